/*
 *  architect/index.ts — Public API for dungeon generation
 *  deepmire
 */

export * from "./rooms.js";
export * from "./analysis.js";
export * from "./architect.js";

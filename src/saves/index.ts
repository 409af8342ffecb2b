/*
 *  saves/index.ts — Barrel export for save and load
 *  deepmire
 */

export * from "./save-schema.js";
export * from "./save-codec.js";
export * from "./save-load.js";

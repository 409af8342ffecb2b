/*
 *  types/index.ts — Barrel export for all type definitions
 *  deepmire
 */

export * from "./constants.js";
export * from "./enums.js";
export * from "./types.js";
export * from "./platform.js";

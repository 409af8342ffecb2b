/*
 *  state/index.ts — Barrel export for map and session state
 *  deepmire
 */

export * from "./game-map.js";
export * from "./game-state.js";

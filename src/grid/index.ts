/*
 *  grid/index.ts — Barrel export for grid operations
 *  deepmire
 */

export * from "./grid.js";

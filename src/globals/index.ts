/*
 *  globals/index.ts — Barrel export for catalogs, tables and configuration
 *  deepmire
 */

export * from "./tables.js";
export * from "./tile-catalog.js";
export * from "./monster-catalog.js";
export * from "./game-config.js";

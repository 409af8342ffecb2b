/*
 *  math/index.ts — Barrel export for random streams
 *  deepmire
 */

export * from "./rng.js";

/*
 *  combat/index.ts — Barrel export for combat
 *  deepmire
 */

export * from "./combat-math.js";
export * from "./combat-damage.js";
export * from "./combat-attack.js";

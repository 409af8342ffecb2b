/*
 *  time/index.ts — Barrel export for scheduling
 *  deepmire
 */

export * from "./turn-queue.js";
export * from "./turn-processing.js";

/*
 *  io/index.ts — Barrel export for messages and input
 *  deepmire
 */

export * from "./io-messages.js";
export * from "./io-input.js";

/*
 *  light/index.ts — Barrel export for field-of-view and vision
 *  deepmire
 */

export * from "./fov.js";
export * from "./vision.js";

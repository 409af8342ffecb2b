/*
 *  platform/index.ts — Barrel exports for the platform module
 *  deepmire
 */

export type { Platform, RenderSurface, InputSource, SessionView } from "../types/platform.js";

export { renderMapText, statusLine, UNEXPLORED_CHAR } from "./glyph-map.js";
export { nullSurface, createCaptureSurface, type CaptureSurface } from "./null-platform.js";
export {
    createScriptedInput,
    createHeadlessPlatform,
    type ScriptedInput,
    type ScriptedInputOptions,
} from "./scripted-input.js";

/*
 *  null-platform.ts — Headless render surfaces
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { RenderSurface, SessionView } from "../types/platform.js";
import { renderMapText, statusLine } from "./glyph-map.js";

/**
 * A surface that draws nothing.
 *
 * Useful for:
 *  - Unit testing game logic without a display
 *  - Headless simulation / AI-driven runs
 */
export const nullSurface: RenderSurface = {
    render(_view: SessionView): void {
        // No-op
    },
};

export interface CaptureSurface extends RenderSurface {
    /** Every frame rendered so far, as text lines (status line last). */
    readonly frames: string[][];
    lastFrame(): string[] | null;
}

/** A surface that keeps a text copy of every frame. */
export function createCaptureSurface(): CaptureSurface {
    const frames: string[][] = [];
    return {
        frames,
        render(view) {
            frames.push([...renderMapText(view), statusLine(view)]);
        },
        lastFrame() {
            return frames.at(-1) ?? null;
        },
    };
}

/*
 *  tables.ts — Direction tables and distance helpers
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Pos } from "../types/types.js";

// =============================================================================
// Direction tables
// =============================================================================

/**
 * Neighbor directions, indexed by `Direction`: N, S, W, E, NW, SW, NE, SE.
 * First 4 are cardinal, all 8 include diagonals.
 * Each entry is [dx, dy]; y grows downward.
 */
export const nbDirs: readonly (readonly [number, number])[] = Object.freeze([
    [0, -1], [0, 1], [-1, 0], [1, 0],
    [-1, -1], [-1, 1], [1, -1], [1, 1],
] as const);

// =============================================================================
// Distances
// =============================================================================

/** King-move distance: the number of 8-way steps between two tiles. */
export function chebyshevDistance(a: Pos, b: Pos): number {
    return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

/** Squared Euclidean distance. */
export function distanceSquared(a: Pos, b: Pos): number {
    const dx = a.x - b.x;
    const dy = a.y - b.y;
    return dx * dx + dy * dy;
}

export function posEq(a: Pos, b: Pos): boolean {
    return a.x === b.x && a.y === b.y;
}

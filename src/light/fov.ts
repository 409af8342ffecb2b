/*
 *  fov.ts — Field-of-view (symmetric shadowcasting) computation
 *  deepmire
 *
 *  The scan walks four quadrants row by row outward from the origin.
 *  Slopes are kept as exact fractions so no rounding can make the
 *  result depend on which end of a sight line is the observer. A floor
 *  tile is only lit when its center lies inside the visible wedge, which
 *  makes visibility between floor tiles symmetric; walls are lit when
 *  any part of them is seen.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Pos } from "../types/types.js";
import { allocGrid, type Grid } from "../grid/grid.js";

// =============================================================================
// Context interface for FOV computations
// =============================================================================

export interface FOVContext {
    width: number;
    height: number;
    /** Whether the in-bounds tile at (x, y) stops sight. */
    blocksVision(x: number, y: number): boolean;
}

// =============================================================================
// Exact slopes
// =============================================================================

/** num / den with den > 0. */
interface Slope {
    num: number;
    den: number;
}

/** Slope through the near-left corner of column `col` at `depth`. */
function slopeOf(depth: number, col: number): Slope {
    return { num: 2 * col - 1, den: 2 * depth };
}

/** Round depth * slope half-up to an integer column. */
function roundTiesUp(depth: number, s: Slope): number {
    return Math.floor((2 * depth * s.num + s.den) / (2 * s.den));
}

/** Round depth * slope half-down to an integer column. */
function roundTiesDown(depth: number, s: Slope): number {
    return Math.ceil((2 * depth * s.num - s.den) / (2 * s.den));
}

// =============================================================================
// Quadrant transformation
// =============================================================================

enum Cardinal {
    North,
    East,
    South,
    West,
}

/**
 * Map a (depth, col) pair in quadrant space to map coordinates.
 * Depth grows away from the origin; col runs across the row.
 */
export function quadrantToMap(origin: Pos, quadrant: number, depth: number, col: number): Pos {
    switch (quadrant) {
        case Cardinal.North:
            return { x: origin.x + col, y: origin.y - depth };
        case Cardinal.South:
            return { x: origin.x + col, y: origin.y + depth };
        case Cardinal.East:
            return { x: origin.x + depth, y: origin.y + col };
        case Cardinal.West:
            return { x: origin.x - depth, y: origin.y + col };
        default:
            throw new Error(`quadrantToMap: unknown quadrant ${quadrant}`);
    }
}

// =============================================================================
// Shadowcasting
// =============================================================================

interface ScanState {
    grid: Grid;
    origin: Pos;
    quadrant: number;
    radiusSquared: number;
    maxDepth: number;
    ctx: FOVContext;
}

function inBounds(ctx: FOVContext, pos: Pos): boolean {
    return pos.x >= 0 && pos.y >= 0 && pos.x < ctx.width && pos.y < ctx.height;
}

/** Out-of-bounds tiles behave as walls that are never marked. */
function isWallAt(state: ScanState, depth: number, col: number): boolean {
    const pos = quadrantToMap(state.origin, state.quadrant, depth, col);
    return !inBounds(state.ctx, pos) || state.ctx.blocksVision(pos.x, pos.y);
}

function reveal(state: ScanState, depth: number, col: number): void {
    const pos = quadrantToMap(state.origin, state.quadrant, depth, col);
    if (!inBounds(state.ctx, pos)) {
        return;
    }
    if (depth * depth + col * col > state.radiusSquared) {
        return;
    }
    state.grid[pos.x][pos.y] = 1;
}

/** The tile's center lies within the wedge between the two slopes. */
function isSymmetric(depth: number, col: number, start: Slope, end: Slope): boolean {
    return col * start.den >= depth * start.num && col * end.den <= depth * end.num;
}

/**
 * Scan one row of a quadrant and recurse into the rows behind it.
 */
function scanRow(state: ScanState, depth: number, startSlope: Slope, endSlope: Slope): void {
    if (depth > state.maxDepth) {
        return;
    }

    let start = startSlope;
    const minCol = roundTiesUp(depth, start);
    const maxCol = roundTiesDown(depth, endSlope);
    let prevWasWall: boolean | null = null;

    for (let col = minCol; col <= maxCol; col++) {
        const wall = isWallAt(state, depth, col);

        if (wall || isSymmetric(depth, col, start, endSlope)) {
            reveal(state, depth, col);
        }
        if (prevWasWall === true && !wall) {
            start = slopeOf(depth, col);
        }
        if (prevWasWall === false && wall) {
            scanRow(state, depth + 1, start, slopeOf(depth, col));
        }
        prevWasWall = wall;
    }

    if (prevWasWall === false) {
        scanRow(state, depth + 1, start, endSlope);
    }
}

/**
 * Compute the tiles visible from `origin` within `radius` (Euclidean).
 * Returns a width × height grid with 1 on visible tiles and 0 elsewhere.
 * The origin is always visible.
 */
export function computeFOV(origin: Pos, radius: number, ctx: FOVContext): Grid {
    const grid = allocGrid(ctx.width, ctx.height, 0);
    if (!inBounds(ctx, origin)) {
        return grid;
    }
    grid[origin.x][origin.y] = 1;

    for (let quadrant = Cardinal.North; quadrant <= Cardinal.West; quadrant++) {
        scanRow(
            {
                grid,
                origin,
                quadrant,
                radiusSquared: radius * radius,
                maxDepth: radius,
                ctx,
            },
            1,
            { num: -1, den: 1 },
            { num: 1, den: 1 },
        );
    }
    return grid;
}

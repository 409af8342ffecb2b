/*
 *  grid.ts — Numeric grid operations
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { INVALID_POS, type Pos } from "../types/types.js";
import { nbDirs } from "../globals/tables.js";
import type { Rng } from "../math/rng.js";

// =============================================================================
// Grid allocation
// =============================================================================

/** Grid type: column-major 2D array [x][y]. */
export type Grid = number[][];

/** Allocate a new width × height grid, every cell set to `fillValue`. */
export function allocGrid(width: number, height: number, fillValue = 0): Grid {
    const grid: Grid = new Array(width);
    for (let i = 0; i < width; i++) {
        grid[i] = new Array<number>(height).fill(fillValue);
    }
    return grid;
}

export function gridWidth(grid: Grid): number {
    return grid.length;
}

export function gridHeight(grid: Grid): number {
    return grid.length > 0 ? grid[0].length : 0;
}

export function coordinatesAreInGrid(grid: Grid, x: number, y: number): boolean {
    return x >= 0 && x < gridWidth(grid) && y >= 0 && y < gridHeight(grid);
}

// =============================================================================
// Basic grid operations
// =============================================================================

/** Copy all values from `from` grid into `to` grid. Both must share dimensions. */
export function copyGrid(to: Grid, from: Grid): void {
    for (let i = 0; i < gridWidth(from); i++) {
        for (let j = 0; j < gridHeight(from); j++) {
            to[i][j] = from[i][j];
        }
    }
}

/** Fill every cell in the grid with `fillValue`. */
export function fillGrid(grid: Grid, fillValue: number): void {
    for (const column of grid) {
        column.fill(fillValue);
    }
}

// =============================================================================
// Flood fill
// =============================================================================

/**
 * Flood-fills the grid from (x, y) along cells whose value lies within the
 * eligible range, writing `fillValue`. Uses cardinal neighbours only, or all
 * eight when `eightWay` is set. Returns the number of cells filled.
 *
 * `fillValue` must lie outside the eligible range or the fill never ends.
 */
export function floodFillGrid(
    grid: Grid,
    x: number,
    y: number,
    eligibleValueMin: number,
    eligibleValueMax: number,
    fillValue: number,
    eightWay = false,
): number {
    if (!coordinatesAreInGrid(grid, x, y)) {
        return 0;
    }
    if (fillValue >= eligibleValueMin && fillValue <= eligibleValueMax) {
        throw new Error("floodFillGrid: fillValue lies inside the eligible range");
    }

    const dirCount = eightWay ? 8 : 4;
    const stack: Pos[] = [{ x, y }];
    grid[x][y] = fillValue;
    let fillCount = 1;

    while (stack.length > 0) {
        const cell = stack.pop();
        if (cell === undefined) break;
        for (let dir = 0; dir < dirCount; dir++) {
            const newX = cell.x + nbDirs[dir][0];
            const newY = cell.y + nbDirs[dir][1];
            if (
                coordinatesAreInGrid(grid, newX, newY)
                && grid[newX][newY] >= eligibleValueMin
                && grid[newX][newY] <= eligibleValueMax
            ) {
                grid[newX][newY] = fillValue;
                fillCount++;
                stack.push({ x: newX, y: newY });
            }
        }
    }
    return fillCount;
}

// =============================================================================
// Drawing primitives
// =============================================================================

/** Draw a filled rectangle on the grid, clipped to its bounds. */
export function drawRectangleOnGrid(
    grid: Grid,
    x: number,
    y: number,
    width: number,
    height: number,
    value: number,
): void {
    for (let i = Math.max(0, x); i < Math.min(gridWidth(grid), x + width); i++) {
        for (let j = Math.max(0, y); j < Math.min(gridHeight(grid), y + height); j++) {
            grid[i][j] = value;
        }
    }
}

// =============================================================================
// Counting & searching
// =============================================================================

/** Count the number of cells in the grid that equal `validValue`. */
export function validLocationCount(grid: Grid, validValue: number): number {
    let count = 0;
    for (const column of grid) {
        for (const cell of column) {
            if (cell === validValue) {
                count++;
            }
        }
    }
    return count;
}

/**
 * Choose a random cell from the grid that equals `validValue`.
 * Returns a copy of INVALID_POS if no valid locations exist.
 */
export function randomLocationInGrid(grid: Grid, validValue: number, rng: Rng): Pos {
    const locationCount = validLocationCount(grid, validValue);
    if (locationCount <= 0) {
        return { ...INVALID_POS };
    }

    let index = rng.range(0, locationCount - 1);
    for (let i = 0; i < gridWidth(grid); i++) {
        for (let j = 0; j < gridHeight(grid); j++) {
            if (grid[i][j] === validValue) {
                if (index === 0) {
                    return { x: i, y: j };
                }
                index--;
            }
        }
    }
    return { ...INVALID_POS };
}

/*
 *  analysis.ts — Connectivity checks over a generated map
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { GameMap, Pos } from "../types/types.js";
import { allocGrid, floodFillGrid, validLocationCount, type Grid } from "../grid/grid.js";
import { isInBounds, isWalkable } from "../state/game-map.js";

const BLOCKED = 0;
const OPEN = 1;
const REACHED = 2;

/** Grid with OPEN on walkable tiles and BLOCKED elsewhere. */
export function passabilityGrid(map: GameMap): Grid {
    const grid = allocGrid(map.width, map.height, BLOCKED);
    for (let x = 0; x < map.width; x++) {
        for (let y = 0; y < map.height; y++) {
            if (isWalkable(map, { x, y })) {
                grid[x][y] = OPEN;
            }
        }
    }
    return grid;
}

/**
 * Number of walkable tiles that cannot be reached from `entry` with
 * 8-way steps. Every walkable tile counts as unreachable when the entry
 * itself is not walkable.
 */
export function unreachableFloorCount(map: GameMap, entry: Pos): number {
    const grid = passabilityGrid(map);
    if (isInBounds(map, entry.x, entry.y) && grid[entry.x][entry.y] === OPEN) {
        floodFillGrid(grid, entry.x, entry.y, OPEN, OPEN, REACHED, true);
    }
    return validLocationCount(grid, OPEN);
}

/** Every walkable tile is reachable from the entry. */
export function isFullyConnected(map: GameMap, entry: Pos): boolean {
    return isWalkable(map, entry) && unreachableFloorCount(map, entry) === 0;
}

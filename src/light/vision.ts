/*
 *  vision.ts — Per-turn visibility pass over the map
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { GameMap, Pos } from "../types/types.js";
import { blocksVision } from "../state/game-map.js";
import type { Grid } from "../grid/grid.js";
import { computeFOV, type FOVContext } from "./fov.js";

export function fovContextForMap(map: GameMap): FOVContext {
    return {
        width: map.width,
        height: map.height,
        blocksVision: (x, y) => blocksVision(map, { x, y }),
    };
}

/**
 * Recompute what the observer sees. Clears every `visible` flag, then
 * marks the tiles in view as visible and explored. `explored` is never
 * cleared. Returns the visibility mask.
 */
export function updateVision(map: GameMap, observer: Pos, radius: number): Grid {
    const mask = computeFOV(observer, radius, fovContextForMap(map));
    for (let x = 0; x < map.width; x++) {
        for (let y = 0; y < map.height; y++) {
            const tile = map.tiles[x][y];
            tile.visible = mask[x][y] === 1;
            if (tile.visible) {
                tile.explored = true;
            }
        }
    }
    return mask;
}

/** Whether `to` is in view from `from`, ignoring the stored flags. */
export function canSee(map: GameMap, from: Pos, to: Pos, radius: number): boolean {
    const mask = computeFOV(from, radius, fovContextForMap(map));
    return mask[to.x]?.[to.y] === 1;
}

/*
 *  tile-catalog.ts — Terrain kinds and their static properties
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { TileKind } from "../types/enums.js";
import { FLOOR_CHAR, WALL_CHAR } from "../types/constants.js";
import type { TileType } from "../types/types.js";

export const tileCatalog: Readonly<Record<TileKind, Readonly<TileType>>> = Object.freeze({
    [TileKind.Wall]: { name: "wall", displayChar: WALL_CHAR, walkable: false, transparent: false },
    [TileKind.Floor]: { name: "floor", displayChar: FLOOR_CHAR, walkable: true, transparent: true },
});

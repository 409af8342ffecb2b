/*
 *  game-map.ts — Map construction, tile queries and the spatial index
 *  deepmire
 *
 *  The map owns its tiles. The creature index only records which creature
 *  id stands where; the creatures themselves belong to the session.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature, GameMap, Pos, Tile } from "../types/types.js";
import { TileKind } from "../types/enums.js";
import { tileCatalog } from "../globals/tile-catalog.js";

// =============================================================================
// Construction
// =============================================================================

/** Create a map filled with a single terrain kind, nothing explored or visible. */
export function createGameMap(width: number, height: number, fill: TileKind = TileKind.Wall): GameMap {
    const tiles: Tile[][] = new Array(width);
    for (let x = 0; x < width; x++) {
        tiles[x] = new Array(height);
        for (let y = 0; y < height; y++) {
            tiles[x][y] = { kind: fill, explored: false, visible: false };
        }
    }
    return { width, height, tiles, creatureIndex: new Map() };
}

// =============================================================================
// Tile queries
// =============================================================================

export function isInBounds(map: GameMap, x: number, y: number): boolean {
    return x >= 0 && x < map.width && y >= 0 && y < map.height;
}

export function tileAt(map: GameMap, pos: Pos): Tile {
    return map.tiles[pos.x][pos.y];
}

export function setTileKind(map: GameMap, pos: Pos, kind: TileKind): void {
    map.tiles[pos.x][pos.y].kind = kind;
}

/** Out-of-bounds tiles are never walkable. */
export function isWalkable(map: GameMap, pos: Pos): boolean {
    return isInBounds(map, pos.x, pos.y) && tileCatalog[map.tiles[pos.x][pos.y].kind].walkable;
}

/** Out-of-bounds tiles block sight. */
export function blocksVision(map: GameMap, pos: Pos): boolean {
    return !isInBounds(map, pos.x, pos.y) || !tileCatalog[map.tiles[pos.x][pos.y].kind].transparent;
}

export function countTiles(map: GameMap, kind: TileKind): number {
    let count = 0;
    for (const column of map.tiles) {
        for (const tile of column) {
            if (tile.kind === kind) count++;
        }
    }
    return count;
}

// =============================================================================
// Spatial index
// =============================================================================

export function positionKey(map: GameMap, pos: Pos): number {
    return pos.x + pos.y * map.width;
}

/** Id of the creature standing at `pos`, or null. */
export function creatureIdAt(map: GameMap, pos: Pos): number | null {
    return map.creatureIndex.get(positionKey(map, pos)) ?? null;
}

export function isOccupied(map: GameMap, pos: Pos): boolean {
    return map.creatureIndex.has(positionKey(map, pos));
}

/**
 * Put a creature on the map at `pos` and record it in the index.
 * Throws if the tile is out of bounds or already taken.
 */
export function placeCreature(map: GameMap, creature: Creature, pos: Pos): void {
    if (!isInBounds(map, pos.x, pos.y)) {
        throw new Error(`placeCreature: (${pos.x}, ${pos.y}) is outside the map`);
    }
    const key = positionKey(map, pos);
    const occupant = map.creatureIndex.get(key);
    if (occupant !== undefined && occupant !== creature.id) {
        throw new Error(`placeCreature: (${pos.x}, ${pos.y}) is already occupied by creature ${occupant}`);
    }
    map.creatureIndex.set(key, creature.id);
    creature.loc = { x: pos.x, y: pos.y };
}

/** Drop a creature from the index. Its `loc` is left as it was. */
export function removeCreatureFromMap(map: GameMap, creature: Creature): void {
    const key = positionKey(map, creature.loc);
    if (map.creatureIndex.get(key) === creature.id) {
        map.creatureIndex.delete(key);
    }
}

/** Move a creature between tiles, keeping the index in step. */
export function moveCreature(map: GameMap, creature: Creature, to: Pos): void {
    if (!isInBounds(map, to.x, to.y)) {
        throw new Error(`moveCreature: (${to.x}, ${to.y}) is outside the map`);
    }
    const occupant = creatureIdAt(map, to);
    if (occupant !== null && occupant !== creature.id) {
        throw new Error(`moveCreature: (${to.x}, ${to.y}) is already occupied by creature ${occupant}`);
    }
    removeCreatureFromMap(map, creature);
    placeCreature(map, creature, to);
}

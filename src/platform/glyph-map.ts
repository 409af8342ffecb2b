/*
 *  glyph-map.ts — Text rendering of a session view
 *  deepmire
 *
 *  One character per tile. Unexplored tiles are blank, remembered tiles
 *  show their terrain, and creatures are drawn only on tiles in view.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { SessionView } from "../types/platform.js";
import { tileCatalog } from "../globals/tile-catalog.js";

export const UNEXPLORED_CHAR = " ";

/** Rows of the map as strings, top row first. */
export function renderMapText(view: SessionView): string[] {
    const { map } = view;
    const rows: string[][] = [];
    for (let y = 0; y < map.height; y++) {
        const row: string[] = [];
        for (let x = 0; x < map.width; x++) {
            const tile = map.tiles[x][y];
            row.push(tile.explored ? tileCatalog[tile.kind].displayChar : UNEXPLORED_CHAR);
        }
        rows.push(row);
    }

    for (const creature of view.creatures) {
        if (map.tiles[creature.loc.x][creature.loc.y].visible) {
            rows[creature.loc.y][creature.loc.x] = creature.displayChar;
        }
    }
    if (!view.player.isDead) {
        rows[view.player.loc.y][view.player.loc.x] = view.player.displayChar;
    }
    return rows.map((row) => row.join(""));
}

/** One-line status: hit points and turn. */
export function statusLine(view: SessionView): string {
    return `HP: ${view.player.currentHP}/${view.player.maxHP}  Turn: ${view.turnNumber}`;
}

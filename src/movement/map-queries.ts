/*
 *  map-queries.ts — Creature lookups and step checks on the session map
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature, Pos } from "../types/types.js";
import { creatureById, type GameSession } from "../state/game-state.js";
import { creatureIdAt, isInBounds, isWalkable } from "../state/game-map.js";

/** Live creature standing at `pos`, or null. */
export function creatureAt(session: GameSession, pos: Pos): Creature | null {
    if (!isInBounds(session.map, pos.x, pos.y)) {
        return null;
    }
    const id = creatureIdAt(session.map, pos);
    return id === null ? null : creatureById(session, id);
}

/** True for the eight single-tile steps; (0, 0) is not a step. */
export function isUnitStep(dx: number, dy: number): boolean {
    return Number.isInteger(dx) && Number.isInteger(dy)
        && Math.abs(dx) <= 1 && Math.abs(dy) <= 1
        && (dx !== 0 || dy !== 0);
}

export function offset(pos: Pos, dx: number, dy: number): Pos {
    return { x: pos.x + dx, y: pos.y + dy };
}

/** Terrain lets a creature stand at `pos` and no blocking creature is there. */
export function isFreeForMovement(session: GameSession, pos: Pos): boolean {
    if (!isWalkable(session.map, pos)) {
        return false;
    }
    const occupant = creatureAt(session, pos);
    return occupant === null || !occupant.blocksMovement;
}

/*
 *  monster-spawning.ts — Species selection and room population
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature, GameMap, MonsterType, Pos, Room } from "../types/types.js";
import type { Rng } from "../math/rng.js";
import { isOccupied, isWalkable, placeCreature } from "../state/game-map.js";
import { roomRight, roomBottom } from "../architect/rooms.js";
import { generateMonster } from "./monster-creation.js";

/**
 * Choose a species with probability proportional to its frequency.
 * Returns null when the catalog is empty or every frequency is zero.
 */
export function pickMonsterType(
    rng: Rng,
    catalog: readonly Readonly<MonsterType>[],
): Readonly<MonsterType> | null {
    const total = catalog.reduce((sum, type) => sum + Math.max(0, type.frequency), 0);
    if (total <= 0) {
        return null;
    }
    let roll = rng.range(1, total);
    for (const type of catalog) {
        roll -= Math.max(0, type.frequency);
        if (roll <= 0) {
            return type;
        }
    }
    return null;
}

export interface PopulationContext {
    map: GameMap;
    rooms: readonly Room[];
    rng: Rng;
    catalog: readonly Readonly<MonsterType>[];
    maxMonstersPerRoom: number;
    /** Hands out a fresh creature id on every call. */
    allocateId(): number;
}

/**
 * Scatter monsters over every room but the first, which is where the
 * player starts. Each room rolls 0..maxMonstersPerRoom spawn attempts;
 * an attempt that lands on an occupied tile is skipped. Monsters are
 * placed on the map and returned in spawn order.
 */
export function populateRooms(ctx: PopulationContext): Creature[] {
    const spawned: Creature[] = [];

    for (const room of ctx.rooms.slice(1)) {
        const count = ctx.rng.range(0, ctx.maxMonstersPerRoom);
        for (let i = 0; i < count; i++) {
            const loc: Pos = {
                x: ctx.rng.range(room.x + 1, roomRight(room) - 1),
                y: ctx.rng.range(room.y + 1, roomBottom(room) - 1),
            };
            if (!isWalkable(ctx.map, loc) || isOccupied(ctx.map, loc)) {
                continue;
            }
            const type = pickMonsterType(ctx.rng, ctx.catalog);
            if (type === null) {
                return spawned;
            }
            const monster = generateMonster(ctx.allocateId(), type, loc);
            placeCreature(ctx.map, monster, loc);
            spawned.push(monster);
        }
    }
    return spawned;
}

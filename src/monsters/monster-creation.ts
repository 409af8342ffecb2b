/*
 *  monster-creation.ts — Creating the player and monsters
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature, MonsterType, PlayerStats, Pos } from "../types/types.js";
import { ActionCapability } from "../types/enums.js";

export const PLAYER_DISPLAY_CHAR = "@";

/**
 * Build the player creature at full health.
 */
export function createPlayer(id: number, stats: PlayerStats, loc: Pos): Creature {
    return {
        id,
        name: stats.name,
        displayChar: PLAYER_DISPLAY_CHAR,
        loc: { x: loc.x, y: loc.y },
        currentHP: stats.maxHP,
        maxHP: stats.maxHP,
        power: stats.power,
        defense: stats.defense,
        speed: stats.speed,
        capability: ActionCapability.PlayerControlled,
        monsterKind: null,
        blocksMovement: true,
        isDead: false,
    };
}

/**
 * Build a hostile monster of the given species at full health.
 */
export function generateMonster(id: number, type: Readonly<MonsterType>, loc: Pos): Creature {
    return {
        id,
        name: type.name,
        displayChar: type.displayChar,
        loc: { x: loc.x, y: loc.y },
        currentHP: type.maxHP,
        maxHP: type.maxHP,
        power: type.power,
        defense: type.defense,
        speed: type.speed,
        capability: ActionCapability.Hostile,
        monsterKind: type.kind,
        blocksMovement: true,
        isDead: false,
    };
}

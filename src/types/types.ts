/*
 *  types.ts — Core data structures: positions, tiles, maps, creatures
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type {
    ActionCapability, CommandType, MonsterKind, SessionStatus, TileKind, LogLevel,
} from "./enums.js";

// ===== Positions =====

export interface Pos {
    x: number;
    y: number;
}

/** Marker for "no position". Frozen; hand out copies where a caller may keep it. */
export const INVALID_POS: Readonly<Pos> = Object.freeze({ x: -1, y: -1 });

// ===== Tiles & map =====

export interface Tile {
    kind: TileKind;
    /** Seen at least once. Never cleared. */
    explored: boolean;
    /** In the player's field of view this turn. */
    visible: boolean;
}

/** Static properties of a terrain kind. */
export interface TileType {
    name: string;
    displayChar: string;
    walkable: boolean;
    transparent: boolean;
}

export interface GameMap {
    width: number;
    height: number;
    /** Column-major: tiles[x][y]. */
    tiles: Tile[][];
    /** Non-owning spatial index: position key → creature id. */
    creatureIndex: Map<number, number>;
}

// ===== Rooms =====

/** Rectangle including its wall border. Interior is the rectangle minus one tile on each side. */
export interface Room {
    x: number;
    y: number;
    width: number;
    height: number;
}

// ===== Creatures =====

export interface Creature {
    id: number;
    name: string;
    displayChar: string;
    loc: Pos;
    currentHP: number;
    maxHP: number;
    power: number;
    defense: number;
    /** Ticks spent per action. Lower is faster. */
    speed: number;
    capability: ActionCapability;
    monsterKind: MonsterKind | null;
    blocksMovement: boolean;
    isDead: boolean;
}

/** Catalog entry describing a monster species. */
export interface MonsterType {
    kind: MonsterKind;
    name: string;
    displayChar: string;
    maxHP: number;
    power: number;
    defense: number;
    speed: number;
    /** Relative spawn weight. */
    frequency: number;
}

// ===== Turn queue =====

export interface TurnEntry {
    creatureId: number;
    /** Absolute tick at which the creature acts next. */
    time: number;
    /** Insertion order; breaks ties between equal times. */
    sequence: number;
}

// ===== Commands =====

export type PlayerCommand =
    | { type: CommandType.Move; dx: number; dy: number }
    | { type: CommandType.Wait }
    | { type: CommandType.Interact; dx: number; dy: number }
    | { type: CommandType.Quit };

/** Outcome of trying to perform an action. */
export interface ActionResult {
    /** False when the action was rejected; the actor keeps its turn. */
    tookTurn: boolean;
    /** Ticks consumed when tookTurn is true. */
    cost: number;
    reason?: string;
}

// ===== Messages =====

export interface Message {
    text: string;
    /** How many times the same text was logged back to back. */
    count: number;
    turnNumber: number;
}

// ===== Configuration =====

export interface PlayerStats {
    name: string;
    maxHP: number;
    power: number;
    defense: number;
    speed: number;
}

export interface GameConfig {
    mapWidth: number;
    mapHeight: number;
    roomMinSize: number;
    roomMaxSize: number;
    maxRooms: number;
    maxMonstersPerRoom: number;
    maxGenerationAttempts: number;
    fovRadius: number;
    messageCapacity: number;
    player: PlayerStats;
    logLevel: LogLevel;
}

// ===== Session status =====

export interface SessionSummary {
    status: SessionStatus;
    turnNumber: number;
    seed: bigint;
}

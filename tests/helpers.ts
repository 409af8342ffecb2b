/*
 *  helpers.ts — Shared fixtures for the test suite
 *  deepmire
 */

import type { Creature, GameMap } from "../src/types/types.js";
import { ActionCapability, LogLevel, MonsterKind, SessionStatus, TileKind } from "../src/types/enums.js";
import { createGameMap, placeCreature, setTileKind } from "../src/state/game-map.js";
import type { GameSession } from "../src/state/game-state.js";
import { resolveConfig, type GameConfigOverrides } from "../src/globals/game-config.js";
import { monsterTypeForKind } from "../src/globals/monster-catalog.js";
import { tileCatalog } from "../src/globals/tile-catalog.js";
import { createPlayer, generateMonster } from "../src/monsters/monster-creation.js";
import { createRng } from "../src/math/rng.js";
import { silentLogger, type Logger } from "../src/logging/logger.js";
import { TurnQueue } from "../src/time/turn-queue.js";
import { refreshVision } from "../src/time/turn-processing.js";
import { MessageLog } from "../src/io/io-messages.js";

// =============================================================================
// Maps
// =============================================================================

/** "#" is wall; every other character is floor. Rows run top to bottom. */
export function mapFromAscii(rows: readonly string[]): GameMap {
    const map = createGameMap(rows[0].length, rows.length, TileKind.Floor);
    for (let y = 0; y < rows.length; y++) {
        for (let x = 0; x < rows[y].length; x++) {
            if (rows[y][x] === "#") {
                setTileKind(map, { x, y }, TileKind.Wall);
            }
        }
    }
    return map;
}

export function mapToAscii(map: GameMap): string[] {
    const rows: string[] = [];
    for (let y = 0; y < map.height; y++) {
        let row = "";
        for (let x = 0; x < map.width; x++) {
            row += tileCatalog[map.tiles[x][y].kind].displayChar;
        }
        rows.push(row);
    }
    return rows;
}

// =============================================================================
// Creatures
// =============================================================================

export function makeCreature(overrides: Partial<Creature> = {}): Creature {
    return {
        id: 1,
        name: "orc",
        displayChar: "o",
        loc: { x: 0, y: 0 },
        currentHP: 10,
        maxHP: 10,
        power: 3,
        defense: 0,
        speed: 100,
        capability: ActionCapability.Hostile,
        monsterKind: MonsterKind.Orc,
        blocksMovement: true,
        isDead: false,
        ...overrides,
    };
}

/** Creature `id` from the registry; fails the test if it is missing. */
export function creatureOf(session: GameSession, id: number): Creature {
    const creature = session.creatures.get(id);
    if (creature === undefined) {
        throw new Error(`no creature ${id} in the session`);
    }
    return creature;
}

// =============================================================================
// Logging
// =============================================================================

export interface RecordedLine {
    level: "debug" | "info" | "warn" | "error";
    tag: string;
    message: string;
}

export function makeRecordingLogger(tag = "test"): { logger: Logger; lines: RecordedLine[] } {
    const lines: RecordedLine[] = [];
    const build = (t: string): Logger => ({
        debug: (message) => { lines.push({ level: "debug", tag: t, message }); },
        info: (message) => { lines.push({ level: "info", tag: t, message }); },
        warn: (message) => { lines.push({ level: "warn", tag: t, message }); },
        error: (message) => { lines.push({ level: "error", tag: t, message }); },
        child: (childTag) => build(`${t}:${childTag}`),
    });
    return { logger: build(tag), lines };
}

// =============================================================================
// Sessions
// =============================================================================

export interface SessionFixtureOptions {
    config?: GameConfigOverrides;
    logger?: Logger;
}

function creatureForGlyph(glyph: string, id: number, x: number, y: number): Creature | null {
    const loc = { x, y };
    switch (glyph) {
        case "o":
            return generateMonster(id, monsterTypeForKind(MonsterKind.Orc), loc);
        case "T":
            return generateMonster(id, monsterTypeForKind(MonsterKind.Troll), loc);
        case "S":
            return makeCreature({
                id,
                name: "statue",
                displayChar: "S",
                loc,
                power: 0,
                capability: ActionCapability.Inert,
                monsterKind: null,
            });
        default:
            return null;
    }
}

/**
 * Session over an ASCII map. Legend: "#" wall, "." floor, "@" player,
 * "o" orc, "T" troll, "S" inert statue. The player gets id 0; the others
 * are numbered from 1 in reading order. Everyone is queued at tick 0 with
 * the player first, and the first field of view is computed.
 */
export function makeSession(rows: readonly string[], options: SessionFixtureOptions = {}): GameSession {
    const map = mapFromAscii(rows);
    const config = resolveConfig({
        mapWidth: map.width,
        mapHeight: map.height,
        roomMinSize: 3,
        roomMaxSize: 3,
        logLevel: LogLevel.Silent,
        ...options.config,
    });

    let player: Creature | null = null;
    const others: Creature[] = [];
    let nextId = 1;
    for (let y = 0; y < rows.length; y++) {
        for (let x = 0; x < rows[y].length; x++) {
            if (rows[y][x] === "@") {
                player = createPlayer(0, config.player, { x, y });
                continue;
            }
            const creature = creatureForGlyph(rows[y][x], nextId, x, y);
            if (creature !== null) {
                others.push(creature);
                nextId++;
            }
        }
    }
    if (player === null) {
        throw new Error("makeSession: the map has no '@'");
    }

    const creatures = new Map<number, Creature>();
    const queue = new TurnQueue();
    for (const creature of [player, ...others]) {
        placeCreature(map, creature, creature.loc);
        creatures.set(creature.id, creature);
        queue.schedule(creature.id, 0);
    }

    const session: GameSession = {
        config,
        seed: 1n,
        requestedSeed: 1n,
        map,
        creatures,
        player,
        queue,
        rng: createRng(1n),
        messages: new MessageLog(config.messageCapacity),
        nextCreatureId: nextId,
        turnNumber: 0,
        status: SessionStatus.InProgress,
        logger: options.logger ?? silentLogger,
    };
    refreshVision(session);
    return session;
}

/** Text of the newest `n` messages, oldest first. */
export function lastMessages(session: GameSession, n: number): string[] {
    return session.messages.messages().slice(-n).map((m) => m.text);
}

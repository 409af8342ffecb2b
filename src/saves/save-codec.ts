/*
 *  save-codec.ts — Session to JSON and back
 *  deepmire
 *
 *  Loading is all or nothing: the document is validated against the
 *  schema and then cross-checked (positions, occupancy, queue contents)
 *  before any session object is built. Every failure surfaces as a
 *  SaveLoadError.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature, GameMap } from "../types/types.js";
import { ActionCapability, SessionStatus, TileKind } from "../types/enums.js";
import { FLOOR_CHAR, SAVE_FORMAT_VERSION, WALL_CHAR } from "../types/constants.js";
import { SaveLoadError } from "../errors.js";
import { restoreRng } from "../math/rng.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { createGameMap, placeCreature } from "../state/game-map.js";
import type { GameSession } from "../state/game-state.js";
import { TurnQueue } from "../time/turn-queue.js";
import { MessageLog } from "../io/io-messages.js";
import { updateVision } from "../light/vision.js";
import { saveDocumentSchema, type SaveDocument, type SaveDocumentInput, type SavedCreature } from "./save-schema.js";

// =============================================================================
// Encoding
// =============================================================================

function encodeMap(map: GameMap): SaveDocumentInput["map"] {
    const rows: string[] = [];
    const explored: string[] = [];
    for (let y = 0; y < map.height; y++) {
        let row = "";
        let seen = "";
        for (let x = 0; x < map.width; x++) {
            const tile = map.tiles[x][y];
            row += tile.kind === TileKind.Wall ? WALL_CHAR : FLOOR_CHAR;
            seen += tile.explored ? "1" : "0";
        }
        rows.push(row);
        explored.push(seen);
    }
    return { width: map.width, height: map.height, rows, explored };
}

function encodeCreature(c: Creature): SaveDocumentInput["creatures"][number] {
    return {
        id: c.id,
        name: c.name,
        displayChar: c.displayChar,
        loc: { x: c.loc.x, y: c.loc.y },
        currentHP: c.currentHP,
        maxHP: c.maxHP,
        power: c.power,
        defense: c.defense,
        speed: c.speed,
        capability: c.capability,
        monsterKind: c.monsterKind,
        blocksMovement: c.blocksMovement,
    };
}

/**
 * Build the save document for a session. A session whose player has died
 * cannot be saved; a quit session saves as a game to resume.
 */
export function encodeSession(session: GameSession): SaveDocumentInput {
    if (session.status === SessionStatus.PlayerDied || session.player.isDead) {
        throw new Error("encodeSession: cannot save a game whose player has died");
    }
    return {
        version: SAVE_FORMAT_VERSION,
        seed: session.seed.toString(),
        requestedSeed: session.requestedSeed.toString(),
        turnNumber: session.turnNumber,
        nextCreatureId: session.nextCreatureId,
        playerId: session.player.id,
        config: session.config,
        map: encodeMap(session.map),
        creatures: [...session.creatures.values()].map(encodeCreature),
        queue: {
            currentTime: session.queue.currentTime,
            nextSequence: session.queue.nextSequence,
            entries: session.queue.entries(),
        },
        rng: session.rng.getState(),
        messages: session.messages.messages(),
    };
}

export function serializeSession(session: GameSession): string {
    return JSON.stringify(encodeSession(session), null, 2);
}

// =============================================================================
// Decoding
// =============================================================================

/** Every inconsistency between the parts of a schema-valid document. */
export function saveDocumentProblems(doc: SaveDocument): string[] {
    const problems: string[] = [];
    const { map, config } = doc;

    if (map.width !== config.mapWidth || map.height !== config.mapHeight) {
        problems.push(
            `map is ${map.width}x${map.height} but the config says ${config.mapWidth}x${config.mapHeight}`,
        );
    }
    if (map.rows.length !== map.height || map.rows.some((row) => row.length !== map.width)) {
        problems.push("terrain rows do not match the map size");
    }
    if (map.explored.length !== map.height || map.explored.some((row) => row.length !== map.width)) {
        problems.push("explored rows do not match the map size");
    }

    const ids = new Set<number>();
    const occupied = new Map<string, number>();
    for (const c of doc.creatures) {
        if (ids.has(c.id)) {
            problems.push(`creature id ${c.id} appears twice`);
        }
        ids.add(c.id);
        if (c.id >= doc.nextCreatureId) {
            problems.push(`creature id ${c.id} is not below nextCreatureId ${doc.nextCreatureId}`);
        }
        const { x, y } = c.loc;
        if (x < 0 || y < 0 || x >= map.width || y >= map.height) {
            problems.push(`creature ${c.id} is outside the map at (${x}, ${y})`);
            continue;
        }
        if (map.rows[y]?.[x] !== FLOOR_CHAR) {
            problems.push(`creature ${c.id} stands in a wall at (${x}, ${y})`);
        }
        if (c.blocksMovement) {
            const key = `${x},${y}`;
            const other = occupied.get(key);
            if (other !== undefined) {
                problems.push(`creatures ${other} and ${c.id} share (${x}, ${y})`);
            }
            occupied.set(key, c.id);
        }
    }

    const players = doc.creatures.filter((c) => c.capability === ActionCapability.PlayerControlled);
    if (players.length !== 1) {
        problems.push(`expected exactly one player, found ${players.length}`);
    } else if (players[0].id !== doc.playerId) {
        problems.push(`playerId ${doc.playerId} does not name the player creature`);
    }

    const queued = new Set<number>();
    for (const entry of doc.queue.entries) {
        if (queued.has(entry.creatureId)) {
            problems.push(`creature ${entry.creatureId} is queued twice`);
        }
        queued.add(entry.creatureId);
        if (!ids.has(entry.creatureId)) {
            problems.push(`queued creature ${entry.creatureId} does not exist`);
        }
    }
    for (const id of ids) {
        if (!queued.has(id)) {
            problems.push(`creature ${id} is not in the turn queue`);
        }
    }
    return problems;
}

function decodeMap(doc: SaveDocument): GameMap {
    const map = createGameMap(doc.map.width, doc.map.height);
    for (let y = 0; y < map.height; y++) {
        for (let x = 0; x < map.width; x++) {
            const tile = map.tiles[x][y];
            tile.kind = doc.map.rows[y][x] === WALL_CHAR ? TileKind.Wall : TileKind.Floor;
            tile.explored = doc.map.explored[y][x] === "1";
        }
    }
    return map;
}

function decodeCreature(saved: SavedCreature): Creature {
    return { ...saved, loc: { x: saved.loc.x, y: saved.loc.y }, isDead: false };
}

export interface DeserializeOptions {
    logger?: Logger;
}

/**
 * Rebuild a session from a save. Throws SaveLoadError for anything that
 * is not a valid, self-consistent save; no session is returned in that
 * case. Field of view is recomputed from the player's position.
 */
export function deserializeSession(text: string, options: DeserializeOptions = {}): GameSession {
    const logger = options.logger ?? silentLogger;

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new SaveLoadError("Save file is not valid JSON", { cause: err });
    }

    const parsed = saveDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new SaveLoadError(`Save file is malformed: ${detail}`, { cause: parsed.error });
    }
    const doc = parsed.data;

    const problems = saveDocumentProblems(doc);
    if (problems.length > 0) {
        throw new SaveLoadError(`Save file is inconsistent: ${problems.join("; ")}`);
    }

    let queue: TurnQueue;
    try {
        queue = TurnQueue.fromEntries(doc.queue.entries, doc.queue.currentTime, doc.queue.nextSequence);
    } catch (err) {
        throw new SaveLoadError("Save file has an invalid turn queue", { cause: err });
    }

    const map = decodeMap(doc);
    const creatures = new Map<number, Creature>();
    for (const saved of doc.creatures) {
        const creature = decodeCreature(saved);
        if (creature.blocksMovement) {
            placeCreature(map, creature, creature.loc);
        }
        creatures.set(creature.id, creature);
    }
    const player = creatures.get(doc.playerId);
    if (player === undefined) {
        throw new SaveLoadError(`Save file has no creature ${doc.playerId}`);
    }

    const session: GameSession = {
        config: doc.config,
        seed: doc.seed,
        requestedSeed: doc.requestedSeed,
        map,
        creatures,
        player,
        queue,
        rng: restoreRng(doc.rng),
        messages: MessageLog.fromMessages(doc.messages, doc.config.messageCapacity),
        nextCreatureId: doc.nextCreatureId,
        turnNumber: doc.turnNumber,
        status: SessionStatus.InProgress,
        logger,
    };
    updateVision(session.map, player.loc, session.config.fovRadius);
    logger.info(`loaded game at turn ${doc.turnNumber}, ${creatures.size} creatures`);
    return session;
}


/*
 *  game-init.ts — Starting a new session
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature, MonsterType } from "../types/types.js";
import { SessionStatus } from "../types/enums.js";
import { resolveConfig, type GameConfigOverrides } from "../globals/game-config.js";
import { monsterCatalog } from "../globals/monster-catalog.js";
import { randomSeed, formatSeedString } from "../math/rng.js";
import { createConsoleLogger, type Logger } from "../logging/logger.js";
import { generateDungeon, type DigFunction } from "../architect/architect.js";
import { placeCreature } from "../state/game-map.js";
import type { GameSession } from "../state/game-state.js";
import { createPlayer } from "../monsters/monster-creation.js";
import { populateRooms } from "../monsters/monster-spawning.js";
import { TurnQueue } from "../time/turn-queue.js";
import { refreshVision } from "../time/turn-processing.js";
import { MessageLog } from "../io/io-messages.js";

export interface NewSessionOptions {
    /** Dungeon seed; taken from the clock when omitted. Negative seeds wrap to 64 bits. */
    seed?: bigint;
    config?: GameConfigOverrides;
    logger?: Logger;
    /** Species the architect may spawn. */
    catalog?: readonly Readonly<MonsterType>[];
    /** Replaces the dungeon digger. */
    dig?: DigFunction;
}

export const WELCOME_MESSAGE = "Welcome, adventurer, to the depths.";

/**
 * Build a ready-to-play session: dig a connected dungeon, put the player
 * on the entry tile, scatter monsters, compute the first field of view
 * and queue everyone at tick 0 with the player first.
 *
 * Throws ConfigError for bad overrides and GenerationError when no
 * connected dungeon comes out of the allowed attempts.
 */
export function createSession(options: NewSessionOptions = {}): GameSession {
    const config = resolveConfig(options.config);
    const logger = options.logger ?? createConsoleLogger("game", config.logLevel);
    // Seeds are stored as the unsigned 64-bit value the generator runs on.
    const requestedSeed = BigInt.asUintN(64, options.seed ?? randomSeed());

    const dungeon = generateDungeon(requestedSeed, config, {
        logger: logger.child("architect"),
        dig: options.dig,
    });

    let nextCreatureId = 0;
    const allocateId = (): number => nextCreatureId++;

    const player = createPlayer(allocateId(), config.player, dungeon.entry);
    placeCreature(dungeon.map, player, dungeon.entry);

    const monsters = populateRooms({
        map: dungeon.map,
        rooms: dungeon.rooms,
        rng: dungeon.rng,
        catalog: options.catalog ?? monsterCatalog,
        maxMonstersPerRoom: config.maxMonstersPerRoom,
        allocateId,
    });

    const creatures = new Map<number, Creature>();
    const queue = new TurnQueue();
    for (const creature of [player, ...monsters]) {
        creatures.set(creature.id, creature);
        queue.schedule(creature.id, 0);
    }

    const session: GameSession = {
        config,
        seed: dungeon.seed,
        requestedSeed,
        map: dungeon.map,
        creatures,
        player,
        queue,
        rng: dungeon.rng,
        messages: new MessageLog(config.messageCapacity),
        nextCreatureId,
        turnNumber: 0,
        status: SessionStatus.InProgress,
        logger,
    };

    refreshVision(session);
    session.messages.add(WELCOME_MESSAGE, 0);
    logger.info(
        `new game, seed ${formatSeedString(dungeon.seed)}: ${dungeon.rooms.length} rooms, ${monsters.length} monsters`,
    );
    return session;
}

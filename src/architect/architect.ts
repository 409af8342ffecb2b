/*
 *  architect.ts — Top-level dungeon generation orchestration
 *  deepmire
 *
 *  One dig attempt scatters non-overlapping rooms and chains each new room
 *  to the previous one with a tunnel. generateDungeon() wraps attempts in a
 *  bounded retry loop and only hands back layouts that are connected from
 *  the entry tile and free of degenerate rooms.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { GameConfig, GameMap, Pos, Room } from "../types/types.js";
import { INVALID_POS } from "../types/types.js";
import { TileKind } from "../types/enums.js";
import { createGameMap } from "../state/game-map.js";
import { createRng, deriveSeed, type Rng } from "../math/rng.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { GenerationError } from "../errors.js";
import {
    carveRoom, carveTunnel, designRoom, isDegenerateRoom, roomCenter, roomsIntersect, tunnelBetween,
} from "./rooms.js";
import { isFullyConnected, unreachableFloorCount } from "./analysis.js";

// =============================================================================
// Types
// =============================================================================

export type GenerationSettings = Pick<
    GameConfig,
    "mapWidth" | "mapHeight" | "roomMinSize" | "roomMaxSize" | "maxRooms" | "maxGenerationAttempts"
>;

/** The product of one dig attempt. */
export interface DungeonLayout {
    /** Seed this attempt was dug from. */
    seed: bigint;
    map: GameMap;
    /** Accepted rooms in the order they were carved. */
    rooms: Room[];
    /** Player start: center of the first room, or INVALID_POS with no rooms. */
    entry: Pos;
    /** Stream the attempt drew from, positioned after the last draw. */
    rng: Rng;
}

export interface GeneratedDungeon extends DungeonLayout {
    /** Seed the caller asked for. */
    requestedSeed: bigint;
    /** Attempts used, 1-based. */
    attempts: number;
}

export type DigFunction = (seed: bigint, settings: GenerationSettings) => DungeonLayout;

export interface ArchitectOptions {
    logger?: Logger;
    /** Replaces the digger; lets tests force failing layouts. */
    dig?: DigFunction;
}

// =============================================================================
// Single attempt
// =============================================================================

/**
 * Dig one dungeon from `seed`. Deterministic: equal seeds and settings
 * give equal layouts.
 */
export function digDungeon(seed: bigint, settings: GenerationSettings): DungeonLayout {
    const rng = createRng(seed);
    const map = createGameMap(settings.mapWidth, settings.mapHeight, TileKind.Wall);
    const rooms: Room[] = [];

    for (let attempt = 0; attempt < settings.maxRooms; attempt++) {
        const room = designRoom(rng, settings, settings.mapWidth, settings.mapHeight);
        if (rooms.some((other) => roomsIntersect(room, other))) {
            continue;
        }

        carveRoom(map, room);
        const previous = rooms.at(-1);
        if (previous !== undefined) {
            carveTunnel(map, tunnelBetween(rng, roomCenter(previous), roomCenter(room)));
        }
        rooms.push(room);
    }

    return {
        seed,
        map,
        rooms,
        entry: rooms.length > 0 ? roomCenter(rooms[0]) : { ...INVALID_POS },
        rng,
    };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Reason the layout is unusable, or null when it is fine.
 */
export function layoutProblem(layout: DungeonLayout): string | null {
    if (layout.rooms.length === 0) {
        return "no rooms were placed";
    }
    const degenerate = layout.rooms.find(isDegenerateRoom);
    if (degenerate !== undefined) {
        return `room at (${degenerate.x}, ${degenerate.y}) is ${degenerate.width}x${degenerate.height}`;
    }
    if (!isFullyConnected(layout.map, layout.entry)) {
        const stranded = unreachableFloorCount(layout.map, layout.entry);
        return `${stranded} floor tiles are unreachable from the entry`;
    }
    return null;
}

// =============================================================================
// Retry loop
// =============================================================================

/**
 * Generate a connected dungeon, retrying with derived seeds.
 * Throws GenerationError once `maxGenerationAttempts` attempts have failed.
 */
export function generateDungeon(
    seed: bigint,
    settings: GenerationSettings,
    options: ArchitectOptions = {},
): GeneratedDungeon {
    const logger = options.logger ?? silentLogger;
    const dig = options.dig ?? digDungeon;

    for (let attempt = 0; attempt < settings.maxGenerationAttempts; attempt++) {
        const attemptSeed = deriveSeed(seed, attempt);
        const layout = dig(attemptSeed, settings);
        const problem = layoutProblem(layout);
        if (problem === null) {
            logger.debug(
                `dungeon ready after ${attempt + 1} attempt(s): ${layout.rooms.length} rooms, seed ${attemptSeed}`,
            );
            return { ...layout, requestedSeed: seed, attempts: attempt + 1 };
        }
        logger.warn(`attempt ${attempt + 1} with seed ${attemptSeed} rejected: ${problem}`);
    }

    logger.error(`giving up on seed ${seed} after ${settings.maxGenerationAttempts} attempts`);
    throw new GenerationError(seed, settings.maxGenerationAttempts);
}

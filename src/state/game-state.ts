/*
 *  game-state.ts — The session container
 *  deepmire
 *
 *  Everything a running game needs lives on one GameSession. Functions
 *  that act on the game take the session (or the parts of it they need)
 *  as a parameter; there is no module-level mutable state.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature, GameConfig, GameMap, SessionSummary } from "../types/types.js";
import type { SessionView } from "../types/platform.js";
import { SessionStatus } from "../types/enums.js";
import type { Rng } from "../math/rng.js";
import type { Logger } from "../logging/logger.js";
import type { TurnQueue } from "../time/turn-queue.js";
import type { MessageLog } from "../io/io-messages.js";

export interface GameSession {
    readonly config: GameConfig;
    /** Seed the dungeon was actually dug from. */
    seed: bigint;
    /** Seed the session was asked for; differs from `seed` after a retry. */
    requestedSeed: bigint;
    map: GameMap;
    /** Owning registry of live creatures, keyed by id. */
    creatures: Map<number, Creature>;
    player: Creature;
    queue: TurnQueue;
    /**
     * Stream left positioned after generation. No rule draws from it yet;
     * it is saved and restored so later chance-based rules continue the
     * same sequence after a load.
     */
    rng: Rng;
    messages: MessageLog;
    nextCreatureId: number;
    /** Player turns completed. */
    turnNumber: number;
    status: SessionStatus;
    logger: Logger;
}

export function isSessionOver(session: GameSession): boolean {
    return session.status !== SessionStatus.InProgress;
}

export function allocateCreatureId(session: GameSession): number {
    return session.nextCreatureId++;
}

/** Live creature with the given id, or null. */
export function creatureById(session: GameSession, id: number): Creature | null {
    return session.creatures.get(id) ?? null;
}

/** Read-only snapshot handed to the render surface and the input source. */
export function sessionView(session: GameSession): SessionView {
    return {
        map: session.map,
        creatures: [...session.creatures.values()],
        player: session.player,
        messages: session.messages.messages(),
        turnNumber: session.turnNumber,
        status: session.status,
    };
}

export function summarizeSession(session: GameSession): SessionSummary {
    return {
        status: session.status,
        turnNumber: session.turnNumber,
        seed: session.seed,
    };
}

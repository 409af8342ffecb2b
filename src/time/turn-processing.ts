/*
 *  turn-processing.ts — Advancing the game one actor at a time
 *  deepmire
 *
 *  The creature at the head of the queue acts next. For the player that
 *  means waiting on the input source, which is the only place the game
 *  ever suspends. Monsters decide synchronously. After acting, a creature
 *  that is still alive goes back into the queue at its next tick.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { ActionResult, Creature, TurnEntry } from "../types/types.js";
import type { InputSource } from "../types/platform.js";
import { ActionCapability, type SessionStatus } from "../types/enums.js";
import { creatureById, isSessionOver, sessionView, type GameSession } from "../state/game-state.js";
import { performPlayerCommand } from "../movement/player-movement.js";
import { monstersTurn } from "../monsters/monster-actions.js";
import { updateVision } from "../light/vision.js";

// =============================================================================
// Outcomes
// =============================================================================

export type TurnOutcome =
    | { kind: "player"; result: ActionResult }
    | { kind: "rejected"; reason: string }
    | { kind: "monster"; creatureId: number; result: ActionResult }
    | { kind: "ended"; status: SessionStatus };

// =============================================================================
// Helpers
// =============================================================================

/** Head of the queue and the creature it names. Throws on a broken queue. */
function nextActor(session: GameSession): { entry: TurnEntry; actor: Creature } {
    const entry = session.queue.peek();
    if (entry === null) {
        throw new Error("processNextTurn: the turn queue is empty while the session is in progress");
    }
    const actor = creatureById(session, entry.creatureId);
    if (actor === null) {
        throw new Error(`processNextTurn: queued creature ${entry.creatureId} does not exist`);
    }
    return { entry, actor };
}

/** Pop the head, which must be `entry`, and requeue the actor if it lived. */
function finishTurn(session: GameSession, entry: TurnEntry, actor: Creature, result: ActionResult): void {
    const popped = session.queue.pop();
    if (popped === null || popped.creatureId !== entry.creatureId) {
        throw new Error(`processNextTurn: expected creature ${entry.creatureId} at the head of the queue`);
    }
    if (!actor.isDead && !isSessionOver(session)) {
        session.queue.schedule(actor.id, entry.time + result.cost);
    }
}

/** Refresh what the player sees. */
export function refreshVision(session: GameSession): void {
    updateVision(session.map, session.player.loc, session.config.fovRadius);
}

function endedOutcome(session: GameSession): TurnOutcome {
    return { kind: "ended", status: session.status };
}

// =============================================================================
// Turn processing
// =============================================================================

function monsterActs(session: GameSession, entry: TurnEntry, actor: Creature): TurnOutcome {
    const result = monstersTurn(session, actor);
    if (isSessionOver(session)) {
        return endedOutcome(session);
    }
    finishTurn(session, entry, actor, result);
    return { kind: "monster", creatureId: actor.id, result };
}

/**
 * Let the creature at the head of the queue take its turn.
 *
 * For the player this awaits the next command. A rejected command leaves
 * the queue untouched and returns `rejected`; the player is asked again
 * on the next call.
 */
export async function processNextTurn(session: GameSession, input: InputSource): Promise<TurnOutcome> {
    if (isSessionOver(session)) {
        return endedOutcome(session);
    }
    const { entry, actor } = nextActor(session);

    if (actor.capability !== ActionCapability.PlayerControlled) {
        return monsterActs(session, entry, actor);
    }

    const command = await input.nextCommand(sessionView(session));
    const result = performPlayerCommand(session, command);
    if (isSessionOver(session)) {
        return endedOutcome(session);
    }
    if (!result.tookTurn) {
        return { kind: "rejected", reason: result.reason ?? "rejected" };
    }

    finishTurn(session, entry, actor, result);
    session.turnNumber++;
    refreshVision(session);
    return { kind: "player", result };
}

/**
 * Run queued non-player turns until a player-controlled creature is at
 * the head or the session ends. Returns how many turns ran.
 */
export function runMonsterTurns(session: GameSession): number {
    let turns = 0;
    while (!isSessionOver(session)) {
        const { entry, actor } = nextActor(session);
        if (actor.capability === ActionCapability.PlayerControlled) {
            break;
        }
        monsterActs(session, entry, actor);
        turns++;
    }
    return turns;
}

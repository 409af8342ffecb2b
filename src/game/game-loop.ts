/*
 *  game-loop.ts — Driving a session against a platform
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { SessionSummary } from "../types/types.js";
import type { Platform } from "../types/platform.js";
import { isSessionOver, sessionView, summarizeSession, type GameSession } from "../state/game-state.js";
import { processNextTurn, runMonsterTurns } from "../time/turn-processing.js";

/**
 * Run until the player dies or quits. Monsters move between player
 * turns; the surface is redrawn each time the player is about to act
 * and once more at the end.
 */
export async function runGame(session: GameSession, platform: Platform): Promise<SessionSummary> {
    while (!isSessionOver(session)) {
        runMonsterTurns(session);
        if (isSessionOver(session)) {
            break;
        }
        platform.surface.render(sessionView(session));
        await processNextTurn(session, platform.input);
    }
    platform.surface.render(sessionView(session));
    session.logger.info(`game over after ${session.turnNumber} turns`);
    return summarizeSession(session);
}

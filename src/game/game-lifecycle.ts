/*
 *  game-lifecycle.ts — Ending a session
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { SessionSummary } from "../types/types.js";
import { SessionStatus } from "../types/enums.js";
import { isSessionOver, summarizeSession, type GameSession } from "../state/game-state.js";

/**
 * The player has died. Nobody acts after this, so the queue is emptied.
 */
export function gameOver(session: GameSession, killedBy: string): SessionSummary {
    if (isSessionOver(session)) {
        return summarizeSession(session);
    }
    session.status = SessionStatus.PlayerDied;
    session.queue.clear();
    session.messages.add(`You were killed by the ${killedBy}.`, session.turnNumber);
    session.logger.info(`player killed by ${killedBy} on turn ${session.turnNumber}`);
    return summarizeSession(session);
}

/** The player asked to stop. The queue is kept so the session can still be saved. */
export function quitGame(session: GameSession): SessionSummary {
    if (isSessionOver(session)) {
        return summarizeSession(session);
    }
    session.status = SessionStatus.Quit;
    session.logger.info(`player quit on turn ${session.turnNumber}`);
    return summarizeSession(session);
}

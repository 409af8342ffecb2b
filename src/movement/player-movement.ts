/*
 *  player-movement.ts — Carrying out player commands
 *  deepmire
 *
 *  A command either takes the player's turn (and costs its speed in
 *  ticks) or is rejected. A rejection leaves every piece of game state
 *  as it was apart from the message log.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { ActionResult, PlayerCommand } from "../types/types.js";
import { ActionCapability, CommandType } from "../types/enums.js";
import type { GameSession } from "../state/game-state.js";
import { isInBounds, isWalkable, moveCreature } from "../state/game-map.js";
import { attack } from "../combat/combat-attack.js";
import { quitGame } from "../game/game-lifecycle.js";
import { creatureAt, isUnitStep, offset } from "./map-queries.js";

function accepted(session: GameSession): ActionResult {
    return { tookTurn: true, cost: session.player.speed };
}

/** Log the reason in the message log and the debug log; the turn is not spent. */
function rejected(session: GameSession, reason: string): ActionResult {
    session.messages.add(reason, session.turnNumber);
    session.logger.debug(`command rejected: ${reason}`);
    return { tookTurn: false, cost: 0, reason };
}

function playerMoves(session: GameSession, dx: number, dy: number): ActionResult {
    const player = session.player;
    if (!isUnitStep(dx, dy)) {
        return rejected(session, "You can only move one tile at a time.");
    }
    const target = offset(player.loc, dx, dy);
    if (!isInBounds(session.map, target.x, target.y) || !isWalkable(session.map, target)) {
        return rejected(session, "That way is blocked.");
    }

    const occupant = creatureAt(session, target);
    if (occupant !== null && occupant.blocksMovement) {
        if (occupant.capability !== ActionCapability.Hostile) {
            return rejected(session, `The ${occupant.name} is in the way.`);
        }
        attack(session, player, occupant);
        return accepted(session);
    }

    moveCreature(session.map, player, target);
    return accepted(session);
}

function playerInteracts(session: GameSession, dx: number, dy: number): ActionResult {
    if (!isUnitStep(dx, dy)) {
        return rejected(session, "Nothing to attack.");
    }
    const target = creatureAt(session, offset(session.player.loc, dx, dy));
    if (target === null || target === session.player) {
        return rejected(session, "Nothing to attack.");
    }
    attack(session, session.player, target);
    return accepted(session);
}

/**
 * Carry out one player command. Quitting ends the session and does not
 * count as a turn.
 */
export function performPlayerCommand(session: GameSession, command: PlayerCommand): ActionResult {
    switch (command.type) {
        case CommandType.Move:
            return playerMoves(session, command.dx, command.dy);
        case CommandType.Wait:
            return accepted(session);
        case CommandType.Interact:
            return playerInteracts(session, command.dx, command.dy);
        case CommandType.Quit:
            quitGame(session);
            return { tookTurn: false, cost: 0, reason: "quit" };
    }
}

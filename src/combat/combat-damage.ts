/*
 *  combat-damage.ts — Applying damage and removing the dead
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature } from "../types/types.js";
import type { GameSession } from "../state/game-state.js";
import { removeCreatureFromMap } from "../state/game-map.js";
import { gameOver } from "../game/game-lifecycle.js";
import { capitalize } from "./combat-math.js";

/**
 * Take `damage` hit points off a creature. Returns true if this killed it;
 * the caller is responsible for calling killCreature.
 */
export function inflictDamage(defender: Creature, damage: number): boolean {
    if (defender.isDead) {
        return false;
    }
    defender.currentHP = Math.max(0, defender.currentHP - Math.max(0, damage));
    return defender.currentHP <= 0;
}

/**
 * Remove a creature from the game: off the map, out of the turn queue and
 * out of the registry. Killing the player ends the session and empties
 * the queue. Killing the dead is a no-op.
 */
export function killCreature(session: GameSession, decedent: Creature, killer: Creature | null = null): void {
    if (decedent.isDead) {
        return;
    }
    decedent.isDead = true;
    decedent.blocksMovement = false;

    removeCreatureFromMap(session.map, decedent);
    session.queue.remove(decedent.id);
    session.creatures.delete(decedent.id);

    if (decedent === session.player) {
        gameOver(session, killer?.name ?? "dungeon");
    } else {
        session.messages.add(`${capitalize(decedent.name)} is dead!`, session.turnNumber);
        session.logger.debug(`${decedent.name} #${decedent.id} died at (${decedent.loc.x}, ${decedent.loc.y})`);
    }
}

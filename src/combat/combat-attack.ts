/*
 *  combat-attack.ts — Melee attacks
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature } from "../types/types.js";
import type { GameSession } from "../state/game-state.js";
import { attackDamage, capitalize } from "./combat-math.js";
import { inflictDamage, killCreature } from "./combat-damage.js";

/**
 * Resolve one melee attack. Always lands; damage is power minus defense,
 * floored at zero. Returns the damage dealt.
 */
export function attack(session: GameSession, attacker: Creature, defender: Creature): number {
    const damage = attackDamage(attacker, defender);
    const description = `${capitalize(attacker.name)} attacks ${defender.name}`;

    if (damage > 0) {
        session.messages.add(`${description} for ${damage} hit points.`, session.turnNumber);
    } else {
        session.messages.add(`${description} but does no damage.`, session.turnNumber);
    }

    if (inflictDamage(defender, damage)) {
        killCreature(session, defender, attacker);
    }
    return damage;
}

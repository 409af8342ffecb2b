/*
 *  combat-math.ts — Damage calculation
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Creature } from "../types/types.js";

/** Hit points an attack takes off: attacker power minus defense, never negative. */
export function attackDamage(attacker: Readonly<Creature>, defender: Readonly<Creature>): number {
    return Math.max(0, attacker.power - defender.defense);
}

/** First letter upper-cased, for names at the start of a sentence. */
export function capitalize(text: string): string {
    return text.length === 0 ? text : text[0].toUpperCase() + text.slice(1);
}

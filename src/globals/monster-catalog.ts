/*
 *  monster-catalog.ts — Monster species spawned by the architect
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { MonsterKind } from "../types/enums.js";
import { NORMAL_SPEED } from "../types/constants.js";
import type { MonsterType } from "../types/types.js";

export const monsterCatalog: readonly Readonly<MonsterType>[] = Object.freeze([
    {
        kind: MonsterKind.Orc,
        name: "orc",
        displayChar: "o",
        maxHP: 10,
        power: 3,
        defense: 0,
        speed: NORMAL_SPEED,
        frequency: 80,
    },
    {
        kind: MonsterKind.Troll,
        name: "troll",
        displayChar: "T",
        maxHP: 16,
        power: 4,
        defense: 1,
        speed: NORMAL_SPEED,
        frequency: 20,
    },
]);

export function monsterTypeForKind(kind: MonsterKind): Readonly<MonsterType> {
    const type = monsterCatalog.find((entry) => entry.kind === kind);
    if (type === undefined) {
        throw new Error(`monsterTypeForKind: no catalog entry for kind ${kind}`);
    }
    return type;
}

/*
 *  monster-actions.ts — Hostile monster decisions
 *  deepmire
 *
 *  A hostile monster acts only when the player can see it. Field of view
 *  is symmetric, so that is also exactly when it can see the player.
 *  Adjacent monsters attack; the rest step down a distance map toward
 *  the player. Every other case is a wait.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { ActionResult, Creature, Pos } from "../types/types.js";
import { ActionCapability } from "../types/enums.js";
import { CREATURE_PATHING_PENALTY, PDS_MAX_DISTANCE } from "../types/constants.js";
import { nbDirs, chebyshevDistance } from "../globals/tables.js";
import type { GameSession } from "../state/game-state.js";
import { isOccupied, isWalkable, moveCreature, tileAt } from "../state/game-map.js";
import { calculateDistances, type CalculateDistancesContext } from "../dijkstra/dijkstra.js";
import type { Grid } from "../grid/grid.js";
import { attack } from "../combat/combat-attack.js";
import { isFreeForMovement, offset } from "../movement/map-queries.js";

/**
 * Distance map toward the player. Tiles other creatures stand on cost
 * extra so monsters path around each other rather than queue behind.
 */
export function distanceMapToPlayer(session: GameSession, mover: Creature): Grid {
    const ctx: CalculateDistancesContext = {
        width: session.map.width,
        height: session.map.height,
        isWalkable: (pos) => isWalkable(session.map, pos),
        extraCost: (pos) => {
            if (!isOccupied(session.map, pos)) return 0;
            const here = (pos.x === mover.loc.x && pos.y === mover.loc.y)
                || (pos.x === session.player.loc.x && pos.y === session.player.loc.y);
            return here ? 0 : CREATURE_PATHING_PENALTY;
        },
    };
    return calculateDistances(session.player.loc, true, ctx);
}

/**
 * Free neighbour with the lowest distance below the monster's own, or
 * null if none gets it closer. Ties go to the earlier direction in nbDirs.
 */
export function nextStepToward(session: GameSession, monster: Creature, distances: Grid): Pos | null {
    let best: Pos | null = null;
    let bestDistance = distances[monster.loc.x][monster.loc.y];
    for (const [dx, dy] of nbDirs) {
        const candidate = offset(monster.loc, dx, dy);
        if (!isFreeForMovement(session, candidate)) {
            continue;
        }
        const distance = distances[candidate.x][candidate.y];
        if (distance >= 0 && distance < PDS_MAX_DISTANCE && distance < bestDistance) {
            best = candidate;
            bestDistance = distance;
        }
    }
    return best;
}

/**
 * Decide and carry out one action for a non-player creature. Always
 * takes the turn: a monster with nothing to do waits.
 */
export function monstersTurn(session: GameSession, monster: Creature): ActionResult {
    const done: ActionResult = { tookTurn: true, cost: monster.speed };
    const player = session.player;

    if (monster.capability !== ActionCapability.Hostile || player.isDead) {
        return done;
    }
    if (!tileAt(session.map, monster.loc).visible) {
        return done;
    }

    if (chebyshevDistance(monster.loc, player.loc) <= 1) {
        attack(session, monster, player);
        return done;
    }

    const step = nextStepToward(session, monster, distanceMapToPlayer(session, monster));
    if (step !== null) {
        moveCreature(session.map, monster, step);
    }
    return done;
}

/*
 *  monsters/index.ts — Barrel export for monster module
 *  deepmire
 */

export {
    PLAYER_DISPLAY_CHAR,
    createPlayer,
    generateMonster,
} from "./monster-creation.js";

export {
    pickMonsterType,
    populateRooms,
} from "./monster-spawning.js";

export type {
    PopulationContext,
} from "./monster-spawning.js";

export {
    distanceMapToPlayer,
    nextStepToward,
    monstersTurn,
} from "./monster-actions.js";

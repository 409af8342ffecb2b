/*
 *  movement/index.ts — Barrel exports for the movement module
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// === Map query helpers ===
export {
    creatureAt,
    isUnitStep,
    offset,
    isFreeForMovement,
} from "./map-queries.js";

// === Player commands ===
export {
    performPlayerCommand,
} from "./player-movement.js";

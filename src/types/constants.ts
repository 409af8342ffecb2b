/*
 *  constants.ts — Map, room, vision and scheduling constants
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ----- Map dimensions -----

export const DEFAULT_MAP_WIDTH = 80;
export const DEFAULT_MAP_HEIGHT = 45;

// ----- Room generation -----

export const DEFAULT_ROOM_MIN_SIZE = 6;
export const DEFAULT_ROOM_MAX_SIZE = 10;
export const DEFAULT_MAX_ROOMS = 30;
// A room this small has no interior floor at all.
export const MIN_LEGAL_ROOM_SIZE = 3;
export const DEFAULT_MAX_MONSTERS_PER_ROOM = 2;
export const DEFAULT_MAX_GENERATION_ATTEMPTS = 10;

// ----- Vision -----

export const DEFAULT_FOV_RADIUS = 8;

// ----- Time -----

/** Ticks a normal-speed creature spends on one action. */
export const NORMAL_SPEED = 100;

// ----- Dijkstra -----

export const PDS_FORBIDDEN = -1;
export const PDS_OBSTRUCTION = -2;
export const PDS_MAX_DISTANCE = 30000;
/** Extra pathing cost of a tile another creature stands on. */
export const CREATURE_PATHING_PENALTY = 10;

// ----- Messages -----

export const DEFAULT_MESSAGE_CAPACITY = 100;

// ----- Saves -----

export const SAVE_FORMAT_VERSION = 1;
export const GAME_SUFFIX = ".sav.json";
export const WALL_CHAR = "#";
export const FLOOR_CHAR = ".";

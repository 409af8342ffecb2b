/*
 *  rooms.ts — Room design, room carving and tunnels between rooms
 *  deepmire
 *
 *  Rooms are rectangles that include their wall border; only the
 *  interior is carved to floor. Tunnels are L-shaped runs between room
 *  centers.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { GameMap, Pos, Room } from "../types/types.js";
import { TileKind } from "../types/enums.js";
import { setTileKind } from "../state/game-map.js";
import type { Rng } from "../math/rng.js";

// =============================================================================
// Room geometry
// =============================================================================

export interface RoomSizeLimits {
    roomMinSize: number;
    roomMaxSize: number;
}

/** Rightmost column of the room, wall included. */
export function roomRight(room: Room): number {
    return room.x + room.width - 1;
}

/** Bottom row of the room, wall included. */
export function roomBottom(room: Room): number {
    return room.y + room.height - 1;
}

export function roomCenter(room: Room): Pos {
    return {
        x: Math.floor((room.x + roomRight(room)) / 2),
        y: Math.floor((room.y + roomBottom(room)) / 2),
    };
}

/**
 * True when the rectangles overlap or touch, walls included. Rooms that
 * would share a wall are rejected so every room keeps its own border.
 */
export function roomsIntersect(a: Room, b: Room): boolean {
    return a.x <= roomRight(b)
        && roomRight(a) >= b.x
        && a.y <= roomBottom(b)
        && roomBottom(a) >= b.y;
}

/** A room with no interior floor. */
export function isDegenerateRoom(room: Room): boolean {
    return room.width < 3 || room.height < 3;
}

/** Every interior (floor) position of the room, column by column. */
export function roomInterior(room: Room): Pos[] {
    const cells: Pos[] = [];
    for (let x = room.x + 1; x < roomRight(room); x++) {
        for (let y = room.y + 1; y < roomBottom(room); y++) {
            cells.push({ x, y });
        }
    }
    return cells;
}

export function roomContains(room: Room, pos: Pos): boolean {
    return pos.x > room.x && pos.x < roomRight(room) && pos.y > room.y && pos.y < roomBottom(room);
}

// =============================================================================
// Room design
// =============================================================================

/**
 * Pick a random room size and position that fits entirely inside a
 * mapWidth × mapHeight map.
 */
export function designRoom(
    rng: Rng,
    limits: RoomSizeLimits,
    mapWidth: number,
    mapHeight: number,
): Room {
    const width = rng.range(limits.roomMinSize, Math.min(limits.roomMaxSize, mapWidth));
    const height = rng.range(limits.roomMinSize, Math.min(limits.roomMaxSize, mapHeight));
    const x = rng.range(0, mapWidth - width);
    const y = rng.range(0, mapHeight - height);
    return { x, y, width, height };
}

/** Turn the room's interior into floor. */
export function carveRoom(map: GameMap, room: Room): void {
    for (const pos of roomInterior(room)) {
        setTileKind(map, pos, TileKind.Floor);
    }
}

// =============================================================================
// Tunnels
// =============================================================================

function straightRun(from: Pos, to: Pos): Pos[] {
    const cells: Pos[] = [];
    const stepX = Math.sign(to.x - from.x);
    const stepY = Math.sign(to.y - from.y);
    let x = from.x;
    let y = from.y;
    cells.push({ x, y });
    while (x !== to.x || y !== to.y) {
        x += stepX;
        y += stepY;
        cells.push({ x, y });
    }
    return cells;
}

/**
 * Positions of an L-shaped tunnel from start to end, both included.
 * Half the time the tunnel runs horizontally first, otherwise vertically.
 */
export function tunnelBetween(rng: Rng, start: Pos, end: Pos): Pos[] {
    const corner: Pos = rng.percent(50)
        ? { x: end.x, y: start.y }
        : { x: start.x, y: end.y };

    const firstLeg = straightRun(start, corner);
    const secondLeg = straightRun(corner, end);
    // The corner ends the first leg and starts the second.
    return firstLeg.concat(secondLeg.slice(1));
}

export function carveTunnel(map: GameMap, cells: readonly Pos[]): void {
    for (const pos of cells) {
        setTileKind(map, pos, TileKind.Floor);
    }
}

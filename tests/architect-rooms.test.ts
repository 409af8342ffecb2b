/*
 *  architect-rooms.test.ts — Tests for room geometry, carving and tunnels
 *  deepmire
 */

import { describe, it, expect } from "vitest";
import {
    roomCenter,
    roomRight,
    roomBottom,
    roomsIntersect,
    roomInterior,
    roomContains,
    isDegenerateRoom,
    designRoom,
    carveRoom,
    tunnelBetween,
    carveTunnel,
} from "../src/architect/rooms.js";
import { createGameMap, countTiles } from "../src/state/game-map.js";
import { createRng } from "../src/math/rng.js";
import { TileKind } from "../src/types/enums.js";
import { mapToAscii } from "./helpers.js";

describe("room geometry", () => {
    const room = { x: 2, y: 3, width: 6, height: 5 };

    it("edges include the wall border", () => {
        expect(roomRight(room)).toBe(7);
        expect(roomBottom(room)).toBe(7);
    });

    it("center rounds down", () => {
        expect(roomCenter(room)).toEqual({ x: 4, y: 5 });
    });

    it("interior excludes the walls", () => {
        expect(roomInterior({ x: 0, y: 0, width: 4, height: 3 })).toEqual([
            { x: 1, y: 1 },
            { x: 2, y: 1 },
        ]);
        expect(roomContains(room, { x: 3, y: 4 })).toBe(true);
        expect(roomContains(room, { x: 2, y: 4 })).toBe(false);
    });

    it("rooms sharing a wall intersect", () => {
        const a = { x: 0, y: 0, width: 5, height: 5 };
        expect(roomsIntersect(a, { x: 4, y: 0, width: 5, height: 5 })).toBe(true);
        expect(roomsIntersect(a, { x: 5, y: 0, width: 5, height: 5 })).toBe(false);
        expect(roomsIntersect(a, { x: 1, y: 1, width: 2, height: 2 })).toBe(true);
    });

    it("a room without interior is degenerate", () => {
        expect(isDegenerateRoom({ x: 0, y: 0, width: 2, height: 5 })).toBe(true);
        expect(isDegenerateRoom({ x: 0, y: 0, width: 6, height: 2 })).toBe(true);
        expect(isDegenerateRoom({ x: 0, y: 0, width: 3, height: 3 })).toBe(false);
    });
});

describe("designRoom", () => {
    it("sizes and positions stay within the limits and the map", () => {
        const rng = createRng(8n);
        for (let i = 0; i < 300; i++) {
            const room = designRoom(rng, { roomMinSize: 6, roomMaxSize: 10 }, 80, 45);
            expect(room.width).toBeGreaterThanOrEqual(6);
            expect(room.width).toBeLessThanOrEqual(10);
            expect(room.height).toBeGreaterThanOrEqual(6);
            expect(room.height).toBeLessThanOrEqual(10);
            expect(room.x).toBeGreaterThanOrEqual(0);
            expect(room.y).toBeGreaterThanOrEqual(0);
            expect(roomRight(room)).toBeLessThan(80);
            expect(roomBottom(room)).toBeLessThan(45);
        }
    });
});

describe("carveRoom", () => {
    it("turns only the interior into floor", () => {
        const map = createGameMap(6, 5);
        carveRoom(map, { x: 0, y: 0, width: 6, height: 5 });
        expect(countTiles(map, TileKind.Floor)).toBe(12);
        expect(mapToAscii(map)).toEqual([
            "######",
            "#....#",
            "#....#",
            "#....#",
            "######",
        ]);
    });
});

describe("tunnelBetween", () => {
    it("is an unbroken L from start to end", () => {
        for (let seed = 1n; seed <= 20n; seed++) {
            const cells = tunnelBetween(createRng(seed), { x: 1, y: 1 }, { x: 4, y: 3 });
            expect(cells).toHaveLength(6);
            expect(cells[0]).toEqual({ x: 1, y: 1 });
            expect(cells[5]).toEqual({ x: 4, y: 3 });
            for (let i = 1; i < cells.length; i++) {
                const step = Math.abs(cells[i].x - cells[i - 1].x) + Math.abs(cells[i].y - cells[i - 1].y);
                expect(step).toBe(1);
            }
            const corners = cells.filter((c) => (c.x === 4 && c.y === 1) || (c.x === 1 && c.y === 3));
            expect(corners).toHaveLength(1);
        }
    });

    it("goes both ways across seeds", () => {
        const firstSteps = new Set<string>();
        for (let seed = 1n; seed <= 40n; seed++) {
            const cells = tunnelBetween(createRng(seed), { x: 0, y: 0 }, { x: 3, y: 3 });
            firstSteps.add(`${cells[1].x},${cells[1].y}`);
        }
        expect([...firstSteps].sort()).toEqual(["0,1", "1,0"]);
    });

    it("is a single cell between equal points", () => {
        expect(tunnelBetween(createRng(1n), { x: 2, y: 2 }, { x: 2, y: 2 })).toEqual([{ x: 2, y: 2 }]);
    });

    it("carveTunnel floors every cell", () => {
        const map = createGameMap(5, 3);
        carveTunnel(map, [{ x: 1, y: 1 }, { x: 2, y: 1 }, { x: 3, y: 1 }]);
        expect(mapToAscii(map)).toEqual(["#####", "#...#", "#####"]);
    });
});

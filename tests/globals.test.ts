/*
 *  globals.test.ts — Tests for catalogs, tables and configuration
 *  deepmire
 */

import { describe, it, expect } from "vitest";
import { defaultGameConfig, resolveConfig } from "../src/globals/game-config.js";
import { monsterCatalog, monsterTypeForKind } from "../src/globals/monster-catalog.js";
import { nbDirs, chebyshevDistance, distanceSquared, posEq } from "../src/globals/tables.js";
import { tileCatalog } from "../src/globals/tile-catalog.js";
import { ConfigError } from "../src/errors.js";
import { Direction, MonsterKind, TileKind } from "../src/types/enums.js";

describe("resolveConfig", () => {
    it("returns the defaults with no overrides", () => {
        const config = resolveConfig();
        expect(config).toEqual(defaultGameConfig);
        expect(config.mapWidth).toBe(80);
        expect(config.mapHeight).toBe(45);
        expect(config.fovRadius).toBe(8);
        expect(config.player).toEqual({ name: "player", maxHP: 30, power: 5, defense: 2, speed: 100 });
    });

    it("merges player overrides field by field", () => {
        const config = resolveConfig({ player: { maxHP: 50 } });
        expect(config.player.maxHP).toBe(50);
        expect(config.player.power).toBe(5);
    });

    it("rejects a minimum room size above the maximum", () => {
        let caught: unknown = null;
        try {
            resolveConfig({ roomMinSize: 12 });
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ConfigError);
        if (caught instanceof ConfigError) {
            expect(caught.issues).toEqual(["roomMinSize: must not exceed roomMaxSize"]);
            expect(caught.name).toBe("ConfigError");
        }
    });

    it("rejects rooms larger than the map", () => {
        expect(() => resolveConfig({ mapWidth: 8, mapHeight: 8 })).toThrow("roomMaxSize: must fit inside the map");
    });

    it("reports the offending field", () => {
        try {
            resolveConfig({ fovRadius: 0 });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigError);
            if (err instanceof ConfigError) {
                expect(err.issues).toHaveLength(1);
                expect(err.issues[0]).toMatch(/^fovRadius: /);
            }
        }
    });
});

describe("monster catalog", () => {
    it("spawn weights are 80 orc, 20 troll", () => {
        expect(monsterCatalog.map((m) => [m.name, m.frequency])).toEqual([["orc", 80], ["troll", 20]]);
    });

    it("monsterTypeForKind", () => {
        expect(monsterTypeForKind(MonsterKind.Troll).displayChar).toBe("T");
    });
});

describe("tables", () => {
    it("nbDirs starts with the cardinals", () => {
        expect(nbDirs[Direction.Up]).toEqual([0, -1]);
        expect(nbDirs[Direction.Right]).toEqual([1, 0]);
        expect(nbDirs[Direction.DownLeft]).toEqual([-1, 1]);
        expect(nbDirs).toHaveLength(8);
    });

    it("distances", () => {
        expect(chebyshevDistance({ x: 1, y: 1 }, { x: 4, y: 3 })).toBe(3);
        expect(distanceSquared({ x: 1, y: 1 }, { x: 4, y: 3 })).toBe(13);
        expect(posEq({ x: 2, y: 2 }, { x: 2, y: 2 })).toBe(true);
    });

    it("tile catalog", () => {
        expect(tileCatalog[TileKind.Wall].walkable).toBe(false);
        expect(tileCatalog[TileKind.Floor].transparent).toBe(true);
    });
});

/*
 *  game-init.test.ts — Tests for building a new session
 *  deepmire
 */

import { describe, it, expect } from "vitest";
import { createSession, WELCOME_MESSAGE } from "../../src/game/game-init.js";
import { digDungeon, type DungeonLayout, type GenerationSettings } from "../../src/architect/architect.js";
import { roomContains } from "../../src/architect/rooms.js";
import { createGameMap, creatureIdAt, tileAt } from "../../src/state/game-map.js";
import { createRng } from "../../src/math/rng.js";
import { ConfigError, GenerationError } from "../../src/errors.js";
import { LogLevel, SessionStatus } from "../../src/types/enums.js";
import { INVALID_POS } from "../../src/types/types.js";
import { makeRecordingLogger } from "../helpers.js";

const quiet = { logLevel: LogLevel.Silent };

describe("createSession", () => {
    it("starts the player on the entry tile with id 0", () => {
        const session = createSession({ seed: 5n, config: quiet });
        const layout = digDungeon(5n, session.config);

        expect(session.player.id).toBe(0);
        expect(session.player.loc).toEqual(layout.entry);
        expect(creatureIdAt(session.map, layout.entry)).toBe(0);
        expect(session.player.currentHP).toBe(30);
        expect(session.seed).toBe(5n);
        expect(session.requestedSeed).toBe(5n);
        expect(session.status).toBe(SessionStatus.InProgress);
        expect(session.turnNumber).toBe(0);
    });

    it("queues everyone at tick 0 with the player first", () => {
        const session = createSession({ seed: 5n, config: quiet });
        const entries = session.queue.entries();

        expect(entries).toHaveLength(session.creatures.size);
        expect(entries[0]).toEqual({ creatureId: 0, time: 0, sequence: 0 });
        expect(entries.every((e) => e.time === 0 && e.sequence === e.creatureId)).toBe(true);
        expect(session.nextCreatureId).toBe(session.creatures.size);
    });

    it("keeps monsters out of the starting room", () => {
        for (let seed = 1n; seed <= 10n; seed++) {
            const session = createSession({ seed, config: quiet });
            const firstRoom = digDungeon(seed, session.config).rooms[0];
            for (const creature of session.creatures.values()) {
                if (creature === session.player) continue;
                expect(roomContains(firstRoom, creature.loc)).toBe(false);
            }
        }
    });

    it("computes the first field of view and greets the player", () => {
        const session = createSession({ seed: 5n, config: quiet });
        expect(tileAt(session.map, session.player.loc).visible).toBe(true);
        expect(tileAt(session.map, session.player.loc).explored).toBe(true);
        expect(session.messages.messages()).toEqual([{ text: WELCOME_MESSAGE, count: 1, turnNumber: 0 }]);
    });

    it("is deterministic for a seed", () => {
        const a = createSession({ seed: 42n, config: quiet });
        const b = createSession({ seed: 42n, config: quiet });
        expect([...a.creatures.values()]).toEqual([...b.creatures.values()]);
        expect(a.rng.nextUint32()).toBe(b.rng.nextUint32());
    });

    it("stores a negative seed as the unsigned value the generator uses", () => {
        const session = createSession({ seed: -5n, config: quiet });
        expect(session.requestedSeed).toBe(18446744073709551611n);
        expect(session.seed).toBe(18446744073709551611n);
        expect(session.player.loc).toEqual(digDungeon(18446744073709551611n, session.config).entry);
    });

    it("spawns no monsters from an empty catalog", () => {
        const session = createSession({ seed: 5n, config: quiet, catalog: [] });
        expect([...session.creatures.keys()]).toEqual([0]);
        expect(session.nextCreatureId).toBe(1);
    });

    it("logs the new game through the given logger", () => {
        const { logger, lines } = makeRecordingLogger("game");
        const session = createSession({ seed: 5n, logger, catalog: [] });
        const rooms = digDungeon(5n, session.config).rooms.length;

        expect(lines.filter((l) => l.level === "info")).toEqual([
            { level: "info", tag: "game", message: `new game, seed 5: ${rooms} rooms, 0 monsters` },
        ]);
        expect(lines.some((l) => l.tag === "game:architect" && l.level === "debug")).toBe(true);
    });

    it("records both seeds after a retry", () => {
        let calls = 0;
        const session = createSession({
            seed: 9n,
            config: quiet,
            dig: (seed: bigint, settings: GenerationSettings): DungeonLayout => {
                calls++;
                if (calls === 1) {
                    return {
                        seed,
                        map: createGameMap(settings.mapWidth, settings.mapHeight),
                        rooms: [],
                        entry: INVALID_POS,
                        rng: createRng(seed),
                    };
                }
                return digDungeon(seed, settings);
            },
        });
        expect(session.requestedSeed).toBe(9n);
        expect(session.seed).not.toBe(9n);
    });

    it("rejects a bad configuration", () => {
        expect(() => createSession({ seed: 1n, config: { ...quiet, roomMinSize: 12, roomMaxSize: 8 } }))
            .toThrow(ConfigError);
    });

    it("gives up when no attempt yields a usable dungeon", () => {
        expect(() => createSession({
            seed: 3n,
            config: { ...quiet, maxGenerationAttempts: 2 },
            dig: (seed, settings) => ({
                seed,
                map: createGameMap(settings.mapWidth, settings.mapHeight),
                rooms: [],
                entry: INVALID_POS,
                rng: createRng(seed),
            }),
        })).toThrow(GenerationError);
    });
});

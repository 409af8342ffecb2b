/*
 *  game-loop.test.ts — Tests for running a whole game headless
 *  deepmire
 */

import { describe, it, expect } from "vitest";
import { runGame } from "../../src/game/game-loop.js";
import { createSession } from "../../src/game/game-init.js";
import { createCaptureSurface } from "../../src/platform/null-platform.js";
import { createHeadlessPlatform } from "../../src/platform/scripted-input.js";
import { CommandType, LogLevel, SessionStatus } from "../../src/types/enums.js";
import type { PlayerCommand } from "../../src/types/types.js";
import { lastMessages, makeRecordingLogger, makeSession } from "../helpers.js";

const WAIT: PlayerCommand = { type: CommandType.Wait };
const RIGHT: PlayerCommand = { type: CommandType.Move, dx: 1, dy: 0 };

describe("runGame", () => {
    it("plays a corridor fight to the end of the script", async () => {
        const { logger, lines } = makeRecordingLogger();
        const session = makeSession([
            "#######",
            "#@...o#",
            "#######",
        ], { logger });
        const surface = createCaptureSurface();

        const summary = await runGame(session, createHeadlessPlatform([WAIT, WAIT, RIGHT, RIGHT, RIGHT], surface));

        expect(summary).toEqual({ status: SessionStatus.Quit, turnNumber: 5, seed: 1n });
        expect(session.player.currentHP).toBe(28);
        expect(session.creatures.size).toBe(1);

        expect(surface.frames).toHaveLength(7);
        expect(surface.frames[0]).toEqual(["#######", "#@...o#", "#######", "HP: 30/30  Turn: 0"]);
        expect(surface.frames[1]).toEqual(["#######", "#@..o.#", "#######", "HP: 30/30  Turn: 1"]);
        expect(surface.lastFrame()).toEqual(["#######", "#.@...#", "#######", "HP: 28/30  Turn: 5"]);

        expect(lastMessages(session, 3)).toEqual([
            "Orc attacks player for 1 hit points.",
            "Player attacks orc for 5 hit points.",
            "Orc is dead!",
        ]);
        expect(lines.filter((l) => l.level === "info").map((l) => l.message)).toEqual([
            "player quit on turn 5",
            "game over after 5 turns",
        ]);
    });

    it("stops when the player dies", async () => {
        const session = makeSession(["#####", "#@o.#", "#####"]);
        session.player.currentHP = 1;
        const surface = createCaptureSurface();

        const summary = await runGame(session, createHeadlessPlatform([WAIT, WAIT], surface));

        expect(summary).toEqual({ status: SessionStatus.PlayerDied, turnNumber: 1, seed: 1n });
        expect(surface.frames).toHaveLength(2);
        expect(surface.lastFrame()).toEqual(["#####", "#.o.#", "#####", "HP: 0/30  Turn: 1"]);
        expect(lastMessages(session, 1)).toEqual(["You were killed by the orc."]);
    });

    it("runs a generated dungeon until the script ends", async () => {
        const session = createSession({ seed: 21n, config: { logLevel: LogLevel.Silent } });
        const script: PlayerCommand[] = Array.from({ length: 30 }, () => WAIT);
        const summary = await runGame(session, createHeadlessPlatform(script));

        expect(summary.seed).toBe(session.seed);
        if (summary.status === SessionStatus.Quit) {
            expect(summary.turnNumber).toBe(30);
        } else {
            expect(summary.status).toBe(SessionStatus.PlayerDied);
            expect(summary.turnNumber).toBeLessThanOrEqual(30);
        }
    });
});

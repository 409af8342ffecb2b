/*
 *  player-movement.test.ts — Tests for carrying out player commands
 *  deepmire
 */

import { describe, it, expect } from "vitest";
import { performPlayerCommand } from "../../src/movement/player-movement.js";
import { creatureAt, isFreeForMovement, isUnitStep } from "../../src/movement/map-queries.js";
import { CommandType, SessionStatus } from "../../src/types/enums.js";
import { creatureIdAt } from "../../src/state/game-map.js";
import { creatureOf, lastMessages, makeRecordingLogger, makeSession } from "../helpers.js";

// Statue is creature 1, orc is creature 2.
const ROOM = [
    "#######",
    "#@.S..#",
    "#.o...#",
    "#######",
];

function move(dx: number, dy: number) {
    return { type: CommandType.Move, dx, dy } as const;
}

describe("isUnitStep", () => {
    it("accepts the eight neighbours only", () => {
        expect(isUnitStep(1, -1)).toBe(true);
        expect(isUnitStep(0, 1)).toBe(true);
        expect(isUnitStep(0, 0)).toBe(false);
        expect(isUnitStep(2, 0)).toBe(false);
        expect(isUnitStep(0.5, 0)).toBe(false);
    });
});

describe("map queries", () => {
    it("finds creatures and free tiles", () => {
        const session = makeSession(ROOM);
        expect(creatureAt(session, { x: 3, y: 1 })?.name).toBe("statue");
        expect(creatureAt(session, { x: 4, y: 1 })).toBeNull();
        expect(creatureAt(session, { x: -1, y: 1 })).toBeNull();
        expect(isFreeForMovement(session, { x: 4, y: 1 })).toBe(true);
        expect(isFreeForMovement(session, { x: 3, y: 1 })).toBe(false);
        expect(isFreeForMovement(session, { x: 0, y: 1 })).toBe(false);
    });
});

describe("performPlayerCommand", () => {
    it("moves onto a free floor tile", () => {
        const session = makeSession(ROOM);
        expect(performPlayerCommand(session, move(1, 0))).toEqual({ tookTurn: true, cost: 100 });
        expect(session.player.loc).toEqual({ x: 2, y: 1 });
        expect(creatureIdAt(session.map, { x: 2, y: 1 })).toBe(0);
        expect(creatureIdAt(session.map, { x: 1, y: 1 })).toBeNull();
    });

    it("rejects walking into a wall and logs why", () => {
        const { logger, lines } = makeRecordingLogger();
        const session = makeSession(ROOM, { logger });
        const result = performPlayerCommand(session, move(-1, 0));

        expect(result).toEqual({ tookTurn: false, cost: 0, reason: "That way is blocked." });
        expect(session.player.loc).toEqual({ x: 1, y: 1 });
        expect(lastMessages(session, 1)).toEqual(["That way is blocked."]);
        expect(lines).toEqual([{ level: "debug", tag: "test", message: "command rejected: That way is blocked." }]);
    });

    it("rejects steps off the edge of the map", () => {
        const session = makeSession(["@..", "...", "..."]);
        expect(performPlayerCommand(session, move(0, -1)).reason).toBe("That way is blocked.");
        expect(performPlayerCommand(session, move(-1, 1)).reason).toBe("That way is blocked.");
        expect(session.player.loc).toEqual({ x: 0, y: 0 });
    });

    it("rejects anything but a single step", () => {
        const session = makeSession(ROOM);
        expect(performPlayerCommand(session, move(2, 0)).reason).toBe("You can only move one tile at a time.");
        expect(performPlayerCommand(session, move(0, 0)).reason).toBe("You can only move one tile at a time.");
        expect(session.player.loc).toEqual({ x: 1, y: 1 });
    });

    it("stacks repeated rejections in the message log", () => {
        const session = makeSession(ROOM);
        performPlayerCommand(session, move(0, -1));
        performPlayerCommand(session, move(0, -1));
        expect(session.messages.recent(1)).toEqual(["That way is blocked. (x2)"]);
    });

    it("does not walk through a creature that is not hostile", () => {
        const session = makeSession(ROOM);
        performPlayerCommand(session, move(1, 0));
        const result = performPlayerCommand(session, move(1, 0));
        expect(result).toEqual({ tookTurn: false, cost: 0, reason: "The statue is in the way." });
        expect(session.player.loc).toEqual({ x: 2, y: 1 });
        expect(creatureOf(session, 1).currentHP).toBe(10);
    });

    it("attacks a hostile creature instead of moving into it", () => {
        const session = makeSession(ROOM);
        expect(performPlayerCommand(session, move(1, 1))).toEqual({ tookTurn: true, cost: 100 });
        expect(session.player.loc).toEqual({ x: 1, y: 1 });
        expect(creatureOf(session, 2).currentHP).toBe(5);
        expect(lastMessages(session, 1)).toEqual(["Player attacks orc for 5 hit points."]);
    });

    it("interact attacks whatever is in that direction", () => {
        const session = makeSession(ROOM);
        performPlayerCommand(session, move(1, 0));
        const result = performPlayerCommand(session, { type: CommandType.Interact, dx: 1, dy: 0 });
        expect(result.tookTurn).toBe(true);
        expect(creatureOf(session, 1).currentHP).toBe(5);
        expect(lastMessages(session, 1)).toEqual(["Player attacks statue for 5 hit points."]);
    });

    it("interact with nothing there is rejected", () => {
        const session = makeSession(ROOM);
        const result = performPlayerCommand(session, { type: CommandType.Interact, dx: 0, dy: 1 });
        expect(result).toEqual({ tookTurn: false, cost: 0, reason: "Nothing to attack." });
        expect(performPlayerCommand(session, { type: CommandType.Interact, dx: 3, dy: 0 }).reason)
            .toBe("Nothing to attack.");
    });

    it("wait spends the turn without changing anything", () => {
        const session = makeSession(ROOM);
        expect(performPlayerCommand(session, { type: CommandType.Wait })).toEqual({ tookTurn: true, cost: 100 });
        expect(session.player.loc).toEqual({ x: 1, y: 1 });
        expect(session.messages.length).toBe(0);
    });

    it("quit ends the session without spending a turn", () => {
        const session = makeSession(ROOM);
        const result = performPlayerCommand(session, { type: CommandType.Quit });
        expect(result).toEqual({ tookTurn: false, cost: 0, reason: "quit" });
        expect(session.status).toBe(SessionStatus.Quit);
        expect(session.queue.size).toBe(3);
    });

    it("never touches the turn queue", () => {
        const session = makeSession(ROOM);
        const before = session.queue.entries();
        performPlayerCommand(session, move(1, 0));
        performPlayerCommand(session, move(-5, 0));
        expect(session.queue.entries()).toEqual(before);
    });
});

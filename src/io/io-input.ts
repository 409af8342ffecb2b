/*
 *  io-input.ts — Keystroke to command mapping
 *  deepmire
 *
 *  Keys use the names of the DOM `KeyboardEvent.key` values ("ArrowUp",
 *  "Escape", "k") with numpad keys also accepted by their `code` names
 *  ("Numpad8").
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { PlayerCommand } from "../types/types.js";
import { CommandType, Direction } from "../types/enums.js";
import { nbDirs } from "../globals/tables.js";

export const ESCAPE_KEY = "Escape";
export const REST_KEY = ".";

const MOVE_KEYS: Readonly<Record<string, Direction>> = {
    // Arrows and the navigation cluster
    ArrowUp: Direction.Up,
    ArrowDown: Direction.Down,
    ArrowLeft: Direction.Left,
    ArrowRight: Direction.Right,
    Home: Direction.UpLeft,
    End: Direction.DownLeft,
    PageUp: Direction.UpRight,
    PageDown: Direction.DownRight,

    // Numpad
    Numpad8: Direction.Up,
    Numpad2: Direction.Down,
    Numpad4: Direction.Left,
    Numpad6: Direction.Right,
    Numpad7: Direction.UpLeft,
    Numpad1: Direction.DownLeft,
    Numpad9: Direction.UpRight,
    Numpad3: Direction.DownRight,
    "8": Direction.Up,
    "2": Direction.Down,
    "4": Direction.Left,
    "6": Direction.Right,
    "7": Direction.UpLeft,
    "1": Direction.DownLeft,
    "9": Direction.UpRight,
    "3": Direction.DownRight,

    // vi-keys
    k: Direction.Up,
    j: Direction.Down,
    h: Direction.Left,
    l: Direction.Right,
    y: Direction.UpLeft,
    b: Direction.DownLeft,
    u: Direction.UpRight,
    n: Direction.DownRight,
};

const WAIT_KEYS: ReadonlySet<string> = new Set([REST_KEY, "5", "Numpad5", "Clear"]);

export function moveCommand(dir: Direction): PlayerCommand {
    const [dx, dy] = nbDirs[dir];
    return { type: CommandType.Move, dx, dy };
}

export function interactCommand(dir: Direction): PlayerCommand {
    const [dx, dy] = nbDirs[dir];
    return { type: CommandType.Interact, dx, dy };
}

/**
 * Command for a key, or null if the key does nothing. Shifted vi-keys
 * ("K", "J", ...) attack in their direction without moving.
 */
export function commandForKey(key: string): PlayerCommand | null {
    if (key === ESCAPE_KEY) {
        return { type: CommandType.Quit };
    }
    if (WAIT_KEYS.has(key)) {
        return { type: CommandType.Wait };
    }
    if (Object.hasOwn(MOVE_KEYS, key)) {
        return moveCommand(MOVE_KEYS[key]);
    }
    const lower = key.toLowerCase();
    if (key.length === 1 && key !== lower && Object.hasOwn(MOVE_KEYS, lower)) {
        return interactCommand(MOVE_KEYS[lower]);
    }
    return null;
}

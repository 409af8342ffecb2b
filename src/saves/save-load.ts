/*
 *  save-load.ts — Writing saves to disk and reading them back
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { GAME_SUFFIX } from "../types/constants.js";
import { SaveLoadError } from "../errors.js";
import { formatSeedString } from "../math/rng.js";
import type { GameSession } from "../state/game-state.js";
import { deserializeSession, serializeSession, type DeserializeOptions } from "./save-codec.js";

// =============================================================================
// File access
// =============================================================================

/** The file operations save and load need. */
export interface SaveFileIO {
    fileExists(path: string): boolean;
    readFile(path: string): string;
    writeFile(path: string, contents: string): void;
}

export const nodeFileIO: SaveFileIO = {
    fileExists: (path) => existsSync(path),
    readFile: (path) => readFileSync(path, "utf8"),
    writeFile: (path, contents) => writeFileSync(path, contents, "utf8"),
};

// =============================================================================
// File path utilities
// =============================================================================

/**
 * Given a defaultPath (without suffix) and a suffix, return either the
 * defaultPath or "defaultPath (N)" where N is the lowest number from 2 up
 * that doesn't collide with an existing file. The suffix is not included.
 */
export function getAvailableFilePath(
    defaultPath: string,
    suffix: string,
    fileExists: (path: string) => boolean,
): string {
    let result = defaultPath;
    let iterator = 2;
    while (fileExists(`${result}${suffix}`)) {
        result = `${defaultPath} (${iterator})`;
        iterator++;
    }
    return result;
}

/** Default save name (without suffix), e.g. "Saved #1234 at turn 17". */
export function getDefaultFilePath(session: GameSession): string {
    return `Saved #${formatSeedString(session.requestedSeed)} at turn ${session.turnNumber}`;
}

// =============================================================================
// Save / load
// =============================================================================

export interface SaveGameOptions {
    /** Fixed file name (without suffix); an existing file of that name is replaced. */
    name?: string;
}

/**
 * Write the session into `directory`. Without a fixed name the file gets
 * the default name, numbered to avoid clobbering earlier saves. Returns
 * the path written.
 */
export function saveGameToFile(
    session: GameSession,
    directory: string,
    io: SaveFileIO = nodeFileIO,
    options: SaveGameOptions = {},
): string {
    const base = options.name !== undefined
        ? join(directory, options.name)
        : getAvailableFilePath(join(directory, getDefaultFilePath(session)), GAME_SUFFIX, (p) => io.fileExists(p));
    const fullPath = `${base}${GAME_SUFFIX}`;
    const contents = serializeSession(session);

    try {
        io.writeFile(fullPath, contents);
    } catch (err) {
        throw new SaveLoadError(`Could not write save file ${fullPath}`, { cause: err });
    }
    session.logger.info(`saved game to ${fullPath}`);
    return fullPath;
}

/**
 * Read a session back from `path`. Throws SaveLoadError when the file is
 * missing, unreadable, or not a valid save.
 */
export function loadGameFromFile(
    path: string,
    io: SaveFileIO = nodeFileIO,
    options: DeserializeOptions = {},
): GameSession {
    if (!io.fileExists(path)) {
        throw new SaveLoadError(`No save file at ${path}`);
    }
    let text: string;
    try {
        text = io.readFile(path);
    } catch (err) {
        throw new SaveLoadError(`Could not read save file ${path}`, { cause: err });
    }
    return deserializeSession(text, options);
}

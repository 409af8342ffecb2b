/*
 *  logger.ts — Tagged console logging
 *  deepmire
 *
 *  Lines are written as "[tag] message" to the console. Modules receive
 *  a Logger through their context so tests can pass silentLogger.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { LogLevel } from "../types/enums.js";

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
    /** A logger writing under a nested tag, e.g. "game:architect". */
    child(tag: string): Logger;
}

/**
 * Create a console-backed logger. Messages below `level` are dropped.
 */
export function createConsoleLogger(tag: string, level: LogLevel = LogLevel.Info): Logger {
    const prefix = `[${tag}]`;
    return {
        debug(message, ...details) {
            if (level <= LogLevel.Debug) console.debug(prefix, message, ...details);
        },
        info(message, ...details) {
            if (level <= LogLevel.Info) console.info(prefix, message, ...details);
        },
        warn(message, ...details) {
            if (level <= LogLevel.Warn) console.warn(prefix, message, ...details);
        },
        error(message, ...details) {
            if (level <= LogLevel.Error) console.error(prefix, message, ...details);
        },
        child(childTag) {
            return createConsoleLogger(`${tag}:${childTag}`, level);
        },
    };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
    debug(): void {
        // No-op
    },
    info(): void {
        // No-op
    },
    warn(): void {
        // No-op
    },
    error(): void {
        // No-op
    },
    child(): Logger {
        return silentLogger;
    },
};

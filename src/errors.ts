/*
 *  errors.ts — Error types raised across module boundaries
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

/**
 * No connected, non-degenerate dungeon came out of any attempt.
 */
export class GenerationError extends Error {
    readonly seed: bigint;
    readonly attempts: number;

    constructor(seed: bigint, attempts: number, options?: { cause?: unknown }) {
        super(`Could not generate a connected dungeon from seed ${seed} in ${attempts} attempts`, options);
        this.name = "GenerationError";
        this.seed = seed;
        this.attempts = attempts;
    }
}

/**
 * A save file could not be read back into a session. Thrown before any
 * session object is handed out.
 */
export class SaveLoadError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "SaveLoadError";
    }
}

export class ConfigError extends Error {
    /** One entry per offending field, as "path: problem". */
    readonly issues: readonly string[];

    constructor(issues: readonly string[], options?: { cause?: unknown }) {
        super(`Invalid game configuration: ${issues.join("; ")}`, options);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

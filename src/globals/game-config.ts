/*
 *  game-config.ts — Default game configuration and its validation
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { z } from "zod";
import { LogLevel } from "../types/enums.js";
import {
    DEFAULT_MAP_WIDTH, DEFAULT_MAP_HEIGHT,
    DEFAULT_ROOM_MIN_SIZE, DEFAULT_ROOM_MAX_SIZE, DEFAULT_MAX_ROOMS,
    DEFAULT_MAX_MONSTERS_PER_ROOM, DEFAULT_MAX_GENERATION_ATTEMPTS,
    DEFAULT_FOV_RADIUS, DEFAULT_MESSAGE_CAPACITY,
    MIN_LEGAL_ROOM_SIZE, NORMAL_SPEED,
} from "../types/constants.js";
import type { GameConfig, PlayerStats } from "../types/types.js";
import { ConfigError } from "../errors.js";

export const defaultGameConfig: Readonly<GameConfig> = Object.freeze({
    mapWidth: DEFAULT_MAP_WIDTH,
    mapHeight: DEFAULT_MAP_HEIGHT,
    roomMinSize: DEFAULT_ROOM_MIN_SIZE,
    roomMaxSize: DEFAULT_ROOM_MAX_SIZE,
    maxRooms: DEFAULT_MAX_ROOMS,
    maxMonstersPerRoom: DEFAULT_MAX_MONSTERS_PER_ROOM,
    maxGenerationAttempts: DEFAULT_MAX_GENERATION_ATTEMPTS,
    fovRadius: DEFAULT_FOV_RADIUS,
    messageCapacity: DEFAULT_MESSAGE_CAPACITY,
    player: Object.freeze({
        name: "player",
        maxHP: 30,
        power: 5,
        defense: 2,
        speed: NORMAL_SPEED,
    }),
    logLevel: LogLevel.Info,
});

const positiveInt = z.number().int().positive();

export const playerStatsSchema: z.ZodType<PlayerStats> = z.object({
    name: z.string().min(1),
    maxHP: positiveInt,
    power: z.number().int().nonnegative(),
    defense: z.number().int().nonnegative(),
    speed: positiveInt,
});

export const gameConfigSchema: z.ZodType<GameConfig> = z.object({
    mapWidth: z.number().int().min(MIN_LEGAL_ROOM_SIZE),
    mapHeight: z.number().int().min(MIN_LEGAL_ROOM_SIZE),
    roomMinSize: z.number().int().min(MIN_LEGAL_ROOM_SIZE),
    roomMaxSize: z.number().int().min(MIN_LEGAL_ROOM_SIZE),
    maxRooms: positiveInt,
    maxMonstersPerRoom: z.number().int().nonnegative(),
    maxGenerationAttempts: positiveInt,
    fovRadius: positiveInt,
    messageCapacity: positiveInt,
    player: playerStatsSchema,
    logLevel: z.nativeEnum(LogLevel),
}).superRefine((config, ctx) => {
    if (config.roomMinSize > config.roomMaxSize) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["roomMinSize"],
            message: "must not exceed roomMaxSize",
        });
    }
    if (config.roomMaxSize > Math.min(config.mapWidth, config.mapHeight)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["roomMaxSize"],
            message: "must fit inside the map",
        });
    }
});

export type GameConfigOverrides = Partial<Omit<GameConfig, "player">> & {
    player?: Partial<PlayerStats>;
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ConfigError listing every offending field.
 */
export function resolveConfig(overrides: GameConfigOverrides = {}): GameConfig {
    const merged = {
        ...defaultGameConfig,
        ...overrides,
        player: { ...defaultGameConfig.player, ...overrides.player },
    };
    const parsed = gameConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
            { cause: parsed.error },
        );
    }
    return parsed.data;
}

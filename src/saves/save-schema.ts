/*
 *  save-schema.ts — Shape of a saved game on disk
 *  deepmire
 *
 *  A save is one JSON document. Terrain is stored as text rows ("#" wall,
 *  "." floor) and the explored flags as rows of "1"/"0", top row first.
 *  Seeds are decimal strings since JSON has no 64-bit integers.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { z } from "zod";
import { ActionCapability, MonsterKind } from "../types/enums.js";
import { SAVE_FORMAT_VERSION } from "../types/constants.js";
import { gameConfigSchema } from "../globals/game-config.js";

const nonNegativeInt = z.number().int().nonnegative();

const seedSchema = z.string().regex(/^\d+$/, "must be a decimal integer").transform((s) => BigInt(s));

const uint32 = z.number().int().min(0).max(0xFFFFFFFF);

export const posSchema = z.object({
    x: z.number().int(),
    y: z.number().int(),
});

export const savedCreatureSchema = z.object({
    id: nonNegativeInt,
    name: z.string().min(1),
    displayChar: z.string().length(1),
    loc: posSchema,
    currentHP: z.number().int().positive(),
    maxHP: z.number().int().positive(),
    power: nonNegativeInt,
    defense: nonNegativeInt,
    speed: z.number().int().positive(),
    capability: z.nativeEnum(ActionCapability),
    monsterKind: z.nativeEnum(MonsterKind).nullable(),
    blocksMovement: z.boolean(),
}).refine((c) => c.currentHP <= c.maxHP, { message: "currentHP exceeds maxHP", path: ["currentHP"] });

export const savedMapSchema = z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    rows: z.array(z.string().regex(/^[#.]*$/, "terrain rows may only contain '#' and '.'")),
    explored: z.array(z.string().regex(/^[01]*$/, "explored rows may only contain '0' and '1'")),
});

export const turnEntrySchema = z.object({
    creatureId: nonNegativeInt,
    time: nonNegativeInt,
    sequence: nonNegativeInt,
});

export const savedQueueSchema = z.object({
    currentTime: nonNegativeInt,
    nextSequence: nonNegativeInt,
    entries: z.array(turnEntrySchema),
});

export const savedMessageSchema = z.object({
    text: z.string(),
    count: z.number().int().positive(),
    turnNumber: nonNegativeInt,
});

export const saveDocumentSchema = z.object({
    version: z.literal(SAVE_FORMAT_VERSION),
    seed: seedSchema,
    requestedSeed: seedSchema,
    turnNumber: nonNegativeInt,
    nextCreatureId: nonNegativeInt,
    playerId: nonNegativeInt,
    config: gameConfigSchema,
    map: savedMapSchema,
    creatures: z.array(savedCreatureSchema),
    queue: savedQueueSchema,
    rng: z.object({ a: uint32, b: uint32, c: uint32, d: uint32 }),
    messages: z.array(savedMessageSchema),
});

/** A save as written to disk. */
export type SaveDocumentInput = z.input<typeof saveDocumentSchema>;
/** A save after validation, seeds parsed. */
export type SaveDocument = z.output<typeof saveDocumentSchema>;
export type SavedCreature = z.output<typeof savedCreatureSchema>;

/*
 *  rng.ts — Bob Jenkins' small PRNG as seedable, independent streams
 *  deepmire
 *
 *  The generator uses 32-bit unsigned integer arithmetic with overflow
 *  semantics; `>>> 0` keeps every intermediate an unsigned 32-bit value.
 *  Each stream owns its state, so a dungeon generator and a running
 *  session never disturb each other's sequence.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ===== Internal state =====

/** The four state words of the generator. */
export interface RngState {
    a: number;
    b: number;
    c: number;
    d: number;
}

export interface Rng {
    /** Next raw unsigned 32-bit value. */
    nextUint32(): number;
    /** Random integer in [lowerBound, upperBound], inclusive. */
    range(lowerBound: number, upperBound: number): number;
    /** True with a chance of `percent` out of 100. */
    percent(percent: number): boolean;
    /** Fisher-Yates shuffle, in place. */
    shuffle<T>(list: T[]): void;
    /** Pick one element, or undefined for an empty list. */
    pick<T>(list: readonly T[]): T | undefined;
    /** Random 64-bit value, suitable as a seed for another stream. */
    nextSeed(): bigint;
    /** Copy of the current state words. */
    getState(): RngState;
}

// ===== Core PRNG (Jenkins small) =====

function rot(x: number, k: number): number {
    return ((x << k) | (x >>> (32 - k))) >>> 0;
}

function ranval(ctx: RngState): number {
    const e = (ctx.a - rot(ctx.b, 27)) >>> 0;
    ctx.a = (ctx.b ^ rot(ctx.c, 17)) >>> 0;
    ctx.b = (ctx.c + ctx.d) >>> 0;
    ctx.c = (ctx.d + e) >>> 0;
    ctx.d = (e + ctx.a) >>> 0;
    return ctx.d;
}

function raninit(seed: bigint): RngState {
    const lo = Number(BigInt.asUintN(64, seed) & 0xFFFFFFFFn) >>> 0;
    const hi = Number((BigInt.asUintN(64, seed) >> 32n) & 0xFFFFFFFFn) >>> 0;

    const ctx: RngState = {
        a: 0xf1ea5eed,
        b: lo,
        c: (lo ^ hi) >>> 0,
        d: lo,
    };
    for (let i = 0; i < 20; i++) {
        ranval(ctx);
    }
    return ctx;
}

// ===== Unbiased range selection =====

const RAND_MAX_COMBO = 0xFFFFFFFF;

/**
 * Returns an unbiased random number in [0, n-1].
 * Uses rejection sampling to eliminate modulo bias.
 */
function unbiased(ctx: RngState, n: number): number {
    const div = Math.floor(RAND_MAX_COMBO / n);
    let r: number;
    do {
        r = Math.floor(ranval(ctx) / div);
    } while (r >= n);
    return r;
}

// ===== Public API =====

function streamFromState(ctx: RngState): Rng {
    const rng: Rng = {
        nextUint32() {
            return ranval(ctx);
        },

        range(lowerBound, upperBound) {
            if (upperBound <= lowerBound) {
                return lowerBound;
            }
            return lowerBound + unbiased(ctx, upperBound - lowerBound + 1);
        },

        percent(percent) {
            return rng.range(0, 99) < clamp(percent, 0, 100);
        },

        shuffle(list) {
            for (let i = 0; i < list.length - 1; i++) {
                const r = rng.range(i, list.length - 1);
                if (i !== r) {
                    const tmp = list[r];
                    list[r] = list[i];
                    list[i] = tmp;
                }
            }
        },

        pick(list) {
            if (list.length === 0) return undefined;
            return list[rng.range(0, list.length - 1)];
        },

        nextSeed() {
            const hi = BigInt(ranval(ctx));
            const lo = BigInt(ranval(ctx));
            return (hi << 32n) | lo;
        },

        getState() {
            return { a: ctx.a, b: ctx.b, c: ctx.c, d: ctx.d };
        },
    };
    return rng;
}

/**
 * Create a stream seeded with `seed`. Equal seeds give equal sequences.
 */
export function createRng(seed: bigint): Rng {
    return streamFromState(raninit(seed));
}

/**
 * Resume a stream from state captured with `getState()`.
 */
export function restoreRng(state: RngState): Rng {
    return streamFromState({
        a: state.a >>> 0,
        b: state.b >>> 0,
        c: state.c >>> 0,
        d: state.d >>> 0,
    });
}

/**
 * Seed for generation attempt `attempt`. Attempt 0 uses the seed itself,
 * so a seed that works the first time reproduces exactly.
 */
export function deriveSeed(seed: bigint, attempt: number): bigint {
    if (attempt === 0) {
        return seed;
    }
    const stream = createRng(seed ^ BigInt(attempt) * 0x9E3779B97F4A7C15n);
    return BigInt.asUintN(64, stream.nextSeed());
}

/** A seed taken from the clock, for sessions started without one. */
export function randomSeed(): bigint {
    return BigInt(Date.now()) & 0xFFFFFFFFn;
}

// ===== Utility functions =====

/**
 * Clamp a value between min and max.
 */
export function clamp(value: number, min: number, max: number): number {
    if (value < min) return min;
    if (value > max) return max;
    return value;
}

/**
 * Format a seed as a display string.
 * Seeds up to 11 digits are printed in full; longer ones are shortened
 * to e.g. "184...51615".
 */
export function formatSeedString(seed: bigint): string {
    const full = seed.toString();
    if (full.length > 11) {
        const last5 = (seed % 100000n).toString().padStart(5, "0");
        return `${full.substring(0, 3)}...${last5}`;
    }
    return full;
}

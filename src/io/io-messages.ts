/*
 *  io-messages.ts — Message log with repeat stacking
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Message } from "../types/types.js";
import { DEFAULT_MESSAGE_CAPACITY } from "../types/constants.js";

/** Repeat counts stop growing here and display as "(many)". */
export const MAX_MESSAGE_REPEATS = 100;

/**
 * Bounded, append-only log of game messages. A message identical to the
 * newest entry bumps that entry's count instead of adding a line. Once
 * the log is full the oldest entry is dropped.
 */
export class MessageLog {
    private readonly entries: Message[] = [];

    constructor(readonly capacity: number = DEFAULT_MESSAGE_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`MessageLog: capacity must be a positive integer, got ${capacity}`);
        }
    }

    get length(): number {
        return this.entries.length;
    }

    /** Record `text` for `turnNumber`. Returns true if a new line was added. */
    add(text: string, turnNumber: number): boolean {
        const newest = this.entries.at(-1);
        if (newest !== undefined && newest.text === text) {
            if (newest.count < MAX_MESSAGE_REPEATS) {
                newest.count++;
            }
            newest.turnNumber = turnNumber;
            return false;
        }
        this.entries.push({ text, count: 1, turnNumber });
        if (this.entries.length > this.capacity) {
            this.entries.shift();
        }
        return true;
    }

    /** Copies of the entries, oldest first. */
    messages(): Message[] {
        return this.entries.map((m) => ({ ...m }));
    }

    /** The last `n` entries formatted for display, oldest first. */
    recent(n: number): string[] {
        return this.entries.slice(Math.max(0, this.entries.length - n)).map(formatCountedMessage);
    }

    clear(): void {
        this.entries.length = 0;
    }

    /**
     * Rebuild a log from saved entries. Entries past `capacity` are
     * dropped from the front.
     */
    static fromMessages(messages: readonly Message[], capacity: number): MessageLog {
        const log = new MessageLog(capacity);
        for (const m of messages.slice(Math.max(0, messages.length - capacity))) {
            log.entries.push({ ...m });
        }
        return log;
    }
}

export function formatCountedMessage(m: Message): string {
    if (m.count <= 1) {
        return m.text;
    } else if (m.count >= MAX_MESSAGE_REPEATS) {
        return `${m.text} (many)`;
    } else {
        return `${m.text} (x${m.count})`;
    }
}

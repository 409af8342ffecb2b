/*
 *  turn-queue.ts — Time-ordered schedule of creature turns
 *  deepmire
 *
 *  Entries are ordered by the tick they act at, then by the order they
 *  were scheduled in, so creatures with equal initiative take turns
 *  first-in first-out. A creature id is queued at most once.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { TurnEntry } from "../types/types.js";

function comesBefore(a: TurnEntry, b: TurnEntry): boolean {
    return a.time < b.time || (a.time === b.time && a.sequence < b.sequence);
}

export class TurnQueue {
    private heap: TurnEntry[] = [];
    private queued = new Set<number>();
    private now = 0;
    private sequence = 0;

    /** Tick of the most recently popped entry. */
    get currentTime(): number {
        return this.now;
    }

    /** Sequence number the next scheduled entry will get. */
    get nextSequence(): number {
        return this.sequence;
    }

    get size(): number {
        return this.heap.length;
    }

    has(creatureId: number): boolean {
        return this.queued.has(creatureId);
    }

    /**
     * Queue a creature to act at `time`. Throws if it is already queued
     * or `time` lies before the current time.
     */
    schedule(creatureId: number, time: number): TurnEntry {
        if (this.queued.has(creatureId)) {
            throw new Error(`TurnQueue.schedule: creature ${creatureId} is already queued`);
        }
        if (time < this.now) {
            throw new Error(`TurnQueue.schedule: time ${time} is before the current time ${this.now}`);
        }
        const entry: TurnEntry = { creatureId, time, sequence: this.sequence++ };
        this.heap.push(entry);
        this.queued.add(creatureId);
        this.siftUp(this.heap.length - 1);
        return entry;
    }

    /** The next entry to act, without removing it. */
    peek(): TurnEntry | null {
        return this.heap[0] ?? null;
    }

    /** Remove and return the next entry, advancing the current time to it. */
    pop(): TurnEntry | null {
        const top = this.heap[0];
        if (top === undefined) {
            return null;
        }
        this.removeAt(0);
        this.now = top.time;
        return top;
    }

    /** Drop a creature's entry. Returns false if it was not queued. */
    remove(creatureId: number): boolean {
        if (!this.queued.has(creatureId)) {
            return false;
        }
        const index = this.heap.findIndex((entry) => entry.creatureId === creatureId);
        this.removeAt(index);
        return true;
    }

    clear(): void {
        this.heap = [];
        this.queued.clear();
    }

    /** Every entry in acting order. */
    entries(): TurnEntry[] {
        return [...this.heap]
            .sort((a, b) => (a.time - b.time) || (a.sequence - b.sequence))
            .map((entry) => ({ ...entry }));
    }

    /**
     * Rebuild a queue from saved entries, keeping their sequence numbers.
     * Throws on a duplicate id, a time before `currentTime`, or a sequence
     * number at or past `nextSequence`.
     */
    static fromEntries(entries: readonly TurnEntry[], currentTime: number, nextSequence: number): TurnQueue {
        const queue = new TurnQueue();
        queue.now = currentTime;
        for (const entry of entries) {
            if (queue.queued.has(entry.creatureId)) {
                throw new Error(`TurnQueue.fromEntries: creature ${entry.creatureId} appears twice`);
            }
            if (entry.time < currentTime) {
                throw new Error(`TurnQueue.fromEntries: entry for ${entry.creatureId} is in the past`);
            }
            if (entry.sequence >= nextSequence) {
                throw new Error(`TurnQueue.fromEntries: sequence ${entry.sequence} is not below ${nextSequence}`);
            }
            queue.heap.push({ ...entry });
            queue.queued.add(entry.creatureId);
            queue.siftUp(queue.heap.length - 1);
        }
        queue.sequence = nextSequence;
        return queue;
    }

    // ===== Heap maintenance =====

    private removeAt(index: number): void {
        const removed = this.heap[index];
        const last = this.heap.pop();
        this.queued.delete(removed.creatureId);
        if (last === undefined || index === this.heap.length) {
            return;
        }
        this.heap[index] = last;
        this.siftUp(index);
        this.siftDown(index);
    }

    private siftUp(index: number): void {
        let i = index;
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (!comesBefore(this.heap[i], this.heap[parent])) {
                break;
            }
            this.swap(i, parent);
            i = parent;
        }
    }

    private siftDown(index: number): void {
        let i = index;
        for (;;) {
            const left = 2 * i + 1;
            const right = left + 1;
            let smallest = i;
            if (left < this.heap.length && comesBefore(this.heap[left], this.heap[smallest])) {
                smallest = left;
            }
            if (right < this.heap.length && comesBefore(this.heap[right], this.heap[smallest])) {
                smallest = right;
            }
            if (smallest === i) {
                return;
            }
            this.swap(i, smallest);
            i = smallest;
        }
    }

    private swap(i: number, j: number): void {
        const tmp = this.heap[i];
        this.heap[i] = this.heap[j];
        this.heap[j] = tmp;
    }
}

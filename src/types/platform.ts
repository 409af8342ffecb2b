/*
 *  platform.ts — Platform abstraction layer interface
 *  deepmire
 *
 *  The render surface and the input source are the only ways the
 *  simulation talks to the outside world. Any platform (terminal, browser,
 *  test harness) implements these to drive the game loop.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { SessionStatus } from "./enums.js";
import type { Creature, GameMap, Message, PlayerCommand } from "./types.js";

/**
 * Read-only snapshot of a session handed to the platform each frame.
 */
export interface SessionView {
    readonly map: Readonly<GameMap>;
    readonly creatures: readonly Readonly<Creature>[];
    readonly player: Readonly<Creature>;
    readonly messages: readonly Readonly<Message>[];
    readonly turnNumber: number;
    readonly status: SessionStatus;
}

export interface RenderSurface {
    /** Draw the current state. Must not mutate the view. */
    render(view: SessionView): void;
}

export interface InputSource {
    /**
     * Resolve with the next discrete player command. The turn loop
     * suspends on this promise and nowhere else.
     */
    nextCommand(view: SessionView): Promise<PlayerCommand>;
}

export interface Platform {
    surface: RenderSurface;
    input: InputSource;
}

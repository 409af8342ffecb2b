/*
 *  scripted-input.ts — Input source that replays a fixed command list
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { InputSource, Platform, RenderSurface } from "../types/platform.js";
import type { PlayerCommand } from "../types/types.js";
import { CommandType } from "../types/enums.js";
import { nullSurface } from "./null-platform.js";

export interface ScriptedInputOptions {
    /** What to do once the script runs out: send Quit (default) or reject. */
    whenExhausted?: "quit" | "throw";
}

export interface ScriptedInput extends InputSource {
    /** Commands handed out so far. */
    readonly consumed: number;
    readonly remaining: number;
}

export function createScriptedInput(
    commands: readonly PlayerCommand[],
    options: ScriptedInputOptions = {},
): ScriptedInput {
    const whenExhausted = options.whenExhausted ?? "quit";
    let index = 0;
    return {
        get consumed() {
            return index;
        },
        get remaining() {
            return commands.length - index;
        },
        nextCommand() {
            if (index < commands.length) {
                return Promise.resolve(commands[index++]);
            }
            if (whenExhausted === "quit") {
                const quit: PlayerCommand = { type: CommandType.Quit };
                return Promise.resolve(quit);
            }
            return Promise.reject(new Error(`scripted input exhausted after ${commands.length} commands`));
        },
    };
}

/** Platform with no display fed from a command list. */
export function createHeadlessPlatform(
    commands: readonly PlayerCommand[],
    surface: RenderSurface = nullSurface,
    options: ScriptedInputOptions = {},
): Platform {
    return { surface, input: createScriptedInput(commands, options) };
}

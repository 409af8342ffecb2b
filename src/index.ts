/*
 *  deepmire
 *  Turn-based roguelike simulation core
 *
 *  Copyright 2025. All rights reserved.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 *
 *  This program is distributed in the hope that it will be useful,
 *  but WITHOUT ANY WARRANTY; without even the implied warranty of
 *  MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *  GNU Affero General Public License for more details.
 *
 *  You should have received a copy of the GNU Affero General Public License
 *  along with this program.  If not, see <http://www.gnu.org/licenses/>.
 */

// Top-level barrel exports for deepmire.
//
// Foundation types, errors and the session entry points are exported flat;
// every module is also available as a namespace for grouped access.
//
// ── Foundation ──────────────────────────────────────────────────────────────
export * from "./types/index.js";
export * from "./errors.js";
export * from "./logging/logger.js";

// ── Session entry points ────────────────────────────────────────────────────
export { createSession, runGame, type NewSessionOptions } from "./game/index.js";
export { resolveConfig, defaultGameConfig, type GameConfigOverrides } from "./globals/game-config.js";
export type { GameSession } from "./state/game-state.js";
export { processNextTurn, type TurnOutcome } from "./time/turn-processing.js";
export { serializeSession, deserializeSession, saveGameToFile, loadGameFromFile } from "./saves/index.js";

// ── Module namespaces ───────────────────────────────────────────────────────

export * as math from "./math/index.js";
export * as globals from "./globals/index.js";
export * as grid from "./grid/index.js";
export * as state from "./state/index.js";
export * as dijkstra from "./dijkstra/index.js";
export * as light from "./light/index.js";
export * as architect from "./architect/index.js";
export * as monsters from "./monsters/index.js";
export * as combat from "./combat/index.js";
export * as movement from "./movement/index.js";
export * as time from "./time/index.js";
export * as io from "./io/index.js";
export * as saves from "./saves/index.js";
export * as game from "./game/index.js";
export * as platform from "./platform/index.js";

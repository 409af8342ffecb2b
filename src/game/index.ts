/*
 *  game/index.ts — Barrel exports for session lifecycle
 *  deepmire
 *
 *  Re-exports from:
 *    - game-init.ts      (createSession)
 *    - game-loop.ts      (runGame)
 *    - game-lifecycle.ts (gameOver, quitGame)
 */

export { createSession, WELCOME_MESSAGE, type NewSessionOptions } from "./game-init.js";
export { runGame } from "./game-loop.js";
export { gameOver, quitGame } from "./game-lifecycle.js";

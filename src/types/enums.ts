/*
 *  enums.ts — Enumerations shared across the simulation
 *  deepmire
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ===== Terrain =====

export enum TileKind {
    Wall,
    Floor,
}

// ===== Creatures =====

/** What drives a creature's turn. */
export enum ActionCapability {
    PlayerControlled,
    Hostile,
    Inert,
}

export enum MonsterKind {
    Orc,
    Troll,
}

// ===== Session =====

export enum SessionStatus {
    InProgress,
    PlayerDied,
    Quit,
}

// ===== Commands =====

export enum CommandType {
    Move,
    Wait,
    Interact,
    Quit,
}

// ===== Directions =====

/** Index into nbDirs. The first four are cardinal. */
export enum Direction {
    Up,
    Down,
    Left,
    Right,
    UpLeft,
    DownLeft,
    UpRight,
    DownRight,
}

// ===== Logging =====

export enum LogLevel {
    Debug,
    Info,
    Warn,
    Error,
    Silent,
}

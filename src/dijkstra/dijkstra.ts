/*
 *  dijkstra.ts — Dijkstra scanning algorithm for pathfinding distance maps
 *  deepmire
 *
 *  The core dijkstraScan function is pure: grid in, grid out, no game state.
 *  The calculateDistances function reads the map through a context
 *  interface so callers decide what blocks and what merely costs more.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { PDS_FORBIDDEN, PDS_MAX_DISTANCE, PDS_OBSTRUCTION } from "../types/constants.js";
import type { Pos } from "../types/types.js";
import { allocGrid, gridHeight, gridWidth, type Grid } from "../grid/grid.js";
import { nbDirs } from "../globals/tables.js";

// =============================================================================
// Internal types (private to module)
// =============================================================================

/**
 * A node in the priority-sorted linked list used by the scanner.
 * Nodes live in a flat array; the list links them by reference.
 */
interface PdsLink {
    x: number;
    y: number;
    /** Current shortest distance to this cell. */
    distance: number;
    /** Movement cost for this cell. Negative = impassable. */
    cost: number;
    /** Previous node in the sorted linked list (or null). */
    left: PdsLink | null;
    /** Next node in the sorted linked list (or null). */
    right: PdsLink | null;
}

/**
 * Priority queue backed by a sorted doubly-linked list over a flat cell array.
 */
interface PdsMap {
    width: number;
    height: number;
    /** Sentinel node at the front of the sorted list. */
    front: PdsLink;
    /** Flat array of width*height links, indexed by (x + width * y). */
    links: PdsLink[];
}

// =============================================================================
// PdsMap helpers
// =============================================================================

function pdsCell(map: PdsMap, x: number, y: number): PdsLink {
    return map.links[x + map.width * y];
}

function createPdsMap(width: number, height: number): PdsMap {
    const links: PdsLink[] = new Array(width * height);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            links[x + width * y] = { x, y, distance: 0, cost: 0, left: null, right: null };
        }
    }
    const front: PdsLink = { x: -1, y: -1, distance: -1, cost: 0, left: null, right: null };
    return { width, height, front, links };
}

// =============================================================================
// Core PDS algorithm
// =============================================================================

/**
 * Process the priority queue: for each queued cell, relax its neighbors.
 */
function pdsUpdate(map: PdsMap, useDiagonals: boolean): void {
    const dirs = useDiagonals ? 8 : 4;

    let head: PdsLink | null = map.front.right;
    map.front.right = null;

    while (head !== null) {
        for (let dir = 0; dir < dirs; dir++) {
            const nx = head.x + nbDirs[dir][0];
            const ny = head.y + nbDirs[dir][1];
            if (nx < 0 || ny < 0 || nx >= map.width || ny >= map.height) continue;

            const link = pdsCell(map, nx, ny);
            if (link.cost < 0) continue;

            // Diagonal steps may not cut across an obstruction.
            if (dir >= 4) {
                const way1 = pdsCell(map, nx, head.y);
                const way2 = pdsCell(map, head.x, ny);
                if (way1.cost === PDS_OBSTRUCTION || way2.cost === PDS_OBSTRUCTION) continue;
            }

            if (head.distance + link.cost < link.distance) {
                link.distance = head.distance + link.cost;

                // Unlink, then reinsert at the sorted position after head
                if (link.right !== null) link.right.left = link.left;
                if (link.left !== null) link.left.right = link.right;

                let left: PdsLink = head;
                let right: PdsLink | null = head.right;
                while (right !== null && right.distance < link.distance) {
                    left = right;
                    right = right.right;
                }
                left.right = link;
                link.right = right;
                link.left = left;
                if (right !== null) right.left = link;
            }
        }

        const nextHead: PdsLink | null = head.right;
        head.left = null;
        head.right = null;
        head = nextHead;
    }
}

/**
 * Load distances and costs from the grids and build the initial queue
 * out of every passable cell already closer than maxDistance.
 */
function pdsBatchInput(map: PdsMap, distanceMap: Grid, costMap: Grid, maxDistance: number): void {
    const sources: PdsLink[] = [];
    for (let i = 0; i < map.width; i++) {
        for (let j = 0; j < map.height; j++) {
            const link = pdsCell(map, i, j);
            link.distance = distanceMap[i][j];
            link.cost = costMap[i][j];
            link.left = null;
            link.right = null;
            if (link.cost > 0 && link.distance < maxDistance) {
                sources.push(link);
            }
        }
    }

    sources.sort((a, b) => a.distance - b.distance);
    let left: PdsLink = map.front;
    map.front.right = null;
    for (const link of sources) {
        link.left = left;
        left.right = link;
        left = link;
    }
}

function pdsBatchOutput(map: PdsMap, distanceMap: Grid, useDiagonals: boolean): void {
    pdsUpdate(map, useDiagonals);
    for (let i = 0; i < map.width; i++) {
        for (let j = 0; j < map.height; j++) {
            distanceMap[i][j] = pdsCell(map, i, j).distance;
        }
    }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Perform a Dijkstra scan on a distance/cost map.
 *
 * The distanceMap serves as both input (initial distances) and output
 * (computed shortest distances). Cells with distance below PDS_MAX_DISTANCE
 * are sources.
 *
 * @param costMap - Positive = traversable at that cost,
 *   PDS_FORBIDDEN = impassable, PDS_OBSTRUCTION = impassable and blocks
 *   diagonal steps around it.
 */
export function dijkstraScan(
    distanceMap: Grid,
    costMap: Grid,
    useDiagonals: boolean,
): void {
    const map = createPdsMap(gridWidth(distanceMap), gridHeight(distanceMap));
    pdsBatchInput(map, distanceMap, costMap, PDS_MAX_DISTANCE);
    pdsBatchOutput(map, distanceMap, useDiagonals);
}

// =============================================================================
// Context interface for calculateDistances
// =============================================================================

export interface CalculateDistancesContext {
    width: number;
    height: number;
    /** Whether a creature could ever stand on the tile. */
    isWalkable(pos: Pos): boolean;
    /** Extra cost of entering the tile (occupants, hazards); 0 for none. */
    extraCost(pos: Pos): number;
}

/**
 * Build a distance map to a destination. Walls become PDS_FORBIDDEN, so
 * diagonal steps past wall corners stay legal, matching player movement.
 */
export function calculateDistances(
    destination: Pos,
    eightWays: boolean,
    ctx: CalculateDistancesContext,
): Grid {
    const costMap = allocGrid(ctx.width, ctx.height);
    for (let i = 0; i < ctx.width; i++) {
        for (let j = 0; j < ctx.height; j++) {
            const pos = { x: i, y: j };
            costMap[i][j] = ctx.isWalkable(pos) ? 1 + ctx.extraCost(pos) : PDS_FORBIDDEN;
        }
    }
    // The destination itself must be enterable for the scan to seed from it.
    costMap[destination.x][destination.y] = Math.max(1, costMap[destination.x][destination.y]);

    const distanceMap = allocGrid(ctx.width, ctx.height, PDS_MAX_DISTANCE);
    distanceMap[destination.x][destination.y] = 0;
    dijkstraScan(distanceMap, costMap, eightWays);
    return distanceMap;
}

/**
 * Shortest path length between two tiles, or PDS_MAX_DISTANCE when none.
 */
export function pathingDistance(
    from: Pos,
    to: Pos,
    eightWays: boolean,
    ctx: CalculateDistancesContext,
): number {
    return calculateDistances(to, eightWays, ctx)[from.x][from.y];
}

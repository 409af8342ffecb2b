/*
 *  dijkstra/index.ts — Barrel export for Dijkstra pathfinding module
 *  deepmire
 */

export {
    dijkstraScan,
    calculateDistances,
    pathingDistance,
    type CalculateDistancesContext,
} from "./dijkstra.js";

import type { AdjacencyGraph, GeometryKind, Neighbor } from '../core/types.js';
import type { CoordinateTable } from '../layout/coordinates.js';
import { adjacentPositions, geometryOf, type Direction } from './geometry.js';

/**
 * Build the adjacency graph of a coordinate table.
 *
 * Both symbols of a key become graph entries. Each neighbour is written as the
 * symbol at the same index of the neighbouring key, so unshifted characters
 * point at unshifted characters and shifted at shifted. A missing key is null,
 * which keeps every list at the geometry's neighbour count. The graph and its
 * lists are frozen:
 *
 * - qwerty 'g' → ['f', 't', 'y', 'h', 'b', 'v']
 * - keypad '7' → [null, null, null, '/', '8', '5', '4', null]
 */
export function buildGraph(table: CoordinateTable, kind: GeometryKind): AdjacencyGraph {
  const geometry = geometryOf(kind);
  const graph: Record<string, readonly Neighbor[]> = {};
  for (const { position, token } of table.entries()) {
    const around = adjacentPositions(geometry, position).map((p) => table.tokenAt(p));
    for (let i = 0; i < token.length; i++) {
      graph[token.charAt(i)] = Object.freeze(around.map((neighbor) => (neighbor === undefined ? null : neighbor.charAt(i))));
    }
  }
  return Object.freeze(graph);
}

/** Neighbours of one character keyed by direction, or undefined if it is not on the layout. */
export function neighborsOf(graph: AdjacencyGraph, kind: GeometryKind, char: string): Partial<Record<Direction, Neighbor>> | undefined {
  const list = graph[char];
  if (!list) return undefined;
  const out: Partial<Record<Direction, Neighbor>> = {};
  geometryOf(kind).directions.forEach((dir, i) => {
    out[dir] = list[i] ?? null;
  });
  return out;
}

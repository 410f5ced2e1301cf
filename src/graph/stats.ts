import type { AdjacencyGraph } from '../core/types.js';

// On qwerty 'g' has degree 6 (f t y h b v) and '\' has degree 1.
// This is the mean over every character in the graph.
export function averageDegree(graph: AdjacencyGraph): number {
  const lists = Object.values(graph);
  if (lists.length === 0) return 0;
  let total = 0;
  for (const list of lists) {
    for (const neighbor of list) {
      if (neighbor !== null) total++;
    }
  }
  return total / lists.length;
}

export function startingPositions(graph: AdjacencyGraph): number {
  return Object.keys(graph).length;
}

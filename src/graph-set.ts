import type { AdjacencyGraph, LayoutDefinition } from './core/types.js';
import { LayoutDefinitionError } from './core/errors.js';
import { parseLayout } from './layout/validate.js';
import { buildGraph } from './graph/adjacency.js';
import { averageDegree, startingPositions } from './graph/stats.js';
import { BUILTIN_LAYOUTS, defineLayouts } from './layouts.js';

export interface GraphSet {
  readonly graphs: Readonly<Record<string, AdjacencyGraph>>;
  readonly keyboardAverageDegree: number;
  // Slightly different for mac_keypad, but close enough
  readonly keypadAverageDegree: number;
  readonly keyboardStartingPositions: number;
  readonly keypadStartingPositions: number;
}

export interface ReferenceGraphs {
  keyboard: string;
  keypad: string;
}

export const DEFAULT_REFERENCES: ReferenceGraphs = { keyboard: 'qwerty', keypad: 'keypad' };

export function buildLayoutGraph(def: LayoutDefinition): AdjacencyGraph {
  const table = parseLayout(def.diagram, { geometry: def.geometry, name: def.name });
  return buildGraph(table, def.geometry);
}

/**
 * Build every layout, then the keyboard and keypad statistics from the
 * reference graphs. Throws LayoutDefinitionError for bad definitions or a
 * missing reference, and LayoutFormatError for a malformed diagram.
 */
export function buildGraphSet(
  definitions: readonly LayoutDefinition[] = BUILTIN_LAYOUTS,
  references: ReferenceGraphs = DEFAULT_REFERENCES,
): GraphSet {
  const defs = defineLayouts(definitions);
  const graphs: Record<string, AdjacencyGraph> = {};
  for (const def of defs) {
    graphs[def.name] = buildLayoutGraph(def);
  }

  const reference = (role: keyof ReferenceGraphs): AdjacencyGraph => {
    const graph = graphs[references[role]];
    if (!graph) {
      throw new LayoutDefinitionError(`No layout named "${references[role]}" to use as the ${role} reference graph`);
    }
    return graph;
  };
  const keyboard = reference('keyboard');
  const keypad = reference('keypad');

  return Object.freeze({
    graphs: Object.freeze(graphs),
    keyboardAverageDegree: averageDegree(keyboard),
    keypadAverageDegree: averageDegree(keypad),
    keyboardStartingPositions: startingPositions(keyboard),
    keypadStartingPositions: startingPositions(keypad),
  });
}

export const ADJACENCY_GRAPHS: GraphSet = buildGraphSet();

export const KEYBOARD_AVERAGE_DEGREE = ADJACENCY_GRAPHS.keyboardAverageDegree;
export const KEYPAD_AVERAGE_DEGREE = ADJACENCY_GRAPHS.keypadAverageDegree;
export const KEYBOARD_STARTING_POSITIONS = ADJACENCY_GRAPHS.keyboardStartingPositions;
export const KEYPAD_STARTING_POSITIONS = ADJACENCY_GRAPHS.keypadStartingPositions;

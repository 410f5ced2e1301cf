// Public SDK surface for programmatic use
export type {
  ValidationError,
  GeometryKind,
  ParseOptions,
  LayoutDefinition,
  KeyPosition,
  Neighbor,
  AdjacencyGraph,
} from './core/types.js';
export type { LayoutErrorKind } from './core/errors.js';
export { LayoutFormatError, LayoutDefinitionError } from './core/errors.js';

// Diagram parsing
export { lintLayout, validateLayout, parseLayout } from './layout/validate.js';
export { CoordinateTable } from './layout/coordinates.js';
export type { PlacedKey } from './layout/coordinates.js';

// Geometry and graphs
export type { Direction, SlantedDirection, AlignedDirection, Geometry } from './graph/geometry.js';
export {
  SLANTED,
  ALIGNED,
  SLANTED_DIRECTIONS,
  ALIGNED_DIRECTIONS,
  geometryOf,
  neighborCount,
  adjacentPositions,
  directionIndex,
  oppositeIndex,
} from './graph/geometry.js';
export { buildGraph, neighborsOf } from './graph/adjacency.js';
export { averageDegree, startingPositions } from './graph/stats.js';

// Built-in layouts and the precomputed graph set
export { BUILTIN_LAYOUTS, LayoutDefinitionSchema, LayoutDefinitionsSchema, defineLayouts } from './layouts.js';
export type { GraphSet, ReferenceGraphs } from './graph-set.js';
export {
  buildGraphSet,
  buildLayoutGraph,
  ADJACENCY_GRAPHS,
  KEYBOARD_AVERAGE_DEGREE,
  KEYPAD_AVERAGE_DEGREE,
  KEYBOARD_STARTING_POSITIONS,
  KEYPAD_STARTING_POSITIONS,
} from './graph-set.js';

// Formatting
export type { OutputFormat } from './core/format.js';
export { textReport, toJsonResult } from './core/format.js';

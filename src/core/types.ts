export interface ValidationError {
  line: number;
  column: number;
  message: string;
  severity: 'error' | 'warning';
  code?: string;
  hint?: string;
  length?: number;
}

export type GeometryKind = 'slanted' | 'aligned';

export interface ParseOptions {
  geometry: GeometryKind;
  // Used in error messages only
  name?: string;
}

export interface LayoutDefinition {
  readonly name: string;
  readonly diagram: string;
  readonly geometry: GeometryKind;
}

export interface KeyPosition {
  readonly x: number;
  readonly y: number;
}

// null marks a direction with no key
export type Neighbor = string | null;

/** Character → neighbours, in the clockwise direction order of the graph's geometry. */
export type AdjacencyGraph = Readonly<Record<string, readonly Neighbor[]>>;

import type { GeometryKind, KeyPosition } from '../core/types.js';

// Clockwise, starting with the key to the left. Only near-diagonal keys touch
// in a staggered row, so on qwerty 'g' borders t, y, b and v but not r, u, n or c.
export const SLANTED_DIRECTIONS = ['left', 'top', 'topRight', 'right', 'bottom', 'bottomLeft'] as const;

// Clockwise, starting with the key to the left, for vertically aligned keypads.
export const ALIGNED_DIRECTIONS = [
  'left',
  'topLeft',
  'top',
  'topRight',
  'right',
  'bottomRight',
  'bottom',
  'bottomLeft',
] as const;

export type SlantedDirection = (typeof SLANTED_DIRECTIONS)[number];
export type AlignedDirection = (typeof ALIGNED_DIRECTIONS)[number];
export type Direction = SlantedDirection | AlignedDirection;

type Offset = readonly [dx: number, dy: number];

export interface Geometry<K extends GeometryKind = GeometryKind, D extends Direction = Direction> {
  readonly kind: K;
  readonly directions: readonly D[];
  // Parallel to directions
  readonly offsets: readonly Offset[];
}

const OFFSETS: Record<Direction, Offset> = {
  left: [-1, 0],
  topLeft: [-1, -1],
  top: [0, -1],
  topRight: [1, -1],
  right: [1, 0],
  bottomRight: [1, 1],
  bottom: [0, 1],
  bottomLeft: [-1, 1],
};

export const SLANTED: Geometry<'slanted', SlantedDirection> = {
  kind: 'slanted',
  directions: SLANTED_DIRECTIONS,
  offsets: SLANTED_DIRECTIONS.map((d) => OFFSETS[d]),
};

export const ALIGNED: Geometry<'aligned', AlignedDirection> = {
  kind: 'aligned',
  directions: ALIGNED_DIRECTIONS,
  offsets: ALIGNED_DIRECTIONS.map((d) => OFFSETS[d]),
};

export function geometryOf(kind: 'slanted'): Geometry<'slanted', SlantedDirection>;
export function geometryOf(kind: 'aligned'): Geometry<'aligned', AlignedDirection>;
export function geometryOf(kind: GeometryKind): Geometry;
export function geometryOf(kind: GeometryKind): Geometry {
  switch (kind) {
    case 'slanted':
      return SLANTED;
    case 'aligned':
      return ALIGNED;
  }
}

export function neighborCount(kind: GeometryKind): number {
  return geometryOf(kind).directions.length;
}

/** Neighbour positions of a key, in the geometry's clockwise order. */
export function adjacentPositions(geometry: Geometry, { x, y }: KeyPosition): KeyPosition[] {
  return geometry.offsets.map(([dx, dy]) => ({ x: x + dx, y: y + dy }));
}

/** -1 when the geometry has no such direction (e.g. topLeft on a slanted keyboard). */
export function directionIndex(geometry: Geometry, direction: Direction): number {
  return geometry.directions.indexOf(direction);
}

/** Index of the direction pointing back, e.g. left ↔ right. */
export function oppositeIndex(kind: GeometryKind, index: number): number {
  const n = neighborCount(kind);
  return (index + n / 2) % n;
}

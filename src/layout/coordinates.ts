import type { KeyPosition } from '../core/types.js';

export interface PlacedKey {
  readonly position: KeyPosition;
  readonly token: string;
}

function keyOf(x: number, y: number): string {
  return `${x},${y}`;
}

/**
 * Key position → token printed on that key, in diagram order.
 * Filled once by the layout semantics pass and read-only afterwards.
 */
export class CoordinateTable {
  private readonly keys = new Map<string, PlacedKey>();

  constructor(readonly tokenWidth: number, entries: Iterable<PlacedKey> = []) {
    for (const entry of entries) {
      this.keys.set(keyOf(entry.position.x, entry.position.y), entry);
    }
  }

  get size(): number {
    return this.keys.size;
  }

  tokenAt(position: KeyPosition): string | undefined {
    return this.keys.get(keyOf(position.x, position.y))?.token;
  }

  entries(): Iterable<PlacedKey> {
    return this.keys.values();
  }
}

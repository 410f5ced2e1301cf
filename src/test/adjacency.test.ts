import { describe, it, expect } from 'vitest';
import { buildGraph, neighborsOf } from '../graph/adjacency.js';
import { ALIGNED, SLANTED, directionIndex, neighborCount, oppositeIndex } from '../graph/geometry.js';
import { parseLayout } from '../layout/validate.js';
import { ADJACENCY_GRAPHS } from '../graph-set.js';
import { BUILTIN_LAYOUTS } from '../layouts.js';

const { graphs } = ADJACENCY_GRAPHS;

describe('geometry', () => {
    it('orders directions clockwise from the left', () => {
        expect(SLANTED.directions).toEqual(['left', 'top', 'topRight', 'right', 'bottom', 'bottomLeft']);
        expect(ALIGNED.directions).toEqual(['left', 'topLeft', 'top', 'topRight', 'right', 'bottomRight', 'bottom', 'bottomLeft']);
        expect(SLANTED.offsets).toEqual([[-1, 0], [0, -1], [1, -1], [1, 0], [0, 1], [-1, 1]]);
        expect(ALIGNED.offsets).toEqual([[-1, 0], [-1, -1], [0, -1], [1, -1], [1, 0], [1, 1], [0, 1], [-1, 1]]);
    });

    it('indexes directions per geometry', () => {
        expect(directionIndex(ALIGNED, 'top')).toBe(2);
        expect(directionIndex(SLANTED, 'top')).toBe(1);
        expect(directionIndex(SLANTED, 'topLeft')).toBe(-1);
        expect(neighborCount('slanted')).toBe(6);
        expect(neighborCount('aligned')).toBe(8);
    });

    it('finds the opposite direction', () => {
        expect(oppositeIndex('slanted', 1)).toBe(4);
        expect(oppositeIndex('slanted', 5)).toBe(2);
        expect(oppositeIndex('aligned', 7)).toBe(3);
        expect(oppositeIndex('aligned', 0)).toBe(4);
    });
});

describe('buildGraph', () => {
    it('maps both symbols of a key with matching shift state', () => {
        const table = parseLayout('\naA bB\n cC dD\n', { geometry: 'slanted' });
        const graph = buildGraph(table, 'slanted');
        expect(Object.keys(graph)).toEqual(['a', 'A', 'b', 'B', 'c', 'C', 'd', 'D']);
        expect(graph['a']).toEqual([null, null, null, 'b', 'c', null]);
        expect(graph['d']).toEqual(['c', 'b', null, null, null, null]);
        expect(graph['C']).toEqual([null, 'A', 'B', 'D', null, null]);
    });

    it('builds qwerty neighbours', () => {
        const qwerty = graphs['qwerty'] ?? {};
        expect(qwerty['g']).toEqual(['f', 't', 'y', 'h', 'b', 'v']);
        expect(qwerty['G']).toEqual(['F', 'T', 'Y', 'H', 'B', 'V']);
        expect(qwerty['\\']).toEqual([']', null, null, null, null, null]);
        expect(qwerty['|']).toEqual(['}', null, null, null, null, null]);
        expect(qwerty['1']).toEqual(['`', null, null, '2', 'q', null]);
        expect(qwerty['!']).toEqual(['~', null, null, '@', 'Q', null]);
        expect(qwerty['/']).toEqual(['.', ';', "'", null, null, null]);
        expect(qwerty['?']).toEqual(['>', ':', '"', null, null, null]);
    });

    it('builds dvorak neighbours', () => {
        expect(graphs['dvorak']?.['g']).toEqual(['f', '7', '8', 'c', 'h', 'd']);
    });

    it('builds keypad neighbours', () => {
        const keypad = graphs['keypad'] ?? {};
        expect(keypad['7']).toEqual([null, null, null, '/', '8', '5', '4', null]);
        expect(keypad['5']).toEqual(['4', '7', '8', '9', '6', '3', '2', '1']);
        expect(keypad['0']).toEqual([null, '1', '2', '3', '.', null, null, null]);
        expect(keypad['+']).toEqual(['9', '*', '-', null, null, null, null, '6']);
    });

    it('builds mac keypad neighbours', () => {
        const mac = graphs['mac_keypad'] ?? {};
        expect(mac['7']).toEqual([null, null, null, '=', '8', '5', '4', null]);
        expect(mac['=']).toEqual([null, null, null, null, '/', '9', '8', '7']);
    });

    it('keeps every list at the geometry neighbour count', () => {
        for (const def of BUILTIN_LAYOUTS) {
            const graph = graphs[def.name] ?? {};
            const lengths = new Set(Object.values(graph).map((list) => list.length));
            expect([...lengths]).toEqual([neighborCount(def.geometry)]);
        }
    });

    it('freezes the graph and every list', () => {
        const qwerty = graphs['qwerty'] ?? {};
        const list = qwerty['g'] ?? [];
        expect(Object.isFrozen(graphs)).toBe(true);
        expect(Object.isFrozen(ADJACENCY_GRAPHS)).toBe(true);
        expect(Object.isFrozen(qwerty)).toBe(true);
        expect(Object.isFrozen(list)).toBe(true);
        expect(Reflect.set(list, 0, 'x')).toBe(false);
        expect(Reflect.set(qwerty, 'g', [])).toBe(false);
        expect(() => Array.prototype.push.call(list, 'x')).toThrow(TypeError);
        expect(list).toEqual(['f', 't', 'y', 'h', 'b', 'v']);
    });

    it('is symmetric', () => {
        for (const def of BUILTIN_LAYOUTS) {
            const graph = graphs[def.name] ?? {};
            for (const [char, list] of Object.entries(graph)) {
                list.forEach((neighbor, i) => {
                    if (neighbor === null) return;
                    expect(graph[neighbor]?.[oppositeIndex(def.geometry, i)]).toBe(char);
                });
            }
        }
    });
});

describe('neighborsOf', () => {
    it('keys neighbours by direction', () => {
        expect(neighborsOf(graphs['keypad'] ?? {}, 'aligned', '7')).toEqual({
            left: null,
            topLeft: null,
            top: null,
            topRight: '/',
            right: '8',
            bottomRight: '5',
            bottom: '4',
            bottomLeft: null,
        });
    });

    it('returns undefined for characters not on the layout', () => {
        expect(neighborsOf(graphs['keypad'] ?? {}, 'aligned', 'x')).toBeUndefined();
    });
});

import { describe, it, expect } from 'vitest';
import {
    ADJACENCY_GRAPHS,
    KEYBOARD_AVERAGE_DEGREE,
    KEYBOARD_STARTING_POSITIONS,
    KEYPAD_AVERAGE_DEGREE,
    KEYPAD_STARTING_POSITIONS,
    buildGraphSet,
} from '../graph-set.js';
import { averageDegree, startingPositions } from '../graph/stats.js';
import { BUILTIN_LAYOUTS, defineLayouts } from '../layouts.js';
import { LayoutDefinitionError, LayoutFormatError } from '../core/errors.js';

describe('graph set statistics', () => {
    it('builds all four layouts', () => {
        expect(Object.keys(ADJACENCY_GRAPHS.graphs)).toEqual(['qwerty', 'dvorak', 'keypad', 'mac_keypad']);
    });

    it('computes the keyboard average degree from qwerty', () => {
        expect(KEYBOARD_AVERAGE_DEGREE).toBe(432 / 94);
        expect(KEYBOARD_AVERAGE_DEGREE).toBeGreaterThan(1);
        expect(KEYBOARD_AVERAGE_DEGREE).toBeLessThan(6);
    });

    it('computes the keypad average degree from keypad', () => {
        expect(KEYPAD_AVERAGE_DEGREE).toBe(76 / 15);
        expect(averageDegree(ADJACENCY_GRAPHS.graphs['mac_keypad'] ?? {})).toBe(5.25);
    });

    it('counts starting positions', () => {
        expect(KEYBOARD_STARTING_POSITIONS).toBe(94);
        expect(KEYPAD_STARTING_POSITIONS).toBe(15);
        expect(startingPositions(ADJACENCY_GRAPHS.graphs['mac_keypad'] ?? {})).toBe(16);
    });

    it('counts one starting position per distinct diagram character', () => {
        for (const def of BUILTIN_LAYOUTS) {
            const distinct = new Set(def.diagram.replace(/\s+/g, '')).size;
            expect(startingPositions(ADJACENCY_GRAPHS.graphs[def.name] ?? {})).toBe(distinct);
        }
    });

    it('treats an empty graph as degree zero', () => {
        expect(averageDegree({})).toBe(0);
        expect(startingPositions({})).toBe(0);
    });
});

describe('buildGraphSet', () => {
    it('uses the named reference graphs', () => {
        const set = buildGraphSet([{ name: 'pad', diagram: '\n1 2\n', geometry: 'aligned' }], { keyboard: 'pad', keypad: 'pad' });
        expect(set.graphs['pad']?.['1']).toEqual([null, null, null, null, '2', null, null, null]);
        expect(set.keyboardAverageDegree).toBe(1);
        expect(set.keypadStartingPositions).toBe(2);
    });

    it('fails when a reference graph is missing', () => {
        expect(() => buildGraphSet([{ name: 'pad', diagram: '\n1 2\n', geometry: 'aligned' }])).toThrow(
            'No layout named "qwerty" to use as the keyboard reference graph',
        );
    });

    it('rejects duplicate layout names', () => {
        const def = { name: 'pad', diagram: '\n1 2\n', geometry: 'aligned' } as const;
        expect(() => buildGraphSet([def, def], { keyboard: 'pad', keypad: 'pad' })).toThrow(LayoutDefinitionError);
    });

    it('stops at a malformed diagram', () => {
        expect(() =>
            buildGraphSet([{ name: 'pad', diagram: '\n1 22\n', geometry: 'aligned' }], { keyboard: 'pad', keypad: 'pad' }),
        ).toThrow(LayoutFormatError);
    });
});

describe('defineLayouts', () => {
    it('accepts plain objects', () => {
        expect(defineLayouts([{ name: 'pad', diagram: '\n1\n', geometry: 'aligned' }])).toEqual([
            { name: 'pad', diagram: '\n1\n', geometry: 'aligned' },
        ]);
    });

    it('rejects unknown geometries', () => {
        let caught: unknown;
        try {
            defineLayouts([{ name: 'hex', diagram: '\n1\n', geometry: 'hexagonal' }]);
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(LayoutDefinitionError);
        if (!(caught instanceof LayoutDefinitionError)) return;
        expect(caught.issues).toHaveLength(1);
        expect(caught.issues[0]?.startsWith('0.geometry: ')).toBe(true);
    });

    it('reports the duplicated name', () => {
        const def = { name: 'pad', diagram: '\n1\n', geometry: 'aligned' };
        expect(() => defineLayouts([def, def])).toThrow('1.name: Duplicate layout name "pad"');
    });
});

import { z } from 'zod';
import type { LayoutDefinition } from './core/types.js';
import { LayoutDefinitionError } from './core/errors.js';

export const GeometryKindSchema = z.enum(['slanted', 'aligned']);

export const LayoutDefinitionSchema = z.object({
  name: z.string().min(1).describe('Graph name, e.g. "qwerty"'),
  diagram: z.string().describe('Keyboard diagram; the first line is left empty and staggered rows are indented with spaces'),
  geometry: GeometryKindSchema.describe('slanted for staggered keyboards, aligned for keypads'),
});

export const LayoutDefinitionsSchema = z.array(LayoutDefinitionSchema).superRefine((defs, ctx) => {
  const seen = new Set<string>();
  defs.forEach((def, i) => {
    if (seen.has(def.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'name'], message: `Duplicate layout name "${def.name}"` });
    }
    seen.add(def.name);
  });
});

export function defineLayouts(input: unknown): LayoutDefinition[] {
  const res = LayoutDefinitionsSchema.safeParse(input);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new LayoutDefinitionError(`Invalid layout definitions: ${issues.join('; ')}`, issues);
  }
  return res.data;
}

// Each row is drawn one space further right than the row above it.
const qwerty = [
  '',
  '`~ 1! 2@ 3# 4$ 5% 6^ 7& 8* 9( 0) -_ =+',
  '    qQ wW eE rR tT yY uU iI oO pP [{ ]} \\|',
  '     aA sS dD fF gG hH jJ kK lL ;: \'"',
  '      zZ xX cC vV bB nN mM ,< .> /?',
  '',
].join('\n');

const dvorak = [
  '',
  '`~ 1! 2@ 3# 4$ 5% 6^ 7& 8* 9( 0) [{ ]}',
  '    \'" ,< .> pP yY fF gG cC rR lL /? =+ \\|',
  '     aA oO eE uU iI dD hH tT nN sS -_',
  '      ;: qQ jJ kK xX bB mM wW vV zZ',
  '',
].join('\n');

const keypad = [
  '',
  '  / * -',
  '7 8 9 +',
  '4 5 6',
  '1 2 3',
  '  0 .',
  '',
].join('\n');

const macKeypad = [
  '',
  '  = / *',
  '7 8 9 -',
  '4 5 6 +',
  '1 2 3',
  '  0 .',
  '',
].join('\n');

export const BUILTIN_LAYOUTS: readonly LayoutDefinition[] = [
  { name: 'qwerty', diagram: qwerty, geometry: 'slanted' },
  { name: 'dvorak', diagram: dvorak, geometry: 'slanted' },
  { name: 'keypad', diagram: keypad, geometry: 'aligned' },
  { name: 'mac_keypad', diagram: macKeypad, geometry: 'aligned' },
];

import { z } from 'zod';
import { GeometryKindSchema } from './layouts.js';

export const CliOptionsSchema = z.object({
  help: z.boolean().default(false),
  geometry: GeometryKindSchema.default('slanted'),
  format: z.enum(['text', 'json']).default('text'),
  graph: z.boolean().default(false),
  gitignore: z.boolean().default(true),
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  targets: z.array(z.string()),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

function splitGlobs(v: string): string[] {
  return v.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Simple flag parsing: flags take their value from the next argument
 * or after '=', everything else is a file, directory or '-' for stdin.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const raw: Record<string, unknown> = {};
  const include: string[] = [];
  const exclude: string[] = [];
  const targets: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    const eq = a.startsWith('--') ? a.indexOf('=') : -1;
    const flag = eq >= 0 ? a.slice(0, eq) : a;
    const takeValue = () => {
      if (eq >= 0) return a.slice(eq + 1);
      i++;
      return argv[i];
    };

    if (flag === '--help' || flag === '-h') { raw.help = true; continue; }
    if (flag === '--graph') { raw.graph = true; continue; }
    if (flag === '--no-gitignore') { raw.gitignore = false; continue; }
    if (flag === '--geometry' || flag === '-g') { raw.geometry = (takeValue() ?? '').toLowerCase(); continue; }
    if (flag === '--format' || flag === '-f') { raw.format = (takeValue() ?? '').toLowerCase(); continue; }
    if (flag === '--include' || flag === '-I') { include.push(...splitGlobs(takeValue() ?? '')); continue; }
    if (flag === '--exclude' || flag === '-E') { exclude.push(...splitGlobs(takeValue() ?? '')); continue; }
    if (a.startsWith('-') && a !== '-') {
      throw new z.ZodError([{ code: z.ZodIssueCode.custom, path: [], message: `Unknown option: ${a}` }]);
    }
    targets.push(a);
  }

  return CliOptionsSchema.parse({ ...raw, include, exclude, targets });
}

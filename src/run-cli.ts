import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { z } from 'zod';
import type { AdjacencyGraph, GeometryKind, ValidationError } from './core/types.js';
import { textReport, toJsonResult } from './core/format.js';
import { lintLayout } from './layout/validate.js';
import { buildGraph } from './graph/adjacency.js';
import { averageDegree, startingPositions } from './graph/stats.js';
import { ADJACENCY_GRAPHS } from './graph-set.js';
import { parseCliArgs, type CliOptions } from './cli-args.js';

export interface CliIO {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
    readStdin: () => string;
}

export const processIO: CliIO = {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    readStdin: () => fs.readFileSync(0, 'utf8'),
};

const USAGE = [
    'Usage: keygraph                     Print the built-in adjacency graphs as JSON',
    '       keygraph <file> [options]    Check a keyboard diagram',
    '       cat file | keygraph -',
    '       keygraph <directory>         Check every .kbd/.layout file recursively',
    'Options:',
    '  --geometry, -g  Key tiling: slanted|aligned (default: slanted)',
    '  --format, -f    Output format: text|json (default: text)',
    '  --graph         Also print the adjacency graph of each valid diagram',
    '  --include, -I   Glob(s) to include (repeatable or comma-separated)',
    '  --exclude, -E   Glob(s) to exclude (repeatable or comma-separated)',
    '  --no-gitignore  Do not respect .gitignore when scanning directories',
].join('\n');

const DEFAULT_INCLUDE_GLOBS = ['**/*.kbd', '**/*.layout'];

const DEFAULT_IGNORE_DIRS = [
  '**/.git/**',
  '**/node_modules/**',
  '**/dist/**',
  '**/coverage/**',
];

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
    const ignore = [
      ...excludes,
      ...(useGitignore ? [] : DEFAULT_IGNORE_DIRS),
    ];
    const files = await globby(patterns, {
      cwd: path.resolve(root),
      absolute: true,
      dot: true,
      gitignore: useGitignore,
      ignore,
      followSymbolicLinks: false,
    });
    return files.sort();
}

function isDirectory(p: string) {
    return fs.statSync(p, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

interface Input {
    filename: string;
    content: string;
}

interface FileResult extends Input {
    errors: ValidationError[];
    graph?: AdjacencyGraph;
}

function checkFile({ filename, content }: Input, geometry: GeometryKind, withGraph: boolean): FileResult {
    const { value, errors } = lintLayout(content, geometry);
    const valid = !errors.some(e => e.severity === 'error');
    if (!withGraph || !valid || !value) return { filename, content, errors };
    return { filename, content, errors, graph: buildGraph(value, geometry) };
}

function graphSummary(graph: AdjacencyGraph) {
    return {
        averageDegree: averageDegree(graph),
        startingPositions: startingPositions(graph),
        graph,
    };
}

async function collectInputs(opts: CliOptions, io: CliIO): Promise<Input[]> {
    const inputs: Input[] = [];
    for (const target of opts.targets) {
        if (target === '-') {
            inputs.push({ filename: '<stdin>', content: io.readStdin() });
            continue;
        }
        if (isDirectory(target)) {
            const root = path.resolve(target);
            const files = await listCandidateFiles(target, opts.include, opts.exclude, opts.gitignore);
            if (files.length === 0) io.stderr(`No keyboard diagrams found under ${target}`);
            for (const file of files) {
                // Reported relative to the directory as it was given
                inputs.push({ filename: path.join(target, path.relative(root, file)), content: fs.readFileSync(file, 'utf8') });
            }
            continue;
        }
        if (!fs.existsSync(target)) {
            throw new Error(`File not found: ${target}`);
        }
        inputs.push({ filename: target, content: fs.readFileSync(target, 'utf8') });
    }
    return inputs;
}

/** Run the keygraph command and return its exit code. */
export async function runCli(argv: string[], io: CliIO = processIO): Promise<number> {
    let opts: CliOptions;
    try {
        opts = parseCliArgs(argv);
    } catch (error) {
        if (error instanceof z.ZodError) {
            io.stderr(`Invalid arguments: ${error.issues.map(i => i.message).join('; ')}`);
            io.stderr(USAGE);
            return 1;
        }
        throw error;
    }

    if (opts.help) {
        io.stdout(USAGE);
        return 0;
    }

    if (opts.targets.length === 0) {
        io.stdout(JSON.stringify(ADJACENCY_GRAPHS, null, 2));
        return 0;
    }

    let inputs: Input[];
    try {
        inputs = await collectInputs(opts, io);
    } catch (error) {
        io.stderr(error instanceof Error ? error.message : String(error));
        return 1;
    }
    const results = inputs.map(input => checkFile(input, opts.geometry, opts.graph));
    const failed = results.some(r => r.errors.some(e => e.severity === 'error'));

    if (opts.format === 'json') {
        const files = results.map(r => ({
            ...toJsonResult(r.filename, r.errors),
            ...(r.graph ? graphSummary(r.graph) : {}),
        }));
        io.stdout(JSON.stringify({ valid: !failed, geometry: opts.geometry, files }, null, 2));
    } else {
        for (const r of results) {
            const report = textReport(r.filename, r.content, r.errors);
            io.stdout(report === 'Valid' ? `${r.filename}: Valid` : report);
            if (r.graph) io.stdout(JSON.stringify(graphSummary(r.graph), null, 2));
        }
    }

    return failed ? 1 : 0;
}

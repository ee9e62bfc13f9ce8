#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { checkFile, DEFAULT_MAX_INCLUDE_DEPTH } from './core/checker.js';
import type { Diagnostic } from './core/diagnostic.js';
import { applyFixIts } from './core/edits.js';
import { toJsonResult, type JsonResult } from './core/format.js';
import { ManifestError, readManifest, reportManifest, type Manifest } from './core/manifest.js';
import { SourceRegistry } from './core/registry.js';
import { stderrSink } from './core/sink.js';
import { NO_BUFFER, NO_LOC } from './core/types.js';

const PROGRAM = 'srcloc';

function printUsage() {
    console.log(`Usage: ${PROGRAM} <file|dir>... [options]`);
    console.log(`       ${PROGRAM} render <source> <diagnostics.json> [options]`);
    console.log('  - Follows #include directives and reports missing, recursive and misspelled includes');
    console.log('  - When a directory is given, scans recursively for C-family sources and headers');
    console.log(`  - "${PROGRAM} render" prints diagnostics described in a JSON file against a source file`);
    console.log('Options:');
    console.log('  -I <dir>, --include-dir <dir>  Add an include search directory (repeatable)');
    console.log('  --include, -i   Glob(s) to include when scanning directories (repeatable or comma-separated)');
    console.log('  --exclude, -E   Glob(s) to exclude when scanning directories (repeatable or comma-separated)');
    console.log('  --no-gitignore  Do not respect .gitignore when scanning directories');
    console.log(`  --max-depth N   Maximum #include nesting (default: ${DEFAULT_MAX_INCLUDE_DEPTH})`);
    console.log('  --format, -f    Output format: text|json (default: text)');
    console.log('  --fix           Apply suggested fix-its to the files on disk');
    console.log('  --dry-run, -n   Do not write files (useful with --fix)');
    console.log('  --no-color      Disable colored output');
}

const DEFAULT_INCLUDE_GLOBS = [
    '**/*.{c,h,cc,cpp,cxx,hpp,hh,hxx,inc,def}',
];

const DEFAULT_IGNORE_DIRS = [
    '**/.git/**',
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/out/**',
];

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

function splitList(v: string): string[] {
    return v.split(',').map(s => s.trim()).filter(Boolean);
}

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

interface CliOptions {
    format: 'text' | 'json';
    includeDirs: string[];
    includeGlobs: string[];
    excludeGlobs: string[];
    useGitignore: boolean;
    maxDepth: number;
    fix: boolean;
    dryRun: boolean;
    colors: boolean | undefined;
    positionals: string[];
}

function parseArgs(args: string[]): CliOptions {
    const opts: CliOptions = {
        format: 'text',
        includeDirs: [],
        includeGlobs: [],
        excludeGlobs: [],
        useGitignore: true,
        maxDepth: DEFAULT_MAX_INCLUDE_DEPTH,
        fix: false,
        dryRun: false,
        colors: undefined,
        positionals: [],
    };
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a === '--format' || a === '-f') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v === 'json' || v === 'text') { opts.format = v; i++; continue; }
        }
        if (a === '-I' || a === '--include-dir') {
            const v = args[i + 1];
            if (v) { opts.includeDirs.push(v); i++; continue; }
        }
        if (a.startsWith('-I') && a.length > 2) { opts.includeDirs.push(a.slice(2)); continue; }
        if (a === '--include' || a === '-i') {
            const v = args[i + 1];
            if (v) { opts.includeGlobs.push(...splitList(v)); i++; continue; }
        }
        if (a === '--exclude' || a === '-E') {
            const v = args[i + 1];
            if (v) { opts.excludeGlobs.push(...splitList(v)); i++; continue; }
        }
        if (a === '--max-depth') {
            const n = Number(args[i + 1]);
            if (Number.isInteger(n) && n >= 0) { opts.maxDepth = n; i++; continue; }
        }
        if (a === '--no-gitignore') { opts.useGitignore = false; continue; }
        if (a === '--gitignore') { opts.useGitignore = true; continue; }
        if (a === '--fix') { opts.fix = true; continue; }
        if (a === '--dry-run' || a === '-n') { opts.dryRun = true; continue; }
        if (a === '--no-color') { opts.colors = false; continue; }
        if (a === '--color') { opts.colors = true; continue; }
        if (a === '-' || !a.startsWith('-')) opts.positionals.push(a);
    }
    return opts;
}

function createRegistry(opts: CliOptions): SourceRegistry {
    return new SourceRegistry({
        includeDirs: opts.includeDirs,
        sink: stderrSink({ colors: opts.colors }),
    });
}

// JSON mode: a handler collects what the renderer would otherwise print.
function collectInto(registry: SourceRegistry): { current: Diagnostic[] } {
    const bucket: { current: Diagnostic[] } = { current: [] };
    registry.setHandler((d, ctx: { current: Diagnostic[] }) => { ctx.current.push(d); }, bucket);
    return bucket;
}

function loadManifest(file: string): Manifest | null {
    try {
        return readManifest(file);
    } catch (err) {
        if (err instanceof ManifestError) {
            console.error(err.message);
            return null;
        }
        throw err;
    }
}

async function handleRenderCommand(opts: CliOptions) {
    const [sourceFile, manifestFile] = opts.positionals;
    if (!sourceFile || !manifestFile) {
        console.error(`Usage: ${PROGRAM} render <source> <diagnostics.json>`);
        process.exit(1);
    }

    const registry = createRegistry(opts);
    const bucket = opts.format === 'json' ? collectInto(registry) : null;

    const { id } = registry.addIncludeFile(sourceFile, NO_LOC, []);
    if (id === NO_BUFFER) {
        console.error(`File not found: ${sourceFile}`);
        process.exit(1);
    }

    const manifest = loadManifest(manifestFile);
    if (!manifest) process.exit(1);

    const diagnostics = reportManifest(registry, id, manifest);
    const errorCount = diagnostics.filter(d => d.kind === 'error').length;
    if (bucket) {
        console.log(JSON.stringify(toJsonResult(sourceFile, bucket.current), null, 2));
    }
    process.exit(errorCount > 0 ? 1 : 0);
}

async function handleCheckCommand(opts: CliOptions) {
    if (opts.positionals.length === 0) {
        printUsage();
        process.exit(1);
    }

    const files: string[] = [];
    for (const target of opts.positionals) {
        if (isDirectory(target)) {
            files.push(...await listCandidateFiles(target, opts.includeGlobs, opts.excludeGlobs, opts.useGitignore));
        } else {
            files.push(target);
        }
    }

    // One registry per input file keeps include chains and buffer ids independent.
    const results: JsonResult[] = [];
    let totalErrors = 0;
    let modifiedCount = 0;
    for (const file of files) {
        const registry = createRegistry(opts);
        const bucket = opts.format === 'json' ? collectInto(registry) : null;
        const result = checkFile(registry, file, { maxDepth: opts.maxDepth });
        totalErrors += result.errorCount;

        if (opts.fix) {
            for (const [bufferId, fixIts] of result.fixIts) {
                const target = registry.getBuffer(bufferId).identifier;
                const fixed = applyFixIts(registry, bufferId, fixIts);
                if (fixed === registry.getBuffer(bufferId).text()) continue;
                if (!opts.dryRun) fs.writeFileSync(target, fixed, 'utf8');
                modifiedCount++;
            }
        }
        if (bucket) results.push(toJsonResult(file, bucket.current));
    }

    if (opts.format === 'json') {
        const errorCount = results.reduce((n, r) => n + r.errorCount, 0);
        const warningCount = results.reduce((n, r) => n + r.warningCount, 0);
        console.log(JSON.stringify({ valid: errorCount === 0, files: results, errorCount, warningCount }, null, 2));
    } else if (files.length === 0) {
        console.log('No source files found.');
    } else if (totalErrors === 0) {
        console.log(modifiedCount > 0 ? `All includes resolved. Modified ${modifiedCount} file(s).` : 'All includes resolved.');
    }
    process.exit(totalErrors > 0 ? 1 : 0);
}

async function main() {
    const args = process.argv.slice(2);

    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    if (args[0] === 'render') {
        await handleRenderCommand(parseArgs(args.slice(1)));
        return;
    }

    await handleCheckCommand(parseArgs(args));
}

main().catch((err) => {
    console.error(err instanceof Error && err.stack ? err.stack : String(err));
    process.exit(1);
});

#!/usr/bin/env node
/**
 * @file Cairn CLI
 *
 * Command-line front end over the `Pipeline` facade.
 *
 * Usage:
 *   cairn run [targets...] [--workers N] [--error-mode continue|stop] [--seed N] [--no-workspace]
 *   cairn outdated | graph [--json] | read <target> | meta [fields...]
 *   cairn reset | workspaces | purge-workspaces | reproduce <target>
 *
 * Global options: `--file/-f <pipeline.yaml>`, `--store <dir>`, `--log-level <level>`.
 * Exit code is 1 when any target errored or a command failed, 2 on a usage error.
 *
 * @module
 */

import { realpathSync } from 'fs';
import { resolve } from 'path';
import { pathToFileURL } from 'url';
import chalk from 'chalk';

import { Pipeline } from '../dag/bridge/Pipeline.js';
import type { RecordField } from '../dag/bridge/Pipeline.js';
import { CairnError } from '../dag/errors.js';
import type { RunOptions, RunReport } from '../dag/execution/types.js';
import type { FingerprintRecord } from '../dag/fingerprint/types.js';
import type { Invalidation } from '../dag/invalidation/outdated.js';
import { SettingsService } from '../config/settings.js';
import type { CairnSettings, SettingsKey } from '../config/settings.js';
import { logLevel_set } from '../logging/logger.js';

// ─── Argument Parsing ──────────────────────────────────────────────────────

export const DEFAULT_PIPELINE_FILE = 'pipeline.yaml';

export const COMMANDS = [
    'run',
    'outdated',
    'graph',
    'read',
    'meta',
    'reset',
    'workspaces',
    'purge-workspaces',
    'reproduce',
    'help',
] as const;

export type CommandName = (typeof COMMANDS)[number];

/** Flags that take a value, mapped from their aliases. */
const VALUE_FLAGS: Record<string, string> = {
    '--file': 'file',
    '-f': 'file',
    '--store': 'store',
    '--log-level': 'log-level',
    '--workers': 'workers',
    '-j': 'workers',
    '--error-mode': 'error-mode',
    '--seed': 'seed',
};

const BOOLEAN_FLAGS: Record<string, string> = {
    '--no-workspace': 'no-workspace',
    '--json': 'json',
    '--help': 'help',
    '-h': 'help',
};

/** Flags that feed a setting, with the setting they override. */
const SETTING_FLAGS: Array<[string, SettingsKey]> = [
    ['store', 'storeDir'],
    ['log-level', 'logLevel'],
    ['workers', 'workers'],
    ['error-mode', 'errorMode'],
    ['seed', 'seed'],
];

export interface ParsedArgs {
    command: CommandName;
    positionals: string[];
    values: Map<string, string>;
    flags: Set<string>;
}

export class UsageError extends Error {}

function command_is(name: string): name is CommandName {
    return COMMANDS.some((command: CommandName) => command === name);
}

/**
 * Split argv (without the node and script entries) into command,
 * positionals and options. `--flag=value` and `--flag value` are both
 * accepted.
 *
 * @throws UsageError on unknown commands, unknown flags, or a missing flag value
 */
export function argv_parse(args: string[]): ParsedArgs {
    const positionals: string[] = [];
    const values = new Map<string, string>();
    const flags = new Set<string>();

    for (let i = 0; i < args.length; i++) {
        const arg: string = args[i];
        if (!arg.startsWith('-') || arg === '-') {
            positionals.push(arg);
            continue;
        }
        const eq: number = arg.indexOf('=');
        const flag: string = eq > 0 ? arg.slice(0, eq) : arg;

        const valueKey: string | undefined = VALUE_FLAGS[flag];
        if (valueKey !== undefined) {
            const value: string | undefined = eq > 0 ? arg.slice(eq + 1) : args[++i];
            if (value === undefined) throw new UsageError(`Option ${flag} needs a value`);
            values.set(valueKey, value);
            continue;
        }
        const booleanKey: string | undefined = BOOLEAN_FLAGS[flag];
        if (booleanKey !== undefined && eq < 0) {
            flags.add(booleanKey);
            continue;
        }
        throw new UsageError(`Unknown option ${arg}`);
    }

    const first: string | undefined = positionals.shift();
    if (first === undefined) return { command: 'help', positionals, values, flags };
    if (!command_is(first)) throw new UsageError(`Unknown command '${first}'`);
    return { command: first, positionals, values, flags };
}

// ─── Output ────────────────────────────────────────────────────────────────

export interface CliIO {
    cwd: string;
    env: Record<string, string | undefined>;
    out: (line: string) => void;
    err: (line: string) => void;
}

const USAGE: string = [
    'Usage: cairn <command> [options]',
    '',
    'Commands:',
    '  run [targets...]       Bring the pipeline (or the named targets) up to date',
    '  outdated               List targets the next run would execute, with reasons',
    '  graph [--json]         Print the targets and their dependencies',
    '  read <target>          Print a stored result as JSON',
    '  meta [fields...]       Print stored fingerprint records as JSON',
    '  reset                  Forget every result and tracked file',
    '  workspaces             List targets with a captured failure workspace',
    '  purge-workspaces       Delete every captured workspace',
    '  reproduce <target>     Re-evaluate a failed target from its workspace',
    '',
    'Options:',
    `  -f, --file <path>      Pipeline file (default ${DEFAULT_PIPELINE_FILE})`,
    '  --store <dir>          Store directory, relative to the pipeline file',
    '  --log-level <level>    debug | info | warn | error',
    '  -j, --workers <n>      Targets run concurrently at most',
    '  --error-mode <mode>    continue | stop',
    '  --seed <n>             Pipeline seed',
    '  --no-workspace         Do not capture workspaces on failure',
].join('\n');

/** Human-readable run summary, one line per target that did anything. */
export function report_format(report: RunReport): string[] {
    const lines: string[] = [];
    for (const name of report.completed) {
        const reasons: string = (report.reasons[name] ?? []).join(', ');
        lines.push(`${chalk.green('✓')} ${name}${reasons ? chalk.dim(` (${reasons})`) : ''}`);
    }
    for (const name of report.errored) {
        lines.push(`${chalk.red('✗')} ${name}: ${report.errors[name] ?? 'failed'}`);
    }
    for (const name of report.upstreamFailed) {
        lines.push(`${chalk.yellow('↳')} ${name}: upstream failed`);
    }
    for (const name of report.cancelled) {
        lines.push(`${chalk.yellow('○')} ${name}: cancelled`);
    }
    for (const [name, warnings] of Object.entries(report.warnings)) {
        for (const warning of warnings) {
            lines.push(`${chalk.yellow('!')} ${name}: ${warning}`);
        }
    }

    const counts: string[] = [
        `${report.completed.length} completed`,
        `${report.skipped.length} skipped`,
        `${report.errored.length} errored`,
    ];
    if (report.upstreamFailed.length > 0) counts.push(`${report.upstreamFailed.length} upstream failed`);
    if (report.cancelled.length > 0) counts.push(`${report.cancelled.length} cancelled`);
    lines.push(`${counts.join(', ')} in ${report.seconds.toFixed(2)}s`);
    return lines;
}

/** Outdated targets in pipeline order with their reasons. */
export function outdated_format(order: string[], invalidation: Invalidation): string[] {
    const lines: string[] = order
        .filter((name: string) => invalidation.outdated.has(name))
        .map((name: string) => `${name}: ${(invalidation.reasons.get(name) ?? []).join(', ')}`);
    return lines.length > 0 ? lines : ['Everything is up to date.'];
}

// ─── Commands ──────────────────────────────────────────────────────────────

function settings_collect(args: ParsedArgs, service: SettingsService): void {
    for (const [flag, key] of SETTING_FLAGS) {
        const raw: string | undefined = args.values.get(flag);
        if (raw === undefined) continue;
        const result = service.set(key, raw);
        if (!result.ok) throw new UsageError(`${result.error} (--${flag})`);
    }
    if (args.flags.has('no-workspace')) service.set('workspaceOnError', false);
}

function positional_require(args: ParsedArgs, what: string): string {
    const value: string | undefined = args.positionals[0];
    if (value === undefined) throw new UsageError(`cairn ${args.command} needs a ${what}`);
    return value;
}

async function command_dispatch(args: ParsedArgs, pipeline: Pipeline, io: CliIO): Promise<number> {
    switch (args.command) {
        case 'run': {
            const options: RunOptions = args.positionals.length > 0 ? { names: args.positionals } : {};
            const report: RunReport = await pipeline.run(options);
            report_format(report).forEach(io.out);
            return report.ok ? 0 : 1;
        }
        case 'outdated': {
            const invalidation: Invalidation = await pipeline.outdated();
            outdated_format(pipeline.inspectGraph().order, invalidation).forEach(io.out);
            return 0;
        }
        case 'graph': {
            const summaries = pipeline.manifest();
            if (args.flags.has('json')) {
                io.out(JSON.stringify(summaries, null, 2));
                return 0;
            }
            for (const summary of summaries) {
                const deps: string = summary.dependencies.length > 0
                    ? ` <- ${summary.dependencies.join(', ')}`
                    : '';
                io.out(`${chalk.bold(summary.name)} ${chalk.dim(`[${summary.variant}]`)}${deps}`);
            }
            return 0;
        }
        case 'read': {
            const value = await pipeline.readResult(positional_require(args, 'target name'));
            io.out(JSON.stringify(value, null, 2));
            return 0;
        }
        case 'meta': {
            const fields: RecordField[] = args.positionals.map(field_check);
            const records: Array<Partial<FingerprintRecord>> = fields.length > 0
                ? await pipeline.metadata(fields)
                : await pipeline.metadata();
            io.out(JSON.stringify(records, null, 2));
            return 0;
        }
        case 'reset':
            await pipeline.reset();
            io.out('Store reset.');
            return 0;
        case 'workspaces': {
            const names: string[] = await pipeline.workspaces();
            (names.length > 0 ? names : ['No workspaces.']).forEach(io.out);
            return 0;
        }
        case 'purge-workspaces': {
            const count: number = await pipeline.purgeWorkspaces();
            io.out(`Removed ${count} workspace${count === 1 ? '' : 's'}.`);
            return 0;
        }
        case 'reproduce': {
            const result = await pipeline.reproduce(positional_require(args, 'target name'));
            if (result.ok) {
                io.out(`${chalk.green('✓')} did not fail: ${JSON.stringify(result.value)}`);
                return 0;
            }
            io.out(`${chalk.red('✗')} ${result.error.target}: ${result.error.message}`);
            return 1;
        }
        case 'help':
            io.out(USAGE);
            return 0;
    }
}

const RECORD_FIELDS: RecordField[] = [
    'name',
    'variant',
    'format',
    'inputDigest',
    'commandDigest',
    'packages',
    'documentDigest',
    'dependencies',
    'outputDigest',
    'files',
    'timestamp',
    'seconds',
    'seed',
    'status',
    'error',
    'warnings',
];

function field_check(name: string): RecordField {
    const field: RecordField | undefined = RECORD_FIELDS.find((f: RecordField) => f === name);
    if (!field) throw new UsageError(`Unknown record field '${name}'`);
    return field;
}

// ─── Main ──────────────────────────────────────────────────────────────────

/** Run one CLI invocation. Returns the process exit code. */
export async function cli_main(argv: string[], io: CliIO): Promise<number> {
    try {
        const args: ParsedArgs = argv_parse(argv);
        if (args.command === 'help' || args.flags.has('help')) {
            io.out(USAGE);
            return 0;
        }

        const file: string = resolve(io.cwd, args.values.get('file') ?? DEFAULT_PIPELINE_FILE);
        const root: string = resolve(file, '..');
        const service: SettingsService = await SettingsService.load(root, {}, io.env);
        settings_collect(args, service);
        const settings: CairnSettings = service.snapshot();
        logLevel_set(settings.logLevel);

        const pipeline: Pipeline = await Pipeline.fromFile(file, {
            root,
            storeDir: settings.storeDir,
            trustTimestamps: settings.trustTimestamps,
            run: service.runOptions(),
        });
        return await command_dispatch(args, pipeline, io);
    } catch (error: unknown) {
        if (error instanceof UsageError) {
            io.err(chalk.red(`error: ${error.message}`));
            io.err(`Run 'cairn help' for usage.`);
            return 2;
        }
        if (error instanceof CairnError) {
            io.err(chalk.red(`error: ${error.message}`));
            return 1;
        }
        throw error;
    }
}

function entrypoint_is(): boolean {
    const script: string | undefined = process.argv[1];
    if (!script) return false;
    try {
        return import.meta.url === pathToFileURL(realpathSync(script)).href;
    } catch {
        return false;
    }
}

if (entrypoint_is()) {
    cli_main(process.argv.slice(2), {
        cwd: process.cwd(),
        env: process.env,
        out: (line: string) => console.log(line),
        err: (line: string) => console.error(line),
    })
        .then((code: number) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            const message: string = error instanceof Error ? error.message : String(error);
            console.error(chalk.red(`Fatal error: ${message}`));
            process.exitCode = 1;
        });
}

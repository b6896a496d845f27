/**
 * @file Pipeline Facade Tests
 *
 * End-to-end behaviour through the front-end API: incremental reruns,
 * failure handling, file self-healing, literate documents, workspaces
 * and store maintenance.
 *
 * @module dag/bridge
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, access } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { Pipeline } from './Pipeline.js';
import type { PipelineOptions } from './Pipeline.js';
import { SpecError } from '../errors.js';
import { BUNDLED_CAPABILITIES, std } from '../capabilities/builtin.js';
import type { Capability } from '../capabilities/types.js';
import type { PipelineSpec, TargetDefinition } from '../graph/types.js';
import { MemoryBackend } from '../store/backend/memory.js';
import { logHandler_set } from '../../logging/logger.js';
import type { LogEntry, LogHandler } from '../../logging/logger.js';

// ═══════════════════════════════════════════════════════════════════
// Fixtures
// ═══════════════════════════════════════════════════════════════════

function spec_create(targets: TargetDefinition[], packages: string[] = []): PipelineSpec {
    return { name: 'test', packages, targets };
}

const CHAIN: TargetDefinition[] = [
    { name: 'a', command: '1' },
    { name: 'b', command: 'a + 1' },
    { name: 'c', command: 'b * 2' },
];

async function exists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

describe('dag/bridge/Pipeline', () => {
    let root: string;
    let entries: LogEntry[];
    let previousHandler: LogHandler;

    const open = (targets: TargetDefinition[], options: Partial<PipelineOptions> = {}): Promise<Pipeline> =>
        Pipeline.open(spec_create(targets), { root, ...options });

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'cairn-pipeline-'));
        entries = [];
        previousHandler = logHandler_set((entry: LogEntry) => { entries.push(entry); });
    });

    afterEach(async () => {
        logHandler_set(previousHandler);
        await rm(root, { recursive: true, force: true });
    });

    // ─── Incremental Runs ───────────────────────────────────────

    describe('incremental runs', () => {
        it('should run a chain, rerun it after an upstream edit, then do nothing', async () => {
            const pipeline = await open(CHAIN);

            const first = await pipeline.run();
            expect(first.completed).toEqual(['a', 'b', 'c']);
            expect(await pipeline.readResult('c')).toBe(4);

            const reloaded = await pipeline.reload(spec_create([{ name: 'a', command: '10' }, CHAIN[1], CHAIN[2]]));
            expect(reloaded.ok).toBe(true);

            const second = await pipeline.run();
            expect(second.completed).toEqual(['a', 'b', 'c']);
            expect(await pipeline.readResult('a')).toBe(10);
            expect(await pipeline.readResult('b')).toBe(11);
            expect(await pipeline.readResult('c')).toBe(22);

            const third = await pipeline.run();
            expect(third.completed).toEqual([]);
            expect(third.skipped).toEqual(['a', 'b', 'c']);
            expect(third.ok).toBe(true);
        });

        it('should rerun only the edited target and its descendants', async () => {
            const pipeline = await open([...CHAIN, { name: 'd', command: 'a * 100' }]);
            await pipeline.run();

            await pipeline.reload(spec_create([CHAIN[0], { name: 'b', command: 'a + 5' }, CHAIN[2], { name: 'd', command: 'a * 100' }]));
            const report = await pipeline.run();
            expect(report.completed).toEqual(['b', 'c']);
            expect(report.skipped).toEqual(['a', 'd']);
            expect(report.reasons).toEqual({ b: ['command_changed'], c: ['upstream_outdated'] });
        });

        it('should survive reopening the pipeline from the same store', async () => {
            await (await open(CHAIN)).run();
            const reopened = await open(CHAIN);
            const report = await reopened.run();
            expect(report.completed).toEqual([]);
            expect(await reopened.readResult('c')).toBe(4);
        });

        it('should run only the named targets and their ancestors', async () => {
            const pipeline = await open(CHAIN);
            const report = await pipeline.run({ names: ['b'] });
            expect(report.completed).toEqual(['a', 'b']);
            expect((await pipeline.outdated()).outdated).toEqual(new Set(['c']));
        });

        it('should reject unknown names in a run selection', async () => {
            const pipeline = await open(CHAIN);
            await expect(pipeline.run({ names: ['zzz'] })).rejects.toThrow("Unknown target 'zzz'");
        });

        it('should rebuild invalidated targets', async () => {
            const pipeline = await open(CHAIN);
            await pipeline.run();
            await pipeline.invalidate(['b']);
            const report = await pipeline.run();
            expect(report.completed).toEqual(['b', 'c']);
            expect(report.reasons.b).toEqual(['missing_record']);
        });

        it('should give each target a stable seeded random stream', async () => {
            const pipeline = await open([{ name: 'r', command: 'random()' }]);
            await pipeline.run();
            const first = await pipeline.readResult('r');
            await pipeline.reset();
            await pipeline.run();
            expect(await pipeline.readResult('r')).toBe(first);
            expect(typeof first).toBe('number');
        });

        it('should rerun random targets when the pipeline seed changes', async () => {
            const pipeline = await open([{ name: 'r', command: 'random()' }]);
            await pipeline.run({ seed: 1 });
            const first = await pipeline.readResult('r');
            expect((await pipeline.run({ seed: 1 })).completed).toEqual([]);

            const reseeded = await pipeline.run({ seed: 2 });
            expect(reseeded.completed).toEqual(['r']);
            expect(reseeded.reasons.r).toEqual(['seed_changed']);
            expect(await pipeline.readResult('r')).not.toBe(first);
            expect(Array.from((await pipeline.outdated(2)).outdated)).toEqual([]);
            expect(Array.from((await pipeline.outdated(1)).outdated)).toEqual(['r']);
        });

        it('should rerun targets whose capability version changed', async () => {
            const targets: TargetDefinition[] = [
                { name: 'n', command: 'std.sum([1, 2, 3])', packages: ['std'] },
                { name: 'm', command: '1' },
            ];
            await (await open(targets)).run();

            const bumped: Capability = { ...std, version: '2.0.0' };
            const upgraded = await open(targets, {
                capabilities: BUNDLED_CAPABILITIES.map(c => (c.name === 'std' ? bumped : c)),
            });
            const report = await upgraded.run();
            expect(report.completed).toEqual(['n']);
            expect(report.reasons.n).toEqual(['capability_changed']);
        });
    });

    // ─── Failures ───────────────────────────────────────────────

    describe('failures', () => {
        const BRANCHES: TargetDefinition[] = [
            { name: 'a', command: '1' },
            { name: 'bad', command: 'fail("boom")' },
            { name: 'child', command: 'bad + 1' },
            { name: 'sibling', command: 'a + 1' },
        ];

        it('should complete independent siblings when a target fails', async () => {
            const pipeline = await open(BRANCHES);
            const report = await pipeline.run();

            expect(report.ok).toBe(false);
            expect(report.completed).toEqual(['a', 'sibling']);
            expect(report.errored).toEqual(['bad']);
            expect(report.errors).toEqual({ bad: 'boom' });
            expect(report.upstreamFailed).toEqual(['child']);
            expect(await pipeline.readResult('sibling')).toBe(2);

            const statuses = await pipeline.metadata(['name', 'status', 'error']);
            expect(statuses).toEqual([
                { name: 'a', status: 'ok', error: null },
                { name: 'bad', status: 'error', error: 'boom' },
                { name: 'child', status: 'upstream_failed', error: "upstream target 'bad' failed" },
                { name: 'sibling', status: 'ok', error: null },
            ]);
        });

        it('should retry failed targets on the next run', async () => {
            const pipeline = await open(BRANCHES);
            await pipeline.run();
            const again = await pipeline.run();
            expect(again.completed).toEqual([]);
            expect(again.errored).toEqual(['bad']);
            expect(again.upstreamFailed).toEqual(['child']);
            expect(again.skipped).toEqual(['a', 'sibling']);
        });

        it('should stop scheduling after the first failure in stop mode', async () => {
            const pipeline = await open(BRANCHES);
            const report = await pipeline.run({ errorMode: 'stop' });
            expect(report.completed).toEqual(['a']);
            expect(report.errored).toEqual(['bad']);
            expect(report.upstreamFailed).toEqual(['child']);
            expect(report.cancelled).toEqual(['sibling']);

            const [sibling] = await pipeline.metadata(['status']).then(list => list.slice(3));
            expect(sibling).toEqual({ status: 'cancelled' });
        });

        it('should refuse to read the result of a failed target', async () => {
            const pipeline = await open(BRANCHES);
            await pipeline.run();
            await expect(pipeline.readResult('bad')).rejects.toThrow("Target 'bad' has no result (last status: error)");
            await expect(pipeline.readResult('nope')).rejects.toThrow("Unknown target 'nope'");
        });

        it('should record the warnings a target raised', async () => {
            const pipeline = await open([{ name: 'w', command: 'warn("thin data", 5)' }]);
            const report = await pipeline.run();
            expect(report.warnings).toEqual({ w: ['thin data'] });
            const [record] = await pipeline.metadata(['warnings']);
            expect(record).toEqual({ warnings: ['thin data'] });
        });

        it('should fail a target whose value has no canonical form', async () => {
            const odd: Capability = {
                name: 'odd',
                version: '1',
                functions: { table: () => new Map([['k', 1]]) },
            };
            const pipeline = await open(
                [{ name: 'x', command: 'odd.table()', packages: ['odd'] }, { name: 'y', command: 'x' }],
                { capabilities: [odd] },
            );
            const report = await pipeline.run();
            expect(report.errors).toEqual({ x: '$: Map instances cannot be serialized' });
            expect(report.upstreamFailed).toEqual(['y']);
        });
    });

    // ─── Workspaces ─────────────────────────────────────────────

    describe('workspaces', () => {
        const FAILING: TargetDefinition[] = [
            { name: 'xs', command: '[]' },
            { name: 'avg', command: 'std.mean(xs)', packages: ['std'] },
        ];

        it('should capture and reproduce a failure outside the scheduler', async () => {
            const pipeline = await open(FAILING);
            const report = await pipeline.run();
            expect(report.errors).toEqual({ avg: 'std.mean of an empty list' });

            const scope: Record<string, unknown> = {};
            const snapshot = await pipeline.openWorkspace('avg', scope);
            expect(snapshot.bindings).toEqual({ xs: [] });
            expect(snapshot.capabilities).toEqual({ std: '1.0.0' });
            expect(snapshot.command).toBe('std.mean(xs)');
            expect(scope).toEqual({ xs: [] });

            const reproduction = await pipeline.reproduce('avg');
            expect(reproduction.ok).toBe(false);
            if (!reproduction.ok) {
                expect(reproduction.error.message).toBe('std.mean of an empty list');
            }
        });

        it('should keep workspaces across reset until purged', async () => {
            const pipeline = await open(FAILING);
            await pipeline.run();
            await pipeline.reset();
            expect(await pipeline.workspaces()).toEqual(['avg']);
            expect(await pipeline.purgeWorkspaces()).toBe(1);
            expect(await pipeline.workspaces()).toEqual([]);
            await expect(pipeline.openWorkspace('avg')).rejects.toThrow("No workspace for 'avg'");
        });

        it('should omit bindings that cannot be produced and warn', async () => {
            const pipeline = await open(FAILING);
            await pipeline.run();
            await rm(join(root, '_cairn', 'objects', 'xs.json'));

            const report = await pipeline.run();
            expect(report.skipped).toEqual(['xs']);
            expect(report.errored).toEqual(['avg']);

            const snapshot = await pipeline.openWorkspace('avg');
            expect(snapshot.bindings).toEqual({});
            expect(snapshot.omitted).toEqual(['xs']);
            expect(entries.filter(entry => entry.context.code === 'CAPTURE_WARNING')).toMatchObject([
                { level: 'warn', message: "workspace for 'avg' omits 'xs': stored value of 'xs' is missing" },
            ]);
            const [, avg] = await pipeline.metadata(['status']);
            expect(avg).toEqual({ status: 'error' });
        });

        it('should bind only what a document loads', async () => {
            await writeFile(join(root, 'notes.md'), '```cairn\nload("xs")\n```\n\n```cairn\nstd.mean(xs) + ghost\n```\n');
            const pipeline = await open([FAILING[0], { name: 'notes', document: 'notes.md', packages: ['std'] }]);
            const report = await pipeline.run();
            expect(report.errors).toEqual({ notes: "fragment 2 of 'notes.md' failed: std.mean of an empty list" });

            const snapshot = await pipeline.openWorkspace('notes');
            expect(snapshot.bindings).toEqual({ xs: [] });
            expect(snapshot.omitted).toEqual([]);
            expect(entries.some(entry => entry.context.code === 'CAPTURE_WARNING')).toBe(false);
        });

        it('should not capture when capture is disabled', async () => {
            const pipeline = await open(FAILING);
            await pipeline.run({ workspaceOnError: false });
            expect(await pipeline.workspaces()).toEqual([]);
        });
    });

    // ─── File Targets ───────────────────────────────────────────

    describe('file targets', () => {
        const FILES: TargetDefinition[] = [
            { name: 'b', command: '2' },
            { name: 'out', format: 'file', packages: ['fsio'], command: 'fsio.writeText("out.txt", b)' },
        ];

        it('should regenerate a deleted output and nothing else', async () => {
            const pipeline = await open(FILES);
            await pipeline.run();
            expect(await readFile(join(root, 'out.txt'), 'utf-8')).toBe('2');

            await rm(join(root, 'out.txt'));
            const report = await pipeline.run();
            expect(report.completed).toEqual(['out']);
            expect(report.reasons.out).toEqual(['artifact_changed']);
            expect(await readFile(join(root, 'out.txt'), 'utf-8')).toBe('2');
        });

        it('should regenerate an output edited by hand', async () => {
            const pipeline = await open(FILES);
            await pipeline.run();
            await writeFile(join(root, 'out.txt'), 'tampered');
            const report = await pipeline.run();
            expect(report.completed).toEqual(['out']);
            expect(await readFile(join(root, 'out.txt'), 'utf-8')).toBe('2');
        });

        it('should expose the produced path as the result', async () => {
            const pipeline = await open(FILES);
            await pipeline.run();
            expect(await pipeline.readResult('out')).toBe('out.txt');
        });

        it('should fail a file target that returns no path', async () => {
            const pipeline = await open([{ name: 'f', format: 'file', command: '42' }]);
            const report = await pipeline.run();
            expect(report.errors).toEqual({
                f: "Target 'f' must return a file path or a list of file paths, got number",
            });
        });

        it('should refuse a path another target already owns', async () => {
            const pipeline = await open([
                { name: 'f', format: 'file', packages: ['fsio'], command: 'fsio.writeText("out.txt", "one")' },
                { name: 'g', format: 'file', packages: ['fsio'], command: 'fsio.writeText("out.txt", "two")' },
            ]);
            const report = await pipeline.run();
            expect(report.completed).toEqual(['f']);
            expect(report.errors).toEqual({ g: "Target 'g' returned 'out.txt', which target 'f' already owns" });
            expect(await pipeline.metadata(['name', 'status', 'files']).then(rows => rows.map(r => [r.name, r.status, r.files?.length])))
                .toEqual([['f', 'ok', 1], ['g', 'error', 0]]);
        });

        it('should delete tracked files on reset', async () => {
            const pipeline = await open(FILES);
            await pipeline.run();
            await pipeline.reset();
            expect(await exists(join(root, 'out.txt'))).toBe(false);
            expect(await pipeline.metadata()).toEqual([]);
        });
    });

    // ─── Literate Documents ─────────────────────────────────────

    describe('literate documents', () => {
        const DOC = '# Summary\n\n```cairn\nload("c")\n```\n\nTwice: \n\n```cairn\nc * 2\n```\n';

        it('should render a report and rerun it only when its inputs change', async () => {
            await writeFile(join(root, 'report.md'), DOC);
            const targets: TargetDefinition[] = [...CHAIN, { name: 'report', document: 'report.md' }];
            const pipeline = await open(targets);

            const first = await pipeline.run();
            expect(first.completed).toEqual(['a', 'b', 'c', 'report']);
            expect(pipeline.inspectGraph().upstream.get('report')).toEqual(['c']);
            expect(await readFile(join(root, 'report.rendered.md'), 'utf-8')).toBe(
                '# Summary\n\n```text\n4\n```\n\nTwice: \n\n```text\n8\n```\n',
            );
            expect(await pipeline.readResult('report')).toBe('report.rendered.md');

            expect((await pipeline.run()).completed).toEqual([]);

            await writeFile(join(root, 'report.md'), DOC.replace('c * 2', 'c * 3'));
            const edited = await pipeline.run();
            expect(edited.completed).toEqual(['report']);
            expect(edited.reasons.report).toEqual(['document_changed']);
        });

        it('should rerender a deleted report without rerunning its inputs', async () => {
            await writeFile(join(root, 'report.md'), DOC);
            const pipeline = await open([...CHAIN, { name: 'report', document: 'report.md' }]);
            await pipeline.run();

            await rm(join(root, 'report.rendered.md'));
            const report = await pipeline.run();
            expect(report.completed).toEqual(['report']);
            expect(report.skipped).toEqual(['a', 'b', 'c']);
            expect(report.reasons.report).toEqual(['artifact_changed']);
            expect(await exists(join(root, 'report.rendered.md'))).toBe(true);
        });

        it('should record a RenderError when a fragment fails', async () => {
            await writeFile(join(root, 'bad.md'), '```cairn\nfail("no data")\n```\n');
            const pipeline = await open([{ name: 'doc', document: 'bad.md' }]);
            const report = await pipeline.run();
            expect(report.errors).toEqual({ doc: "fragment 1 of 'bad.md' failed: no data" });

            const reproduction = await pipeline.reproduce('doc');
            expect(reproduction.ok).toBe(false);
            if (!reproduction.ok) {
                expect(reproduction.error.message).toBe("fragment 1 of 'bad.md' failed: no data");
            }
        });
    });

    // ─── Store Maintenance ──────────────────────────────────────

    describe('store maintenance', () => {
        it('should bind a result into a scope', async () => {
            const pipeline = await open(CHAIN);
            await pipeline.run();
            const scope = await pipeline.loadResult('b', { existing: true });
            expect(scope).toEqual({ existing: true, b: 2 });
        });

        it('should project metadata fields', async () => {
            const pipeline = await open(CHAIN);
            await pipeline.run();
            const rows = await pipeline.metadata(['name', 'variant', 'dependencies']);
            expect(rows.map(row => row.name)).toEqual(['a', 'b', 'c']);
            expect(rows[0]).toEqual({ name: 'a', variant: 'code', dependencies: {} });
            expect(Object.keys(rows[2].dependencies ?? {})).toEqual(['b']);
        });

        it('should prune records of removed targets', async () => {
            const pipeline = await open(CHAIN);
            await pipeline.run();
            await pipeline.reload(spec_create(CHAIN.slice(0, 2)));
            expect(await pipeline.prune()).toEqual(['c']);
            expect((await pipeline.metadata(['name'])).map(row => row.name)).toEqual(['a', 'b']);
        });

        it('should list targets with their dependencies', async () => {
            const pipeline = await open(CHAIN);
            expect(pipeline.manifest().map(t => [t.name, t.dependencies])).toEqual([
                ['a', []],
                ['b', ['a']],
                ['c', ['b']],
            ]);
        });

        it('should keep everything in memory with the memory backend', async () => {
            const backend = new MemoryBackend();
            const pipeline = await open(CHAIN, { backend });
            await pipeline.run();
            expect(await backend.children_list('_cairn/meta')).toEqual(['a.json', 'b.json', 'c.json']);
            expect(await exists(join(root, '_cairn'))).toBe(false);
        });
    });

    // ─── Loading ────────────────────────────────────────────────

    describe('loading', () => {
        it('should refuse a cyclic pipeline', async () => {
            const attempt = open([
                { name: 'a', command: 'b + 1' },
                { name: 'b', command: 'a + 1' },
            ]);
            await expect(attempt).rejects.toBeInstanceOf(SpecError);
        });

        it('should keep the previous pipeline when a reload fails', async () => {
            const pipeline = await open(CHAIN);
            const result = await pipeline.reload(spec_create([...CHAIN, { name: 'a', command: '2' }]));
            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('DuplicateName');
            expect(pipeline.manifest().map(t => t.name)).toEqual(['a', 'b', 'c']);
        });

        it('should open a YAML pipeline file relative to its directory', async () => {
            await writeFile(join(root, 'pipeline.yaml'), [
                'name: from-file',
                'targets:',
                '  - name: a',
                '    command: "20"',
                '  - name: b',
                '    command: "a / 4"',
            ].join('\n'));
            const pipeline = await Pipeline.fromFile(join(root, 'pipeline.yaml'));
            expect(pipeline.name).toBe('from-file');
            await pipeline.run();
            expect(await pipeline.readResult('b')).toBe(5);
            expect(await exists(join(root, '_cairn', 'meta', 'b.json'))).toBe(true);
        });
    });

    // ─── Concurrency ────────────────────────────────────────────

    describe('concurrency', () => {
        it('should run independent targets up to the worker limit', async () => {
            let active = 0;
            let peak = 0;
            const slow: Capability = {
                name: 'slow',
                version: '1',
                functions: {
                    value: async (_context, value) => {
                        active++;
                        peak = Math.max(peak, active);
                        await new Promise(resolve => setTimeout(resolve, 20));
                        active--;
                        return value;
                    },
                },
            };
            const targets: TargetDefinition[] = ['p', 'q', 'r', 's'].map((name: string, i: number) => ({
                name,
                command: `slow.value(${i})`,
                packages: ['slow'],
            }));
            const pipeline = await open([...targets, { name: 'total', command: 'p + q + r + s' }], {
                capabilities: [slow],
            });

            const report = await pipeline.run({ workers: 2 });
            expect(peak).toBe(2);
            expect(report.completed).toHaveLength(5);
            expect(report.completed[4]).toBe('total');
            expect(await pipeline.readResult('total')).toBe(6);
        });
    });
});

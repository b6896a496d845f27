/**
 * @file Invalidation Engine Tests
 *
 * @module dag/invalidation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { outdated_compute } from './outdated.js';
import { target_digests } from './digests.js';
import { CapabilityRegistry } from '../capabilities/registry.js';
import { FileTracker } from '../files/tracker.js';
import { TargetRegistry } from '../graph/registry.js';
import type { Graph, PipelineSpec, TargetDefinition } from '../graph/types.js';
import type { FileArtifact, FingerprintRecord } from '../fingerprint/types.js';
import { BUNDLED_CAPABILITIES } from '../capabilities/builtin.js';
import { DEFAULT_PIPELINE_SEED, seed_derive } from '../execution/random.js';

// ═══════════════════════════════════════════════════════════════════
// Fixtures
// ═══════════════════════════════════════════════════════════════════

const CHAIN: TargetDefinition[] = [
    { name: 'a', command: '1' },
    { name: 'b', command: 'a + 1' },
    { name: 'c', command: 'b * 2' },
];

async function graph_load(targets: TargetDefinition[], capabilities: CapabilityRegistry, root: string): Promise<Graph> {
    const registry = new TargetRegistry({ root, capabilities });
    const spec: PipelineSpec = { name: 'test', packages: [], targets };
    const result = await registry.load(spec);
    if (!result.ok) throw result.error;
    const graph: Graph | null = registry.graph;
    if (!graph) throw new Error('graph missing after load');
    return graph;
}

/** Records describing a completed, consistent run of every target. */
function records_fresh(
    graph: Graph,
    capabilities: CapabilityRegistry,
    files: Record<string, FileArtifact[]> = {},
): Map<string, FingerprintRecord> {
    const records: Map<string, FingerprintRecord> = new Map();
    for (const name of graph.order) {
        const target = graph.nodes.get(name);
        if (!target) continue;
        const digests = target_digests(target, capabilities);
        const dependencies: Record<string, string> = {};
        for (const dep of graph.upstream.get(name) ?? []) {
            dependencies[dep] = `out-${dep}`;
        }
        records.set(name, {
            name,
            variant: target.variant,
            format: target.format,
            inputDigest: `in-${name}`,
            commandDigest: digests.commandDigest,
            packages: digests.packages,
            documentDigest: digests.documentDigest,
            dependencies,
            outputDigest: `out-${name}`,
            files: files[name] ?? [],
            timestamp: '2026-01-01T00:00:00.000Z',
            seconds: 0,
            seed: seed_derive(DEFAULT_PIPELINE_SEED, name),
            status: 'ok',
            error: null,
            warnings: [],
        });
    }
    return records;
}

function record_patch(
    records: Map<string, FingerprintRecord>,
    name: string,
    patch: Partial<FingerprintRecord>,
): void {
    const record = records.get(name);
    if (!record) throw new Error(`no record for ${name}`);
    records.set(name, { ...record, ...patch });
}

// ═══════════════════════════════════════════════════════════════════
// Tests
// ═══════════════════════════════════════════════════════════════════

describe('dag/invalidation/outdated', () => {
    let root: string;
    let capabilities: CapabilityRegistry;
    let tracker: FileTracker;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'cairn-outdated-'));
        capabilities = new CapabilityRegistry(BUNDLED_CAPABILITIES);
        tracker = new FileTracker({ root });
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('should mark every target outdated when nothing has run', async () => {
        const graph = await graph_load(CHAIN, capabilities, root);
        const result = await outdated_compute(graph, new Map(), capabilities, tracker);
        expect(Array.from(result.outdated)).toEqual(['a', 'b', 'c']);
        expect(result.reasons.get('b')).toEqual(['missing_record']);
    });

    it('should mark nothing outdated after a consistent run', async () => {
        const graph = await graph_load(CHAIN, capabilities, root);
        const result = await outdated_compute(graph, records_fresh(graph, capabilities), capabilities, tracker);
        expect(result.outdated.size).toBe(0);
    });

    it('should invalidate exactly the changed target and its descendants', async () => {
        const before = await graph_load(CHAIN, capabilities, root);
        const records = records_fresh(before, capabilities);
        const after = await graph_load(
            [CHAIN[0], { name: 'b', command: 'a + 2' }, CHAIN[2]],
            capabilities,
            root,
        );
        const result = await outdated_compute(after, records, capabilities, tracker);
        expect(Array.from(result.outdated)).toEqual(['b', 'c']);
        expect(result.reasons.get('b')).toEqual(['command_changed']);
        expect(result.reasons.get('c')).toEqual(['upstream_outdated']);
    });

    it('should ignore formatting-only edits to a command', async () => {
        const before = await graph_load(CHAIN, capabilities, root);
        const records = records_fresh(before, capabilities);
        const after = await graph_load(
            [CHAIN[0], { name: 'b', command: 'a+1   # same' }, CHAIN[2]],
            capabilities,
            root,
        );
        const result = await outdated_compute(after, records, capabilities, tracker);
        expect(result.outdated.size).toBe(0);
    });

    it('should detect an upstream output that differs from the one last seen', async () => {
        const graph = await graph_load(CHAIN, capabilities, root);
        const records = records_fresh(graph, capabilities);
        record_patch(records, 'a', { outputDigest: 'out-a-v2' });
        const result = await outdated_compute(graph, records, capabilities, tracker);
        expect(Array.from(result.outdated)).toEqual(['b', 'c']);
        expect(result.reasons.get('b')).toEqual(['upstream_changed']);
    });

    it('should treat any non-ok record as outdated', async () => {
        const graph = await graph_load(CHAIN, capabilities, root);
        const records = records_fresh(graph, capabilities);
        record_patch(records, 'b', { status: 'error', error: 'boom', outputDigest: null });
        const result = await outdated_compute(graph, records, capabilities, tracker);
        expect(Array.from(result.outdated)).toEqual(['b', 'c']);
        expect(result.reasons.get('b')).toEqual(['previous_not_ok']);
    });

    it('should detect a changed dependency set', async () => {
        const graph = await graph_load(CHAIN, capabilities, root);
        const records = records_fresh(graph, capabilities);
        record_patch(records, 'b', { dependencies: { a: 'out-a', old: 'out-old' } });
        const result = await outdated_compute(graph, records, capabilities, tracker);
        expect(result.reasons.get('b')).toEqual(['dependencies_changed']);
    });

    it('should invalidate targets declaring a capability whose version changed', async () => {
        const targets: TargetDefinition[] = [
            { name: 'n', command: 'std.sum([1, 2])', packages: ['std'] },
            { name: 'm', command: '3' },
        ];
        const graph = await graph_load(targets, capabilities, root);
        const records = records_fresh(graph, capabilities);

        const bumped = new CapabilityRegistry(BUNDLED_CAPABILITIES);
        const std = bumped.get('std');
        if (!std) throw new Error('std missing');
        bumped.register({ ...std, version: '2.0.0' });

        const result = await outdated_compute(graph, records, bumped, tracker);
        expect(Array.from(result.outdated)).toEqual(['n']);
        expect(result.reasons.get('n')).toEqual(['capability_changed']);
    });

    it('should invalidate every target when the pipeline seed changes', async () => {
        const graph = await graph_load(CHAIN, capabilities, root);
        const records = records_fresh(graph, capabilities);
        expect((await outdated_compute(graph, records, capabilities, tracker, DEFAULT_PIPELINE_SEED)).outdated.size).toBe(0);

        const result = await outdated_compute(graph, records, capabilities, tracker, 42);
        expect(Array.from(result.outdated)).toEqual(['a', 'b', 'c']);
        expect(result.reasons.get('a')).toEqual(['seed_changed']);
        expect(result.reasons.get('b')).toEqual(['seed_changed', 'upstream_outdated']);
    });

    it('should honour cue modes', async () => {
        const targets: TargetDefinition[] = [
            { name: 'a', command: '1', cue: 'always' },
            { name: 'b', command: 'a + 1', cue: 'never' },
            { name: 'c', command: '5' },
        ];
        const graph = await graph_load(targets, capabilities, root);
        const records = records_fresh(graph, capabilities);
        const result = await outdated_compute(graph, records, capabilities, tracker);
        expect(Array.from(result.outdated)).toEqual(['a']);
        expect(result.reasons.get('a')).toEqual(['cue_always']);
    });

    it('should still run a never-cue target that has no record', async () => {
        const graph = await graph_load([{ name: 'a', command: '1', cue: 'never' }], capabilities, root);
        const result = await outdated_compute(graph, new Map(), capabilities, tracker);
        expect(result.reasons.get('a')).toEqual(['missing_record']);
    });

    describe('file targets', () => {
        const FILES: TargetDefinition[] = [
            { name: 'b', command: '2' },
            { name: 'out', format: 'file', packages: ['fsio'], command: 'fsio.writeText("out.txt", b)' },
            { name: 'after', command: 'read("out")' },
        ];

        it('should invalidate a file target whose file was deleted, plus its dependents', async () => {
            await writeFile(join(root, 'out.txt'), '2');
            const graph = await graph_load(FILES, capabilities, root);
            const artifacts = await tracker.materialize('out', 'out.txt');
            const records = records_fresh(graph, capabilities, { out: artifacts });

            expect((await outdated_compute(graph, records, capabilities, tracker)).outdated.size).toBe(0);

            await rm(join(root, 'out.txt'));
            const result = await outdated_compute(graph, records, capabilities, tracker);
            expect(Array.from(result.outdated)).toEqual(['out', 'after']);
            expect(result.reasons.get('out')).toEqual(['artifact_changed']);
        });

        it('should report refreshed artifacts when content is intact but rehashed', async () => {
            await writeFile(join(root, 'out.txt'), '2');
            const graph = await graph_load(FILES, capabilities, root);
            const artifacts = await tracker.materialize('out', 'out.txt');
            const stale: FileArtifact[] = artifacts.map(a => ({ ...a, hashedAt: a.mtime }));
            const records = records_fresh(graph, capabilities, { out: stale });

            const result = await outdated_compute(graph, records, capabilities, tracker);
            expect(result.outdated.size).toBe(0);
            expect(result.refreshed.get('out')?.[0].hash).toBe(artifacts[0].hash);
        });
    });
});

/**
 * @file Pipeline Facade
 *
 * Front-end API over the engine. A Pipeline owns one registry, one
 * metadata store and one capability set; every operation a user or the
 * CLI performs goes through it.
 *
 * Each `run()` reloads the pipeline first, so edits to literate
 * documents are seen without reopening.
 *
 * @module dag/bridge
 */

import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';

import { CairnError, SpecError, TargetError } from '../errors.js';
import { CapabilityRegistry } from '../capabilities/registry.js';
import { BUNDLED_CAPABILITIES } from '../capabilities/builtin.js';
import type { Capability } from '../capabilities/types.js';
import { DEFAULT_PIPELINE_SEED } from '../execution/random.js';
import { Scheduler } from '../execution/scheduler.js';
import type { RunOptions, RunReport } from '../execution/types.js';
import { FileTracker } from '../files/tracker.js';
import type { FingerprintRecord, JsonValue, TargetFormat, TargetVariant } from '../fingerprint/types.js';
import { pipeline_parse } from '../graph/parser/pipeline.js';
import { TargetRegistry } from '../graph/registry.js';
import type { DocumentReader } from '../graph/registry.js';
import type { CueMode, Graph, PipelineSpec, Result, Target } from '../graph/types.js';
import { outdated_compute } from '../invalidation/outdated.js';
import type { Invalidation } from '../invalidation/outdated.js';
import { MarkdownRenderer } from '../literate/renderer.js';
import type { DocumentRenderer } from '../literate/renderer.js';
import { MetadataStore } from '../store/MetadataStore.js';
import { NodeFsBackend } from '../store/backend/node.js';
import type { StorageBackend } from '../store/types.js';
import { workspace_reproduce } from '../workspace/capture.js';
import type { WorkspaceSnapshot } from '../workspace/types.js';
import { logger_create } from '../../logging/logger.js';
import type { Logger } from '../../logging/logger.js';

/** Store directory used when none is configured, relative to the root. */
export const DEFAULT_STORE_DIR = '_cairn';

/**
 * @property root - Directory documents, files and the store resolve against
 * @property storeDir - Store directory (default `_cairn`), relative to `root` on the default backend
 * @property backend - Storage backend for the store (default: the filesystem under `root`)
 * @property capabilities - Available capabilities (default: the bundled ones)
 * @property trustTimestamps - Reuse file hashes when size and mtime match (default true)
 * @property run - Defaults merged under the options of every `run()`
 */
export interface PipelineOptions {
    root: string;
    storeDir?: string;
    backend?: StorageBackend;
    capabilities?: Capability[];
    renderer?: DocumentRenderer;
    documentRead?: DocumentReader;
    trustTimestamps?: boolean;
    run?: RunOptions;
}

/** One line of `manifest()`. */
export interface TargetSummary {
    name: string;
    variant: TargetVariant;
    format: TargetFormat;
    packages: string[];
    cue: CueMode;
    dependencies: string[];
}

export type RecordField = keyof FingerprintRecord;

function field_copy<K extends RecordField>(
    into: Partial<FingerprintRecord>,
    from: FingerprintRecord,
    key: K,
): void {
    into[key] = from[key];
}

export class Pipeline {
    private readonly registry: TargetRegistry;
    private readonly capabilities: CapabilityRegistry;
    private readonly store: MetadataStore;
    private readonly tracker: FileTracker;
    private readonly renderer: DocumentRenderer;
    private readonly log: Logger;

    private constructor(
        private spec: PipelineSpec,
        private readonly options: PipelineOptions,
    ) {
        this.capabilities = new CapabilityRegistry(options.capabilities ?? BUNDLED_CAPABILITIES);
        this.registry = new TargetRegistry({
            root: options.root,
            capabilities: this.capabilities,
            documentRead: options.documentRead,
        });
        this.store = new MetadataStore(
            options.backend ?? new NodeFsBackend(options.root),
            options.storeDir ?? DEFAULT_STORE_DIR,
        );
        this.tracker = new FileTracker({ root: options.root, trustTimestamps: options.trustTimestamps });
        this.renderer = options.renderer ?? new MarkdownRenderer();
        this.log = logger_create({ component: 'pipeline', pipeline: spec.name });
    }

    /**
     * Open a pipeline from a spec.
     *
     * @throws SpecError when the spec cannot be loaded
     */
    public static async open(spec: PipelineSpec, options: PipelineOptions): Promise<Pipeline> {
        const pipeline = new Pipeline(spec, options);
        await pipeline.graph_refresh();
        return pipeline;
    }

    /**
     * Open a pipeline YAML file. The root defaults to the file's directory.
     *
     * @throws SpecError when the file is not a valid pipeline
     */
    public static async fromFile(file: string, options: Partial<PipelineOptions> = {}): Promise<Pipeline> {
        const absolute: string = resolve(file);
        const spec: PipelineSpec = pipeline_parse(await readFile(absolute, 'utf-8'));
        return Pipeline.open(spec, { ...options, root: options.root ?? dirname(absolute) });
    }

    public get name(): string {
        return this.spec.name;
    }

    /** Store directory as configured. */
    public get storeDir(): string {
        return this.store.root;
    }

    /**
     * Replace the pipeline spec. On failure the previous spec stays
     * installed and the error is returned.
     */
    public async reload(spec: PipelineSpec): Promise<Result<Set<Target>, SpecError>> {
        const result = await this.registry.load(spec);
        if (result.ok) this.spec = spec;
        return result;
    }

    // ─── Running ────────────────────────────────────────────────

    /** Bring the selection up to date. */
    public async run(options: RunOptions = {}): Promise<RunReport> {
        const merged: RunOptions = { ...this.options.run, ...options };
        const graph: Graph = await this.graph_refresh();
        const previous: Map<string, FingerprintRecord> = await this.store.records_read();
        const invalidation: Invalidation = await outdated_compute(
            graph,
            previous,
            this.capabilities,
            this.tracker,
            merged.seed ?? DEFAULT_PIPELINE_SEED,
        );
        const scheduler = new Scheduler({
            store: this.store,
            capabilities: this.capabilities,
            tracker: this.tracker,
            renderer: this.renderer,
            root: this.options.root,
        });
        return scheduler.run(graph, invalidation, previous, merged);
    }

    /** What the next run would execute, and why. `seed` defaults to the configured run seed. */
    public async outdated(seed?: number): Promise<Invalidation> {
        const graph: Graph = await this.graph_refresh();
        return outdated_compute(
            graph,
            await this.store.records_read(),
            this.capabilities,
            this.tracker,
            seed ?? this.options.run?.seed ?? DEFAULT_PIPELINE_SEED,
        );
    }

    // ─── Inspection ─────────────────────────────────────────────

    public inspectGraph(): Graph {
        return this.graph_current();
    }

    public manifest(): TargetSummary[] {
        const graph: Graph = this.graph_current();
        const summaries: TargetSummary[] = [];
        for (const name of graph.order) {
            const target: Target | undefined = graph.nodes.get(name);
            if (!target) continue;
            summaries.push({
                name,
                variant: target.variant,
                format: target.format,
                packages: [...target.packages],
                cue: target.cue,
                dependencies: [...(graph.upstream.get(name) ?? [])],
            });
        }
        return summaries;
    }

    /** Stored records, in pipeline order then by name; optionally only some fields. */
    public async metadata(): Promise<FingerprintRecord[]>;
    public async metadata(fields: RecordField[]): Promise<Array<Partial<FingerprintRecord>>>;
    public async metadata(fields?: RecordField[]): Promise<Array<Partial<FingerprintRecord>>> {
        const records: Map<string, FingerprintRecord> = await this.store.records_read();
        const order: string[] = this.graph_current().order;
        const names: string[] = [
            ...order.filter((name: string) => records.has(name)),
            ...Array.from(records.keys()).filter((name: string) => !order.includes(name)).sort(),
        ];
        const list: FingerprintRecord[] = [];
        for (const name of names) {
            const record = records.get(name);
            if (record) list.push(record);
        }
        if (!fields) return list;
        return list.map((record: FingerprintRecord) => {
            const picked: Partial<FingerprintRecord> = {};
            for (const field of fields) field_copy(picked, record, field);
            return picked;
        });
    }

    // ─── Results ────────────────────────────────────────────────

    /**
     * The stored value of a target. File and literate targets yield the
     * path(s) they produced.
     *
     * @throws CairnError when the target is unknown or has no successful result
     */
    public async readResult(name: string): Promise<JsonValue> {
        this.target_require(name);
        const record: FingerprintRecord | null = await this.store.record_read(name);
        if (!record) {
            throw new CairnError('RESULT_UNAVAILABLE', `Target '${name}' has not been run`);
        }
        if (record.status !== 'ok') {
            throw new CairnError('RESULT_UNAVAILABLE', `Target '${name}' has no result (last status: ${record.status})`);
        }
        if (!(await this.store.value_exists(name))) {
            throw new CairnError('RESULT_UNAVAILABLE', `Stored value of '${name}' is missing`);
        }
        return this.store.value_read(name);
    }

    /** Bind a target's value into `scope` under its name. */
    public async loadResult<S extends Record<string, unknown>>(
        name: string,
        scope: S,
    ): Promise<S & Record<string, JsonValue>> {
        const value: JsonValue = await this.readResult(name);
        return Object.assign(scope, { [name]: value });
    }

    // ─── Store Maintenance ──────────────────────────────────────

    /**
     * Forget every result: records, stored values and the files tracked
     * by file targets. Workspaces survive; see `purgeWorkspaces()`.
     */
    public async reset(): Promise<void> {
        const records: Map<string, FingerprintRecord> = await this.store.records_read();
        for (const record of records.values()) {
            await this.tracker.remove(record.files);
        }
        await this.store.clear();
        this.log.info('Store reset', { records: records.size });
    }

    /** Drop the records of the named targets so the next run rebuilds them. */
    public async invalidate(names: string[]): Promise<void> {
        names.forEach((name: string) => this.target_require(name));
        for (const name of names) {
            await this.store.record_remove(name);
        }
    }

    /** Drop records and values of targets no longer in the pipeline. */
    public async prune(): Promise<string[]> {
        const graph: Graph = this.graph_current();
        const pruned: string[] = [];
        for (const name of (await this.store.records_read()).keys()) {
            if (graph.nodes.has(name)) continue;
            await this.store.record_remove(name);
            await this.store.value_remove(name);
            pruned.push(name);
        }
        if (pruned.length > 0) this.log.info('Pruned stale records', { targets: pruned });
        return pruned;
    }

    // ─── Workspaces ─────────────────────────────────────────────

    public async workspaces(): Promise<string[]> {
        return this.store.workspaces_list();
    }

    /**
     * The workspace captured when `name` last failed. With `scope`, its
     * bindings are also copied into it.
     *
     * @throws CairnError when no workspace exists for `name`
     */
    public async openWorkspace(name: string, scope?: Record<string, unknown>): Promise<WorkspaceSnapshot> {
        const snapshot: WorkspaceSnapshot | null = await this.store.workspace_read(name);
        if (!snapshot) {
            throw new CairnError('WORKSPACE_MISSING', `No workspace for '${name}'`);
        }
        if (scope) Object.assign(scope, snapshot.bindings);
        return snapshot;
    }

    public async purgeWorkspaces(): Promise<number> {
        return this.store.workspaces_purge();
    }

    /** Re-evaluate a failed target from its workspace. */
    public async reproduce(name: string): Promise<Result<unknown, TargetError>> {
        const snapshot: WorkspaceSnapshot = await this.openWorkspace(name);
        return workspace_reproduce(snapshot, {
            capabilities: this.capabilities,
            root: this.options.root,
            renderer: this.renderer,
        });
    }

    // ─── Internals ──────────────────────────────────────────────

    private async graph_refresh(): Promise<Graph> {
        const result = await this.registry.load(this.spec);
        if (!result.ok) throw result.error;
        return this.graph_current();
    }

    private graph_current(): Graph {
        const graph: Graph | null = this.registry.graph;
        if (!graph) throw new CairnError('PIPELINE_NOT_LOADED', 'Pipeline has not been loaded');
        return graph;
    }

    private target_require(name: string): Target {
        const target: Target | null = this.registry.target_get(name);
        if (!target) throw new CairnError('UNKNOWN_TARGET', `Unknown target '${name}'`);
        return target;
    }
}

/**
 * @file Execution Scheduler
 *
 * Runs the outdated targets of a graph in dependency order, at most
 * `workers` at a time. A target starts only once every dependency has
 * either completed in this run or was already up to date. Each target's
 * value and record are committed after its command returns; a failure
 * is recorded and cascades `upstream_failed` to the target's
 * descendants while independent branches keep running.
 *
 * @module dag/execution
 */

import { ArtifactError, CairnError, errorMessage_extract } from '../errors.js';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { FileTracker } from '../files/tracker.js';
import { digest_text, filesDigest_compute, inputDigest_compute } from '../fingerprint/hasher.js';
import { value_deserialize } from '../fingerprint/serialize.js';
import type { FileArtifact, FingerprintRecord, TargetStatus } from '../fingerprint/types.js';
import { ancestors_collect, descendants_collect } from '../graph/topology.js';
import type { Graph, Target } from '../graph/types.js';
import { target_digests } from '../invalidation/digests.js';
import type { TargetDigests } from '../invalidation/digests.js';
import type { Invalidation } from '../invalidation/outdated.js';
import type { DocumentRenderer } from '../literate/renderer.js';
import type { MetadataStore } from '../store/MetadataStore.js';
import { workspace_capture } from '../workspace/capture.js';
import { DEFAULT_PIPELINE_SEED, seed_derive } from './random.js';
import { target_run } from './runner.js';
import type { Evaluation, TargetEnvironment } from './runner.js';
import type { RunOptions, RunReport } from './types.js';
import { logger_create } from '../../logging/logger.js';
import type { Logger } from '../../logging/logger.js';

export interface SchedulerOptions {
    store: MetadataStore;
    capabilities: CapabilityRegistry;
    tracker: FileTracker;
    renderer: DocumentRenderer;
    root: string;
}

/** State shared by every target of one run. */
interface RunState {
    graph: Graph;
    capabilities: CapabilityRegistry;
    records: Map<string, FingerprintRecord>;
    values: Map<string, unknown>;
    report: RunReport;
    pipelineSeed: number;
    capture: boolean;
}

function report_create(): RunReport {
    return {
        ok: true,
        completed: [],
        skipped: [],
        errored: [],
        upstreamFailed: [],
        cancelled: [],
        errors: {},
        warnings: {},
        reasons: {},
        seconds: 0,
    };
}

export class Scheduler {
    private readonly log: Logger;

    constructor(private readonly options: SchedulerOptions) {
        this.log = logger_create({ component: 'scheduler' });
    }

    /**
     * Run every outdated target of the selection.
     *
     * @param previous - Records as they stood before this run
     * @throws CairnError when `names` mentions a target not in the graph
     */
    async run(
        graph: Graph,
        invalidation: Invalidation,
        previous: Map<string, FingerprintRecord>,
        options: RunOptions = {},
    ): Promise<RunReport> {
        const startedAt: number = Date.now();
        const workers: number = Math.max(1, Math.floor(options.workers ?? 1));
        const errorMode = options.errorMode ?? 'continue';

        for (const name of options.names ?? []) {
            if (!graph.nodes.has(name)) throw new CairnError('UNKNOWN_TARGET', `Unknown target '${name}'`);
        }
        const selection: Set<string> = options.names
            ? ancestors_collect(graph, options.names)
            : new Set(graph.order);

        const state: RunState = {
            graph,
            capabilities: this.options.capabilities.snapshot(),
            records: new Map(previous),
            values: new Map(),
            report: report_create(),
            pipelineSeed: options.seed ?? DEFAULT_PIPELINE_SEED,
            capture: options.workspaceOnError ?? true,
        };
        const { report } = state;

        const selected: string[] = graph.order.filter((name: string) => selection.has(name));
        const planned: Set<string> = new Set(selected.filter((name: string) => invalidation.outdated.has(name)));
        for (const name of selected) {
            if (planned.has(name)) {
                report.reasons[name] = invalidation.reasons.get(name) ?? [];
            } else {
                report.skipped.push(name);
                await this.artifacts_refresh(name, invalidation.refreshed.get(name), state);
            }
        }
        this.log.info('Run started', { outdated: planned.size, upToDate: report.skipped.length, workers });

        const queue: string[] = selected.filter((name: string) => planned.has(name));
        const finished: Set<string> = new Set();
        const running: Map<string, Promise<void>> = new Map();
        let stopping = false;

        const ready = (name: string): boolean =>
            (graph.upstream.get(name) ?? []).every((dep: string) => !planned.has(dep) || finished.has(dep));

        const slot = async (name: string): Promise<void> => {
            const succeeded: boolean = await this.target_execute(name, state);
            running.delete(name);
            if (succeeded) {
                finished.add(name);
                return;
            }
            if (errorMode === 'stop') stopping = true;
            await this.failure_cascade(name, queue, state);
        };

        try {
            while (queue.length > 0 || running.size > 0) {
                if (!stopping) {
                    for (const name of [...queue]) {
                        if (running.size >= workers) break;
                        if (!ready(name)) continue;
                        queue.splice(queue.indexOf(name), 1);
                        running.set(name, slot(name));
                    }
                }
                if (running.size === 0) break;
                await Promise.race(running.values());
            }
        } catch (error: unknown) {
            await Promise.allSettled(running.values());
            throw error;
        }

        for (const name of queue) {
            await this.status_commit(name, 'cancelled', 'run stopped after an earlier failure', state);
            report.cancelled.push(name);
        }

        report.ok = report.errored.length === 0;
        report.seconds = (Date.now() - startedAt) / 1000;
        this.log.info('Run finished', {
            completed: report.completed.length,
            errored: report.errored.length,
            upstreamFailed: report.upstreamFailed.length,
            cancelled: report.cancelled.length,
            seconds: report.seconds,
        });
        return report;
    }

    // ─── Per Target ─────────────────────────────────────────────

    /** Run one target and commit its outcome. Resolves false when the target failed. */
    private async target_execute(name: string, state: RunState): Promise<boolean> {
        const target: Target | undefined = state.graph.nodes.get(name);
        if (!target) throw new CairnError('UNKNOWN_TARGET', `Unknown target '${name}'`);

        const seed: number = seed_derive(state.pipelineSeed, name);
        const digests: TargetDigests = target_digests(target, state.capabilities);
        const dependencies: Record<string, string> = this.dependencies_observe(name, state);
        const warnings: string[] = [];
        const environment: TargetEnvironment = {
            root: this.options.root,
            seed,
            capabilities: state.capabilities,
            tracker: this.options.tracker,
            renderer: this.options.renderer,
            retrieve: (dep: string) => this.value_retrieve(dep, state),
        };

        this.log.info('Running target', { target: name, reasons: state.report.reasons[name] ?? [] });
        const startedAt: number = Date.now();

        let evaluation: Evaluation;
        try {
            evaluation = await target_run(target, environment, warnings);
            this.ownership_check(name, evaluation.files, state);
        } catch (error: unknown) {
            const message: string = errorMessage_extract(error);
            const seconds: number = (Date.now() - startedAt) / 1000;
            this.log.error('Target failed', { target: name, error: message });

            if (state.capture) {
                const snapshot = await workspace_capture(
                    target,
                    { lookup: environment.retrieve, capabilities: digests.packages, seed, error: message },
                    this.log,
                );
                await this.options.store.workspace_write(snapshot);
            }
            await this.options.store.value_remove(name);
            await this.record_commit(
                this.record_build(target, digests, dependencies, seed, 'error', { seconds, error: message, warnings }),
                state,
            );
            state.report.errored.push(name);
            state.report.errors[name] = message;
            this.warnings_report(name, warnings, state);
            return false;
        }

        const seconds: number = (Date.now() - startedAt) / 1000;
        const outputDigest: string = target.format === 'file'
            ? filesDigest_compute(evaluation.files)
            : digest_text(evaluation.serialized);

        await this.options.store.value_write(name, evaluation.serialized);
        await this.record_commit(
            this.record_build(target, digests, dependencies, seed, 'ok', {
                seconds,
                warnings,
                outputDigest,
                files: evaluation.files,
            }),
            state,
        );
        state.values.set(name, value_deserialize(evaluation.serialized));
        state.report.completed.push(name);
        this.warnings_report(name, warnings, state);
        for (const warning of warnings) {
            this.log.warn(warning, { target: name });
        }
        this.log.info('Target completed', { target: name, seconds });
        return true;
    }

    /**
     * A tracked file belongs to exactly one target.
     *
     * @throws ArtifactError when another target's ok record already tracks one of the paths
     */
    private ownership_check(name: string, files: FileArtifact[], state: RunState): void {
        if (files.length === 0) return;
        const tracker: FileTracker = this.options.tracker;
        const owners: Map<string, string> = new Map();
        for (const [owner, record] of state.records) {
            if (owner === name || record.status !== 'ok' || !state.graph.nodes.has(owner)) continue;
            for (const artifact of record.files) {
                owners.set(tracker.path_resolve(artifact.path), owner);
            }
        }
        for (const artifact of files) {
            const owner: string | undefined = owners.get(tracker.path_resolve(artifact.path));
            if (owner !== undefined) {
                throw new ArtifactError(
                    name,
                    `Target '${name}' returned '${artifact.path}', which target '${owner}' already owns`,
                );
            }
        }
    }

    /** Mark every pending descendant of a failed target as `upstream_failed`. */
    private async failure_cascade(failed: string, queue: string[], state: RunState): Promise<void> {
        const affected: Set<string> = descendants_collect(state.graph, [failed]);
        for (const name of state.graph.order) {
            if (name === failed || !affected.has(name)) continue;
            const index: number = queue.indexOf(name);
            if (index < 0) continue;
            queue.splice(index, 1);
            await this.status_commit(name, 'upstream_failed', `upstream target '${failed}' failed`, state);
            state.report.upstreamFailed.push(name);
            this.log.warn('Target skipped after upstream failure', { target: name, upstream: failed });
        }
    }

    /** Record a target that was never run. */
    private async status_commit(
        name: string,
        status: TargetStatus,
        message: string,
        state: RunState,
    ): Promise<void> {
        const target: Target | undefined = state.graph.nodes.get(name);
        if (!target) return;
        await this.options.store.value_remove(name);
        await this.record_commit(
            this.record_build(
                target,
                target_digests(target, state.capabilities),
                this.dependencies_observe(name, state),
                seed_derive(state.pipelineSeed, name),
                status,
                { seconds: 0, error: message, warnings: [] },
            ),
            state,
        );
    }

    // ─── Helpers ────────────────────────────────────────────────

    /** Output digests of a target's dependencies as they stand now. */
    private dependencies_observe(name: string, state: RunState): Record<string, string> {
        const dependencies: Record<string, string> = {};
        for (const dep of state.graph.upstream.get(name) ?? []) {
            dependencies[dep] = state.records.get(dep)?.outputDigest ?? '';
        }
        return dependencies;
    }

    private async value_retrieve(name: string, state: RunState): Promise<unknown> {
        if (state.values.has(name)) return state.values.get(name);
        const record: FingerprintRecord | undefined = state.records.get(name);
        if (!record || record.status !== 'ok') {
            throw new CairnError('RESULT_UNAVAILABLE', `target '${name}' has no result`);
        }
        if (!(await this.options.store.value_exists(name))) {
            throw new CairnError('RESULT_UNAVAILABLE', `stored value of '${name}' is missing`);
        }
        const value: unknown = await this.options.store.value_read(name);
        state.values.set(name, value);
        return value;
    }

    private record_build(
        target: Target,
        digests: TargetDigests,
        dependencies: Record<string, string>,
        seed: number,
        status: TargetStatus,
        outcome: {
            seconds: number;
            warnings: string[];
            error?: string;
            outputDigest?: string;
            files?: FileArtifact[];
        },
    ): FingerprintRecord {
        return {
            name: target.name,
            variant: target.variant,
            format: target.format,
            inputDigest: inputDigest_compute({
                variant: target.variant,
                commandDigest: digests.commandDigest,
                packages: digests.packages,
                documentDigest: digests.documentDigest,
                seed,
                dependencies,
            }),
            commandDigest: digests.commandDigest,
            packages: digests.packages,
            documentDigest: digests.documentDigest,
            dependencies,
            outputDigest: status === 'ok' ? outcome.outputDigest ?? null : null,
            files: status === 'ok' ? outcome.files ?? [] : [],
            timestamp: new Date().toISOString(),
            seconds: outcome.seconds,
            seed,
            status,
            error: outcome.error ?? null,
            warnings: [...outcome.warnings],
        };
    }

    private async record_commit(record: FingerprintRecord, state: RunState): Promise<void> {
        await this.options.store.record_write(record);
        state.records.set(record.name, record);
    }

    /** Persist refreshed mtimes of an up-to-date file target. */
    private async artifacts_refresh(
        name: string,
        files: FileArtifact[] | undefined,
        state: RunState,
    ): Promise<void> {
        const record: FingerprintRecord | undefined = state.records.get(name);
        if (!files || !record) return;
        await this.record_commit({ ...record, files }, state);
    }

    private warnings_report(name: string, warnings: string[], state: RunState): void {
        if (warnings.length > 0) state.report.warnings[name] = [...warnings];
    }
}

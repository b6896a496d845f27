/**
 * @file Invalidation Engine
 *
 * Decides which targets must rerun. Walks the graph once in
 * topological order comparing each target's current identity against
 * its last fingerprint record. Outdatedness cascades: a target whose
 * upstream is outdated is outdated too.
 *
 * Stored values are never read here; only metadata records and, for
 * file targets, the tracked files themselves.
 *
 * @module dag/invalidation
 */

import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { FileTracker } from '../files/tracker.js';
import type { FileArtifact, FingerprintRecord } from '../fingerprint/types.js';
import type { Graph, Target } from '../graph/types.js';
import { DEFAULT_PIPELINE_SEED, seed_derive } from '../execution/random.js';
import { target_digests } from './digests.js';
import type { TargetDigests } from './digests.js';

/**
 * Why a target is outdated.
 *
 * - `missing_record`: never ran (or its record was removed)
 * - `previous_not_ok`: last run errored, was cancelled or skipped
 * - `cue_always`: declared to run every time
 * - `command_changed`: command text, format or document location changed
 * - `capability_changed`: a declared capability's version changed
 * - `document_changed`: a literate document's source changed
 * - `seed_changed`: the pipeline seed moved, so the target's random stream differs
 * - `upstream_outdated`: a dependency will rerun in this pass
 * - `upstream_changed`: a dependency's output differs from what this target saw
 * - `dependencies_changed`: the set of dependencies itself changed
 * - `artifact_changed`: a tracked file is missing or its content changed
 */
export type OutdatedReason =
    | 'missing_record'
    | 'previous_not_ok'
    | 'cue_always'
    | 'command_changed'
    | 'capability_changed'
    | 'document_changed'
    | 'seed_changed'
    | 'upstream_outdated'
    | 'upstream_changed'
    | 'dependencies_changed'
    | 'artifact_changed';

/**
 * @property outdated - Targets that must rerun
 * @property reasons - Every reason found per outdated target
 * @property refreshed - For up-to-date file targets, artifacts rehashed without a content change
 */
export interface Invalidation {
    outdated: Set<string>;
    reasons: Map<string, OutdatedReason[]>;
    refreshed: Map<string, FileArtifact[]>;
}

function keys_equal(a: Record<string, string>, b: string[]): boolean {
    const keys: string[] = Object.keys(a);
    return keys.length === b.length && b.every((name: string) => Object.prototype.hasOwnProperty.call(a, name));
}

function packages_equal(a: Record<string, string>, b: Record<string, string>): boolean {
    const keys: string[] = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((name: string) => b[name] === a[name]);
}

/** Reasons that do not need the filesystem. */
function reasons_static(
    target: Target,
    record: FingerprintRecord,
    digests: TargetDigests,
    seed: number,
    graph: Graph,
    previous: Map<string, FingerprintRecord>,
    outdated: Set<string>,
): OutdatedReason[] {
    const reasons: OutdatedReason[] = [];

    if (
        record.commandDigest !== digests.commandDigest ||
        record.variant !== target.variant ||
        record.format !== target.format
    ) {
        reasons.push('command_changed');
    }
    if (!packages_equal(record.packages, digests.packages)) {
        reasons.push('capability_changed');
    }
    if (record.documentDigest !== digests.documentDigest) {
        reasons.push('document_changed');
    }
    if (record.seed !== seed) {
        reasons.push('seed_changed');
    }

    const upstream: string[] = graph.upstream.get(target.name) ?? [];
    if (!keys_equal(record.dependencies, upstream)) {
        reasons.push('dependencies_changed');
    }
    if (upstream.some((dep: string) => outdated.has(dep))) {
        reasons.push('upstream_outdated');
    }
    const changed: boolean = upstream.some((dep: string) => {
        if (outdated.has(dep)) return false;
        const seen: string | undefined = record.dependencies[dep];
        return seen !== undefined && seen !== previous.get(dep)?.outputDigest;
    });
    if (changed) {
        reasons.push('upstream_changed');
    }

    return reasons;
}

/**
 * Compute the outdated set for a graph given the previous run's records.
 *
 * @param graph - Current graph
 * @param previous - Last record per target name
 * @param capabilities - Capability registry as resolved for this run
 * @param tracker - File tracker used to check file targets' artifacts
 * @param pipelineSeed - Seed the next run will derive target seeds from
 */
export async function outdated_compute(
    graph: Graph,
    previous: Map<string, FingerprintRecord>,
    capabilities: CapabilityRegistry,
    tracker: FileTracker,
    pipelineSeed: number = DEFAULT_PIPELINE_SEED,
): Promise<Invalidation> {
    const outdated: Set<string> = new Set();
    const reasons: Map<string, OutdatedReason[]> = new Map();
    const refreshed: Map<string, FileArtifact[]> = new Map();

    const mark = (name: string, found: OutdatedReason[]): void => {
        if (found.length === 0) return;
        outdated.add(name);
        reasons.set(name, found);
    };

    for (const name of graph.order) {
        const target: Target | undefined = graph.nodes.get(name);
        if (!target) continue;

        const record: FingerprintRecord | undefined = previous.get(name);
        if (!record) {
            mark(name, ['missing_record']);
            continue;
        }
        if (record.status !== 'ok') {
            mark(name, ['previous_not_ok']);
            continue;
        }
        if (target.cue === 'always') {
            mark(name, ['cue_always']);
            continue;
        }
        if (target.cue === 'never') {
            continue;
        }

        const found: OutdatedReason[] = reasons_static(
            target,
            record,
            target_digests(target, capabilities),
            seed_derive(pipelineSeed, name),
            graph,
            previous,
            outdated,
        );

        if (found.length === 0 && target.format === 'file') {
            const current: Array<FileArtifact | null> = await tracker.refresh(record.files);
            const intact: boolean = record.files.every(
                (artifact: FileArtifact, i: number) => current[i]?.hash === artifact.hash,
            );
            if (!intact) {
                found.push('artifact_changed');
            } else {
                const moved: boolean = record.files.some(
                    (artifact: FileArtifact, i: number) => current[i]?.hashedAt !== artifact.hashedAt,
                );
                if (moved) {
                    refreshed.set(name, current.filter((a): a is FileArtifact => a !== null));
                }
            }
        }

        mark(name, found);
    }

    return { outdated, reasons, refreshed };
}

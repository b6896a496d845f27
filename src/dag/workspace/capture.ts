/**
 * @file Workspace Capturer
 *
 * Freezes the environment of a failed target so it can be inspected
 * and re-evaluated later without the scheduler. A snapshot holds only
 * what the command names (its free symbols and the targets it reads or
 * loads), never the whole pipeline.
 *
 * @module dag/workspace
 */

import { CaptureWarning, TargetError, errorMessage_extract } from '../errors.js';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import { FileTracker } from '../files/tracker.js';
import { value_deserialize, value_serialize } from '../fingerprint/serialize.js';
import type { JsonValue } from '../fingerprint/types.js';
import { targetReferences_extract } from '../graph/builder.js';
import { expression_parse } from '../graph/parser/expression.js';
import type { Expr, Result, Target } from '../graph/types.js';
import { fragments_extract } from '../literate/document.js';
import { MarkdownRenderer } from '../literate/renderer.js';
import type { DocumentRenderer } from '../literate/renderer.js';
import { target_run } from '../execution/runner.js';
import type { WorkspaceSnapshot } from './types.js';
import type { Logger } from '../../logging/logger.js';

/**
 * What the scheduler knows at the point of failure.
 *
 * @property lookup - Value of a named binding; rejects when it cannot be produced
 */
export interface CaptureEnvironment {
    lookup(name: string): Promise<unknown>;
    capabilities: Record<string, string>;
    seed: number;
    error: string;
}

/**
 * Names a target's snapshot binds, in first-seen order. A literate
 * document binds only what it reads or loads; its bare symbols are
 * document-local.
 */
export function bindingNames_collect(target: Target): string[] {
    const refs = targetReferences_extract(target);
    const candidates: string[] = target.variant === 'literate'
        ? refs.retrievals
        : [...refs.symbols, ...refs.retrievals];
    const names: string[] = [];
    for (const name of candidates) {
        if (!names.includes(name)) names.push(name);
    }
    return names;
}

/**
 * Capture a snapshot. Bindings that cannot be produced or serialized
 * are left out, listed in `omitted` and logged as CaptureWarnings.
 */
export async function workspace_capture(
    target: Target,
    environment: CaptureEnvironment,
    log: Logger,
): Promise<WorkspaceSnapshot> {
    const bindings: Record<string, JsonValue> = {};
    const omitted: string[] = [];

    for (const name of bindingNames_collect(target)) {
        try {
            bindings[name] = value_deserialize(value_serialize(await environment.lookup(name)));
        } catch (error: unknown) {
            omitted.push(name);
            const warning = new CaptureWarning(target.name, name, errorMessage_extract(error));
            log.warn(warning.message, { target: target.name, code: warning.code });
        }
    }

    return {
        target: target.name,
        variant: target.variant,
        command: target.variant === 'literate' ? target.source : target.commandText,
        document: target.variant === 'literate' ? target.document : null,
        bindings,
        omitted,
        capabilities: { ...environment.capabilities },
        seed: environment.seed,
        error: environment.error,
        timestamp: new Date().toISOString(),
    };
}

/** Rebuild a runnable target from a snapshot. */
function target_restore(snapshot: WorkspaceSnapshot): Target {
    const packages: string[] = Object.keys(snapshot.capabilities);
    if (snapshot.variant === 'literate') {
        return {
            variant: 'literate',
            format: 'file',
            name: snapshot.target,
            packages,
            cue: 'thorough',
            document: snapshot.document ?? `${snapshot.target}.md`,
            output: null,
            source: snapshot.command,
            fragments: fragments_extract(snapshot.command),
        };
    }
    const command: Expr = expression_parse(snapshot.command);
    if (snapshot.variant === 'file') {
        return { variant: 'file', format: 'file', name: snapshot.target, packages, cue: 'thorough', command, commandText: snapshot.command };
    }
    return { variant: 'code', format: 'value', name: snapshot.target, packages, cue: 'thorough', command, commandText: snapshot.command };
}

/**
 * @property root - Directory file paths resolve against
 * @property renderer - Renderer for literate snapshots (default Markdown)
 */
export interface ReproduceOptions {
    capabilities: CapabilityRegistry;
    root: string;
    renderer?: DocumentRenderer;
}

/**
 * Re-evaluate a snapshot's command with its captured bindings and seed,
 * outside the scheduler. A faithful reproduction of a failure returns
 * `{ ok: false }` with the error message the scheduler recorded.
 */
export async function workspace_reproduce(
    snapshot: WorkspaceSnapshot,
    options: ReproduceOptions,
): Promise<Result<unknown, TargetError>> {
    const captured = (name: string): Promise<unknown> => {
        if (Object.prototype.hasOwnProperty.call(snapshot.bindings, name)) {
            return Promise.resolve(snapshot.bindings[name]);
        }
        return Promise.reject(new Error(`binding '${name}' was not captured`));
    };

    try {
        const evaluation = await target_run(
            target_restore(snapshot),
            {
                root: options.root,
                seed: snapshot.seed,
                capabilities: options.capabilities,
                tracker: new FileTracker({ root: options.root }),
                renderer: options.renderer ?? new MarkdownRenderer(),
                retrieve: captured,
            },
            [],
        );
        return { ok: true, value: evaluation.value };
    } catch (error: unknown) {
        if (error instanceof TargetError) return { ok: false, error };
        return { ok: false, error: new TargetError(snapshot.target, errorMessage_extract(error)) };
    }
}

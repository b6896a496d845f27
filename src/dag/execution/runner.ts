/**
 * @file Target Runner
 *
 * Runs one target to completion: evaluates its command (or renders its
 * document), fingerprints what it produced and serializes its value.
 * Nothing here touches the store; the scheduler commits the result.
 *
 * @module dag/execution
 */

import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { CommandContext } from '../capabilities/types.js';
import type { FileTracker } from '../files/tracker.js';
import { value_serialize } from '../fingerprint/serialize.js';
import type { FileArtifact } from '../fingerprint/types.js';
import type { LiterateFragment, Target } from '../graph/types.js';
import type { DocumentRenderer } from '../literate/renderer.js';
import { expression_evaluate } from './evaluator.js';
import type { EvaluationContext } from './evaluator.js';
import { random_create } from './random.js';

/**
 * Everything a target may reach while it runs.
 *
 * @property retrieve - Value of an upstream target
 */
export interface TargetEnvironment {
    root: string;
    seed: number;
    capabilities: CapabilityRegistry;
    tracker: FileTracker;
    renderer: DocumentRenderer;
    retrieve(name: string): Promise<unknown>;
}

/**
 * @property serialized - Canonical JSON of `value`
 * @property files - Tracked artifacts (empty for value targets)
 */
export interface Evaluation {
    value: unknown;
    serialized: string;
    files: FileArtifact[];
}

export function commandContext_create(
    target: string,
    seed: number,
    root: string,
    warnings: string[],
): CommandContext {
    return {
        target,
        seed,
        root,
        random: random_create(seed),
        warn: (message: string) => { warnings.push(message); },
    };
}

/**
 * Run a target. Warnings raised along the way are appended to
 * `warnings` even when the run throws.
 *
 * @throws whatever the command throws, ArtifactError, RenderError or SerializationError
 */
export async function target_run(
    target: Target,
    environment: TargetEnvironment,
    warnings: string[],
): Promise<Evaluation> {
    const command: CommandContext = commandContext_create(target.name, environment.seed, environment.root, warnings);
    const context = (scope: Map<string, unknown>, symbol: (name: string) => Promise<unknown>): EvaluationContext => ({
        scope,
        retrieve: (name: string) => environment.retrieve(name),
        symbol,
        capabilities: environment.capabilities,
        command,
    });

    if (target.variant === 'literate') {
        const unbound = (name: string): Promise<unknown> =>
            Promise.reject(new Error(`'${name}' is not bound in this document; load("${name}") first`));
        const output: string | string[] = await environment.renderer.render({
            target,
            root: environment.root,
            evaluate: (fragment: LiterateFragment, scope: Map<string, unknown>) =>
                expression_evaluate(fragment.expr, context(scope, unbound)),
        });
        const files: FileArtifact[] = await environment.tracker.materialize(target.name, output);
        return { value: output, serialized: value_serialize(output), files };
    }

    const value: unknown = await expression_evaluate(
        target.command,
        context(new Map(), (name: string) => environment.retrieve(name)),
    );
    const files: FileArtifact[] = target.variant === 'file'
        ? await environment.tracker.materialize(target.name, value)
        : [];
    return { value, serialized: value_serialize(value), files };
}

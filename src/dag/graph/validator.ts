/**
 * @file Pipeline Validator
 *
 * Structural checks run before a pipeline is installed: no duplicate
 * names, every referenced target and capability resolves, and the
 * derived graph is acyclic.
 *
 * @module dag/graph
 */

import { SpecError } from '../errors.js';
import { callee_split } from '../capabilities/registry.js';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import { builtin_is } from './parser/expression.js';
import { targetReferences_extract } from './builder.js';
import { cycle_find } from './topology.js';
import type { References } from './references.js';
import type { Graph, Target, TargetDefinition } from './types.js';

/** First name declared twice, as a SpecError. */
export function duplicates_check(definitions: TargetDefinition[]): SpecError | null {
    const seen = new Set<string>();
    for (const definition of definitions) {
        if (seen.has(definition.name)) {
            return new SpecError('DuplicateName', `Duplicate target name: '${definition.name}'`, [definition.name]);
        }
        seen.add(definition.name);
    }
    return null;
}

/**
 * Every target reference must name a target; every `ns.fn` call must
 * use a capability the target declares (and, when the available
 * capabilities are known, one that exists and exports `fn`).
 */
export function references_check(
    targets: Target[],
    capabilities: CapabilityRegistry | null,
): SpecError | null {
    const names = new Set(targets.map(t => t.name));

    for (const target of targets) {
        const refs: References = targetReferences_extract(target);

        for (const [dep, form] of refs.targets) {
            if (!names.has(dep)) {
                const how: string = form === 'symbol' ? 'symbol' : `${form === 'document' ? 'document read' : form}()`;
                return new SpecError(
                    'UnresolvedReference',
                    `Target '${target.name}' references unknown target '${dep}' (${how})`,
                    [target.name],
                );
            }
        }

        for (const capability of target.packages) {
            if (capabilities && !capabilities.has(capability)) {
                return new SpecError(
                    'UnresolvedReference',
                    `Target '${target.name}' declares capability '${capability}', which is not available`,
                    [target.name],
                );
            }
        }

        for (const callee of refs.calls) {
            if (builtin_is(callee)) continue;
            const parts = callee_split(callee);
            if (!parts) {
                return new SpecError('UnresolvedReference', `Target '${target.name}' calls unknown function '${callee}'`, [target.name]);
            }
            if (!target.packages.includes(parts.capability)) {
                return new SpecError(
                    'UnresolvedReference',
                    `Target '${target.name}' calls '${callee}' but does not declare capability '${parts.capability}'`,
                    [target.name],
                );
            }
            if (capabilities && !capabilities.function_resolve(callee)) {
                return new SpecError(
                    'UnresolvedReference',
                    `Capability '${parts.capability}' has no function '${parts.fn}' (called by '${target.name}')`,
                    [target.name],
                );
            }
        }
    }
    return null;
}

/** A cycle in the built graph, as a SpecError naming one closed path. */
export function cycles_check(graph: Graph): SpecError | null {
    if (graph.order.length === graph.nodes.size) return null;

    const placed = new Set(graph.order);
    const blocked: string[] = Array.from(graph.nodes.keys()).filter(name => !placed.has(name));
    const cycle: string[] | null = cycle_find(blocked, graph.upstream);
    const path: string = cycle ? cycle.join(' -> ') : blocked.join(', ');
    return new SpecError('Cycle', `Cycle detected in pipeline: ${path}`, cycle ? cycle.slice(0, -1) : blocked);
}

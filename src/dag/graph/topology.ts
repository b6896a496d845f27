/**
 * @file Graph Topology
 *
 * Topological ordering (Kahn's algorithm) and reachability over a
 * name → dependencies map. Ties among ready nodes are broken by the
 * order the nodes were declared in, so the same pipeline always yields
 * the same linearization.
 *
 * @module dag/graph
 */

import type { Graph } from './types.js';

/**
 * Result of a topological sort.
 *
 * @property order - Nodes in dependency-first order
 * @property blocked - Nodes that could not be ordered (on or behind a cycle)
 */
export interface TopologicalOrder {
    order: string[];
    blocked: string[];
}

/**
 * Order `names` so every node follows all of its dependencies.
 * Dependencies that are not in `names` are ignored.
 */
export function topological_sort(names: string[], upstream: Map<string, string[]>): TopologicalOrder {
    const known = new Set(names);
    const rank = new Map<string, number>(names.map((name, i) => [name, i]));
    const inDegree = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const name of names) {
        inDegree.set(name, 0);
        dependents.set(name, []);
    }
    for (const name of names) {
        for (const dep of new Set(upstream.get(name) ?? [])) {
            if (!known.has(dep)) continue;
            inDegree.set(name, (inDegree.get(name) ?? 0) + 1);
            dependents.get(dep)?.push(name);
        }
    }

    // Ready set kept sorted by declaration rank.
    const ready: string[] = names.filter(name => inDegree.get(name) === 0);
    const order: string[] = [];

    while (ready.length > 0) {
        const current = ready.shift();
        if (current === undefined) break;
        order.push(current);

        for (const next of dependents.get(current) ?? []) {
            const degree: number = (inDegree.get(next) ?? 1) - 1;
            inDegree.set(next, degree);
            if (degree === 0) {
                const at: number = ready.findIndex(r => (rank.get(r) ?? 0) > (rank.get(next) ?? 0));
                if (at < 0) ready.push(next);
                else ready.splice(at, 0, next);
            }
        }
    }

    const placed = new Set(order);
    return { order, blocked: names.filter(name => !placed.has(name)) };
}

/**
 * Find one concrete cycle among `candidates` by depth-first search.
 *
 * @returns The cycle as a closed path (`[a, b, a]`), or null
 */
export function cycle_find(candidates: string[], upstream: Map<string, string[]>): string[] | null {
    const within = new Set(candidates);
    const state = new Map<string, 'visiting' | 'done'>();
    const stack: string[] = [];

    const visit = (name: string): string[] | null => {
        state.set(name, 'visiting');
        stack.push(name);
        for (const dep of upstream.get(name) ?? []) {
            if (!within.has(dep)) continue;
            if (state.get(dep) === 'visiting') {
                // Report in data-flow direction: dependency first.
                const loop: string[] = stack.slice(stack.indexOf(dep)).reverse();
                return [...loop, loop[0]];
            }
            if (!state.has(dep)) {
                const found = visit(dep);
                if (found) return found;
            }
        }
        stack.pop();
        state.set(name, 'done');
        return null;
    };

    for (const name of candidates) {
        if (state.has(name)) continue;
        const found = visit(name);
        if (found) return found;
    }
    return null;
}

function closure_collect(start: Iterable<string>, next: Map<string, string[]>): Set<string> {
    const seen = new Set<string>();
    const queue: string[] = [...start];
    while (queue.length > 0) {
        const current = queue.pop();
        if (current === undefined || seen.has(current)) continue;
        seen.add(current);
        for (const neighbour of next.get(current) ?? []) {
            if (!seen.has(neighbour)) queue.push(neighbour);
        }
    }
    return seen;
}

/** `names` plus everything they transitively depend on. */
export function ancestors_collect(graph: Graph, names: Iterable<string>): Set<string> {
    return closure_collect(names, graph.upstream);
}

/** `names` plus everything that transitively depends on them. */
export function descendants_collect(graph: Graph, names: Iterable<string>): Set<string> {
    return closure_collect(names, graph.downstream);
}

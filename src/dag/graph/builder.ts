/**
 * @file Dependency Graph Builder
 *
 * Derives the pipeline graph from target commands. Every reference a
 * command makes to another target (a bare symbol, `read()` or
 * `load()`) becomes an edge, and so does every `read()` / `load()`
 * inside a literate document's executable fragments. Edges point from
 * dependency to dependent.
 *
 * References to names that are not targets are left out of the graph;
 * the registry reports them before a graph is ever installed.
 *
 * @module dag/graph
 */

import { documentReferences_extract, references_extract, type References } from './references.js';
import { topological_sort } from './topology.js';
import type { Graph, GraphEdge, Target } from './types.js';

/** References made by one target, whatever its variant. */
export function targetReferences_extract(target: Target): References {
    return target.variant === 'literate'
        ? documentReferences_extract(target.fragments)
        : references_extract(target.command);
}

/**
 * Build the graph for a set of targets.
 *
 * `order` holds the nodes that could be linearized; on a cyclic input
 * it is shorter than `nodes` (see `graph_isAcyclic`).
 */
export function graph_build(targets: Target[]): Graph {
    const nodes = new Map<string, Target>();
    for (const target of targets) nodes.set(target.name, target);

    const edges: GraphEdge[] = [];
    const upstream = new Map<string, string[]>();
    const downstream = new Map<string, string[]>();
    for (const name of nodes.keys()) {
        upstream.set(name, []);
        downstream.set(name, []);
    }

    for (const target of nodes.values()) {
        const refs: References = targetReferences_extract(target);
        for (const dep of refs.targets.keys()) {
            if (!nodes.has(dep)) continue;
            edges.push({ from: dep, to: target.name });
            upstream.get(target.name)?.push(dep);
            downstream.get(dep)?.push(target.name);
        }
    }

    const names: string[] = Array.from(nodes.keys());
    const { order } = topological_sort(names, upstream);

    return {
        nodes,
        edges,
        order,
        roots: names.filter(name => (upstream.get(name) ?? []).length === 0),
        terminals: names.filter(name => (downstream.get(name) ?? []).length === 0),
        upstream,
        downstream,
    };
}

/** Whether every node made it into the topological order. */
export function graph_isAcyclic(graph: Graph): boolean {
    return graph.order.length === graph.nodes.size;
}

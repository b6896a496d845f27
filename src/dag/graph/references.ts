/**
 * @file Reference Discovery
 *
 * Static analysis over command expressions: which other targets a
 * command depends on, and in which form (bare symbol, `read`, `load`),
 * plus which capability functions it calls.
 *
 * @module dag/graph
 */

import type { Expr, LiterateFragment, ReferenceForm } from './types.js';

/**
 * References found in one command or document.
 *
 * @property targets - Referenced target name → first form it was seen in
 * @property symbols - Bare symbols, in first-seen order
 * @property retrievals - Targets named by `read` / `load`, in first-seen order
 * @property calls - Dotted callees (`ns.fn`) and builtins called
 */
export interface References {
    targets: Map<string, ReferenceForm>;
    symbols: string[];
    retrievals: string[];
    calls: string[];
}

function references_empty(): References {
    return { targets: new Map(), symbols: [], retrievals: [], calls: [] };
}

function reference_add(refs: References, name: string, form: ReferenceForm): void {
    if (!refs.targets.has(name)) refs.targets.set(name, form);
}

function expr_walk(expr: Expr, refs: References): void {
    switch (expr.kind) {
        case 'literal':
            return;
        case 'symbol':
            reference_add(refs, expr.name, 'symbol');
            if (!refs.symbols.includes(expr.name)) refs.symbols.push(expr.name);
            return;
        case 'read':
        case 'load':
            reference_add(refs, expr.target, expr.kind);
            if (!refs.retrievals.includes(expr.target)) refs.retrievals.push(expr.target);
            return;
        case 'call':
            if (!refs.calls.includes(expr.callee)) refs.calls.push(expr.callee);
            expr.args.forEach((arg: Expr) => expr_walk(arg, refs));
            return;
        case 'binary':
            expr_walk(expr.left, refs);
            expr_walk(expr.right, refs);
            return;
        case 'negate':
            expr_walk(expr.operand, refs);
            return;
        case 'member':
            expr_walk(expr.object, refs);
            expr_walk(expr.property, refs);
            return;
        case 'array':
            expr.items.forEach((item: Expr) => expr_walk(item, refs));
            return;
        case 'object':
            expr.fields.forEach(([, value]) => expr_walk(value, refs));
            return;
    }
}

/** All references made by one command. */
export function references_extract(expr: Expr): References {
    const refs: References = references_empty();
    expr_walk(expr, refs);
    return refs;
}

/**
 * References made by a literate document. Only `read` / `load` calls
 * create dependencies; bare symbols resolve against the document's own
 * scope at render time, so they are reported but not turned into
 * target references.
 */
export function documentReferences_extract(fragments: LiterateFragment[]): References {
    const refs: References = references_empty();
    for (const fragment of fragments) {
        const own: References = references_extract(fragment.expr);
        for (const name of own.retrievals) {
            reference_add(refs, name, 'document');
            if (!refs.retrievals.includes(name)) refs.retrievals.push(name);
        }
        for (const symbol of own.symbols) {
            if (!refs.symbols.includes(symbol)) refs.symbols.push(symbol);
        }
        for (const call of own.calls) {
            if (!refs.calls.includes(call)) refs.calls.push(call);
        }
    }
    return refs;
}

/**
 * @file Graph Type Definitions
 *
 * Core types for the pipeline graph: command expressions, the three
 * target variants, derived edges and the resolved graph.
 *
 * The graph layer is pure topology. It parses pipeline documents and
 * command text, discovers references and validates structure; running,
 * storing and comparing fingerprints happen elsewhere.
 *
 * @module dag/graph
 */

import type { JsonValue, TargetFormat } from '../fingerprint/types.js';

// ─── Command Expressions ────────────────────────────────────────

export type BinaryOperator = '+' | '-' | '*' | '/' | '%';

/** Builtin functions that need no capability. */
export type BuiltinName = 'warn' | 'fail' | 'random';

/**
 * Parsed command. Commands are data, not text: the registry parses
 * them once at load time and every later stage walks this tree.
 *
 * - `symbol`: a bare name bound to another target's result
 * - `read` / `load`: explicit result retrieval (`load` also binds the name)
 * - `call`: a capability function (`ns.fn`) or a builtin
 * - `member`: `x.field` or `x[index]`
 */
export type Expr =
    | { kind: 'literal'; value: JsonValue }
    | { kind: 'symbol'; name: string }
    | { kind: 'read'; target: string }
    | { kind: 'load'; target: string }
    | { kind: 'call'; callee: string; args: Expr[] }
    | { kind: 'binary'; op: BinaryOperator; left: Expr; right: Expr }
    | { kind: 'negate'; operand: Expr }
    | { kind: 'member'; object: Expr; property: Expr }
    | { kind: 'array'; items: Expr[] }
    | { kind: 'object'; fields: Array<[string, Expr]> };

// ─── Targets ────────────────────────────────────────────────────

/**
 * When to rerun a target.
 * - `thorough`: whenever any input changed (default)
 * - `always`: on every run
 * - `never`: only when it has no successful record
 */
export type CueMode = 'thorough' | 'always' | 'never';

interface TargetBase {
    name: string;
    format: TargetFormat;
    /** Declared capability names (pipeline defaults merged in). */
    packages: string[];
    cue: CueMode;
}

/** An in-memory value computed by a command. */
export interface CodeTarget extends TargetBase {
    variant: 'code';
    format: 'value';
    command: Expr;
    /** Canonical printed form of `command`; the command digest is taken over this. */
    commandText: string;
}

/** A command that writes files and returns their paths. */
export interface FileTrackedTarget extends TargetBase {
    variant: 'file';
    format: 'file';
    command: Expr;
    commandText: string;
}

/**
 * A literate document rendered into a report.
 *
 * @property document - Source path (relative to the pipeline root, or absolute)
 * @property output - Rendered report path, or null for the renderer's default
 * @property source - Document text as read at load time
 * @property fragments - Parsed executable fragments of the document
 */
export interface LiterateTarget extends TargetBase {
    variant: 'literate';
    format: 'file';
    document: string;
    output: string | null;
    source: string;
    fragments: LiterateFragment[];
}

export type Target = CodeTarget | FileTrackedTarget | LiterateTarget;

/** One executable fence of a literate document. */
export interface LiterateFragment {
    /** Index of the fence among the document's executable fences. */
    index: number;
    /** Raw fence body. */
    code: string;
    expr: Expr;
    /** Character offsets of the whole fence (opening to closing line) in the source. */
    start: number;
    end: number;
}

// ─── Target Definitions (authoring form) ────────────────────────

/**
 * Authoring form of a target, before parsing. Exactly one of
 * `command` and `document` is set.
 */
export interface TargetDefinition {
    name: string;
    command?: string;
    document?: string;
    output?: string;
    format?: TargetFormat;
    packages?: string[];
    cue?: CueMode;
}

/**
 * A declarative pipeline: the parsed form of a pipeline YAML document,
 * or one built in code.
 */
export interface PipelineSpec {
    name: string;
    /** Capabilities every target gets in addition to its own. */
    packages: string[];
    targets: TargetDefinition[];
}

// ─── Graph ──────────────────────────────────────────────────────

/**
 * An edge in the pipeline graph, pointing from dependency to
 * dependent (the direction of data flow).
 */
export interface GraphEdge {
    from: string;
    to: string;
}

/** How a dependency was discovered. */
export type ReferenceForm = 'symbol' | 'read' | 'load' | 'document';

/**
 * The resolved pipeline graph. Rebuilt on every load.
 *
 * @property order - One topological linearization (declaration order breaks ties)
 * @property upstream - name → direct dependencies
 * @property downstream - name → direct dependents
 */
export interface Graph {
    nodes: Map<string, Target>;
    edges: GraphEdge[];
    order: string[];
    roots: string[];
    terminals: string[];
    upstream: Map<string, string[]>;
    downstream: Map<string, string[]>;
}

/** Result of an operation that either produces a value or a typed error. */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * @file Target Registry
 *
 * Turns a declarative pipeline into validated targets and their graph.
 * Loading is all-or-nothing: a SpecError leaves the previously loaded
 * pipeline (if any) untouched, and a successful load replaces it
 * wholesale, with no merge against an earlier registry.
 *
 * @module dag/graph
 */

import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';

import { SpecError, errorMessage_extract } from '../errors.js';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import { fragments_extract } from '../literate/document.js';
import { expression_parse, expression_print } from './parser/expression.js';
import { IDENTIFIER_PATTERN } from './parser/schemas.js';
import { graph_build } from './builder.js';
import { cycles_check, duplicates_check, references_check } from './validator.js';
import type { Expr, Graph, PipelineSpec, Result, Target, TargetDefinition } from './types.js';

/** Reads a literate document's source by path. */
export type DocumentReader = (documentPath: string) => Promise<string>;

/**
 * @property root - Directory relative document paths resolve against
 * @property capabilities - When given, declared capabilities and called functions must exist
 * @property documentRead - Override for reading document sources
 */
export interface RegistryOptions {
    root: string;
    capabilities?: CapabilityRegistry | null;
    documentRead?: DocumentReader;
}

/** The installed pipeline: targets in declaration order plus their graph. */
export interface LoadedPipeline {
    name: string;
    targets: Target[];
    graph: Graph;
}

export class TargetRegistry {
    private current: LoadedPipeline | null = null;
    private readonly documentRead: DocumentReader;

    constructor(private readonly options: RegistryOptions) {
        this.documentRead = options.documentRead ?? ((documentPath: string) =>
            readFile(isAbsolute(documentPath) ? documentPath : resolve(options.root, documentPath), 'utf-8'));
    }

    /** Load a pipeline, replacing the installed one on success. */
    async load(spec: PipelineSpec): Promise<Result<Set<Target>, SpecError>> {
        const built = await this.pipeline_build(spec);
        if (!built.ok) return built;
        this.current = built.value;
        return { ok: true, value: new Set(built.value.targets) };
    }

    /** The installed pipeline, or null before the first successful load. */
    get pipeline(): LoadedPipeline | null {
        return this.current;
    }

    get graph(): Graph | null {
        return this.current?.graph ?? null;
    }

    target_get(name: string): Target | null {
        return this.current?.graph.nodes.get(name) ?? null;
    }

    private async pipeline_build(spec: PipelineSpec): Promise<Result<LoadedPipeline, SpecError>> {
        const duplicate: SpecError | null = duplicates_check(spec.targets);
        if (duplicate) return { ok: false, error: duplicate };

        const targets: Target[] = [];
        for (const definition of spec.targets) {
            const target = await this.target_build(definition, spec.packages);
            if (!target.ok) return target;
            targets.push(target.value);
        }

        const unresolved: SpecError | null = references_check(targets, this.options.capabilities ?? null);
        if (unresolved) return { ok: false, error: unresolved };

        const graph: Graph = graph_build(targets);
        const cycle: SpecError | null = cycles_check(graph);
        if (cycle) return { ok: false, error: cycle };

        return { ok: true, value: { name: spec.name, targets, graph } };
    }

    private async target_build(
        definition: TargetDefinition,
        defaultPackages: string[],
    ): Promise<Result<Target, SpecError>> {
        const name: string = definition.name;
        const invalid = (message: string): Result<Target, SpecError> =>
            ({ ok: false, error: new SpecError('InvalidSpec', `Target '${name}': ${message}`, [name]) });

        if (!IDENTIFIER_PATTERN.test(name)) {
            return invalid('name must be an identifier');
        }
        if ((definition.command === undefined) === (definition.document === undefined)) {
            return invalid('declare exactly one of command or document');
        }

        const packages: string[] = Array.from(new Set([...defaultPackages, ...(definition.packages ?? [])]));
        const cue = definition.cue ?? 'thorough';

        if (definition.document !== undefined) {
            if (definition.format === 'value') {
                return invalid('a document target is always format: file');
            }
            let source: string;
            try {
                source = await this.documentRead(definition.document);
            } catch (error: unknown) {
                return invalid(`cannot read document '${definition.document}': ${errorMessage_extract(error)}`);
            }
            try {
                return {
                    ok: true,
                    value: {
                        variant: 'literate',
                        format: 'file',
                        name,
                        packages,
                        cue,
                        document: definition.document,
                        output: definition.output ?? null,
                        source,
                        fragments: fragments_extract(source),
                    },
                };
            } catch (error: unknown) {
                return invalid(`document '${definition.document}': ${errorMessage_extract(error)}`);
            }
        }

        if (definition.output !== undefined) {
            return invalid('output applies to document targets only');
        }

        let command: Expr;
        let commandText: string;
        try {
            command = expression_parse(definition.command ?? '');
            commandText = expression_print(command);
        } catch (error: unknown) {
            return invalid(`command: ${errorMessage_extract(error)}`);
        }

        if (definition.format === 'file') {
            return { ok: true, value: { variant: 'file', format: 'file', name, packages, cue, command, commandText } };
        }
        return { ok: true, value: { variant: 'code', format: 'value', name, packages, cue, command, commandText } };
    }
}

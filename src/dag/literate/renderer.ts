/**
 * @file Literate Document Renderer
 *
 * Renders a literate target: every executable fence is evaluated in
 * document order against one shared scope and replaced by its printed
 * result. Prose and other fences pass through untouched.
 *
 * @module dag/literate
 */

import { mkdir, writeFile } from 'fs/promises';
import { basename, dirname, extname, isAbsolute, join, resolve } from 'path';

import { RenderError, errorMessage_extract } from '../errors.js';
import type { LiterateFragment, LiterateTarget } from '../graph/types.js';

/** Evaluates one fragment; `load` calls bind into `scope`. */
export type FragmentEvaluator = (fragment: LiterateFragment, scope: Map<string, unknown>) => Promise<unknown>;

/**
 * @property root - Pipeline root; relative document and output paths resolve against it
 * @property evaluate - Fragment evaluator bound to the running target
 */
export interface RenderRequest {
    target: LiterateTarget;
    root: string;
    evaluate: FragmentEvaluator;
}

/** Pluggable document renderer. Returns the report path(s) it wrote. */
export interface DocumentRenderer {
    readonly name: string;
    render(request: RenderRequest): Promise<string | string[]>;
}

/** `<dir>/<stem>.rendered.md` beside the source. */
export function outputPath_default(documentPath: string): string {
    const stem: string = basename(documentPath, extname(documentPath));
    const dir: string = dirname(documentPath);
    const file: string = `${stem}.rendered.md`;
    return dir === '.' ? file : join(dir, file);
}

/** Printed form of a fragment result inside the report. */
export function result_print(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === undefined) return 'null';
    return JSON.stringify(value, null, 2) ?? String(value);
}

/** Markdown in, Markdown out. */
export class MarkdownRenderer implements DocumentRenderer {
    readonly name = 'markdown';

    async render(request: RenderRequest): Promise<string> {
        const { target } = request;
        const scope: Map<string, unknown> = new Map();
        let rendered = '';
        let cursor = 0;

        for (const fragment of target.fragments) {
            let value: unknown;
            try {
                value = await request.evaluate(fragment, scope);
            } catch (error: unknown) {
                throw new RenderError(
                    target.name,
                    `fragment ${fragment.index + 1} of '${target.document}' failed: ${errorMessage_extract(error)}`,
                );
            }
            rendered += target.source.slice(cursor, fragment.start);
            rendered += '```text\n' + result_print(value) + '\n```';
            cursor = fragment.end;
        }
        rendered += target.source.slice(cursor);

        const output: string = target.output ?? outputPath_default(target.document);
        const absolute: string = isAbsolute(output) ? output : resolve(request.root, output);
        try {
            await mkdir(dirname(absolute), { recursive: true });
            await writeFile(absolute, rendered, 'utf-8');
        } catch (error: unknown) {
            throw new RenderError(target.name, `cannot write '${output}': ${errorMessage_extract(error)}`);
        }
        return output;
    }
}

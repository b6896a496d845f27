/**
 * @file Literate Document Tests
 *
 * Fragment discovery and Markdown rendering.
 *
 * @module dag/literate
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { fragments_extract, info_isExecutable } from './document.js';
import { MarkdownRenderer, outputPath_default, result_print } from './renderer.js';
import type { FragmentEvaluator } from './renderer.js';
import { expression_evaluate } from '../execution/evaluator.js';
import { commandContext_create } from '../execution/runner.js';
import { CapabilityRegistry } from '../capabilities/registry.js';
import { RenderError } from '../errors.js';
import type { LiterateFragment, LiterateTarget } from '../graph/types.js';

const SOURCE: string = [
    '# Report',
    '',
    '```cairn',
    'load("a") + 1',
    '```',
    '',
    '```python',
    'read("ignored")',
    '```',
    '',
    '~~~cairn',
    'a * 10',
    '~~~',
    '',
].join('\n');

function target_create(source: string, output: string | null = null): LiterateTarget {
    return {
        variant: 'literate',
        format: 'file',
        name: 'report',
        packages: [],
        cue: 'thorough',
        document: 'report.md',
        output,
        source,
        fragments: fragments_extract(source),
    };
}

function evaluator_create(values: Record<string, unknown>): FragmentEvaluator {
    return (fragment: LiterateFragment, scope: Map<string, unknown>) =>
        expression_evaluate(fragment.expr, {
            scope,
            retrieve: (name: string) => Promise.resolve(values[name]),
            symbol: (name: string) => Promise.reject(new Error(`'${name}' is not bound`)),
            capabilities: new CapabilityRegistry(),
            command: commandContext_create('report', 1, '/', []),
        });
}

describe('dag/literate/document', () => {
    it('should find only cairn fences', () => {
        const fragments = fragments_extract(SOURCE);
        expect(fragments.map(f => f.code)).toEqual(['load("a") + 1', 'a * 10']);
        expect(fragments.map(f => f.index)).toEqual([0, 1]);
    });

    it('should record fence offsets spanning opening to closing line', () => {
        const [first] = fragments_extract(SOURCE);
        expect(SOURCE.slice(first.start, first.end)).toBe('```cairn\nload("a") + 1\n```');
    });

    it('should accept the braced info string form', () => {
        expect(info_isExecutable('{cairn}')).toBe(true);
        expect(info_isExecutable('cairn title="x"')).toBe(true);
        expect(info_isExecutable('cairnish')).toBe(false);
        expect(info_isExecutable('')).toBe(false);
    });

    it('should ignore read() calls in prose', () => {
        expect(fragments_extract('See read("x") for details.\n')).toEqual([]);
    });

    it('should leave an unterminated fence out', () => {
        expect(fragments_extract('```cairn\n1 + 1\n')).toEqual([]);
    });

    it('should raise on a fragment that does not parse', () => {
        expect(() => fragments_extract('```cairn\n1 +\n```\n')).toThrow('Unexpected end of command');
    });
});

describe('dag/literate/renderer', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'cairn-literate-'));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('should default the report path beside the source', () => {
        expect(outputPath_default('report.md')).toBe('report.rendered.md');
        expect(outputPath_default('docs/summary.markdown')).toBe(join('docs', 'summary.rendered.md'));
    });

    it('should print strings raw and other values as JSON', () => {
        expect(result_print('plain')).toBe('plain');
        expect(result_print(3)).toBe('3');
        expect(result_print({ k: [1] })).toBe('{\n  "k": [\n    1\n  ]\n}');
    });

    it('should replace each fragment with its result and keep the rest', async () => {
        const output = await new MarkdownRenderer().render({
            target: target_create(SOURCE),
            root,
            evaluate: evaluator_create({ a: 2 }),
        });
        expect(output).toBe('report.rendered.md');
        const rendered: string = await readFile(join(root, 'report.rendered.md'), 'utf-8');
        expect(rendered).toBe([
            '# Report',
            '',
            '```text',
            '3',
            '```',
            '',
            '```python',
            'read("ignored")',
            '```',
            '',
            '```text',
            '20',
            '```',
            '',
        ].join('\n'));
    });

    it('should write to the declared output path', async () => {
        const output = await new MarkdownRenderer().render({
            target: target_create('```cairn\n"hi"\n```\n', 'out/final.md'),
            root,
            evaluate: evaluator_create({}),
        });
        expect(output).toBe('out/final.md');
        expect(await readFile(join(root, 'out', 'final.md'), 'utf-8')).toBe('```text\nhi\n```\n');
    });

    it('should raise RenderError naming the failing fragment', async () => {
        const render = new MarkdownRenderer().render({
            target: target_create('```cairn\n1\n```\n\n```cairn\nfail("nope")\n```\n'),
            root,
            evaluate: evaluator_create({}),
        });
        await expect(render).rejects.toBeInstanceOf(RenderError);
        await expect(new MarkdownRenderer().render({
            target: target_create('```cairn\nfail("nope")\n```\n'),
            root,
            evaluate: evaluator_create({}),
        })).rejects.toThrow("fragment 1 of 'report.md' failed: nope");
    });

    it('should reject bare names the document never loaded', async () => {
        await expect(new MarkdownRenderer().render({
            target: target_create('```cairn\nb + 1\n```\n'),
            root,
            evaluate: evaluator_create({ b: 1 }),
        })).rejects.toThrow("'b' is not bound");
    });
});

/**
 * @file Literate Document Fragments
 *
 * Finds the executable fragments of a Markdown document. A fragment is
 * a fenced block whose info string is `cairn` (or `{cairn}`); every
 * other fence and all prose are inert, so a `read("x")` written in
 * prose never creates a dependency.
 *
 * @module dag/literate
 */

import { expression_parse } from '../graph/parser/expression.js';
import type { LiterateFragment } from '../graph/types.js';

export const FRAGMENT_LANGUAGE = 'cairn';

interface Fence {
    marker: string;
    info: string;
    bodyStart: number;
    start: number;
}

/** Info string of an opening fence, or null when the line is not one. */
function fence_open(line: string): { marker: string; info: string } | null {
    const match: RegExpMatchArray | null = line.match(/^ {0,3}(`{3,}|~{3,})(.*)$/);
    if (!match) return null;
    const marker: string = match[1];
    const info: string = match[2].trim();
    // Backtick fences may not carry backticks in their info string.
    if (marker[0] === '`' && info.includes('`')) return null;
    return { marker, info };
}

function fence_closes(line: string, marker: string): boolean {
    const match: RegExpMatchArray | null = line.match(/^ {0,3}(`{3,}|~{3,})\s*$/);
    return !!match && match[1][0] === marker[0] && match[1].length >= marker.length;
}

/** Whether a fence info string marks an executable fragment. */
export function info_isExecutable(info: string): boolean {
    const word: string = info.split(/\s+/)[0] ?? '';
    return word === FRAGMENT_LANGUAGE || word === `{${FRAGMENT_LANGUAGE}}`;
}

/**
 * Extract and parse every executable fragment of a document.
 *
 * @throws ExpressionSyntaxError when a fragment does not parse
 */
export function fragments_extract(source: string): LiterateFragment[] {
    const fragments: LiterateFragment[] = [];
    let open: Fence | null = null;
    let offset = 0;

    for (const line of source.split('\n')) {
        const lineStart: number = offset;
        const lineEnd: number = offset + line.length;
        offset = lineEnd + 1;

        if (!open) {
            const fence = fence_open(line);
            if (fence) {
                open = { marker: fence.marker, info: fence.info, bodyStart: offset, start: lineStart };
            }
            continue;
        }

        if (fence_closes(line, open.marker)) {
            if (info_isExecutable(open.info)) {
                const code: string = source.slice(open.bodyStart, Math.max(open.bodyStart, lineStart - 1));
                fragments.push({
                    index: fragments.length,
                    code,
                    expr: expression_parse(code),
                    start: open.start,
                    end: Math.min(lineEnd, source.length),
                });
            }
            open = null;
        }
    }

    return fragments;
}

/**
 * @file Bundled Capabilities
 *
 * Two small capabilities shipped with the engine: `fsio` for commands
 * that read and write files relative to the pipeline root, and `std`
 * for list and number helpers. Both are ordinary capabilities; a
 * pipeline must still declare them in `packages`.
 *
 * @module dag/capabilities
 */

import { mkdirSync, readFileSync, writeFileSync, existsSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { value_serialize } from '../fingerprint/serialize.js';
import type { Capability, CommandContext } from './types.js';

function path_resolve(context: CommandContext, filePath: unknown): string {
    if (typeof filePath !== 'string' || filePath.length === 0) {
        throw new TypeError('expected a non-empty path string');
    }
    return isAbsolute(filePath) ? filePath : resolve(context.root, filePath);
}

function text_write(context: CommandContext, filePath: unknown, text: string): string {
    const absolute: string = path_resolve(context, filePath);
    mkdirSync(dirname(absolute), { recursive: true });
    writeFileSync(absolute, text);
    return String(filePath);
}

function numbers_expect(value: unknown, fn: string): number[] {
    if (!Array.isArray(value) || !value.every((item: unknown) => typeof item === 'number')) {
        throw new TypeError(`std.${fn} expects a list of numbers`);
    }
    return value;
}

export const fsio: Capability = {
    name: 'fsio',
    version: '1.0.0',
    functions: {
        /** Write text (non-strings are canonical JSON) and return the path. */
        writeText: (context, filePath, content) =>
            text_write(context, filePath, typeof content === 'string' ? content : value_serialize(content)),
        writeJson: (context, filePath, content) =>
            text_write(context, filePath, JSON.stringify(content, null, 2) + '\n'),
        readText: (context, filePath) => readFileSync(path_resolve(context, filePath), 'utf-8'),
        readJson: (context, filePath): unknown => JSON.parse(readFileSync(path_resolve(context, filePath), 'utf-8')),
        exists: (context, filePath) => existsSync(path_resolve(context, filePath)),
    },
};

export const std: Capability = {
    name: 'std',
    version: '1.0.0',
    functions: {
        length: (_context, value) => {
            if (typeof value === 'string' || Array.isArray(value)) return value.length;
            throw new TypeError('std.length expects a string or list');
        },
        sum: (_context, value) => numbers_expect(value, 'sum').reduce((acc, n) => acc + n, 0),
        mean: (_context, value) => {
            const numbers: number[] = numbers_expect(value, 'mean');
            if (numbers.length === 0) throw new RangeError('std.mean of an empty list');
            return numbers.reduce((acc, n) => acc + n, 0) / numbers.length;
        },
        range: (_context, from, to) => {
            if (typeof from !== 'number' || typeof to !== 'number') {
                throw new TypeError('std.range expects two numbers');
            }
            const out: number[] = [];
            for (let i = from; i < to; i++) out.push(i);
            return out;
        },
        round: (_context, value, digits = 0) => {
            if (typeof value !== 'number' || typeof digits !== 'number') {
                throw new TypeError('std.round expects numbers');
            }
            const factor: number = 10 ** digits;
            return Math.round(value * factor) / factor;
        },
        join: (_context, value, separator = '') => {
            if (!Array.isArray(value)) throw new TypeError('std.join expects a list');
            return value.map(item => String(item)).join(String(separator));
        },
    },
};

export const BUNDLED_CAPABILITIES: Capability[] = [fsio, std];

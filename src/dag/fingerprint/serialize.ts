/**
 * @file Canonical Value Serializer
 *
 * Produces the byte representation that value digests are taken over:
 * JSON with object keys sorted and no insignificant whitespace, so two
 * structurally equal values always serialize identically.
 *
 * Only plain data has a canonical form. Functions, symbols, bigints,
 * non-finite numbers, class instances and cyclic structures raise a
 * SerializationError. `undefined` object properties are dropped, as
 * JSON does.
 *
 * @module dag/fingerprint
 */

import { SerializationError } from '../errors.js';
import type { JsonValue } from './types.js';

/**
 * Serialize a value to canonical JSON.
 *
 * @throws SerializationError when the value has no canonical form
 */
export function value_serialize(value: unknown): string {
    return node_serialize(value, '$', new Set<object>());
}

/** Parse canonical JSON back into a value. */
export function value_deserialize(text: string): JsonValue {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
}

/** Whether a value survives `value_serialize`. */
export function value_isSerializable(value: unknown): boolean {
    try {
        value_serialize(value);
        return true;
    } catch (error: unknown) {
        if (error instanceof SerializationError) return false;
        throw error;
    }
}

function node_serialize(value: unknown, at: string, ancestors: Set<object>): string {
    if (value === null) return 'null';

    switch (typeof value) {
        case 'boolean':
            return value ? 'true' : 'false';
        case 'string':
            return JSON.stringify(value);
        case 'number':
            if (!Number.isFinite(value)) {
                throw new SerializationError(`${at}: non-finite number ${String(value)}`);
            }
            return JSON.stringify(value);
        case 'undefined':
            throw new SerializationError(`${at}: undefined`);
        case 'bigint':
        case 'symbol':
        case 'function':
            throw new SerializationError(`${at}: ${typeof value} values cannot be serialized`);
        default:
            break;
    }

    if (typeof value !== 'object') {
        throw new SerializationError(`${at}: unsupported value`);
    }
    if (ancestors.has(value)) {
        throw new SerializationError(`${at}: cyclic structure`);
    }

    ancestors.add(value);
    try {
        if (Array.isArray(value)) {
            const items: string[] = value.map((item: unknown, i: number) =>
                node_serialize(item, `${at}[${i}]`, ancestors),
            );
            return `[${items.join(',')}]`;
        }

        const proto: unknown = Object.getPrototypeOf(value);
        if (proto !== Object.prototype && proto !== null) {
            const ctor: string = value.constructor?.name ?? 'object';
            throw new SerializationError(`${at}: ${ctor} instances cannot be serialized`);
        }

        const fields: string[] = [];
        for (const key of Object.keys(value).sort()) {
            const field: unknown = Reflect.get(value, key);
            if (field === undefined) continue;
            fields.push(`${JSON.stringify(key)}:${node_serialize(field, `${at}.${key}`, ancestors)}`);
        }
        return `{${fields.join(',')}}`;
    } finally {
        ancestors.delete(value);
    }
}

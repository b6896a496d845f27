/**
 * @file Command Evaluator
 *
 * Evaluates a parsed command against a scope. Symbols resolve through
 * the scope first and then through `symbol()`; `read` / `load` go
 * through `retrieve()`, and `load` also binds the name into the scope
 * so later fragments of the same document can use it bare.
 *
 * @module dag/execution
 */

import { TargetError } from '../errors.js';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { CommandContext } from '../capabilities/types.js';
import type { BinaryOperator, Expr } from '../graph/types.js';

/**
 * @property scope - Names bound for this evaluation (mutated by `load`)
 * @property retrieve - Value of another target, for `read` / `load`
 * @property symbol - Fallback for bare names missing from `scope`
 */
export interface EvaluationContext {
    scope: Map<string, unknown>;
    retrieve(name: string): Promise<unknown>;
    symbol(name: string): Promise<unknown>;
    capabilities: CapabilityRegistry;
    command: CommandContext;
}

function kind_describe(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'list';
    return typeof value;
}

function record_is(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function binary_apply(op: BinaryOperator, left: unknown, right: unknown): unknown {
    if (op === '+') {
        if (typeof left === 'number' && typeof right === 'number') return left + right;
        if (typeof left === 'string' && typeof right === 'string') return left + right;
        if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
        throw new TypeError(`cannot apply '+' to ${kind_describe(left)} and ${kind_describe(right)}`);
    }
    if (typeof left !== 'number' || typeof right !== 'number') {
        throw new TypeError(`cannot apply '${op}' to ${kind_describe(left)} and ${kind_describe(right)}`);
    }
    switch (op) {
        case '-':
            return left - right;
        case '*':
            return left * right;
        case '/':
        case '%':
            if (right === 0) throw new RangeError('division by zero');
            return op === '/' ? left / right : left % right;
    }
}

function member_get(object: unknown, property: unknown): unknown {
    if (Array.isArray(object)) {
        if (typeof property !== 'number' || !Number.isInteger(property)) {
            throw new TypeError(`list index must be an integer, got ${kind_describe(property)}`);
        }
        const index: number = property < 0 ? object.length + property : property;
        if (index < 0 || index >= object.length) {
            throw new RangeError(`index ${property} out of range for list of length ${object.length}`);
        }
        return object[index];
    }
    if (typeof object === 'string' && property === 'length') {
        return object.length;
    }
    if (record_is(object)) {
        if (typeof property !== 'string' && typeof property !== 'number') {
            throw new TypeError(`field name must be a string, got ${kind_describe(property)}`);
        }
        const key: string = String(property);
        if (!Object.prototype.hasOwnProperty.call(object, key)) {
            throw new TypeError(`no field '${key}'`);
        }
        return object[key];
    }
    throw new TypeError(`cannot access a field of ${kind_describe(object)}`);
}

async function builtin_call(name: string, args: unknown[], context: EvaluationContext): Promise<unknown> {
    switch (name) {
        case 'warn': {
            context.command.warn(String(args[0] ?? 'warning'));
            return args.length > 1 ? args[1] : null;
        }
        case 'fail':
            throw new TargetError(context.command.target, String(args[0] ?? 'failed'));
        case 'random':
            return context.command.random();
        default:
            throw new TypeError(`unknown function '${name}'`);
    }
}

/** Evaluate a command expression to a value. */
export async function expression_evaluate(expr: Expr, context: EvaluationContext): Promise<unknown> {
    switch (expr.kind) {
        case 'literal':
            return expr.value;
        case 'symbol':
            if (context.scope.has(expr.name)) return context.scope.get(expr.name);
            return context.symbol(expr.name);
        case 'read':
            return context.retrieve(expr.target);
        case 'load': {
            const value: unknown = await context.retrieve(expr.target);
            context.scope.set(expr.target, value);
            return value;
        }
        case 'call': {
            const args: unknown[] = [];
            for (const arg of expr.args) {
                args.push(await expression_evaluate(arg, context));
            }
            if (!expr.callee.includes('.')) {
                return builtin_call(expr.callee, args, context);
            }
            const fn = context.capabilities.function_resolve(expr.callee);
            if (!fn) throw new TypeError(`unknown capability function '${expr.callee}'`);
            return await fn(context.command, ...args);
        }
        case 'binary': {
            const left: unknown = await expression_evaluate(expr.left, context);
            const right: unknown = await expression_evaluate(expr.right, context);
            return binary_apply(expr.op, left, right);
        }
        case 'negate': {
            const operand: unknown = await expression_evaluate(expr.operand, context);
            if (typeof operand !== 'number') throw new TypeError(`cannot negate ${kind_describe(operand)}`);
            return -operand;
        }
        case 'member': {
            const object: unknown = await expression_evaluate(expr.object, context);
            const property: unknown = await expression_evaluate(expr.property, context);
            return member_get(object, property);
        }
        case 'array': {
            const items: unknown[] = [];
            for (const item of expr.items) {
                items.push(await expression_evaluate(item, context));
            }
            return items;
        }
        case 'object': {
            const fields: Record<string, unknown> = {};
            for (const [key, value] of expr.fields) {
                fields[key] = await expression_evaluate(value, context);
            }
            return fields;
        }
    }
}

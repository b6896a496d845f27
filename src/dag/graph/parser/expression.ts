/**
 * @file Command Expression Parser
 *
 * Parses command text into the `Expr` tree that every later stage
 * (reference discovery, digesting, evaluation) works on, and prints a
 * tree back into canonical text. The command digest is taken over the
 * canonical text, so reformatting a command never invalidates it.
 *
 * Grammar (lowest to highest precedence):
 *
 *     expr     := additive
 *     additive := multiplicative (('+' | '-') multiplicative)*
 *     multiplicative := unary (('*' | '/' | '%') unary)*
 *     unary    := '-' unary | postfix
 *     postfix  := primary ('.' IDENT | '[' expr ']')*
 *     primary  := NUMBER | STRING | 'true' | 'false' | 'null'
 *               | IDENT ('.' IDENT)* '(' args ')'      -- call
 *               | IDENT                                -- symbol
 *               | '(' expr ')' | '[' items ']' | '{' fields '}'
 *
 * `read("t")` and `load("t")` are parsed into dedicated nodes and must
 * name their target with a single string literal.
 *
 * @module dag/graph/parser
 */

import { CairnError } from '../../errors.js';
import { value_serialize } from '../../fingerprint/serialize.js';
import type { BinaryOperator, BuiltinName, Expr } from '../types.js';

export const BUILTINS: readonly BuiltinName[] = ['warn', 'fail', 'random'];

const RETRIEVERS = new Set(['read', 'load']);
const KEYWORDS = new Set(['true', 'false', 'null']);

/** Command text that does not parse. */
export class ExpressionSyntaxError extends CairnError {
    readonly position: number;

    constructor(message: string, position: number) {
        super('EXPRESSION_SYNTAX', `${message} at offset ${position}`);
        this.position = position;
    }
}

// ─── Tokenizer ──────────────────────────────────────────────────

export type TokenKind = 'number' | 'string' | 'ident' | 'punct' | 'eof';

export interface Token {
    kind: TokenKind;
    text: string;
    /** Decoded value for number and string tokens. */
    value: number | string | null;
    position: number;
}

const PUNCTUATION = new Set(['+', '-', '*', '/', '%', '(', ')', '[', ']', '{', '}', ',', '.', ':']);

const ESCAPES: Record<string, string> = {
    n: '\n',
    t: '\t',
    r: '\r',
    '\\': '\\',
    '"': '"',
    "'": "'",
};

/** Split command text into tokens. `#` starts a comment to end of line. */
export function expression_tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;

    while (i < source.length) {
        const ch: string = source[i];

        if (/\s/.test(ch)) {
            i++;
            continue;
        }
        if (ch === '#') {
            while (i < source.length && source[i] !== '\n') i++;
            continue;
        }

        const start: number = i;

        if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(source[i + 1] ?? ''))) {
            const match: RegExpMatchArray | null = source.slice(i).match(/^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/);
            const text: string = match ? match[0] : ch;
            const value: number = Number(text);
            if (!Number.isFinite(value)) {
                throw new ExpressionSyntaxError(`Number '${text}' is out of range`, start);
            }
            tokens.push({ kind: 'number', text, value, position: start });
            i += text.length;
            continue;
        }

        if (ch === '"' || ch === "'") {
            let value = '';
            i++;
            while (i < source.length && source[i] !== ch) {
                if (source[i] === '\\') {
                    const escaped: string | undefined = ESCAPES[source[i + 1] ?? ''];
                    if (escaped === undefined) {
                        throw new ExpressionSyntaxError(`Unknown escape '\\${source[i + 1] ?? ''}'`, i);
                    }
                    value += escaped;
                    i += 2;
                    continue;
                }
                value += source[i];
                i++;
            }
            if (i >= source.length) {
                throw new ExpressionSyntaxError('Unterminated string', start);
            }
            i++;
            tokens.push({ kind: 'string', text: source.slice(start, i), value, position: start });
            continue;
        }

        if (/[A-Za-z_]/.test(ch)) {
            const match: RegExpMatchArray | null = source.slice(i).match(/^[A-Za-z_][A-Za-z0-9_]*/);
            const text: string = match ? match[0] : ch;
            tokens.push({ kind: 'ident', text, value: null, position: start });
            i += text.length;
            continue;
        }

        if (PUNCTUATION.has(ch)) {
            tokens.push({ kind: 'punct', text: ch, value: null, position: start });
            i++;
            continue;
        }

        throw new ExpressionSyntaxError(`Unexpected character '${ch}'`, start);
    }

    tokens.push({ kind: 'eof', text: '', value: null, position: source.length });
    return tokens;
}

// ─── Parser ─────────────────────────────────────────────────────

/**
 * Parse command text into an expression tree.
 *
 * @throws ExpressionSyntaxError on malformed input
 */
export function expression_parse(source: string): Expr {
    const parser = new ExpressionParser(expression_tokenize(source));
    const expr: Expr = parser.expr_parse();
    parser.end_expect();
    return expr;
}

class ExpressionParser {
    private index = 0;

    constructor(private readonly tokens: Token[]) {}

    expr_parse(): Expr {
        return this.additive_parse();
    }

    end_expect(): void {
        const token: Token = this.peek();
        if (token.kind !== 'eof') {
            throw new ExpressionSyntaxError(`Unexpected '${token.text}'`, token.position);
        }
    }

    private additive_parse(): Expr {
        let left: Expr = this.multiplicative_parse();
        for (let op = this.operator_take(['+', '-']); op; op = this.operator_take(['+', '-'])) {
            const right: Expr = this.multiplicative_parse();
            left = { kind: 'binary', op, left, right };
        }
        return left;
    }

    private multiplicative_parse(): Expr {
        let left: Expr = this.unary_parse();
        for (let op = this.operator_take(['*', '/', '%']); op; op = this.operator_take(['*', '/', '%'])) {
            const right: Expr = this.unary_parse();
            left = { kind: 'binary', op, left, right };
        }
        return left;
    }

    /** Consume the next token if it is one of `operators`. */
    private operator_take(operators: BinaryOperator[]): BinaryOperator | null {
        const token: Token = this.peek();
        if (token.kind !== 'punct') return null;
        const op: BinaryOperator | undefined = operators.find((candidate: BinaryOperator) => candidate === token.text);
        if (!op) return null;
        this.advance();
        return op;
    }

    private unary_parse(): Expr {
        if (this.punct_is('-')) {
            this.advance();
            return { kind: 'negate', operand: this.unary_parse() };
        }
        return this.postfix_parse();
    }

    private postfix_parse(): Expr {
        let expr: Expr = this.primary_parse();
        for (;;) {
            if (this.punct_is('.')) {
                this.advance();
                const name: Token = this.expect('ident');
                expr = { kind: 'member', object: expr, property: { kind: 'literal', value: name.text } };
                continue;
            }
            if (this.punct_is('[')) {
                this.advance();
                const property: Expr = this.expr_parse();
                this.punct_expect(']');
                expr = { kind: 'member', object: expr, property };
                continue;
            }
            return expr;
        }
    }

    private primary_parse(): Expr {
        const token: Token = this.peek();

        switch (token.kind) {
            case 'number':
            case 'string':
                this.advance();
                return { kind: 'literal', value: token.value };
            case 'ident':
                return this.identifier_parse();
            case 'punct':
                if (token.text === '(') {
                    this.advance();
                    const inner: Expr = this.expr_parse();
                    this.punct_expect(')');
                    return inner;
                }
                if (token.text === '[') return this.array_parse();
                if (token.text === '{') return this.object_parse();
                break;
            default:
                break;
        }
        throw new ExpressionSyntaxError(
            token.kind === 'eof' ? 'Unexpected end of command' : `Unexpected '${token.text}'`,
            token.position,
        );
    }

    private identifier_parse(): Expr {
        const first: Token = this.advance();
        if (KEYWORDS.has(first.text)) {
            return { kind: 'literal', value: first.text === 'null' ? null : first.text === 'true' };
        }

        // `a.b.c(` is a dotted callee; otherwise the dots are member access.
        const path: string[] = [first.text];
        let j: number = this.index;
        while (this.tokens[j].text === '.' && this.tokens[j + 1]?.kind === 'ident') {
            path.push(this.tokens[j + 1].text);
            j += 2;
        }
        if (this.tokens[j].kind !== 'punct' || this.tokens[j].text !== '(') {
            return { kind: 'symbol', name: first.text };
        }

        this.index = j + 1;
        const args: Expr[] = this.list_parse(')');
        const callee: string = path.join('.');

        if (RETRIEVERS.has(callee)) {
            const only: Expr | undefined = args[0];
            if (args.length !== 1 || !only || only.kind !== 'literal' || typeof only.value !== 'string') {
                throw new ExpressionSyntaxError(`${callee}() takes one string literal naming a target`, first.position);
            }
            return callee === 'read'
                ? { kind: 'read', target: only.value }
                : { kind: 'load', target: only.value };
        }
        if (path.length === 1 && !builtin_is(callee)) {
            throw new ExpressionSyntaxError(`Unknown function '${callee}'`, first.position);
        }
        return { kind: 'call', callee, args };
    }

    private array_parse(): Expr {
        this.advance();
        return { kind: 'array', items: this.list_parse(']') };
    }

    private object_parse(): Expr {
        this.advance();
        const fields: Array<[string, Expr]> = [];
        while (!this.punct_is('}')) {
            const key: Token = this.advance();
            if (key.kind !== 'ident' && key.kind !== 'string') {
                throw new ExpressionSyntaxError('Expected object key', key.position);
            }
            this.punct_expect(':');
            fields.push([key.kind === 'string' ? String(key.value) : key.text, this.expr_parse()]);
            if (!this.punct_is('}')) this.punct_expect(',');
        }
        this.advance();
        return { kind: 'object', fields };
    }

    /** Comma-separated expressions up to `close`; a trailing comma is allowed. */
    private list_parse(close: string): Expr[] {
        const items: Expr[] = [];
        while (!this.punct_is(close)) {
            items.push(this.expr_parse());
            if (!this.punct_is(close)) this.punct_expect(',');
        }
        this.advance();
        return items;
    }

    private peek(): Token {
        return this.tokens[this.index];
    }

    private advance(): Token {
        const token: Token = this.tokens[this.index];
        if (token.kind !== 'eof') this.index++;
        return token;
    }

    private punct_is(text: string): boolean {
        const token: Token = this.peek();
        return token.kind === 'punct' && token.text === text;
    }

    private punct_expect(text: string): void {
        const token: Token = this.peek();
        if (!this.punct_is(text)) {
            throw new ExpressionSyntaxError(
                token.kind === 'eof' ? `Expected '${text}' before end of command` : `Expected '${text}' but found '${token.text}'`,
                token.position,
            );
        }
        this.advance();
    }

    private expect(kind: TokenKind): Token {
        const token: Token = this.peek();
        if (token.kind !== kind) {
            throw new ExpressionSyntaxError(`Expected ${kind}`, token.position);
        }
        return this.advance();
    }
}

export function builtin_is(name: string): name is BuiltinName {
    return BUILTINS.some((builtin: BuiltinName) => builtin === name);
}

// ─── Printer ────────────────────────────────────────────────────

const PRECEDENCE: Record<BinaryOperator, number> = {
    '+': 1,
    '-': 1,
    '*': 2,
    '/': 2,
    '%': 2,
};
const UNARY_PRECEDENCE = 3;
const ATOM_PRECEDENCE = 4;

function precedence_of(expr: Expr): number {
    if (expr.kind === 'binary') return PRECEDENCE[expr.op];
    if (expr.kind === 'negate') return UNARY_PRECEDENCE;
    return ATOM_PRECEDENCE;
}

/** Print an expression in canonical form. */
export function expression_print(expr: Expr): string {
    switch (expr.kind) {
        case 'literal':
            return value_serialize(expr.value);
        case 'symbol':
            return expr.name;
        case 'read':
        case 'load':
            return `${expr.kind}(${JSON.stringify(expr.target)})`;
        case 'call':
            return `${expr.callee}(${expr.args.map(expression_print).join(', ')})`;
        case 'binary': {
            const own: number = PRECEDENCE[expr.op];
            const left: string = precedence_of(expr.left) < own
                ? `(${expression_print(expr.left)})`
                : expression_print(expr.left);
            const right: string = precedence_of(expr.right) <= own
                ? `(${expression_print(expr.right)})`
                : expression_print(expr.right);
            return `${left} ${expr.op} ${right}`;
        }
        case 'negate': {
            const inner: string = expression_print(expr.operand);
            return precedence_of(expr.operand) < ATOM_PRECEDENCE ? `-(${inner})` : `-${inner}`;
        }
        case 'member': {
            const object: string = precedence_of(expr.object) < ATOM_PRECEDENCE
                ? `(${expression_print(expr.object)})`
                : expression_print(expr.object);
            const property: Expr = expr.property;
            if (property.kind === 'literal' && typeof property.value === 'string' && /^[A-Za-z_][A-Za-z0-9_]*$/.test(property.value)) {
                return `${object}.${property.value}`;
            }
            return `${object}[${expression_print(property)}]`;
        }
        case 'array':
            return `[${expr.items.map(expression_print).join(', ')}]`;
        case 'object':
            return `{${expr.fields.map(([key, value]) => `${JSON.stringify(key)}: ${expression_print(value)}`).join(', ')}}`;
    }
}

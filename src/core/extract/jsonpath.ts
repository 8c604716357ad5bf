/**
 * JSON Path Evaluator
 *
 * Compiles JSONPath-style expressions and evaluates them against arbitrary
 * JSON trees, returning matches in a deterministic order.
 *
 * Supported syntax:
 *   $                 root (optional; `a.b` is read as `$.a.b`)
 *   .name ['name']    object member
 *   [n]               array element, negative counts from the end
 *   [start:end:step]  array slice (step > 0)
 *   * [*]             every member/element
 *   ..name ..* ..[ ]  recursive descent
 *   [a,b]             union
 *
 * Traversal order decides which match comes first:
 *   - wildcards visit array elements by index and object members in
 *     JavaScript property order (integer-like keys ascending, then insertion order)
 *   - recursive descent is depth-first pre-order, the node before its children
 *   - union members are visited in the order they are written
 */

import type { JsonValue } from '../types.js';
import { isJsonObject } from '../types.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type JsonPathSelector =
  | { kind: 'name'; name: string }
  | { kind: 'wildcard' }
  | { kind: 'index'; index: number }
  | { kind: 'slice'; start: number | null; end: number | null; step: number };

export interface JsonPathSegment {
  /** Apply selectors to every descendant (including the node itself) */
  descendant: boolean;
  selectors: JsonPathSelector[];
}

export class JsonPathSyntaxError extends Error {
  constructor(
    public readonly expression: string,
    public readonly position: number,
    reason: string
  ) {
    super(`Invalid JSON path '${expression}' at position ${position}: ${reason}`);
    this.name = 'JsonPathSyntaxError';
  }
}

// -----------------------------------------------------------------------------
// Parser
// -----------------------------------------------------------------------------

const NAME_CHAR = /[^.[\]\s'"(),*?@]/;
const INTEGER = /-?\d+/y;

class JsonPathParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): JsonPathSegment[] {
    const segments: JsonPathSegment[] = [];

    if (this.source.length === 0) {
      throw this.error('expression is empty');
    }

    if (this.peek() === '$') {
      this.pos++;
    } else if (this.isNameChar(this.peek())) {
      // Bare leading name, e.g. `progress.value`
      segments.push({ descendant: false, selectors: [{ kind: 'name', name: this.readName() }] });
    }

    while (this.pos < this.source.length) {
      segments.push(this.parseSegment());
    }

    return segments;
  }

  private parseSegment(): JsonPathSegment {
    if (this.source.startsWith('..', this.pos)) {
      this.pos += 2;
      return { descendant: true, selectors: this.parseSelectorsAfterDot() };
    }

    const ch = this.peek();

    if (ch === '.') {
      this.pos++;
      return { descendant: false, selectors: this.parseSelectorsAfterDot() };
    }

    if (ch === '[') {
      return { descendant: false, selectors: this.parseBracket() };
    }

    throw this.error(`unexpected character '${ch}'`);
  }

  private parseSelectorsAfterDot(): JsonPathSelector[] {
    const ch = this.peek();

    if (ch === '*') {
      this.pos++;
      return [{ kind: 'wildcard' }];
    }

    if (ch === '[') {
      return this.parseBracket();
    }

    if (!this.isNameChar(ch)) {
      throw this.error('expected a member name');
    }

    return [{ kind: 'name', name: this.readName() }];
  }

  private parseBracket(): JsonPathSelector[] {
    this.expect('[');
    const selectors: JsonPathSelector[] = [];

    for (;;) {
      this.skipWhitespace();
      selectors.push(this.parseBracketSelector());
      this.skipWhitespace();

      const ch = this.peek();
      this.pos++;

      if (ch === ']') break;
      if (ch !== ',') {
        this.pos--;
        throw this.error(ch === '' ? "missing ']'" : `unexpected character '${ch}' in brackets`);
      }
    }

    return selectors;
  }

  private parseBracketSelector(): JsonPathSelector {
    const ch = this.peek();

    if (ch === '*') {
      this.pos++;
      return { kind: 'wildcard' };
    }

    if (ch === "'" || ch === '"') {
      return { kind: 'name', name: this.readQuoted(ch) };
    }

    if (ch === '-' || ch === ':' || (ch >= '0' && ch <= '9')) {
      return this.parseIndexOrSlice();
    }

    throw this.error(ch === '' ? "missing ']'" : `unsupported selector starting with '${ch}'`);
  }

  private parseIndexOrSlice(): JsonPathSelector {
    const first = this.readInteger();

    if (this.peek() !== ':') {
      if (first === null) throw this.error('expected an index');
      return { kind: 'index', index: first };
    }

    this.pos++;
    const end = this.readInteger();
    let step = 1;

    if (this.peek() === ':') {
      this.pos++;
      const parsedStep = this.readInteger();
      if (parsedStep !== null) {
        if (parsedStep <= 0) throw this.error('slice step must be positive');
        step = parsedStep;
      }
    }

    return { kind: 'slice', start: first, end, step };
  }

  private readInteger(): number | null {
    INTEGER.lastIndex = this.pos;
    const match = INTEGER.exec(this.source);
    if (!match) return null;

    this.pos += match[0].length;
    return Number.parseInt(match[0], 10);
  }

  private readName(): string {
    const start = this.pos;
    while (this.pos < this.source.length && this.isNameChar(this.peek())) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private readQuoted(quote: string): string {
    this.pos++;
    let result = '';

    while (this.pos < this.source.length) {
      const ch = this.peek();
      this.pos++;

      if (ch === quote) return result;

      if (ch === '\\') {
        const escaped = this.peek();
        if (escaped === '') break;
        result += escaped;
        this.pos++;
      } else {
        result += ch;
      }
    }

    throw this.error('unterminated string');
  }

  private expect(ch: string): void {
    if (this.peek() !== ch) {
      throw this.error(`expected '${ch}'`);
    }
    this.pos++;
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.peek())) {
      this.pos++;
    }
  }

  private peek(): string {
    return this.source.charAt(this.pos);
  }

  private isNameChar(ch: string): boolean {
    return ch !== '' && NAME_CHAR.test(ch);
  }

  private error(reason: string): JsonPathSyntaxError {
    return new JsonPathSyntaxError(this.source, this.pos, reason);
  }
}

// -----------------------------------------------------------------------------
// Evaluation
// -----------------------------------------------------------------------------

function* descendantsAndSelf(node: JsonValue): Generator<JsonValue> {
  yield node;

  if (Array.isArray(node)) {
    for (const child of node) {
      yield* descendantsAndSelf(child);
    }
  } else if (isJsonObject(node)) {
    for (const child of Object.values(node)) {
      yield* descendantsAndSelf(child);
    }
  }
}

function select(node: JsonValue, selector: JsonPathSelector, out: JsonValue[]): void {
  switch (selector.kind) {
    case 'name':
      if (isJsonObject(node) && Object.prototype.hasOwnProperty.call(node, selector.name)) {
        const value = node[selector.name];
        if (value !== undefined) out.push(value);
      }
      break;

    case 'wildcard':
      if (Array.isArray(node)) {
        out.push(...node);
      } else if (isJsonObject(node)) {
        out.push(...Object.values(node));
      }
      break;

    case 'index':
      if (Array.isArray(node)) {
        const value = node.at(selector.index);
        if (value !== undefined) out.push(value);
      }
      break;

    case 'slice':
      if (Array.isArray(node)) {
        const start = normaliseSliceBound(selector.start, 0, node.length);
        const end = normaliseSliceBound(selector.end, node.length, node.length);
        for (let i = start; i < end; i += selector.step) {
          const value = node[i];
          if (value !== undefined) out.push(value);
        }
      }
      break;
  }
}

function normaliseSliceBound(bound: number | null, fallback: number, length: number): number {
  if (bound === null) return fallback;
  if (bound < 0) return Math.max(length + bound, 0);
  return Math.min(bound, length);
}

/**
 * A compiled path expression. Compile once, evaluate per frame.
 */
export class JsonPath {
  readonly segments: readonly JsonPathSegment[];

  constructor(readonly expression: string) {
    this.segments = new JsonPathParser(expression).parse();
  }

  /**
   * Return every match in traversal order.
   */
  evaluate(root: JsonValue): JsonValue[] {
    let current: JsonValue[] = [root];

    for (const segment of this.segments) {
      const next: JsonValue[] = [];

      for (const node of current) {
        const targets = segment.descendant ? descendantsAndSelf(node) : [node];
        for (const target of targets) {
          for (const selector of segment.selectors) {
            select(target, selector, next);
          }
        }
      }

      current = next;
      if (current.length === 0) break;
    }

    return current;
  }

  /**
   * Return the first match, or undefined when nothing matches.
   */
  first(root: JsonValue): JsonValue | undefined {
    return this.evaluate(root)[0];
  }
}

/**
 * Compile an expression, throwing JsonPathSyntaxError when it is malformed.
 */
export function compileJsonPath(expression: string): JsonPath {
  return new JsonPath(expression);
}

/**
 * Check an expression without keeping the compiled form.
 */
export function isValidJsonPath(expression: string): boolean {
  try {
    compileJsonPath(expression);
    return true;
  } catch (error) {
    if (error instanceof JsonPathSyntaxError) return false;
    throw error;
  }
}

export function evaluateJsonPath(tree: JsonValue, expression: string): JsonValue[] {
  return compileJsonPath(expression).evaluate(tree);
}

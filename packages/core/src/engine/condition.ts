// packages/core/src/engine/condition.ts — Step condition expressions, evaluated without eval()

import { RequiredContextMissingError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { isPlainObject, stableStringify } from '../utils/objects.js';
import { extractTemplateReferences, resolvePath } from './template.js';
import type { TemplateScope } from './template.js';

/**
 * Grammar, lowest precedence first:
 *   or   := and ('or' and)*
 *   and  := not ('and' not)*
 *   not  := 'not' not | cmp
 *   cmp  := term (('==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in') term)?
 *   term := string | number | true | false | null | path | {{path}} | '(' or ')'
 */
export type ConditionNode =
  | { kind: 'literal'; value: string | number | boolean | null }
  | { kind: 'path'; path: string }
  | { kind: 'not'; operand: ConditionNode }
  | { kind: 'and' | 'or'; left: ConditionNode; right: ConditionNode }
  | { kind: 'compare'; op: CompareOp; left: ConditionNode; right: ConditionNode };

export type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';

export class ConditionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(`${message} in condition "${source}"`);
    this.name = 'ConditionSyntaxError';
  }
}

type Token =
  | { type: 'op'; value: CompareOp | '(' | ')' }
  | { type: 'keyword'; value: 'and' | 'or' | 'not' }
  | { type: 'literal'; value: string | number | boolean | null }
  | { type: 'path'; value: string };

const COMPARE_OPS = ['==', '!=', '<=', '>=', '<', '>'] as const;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (source.startsWith('{{', i)) {
      const end = source.indexOf('}}', i + 2);
      if (end === -1) throw new ConditionSyntaxError('Unclosed template', source);
      tokens.push({ type: 'path', value: source.slice(i + 2, end).trim() });
      i = end + 2;
      continue;
    }
    if (ch === '(' || ch === ')') {
      tokens.push({ type: 'op', value: ch });
      i++;
      continue;
    }
    const op = COMPARE_OPS.find((candidate) => source.startsWith(candidate, i));
    if (op) {
      tokens.push({ type: 'op', value: op });
      i += op.length;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const end = source.indexOf(ch, i + 1);
      if (end === -1) throw new ConditionSyntaxError('Unterminated string', source);
      tokens.push({ type: 'literal', value: source.slice(i + 1, end) });
      i = end + 1;
      continue;
    }
    const number = /^-?\d+(\.\d+)?/.exec(source.slice(i));
    if (number) {
      tokens.push({ type: 'literal', value: Number(number[0]) });
      i += number[0].length;
      continue;
    }
    const word = /^[A-Za-z_][\w.[\]]*/.exec(source.slice(i));
    if (!word) {
      throw new ConditionSyntaxError(`Unexpected character '${ch}'`, source);
    }
    tokens.push(wordToken(word[0]));
    i += word[0].length;
  }
  return tokens;
}

function wordToken(word: string): Token {
  const lower = word.toLowerCase();
  if (lower === 'and' || lower === 'or' || lower === 'not') return { type: 'keyword', value: lower };
  if (lower === 'in') return { type: 'op', value: 'in' };
  if (lower === 'true') return { type: 'literal', value: true };
  if (lower === 'false') return { type: 'literal', value: false };
  if (lower === 'null' || lower === 'none') return { type: 'literal', value: null };
  return { type: 'path', value: word };
}

class Parser {
  private pos = 0;

  constructor(
    private tokens: Token[],
    private source: string,
  ) {}

  parse(): ConditionNode {
    if (this.tokens.length === 0) throw new ConditionSyntaxError('Empty expression', this.source);
    const node = this.parseOr();
    if (this.pos < this.tokens.length) {
      throw new ConditionSyntaxError('Unexpected trailing tokens', this.source);
    }
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private isKeyword(value: 'and' | 'or' | 'not', offset = 0): boolean {
    const token = this.tokens[this.pos + offset];
    return token?.type === 'keyword' && token.value === value;
  }

  private parseOr(): ConditionNode {
    let left = this.parseAnd();
    while (this.isKeyword('or')) {
      this.pos++;
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionNode {
    let left = this.parseNot();
    while (this.isKeyword('and')) {
      this.pos++;
      left = { kind: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ConditionNode {
    if (this.isKeyword('not')) {
      this.pos++;
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseCompare();
  }

  private parseCompare(): ConditionNode {
    const left = this.parseTerm();
    const token = this.peek();
    if (this.isKeyword('not')) {
      const next = this.tokens[this.pos + 1];
      if (next?.type === 'op' && next.value === 'in') {
        this.pos += 2;
        return { kind: 'compare', op: 'not in', left, right: this.parseTerm() };
      }
    }
    if (token?.type === 'op' && token.value !== '(' && token.value !== ')') {
      this.pos++;
      return { kind: 'compare', op: token.value, left, right: this.parseTerm() };
    }
    return left;
  }

  private parseTerm(): ConditionNode {
    const token = this.peek();
    if (!token) throw new ConditionSyntaxError('Unexpected end of expression', this.source);
    this.pos++;
    if (token.type === 'literal') return { kind: 'literal', value: token.value };
    if (token.type === 'path') return { kind: 'path', path: token.value };
    if (token.type === 'op' && token.value === '(') {
      const inner = this.parseOr();
      const close = this.peek();
      if (close?.type !== 'op' || close.value !== ')') {
        throw new ConditionSyntaxError('Missing closing parenthesis', this.source);
      }
      this.pos++;
      return inner;
    }
    throw new ConditionSyntaxError(`Unexpected token '${String(token.value)}'`, this.source);
  }
}

export function parseCondition(source: string): ConditionNode {
  return new Parser(tokenize(source), source).parse();
}

/**
 * Decide whether a step runs. Unparseable or failing expressions count as false
 * (with a warning); a missing required context field still aborts the run.
 */
export function evaluateCondition(
  condition: string | boolean | undefined,
  scope: TemplateScope,
  logger: Logger = silentLogger,
): boolean {
  if (condition === undefined) return true;
  if (typeof condition === 'boolean') return condition;
  try {
    return isTruthy(evaluateNode(parseCondition(condition), scope));
  } catch (error) {
    if (error instanceof RequiredContextMissingError) throw error;
    logger.warn(`Failed to evaluate condition "${condition}": ${errorMessage(error)}`);
    return false;
  }
}

export function evaluateNode(node: ConditionNode, scope: TemplateScope): unknown {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'path':
      return resolvePath(node.path, scope);
    case 'not':
      return !isTruthy(evaluateNode(node.operand, scope));
    case 'and':
      return isTruthy(evaluateNode(node.left, scope)) && isTruthy(evaluateNode(node.right, scope));
    case 'or':
      return isTruthy(evaluateNode(node.left, scope)) || isTruthy(evaluateNode(node.right, scope));
    case 'compare':
      return compare(node.op, evaluateNode(node.left, scope), evaluateNode(node.right, scope));
  }
}

function compare(op: CompareOp, left: unknown, right: unknown): boolean {
  switch (op) {
    case '==':
      return looseEquals(left, right);
    case '!=':
      return !looseEquals(left, right);
    case 'in':
      return contains(right, left);
    case 'not in':
      return !contains(right, left);
    default:
      return order(op, left, right);
  }
}

function order(op: '<' | '<=' | '>' | '>=', left: unknown, right: unknown): boolean {
  let diff: number;
  if (typeof left === 'number' && typeof right === 'number') {
    diff = left - right;
  } else if (typeof left === 'string' && typeof right === 'string') {
    diff = left < right ? -1 : left > right ? 1 : 0;
  } else {
    return false;
  }
  switch (op) {
    case '<':
      return diff < 0;
    case '<=':
      return diff <= 0;
    case '>':
      return diff > 0;
    case '>=':
      return diff >= 0;
  }
}

/** Equality where null and undefined match each other and structures compare by value. */
export function looseEquals(left: unknown, right: unknown): boolean {
  if ((left === null || left === undefined) && (right === null || right === undefined)) return true;
  if (typeof left === 'object' && typeof right === 'object' && left !== null && right !== null) {
    return stableStringify(left) === stableStringify(right);
  }
  return left === right;
}

function contains(container: unknown, item: unknown): boolean {
  if (Array.isArray(container)) return container.some((entry) => looseEquals(entry, item));
  if (typeof container === 'string') return typeof item === 'string' && container.includes(item);
  if (isPlainObject(container)) return typeof item === 'string' && Object.hasOwn(container, item);
  return false;
}

/** false for undefined, null, false, 0, NaN, '', [] and {}. */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

/** Paths an expression reads, used to check step dependencies before running. */
export function conditionReferences(condition: string | boolean | undefined): string[] {
  if (typeof condition !== 'string') return [];
  try {
    const refs: string[] = [];
    collectPaths(parseCondition(condition), refs);
    return refs;
  } catch (error) {
    if (!(error instanceof ConditionSyntaxError)) throw error;
    return extractTemplateReferences(condition);
  }
}

function collectPaths(node: ConditionNode, refs: string[]): void {
  switch (node.kind) {
    case 'path':
      refs.push(node.path);
      return;
    case 'literal':
      return;
    case 'not':
      collectPaths(node.operand, refs);
      return;
    default:
      collectPaths(node.left, refs);
      collectPaths(node.right, refs);
  }
}

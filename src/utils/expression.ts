import jsep from 'jsep';
import { TemplateError, UndefinedVariableError, errorMessage } from '../errors.js';

// Word operators and literals of the template language. `|` applies a filter and binds tighter
// than comparisons, so `items | length > 2` compares the length.
jsep.addBinaryOp('or', 1);
jsep.addBinaryOp('and', 2);
jsep.addBinaryOp('|', 12);
jsep.addUnaryOp('not');
jsep.addLiteral('True', true);
jsep.addLiteral('False', false);
jsep.addLiteral('none', null);
jsep.addLiteral('None', null);

export type TemplateScope = Record<string, unknown>;

const EXPRESSION_RE = /\{\{([\s\S]+?)\}\}/g;
const SINGLE_EXPRESSION_RE = /^\s*\{\{([\s\S]+?)\}\}\s*$/;

export function hasTemplate(input: string): boolean {
  return input.includes('{{');
}

/**
 * Deep render: strings are rendered with {@link renderValue}, mappings and lists are walked,
 * anything else is returned unchanged.
 */
export function renderTemplate(input: unknown, scope: TemplateScope): unknown {
  if (typeof input === 'string') return renderValue(input, scope);
  if (Array.isArray(input)) return input.map(v => renderTemplate(v, scope));
  if (isRecord(input)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(input)) {
      out[k] = renderTemplate(v, scope);
    }
    return out;
  }
  return input;
}

/**
 * Render a template. A template made of exactly one `{{ expr }}` keeps the expression's type,
 * so `{{ args.items }}` yields the list itself.
 */
export function renderValue(template: string, scope: TemplateScope): unknown {
  if (!hasTemplate(template)) return template;
  const single = template.match(SINGLE_EXPRESSION_RE);
  if (single && !single[1].includes('{{') && !single[1].includes('}}')) {
    return evalExpression(single[1], scope);
  }
  return renderString(template, scope);
}

export function renderString(template: string, scope: TemplateScope): string {
  return template.replace(EXPRESSION_RE, (_, expr: string) => formatValue(evalExpression(expr, scope)));
}

export function formatValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function evalExpression(expr: string, scope: TemplateScope): unknown {
  return evaluate(parse(expr), scope);
}

export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  return Boolean(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}


// --- parsing ---

type Node = jsep.Expression;

type NodeTypes = {
  Literal: jsep.Literal;
  Identifier: jsep.Identifier;
  MemberExpression: jsep.MemberExpression;
  ArrayExpression: jsep.ArrayExpression;
  UnaryExpression: jsep.UnaryExpression;
  BinaryExpression: jsep.BinaryExpression;
  ConditionalExpression: jsep.ConditionalExpression;
  CallExpression: jsep.CallExpression;
};

function is<K extends keyof NodeTypes>(node: Node, type: K): node is NodeTypes[K] {
  return node.type === type;
}

const parsed = new Map<string, Node>();

function parse(expr: string): Node {
  const source = expr.trim();
  const cached = parsed.get(source);
  if (cached) return cached;
  let node: Node;
  try {
    node = jsep(source);
  } catch (e) {
    throw new TemplateError(`Invalid expression '${source}': ${errorMessage(e)}`, { cause: e });
  }
  parsed.set(source, node);
  return node;
}

// --- evaluation ---

const COMPARISONS = new Set(['==', '!=', '===', '!==', '<', '<=', '>', '>=']);

function evaluate(node: Node, scope: TemplateScope): unknown {
  if (is(node, 'Literal')) return node.value;
  if (is(node, 'Identifier') || is(node, 'MemberExpression')) return lookup(node, scope).value;
  if (is(node, 'ArrayExpression')) return node.elements.map(element => (element ? evaluate(element, scope) : null));
  if (is(node, 'ConditionalExpression')) {
    return isTruthy(evaluate(node.test, scope)) ? evaluate(node.consequent, scope) : evaluate(node.alternate, scope);
  }
  if (is(node, 'UnaryExpression')) {
    if (node.operator === 'not' || node.operator === '!') return !isTruthy(evaluate(node.argument, scope));
    throw new TemplateError(`Unsupported operator '${node.operator}'`);
  }
  if (is(node, 'BinaryExpression')) {
    const op = node.operator;
    if (op === '|') return applyFilter(node, scope);
    if (op === 'or' || op === '||') {
      const left = evaluate(node.left, scope);
      return isTruthy(left) ? left : evaluate(node.right, scope);
    }
    if (op === 'and' || op === '&&') {
      const left = evaluate(node.left, scope);
      return isTruthy(left) ? evaluate(node.right, scope) : left;
    }
    if (COMPARISONS.has(op)) return compare(op, evaluate(node.left, scope), evaluate(node.right, scope));
    throw new TemplateError(`Unsupported operator '${op}'`);
  }
  throw new TemplateError(`Unsupported expression: ${node.type}`);
}

type Resolved = { value: unknown; text: string; root: string };

/** Resolve a dotted or indexed reference, naming the full path when a segment is missing. */
function lookup(node: Node, scope: TemplateScope): Resolved {
  if (is(node, 'Identifier')) {
    if (!Object.hasOwn(scope, node.name)) {
      throw new UndefinedVariableError(node.name, 'root', Object.keys(scope));
    }
    return { value: scope[node.name], text: node.name, root: node.name };
  }
  if (is(node, 'MemberExpression')) {
    const base = lookup(node.object, scope);
    let key: unknown;
    if (node.computed) key = evaluate(node.property, scope);
    else if (is(node.property, 'Identifier')) key = node.property.name;
    else throw new TemplateError(`Unsupported property access in '${base.text}'`);
    const text = node.computed ? `${base.text}[${JSON.stringify(key)}]` : `${base.text}.${String(key)}`;
    return { value: access(base.value, key, text, base.root), text, root: base.root };
  }
  return { value: evaluate(node, scope), text: node.type, root: 'root' };
}

function access(current: unknown, key: unknown, text: string, root: string): unknown {
  if (Array.isArray(current) && (typeof key === 'number' || /^\d+$/.test(String(key)))) {
    const index = Number(key);
    if (index >= current.length) {
      throw new UndefinedVariableError(text, root, current.map((_, i) => String(i)));
    }
    return current[index];
  }
  if (isRecord(current) && Object.hasOwn(current, String(key))) return current[String(key)];
  if (typeof current === 'string' && key === 'length') return current.length;
  throw new UndefinedVariableError(text, root, isRecord(current) ? Object.keys(current) : []);
}

function compare(op: string, left: unknown, right: unknown): boolean {
  switch (op) {
    case '==':
    case '===':
      return looseEquals(left, right);
    case '!=':
    case '!==':
      return !looseEquals(left, right);
  }
  if (typeof left === 'number' && typeof right === 'number') return ordered(op, left - right);
  if (typeof left === 'string' && typeof right === 'string') return ordered(op, left.localeCompare(right));
  throw new TemplateError(`Cannot compare ${typeof left} with ${typeof right} using '${op}'`);
}

function ordered(op: string, diff: number): boolean {
  if (op === '<') return diff < 0;
  if (op === '<=') return diff <= 0;
  if (op === '>') return diff > 0;
  return diff >= 0;
}

function looseEquals(left: unknown, right: unknown): boolean {
  if (typeof left === 'object' || typeof right === 'object') {
    return JSON.stringify(left) === JSON.stringify(right);
  }
  return left === right;
}

/** `value | name` or `value | name(args)`. */
function filterCall(node: Node): { name: string; args: Node[] } {
  if (is(node, 'Identifier')) return { name: node.name, args: [] };
  if (is(node, 'CallExpression') && is(node.callee, 'Identifier')) {
    return { name: node.callee.name, args: node.arguments };
  }
  throw new TemplateError('expected filter name after |');
}

function applyFilter(node: jsep.BinaryExpression, scope: TemplateScope): unknown {
  const { name, args: argNodes } = filterCall(node.right);
  if (name === 'default' || name === 'd') {
    try {
      const value = evaluate(node.left, scope);
      if (value !== undefined) return value;
    } catch (error) {
      if (!(error instanceof UndefinedVariableError)) throw error;
    }
    return argNodes.length ? evaluate(argNodes[0], scope) : '';
  }

  const value = evaluate(node.left, scope);
  const args = argNodes.map(arg => evaluate(arg, scope));
  switch (name) {
    case 'trim':
      return formatValue(value).trim();
    case 'upper':
      return formatValue(value).toUpperCase();
    case 'lower':
      return formatValue(value).toLowerCase();
    case 'string':
      return formatValue(value);
    case 'length':
    case 'count':
      if (Array.isArray(value) || typeof value === 'string') return value.length;
      if (isRecord(value)) return Object.keys(value).length;
      return 0;
    case 'int': {
      const parsedInt = Number.parseInt(formatValue(value), 10);
      return Number.isNaN(parsedInt) ? 0 : parsedInt;
    }
    case 'float': {
      const parsedFloat = Number.parseFloat(formatValue(value));
      return Number.isNaN(parsedFloat) ? 0 : parsedFloat;
    }
    case 'tojson':
      return JSON.stringify(value);
    case 'join': {
      const separator = args.length ? formatValue(args[0]) : '';
      return Array.isArray(value) ? value.map(formatValue).join(separator) : formatValue(value);
    }
    default:
      throw new TemplateError(`Unknown filter '${name}'`);
  }
}

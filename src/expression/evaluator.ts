import jsepArrow from '@jsep-plugin/arrow';
import jsepObject from '@jsep-plugin/object';
import jsep from 'jsep';
import { ExpressionError } from '../runner/errors.ts';
import { describeType, getFilter, isPlainObject, isTruthy, shellQuote, toText } from './filters.ts';

jsep.plugins.register(jsepArrow);
jsep.plugins.register(jsepObject);

// Word operators and the filter pipe. `|` binds tighter than arithmetic so
// `a + b | upper` applies the filter to `b` only.
jsep.addBinaryOp('or', 1);
jsep.addBinaryOp('and', 2);
jsep.addBinaryOp('in', 7);
jsep.addBinaryOp('|', 12);
jsep.addUnaryOp('not');
jsep.addLiteral('none', null);

/**
 * Expression evaluator for the ${{ }} interpolation language.
 * Supports:
 * - inputs.name, env.NAME, secrets.KEY, variables.name
 * - steps.<id>.outcome / steps.<id>.outputs.field
 * - loop.item, loop.index, loop.output, ... inside loops
 * - error.message / error.step inside failure handlers
 * - arithmetic, comparisons, and/or/not, `in`, ternary, list and mapping literals
 * - filters: `value | default("x")`, `name | shell_quote`
 * - whitelisted methods with arrow functions: `items.filter(i => i.ok)`
 *
 * Parsing is AST based (jsep); nothing is executed outside the whitelist.
 */

export interface StepView {
  outcome: string;
  outputs: Record<string, unknown>;
  error?: string;
  error_type?: string;
  duration_ms?: number;
}

export interface ExpressionContext {
  inputs?: Record<string, unknown>;
  env?: Record<string, unknown>;
  steps?: Record<string, StepView>;
  loop?: Record<string, unknown>;
  variables?: Record<string, unknown>;
  secrets?: Record<string, string>;
  error?: Record<string, unknown>;
  workflow?: Record<string, unknown>;
  /** Reject an unclosed `${{` or a stray `}}` instead of keeping it as text */
  strict?: boolean;
}

const ROOT_NAMES = [
  'inputs',
  'env',
  'steps',
  'loop',
  'variables',
  'secrets',
  'error',
  'workflow',
] as const;

type RootName = (typeof ROOT_NAMES)[number];

interface ArrowFunctionExpression extends jsep.Expression {
  type: 'ArrowFunctionExpression';
  params: jsep.Expression[] | null;
  body: jsep.Expression;
}

interface ObjectProperty extends jsep.Expression {
  type: 'Property';
  key: jsep.Expression;
  value?: jsep.Expression;
  computed: boolean;
  shorthand: boolean;
}

interface ObjectExpression extends jsep.Expression {
  type: 'ObjectExpression';
  properties: ObjectProperty[];
}

interface Scope {
  context: ExpressionContext;
  locals: ReadonlyMap<string, unknown>;
  counter: { count: number };
}

function isIdentifier(node: jsep.Expression): node is jsep.Identifier {
  return node.type === 'Identifier';
}
function isLiteral(node: jsep.Expression): node is jsep.Literal {
  return node.type === 'Literal';
}
function isMember(node: jsep.Expression): node is jsep.MemberExpression {
  return node.type === 'MemberExpression';
}
function isBinary(node: jsep.Expression): node is jsep.BinaryExpression {
  return node.type === 'BinaryExpression';
}
function isUnary(node: jsep.Expression): node is jsep.UnaryExpression {
  return node.type === 'UnaryExpression';
}
function isConditional(node: jsep.Expression): node is jsep.ConditionalExpression {
  return node.type === 'ConditionalExpression';
}
function isArray(node: jsep.Expression): node is jsep.ArrayExpression {
  return node.type === 'ArrayExpression';
}
function isCall(node: jsep.Expression): node is jsep.CallExpression {
  return node.type === 'CallExpression';
}
function isArrow(node: jsep.Expression): node is ArrowFunctionExpression {
  return node.type === 'ArrowFunctionExpression';
}
function isObject(node: jsep.Expression): node is ObjectExpression {
  return node.type === 'ObjectExpression';
}
function isNode(value: unknown): value is jsep.Expression {
  return isPlainObject(value) && typeof value.type === 'string';
}

function childNodes(node: jsep.Expression): jsep.Expression[] {
  const children: jsep.Expression[] = [];
  for (const value of Object.values(node)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        if (isNode(item)) children.push(item);
      }
    } else if (isNode(value)) {
      children.push(value);
    }
  }
  return children;
}

export class ExpressionEvaluator {
  // Forbidden properties for security - prevents prototype pollution
  private static readonly FORBIDDEN_PROPERTIES = new Set([
    'constructor',
    '__proto__',
    'prototype',
    '__definegetter__',
    '__definesetter__',
    '__lookupgetter__',
    '__lookupsetter__',
  ]);

  private static readonly FORBIDDEN_IDENTIFIERS = new Set([
    'eval',
    'Function',
    'globalThis',
    'global',
    'process',
    'require',
    'import',
    'module',
    'exports',
    'Reflect',
    'Proxy',
  ]);

  private static readonly SAFE_METHODS = new Set([
    // Array methods
    'map',
    'filter',
    'reduce',
    'every',
    'some',
    'find',
    'findIndex',
    'includes',
    'indexOf',
    'slice',
    'concat',
    'join',
    'flat',
    'reverse',
    'sort',
    // String methods
    'split',
    'toLowerCase',
    'toUpperCase',
    'trim',
    'startsWith',
    'endsWith',
    'replace',
    'replaceAll',
    'substring',
    'padStart',
    'padEnd',
    'toString',
    // Number methods
    'toFixed',
    // Math / JSON
    'max',
    'min',
    'abs',
    'round',
    'floor',
    'ceil',
    'stringify',
    'parse',
  ]);

  private static readonly SAFE_GLOBALS: Record<string, unknown> = {
    Math,
    JSON,
  };

  private static readonly GLOBAL_FUNCTIONS: Record<string, (...args: unknown[]) => unknown> = {
    now: () => new Date().toISOString(),
    Number: (value) => Number(value),
    String: (value) => toText(value),
    Boolean: (value) => isTruthy(value),
    parseInt: (value) => Number.parseInt(toText(value), 10),
    parseFloat: (value) => Number.parseFloat(toText(value)),
  };

  private static readonly MAX_TEMPLATE_LENGTH = 10_000;
  private static readonly MAX_PLAIN_STRING_LENGTH = 1_000_000;
  private static readonly MAX_NESTING_DEPTH = 50;
  private static readonly MAX_ARRAY_SIZE = 1000;
  private static readonly MAX_TOTAL_NODES = 10_000;
  private static readonly MAX_CACHED_ASTS = 500;

  private static readonly astCache = new Map<string, jsep.Expression>();

  /**
   * Throw on an unclosed `${{` or a stray `}}`
   */
  static validateTemplate(template: string): void {
    let i = 0;
    while (i < template.length) {
      if (template.startsWith('${{', i)) {
        const end = ExpressionEvaluator.findClose(template, i + 3);
        if (end === -1) {
          throw new ExpressionError(`Unclosed expression starting at index ${i}`, template);
        }
        i = end + 2;
        continue;
      }
      if (template.startsWith('}}', i)) {
        throw new ExpressionError(`Unexpected "}}" at index ${i}`, template);
      }
      i++;
    }
  }

  /** Index of the `}}` closing an expression body starting at `from`, or -1 */
  private static findClose(template: string, from: number): number {
    let depth = 0;
    for (let j = from; j < template.length; j++) {
      if (depth === 0 && template.startsWith('}}', j)) return j;
      if (template[j] === '{') depth++;
      else if (template[j] === '}' && depth > 0) depth--;
    }
    return -1;
  }

  /**
   * Scan a template for ${{ ... }} segments, handling nested braces
   */
  static *scanExpressions(
    template: string
  ): Generator<{ start: number; end: number; expr: string }> {
    let i = 0;
    while (i < template.length) {
      if (template.startsWith('${{', i)) {
        const close = ExpressionEvaluator.findClose(template, i + 3);
        if (close === -1) return;
        yield { start: i, end: close + 2, expr: template.substring(i + 3, close).trim() };
        i = close + 2;
      } else {
        i++;
      }
    }
  }

  static hasExpression(str: string): boolean {
    return !ExpressionEvaluator.scanExpressions(str).next().done;
  }

  /**
   * Evaluate a string that may contain ${{ }} expressions.
   * A string that is exactly one expression keeps the value's type; otherwise each
   * segment is stringified (mappings and lists as JSON) and spliced.
   *
   * `==` is loose ("5" == 5 is true); `===` is strict.
   */
  static evaluate(template: string, context: ExpressionContext): unknown {
    if (context.strict && (template.includes('${{') || template.includes('}}'))) {
      ExpressionEvaluator.validateTemplate(template);
    }

    if (!ExpressionEvaluator.hasExpression(template)) {
      if (template.length > ExpressionEvaluator.MAX_PLAIN_STRING_LENGTH) {
        throw new ExpressionError(
          `Plain string exceeds maximum length of ${ExpressionEvaluator.MAX_PLAIN_STRING_LENGTH} characters`
        );
      }
      return template;
    }

    if (template.length > ExpressionEvaluator.MAX_TEMPLATE_LENGTH) {
      throw new ExpressionError(
        `Template with expressions exceeds maximum length of ${ExpressionEvaluator.MAX_TEMPLATE_LENGTH} characters`
      );
    }

    const single = ExpressionEvaluator.singleExpression(template);
    if (single !== null) {
      return ExpressionEvaluator.evaluateExpression(single, context);
    }

    return ExpressionEvaluator.splice(template, (expr) =>
      toText(ExpressionEvaluator.evaluateExpression(expr, context))
    );
  }

  /** The expression body when the trimmed template is exactly one `${{ }}` segment */
  private static singleExpression(template: string): string | null {
    const trimmed = template.trim();
    if (!trimmed.startsWith('${{')) return null;
    const close = ExpressionEvaluator.findClose(trimmed, 3);
    if (close !== trimmed.length - 2) return null;
    return trimmed.substring(3, close).trim();
  }

  private static splice(template: string, render: (expr: string) => string): string {
    let result = '';
    let lastIndex = 0;
    for (const match of ExpressionEvaluator.scanExpressions(template)) {
      result += template.substring(lastIndex, match.start);
      result += render(match.expr);
      lastIndex = match.end;
    }
    return result + template.substring(lastIndex);
  }

  /**
   * Evaluate a template and always return a string
   */
  static evaluateString(template: string, context: ExpressionContext): string {
    return toText(ExpressionEvaluator.evaluate(template, context));
  }

  /**
   * Render a string-form shell command, quoting every interpolation that is not already
   * piped through shell_quote.
   */
  static interpolateShell(template: string, context: ExpressionContext): string {
    return ExpressionEvaluator.splice(template, (expr) => {
      const value = ExpressionEvaluator.evaluateExpression(expr, context);
      return ExpressionEvaluator.isShellQuoted(expr) ? toText(value) : shellQuote(value);
    });
  }

  /**
   * True when the expression's outermost operation is the shell_quote filter
   */
  static isShellQuoted(expr: string): boolean {
    try {
      const ast = ExpressionEvaluator.parse(expr);
      return (
        isBinary(ast) &&
        ast.operator === '|' &&
        ExpressionEvaluator.filterName(ast.right) === 'shell_quote'
      );
    } catch {
      return false;
    }
  }

  /**
   * Evaluate a condition (`if`, `break_if`, `until`). Bare strings without ${{ }} are
   * treated as expressions; non-string values use truthiness directly.
   */
  static evaluateCondition(condition: unknown, context: ExpressionContext): boolean {
    if (typeof condition !== 'string') return isTruthy(condition);
    const value = ExpressionEvaluator.hasExpression(condition)
      ? ExpressionEvaluator.evaluate(condition, context)
      : ExpressionEvaluator.evaluateExpression(condition, context);
    return isTruthy(value);
  }

  /**
   * Evaluate a value that is either a template or a bare expression (loop sources)
   */
  static evaluateValue(source: unknown, context: ExpressionContext): unknown {
    if (typeof source !== 'string') return ExpressionEvaluator.evaluateObject(source, context);
    return ExpressionEvaluator.hasExpression(source)
      ? ExpressionEvaluator.evaluate(source, context)
      : ExpressionEvaluator.evaluateExpression(source, context);
  }

  /**
   * Parse an expression body (without the ${{ }} wrapper)
   */
  static parse(expr: string): jsep.Expression {
    const cached = ExpressionEvaluator.astCache.get(expr);
    if (cached) return cached;

    let ast: jsep.Expression;
    try {
      ast = jsep(expr);
    } catch (error) {
      throw new ExpressionError(
        `Invalid expression "${expr}": ${error instanceof Error ? error.message : String(error)}`,
        expr
      );
    }
    if (ast.type === 'Compound' || ast.type === 'SequenceExpression') {
      throw new ExpressionError(`Invalid expression "${expr}": multiple expressions`, expr);
    }

    if (ExpressionEvaluator.astCache.size >= ExpressionEvaluator.MAX_CACHED_ASTS) {
      ExpressionEvaluator.astCache.clear();
    }
    ExpressionEvaluator.astCache.set(expr, ast);
    return ast;
  }

  /**
   * Evaluate a single expression (without the ${{ }} wrapper)
   */
  static evaluateExpression(expr: string, context: ExpressionContext): unknown {
    const ast = ExpressionEvaluator.parse(expr);
    try {
      return ExpressionEvaluator.evaluateNode(
        ast,
        { context, locals: new Map(), counter: { count: 0 } },
        0
      );
    } catch (error) {
      throw new ExpressionError(
        `Failed to evaluate expression "${expr}": ${error instanceof Error ? error.message : String(error)}`,
        expr
      );
    }
  }

  private static evaluateNode(node: jsep.Expression, scope: Scope, depth: number): unknown {
    scope.counter.count++;
    if (scope.counter.count > ExpressionEvaluator.MAX_TOTAL_NODES) {
      throw new ExpressionError(
        `Expression exceeds maximum complexity of ${ExpressionEvaluator.MAX_TOTAL_NODES} nodes`
      );
    }
    if (depth > ExpressionEvaluator.MAX_NESTING_DEPTH) {
      throw new ExpressionError(
        `Expression nesting exceeds maximum depth of ${ExpressionEvaluator.MAX_NESTING_DEPTH}`
      );
    }
    const next = depth + 1;

    if (isLiteral(node)) return node.value;

    if (isIdentifier(node)) return ExpressionEvaluator.resolveIdentifier(node.name, scope);

    if (isMember(node)) {
      const object = ExpressionEvaluator.evaluateNode(node.object, scope, next);
      const property = ExpressionEvaluator.memberKey(node, scope, next);
      return ExpressionEvaluator.readProperty(object, property);
    }

    if (isBinary(node)) {
      return ExpressionEvaluator.evaluateBinary(node, scope, next);
    }

    if (isUnary(node)) {
      const argument = ExpressionEvaluator.evaluateNode(node.argument, scope, next);
      switch (node.operator) {
        case '!':
        case 'not':
          return !isTruthy(argument);
        case '-':
          return -ExpressionEvaluator.requireNumber(node.operator, argument);
        case '+':
          return ExpressionEvaluator.requireNumber(node.operator, argument);
        default:
          throw new ExpressionError(`Unsupported unary operator: ${node.operator}`);
      }
    }

    if (isConditional(node)) {
      const test = ExpressionEvaluator.evaluateNode(node.test, scope, next);
      return isTruthy(test)
        ? ExpressionEvaluator.evaluateNode(node.consequent, scope, next)
        : ExpressionEvaluator.evaluateNode(node.alternate, scope, next);
    }

    if (isArray(node)) {
      if (node.elements.length > ExpressionEvaluator.MAX_ARRAY_SIZE) {
        throw new ExpressionError(
          `Array literal exceeds maximum size of ${ExpressionEvaluator.MAX_ARRAY_SIZE} elements`
        );
      }
      return node.elements.map((element) =>
        element ? ExpressionEvaluator.evaluateNode(element, scope, next) : null
      );
    }

    if (isObject(node)) {
      const result: Record<string, unknown> = {};
      for (const prop of node.properties) {
        const key =
          isIdentifier(prop.key) && !prop.computed
            ? prop.key.name
            : toText(ExpressionEvaluator.evaluateNode(prop.key, scope, next));
        ExpressionEvaluator.assertAllowedProperty(key);
        result[key] = prop.value
          ? ExpressionEvaluator.evaluateNode(prop.value, scope, next)
          : ExpressionEvaluator.evaluateNode(prop.key, scope, next);
      }
      return result;
    }

    if (isCall(node)) return ExpressionEvaluator.evaluateCall(node, scope, next);

    if (isArrow(node)) return ExpressionEvaluator.createArrowFunction(node, scope, next);

    throw new ExpressionError(`Unsupported expression type: ${node.type}`);
  }

  private static resolveIdentifier(name: string, scope: Scope): unknown {
    if (ExpressionEvaluator.FORBIDDEN_IDENTIFIERS.has(name)) {
      throw new ExpressionError(`Access to "${name}" is forbidden for security reasons`);
    }
    if (scope.locals.has(name)) return scope.locals.get(name);

    if (ExpressionEvaluator.isRootName(name)) {
      const value = scope.context[name];
      if (value !== undefined) return value;
      if (name === 'inputs' || name === 'steps' || name === 'variables' || name === 'env') {
        return {};
      }
      throw new ExpressionError(`"${name}" is not available here`);
    }

    if (Object.hasOwn(ExpressionEvaluator.SAFE_GLOBALS, name)) {
      return ExpressionEvaluator.SAFE_GLOBALS[name];
    }
    if (Object.hasOwn(ExpressionEvaluator.GLOBAL_FUNCTIONS, name)) {
      return ExpressionEvaluator.GLOBAL_FUNCTIONS[name];
    }
    throw new ExpressionError(`Undefined variable: ${name}`);
  }

  private static isRootName(name: string): name is RootName {
    return (ROOT_NAMES as readonly string[]).includes(name);
  }

  private static memberKey(
    node: jsep.MemberExpression,
    scope: Scope,
    depth: number
  ): string | number {
    if (!node.computed && isIdentifier(node.property)) return node.property.name;
    const key = ExpressionEvaluator.evaluateNode(node.property, scope, depth);
    if (typeof key === 'string' || typeof key === 'number') return key;
    throw new ExpressionError(`Invalid property key of type ${describeType(key)}`);
  }

  private static isForbiddenProperty(property: string): boolean {
    const normalized = property.normalize('NFKC').toLowerCase();
    return (
      ExpressionEvaluator.FORBIDDEN_PROPERTIES.has(normalized) ||
      normalized.includes('proto') ||
      normalized.includes('constructor')
    );
  }

  private static assertAllowedProperty(property: string): void {
    if (ExpressionEvaluator.isForbiddenProperty(property)) {
      throw new ExpressionError(`Access to property "${property}" is forbidden for security reasons`);
    }
  }

  /**
   * Member access. Missing keys and access on none yield undefined so chains like
   * `steps.skipped.outputs.value | default("x")` stay safe.
   */
  private static readProperty(target: unknown, property: string | number): unknown {
    if (typeof property === 'string') ExpressionEvaluator.assertAllowedProperty(property);
    if (target === null || target === undefined) return undefined;

    if (typeof target === 'string' || Array.isArray(target)) {
      if (property === 'length') return target.length;
      const index = typeof property === 'number' ? property : Number(property);
      if (!Number.isInteger(index)) return undefined;
      return target.at(index);
    }

    if (typeof target === 'object') {
      const key = String(property);
      return Object.hasOwn(target, key) ? Reflect.get(target, key) : undefined;
    }

    return undefined;
  }

  private static evaluateBinary(
    node: jsep.BinaryExpression,
    scope: Scope,
    depth: number
  ): unknown {
    const { operator } = node;
    const left = ExpressionEvaluator.evaluateNode(node.left, scope, depth);

    if (operator === '|') return ExpressionEvaluator.applyFilter(node.right, left, scope, depth);

    // Short-circuit operators return the deciding operand
    if (operator === '&&' || operator === 'and') {
      return isTruthy(left) ? ExpressionEvaluator.evaluateNode(node.right, scope, depth) : left;
    }
    if (operator === '||' || operator === 'or') {
      return isTruthy(left) ? left : ExpressionEvaluator.evaluateNode(node.right, scope, depth);
    }

    const right = ExpressionEvaluator.evaluateNode(node.right, scope, depth);

    switch (operator) {
      case '+':
        if (typeof left === 'number' && typeof right === 'number') return left + right;
        if (typeof left === 'string' && typeof right === 'string') return left + right;
        if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
        throw new ExpressionError(
          `Cannot apply "+" to ${describeType(left)} and ${describeType(right)}`
        );
      case '-':
      case '*':
      case '/':
      case '%':
        return ExpressionEvaluator.arithmetic(
          operator,
          ExpressionEvaluator.requireNumber(operator, left),
          ExpressionEvaluator.requireNumber(operator, right)
        );
      case '==':
        // biome-ignore lint/suspicious/noDoubleEquals: loose equality is part of the language
        return left == right;
      case '!=':
        // biome-ignore lint/suspicious/noDoubleEquals: loose equality is part of the language
        return left != right;
      case '===':
        return left === right;
      case '!==':
        return left !== right;
      case '<':
      case '<=':
      case '>':
      case '>=':
        return ExpressionEvaluator.compare(operator, left, right);
      case 'in':
        return ExpressionEvaluator.membership(left, right);
      default:
        throw new ExpressionError(`Unsupported binary operator: ${operator}`);
    }
  }

  private static requireNumber(operator: string, value: unknown): number {
    if (typeof value === 'number') return value;
    throw new ExpressionError(`Operator "${operator}" expects numbers, got ${describeType(value)}`);
  }

  private static arithmetic(operator: string, left: number, right: number): number {
    switch (operator) {
      case '-':
        return left - right;
      case '*':
        return left * right;
      case '/':
        if (right === 0) throw new ExpressionError('Division by zero');
        return left / right;
      default:
        if (right === 0) throw new ExpressionError('Modulo by zero');
        return left % right;
    }
  }

  private static compare(operator: string, left: unknown, right: unknown): boolean {
    const comparable =
      (typeof left === 'number' && typeof right === 'number') ||
      (typeof left === 'string' && typeof right === 'string');
    if (!comparable) {
      throw new ExpressionError(
        `Cannot compare ${describeType(left)} ${operator} ${describeType(right)}`
      );
    }
    let order: number;
    if (typeof left === 'number' && typeof right === 'number') order = left - right;
    else order = toText(left) < toText(right) ? -1 : toText(left) > toText(right) ? 1 : 0;
    switch (operator) {
      case '<':
        return order < 0;
      case '<=':
        return order <= 0;
      case '>':
        return order > 0;
      default:
        return order >= 0;
    }
  }

  private static membership(needle: unknown, haystack: unknown): boolean {
    if (typeof haystack === 'string') return haystack.includes(toText(needle));
    if (Array.isArray(haystack)) return haystack.includes(needle);
    if (isPlainObject(haystack)) return Object.hasOwn(haystack, toText(needle));
    throw new ExpressionError(
      `Operator "in" expects a string, list or mapping, got ${describeType(haystack)}`
    );
  }

  private static filterName(node: jsep.Expression): string | null {
    if (isIdentifier(node)) return node.name;
    if (isCall(node) && isIdentifier(node.callee)) return node.callee.name;
    return null;
  }

  private static applyFilter(
    node: jsep.Expression,
    value: unknown,
    scope: Scope,
    depth: number
  ): unknown {
    if (isIdentifier(node)) return getFilter(node.name)(value);
    if (isCall(node) && isIdentifier(node.callee)) {
      const filter = getFilter(node.callee.name);
      const args = node.arguments.map((arg) => ExpressionEvaluator.evaluateNode(arg, scope, depth));
      return filter(value, ...args);
    }
    throw new ExpressionError('The right side of "|" must be a filter name or filter call');
  }

  private static evaluateCall(node: jsep.CallExpression, scope: Scope, depth: number): unknown {
    const args = node.arguments.map((arg) =>
      isArrow(arg)
        ? ExpressionEvaluator.createArrowFunction(arg, scope, depth)
        : ExpressionEvaluator.evaluateNode(arg, scope, depth)
    );

    if (isMember(node.callee)) {
      const target = ExpressionEvaluator.evaluateNode(node.callee.object, scope, depth);
      const methodName = String(ExpressionEvaluator.memberKey(node.callee, scope, depth));
      if (!ExpressionEvaluator.SAFE_METHODS.has(methodName)) {
        throw new ExpressionError(`Method ${methodName} is not allowed`);
      }
      if (target === null || target === undefined) {
        throw new ExpressionError(`Cannot call method ${methodName} on ${describeType(target)}`);
      }
      // sort and reverse mutate in place; work on a copy
      const receiver: unknown =
        Array.isArray(target) && (methodName === 'sort' || methodName === 'reverse')
          ? [...target]
          : target;
      const method: unknown = Reflect.get(Object(receiver), methodName);
      if (typeof method !== 'function') {
        throw new ExpressionError(`Cannot call method ${methodName} on ${describeType(target)}`);
      }
      return Reflect.apply(method, receiver, args);
    }

    if (isIdentifier(node.callee)) {
      const name = node.callee.name;
      if (!Object.hasOwn(ExpressionEvaluator.GLOBAL_FUNCTIONS, name)) {
        throw new ExpressionError(`${name} is not a function`);
      }
      return ExpressionEvaluator.GLOBAL_FUNCTIONS[name](...args);
    }

    throw new ExpressionError('Only method calls and safe function calls are supported');
  }

  private static createArrowFunction(
    node: ArrowFunctionExpression,
    scope: Scope,
    depth: number
  ): (...args: unknown[]) => unknown {
    return (...args: unknown[]) => {
      const locals = new Map(scope.locals);
      (node.params ?? []).forEach((param, index) => {
        if (isIdentifier(param)) locals.set(param.name, args[index]);
      });
      return ExpressionEvaluator.evaluateNode(node.body, { ...scope, locals }, depth + 1);
    };
  }

  /**
   * Recursively evaluate all expressions in a value
   */
  static evaluateObject(obj: unknown, context: ExpressionContext): unknown {
    if (typeof obj === 'string') {
      return ExpressionEvaluator.evaluate(obj, context);
    }
    if (Array.isArray(obj)) {
      return obj.map((item) => ExpressionEvaluator.evaluateObject(item, context));
    }
    if (isPlainObject(obj)) {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        result[key] = ExpressionEvaluator.evaluateObject(value, context);
      }
      return result;
    }
    return obj;
  }

  /**
   * Step ids read through `steps.<id>` or `steps["<id>"]`
   */
  static findStepReferences(ast: jsep.Expression): string[] {
    const found = new Set<string>();
    const visit = (node: jsep.Expression): void => {
      if (isMember(node) && isIdentifier(node.object) && node.object.name === 'steps') {
        if (!node.computed && isIdentifier(node.property)) found.add(node.property.name);
        else if (node.computed && isLiteral(node.property)) found.add(String(node.property.value));
        return;
      }
      for (const child of childNodes(node)) visit(child);
    };
    visit(ast);
    return [...found];
  }

  /**
   * Filter names used anywhere in the expression
   */
  static findFilterNames(ast: jsep.Expression): string[] {
    const found = new Set<string>();
    const visit = (node: jsep.Expression): void => {
      if (isBinary(node) && node.operator === '|') {
        const name = ExpressionEvaluator.filterName(node.right);
        if (name) found.add(name);
      }
      for (const child of childNodes(node)) visit(child);
    };
    visit(ast);
    return [...found];
  }

  /**
   * Forbidden identifiers or properties used anywhere in the expression
   */
  static findForbiddenAccess(ast: jsep.Expression): string[] {
    const found = new Set<string>();
    const visit = (node: jsep.Expression): void => {
      if (isIdentifier(node) && ExpressionEvaluator.FORBIDDEN_IDENTIFIERS.has(node.name)) {
        found.add(node.name);
      }
      if (isMember(node)) {
        const key =
          !node.computed && isIdentifier(node.property)
            ? node.property.name
            : isLiteral(node.property)
              ? String(node.property.value)
              : null;
        if (key !== null && ExpressionEvaluator.isForbiddenProperty(key)) found.add(key);
      }
      for (const child of childNodes(node)) visit(child);
    };
    visit(ast);
    return [...found];
  }
}

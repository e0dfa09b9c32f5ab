import { describe, expect, test } from 'vitest';
import { TemplateError, UndefinedVariableError } from '../errors.js';
import { evalExpression, formatValue, hasTemplate, renderString, renderTemplate, renderValue } from './expression.js';

const scope = {
  args: { name: 'world', items: [1, 2, 3], count: 3, flag: true, empty: '' },
  steps: { fetch: { result: { status: 'ok' } } },
  greeting: 'hi'
};

describe('renderValue', () => {
  test('should return the raw value for a single expression', () => {
    expect(renderValue('{{ args.items }}', scope)).toEqual([1, 2, 3]);
    expect(renderValue('  {{ args.count }} ', scope)).toBe(3);
  });

  test('should interpolate mixed text', () => {
    expect(renderValue('Hello {{ args.name }}!', scope)).toBe('Hello world!');
  });

  test('should leave strings without templates unchanged', () => {
    expect(renderValue('plain', scope)).toBe('plain');
    expect(hasTemplate('plain')).toBe(false);
    expect(renderValue('{ not a template }', scope)).toBe('{ not a template }');
  });
});

describe('renderString', () => {
  test('should format non-string values', () => {
    expect(renderString('{{ args.items }}', scope)).toBe('[1,2,3]');
    expect(renderString('{{ args.flag }}', scope)).toBe('true');
    expect(renderString('[{{ none }}]', scope)).toBe('[]');
  });

  test('should resolve root keys and nested step outputs', () => {
    expect(renderString('{{ greeting }} {{ steps.fetch.result.status }}', scope)).toBe('hi ok');
  });
});

describe('renderTemplate', () => {
  test('should render nested mappings and lists', () => {
    const rendered = renderTemplate({ a: '{{ args.count }}', b: ['x-{{ args.name }}', 7], c: null }, scope);
    expect(rendered).toEqual({ a: 3, b: ['x-world', 7], c: null });
  });
});

describe('strict resolution', () => {
  test('should name the variable, namespace and available keys', () => {
    try {
      renderString('{{ args.missing }}', scope);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UndefinedVariableError);
      if (!(e instanceof UndefinedVariableError)) return;
      expect(e.variable).toBe('args.missing');
      expect(e.namespace).toBe('args');
      expect(e.available).toEqual(['name', 'items', 'count', 'flag', 'empty']);
    }
  });

  test('should reject unknown roots', () => {
    expect(() => renderString('{{ nope }}', scope)).toThrow("Variable 'nope' is undefined");
  });

  test('should let default absorb undefined references', () => {
    expect(renderValue('{{ args.missing | default("fallback") }}', scope)).toBe('fallback');
    expect(renderValue('{{ args.name | default("fallback") }}', scope)).toBe('world');
  });

  test('should reject out-of-range list indexes', () => {
    expect(() => evalExpression('args.items[5]', scope)).toThrow(UndefinedVariableError);
    expect(evalExpression('args.items[1]', scope)).toBe(2);
  });
});

describe('evalExpression', () => {
  test('should compare values', () => {
    expect(evalExpression('args.count == 3', scope)).toBe(true);
    expect(evalExpression('args.count > 5', scope)).toBe(false);
    expect(evalExpression("args.name != 'world'", scope)).toBe(false);
    expect(evalExpression("'a' < 'b'", scope)).toBe(true);
  });

  test('should combine with and, or and not', () => {
    expect(evalExpression('args.flag and args.count >= 3', scope)).toBe(true);
    expect(evalExpression('not args.flag or args.empty', scope)).toBe('');
    expect(evalExpression('args.empty || "x"', scope)).toBe('x');
  });

  test('should apply filters', () => {
    expect(evalExpression('args.name | upper', scope)).toBe('WORLD');
    expect(evalExpression('args.items | length', scope)).toBe(3);
    expect(evalExpression("args.items | join('-')", scope)).toBe('1-2-3');
    expect(evalExpression("'42' | int", scope)).toBe(42);
    expect(evalExpression('steps.fetch.result | tojson', scope)).toBe('{"status":"ok"}');
    expect(evalExpression("'  pad ' | trim", scope)).toBe('pad');
    expect(evalExpression('args.name | trim | upper', scope)).toBe('WORLD');
  });

  test('should apply filters before comparing', () => {
    expect(evalExpression('args.items | length > 2', scope)).toBe(true);
    expect(evalExpression("steps['fetch'].result.status == 'ok'", scope)).toBe(true);
  });

  test('should pick a branch with a conditional', () => {
    expect(evalExpression("args.flag ? 'on' : 'off'", scope)).toBe('on');
  });

  test('should reject malformed expressions', () => {
    expect(() => evalExpression('args.count ==', scope)).toThrow(TemplateError);
    expect(() => evalExpression('"open', scope)).toThrow(`Invalid expression '"open'`);
    expect(() => evalExpression('args.count - 1', scope)).toThrow("Unsupported operator '-'");
  });

  test('should refuse to order mismatched types', () => {
    expect(() => evalExpression("args.count < 'a'", scope)).toThrow("Cannot compare number with string using '<'");
  });
});

describe('formatValue', () => {
  test('should render null and undefined as empty strings', () => {
    expect(formatValue(null)).toBe('');
    expect(formatValue(undefined)).toBe('');
    expect(formatValue({ a: 1 })).toBe('{"a":1}');
    expect(formatValue(1.5)).toBe('1.5');
  });
});

import { describe, it, expect } from 'vitest';
import type { JsonValue } from '@rulelogic/types';
import { EvaluationLimitError, LogicError, UnrecognizedOperatorError } from './errors.js';
import { evaluate, evaluateWithTrace } from './evaluator.js';
import { VARIADIC, fixed, operandAt } from './operator.js';
import { createDefaultRegistry } from './operators/index.js';

const cars = { cars: [{ price: 2000 }, { price: 3000 }] };

describe('evaluate', () => {
  it('returns literals unchanged', () => {
    const multiKey = { a: 1, b: 2 };
    expect(evaluate(42)).toBe(42);
    expect(evaluate('text')).toBe('text');
    expect(evaluate(null)).toBeNull();
    expect(evaluate(multiKey)).toBe(multiKey);
    expect(evaluate({})).toEqual({});
  });

  it('evaluates arrays element-wise', () => {
    expect(evaluate([{ var: 'a' }, 1, [{ '+': [1, 1] }]], { a: 'x' })).toEqual(['x', 1, [2]]);
  });

  it('gives the whole context for an empty var', () => {
    expect(evaluate({ var: [] }, { a: 1 })).toEqual({ a: 1 });
    expect(evaluate({ var: '' }, [1, 2])).toEqual([1, 2]);
  });

  it('applies the var default on absent and on null', () => {
    expect(evaluate({ var: ['x', 'fallback'] }, {})).toBe('fallback');
    expect(evaluate({ var: ['x', 'fallback'] }, { x: null })).toBe('fallback');
    expect(evaluate({ var: ['x', 'fallback'] }, { x: false })).toBe(false);
  });

  it('indexes an array context with a numeric var', () => {
    expect(evaluate({ var: 1 }, ['apple', 'banana', 'carrot'])).toBe('banana');
  });

  it('sums prices with reduce', () => {
    const rule: JsonValue = {
      reduce: [{ var: 'cars' }, { '+': [{ var: 'accumulator' }, { var: 'current.price' }] }, 0],
    };
    expect(evaluate(rule, cars)).toBe(5000);
  });

  it('distinguishes soft from strict equality', () => {
    expect(evaluate({ '==': ['1', 1] })).toBe(true);
    expect(evaluate({ '===': ['1', 1] })).toBe(false);
  });

  it('never evaluates operands after an and short-circuits', () => {
    const registry = createDefaultRegistry();
    const calls: number[] = [];
    registry.add('spy', () => {
      calls.push(1);
      return true;
    });
    expect(evaluate({ and: [false, { spy: [] }] }, null, registry)).toBe(false);
    expect(evaluate({ or: [true, { spy: [] }] }, null, registry)).toBe(true);
    expect(calls).toHaveLength(0);
  });

  it('is idempotent and leaves rule and data untouched', () => {
    const rule: JsonValue = {
      map: [{ var: 'items' }, { '*': [{ var: '' }, 2] }],
    };
    const data = { items: [1, 2, 3] };
    const ruleBefore = structuredClone(rule);
    const dataBefore = structuredClone(data);
    const first = evaluate(rule, data);
    const second = evaluate(rule, data);
    expect(first).toEqual([2, 4, 6]);
    expect(second).toEqual(first);
    expect(rule).toEqual(ruleBefore);
    expect(data).toEqual(dataBefore);
  });

  it('throws UnrecognizedOperatorError with the execution path', () => {
    try {
      evaluate({ and: [true, { frobnicate: [1] }] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnrecognizedOperatorError);
      if (err instanceof UnrecognizedOperatorError) {
        expect(err.operator).toBe('frobnicate');
        expect(err.path).toBe('root > and > frobnicate');
        expect(err.message).toBe('Unrecognized operation "frobnicate"');
      }
    }
  });

  it('drops operands beyond a fixed arity', () => {
    expect(evaluate({ '!': [false, 'ignored'] })).toBe(true);
  });

  it('passes raw operands and a narrowing evaluate to lazy operators', () => {
    const registry = createDefaultRegistry();
    registry.register({
      name: 'with',
      category: 'custom',
      description: 'Evaluate the second operand against the first',
      mode: 'lazy',
      arity: fixed(2),
      execute: (operands, _scope, run) => run(operandAt(operands, 1), run(operandAt(operands, 0))),
    });
    expect(evaluate({ with: [{ var: 'inner' }, { var: 'name' }] }, { inner: { name: 'Ada' } }, registry)).toBe('Ada');
  });

  it('propagates errors from custom operators unchanged', () => {
    const registry = createDefaultRegistry();
    registry.add('boom', () => {
      throw new Error('kaboom');
    });
    expect(() => evaluate({ boom: [] }, null, registry)).toThrow('kaboom');
  });

  it('enforces the maximum depth', () => {
    const rule = { '!': { '!': { '!': { '!': true } } } };
    expect(evaluate(rule, null, undefined, { max_depth: 3 })).toBe(true);
    expect(() => evaluate(rule, null, undefined, { max_depth: 2 })).toThrow(EvaluationLimitError);
  });

  it('counts only operator nesting toward the depth', () => {
    expect(evaluate([[[{ '!': true }]]], null, undefined, { max_depth: 0 })).toEqual([[[false]]]);
  });

  it('sets no depth limit by default', () => {
    let rule: JsonValue = true;
    for (let i = 0; i < 300; i++) rule = { '!': rule };
    expect(evaluate(rule)).toBe(true);
  });

  it('returns a timeout error when evaluation exceeds the time limit', () => {
    const registry = createDefaultRegistry();
    registry.register({
      name: 'slow',
      category: 'custom',
      description: 'Spins for a while',
      mode: 'eager',
      arity: VARIADIC,
      execute() {
        const end = Date.now() + 30;
        while (Date.now() < end) { /* spin */ }
        return 'done';
      },
    });
    try {
      evaluate({ slow: [] }, null, registry, { timeout_ms: 10 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EvaluationLimitError);
      if (err instanceof EvaluationLimitError) {
        expect(err.limit).toBe('timeout');
        expect(err.message).toBe('Evaluation timeout exceeded after root > slow');
      }
    }
  });

  it('succeeds when evaluation completes within the time limit', () => {
    expect(evaluate({ '+': [1, 2] }, null, undefined, { timeout_ms: 5000 })).toBe(3);
  });
});

describe('evaluateWithTrace', () => {
  it('records one trace per operator application', () => {
    const { value, traces } = evaluateWithTrace({ and: [true, { '!': false }] });
    expect(value).toBe(true);
    expect(traces).toHaveLength(1);
    const [top] = traces;
    expect(top.operator).toBe('and');
    expect(top.execution_path).toBe('root > and');
    expect(top.status).toBe('success');
    expect(top.child_traces).toHaveLength(1);
    expect(top.child_traces?.[0]).toMatchObject({
      operator: '!',
      operands: [false],
      output: true,
      execution_path: 'root > and > !',
      status: 'success',
    });
  });

  it('traces each element of a top-level array', () => {
    const { value, traces } = evaluateWithTrace([{ '+': [1, 1] }, { cat: ['a', 'b'] }]);
    expect(value).toEqual([2, 'ab']);
    expect(traces.map((t) => t.operator)).toEqual(['+', 'cat']);
  });

  it('attaches partial traces to a thrown LogicError', () => {
    try {
      evaluateWithTrace({ or: [false, { nope: [] }] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LogicError);
      if (err instanceof LogicError) {
        expect(err.traces).toHaveLength(1);
        expect(err.traces?.[0]).toMatchObject({
          operator: 'or',
          status: 'error',
          error: { code: 'UNRECOGNIZED_OPERATOR', message: 'Unrecognized operation "nope"' },
        });
      }
    }
  });
});

import { describe, it, expect } from 'vitest';
import { evaluate } from '../evaluator.js';
import { CalendarDate } from '../temporal.js';

describe('comparison operators', () => {
  it('== coerces, === does not', () => {
    expect(evaluate({ '==': [1, '1'] })).toBe(true);
    expect(evaluate({ '==': [0, false] })).toBe(true);
    expect(evaluate({ '==': [null, 0] })).toBe(false);
    expect(evaluate({ '===': [1, 1] })).toBe(true);
    expect(evaluate({ '===': [0, false] })).toBe(false);
  });

  it('!= and !== negate their counterparts', () => {
    expect(evaluate({ '!=': [1, '1'] })).toBe(false);
    expect(evaluate({ '!==': [1, '1'] })).toBe(true);
  });

  it('orders numbers and numeric strings', () => {
    expect(evaluate({ '>': [2, 1] })).toBe(true);
    expect(evaluate({ '>': ['2', 10] })).toBe(false);
    expect(evaluate({ '>=': [1, 1] })).toBe(true);
    expect(evaluate({ '<': [1, 2] })).toBe(true);
    expect(evaluate({ '<=': [3, 2] })).toBe(false);
  });

  it('compares two strings lexicographically', () => {
    expect(evaluate({ '<': ['a', 'b'] })).toBe(true);
    expect(evaluate({ '>': ['2', '10'] })).toBe(true);
  });

  it('answers false when operands cannot be ordered', () => {
    expect(evaluate({ '<': [null, 1] })).toBe(false);
    expect(evaluate({ '>': [null, 1] })).toBe(false);
    expect(evaluate({ '>=': ['abc', 1] })).toBe(false);
  });

  it('performs the exclusive and inclusive range checks', () => {
    expect(evaluate({ '<': [1, 2, 3] })).toBe(true);
    expect(evaluate({ '<': [1, 1, 3] })).toBe(false);
    expect(evaluate({ '<=': [1, 1, 3] })).toBe(true);
    expect(evaluate({ '<=': [1, 4, 3] })).toBe(false);
  });

  it('compares dates from the data', () => {
    const data = { a: new CalendarDate(Date.UTC(2024, 0, 1)), b: new CalendarDate(Date.UTC(2024, 5, 1)) };
    expect(evaluate({ '<': [{ var: 'a' }, { var: 'b' }] }, data)).toBe(true);
    expect(evaluate({ '<': [{ date: '2024-01-01' }, { date: '2024-01-02' }] })).toBe(true);
  });
});

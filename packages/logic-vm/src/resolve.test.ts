import { describe, it, expect } from 'vitest';
import { getNestedValue, resolveVariable } from './resolve.js';

const data = {
  user: { name: 'Ada', address: { city: 'Lyon' }, nickname: null },
  scores: [10, 20, { best: 30 }],
};

describe('getNestedValue', () => {
  it('walks objects and arrays', () => {
    expect(getNestedValue(data, 'user.address.city')).toBe('Lyon');
    expect(getNestedValue(data, 'scores.1')).toBe(20);
    expect(getNestedValue(data, 'scores.2.best')).toBe(30);
  });

  it('returns undefined for missing steps', () => {
    expect(getNestedValue(data, 'user.email')).toBeUndefined();
    expect(getNestedValue(data, 'scores.5')).toBeUndefined();
    expect(getNestedValue(data, 'scores.-1')).toBeUndefined();
    expect(getNestedValue(data, 'user.name.first')).toBeUndefined();
  });

  it('indexes a top-level array', () => {
    expect(getNestedValue(['apple', 'banana', 'carrot'], '1')).toBe('banana');
  });
});

describe('resolveVariable', () => {
  it('returns the whole context for an empty or absent path', () => {
    expect(resolveVariable(data, '')).toBe(data);
    expect(resolveVariable(data, null)).toBe(data);
    expect(resolveVariable(data, undefined)).toBe(data);
  });

  it('uses the fallback when the path is missing', () => {
    expect(resolveVariable(data, 'user.email', 'n/a')).toBe('n/a');
  });

  it('uses the fallback when the value is null', () => {
    expect(resolveVariable(data, 'user.nickname', 'anon')).toBe('anon');
  });

  it('gives null without a fallback', () => {
    expect(resolveVariable(data, 'user.email')).toBeNull();
  });

  it('accepts numeric paths', () => {
    expect(resolveVariable(['a', 'b'], 0)).toBe('a');
  });

  it('keeps falsy found values', () => {
    expect(resolveVariable({ n: 0, s: '' }, 'n', 5)).toBe(0);
    expect(resolveVariable({ n: 0, s: '' }, 's', 'x')).toBe('');
  });
});

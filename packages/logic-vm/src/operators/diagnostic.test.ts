import { describe, it, expect, vi } from 'vitest';
import { evaluate } from '../evaluator.js';
import type { Logger } from '../logger.js';

describe('log', () => {
  it('writes the value at info level and returns it', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const value = evaluate({ log: { var: 'items' } }, { items: [1, 2] }, undefined, { logger });
    expect(value).toEqual([1, 2]);
    expect(logger.info).toHaveBeenCalledWith('1,2');
  });
});

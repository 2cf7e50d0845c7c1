import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseTimeout } from './options';

describe('parseTimeout', () => {
  it('accepts whole milliseconds, including 0', () => {
    expect(parseTimeout('1500')).toBe(1500);
    expect(parseTimeout('0')).toBe(0);
  });

  it.each(['1.5', '-1', 'soon', ''])('rejects %j', value => {
    expect(() => parseTimeout(value)).toThrow(InvalidArgumentError);
    expect(() => parseTimeout(value)).toThrow('Expected a non-negative integer number of milliseconds.');
  });
});

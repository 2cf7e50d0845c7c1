import { InvalidArgumentError } from 'commander';

/**
 * `--timeout` value: whole milliseconds, 0 for no limit
 */
export function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer number of milliseconds.');
  }
  return parsed;
}

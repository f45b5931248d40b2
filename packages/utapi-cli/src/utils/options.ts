import { InvalidArgumentError } from 'commander';

/** Commander option parser for non-negative integers */
export function parseCount(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/** Commander option parser restricted to a fixed set of values */
export function oneOf<T extends string>(values: readonly T[]): (value: string) => T {
  return (value: string): T => {
    const match = values.find((v) => v === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Expected one of: ${values.join(', ')}.`);
    }
    return match;
  };
}

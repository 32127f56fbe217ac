import { InvalidArgumentError } from 'commander';

/** Commander parser for non-negative integer flags (counts, milliseconds). */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`expected a non-negative integer, got '${value}'`);
  }
  return parsed;
}

/** Commander parser for a strictly positive number (requests per second). */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`expected a positive number, got '${value}'`);
  }
  return parsed;
}

/** `--retry-on 500,502,503` */
export function parseStatusList(value: string): number[] {
  const codes = value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(Number);
  if (codes.length === 0 || codes.some((code) => !Number.isInteger(code) || code < 100 || code > 599)) {
    throw new InvalidArgumentError(`expected comma-separated HTTP status codes, got '${value}'`);
  }
  return codes;
}

/** Repeatable `-H 'Name: value'`, accumulated as [name, value] pairs. */
export function collectHeader(value: string, previous: Array<[string, string]> = []): Array<[string, string]> {
  const separator = value.indexOf(':');
  const name = separator > 0 ? value.slice(0, separator).trim() : '';
  if (name.length === 0) {
    throw new InvalidArgumentError(`expected 'Name: value', got '${value}'`);
  }
  return [...previous, [name, value.slice(separator + 1).trim()]];
}

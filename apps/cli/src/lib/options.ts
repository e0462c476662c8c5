/**
 * Option parsers for commander
 */

import { InvalidArgumentError } from 'commander';

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}

/**
 * "key=value" into a tag pair; the key is lower-cased
 */
export function parseTag(value: string): [string, string] {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError('Expected key=value.');
  }
  return [value.slice(0, eq).trim().toLowerCase(), value.slice(eq + 1)];
}

/**
 * Repeatable --tag collector
 */
export function collectTag(
  value: string,
  previous: Record<string, string> = {}
): Record<string, string> {
  const [key, tagValue] = parseTag(value);
  return { ...previous, [key]: tagValue };
}

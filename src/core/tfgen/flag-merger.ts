/**
 * Flag Merger
 *
 * Folds supplied flag values into an existing configuration body:
 * scalar flags become `name = "value"` assignments, list flags become
 * `name = [ ... ]` blocks and map flags become `name = { ... }` blocks.
 *
 * The body is treated as opaque lines. A supplied flag replaces the first
 * line that contains its name as a substring. This can match a line that
 * only mentions the name inside a value or a comment.
 */

import { FlagValueError } from '../errors/index.js';
import type { VisitedFlag } from './flag-set.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export interface MergeOptions {
  listFlags: ReadonlySet<string>;
  mapFlags: ReadonlySet<string>;
}

export function mergeFlags(body: readonly string[], flags: readonly VisitedFlag[], options: MergeOptions): string[] {
  const lines = [...body];
  const listValues = new Map<string, string[]>();
  const mapValues = new Map<string, Map<string, string>>();

  for (const flag of flags) {
    removeFirstMention(lines, flag.name);

    if (options.listFlags.has(flag.name)) {
      const values = listValues.get(flag.name) ?? [];
      values.push(...flag.values);
      listValues.set(flag.name, values);
    } else if (options.mapFlags.has(flag.name)) {
      const entries = mapValues.get(flag.name) ?? new Map<string, string>();
      for (const value of flag.values) {
        const [key, entryValue] = splitKeyValue(flag.name, value);
        entries.set(key, entryValue);
      }
      mapValues.set(flag.name, entries);
    } else {
      const value = flag.values[flag.values.length - 1] ?? '';
      lines.push(`${flag.name} = ${quote(value)}`);
    }
  }

  for (const name of sortedKeys(listValues)) {
    lines.push('', `${name} = [`);
    for (const item of listValues.get(name) ?? []) {
      lines.push(`  ${quote(item)},`);
    }
    lines.push(']');
  }

  for (const name of sortedKeys(mapValues)) {
    lines.push('', `${name} = {`);
    for (const [key, value] of mapValues.get(name) ?? []) {
      lines.push(`  ${renderKey(key)} = ${quote(value)}`);
    }
    lines.push('}');
  }

  return lines;
}

/**
 * Split `key=value` on the first `=`. The key must not be empty.
 */
export function splitKeyValue(flagName: string, raw: string): [string, string] {
  const index = raw.indexOf('=');
  if (index <= 0) {
    throw new FlagValueError(flagName, raw);
  }
  return [raw.slice(0, index), raw.slice(index + 1)];
}

function removeFirstMention(lines: string[], name: string): void {
  const index = lines.findIndex((line) => line.includes(name));
  if (index !== -1) {
    lines.splice(index, 1);
  }
}

/**
 * Object keys that are not identifiers are written as quoted strings
 */
function renderKey(key: string): string {
  return IDENTIFIER_PATTERN.test(key) ? key : quote(key);
}

function quote(value: string): string {
  return JSON.stringify(value);
}

function sortedKeys(map: ReadonlyMap<string, unknown>): string[] {
  return Array.from(map.keys()).sort();
}

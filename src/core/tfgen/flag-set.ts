/**
 * Flag sets for plugin commands.
 *
 * Flags are written terraform style (`-cluster_name=demo`) and parsed with
 * commander. Every explicitly supplied occurrence is recorded in order, so a
 * generator can tell supplied values apart from defaults that were never
 * mentioned on the command line.
 */

import { Command, CommanderError, Option } from 'commander';
import { FlagParseError } from '../errors/index.js';

export interface FlagDefinition {
  name: string;
  usage: string;
}

/**
 * A flag that was supplied on the command line, with every value given for
 * it in supply order.
 */
export interface VisitedFlag {
  name: string;
  values: string[];
}

const FLAG_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

export class FlagSet {
  private readonly definitions = new Map<string, FlagDefinition>();
  private visited: VisitedFlag[] = [];

  constructor(public readonly name: string) {}

  /**
   * Declare a string-valued flag
   */
  define(name: string, usage: string): this {
    if (!FLAG_NAME_PATTERN.test(name)) {
      throw new FlagParseError(`invalid flag name: ${name}`, name);
    }
    if (this.definitions.has(name)) {
      throw new FlagParseError(`flag redefined: ${name}`, name);
    }
    this.definitions.set(name, { name, usage });
    return this;
  }

  /**
   * All declared flags in lexicographical order
   */
  getDefinitions(): FlagDefinition[] {
    return Array.from(this.definitions.values()).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * Parse an argument vector. Returns the positional arguments.
   * Previously recorded values are discarded.
   */
  parse(args: readonly string[]): string[] {
    this.visited = [];
    const byName = new Map<string, VisitedFlag>();

    const program = new Command(this.name)
      .exitOverride()
      .helpOption(false)
      .argument('[args...]')
      .configureOutput({
        writeOut: () => {},
        writeErr: () => {},
        outputError: () => {},
      });

    for (const definition of this.definitions.values()) {
      const option = new Option(`--${definition.name} <value>`, definition.usage).argParser((value: string) => {
        let entry = byName.get(definition.name);
        if (!entry) {
          entry = { name: definition.name, values: [] };
          byName.set(definition.name, entry);
          this.visited.push(entry);
        }
        entry.values.push(value);
        return value;
      });
      program.addOption(option);
    }

    try {
      program.parse(normalizeArgs(args), { from: 'user' });
    } catch (error: unknown) {
      if (error instanceof CommanderError) {
        throw toFlagParseError(error);
      }
      throw error;
    }

    return [...program.args];
  }

  /**
   * Supplied flags in order of first occurrence
   */
  getVisited(): VisitedFlag[] {
    return this.visited.map((flag) => ({ name: flag.name, values: [...flag.values] }));
  }
}

/**
 * Accept `-name=value` and `-name value` alongside the double-dash forms.
 * Everything after a bare `--` is left alone.
 */
export function normalizeArgs(args: readonly string[]): string[] {
  const result: string[] = [];
  let terminated = false;

  for (const arg of args) {
    if (terminated || arg === '-' || !arg.startsWith('-') || arg.startsWith('--')) {
      if (arg === '--') terminated = true;
      result.push(arg);
      continue;
    }
    result.push(`-${arg}`);
  }

  return result;
}

function toFlagParseError(error: CommanderError): FlagParseError {
  const quoted = /'(-{1,2}[^' ]+)/.exec(error.message);
  const flag = quoted?.[1]?.replace(/^-+/, '').split('=')[0];

  switch (error.code) {
    case 'commander.unknownOption':
      return new FlagParseError(`flag provided but not defined: -${flag ?? '?'}`, flag);
    case 'commander.optionMissingArgument':
      return new FlagParseError(`flag needs an argument: -${flag ?? '?'}`, flag);
    default:
      return new FlagParseError(error.message.replace(/^error: /, ''), flag);
  }
}

/**
 * Terraform file generation
 *
 * A TerraformFileConfig describes one generated file: a fixed header and
 * footer, the previous (or default) body, and the flags that may be merged
 * into that body. Plugin commands build one per invocation, parse their
 * arguments into it and write the generated text to disk.
 */

import { FlagSet, type VisitedFlag } from './flag-set.js';
import { mergeFlags } from './flag-merger.js';
import { formatHcl, type ConfigFormatter } from './formatter.js';
import { FormatError, errorMessage } from '../errors/index.js';

const HELP_LINE_WIDTH = 60;
const HELP_LABEL_WIDTH = 20;

export interface TerraformFileOptions {
  flags: FlagSet;
  listFlags?: Iterable<string>;
  mapFlags?: Iterable<string>;
  preLines?: string[];
  bodyLines?: string[];
  postLines?: string[];
  formatter?: ConfigFormatter;
}

export class TerraformFileConfig {
  readonly flags: FlagSet;
  readonly listFlags: ReadonlySet<string>;
  readonly mapFlags: ReadonlySet<string>;
  preLines: string[];
  bodyLines: string[];
  postLines: string[];
  private readonly formatter: ConfigFormatter;

  constructor(options: TerraformFileOptions) {
    this.flags = options.flags;
    this.listFlags = new Set(options.listFlags ?? []);
    this.mapFlags = new Set(options.mapFlags ?? []);
    this.preLines = options.preLines ?? [];
    this.bodyLines = options.bodyLines ?? [];
    this.postLines = options.postLines ?? [];
    this.formatter = options.formatter ?? formatHcl;
  }

  isList(name: string): boolean {
    return this.listFlags.has(name);
  }

  isMap(name: string): boolean {
    return this.mapFlags.has(name);
  }

  /**
   * Parse command arguments into the flag set. Returns positional arguments.
   */
  parse(args: readonly string[]): string[] {
    return this.flags.parse(args);
  }

  /**
   * Merge the supplied flags into the body and render the whole file
   */
  generate(): string {
    const visited: VisitedFlag[] = this.flags.getVisited();
    const body = mergeFlags(this.bodyLines, visited, {
      listFlags: this.listFlags,
      mapFlags: this.mapFlags,
    });

    const content = [...this.preLines, ...body, ...this.postLines].join('\n');

    try {
      return this.formatter(content);
    } catch (error: unknown) {
      if (error instanceof FormatError) throw error;
      throw new FormatError(errorMessage(error));
    }
  }

  /**
   * Usage text for every declared flag
   */
  renderOptionHelp(): string[] {
    const output: string[] = [];
    const label = (text: string): string => text.padEnd(HELP_LABEL_WIDTH);

    for (const flag of this.flags.getDefinitions()) {
      const lines = wrapLongLines(flag.usage, HELP_LINE_WIDTH);
      const token = `-${flag.name}=`;

      output.push('');
      lines.forEach((line, i) => {
        if (i === 0 && token.length > HELP_LABEL_WIDTH) {
          output.push(`  ${token}`);
          output.push(`  ${label('')} ${line}`);
        } else if (i === 0) {
          output.push(`  ${label(token)} ${line}`);
        } else {
          output.push(`  ${label('')} ${line}`);
        }
      });
    }

    return output;
  }

  printOptionHelp(): void {
    for (const line of this.renderOptionHelp()) {
      console.log(line);
    }
  }
}

/**
 * Greedy word wrap. A single word longer than the width gets a line of its own.
 */
export function wrapLongLines(text: string, lineWidth: number): string[] {
  const words = text.trim().split(/\s+/).filter(Boolean);
  const [first, ...rest] = words;
  if (first === undefined) {
    return [text];
  }

  const result: string[] = [];
  let wrapped = first;
  let spaceLeft = lineWidth - wrapped.length;

  for (const word of rest) {
    if (word.length + 1 > spaceLeft) {
      result.push(wrapped);
      wrapped = word;
      spaceLeft = lineWidth - word.length;
    } else {
      wrapped += ` ${word}`;
      spaceLeft -= 1 + word.length;
    }
  }

  result.push(wrapped);
  return result;
}

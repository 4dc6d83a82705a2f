/**
 * Helpers shared by the commands that generate terraform files
 */

import { FlagParseError } from '../../core/errors/index.js';
import type { TerraformFileConfig } from '../../core/tfgen/generator.js';
import type { Sandbox } from '../../core/sandbox/types.js';
import { printInfo } from '../../utils/logger.js';

export interface GeneratedFileLayout {
  /** File name relative to the project */
  file: string;
  preLines: string[];
  postLines: string[];
  /** Body used when the file does not exist yet */
  defaultBody: string[];
}

/**
 * Body of a previously generated file: everything between the header and the
 * footer. Returns the default body when the file does not exist.
 */
export async function readGeneratedBody(sandbox: Sandbox, layout: GeneratedFileLayout): Promise<string[]> {
  if (!(await sandbox.fileExists(layout.file))) {
    return [...layout.defaultBody];
  }

  const lines = (await sandbox.readFile(layout.file)).trimEnd().split('\n');
  const pre = layout.preLines.map((line) => line.trim());
  const post = layout.postLines.map((line) => line.trim());

  const head = lines.slice(0, pre.length).map((line) => line.trim());
  const tail = lines.slice(lines.length - post.length).map((line) => line.trim());
  const matches =
    lines.length >= pre.length + post.length &&
    head.every((line, i) => line === pre[i]) &&
    tail.every((line, i) => line === post[i]);

  if (!matches) {
    throw new Error(`${layout.file} does not have the expected layout; move it away to generate a new one`);
  }

  return lines.slice(pre.length, lines.length - post.length);
}

/**
 * Parse command arguments, printing the option help when they are invalid
 */
export function parseCommandArgs(config: TerraformFileConfig, args: readonly string[]): string[] {
  try {
    return config.parse(args);
  } catch (error: unknown) {
    if (error instanceof FlagParseError) {
      console.log(`Usage of ${config.flags.name}:`);
      config.printOptionHelp();
      console.log('');
    }
    throw error;
  }
}

/**
 * Generate the file and write it into the project
 */
export async function writeGeneratedFile(sandbox: Sandbox, config: TerraformFileConfig, file: string): Promise<void> {
  const existed = await sandbox.fileExists(file);
  await sandbox.writeFile(file, config.generate());
  printInfo(`${existed ? 'Updated' : 'Created'} ${file}`);
}

import chalk from 'chalk';
import type { Sandbox } from '../core/sandbox/types.js';
import type { PluginRegistry } from '../plugins/registry.js';
import { errorMessage } from '../core/errors/index.js';
import { printDebug } from '../utils/logger.js';

const COMMAND_COLUMN_WIDTH = 18;

/**
 * Shown instead of terraform's own help when no terraform executable is found
 */
export function renderMissingTerraformHelp(): string[] {
  return [
    'Your system does not have terraform installed, or it could not be found',
    'in the project directory or on your PATH. This means we cannot show you',
    'the terraform help screen.',
    '',
    'Install terraform, or point "terraformPath" in .wheels/config.json at it.',
    'The following commands work without it:',
  ];
}

/**
 * Listing of the wrapper's own commands, in registration order
 */
export function renderPluginHelp(registry: PluginRegistry, binName: string): string[] {
  const row = (name: string, description: string): string =>
    `    ${name.padEnd(COMMAND_COLUMN_WIDTH)} ${description}`;

  const lines = [
    '',
    chalk.bold('Wheels Commands:'),
    row('wheels-version', `Check the version of ${binName}`),
    row('wheels-upgrade', `Upgrade to the latest version of ${binName}`),
  ];

  for (const { command } of registry.listCommands()) {
    lines.push(row(command.name, command.description));
  }

  return lines;
}

/**
 * Print terraform's help (when available) followed by the plugin commands
 */
export async function showHelp(sandbox: Sandbox, registry: PluginRegistry, binName: string): Promise<void> {
  if (await sandbox.hasTerraform()) {
    const terraform = await sandbox.getTerraform();
    try {
      await terraform.invoke([]);
    } catch (error: unknown) {
      // terraform exits non-zero after printing its usage
      printDebug(`terraform help: ${errorMessage(error)}`);
    }
  } else {
    for (const line of renderMissingTerraformHelp()) {
      console.log(line);
    }
  }

  for (const line of renderPluginHelp(registry, binName)) {
    console.log(line);
  }
}

/**
 * Commands about the wrapper itself. They are handled before any project
 * or plugin work happens.
 */

import { UpgradeError } from '../core/errors/index.js';
import { completeUpgrade, type Upgrader } from '../core/upgrade/upgrader.js';
import { bold, printInfo, printSuccess } from '../utils/logger.js';
import { EXIT_SUCCESS } from './dispatcher.js';

export const META_COMMANDS = ['wheels-version', 'wheels-upgrade', 'wheels-complete-upgrade'] as const;

export type MetaCommand = (typeof META_COMMANDS)[number];

export function isMetaCommand(value: string | undefined): value is MetaCommand {
  return META_COMMANDS.some((command) => command === value);
}

export interface MetaCommandContext {
  packageName: string;
  version: string;
  upgrader: Upgrader;
}

/**
 * Run a meta command if `args[0]` names one. Returns the exit code, or null
 * when the arguments are not a meta command.
 */
export async function runMetaCommand(args: readonly string[], context: MetaCommandContext): Promise<number | null> {
  const [command, ...rest] = args;
  if (!isMetaCommand(command)) {
    return null;
  }

  switch (command) {
    case 'wheels-version':
      printInfo(`You are using ${context.packageName} version ${bold(context.version)}`);
      return EXIT_SUCCESS;

    case 'wheels-upgrade': {
      const latest = await context.upgrader.getLatestVersion();
      if (!context.upgrader.isNewer(latest)) {
        printInfo('You are running the latest released version');
        return EXIT_SUCCESS;
      }
      printInfo(`Upgrading from ${bold(context.version)} to ${bold(latest)}`);
      await context.upgrader.performUpgrade(latest);
      return EXIT_SUCCESS;
    }

    case 'wheels-complete-upgrade': {
      const recordDir = rest[0];
      if (!recordDir) {
        throw new UpgradeError('wheels-complete-upgrade expects the upgrade record directory as its argument');
      }
      const record = await completeUpgrade(recordDir);
      printSuccess(`🍺 Upgraded to latest version (${record.from} → ${record.to})`);
      return EXIT_SUCCESS;
    }
  }
}

/**
 * Command Router
 *
 * Decides where an argument vector goes: to a plugin command, straight to
 * terraform, or to the help screen.
 */

import type { PluginRegistry } from '../plugins/registry.js';
import type { RegisteredCommand } from '../plugins/types.js';

/**
 * terraform subcommands passed through unchanged. Keep in step with the
 * terraform releases in use; newer ones can be added with `extraCommands`.
 */
export const KNOWN_TERRAFORM_COMMANDS: readonly string[] = [
  'apply',
  'console',
  'destroy',
  'env',
  'fmt',
  'get',
  'graph',
  'import',
  'init',
  'login',
  'logout',
  'metadata',
  'output',
  'plan',
  'providers',
  'push',
  'refresh',
  'show',
  'taint',
  'test',
  'untaint',
  'validate',
  'version',
  'workspace',
  '0.12checklist',
  '0.13upgrade',
  'debug',
  'force-unlock',
  'state',
];

export type HelpReason = 'no-arguments' | 'help-requested' | 'no-command' | 'unknown-command';

export type RouteDecision =
  | { kind: 'help'; reason: HelpReason; command?: string }
  | { kind: 'plugin'; target: RegisteredCommand; args: string[] }
  | { kind: 'passthrough'; command: string; args: string[] };

export class CommandRouter {
  private readonly passthrough: ReadonlySet<string>;

  constructor(
    private readonly registry: PluginRegistry,
    extraCommands: readonly string[] = [],
  ) {
    this.passthrough = new Set([...KNOWN_TERRAFORM_COMMANDS, ...extraCommands]);
  }

  /**
   * @param args - process arguments without the node executable and script
   */
  route(args: readonly string[]): RouteDecision {
    if (args.length === 0) {
      return { kind: 'help', reason: 'no-arguments' };
    }
    if (args.some((arg) => arg.includes('help'))) {
      return { kind: 'help', reason: 'help-requested' };
    }

    const index = findCommandIndex(args);
    const command = index === -1 ? undefined : args[index];
    if (command === undefined) {
      return { kind: 'help', reason: 'no-command' };
    }

    const target = this.registry.resolveCommand(command);
    if (target) {
      return { kind: 'plugin', target, args: args.slice(index + 1) };
    }

    if (this.passthrough.has(command)) {
      return { kind: 'passthrough', command, args: [...args] };
    }

    return { kind: 'help', reason: 'unknown-command', command };
  }
}

/**
 * Index of the first argument that is not a flag, or -1
 */
export function findCommandIndex(args: readonly string[]): number {
  return args.findIndex((arg) => !arg.startsWith('-'));
}

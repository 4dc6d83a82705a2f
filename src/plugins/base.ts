import type { Sandbox } from '../core/sandbox/types.js';
import type { PluginCommand, RunContext, WheelsPlugin } from './types.js';

/**
 * Plugin with no commands and no hooks. Subclasses override what they need.
 */
export abstract class BasePlugin implements WheelsPlugin {
  abstract readonly name: string;

  getCommands(): readonly PluginCommand[] {
    return [];
  }

  async isUsed(_sandbox: Sandbox): Promise<boolean> {
    return false;
  }

  async beforeRun(_context: RunContext): Promise<void> {}

  async afterRun(_context: RunContext, _error?: Error): Promise<void> {}
}

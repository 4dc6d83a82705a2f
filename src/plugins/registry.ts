/**
 * Plugin Registry
 *
 * Built once by the entry point from an ordered list of plugins and handed to
 * the router and the lifecycle. Command names must be unique across plugins;
 * a clash fails construction instead of silently shadowing the later command.
 */

import { PluginRegistryError } from '../core/errors/index.js';
import type { RegisteredCommand, WheelsPlugin } from './types.js';

export class PluginRegistry {
  private readonly plugins: readonly WheelsPlugin[];
  private readonly commands = new Map<string, RegisteredCommand>();

  constructor(plugins: readonly WheelsPlugin[]) {
    this.plugins = [...plugins];

    for (const plugin of this.plugins) {
      for (const command of plugin.getCommands()) {
        const existing = this.commands.get(command.name);
        if (existing) {
          throw new PluginRegistryError(
            `Command "${command.name}" of plugin ${plugin.name} is already provided by plugin ${existing.plugin.name}`,
            command.name,
          );
        }
        this.commands.set(command.name, { plugin, command });
      }
    }
  }

  /**
   * Plugins in registration order
   */
  getPlugins(): readonly WheelsPlugin[] {
    return this.plugins;
  }

  resolveCommand(name: string): RegisteredCommand | undefined {
    return this.commands.get(name);
  }

  /**
   * Every command, in plugin registration order then declaration order
   */
  listCommands(): RegisteredCommand[] {
    return Array.from(this.commands.values());
  }
}

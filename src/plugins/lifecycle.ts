/**
 * Plugin Lifecycle
 *
 * Wraps a terraform invocation with plugin hooks:
 *
 *   isUsed (every plugin) → beforeRun (active plugins) → terraform → afterRun (active plugins)
 *
 * Everything runs sequentially in registration order. A failing beforeRun
 * stops the invocation before terraform and before any afterRun. Terraform's
 * own failure is not fatal here: it is handed to every afterRun and returned.
 */

import { PluginError, PluginHookError, errorMessage } from '../core/errors/index.js';
import type { Sandbox, ToolHandle } from '../core/sandbox/types.js';
import { printInfo } from '../utils/logger.js';
import type { PluginRegistry } from './registry.js';
import type { RunContext, WheelsPlugin } from './types.js';

export interface InvocationResult {
  args: readonly string[];
  /** Plugins whose hooks ran */
  plugins: readonly WheelsPlugin[];
  /** Terraform's failure, if it failed */
  error?: Error;
}

export class PluginLifecycle {
  constructor(private readonly registry: PluginRegistry) {}

  /**
   * Plugins that apply to the project, in registration order
   */
  async loadActivePlugins(sandbox: Sandbox): Promise<WheelsPlugin[]> {
    const active: WheelsPlugin[] = [];

    for (const plugin of this.registry.getPlugins()) {
      let used: boolean;
      try {
        used = await plugin.isUsed(sandbox);
      } catch (error: unknown) {
        throw new PluginError(`Could not load plugin ${plugin.name}: ${errorMessage(error)}`, plugin.name);
      }

      if (used) {
        printInfo(`Using plugin ${plugin.name}`);
        active.push(plugin);
      }
    }

    return active;
  }

  async invoke(
    sandbox: Sandbox,
    terraform: ToolHandle,
    plugins: readonly WheelsPlugin[],
    args: readonly string[],
  ): Promise<InvocationResult> {
    const context: RunContext = {
      sandbox,
      terraform,
      args,
      isInit: args.includes('init'),
    };

    for (const plugin of plugins) {
      try {
        await plugin.beforeRun(context);
      } catch (error: unknown) {
        throw new PluginHookError(plugin.name, 'beforeRun', error);
      }
    }

    let failure: Error | undefined;
    try {
      await terraform.invoke(args);
    } catch (error: unknown) {
      failure = error instanceof Error ? error : new Error(String(error));
    }

    for (const plugin of plugins) {
      try {
        await plugin.afterRun(context, failure);
      } catch (error: unknown) {
        throw new PluginHookError(plugin.name, 'afterRun', error);
      }
    }

    return { args, plugins, error: failure };
  }

  /**
   * Detect active plugins and run terraform with their hooks
   */
  async run(sandbox: Sandbox, args: readonly string[]): Promise<InvocationResult> {
    const terraform = await sandbox.getTerraform();
    await terraform.locate();
    const plugins = await this.loadActivePlugins(sandbox);
    return this.invoke(sandbox, terraform, plugins, args);
  }
}

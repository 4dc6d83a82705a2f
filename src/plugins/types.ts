import type { Sandbox, ToolHandle } from '../core/sandbox/types.js';

/**
 * Context handed to plugin hooks around a terraform invocation
 */
export interface RunContext {
  sandbox: Sandbox;
  terraform: ToolHandle;
  /** Arguments passed to terraform */
  args: readonly string[];
  /** Whether this invocation runs `terraform init` */
  isInit: boolean;
}

export type CommandHandler = (args: string[], sandbox: Sandbox, terraform: ToolHandle) => Promise<void>;

/**
 * A command contributed by a plugin, invoked instead of terraform
 */
export interface PluginCommand {
  /** Unique across all plugins */
  name: string;
  description: string;
  handle: CommandHandler;
}

export interface WheelsPlugin {
  readonly name: string;

  /** Commands in the order they are listed in help */
  getCommands(): readonly PluginCommand[];

  /** Whether the plugin applies to the project. Throwing aborts the invocation. */
  isUsed(sandbox: Sandbox): Promise<boolean>;

  /** Runs before terraform. Throwing prevents the invocation. */
  beforeRun(context: RunContext): Promise<void>;

  /** Runs after terraform, with terraform's error if it failed */
  afterRun(context: RunContext, error?: Error): Promise<void>;
}

/**
 * A plugin command together with the plugin that owns it
 */
export interface RegisteredCommand {
  plugin: WheelsPlugin;
  command: PluginCommand;
}

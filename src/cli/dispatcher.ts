/**
 * Dispatcher
 *
 * Executes a route decision against a sandbox. A plugin command that creates
 * the first terraform file of an empty project is followed by one automatic
 * `terraform init`, run with the plugin hooks.
 */

import { PluginError, WheelsErrorCode, errorMessage } from '../core/errors/index.js';
import type { Sandbox } from '../core/sandbox/types.js';
import type { InvocationResult, PluginLifecycle } from '../plugins/lifecycle.js';
import type { PluginRegistry } from '../plugins/registry.js';
import type { RegisteredCommand } from '../plugins/types.js';
import { printInfo, printWarning } from '../utils/logger.js';
import { showHelp } from './help.js';
import type { CommandRouter } from './router.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface DispatcherOptions {
  sandbox: Sandbox;
  registry: PluginRegistry;
  router: CommandRouter;
  lifecycle: PluginLifecycle;
  binName: string;
  /** Run `init` after the first terraform file appears (default: true) */
  autoInit?: boolean;
  /** Help renderer, replaceable in tests */
  showHelp?: (sandbox: Sandbox, registry: PluginRegistry, binName: string) => Promise<void>;
}

export class Dispatcher {
  private readonly autoInit: boolean;
  private readonly renderHelp: NonNullable<DispatcherOptions['showHelp']>;

  constructor(private readonly options: DispatcherOptions) {
    this.autoInit = options.autoInit ?? true;
    this.renderHelp = options.showHelp ?? showHelp;
  }

  /**
   * Returns the process exit code
   */
  async dispatch(args: readonly string[]): Promise<number> {
    const { sandbox, router, registry, binName } = this.options;
    const decision = router.route(args);

    if (decision.kind === 'help') {
      if (decision.reason === 'unknown-command' && decision.command) {
        printWarning(`Unknown command: ${decision.command}`);
      }
      await this.renderHelp(sandbox, registry, binName);
      return EXIT_FAILURE;
    }

    const hadTerraformFiles = await sandbox.hasTerraformFiles();

    if (decision.kind === 'plugin') {
      return this.runPluginCommand(decision.target, decision.args, hadTerraformFiles);
    }

    const result = await this.options.lifecycle.run(sandbox, decision.args);

    if (!hadTerraformFiles) {
      console.log('');
      console.log(`Consider running ${binName} add-aws-cluster if you are trying to`);
      console.log(`launch a DC/OS cluster. Or ${binName} -help to see all options`);
    }

    return exitCodeOf(result);
  }

  private async runPluginCommand(
    target: RegisteredCommand,
    args: string[],
    hadTerraformFiles: boolean,
  ): Promise<number> {
    const { sandbox, lifecycle } = this.options;
    const terraform = await sandbox.getTerraform();

    try {
      await target.command.handle(args, sandbox, terraform);
    } catch (error: unknown) {
      const failure = new PluginError(
        `${target.command.name}: ${errorMessage(error)}`,
        target.plugin.name,
        WheelsErrorCode.PLUGIN_COMMAND_FAILED,
      );
      failure.cause = error;
      throw failure;
    }

    const hasTerraformFiles = await sandbox.hasTerraformFiles();
    if (!hadTerraformFiles && hasTerraformFiles && this.autoInit) {
      printInfo('Terraform project created, initializing now');
      await sandbox.reloadTerraformProject();
      return exitCodeOf(await lifecycle.run(sandbox, ['init']));
    }

    return EXIT_SUCCESS;
  }
}

/**
 * A failed terraform run is reported, not fatal: the process still exits 0
 */
function exitCodeOf(result: InvocationResult): number {
  if (result.error) {
    printWarning(result.error.message);
  }
  return EXIT_SUCCESS;
}

import { loadConfig } from '../core/config/loader.js';
import { ProjectSandbox } from '../core/sandbox/sandbox.js';
import { Upgrader } from '../core/upgrade/upgrader.js';
import { createBuiltinPlugins } from '../plugins/builtin/index.js';
import { PluginLifecycle } from '../plugins/lifecycle.js';
import { PluginRegistry } from '../plugins/registry.js';
import { getBinName } from '../utils/index.js';
import { printDebug, printFatal, setDebug } from '../utils/logger.js';
import { Dispatcher, EXIT_FAILURE } from './dispatcher.js';
import { runMetaCommand } from './meta-commands.js';
import { CommandRouter } from './router.js';
import { readPackageInfo } from './version.js';

export interface MainOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run the wrapper and return the process exit code
 */
export async function main(args: readonly string[], options: MainOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const binName = getBinName();

  try {
    // 1. Commands about the wrapper itself
    const packageInfo = await readPackageInfo();
    const upgrader = new Upgrader({
      packageName: packageInfo.name,
      currentVersion: packageInfo.version,
      binName,
    });
    const metaExitCode = await runMetaCommand(args, {
      packageName: packageInfo.name,
      version: packageInfo.version,
      upgrader,
    });
    if (metaExitCode !== null) {
      return metaExitCode;
    }

    // 2. Load Config
    const config = await loadConfig({ cwd, env });
    setDebug(config.debug);
    printDebug(`${packageInfo.name} ${packageInfo.version} in ${cwd}`);

    // 3. Project and plugins
    const sandbox = await ProjectSandbox.open(cwd, { terraformPath: config.terraformPath });
    const disabled = new Set(config.disabledPlugins);
    const registry = new PluginRegistry(createBuiltinPlugins().filter((plugin) => !disabled.has(plugin.name)));

    const dispatcher = new Dispatcher({
      sandbox,
      registry,
      router: new CommandRouter(registry, config.extraCommands),
      lifecycle: new PluginLifecycle(registry),
      binName,
      autoInit: config.autoInit,
    });

    return await dispatcher.dispatch(args);
  } catch (error: unknown) {
    printFatal(error);
    return EXIT_FAILURE;
  }
}

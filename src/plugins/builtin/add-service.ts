import { FlagSet } from '../../core/tfgen/flag-set.js';
import { TerraformFileConfig } from '../../core/tfgen/generator.js';
import type { Sandbox } from '../../core/sandbox/types.js';
import { BasePlugin } from '../base.js';
import type { PluginCommand } from '../types.js';
import { parseCommandArgs, readGeneratedBody, writeGeneratedFile, type GeneratedFileLayout } from './scaffold.js';

const SERVICE_NAME_PATTERN = /^[a-z][a-z0-9-]*$/;

export function serviceLayout(serviceName: string): GeneratedFileLayout {
  const id = serviceName.replace(/-/g, '_');
  return {
    file: `service_${id}.tf`,
    preLines: [`resource "dcos_package" "${id}" {`],
    postLines: ['}'],
    defaultBody: [`app_id = "${serviceName}"`, `package_name = "${serviceName}"`],
  };
}

export function createServiceFileConfig(): TerraformFileConfig {
  const flags = new FlagSet('add-service')
    .define('app_id', 'The marathon application ID of the service. Defaults to the service name.')
    .define('package_name', 'The catalog package to install. Defaults to the service name.')
    .define('package_version', 'The package version to install. The latest version is used when omitted.')
    .define('options', 'A key=value package option. Repeat the flag to set several options.');

  return new TerraformFileConfig({
    flags,
    mapFlags: ['options'],
  });
}

/**
 * `add-service <name>` declares a catalog package on the cluster
 */
export class AddServicePlugin extends BasePlugin {
  readonly name = 'add-service';

  getCommands(): readonly PluginCommand[] {
    return [
      {
        name: 'add-service',
        description: 'Add a catalog service to the cluster',
        handle: (args, sandbox) => this.addService(args, sandbox),
      },
    ];
  }

  private async addService(args: string[], sandbox: Sandbox): Promise<void> {
    const config = createServiceFileConfig();
    const [serviceName, ...extra] = parseCommandArgs(config, args);
    if (!serviceName) {
      throw new Error('expected the service name, e.g. add-service kafka');
    }
    if (!SERVICE_NAME_PATTERN.test(serviceName)) {
      throw new Error(`invalid service name "${serviceName}": use lowercase letters, digits and dashes`);
    }
    if (extra.length > 0) {
      throw new Error(`unexpected argument: ${extra[0]}`);
    }

    const layout = serviceLayout(serviceName);
    config.preLines = layout.preLines;
    config.postLines = layout.postLines;
    config.bodyLines = await readGeneratedBody(sandbox, layout);

    await writeGeneratedFile(sandbox, config, layout.file);
  }
}

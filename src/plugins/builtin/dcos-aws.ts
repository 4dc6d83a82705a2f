/**
 * DC/OS on AWS
 *
 * `add-aws-cluster` scaffolds (or updates) cluster.tf, a module block for the
 * dcos-terraform AWS module. Running it again with new flags rewrites only
 * the attributes named by those flags.
 */

import { FlagSet } from '../../core/tfgen/flag-set.js';
import { TerraformFileConfig } from '../../core/tfgen/generator.js';
import type { Sandbox } from '../../core/sandbox/types.js';
import { projectContains } from '../../core/sandbox/types.js';
import { printInfo } from '../../utils/logger.js';
import { BasePlugin } from '../base.js';
import type { PluginCommand, RunContext } from '../types.js';
import { parseCommandArgs, readGeneratedBody, writeGeneratedFile, type GeneratedFileLayout } from './scaffold.js';

export const CLUSTER_FILE = 'cluster.tf';

export const CLUSTER_LAYOUT: GeneratedFileLayout = {
  file: CLUSTER_FILE,
  preLines: ['module "dcos" {'],
  postLines: ['}'],
  defaultBody: [
    'source  = "dcos-terraform/dcos/aws"',
    'version = "~> 0.2.0"',
    '',
    'cluster_name        = "dcos-cluster"',
    'dcos_version        = "1.13.3"',
    'ssh_public_key_file = "~/.ssh/id_rsa.pub"',
    'num_masters         = "1"',
    'num_private_agents  = "2"',
    'num_public_agents   = "1"',
  ],
};

export function createClusterFileConfig(bodyLines: string[]): TerraformFileConfig {
  const flags = new FlagSet('add-aws-cluster')
    .define('cluster_name', 'The name of the cluster. Used as a prefix for every AWS resource created.')
    .define('dcos_version', 'The DC/OS version to install.')
    .define('ssh_public_key_file', 'Path to the SSH public key installed on every cluster node.')
    .define('num_masters', 'Number of master nodes. Use 1, 3 or 5.')
    .define('num_private_agents', 'Number of private agent nodes.')
    .define('num_public_agents', 'Number of public agent nodes.')
    .define('aws_region', 'The AWS region to create the cluster in. The provider default is used when omitted.')
    .define(
      'admin_ips',
      'A CIDR range allowed to reach the admin endpoints of the cluster. Repeat the flag to allow several ranges.',
    )
    .define('availability_zones', 'An availability zone to spread nodes across. Repeat the flag for several zones.')
    .define('tags', 'A key=value tag added to every AWS resource. Repeat the flag for several tags.');

  return new TerraformFileConfig({
    flags,
    listFlags: ['admin_ips', 'availability_zones'],
    mapFlags: ['tags'],
    preLines: CLUSTER_LAYOUT.preLines,
    bodyLines,
    postLines: CLUSTER_LAYOUT.postLines,
  });
}

export class DcosAwsPlugin extends BasePlugin {
  readonly name = 'dcos-aws';

  getCommands(): readonly PluginCommand[] {
    return [
      {
        name: 'add-aws-cluster',
        description: 'Create or update a DC/OS cluster on AWS',
        handle: (args, sandbox) => this.addCluster(args, sandbox),
      },
    ];
  }

  async isUsed(sandbox: Sandbox): Promise<boolean> {
    return projectContains(sandbox.getProject(), 'module "dcos"');
  }

  async beforeRun(context: RunContext): Promise<void> {
    if (context.isInit) return;
    if (!(await context.sandbox.fileExists('.terraform'))) {
      throw new Error('the project has not been initialized, run `init` first');
    }
  }

  async afterRun(context: RunContext, error?: Error): Promise<void> {
    if (!error && context.args.includes('apply')) {
      printInfo('Cluster is up. Run `output` to see the addresses of its nodes');
    }
  }

  private async addCluster(args: string[], sandbox: Sandbox): Promise<void> {
    const config = createClusterFileConfig(await readGeneratedBody(sandbox, CLUSTER_LAYOUT));
    const positional = parseCommandArgs(config, args);
    if (positional.length > 0) {
      throw new Error(`unexpected argument: ${positional[0]}`);
    }
    await writeGeneratedFile(sandbox, config, CLUSTER_FILE);
  }
}

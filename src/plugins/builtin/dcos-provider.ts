import { formatHcl } from '../../core/tfgen/formatter.js';
import type { Sandbox } from '../../core/sandbox/types.js';
import { projectContains } from '../../core/sandbox/types.js';
import { printInfo } from '../../utils/logger.js';
import { BasePlugin } from '../base.js';
import type { RunContext } from '../types.js';

export const PROVIDER_FILE = 'provider_dcos.tf';
export const DCOS_PROVIDER_SOURCE = 'dcos/dcos';
export const DCOS_PROVIDER_VERSION = '~> 0.5.0';

const DCOS_REFERENCE = /(?:resource|data)\s+"dcos_/;

export function renderProviderPin(version: string = DCOS_PROVIDER_VERSION): string {
  return formatHcl(
    [
      'terraform {',
      'required_providers {',
      'dcos = {',
      `source = "${DCOS_PROVIDER_SOURCE}"`,
      `version = "${version}"`,
      '}',
      '}',
      '}',
    ].join('\n'),
  );
}

/**
 * Pins the dcos provider before `init` in projects that declare dcos_
 * resources or data sources
 */
export class DcosProviderPlugin extends BasePlugin {
  readonly name = 'dcos-provider';

  constructor(private readonly version: string = DCOS_PROVIDER_VERSION) {
    super();
  }

  async isUsed(sandbox: Sandbox): Promise<boolean> {
    return projectContains(sandbox.getProject(), DCOS_REFERENCE);
  }

  async beforeRun(context: RunContext): Promise<void> {
    if (!context.isInit) return;
    if (await context.sandbox.fileExists(PROVIDER_FILE)) return;

    await context.sandbox.writeFile(PROVIDER_FILE, renderProviderPin(this.version));
    printInfo(`Pinned the dcos provider to ${this.version} in ${PROVIDER_FILE}`);
  }
}

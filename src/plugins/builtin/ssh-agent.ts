/**
 * SSH agent wiring
 *
 * The cluster modules connect to new nodes over SSH with the key named by
 * `ssh_public_key_file`. When no agent is running, one is started for the
 * duration of the terraform run and the matching private key is added to it.
 */

import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { execa } from 'execa';
import type { Sandbox, TerraformProject } from '../../core/sandbox/types.js';
import { projectContains } from '../../core/sandbox/types.js';
import { errorMessage } from '../../core/errors/index.js';
import { printDebug, printInfo, printWarning } from '../../utils/logger.js';
import { BasePlugin } from '../base.js';
import type { RunContext } from '../types.js';

const KEY_REFERENCE = /ssh_public_key_file\s*=\s*"([^"]+)"/;
const AGENT_VARIABLE = /(SSH_AUTH_SOCK|SSH_AGENT_PID)=([^;\s]+)/g;

export interface ExecOptions {
  env: NodeJS.ProcessEnv;
  /** Attach to the terminal (ssh-add may ask for a passphrase) */
  interactive?: boolean;
}

export type Executor = (file: string, args: string[], options: ExecOptions) => Promise<string>;

const defaultExecutor: Executor = async (file, args, options) => {
  if (options.interactive) {
    await execa(file, args, { env: options.env, stdio: 'inherit' });
    return '';
  }
  const { stdout } = await execa(file, args, { env: options.env });
  return stdout;
};

/**
 * Private key path for the public key referenced by the project
 */
export function findPrivateKey(project: TerraformProject, homeDir: string = os.homedir()): string | null {
  for (const content of project.files.values()) {
    const match = KEY_REFERENCE.exec(content);
    const publicKey = match?.[1];
    if (publicKey) {
      const expanded = publicKey.startsWith('~/') ? path.join(homeDir, publicKey.slice(2)) : publicKey;
      return expanded.endsWith('.pub') ? expanded.slice(0, -'.pub'.length) : expanded;
    }
  }
  return null;
}

/**
 * Parse the `SSH_AUTH_SOCK=...; export SSH_AUTH_SOCK;` lines printed by `ssh-agent -s`
 */
export function parseAgentOutput(output: string): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const match of output.matchAll(AGENT_VARIABLE)) {
    const [, name, value] = match;
    if (name && value) {
      variables[name] = value;
    }
  }
  return variables;
}

export class SshAgentPlugin extends BasePlugin {
  readonly name = 'ssh-agent';
  private startedAgent = false;

  constructor(
    private readonly exec: Executor = defaultExecutor,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    super();
  }

  async isUsed(sandbox: Sandbox): Promise<boolean> {
    return projectContains(sandbox.getProject(), 'ssh_public_key_file');
  }

  async beforeRun(context: RunContext): Promise<void> {
    if (this.env.SSH_AUTH_SOCK) {
      printDebug(`Using the SSH agent at ${this.env.SSH_AUTH_SOCK}`);
      return;
    }

    const privateKey = findPrivateKey(context.sandbox.getProject());
    if (!privateKey) {
      throw new Error('no ssh_public_key_file is set in the project');
    }
    if (!(await fs.pathExists(privateKey))) {
      throw new Error(`private key ${privateKey} not found`);
    }

    const variables = parseAgentOutput(await this.exec('ssh-agent', ['-s'], { env: this.env }));
    if (!variables.SSH_AUTH_SOCK || !variables.SSH_AGENT_PID) {
      throw new Error('could not parse the output of ssh-agent');
    }
    Object.assign(this.env, variables);
    this.startedAgent = true;
    printInfo(`Started an SSH agent (pid ${variables.SSH_AGENT_PID})`);

    try {
      await this.exec('ssh-add', [privateKey], { env: this.env, interactive: true });
    } catch (error: unknown) {
      // post-hooks are skipped when a pre-hook fails, so the agent is stopped here
      try {
        await this.stopAgent();
      } catch (stopError: unknown) {
        printWarning(`Could not stop the SSH agent: ${errorMessage(stopError)}`);
      }
      throw error;
    }
  }

  async afterRun(_context: RunContext, _error?: Error): Promise<void> {
    if (!this.startedAgent) return;
    await this.stopAgent();
  }

  private async stopAgent(): Promise<void> {
    try {
      await this.exec('ssh-agent', ['-k'], { env: this.env });
    } finally {
      delete this.env.SSH_AUTH_SOCK;
      delete this.env.SSH_AGENT_PID;
      this.startedAgent = false;
    }
  }
}

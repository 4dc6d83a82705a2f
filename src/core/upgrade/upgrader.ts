/**
 * Self-upgrade
 *
 * The wrapper is distributed through npm, so upgrading means installing the
 * newer release globally and letting that release finish the job: the old
 * process writes an upgrade record into a fresh directory and runs
 * `<bin> wheels-complete-upgrade <dir>` from the newly installed version.
 */

import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import semver from 'semver';
import { execa } from 'execa';
import { z } from 'zod';
import { UpgradeError, errorMessage } from '../errors/index.js';

export const DEFAULT_REGISTRY_URL = 'https://registry.npmjs.org';
export const UPGRADE_RECORD_FILE = 'upgrade.json';

const LatestReleaseSchema = z.object({
  version: z.string(),
});

export const UpgradeRecordSchema = z.object({
  packageName: z.string(),
  from: z.string(),
  to: z.string(),
});

export type UpgradeRecord = z.infer<typeof UpgradeRecordSchema>;

export type CommandRunner = (file: string, args: string[]) => Promise<void>;

export interface UpgraderOptions {
  packageName: string;
  currentVersion: string;
  binName: string;
  registryUrl?: string;
  fetchFn?: typeof fetch;
  run?: CommandRunner;
}

export class Upgrader {
  private readonly registryUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly run: CommandRunner;

  constructor(private readonly options: UpgraderOptions) {
    this.registryUrl = (options.registryUrl ?? DEFAULT_REGISTRY_URL).replace(/\/+$/, '');
    this.fetchFn = options.fetchFn ?? fetch;
    this.run = options.run ?? runInherited;
  }

  /**
   * Latest published version from the npm registry
   */
  async getLatestVersion(): Promise<string> {
    const url = `${this.registryUrl}/${encodeURIComponent(this.options.packageName)}/latest`;

    let body: unknown;
    try {
      const response = await this.fetchFn(url, { headers: { accept: 'application/json' } });
      if (!response.ok) {
        throw new Error(`${response.status} ${response.statusText}`);
      }
      body = await response.json();
    } catch (error: unknown) {
      throw new UpgradeError(`Could not check the latest version: ${errorMessage(error)}`);
    }

    const parsed = LatestReleaseSchema.safeParse(body);
    if (!parsed.success || !semver.valid(parsed.data.version)) {
      throw new UpgradeError(`The registry returned an unexpected release description for ${this.options.packageName}`);
    }
    return parsed.data.version;
  }

  isNewer(version: string): boolean {
    const current = semver.valid(this.options.currentVersion);
    if (!current) {
      throw new UpgradeError(`Cannot compare against invalid current version "${this.options.currentVersion}"`);
    }
    return semver.gt(version, current);
  }

  async performUpgrade(version: string): Promise<void> {
    const { packageName, currentVersion, binName } = this.options;
    const recordDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wheels-upgrade-'));
    const record: UpgradeRecord = { packageName, from: currentVersion, to: version };
    await fs.writeJson(path.join(recordDir, UPGRADE_RECORD_FILE), record);

    try {
      await this.run('npm', ['install', '--global', `${packageName}@${version}`]);
    } catch (error: unknown) {
      await fs.remove(recordDir);
      throw new UpgradeError(
        `Could not install ${packageName}@${version}: ${errorMessage(error)}`,
        `Try running: npm install --global ${packageName}@${version}`,
      );
    }

    try {
      await this.run(binName, ['wheels-complete-upgrade', recordDir]);
    } catch (error: unknown) {
      throw new UpgradeError(`Installed ${version}, but could not complete the upgrade: ${errorMessage(error)}`);
    }
  }
}

/**
 * Read and remove the record left by `performUpgrade`
 */
export async function completeUpgrade(recordDir: string): Promise<UpgradeRecord> {
  const recordPath = path.join(recordDir, UPGRADE_RECORD_FILE);
  if (!(await fs.pathExists(recordPath))) {
    throw new UpgradeError(`No upgrade record found in ${recordDir}`);
  }

  let content: unknown;
  try {
    content = await fs.readJson(recordPath);
  } catch (error: unknown) {
    throw new UpgradeError(`Could not read upgrade record ${recordPath}: ${errorMessage(error)}`);
  }

  const parsed = UpgradeRecordSchema.safeParse(content);
  if (!parsed.success) {
    throw new UpgradeError(`Malformed upgrade record ${recordPath}`);
  }

  await fs.remove(recordDir);
  return parsed.data;
}

async function runInherited(file: string, args: string[]): Promise<void> {
  await execa(file, args, { stdio: 'inherit' });
}

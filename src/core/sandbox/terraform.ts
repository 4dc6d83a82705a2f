import path from 'path';
import fs from 'fs-extra';
import { execa, ExecaError } from 'execa';
import { SandboxError, TerraformError, WheelsErrorCode } from '../errors/index.js';
import type { ToolHandle } from './types.js';

const EXECUTABLE_NAME = process.platform === 'win32' ? 'terraform.exe' : 'terraform';

/**
 * Runs terraform in a project directory. Output is not captured: terraform
 * writes straight to the user's terminal and may prompt for input.
 */
export class TerraformWrapper implements ToolHandle {
  private executable: string | null = null;

  constructor(
    private readonly cwd: string,
    private readonly terraformPath?: string,
  ) {}

  async locate(): Promise<string> {
    if (!this.executable) {
      const found = await resolveTerraformExecutable(this.cwd, this.terraformPath);
      if (!found) {
        throw new SandboxError(
          this.terraformPath
            ? `Terraform executable not found at ${this.terraformPath}`
            : 'Terraform executable not found in the project directory or on PATH',
          this.cwd,
          WheelsErrorCode.TERRAFORM_NOT_FOUND,
          'Install terraform, or set "terraformPath" in .wheels/config.json or WHEELS_TERRAFORM_PATH.',
        );
      }
      this.executable = found;
    }
    return this.executable;
  }

  async invoke(args: readonly string[]): Promise<void> {
    const executable = await this.locate();
    try {
      await execa(executable, [...args], {
        cwd: this.cwd,
        stdio: 'inherit',
      });
    } catch (error: unknown) {
      if (error instanceof ExecaError) {
        const command = ['terraform', ...args].join(' ');
        const message =
          error.exitCode === undefined
            ? `Could not run ${command}: ${error.shortMessage}`
            : `${command} exited with code ${error.exitCode}`;
        throw new TerraformError(message, args, error.exitCode);
      }
      throw error;
    }
  }
}

/**
 * Locate the terraform executable.
 *
 * Lookup order:
 * 1. Explicit path (configuration / WHEELS_TERRAFORM_PATH), relative to the project
 * 2. A terraform binary inside the project directory
 * 3. The PATH
 */
export async function resolveTerraformExecutable(
  projectDir: string,
  explicitPath?: string,
  searchPath: string = process.env.PATH ?? '',
): Promise<string | null> {
  if (explicitPath) {
    const candidate = path.resolve(projectDir, explicitPath);
    return (await isExecutableFile(candidate)) ? candidate : null;
  }

  const local = path.join(projectDir, EXECUTABLE_NAME);
  if (await isExecutableFile(local)) {
    return local;
  }

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, EXECUTABLE_NAME);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  if (!(await fs.pathExists(filePath))) {
    return false;
  }
  const stats = await fs.stat(filePath);
  if (!stats.isFile()) {
    return false;
  }
  if (process.platform === 'win32') {
    return true;
  }
  return (stats.mode & 0o111) !== 0;
}

import path from 'path';
import fs from 'fs-extra';
import { glob } from 'glob';
import { SandboxError, errorMessage } from '../errors/index.js';
import { TerraformWrapper, resolveTerraformExecutable } from './terraform.js';
import type { Sandbox, TerraformProject, ToolHandle } from './types.js';

const TERRAFORM_FILE_PATTERNS = ['*.tf', '*.tf.json'];

export interface SandboxOptions {
  /** Explicit terraform executable */
  terraformPath?: string;
}

/**
 * Sandbox backed by a directory on disk
 */
export class ProjectSandbox implements Sandbox {
  private project: TerraformProject = { files: new Map() };
  private terraform: ToolHandle | null = null;

  private constructor(
    public readonly projectDir: string,
    private readonly options: SandboxOptions,
  ) {}

  static async open(dir: string, options: SandboxOptions = {}): Promise<ProjectSandbox> {
    const projectDir = path.resolve(dir);

    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(projectDir)).isDirectory();
    } catch (error: unknown) {
      throw new SandboxError(`Could not open project directory ${projectDir}: ${errorMessage(error)}`, projectDir);
    }
    if (!isDirectory) {
      throw new SandboxError(`Project path ${projectDir} is not a directory`, projectDir);
    }

    const sandbox = new ProjectSandbox(projectDir, options);
    await sandbox.reloadTerraformProject();
    return sandbox;
  }

  async hasTerraformFiles(): Promise<boolean> {
    return (await this.listTerraformFiles()).length > 0;
  }

  async hasTerraform(): Promise<boolean> {
    return (await resolveTerraformExecutable(this.projectDir, this.options.terraformPath)) !== null;
  }

  async getTerraform(): Promise<ToolHandle> {
    if (!this.terraform) {
      this.terraform = new TerraformWrapper(this.projectDir, this.options.terraformPath);
    }
    return this.terraform;
  }

  getProject(): TerraformProject {
    return this.project;
  }

  async reloadTerraformProject(): Promise<void> {
    const files = new Map<string, string>();
    for (const file of await this.listTerraformFiles()) {
      files.set(file, await this.readFile(file));
    }
    this.project = { files };
  }

  async fileExists(relativePath: string): Promise<boolean> {
    return fs.pathExists(this.resolve(relativePath));
  }

  async readFile(relativePath: string): Promise<string> {
    try {
      return await fs.readFile(this.resolve(relativePath), 'utf-8');
    } catch (error: unknown) {
      throw new SandboxError(`Could not read ${relativePath}: ${errorMessage(error)}`, this.projectDir);
    }
  }

  async writeFile(relativePath: string, content: string): Promise<void> {
    try {
      await fs.outputFile(this.resolve(relativePath), content, 'utf-8');
    } catch (error: unknown) {
      throw new SandboxError(`Could not write ${relativePath}: ${errorMessage(error)}`, this.projectDir);
    }
  }

  private resolve(relativePath: string): string {
    const fullPath = path.resolve(this.projectDir, relativePath);
    const relative = path.relative(this.projectDir, fullPath);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new SandboxError(`Path ${relativePath} is outside the project directory`, this.projectDir);
    }
    return fullPath;
  }

  private async listTerraformFiles(): Promise<string[]> {
    try {
      const files = await glob(TERRAFORM_FILE_PATTERNS, { cwd: this.projectDir, nodir: true, dot: false });
      return files.sort();
    } catch (error: unknown) {
      throw new SandboxError(`Could not list terraform files: ${errorMessage(error)}`, this.projectDir);
    }
  }
}

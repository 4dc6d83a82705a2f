/**
 * Sandbox Types
 *
 * A sandbox is the current project directory as seen by terraform: which
 * configuration files it holds and how to run terraform inside it.
 */

/**
 * Handle to the terraform executable, bound to a project directory
 */
export interface ToolHandle {
  /** Path of the executable. Rejects when terraform cannot be found. */
  locate(): Promise<string>;
  /**
   * Run terraform with inherited stdio. Resolves when it exits with 0,
   * rejects with a TerraformError otherwise.
   */
  invoke(args: readonly string[]): Promise<void>;
}

/**
 * Snapshot of the project's terraform files
 */
export interface TerraformProject {
  /** File name (relative to the project) to file contents */
  files: ReadonlyMap<string, string>;
}

export interface Sandbox {
  readonly projectDir: string;

  /** Whether the directory holds any .tf / .tf.json file. Queried every call. */
  hasTerraformFiles(): Promise<boolean>;

  /** Whether a terraform executable could be located */
  hasTerraform(): Promise<boolean>;

  /** Terraform handle; the executable is looked up on first use */
  getTerraform(): Promise<ToolHandle>;

  /** Snapshot loaded at open time or by the last reload */
  getProject(): TerraformProject;

  /** Re-read the project's terraform files */
  reloadTerraformProject(): Promise<void>;

  fileExists(relativePath: string): Promise<boolean>;
  readFile(relativePath: string): Promise<string>;
  writeFile(relativePath: string, content: string): Promise<void>;
}

/**
 * Whether any file in the snapshot contains the given text
 */
export function projectContains(project: TerraformProject, needle: string | RegExp): boolean {
  for (const content of project.files.values()) {
    if (typeof needle === 'string' ? content.includes(needle) : needle.test(content)) {
      return true;
    }
  }
  return false;
}

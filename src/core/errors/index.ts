export enum ConfigErrorCode {
  INVALID_JSON = 'INVALID_JSON',
  INVALID_VALUE = 'INVALID_VALUE',
}

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: ConfigErrorCode, suggestion?: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.suggestion = suggestion;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export enum WheelsErrorCode {
  SANDBOX_IO = 'SANDBOX_IO',
  TERRAFORM_NOT_FOUND = 'TERRAFORM_NOT_FOUND',
  TERRAFORM_FAILED = 'TERRAFORM_FAILED',
  PLUGIN_NOT_APPLICABLE = 'PLUGIN_NOT_APPLICABLE',
  PLUGIN_HOOK_FAILED = 'PLUGIN_HOOK_FAILED',
  PLUGIN_COMMAND_FAILED = 'PLUGIN_COMMAND_FAILED',
  DUPLICATE_COMMAND = 'DUPLICATE_COMMAND',
  FLAG_PARSE = 'FLAG_PARSE',
  INVALID_FLAG_VALUE = 'INVALID_FLAG_VALUE',
  FORMAT_FAILED = 'FORMAT_FAILED',
  UPGRADE_FAILED = 'UPGRADE_FAILED',
}

/**
 * Base class for every error that ends an invocation.
 */
export class WheelsError extends Error {
  public readonly code: WheelsErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: WheelsErrorCode, suggestion?: string) {
    super(message);
    this.name = 'WheelsError';
    this.code = code;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, WheelsError.prototype);
  }
}

export class SandboxError extends WheelsError {
  constructor(
    message: string,
    public readonly projectDir: string,
    code: WheelsErrorCode = WheelsErrorCode.SANDBOX_IO,
    suggestion?: string,
  ) {
    super(message, code, suggestion);
    this.name = 'SandboxError';
    Object.setPrototypeOf(this, SandboxError.prototype);
  }
}

export class TerraformError extends WheelsError {
  constructor(
    message: string,
    public readonly args: readonly string[],
    public readonly exitCode?: number,
  ) {
    super(message, WheelsErrorCode.TERRAFORM_FAILED);
    this.name = 'TerraformError';
    Object.setPrototypeOf(this, TerraformError.prototype);
  }
}

export class PluginError extends WheelsError {
  constructor(
    message: string,
    public readonly pluginName: string,
    code: WheelsErrorCode = WheelsErrorCode.PLUGIN_NOT_APPLICABLE,
  ) {
    super(message, code);
    this.name = 'PluginError';
    Object.setPrototypeOf(this, PluginError.prototype);
  }
}

export type HookPhase = 'beforeRun' | 'afterRun';

export class PluginHookError extends PluginError {
  constructor(
    pluginName: string,
    public readonly phase: HookPhase,
    cause: unknown,
  ) {
    const verb = phase === 'beforeRun' ? 'start' : 'finalize';
    super(`Could not ${verb} ${pluginName}: ${errorMessage(cause)}`, pluginName, WheelsErrorCode.PLUGIN_HOOK_FAILED);
    this.name = 'PluginHookError';
    this.cause = cause;
    Object.setPrototypeOf(this, PluginHookError.prototype);
  }
}

export class PluginRegistryError extends WheelsError {
  constructor(
    message: string,
    public readonly commandName: string,
  ) {
    super(message, WheelsErrorCode.DUPLICATE_COMMAND);
    this.name = 'PluginRegistryError';
    Object.setPrototypeOf(this, PluginRegistryError.prototype);
  }
}

export class FlagParseError extends WheelsError {
  constructor(
    message: string,
    public readonly flagName?: string,
  ) {
    super(message, WheelsErrorCode.FLAG_PARSE);
    this.name = 'FlagParseError';
    Object.setPrototypeOf(this, FlagParseError.prototype);
  }
}

export class FlagValueError extends WheelsError {
  constructor(
    public readonly flagName: string,
    public readonly value: string,
  ) {
    super(
      `Could not parse '${value}' for -${flagName}: expected key=value format`,
      WheelsErrorCode.INVALID_FLAG_VALUE,
    );
    this.name = 'FlagValueError';
    Object.setPrototypeOf(this, FlagValueError.prototype);
  }
}

export class FormatError extends WheelsError {
  constructor(
    reason: string,
    public readonly line?: number,
  ) {
    super(`Could not format output: ${reason}`, WheelsErrorCode.FORMAT_FAILED);
    this.name = 'FormatError';
    Object.setPrototypeOf(this, FormatError.prototype);
  }
}

export class UpgradeError extends WheelsError {
  constructor(message: string, suggestion?: string) {
    super(message, WheelsErrorCode.UPGRADE_FAILED, suggestion);
    this.name = 'UpgradeError';
    Object.setPrototypeOf(this, UpgradeError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

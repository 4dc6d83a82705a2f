/**
 * Utility Functions
 */

/**
 * Get environment variable with default value
 */
export function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

/**
 * Interpret an environment flag such as WHEELS_DEBUG=1
 */
export function isEnvFlagSet(key: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[key];
  if (value === undefined) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Name of the executable as the user typed it
 */
export function getBinName(): string {
  return getEnv('WHEELS_BIN_NAME', 'terraform-wheels');
}

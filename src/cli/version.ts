import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs-extra';
import { z } from 'zod';

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

/**
 * Name and version from the package.json two levels above this module
 * (src/cli or dist/cli)
 */
export async function readPackageInfo(): Promise<PackageInfo> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const packageJson: unknown = await fs.readJson(path.resolve(moduleDir, '..', '..', 'package.json'));
  return PackageInfoSchema.parse(packageJson);
}

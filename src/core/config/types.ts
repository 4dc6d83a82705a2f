/**
 * terraform-wheels configuration
 */

import { z } from 'zod';

export const WheelsConfigSchema = z.object({
  /** Explicit terraform executable; otherwise looked up in the project and on PATH */
  terraformPath: z.string().min(1).optional(),

  /** Run `init` automatically after a plugin command creates the first .tf file */
  autoInit: z.boolean().default(true),

  /** Plugin names to leave out of the registry */
  disabledPlugins: z.array(z.string()).default([]),

  /** Extra terraform subcommands to pass through, for newer terraform releases */
  extraCommands: z.array(z.string().min(1)).default([]),

  /** Verbose logging */
  debug: z.boolean().default(false),
});

export type WheelsConfig = z.infer<typeof WheelsConfigSchema>;

/**
 * Shape of a single config file before defaults are applied
 */
export const PartialWheelsConfigSchema = WheelsConfigSchema.partial().strict();

export type PartialWheelsConfig = z.infer<typeof PartialWheelsConfigSchema>;

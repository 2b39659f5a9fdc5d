/**
 * Config Schema Validation
 *
 * Zod schema for the On Air Link configuration file. Every field has a
 * default, so an empty file is a valid config.
 */

import { z } from 'zod';

const portSchema = z.number().int().min(1).max(65535);

const midiConfigSchema = z.object({
  portMatch: z.string().min(1).default('DJM'),
  pollIntervalMs: z.number().int().min(50).default(500),
});

const networkConfigSchema = z.object({
  interface: z.string().min(1).default('eth0'),
  port: portSchema.default(50001),
  localBroadcast: z.boolean().default(false),
});

const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  pretty: z.boolean().optional(),
});

export const linkConfigSchema = z.object({
  /** Longer than 20 UTF-8 bytes is truncated, with a warning */
  deviceName: z.string().min(1).default('On Air Link'),
  midi: midiConfigSchema.default({}),
  network: networkConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type LinkConfigInput = z.input<typeof linkConfigSchema>;
export type LinkConfig = z.output<typeof linkConfigSchema>;

export function validateLinkConfig(data: unknown): LinkConfig {
  return linkConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}

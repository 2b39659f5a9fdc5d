/**
 * Configuration loader
 *
 * Reads an optional YAML config file and validates it. A missing file
 * means all defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { LinkConfig, formatZodError, validateLinkConfig } from './config-schema';

export type { LinkConfig } from './config-schema';

export const DEFAULT_CONFIG_FILE = 'config.yml';

/** Validate an already-parsed config object */
export function buildConfig(raw: unknown): LinkConfig {
  try {
    return validateLinkConfig(raw ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

/**
 * Load config from YAML. With no explicit path, config.yml in the working
 * directory is used if present.
 */
export function loadConfig(configPath?: string): LinkConfig {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    if (configPath) {
      throw new Error(`[Config] Config file not found: ${configPath}`);
    }
    return buildConfig({});
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[Config] Invalid YAML in ${resolvedPath}: ${message}`);
  }
  return buildConfig(parsed);
}

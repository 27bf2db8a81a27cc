/**
 * Configuration Module
 *
 * Loads and validates environment variables for the court harvester.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { resolve } from 'node:path';

/**
 * Placeholder value shipped in `.env.example`; treated the same as a missing key.
 */
export const API_KEY_PLACEHOLDER = 'paste_your_key_here';

/** Default number of courts to enrich per run */
export const DEFAULT_MAX_ENRICH = 500;

// Environment schema with optional values and defaults
const envSchema = z.object({
  // API key (allow starting without it so offline commands still work)
  GOOGLE_API_KEY: z.string().optional(),

  // Output locations
  COURTS_DATA_DIR: z.string().optional(),
  COURTS_DOCS_DIR: z.string().optional(),

  // Enrichment cap per run
  COURTS_MAX_ENRICH: z.coerce.number().int().min(0).optional(),
});

/**
 * Raised when configuration needed for a command is missing or invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Resolved application configuration
 */
export interface Config {
  apiKey: string | undefined;
  dataDir: string;
  docsDir: string;
  maxEnrich: number;
}

/**
 * Build configuration from an environment map.
 *
 * Relative directories resolve against the current working directory.
 *
 * @throws ConfigError if a variable fails validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const details = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${details}`);
  }

  const parsed = parseResult.data;

  return {
    apiKey: parsed.GOOGLE_API_KEY?.trim() || undefined,
    dataDir: resolve(parsed.COURTS_DATA_DIR ?? 'data'),
    docsDir: resolve(parsed.COURTS_DOCS_DIR ?? 'docs'),
    maxEnrich: parsed.COURTS_MAX_ENRICH ?? DEFAULT_MAX_ENRICH,
  };
}

/**
 * Get the API key or throw if it is missing or still the placeholder
 */
export function requireApiKey(config: Config): string {
  const key = config.apiKey;
  if (!key || key === API_KEY_PLACEHOLDER) {
    throw new ConfigError(
      'Missing required API key: GOOGLE_API_KEY. Please set it in your .env file.'
    );
  }
  return key;
}

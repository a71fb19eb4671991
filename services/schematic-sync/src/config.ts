/**
 * Schematic Sync - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import { z } from 'zod';

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logSilent: z.boolean().default(false),
  logFormat: z.enum(['text', 'json']).default('text'),

  // Build Metadata
  buildId: z.string().optional(),
  version: z.string().default('1.0.0'),
  serviceId: z.string().default('schematic-sync'),

  // Reconciliation Defaults
  sync: z.object({
    preserveUnmatchedDestination: z.boolean().default(true),
    maxRefinementIterations: z.number().int().min(1).max(32).default(4),
    matchMode: z.enum(['identity', 'topology']).default('identity'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export type Environment = Record<string, string | undefined>;

export function loadConfig(env: Environment = process.env): Config {
  const rawConfig = {
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    logSilent: env.LOG_SILENT === 'true',
    logFormat: env.LOG_FORMAT || 'text',

    buildId: env.SCHEMATIC_SYNC_BUILD_ID,
    version: env.SCHEMATIC_SYNC_VERSION || '1.0.0',
    serviceId: env.SCHEMATIC_SYNC_SERVICE_ID || 'schematic-sync',

    sync: {
      preserveUnmatchedDestination: env.SYNC_PRESERVE_UNMATCHED !== 'false',
      maxRefinementIterations: parseInt(env.SYNC_MAX_REFINEMENT_ITERATIONS || '4', 10),
      matchMode: env.SYNC_MATCH_MODE || 'identity',
    },
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();

export function getConfig(): Config {
  return config;
}

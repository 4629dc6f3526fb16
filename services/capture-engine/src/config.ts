/**
 * Capture Rig - Configuration
 *
 * Process-level settings with environment variable support. Per-test rig
 * layouts (instruments, sources, stop channels) live in the rig file, see
 * services/rig-config.
 */

import 'dotenv/config';
import { z } from 'zod';

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logSilent: z.boolean().default(false),

  // Build Metadata
  serviceName: z.string().default('capture-rig'),
  version: z.string().default('1.0.0'),
  buildId: z.string().optional(),

  // Shutdown
  shutdown: z.object({
    graceTimeoutMs: z.number().int().positive().default(30000),
    emergencyOffTimeoutMs: z.number().int().positive().default(500),
  }),

  // Acquisition defaults, overridable per instrument in the rig file
  acquisition: z.object({
    acquireTimeoutMs: z.number().int().positive().default(2000),
    maxRetriesPerIteration: z.number().int().min(0).default(2),
    retryDelayMs: z.number().int().min(0).default(100),
  }),

  // Reconciliation
  reconcile: z.object({
    marginMs: z.number().int().min(0).default(5000),
    lookbackMs: z.number().int().positive().default(24 * 3600 * 1000),
  }),

  // Control server (status + remote stop)
  controlServer: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(8090),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',
    logSilent: process.env.LOG_SILENT === 'true',

    serviceName: process.env.CAPTURE_SERVICE_NAME || 'capture-rig',
    version: process.env.CAPTURE_VERSION || '1.0.0',
    buildId: process.env.CAPTURE_BUILD_ID,

    shutdown: {
      graceTimeoutMs: parseInt(process.env.GRACE_TIMEOUT_MS || '30000', 10),
      emergencyOffTimeoutMs: parseInt(process.env.EMERGENCY_OFF_TIMEOUT_MS || '500', 10),
    },

    acquisition: {
      acquireTimeoutMs: parseInt(process.env.ACQUIRE_TIMEOUT_MS || '2000', 10),
      maxRetriesPerIteration: parseInt(process.env.MAX_RETRIES_PER_ITERATION || '2', 10),
      retryDelayMs: parseInt(process.env.RETRY_DELAY_MS || '100', 10),
    },

    reconcile: {
      marginMs: parseInt(process.env.RECONCILE_MARGIN_MS || '5000', 10),
      lookbackMs: parseInt(process.env.RECONCILE_LOOKBACK_MS || String(24 * 3600 * 1000), 10),
    },

    controlServer: {
      host: process.env.CONTROL_HOST || '127.0.0.1',
      port: parseInt(process.env.CONTROL_PORT || '8090', 10),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();

export function getConfig(): Config {
  return config;
}

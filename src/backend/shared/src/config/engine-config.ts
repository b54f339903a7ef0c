/**
 * Engine Configuration
 *
 * Runtime settings for the evaluation engine: logging, the set of carrier
 * materials approved for medical use, and the delivery weights.
 * Values can be supplied from environment variables.
 *
 * @tested tests/property/engine-config.property.test.ts
 */

import { z } from 'zod';

import { DEFAULT_APPROVED_MATERIALS, KNOWN_MATERIALS } from '../models/design.js';
import { DEFAULT_DELIVERY_WEIGHTS, DeliveryWeightsSchema } from '../models/scoring.js';
import { LogLevelSchema } from '../logging/logger.js';

/**
 * Schema for the engine configuration
 */
export const EngineConfigSchema = z.object({
  serviceName: z.string().min(1).max(100),
  logLevel: LogLevelSchema,
  enableConsoleLogging: z.boolean(),
  approvedMaterials: z.array(z.enum(KNOWN_MATERIALS)),
  deliveryWeights: DeliveryWeightsSchema,
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Default engine configuration
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  serviceName: 'nanoeval',
  logLevel: 'info',
  enableConsoleLogging: true,
  approvedMaterials: [...DEFAULT_APPROVED_MATERIALS],
  deliveryWeights: DEFAULT_DELIVERY_WEIGHTS,
};

/**
 * Environment variables read by {@link loadEngineConfig}
 */
export const ENGINE_ENV_VARS = {
  SERVICE_NAME: 'NANOEVAL_SERVICE_NAME',
  LOG_LEVEL: 'NANOEVAL_LOG_LEVEL',
  LOG_CONSOLE: 'NANOEVAL_LOG_CONSOLE',
  APPROVED_MATERIALS: 'NANOEVAL_APPROVED_MATERIALS',
} as const;

function parseMaterialList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Loads the engine configuration from environment variables,
 * falling back to the defaults for anything unset.
 *
 * @throws ZodError when a variable holds an invalid value
 */
export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const approvedMaterials = env[ENGINE_ENV_VARS.APPROVED_MATERIALS];

  return EngineConfigSchema.parse({
    serviceName: env[ENGINE_ENV_VARS.SERVICE_NAME] || DEFAULT_ENGINE_CONFIG.serviceName,
    logLevel: env[ENGINE_ENV_VARS.LOG_LEVEL] || DEFAULT_ENGINE_CONFIG.logLevel,
    enableConsoleLogging: env[ENGINE_ENV_VARS.LOG_CONSOLE] !== 'false',
    approvedMaterials: approvedMaterials
      ? parseMaterialList(approvedMaterials)
      : DEFAULT_ENGINE_CONFIG.approvedMaterials,
    deliveryWeights: DEFAULT_ENGINE_CONFIG.deliveryWeights,
  });
}

/**
 * Merges partial overrides into a configuration and validates the result
 */
export function mergeEngineConfig(
  overrides: Partial<EngineConfig> = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  return EngineConfigSchema.parse({ ...base, ...overrides });
}

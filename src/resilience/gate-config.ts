/**
 * Serializable configuration of a call gate.
 * @module resilience/gate-config
 */

import { err, ok, Result } from 'neverthrow';
import { z } from 'zod';
import { ConfigurationError } from '../errors/categories.js';

const rateWindowSchema = z.object({
  name: z.string().min(1),
  maxRequests: z.number().int().positive(),
  periodSeconds: z.number().positive(),
});

/**
 * Zod schema for gate configuration. Times are in seconds.
 */
export const gateConfigSchema = z
  .object({
    windows: z.array(rateWindowSchema).min(1),
    failureThreshold: z.number().int().positive().default(5),
    recoveryTimeoutSeconds: z.number().nonnegative().default(60),
    maxRetries: z.number().int().nonnegative().default(3),
    initialDelaySeconds: z.number().nonnegative().default(1),
    maxDelaySeconds: z.number().nonnegative().default(60),
    backoffFactor: z.number().gt(1).default(2),
  })
  .superRefine((config, ctx) => {
    const names = new Set<string>();
    config.windows.forEach((window, index) => {
      if (names.has(window.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['windows', index, 'name'],
          message: `Duplicate window name ${window.name}`,
        });
      }
      names.add(window.name);
    });

    if (config.maxDelaySeconds < config.initialDelaySeconds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxDelaySeconds'],
        message: 'Must be at least initialDelaySeconds',
      });
    }
  });

/**
 * Fully resolved gate configuration
 */
export type GateConfig = z.output<typeof gateConfigSchema>;

/**
 * Gate configuration as written by a caller; everything but `windows` has a default
 */
export type GateConfigInput = z.input<typeof gateConfigSchema>;

/**
 * Validates a configuration and fills in defaults
 */
export function validateGateConfig(input: unknown): Result<GateConfig, ConfigurationError> {
  const result = gateConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    return err(
      new ConfigurationError(`Invalid gate configuration: ${issues.join(', ')}`, { issues }),
    );
  }
  return ok(result.data);
}

/**
 * Validates a configuration and fills in defaults
 * @throws ConfigurationError
 */
export function resolveGateConfig(input: GateConfigInput): GateConfig {
  const result = validateGateConfig(input);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

/**
 * JSON form of a configuration. The retryable predicate is code and is not part of it.
 */
export function serializeGateConfig(config: GateConfig): string {
  return JSON.stringify(config);
}

/**
 * Reads a configuration written by serializeGateConfig
 */
export function parseGateConfig(json: string): Result<GateConfig, ConfigurationError> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ConfigurationError(`Gate configuration is not valid JSON: ${reason}`));
  }
  return validateGateConfig(raw);
}

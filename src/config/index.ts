import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { RelayConfig } from '../types';

/**
 * Environment variables set on the function by the deployment.
 * Names match the ones the infrastructure definitions export.
 */
const envSchema = z.object({
  DDB_TABLE: z.string().trim().min(1),
  SNS_ARN: z.string().trim().min(1),
  AWS_REGION: z.string().trim().min(1).optional(),
});

/**
 * Load and validate relay configuration from the environment.
 * Throws ConfigurationError naming every missing or empty variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = envSchema.safeParse({
    DDB_TABLE: env.DDB_TABLE,
    SNS_ARN: env.SNS_ARN,
    // Lambda always sets AWS_REGION; treat an empty value as unset
    AWS_REGION: env.AWS_REGION || undefined,
  });

  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new ConfigurationError(variables);
  }

  return {
    tableName: parsed.data.DDB_TABLE,
    topicArn: parsed.data.SNS_ARN,
    region: parsed.data.AWS_REGION,
  };
}

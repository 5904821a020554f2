/**
 * Open Food Facts lookup configuration
 *
 * Read once from the environment when the service container is built.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';

export interface UpcApiConfig {
  baseUrl: string;
  stagingUrl: string;
  useStaging: boolean;
  userAgent: string;
  timeoutMs: number;
  stagingUsername: string;
  stagingPassword: string;
}

export const DEFAULT_UPC_API_CONFIG: UpcApiConfig = {
  baseUrl: 'https://world.openfoodfacts.org',
  stagingUrl: 'https://world.openfoodfacts.net',
  useStaging: false,
  userAgent: 'HouseholdInventory/1.0 (inventory@example.com)',
  timeoutMs: 5000,
  // Open Food Facts publishes these credentials for its staging server
  stagingUsername: 'off',
  stagingPassword: 'off',
};

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const UpcApiConfigSchema = z.object({
  baseUrl: z.string().trim().url('Base URL must be a valid URL'),
  stagingUrl: z.string().trim().url('Staging URL must be a valid URL'),
  useStaging: z.boolean(),
  userAgent: z.string().trim().min(1, 'User agent cannot be empty'),
  timeoutMs: z.number().int().positive('Timeout must be positive'),
  stagingUsername: z.string(),
  stagingPassword: z.string(),
});

/**
 * Validate a config object, raising ConfigurationError naming the first bad setting
 */
export function validateUpcApiConfig(config: UpcApiConfig): UpcApiConfig {
  const result = UpcApiConfigSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      issue ? `upcApi.${issue.path.join('.')}` : 'upcApi',
      issue?.message ?? 'invalid value'
    );
  }
  return {
    ...result.data,
    baseUrl: result.data.baseUrl.replace(/\/+$/, ''),
    stagingUrl: result.data.stagingUrl.replace(/\/+$/, ''),
  };
}

export function readUpcApiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): UpcApiConfig {
  const useStagingRaw = env['UPC_API_USE_STAGING'];
  let useStaging = DEFAULT_UPC_API_CONFIG.useStaging;
  if (useStagingRaw !== undefined) {
    const parsed = booleanFlag.safeParse(useStagingRaw.trim().toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError('UPC_API_USE_STAGING', `expected true or false, got "${useStagingRaw}"`);
    }
    useStaging = parsed.data;
  }

  const timeoutRaw = env['UPC_API_TIMEOUT_MS'];
  const timeoutMs =
    timeoutRaw === undefined ? DEFAULT_UPC_API_CONFIG.timeoutMs : Number(timeoutRaw);

  return validateUpcApiConfig({
    baseUrl: env['UPC_API_BASE_URL'] ?? DEFAULT_UPC_API_CONFIG.baseUrl,
    stagingUrl: env['UPC_API_STAGING_URL'] ?? DEFAULT_UPC_API_CONFIG.stagingUrl,
    useStaging,
    userAgent: env['UPC_API_USER_AGENT'] ?? DEFAULT_UPC_API_CONFIG.userAgent,
    timeoutMs,
    stagingUsername: env['UPC_API_STAGING_USERNAME'] ?? DEFAULT_UPC_API_CONFIG.stagingUsername,
    stagingPassword: env['UPC_API_STAGING_PASSWORD'] ?? DEFAULT_UPC_API_CONFIG.stagingPassword,
  });
}

/**
 * Environment Configuration
 * Reads the HubSpot credential, base URL and request timeouts from the environment.
 */

import {
  ConfigurationError,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUTS,
  type OperationTimeouts,
} from '@company-hierarchy/crm-client';

export const ACCESS_TOKEN_ENV = 'HUBSPOT_API_ACCESS_TOKEN';

export const MISSING_TOKEN_MESSAGE =
  'A Hubspot API access token is required. Provide it via command line "--api_access_token" or ' +
  `set ${ACCESS_TOKEN_ENV} in a .env file in the project root.`;

export interface SyncConfig {
  hubspot: {
    accessToken?: string;
    baseUrl: string;
  };
  timeouts: OperationTimeouts;
}

type Env = Record<string, string | undefined>;

function parseTimeout(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return parsed > 0 ? parsed : fallback;
}

/**
 * Load configuration from environment variables.
 */
export function loadConfigFromEnv(env: Env): SyncConfig {
  return {
    hubspot: {
      accessToken: env[ACCESS_TOKEN_ENV] || undefined,
      baseUrl: env.HUBSPOT_BASE_URL || DEFAULT_BASE_URL,
    },
    timeouts: {
      findParent: parseTimeout(env.HUBSPOT_SEARCH_TIMEOUT_MS, DEFAULT_TIMEOUTS.findParent),
      createParent: parseTimeout(env.HUBSPOT_CREATE_TIMEOUT_MS, DEFAULT_TIMEOUTS.createParent),
      renameParent: parseTimeout(env.HUBSPOT_UPDATE_TIMEOUT_MS, DEFAULT_TIMEOUTS.renameParent),
      associate: parseTimeout(env.HUBSPOT_ASSOCIATE_TIMEOUT_MS, DEFAULT_TIMEOUTS.associate),
    },
  };
}

/**
 * Validate configuration has required fields.
 */
export function validateConfig(config: SyncConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.hubspot.accessToken) {
    errors.push(`Missing ${ACCESS_TOKEN_ENV}`);
  }
  if (!/^https?:\/\/\S+$/.test(config.hubspot.baseUrl)) {
    errors.push(`Invalid HUBSPOT_BASE_URL: ${config.hubspot.baseUrl}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * The command-line token wins over the environment. Throws before any request is made.
 */
export function resolveAccessToken(cliToken: string | undefined, config: SyncConfig): string {
  if (cliToken) return cliToken;
  if (config.hubspot.accessToken) return config.hubspot.accessToken;
  throw new ConfigurationError(MISSING_TOKEN_MESSAGE);
}

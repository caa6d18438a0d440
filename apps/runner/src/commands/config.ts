/**
 * Config Command
 *
 * Show the configuration the sync would run with.
 */

import { loadConfigFromEnv, validateConfig } from '@company-hierarchy/crm-core';
import type { CommandDeps } from './sync.js';

export function maskToken(token: string | undefined): string {
  if (!token) return '(not set)';
  if (token.length <= 8) return '****';
  return `${token.slice(0, 4)}…${token.slice(-4)}`;
}

export function showConfig(deps: CommandDeps = {}): number {
  const logger = deps.logger ?? console;
  const config = loadConfigFromEnv(deps.env ?? process.env);

  logger.log('\n⚙️  Configuration\n');
  logger.log(`  HUBSPOT_API_ACCESS_TOKEN: ${maskToken(config.hubspot.accessToken)}`);
  logger.log(`  HUBSPOT_BASE_URL: ${config.hubspot.baseUrl}`);
  for (const [operation, ms] of Object.entries(config.timeouts)) {
    logger.log(`  timeout.${operation}: ${ms}ms`);
  }

  const { valid, errors } = validateConfig(config);
  if (!valid) {
    logger.log('');
    errors.forEach((e) => logger.error(`  ❌ ${e}`));
    return 1;
  }

  logger.log('\n  ✅ Configuration valid');
  return 0;
}

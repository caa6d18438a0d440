/**
 * Sync Command
 *
 * Reconciles one location and prints the resulting parent company.
 */

import { isCompanySyncError, type Logger } from '@company-hierarchy/crm-client';
import { loadConfigFromEnv, reconcile } from '@company-hierarchy/crm-core';

export interface SyncCommandOptions {
  locationId: string;
  accessToken?: string;
  verbose: boolean;
}

export interface CommandDeps {
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

export const EXIT_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;

export function exitCodeFor(error: unknown): number {
  if (isCompanySyncError(error) && error.kind === 'configuration') {
    return EXIT_CONFIGURATION;
  }
  return EXIT_FAILURE;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export async function runSync(options: SyncCommandOptions, deps: CommandDeps = {}): Promise<number> {
  const logger = deps.logger ?? console;
  const config = loadConfigFromEnv(deps.env ?? process.env);

  try {
    const parent = await reconcile(options.locationId, options.accessToken, {
      config,
      verbose: options.verbose,
      logger,
    });

    logger.log(JSON.stringify(parent, null, 2));
    logger.log('\n\n\nScript completed successfully.');
    return 0;
  } catch (error) {
    logger.error(`❌ ${formatError(error)}`);
    return exitCodeFor(error);
  }
}

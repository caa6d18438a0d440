#!/usr/bin/env -S npx tsx
/**
 * Company Sync CLI
 *
 * Links HubSpot child companies to their parent company for a location id.
 */

import 'dotenv/config';
import { Command } from 'commander';

const program = new Command();

program
  .name('company-sync')
  .description('Company Sync CLI - Link HubSpot child companies to their parent company')
  .version('0.1.0');

// Sync command
program
  .command('sync', { isDefault: true })
  .description('Find or create the parent company and associate its children')
  .requiredOption('-p, --parent_id <id>', 'Client Parent Location ID')
  .option('--api_access_token <token>', 'Hubspot API Access Token')
  .option('--verbose', 'Enable pretty-printing of api responses')
  .action(async (options: { parent_id: string; api_access_token?: string; verbose?: boolean }) => {
    const { runSync } = await import('./commands/sync.js');
    process.exitCode = await runSync({
      locationId: options.parent_id,
      accessToken: options.api_access_token,
      verbose: options.verbose || false,
    });
  });

// Config command
program
  .command('config')
  .description('Show the resolved configuration')
  .action(async () => {
    const { showConfig } = await import('./commands/config.js');
    process.exitCode = showConfig();
  });

// Parse and run
await program.parseAsync();

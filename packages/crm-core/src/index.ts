/**
 * CRM Core Library
 *
 * Parent/child company reconciliation on top of the HubSpot companies client.
 *
 * @example
 * ```typescript
 * import { createCompaniesClient } from '@company-hierarchy/crm-client';
 * import { reconcileCompanies } from '@company-hierarchy/crm-core';
 *
 * const client = createCompaniesClient(process.env.HUBSPOT_API_ACCESS_TOKEN ?? '');
 * const { parent, action } = await reconcileCompanies(client, 'loc-1');
 * ```
 */

// Engines
export {
  reconcileCompanies,
  reconcile,
  type ReconcileAction,
  type ReconcileResult,
  type ReconcileOptions,
  type ReconcileRunOptions,
} from './engines/reconcile-engine.js';

// Utils / Config
export {
  loadConfigFromEnv,
  validateConfig,
  resolveAccessToken,
  createVerboseObserver,
  describeResponse,
  ACCESS_TOKEN_ENV,
  MISSING_TOKEN_MESSAGE,
  type SyncConfig,
} from './utils/index.js';

/**
 * Reconcile Engine
 *
 * Finds or creates the parent company for a location id and links every
 * child company tagged with that id to it.
 *
 * Runs are not transactional: a failed association leaves the edges created
 * for earlier children in place.
 */

import {
  IMPORTED_NAME_PROPERTY,
  createCompaniesClient,
  type CompaniesApi,
  type CompanyRecord,
  type Logger,
  type ResponseObserver,
} from '@company-hierarchy/crm-client';
import { loadConfigFromEnv, resolveAccessToken, type SyncConfig } from '../utils/config.js';
import { createVerboseObserver } from '../utils/verbose.js';

export type ReconcileAction = 'created' | 'renamed' | 'rename-skipped';

export interface ReconcileResult {
  parent: CompanyRecord;
  action: ReconcileAction;
  children: CompanyRecord[];
  /** Child ids linked to the parent, in request order. */
  associated: string[];
}

export interface ReconcileOptions {
  logger?: Logger;
}

export async function reconcileCompanies(
  api: CompaniesApi,
  locationId: string,
  options: ReconcileOptions = {},
): Promise<ReconcileResult> {
  const logger = options.logger ?? console;

  const children = await api.listChildren(locationId);
  logger.log(`[Reconcile] ${children.length} child companies tagged with ${locationId}`);

  const existing = await api.findParent(locationId);

  let parent: CompanyRecord;
  let action: ReconcileAction;

  if (existing) {
    const importedName = existing.properties[IMPORTED_NAME_PROPERTY] ?? '';
    const renamed = await api.renameParent(existing, importedName);
    parent = renamed.record;
    action = renamed.status === 'updated' ? 'renamed' : 'rename-skipped';
    logger.log(`[Reconcile] Found parent ${existing.id} (${action})`);
  } else {
    parent = await api.createParent(locationId, children);
    action = 'created';
    logger.log(`[Reconcile] Created parent ${parent.id} "${parent.properties.name ?? ''}"`);
  }

  const associated: string[] = [];
  for (const child of children) {
    await api.associate(child.id, parent.id);
    associated.push(child.id);
  }
  logger.log(`[Reconcile] Associated ${associated.length} children with parent ${parent.id}`);

  return { parent, action, children, associated };
}

export interface ReconcileRunOptions extends ReconcileOptions {
  config?: SyncConfig;
  /** Echo every raw response through the logger. Ignored when `observer` is set. */
  verbose?: boolean;
  observer?: ResponseObserver;
}

/**
 * Builds a client from configuration and returns the resolved parent.
 */
export async function reconcile(
  locationId: string,
  accessToken: string | undefined,
  options: ReconcileRunOptions = {},
): Promise<CompanyRecord> {
  const config = options.config ?? loadConfigFromEnv(process.env);
  const token = resolveAccessToken(accessToken, config);
  const observer =
    options.observer ?? (options.verbose ? createVerboseObserver(options.logger) : undefined);

  const client = createCompaniesClient(token, {
    baseUrl: config.hubspot.baseUrl,
    timeouts: config.timeouts,
    observer,
    logger: options.logger,
  });

  const { parent } = await reconcileCompanies(client, locationId, options);
  return parent;
}

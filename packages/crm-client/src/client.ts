/**
 * CRM Client
 *
 * HTTP client for the HubSpot companies API: lists child companies,
 * searches for the parent by location id, renames or creates the parent
 * and links children to it with HubSpot's parent/child associations.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { companyCollectionSchema, companyRecordSchema } from './schemas.js';
import {
  DataIntegrityError,
  PreconditionError,
  RemoteAssociationError,
  RemoteCreateError,
  RemoteFetchError,
  RemoteUpdateError,
} from './errors.js';
import type {
  AssociationEdge,
  CompaniesApi,
  CompaniesClientConfig,
  CompanyRecord,
  HttpMethod,
  Logger,
  Operation,
  OperationTimeouts,
  RenameResult,
  ResponseObserver,
} from './types.js';

export const DEFAULT_BASE_URL = 'https://api.hubapi.com';
export const COMPANIES_PATH = '/crm/v3/objects/companies';
export const ASSOCIATIONS_PATH = '/crm/v4/associations/companies/companies/batch/create';

export const PARENT_TO_CHILD_TYPE_ID = 13;
export const CHILD_TO_PARENT_TYPE_ID = 14;

export const CHILD_LINK_PROPERTY = 'client_parent_company_id';
export const LOCATION_PROPERTY = 'client_company_location_id';
export const IMPORTED_NAME_PROPERTY = 'imported_company_name';

export const UNNAMED_COMPANY = 'Unnamed Company';
export const PARENT_SUFFIX = ' - Parent';

export const DEFAULT_TIMEOUTS: OperationTimeouts = {
  findParent: 10000,
  createParent: 10000,
  renameParent: 30000,
  associate: 30000,
};

interface RawResponse {
  status: number;
  body: unknown;
  detail: string;
}

interface SendOptions {
  payload?: unknown;
  timeout?: number;
  context?: Record<string, string>;
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function parentNameFor(seedChild: CompanyRecord): string {
  return (seedChild.properties.name ?? UNNAMED_COMPANY) + PARENT_SUFFIX;
}

export class CompaniesClient implements CompaniesApi {
  private baseUrl: string;
  private accessToken: string;
  private timeouts: OperationTimeouts;
  private observer?: ResponseObserver;
  private logger: Logger;

  constructor(config: CompaniesClientConfig) {
    this.baseUrl = (config.baseUrl || DEFAULT_BASE_URL).replace(/\/$/, '');
    this.accessToken = config.accessToken;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...config.timeouts };
    this.observer = config.observer;
    this.logger = config.logger ?? console;
  }

  private async send(
    operation: Operation,
    method: HttpMethod,
    url: string,
    options: SendOptions = {},
  ): Promise<RawResponse> {
    const response = await fetch(url, {
      method,
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        'Content-Type': 'application/json',
      },
      body: options.payload === undefined ? undefined : JSON.stringify(options.payload),
      signal: options.timeout === undefined ? undefined : AbortSignal.timeout(options.timeout),
    });

    const detail = await response.text();
    const body = parseBody(detail);

    this.observer?.({
      operation,
      method,
      url,
      status: response.status,
      body,
      detail,
      context: options.context ?? {},
    });

    return { status: response.status, body, detail };
  }

  private decode<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    raw: RawResponse,
    fail: (detail: string) => Error,
  ): T {
    const parsed = schema.safeParse(raw.body);
    if (!parsed.success) {
      throw fail(raw.detail);
    }
    return parsed.data;
  }

  // === READS ===

  async listChildren(locationId: string): Promise<CompanyRecord[]> {
    const params = new URLSearchParams({ properties: `${CHILD_LINK_PROPERTY},name` });
    const raw = await this.send('listChildren', 'GET', `${this.baseUrl}${COMPANIES_PATH}?${params}`, {
      timeout: this.timeouts.listChildren,
      context: { locationId },
    });

    const fail = (detail: string) =>
      new RemoteFetchError(`Failed to fetch child companies: ${detail}`, raw.status, detail);

    if (raw.status !== 200) {
      throw fail(raw.detail);
    }

    // Only the first page is read; HubSpot's default page size caps the result.
    const { results } = this.decode(companyCollectionSchema, raw, fail);
    return results.filter((company) => company.properties[CHILD_LINK_PROPERTY] === locationId);
  }

  async findParent(locationId: string): Promise<CompanyRecord | null> {
    const raw = await this.send('findParent', 'POST', `${this.baseUrl}${COMPANIES_PATH}/search`, {
      payload: {
        filterGroups: [
          {
            filters: [{ propertyName: LOCATION_PROPERTY, operator: 'EQ', value: locationId }],
          },
        ],
        properties: [LOCATION_PROPERTY, 'name', IMPORTED_NAME_PROPERTY],
      },
      timeout: this.timeouts.findParent,
      context: { locationId },
    });

    const fail = (detail: string) =>
      new RemoteFetchError(`Failed to fetch parent company: ${detail}`, raw.status, detail);

    if (raw.status !== 200) {
      throw fail(raw.detail);
    }

    const { results } = this.decode(companyCollectionSchema, raw, fail);
    if (results.length > 1) {
      throw new DataIntegrityError(
        `Multiple companies found with Client Company Location ID: ${locationId}. Expected only one or zero.`,
        locationId,
        results.length,
      );
    }

    return results[0] ?? null;
  }

  // === WRITES ===

  async renameParent(parent: CompanyRecord, importedName: string): Promise<RenameResult> {
    if (!importedName.trim()) {
      this.logger.warn(
        `[CRM] Imported Company Name is empty for company ID: ${parent.id}. Skipping update.`,
      );
      return { status: 'skipped', record: parent };
    }

    const raw = await this.send(
      'renameParent',
      'PATCH',
      `${this.baseUrl}${COMPANIES_PATH}/${encodeURIComponent(parent.id)}`,
      {
        payload: { properties: { name: importedName } },
        timeout: this.timeouts.renameParent,
        context: { companyId: parent.id, name: importedName },
      },
    );

    const fail = (detail: string) =>
      new RemoteUpdateError(`Failed to update parent company: ${detail}`, raw.status, detail);

    if (raw.status < 200 || raw.status >= 300) {
      throw fail(raw.detail);
    }

    // A 2xx without a record body (e.g. 204) still means the name was written.
    const parsed = companyRecordSchema.safeParse(raw.body);
    const record = parsed.success
      ? parsed.data
      : { ...parent, properties: { ...parent.properties, name: importedName } };

    return { status: 'updated', record };
  }

  async createParent(locationId: string, seedChildren: CompanyRecord[]): Promise<CompanyRecord> {
    const [seed] = seedChildren;
    if (!seed) {
      throw new PreconditionError(
        `No child companies found for Client Parent Company ID: ${locationId}. Cannot infer name.`,
      );
    }

    const name = parentNameFor(seed);
    const raw = await this.send('createParent', 'POST', `${this.baseUrl}${COMPANIES_PATH}`, {
      payload: { properties: { name, [LOCATION_PROPERTY]: locationId } },
      timeout: this.timeouts.createParent,
      context: { locationId, name },
    });

    const fail = (detail: string) =>
      new RemoteCreateError(`Failed to create parent company: ${detail}`, raw.status, detail);

    // Only 201 Created counts; other 2xx codes are treated as failures.
    if (raw.status !== 201) {
      throw fail(raw.detail);
    }

    return this.decode(companyRecordSchema, raw, fail);
  }

  async associate(childId: string, parentId: string): Promise<void> {
    const inputs: AssociationEdge[] = [
      {
        from: { id: parentId },
        to: { id: childId },
        associationCategory: 'HUBSPOT_DEFINED',
        associationTypeId: PARENT_TO_CHILD_TYPE_ID,
      },
      {
        from: { id: childId },
        to: { id: parentId },
        associationCategory: 'HUBSPOT_DEFINED',
        associationTypeId: CHILD_TO_PARENT_TYPE_ID,
      },
    ];

    const raw = await this.send('associate', 'POST', `${this.baseUrl}${ASSOCIATIONS_PATH}`, {
      payload: { inputs },
      timeout: this.timeouts.associate,
      context: { childId, parentId },
    });

    if (raw.status !== 201) {
      throw new RemoteAssociationError(
        `Failed to associate child company ${childId} with parent company ${parentId}: ${raw.status} - ${raw.detail}`,
        raw.status,
        raw.detail,
        childId,
        parentId,
      );
    }
  }

  // === CONFIG ===

  getBaseUrl(): string {
    return this.baseUrl;
  }
}

export function createCompaniesClient(
  accessToken: string,
  options: Omit<CompaniesClientConfig, 'accessToken'> = {},
): CompaniesClient {
  return new CompaniesClient({ accessToken, ...options });
}

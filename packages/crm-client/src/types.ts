/**
 * CRM Client Types
 *
 * Shapes of the HubSpot company records and association edges
 * used by the parent/child company sync.
 */

export type CompanyProperties = Record<string, string | null | undefined>;

export interface CompanyRecord {
  id: string;
  properties: CompanyProperties;
  createdAt?: string;
  updatedAt?: string;
  archived?: boolean;
}

export type LocationId = string;

export type RenameResult =
  | { status: 'updated'; record: CompanyRecord }
  | { status: 'skipped'; record: CompanyRecord };

export type Operation =
  | 'listChildren'
  | 'findParent'
  | 'renameParent'
  | 'createParent'
  | 'associate';

export type HttpMethod = 'GET' | 'POST' | 'PATCH';

export interface ResponseEvent {
  operation: Operation;
  method: HttpMethod;
  url: string;
  status: number;
  /** Parsed JSON when the body is JSON, raw text otherwise. */
  body: unknown;
  /** Raw response text. */
  detail: string;
  /** Operation arguments worth echoing (location id, new name, ids). */
  context: Record<string, string>;
}

export type ResponseObserver = (event: ResponseEvent) => void;

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface OperationTimeouts {
  /** Unset means the list call waits indefinitely. */
  listChildren?: number;
  findParent: number;
  createParent: number;
  renameParent: number;
  associate: number;
}

export interface CompaniesClientConfig {
  accessToken: string;
  baseUrl?: string;
  timeouts?: Partial<OperationTimeouts>;
  observer?: ResponseObserver;
  logger?: Logger;
}

/**
 * The five operations the reconciliation workflow needs.
 */
export interface CompaniesApi {
  listChildren(locationId: LocationId): Promise<CompanyRecord[]>;
  findParent(locationId: LocationId): Promise<CompanyRecord | null>;
  renameParent(parent: CompanyRecord, importedName: string): Promise<RenameResult>;
  createParent(locationId: LocationId, seedChildren: CompanyRecord[]): Promise<CompanyRecord>;
  associate(childId: string, parentId: string): Promise<void>;
}

export interface AssociationEdge {
  from: { id: string };
  to: { id: string };
  associationCategory: 'HUBSPOT_DEFINED';
  associationTypeId: number;
}

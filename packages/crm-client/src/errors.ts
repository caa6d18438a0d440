/**
 * Error kinds raised by the company sync. Every one of them aborts a run.
 */

export type CompanySyncErrorKind =
  | 'configuration'
  | 'remote-fetch'
  | 'remote-update'
  | 'remote-create'
  | 'remote-association'
  | 'data-integrity'
  | 'precondition';

export abstract class CompanySyncError extends Error {
  abstract readonly kind: CompanySyncErrorKind;
}

export class ConfigurationError extends CompanySyncError {
  readonly kind = 'configuration';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Base for non-success responses. `detail` is the raw response text.
 */
export abstract class RemoteError extends CompanySyncError {
  constructor(
    message: string,
    readonly status: number,
    readonly detail: string,
  ) {
    super(message);
  }
}

export class RemoteFetchError extends RemoteError {
  readonly kind = 'remote-fetch';

  constructor(message: string, status: number, detail: string) {
    super(message, status, detail);
    this.name = 'RemoteFetchError';
  }
}

export class RemoteUpdateError extends RemoteError {
  readonly kind = 'remote-update';

  constructor(message: string, status: number, detail: string) {
    super(message, status, detail);
    this.name = 'RemoteUpdateError';
  }
}

export class RemoteCreateError extends RemoteError {
  readonly kind = 'remote-create';

  constructor(message: string, status: number, detail: string) {
    super(message, status, detail);
    this.name = 'RemoteCreateError';
  }
}

export class RemoteAssociationError extends RemoteError {
  readonly kind = 'remote-association';

  constructor(
    message: string,
    status: number,
    detail: string,
    readonly childId: string,
    readonly parentId: string,
  ) {
    super(message, status, detail);
    this.name = 'RemoteAssociationError';
  }
}

export class DataIntegrityError extends CompanySyncError {
  readonly kind = 'data-integrity';

  constructor(
    message: string,
    readonly locationId: string,
    readonly matches: number,
  ) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

export class PreconditionError extends CompanySyncError {
  readonly kind = 'precondition';

  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export function isCompanySyncError(value: unknown): value is CompanySyncError {
  return value instanceof CompanySyncError;
}

/**
 * Registry error taxonomy.
 * Codes are the OCI distribution error codes; each error carries its HTTP status.
 */

export const ErrorCodes = {
  BLOB_UNKNOWN: 'BLOB_UNKNOWN',
  BLOB_UPLOAD_INVALID: 'BLOB_UPLOAD_INVALID',
  BLOB_UPLOAD_UNKNOWN: 'BLOB_UPLOAD_UNKNOWN',
  DIGEST_INVALID: 'DIGEST_INVALID',
  MANIFEST_BLOB_UNKNOWN: 'MANIFEST_BLOB_UNKNOWN',
  MANIFEST_INVALID: 'MANIFEST_INVALID',
  MANIFEST_UNKNOWN: 'MANIFEST_UNKNOWN',
  NAME_INVALID: 'NAME_INVALID',
  NAME_UNKNOWN: 'NAME_UNKNOWN',
  SIZE_INVALID: 'SIZE_INVALID',
  TAG_INVALID: 'TAG_INVALID',
  UNAUTHORIZED: 'UNAUTHORIZED',
  DENIED: 'DENIED',
  UNSUPPORTED: 'UNSUPPORTED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorEntry {
  code: ErrorCode;
  message: string;
  detail?: unknown;
}

export interface ErrorResponse {
  errors: ErrorEntry[];
}

export class RegistryError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly detail?: unknown;

  constructor(code: ErrorCode, statusCode: number, message: string, detail?: unknown) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    this.statusCode = statusCode;
    this.detail = detail;
  }

  toResponse(): ErrorResponse {
    return {
      errors: [
        {
          code: this.code,
          message: this.message,
          ...(this.detail !== undefined && { detail: this.detail }),
        },
      ],
    };
  }
}

export type NotFoundCode = typeof ErrorCodes.NAME_UNKNOWN | typeof ErrorCodes.MANIFEST_UNKNOWN | typeof ErrorCodes.BLOB_UNKNOWN;

/**
 * Unknown repository, tag, manifest or blob.
 */
export class NotFoundError extends RegistryError {
  constructor(code: NotFoundCode, message: string, detail?: unknown) {
    super(code, 404, message, detail);
    this.name = 'NotFoundError';
  }

  static repository(name: string): NotFoundError {
    return new NotFoundError(ErrorCodes.NAME_UNKNOWN, `repository ${name} not found`, { name });
  }

  static manifest(repository: string, reference: string): NotFoundError {
    return new NotFoundError(ErrorCodes.MANIFEST_UNKNOWN, `manifest ${repository}:${reference} not found`, {
      name: repository,
      reference,
    });
  }

  static blob(digest: string): NotFoundError {
    return new NotFoundError(ErrorCodes.BLOB_UNKNOWN, `blob ${digest} not found`, { digest });
  }
}

export class DigestMismatchError extends RegistryError {
  constructor(message: string, detail?: unknown) {
    super(ErrorCodes.DIGEST_INVALID, 400, message, detail);
    this.name = 'DigestMismatchError';
  }
}

/**
 * A chunk did not start at the session's current offset.
 */
export class OffsetMismatchError extends RegistryError {
  readonly currentOffset: number;

  constructor(expected: number, current: number) {
    super(ErrorCodes.BLOB_UPLOAD_INVALID, 416, `chunk starts at ${expected} but upload is at offset ${current}`, {
      expected,
      current,
    });
    this.name = 'OffsetMismatchError';
    this.currentOffset = current;
  }
}

export class SizeInvalidError extends RegistryError {
  constructor(message: string, detail?: unknown) {
    super(ErrorCodes.SIZE_INVALID, 400, message, detail);
    this.name = 'SizeInvalidError';
  }
}

export class RepositoryInvalidError extends RegistryError {
  constructor(name: string, reason: string) {
    super(ErrorCodes.NAME_INVALID, 400, `invalid repository name ${name}: ${reason}`, { name });
    this.name = 'RepositoryInvalidError';
  }
}

export class TagInvalidError extends RegistryError {
  constructor(tag: string, reason: string) {
    super(ErrorCodes.TAG_INVALID, 400, `invalid tag ${tag}: ${reason}`, { tag });
    this.name = 'TagInvalidError';
  }
}

export type ManifestInvalidCode = typeof ErrorCodes.MANIFEST_INVALID | typeof ErrorCodes.MANIFEST_BLOB_UNKNOWN;

export class ManifestInvalidError extends RegistryError {
  constructor(message: string, detail?: unknown, code: ManifestInvalidCode = ErrorCodes.MANIFEST_INVALID) {
    super(code, 400, message, detail);
    this.name = 'ManifestInvalidError';
  }
}

export class SessionNotFoundError extends RegistryError {
  constructor(id: string, message = `blob upload ${id} not found`) {
    super(ErrorCodes.BLOB_UPLOAD_UNKNOWN, 404, message, { uuid: id });
    this.name = 'SessionNotFoundError';
  }
}

/**
 * A session idle past its TTL. Reported exactly like an unknown session.
 */
export class SessionExpiredError extends SessionNotFoundError {
  constructor(id: string) {
    super(id, `blob upload ${id} expired`);
    this.name = 'SessionExpiredError';
  }
}

export class UnauthorizedError extends RegistryError {
  constructor(message = 'authentication required') {
    super(ErrorCodes.UNAUTHORIZED, 401, message);
    this.name = 'UnauthorizedError';
  }
}

export class DeniedError extends RegistryError {
  constructor(message: string, detail?: unknown) {
    super(ErrorCodes.DENIED, 403, message, detail);
    this.name = 'DeniedError';
  }
}

/**
 * Durable store or cache I/O failure. Never reported as "not found".
 */
export class StoreUnavailableError extends RegistryError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCodes.UNKNOWN, 500, `storage unavailable during ${operation}: ${reason}`);
    this.name = 'StoreUnavailableError';
    this.cause = cause;
  }
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

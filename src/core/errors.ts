/**
 * Error taxonomy
 * Every failure the tool reports is one of these, so callers can decide
 * whether it ends the run, the zone, or a single record set.
 */
import { ZodError } from 'zod';

export type ErrorCode = 'CONFIG' | 'CONNECTION' | 'ZONE_NOT_FOUND' | 'PROVIDER_API' | 'INTERNAL';

export class DnsSyncError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'DnsSyncError';
  }

  static connection(cloud: string, cause: unknown): ConnectionError {
    return new ConnectionError(cloud, getErrorMessage(cause));
  }

  static zoneNotFound(zone: string, cloud?: string): ZoneNotFoundError {
    return new ZoneNotFoundError(zone, cloud);
  }

  static internal(message: string = 'Internal error'): DnsSyncError {
    return new DnsSyncError(message, 'INTERNAL');
  }
}

/**
 * Missing or invalid cloud profile, bad argument combination
 */
export class ConfigError extends DnsSyncError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG', details);
    this.name = 'ConfigError';
  }
}

/**
 * Cloud unreachable or authentication rejected
 */
export class ConnectionError extends DnsSyncError {
  constructor(
    public readonly cloud: string,
    reason: string
  ) {
    super(`Cannot connect to cloud ${cloud}: ${reason}`, 'CONNECTION');
    this.name = 'ConnectionError';
  }
}

export class ZoneNotFoundError extends DnsSyncError {
  constructor(
    public readonly zone: string,
    public readonly cloud?: string
  ) {
    super(cloud ? `Zone ${zone} not found in cloud ${cloud}` : `Zone ${zone} not found`, 'ZONE_NOT_FOUND');
    this.name = 'ZoneNotFoundError';
  }
}

/**
 * A DNS service call that returned an error status
 */
export class ProviderApiError extends DnsSyncError {
  constructor(
    public readonly status: number,
    public readonly method: string,
    public readonly path: string,
    apiMessage: string
  ) {
    super(`${method} ${path} failed (${status}): ${apiMessage}`, 'PROVIDER_API');
    this.name = 'ProviderApiError';
  }

  get isAuthFailure(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/**
 * Format Zod validation errors as field: message pairs
 */
export function formatZodError(error: ZodError): { field: string; message: string }[] {
  return error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Wrap a ZodError into a ConfigError naming the offending fields
 */
export function configErrorFromZod(context: string, error: ZodError): ConfigError {
  const fields = formatZodError(error)
    .map((e) => (e.field ? `${e.field}: ${e.message}` : e.message))
    .join('; ');
  return new ConfigError(`Invalid ${context}: ${fields}`, formatZodError(error));
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function getErrorCode(error: unknown): ErrorCode {
  return error instanceof DnsSyncError ? error.code : 'INTERNAL';
}

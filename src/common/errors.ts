/** Base error raised by the services registry and its collaborators. */
export class ServiceRegistryError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ServiceRegistryError';
  }
}

export type ConfigurationErrorCode =
  | 'MISSING_STATS_SUBSCRIPTION'
  | 'MISSING_BREWERY_ROOMS'
  | 'INVALID_CONFIGURATION';

/** A required dependency or setting is missing or malformed. */
export class ConfigurationError extends ServiceRegistryError {
  constructor(
    readonly code: ConfigurationErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

export type RegistryStateErrorCode =
  | 'NOT_INITIALIZED'
  | 'ALREADY_INITIALIZED'
  | 'DISPOSED';

/** An operation was called at the wrong point of the registry lifecycle. */
export class RegistryStateError extends ServiceRegistryError {
  constructor(
    readonly code: RegistryStateErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'RegistryStateError';
  }
}

// Licensed under the Hungry Ghost Hive License. See LICENSE.

/**
 * Base error class for all branchlink errors
 */
export class LinkError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'LINK_ERROR') {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    Object.setPrototypeOf(this, LinkError.prototype);
  }
}

/**
 * Configuration-related errors (missing tracker URL, blank tokens, etc.)
 */
export class ConfigurationError extends LinkError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Validation errors (bad line numbers, malformed arguments, etc.)
 */
export class ValidationError extends LinkError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Runtime operational errors (git commands failed, hook files unwritable, etc.)
 */
export class OperationalError extends LinkError {
  constructor(message: string) {
    super(message, 'OPERATIONAL_ERROR');
    Object.setPrototypeOf(this, OperationalError.prototype);
  }
}

/**
 * Not found errors (no repository, no commit in scope)
 */
export class NotFoundError extends LinkError {
  constructor(message: string) {
    super(message, 'NOT_FOUND_ERROR');
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Helper function to convert generic errors to branchlink errors
 */
export function toLinkError(error: unknown, fallbackType: typeof LinkError = LinkError): LinkError {
  if (error instanceof LinkError) {
    return error;
  }
  if (error instanceof Error) {
    return new fallbackType(error.message);
  }
  return new fallbackType(String(error));
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

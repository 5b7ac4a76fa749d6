/**
 * Error taxonomy for deploy construction and signing
 *
 * Every error raised by this package is a {@link DeployError}. Callers can branch
 * on `instanceof` or on the machine-readable `code`. None of these are transient:
 * they signal bad input or key material and are never retried internally.
 */

/**
 * Machine-readable error codes
 */
export type DeployErrorCode =
  | "VALIDATION_ERROR"
  | "ENCODING_ERROR"
  | "ARGUMENT_ERROR"
  | "SIGNING_ERROR";

/**
 * Base class for all errors raised by the deploy client
 */
export class DeployError extends Error {
  public readonly code: DeployErrorCode;

  constructor(message: string, code: DeployErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "DeployError";
    this.code = code;
  }
}

/**
 * A required field is missing or malformed; raised before any hashing happens.
 */
export class ValidationError extends DeployError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "VALIDATION_ERROR", options);
    this.name = "ValidationError";
  }
}

/**
 * A value cannot be represented in its declared type (bad hex, out-of-range number, ...)
 */
export class EncodingError extends DeployError {
  constructor(message: string, options?: ErrorOptions, code: DeployErrorCode = "ENCODING_ERROR") {
    super(message, code, options);
    this.name = "EncodingError";
  }
}

/**
 * An unknown variant name was passed where a fixed set is expected (e.g. Key variants)
 */
export class ArgumentError extends EncodingError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options, "ARGUMENT_ERROR");
    this.name = "ArgumentError";
  }
}

/**
 * Key material is malformed or the algorithm is unsupported
 */
export class SigningError extends DeployError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SIGNING_ERROR", options);
    this.name = "SigningError";
  }
}

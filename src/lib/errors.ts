/**
 * Error hierarchy
 * Every error raised by the library extends OpenADRError and carries a stable code.
 */

export type OpenADRErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'TOKEN_TRANSPORT_ERROR'
  | 'VTN_REQUEST_ERROR'
  | 'MODEL_VALIDATION_ERROR'
  | 'CREATION_GUARD_ERROR'
  | 'CONVERSION_ERROR';

export class OpenADRError extends Error {
  public readonly code: OpenADRErrorCode;
  public readonly cause?: unknown;

  constructor(message: string, code: OpenADRErrorCode, cause?: unknown) {
    super(message);
    this.name = 'OpenADRError';
    this.code = code;
    this.cause = cause;
  }
}

/**
 * Required configuration is missing or invalid. Raised before any network call.
 */
export class ConfigurationError extends OpenADRError {
  public readonly missingKeys: string[];

  constructor(message: string, missingKeys: string[] = [], cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
    this.missingKeys = missingKeys;
  }
}

export interface AuthenticationErrorDetails {
  /** HTTP status returned by the token endpoint */
  status?: number;
  /** OAuth2 `error` field of the token endpoint response */
  oauthError?: string;
  /** OAuth2 `error_description` field */
  oauthErrorDescription?: string;
}

/**
 * The token endpoint rejected the grant or answered with something that is not a token.
 */
export class AuthenticationError extends OpenADRError {
  public readonly status?: number;
  public readonly oauthError?: string;
  public readonly oauthErrorDescription?: string;

  constructor(
    message: string,
    details: AuthenticationErrorDetails = {},
    cause?: unknown,
    code: 'AUTHENTICATION_ERROR' | 'TOKEN_TRANSPORT_ERROR' = 'AUTHENTICATION_ERROR'
  ) {
    super(message, code, cause);
    this.name = 'AuthenticationError';
    this.status = details.status;
    this.oauthError = details.oauthError;
    this.oauthErrorDescription = details.oauthErrorDescription;
  }
}

/**
 * The token endpoint could not be reached (DNS, connection refused, timeout).
 */
export class TokenTransportError extends AuthenticationError {
  constructor(message: string, cause?: unknown) {
    super(message, {}, cause, 'TOKEN_TRANSPORT_ERROR');
    this.name = 'TokenTransportError';
  }
}

export interface VtnRequestErrorDetails {
  method: string;
  url: string;
  status?: number;
  /** Parsed problem body returned by the VTN, if any */
  body?: unknown;
}

/**
 * A VTN resource call failed. Authentication failures never end up here.
 */
export class VtnRequestError extends OpenADRError {
  public readonly method: string;
  public readonly url: string;
  public readonly status?: number;
  public readonly body?: unknown;

  constructor(message: string, details: VtnRequestErrorDetails, cause?: unknown) {
    super(message, 'VTN_REQUEST_ERROR', cause);
    this.name = 'VtnRequestError';
    this.method = details.method;
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
  }
}

export interface ValidationIssue {
  /** Dotted path of the offending field, empty for model-level issues */
  path: string;
  message: string;
}

export class ModelValidationError extends OpenADRError {
  public readonly model: string;
  public readonly issues: ValidationIssue[];

  constructor(model: string, issues: ValidationIssue[], cause?: unknown) {
    super(
      `Invalid ${model}: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
      'MODEL_VALIDATION_ERROR',
      cause
    );
    this.name = 'ModelValidationError';
    this.model = model;
    this.issues = issues;
  }
}

export class CreationGuardError extends OpenADRError {
  constructor(model: string) {
    super(`New${model} has already been created.`, 'CREATION_GUARD_ERROR');
    this.name = 'CreationGuardError';
  }
}

export interface RowError {
  row: number;
  error: Error;
}

/**
 * One or more rows could not be converted; every failing row is listed.
 */
export class ConversionError extends OpenADRError {
  public readonly errors: RowError[];

  constructor(message: string, errors: RowError[]) {
    super(message, 'CONVERSION_ERROR');
    this.name = 'ConversionError';
    this.errors = errors;
  }
}

/**
 * Exit code used by the CLI for an error
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError || error instanceof AuthenticationError) {
    return 3;
  }
  if (error instanceof VtnRequestError) {
    return 2;
  }
  return 1;
}

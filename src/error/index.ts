/**
 * Model Client Error Types
 *
 * Error hierarchy for client construction and call execution. Every error the
 * framework raises extends {@link ModelClientError} and carries a kind and a
 * retryability flag.
 *
 * @module error
 */

/**
 * Error kinds.
 */
export type ModelClientErrorKind =
  | 'PARAM_VALIDATION' // Caller parameters fail the input shape
  | 'SERVICE' // The remote service returned an error response
  | 'TRANSPORT' // The network exchange did not complete
  | 'CAPABILITY' // Pagination or waiter not supported
  | 'CONFIGURATION' // Model, rule or client configuration problem
  | 'WAITER' // A waiter reached a failure state or ran out of attempts
  | 'TIMEOUT' // A poll deadline passed
  | 'SIGNING' // Request signing failed
  | 'CREDENTIAL'; // Credentials unavailable

/**
 * Base error class.
 *
 * @example
 * ```typescript
 * try {
 *   await client.call('DescribeWidgets', {});
 * } catch (error) {
 *   if (error instanceof ModelClientError && error.retryable) {
 *     // schedule another try
 *   }
 * }
 * ```
 */
export class ModelClientError extends Error {
  /**
   * Error kind identifying the failure category.
   */
  public readonly kind: ModelClientErrorKind;

  /**
   * Whether the failed operation can be safely retried.
   */
  public readonly retryable: boolean;

  constructor(message: string, kind: ModelClientErrorKind, retryable = false) {
    super(message);
    this.name = 'ModelClientError';
    this.kind = kind;
    this.retryable = retryable;

    // Maintain proper stack trace in V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.kind}]: ${this.message}`;
  }

  /**
   * Convert error to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

/**
 * A single parameter validation failure.
 */
export interface ValidationIssue {
  /** Field path, e.g. `Filters[0].Name` */
  path: string;
  /** What is wrong with the field */
  message: string;
}

/**
 * Caller-supplied parameters failed the operation's input shape.
 *
 * Never sent over the wire and never retried.
 */
export class ParamValidationError extends ModelClientError {
  public readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    const report = issues.map((issue) => `  ${issue.path}: ${issue.message}`).join('\n');
    super(`Parameter validation failed:\n${report}`, 'PARAM_VALIDATION', false);
    this.name = 'ParamValidationError';
    this.issues = issues;
  }

  /**
   * Field paths of every issue, in report order.
   */
  get paths(): string[] {
    return this.issues.map((issue) => issue.path);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}

/**
 * Details a service error was built from.
 */
export interface ServiceErrorDetails {
  /** Service-declared error code, e.g. `WidgetNotFound` */
  code: string;
  /** Service-provided message, kept verbatim */
  message: string;
  /** HTTP status code of the response */
  statusCode: number;
  /** Operation that failed */
  operationName: string;
  /** Request id reported by the service */
  requestId?: string;
  /** Fault side when the protocol reports it (`Sender` / `Receiver`) */
  type?: string;
  /** Parsed error payload */
  response?: Record<string, unknown>;
}

/**
 * The remote service returned an error response (status >= 300).
 *
 * `message` is the service's message, unchanged; `code` is the service's
 * error code and is the only field meant for classification.
 */
export class ServiceError extends ModelClientError {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly operationName: string;
  public readonly requestId?: string;
  public readonly type?: string;
  public readonly response?: Record<string, unknown>;

  constructor(details: ServiceErrorDetails) {
    super(details.message, 'SERVICE', details.statusCode >= 500 || details.statusCode === 429);
    this.name = 'ServiceError';
    this.code = details.code;
    this.statusCode = details.statusCode;
    this.operationName = details.operationName;
    this.requestId = details.requestId;
    this.type = details.type;
    this.response = details.response;
  }

  override toString(): string {
    return `${this.name} [${this.code}] (${this.operationName}, HTTP ${this.statusCode}): ${this.message}`;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      code: this.code,
      statusCode: this.statusCode,
      operationName: this.operationName,
      requestId: this.requestId,
    };
  }
}

/**
 * Why a transport exchange failed.
 */
export type TransportFailureReason = 'connection' | 'timeout' | 'malformed-response';

/**
 * The network exchange did not complete. Always offered to retry evaluation.
 */
export class TransportError extends ModelClientError {
  public readonly reason: TransportFailureReason;
  public override readonly cause?: unknown;

  constructor(message: string, reason: TransportFailureReason, cause?: unknown) {
    super(message, 'TRANSPORT', true);
    this.name = 'TransportError';
    this.reason = reason;
    this.cause = cause;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason };
  }
}

/**
 * The caller asked for pagination or waiter functionality that the
 * operation or service does not support.
 */
export class CapabilityError extends ModelClientError {
  public readonly capability: 'pagination' | 'waiter';
  public readonly target: string;

  constructor(capability: 'pagination' | 'waiter', target: string, message?: string) {
    super(
      message ??
        (capability === 'pagination'
          ? `Operation cannot be paginated: ${target}`
          : `Waiter does not exist: ${target}`),
      'CAPABILITY',
      false
    );
    this.name = 'CapabilityError';
    this.capability = capability;
    this.target = target;
  }
}

/**
 * A model, rule set or client configuration references state that is not
 * present or is malformed.
 */
export class ConfigurationError extends ModelClientError {
  constructor(message: string) {
    super(message, 'CONFIGURATION', false);
    this.name = 'ConfigurationError';
  }
}

/**
 * A loader has no data under the requested name.
 */
export class DataNotFoundError extends ConfigurationError {
  public readonly dataPath: string;

  constructor(dataPath: string) {
    super(`Unable to load data for: ${dataPath}`);
    this.name = 'DataNotFoundError';
    this.dataPath = dataPath;
  }
}

/**
 * A paginated operation misbehaved (repeated token) or a starting token
 * could not be decoded.
 */
export class PaginationError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'PaginationError';
  }
}

/**
 * Why a waiter stopped without success.
 */
export type WaiterFailureReason = 'max-attempts' | 'failure-state' | 'unexpected-error';

/**
 * A waiter reached a failure state, met an unexpected error, or exhausted its
 * attempt budget while still polling.
 */
export class WaiterError extends ModelClientError {
  public readonly waiterName: string;
  public readonly reason: WaiterFailureReason;
  public readonly attempts: number;
  public readonly lastResponse?: Record<string, unknown>;
  public override readonly cause?: unknown;

  constructor(
    waiterName: string,
    reason: WaiterFailureReason,
    attempts: number,
    details: { lastResponse?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(`Waiter ${waiterName} failed: ${describeWaiterFailure(reason)}`, 'WAITER', false);
    this.name = 'WaiterError';
    this.waiterName = waiterName;
    this.reason = reason;
    this.attempts = attempts;
    this.lastResponse = details.lastResponse;
    this.cause = details.cause;
  }
}

function describeWaiterFailure(reason: WaiterFailureReason): string {
  switch (reason) {
    case 'max-attempts':
      return 'Max attempts exceeded';
    case 'failure-state':
      return 'Waiter encountered a terminal failure state';
    case 'unexpected-error':
      return 'Unexpected error encountered';
  }
}

/**
 * A cooperative poll loop passed its deadline.
 */
export class PollTimeoutError extends ModelClientError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `Timed out after ${timeoutMs}ms while polling`) {
    super(message, 'TIMEOUT', false);
    this.name = 'PollTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error codes for signing operations.
 */
export type SigningErrorCode = 'MISSING_HEADER' | 'INVALID_URL' | 'SIGNING_FAILED';

/**
 * Error thrown during request signing.
 */
export class SigningError extends ModelClientError {
  public readonly code: SigningErrorCode;

  constructor(message: string, code: SigningErrorCode) {
    super(message, 'SIGNING', false);
    this.name = 'SigningError';
    this.code = code;
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Credentials could not be obtained from a provider.
 */
export class CredentialError extends ModelClientError {
  constructor(message: string) {
    super(message, 'CREDENTIAL', false);
    this.name = 'CredentialError';
  }
}

/**
 * Check whether an error is a {@link ServiceError} carrying one of the codes.
 *
 * Classification goes through the structured code only; message text is for
 * display.
 *
 * @example
 * ```typescript
 * try {
 *   await client.call('ImportKeyPair', params);
 * } catch (error) {
 *   if (!isServiceErrorCode(error, 'InvalidKeyPair.Duplicate')) throw error;
 * }
 * ```
 */
export function isServiceErrorCode(error: unknown, ...codes: string[]): error is ServiceError {
  return error instanceof ServiceError && codes.includes(error.code);
}

/**
 * Await a call and treat the given service error codes as an absent result.
 *
 * @returns The call's result, or `undefined` when it failed with one of the codes
 */
export async function ignoreServiceErrorCodes<T>(
  call: Promise<T>,
  ...codes: string[]
): Promise<T | undefined> {
  try {
    return await call;
  } catch (error) {
    if (isServiceErrorCode(error, ...codes)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Type guard for framework errors.
 */
export function isModelClientError(error: unknown): error is ModelClientError {
  return error instanceof ModelClientError;
}

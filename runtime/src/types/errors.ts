/**
 * Error types and utilities for @nexus-core/runtime
 *
 * Runtime errors carry a string code from {@link RuntimeErrorCodes}. Signed
 * HTTP failures additionally carry a typed `detail` whose `kind` names the
 * protocol, binding, time or key check that failed.
 *
 * @module
 */

// ============================================================================
// Runtime Error Codes
// ============================================================================

/**
 * String error codes for runtime-specific errors.
 * These are distinct from the SDK's NexusErrorCodes.
 */
export const RuntimeErrorCodes = {
  /** Input validation failed */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** A signed HTTP request or response failed verification or signing */
  SIGNED_HTTP_ERROR: 'SIGNED_HTTP_ERROR',
  /** Persisted client state could not be read, written or updated */
  CLIENT_STATE_ERROR: 'CLIENT_STATE_ERROR',
  /** On-chain tool schema generation failed */
  SCHEMA_GENERATION_ERROR: 'SCHEMA_GENERATION_ERROR',
} as const;

/** Union type of all runtime error code values */
export type RuntimeErrorCode = (typeof RuntimeErrorCodes)[keyof typeof RuntimeErrorCodes];

// ============================================================================
// Base Runtime Error
// ============================================================================

/**
 * Base error class for all runtime errors.
 *
 * @example
 * ```typescript
 * throw new RuntimeError('Something went wrong', RuntimeErrorCodes.VALIDATION_ERROR);
 * ```
 */
export class RuntimeError extends Error {
  /** The error code identifying this error type */
  public readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
    // Using this.constructor hides subclass constructors from the stack.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Specific Runtime Error Classes
// ============================================================================

/**
 * Error thrown when input validation fails.
 */
export class ValidationError extends RuntimeError {
  constructor(message: string) {
    super(message, RuntimeErrorCodes.VALIDATION_ERROR);
    this.name = 'ValidationError';
  }
}

/**
 * Why a signed HTTP exchange was refused.
 *
 * Ids and kids are the claimed values. `reason` fields carry the underlying
 * parser message.
 */
export type SignedHttpErrorDetail =
  // Protocol
  | { kind: 'UnsupportedVersion'; version: string }
  | { kind: 'MissingHeader'; header: string }
  | { kind: 'InvalidBase64'; header: string }
  | { kind: 'InvalidSignatureLength'; length: number }
  | { kind: 'InvalidSignedInputJson'; reason: string }
  // Binding
  | { kind: 'ToolIdMismatch'; claimed: string; expected: string }
  | { kind: 'MethodMismatch'; claimed: string; actual: string }
  | { kind: 'PathMismatch'; claimed: string; actual: string }
  | { kind: 'QueryMismatch'; claimed: string; actual: string }
  | { kind: 'InvalidBodySha256Hex'; value: string }
  | { kind: 'InvalidReqSigInputSha256Hex'; value: string }
  | { kind: 'BodyHashMismatch' }
  | { kind: 'RequestBindingMismatch' }
  | { kind: 'StatusMismatch'; claimed: number; actual: number }
  // Time
  | { kind: 'InvalidTimeWindow'; iatMs: number; expMs: number }
  | { kind: 'NotYetValid'; iatMs: number; nowMs: number }
  | { kind: 'Expired'; expMs: number; nowMs: number }
  | { kind: 'ValidityTooLarge'; validityMs: number; maxValidityMs: number }
  // Keys
  | { kind: 'UnknownInvokerKey'; invokerId: string; invokerKid: number }
  | { kind: 'InvalidInvokerPublicKey'; invokerId: string; invokerKid: number }
  | { kind: 'UnknownResponderKey'; responderId: string; responderKid: number }
  | { kind: 'InvalidResponderPublicKey'; responderId: string; responderKid: number }
  | { kind: 'InvalidSignature' }
  // Configuration
  | { kind: 'InvalidAllowedLeadersFile'; reason: string };

export type SignedHttpErrorKind = SignedHttpErrorDetail['kind'];

function describeSignedHttpError(detail: SignedHttpErrorDetail): string {
  switch (detail.kind) {
    case 'UnsupportedVersion':
      return `unsupported signature version '${detail.version}', expected '1'`;
    case 'MissingHeader':
      return `missing required header '${detail.header}'`;
    case 'InvalidBase64':
      return `invalid base64url in header '${detail.header}'`;
    case 'InvalidSignatureLength':
      return `invalid signature length ${detail.length}, expected 64`;
    case 'InvalidSignedInputJson':
      return `invalid json in signed input: ${detail.reason}`;
    case 'ToolIdMismatch':
      return `tool_id mismatch (claimed '${detail.claimed}', expected '${detail.expected}')`;
    case 'MethodMismatch':
      return `method mismatch (claimed '${detail.claimed}', actual '${detail.actual}')`;
    case 'PathMismatch':
      return `path mismatch (claimed '${detail.claimed}', actual '${detail.actual}')`;
    case 'QueryMismatch':
      return `query mismatch (claimed '${detail.claimed}', actual '${detail.actual}')`;
    case 'InvalidBodySha256Hex':
      return `invalid body_sha256 hex: ${detail.value}`;
    case 'InvalidReqSigInputSha256Hex':
      return `invalid req_sig_input_sha256 hex: ${detail.value}`;
    case 'BodyHashMismatch':
      return 'body hash mismatch';
    case 'RequestBindingMismatch':
      return 'response is not bound to the expected request';
    case 'StatusMismatch':
      return `status mismatch (claimed ${detail.claimed}, actual ${detail.actual})`;
    case 'InvalidTimeWindow':
      return 'exp_ms must be >= iat_ms';
    case 'NotYetValid':
      return `request is not yet valid (iat_ms=${detail.iatMs}, now_ms=${detail.nowMs})`;
    case 'Expired':
      return `request expired (exp_ms=${detail.expMs}, now_ms=${detail.nowMs})`;
    case 'ValidityTooLarge':
      return `validity window too large (${detail.validityMs}ms > ${detail.maxValidityMs}ms)`;
    case 'UnknownInvokerKey':
      return `unknown leader key (leader_id=${detail.invokerId}, leader_kid=${detail.invokerKid})`;
    case 'InvalidInvokerPublicKey':
      return `invalid ed25519 public key (leader_id=${detail.invokerId}, leader_kid=${detail.invokerKid})`;
    case 'UnknownResponderKey':
      return `unknown tool key (tool_id=${detail.responderId}, tool_kid=${detail.responderKid})`;
    case 'InvalidResponderPublicKey':
      return `invalid ed25519 public key (tool_id=${detail.responderId}, tool_kid=${detail.responderKid})`;
    case 'InvalidSignature':
      return 'invalid signature';
    case 'InvalidAllowedLeadersFile':
      return `invalid allowed-leaders file: ${detail.reason}`;
  }
}

/**
 * Error thrown when a signed HTTP request or response is refused.
 *
 * @example
 * ```typescript
 * try {
 *   responder.authenticateInvoke(meta, body, headers);
 * } catch (err) {
 *   if (err instanceof SignedHttpError && err.kind === 'Expired') {
 *     // ask the caller to re-sign
 *   }
 * }
 * ```
 */
export class SignedHttpError extends RuntimeError {
  public readonly detail: SignedHttpErrorDetail;

  constructor(detail: SignedHttpErrorDetail) {
    super(describeSignedHttpError(detail), RuntimeErrorCodes.SIGNED_HTTP_ERROR);
    this.name = 'SignedHttpError';
    this.detail = detail;
  }

  get kind(): SignedHttpErrorKind {
    return this.detail.kind;
  }
}

/**
 * Error thrown when persisted client state cannot be used.
 */
export class ClientStateError extends RuntimeError {
  /** Path of the state file involved */
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message, RuntimeErrorCodes.CLIENT_STATE_ERROR);
    this.name = 'ClientStateError';
    this.path = path;
  }
}

/**
 * Error thrown when a tool schema cannot be generated from a package summary.
 */
export class SchemaGenerationError extends RuntimeError {
  constructor(message: string) {
    super(message, RuntimeErrorCodes.SCHEMA_GENERATION_ERROR);
    this.name = 'SchemaGenerationError';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Type guard to check if an error is a RuntimeError.
 */
export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}

/**
 * Type guard narrowing to a SignedHttpError, optionally of one kind.
 */
export function isSignedHttpError(error: unknown, kind?: SignedHttpErrorKind): error is SignedHttpError {
  return error instanceof SignedHttpError && (kind === undefined || error.kind === kind);
}

/**
 * Error types for the Nexus SDK.
 *
 * Every failure surfaced by the SDK is a {@link NexusError} carrying a string
 * `code`, so callers can branch on the code instead of parsing messages.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const NexusErrorCodes = {
  /** Ledger RPC transport or server failure */
  RPC: "RPC",
  /** A ledger value could not be parsed into the expected shape */
  PARSING: "PARSING",
  /** A transaction could not be composed */
  TRANSACTION_BUILDING: "TRANSACTION_BUILDING",
  /** An awaited ledger condition did not happen in time */
  TIMEOUT: "TIMEOUT",
  /** Invalid or missing client configuration or arguments */
  CONFIGURATION: "CONFIGURATION",
  /** Signing, submission or effects failure */
  WALLET: "WALLET",
  /** Object requested from the ledger does not exist */
  OBJECT_NOT_FOUND: "OBJECT_NOT_FOUND",
  /** Object metadata field missing from the ledger response */
  METADATA_MISSING: "METADATA_MISSING",
  /** Dynamic field collection returned a different number of entries than declared */
  DYNAMIC_FIELD_SIZE_MISMATCH: "DYNAMIC_FIELD_SIZE_MISMATCH",
  /** Table-vec index outside of 0..size-1 or missing */
  INDEX_OUT_OF_BOUNDS: "INDEX_OUT_OF_BOUNDS",
  /** Event is not wrapped in the Nexus event wrapper */
  NOT_NEXUS_EVENT: "NOT_NEXUS_EVENT",
  /** Type parameter expected to be a struct tag */
  NOT_A_STRUCT: "NOT_A_STRUCT",
  /** Event name is not a known Nexus event kind */
  UNKNOWN_EVENT_KIND: "UNKNOWN_EVENT_KIND",
  /** Event payload does not match its kind */
  MALFORMED_PAYLOAD: "MALFORMED_PAYLOAD",
  /** Key material could not be parsed */
  INVALID_KEY: "INVALID_KEY",
  /** Artifact storage commit or fetch failure */
  STORAGE: "STORAGE",
} as const;

export type NexusErrorCode = (typeof NexusErrorCodes)[keyof typeof NexusErrorCodes];

// ============================================================================
// Base Error
// ============================================================================

export class NexusError extends Error {
  /** The error code identifying this error type */
  public readonly code: NexusErrorCode;

  constructor(message: string, code: NexusErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NexusError";
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export function isNexusError(error: unknown): error is NexusError {
  return error instanceof NexusError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

// ============================================================================
// Ledger Errors
// ============================================================================

export class RpcError extends NexusError {
  /** gRPC status code, when the failure came from a call */
  public readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, NexusErrorCodes.RPC, { cause });
    this.name = "RpcError";
    this.statusCode = statusCode;
  }
}

export class ParsingError extends NexusError {
  constructor(message: string, cause?: unknown) {
    super(message, NexusErrorCodes.PARSING, { cause });
    this.name = "ParsingError";
  }
}

export class TransactionBuildingError extends NexusError {
  constructor(message: string, cause?: unknown) {
    super(message, NexusErrorCodes.TRANSACTION_BUILDING, { cause });
    this.name = "TransactionBuildingError";
  }
}

export class TimeoutError extends NexusError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, NexusErrorCodes.TIMEOUT);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigurationError extends NexusError {
  constructor(message: string) {
    super(message, NexusErrorCodes.CONFIGURATION);
    this.name = "ConfigurationError";
  }
}

export class WalletError extends NexusError {
  constructor(message: string, cause?: unknown) {
    super(message, NexusErrorCodes.WALLET, { cause });
    this.name = "WalletError";
  }
}

export class StorageError extends NexusError {
  constructor(message: string, cause?: unknown) {
    super(message, NexusErrorCodes.STORAGE, { cause });
    this.name = "StorageError";
  }
}

export class InvalidKeyError extends NexusError {
  /** Which parse step failed */
  public readonly reason:
    | { kind: "InvalidHex" }
    | { kind: "InvalidBase64" }
    | { kind: "UnsupportedKeySchemeFlag"; flag: number }
    | { kind: "InvalidLength"; length: number }
    | { kind: "InvalidPoint" };

  constructor(reason: InvalidKeyError["reason"]) {
    super(describeKeyReason(reason), NexusErrorCodes.INVALID_KEY);
    this.name = "InvalidKeyError";
    this.reason = reason;
  }
}

function describeKeyReason(reason: InvalidKeyError["reason"]): string {
  switch (reason.kind) {
    case "InvalidHex":
      return "Invalid hex key encoding";
    case "InvalidBase64":
      return "Invalid base64 key encoding";
    case "UnsupportedKeySchemeFlag":
      return `Unsupported key scheme flag 0x${reason.flag.toString(16).padStart(2, "0")}`;
    case "InvalidLength":
      return `Invalid key length ${reason.length}, expected 32 bytes or 33 bytes with a scheme flag`;
    case "InvalidPoint":
      return "Public key is not a canonical Ed25519 point of large order";
  }
}

// ============================================================================
// Crawler Errors
// ============================================================================

export class ObjectNotFoundError extends NexusError {
  public readonly objectId: string;

  constructor(objectId: string) {
    super(`Object not found: ${objectId}`, NexusErrorCodes.OBJECT_NOT_FOUND);
    this.name = "ObjectNotFoundError";
    this.objectId = objectId;
  }
}

export class MetadataMissingError extends NexusError {
  public readonly field: "owner" | "digest" | "version" | "json" | "objectId";
  public readonly objectId: string;

  constructor(field: MetadataMissingError["field"], objectId: string) {
    super(`Object ${field} missing for ${objectId}`, NexusErrorCodes.METADATA_MISSING);
    this.name = "MetadataMissingError";
    this.field = field;
    this.objectId = objectId;
  }
}

export class DynamicFieldSizeMismatchError extends NexusError {
  public readonly expected: number;
  public readonly got: number;

  constructor(expected: number, got: number) {
    super(
      `Dynamic field size mismatch: expected ${expected}, got ${got}`,
      NexusErrorCodes.DYNAMIC_FIELD_SIZE_MISMATCH,
    );
    this.name = "DynamicFieldSizeMismatchError";
    this.expected = expected;
    this.got = got;
  }
}

export class IndexOutOfBoundsError extends NexusError {
  public readonly index: bigint;
  public readonly size: number;

  constructor(index: bigint, size: number) {
    super(`Index ${index} out of bounds for table of size ${size}`, NexusErrorCodes.INDEX_OUT_OF_BOUNDS);
    this.name = "IndexOutOfBoundsError";
    this.index = index;
    this.size = size;
  }
}

// ============================================================================
// Event Errors
// ============================================================================

export class NotNexusEventError extends NexusError {
  public readonly eventType: string;

  constructor(eventType: string) {
    super(`Event is not a Nexus event: ${eventType}`, NexusErrorCodes.NOT_NEXUS_EVENT);
    this.name = "NotNexusEventError";
    this.eventType = eventType;
  }
}

export class NotAStructError extends NexusError {
  constructor(what: string) {
    super(`Expected a struct type parameter, got ${what}`, NexusErrorCodes.NOT_A_STRUCT);
    this.name = "NotAStructError";
  }
}

export class UnknownEventKindError extends NexusError {
  public readonly eventName: string;

  constructor(eventName: string) {
    super(`Unknown Nexus event kind: ${eventName}`, NexusErrorCodes.UNKNOWN_EVENT_KIND);
    this.name = "UnknownEventKindError";
    this.eventName = eventName;
  }
}

export class MalformedPayloadError extends NexusError {
  public readonly eventName: string;
  public readonly issues: readonly string[];

  constructor(eventName: string, issues: readonly string[]) {
    super(`Malformed ${eventName} payload: ${issues.join("; ")}`, NexusErrorCodes.MALFORMED_PAYLOAD);
    this.name = "MalformedPayloadError";
    this.eventName = eventName;
    this.issues = issues;
  }
}

/**
 * Signed HTTP v1 wire format.
 *
 * Both directions carry three headers: the protocol version, the signed
 * claims bytes and an Ed25519 signature over `domain || claims`. Header
 * values are URL-safe base64 without padding.
 *
 * @module
 */

import {
  ED25519_SIGNATURE_LENGTH,
  concatBytes,
  fromBase64Url,
  hexToBytes,
  toBase64Url,
  utf8,
  verifyStrict,
  type Ed25519Keypair,
} from '@nexus-core/sdk';
import { SignedHttpError } from '../types/errors.js';

// ============================================================================
// Constants
// ============================================================================

export const HEADER_SIG_VERSION = 'X-Nexus-Sig-V';
export const HEADER_SIG_INPUT = 'X-Nexus-Sig-Input';
export const HEADER_SIG = 'X-Nexus-Sig';

export const SIG_VERSION_V1 = '1';

export const DOMAIN_REQUEST_V1 = utf8('nexus.leader_tool.request.v1.');
export const DOMAIN_RESPONSE_V1 = utf8('nexus.leader_tool.response.v1.');

// ============================================================================
// Policy
// ============================================================================

/** What a verifier accepts, independent of what a signer claims. */
export interface SignedHttpPolicy {
  /** Allowed clock difference when comparing now to `iat_ms`/`exp_ms` */
  maxClockSkewMs: number;
  /** Largest accepted `exp_ms - iat_ms`; signers also use it as their window */
  maxValidityMs: number;
}

export const DEFAULT_SIGNED_HTTP_POLICY: Readonly<SignedHttpPolicy> = {
  maxClockSkewMs: 30_000,
  maxValidityMs: 60_000,
};

/**
 * Check a claimed validity window against `nowMs`.
 *
 * Bounds are inclusive: `iat = now + skew` and `exp = now - skew` both pass.
 */
export function validateTimeWindow(iatMs: number, expMs: number, nowMs: number, policy: SignedHttpPolicy): void {
  if (expMs < iatMs) {
    throw new SignedHttpError({ kind: 'InvalidTimeWindow', iatMs, expMs });
  }
  const validityMs = expMs - iatMs;
  if (validityMs > policy.maxValidityMs) {
    throw new SignedHttpError({ kind: 'ValidityTooLarge', validityMs, maxValidityMs: policy.maxValidityMs });
  }
  if (iatMs > nowMs + policy.maxClockSkewMs) {
    throw new SignedHttpError({ kind: 'NotYetValid', iatMs, nowMs });
  }
  if (expMs < Math.max(0, nowMs - policy.maxClockSkewMs)) {
    throw new SignedHttpError({ kind: 'Expired', expMs, nowMs });
  }
}

// ============================================================================
// Headers
// ============================================================================

/** Raw header values as received; any may be absent. */
export interface SignatureHeaderValues {
  version?: string;
  sigInput?: string;
  signature?: string;
}

/** Header values as sent. The version is always {@link SIG_VERSION_V1}. */
export interface EncodedSignatureHeaders {
  sigInputB64: string;
  sigB64: string;
}

export interface DecodedSignature {
  sigInput: Uint8Array;
  signature: Uint8Array;
}

/** A signed response ready for transport. */
export interface SignedResponse {
  status: number;
  body: Uint8Array;
  headers: EncodedSignatureHeaders;
}

export function encodeSignatureHeaders(sigInput: Uint8Array, signature: Uint8Array): EncodedSignatureHeaders {
  return { sigInputB64: toBase64Url(sigInput), sigB64: toBase64Url(signature) };
}

/** The three `(name, value)` pairs to set on a request or response. */
export function signatureHeaderPairs(headers: EncodedSignatureHeaders): Array<[string, string]> {
  return [
    [HEADER_SIG_VERSION, SIG_VERSION_V1],
    [HEADER_SIG_INPUT, headers.sigInputB64],
    [HEADER_SIG, headers.sigB64],
  ];
}

function decodeHeader(header: string, value: string): Uint8Array {
  try {
    return fromBase64Url(value);
  } catch {
    throw new SignedHttpError({ kind: 'InvalidBase64', header });
  }
}

/**
 * Validate and decode the header triple.
 *
 * The version is checked before anything else so a future version is
 * reported as such even if its other headers differ.
 */
export function decodeSignatureHeaders(values: SignatureHeaderValues): DecodedSignature {
  if (values.version === undefined) {
    throw new SignedHttpError({ kind: 'MissingHeader', header: HEADER_SIG_VERSION });
  }
  if (values.version !== SIG_VERSION_V1) {
    throw new SignedHttpError({ kind: 'UnsupportedVersion', version: values.version });
  }
  if (values.sigInput === undefined) {
    throw new SignedHttpError({ kind: 'MissingHeader', header: HEADER_SIG_INPUT });
  }
  if (values.signature === undefined) {
    throw new SignedHttpError({ kind: 'MissingHeader', header: HEADER_SIG });
  }

  const sigInput = decodeHeader(HEADER_SIG_INPUT, values.sigInput);
  const signature = decodeHeader(HEADER_SIG, values.signature);
  if (signature.length !== ED25519_SIGNATURE_LENGTH) {
    throw new SignedHttpError({ kind: 'InvalidSignatureLength', length: signature.length });
  }
  return { sigInput, signature };
}

// ============================================================================
// Signing
// ============================================================================

export function messageToSign(domain: Uint8Array, sigInput: Uint8Array): Uint8Array {
  return concatBytes(domain, sigInput);
}

export function signWithDomain(domain: Uint8Array, sigInput: Uint8Array, key: Ed25519Keypair): Uint8Array {
  return key.sign(messageToSign(domain, sigInput));
}

export function verifyWithDomain(
  domain: Uint8Array,
  sigInput: Uint8Array,
  signature: Uint8Array,
  publicKey: Uint8Array,
): boolean {
  return verifyStrict(publicKey, messageToSign(domain, sigInput), signature);
}

/** HTTP bodies may be given as bytes or as text, which is UTF-8 encoded. */
export type BodyInput = Uint8Array | string;

export function bodyBytes(body: BodyInput): Uint8Array {
  return typeof body === 'string' ? utf8(body) : body;
}

/** Request metadata bound into the signature. */
export interface HttpRequestMeta {
  /** e.g. `POST` */
  method: string;
  /** e.g. `/invoke` */
  path: string;
  /** Raw query string without the leading `?`, or empty */
  query: string;
}

/** Decode 64 hex digits (either case) to 32 bytes. */
export function parseHex32(value: string): Uint8Array | undefined {
  if (!/^[0-9a-fA-F]{64}$/.test(value)) return undefined;
  return hexToBytes(value);
}

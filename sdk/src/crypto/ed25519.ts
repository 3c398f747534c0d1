/**
 * Ed25519 signing and strict verification.
 *
 * Uses node:crypto with DER-encoded keys. Verification additionally rejects
 * small-order and non-canonical public keys and `R` components, and
 * non-canonical `S` scalars, so a signature verifies under exactly one key.
 *
 * Accepted key text encodings:
 * - hex (64 chars, optional `0x` prefix)
 * - base64 / base64url, padded or not, of the 32 raw bytes
 * - the flagged form `0x00 || key32` (33 bytes), where `0x00` is the
 *   Ed25519 key scheme flag
 *
 * @module
 */

import { createPrivateKey, createPublicKey, sign, verify, type KeyObject } from "node:crypto";
import { InvalidKeyError } from "../errors.js";
import { bytesToHex, hexToBytes, randomBytes } from "../utils/encoding.js";

// ============================================================================
// Constants
// ============================================================================

export const ED25519_PUBLIC_KEY_LENGTH = 32;
export const ED25519_PRIVATE_KEY_LENGTH = 32;
export const ED25519_SIGNATURE_LENGTH = 64;
/** Key scheme flag for Ed25519 in flagged key and signature encodings */
export const ED25519_SCHEME_FLAG = 0x00;

/** DER prefix for SPKI-encoded Ed25519 public key (32 raw bytes follow) */
const ED25519_DER_PUBLIC_PREFIX = Buffer.from("302a300506032b6570032100", "hex");

/** DER prefix for PKCS8-encoded Ed25519 private key (32 raw bytes follow) */
const ED25519_DER_PRIVATE_PREFIX = Buffer.from("302e020100300506032b657004220420", "hex");

/** Field prime 2^255 - 19 */
const FIELD_P = (1n << 255n) - 19n;

/** Group order 2^252 + 27742317777372353535851937790883648493 */
const GROUP_L = (1n << 252n) + 27742317777372353535851937790883648493n;

/**
 * Encodings of the small-order points with the sign bit cleared.
 * Non-canonical encodings (y >= p) are rejected separately.
 */
const SMALL_ORDER_ENCODINGS: readonly string[] = [
  "0000000000000000000000000000000000000000000000000000000000000000",
  "0100000000000000000000000000000000000000000000000000000000000000",
  "26e8958fc2b227b045c3f489f2ef98f0d5dfac05d3c63339b13802886d53fc05",
  "c7176a703d4dd84fba3c0b760d10670f2a2053fa2c39ccc64ec7fd7792ac037a",
  "ecffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f",
];

// ============================================================================
// Point checks
// ============================================================================

function littleEndianToBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i]);
  }
  return value;
}

function clearSignBit(encoded: Uint8Array): Uint8Array {
  const copy = Uint8Array.from(encoded);
  copy[31] &= 0x7f;
  return copy;
}

/**
 * Whether a 32-byte point encoding is canonical (y < p) and not one of the
 * small-order points.
 */
export function isStrictPointEncoding(encoded: Uint8Array): boolean {
  if (encoded.length !== 32) return false;
  const y = clearSignBit(encoded);
  if (littleEndianToBigInt(y) >= FIELD_P) return false;
  return !SMALL_ORDER_ENCODINGS.includes(bytesToHex(y));
}

function isCanonicalScalar(encoded: Uint8Array): boolean {
  return littleEndianToBigInt(encoded) < GROUP_L;
}

// ============================================================================
// Key objects
// ============================================================================

function publicKeyObject(rawKey: Uint8Array): KeyObject {
  return createPublicKey({
    key: Buffer.concat([ED25519_DER_PUBLIC_PREFIX, rawKey]),
    format: "der",
    type: "spki",
  });
}

function privateKeyObject(rawKey: Uint8Array): KeyObject {
  return createPrivateKey({
    key: Buffer.concat([ED25519_DER_PRIVATE_PREFIX, rawKey]),
    format: "der",
    type: "pkcs8",
  });
}

/**
 * Derive the 32-byte public key from a 32-byte secret seed.
 */
export function publicKeyFromPrivate(privateKey: Uint8Array): Uint8Array {
  const der = createPublicKey(privateKeyObject(privateKey)).export({ format: "der", type: "spki" });
  return new Uint8Array(der.subarray(ED25519_DER_PUBLIC_PREFIX.length));
}

// ============================================================================
// Sign / Verify
// ============================================================================

/**
 * Sign a message with a 32-byte Ed25519 secret seed.
 *
 * @returns 64-byte detached signature
 */
export function ed25519Sign(privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  if (privateKey.length !== ED25519_PRIVATE_KEY_LENGTH) {
    throw new InvalidKeyError({ kind: "InvalidLength", length: privateKey.length });
  }
  return new Uint8Array(sign(null, message, privateKeyObject(privateKey)));
}

/**
 * Strict Ed25519 verification. Returns false for any malformed input.
 */
export function verifyStrict(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  if (publicKey.length !== ED25519_PUBLIC_KEY_LENGTH || signature.length !== ED25519_SIGNATURE_LENGTH) {
    return false;
  }
  if (!isStrictPointEncoding(publicKey)) return false;
  if (!isStrictPointEncoding(signature.subarray(0, 32))) return false;
  if (!isCanonicalScalar(signature.subarray(32))) return false;
  try {
    return verify(null, message, publicKeyObject(publicKey), signature);
  } catch {
    return false;
  }
}

/**
 * Whether a public key may be used with {@link verifyStrict}.
 */
export function isValidPublicKey(publicKey: Uint8Array): boolean {
  if (!isStrictPointEncoding(publicKey)) return false;
  try {
    publicKeyObject(publicKey);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Key parsing
// ============================================================================

const HEX_CHARS_RE = /^[0-9a-fA-F]+$/;
const ANY_BASE64_RE = /^[A-Za-z0-9+/_-]+={0,2}$/;

function decodeAnyBase64(text: string): Uint8Array {
  if (!ANY_BASE64_RE.test(text)) {
    throw new InvalidKeyError({ kind: "InvalidBase64" });
  }
  const hasStd = /[+/]/.test(text);
  const hasUrl = /[-_]/.test(text);
  if (hasStd && hasUrl) {
    throw new InvalidKeyError({ kind: "InvalidBase64" });
  }
  const unpadded = text.replace(/=+$/, "");
  const padded = text.length !== unpadded.length;
  if (unpadded.length % 4 === 1 || (padded && text.length % 4 !== 0)) {
    throw new InvalidKeyError({ kind: "InvalidBase64" });
  }
  return new Uint8Array(Buffer.from(unpadded, hasUrl ? "base64url" : "base64"));
}

function fromFlaggedOrRaw(bytes: Uint8Array): Uint8Array {
  if (bytes.length === 32) return bytes;
  if (bytes.length === 33) {
    if (bytes[0] !== ED25519_SCHEME_FLAG) {
      throw new InvalidKeyError({ kind: "UnsupportedKeySchemeFlag", flag: bytes[0] });
    }
    return bytes.slice(1);
  }
  throw new InvalidKeyError({ kind: "InvalidLength", length: bytes.length });
}

/**
 * Parse 32 bytes of Ed25519 key material from one of the accepted text
 * encodings.
 */
export function parseEd25519KeyBytes(raw: string): Uint8Array {
  const text = raw.trim();
  const noPrefix = text.startsWith("0x") ? text.slice(2) : text;
  // Hex wins only when the input is unambiguously hex.
  const looksLikeHex =
    text.startsWith("0x") || ((noPrefix.length === 64 || noPrefix.length === 66) && HEX_CHARS_RE.test(noPrefix));

  if (looksLikeHex) {
    let bytes: Uint8Array;
    try {
      bytes = hexToBytes(noPrefix);
    } catch {
      throw new InvalidKeyError({ kind: "InvalidHex" });
    }
    return fromFlaggedOrRaw(bytes);
  }
  return fromFlaggedOrRaw(decodeAnyBase64(text));
}

export function parseEd25519PrivateKey(raw: string): Uint8Array {
  return parseEd25519KeyBytes(raw);
}

/**
 * Parse a public key and check that it is usable for strict verification.
 */
export function parseEd25519PublicKey(raw: string): Uint8Array {
  const bytes = parseEd25519KeyBytes(raw);
  if (!isValidPublicKey(bytes)) {
    throw new InvalidKeyError({ kind: "InvalidPoint" });
  }
  return bytes;
}

// ============================================================================
// Keypair
// ============================================================================

export class Ed25519Keypair {
  private readonly secret: Uint8Array;
  private readonly publicKey: Uint8Array;

  private constructor(secret: Uint8Array) {
    if (secret.length !== ED25519_PRIVATE_KEY_LENGTH) {
      throw new InvalidKeyError({ kind: "InvalidLength", length: secret.length });
    }
    this.secret = Uint8Array.from(secret);
    this.publicKey = publicKeyFromPrivate(this.secret);
  }

  static generate(): Ed25519Keypair {
    return new Ed25519Keypair(randomBytes(ED25519_PRIVATE_KEY_LENGTH));
  }

  static fromSecretKey(secret: Uint8Array): Ed25519Keypair {
    return new Ed25519Keypair(secret);
  }

  /** Parse hex, base64 or the flagged form (see module docs). */
  static fromString(raw: string): Ed25519Keypair {
    return new Ed25519Keypair(parseEd25519PrivateKey(raw));
  }

  publicKeyBytes(): Uint8Array {
    return Uint8Array.from(this.publicKey);
  }

  privateKeyBytes(): Uint8Array {
    return Uint8Array.from(this.secret);
  }

  publicKeyHex(): string {
    return bytesToHex(this.publicKey);
  }

  privateKeyHex(): string {
    return bytesToHex(this.secret);
  }

  sign(message: Uint8Array): Uint8Array {
    return ed25519Sign(this.secret, message);
  }
}

/**
 * Byte encoding and hashing helpers shared by the ledger codec and the
 * signed-HTTP wire format.
 * @module
 */

import { createHash, randomBytes as nodeRandomBytes } from "node:crypto";

const HEX_RE = /^[0-9a-fA-F]*$/;
const BASE64URL_RE = /^[A-Za-z0-9_-]*$/;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Convert a hex string to Uint8Array
 * @param hex - Hex string (with or without 0x prefix)
 * @throws Error if hex string has odd length or non-hex characters
 * @example
 * ```typescript
 * hexToBytes('0x0102'); // Uint8Array([1, 2])
 * ```
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
  if (cleanHex.length % 2 !== 0) {
    throw new Error("Invalid hex string length");
  }
  if (!HEX_RE.test(cleanHex)) {
    throw new Error("Invalid hex string: contains non-hexadecimal characters");
  }
  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < cleanHex.length; i += 2) {
    bytes[i / 2] = parseInt(cleanHex.slice(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Convert Uint8Array to lowercase hex string
 * @param prefix - Whether to include 0x prefix (default: false)
 */
export function bytesToHex(bytes: Uint8Array, prefix = false): string {
  const hex = Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
  return prefix ? `0x${hex}` : hex;
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

/**
 * Strict standard base64 decoding. Rejects characters outside the alphabet,
 * misplaced padding and impossible lengths.
 */
export function fromBase64(text: string): Uint8Array {
  if (!BASE64_RE.test(text) || text.length % 4 !== 0) {
    throw new Error("Invalid base64 string");
  }
  return new Uint8Array(Buffer.from(text, "base64"));
}

/** URL-safe base64 without padding. */
export function toBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64url");
}

/**
 * Strict URL-safe base64 decoding: no padding, URL alphabet only, and a
 * length that can encode whole bytes (`len % 4 !== 1`).
 */
export function fromBase64Url(text: string): Uint8Array {
  if (!BASE64URL_RE.test(text) || text.length % 4 === 1) {
    throw new Error("Invalid base64url string");
  }
  const bytes = new Uint8Array(Buffer.from(text, "base64url"));
  // Reject non-canonical trailing bits so every byte string has one encoding.
  if (toBase64Url(bytes) !== text) {
    throw new Error("Invalid base64url string");
  }
  return bytes;
}

export function sha256(bytes: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha256").update(bytes).digest());
}

/** 64-char lowercase hex SHA-256 digest. */
export function sha256Hex(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export function randomBytes(length: number): Uint8Array {
  return new Uint8Array(nodeRandomBytes(length));
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Compare two byte arrays in constant time for equal lengths.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a[i] ^ b[i];
  }
  return result === 0;
}

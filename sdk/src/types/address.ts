/**
 * 32-byte ledger addresses and object ids.
 * @module
 */

import { z } from "zod";
import { blake2b } from "@noble/hashes/blake2b";
import { bytesToHex, hexToBytes, concatBytes } from "../utils/encoding.js";

/** `0x` followed by 64 lowercase hex chars */
export type Address = string;

export const ADDRESS_LENGTH = 32;

const SHORT_ADDRESS_RE = /^0x[0-9a-fA-F]{1,64}$/;

/**
 * Normalize an address to its long form: lowercase, `0x` prefix, left-padded
 * to 32 bytes (`0x2` becomes `0x000...02`).
 */
export function normalizeAddress(value: string): Address {
  const text = value.trim();
  const prefixed = text.startsWith("0x") || text.startsWith("0X") ? `0x${text.slice(2)}` : `0x${text}`;
  if (!SHORT_ADDRESS_RE.test(prefixed)) {
    throw new Error(`Invalid address: "${value}"`);
  }
  return `0x${prefixed.slice(2).toLowerCase().padStart(ADDRESS_LENGTH * 2, "0")}`;
}

export function isValidAddress(value: string): boolean {
  try {
    normalizeAddress(value);
    return true;
  } catch {
    return false;
  }
}

export function addressToBytes(address: Address): Uint8Array {
  return hexToBytes(normalizeAddress(address));
}

export function addressFromBytes(bytes: Uint8Array): Address {
  if (bytes.length !== ADDRESS_LENGTH) {
    throw new Error(`Address must be ${ADDRESS_LENGTH} bytes, got ${bytes.length}`);
  }
  return bytesToHex(bytes, true);
}

/**
 * Derive the ledger address of a public key: blake2b-256 of
 * `scheme_flag || public_key`.
 */
export function addressFromPublicKey(publicKey: Uint8Array, schemeFlag = 0x00): Address {
  const digest = blake2b(concatBytes(Uint8Array.of(schemeFlag), publicKey), { dkLen: 32 });
  return addressFromBytes(digest);
}

/** Zod schema that accepts any address form and yields the long form. */
export const addressSchema = z.string().transform((value, ctx) => {
  try {
    return normalizeAddress(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid address: ${value}` });
    return z.NEVER;
  }
});

/**
 * Ledger `ID` / `UID` values appear either bare or wrapped as `{ id }`.
 */
export const objectIdSchema = z.union([
  addressSchema,
  z.object({ id: addressSchema }).transform((v) => v.id),
  z.object({ id: z.object({ id: addressSchema }) }).transform((v) => v.id.id),
]);

/**
 * Zod codecs for values as the ledger renders them in JSON.
 * @module
 */

import { z } from "zod";
import { parseStringifiedU64, serializeStringifiedU64 } from "../utils/numeric.js";
import { fromBase64 } from "../utils/encoding.js";

/**
 * Stringified u64. Plain JSON integers are also accepted when they are safe
 * integers, since some ledger paths emit small values unquoted.
 */
export const u64Schema = z.union([z.string(), z.number().int().nonnegative(), z.bigint()]).transform((value, ctx) => {
  try {
    if (typeof value === "bigint") return parseStringifiedU64(value.toString());
    if (typeof value === "number") {
      if (!Number.isSafeInteger(value)) throw new RangeError(`Unsafe integer ${value}`);
      return BigInt(value);
    }
    return parseStringifiedU64(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: String(error) });
    return z.NEVER;
  }
});

/**
 * Stringified `Option<u64>`: `null`, absent, `{ vec: [] }` or `{ vec: ["5"] }`
 * decode to `undefined` or the value.
 */
export const optionU64Schema = z
  .union([
    z.null(),
    z.undefined(),
    z.object({ vec: z.array(u64Schema).max(1) }).transform((v) => (v.vec.length === 0 ? undefined : v.vec[0])),
    u64Schema,
  ])
  .transform((value) => (value === null ? undefined : value));

export function emitU64(value: bigint): string {
  return serializeStringifiedU64(value);
}

export function emitOptionU64(value: bigint | undefined): string | null {
  return value === undefined ? null : serializeStringifiedU64(value);
}

/** `vector<u8>` as a number array or base64 string. */
export const bytesSchema = z
  .union([z.array(z.number().int().min(0).max(255)), z.string()])
  .transform((value, ctx) => {
    if (Array.isArray(value)) return Uint8Array.from(value);
    try {
      return fromBase64(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid byte string" });
      return z.NEVER;
    }
  });

/** `vector<u8>` holding UTF-8 text, or a plain string. */
export const utf8BytesSchema = z
  .union([z.array(z.number().int().min(0).max(255)), z.string()])
  .transform((value) => (Array.isArray(value) ? new TextDecoder().decode(Uint8Array.from(value)) : value));

/** `vector<u8>` holding an absolute URL. */
export const urlBytesSchema = utf8BytesSchema.transform((text, ctx) => {
  try {
    return new URL(text).toString();
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid URL "${text}"` });
    return z.NEVER;
  }
});

/** `vector<u8>` holding a JSON document. */
export const jsonBytesSchema = utf8BytesSchema.transform((text, ctx): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid JSON: ${String(error)}` });
    return z.NEVER;
  }
});

/** Move `std::type_name::TypeName` and the ascii-string wrapper forms. */
export const typeNameSchema = z.object({ name: z.string() });

export type TypeName = z.infer<typeof typeNameSchema>;

/** Move ascii / utf8 `String`, bare or wrapped as `{ bytes }`. */
export const moveStringSchema = z.union([z.string(), z.object({ bytes: z.string() }).transform((v) => v.bytes)]);

/**
 * Normalize the ledger renderings of a Move enum into `{ "@variant", ...fields }`.
 * Accepted shapes: `{ "@variant": V, ...fields }`, `{ _variant_name: V, ...fields }`
 * and `{ variant: V, fields: {...} }`.
 */
export function normalizeMoveEnum(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  const record: Record<string, unknown> = { ...value };
  if (typeof record["@variant"] === "string") return record;
  if (typeof record._variant_name === "string") {
    const { _variant_name: variant, ...fields } = record;
    return { "@variant": variant, ...fields };
  }
  if (typeof record.variant === "string" && typeof record.fields === "object" && record.fields !== null) {
    return { "@variant": record.variant, ...record.fields };
  }
  return value;
}

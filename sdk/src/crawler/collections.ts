/**
 * Zod projections of the ledger's collection types.
 *
 * Inline collections (`VecSet`, `VecMap`) decode to JS `Set` / `Map`. Dynamic
 * collections (`Bag`, `Table`, `TableVec` and friends) decode to a handle
 * carrying only the parent id and the declared size; the {@link Crawler}
 * fetches their entries on demand.
 *
 * @module
 */

import { z } from "zod";
import { objectIdSchema, type Address } from "../types/address.js";
import { u64Schema } from "../types/codecs.js";
import { toNumber } from "../utils/numeric.js";

// ============================================================================
// Inline collections
// ============================================================================

function parseInto<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  path: (string | number)[],
  ctx: z.RefinementCtx,
): { ok: true; value: T } | { ok: false } {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return { ok: true, value: parsed.data };
  for (const issue of parsed.error.issues) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: [...path, ...issue.path] });
  }
  return { ok: false };
}

/**
 * `VecSet<T>`. The ledger renders it either as `{ contents: [..] }` or, for
 * string-like elements, as `{ contents: { item: .. } }`, in which case the
 * keys are the elements.
 */
export function setSchema<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>): z.ZodType<Set<T>, z.ZodTypeDef, unknown> {
  return z
    .object({ contents: z.union([z.array(z.unknown()), z.record(z.unknown()).transform((v): unknown[] => Object.keys(v))]) })
    .transform((value, ctx) => {
      const out = new Set<T>();
      for (const [index, raw] of value.contents.entries()) {
        const parsed = parseInto(item, raw, ["contents", index], ctx);
        if (!parsed.ok) return z.NEVER;
        out.add(parsed.value);
      }
      return out;
    });
}

const entryListSchema = z
  .array(z.object({ key: z.unknown(), value: z.unknown() }))
  .transform((list) => list.map((entry): [unknown, unknown] => [entry.key, entry.value]));

const entryRecordSchema = z.record(z.unknown()).transform((obj) => Object.entries(obj));

/**
 * `VecMap<K, V>`: `{ contents: [{ key, value }, ..] }` or `{ contents: { k: v } }`.
 * Object keys keep their identity, so look them up by iterating.
 */
export function mapSchema<K, V>(
  key: z.ZodType<K, z.ZodTypeDef, unknown>,
  value: z.ZodType<V, z.ZodTypeDef, unknown>,
): z.ZodType<Map<K, V>, z.ZodTypeDef, unknown> {
  return z.object({ contents: z.union([entryListSchema, entryRecordSchema]) }).transform((v, ctx) => {
    const out = new Map<K, V>();
    for (const [index, [rawKey, rawValue]] of v.contents.entries()) {
      const k = parseInto(key, rawKey, ["contents", index, "key"], ctx);
      const val = parseInto(value, rawValue, ["contents", index, "value"], ctx);
      if (!k.ok || !val.ok) return z.NEVER;
      out.set(k.value, val.value);
    }
    return out;
  });
}

// ============================================================================
// Dynamic collections
// ============================================================================

/** Collections whose entries are `Field<K, V>` dynamic fields. */
export type FieldCollectionKind = "bag" | "table" | "table_vec" | "dynamic_map";
/** Collections whose entries are objects attached as dynamic object fields. */
export type ObjectCollectionKind = "object_bag" | "object_table" | "dynamic_object_map";

export interface CollectionHandle<Kind extends string> {
  kind: Kind;
  /** Parent UID the entries hang off */
  id: Address;
  /** Declared number of entries */
  size: number;
}

export type FieldCollection = CollectionHandle<FieldCollectionKind>;
export type ObjectCollection = CollectionHandle<ObjectCollectionKind>;
export type TableVecHandle = CollectionHandle<"table_vec">;

function handleSchema<Kind extends string>(kind: Kind): z.ZodType<CollectionHandle<Kind>, z.ZodTypeDef, unknown> {
  return z
    .object({ id: objectIdSchema, size: u64Schema })
    .transform((v, ctx): CollectionHandle<Kind> => {
      try {
        return { kind, id: v.id, size: toNumber(v.size) };
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: String(error), path: ["size"] });
        return z.NEVER;
      }
    });
}

export const bagSchema = handleSchema("bag");
export const objectBagSchema = handleSchema("object_bag");
export const tableSchema = handleSchema("table");
export const objectTableSchema = handleSchema("object_table");
export const tableVecSchema = handleSchema("table_vec");
export const dynamicMapSchema = handleSchema("dynamic_map");
export const dynamicObjectMapSchema = handleSchema("dynamic_object_map");

/** Build a handle without going through JSON. */
export function collectionHandle<Kind extends string>(kind: Kind, id: Address, size: number): CollectionHandle<Kind> {
  return { kind, id, size };
}

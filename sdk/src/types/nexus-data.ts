/**
 * NexusData: port data as the workflow stores it on the ledger.
 *
 * On the ledger the value is the struct
 * `{ storage: vector<u8>, one: vector<u8>, many: vector<vector<u8>>, encrypted: bool }`.
 * `storage` is `"inline"` or `"walrus"`; `one` holds the JSON text of a
 * non-array value and `many` one JSON text per array element.
 *
 * @module
 */

import { z } from "zod";
import { bytesSchema, typeNameSchema } from "./codecs.js";

export type StorageKind = "inline" | "walrus";

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export interface NexusData {
  storage: StorageKind;
  /** Whether the value is encrypted before commit and decrypted after fetch */
  encrypted: boolean;
  /** Plain value for inline storage, blob id(s) for remote storage once committed */
  data: JsonValue;
}

// ============================================================================
// Size constants
// ============================================================================

/** Max transaction size accepted by the ledger */
export const MAX_TRANSACTION_SIZE = 128 * 1024;
/** Size of a walk-evaluation transaction without any port data */
export const NEXUS_BASE_TRANSACTION_SIZE = 8 * 1024;
/** Length of a remote blob id */
export const WALRUS_BLOB_ID_LENGTH = 44;
/** Extra bytes per encrypted item */
export const ENCRYPTION_BASE_SIZE = 440;
/** Size inflation of encrypted data */
export const ENCRYPTION_INFLATION_FACTOR = 4;

// ============================================================================
// Constructors
// ============================================================================

export function inlineData(data: JsonValue, encrypted = false): NexusData {
  return { storage: "inline", encrypted, data };
}

export function walrusData(data: JsonValue, encrypted = false): NexusData {
  return { storage: "walrus", encrypted, data };
}

// ============================================================================
// Wire struct
// ============================================================================

export interface NexusDataStruct {
  storage: Uint8Array;
  one: Uint8Array;
  many: Uint8Array[];
  encrypted: boolean;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

function parseJsonBytes(bytes: Uint8Array): JsonValue {
  const parsed: unknown = JSON.parse(decoder.decode(bytes));
  return jsonValueSchema.parse(parsed);
}

export function toNexusDataStruct(value: NexusData): NexusDataStruct {
  const storage = encoder.encode(value.storage);
  if (Array.isArray(value.data)) {
    return {
      storage,
      one: new Uint8Array(0),
      many: value.data.map((item) => encoder.encode(JSON.stringify(item))),
      encrypted: value.encrypted,
    };
  }
  return {
    storage,
    one: encoder.encode(JSON.stringify(value.data)),
    many: [],
    encrypted: value.encrypted,
  };
}

export function fromNexusDataStruct(value: NexusDataStruct): NexusData {
  const storageTag = decoder.decode(value.storage);
  if (storageTag !== "inline" && storageTag !== "walrus") {
    throw new Error(`Unknown NexusData storage "${storageTag}"`);
  }
  const data = value.one.length > 0 ? parseJsonBytes(value.one) : value.many.map(parseJsonBytes);
  return { storage: storageTag, encrypted: value.encrypted, data };
}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

/** Ledger JSON rendering of the wire struct. */
export const nexusDataSchema: z.ZodType<NexusData, z.ZodTypeDef, unknown> = z
  .object({
    storage: bytesSchema,
    one: bytesSchema,
    many: z.array(bytesSchema),
    encrypted: z.boolean(),
  })
  .transform((value, ctx) => {
    try {
      return fromNexusDataStruct(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: String(error) });
      return z.NEVER;
    }
  });

export function emitNexusData(value: NexusData): Record<string, unknown> {
  const wire = toNexusDataStruct(value);
  return {
    storage: Array.from(wire.storage),
    one: Array.from(wire.one),
    many: wire.many.map((item) => Array.from(item)),
    encrypted: wire.encrypted,
  };
}

/**
 * Port-to-data map stored as a `VecMap<TypeName, NexusData>`.
 */
export const portsDataSchema = z
  .object({ contents: z.array(z.object({ key: typeNameSchema, value: nexusDataSchema })) })
  .transform((v) => new Map(v.contents.map((entry) => [entry.key.name, entry.value])));

export type PortsData = Map<string, NexusData>;

export function emitPortsData(ports: PortsData): Record<string, unknown> {
  return {
    contents: Array.from(ports, ([key, value]) => ({ key: { name: key }, value: emitNexusData(value) })),
  };
}

// ============================================================================
// Helpers
// ============================================================================

function asJsonObject(json: JsonValue): { [key: string]: JsonValue } {
  if (json === null || typeof json !== "object" || Array.isArray(json)) {
    throw new Error("Expected JSON object");
  }
  return json;
}

/**
 * Turn a JSON object into a port-to-NexusData map. Fields listed in
 * `encryptFields` are marked encrypted and fields in `remoteFields` go to the
 * preferred remote storage.
 */
export function jsonToNexusDataMap(
  json: JsonValue,
  encryptFields: readonly string[] = [],
  remoteFields: readonly string[] = [],
  preferredRemoteStorage: StorageKind = "walrus",
): Map<string, NexusData> {
  const obj = asJsonObject(json);
  const map = new Map<string, NexusData>();

  for (const [key, value] of Object.entries(obj)) {
    const encrypt = encryptFields.includes(key);
    const remote = remoteFields.includes(key);
    if (!remote) {
      map.set(key, inlineData(value, encrypt));
      continue;
    }
    if (preferredRemoteStorage === "inline") {
      throw new Error("Cannot store data remotely using inline storage");
    }
    map.set(key, walrusData(value, encrypt));
  }

  return map;
}

/**
 * Suggest which fields to store remotely so that the port data fits in one
 * transaction. Sizes assume every field is encrypted; largest fields are
 * moved first.
 */
export function hintRemoteFields(json: JsonValue): string[] {
  const obj = asJsonObject(json);

  const fields = Object.entries(obj).map(([key, value]) => {
    const dataSize = encoder.encode(JSON.stringify(value)).length;
    const items = Array.isArray(value) ? value.length : 1;
    const encryptedSize = ENCRYPTION_BASE_SIZE * items + dataSize * ENCRYPTION_INFLATION_FACTOR;
    return { key, value, size: encoder.encode(key).length + encryptedSize };
  });

  fields.sort((a, b) => b.size - a.size);

  const availableSize = MAX_TRANSACTION_SIZE - NEXUS_BASE_TRANSACTION_SIZE;
  let requiredSize = fields.reduce((sum, field) => sum + field.size, 0);

  if (requiredSize <= availableSize) {
    return [];
  }

  const remoteFields: string[] = [];
  for (const field of fields) {
    const storageCost = Array.isArray(field.value) ? WALRUS_BLOB_ID_LENGTH * field.value.length : WALRUS_BLOB_ID_LENGTH;
    requiredSize = Math.max(0, requiredSize - field.size) + storageCost;
    remoteFields.push(field.key);
    if (requiredSize <= availableSize) break;
  }

  if (requiredSize > availableSize) {
    throw new Error("Cannot fit data within max transaction size, even after storing all fields remotely");
  }

  return remoteFields;
}

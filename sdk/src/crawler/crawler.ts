/**
 * Object crawler.
 *
 * Fetches ledger objects through a {@link LedgerClient} and validates their
 * JSON contents against caller-supplied zod schemas. Dynamic collections are
 * resolved by listing the parent's dynamic fields page by page and then
 * batch-fetching the field objects; the number of entries found must match
 * the size the parent declares.
 *
 * @module
 */

import { z } from "zod";
import {
  DynamicFieldSizeMismatchError,
  IndexOutOfBoundsError,
  MetadataMissingError,
  ObjectNotFoundError,
  ParsingError,
} from "../errors.js";
import { getSdkLogger, type Logger } from "../logger.js";
import { CONTENT_MASK, METADATA_MASK, type DynamicFieldEntry, type LedgerClient, type LedgerObject } from "../ledger/types.js";
import { objectIdSchema, type Address } from "../types/address.js";
import { u64Schema } from "../types/codecs.js";
import { formatZodIssues } from "../utils/zod.js";
import type { FieldCollection, ObjectCollection, TableVecHandle } from "./collections.js";
import { Response } from "./response.js";
import { ValueMap } from "./value-map.js";

/** Page size used when listing dynamic fields */
export const DYNAMIC_FIELD_PAGE_SIZE = 1000;

/** Maximum ids per batch read */
export const OBJECT_BATCH_SIZE = 50;

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface CrawlerOptions {
  logger?: Logger;
}

const fieldObjectSchema = z.object({ name: z.unknown(), value: z.unknown() });

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

function parseWith<T>(schema: Schema<T>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ParsingError(`Could not parse ${what}: ${formatZodIssues(parsed.error).join("; ")}`, parsed.error);
  }
  return parsed.data;
}

export class Crawler {
  private readonly ledger: LedgerClient;
  private readonly logger: Logger;

  constructor(ledger: LedgerClient, options: CrawlerOptions = {}) {
    this.ledger = ledger;
    this.logger = options.logger ?? getSdkLogger();
  }

  // ==========================================================================
  // Objects
  // ==========================================================================

  async getObject<T>(objectId: Address, schema: Schema<T>): Promise<Response<T>> {
    const object = await this.ledger.getObject(objectId, CONTENT_MASK);
    if (object === undefined) throw new ObjectNotFoundError(objectId);
    return this.toResponse(objectId, object, schema);
  }

  /** Results follow the order of `objectIds`. */
  async getObjects<T>(objectIds: readonly Address[], schema: Schema<T>): Promise<Response<T>[]> {
    const objects = await this.fetchBatch(objectIds, true);
    return objects.map((object, i) => this.toResponse(objectIds[i] ?? "", object, schema));
  }

  async getObjectMetadata(objectId: Address): Promise<Response<null>> {
    const object = await this.ledger.getObject(objectId, METADATA_MASK);
    if (object === undefined) throw new ObjectNotFoundError(objectId);
    return this.toMetadata(objectId, object);
  }

  async getObjectsMetadata(objectIds: readonly Address[]): Promise<Response<null>[]> {
    const objects = await this.fetchBatch(objectIds, false);
    return objects.map((object, i) => this.toMetadata(objectIds[i] ?? "", object));
  }

  // ==========================================================================
  // Dynamic collections
  // ==========================================================================

  /** Entries of a `Bag`, `Table` or dynamic map, looked up by key value. */
  async getDynamicFields<K, V>(
    parent: FieldCollection,
    keySchema: Schema<K>,
    valueSchema: Schema<V>,
  ): Promise<ValueMap<K, V>> {
    const fields = await this.fieldObjects(parent);
    const out = new ValueMap<K, V>();
    for (const field of fields) {
      const id = field.objectId;
      const key = parseWith(keySchema, field.name, `dynamic field name of ${id}`);
      out.set(key, parseWith(valueSchema, field.value, `dynamic field value of ${id}`));
    }
    return out;
  }

  /** Entries of an `ObjectBag`, `ObjectTable` or dynamic object map. */
  async getDynamicFieldObjects<K, V>(
    parent: ObjectCollection,
    keySchema: Schema<K>,
    valueSchema: Schema<V>,
  ): Promise<ValueMap<K, Response<V>>> {
    const entries = await this.listAll(parent);
    const unresolved = entries.filter((entry) => entry.childId === undefined).map((entry) => entry.fieldId);

    // Entries listed without a child id are resolved through their wrapper.
    const childByField = new Map<Address, Address>();
    if (unresolved.length > 0) {
      const wrappers = await this.fetchBatch(unresolved, true);
      wrappers.forEach((wrapper, i) => {
        const fieldId = unresolved[i] ?? "";
        const json = this.requireJson(fieldId, wrapper);
        const parsed = parseWith(fieldObjectSchema, json, `dynamic object field ${fieldId}`);
        childByField.set(fieldId, parseWith(objectIdSchema, parsed.value, `child id of ${fieldId}`));
      });
    }

    const wrapperIds = entries.map((entry) => entry.fieldId);
    const childIds = entries.map((entry) => entry.childId ?? childByField.get(entry.fieldId) ?? "");
    const [wrappers, children] = await Promise.all([
      this.fetchBatch(wrapperIds, true),
      this.getObjects(childIds, valueSchema),
    ]);

    const out = new ValueMap<K, Response<V>>();
    wrappers.forEach((wrapper, i) => {
      const fieldId = wrapperIds[i] ?? "";
      const child = children[i];
      if (child === undefined) throw new ObjectNotFoundError(childIds[i] ?? fieldId);
      const parsed = parseWith(fieldObjectSchema, this.requireJson(fieldId, wrapper), `dynamic object field ${fieldId}`);
      out.set(parseWith(keySchema, parsed.name, `dynamic field name of ${fieldId}`), child);
    });
    return out;
  }

  /** Entries of a `TableVec<T>`, in index order. */
  async getTableVec<T>(parent: TableVecHandle, valueSchema: Schema<T>): Promise<T[]> {
    const fields = await this.fieldObjects(parent);
    const out: T[] = [];
    const filled = new Set<number>();

    for (const field of fields) {
      const index = parseWith(u64Schema, field.name, `table index of ${field.objectId}`);
      if (index >= BigInt(parent.size)) throw new IndexOutOfBoundsError(index, parent.size);
      const slot = Number(index);
      if (filled.has(slot)) throw new ParsingError(`Duplicate index ${slot} in table vec ${parent.id}`);
      out[slot] = parseWith(valueSchema, field.value, `table vec entry ${slot} of ${parent.id}`);
      filled.add(slot);
    }

    for (let i = 0; i < parent.size; i++) {
      if (!filled.has(i)) throw new ParsingError(`Missing index ${i} in table vec ${parent.id}`);
    }
    return out;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async listAll(parent: FieldCollection | ObjectCollection): Promise<DynamicFieldEntry[]> {
    const entries: DynamicFieldEntry[] = [];
    let pageToken: Uint8Array | undefined;
    let pages = 0;
    do {
      const page = await this.ledger.listDynamicFields({
        parent: parent.id,
        pageSize: DYNAMIC_FIELD_PAGE_SIZE,
        pageToken,
      });
      entries.push(...page.fields);
      pageToken = page.nextPageToken;
      pages++;
    } while (pageToken !== undefined);

    this.logger.debug(`Listed ${entries.length} dynamic fields of ${parent.id} in ${pages} page(s)`);
    if (entries.length !== parent.size) {
      throw new DynamicFieldSizeMismatchError(parent.size, entries.length);
    }
    return entries;
  }

  private async fieldObjects(
    parent: FieldCollection,
  ): Promise<{ objectId: Address; name: unknown; value: unknown }[]> {
    const entries = await this.listAll(parent);
    const ids = entries.map((entry) => entry.fieldId);
    const objects = await this.fetchBatch(ids, true);
    return objects.map((object, i) => {
      const objectId = ids[i] ?? "";
      const parsed = parseWith(fieldObjectSchema, this.requireJson(objectId, object), `dynamic field ${objectId}`);
      return { objectId, name: parsed.name, value: parsed.value };
    });
  }

  private async fetchBatch(objectIds: readonly Address[], withContent: boolean): Promise<LedgerObject[]> {
    const mask = withContent ? CONTENT_MASK : METADATA_MASK;
    const batches = await Promise.all(chunk(objectIds, OBJECT_BATCH_SIZE).map((ids) => this.ledger.batchGetObjects(ids, mask)));
    return batches.flat().map((object, i) => {
      if (object === undefined) throw new ObjectNotFoundError(objectIds[i] ?? "");
      return object;
    });
  }

  private requireJson(objectId: Address, object: LedgerObject): unknown {
    if (object.json === undefined) throw new MetadataMissingError("json", objectId);
    return object.json;
  }

  private toMetadata(objectId: Address, object: LedgerObject): Response<null> {
    if (object.owner === undefined) throw new MetadataMissingError("owner", objectId);
    if (object.version === undefined) throw new MetadataMissingError("version", objectId);
    if (object.digest === undefined) throw new MetadataMissingError("digest", objectId);
    return new Response(object.objectId ?? objectId, object.owner, object.version, null, object.digest, object.balance);
  }

  private toResponse<T>(objectId: Address, object: LedgerObject, schema: Schema<T>): Response<T> {
    const metadata = this.toMetadata(objectId, object);
    const data = parseWith(schema, this.requireJson(objectId, object), `object ${objectId}`);
    return metadata.withData(data);
  }
}

/**
 * In-process {@link LedgerClient} backed by maps. Used by tests and by local
 * tooling that wants to exercise the SDK without a node.
 *
 * @module
 */

import { ObjectNotFoundError, RpcError } from "../errors.js";
import { normalizeAddress, type Address } from "../types/address.js";
import type { Owner } from "../types/object.js";
import type {
  CheckpointSummary,
  DynamicFieldEntry,
  DynamicFieldPage,
  EpochInfo,
  ExecuteTransactionRequest,
  ExecutedTransaction,
  LedgerClient,
  LedgerObject,
  ListDynamicFieldsRequest,
  ObjectField,
} from "./types.js";

export interface MemoryObject {
  objectId: Address;
  owner: Owner;
  version: bigint;
  digest: string;
  objectType?: string;
  balance?: bigint;
  json: unknown;
}

export type TransactionHandler = (request: ExecuteTransactionRequest) => ExecutedTransaction | Promise<ExecutedTransaction>;

function pageToken(offset: number): Uint8Array {
  const view = new DataView(new ArrayBuffer(4));
  view.setUint32(0, offset);
  return new Uint8Array(view.buffer);
}

function pageOffset(token: Uint8Array | undefined): number {
  if (token === undefined) return 0;
  if (token.length !== 4) throw new RpcError("Invalid page token", 3);
  return new DataView(token.buffer, token.byteOffset, token.byteLength).getUint32(0);
}

export class MemoryLedger implements LedgerClient {
  private readonly objects = new Map<Address, MemoryObject>();
  private readonly dynamicFields = new Map<Address, DynamicFieldEntry[]>();
  private readonly checkpoints: CheckpointSummary[] = [];
  private readonly checkpointWaiters: Array<() => void> = [];
  private handler: TransactionHandler | undefined;

  /** Requests received by {@link executeTransaction}, in order */
  readonly submitted: ExecuteTransactionRequest[] = [];
  /** Number of list calls served, for pagination assertions */
  listCalls = 0;

  epoch: EpochInfo = { epoch: 1n, referenceGasPrice: 1000n };

  putObject(object: MemoryObject): this {
    this.objects.set(normalizeAddress(object.objectId), { ...object, objectId: normalizeAddress(object.objectId) });
    return this;
  }

  removeObject(objectId: Address): void {
    this.objects.delete(normalizeAddress(objectId));
  }

  /** Attach a dynamic field to `parent`; the field object must be put separately. */
  addDynamicField(parent: Address, entry: DynamicFieldEntry): this {
    const key = normalizeAddress(parent);
    const list = this.dynamicFields.get(key) ?? [];
    list.push(entry);
    this.dynamicFields.set(key, list);
    return this;
  }

  removeDynamicField(parent: Address, fieldId: Address): void {
    const key = normalizeAddress(parent);
    const id = normalizeAddress(fieldId);
    this.dynamicFields.set(
      key,
      (this.dynamicFields.get(key) ?? []).filter((entry) => entry.fieldId !== id),
    );
  }

  onExecute(handler: TransactionHandler): this {
    this.handler = handler;
    return this;
  }

  publishCheckpoint(checkpoint: Omit<CheckpointSummary, "events"> & Partial<Pick<CheckpointSummary, "events">>): void {
    this.checkpoints.push({ ...checkpoint, events: checkpoint.events ?? [] });
    for (const wake of this.checkpointWaiters.splice(0)) wake();
  }

  private project(object: MemoryObject, mask: readonly ObjectField[]): LedgerObject {
    const out: LedgerObject = {};
    for (const field of mask) {
      switch (field) {
        case "object_id":
          out.objectId = object.objectId;
          break;
        case "owner":
          out.owner = object.owner;
          break;
        case "version":
          out.version = object.version;
          break;
        case "digest":
          out.digest = object.digest;
          break;
        case "balance":
          if (object.balance !== undefined) out.balance = object.balance;
          break;
        case "object_type":
          if (object.objectType !== undefined) out.objectType = object.objectType;
          break;
        case "json":
          out.json = object.json;
          break;
      }
    }
    return out;
  }

  async getObject(objectId: Address, mask: readonly ObjectField[]): Promise<LedgerObject | undefined> {
    const object = this.objects.get(normalizeAddress(objectId));
    return object !== undefined ? this.project(object, mask) : undefined;
  }

  async batchGetObjects(
    objectIds: readonly Address[],
    mask: readonly ObjectField[],
  ): Promise<(LedgerObject | undefined)[]> {
    return Promise.all(objectIds.map((id) => this.getObject(id, mask)));
  }

  async getEpoch(): Promise<EpochInfo> {
    return this.epoch;
  }

  async listDynamicFields(request: ListDynamicFieldsRequest): Promise<DynamicFieldPage> {
    this.listCalls++;
    const all = this.dynamicFields.get(normalizeAddress(request.parent)) ?? [];
    const offset = pageOffset(request.pageToken);
    const end = offset + request.pageSize;
    const page: DynamicFieldPage = { fields: all.slice(offset, end) };
    if (end < all.length) page.nextPageToken = pageToken(end);
    return page;
  }

  async executeTransaction(request: ExecuteTransactionRequest): Promise<ExecutedTransaction> {
    this.submitted.push(request);
    if (this.handler === undefined) {
      throw new RpcError("No transaction handler installed", 12);
    }
    return this.handler(request);
  }

  async *subscribeCheckpoints(signal: AbortSignal): AsyncIterable<CheckpointSummary> {
    let next = 0;
    while (!signal.aborted) {
      const checkpoint = this.checkpoints[next];
      if (checkpoint !== undefined) {
        next++;
        yield checkpoint;
        continue;
      }
      await new Promise<void>((resolve) => {
        const wake = (): void => {
          signal.removeEventListener("abort", wake);
          resolve();
        };
        this.checkpointWaiters.push(wake);
        signal.addEventListener("abort", wake, { once: true });
      });
    }
  }

  close(): void {
    for (const wake of this.checkpointWaiters.splice(0)) wake();
  }

  /** Look up an object or fail the way a node would report it. */
  require(objectId: Address): MemoryObject {
    const object = this.objects.get(normalizeAddress(objectId));
    if (object === undefined) throw new ObjectNotFoundError(objectId);
    return object;
  }
}

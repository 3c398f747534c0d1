/**
 * Transport-neutral view of the ledger. The gRPC client implements it
 * against the Nexus ledger gateway; tests implement it in memory.
 * @module
 */

import type { Address } from "../types/address.js";
import type { Owner } from "../types/object.js";
import type { RawLedgerEvent } from "../events/types.js";

/** Fields of an object a read may ask for. */
export type ObjectField = "object_id" | "owner" | "version" | "digest" | "balance" | "json" | "object_type";

export const METADATA_MASK: readonly ObjectField[] = ["object_id", "owner", "version", "digest", "balance"];
export const CONTENT_MASK: readonly ObjectField[] = [...METADATA_MASK, "json"];

/** An object as returned by the node; only the masked fields are present. */
export interface LedgerObject {
  objectId?: Address;
  owner?: Owner;
  version?: bigint;
  digest?: string;
  objectType?: string;
  balance?: bigint;
  /** Object contents, already converted to plain JSON */
  json?: unknown;
}

export interface EpochInfo {
  epoch: bigint;
  referenceGasPrice: bigint;
  endTimestampMs?: bigint;
}

export interface DynamicFieldEntry {
  kind: "field" | "object";
  /** Id of the `Field<K, V>` wrapper object */
  fieldId: Address;
  /** Id of the stored object, for dynamic object fields */
  childId?: Address;
}

export interface DynamicFieldPage {
  fields: DynamicFieldEntry[];
  nextPageToken?: Uint8Array;
}

export interface ListDynamicFieldsRequest {
  parent: Address;
  pageSize: number;
  pageToken?: Uint8Array;
}

export type ObjectChangeKind = "created" | "mutated" | "deleted";

export interface ObjectChange {
  objectId: Address;
  kind: ObjectChangeKind;
  objectType?: string;
  version?: bigint;
  digest?: string;
  owner?: Owner;
}

export interface ExecutedTransaction {
  digest: string;
  success: boolean;
  error?: string;
  objectChanges: ObjectChange[];
  events: RawLedgerEvent[];
  checkpoint?: bigint;
}

export interface ExecuteTransactionRequest {
  /** BCS-encoded transaction data */
  txBytes: Uint8Array;
  /** Serialized user signatures */
  signatures: Uint8Array[];
}

export interface CheckpointSummary {
  sequenceNumber: bigint;
  transactionDigests: string[];
  /** Events of every transaction in the checkpoint, in execution order */
  events: RawLedgerEvent[];
}

export interface LedgerClient {
  /** `undefined` when the object does not exist */
  getObject(objectId: Address, mask: readonly ObjectField[]): Promise<LedgerObject | undefined>;
  /** Results follow the order of `objectIds` */
  batchGetObjects(objectIds: readonly Address[], mask: readonly ObjectField[]): Promise<(LedgerObject | undefined)[]>;
  getEpoch(): Promise<EpochInfo>;
  listDynamicFields(request: ListDynamicFieldsRequest): Promise<DynamicFieldPage>;
  executeTransaction(request: ExecuteTransactionRequest): Promise<ExecutedTransaction>;
  /** Checkpoint stream; ends when `signal` aborts */
  subscribeCheckpoints(signal: AbortSignal): AsyncIterable<CheckpointSummary>;
  close(): void;
}

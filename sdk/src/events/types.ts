/**
 * Typed Nexus ledger events.
 * @module
 */

import type { Address } from "../types/address.js";
import type { TypeName } from "../types/codecs.js";
import type { PortsData } from "../types/nexus-data.js";
import type { RuntimeVertex } from "../types/runtime-vertex.js";
import type { ToolFqn } from "../types/tool.js";
import type { StructTag, TypeTag } from "../types/type-tag.js";

/** Key spliced into event payloads to carry the inner event's Move name. */
export const NEXUS_EVENT_TYPE_TAG = "_nexus_event_type";

export interface EventId {
  txDigest: string;
  eventSeq: bigint;
}

// ============================================================================
// Workflow
// ============================================================================

export interface RequestWalkExecution {
  kind: "RequestWalkExecution";
  dag: Address;
  execution: Address;
  /** Present on deployments that record who started the execution */
  invoker?: Address;
  walkIndex: bigint;
  nextVertex: RuntimeVertex;
  evaluations: Address;
  worksheetFromType: TypeName;
}

export interface AnnounceInterfacePackage {
  kind: "AnnounceInterfacePackage";
  sharedObjects: Address[];
}

export interface WalkAdvanced {
  kind: "WalkAdvanced";
  dag: Address;
  execution: Address;
  walkIndex: bigint;
  vertex: RuntimeVertex;
  variant: TypeName;
  variantPortsToData: PortsData;
}

export interface WalkFailed {
  kind: "WalkFailed";
  dag: Address;
  execution: Address;
  walkIndex: bigint;
  vertex: RuntimeVertex;
  reason: string;
}

export interface EndStateReached {
  kind: "EndStateReached";
  dag: Address;
  execution: Address;
  walkIndex: bigint;
  vertex: RuntimeVertex;
  variant: TypeName;
  variantPortsToData: PortsData;
}

export interface ExecutionFinished {
  kind: "ExecutionFinished";
  dag: Address;
  execution: Address;
  hasAnyWalkFailed: boolean;
  hasAnyWalkSucceeded: boolean;
}

// ============================================================================
// Tools
// ============================================================================

export interface OffChainToolRegistered {
  kind: "OffChainToolRegistered";
  registry: Address;
  tool: Address;
  fqn: ToolFqn;
  url: string;
  inputSchema: unknown;
  outputSchema: unknown;
}

export interface OnChainToolRegistered {
  kind: "OnChainToolRegistered";
  fqn: ToolFqn;
}

export interface ToolUnregistered {
  kind: "ToolUnregistered";
  tool: Address;
  fqn: ToolFqn;
}

// ============================================================================
// Scheduler
// ============================================================================

/**
 * Scheduler envelope around another event. `request` may itself be a
 * scheduled envelope.
 */
export interface RequestScheduledExecution {
  kind: "RequestScheduledExecution";
  request: NexusEventKind;
  priority: bigint;
  requestMs: bigint;
  startMs: bigint;
  deadlineMs: bigint;
}

export interface OccurrenceScheduled {
  kind: "OccurrenceScheduled";
  task: Address;
  fromPeriodic: boolean;
}

export interface MissedOccurrence {
  kind: "MissedOccurrence";
  task: Address;
  startTime: bigint;
  deadline?: bigint;
  prunedAt: bigint;
  gasPrice: bigint;
}

export interface TaskCreated {
  kind: "TaskCreated";
  task: Address;
  owner: Address;
}

export interface TaskPaused {
  kind: "TaskPaused";
  task: Address;
}

export interface TaskResumed {
  kind: "TaskResumed";
  task: Address;
}

export interface TaskCanceled {
  kind: "TaskCanceled";
  task: Address;
  clearedOccurrences: bigint;
  hadPeriodic: boolean;
}

export interface OccurrenceConsumed {
  kind: "OccurrenceConsumed";
  task: Address;
  startTime: bigint;
  deadline?: bigint;
  gasPrice: bigint;
  fromPeriodic: boolean;
  executedAt: bigint;
}

export interface PeriodicScheduleConfigured {
  kind: "PeriodicScheduleConfigured";
  task: Address;
  periodMs?: bigint;
  deadlineOffsetMs?: bigint;
  maxIterations?: bigint;
  generated?: bigint;
  gasPrice?: bigint;
  lastGeneratedStart?: bigint;
}

// ============================================================================
// Network, gas and keys
// ============================================================================

export interface FoundingLeaderCapCreated {
  kind: "FoundingLeaderCapCreated";
  leaderCap: Address;
  network: Address;
}

export interface GasSettlementUpdate {
  kind: "GasSettlementUpdate";
  execution: Address;
  toolFqn: ToolFqn;
  vertex: RuntimeVertex;
  wasSettled: boolean;
}

export interface PreKeyVaultCreated {
  kind: "PreKeyVaultCreated";
  vault: Address;
  cryptoCap: Address;
}

export interface PreKeyClaimed {
  kind: "PreKeyClaimed";
  /** Pre keys left in the vault after the claim */
  remaining: bigint;
}

export interface PreKeyAssociated {
  kind: "PreKeyAssociated";
  claimedBy: Address;
  preKey: Uint8Array;
  initialMessage: Uint8Array;
}

// ============================================================================
// Events carried as raw JSON
// ============================================================================

export const OPAQUE_EVENT_KINDS = [
  "ToolRegistryCreated",
  "DAGCreated",
  "DAGVertexAdded",
  "DAGEdgeAdded",
  "DAGOutputAdded",
  "DAGEntryVertexInputPortAdded",
  "DAGDefaultValueAdded",
  "LeaderClaimedGas",
  "AllowedOwnerAdded",
  "AllowedOwnerRemoved",
] as const;

export type OpaqueEventKindName = (typeof OPAQUE_EVENT_KINDS)[number];

/** An event the SDK does not interpret; `json` is its payload as delivered. */
export type OpaqueEvent = {
  [K in OpaqueEventKindName]: { kind: K; json: Record<string, unknown> };
}[OpaqueEventKindName];

export type NexusEventKind =
  | RequestScheduledExecution
  | OccurrenceScheduled
  | RequestWalkExecution
  | AnnounceInterfacePackage
  | OffChainToolRegistered
  | OnChainToolRegistered
  | ToolUnregistered
  | WalkAdvanced
  | WalkFailed
  | EndStateReached
  | ExecutionFinished
  | MissedOccurrence
  | TaskCreated
  | TaskPaused
  | TaskResumed
  | TaskCanceled
  | OccurrenceConsumed
  | PeriodicScheduleConfigured
  | FoundingLeaderCapCreated
  | GasSettlementUpdate
  | PreKeyVaultCreated
  | PreKeyClaimed
  | PreKeyAssociated
  | OpaqueEvent;

export type NexusEventKindName = NexusEventKind["kind"];

export interface NexusEvent {
  id: EventId;
  /** Type parameters of the inner event struct, e.g. the scheduled request type */
  generics: TypeTag[];
  data: NexusEventKind;
}

/** A ledger event as delivered by a subscription or a transaction result. */
export interface RawLedgerEvent {
  /** Outer struct tag, as a Move type string or already parsed */
  eventType: string | StructTag;
  json: unknown;
  id: EventId;
}

/** Move struct name of the event for a kind. */
export function moveEventName(kind: NexusEventKindName): string {
  return kind === "RequestScheduledExecution" ? kind : `${kind}Event`;
}

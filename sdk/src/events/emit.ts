/**
 * Build ledger-shaped events from typed values. Used by in-process ledger
 * fakes and by tests that feed the decoder.
 * @module
 */

import { emitOptionU64, emitU64 } from "../types/codecs.js";
import { emitPortsData } from "../types/nexus-data.js";
import { emitRuntimeVertex } from "../types/runtime-vertex.js";
import { formatToolFqn } from "../types/tool.js";
import { formatStructTag, structTag, structType, type TypeTag } from "../types/type-tag.js";
import type { Address } from "../types/address.js";
import { utf8 } from "../utils/encoding.js";
import { EVENT_WRAPPER_MODULE, EVENT_WRAPPER_NAME } from "./decode.js";
import { moveEventName, type EventId, type NexusEventKind, type NexusEventKindName, type RawLedgerEvent } from "./types.js";

/** Move module that emits each event kind. */
const EVENT_MODULES: Record<NexusEventKindName, string> = {
  RequestScheduledExecution: "scheduler",
  OccurrenceScheduled: "scheduler",
  RequestWalkExecution: "dag",
  AnnounceInterfacePackage: "v1",
  OffChainToolRegistered: "tool_registry",
  OnChainToolRegistered: "tool_registry",
  ToolUnregistered: "tool_registry",
  WalkAdvanced: "dag",
  WalkFailed: "dag",
  EndStateReached: "dag",
  ExecutionFinished: "dag",
  MissedOccurrence: "scheduler",
  TaskCreated: "scheduler",
  TaskPaused: "scheduler",
  TaskResumed: "scheduler",
  TaskCanceled: "scheduler",
  OccurrenceConsumed: "scheduler",
  PeriodicScheduleConfigured: "scheduler",
  FoundingLeaderCapCreated: "leader_cap",
  GasSettlementUpdate: "gas",
  PreKeyVaultCreated: "pre_key_vault",
  PreKeyClaimed: "pre_key_vault",
  PreKeyAssociated: "pre_key_vault",
  ToolRegistryCreated: "tool_registry",
  DAGCreated: "dag",
  DAGVertexAdded: "dag",
  DAGEdgeAdded: "dag",
  DAGOutputAdded: "dag",
  DAGEntryVertexInputPortAdded: "dag",
  DAGDefaultValueAdded: "dag",
  LeaderClaimedGas: "gas",
  AllowedOwnerAdded: "leader_cap",
  AllowedOwnerRemoved: "leader_cap",
};

export interface EmitEventOptions {
  primitivesPkgId: Address;
  /** Package the inner event structs live in */
  workflowPkgId: Address;
  id?: EventId;
}

/** Snake_case ledger JSON fields of an event. */
export function emitEventFields(data: NexusEventKind): Record<string, unknown> {
  switch (data.kind) {
    case "RequestScheduledExecution":
      return {
        request: emitEventFields(data.request),
        priority: emitU64(data.priority),
        request_ms: emitU64(data.requestMs),
        start_ms: emitU64(data.startMs),
        deadline_ms: emitU64(data.deadlineMs),
      };
    case "OccurrenceScheduled":
      return { task: data.task, from_periodic: data.fromPeriodic };
    case "RequestWalkExecution":
      return {
        dag: data.dag,
        execution: data.execution,
        ...(data.invoker !== undefined ? { invoker: data.invoker } : {}),
        walk_index: emitU64(data.walkIndex),
        next_vertex: emitRuntimeVertex(data.nextVertex),
        evaluations: data.evaluations,
        worksheet_from_type: { name: data.worksheetFromType.name },
      };
    case "AnnounceInterfacePackage":
      return { shared_objects: data.sharedObjects };
    case "OffChainToolRegistered":
      return {
        registry: data.registry,
        tool: data.tool,
        fqn: formatToolFqn(data.fqn),
        url: Array.from(utf8(data.url)),
        input_schema: Array.from(utf8(JSON.stringify(data.inputSchema))),
        output_schema: Array.from(utf8(JSON.stringify(data.outputSchema))),
      };
    case "OnChainToolRegistered":
      return { fqn: formatToolFqn(data.fqn) };
    case "ToolUnregistered":
      return { tool: data.tool, fqn: formatToolFqn(data.fqn) };
    case "WalkAdvanced":
    case "EndStateReached":
      return {
        dag: data.dag,
        execution: data.execution,
        walk_index: emitU64(data.walkIndex),
        vertex: emitRuntimeVertex(data.vertex),
        variant: { name: data.variant.name },
        variant_ports_to_data: emitPortsData(data.variantPortsToData),
      };
    case "WalkFailed":
      return {
        dag: data.dag,
        execution: data.execution,
        walk_index: emitU64(data.walkIndex),
        vertex: emitRuntimeVertex(data.vertex),
        reason: data.reason,
      };
    case "ExecutionFinished":
      return {
        dag: data.dag,
        execution: data.execution,
        has_any_walk_failed: data.hasAnyWalkFailed,
        has_any_walk_succeeded: data.hasAnyWalkSucceeded,
      };
    case "MissedOccurrence":
      return {
        task: data.task,
        start_time: emitU64(data.startTime),
        deadline: emitOptionU64(data.deadline),
        pruned_at: emitU64(data.prunedAt),
        gas_price: emitU64(data.gasPrice),
      };
    case "TaskCreated":
      return { task: data.task, owner: data.owner };
    case "TaskPaused":
    case "TaskResumed":
      return { task: data.task };
    case "TaskCanceled":
      return {
        task: data.task,
        cleared_occurrences: emitU64(data.clearedOccurrences),
        had_periodic: data.hadPeriodic,
      };
    case "OccurrenceConsumed":
      return {
        task: data.task,
        start_time: emitU64(data.startTime),
        deadline: emitOptionU64(data.deadline),
        gas_price: emitU64(data.gasPrice),
        from_periodic: data.fromPeriodic,
        executed_at: emitU64(data.executedAt),
      };
    case "PeriodicScheduleConfigured":
      return {
        task: data.task,
        period_ms: emitOptionU64(data.periodMs),
        deadline_offset_ms: emitOptionU64(data.deadlineOffsetMs),
        max_iterations: emitOptionU64(data.maxIterations),
        generated: emitOptionU64(data.generated),
        gas_price: emitOptionU64(data.gasPrice),
        last_generated_start: emitOptionU64(data.lastGeneratedStart),
      };
    case "FoundingLeaderCapCreated":
      return { leader_cap: data.leaderCap, network: data.network };
    case "GasSettlementUpdate":
      return {
        execution: data.execution,
        tool_fqn: formatToolFqn(data.toolFqn),
        vertex: emitRuntimeVertex(data.vertex),
        was_settled: data.wasSettled,
      };
    case "PreKeyVaultCreated":
      return { vault: data.vault, crypto_cap: data.cryptoCap };
    case "PreKeyClaimed":
      return { remaining: emitU64(data.remaining) };
    case "PreKeyAssociated":
      return {
        claimed_by: data.claimedBy,
        pre_key: Array.from(data.preKey),
        initial_message: Array.from(data.initialMessage),
      };
    case "ToolRegistryCreated":
    case "DAGCreated":
    case "DAGVertexAdded":
    case "DAGEdgeAdded":
    case "DAGOutputAdded":
    case "DAGEntryVertexInputPortAdded":
    case "DAGDefaultValueAdded":
    case "LeaderClaimedGas":
    case "AllowedOwnerAdded":
    case "AllowedOwnerRemoved":
      return data.json;
  }
}

/** Inner event type, with scheduled envelopes parameterized by what they carry. */
export function eventTypeTag(data: NexusEventKind, workflowPkgId: Address): TypeTag {
  const typeParams = data.kind === "RequestScheduledExecution" ? [eventTypeTag(data.request, workflowPkgId)] : [];
  return structType(workflowPkgId, EVENT_MODULES[data.kind], moveEventName(data.kind), typeParams);
}

/** Wrap an event the way the ledger delivers it. */
export function emitNexusEvent(data: NexusEventKind, options: EmitEventOptions): RawLedgerEvent {
  const wrapper = structTag(options.primitivesPkgId, EVENT_WRAPPER_MODULE, EVENT_WRAPPER_NAME, [
    eventTypeTag(data, options.workflowPkgId),
  ]);
  return {
    eventType: formatStructTag(wrapper),
    json: { event: emitEventFields(data) },
    id: options.id ?? { txDigest: "", eventSeq: 0n },
  };
}

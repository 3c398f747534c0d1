/**
 * Payload schemas for every event kind except the scheduled envelope, which
 * the decoder handles itself because its `request` is another event.
 *
 * Payloads use the ledger's snake_case field names; decoded values use
 * camelCase and `bigint` for every u64. Kinds the SDK does not interpret
 * keep their payload as JSON.
 *
 * @module
 */

import { z } from "zod";
import { addressSchema, objectIdSchema } from "../types/address.js";
import {
  bytesSchema,
  jsonBytesSchema,
  optionU64Schema,
  typeNameSchema,
  u64Schema,
  urlBytesSchema,
} from "../types/codecs.js";
import { portsDataSchema } from "../types/nexus-data.js";
import { runtimeVertexSchema } from "../types/runtime-vertex.js";
import { toolFqnSchema } from "../types/tool.js";
import type { NexusEventKind, NexusEventKindName, OpaqueEventKindName } from "./types.js";

type PlainKindName = Exclude<NexusEventKindName, "RequestScheduledExecution">;

type KindSchema<K extends NexusEventKindName> = z.ZodType<Extract<NexusEventKind, { kind: K }>, z.ZodTypeDef, unknown>;

const id = objectIdSchema;

function opaque<K extends OpaqueEventKindName>(kind: K) {
  return z.record(z.unknown()).transform((json) => ({ kind, json }));
}

const walkFields = {
  dag: id,
  execution: id,
  walk_index: u64Schema,
  vertex: runtimeVertexSchema,
};

export const EVENT_PAYLOAD_SCHEMAS: { [K in PlainKindName]: KindSchema<K> } = {
  OccurrenceScheduled: z
    .object({ task: id, from_periodic: z.boolean() })
    .transform((v) => ({ kind: "OccurrenceScheduled" as const, task: v.task, fromPeriodic: v.from_periodic })),

  RequestWalkExecution: z
    .object({
      dag: id,
      execution: id,
      invoker: addressSchema.optional(),
      walk_index: u64Schema,
      next_vertex: runtimeVertexSchema,
      evaluations: id,
      worksheet_from_type: typeNameSchema,
    })
    .transform((v) => ({
      kind: "RequestWalkExecution" as const,
      dag: v.dag,
      execution: v.execution,
      ...(v.invoker !== undefined ? { invoker: v.invoker } : {}),
      walkIndex: v.walk_index,
      nextVertex: v.next_vertex,
      evaluations: v.evaluations,
      worksheetFromType: v.worksheet_from_type,
    })),

  AnnounceInterfacePackage: z
    .object({ shared_objects: z.array(id) })
    .transform((v) => ({ kind: "AnnounceInterfacePackage" as const, sharedObjects: v.shared_objects })),

  OffChainToolRegistered: z
    .object({
      registry: id,
      tool: id,
      fqn: toolFqnSchema,
      url: urlBytesSchema,
      input_schema: jsonBytesSchema,
      output_schema: jsonBytesSchema,
    })
    .transform((v) => ({
      kind: "OffChainToolRegistered" as const,
      registry: v.registry,
      tool: v.tool,
      fqn: v.fqn,
      url: v.url,
      inputSchema: v.input_schema,
      outputSchema: v.output_schema,
    })),

  OnChainToolRegistered: z
    .object({ fqn: toolFqnSchema })
    .transform((v) => ({ kind: "OnChainToolRegistered" as const, fqn: v.fqn })),

  ToolUnregistered: z
    .object({ tool: id, fqn: toolFqnSchema })
    .transform((v) => ({ kind: "ToolUnregistered" as const, tool: v.tool, fqn: v.fqn })),

  WalkAdvanced: z
    .object({ ...walkFields, variant: typeNameSchema, variant_ports_to_data: portsDataSchema })
    .transform((v) => ({
      kind: "WalkAdvanced" as const,
      dag: v.dag,
      execution: v.execution,
      walkIndex: v.walk_index,
      vertex: v.vertex,
      variant: v.variant,
      variantPortsToData: v.variant_ports_to_data,
    })),

  WalkFailed: z.object({ ...walkFields, reason: z.string() }).transform((v) => ({
    kind: "WalkFailed" as const,
    dag: v.dag,
    execution: v.execution,
    walkIndex: v.walk_index,
    vertex: v.vertex,
    reason: v.reason,
  })),

  EndStateReached: z
    .object({ ...walkFields, variant: typeNameSchema, variant_ports_to_data: portsDataSchema })
    .transform((v) => ({
      kind: "EndStateReached" as const,
      dag: v.dag,
      execution: v.execution,
      walkIndex: v.walk_index,
      vertex: v.vertex,
      variant: v.variant,
      variantPortsToData: v.variant_ports_to_data,
    })),

  ExecutionFinished: z
    .object({ dag: id, execution: id, has_any_walk_failed: z.boolean(), has_any_walk_succeeded: z.boolean() })
    .transform((v) => ({
      kind: "ExecutionFinished" as const,
      dag: v.dag,
      execution: v.execution,
      hasAnyWalkFailed: v.has_any_walk_failed,
      hasAnyWalkSucceeded: v.has_any_walk_succeeded,
    })),

  MissedOccurrence: z
    .object({
      task: id,
      start_time: u64Schema,
      deadline: optionU64Schema,
      pruned_at: u64Schema,
      gas_price: u64Schema,
    })
    .transform((v) => ({
      kind: "MissedOccurrence" as const,
      task: v.task,
      startTime: v.start_time,
      deadline: v.deadline,
      prunedAt: v.pruned_at,
      gasPrice: v.gas_price,
    })),

  TaskCreated: z
    .object({ task: id, owner: addressSchema })
    .transform((v) => ({ kind: "TaskCreated" as const, task: v.task, owner: v.owner })),

  TaskPaused: z.object({ task: id }).transform((v) => ({ kind: "TaskPaused" as const, task: v.task })),

  TaskResumed: z.object({ task: id }).transform((v) => ({ kind: "TaskResumed" as const, task: v.task })),

  TaskCanceled: z
    .object({ task: id, cleared_occurrences: u64Schema, had_periodic: z.boolean() })
    .transform((v) => ({
      kind: "TaskCanceled" as const,
      task: v.task,
      clearedOccurrences: v.cleared_occurrences,
      hadPeriodic: v.had_periodic,
    })),

  OccurrenceConsumed: z
    .object({
      task: id,
      start_time: u64Schema,
      deadline: optionU64Schema,
      gas_price: u64Schema,
      from_periodic: z.boolean(),
      executed_at: u64Schema,
    })
    .transform((v) => ({
      kind: "OccurrenceConsumed" as const,
      task: v.task,
      startTime: v.start_time,
      deadline: v.deadline,
      gasPrice: v.gas_price,
      fromPeriodic: v.from_periodic,
      executedAt: v.executed_at,
    })),

  PeriodicScheduleConfigured: z
    .object({
      task: id,
      period_ms: optionU64Schema,
      deadline_offset_ms: optionU64Schema,
      max_iterations: optionU64Schema,
      generated: optionU64Schema,
      gas_price: optionU64Schema,
      last_generated_start: optionU64Schema,
    })
    .transform((v) => ({
      kind: "PeriodicScheduleConfigured" as const,
      task: v.task,
      periodMs: v.period_ms,
      deadlineOffsetMs: v.deadline_offset_ms,
      maxIterations: v.max_iterations,
      generated: v.generated,
      gasPrice: v.gas_price,
      lastGeneratedStart: v.last_generated_start,
    })),

  FoundingLeaderCapCreated: z
    .object({ leader_cap: id, network: id })
    .transform((v) => ({ kind: "FoundingLeaderCapCreated" as const, leaderCap: v.leader_cap, network: v.network })),

  GasSettlementUpdate: z
    .object({ execution: id, tool_fqn: toolFqnSchema, vertex: runtimeVertexSchema, was_settled: z.boolean() })
    .transform((v) => ({
      kind: "GasSettlementUpdate" as const,
      execution: v.execution,
      toolFqn: v.tool_fqn,
      vertex: v.vertex,
      wasSettled: v.was_settled,
    })),

  PreKeyVaultCreated: z
    .object({ vault: id, crypto_cap: id })
    .transform((v) => ({ kind: "PreKeyVaultCreated" as const, vault: v.vault, cryptoCap: v.crypto_cap })),

  PreKeyClaimed: z
    .object({ remaining: u64Schema })
    .transform((v) => ({ kind: "PreKeyClaimed" as const, remaining: v.remaining })),

  PreKeyAssociated: z
    .object({ claimed_by: addressSchema, pre_key: bytesSchema, initial_message: bytesSchema })
    .transform((v) => ({
      kind: "PreKeyAssociated" as const,
      claimedBy: v.claimed_by,
      preKey: v.pre_key,
      initialMessage: v.initial_message,
    })),

  ToolRegistryCreated: opaque("ToolRegistryCreated"),
  DAGCreated: opaque("DAGCreated"),
  DAGVertexAdded: opaque("DAGVertexAdded"),
  DAGEdgeAdded: opaque("DAGEdgeAdded"),
  DAGOutputAdded: opaque("DAGOutputAdded"),
  DAGEntryVertexInputPortAdded: opaque("DAGEntryVertexInputPortAdded"),
  DAGDefaultValueAdded: opaque("DAGDefaultValueAdded"),
  LeaderClaimedGas: opaque("LeaderClaimedGas"),
  AllowedOwnerAdded: opaque("AllowedOwnerAdded"),
  AllowedOwnerRemoved: opaque("AllowedOwnerRemoved"),
};

/** Envelope fields of `RequestScheduledExecution`; `request` is decoded separately. */
export const scheduledEnvelopeSchema = z.object({
  request: z.unknown(),
  priority: u64Schema,
  request_ms: u64Schema,
  start_ms: u64Schema,
  deadline_ms: u64Schema,
});

export function isPlainKindName(name: string): name is PlainKindName {
  return Object.prototype.hasOwnProperty.call(EVENT_PAYLOAD_SCHEMAS, name);
}

/**
 * Call templates for scheduler tasks: creation, occurrences, periodic
 * schedules and state changes.
 *
 * Tasks are shared objects; every `task` parameter is an {@link ObjectRef}
 * whose `version` is the task's initial shared version.
 *
 * @module
 */

import { ConfigurationError } from "../errors.js";
import type { Address } from "../types/address.js";
import { sharedRef, type NexusObjects } from "../types/nexus-objects.js";
import type { ObjectRef } from "../types/object.js";
import type { TypeTag } from "../types/type-tag.js";
import type { Argument } from "./bcs.js";
import type { TransactionBuilder } from "./builder.js";
import { entryGroupArg, executionInputsArg, type ExecutionInputs } from "./dag.js";
import {
  callIdent,
  identType,
  MOVE_STDLIB_PACKAGE_ID,
  moveStd,
  primitives,
  SUI_FRAMEWORK_PACKAGE_ID,
  suiFramework,
  workflow,
  type MoveIdent,
} from "./idents.js";

/** Which occurrence generator drives a task. */
export type OccurrenceGenerator = "queue" | "periodic";

export type TaskStateAction = "pause" | "resume" | "cancel";

function taskArg(tx: TransactionBuilder, task: ObjectRef): Argument {
  return tx.sharedObject(sharedRef(task, true));
}

// ============================================================================
// Task creation
// ============================================================================

/** `scheduler::Metadata` from key-value pairs, inserted in order. */
export function newMetadata(
  tx: TransactionBuilder,
  objects: NexusObjects,
  entries: Iterable<readonly [string, string]>,
): Argument {
  const stringType = identType(MOVE_STDLIB_PACKAGE_ID, moveStd.string.String);
  const types = [stringType, stringType];
  const map = callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.vecMap.empty, [], types);
  for (const [key, value] of entries) {
    callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.vecMap.insert, [map, tx.pureString(key), tx.pureString(value)], types);
  }
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.newMetadata, [map]);
}

/**
 * Build a policy from a single witness symbol: a `TableVec<Symbol>` holding
 * the symbol is handed to `constructor` and dropped afterwards.
 */
function policyFromWitness(
  tx: TransactionBuilder,
  objects: NexusObjects,
  witness: TypeTag,
  constructor: MoveIdent,
): Argument {
  const symbolType = identType(objects.primitivesPkgId, primitives.policy.Symbol);
  const symbol = callIdent(tx, objects.primitivesPkgId, primitives.policy.witnessSymbol, [], [witness]);
  const sequence = callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.tableVec.empty, [], [symbolType]);
  callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.tableVec.pushBack, [sequence, symbol], [symbolType]);
  const policy = callIdent(tx, objects.workflowPkgId, constructor, [sequence]);
  callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.tableVec.drop, [sequence], [symbolType]);
  return policy;
}

/** Constraints policy with the chosen generator registered. */
export function newConstraintsPolicy(
  tx: TransactionBuilder,
  objects: NexusObjects,
  generator: OccurrenceGenerator,
): Argument {
  const pkg = objects.workflowPkgId;
  const s = workflow.scheduler;
  const witness = identType(pkg, generator === "queue" ? s.QueueGeneratorWitness : s.PeriodicGeneratorWitness);
  const constraints = policyFromWitness(tx, objects, witness, s.newConstraintsPolicy);

  if (generator === "queue") {
    const state = callIdent(tx, pkg, s.newQueueGeneratorState);
    callIdent(tx, pkg, s.registerQueueGenerator, [constraints, state]);
  } else {
    const state = callIdent(tx, pkg, s.newPeriodicGeneratorState);
    callIdent(tx, pkg, s.registerPeriodicGenerator, [constraints, state]);
  }
  return constraints;
}

export interface ExecutionPolicyParams {
  dagId: Address;
  entryGroup: string;
  inputs: ExecutionInputs;
  /** Gas price each scheduled execution begins at */
  gasPrice: bigint;
}

/** Execution policy that begins the DAG through the default TAP. */
export function newExecutionPolicy(
  tx: TransactionBuilder,
  objects: NexusObjects,
  params: ExecutionPolicyParams,
): Argument {
  const pkg = objects.workflowPkgId;
  const witness = identType(pkg, workflow.defaultTap.BeginDagExecutionWitness);
  const execution = policyFromWitness(tx, objects, witness, workflow.scheduler.newExecutionPolicy);

  const idFrom = (address: Address): Argument =>
    callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.object.idFromAddress, [tx.pureAddress(address)]);

  const config = callIdent(tx, pkg, workflow.dag.newDagExecutionConfig, [
    idFrom(params.dagId),
    idFrom(objects.networkId),
    entryGroupArg(tx, pkg, params.entryGroup),
    executionInputsArg(tx, objects, params.inputs),
    tx.pureU64(params.gasPrice),
  ]);
  callIdent(tx, pkg, workflow.defaultTap.registerBeginExecution, [execution, config]);
  return execution;
}

export function newTask(
  tx: TransactionBuilder,
  objects: NexusObjects,
  metadata: Argument,
  constraints: Argument,
  execution: Argument,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.new, [metadata, constraints, execution]);
}

export function shareTask(tx: TransactionBuilder, objects: NexusObjects, task: Argument): Argument {
  const taskType = identType(objects.workflowPkgId, workflow.scheduler.Task);
  return callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.transfer.publicShareObject, [task], [taskType]);
}

export function updateMetadata(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  metadata: Argument,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.updateMetadata, [taskArg(tx, task), metadata]);
}

// ============================================================================
// Occurrences
// ============================================================================

/** Occurrence with an absolute start; the deadline is relative to the start. */
export function addOccurrenceAbsoluteForTask(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  startMs: bigint,
  deadlineOffsetMs: bigint | undefined,
  gasPrice: bigint,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.addOccurrenceAbsoluteForTask, [
    taskArg(tx, task),
    tx.pureU64(startMs),
    tx.pureOptionU64(deadlineOffsetMs),
    tx.pureU64(gasPrice),
    tx.clock(),
  ]);
}

/** Same call as the absolute form, with the deadline already given as an offset. */
export function addOccurrenceWithOffsetForTask(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  startMs: bigint,
  deadlineOffsetMs: bigint | undefined,
  gasPrice: bigint,
): Argument {
  return addOccurrenceAbsoluteForTask(tx, objects, task, startMs, deadlineOffsetMs, gasPrice);
}

/** Occurrence starting `startOffsetMs` after the transaction's clock time. */
export function addOccurrenceRelativeForTask(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  startOffsetMs: bigint,
  deadlineOffsetMs: bigint | undefined,
  gasPrice: bigint,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.addOccurrenceRelativeForTask, [
    taskArg(tx, task),
    tx.pureU64(startOffsetMs),
    tx.pureOptionU64(deadlineOffsetMs),
    tx.pureU64(gasPrice),
    tx.clock(),
  ]);
}

export interface OccurrenceRequest {
  startMs?: bigint;
  deadlineMs?: bigint;
  startOffsetMs?: bigint;
  deadlineOffsetMs?: bigint;
  gasPrice: bigint;
}

/**
 * Check an occurrence request before anything is composed. With
 * `requireStart`, one of the two start forms must be present.
 */
export function validateOccurrence(request: OccurrenceRequest, requireStart: boolean): OccurrenceRequest {
  const { startMs, deadlineMs, startOffsetMs, deadlineOffsetMs } = request;

  if (requireStart && startMs === undefined && startOffsetMs === undefined) {
    throw new ConfigurationError("Provide either an absolute start or a start offset");
  }
  if (deadlineMs !== undefined && startMs === undefined) {
    throw new ConfigurationError("Absolute deadlines require an absolute start time");
  }
  if (
    startMs === undefined &&
    startOffsetMs === undefined &&
    (deadlineMs !== undefined || deadlineOffsetMs !== undefined)
  ) {
    throw new ConfigurationError("Deadline flags require a corresponding start flag");
  }
  if (startMs !== undefined && deadlineMs !== undefined && deadlineMs < startMs) {
    throw new ConfigurationError(`Deadline (${deadlineMs}) cannot be earlier than start (${startMs})`);
  }
  if (deadlineOffsetMs !== undefined && startOffsetMs === undefined && startMs === undefined) {
    throw new ConfigurationError("Deadline offset requires either an absolute start or a start offset");
  }
  return request;
}

/**
 * Pick the occurrence call for a validated request:
 *
 * | fields | call |
 * |---|---|
 * | `startMs`, optional `deadlineMs` | absolute, offset `deadline - start` |
 * | `startMs`, `deadlineOffsetMs` | absolute with that offset |
 * | `startOffsetMs`, optional `deadlineOffsetMs` | relative |
 */
export function addOccurrence(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  request: OccurrenceRequest,
): Argument {
  const { startMs, deadlineMs, startOffsetMs, deadlineOffsetMs, gasPrice } = request;
  if (startMs !== undefined) {
    if (deadlineOffsetMs !== undefined) {
      return addOccurrenceWithOffsetForTask(tx, objects, task, startMs, deadlineOffsetMs, gasPrice);
    }
    const offset = deadlineMs === undefined ? undefined : deadlineMs - startMs;
    return addOccurrenceAbsoluteForTask(tx, objects, task, startMs, offset, gasPrice);
  }
  if (startOffsetMs === undefined) {
    throw new ConfigurationError("Provide either an absolute start or a start offset");
  }
  return addOccurrenceRelativeForTask(tx, objects, task, startOffsetMs, deadlineOffsetMs, gasPrice);
}

// ============================================================================
// Periodic schedules
// ============================================================================

export interface PeriodicScheduleInputs {
  firstStartMs: bigint;
  periodMs: bigint;
  deadlineOffsetMs?: bigint;
  maxIterations?: bigint;
  gasPrice: bigint;
}

export function newOrModifyPeriodicForTask(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  schedule: PeriodicScheduleInputs,
): Argument {
  if (schedule.periodMs <= 0n) {
    throw new ConfigurationError("Period must be positive");
  }
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.newOrModifyPeriodicForTask, [
    taskArg(tx, task),
    tx.pureU64(schedule.firstStartMs),
    tx.pureU64(schedule.periodMs),
    tx.pureOptionU64(schedule.deadlineOffsetMs),
    tx.pureOptionU64(schedule.maxIterations),
    tx.pureU64(schedule.gasPrice),
  ]);
}

export function disablePeriodicForTask(tx: TransactionBuilder, objects: NexusObjects, task: ObjectRef): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.disablePeriodicForTask, [taskArg(tx, task)]);
}

// ============================================================================
// Task state
// ============================================================================

export function pauseTimeConstraintForTask(tx: TransactionBuilder, objects: NexusObjects, task: ObjectRef): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.pauseTimeConstraintForTask, [taskArg(tx, task)]);
}

export function resumeTimeConstraintForTask(tx: TransactionBuilder, objects: NexusObjects, task: ObjectRef): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.resumeTimeConstraintForTask, [taskArg(tx, task)]);
}

export function cancelTimeConstraintForTask(tx: TransactionBuilder, objects: NexusObjects, task: ObjectRef): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.scheduler.cancelTimeConstraintForTask, [taskArg(tx, task)]);
}

export function setTaskState(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  action: TaskStateAction,
): Argument {
  switch (action) {
    case "pause":
      return pauseTimeConstraintForTask(tx, objects, task);
    case "resume":
      return resumeTimeConstraintForTask(tx, objects, task);
    case "cancel":
      return cancelTimeConstraintForTask(tx, objects, task);
  }
}

// ============================================================================
// Scheduled execution
// ============================================================================

/** Consume the task's next due occurrence from the given generator. */
export function checkTimeConstraint(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  generator: OccurrenceGenerator = "queue",
): Argument {
  const ident =
    generator === "queue" ? workflow.scheduler.checkQueueOccurrence : workflow.scheduler.checkPeriodicOccurrence;
  return callIdent(tx, objects.workflowPkgId, ident, [taskArg(tx, task), tx.clock()]);
}

export function dagBeginExecutionFromScheduler(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  dag: ObjectRef,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.defaultTap.dagBeginExecutionFromScheduler, [
    tx.sharedObject(sharedRef(objects.defaultTap, true)),
    taskArg(tx, task),
    tx.sharedObject(sharedRef(dag, false)),
    tx.sharedObject(sharedRef(objects.gasService, true)),
    tx.clock(),
  ]);
}

/** Consume the next occurrence and begin the DAG run it schedules. */
export function executeScheduledOccurrence(
  tx: TransactionBuilder,
  objects: NexusObjects,
  task: ObjectRef,
  dag: ObjectRef,
  generator: OccurrenceGenerator = "queue",
): Argument {
  checkTimeConstraint(tx, objects, task, generator);
  return dagBeginExecutionFromScheduler(tx, objects, task, dag);
}

/**
 * Scheduler task management: creating tasks, queueing occurrences, periodic
 * schedules and task state.
 * @module
 */

import type { NexusEventKind } from "../events/types.js";
import { ConfigurationError, ParsingError } from "../errors.js";
import * as schedulerTx from "../transactions/scheduler.js";
import type { OccurrenceGenerator, OccurrenceRequest, TaskStateAction } from "../transactions/scheduler.js";
import type { Address } from "../types/address.js";
import { DEFAULT_ENTRY_GROUP } from "../types/dag.js";
import type { NexusData } from "../types/nexus-data.js";
import type { ObjectRef } from "../types/object.js";
import type { NexusClient } from "./client.js";
import type { ExecutedTransactionResult } from "./signer.js";
import { commitEntryData, type SessionCipher, type StorageConf } from "./storage.js";

export interface CreateTaskParams {
  dagId: Address;
  entryGroup?: string;
  inputs: ReadonlyMap<string, ReadonlyMap<string, NexusData>>;
  metadata?: ReadonlyArray<readonly [string, string]>;
  /** Gas price each scheduled execution begins at */
  executionGasPrice: bigint;
  generator: OccurrenceGenerator;
  /** First occurrence to queue once the task exists; queue generator only */
  initialSchedule?: OccurrenceRequest;
  storage?: StorageConf;
  cipher?: SessionCipher;
}

export interface ScheduleResult {
  txDigest: string;
  /** The `OccurrenceScheduled` event, when the ledger emitted one */
  event?: NexusEventKind;
}

export interface CreateTaskResult {
  txDigest: string;
  taskId: Address;
  initialSchedule?: ScheduleResult;
}

export interface UpdateMetadataResult {
  txDigest: string;
  entries: number;
}

export interface TaskStateResult {
  txDigest: string;
  state: TaskStateAction;
}

export interface PeriodicScheduleConfig {
  firstStartMs: bigint;
  periodMs: bigint;
  deadlineOffsetMs?: bigint;
  maxIterations?: bigint;
  gasPrice: bigint;
}

function extractTaskId(result: ExecutedTransactionResult): Address {
  for (const event of result.events) {
    if (event.data.kind === "TaskCreated") return event.data.task;
  }
  throw new ParsingError("TaskCreatedEvent not found in response");
}

function extractOccurrenceEvent(result: ExecutedTransactionResult): NexusEventKind | undefined {
  return result.events.find((event) => event.data.kind === "OccurrenceScheduled")?.data;
}

export class SchedulerActions {
  constructor(private readonly client: NexusClient) {}

  /** Create and share a task; queue its first occurrence when one is given. */
  async createTask(params: CreateTaskParams): Promise<CreateTaskResult> {
    if (params.initialSchedule !== undefined && params.generator !== "queue") {
      throw new ConfigurationError("Initial queue schedule can only be used with the queue generator");
    }
    const initialSchedule =
      params.initialSchedule === undefined ? undefined : schedulerTx.validateOccurrence(params.initialSchedule, true);

    const { objects } = this.client;
    const inputs = await commitEntryData(params.inputs, params.storage ?? {}, params.cipher);
    const result = await this.client.submit((tx) => {
      const metadata = schedulerTx.newMetadata(tx, objects, params.metadata ?? []);
      const constraints = schedulerTx.newConstraintsPolicy(tx, objects, params.generator);
      const execution = schedulerTx.newExecutionPolicy(tx, objects, {
        dagId: params.dagId,
        entryGroup: params.entryGroup ?? DEFAULT_ENTRY_GROUP,
        inputs,
        gasPrice: params.executionGasPrice,
      });
      const task = schedulerTx.newTask(tx, objects, metadata, constraints, execution);
      schedulerTx.shareTask(tx, objects, task);
    });

    const taskId = extractTaskId(result);
    this.client.logger.info(`Created task ${taskId} in ${result.digest}`);
    if (initialSchedule === undefined) {
      return { txDigest: result.digest, taskId };
    }
    const task = await this.client.sharedObjectRef(taskId);
    return { txDigest: result.digest, taskId, initialSchedule: await this.enqueue(task, initialSchedule) };
  }

  /** Replace the task's metadata with `entries`. */
  async updateMetadata(
    taskId: Address,
    entries: ReadonlyArray<readonly [string, string]>,
  ): Promise<UpdateMetadataResult> {
    const { objects } = this.client;
    const task = await this.client.sharedObjectRef(taskId);
    const result = await this.client.submit((tx) => {
      schedulerTx.updateMetadata(tx, objects, task, schedulerTx.newMetadata(tx, objects, entries));
    });
    return { txDigest: result.digest, entries: entries.length };
  }

  async setTaskState(taskId: Address, state: TaskStateAction): Promise<TaskStateResult> {
    const { objects } = this.client;
    const task = await this.client.sharedObjectRef(taskId);
    const result = await this.client.submit((tx) => {
      schedulerTx.setTaskState(tx, objects, task, state);
    });
    return { txDigest: result.digest, state };
  }

  /** Queue a one-off occurrence. */
  async addOccurrence(taskId: Address, request: OccurrenceRequest): Promise<ScheduleResult> {
    const validated = schedulerTx.validateOccurrence(request, true);
    const task = await this.client.sharedObjectRef(taskId);
    return this.enqueue(task, validated);
  }

  /** Create or replace the task's periodic schedule. */
  async configurePeriodic(taskId: Address, config: PeriodicScheduleConfig): Promise<{ txDigest: string }> {
    if (config.periodMs <= 0n) {
      throw new ConfigurationError("Period must be positive");
    }
    const { objects } = this.client;
    const task = await this.client.sharedObjectRef(taskId);
    const result = await this.client.submit((tx) => {
      schedulerTx.newOrModifyPeriodicForTask(tx, objects, task, config);
    });
    return { txDigest: result.digest };
  }

  async disablePeriodic(taskId: Address): Promise<{ txDigest: string }> {
    const { objects } = this.client;
    const task = await this.client.sharedObjectRef(taskId);
    const result = await this.client.submit((tx) => {
      schedulerTx.disablePeriodicForTask(tx, objects, task);
    });
    return { txDigest: result.digest };
  }

  /** Consume the next due occurrence and begin the DAG run it schedules. */
  async executeScheduledOccurrence(
    taskId: Address,
    dagId: Address,
    generator: OccurrenceGenerator = "queue",
  ): Promise<{ txDigest: string }> {
    const { objects } = this.client;
    const [task, dag] = await Promise.all([this.client.sharedObjectRef(taskId), this.client.sharedObjectRef(dagId)]);
    const result = await this.client.submit((tx) => {
      schedulerTx.executeScheduledOccurrence(tx, objects, task, dag, generator);
    });
    return { txDigest: result.digest };
  }

  private async enqueue(task: ObjectRef, request: OccurrenceRequest): Promise<ScheduleResult> {
    const { objects } = this.client;
    const result = await this.client.submit((tx) => {
      schedulerTx.addOccurrence(tx, objects, task, request);
    });
    const event = extractOccurrenceEvent(result);
    return event === undefined ? { txDigest: result.digest } : { txDigest: result.digest, event };
  }
}

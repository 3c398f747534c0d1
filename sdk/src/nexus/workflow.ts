/**
 * Publishing, executing and following DAGs.
 * @module
 */

import type { ExecutionFinished } from "../events/types.js";
import { ParsingError, RpcError, TimeoutError } from "../errors.js";
import * as dagTx from "../transactions/dag.js";
import { workflow } from "../transactions/idents.js";
import { normalizeAddress, objectIdSchema, type Address } from "../types/address.js";
import { DEFAULT_ENTRY_GROUP, type DagDefinition } from "../types/dag.js";
import type { NexusData, PortsData } from "../types/nexus-data.js";
import type { RuntimeVertex } from "../types/runtime-vertex.js";
import { findCreatedObject, type NexusClient } from "./client.js";
import { commitEntryData, fetchNexusData, type SessionCipher, type StorageConf } from "./storage.js";

export interface PublishResult {
  txDigest: string;
  dagObjectId: Address;
}

export interface ExecuteDagParams {
  dagId: Address;
  /** Entry vertex name to input port name to port data */
  inputs: ReadonlyMap<string, ReadonlyMap<string, NexusData>>;
  entryGroup?: string;
  /** Defaults to the reference gas price */
  priority?: bigint;
  storage?: StorageConf;
  cipher?: SessionCipher;
}

export interface ExecuteResult {
  txDigest: string;
  executionId: Address;
}

export type ExecutionStep =
  | {
      kind: "advanced" | "end_state";
      walkIndex: bigint;
      vertex: RuntimeVertex;
      variant: string;
      ports: PortsData;
    }
  | { kind: "failed"; walkIndex: bigint; vertex: RuntimeVertex; reason: string };

export interface ExecutionTrace {
  executionId: Address;
  steps: ExecutionStep[];
  finished: ExecutionFinished;
}

export interface InspectOptions {
  /** Resolve remote and encrypted port data with these */
  storage?: StorageConf;
  cipher?: SessionCipher;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export class WorkflowActions {
  constructor(private readonly client: NexusClient) {}

  /** Build `dag` on the ledger and share it. */
  async publish(dag: DagDefinition): Promise<PublishResult> {
    const { objects } = this.client;
    const result = await this.client.submit((tx) => {
      dagTx.publish(tx, objects, dagTx.buildDag(tx, objects, dag));
    });

    let dagObjectId = findCreatedObject(result.objectChanges, objects.workflowPkgId, "dag", workflow.dag.DAG.name);
    if (dagObjectId === undefined) {
      for (const event of result.events) {
        if (event.data.kind !== "DAGCreated") continue;
        const dag = objectIdSchema.safeParse(event.data.json.dag);
        if (dag.success) dagObjectId = dag.data;
        break;
      }
    }
    if (dagObjectId === undefined) {
      throw new ParsingError("DAG object not found in response");
    }
    this.client.logger.info(`Published DAG ${dagObjectId} in ${result.digest}`);
    return { txDigest: result.digest, dagObjectId };
  }

  /**
   * Commit the entry data and begin an execution of a published DAG.
   * Remote and encrypted ports are stored before anything is composed.
   */
  async execute(params: ExecuteDagParams): Promise<ExecuteResult> {
    const { objects } = this.client;
    const inputs = await commitEntryData(params.inputs, params.storage ?? {}, params.cipher);
    const dag = await this.client.sharedObjectRef(params.dagId);
    const priority = params.priority ?? this.client.referenceGasPrice;

    const result = await this.client.submit((tx) => {
      dagTx.execute(tx, objects, {
        dag,
        entryGroup: params.entryGroup ?? DEFAULT_ENTRY_GROUP,
        inputs,
        priority,
      });
    });

    let executionId = findCreatedObject(
      result.objectChanges,
      objects.workflowPkgId,
      "dag",
      workflow.dag.DAGExecution.name,
    );
    if (executionId === undefined) {
      const request = result.events.find((event) => event.data.kind === "RequestWalkExecution");
      if (request?.data.kind === "RequestWalkExecution") executionId = request.data.execution;
    }
    if (executionId === undefined) {
      throw new ParsingError("DAG execution object not found in response");
    }
    return { txDigest: result.digest, executionId };
  }

  /**
   * Follow an execution through the checkpoint stream until it finishes.
   * Only checkpoints published after the call are seen, so start inspecting
   * right after {@link execute}.
   *
   * @throws TimeoutError when `timeoutMs` passes first
   */
  async inspectExecution(executionId: Address, options: InspectOptions = {}): Promise<ExecutionTrace> {
    const target = normalizeAddress(executionId);
    const abort = new AbortController();
    const forwardAbort = (): void => abort.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });

    let timedOut = false;
    const timer =
      options.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            abort.abort();
          }, options.timeoutMs);

    const steps: ExecutionStep[] = [];
    try {
      for await (const checkpoint of this.client.ledger.subscribeCheckpoints(abort.signal)) {
        for (const event of this.client.signer.decodeEvents(checkpoint.events)) {
          const data = event.data;
          switch (data.kind) {
            case "WalkAdvanced":
            case "EndStateReached":
              if (data.execution !== target) break;
              steps.push({
                kind: data.kind === "WalkAdvanced" ? "advanced" : "end_state",
                walkIndex: data.walkIndex,
                vertex: data.vertex,
                variant: data.variant.name,
                ports: await this.resolvePorts(data.variantPortsToData, options),
              });
              break;
            case "WalkFailed":
              if (data.execution !== target) break;
              steps.push({ kind: "failed", walkIndex: data.walkIndex, vertex: data.vertex, reason: data.reason });
              break;
            case "ExecutionFinished":
              if (data.execution === target) return { executionId: target, steps, finished: data };
              break;
            default:
              break;
          }
        }
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", forwardAbort);
      abort.abort();
    }

    if (timedOut && options.timeoutMs !== undefined) {
      throw new TimeoutError(`Execution ${target} did not finish in time`, options.timeoutMs);
    }
    throw new RpcError(`Checkpoint stream ended before execution ${target} finished`);
  }

  private async resolvePorts(ports: PortsData, options: InspectOptions): Promise<PortsData> {
    if (options.storage === undefined && options.cipher === undefined) return ports;
    const out: PortsData = new Map();
    for (const [port, value] of ports) {
      out.set(port, await fetchNexusData(value, options.storage ?? {}, options.cipher));
    }
    return out;
  }
}

import { describe, expect, it } from "vitest";
import { Ed25519Keypair } from "../crypto/ed25519.js";
import { emitNexusEvent } from "../events/emit.js";
import type { NexusEventKind } from "../events/types.js";
import { ConfigurationError, ParsingError, RpcError, StorageError, TimeoutError, WalletError } from "../errors.js";
import { MemoryLedger } from "../ledger/memory.js";
import type { ExecutedTransaction, ObjectChange } from "../ledger/types.js";
import { silentLogger } from "../logger.js";
import { findCreatedObject, NexusClient } from "../nexus/client.js";
import { GasPool } from "../nexus/gas-pool.js";
import { commitEntryData, fetchNexusData, MAX_SAVE_FOR_EPOCHS, type ArtifactStorage } from "../nexus/storage.js";
import { deserializeTransactionData, transactionDigest } from "../transactions/bcs.js";
import { bindingObjectId } from "../transactions/network-auth.js";
import { addressFromPublicKey, normalizeAddress } from "../types/address.js";
import type { DagDefinition } from "../types/dag.js";
import { inlineData, walrusData, type JsonValue } from "../types/nexus-data.js";
import { ref, testObjects } from "./helpers.js";

const KEY = Ed25519Keypair.fromSecretKey(new Uint8Array(32).fill(7));
const SENDER = addressFromPublicKey(KEY.publicKeyBytes(), 0);
const GAS_COIN = ref("0xaa", 10n);
/** 31 zero bytes and a one, base58 */
const NEXT_DIGEST = "11111111111111111111111111111112";

const DAG = normalizeAddress("0xd1");
const TASK = normalizeAddress("0x7a5");

interface Outcome {
  success?: boolean;
  error?: string;
  objectChanges?: ObjectChange[];
  events?: NexusEventKind[];
  /** Leave the transaction out of every checkpoint */
  unconfirmed?: boolean;
}

/** Answer each submission with the next outcome, including it in a checkpoint unless told not to. */
function scripted(ledger: MemoryLedger, outcomes: Outcome[]): void {
  let sequence = 0n;
  ledger.onExecute((request): ExecutedTransaction => {
    const digest = transactionDigest(request.txBytes);
    const outcome = outcomes.shift() ?? {};
    if (outcome.unconfirmed !== true) {
      ledger.publishCheckpoint({ sequenceNumber: sequence++, transactionDigests: [digest] });
    }
    return {
      digest,
      success: outcome.success ?? true,
      error: outcome.error,
      objectChanges: outcome.objectChanges ?? [],
      events: (outcome.events ?? []).map((data, i) =>
        emitNexusEvent(data, {
          primitivesPkgId: testObjects.primitivesPkgId,
          workflowPkgId: testObjects.workflowPkgId,
          id: { txDigest: digest, eventSeq: BigInt(i) },
        }),
      ),
    };
  });
}

function buildClient(ledger: MemoryLedger, timeoutMs = 1_000): Promise<NexusClient> {
  return NexusClient.builder()
    .withPrivateKey(KEY)
    .withLedgerClient(ledger)
    .withGas([GAS_COIN], 1_000_000n)
    .withNexusObjects(testObjects)
    .withTransactionTimeout(timeoutMs)
    .withLogger(silentLogger)
    .build();
}

function sharedObject(ledger: MemoryLedger, objectId: string, initialVersion: bigint): void {
  ledger.putObject({
    objectId,
    owner: { kind: "shared", initialVersion },
    version: initialVersion + 3n,
    digest: NEXT_DIGEST,
    json: {},
  });
}

function oneVertexDag(): DagDefinition {
  return {
    vertices: [
      {
        name: "a",
        kind: { variant: "off_chain", toolFqn: { domain: "xyz.test", name: "tool", version: 1 } },
        entryPorts: ["in"],
      },
    ],
    edges: [],
    defaultValues: [],
    entryGroups: [],
    outputs: [],
  };
}

const dagCreated: ObjectChange = {
  objectId: DAG,
  kind: "created",
  objectType: `${testObjects.workflowPkgId}::dag::DAG`,
};

const gasMutated: ObjectChange = {
  objectId: GAS_COIN.objectId,
  kind: "mutated",
  version: 11n,
  digest: NEXT_DIGEST,
};

// ============================================================================
// Gas pool
// ============================================================================

describe("GasPool", () => {
  it("hands out coins first in, first out", async () => {
    const pool = new GasPool([ref("0x1"), ref("0x2")], 10n);
    expect((await pool.acquire()).objectId).toBe(normalizeAddress("0x1"));
    expect((await pool.acquire()).objectId).toBe(normalizeAddress("0x2"));
    expect(pool.available).toBe(0);
  });

  it("serves waiters in arrival order once coins come back", async () => {
    const pool = new GasPool([ref("0x1")], 10n);
    const held = await pool.acquire();
    const order: string[] = [];
    const first = pool.acquire().then((coin) => order.push(`first:${coin.version}`));
    const second = pool.acquire().then((coin) => order.push(`second:${coin.version}`));

    pool.release({ ...held, version: 2n });
    pool.release({ ...held, version: 3n });
    await Promise.all([first, second]);
    expect(order).toEqual(["first:2", "second:3"]);
  });

  it("returns the coin when the leased work throws", async () => {
    const pool = new GasPool([ref("0x1")], 10n);
    await expect(
      pool.withGasCoin(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(pool.available).toBe(1);
  });

  it("rejects an empty pool and a non-positive budget", () => {
    expect(() => new GasPool([], 10n)).toThrow("At least one gas coin is required");
    expect(() => new GasPool([ref("0x1")], 0n)).toThrow("Gas budget must be positive");
  });
});

// ============================================================================
// Builder
// ============================================================================

describe("NexusClientBuilder", () => {
  it("checks required settings in order", async () => {
    await expect(NexusClient.builder().build()).rejects.toThrow("User's private key is required");
    await expect(NexusClient.builder().withPrivateKey(KEY).build()).rejects.toThrow("RPC URL is required");
    await expect(
      NexusClient.builder().withPrivateKey(KEY).withLedgerClient(new MemoryLedger()).build(),
    ).rejects.toThrow("At least one gas coin is required");
    await expect(
      NexusClient.builder().withPrivateKey(KEY).withLedgerClient(new MemoryLedger()).withGas([GAS_COIN], 5n).build(),
    ).rejects.toThrow("Nexus objects are required");
  });

  it("rejects a non-positive transaction timeout", async () => {
    await expect(buildClient(new MemoryLedger(), 0)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("rejects a retry policy on a supplied connection", async () => {
    const build = NexusClient.builder()
      .withPrivateKey(KEY)
      .withLedgerClient(new MemoryLedger())
      .withGas([GAS_COIN], 5n)
      .withNexusObjects(testObjects)
      .withRetry({ maxRetries: 1 })
      .build();
    await expect(build).rejects.toThrow("Retry policy only applies to connections created from an RPC URL");
  });

  it("rejects a non-http RPC URL", async () => {
    const build = NexusClient.builder()
      .withPrivateKey(KEY)
      .withRpcUrl("ftp://node.test")
      .withGas([GAS_COIN], 5n)
      .withNexusObjects(testObjects)
      .build();
    await expect(build).rejects.toThrow("Invalid RPC URL: RPC URL must use http or https protocol");
  });

  it("reads the reference gas price and derives the sender", async () => {
    const ledger = new MemoryLedger();
    ledger.epoch = { epoch: 4n, referenceGasPrice: 750n };
    const client = await buildClient(ledger);
    expect(client.referenceGasPrice).toBe(750n);
    expect(client.address).toBe(SENDER);
  });
});

// ============================================================================
// Signing and submission
// ============================================================================

describe("NexusClient.submit", () => {
  it("pays with the pooled coin and tracks its new version", async () => {
    const ledger = new MemoryLedger();
    scripted(ledger, [{ objectChanges: [dagCreated, gasMutated] }]);
    const client = await buildClient(ledger);

    const result = await client.workflow().publish(oneVertexDag());
    expect(result.dagObjectId).toBe(DAG);

    const [request] = ledger.submitted;
    if (request === undefined) throw new Error("nothing submitted");
    const data = deserializeTransactionData(request.txBytes);
    expect(data.sender).toBe(SENDER);
    expect(data.gasData).toEqual({ payment: [GAS_COIN], owner: SENDER, price: 1000n, budget: 1_000_000n });
    expect(request.signatures[0]?.length).toBe(1 + 64 + 32);
    expect(result.txDigest).toBe(transactionDigest(request.txBytes));

    expect(client.gasPool.available).toBe(1);
    expect(await client.gasPool.acquire()).toEqual({ objectId: GAS_COIN.objectId, version: 11n, digest: NEXT_DIGEST });
  });

  it("times out when no checkpoint includes the transaction", async () => {
    const ledger = new MemoryLedger();
    scripted(ledger, [{ objectChanges: [dagCreated], unconfirmed: true }]);
    const client = await buildClient(ledger, 50);

    await expect(client.workflow().publish(oneVertexDag())).rejects.toBeInstanceOf(TimeoutError);
    expect(client.gasPool.available).toBe(1);
  });

  it("reports a failed execution and keeps the old coin reference", async () => {
    const ledger = new MemoryLedger();
    scripted(ledger, [{ success: false, error: "MoveAbort(7)", objectChanges: [gasMutated] }]);
    const client = await buildClient(ledger);

    const publish = client.workflow().publish(oneVertexDag());
    await expect(publish).rejects.toBeInstanceOf(WalletError);
    await expect(publish).rejects.toThrow("Transaction execution failed: MoveAbort(7)");
    expect(await client.gasPool.acquire()).toEqual(GAS_COIN);
  });

  it("wraps submission failures", async () => {
    const ledger = new MemoryLedger();
    ledger.onExecute(() => {
      throw new Error("connection reset");
    });
    const client = await buildClient(ledger);
    await expect(client.workflow().publish(oneVertexDag())).rejects.toThrow(
      "Transaction submission failed: connection reset",
    );
  });
});

// ============================================================================
// Workflows
// ============================================================================

describe("WorkflowActions", () => {
  it("falls back to the DAGCreated event for the DAG id", async () => {
    const ledger = new MemoryLedger();
    scripted(ledger, [
      {
        events: [
          { kind: "DAGVertexAdded", json: { dag: DAG, vertex: { name: "a" } } },
          { kind: "DAGEntryVertexInputPortAdded", json: { dag: DAG, vertex: { name: "a" }, port: { name: "x" } } },
          { kind: "DAGCreated", json: { dag: DAG } },
        ],
      },
    ]);
    const client = await buildClient(ledger);
    expect((await client.workflow().publish(oneVertexDag())).dagObjectId).toBe(DAG);
  });

  it("fails when the response names no DAG", async () => {
    const ledger = new MemoryLedger();
    scripted(ledger, [{}]);
    const client = await buildClient(ledger);
    const publish = client.workflow().publish(oneVertexDag());
    await expect(publish).rejects.toBeInstanceOf(ParsingError);
    await expect(publish).rejects.toThrow("DAG object not found in response");
  });

  it("begins an execution of a shared DAG", async () => {
    const ledger = new MemoryLedger();
    sharedObject(ledger, DAG, 2n);
    const execution = normalizeAddress("0xe1");
    scripted(ledger, [
      {
        objectChanges: [
          { objectId: execution, kind: "created", objectType: `${testObjects.workflowPkgId}::dag::DAGExecution` },
        ],
      },
    ]);
    const client = await buildClient(ledger);

    const result = await client
      .workflow()
      .execute({ dagId: DAG, inputs: new Map([["a", new Map([["in", inlineData({ n: 1 })]])]]) });
    expect(result.executionId).toBe(execution);

    const [request] = ledger.submitted;
    if (request === undefined) throw new Error("nothing submitted");
    const data = deserializeTransactionData(request.txBytes);
    const dagInput = data.kind.inputs.find(
      (input) => input.kind === "Object" && input.object.kind === "SharedObject" && input.object.ref.objectId === DAG,
    );
    expect(dagInput).toEqual({
      kind: "Object",
      object: { kind: "SharedObject", ref: { objectId: DAG, initialSharedVersion: 2n, mutable: false } },
    });
  });
});

// ============================================================================
// Scheduler
// ============================================================================

describe("SchedulerActions.createTask", () => {
  const base = {
    dagId: DAG,
    inputs: new Map([["a", new Map([["in", inlineData(1)]])]]),
    executionGasPrice: 1000n,
  };

  it("returns the task id from the TaskCreated event", async () => {
    const ledger = new MemoryLedger();
    scripted(ledger, [{ events: [{ kind: "TaskCreated", task: TASK, owner: SENDER }] }]);
    const client = await buildClient(ledger);

    const result = await client.scheduler().createTask({ ...base, generator: "queue" });
    expect(result.taskId).toBe(TASK);
    expect(result.initialSchedule).toBeUndefined();
    expect(ledger.submitted).toHaveLength(1);
  });

  it("fails without a TaskCreated event", async () => {
    const ledger = new MemoryLedger();
    scripted(ledger, [{}]);
    const client = await buildClient(ledger);
    await expect(client.scheduler().createTask({ ...base, generator: "queue" })).rejects.toThrow(
      "TaskCreatedEvent not found in response",
    );
  });

  it("refuses an initial schedule for a periodic task before submitting", async () => {
    const ledger = new MemoryLedger();
    scripted(ledger, []);
    const client = await buildClient(ledger);
    await expect(
      client.scheduler().createTask({ ...base, generator: "periodic", initialSchedule: { startMs: 10n, gasPrice: 1000n } }),
    ).rejects.toThrow("Initial queue schedule can only be used with the queue generator");
    expect(ledger.submitted).toHaveLength(0);
  });

  it("queues the initial occurrence on the new task", async () => {
    const ledger = new MemoryLedger();
    sharedObject(ledger, TASK, 9n);
    scripted(ledger, [
      { events: [{ kind: "TaskCreated", task: TASK, owner: SENDER }] },
      { events: [{ kind: "OccurrenceScheduled", task: TASK, fromPeriodic: false }] },
    ]);
    const client = await buildClient(ledger);

    const result = await client
      .scheduler()
      .createTask({ ...base, generator: "queue", initialSchedule: { startMs: 10n, gasPrice: 1000n } });
    expect(result.initialSchedule?.event).toEqual({ kind: "OccurrenceScheduled", task: TASK, fromPeriodic: false });
    expect(ledger.submitted).toHaveLength(2);
  });
});

// ============================================================================
// Port data storage
// ============================================================================

class MemoryStorage implements ArtifactStorage {
  readonly blobs = new Map<string, JsonValue>();

  async commit(json: JsonValue): Promise<string> {
    const key = `blob-${this.blobs.size}`;
    this.blobs.set(key, json);
    return key;
  }

  async fetch(key: string): Promise<JsonValue> {
    const json = this.blobs.get(key);
    if (json === undefined) throw new Error(`no blob ${key}`);
    return json;
  }
}

describe("port data storage", () => {
  it("keeps inline data and stores remote arrays under one repeated key", async () => {
    const remote = new MemoryStorage();
    const committed = await commitEntryData(
      new Map([["a", new Map([["x", inlineData(1)], ["y", walrusData([1, 2, 3])]])]]),
      { remote, saveForEpochs: 2 },
    );
    expect(committed.get("a")?.get("x")).toEqual(inlineData(1));
    expect(committed.get("a")?.get("y")).toEqual(walrusData(["blob-0", "blob-0", "blob-0"]));
    expect(remote.blobs.get("blob-0")).toEqual([1, 2, 3]);
  });

  it("resolves a stored array back to its value", async () => {
    const remote = new MemoryStorage();
    remote.blobs.set("blob-0", [4, 5]);
    expect(await fetchNexusData(walrusData(["blob-0", "blob-0"]), { remote })).toEqual(walrusData([4, 5]));
  });

  it("requires a retention within the maximum", async () => {
    const remote = new MemoryStorage();
    await expect(
      commitEntryData(new Map([["a", new Map([["y", walrusData("v")]])]]), {
        remote,
        saveForEpochs: MAX_SAVE_FOR_EPOCHS + 1,
      }),
    ).rejects.toThrow("Save for epochs exceeds maximum allowed (53)");
  });

  it("needs a cipher for encrypted data", async () => {
    await expect(commitEntryData(new Map([["a", new Map([["x", inlineData(1, true)]])]]), {})).rejects.toBeInstanceOf(
      StorageError,
    );
  });
});

// ============================================================================
// Allowlist export
// ============================================================================

describe("NetworkAuthActions.exportAllowedLeadersFile", () => {
  const LEADER = normalizeAddress("0x1ead");
  const KEYS = normalizeAddress("0x4e45");
  const LEADER_KEY = new Uint8Array(32).fill(9);

  function withBinding(ledger: MemoryLedger, activeKeyId: string | null, scheme = 0): void {
    const id = bindingObjectId(testObjects, { kind: "leader", address: LEADER });
    ledger.putObject({
      objectId: id,
      owner: { kind: "shared", initialVersion: 1n },
      version: 2n,
      digest: NEXT_DIGEST,
      json: { next_key_id: "1", active_key_id: activeKeyId, keys: { id: KEYS, size: "1" } },
    });
    const field = normalizeAddress("0xf0f0");
    ledger.putObject({
      objectId: field,
      owner: { kind: "object", address: KEYS },
      version: 1n,
      digest: NEXT_DIGEST,
      json: {
        id: field,
        name: "0",
        value: { scheme, public_key: Array.from(LEADER_KEY), added_at_ms: "5", revoked_at_ms: null },
      },
    });
    ledger.addDynamicField(KEYS, { kind: "field", fieldId: field });
  }

  it("exports the active key of each leader", async () => {
    const ledger = new MemoryLedger();
    withBinding(ledger, "0");
    const client = await buildClient(ledger);
    expect(await client.networkAuth().exportAllowedLeadersFile([LEADER])).toEqual({
      version: 1,
      leaders: [{ leaderId: LEADER, keys: [{ kid: 0, publicKey: "09".repeat(32) }] }],
    });
  });

  it("reports a leader without a binding", async () => {
    const client = await buildClient(new MemoryLedger());
    const id = bindingObjectId(testObjects, { kind: "leader", address: LEADER });
    const exported = client.networkAuth().exportAllowedLeadersFile([LEADER]);
    await expect(exported).rejects.toBeInstanceOf(RpcError);
    await expect(exported).rejects.toThrow(`failed to fetch leader KeyBinding (${id}): Object not found: ${id}`);
  });

  it("rejects a binding with no active key", async () => {
    const ledger = new MemoryLedger();
    withBinding(ledger, null);
    const client = await buildClient(ledger);
    await expect(client.networkAuth().exportAllowedLeadersFile([LEADER])).rejects.toThrow("has no active key");
  });

  it("rejects keys of another scheme", async () => {
    const ledger = new MemoryLedger();
    withBinding(ledger, "0", 1);
    const client = await buildClient(ledger);
    await expect(client.networkAuth().exportAllowedLeadersFile([LEADER])).rejects.toThrow(
      "active key uses unsupported scheme 1",
    );
  });
});

describe("findCreatedObject", () => {
  it("ignores type parameters and non-created changes", () => {
    const changes: ObjectChange[] = [
      { objectId: normalizeAddress("0x1"), kind: "mutated", objectType: `${testObjects.workflowPkgId}::dag::DAG` },
      { objectId: normalizeAddress("0x2"), kind: "created", objectType: "package" },
      {
        objectId: normalizeAddress("0x3"),
        kind: "created",
        objectType: `${testObjects.workflowPkgId}::dag::DAG<0x2::sui::SUI>`,
      },
    ];
    expect(findCreatedObject(changes, testObjects.workflowPkgId, "dag", "DAG")).toBe(normalizeAddress("0x3"));
  });
});

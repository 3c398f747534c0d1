import { describe, expect, it } from "vitest";
import { ConfigurationError, TransactionBuildingError } from "../errors.js";
import * as dag from "../transactions/dag.js";
import * as gas from "../transactions/gas.js";
import * as networkAuth from "../transactions/network-auth.js";
import * as scheduler from "../transactions/scheduler.js";
import * as tool from "../transactions/tool.js";
import type { Argument } from "../transactions/bcs.js";
import { TransactionBuilder } from "../transactions/builder.js";
import { normalizeAddress } from "../types/address.js";
import type { DagDefinition } from "../types/dag.js";
import { inlineData } from "../types/nexus-data.js";
import type { ToolFqn } from "../types/tool.js";
import { utf8 } from "../utils/encoding.js";
import { ref, testObjects } from "./helpers.js";

const FQN: ToolFqn = { domain: "xyz.test", name: "tool", version: 1 };

function calls(tx: TransactionBuilder): string[] {
  return tx.moveCalls().map((call) => call.function);
}

function inputBytes(tx: TransactionBuilder, arg: Argument | undefined): Uint8Array {
  if (arg?.kind !== "Input") throw new Error("expected an input argument");
  const input = tx.input(arg.index);
  if (input?.kind !== "Pure") throw new Error("expected a pure input");
  return input.bytes;
}

function twoVertexDag(): DagDefinition {
  return {
    vertices: [
      { name: "a", kind: { variant: "off_chain", toolFqn: FQN }, entryPorts: ["in"] },
      { name: "b", kind: { variant: "off_chain", toolFqn: FQN }, entryPorts: [] },
    ],
    edges: [
      {
        from: { vertex: "a", outputVariant: "ok", outputPort: "out", encrypted: false },
        to: { vertex: "b", inputPort: "in" },
        kind: "normal",
      },
    ],
    defaultValues: [],
    entryGroups: [],
    outputs: [],
  };
}

describe("TransactionBuilder", () => {
  it("encodes pure values canonically", () => {
    const tx = new TransactionBuilder();
    expect(inputBytes(tx, tx.pureU64(5n))).toEqual(Uint8Array.of(5, 0, 0, 0, 0, 0, 0, 0));
    expect(inputBytes(tx, tx.pureString("ab"))).toEqual(Uint8Array.of(2, 97, 98));
    expect(inputBytes(tx, tx.pureOptionU64(undefined))).toEqual(Uint8Array.of(0));
    expect(inputBytes(tx, tx.pureOptionU64(1n))).toEqual(Uint8Array.of(1, 1, 0, 0, 0, 0, 0, 0, 0));
    expect(inputBytes(tx, tx.pureBool(true))).toEqual(Uint8Array.of(1));
  });

  it("rejects non-ascii ascii strings and out of range integers", () => {
    const tx = new TransactionBuilder();
    expect(() => tx.pureAsciiString("héllo")).toThrow(TransactionBuildingError);
    expect(() => tx.pureU64(-1n)).toThrow(TransactionBuildingError);
    expect(() => tx.pureU8(256)).toThrow(TransactionBuildingError);
  });

  it("merges repeated shared objects and upgrades them to mutable", () => {
    const tx = new TransactionBuilder();
    const first = tx.sharedObject({ objectId: "0xaa", initialSharedVersion: 2n, mutable: false });
    const second = tx.sharedObject({ objectId: "0xaa", initialSharedVersion: 2n, mutable: true });

    expect(second).toEqual(first);
    expect(tx.inputCount).toBe(1);
    expect(tx.input(0)).toEqual({
      kind: "Object",
      object: {
        kind: "SharedObject",
        ref: { objectId: normalizeAddress("0xaa"), initialSharedVersion: 2n, mutable: true },
      },
    });
  });

  it("rejects conflicting uses of one object", () => {
    const tx = new TransactionBuilder();
    tx.sharedObject({ objectId: "0xaa", initialSharedVersion: 2n, mutable: false });
    expect(() => tx.sharedObject({ objectId: "0xaa", initialSharedVersion: 3n, mutable: false })).toThrow(
      TransactionBuildingError,
    );
    expect(() => tx.object(ref("0xaa"))).toThrow("used both as owned and as shared");
  });

  it("refuses to build without commands or gas", () => {
    const tx = new TransactionBuilder();
    const options = { sender: "0x1", gasPayment: [ref("0x9")], gasPrice: 1000n, gasBudget: 10n };
    expect(() => tx.build(options)).toThrow("Transaction has no commands");
    tx.transferObjects([tx.object(ref("0x8"))], tx.pureAddress("0x1"));
    expect(() => tx.build({ ...options, gasPayment: [] })).toThrow("at least one coin");
    expect(tx.build(options).gasData.owner).toBe(normalizeAddress("0x1"));
  });
});

describe("DAG templates", () => {
  it("publishes a two-vertex DAG in six DAG-level calls", () => {
    const tx = new TransactionBuilder();
    dag.publish(tx, testObjects, dag.buildDag(tx, testObjects, twoVertexDag()));

    expect(dag.dagLevelCalls(tx)).toEqual([
      "new",
      "with_vertex",
      "with_vertex",
      "with_edge",
      "with_entry_port_in_group",
      "public_share_object",
    ]);
  });

  it("emits one DAG-level call per element plus new and share", () => {
    const definition = twoVertexDag();
    definition.vertices.push({ name: "c", kind: { variant: "off_chain", toolFqn: FQN }, entryPorts: ["x", "y"] });
    definition.defaultValues.push({ vertex: "b", inputPort: "extra", value: { storage: "inline", data: 1 } });
    definition.outputs.push({ vertex: "b", outputVariant: "ok", outputPort: "result", encrypted: true });
    definition.entryGroups.push({ name: "g1", vertices: ["a", "c"] }, { name: "g2", vertices: ["a"] });

    const tx = new TransactionBuilder();
    dag.publish(tx, testObjects, dag.buildDag(tx, testObjects, definition));

    // a joins two groups, c has two ports in one group
    expect(dag.expectedDagCallCount(definition)).toBe(3 + 1 + 1 + 1 + 4 + 2);
    expect(dag.dagLevelCalls(tx)).toHaveLength(dag.expectedDagCallCount(definition));
    expect(dag.dagLevelCalls(tx)).toContain("with_encrypted_output");
  });

  it("looks up the witness of on-chain vertices in the registry", () => {
    const tx = new TransactionBuilder();
    dag.createVertex(tx, testObjects, dag.empty(tx, testObjects), {
      name: "v",
      kind: { variant: "on_chain", toolFqn: FQN },
      entryPorts: [],
    });
    expect(calls(tx)).toEqual(["new", "vertex_from_string", "onchain_tool_witness_id", "vertex_on_chain", "with_vertex"]);
  });

  it("builds array data one element at a time", () => {
    const tx = new TransactionBuilder();
    dag.nexusDataArg(tx, testObjects.primitivesPkgId, inlineData([1, 2]));
    expect(calls(tx)).toEqual(["empty", "push_back", "push_back", "inline_many"]);
    expect(inputBytes(tx, tx.moveCalls()[1]?.arguments[1])).toEqual(Uint8Array.of(1, 49));
  });

  it("parses execution inputs and marks encrypted ports", () => {
    const inputs = dag.parseExecutionInputs({ a: { in: "hi", secret: 1 } }, { a: ["secret"] });
    expect(inputs.get("a")?.get("in")).toEqual(inlineData("hi"));
    expect(inputs.get("a")?.get("secret")).toEqual(inlineData(1, true));
  });

  it("rejects malformed execution inputs", () => {
    expect(() => dag.parseExecutionInputs([1])).toThrow(
      "Input JSON must be an object containing the entry vertices and their respective data.",
    );
    expect(() => dag.parseExecutionInputs({ a: 1 })).toThrow(
      "Values of input JSON must be an object containing the input ports and their respective values.",
    );
  });

  it("begins execution with the network id, entry group and priority", () => {
    const tx = new TransactionBuilder();
    dag.execute(tx, testObjects, {
      dag: ref("0xda9", 11n),
      entryGroup: "_default_group",
      inputs: dag.parseExecutionInputs({ a: { in: 1 } }),
      priority: 9n,
    });
    const begin = tx.moveCalls().at(-1);
    expect(begin?.function).toBe("begin_dag_execution");
    expect(begin?.arguments).toHaveLength(8);
    expect(inputBytes(tx, begin?.arguments[6])).toEqual(Uint8Array.of(9, 0, 0, 0, 0, 0, 0, 0));
  });
});

describe("scheduler templates", () => {
  const task = ref("0x7a5", 12n);

  it("rejects a deadline before the start", () => {
    expect(() => scheduler.validateOccurrence({ startMs: 50n, deadlineMs: 40n, gasPrice: 1n }, true)).toThrow(
      "Deadline (40) cannot be earlier than start (50)",
    );
  });

  it("validates start and deadline combinations", () => {
    expect(() => scheduler.validateOccurrence({ gasPrice: 1n }, true)).toThrow(
      "Provide either an absolute start or a start offset",
    );
    expect(() => scheduler.validateOccurrence({ startOffsetMs: 5n, deadlineMs: 9n, gasPrice: 1n }, true)).toThrow(
      "Absolute deadlines require an absolute start time",
    );
    expect(() => scheduler.validateOccurrence({ deadlineOffsetMs: 9n, gasPrice: 1n }, false)).toThrow(
      ConfigurationError,
    );
    expect(scheduler.validateOccurrence({ startOffsetMs: 5n, gasPrice: 1n }, true)).toEqual({
      startOffsetMs: 5n,
      gasPrice: 1n,
    });
  });

  it("turns an absolute deadline into an offset from the start", () => {
    const tx = new TransactionBuilder();
    scheduler.addOccurrence(tx, testObjects, task, { startMs: 100n, deadlineMs: 150n, gasPrice: 1n });
    const call = tx.moveCalls()[0];
    expect(call?.function).toBe("add_occurrence_absolute_for_task");
    expect(inputBytes(tx, call?.arguments[2])).toEqual(Uint8Array.of(1, 50, 0, 0, 0, 0, 0, 0, 0));
  });

  it("uses the relative call for start offsets", () => {
    const tx = new TransactionBuilder();
    scheduler.addOccurrence(tx, testObjects, task, { startOffsetMs: 10n, gasPrice: 1n });
    const call = tx.moveCalls()[0];
    expect(call?.function).toBe("add_occurrence_relative_for_task");
    expect(inputBytes(tx, call?.arguments[2])).toEqual(Uint8Array.of(0));
  });

  it("requires a positive period", () => {
    const tx = new TransactionBuilder();
    expect(() =>
      scheduler.newOrModifyPeriodicForTask(tx, testObjects, task, { firstStartMs: 1n, periodMs: 0n, gasPrice: 1n }),
    ).toThrow("Period must be positive");
    expect(tx.commandCount).toBe(0);
  });

  it("maps state actions to their calls", () => {
    const tx = new TransactionBuilder();
    scheduler.setTaskState(tx, testObjects, task, "pause");
    scheduler.setTaskState(tx, testObjects, task, "resume");
    scheduler.setTaskState(tx, testObjects, task, "cancel");
    expect(calls(tx)).toEqual([
      "pause_time_constraint_for_task",
      "resume_time_constraint_for_task",
      "cancel_time_constraint_for_task",
    ]);
  });

  it("consumes an occurrence before beginning the scheduled run", () => {
    const tx = new TransactionBuilder();
    scheduler.executeScheduledOccurrence(tx, testObjects, task, ref("0xda9", 11n), "periodic");
    expect(calls(tx)).toEqual(["check_periodic_occurrence", "dag_begin_execution_from_scheduler"]);
  });
});

describe("tool and gas templates", () => {
  const meta: tool.ToolMeta = {
    fqn: FQN,
    url: "https://tool.test/",
    description: "test tool",
    inputSchema: { type: "object" },
    outputSchema: { type: "object" },
  };

  it("registers, prices and hands over both caps", () => {
    const tx = new TransactionBuilder();
    tool.registerOffChainForSelf(tx, testObjects, meta, "0x5e", ref("0xc0"), 25n);

    expect(calls(tx)).toEqual([
      "register_off_chain_tool",
      "deescalate",
      "set_single_invocation_cost_mist",
      "public_transfer",
      "public_transfer",
    ]);
    const transfers = tx.moveCalls().filter((call) => call.function === "public_transfer");
    expect(transfers[0]?.typeArguments).toEqual([tool.overToolCapType(testObjects)]);
    expect(transfers[1]?.typeArguments).toEqual([tool.overGasCapType(testObjects)]);
  });

  it("turns a coin into the invoker's budget", () => {
    const tx = new TransactionBuilder();
    gas.addBudget(tx, testObjects, "0x5e", ref("0xc0"));
    expect(calls(tx)).toEqual(["scope_invoker_address", "into_balance", "add_gas_budget"]);
  });
});

describe("network auth templates", () => {
  const publicKey = new Uint8Array(32).fill(7);
  const key = { publicKey, signature: new Uint8Array(64).fill(9) };

  it("lays out the proof-of-possession message", () => {
    const message = networkAuth.popMessageV1({ kind: "tool", fqn: FQN }, 3n, publicKey);
    const fqn = "xyz.test.tool@1";

    expect(message.subarray(0, 34)).toEqual(utf8("nexus_workflow.network_auth.pop_v1"));
    expect(Array.from(message.subarray(34, 36))).toEqual([1, fqn.length]);
    expect(message.subarray(36, 36 + fqn.length)).toEqual(utf8(fqn));
    expect(Array.from(message.subarray(51, 59))).toEqual([3, 0, 0, 0, 0, 0, 0, 0]);
    expect(message.subarray(59)).toEqual(publicKey);
  });

  it("encodes leaders by address", () => {
    const bytes = networkAuth.identityKeyBytes({ kind: "leader", address: "0x1" });
    expect(bytes).toHaveLength(33);
    expect(bytes[0]).toBe(0);
    expect(bytes[32]).toBe(1);
  });

  it("derives a stable binding id per identity", () => {
    const leader = networkAuth.bindingObjectId(testObjects, { kind: "leader", address: "0x1" });
    expect(networkAuth.bindingObjectId(testObjects, { kind: "leader", address: "0x1" })).toBe(leader);
    expect(networkAuth.bindingObjectId(testObjects, { kind: "tool", fqn: FQN })).not.toBe(leader);
    expect(
      networkAuth.bindingObjectId({ ...testObjects, networkAuth: ref("0x106") }, { kind: "leader", address: "0x1" }),
    ).not.toBe(leader);
  });

  it("proves ownership twice when creating a binding", () => {
    const tx = new TransactionBuilder();
    networkAuth.createToolBindingAndRegisterKey(tx, testObjects, FQN, ref("0xca9"), key, "0x5e", "docs");

    expect(calls(tx)).toEqual([
      "prove_offchain_tool",
      "create_binding",
      "prove_offchain_tool",
      "new_proof_of_key",
      "register_key",
    ]);
    expect(tx.snapshot().commands.at(-1)?.kind).toBe("TransferObjects");
  });

  it("rotates leader keys on an owned binding", () => {
    const tx = new TransactionBuilder();
    networkAuth.registerLeaderKeyOnExistingBinding(tx, testObjects, ref("0x1ead", 2n), ref("0xb1d"), key);
    expect(calls(tx)).toEqual(["prove_leader", "new_proof_of_key", "register_key"]);
    const cap = tx.moveCalls()[0]?.arguments[0];
    expect(cap?.kind === "Input" ? tx.input(cap.index) : undefined).toEqual({
      kind: "Object",
      object: {
        kind: "SharedObject",
        ref: { objectId: normalizeAddress("0x1ead"), initialSharedVersion: 2n, mutable: false },
      },
    });
  });
});

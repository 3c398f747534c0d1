/**
 * Call templates for building, publishing and executing DAGs.
 *
 * Every template returns the argument produced by its last call, so a DAG is
 * built by threading the `dag` handle through `empty`, `createVertex`,
 * `createDefaultValue`, `createEdge`, `createOutput` and `markEntryPort`
 * before `publish` shares it.
 *
 * @module
 */

import { TransactionBuildingError } from "../errors.js";
import type { Address } from "../types/address.js";
import {
  entryPortMarkers,
  type DagDefaultValue,
  type DagDefinition,
  type DagEdge,
  type DagOutput,
  type DagVertex,
  type EdgeKind,
  type EntryPortMarker,
} from "../types/dag.js";
import { inlineData, type JsonValue, type NexusData } from "../types/nexus-data.js";
import { sharedRef, type NexusObjects } from "../types/nexus-objects.js";
import type { ObjectRef } from "../types/object.js";
import { formatToolFqn } from "../types/tool.js";
import { structType, type TypeTag } from "../types/type-tag.js";
import type { Argument } from "./bcs.js";
import type { TransactionBuilder } from "./builder.js";
import {
  callIdent,
  identType,
  MOVE_STDLIB_PACKAGE_ID,
  moveStd,
  primitives,
  SUI_FRAMEWORK_PACKAGE_ID,
  suiFramework,
  workflow,
} from "./idents.js";

/**
 * Functions that make up the DAG itself. Helper constructors such as
 * `vertex_from_string` are not counted.
 */
export const DAG_LEVEL_FUNCTIONS: ReadonlySet<string> = new Set([
  workflow.dag.new.name,
  workflow.dag.withVertex.name,
  workflow.dag.withDefaultValue.name,
  workflow.dag.withEdge.name,
  workflow.dag.withEncryptedEdge.name,
  workflow.dag.withOutput.name,
  workflow.dag.withEncryptedOutput.name,
  workflow.dag.withEntryPortInGroup.name,
  suiFramework.transfer.publicShareObject.name,
]);

/** Number of DAG-level calls `buildDag` followed by `publish` emits. */
export function expectedDagCallCount(dag: DagDefinition): number {
  return (
    dag.vertices.length +
    dag.defaultValues.length +
    dag.edges.length +
    dag.outputs.length +
    entryPortMarkers(dag).length +
    2
  );
}

/** DAG-level calls recorded in `tx`, in order. */
export function dagLevelCalls(tx: TransactionBuilder): string[] {
  return tx
    .moveCalls()
    .map((call) => call.function)
    .filter((name) => DAG_LEVEL_FUNCTIONS.has(name));
}

// ============================================================================
// Identifier helpers
// ============================================================================

function fromString(tx: TransactionBuilder, pkg: Address, ident: { module: string; name: string }, value: string): Argument {
  return callIdent(tx, pkg, ident, [tx.pureAsciiString(value)]);
}

export function vertexArg(tx: TransactionBuilder, pkg: Address, name: string): Argument {
  return fromString(tx, pkg, workflow.dag.vertexFromString, name);
}

export function inputPortArg(tx: TransactionBuilder, pkg: Address, name: string, encrypted = false): Argument {
  return fromString(tx, pkg, encrypted ? workflow.dag.encryptedInputPortFromString : workflow.dag.inputPortFromString, name);
}

export function entryGroupArg(tx: TransactionBuilder, pkg: Address, name: string): Argument {
  return fromString(tx, pkg, workflow.dag.entryGroupFromString, name);
}

function edgeKindArg(tx: TransactionBuilder, pkg: Address, kind: EdgeKind): Argument {
  switch (kind) {
    case "normal":
      return callIdent(tx, pkg, workflow.dag.edgeKindNormal);
    case "for_each":
      return callIdent(tx, pkg, workflow.dag.edgeKindForEach);
    case "collect":
      return callIdent(tx, pkg, workflow.dag.edgeKindCollect);
    case "do_while":
      return callIdent(tx, pkg, workflow.dag.edgeKindDoWhile);
    case "break":
      return callIdent(tx, pkg, workflow.dag.edgeKindBreak);
  }
}

// ============================================================================
// NexusData
// ============================================================================

const encoder = new TextEncoder();

function dataConstructor(value: NexusData, many: boolean): { module: string; name: string } {
  const d = primitives.data;
  if (value.storage === "inline") {
    if (many) return value.encrypted ? d.inlineManyEncrypted : d.inlineMany;
    return value.encrypted ? d.inlineOneEncrypted : d.inlineOne;
  }
  if (many) return value.encrypted ? d.walrusManyEncrypted : d.walrusMany;
  return value.encrypted ? d.walrusOneEncrypted : d.walrusOne;
}

/**
 * Construct a `NexusData` value. Arrays become a `vector<vector<u8>>` with one
 * JSON text per element; anything else is a single JSON text.
 */
export function nexusDataArg(tx: TransactionBuilder, primitivesPkgId: Address, value: NexusData): Argument {
  if (!Array.isArray(value.data)) {
    const bytes = tx.pureBytes(encoder.encode(JSON.stringify(value.data)));
    return callIdent(tx, primitivesPkgId, dataConstructor(value, false), [bytes]);
  }

  const bytesType: TypeTag = { kind: "vector", element: { kind: "u8" } };
  const items = callIdent(tx, MOVE_STDLIB_PACKAGE_ID, moveStd.vector.empty, [], [bytesType]);
  for (const item of value.data) {
    const bytes = tx.pureBytes(encoder.encode(JSON.stringify(item)));
    callIdent(tx, MOVE_STDLIB_PACKAGE_ID, moveStd.vector.pushBack, [items, bytes], [bytesType]);
  }
  return callIdent(tx, primitivesPkgId, dataConstructor(value, true), [items]);
}

// ============================================================================
// DAG templates
// ============================================================================

export function empty(tx: TransactionBuilder, objects: NexusObjects): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.dag.new);
}

export function createVertex(tx: TransactionBuilder, objects: NexusObjects, dag: Argument, vertex: DagVertex): Argument {
  const pkg = objects.workflowPkgId;
  const name = vertexArg(tx, pkg, vertex.name);
  const fqn = tx.pureAsciiString(formatToolFqn(vertex.kind.toolFqn));

  let kind: Argument;
  if (vertex.kind.variant === "off_chain") {
    kind = callIdent(tx, pkg, workflow.dag.vertexOffChain, [fqn]);
  } else {
    const registry = tx.sharedObject(sharedRef(objects.toolRegistry, false));
    const witnessId = callIdent(tx, pkg, workflow.toolRegistry.onchainToolWitnessId, [
      registry,
      tx.pureAsciiString(formatToolFqn(vertex.kind.toolFqn)),
    ]);
    kind = callIdent(tx, pkg, workflow.dag.vertexOnChain, [fqn, witnessId]);
  }

  return callIdent(tx, pkg, workflow.dag.withVertex, [dag, name, kind]);
}

export function createDefaultValue(
  tx: TransactionBuilder,
  objects: NexusObjects,
  dag: Argument,
  value: DagDefaultValue,
): Argument {
  const pkg = objects.workflowPkgId;
  const vertex = vertexArg(tx, pkg, value.vertex);
  const port = inputPortArg(tx, pkg, value.inputPort);
  const data = nexusDataArg(tx, objects.primitivesPkgId, inlineData(value.value.data));
  return callIdent(tx, pkg, workflow.dag.withDefaultValue, [dag, vertex, port, data]);
}

export function createEdge(tx: TransactionBuilder, objects: NexusObjects, dag: Argument, edge: DagEdge): Argument {
  const pkg = objects.workflowPkgId;
  const fromVertex = vertexArg(tx, pkg, edge.from.vertex);
  const fromVariant = fromString(tx, pkg, workflow.dag.outputVariantFromString, edge.from.outputVariant);
  const fromPort = fromString(tx, pkg, workflow.dag.outputPortFromString, edge.from.outputPort);
  const toVertex = vertexArg(tx, pkg, edge.to.vertex);
  const toPort = inputPortArg(tx, pkg, edge.to.inputPort);
  const kind = edgeKindArg(tx, pkg, edge.kind);

  const ident = edge.from.encrypted ? workflow.dag.withEncryptedEdge : workflow.dag.withEdge;
  return callIdent(tx, pkg, ident, [dag, fromVertex, fromVariant, fromPort, toVertex, toPort, kind]);
}

export function createOutput(tx: TransactionBuilder, objects: NexusObjects, dag: Argument, output: DagOutput): Argument {
  const pkg = objects.workflowPkgId;
  const vertex = vertexArg(tx, pkg, output.vertex);
  const variant = fromString(tx, pkg, workflow.dag.outputVariantFromString, output.outputVariant);
  const port = fromString(tx, pkg, workflow.dag.outputPortFromString, output.outputPort);

  const ident = output.encrypted ? workflow.dag.withEncryptedOutput : workflow.dag.withOutput;
  return callIdent(tx, pkg, ident, [dag, vertex, variant, port]);
}

export function markEntryPort(
  tx: TransactionBuilder,
  objects: NexusObjects,
  dag: Argument,
  marker: EntryPortMarker,
): Argument {
  const pkg = objects.workflowPkgId;
  const vertex = vertexArg(tx, pkg, marker.vertex);
  const port = inputPortArg(tx, pkg, marker.inputPort);
  const group = entryGroupArg(tx, pkg, marker.group);
  return callIdent(tx, pkg, workflow.dag.withEntryPortInGroup, [dag, vertex, port, group]);
}

/** Share the finished DAG object. */
export function publish(tx: TransactionBuilder, objects: NexusObjects, dag: Argument): Argument {
  const dagType = identType(objects.workflowPkgId, workflow.dag.DAG);
  return callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.transfer.publicShareObject, [dag], [dagType]);
}

/** Compose the whole definition onto a fresh DAG; returns the unshared handle. */
export function buildDag(tx: TransactionBuilder, objects: NexusObjects, definition: DagDefinition): Argument {
  let dag = empty(tx, objects);
  for (const vertex of definition.vertices) dag = createVertex(tx, objects, dag, vertex);
  for (const value of definition.defaultValues) dag = createDefaultValue(tx, objects, dag, value);
  for (const edge of definition.edges) dag = createEdge(tx, objects, dag, edge);
  for (const output of definition.outputs) dag = createOutput(tx, objects, dag, output);
  for (const marker of entryPortMarkers(definition)) dag = markEntryPort(tx, objects, dag, marker);
  return dag;
}

// ============================================================================
// Execution
// ============================================================================

/** Entry vertex name to input port name to port data. */
export type ExecutionInputs = ReadonlyMap<string, ReadonlyMap<string, NexusData>>;

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Read `{ vertex: { port: value } }` into inline port data. Ports listed in
 * `encrypted` (by vertex) are marked for encryption.
 */
export function parseExecutionInputs(
  json: JsonValue,
  encrypted: Readonly<Record<string, readonly string[]>> = {},
): Map<string, Map<string, NexusData>> {
  if (!isJsonObject(json)) {
    throw new TransactionBuildingError(
      "Input JSON must be an object containing the entry vertices and their respective data.",
    );
  }
  const out = new Map<string, Map<string, NexusData>>();
  for (const [vertex, ports] of Object.entries(json)) {
    if (!isJsonObject(ports)) {
      throw new TransactionBuildingError(
        "Values of input JSON must be an object containing the input ports and their respective values.",
      );
    }
    const encryptedPorts = encrypted[vertex] ?? [];
    const data = new Map<string, NexusData>();
    for (const [port, value] of Object.entries(ports)) {
      data.set(port, inlineData(value, encryptedPorts.includes(port)));
    }
    out.set(vertex, data);
  }
  return out;
}

export interface ExecuteParams {
  /** Shared DAG object; `version` is its initial shared version */
  dag: ObjectRef;
  entryGroup: string;
  inputs: ExecutionInputs;
  /** Gas price the leaders are paid at, also the execution priority */
  priority: bigint;
}

/** Build the `VecMap<Vertex, VecMap<InputPort, NexusData>>` of entry data. */
export function executionInputsArg(tx: TransactionBuilder, objects: NexusObjects, inputs: ExecutionInputs): Argument {
  const pkg = objects.workflowPkgId;
  const innerTypes = [identType(pkg, workflow.dag.InputPort), identType(objects.primitivesPkgId, primitives.data.NexusData)];
  const outerTypes = [
    identType(pkg, workflow.dag.Vertex),
    structType(SUI_FRAMEWORK_PACKAGE_ID, suiFramework.vecMap.VecMap.module, suiFramework.vecMap.VecMap.name, innerTypes),
  ];

  const outer = callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.vecMap.empty, [], outerTypes);
  for (const [vertexName, ports] of inputs) {
    const vertex = vertexArg(tx, pkg, vertexName);
    const inner = callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.vecMap.empty, [], innerTypes);
    for (const [portName, value] of ports) {
      const port = inputPortArg(tx, pkg, portName, value.encrypted);
      const data = nexusDataArg(tx, objects.primitivesPkgId, value);
      callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.vecMap.insert, [inner, port, data], innerTypes);
    }
    callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.vecMap.insert, [outer, vertex, inner], outerTypes);
  }
  return outer;
}

/** Begin executing a published DAG through the default TAP. */
export function execute(tx: TransactionBuilder, objects: NexusObjects, params: ExecuteParams): Argument {
  const pkg = objects.workflowPkgId;
  const tap = tx.sharedObject(sharedRef(objects.defaultTap, true));
  const dag = tx.sharedObject(sharedRef(params.dag, false));
  const gasService = tx.sharedObject(sharedRef(objects.gasService, true));
  const network = callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.object.idFromAddress, [
    tx.pureAddress(objects.networkId),
  ]);
  const entryGroup = entryGroupArg(tx, pkg, params.entryGroup);
  const inputs = executionInputsArg(tx, objects, params.inputs);

  return callIdent(tx, pkg, workflow.defaultTap.beginDagExecution, [
    tap,
    dag,
    gasService,
    network,
    entryGroup,
    inputs,
    tx.pureU64(params.priority),
    tx.clock(),
  ]);
}

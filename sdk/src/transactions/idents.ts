/**
 * Module and member names of the ledger packages the composer calls into.
 *
 * Framework packages live at fixed addresses; the workflow and primitives
 * package ids come from the deployment's {@link NexusObjects}.
 *
 * @module
 */

import { normalizeAddress, type Address } from "../types/address.js";
import { structType, type TypeTag } from "../types/type-tag.js";
import type { Argument } from "./bcs.js";
import type { TransactionBuilder } from "./builder.js";

export interface MoveIdent {
  module: string;
  name: string;
}

function ident(module: string, name: string): MoveIdent {
  return { module, name };
}

export const MOVE_STDLIB_PACKAGE_ID = normalizeAddress("0x1");
export const SUI_FRAMEWORK_PACKAGE_ID = normalizeAddress("0x2");

// ============================================================================
// Framework
// ============================================================================

export const moveStd = {
  ascii: {
    String: ident("ascii", "String"),
    string: ident("ascii", "string"),
  },
  string: {
    String: ident("string", "String"),
    utf8: ident("string", "utf8"),
  },
  vector: {
    empty: ident("vector", "empty"),
    pushBack: ident("vector", "push_back"),
  },
} as const;

export const suiFramework = {
  coin: {
    Coin: ident("coin", "Coin"),
    intoBalance: ident("coin", "into_balance"),
  },
  sui: {
    SUI: ident("sui", "SUI"),
  },
  object: {
    idFromAddress: ident("object", "id_from_address"),
  },
  tableVec: {
    empty: ident("table_vec", "empty"),
    pushBack: ident("table_vec", "push_back"),
    drop: ident("table_vec", "drop"),
  },
  transfer: {
    publicShareObject: ident("transfer", "public_share_object"),
    publicTransfer: ident("transfer", "public_transfer"),
  },
  vecMap: {
    VecMap: ident("vec_map", "VecMap"),
    empty: ident("vec_map", "empty"),
    insert: ident("vec_map", "insert"),
  },
} as const;

// ============================================================================
// Primitives package
// ============================================================================

export const primitives = {
  data: {
    NexusData: ident("data", "NexusData"),
    inlineOne: ident("data", "inline_one"),
    inlineOneEncrypted: ident("data", "inline_one_encrypted"),
    inlineMany: ident("data", "inline_many"),
    inlineManyEncrypted: ident("data", "inline_many_encrypted"),
    walrusOne: ident("data", "walrus_one"),
    walrusOneEncrypted: ident("data", "walrus_one_encrypted"),
    walrusMany: ident("data", "walrus_many"),
    walrusManyEncrypted: ident("data", "walrus_many_encrypted"),
  },
  ownerCap: {
    CloneableOwnerCap: ident("owner_cap", "CloneableOwnerCap"),
  },
  policy: {
    Symbol: ident("policy", "Symbol"),
    witnessSymbol: ident("policy", "witness_symbol"),
  },
} as const;

// ============================================================================
// Workflow package
// ============================================================================

export const workflow = {
  dag: {
    DAG: ident("dag", "DAG"),
    DAGExecution: ident("dag", "DAGExecution"),
    Vertex: ident("dag", "Vertex"),
    InputPort: ident("dag", "InputPort"),
    EntryGroup: ident("dag", "EntryGroup"),
    new: ident("dag", "new"),
    withVertex: ident("dag", "with_vertex"),
    withDefaultValue: ident("dag", "with_default_value"),
    withEdge: ident("dag", "with_edge"),
    withEncryptedEdge: ident("dag", "with_encrypted_edge"),
    withOutput: ident("dag", "with_output"),
    withEncryptedOutput: ident("dag", "with_encrypted_output"),
    withEntryPortInGroup: ident("dag", "with_entry_port_in_group"),
    vertexFromString: ident("dag", "vertex_from_string"),
    inputPortFromString: ident("dag", "input_port_from_string"),
    encryptedInputPortFromString: ident("dag", "encrypted_input_port_from_string"),
    outputPortFromString: ident("dag", "output_port_from_string"),
    outputVariantFromString: ident("dag", "output_variant_from_string"),
    entryGroupFromString: ident("dag", "entry_group_from_string"),
    vertexOffChain: ident("dag", "vertex_off_chain"),
    vertexOnChain: ident("dag", "vertex_on_chain"),
    edgeKindNormal: ident("dag", "edge_kind_normal"),
    edgeKindForEach: ident("dag", "edge_kind_for_each"),
    edgeKindCollect: ident("dag", "edge_kind_collect"),
    edgeKindDoWhile: ident("dag", "edge_kind_do_while"),
    edgeKindBreak: ident("dag", "edge_kind_break"),
    newDagExecutionConfig: ident("dag", "new_dag_execution_config"),
  },
  defaultTap: {
    beginDagExecution: ident("default_tap", "begin_dag_execution"),
    dagBeginExecutionFromScheduler: ident("default_tap", "dag_begin_execution_from_scheduler"),
    registerBeginExecution: ident("default_tap", "register_begin_execution"),
    BeginDagExecutionWitness: ident("default_tap", "BeginDagExecutionWitness"),
  },
  scheduler: {
    Task: ident("scheduler", "Task"),
    new: ident("scheduler", "new"),
    newMetadata: ident("scheduler", "new_metadata"),
    newConstraintsPolicy: ident("scheduler", "new_constraints_policy"),
    newExecutionPolicy: ident("scheduler", "new_execution_policy"),
    newQueueGeneratorState: ident("scheduler", "new_queue_generator_state"),
    newPeriodicGeneratorState: ident("scheduler", "new_periodic_generator_state"),
    registerQueueGenerator: ident("scheduler", "register_queue_generator"),
    registerPeriodicGenerator: ident("scheduler", "register_periodic_generator"),
    QueueGeneratorWitness: ident("scheduler", "QueueGeneratorWitness"),
    PeriodicGeneratorWitness: ident("scheduler", "PeriodicGeneratorWitness"),
    addOccurrenceAbsoluteForTask: ident("scheduler", "add_occurrence_absolute_for_task"),
    addOccurrenceRelativeForTask: ident("scheduler", "add_occurrence_relative_for_task"),
    newOrModifyPeriodicForTask: ident("scheduler", "new_or_modify_periodic_for_task"),
    disablePeriodicForTask: ident("scheduler", "disable_periodic_for_task"),
    pauseTimeConstraintForTask: ident("scheduler", "pause_time_constraint_for_task"),
    resumeTimeConstraintForTask: ident("scheduler", "resume_time_constraint_for_task"),
    cancelTimeConstraintForTask: ident("scheduler", "cancel_time_constraint_for_task"),
    checkQueueOccurrence: ident("scheduler", "check_queue_occurrence"),
    checkPeriodicOccurrence: ident("scheduler", "check_periodic_occurrence"),
    updateMetadata: ident("scheduler", "update_metadata"),
  },
  toolRegistry: {
    OverTool: ident("tool_registry", "OverTool"),
    registerOffChainTool: ident("tool_registry", "register_off_chain_tool"),
    registerOnChainTool: ident("tool_registry", "register_on_chain_tool"),
    onchainToolWitnessId: ident("tool_registry", "onchain_tool_witness_id"),
    unregisterTool: ident("tool_registry", "unregister_tool"),
    claimCollateralForSelf: ident("tool_registry", "claim_collateral_for_self"),
  },
  gas: {
    OverGas: ident("gas", "OverGas"),
    addGasBudget: ident("gas", "add_gas_budget"),
    scopeInvokerAddress: ident("gas", "scope_invoker_address"),
    deescalate: ident("gas", "deescalate"),
    setSingleInvocationCostMist: ident("gas", "set_single_invocation_cost_mist"),
  },
  gasExtension: {
    enableExpiry: ident("gas_extension", "enable_expiry"),
    disableExpiry: ident("gas_extension", "disable_expiry"),
    buyExpiryGasTicket: ident("gas_extension", "buy_expiry_gas_ticket"),
    enableLimitedInvocations: ident("gas_extension", "enable_limited_invocations"),
    disableLimitedInvocations: ident("gas_extension", "disable_limited_invocations"),
    buyLimitedInvocationsGasTicket: ident("gas_extension", "buy_limited_invocations_gas_ticket"),
  },
  networkAuth: {
    IdentityKey: ident("network_auth", "IdentityKey"),
    KeyBinding: ident("network_auth", "KeyBinding"),
    createBinding: ident("network_auth", "create_binding"),
    newProofOfKey: ident("network_auth", "new_proof_of_key"),
    proveLeader: ident("network_auth", "prove_leader"),
    proveOffchainTool: ident("network_auth", "prove_offchain_tool"),
    registerKey: ident("network_auth", "register_key"),
  },
} as const;

// ============================================================================
// Helpers
// ============================================================================

/** Struct type `<pkg>::<module>::<name><params>`. */
export function identType(pkg: Address, id: MoveIdent, typeParams: TypeTag[] = []): TypeTag {
  return structType(pkg, id.module, id.name, typeParams);
}

/** `0x2::sui::SUI` */
export const SUI_TYPE: TypeTag = identType(SUI_FRAMEWORK_PACKAGE_ID, suiFramework.sui.SUI);

/** `0x2::coin::Coin<0x2::sui::SUI>` */
export const SUI_COIN_TYPE: TypeTag = identType(SUI_FRAMEWORK_PACKAGE_ID, suiFramework.coin.Coin, [SUI_TYPE]);

/** Move call on `pkg::ident.module::ident.name`. */
export function callIdent(
  tx: TransactionBuilder,
  pkg: Address,
  id: MoveIdent,
  args: readonly Argument[] = [],
  typeArguments: readonly TypeTag[] = [],
): Argument {
  return tx.moveCall({ package: pkg, module: id.module, function: id.name, typeArguments, arguments: args });
}

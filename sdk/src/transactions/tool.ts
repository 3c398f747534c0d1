/**
 * Call templates for registering and managing tools in the tool registry.
 * @module
 */

import type { Address } from "../types/address.js";
import type { JsonValue } from "../types/nexus-data.js";
import { sharedRef, type NexusObjects } from "../types/nexus-objects.js";
import type { ObjectRef } from "../types/object.js";
import { formatToolFqn, type ToolFqn } from "../types/tool.js";
import type { TypeTag } from "../types/type-tag.js";
import type { Argument } from "./bcs.js";
import type { TransactionBuilder } from "./builder.js";
import { callIdent, identType, primitives, SUI_FRAMEWORK_PACKAGE_ID, suiFramework, workflow } from "./idents.js";

/** Description of an off-chain tool as registered. */
export interface ToolMeta {
  fqn: ToolFqn;
  url: string;
  description: string;
  inputSchema: JsonValue;
  outputSchema: JsonValue;
}

export interface OnChainToolMeta {
  fqn: ToolFqn;
  packageAddress: Address;
  moduleName: string;
  description: string;
  inputSchema: JsonValue;
  outputSchema: JsonValue;
  witnessId: Address;
}

function cloneableOwnerCapType(objects: NexusObjects, over: TypeTag): TypeTag {
  return identType(objects.primitivesPkgId, primitives.ownerCap.CloneableOwnerCap, [over]);
}

/** `CloneableOwnerCap<OverTool>` */
export function overToolCapType(objects: NexusObjects): TypeTag {
  return cloneableOwnerCapType(objects, identType(objects.workflowPkgId, workflow.toolRegistry.OverTool));
}

/** `CloneableOwnerCap<OverGas>` */
export function overGasCapType(objects: NexusObjects): TypeTag {
  return cloneableOwnerCapType(objects, identType(objects.workflowPkgId, workflow.gas.OverGas));
}

function transferTo(tx: TransactionBuilder, type: TypeTag, object: Argument, recipient: Argument): Argument {
  return callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.transfer.publicTransfer, [object, recipient], [type]);
}

/**
 * Register an off-chain tool paying `collateral`, set its per-invocation cost
 * and send both owner caps to `owner`.
 */
export function registerOffChainForSelf(
  tx: TransactionBuilder,
  objects: NexusObjects,
  meta: ToolMeta,
  owner: Address,
  collateral: ObjectRef,
  invocationCost: bigint,
): Argument {
  const pkg = objects.workflowPkgId;
  const registry = tx.sharedObject(sharedRef(objects.toolRegistry, true));
  const fqn = tx.pureAsciiString(formatToolFqn(meta.fqn));

  const overTool = callIdent(tx, pkg, workflow.toolRegistry.registerOffChainTool, [
    registry,
    fqn,
    tx.pureString(meta.url),
    tx.pureString(meta.description),
    tx.pureString(JSON.stringify(meta.inputSchema)),
    tx.pureString(JSON.stringify(meta.outputSchema)),
    tx.object(collateral),
    tx.clock(),
  ]);

  const overGas = callIdent(tx, pkg, workflow.gas.deescalate, [registry, overTool, fqn]);
  const gasService = tx.sharedObject(sharedRef(objects.gasService, true));
  callIdent(tx, pkg, workflow.gas.setSingleInvocationCostMist, [
    gasService,
    registry,
    overGas,
    fqn,
    tx.pureU64(invocationCost),
  ]);

  const recipient = tx.pureAddress(owner);
  transferTo(tx, overToolCapType(objects), overTool, recipient);
  return transferTo(tx, overGasCapType(objects), overGas, recipient);
}

/** Register an on-chain tool and send its owner cap to `owner`. */
export function registerOnChainForSelf(
  tx: TransactionBuilder,
  objects: NexusObjects,
  meta: OnChainToolMeta,
  owner: Address,
  collateral: ObjectRef,
): Argument {
  const registry = tx.sharedObject(sharedRef(objects.toolRegistry, true));
  const overTool = callIdent(tx, objects.workflowPkgId, workflow.toolRegistry.registerOnChainTool, [
    registry,
    tx.pureAddress(meta.packageAddress),
    tx.pureAsciiString(meta.moduleName),
    tx.pureString(JSON.stringify(meta.inputSchema)),
    tx.pureString(JSON.stringify(meta.outputSchema)),
    tx.pureAsciiString(formatToolFqn(meta.fqn)),
    tx.pureString(meta.description),
    tx.pureAddress(meta.witnessId),
    tx.object(collateral),
    tx.clock(),
  ]);
  return transferTo(tx, overToolCapType(objects), overTool, tx.pureAddress(owner));
}

/** `overGasCap` is a `CloneableOwnerCap<OverGas>` for the tool. */
export function setInvocationCost(
  tx: TransactionBuilder,
  objects: NexusObjects,
  fqn: ToolFqn,
  overGasCap: ObjectRef,
  invocationCost: bigint,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.gas.setSingleInvocationCostMist, [
    tx.sharedObject(sharedRef(objects.gasService, true)),
    tx.sharedObject(sharedRef(objects.toolRegistry, true)),
    tx.object(overGasCap),
    tx.pureAsciiString(formatToolFqn(fqn)),
    tx.pureU64(invocationCost),
  ]);
}

/** `overToolCap` is a `CloneableOwnerCap<OverTool>` for the tool. */
export function unregister(tx: TransactionBuilder, objects: NexusObjects, fqn: ToolFqn, overToolCap: ObjectRef): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.toolRegistry.unregisterTool, [
    tx.sharedObject(sharedRef(objects.toolRegistry, true)),
    tx.object(overToolCap),
    tx.pureAsciiString(formatToolFqn(fqn)),
    tx.clock(),
  ]);
}

/** Claim the tool's collateral; the funds go to the sender. */
export function claimCollateralForSelf(
  tx: TransactionBuilder,
  objects: NexusObjects,
  fqn: ToolFqn,
  overToolCap: ObjectRef,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.toolRegistry.claimCollateralForSelf, [
    tx.sharedObject(sharedRef(objects.toolRegistry, true)),
    tx.object(overToolCap),
    tx.pureAsciiString(formatToolFqn(fqn)),
    tx.clock(),
  ]);
}

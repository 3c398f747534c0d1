/**
 * Call templates for gas budgets and the tool gas extensions (expiry and
 * limited-invocation tickets).
 * @module
 */

import type { Address } from "../types/address.js";
import { sharedRef, type NexusObjects } from "../types/nexus-objects.js";
import type { ObjectRef } from "../types/object.js";
import { formatToolFqn, type ToolFqn } from "../types/tool.js";
import type { Argument } from "./bcs.js";
import type { TransactionBuilder } from "./builder.js";
import { callIdent, SUI_FRAMEWORK_PACKAGE_ID, SUI_TYPE, suiFramework, workflow } from "./idents.js";

function gasService(tx: TransactionBuilder, objects: NexusObjects): Argument {
  return tx.sharedObject(sharedRef(objects.gasService, true));
}

/** The gas extensions only read the registry. */
function toolRegistry(tx: TransactionBuilder, objects: NexusObjects): Argument {
  return tx.sharedObject(sharedRef(objects.toolRegistry, false));
}

/** Move the whole of `coin` into the gas budget of `invoker`. */
export function addBudget(tx: TransactionBuilder, objects: NexusObjects, invoker: Address, coin: ObjectRef): Argument {
  const service = gasService(tx, objects);
  const scope = callIdent(tx, objects.workflowPkgId, workflow.gas.scopeInvokerAddress, [tx.pureAddress(invoker)]);
  const balance = callIdent(tx, SUI_FRAMEWORK_PACKAGE_ID, suiFramework.coin.intoBalance, [tx.object(coin)], [SUI_TYPE]);
  return callIdent(tx, objects.workflowPkgId, workflow.gas.addGasBudget, [service, scope, balance]);
}

// ============================================================================
// Expiry extension
// ============================================================================

export function enableExpiry(
  tx: TransactionBuilder,
  objects: NexusObjects,
  fqn: ToolFqn,
  overGasCap: ObjectRef,
  costPerMinute: bigint,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.gasExtension.enableExpiry, [
    gasService(tx, objects),
    toolRegistry(tx, objects),
    tx.object(overGasCap),
    tx.pureU64(costPerMinute),
    tx.pureAsciiString(formatToolFqn(fqn)),
  ]);
}

export function disableExpiry(tx: TransactionBuilder, objects: NexusObjects, fqn: ToolFqn, overGasCap: ObjectRef): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.gasExtension.disableExpiry, [
    gasService(tx, objects),
    toolRegistry(tx, objects),
    tx.object(overGasCap),
    tx.pureAsciiString(formatToolFqn(fqn)),
  ]);
}

export function buyExpiryGasTicket(
  tx: TransactionBuilder,
  objects: NexusObjects,
  fqn: ToolFqn,
  minutes: bigint,
  payWith: ObjectRef,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.gasExtension.buyExpiryGasTicket, [
    gasService(tx, objects),
    toolRegistry(tx, objects),
    tx.pureAsciiString(formatToolFqn(fqn)),
    tx.pureU64(minutes),
    tx.object(payWith),
    tx.clock(),
  ]);
}

// ============================================================================
// Limited invocations extension
// ============================================================================

export interface LimitedInvocationsParams {
  costPerInvocation: bigint;
  minInvocations: bigint;
  maxInvocations: bigint;
}

export function enableLimitedInvocations(
  tx: TransactionBuilder,
  objects: NexusObjects,
  fqn: ToolFqn,
  overGasCap: ObjectRef,
  params: LimitedInvocationsParams,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.gasExtension.enableLimitedInvocations, [
    gasService(tx, objects),
    toolRegistry(tx, objects),
    tx.object(overGasCap),
    tx.pureU64(params.costPerInvocation),
    tx.pureU64(params.minInvocations),
    tx.pureU64(params.maxInvocations),
    tx.pureAsciiString(formatToolFqn(fqn)),
  ]);
}

export function disableLimitedInvocations(
  tx: TransactionBuilder,
  objects: NexusObjects,
  fqn: ToolFqn,
  overGasCap: ObjectRef,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.gasExtension.disableLimitedInvocations, [
    gasService(tx, objects),
    toolRegistry(tx, objects),
    tx.object(overGasCap),
    tx.pureAsciiString(formatToolFqn(fqn)),
  ]);
}

export function buyLimitedInvocationsGasTicket(
  tx: TransactionBuilder,
  objects: NexusObjects,
  fqn: ToolFqn,
  invocations: bigint,
  payWith: ObjectRef,
): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.gasExtension.buyLimitedInvocationsGasTicket, [
    gasService(tx, objects),
    toolRegistry(tx, objects),
    tx.pureAsciiString(formatToolFqn(fqn)),
    tx.pureU64(invocations),
    tx.object(payWith),
    tx.clock(),
  ]);
}

/**
 * Tool registry actions.
 * @module
 */

import * as toolTx from "../transactions/tool.js";
import type { OnChainToolMeta, ToolMeta } from "../transactions/tool.js";
import type { Address } from "../types/address.js";
import type { ToolFqn } from "../types/tool.js";
import { findCreatedObjectOfType, type NexusClient } from "./client.js";

export interface RegisterOffChainParams {
  meta: ToolMeta;
  /** Coin paid as collateral */
  collateralCoin: Address;
  /** Cost of a single invocation, in MIST */
  invocationCost: bigint;
}

export interface RegisterOffChainResult {
  txDigest: string;
  overToolCapId?: Address;
  overGasCapId?: Address;
}

export interface RegisterOnChainResult {
  txDigest: string;
  overToolCapId?: Address;
}

export class ToolActions {
  constructor(private readonly client: NexusClient) {}

  async registerOffChain(params: RegisterOffChainParams): Promise<RegisterOffChainResult> {
    const { objects } = this.client;
    const collateral = await this.client.ownedObjectRef(params.collateralCoin);
    const result = await this.client.submit((tx) => {
      toolTx.registerOffChainForSelf(tx, objects, params.meta, this.client.address, collateral, params.invocationCost);
    });
    return {
      txDigest: result.digest,
      overToolCapId: findCreatedObjectOfType(result.objectChanges, toolTx.overToolCapType(objects)),
      overGasCapId: findCreatedObjectOfType(result.objectChanges, toolTx.overGasCapType(objects)),
    };
  }

  async registerOnChain(meta: OnChainToolMeta, collateralCoin: Address): Promise<RegisterOnChainResult> {
    const { objects } = this.client;
    const collateral = await this.client.ownedObjectRef(collateralCoin);
    const result = await this.client.submit((tx) => {
      toolTx.registerOnChainForSelf(tx, objects, meta, this.client.address, collateral);
    });
    return {
      txDigest: result.digest,
      overToolCapId: findCreatedObjectOfType(result.objectChanges, toolTx.overToolCapType(objects)),
    };
  }

  async setInvocationCost(fqn: ToolFqn, overGasCap: Address, invocationCost: bigint): Promise<{ txDigest: string }> {
    const { objects } = this.client;
    const cap = await this.client.ownedObjectRef(overGasCap);
    const result = await this.client.submit((tx) => {
      toolTx.setInvocationCost(tx, objects, fqn, cap, invocationCost);
    });
    return { txDigest: result.digest };
  }

  async unregister(fqn: ToolFqn, overToolCap: Address): Promise<{ txDigest: string }> {
    const { objects } = this.client;
    const cap = await this.client.ownedObjectRef(overToolCap);
    const result = await this.client.submit((tx) => {
      toolTx.unregister(tx, objects, fqn, cap);
    });
    return { txDigest: result.digest };
  }

  /** Claim the collateral of an unregistered tool back to the sender. */
  async claimCollateral(fqn: ToolFqn, overToolCap: Address): Promise<{ txDigest: string }> {
    const { objects } = this.client;
    const cap = await this.client.ownedObjectRef(overToolCap);
    const result = await this.client.submit((tx) => {
      toolTx.claimCollateralForSelf(tx, objects, fqn, cap);
    });
    return { txDigest: result.digest };
  }
}

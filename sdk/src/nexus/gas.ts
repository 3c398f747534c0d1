/**
 * Gas budget and tool gas-ticket actions.
 * @module
 */

import * as gasTx from "../transactions/gas.js";
import type { LimitedInvocationsParams } from "../transactions/gas.js";
import type { Address } from "../types/address.js";
import type { ToolFqn } from "../types/tool.js";
import type { NexusClient } from "./client.js";

export interface GasActionResult {
  txDigest: string;
}

export class GasActions {
  constructor(private readonly client: NexusClient) {}

  /** Move all of `coin` into the sender's gas budget. */
  async addBudget(coin: Address): Promise<GasActionResult> {
    const { objects } = this.client;
    const coinRef = await this.client.ownedObjectRef(coin);
    const result = await this.client.submit((tx) => {
      gasTx.addBudget(tx, objects, this.client.address, coinRef);
    });
    return { txDigest: result.digest };
  }

  async enableExpiry(fqn: ToolFqn, overGasCap: Address, costPerMinute: bigint): Promise<GasActionResult> {
    const { objects } = this.client;
    const cap = await this.client.ownedObjectRef(overGasCap);
    const result = await this.client.submit((tx) => {
      gasTx.enableExpiry(tx, objects, fqn, cap, costPerMinute);
    });
    return { txDigest: result.digest };
  }

  async disableExpiry(fqn: ToolFqn, overGasCap: Address): Promise<GasActionResult> {
    const { objects } = this.client;
    const cap = await this.client.ownedObjectRef(overGasCap);
    const result = await this.client.submit((tx) => {
      gasTx.disableExpiry(tx, objects, fqn, cap);
    });
    return { txDigest: result.digest };
  }

  async buyExpiryTicket(fqn: ToolFqn, minutes: bigint, payWith: Address): Promise<GasActionResult> {
    const { objects } = this.client;
    const coin = await this.client.ownedObjectRef(payWith);
    const result = await this.client.submit((tx) => {
      gasTx.buyExpiryGasTicket(tx, objects, fqn, minutes, coin);
    });
    return { txDigest: result.digest };
  }

  async enableLimitedInvocations(
    fqn: ToolFqn,
    overGasCap: Address,
    params: LimitedInvocationsParams,
  ): Promise<GasActionResult> {
    const { objects } = this.client;
    const cap = await this.client.ownedObjectRef(overGasCap);
    const result = await this.client.submit((tx) => {
      gasTx.enableLimitedInvocations(tx, objects, fqn, cap, params);
    });
    return { txDigest: result.digest };
  }

  async disableLimitedInvocations(fqn: ToolFqn, overGasCap: Address): Promise<GasActionResult> {
    const { objects } = this.client;
    const cap = await this.client.ownedObjectRef(overGasCap);
    const result = await this.client.submit((tx) => {
      gasTx.disableLimitedInvocations(tx, objects, fqn, cap);
    });
    return { txDigest: result.digest };
  }

  async buyLimitedInvocationsTicket(fqn: ToolFqn, invocations: bigint, payWith: Address): Promise<GasActionResult> {
    const { objects } = this.client;
    const coin = await this.client.ownedObjectRef(payWith);
    const result = await this.client.submit((tx) => {
      gasTx.buyLimitedInvocationsGasTicket(tx, objects, fqn, invocations, coin);
    });
    return { txDigest: result.digest };
  }
}

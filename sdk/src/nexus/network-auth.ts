/**
 * Message-signing key bindings for tools and leaders.
 *
 * A binding's `next_key_id` is part of the proof-of-possession message, so a
 * proof signed for one registration cannot be replayed for the next.
 * Tools never read the ledger at runtime: operators export the leaders'
 * active keys to an allowlist file with {@link NetworkAuthActions.writeAllowedLeadersFile}.
 *
 * @module
 */

import { writeFile } from "node:fs/promises";
import { z } from "zod";
import { tableSchema } from "../crawler/collections.js";
import type { ValueMap } from "../crawler/value-map.js";
import type { Ed25519Keypair } from "../crypto/ed25519.js";
import { errorMessage, ObjectNotFoundError, ParsingError, RpcError } from "../errors.js";
import * as networkAuthTx from "../transactions/network-auth.js";
import { bindingObjectId, KEY_SCHEME_ED25519, popMessageV1, type IdentityKey } from "../transactions/network-auth.js";
import type { Address } from "../types/address.js";
import {
  ALLOWED_LEADERS_FILE_VERSION,
  emitAllowedLeadersFile,
  type AllowedLeader,
  type AllowedLeadersFile,
} from "../types/allowed-leaders.js";
import { bytesSchema, optionU64Schema, u64Schema } from "../types/codecs.js";
import type { ObjectRef } from "../types/object.js";
import type { ToolFqn } from "../types/tool.js";
import { bytesToHex } from "../utils/encoding.js";
import { toNumber } from "../utils/numeric.js";
import type { NexusClient } from "./client.js";

export const keyBindingSchema = z.object({
  next_key_id: u64Schema,
  active_key_id: optionU64Schema,
  keys: tableSchema,
});

export type KeyBinding = z.infer<typeof keyBindingSchema>;

export const keyRecordSchema = z.object({
  scheme: z.number().int().min(0).max(255),
  public_key: bytesSchema,
  added_at_ms: u64Schema,
  revoked_at_ms: optionU64Schema,
});

export type KeyRecord = z.infer<typeof keyRecordSchema>;

export interface RegisteredKey {
  txDigest: string;
  /** Key id to put in signed-HTTP claims */
  kid: bigint;
  publicKey: Uint8Array;
  bindingObjectId: Address;
}

export interface RegisteredToolKey extends RegisteredKey {
  toolId: ToolFqn;
}

export interface RegisteredLeaderKey extends RegisteredKey {
  leaderId: Address;
}

interface ExistingBinding {
  ref: ObjectRef;
  nextKeyId: bigint;
}

export class NetworkAuthActions {
  constructor(private readonly client: NexusClient) {}

  // ==========================================================================
  // Tools
  // ==========================================================================

  /** Register the tool's key, creating its binding on first use. */
  async registerToolMessageKey(
    fqn: ToolFqn,
    ownerCapOverTool: Address,
    signingKey: Ed25519Keypair,
    description?: string,
  ): Promise<RegisteredToolKey> {
    const identity: IdentityKey = { kind: "tool", fqn };
    const existing = await this.findBinding(bindingObjectId(this.client.objects, identity));
    return existing === undefined
      ? this.createToolBinding(fqn, ownerCapOverTool, signingKey, description)
      : this.rotateToolKey(fqn, ownerCapOverTool, signingKey);
  }

  async createToolBinding(
    fqn: ToolFqn,
    ownerCapOverTool: Address,
    signingKey: Ed25519Keypair,
    description?: string,
  ): Promise<RegisteredToolKey> {
    const { objects } = this.client;
    const identity: IdentityKey = { kind: "tool", fqn };
    const ownerCap = await this.ownerCapRef(ownerCapOverTool);
    const key = this.proveKey(identity, 0n, signingKey);

    const result = await this.client.submit((tx) => {
      networkAuthTx.createToolBindingAndRegisterKey(tx, objects, fqn, ownerCap, key, this.client.address, description);
    });
    return { ...this.registered(result.digest, identity, 0n, key.publicKey), toolId: fqn };
  }

  /** Register a new key on the tool's existing binding. */
  async rotateToolKey(fqn: ToolFqn, ownerCapOverTool: Address, signingKey: Ed25519Keypair): Promise<RegisteredToolKey> {
    const { objects } = this.client;
    const identity: IdentityKey = { kind: "tool", fqn };
    const binding = await this.requireBinding(identity);
    const ownerCap = await this.ownerCapRef(ownerCapOverTool);
    const key = this.proveKey(identity, binding.nextKeyId, signingKey);

    const result = await this.client.submit((tx) => {
      networkAuthTx.registerToolKeyOnExistingBinding(tx, objects, fqn, ownerCap, binding.ref, key);
    });
    return { ...this.registered(result.digest, identity, binding.nextKeyId, key.publicKey), toolId: fqn };
  }

  // ==========================================================================
  // Leaders
  // ==========================================================================

  /** `leaderCap` is the shared leader capability object proving the sender leads. */
  async createLeaderBinding(
    leaderCap: Address,
    signingKey: Ed25519Keypair,
    description?: string,
  ): Promise<RegisteredLeaderKey> {
    const { objects } = this.client;
    const identity: IdentityKey = { kind: "leader", address: this.client.address };
    const cap = await this.client.sharedObjectRef(leaderCap);
    const key = this.proveKey(identity, 0n, signingKey);

    const result = await this.client.submit((tx) => {
      networkAuthTx.createLeaderBindingAndRegisterKey(tx, objects, cap, key, this.client.address, description);
    });
    return { ...this.registered(result.digest, identity, 0n, key.publicKey), leaderId: identity.address };
  }

  async rotateLeaderKey(leaderCap: Address, signingKey: Ed25519Keypair): Promise<RegisteredLeaderKey> {
    const { objects } = this.client;
    const identity: IdentityKey = { kind: "leader", address: this.client.address };
    const binding = await this.requireBinding(identity);
    const cap = await this.client.sharedObjectRef(leaderCap);
    const key = this.proveKey(identity, binding.nextKeyId, signingKey);

    const result = await this.client.submit((tx) => {
      networkAuthTx.registerLeaderKeyOnExistingBinding(tx, objects, cap, binding.ref, key);
    });
    return { ...this.registered(result.digest, identity, binding.nextKeyId, key.publicKey), leaderId: identity.address };
  }

  // ==========================================================================
  // Allowlist export
  // ==========================================================================

  /**
   * The active key of each leader, ready to hand to a tool.
   *
   * @throws ParsingError when a leader has no usable active key
   */
  async exportAllowedLeadersFile(leaders: readonly Address[]): Promise<AllowedLeadersFile> {
    const out: AllowedLeader[] = [];
    for (const leader of leaders) {
      const id = bindingObjectId(this.client.objects, { kind: "leader", address: leader });

      let binding: KeyBinding;
      try {
        binding = (await this.client.crawler.getObject(id, keyBindingSchema)).data;
      } catch (error) {
        throw new RpcError(`failed to fetch leader KeyBinding (${id}): ${errorMessage(error)}`, undefined, error);
      }
      const activeKid = binding.active_key_id;
      if (activeKid === undefined) {
        throw new ParsingError(`leader binding ${id} has no active key`);
      }

      let records: ValueMap<bigint, KeyRecord>;
      try {
        records = await this.client.crawler.getDynamicFields(binding.keys, u64Schema, keyRecordSchema);
      } catch (error) {
        throw new RpcError(`failed to fetch leader key records (${id}): ${errorMessage(error)}`, undefined, error);
      }
      const record = records.get(activeKid);
      if (record === undefined) {
        throw new ParsingError(`leader binding ${id} missing active key record kid=${activeKid}`);
      }
      if (record.public_key.length !== 32) {
        throw new ParsingError(`leader binding ${id} active key is not 32 bytes`);
      }
      if (record.scheme !== KEY_SCHEME_ED25519) {
        throw new ParsingError(`leader binding ${id} active key uses unsupported scheme ${record.scheme}`);
      }

      out.push({ leaderId: leader, keys: [{ kid: toNumber(activeKid), publicKey: bytesToHex(record.public_key) }] });
    }
    return { version: ALLOWED_LEADERS_FILE_VERSION, leaders: out };
  }

  /** Export and write the allowlist to `path` as pretty JSON. */
  async writeAllowedLeadersFile(leaders: readonly Address[], path: string): Promise<void> {
    const file = await this.exportAllowedLeadersFile(leaders);
    await writeFile(path, JSON.stringify(emitAllowedLeadersFile(file), null, 2));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private proveKey(identity: IdentityKey, keyId: bigint, signingKey: Ed25519Keypair): networkAuthTx.KeyRegistration {
    const publicKey = signingKey.publicKeyBytes();
    return { publicKey, signature: signingKey.sign(popMessageV1(identity, keyId, publicKey)) };
  }

  private registered(txDigest: string, identity: IdentityKey, kid: bigint, publicKey: Uint8Array): RegisteredKey {
    return { txDigest, kid, publicKey, bindingObjectId: bindingObjectId(this.client.objects, identity) };
  }

  private async ownerCapRef(ownerCap: Address): Promise<ObjectRef> {
    try {
      return await this.client.ownedObjectRef(ownerCap);
    } catch (error) {
      throw new RpcError(`failed to fetch OwnerCap metadata (${ownerCap}): ${errorMessage(error)}`, undefined, error);
    }
  }

  private async findBinding(id: Address): Promise<ExistingBinding | undefined> {
    try {
      const response = await this.client.crawler.getObject(id, keyBindingSchema);
      return { ref: response.objectRef(), nextKeyId: response.data.next_key_id };
    } catch (error) {
      if (error instanceof ObjectNotFoundError) return undefined;
      throw error;
    }
  }

  private async requireBinding(identity: IdentityKey): Promise<ExistingBinding> {
    const id = bindingObjectId(this.client.objects, identity);
    const binding = await this.findBinding(id);
    if (binding === undefined) throw new ObjectNotFoundError(id);
    return binding;
  }
}

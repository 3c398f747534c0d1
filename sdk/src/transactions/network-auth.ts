/**
 * Call templates for the network auth registry: message-signing key bindings
 * for leaders and off-chain tools.
 *
 * A binding is a derived object under the deployment's `network_auth` object,
 * keyed by the BCS encoding of an {@link IdentityKey}. Registering a key
 * requires a proof of possession: an Ed25519 signature over
 * {@link popMessageV1}.
 *
 * @module
 */

import { bcs } from "@mysten/bcs";
import { blake2b } from "@noble/hashes/blake2b";
import { addressFromBytes, addressToBytes, type Address } from "../types/address.js";
import { sharedRef, type NexusObjects } from "../types/nexus-objects.js";
import type { ObjectRef } from "../types/object.js";
import { formatToolFqn, type ToolFqn } from "../types/tool.js";
import { structType } from "../types/type-tag.js";
import { concatBytes, utf8 } from "../utils/encoding.js";
import { AddressBcs, TypeTagBcs, type Argument } from "./bcs.js";
import type { TransactionBuilder } from "./builder.js";
import { callIdent, identType, SUI_FRAMEWORK_PACKAGE_ID, workflow } from "./idents.js";

/** Scheme byte of Ed25519 keys in a key record. */
export const KEY_SCHEME_ED25519 = 0;

/** Domain separator prefixed to every proof-of-possession message. */
export const POP_V1_DOMAIN = "nexus_workflow.network_auth.pop_v1";

export type IdentityKey = { kind: "leader"; address: Address } | { kind: "tool"; fqn: ToolFqn };

const IdentityKeyEnumBcs = bcs.enum("IdentityKey", {
  Leader: bcs.struct("Leader", { address: AddressBcs }),
  Tool: bcs.struct("Tool", { fqn: bcs.string() }),
});

/** BCS encoding of an identity key, as the registry keys bindings. */
export function identityKeyBytes(key: IdentityKey): Uint8Array {
  const value =
    key.kind === "leader" ? { Leader: { address: key.address } } : { Tool: { fqn: formatToolFqn(key.fqn) } };
  return IdentityKeyEnumBcs.serialize(value).toBytes();
}

/**
 * Message signed by the key being registered:
 * `domain || bcs(identity) || bcs(u64 key id) || public key`.
 */
export function popMessageV1(identity: IdentityKey, keyId: bigint, publicKey: Uint8Array): Uint8Array {
  return concatBytes(
    utf8(POP_V1_DOMAIN),
    identityKeyBytes(identity),
    bcs.u64().serialize(keyId).toBytes(),
    publicKey,
  );
}

// ============================================================================
// Derived binding ids
// ============================================================================

const CHILD_OBJECT_ID_SCOPE = 0xf0;

/**
 * Object id of the binding for `identity`. Derived objects are dynamic fields
 * of the parent keyed by `0x2::derived_object::DerivedObjectKey<IdentityKey>`.
 */
export function bindingObjectId(objects: NexusObjects, identity: IdentityKey): Address {
  const key = identityKeyBytes(identity);
  const keyType = structType(SUI_FRAMEWORK_PACKAGE_ID, "derived_object", "DerivedObjectKey", [
    identType(objects.workflowPkgId, workflow.networkAuth.IdentityKey),
  ]);
  const hash = blake2b(
    concatBytes(
      Uint8Array.of(CHILD_OBJECT_ID_SCOPE),
      addressToBytes(objects.networkAuth.objectId),
      bcs.u64().serialize(BigInt(key.length)).toBytes(),
      key,
      TypeTagBcs.serialize(keyType).toBytes(),
    ),
    { dkLen: 32 },
  );
  return addressFromBytes(hash);
}

// ============================================================================
// Templates
// ============================================================================

/** Signed key material for one `register_key` call. */
export interface KeyRegistration {
  publicKey: Uint8Array;
  signature: Uint8Array;
}

function networkAuth(tx: TransactionBuilder, objects: NexusObjects): Argument {
  return tx.sharedObject(sharedRef(objects.networkAuth, true));
}

function proveTool(tx: TransactionBuilder, objects: NexusObjects, fqn: ToolFqn, ownerCap: ObjectRef): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.networkAuth.proveOffchainTool, [
    tx.sharedObject(sharedRef(objects.toolRegistry, false)),
    tx.object(ownerCap),
    tx.pureAsciiString(formatToolFqn(fqn)),
  ]);
}

function proveLeader(tx: TransactionBuilder, objects: NexusObjects, leaderCap: ObjectRef): Argument {
  return callIdent(tx, objects.workflowPkgId, workflow.networkAuth.proveLeader, [
    tx.sharedObject(sharedRef(leaderCap, false)),
  ]);
}

function registerKey(
  tx: TransactionBuilder,
  objects: NexusObjects,
  binding: Argument,
  proof: Argument,
  key: KeyRegistration,
): Argument {
  const pkg = objects.workflowPkgId;
  const pok = callIdent(tx, pkg, workflow.networkAuth.newProofOfKey, [
    binding,
    proof,
    tx.pureBytes(key.publicKey),
    tx.pureBytes(key.signature),
  ]);
  return callIdent(tx, pkg, workflow.networkAuth.registerKey, [binding, proof, pok, tx.clock()]);
}

function createBindingAndRegister(
  tx: TransactionBuilder,
  objects: NexusObjects,
  prove: () => Argument,
  key: KeyRegistration,
  sender: Address,
  description: string | undefined,
): Argument {
  const binding = callIdent(tx, objects.workflowPkgId, workflow.networkAuth.createBinding, [
    networkAuth(tx, objects),
    prove(),
    tx.pureOptionBytes(description === undefined ? undefined : utf8(description)),
  ]);
  // The proof is consumed by create_binding.
  registerKey(tx, objects, binding, prove(), key);
  return tx.transferObjects([binding], tx.pureAddress(sender));
}

/**
 * Create the binding for an off-chain tool, register its first key and
 * hand the binding to `sender`.
 */
export function createToolBindingAndRegisterKey(
  tx: TransactionBuilder,
  objects: NexusObjects,
  fqn: ToolFqn,
  ownerCap: ObjectRef,
  key: KeyRegistration,
  sender: Address,
  description?: string,
): Argument {
  return createBindingAndRegister(tx, objects, () => proveTool(tx, objects, fqn, ownerCap), key, sender, description);
}

/** Rotate the key on a binding the sender already owns. */
export function registerToolKeyOnExistingBinding(
  tx: TransactionBuilder,
  objects: NexusObjects,
  fqn: ToolFqn,
  ownerCap: ObjectRef,
  binding: ObjectRef,
  key: KeyRegistration,
): Argument {
  return registerKey(tx, objects, tx.object(binding), proveTool(tx, objects, fqn, ownerCap), key);
}

export function createLeaderBindingAndRegisterKey(
  tx: TransactionBuilder,
  objects: NexusObjects,
  leaderCap: ObjectRef,
  key: KeyRegistration,
  sender: Address,
  description?: string,
): Argument {
  return createBindingAndRegister(tx, objects, () => proveLeader(tx, objects, leaderCap), key, sender, description);
}

export function registerLeaderKeyOnExistingBinding(
  tx: TransactionBuilder,
  objects: NexusObjects,
  leaderCap: ObjectRef,
  binding: ObjectRef,
  key: KeyRegistration,
): Argument {
  return registerKey(tx, objects, tx.object(binding), proveLeader(tx, objects, leaderCap), key);
}

/**
 * Ledger object references and ownership.
 * @module
 */

import type { Address } from "./address.js";

/** Object reference triple used for owned-object transaction inputs. */
export interface ObjectRef {
  objectId: Address;
  version: bigint;
  /** Base58 content digest */
  digest: string;
}

export type Owner =
  | { kind: "address"; address: Address }
  | { kind: "object"; address: Address }
  | { kind: "shared"; initialVersion: bigint }
  | { kind: "immutable" };

/**
 * Handle for a shared object input. `initialSharedVersion` is the version at
 * which the object became shared, not its current version.
 */
export interface SharedObjectRef {
  objectId: Address;
  initialSharedVersion: bigint;
  mutable: boolean;
}

export function isSharedOwner(owner: Owner): owner is { kind: "shared"; initialVersion: bigint } {
  return owner.kind === "shared";
}

export function describeOwner(owner: Owner): string {
  switch (owner.kind) {
    case "address":
      return `address ${owner.address}`;
    case "object":
      return `object ${owner.address}`;
    case "shared":
      return `shared (initial version ${owner.initialVersion})`;
    case "immutable":
      return "immutable";
  }
}

import type { Address } from "../types/address.js";
import { isSharedOwner, type ObjectRef, type Owner, type SharedObjectRef } from "../types/object.js";

/** A fetched object with its metadata. */
export class Response<T> {
  constructor(
    readonly objectId: Address,
    readonly owner: Owner,
    readonly version: bigint,
    readonly data: T,
    readonly digest: string,
    readonly balance?: bigint,
  ) {}

  isShared(): boolean {
    return isSharedOwner(this.owner);
  }

  /** Initial shared version for shared objects, current version otherwise. */
  getInitialVersion(): bigint {
    return isSharedOwner(this.owner) ? this.owner.initialVersion : this.version;
  }

  objectRef(): ObjectRef {
    return { objectId: this.objectId, version: this.version, digest: this.digest };
  }

  sharedRef(mutable: boolean): SharedObjectRef {
    return { objectId: this.objectId, initialSharedVersion: this.getInitialVersion(), mutable };
  }

  /** Same metadata, different payload. */
  withData<U>(data: U): Response<U> {
    return new Response(this.objectId, this.owner, this.version, data, this.digest, this.balance);
  }
}

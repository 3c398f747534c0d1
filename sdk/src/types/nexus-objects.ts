/**
 * Object ids and references produced by a Nexus deployment.
 * @module
 */

import { z } from "zod";
import { addressSchema, type Address } from "./address.js";
import type { ObjectRef, SharedObjectRef } from "./object.js";
import { u64Schema } from "./codecs.js";
import type { StructTag } from "./type-tag.js";

/**
 * Deployment configuration. Shared objects carry their initial shared version
 * in `version`.
 */
export interface NexusObjects {
  workflowPkgId: Address;
  primitivesPkgId: Address;
  interfacePkgId: Address;
  networkId: Address;
  toolRegistry: ObjectRef;
  defaultTap: ObjectRef;
  gasService: ObjectRef;
  preKeyVault: ObjectRef;
  networkAuth: ObjectRef;
}

const objectRefSchema = z
  .object({
    object_id: addressSchema,
    version: u64Schema,
    digest: z.string().min(1),
  })
  .transform((v): ObjectRef => ({ objectId: v.object_id, version: v.version, digest: v.digest }));

export const nexusObjectsSchema = z
  .object({
    workflow_pkg_id: addressSchema,
    primitives_pkg_id: addressSchema,
    interface_pkg_id: addressSchema,
    network_id: addressSchema,
    tool_registry: objectRefSchema,
    default_tap: objectRefSchema,
    gas_service: objectRefSchema,
    pre_key_vault: objectRefSchema,
    network_auth: objectRefSchema,
  })
  .transform(
    (v): NexusObjects => ({
      workflowPkgId: v.workflow_pkg_id,
      primitivesPkgId: v.primitives_pkg_id,
      interfacePkgId: v.interface_pkg_id,
      networkId: v.network_id,
      toolRegistry: v.tool_registry,
      defaultTap: v.default_tap,
      gasService: v.gas_service,
      preKeyVault: v.pre_key_vault,
      networkAuth: v.network_auth,
    }),
  );

/**
 * Validate a deployment description (snake_case keys, as written by the
 * deployment tooling).
 */
export function parseNexusObjects(json: unknown): NexusObjects {
  return nexusObjectsSchema.parse(json);
}

/** Shared-object input handle for one of the deployment's shared objects. */
export function sharedRef(ref: ObjectRef, mutable: boolean): SharedObjectRef {
  return { objectId: ref.objectId, initialSharedVersion: ref.version, mutable };
}

/**
 * Whether an event type parameter originates from this deployment: either a
 * workflow package event, or an interface announcement whose witness is
 * defined in the workflow package.
 */
export function isEventFromNexus(objects: NexusObjects, inner: StructTag): boolean {
  if (inner.address === objects.workflowPkgId) return true;
  if (inner.address === objects.interfacePkgId && inner.module === "v1" && inner.name === "AnnounceInterfacePackageEvent") {
    const witness = inner.typeParams[0];
    return witness !== undefined && witness.kind === "struct" && witness.struct.address === objects.workflowPkgId;
  }
  return false;
}

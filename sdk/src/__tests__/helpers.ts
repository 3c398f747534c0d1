import { normalizeAddress } from "../types/address.js";
import type { NexusObjects } from "../types/nexus-objects.js";
import type { ObjectRef } from "../types/object.js";

export function ref(id: string, version = 1n, digest = "11111111111111111111111111111111"): ObjectRef {
  return { objectId: normalizeAddress(id), version, digest };
}

export const testObjects: NexusObjects = {
  workflowPkgId: normalizeAddress("0xf1"),
  primitivesPkgId: normalizeAddress("0xf2"),
  interfacePkgId: normalizeAddress("0xf3"),
  networkId: normalizeAddress("0xf4"),
  toolRegistry: ref("0x101", 3n),
  defaultTap: ref("0x102", 4n),
  gasService: ref("0x103", 5n),
  preKeyVault: ref("0x104", 6n),
  networkAuth: ref("0x105", 7n),
};

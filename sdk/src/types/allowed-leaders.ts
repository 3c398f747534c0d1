/**
 * Tool-side allowlist of leader signing keys, as written by the export
 * action and read by the signed-HTTP responder.
 *
 * ```json
 * { "version": 1, "leaders": [{ "leader_id": "0x..", "keys": [{ "kid": 0, "public_key": "<64 hex>" }] }] }
 * ```
 *
 * @module
 */

import { z } from "zod";
import { addressSchema, type Address } from "./address.js";

export const ALLOWED_LEADERS_FILE_VERSION = 1;

export interface AllowedLeaderKey {
  kid: number;
  /** 32-byte Ed25519 public key, lowercase hex */
  publicKey: string;
}

export interface AllowedLeader {
  leaderId: Address;
  keys: AllowedLeaderKey[];
}

export interface AllowedLeadersFile {
  version: typeof ALLOWED_LEADERS_FILE_VERSION;
  leaders: AllowedLeader[];
}

export const allowedLeadersFileSchema: z.ZodType<AllowedLeadersFile, z.ZodTypeDef, unknown> = z
  .object({
    version: z.literal(ALLOWED_LEADERS_FILE_VERSION),
    leaders: z.array(
      z.object({
        leader_id: addressSchema,
        keys: z.array(
          z.object({
            kid: z.number().int().nonnegative(),
            public_key: z.string().regex(/^[0-9a-fA-F]{64}$/, "public_key must be 32 bytes of hex"),
          }),
        ),
      }),
    ),
  })
  .transform((file) => ({
    version: file.version,
    leaders: file.leaders.map((leader) => ({
      leaderId: leader.leader_id,
      keys: leader.keys.map((key) => ({ kid: key.kid, publicKey: key.public_key.toLowerCase() })),
    })),
  }));

/** The file's JSON form. */
export function emitAllowedLeadersFile(file: AllowedLeadersFile): Record<string, unknown> {
  return {
    version: file.version,
    leaders: file.leaders.map((leader) => ({
      leader_id: leader.leaderId,
      keys: leader.keys.map((key) => ({ kid: key.kid, public_key: key.publicKey })),
    })),
  };
}

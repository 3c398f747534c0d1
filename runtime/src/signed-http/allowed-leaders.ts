/**
 * Tool-side allowlist of leader signing keys.
 *
 * The file is provisioned out of band (see the SDK's export action) and read
 * once at startup. Leader ids that parse as ledger addresses are normalized
 * so lookups match however the id was written.
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import {
  allowedLeadersFileSchema,
  formatZodIssues,
  hexToBytes,
  isValidAddress,
  normalizeAddress,
  type AllowedLeadersFile,
} from '@nexus-core/sdk';
import { SignedHttpError } from '../types/errors.js';
import { KeyTable, type InvokerKeyResolver } from './keys.js';

function leaderKey(leaderId: string): string {
  return isValidAddress(leaderId) ? normalizeAddress(leaderId) : leaderId;
}

export class AllowedLeaders implements InvokerKeyResolver {
  private readonly table = new KeyTable();

  private constructor(
    file: AllowedLeadersFile,
    readonly sourcePath?: string,
  ) {
    for (const leader of file.leaders) {
      for (const key of leader.keys) {
        this.table.set(leaderKey(leader.leaderId), key.kid, hexToBytes(key.publicKey));
      }
    }
  }

  static fromFile(file: AllowedLeadersFile, sourcePath?: string): AllowedLeaders {
    return new AllowedLeaders(file, sourcePath);
  }

  leaderIds(): string[] {
    return this.table.ids();
  }

  leaderPublicKey(leaderId: string, leaderKid: number): Uint8Array | undefined {
    return this.table.get(leaderKey(leaderId), leaderKid);
  }

  invokerPublicKey(invokerId: string, invokerKid: number): Uint8Array | undefined {
    return this.leaderPublicKey(invokerId, invokerKid);
  }
}

/** Validate already-parsed JSON as an allowlist. */
export function parseAllowedLeaders(json: unknown, sourcePath?: string): AllowedLeaders {
  const parsed = allowedLeadersFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new SignedHttpError({ kind: 'InvalidAllowedLeadersFile', reason: formatZodIssues(parsed.error).join('; ') });
  }
  return AllowedLeaders.fromFile(parsed.data, sourcePath);
}

export async function loadAllowedLeaders(path: string): Promise<AllowedLeaders> {
  const text = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SignedHttpError({ kind: 'InvalidAllowedLeadersFile', reason });
  }
  return parseAllowedLeaders(json, path);
}

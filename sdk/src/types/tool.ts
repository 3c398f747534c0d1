/**
 * Tool identifiers: fully-qualified names and tool locations.
 * @module
 */

import { z } from "zod";
import { normalizeAddress, type Address } from "./address.js";

// ============================================================================
// Fully-qualified tool name
// ============================================================================

/** `domain.name@version`, e.g. `xyz.weather.forecast@1` */
export interface ToolFqn {
  /** Dot-separated reverse-domain prefix */
  domain: string;
  name: string;
  version: number;
}

const SEGMENT = "[a-z0-9](?:[a-z0-9_-]*[a-z0-9])?";
const FQN_RE = new RegExp(`^(${SEGMENT}(?:\\.${SEGMENT})*)\\.(${SEGMENT})@([1-9][0-9]*)$`);

export function parseToolFqn(text: string): ToolFqn {
  const match = FQN_RE.exec(text.trim());
  if (!match) {
    throw new Error(`Invalid tool FQN "${text}", expected domain.name@version`);
  }
  const version = Number(match[3]);
  if (!Number.isSafeInteger(version)) {
    throw new Error(`Invalid tool FQN version in "${text}"`);
  }
  return { domain: match[1], name: match[2], version };
}

export function formatToolFqn(fqn: ToolFqn): string {
  return `${fqn.domain}.${fqn.name}@${fqn.version}`;
}

export function toolFqnEquals(a: ToolFqn, b: ToolFqn): boolean {
  return a.domain === b.domain && a.name === b.name && a.version === b.version;
}

/**
 * Ledger representation of an FQN is an ASCII string, sometimes wrapped as
 * `{ bytes }`.
 */
export const toolFqnSchema = z
  .union([z.string(), z.object({ bytes: z.string() }).transform((v) => v.bytes)])
  .transform((value, ctx) => {
    try {
      return parseToolFqn(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: String(error) });
      return z.NEVER;
    }
  });

// ============================================================================
// Tool location
// ============================================================================

/**
 * Where a tool runs: an HTTP endpoint for off-chain tools, or a ledger module
 * with its witness object for on-chain tools.
 *
 * String forms: `https://example.com/tool` and `0xpkg::module@0xwitness`.
 */
export type ToolRef =
  | { kind: "http"; url: string }
  | { kind: "ledger"; package: Address; module: string; witnessId: Address };

const MODULE_IDENT_RE = /^[A-Za-z][A-Za-z0-9_]*$/;

export function parseToolRef(text: string): ToolRef {
  if (text.startsWith("http://") || text.startsWith("https://")) {
    // Throws TypeError for malformed URLs.
    return { kind: "http", url: new URL(text).toString() };
  }
  const sep = text.indexOf("::");
  const at = text.lastIndexOf("@");
  if (sep < 0 || at < sep) {
    throw new Error(`Invalid tool reference format: expected 'address::module@witness', got '${text}'`);
  }
  const module = text.slice(sep + 2, at);
  if (!MODULE_IDENT_RE.test(module)) {
    throw new Error(`Invalid module identifier: ${module}`);
  }
  return {
    kind: "ledger",
    package: normalizeAddress(text.slice(0, sep)),
    module,
    witnessId: normalizeAddress(text.slice(at + 1)),
  };
}

export function formatToolRef(ref: ToolRef): string {
  return ref.kind === "http" ? ref.url : `${ref.package}::${ref.module}@${ref.witnessId}`;
}

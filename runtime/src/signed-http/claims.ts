/**
 * Signed claims for leader to tool invocations.
 *
 * Claims are serialized as compact JSON with keys in the order declared
 * here; the signature covers those exact bytes, so verifiers parse the
 * received bytes and never re-serialize them.
 *
 * @module
 */

import { z } from 'zod';
import { formatZodIssues, utf8 } from '@nexus-core/sdk';
import { SignedHttpError } from '../types/errors.js';

/** Leader to tool request claims. */
export interface InvokeRequestClaims {
  leaderId: string;
  /** Key id, for leader key rotation */
  leaderKid: number;
  /** Tool being invoked */
  toolId: string;
  iatMs: number;
  expMs: number;
  /** Unique per invocation attempt; replay tracking keys on it */
  nonce: string;
  method: string;
  path: string;
  /** Raw query string without `?` */
  query: string;
  /** Lowercase hex SHA-256 of the body bytes */
  bodySha256: string;
}

/** Tool to leader response claims. */
export interface InvokeResponseClaims {
  toolId: string;
  toolKid: number;
  iatMs: number;
  expMs: number;
  /** Echo of the request nonce */
  nonce: string;
  /** Hex SHA-256 of the request's signed claims bytes */
  reqSigInputSha256: string;
  status: number;
  bodySha256: string;
}

const u64 = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const requestClaimsSchema = z
  .object({
    leader_id: z.string(),
    leader_kid: u64,
    tool_id: z.string(),
    iat_ms: u64,
    exp_ms: u64,
    nonce: z.string(),
    method: z.string(),
    path: z.string(),
    query: z.string(),
    body_sha256: z.string(),
  })
  .transform(
    (c): InvokeRequestClaims => ({
      leaderId: c.leader_id,
      leaderKid: c.leader_kid,
      toolId: c.tool_id,
      iatMs: c.iat_ms,
      expMs: c.exp_ms,
      nonce: c.nonce,
      method: c.method,
      path: c.path,
      query: c.query,
      bodySha256: c.body_sha256,
    }),
  );

const responseClaimsSchema = z
  .object({
    tool_id: z.string(),
    tool_kid: u64,
    iat_ms: u64,
    exp_ms: u64,
    nonce: z.string(),
    req_sig_input_sha256: z.string(),
    status: z.number().int().min(0).max(0xffff),
    body_sha256: z.string(),
  })
  .transform(
    (c): InvokeResponseClaims => ({
      toolId: c.tool_id,
      toolKid: c.tool_kid,
      iatMs: c.iat_ms,
      expMs: c.exp_ms,
      nonce: c.nonce,
      reqSigInputSha256: c.req_sig_input_sha256,
      status: c.status,
      bodySha256: c.body_sha256,
    }),
  );

export function encodeRequestClaims(claims: InvokeRequestClaims): Uint8Array {
  return utf8(
    JSON.stringify({
      leader_id: claims.leaderId,
      leader_kid: claims.leaderKid,
      tool_id: claims.toolId,
      iat_ms: claims.iatMs,
      exp_ms: claims.expMs,
      nonce: claims.nonce,
      method: claims.method,
      path: claims.path,
      query: claims.query,
      body_sha256: claims.bodySha256,
    }),
  );
}

export function encodeResponseClaims(claims: InvokeResponseClaims): Uint8Array {
  return utf8(
    JSON.stringify({
      tool_id: claims.toolId,
      tool_kid: claims.toolKid,
      iat_ms: claims.iatMs,
      exp_ms: claims.expMs,
      nonce: claims.nonce,
      req_sig_input_sha256: claims.reqSigInputSha256,
      status: claims.status,
      body_sha256: claims.bodySha256,
    }),
  );
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

function parseClaims<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, bytes: Uint8Array): T {
  let json: unknown;
  try {
    json = JSON.parse(strictUtf8.decode(bytes));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SignedHttpError({ kind: 'InvalidSignedInputJson', reason });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new SignedHttpError({ kind: 'InvalidSignedInputJson', reason: formatZodIssues(parsed.error).join('; ') });
  }
  return parsed.data;
}

export function parseRequestClaims(bytes: Uint8Array): InvokeRequestClaims {
  return parseClaims(requestClaimsSchema, bytes);
}

export function parseResponseClaims(bytes: Uint8Array): InvokeResponseClaims {
  return parseClaims(responseClaimsSchema, bytes);
}

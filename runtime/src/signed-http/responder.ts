/**
 * Tool side: authenticate invocation requests, apply replay rules and sign
 * responses bound to the request they answer.
 *
 * Replay state per `invokerId:nonce`:
 *
 * ```text
 *  (none) --authenticate--> in flight --finish--> complete --expiry--> (none)
 *                               |
 *                               +-- release --> (none)
 * ```
 *
 * A same-request retry sees `InFlight` or gets the stored response back; a
 * different request under the same nonce is a `ReplayConflict`.
 *
 * @module
 */

import { bytesEqual, bytesToHex, isValidPublicKey, sha256, sha256Hex, type Ed25519Keypair } from '@nexus-core/sdk';
import { SignedHttpError, ValidationError } from '../types/errors.js';
import { encodeResponseClaims, parseRequestClaims } from './claims.js';
import type { SignedHttpContext } from './engine.js';
import type { InvokerKeyResolver } from './keys.js';
import type { ReplayStore } from './replay-store.js';
import {
  DOMAIN_REQUEST_V1,
  DOMAIN_RESPONSE_V1,
  bodyBytes,
  decodeSignatureHeaders,
  encodeSignatureHeaders,
  parseHex32,
  signWithDomain,
  validateTimeWindow,
  verifyWithDomain,
  type BodyInput,
  type HttpRequestMeta,
  type SignatureHeaderValues,
  type SignedResponse,
} from './wire.js';

/** Who called and what they signed, for authorization hooks. */
export interface AuthContext {
  invokerId: string;
  invokerKid: number;
  responderId: string;
  iatMs: number;
  expMs: number;
  nonce: string;
  method: string;
  path: string;
  query: string;
  invokerPublicKey: Uint8Array;
  requestSigInputSha256: Uint8Array;
}

export type ResponderRejectionKind = 'ReplayConflict' | 'InFlight';

export type ResponderDecision =
  | { kind: 'proceed'; session: InboundSession }
  | { kind: 'return'; response: SignedResponse }
  | { kind: 'reject'; rejection: ResponderRejection };

/**
 * An authenticated request with no replay reservation. Responses signed from
 * it are still bound to the request, so a rejected caller can verify them.
 */
export class AuthenticatedRequest {
  constructor(
    private readonly responder: SignedHttpResponder,
    private readonly context: AuthContext,
  ) {}

  authContext(): AuthContext {
    return { ...this.context };
  }

  signResponse(status: number, body: BodyInput): SignedResponse {
    return this.responder.signResponseFor(this.context, status, bodyBytes(body));
  }
}

export class ResponderRejection {
  constructor(
    readonly kind: ResponderRejectionKind,
    readonly request: AuthenticatedRequest,
  ) {}

  authContext(): AuthContext {
    return this.request.authContext();
  }

  signResponse(status: number, body: BodyInput): SignedResponse {
    return this.request.signResponse(status, body);
  }
}

type InboundState = 'open' | 'finished' | 'released';

/**
 * A request that won its nonce reservation. Call {@link finish} with the
 * result, or {@link release} if the request will not be answered; a retry
 * can then run it again. Abandoned reservations lapse at the request's
 * `exp_ms`.
 */
export class InboundSession {
  private state: InboundState = 'open';

  constructor(
    private readonly request: AuthenticatedRequest,
    private readonly replayStore: ReplayStore,
    readonly nonceKey: string,
    private readonly requestHash: Uint8Array,
    private readonly expiresAtMs: number,
  ) {}

  get isOpen(): boolean {
    return this.state === 'open';
  }

  authContext(): AuthContext {
    return this.request.authContext();
  }

  /** Sign the response, store it for identical retries and return it. */
  finish(status: number, body: BodyInput): SignedResponse {
    if (this.state !== 'open') {
      throw new ValidationError(`Inbound session ${this.nonceKey} is already ${this.state}`);
    }
    const signed = this.request.signResponse(status, body);
    this.replayStore.complete(this.nonceKey, this.requestHash, this.expiresAtMs, {
      ...signed,
      body: Uint8Array.from(signed.body),
    });
    this.state = 'finished';
    return signed;
  }

  /** Drop the reservation. No-op once finished or released. */
  release(): void {
    if (this.state !== 'open') return;
    this.state = 'released';
    this.replayStore.remove(this.nonceKey);
  }
}

/**
 * Run `handler` for a session and release the reservation if the handler
 * throws or returns without finishing.
 */
export async function withInboundSession<T>(
  session: InboundSession,
  handler: (session: InboundSession) => Promise<T> | T,
): Promise<T> {
  try {
    return await handler(session);
  } finally {
    session.release();
  }
}

export class SignedHttpResponder {
  constructor(
    private readonly ctx: SignedHttpContext,
    readonly responderId: string,
    readonly responderKid: number,
    private readonly signingKey: Ed25519Keypair,
    private readonly invokerKeys: InvokerKeyResolver,
    private readonly replayStore: ReplayStore,
  ) {}

  /**
   * Verify a request and decide how to handle its nonce. Verification
   * failures throw {@link SignedHttpError}; replay outcomes are returned.
   */
  authenticateInvoke(http: HttpRequestMeta, body: BodyInput, headers: SignatureHeaderValues): ResponderDecision {
    const decoded = decodeSignatureHeaders(headers);
    const context = this.verifyInbound(decoded.sigInput, decoded.signature, http, bodyBytes(body));

    const nonceKey = `${context.invokerId}:${context.nonce}`;
    const request = new AuthenticatedRequest(this, context);
    const decision = this.replayStore.beginOrReplay(
      nonceKey,
      context.requestSigInputSha256,
      context.expMs,
      this.ctx.nowMs(),
    );

    switch (decision.kind) {
      case 'proceed':
        this.ctx.logger.debug(`Accepted request ${nonceKey}`);
        return {
          kind: 'proceed',
          session: new InboundSession(request, this.replayStore, nonceKey, context.requestSigInputSha256, context.expMs),
        };
      case 'return':
        this.ctx.logger.debug(`Returning stored response for ${nonceKey}`);
        return { kind: 'return', response: decision.response };
      case 'inFlight':
        this.ctx.logger.debug(`Request ${nonceKey} is still in flight`);
        return { kind: 'reject', rejection: new ResponderRejection('InFlight', request) };
      case 'reject':
        this.ctx.logger.warn(`Nonce reuse with a different request: ${nonceKey}`);
        return { kind: 'reject', rejection: new ResponderRejection('ReplayConflict', request) };
    }
  }

  /** @internal Used by {@link AuthenticatedRequest}. */
  signResponseFor(context: AuthContext, status: number, body: Uint8Array): SignedResponse {
    const iatMs = this.ctx.nowMs();
    const sigInput = encodeResponseClaims({
      toolId: this.responderId,
      toolKid: this.responderKid,
      iatMs,
      expMs: iatMs + this.ctx.policy.maxValidityMs,
      nonce: context.nonce,
      reqSigInputSha256: bytesToHex(context.requestSigInputSha256),
      status,
      bodySha256: sha256Hex(body),
    });
    const signature = signWithDomain(DOMAIN_RESPONSE_V1, sigInput, this.signingKey);
    return { status, body, headers: encodeSignatureHeaders(sigInput, signature) };
  }

  private verifyInbound(sigInput: Uint8Array, signature: Uint8Array, http: HttpRequestMeta, body: Uint8Array): AuthContext {
    const claims = parseRequestClaims(sigInput);

    if (claims.toolId !== this.responderId) {
      throw new SignedHttpError({ kind: 'ToolIdMismatch', claimed: claims.toolId, expected: this.responderId });
    }
    if (claims.method !== http.method) {
      throw new SignedHttpError({ kind: 'MethodMismatch', claimed: claims.method, actual: http.method });
    }
    if (claims.path !== http.path) {
      throw new SignedHttpError({ kind: 'PathMismatch', claimed: claims.path, actual: http.path });
    }
    if (claims.query !== http.query) {
      throw new SignedHttpError({ kind: 'QueryMismatch', claimed: claims.query, actual: http.query });
    }

    const claimedBody = parseHex32(claims.bodySha256);
    if (claimedBody === undefined) {
      throw new SignedHttpError({ kind: 'InvalidBodySha256Hex', value: claims.bodySha256 });
    }
    if (!bytesEqual(sha256(body), claimedBody)) {
      throw new SignedHttpError({ kind: 'BodyHashMismatch' });
    }

    validateTimeWindow(claims.iatMs, claims.expMs, this.ctx.nowMs(), this.ctx.policy);

    const publicKey = this.invokerKeys.invokerPublicKey(claims.leaderId, claims.leaderKid);
    if (publicKey === undefined) {
      throw new SignedHttpError({ kind: 'UnknownInvokerKey', invokerId: claims.leaderId, invokerKid: claims.leaderKid });
    }
    if (!isValidPublicKey(publicKey)) {
      throw new SignedHttpError({
        kind: 'InvalidInvokerPublicKey',
        invokerId: claims.leaderId,
        invokerKid: claims.leaderKid,
      });
    }
    if (!verifyWithDomain(DOMAIN_REQUEST_V1, sigInput, signature, publicKey)) {
      throw new SignedHttpError({ kind: 'InvalidSignature' });
    }

    return {
      invokerId: claims.leaderId,
      invokerKid: claims.leaderKid,
      responderId: claims.toolId,
      iatMs: claims.iatMs,
      expMs: claims.expMs,
      nonce: claims.nonce,
      method: claims.method,
      path: claims.path,
      query: claims.query,
      invokerPublicKey: publicKey,
      requestSigInputSha256: sha256(sigInput),
    };
  }
}

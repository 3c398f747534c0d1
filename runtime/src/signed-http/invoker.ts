/**
 * Leader side: sign invocation requests and verify the tool's responses.
 *
 * @module
 */

import { bytesEqual, isValidPublicKey, randomBytes, sha256, sha256Hex, toBase64Url, type Ed25519Keypair } from '@nexus-core/sdk';
import { SignedHttpError } from '../types/errors.js';
import { encodeRequestClaims, parseResponseClaims } from './claims.js';
import type { SignedHttpContext } from './engine.js';
import { toHeaderRecord } from './headers.js';
import type { ResponderKeyResolver } from './keys.js';
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
  type EncodedSignatureHeaders,
  type HttpRequestMeta,
  type SignatureHeaderValues,
} from './wire.js';

const NONCE_BYTES = 16;

/** What a verified response proved. */
export interface VerifiedOutboundResponse {
  responderId: string;
  responderKid: number;
  nonce: string;
  status: number;
  responderPublicKey: Uint8Array;
  responseSigInputSha256: Uint8Array;
}

export class SignedHttpInvoker {
  constructor(
    private readonly ctx: SignedHttpContext,
    readonly invokerId: string,
    readonly invokerKid: number,
    private readonly signingKey: Ed25519Keypair,
  ) {}

  /**
   * Sign a request to `responderId`. Without `nonce`, 16 random bytes are
   * used. The session's headers never change, so transport retries can
   * resend them as they are.
   */
  beginInvoke(responderId: string, http: HttpRequestMeta, body: BodyInput, nonce?: string): OutboundSession {
    const iatMs = this.ctx.nowMs();
    const expMs = iatMs + this.ctx.policy.maxValidityMs;
    const requestNonce = nonce ?? toBase64Url(randomBytes(NONCE_BYTES));

    const sigInput = encodeRequestClaims({
      leaderId: this.invokerId,
      leaderKid: this.invokerKid,
      toolId: responderId,
      iatMs,
      expMs,
      nonce: requestNonce,
      method: http.method,
      path: http.path,
      query: http.query,
      bodySha256: sha256Hex(bodyBytes(body)),
    });
    const signature = signWithDomain(DOMAIN_REQUEST_V1, sigInput, this.signingKey);

    this.ctx.logger.debug(`Signed request to ${responderId} (${http.method} ${http.path}, nonce ${requestNonce})`);
    return new OutboundSession(this.ctx, responderId, requestNonce, sigInput, encodeSignatureHeaders(sigInput, signature));
  }
}

/**
 * One invocation from the leader's point of view.
 */
export class OutboundSession {
  private readonly sigInputSha256: Uint8Array;

  constructor(
    private readonly ctx: SignedHttpContext,
    readonly expectedResponderId: string,
    readonly nonce: string,
    private readonly sigInput: Uint8Array,
    private readonly headers: EncodedSignatureHeaders,
  ) {
    this.sigInputSha256 = sha256(sigInput);
  }

  requestHeaders(): EncodedSignatureHeaders {
    return { ...this.headers };
  }

  requestHeaderRecord(): Record<string, string> {
    return toHeaderRecord(this.headers);
  }

  /** The signed claims bytes, e.g. for an audit transcript. */
  requestSigInputBytes(): Uint8Array {
    return Uint8Array.from(this.sigInput);
  }

  requestSigInputSha256(): Uint8Array {
    return Uint8Array.from(this.sigInputSha256);
  }

  /**
   * Check that a response was signed by a known tool key, describes the
   * received status and body, and answers this request.
   */
  verifyResponse(
    status: number,
    headers: SignatureHeaderValues,
    body: BodyInput,
    responderKeys: ResponderKeyResolver,
  ): VerifiedOutboundResponse {
    const decoded = decodeSignatureHeaders(headers);
    const claims = parseResponseClaims(decoded.sigInput);

    if (claims.status !== status) {
      throw new SignedHttpError({ kind: 'StatusMismatch', claimed: claims.status, actual: status });
    }

    const publicKey = responderKeys.responderPublicKey(claims.toolId, claims.toolKid);
    if (publicKey === undefined) {
      throw new SignedHttpError({ kind: 'UnknownResponderKey', responderId: claims.toolId, responderKid: claims.toolKid });
    }

    if (claims.toolId !== this.expectedResponderId) {
      throw new SignedHttpError({ kind: 'ToolIdMismatch', claimed: claims.toolId, expected: this.expectedResponderId });
    }

    const claimedBody = parseHex32(claims.bodySha256);
    if (claimedBody === undefined) {
      throw new SignedHttpError({ kind: 'InvalidBodySha256Hex', value: claims.bodySha256 });
    }
    if (!bytesEqual(sha256(bodyBytes(body)), claimedBody)) {
      throw new SignedHttpError({ kind: 'BodyHashMismatch' });
    }

    validateTimeWindow(claims.iatMs, claims.expMs, this.ctx.nowMs(), this.ctx.policy);

    const boundTo = parseHex32(claims.reqSigInputSha256);
    if (boundTo === undefined) {
      throw new SignedHttpError({ kind: 'InvalidReqSigInputSha256Hex', value: claims.reqSigInputSha256 });
    }
    if (!bytesEqual(boundTo, this.sigInputSha256)) {
      throw new SignedHttpError({ kind: 'RequestBindingMismatch' });
    }

    if (!isValidPublicKey(publicKey)) {
      throw new SignedHttpError({
        kind: 'InvalidResponderPublicKey',
        responderId: claims.toolId,
        responderKid: claims.toolKid,
      });
    }
    if (!verifyWithDomain(DOMAIN_RESPONSE_V1, decoded.sigInput, decoded.signature, publicKey)) {
      throw new SignedHttpError({ kind: 'InvalidSignature' });
    }

    return {
      responderId: claims.toolId,
      responderKid: claims.toolKid,
      nonce: claims.nonce,
      status: claims.status,
      responderPublicKey: publicKey,
      responseSigInputSha256: sha256(decoded.sigInput),
    };
  }
}

/**
 * Responder-side replay tracking.
 *
 * Entries are keyed by `invokerId:nonce` and hold the request hash, an expiry
 * and either an in-flight reservation or the signed response to hand back on
 * an identical retry.
 *
 * @module
 */

import { bytesEqual } from '@nexus-core/sdk';
import type { SignedResponse } from './wire.js';

export type ReplayDecision =
  /** First sighting; the key is now reserved as in flight */
  | { kind: 'proceed' }
  /** Identical retry of a completed request */
  | { kind: 'return'; response: SignedResponse }
  /** Identical retry while the first attempt still runs */
  | { kind: 'inFlight' }
  /** Same nonce, different request */
  | { kind: 'reject' };

/**
 * Storage behind the responder's replay rules. An implementation backed by a
 * shared store must make {@link beginOrReplay} atomic per key.
 */
export interface ReplayStore {
  beginOrReplay(nonceKey: string, requestHash: Uint8Array, expiresAtMs: number, nowMs: number): ReplayDecision;
  /** Record the signed response, replacing any reservation. */
  complete(nonceKey: string, requestHash: Uint8Array, expiresAtMs: number, response: SignedResponse): void;
  /** Drop an in-flight reservation. */
  remove(nonceKey: string): void;
}

function copyResponse(response: SignedResponse): SignedResponse {
  return { status: response.status, body: Uint8Array.from(response.body), headers: { ...response.headers } };
}

interface ReplayEntry {
  requestHash: Uint8Array;
  expiresAtMs: number;
  state: { kind: 'inFlight' } | { kind: 'complete'; response: SignedResponse };
}

/**
 * Process-local replay store. Decisions run synchronously, so two requests
 * racing on the same nonce cannot both see `proceed`. Responses are copied on
 * the way in and out; callers may reuse the buffers they hold.
 */
export class InMemoryReplayStore implements ReplayStore {
  private readonly entries = new Map<string, ReplayEntry>();

  get size(): number {
    return this.entries.size;
  }

  beginOrReplay(nonceKey: string, requestHash: Uint8Array, expiresAtMs: number, nowMs: number): ReplayDecision {
    this.purgeExpired(nowMs);

    const entry = this.entries.get(nonceKey);
    if (entry === undefined) {
      this.entries.set(nonceKey, { requestHash, expiresAtMs, state: { kind: 'inFlight' } });
      return { kind: 'proceed' };
    }
    if (!bytesEqual(entry.requestHash, requestHash)) {
      return { kind: 'reject' };
    }
    if (entry.state.kind === 'inFlight') {
      return { kind: 'inFlight' };
    }
    return { kind: 'return', response: copyResponse(entry.state.response) };
  }

  complete(nonceKey: string, requestHash: Uint8Array, expiresAtMs: number, response: SignedResponse): void {
    const state = { kind: 'complete' as const, response: copyResponse(response) };
    this.entries.set(nonceKey, { requestHash, expiresAtMs, state });
  }

  remove(nonceKey: string): void {
    this.entries.delete(nonceKey);
  }

  private purgeExpired(nowMs: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAtMs < nowMs) this.entries.delete(key);
    }
  }
}

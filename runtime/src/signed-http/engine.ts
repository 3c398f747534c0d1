/**
 * Signed HTTP v1 engine.
 *
 * Holds the verification policy, the clock and a logger, and hands out
 * invoker (leader) and responder (tool) helpers that share them.
 *
 * @example
 * ```typescript
 * const engine = new SignedHttpEngineV1();
 * const leader = engine.invoker(leaderId, 0, leaderKey);
 * const session = leader.beginInvoke(toolId, { method: 'POST', path: '/invoke', query: '' }, body);
 * await fetch(url, { method: 'POST', body, headers: session.requestHeaderRecord() });
 * ```
 *
 * @module
 */

import type { Ed25519Keypair } from '@nexus-core/sdk';
import { ValidationError } from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { SignedHttpInvoker } from './invoker.js';
import type { InvokerKeyResolver } from './keys.js';
import { InMemoryReplayStore, type ReplayStore } from './replay-store.js';
import { SignedHttpResponder } from './responder.js';
import { DEFAULT_SIGNED_HTTP_POLICY, type SignedHttpPolicy } from './wire.js';

/** Milliseconds since the Unix epoch. */
export interface Clock {
  nowMs(): number;
}

export const systemClock: Clock = {
  nowMs: () => Date.now(),
};

/** What invoker and responder helpers read from their engine. */
export interface SignedHttpContext {
  readonly policy: Readonly<SignedHttpPolicy>;
  readonly logger: Logger;
  nowMs(): number;
}

export interface SignedHttpEngineOptions {
  /** Overrides for {@link DEFAULT_SIGNED_HTTP_POLICY} */
  policy?: Partial<SignedHttpPolicy>;
  clock?: Clock;
  logger?: Logger;
}

function checkPolicyValue(name: keyof SignedHttpPolicy, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export class SignedHttpEngineV1 implements SignedHttpContext {
  readonly policy: Readonly<SignedHttpPolicy>;
  readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: SignedHttpEngineOptions = {}) {
    const policy = { ...DEFAULT_SIGNED_HTTP_POLICY, ...options.policy };
    checkPolicyValue('maxClockSkewMs', policy.maxClockSkewMs);
    checkPolicyValue('maxValidityMs', policy.maxValidityMs);
    this.policy = Object.freeze(policy);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  nowMs(): number {
    return this.clock.nowMs();
  }

  /** A leader-side helper signing as `(invokerId, invokerKid)`. */
  invoker(invokerId: string, invokerKid: number, signingKey: Ed25519Keypair): SignedHttpInvoker {
    return new SignedHttpInvoker(this, invokerId, invokerKid, signingKey);
  }

  /** A tool-side helper backed by a caller-provided replay store. */
  responder(
    responderId: string,
    responderKid: number,
    signingKey: Ed25519Keypair,
    invokerKeys: InvokerKeyResolver,
    replayStore: ReplayStore,
  ): SignedHttpResponder {
    return new SignedHttpResponder(this, responderId, responderKid, signingKey, invokerKeys, replayStore);
  }

  responderWithInMemoryReplay(
    responderId: string,
    responderKid: number,
    signingKey: Ed25519Keypair,
    invokerKeys: InvokerKeyResolver,
  ): SignedHttpResponder {
    return this.responder(responderId, responderKid, signingKey, invokerKeys, new InMemoryReplayStore());
  }
}

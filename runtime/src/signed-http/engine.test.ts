import { describe, it, expect, beforeEach } from 'vitest';
import { Ed25519Keypair, normalizeAddress } from '@nexus-core/sdk';
import { SignedHttpError, ValidationError } from '../types/errors.js';
import { parseRequestClaims } from './claims.js';
import { SignedHttpEngineV1, type Clock } from './engine.js';
import { headersFromRecord, toHeaderRecord } from './headers.js';
import type { OutboundSession } from './invoker.js';
import { KeyTable, StaticResponderKey } from './keys.js';
import { InMemoryReplayStore } from './replay-store.js';
import { withInboundSession, type InboundSession, type ResponderDecision, type SignedHttpResponder } from './responder.js';
import type { HttpRequestMeta, SignedResponse } from './wire.js';

const LEADER_KEY = Ed25519Keypair.fromSecretKey(new Uint8Array(32).fill(1));
const TOOL_KEY = Ed25519Keypair.fromSecretKey(new Uint8Array(32).fill(2));
const LEADER_ID = normalizeAddress('0xa1');
const TOOL_ID = normalizeAddress('0xb2');
const ZERO_NONCE = 'AAAAAAAAAAAAAAAAAAAAAA';
const INVOKE: HttpRequestMeta = { method: 'POST', path: '/invoke', query: '' };
const T0 = 1_700_000_000_000;

function expectProceed(decision: ResponderDecision): InboundSession {
  if (decision.kind !== 'proceed') throw new Error(`expected proceed, got ${decision.kind}`);
  return decision.session;
}

function detailOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    if (err instanceof SignedHttpError) return err.detail;
    throw err;
  }
  throw new Error('expected a SignedHttpError');
}

describe('SignedHttpEngineV1', () => {
  let now: number;
  let engine: SignedHttpEngineV1;
  let store: InMemoryReplayStore;
  let responder: SignedHttpResponder;
  const clock: Clock = { nowMs: () => now };
  const toolKeys = new StaticResponderKey(TOOL_ID, 0, TOOL_KEY.publicKeyBytes());

  beforeEach(() => {
    now = T0;
    engine = new SignedHttpEngineV1({ clock });
    store = new InMemoryReplayStore();
    const leaders = new KeyTable().set(LEADER_ID, 0, LEADER_KEY.publicKeyBytes());
    responder = engine.responder(TOOL_ID, 0, TOOL_KEY, leaders, store);
  });

  function begin(body: string, nonce = ZERO_NONCE, http = INVOKE): OutboundSession {
    return engine.invoker(LEADER_ID, 0, LEADER_KEY).beginInvoke(TOOL_ID, http, body, nonce);
  }

  function deliver(session: OutboundSession, body: string, http = INVOKE): ResponderDecision {
    return responder.authenticateInvoke(http, body, headersFromRecord(session.requestHeaderRecord()));
  }

  function verify(session: OutboundSession, response: SignedResponse) {
    return session.verifyResponse(response.status, headersFromRecord(toHeaderRecord(response.headers)), response.body, toolKeys);
  }

  describe('request and response round trip', () => {
    it('authenticates, answers and replays an identical retry bit for bit', () => {
      const outbound = begin('ping');
      const inbound = expectProceed(deliver(outbound, 'ping'));

      expect(inbound.authContext()).toMatchObject({
        invokerId: LEADER_ID,
        invokerKid: 0,
        responderId: TOOL_ID,
        iatMs: T0,
        expMs: T0 + 60_000,
        nonce: ZERO_NONCE,
        method: 'POST',
        path: '/invoke',
        query: '',
      });

      const response = inbound.finish(200, 'pong');
      const verified = verify(outbound, response);
      expect(verified).toMatchObject({ responderId: TOOL_ID, responderKid: 0, nonce: ZERO_NONCE, status: 200 });
      expect(verified.responderPublicKey).toEqual(TOOL_KEY.publicKeyBytes());

      const retry = deliver(outbound, 'ping');
      expect(retry.kind).toBe('return');
      if (retry.kind === 'return') {
        expect(retry.response).toEqual(response);
        expect(verify(outbound, retry.response).status).toBe(200);
      }
    });

    it('rejects a different request under a used nonce', () => {
      expectProceed(deliver(begin('ping'), 'ping')).finish(200, 'pong');

      const conflicting = begin('pang');
      const decision = deliver(conflicting, 'pang');
      expect(decision.kind).toBe('reject');
      if (decision.kind !== 'reject') return;
      expect(decision.rejection.kind).toBe('ReplayConflict');

      // A rejection can still be answered with a response bound to the new request.
      const refusal = decision.rejection.signResponse(409, 'nonce reused');
      expect(verify(conflicting, refusal).status).toBe(409);
      expect(store.size).toBe(1);
    });

    it('reports an identical retry as in flight until the first attempt settles', () => {
      const outbound = begin('ping');
      const first = expectProceed(deliver(outbound, 'ping'));

      const retry = deliver(outbound, 'ping');
      expect(retry.kind === 'reject' && retry.rejection.kind).toBe('InFlight');

      first.release();
      expect(first.isOpen).toBe(false);
      expectProceed(deliver(outbound, 'ping'));
    });

    it('keeps request headers stable across calls', () => {
      const outbound = begin('ping');
      expect(outbound.requestHeaders()).toEqual(outbound.requestHeaders());
      expect(outbound.requestHeaderRecord()['X-Nexus-Sig-V']).toBe('1');
    });

    it('hashes an empty body as the empty-string digest', () => {
      const outbound = begin('');
      expect(parseRequestClaims(outbound.requestSigInputBytes()).bodySha256).toBe(
        'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
      );
      expectProceed(deliver(outbound, ''));
    });

    it('generates a 16-byte nonce when none is given', () => {
      const outbound = engine.invoker(LEADER_ID, 0, LEADER_KEY).beginInvoke(TOOL_ID, INVOKE, 'ping');
      expect(outbound.nonce).toMatch(/^[A-Za-z0-9_-]{22}$/);
    });
  });

  describe('inbound sessions', () => {
    it('releases the reservation when the handler throws', async () => {
      const outbound = begin('ping');
      const inbound = expectProceed(deliver(outbound, 'ping'));

      await expect(
        withInboundSession(inbound, async () => {
          throw new Error('tool crashed');
        }),
      ).rejects.toThrow('tool crashed');

      expect(inbound.isOpen).toBe(false);
      expect(store.size).toBe(0);
      expectProceed(deliver(outbound, 'ping'));
    });

    it('keeps the stored response when the handler finishes', async () => {
      const outbound = begin('ping');
      const inbound = expectProceed(deliver(outbound, 'ping'));

      const response = await withInboundSession(inbound, (session) => session.finish(201, 'created'));

      expect(response.status).toBe(201);
      expect(deliver(outbound, 'ping').kind).toBe('return');
    });

    it('refuses to finish twice', () => {
      const inbound = expectProceed(deliver(begin('ping'), 'ping'));
      inbound.finish(200, 'pong');
      expect(() => inbound.finish(200, 'pong')).toThrow(ValidationError);
    });

    it('expires stored responses after exp_ms', () => {
      const outbound = begin('ping');
      expectProceed(deliver(outbound, 'ping')).finish(200, 'pong');

      // Past exp_ms the store forgets the nonce, but the request itself is still
      // inside the skew allowance, so it runs again.
      now = T0 + 60_001;
      expectProceed(deliver(outbound, 'ping'));
    });
  });

  describe('request verification', () => {
    it('binds method, path, query and body', () => {
      const outbound = begin('ping');
      expect(detailOf(() => deliver(outbound, 'ping', { ...INVOKE, method: 'PUT' }))).toEqual({
        kind: 'MethodMismatch',
        claimed: 'POST',
        actual: 'PUT',
      });
      expect(detailOf(() => deliver(outbound, 'ping', { ...INVOKE, path: '/other' }))).toEqual({
        kind: 'PathMismatch',
        claimed: '/invoke',
        actual: '/other',
      });
      expect(detailOf(() => deliver(outbound, 'ping', { ...INVOKE, query: 'a=1' }))).toEqual({
        kind: 'QueryMismatch',
        claimed: '',
        actual: 'a=1',
      });
      expect(detailOf(() => deliver(outbound, 'pong'))).toEqual({ kind: 'BodyHashMismatch' });
      expect(store.size).toBe(0);
    });

    it('rejects requests addressed to another tool', () => {
      const other = normalizeAddress('0xc3');
      const outbound = engine.invoker(LEADER_ID, 0, LEADER_KEY).beginInvoke(other, INVOKE, 'ping');
      expect(detailOf(() => deliver(outbound, 'ping'))).toEqual({ kind: 'ToolIdMismatch', claimed: other, expected: TOOL_ID });
    });

    it('rejects unknown leader keys', () => {
      const outbound = engine.invoker(LEADER_ID, 7, LEADER_KEY).beginInvoke(TOOL_ID, INVOKE, 'ping');
      expect(detailOf(() => deliver(outbound, 'ping'))).toEqual({
        kind: 'UnknownInvokerKey',
        invokerId: LEADER_ID,
        invokerKid: 7,
      });
    });

    it('rejects signatures from a key other than the registered one', () => {
      const outbound = engine.invoker(LEADER_ID, 0, TOOL_KEY).beginInvoke(TOOL_ID, INVOKE, 'ping');
      expect(detailOf(() => deliver(outbound, 'ping'))).toEqual({ kind: 'InvalidSignature' });
    });

    it('accepts until exp_ms plus skew and rejects after', () => {
      const outbound = begin('ping');

      now = T0 + 90_001;
      expect(detailOf(() => deliver(outbound, 'ping'))).toEqual({
        kind: 'Expired',
        expMs: T0 + 60_000,
        nowMs: T0 + 90_001,
      });

      now = T0 + 90_000;
      expectProceed(deliver(outbound, 'ping'));
    });
  });

  describe('response verification', () => {
    it('rejects a response answering another request', () => {
      const first = begin('ping', 'bm9uY2UtMQ');
      const second = begin('ping', 'bm9uY2UtMg');
      const response = expectProceed(deliver(first, 'ping')).finish(200, 'pong');

      expect(detailOf(() => verify(second, response))).toEqual({ kind: 'RequestBindingMismatch' });
    });

    it('checks the received status and body', () => {
      const outbound = begin('ping');
      const response = expectProceed(deliver(outbound, 'ping')).finish(200, 'pong');
      const headers = headersFromRecord(toHeaderRecord(response.headers));

      expect(detailOf(() => outbound.verifyResponse(500, headers, response.body, toolKeys))).toEqual({
        kind: 'StatusMismatch',
        claimed: 200,
        actual: 500,
      });
      expect(detailOf(() => outbound.verifyResponse(200, headers, 'tampered', toolKeys))).toEqual({
        kind: 'BodyHashMismatch',
      });
    });

    it('requires a known tool key', () => {
      const outbound = begin('ping');
      const response = expectProceed(deliver(outbound, 'ping')).finish(200, 'pong');
      const rotated = new StaticResponderKey(TOOL_ID, 1, TOOL_KEY.publicKeyBytes());

      expect(() =>
        outbound.verifyResponse(200, headersFromRecord(toHeaderRecord(response.headers)), response.body, rotated),
      ).toThrow('unknown tool key');
    });

    it('rejects a response signed by a different key', () => {
      const outbound = begin('ping');
      const response = expectProceed(deliver(outbound, 'ping')).finish(200, 'pong');
      const wrongKey = new StaticResponderKey(TOOL_ID, 0, LEADER_KEY.publicKeyBytes());

      expect(() =>
        outbound.verifyResponse(200, headersFromRecord(toHeaderRecord(response.headers)), response.body, wrongKey),
      ).toThrow('invalid signature');
    });
  });

  it('validates the policy', () => {
    expect(new SignedHttpEngineV1().policy).toEqual({ maxClockSkewMs: 30_000, maxValidityMs: 60_000 });
    expect(() => new SignedHttpEngineV1({ policy: { maxValidityMs: -1 } })).toThrow(ValidationError);
  });
});

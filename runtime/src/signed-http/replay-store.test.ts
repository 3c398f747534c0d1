import { describe, it, expect } from 'vitest';
import { InMemoryReplayStore } from './replay-store.js';
import type { SignedResponse } from './wire.js';

const HASH_A = new Uint8Array(32).fill(0xa);
const HASH_B = new Uint8Array(32).fill(0xb);
const RESPONSE: SignedResponse = {
  status: 200,
  body: new Uint8Array([1, 2, 3]),
  headers: { sigInputB64: 'aW5wdXQ', sigB64: 'c2ln' },
};

describe('InMemoryReplayStore', () => {
  it('reserves a new key and reports the retry as in flight', () => {
    const store = new InMemoryReplayStore();
    expect(store.beginOrReplay('leader:n1', HASH_A, 100, 10)).toEqual({ kind: 'proceed' });
    expect(store.beginOrReplay('leader:n1', HASH_A, 100, 11)).toEqual({ kind: 'inFlight' });
  });

  it('returns the stored response once complete', () => {
    const store = new InMemoryReplayStore();
    store.beginOrReplay('leader:n1', HASH_A, 100, 10);
    store.complete('leader:n1', HASH_A, 100, RESPONSE);
    expect(store.beginOrReplay('leader:n1', HASH_A, 100, 20)).toEqual({ kind: 'return', response: RESPONSE });
  });

  it('hands out copies that later retries do not see changes to', () => {
    const store = new InMemoryReplayStore();
    const original: SignedResponse = {
      status: RESPONSE.status,
      body: Uint8Array.from(RESPONSE.body),
      headers: { ...RESPONSE.headers },
    };
    store.beginOrReplay('leader:n1', HASH_A, 100, 10);
    store.complete('leader:n1', HASH_A, 100, original);
    original.body[1] = 7;

    const first = store.beginOrReplay('leader:n1', HASH_A, 100, 20);
    if (first.kind !== 'return') throw new Error(`expected a stored response, got ${first.kind}`);
    first.response.body[0] = 9;
    first.response.headers.sigB64 = 'dGFtcGVyZWQ';

    expect(store.beginOrReplay('leader:n1', HASH_A, 100, 21)).toEqual({ kind: 'return', response: RESPONSE });
  });

  it('rejects a different hash and leaves the entry untouched', () => {
    const store = new InMemoryReplayStore();
    store.beginOrReplay('leader:n1', HASH_A, 100, 10);
    expect(store.beginOrReplay('leader:n1', HASH_B, 100, 11)).toEqual({ kind: 'reject' });
    expect(store.beginOrReplay('leader:n1', HASH_A, 100, 12)).toEqual({ kind: 'inFlight' });
  });

  it('keeps entries through their expiry and purges them after', () => {
    const store = new InMemoryReplayStore();
    store.beginOrReplay('leader:n1', HASH_A, 100, 10);
    store.beginOrReplay('leader:n2', HASH_A, 500, 10);

    expect(store.beginOrReplay('leader:n1', HASH_A, 100, 100)).toEqual({ kind: 'inFlight' });
    expect(store.beginOrReplay('leader:n3', HASH_B, 600, 101)).toEqual({ kind: 'proceed' });
    expect(store.size).toBe(2);
    expect(store.beginOrReplay('leader:n1', HASH_B, 700, 102)).toEqual({ kind: 'proceed' });
  });

  it('removes reservations', () => {
    const store = new InMemoryReplayStore();
    store.beginOrReplay('leader:n1', HASH_A, 100, 10);
    store.remove('leader:n1');
    expect(store.size).toBe(0);
    expect(store.beginOrReplay('leader:n1', HASH_B, 100, 11)).toEqual({ kind: 'proceed' });
  });
});

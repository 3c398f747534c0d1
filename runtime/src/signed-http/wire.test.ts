import { describe, it, expect } from 'vitest';
import { toBase64Url, utf8 } from '@nexus-core/sdk';
import { SignedHttpError } from '../types/errors.js';
import { encodeRequestClaims, parseRequestClaims, parseResponseClaims } from './claims.js';
import { headersFromGetter, headersFromRecord, toHeaderRecord } from './headers.js';
import {
  DEFAULT_SIGNED_HTTP_POLICY,
  HEADER_SIG,
  HEADER_SIG_INPUT,
  HEADER_SIG_VERSION,
  decodeSignatureHeaders,
  parseHex32,
  validateTimeWindow,
} from './wire.js';

function detailOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    if (err instanceof SignedHttpError) return err.detail;
    throw err;
  }
  throw new Error('expected a SignedHttpError');
}

const SIG_64 = toBase64Url(new Uint8Array(64).fill(5));
const INPUT = toBase64Url(utf8('{}'));

describe('decodeSignatureHeaders', () => {
  it('decodes a complete triple', () => {
    const decoded = decodeSignatureHeaders({ version: '1', sigInput: INPUT, signature: SIG_64 });
    expect(new TextDecoder().decode(decoded.sigInput)).toBe('{}');
    expect(decoded.signature).toEqual(new Uint8Array(64).fill(5));
  });

  it('checks the version first', () => {
    expect(detailOf(() => decodeSignatureHeaders({}))).toEqual({ kind: 'MissingHeader', header: HEADER_SIG_VERSION });
    expect(detailOf(() => decodeSignatureHeaders({ version: '2' }))).toEqual({
      kind: 'UnsupportedVersion',
      version: '2',
    });
  });

  it('reports the first missing header', () => {
    expect(detailOf(() => decodeSignatureHeaders({ version: '1', signature: SIG_64 }))).toEqual({
      kind: 'MissingHeader',
      header: HEADER_SIG_INPUT,
    });
    expect(detailOf(() => decodeSignatureHeaders({ version: '1', sigInput: INPUT }))).toEqual({
      kind: 'MissingHeader',
      header: HEADER_SIG,
    });
  });

  it('rejects base64 that cannot encode whole bytes', () => {
    expect(detailOf(() => decodeSignatureHeaders({ version: '1', sigInput: 'abcde', signature: SIG_64 }))).toEqual({
      kind: 'InvalidBase64',
      header: HEADER_SIG_INPUT,
    });
    expect(detailOf(() => decodeSignatureHeaders({ version: '1', sigInput: INPUT, signature: 'a+b/' }))).toEqual({
      kind: 'InvalidBase64',
      header: HEADER_SIG,
    });
  });

  it('requires a 64-byte signature', () => {
    const short = toBase64Url(new Uint8Array(63));
    expect(detailOf(() => decodeSignatureHeaders({ version: '1', sigInput: INPUT, signature: short }))).toEqual({
      kind: 'InvalidSignatureLength',
      length: 63,
    });
  });
});

describe('validateTimeWindow', () => {
  const now = 1_000_000;
  const policy = DEFAULT_SIGNED_HTTP_POLICY;

  it('accepts the widest window at both skew bounds', () => {
    expect(() => validateTimeWindow(now - 30_000, now + 30_000, now, policy)).not.toThrow();
    expect(() => validateTimeWindow(now + 30_000, now + 30_000, now, policy)).not.toThrow();
    expect(() => validateTimeWindow(now - 30_000, now - 30_000, now, policy)).not.toThrow();
  });

  it('rejects a window one millisecond wider', () => {
    expect(detailOf(() => validateTimeWindow(now - 30_001, now + 30_000, now, policy))).toEqual({
      kind: 'ValidityTooLarge',
      validityMs: 60_001,
      maxValidityMs: 60_000,
    });
    expect(detailOf(() => validateTimeWindow(now - 30_000, now + 30_001, now, policy))).toEqual({
      kind: 'ValidityTooLarge',
      validityMs: 60_001,
      maxValidityMs: 60_000,
    });
  });

  it('rejects windows outside the skew', () => {
    expect(detailOf(() => validateTimeWindow(now + 30_001, now + 30_010, now, policy))).toEqual({
      kind: 'NotYetValid',
      iatMs: now + 30_001,
      nowMs: now,
    });
    expect(detailOf(() => validateTimeWindow(now - 30_010, now - 30_001, now, policy))).toEqual({
      kind: 'Expired',
      expMs: now - 30_001,
      nowMs: now,
    });
  });

  it('rejects exp before iat', () => {
    expect(detailOf(() => validateTimeWindow(now, now - 1, now, policy))).toEqual({
      kind: 'InvalidTimeWindow',
      iatMs: now,
      expMs: now - 1,
    });
  });
});

describe('claims', () => {
  it('serializes request claims compactly in declaration order', () => {
    const bytes = encodeRequestClaims({
      leaderId: 'L',
      leaderKid: 0,
      toolId: 'T',
      iatMs: 1,
      expMs: 2,
      nonce: 'n',
      method: 'POST',
      path: '/invoke',
      query: '',
      bodySha256: 'ab',
    });
    expect(new TextDecoder().decode(bytes)).toBe(
      '{"leader_id":"L","leader_kid":0,"tool_id":"T","iat_ms":1,"exp_ms":2,"nonce":"n","method":"POST","path":"/invoke","query":"","body_sha256":"ab"}',
    );
    expect(parseRequestClaims(bytes).path).toBe('/invoke');
  });

  it('ignores unknown fields when parsing', () => {
    const claims = parseResponseClaims(
      utf8(
        '{"tool_id":"T","tool_kid":1,"iat_ms":5,"exp_ms":6,"nonce":"n","req_sig_input_sha256":"00","status":204,"body_sha256":"ff","extra":true}',
      ),
    );
    expect(claims).toEqual({
      toolId: 'T',
      toolKid: 1,
      iatMs: 5,
      expMs: 6,
      nonce: 'n',
      reqSigInputSha256: '00',
      status: 204,
      bodySha256: 'ff',
    });
  });

  it('rejects malformed and incomplete input', () => {
    expect(() => parseRequestClaims(utf8('not json'))).toThrow(/^invalid json in signed input: /);
    expect(() => parseRequestClaims(utf8('{"leader_id":"L"}'))).toThrow(SignedHttpError);
    expect(() => parseResponseClaims(utf8('{"tool_id":"T","tool_kid":-1}'))).toThrow(SignedHttpError);
  });
});

describe('parseHex32', () => {
  it('accepts 64 hex digits of either case', () => {
    expect(parseHex32('AB'.repeat(32))).toEqual(new Uint8Array(32).fill(0xab));
  });

  it('rejects other lengths and prefixes', () => {
    expect(parseHex32('ab'.repeat(31))).toBeUndefined();
    expect(parseHex32(`0x${'ab'.repeat(31)}`)).toBeUndefined();
    expect(parseHex32('zz'.repeat(32))).toBeUndefined();
  });
});

describe('header adapters', () => {
  it('looks headers up case-insensitively and takes the first repeated value', () => {
    const values = headersFromRecord({
      'x-nexus-sig-v': '1',
      'X-NEXUS-SIG-INPUT': ['first', 'second'],
      'content-type': 'application/json',
    });
    expect(values).toEqual({ version: '1', sigInput: 'first', signature: undefined });
  });

  it('maps null from a getter to absent', () => {
    const values = headersFromGetter((name) => (name === HEADER_SIG ? 'sig' : null));
    expect(values).toEqual({ version: undefined, sigInput: undefined, signature: 'sig' });
  });

  it('emits the three outgoing headers', () => {
    expect(toHeaderRecord({ sigInputB64: 'aW4', sigB64: 'c2ln' })).toEqual({
      'X-Nexus-Sig-V': '1',
      'X-Nexus-Sig-Input': 'aW4',
      'X-Nexus-Sig': 'c2ln',
    });
  });
});

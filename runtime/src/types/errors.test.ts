import { describe, it, expect } from 'vitest';
import {
  RuntimeErrorCodes,
  RuntimeError,
  ValidationError,
  SignedHttpError,
  ClientStateError,
  SchemaGenerationError,
  isRuntimeError,
  isSignedHttpError,
} from './errors.js';

describe('RuntimeError', () => {
  it('carries message, code and name', () => {
    const err = new RuntimeError('boom', RuntimeErrorCodes.VALIDATION_ERROR);
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('boom');
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.name).toBe('RuntimeError');
  });

  it('subclasses keep their own names and codes', () => {
    expect(new ValidationError('bad').code).toBe(RuntimeErrorCodes.VALIDATION_ERROR);
    expect(new ValidationError('bad').name).toBe('ValidationError');

    const state = new ClientStateError('unreadable', '/tmp/state.json');
    expect(state.code).toBe(RuntimeErrorCodes.CLIENT_STATE_ERROR);
    expect(state.path).toBe('/tmp/state.json');

    expect(new SchemaGenerationError('no module').code).toBe(RuntimeErrorCodes.SCHEMA_GENERATION_ERROR);
  });
});

describe('SignedHttpError', () => {
  it.each([
    [{ kind: 'UnsupportedVersion', version: '2' } as const, "unsupported signature version '2', expected '1'"],
    [{ kind: 'MissingHeader', header: 'X-Nexus-Sig' } as const, "missing required header 'X-Nexus-Sig'"],
    [{ kind: 'InvalidSignatureLength', length: 63 } as const, 'invalid signature length 63, expected 64'],
    [
      { kind: 'ToolIdMismatch', claimed: 'tool-a', expected: 'tool-b' } as const,
      "tool_id mismatch (claimed 'tool-a', expected 'tool-b')",
    ],
    [{ kind: 'StatusMismatch', claimed: 200, actual: 500 } as const, 'status mismatch (claimed 200, actual 500)'],
    [
      { kind: 'ValidityTooLarge', validityMs: 60001, maxValidityMs: 60000 } as const,
      'validity window too large (60001ms > 60000ms)',
    ],
    [
      { kind: 'UnknownInvokerKey', invokerId: 'leader-1', invokerKid: 3 } as const,
      'unknown leader key (leader_id=leader-1, leader_kid=3)',
    ],
    [{ kind: 'RequestBindingMismatch' } as const, 'response is not bound to the expected request'],
  ])('describes %o', (detail, message) => {
    const err = new SignedHttpError(detail);
    expect(err.message).toBe(message);
    expect(err.kind).toBe(detail.kind);
    expect(err.detail).toEqual(detail);
    expect(err.code).toBe(RuntimeErrorCodes.SIGNED_HTTP_ERROR);
  });
});

describe('type guards', () => {
  it('isRuntimeError matches runtime errors only', () => {
    expect(isRuntimeError(new ValidationError('x'))).toBe(true);
    expect(isRuntimeError(new Error('x'))).toBe(false);
    expect(isRuntimeError('x')).toBe(false);
  });

  it('isSignedHttpError narrows by kind', () => {
    const err = new SignedHttpError({ kind: 'InvalidSignature' });
    expect(isSignedHttpError(err)).toBe(true);
    expect(isSignedHttpError(err, 'InvalidSignature')).toBe(true);
    expect(isSignedHttpError(err, 'Expired')).toBe(false);
    expect(isSignedHttpError(new ValidationError('x'))).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@nexus-core/sdk';
import { ClientStateError, SignedHttpError, ValidationError } from '../types/errors.js';
import { formatCliError, rejectionCliError, toCliError } from './error-surface.js';

describe('toCliError', () => {
  it('answers signed-http failures with 401', () => {
    expect(toCliError(new SignedHttpError({ kind: 'InvalidSignature' }))).toEqual({
      kind: 'auth_failed',
      reason: 'invalid signature',
      statusCode: 401,
    });
  });

  it('uses the code of runtime and sdk errors', () => {
    expect(toCliError(new ValidationError('bad policy'))).toEqual({ kind: 'validation_error', reason: 'bad policy' });
    expect(toCliError(new ClientStateError('No identity key found', '/tmp/x'))).toEqual({
      kind: 'client_state_error',
      reason: 'No identity key found',
    });
    expect(toCliError(new ConfigurationError('missing gas'))).toEqual({ kind: 'configuration', reason: 'missing gas' });
  });

  it('falls back to internal_error', () => {
    expect(toCliError(new Error('boom'))).toEqual({ kind: 'internal_error', reason: 'boom' });
    expect(toCliError(42)).toEqual({ kind: 'internal_error', reason: '42' });
  });
});

describe('rejectionCliError', () => {
  it('maps replay rejections to their status codes', () => {
    expect(rejectionCliError('ReplayConflict').statusCode).toBe(401);
    expect(rejectionCliError('InFlight')).toEqual({
      kind: 'request_in_flight',
      reason: 'request with same nonce is still processing',
      statusCode: 409,
    });
  });
});

describe('formatCliError', () => {
  const error = new SignedHttpError({ kind: 'MissingHeader', header: 'x-nexus-sig' });

  it('renders a plain line by default', () => {
    expect(formatCliError(error)).toBe("error[auth_failed]: missing required header 'x-nexus-sig'");
  });

  it('renders compact JSON', () => {
    expect(formatCliError(error, 'json')).toBe(
      '{"error":"auth_failed","details":"missing required header \'x-nexus-sig\'"}',
    );
  });
});

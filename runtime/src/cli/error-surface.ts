/**
 * Maps runtime and SDK failures to the flat shape printed by command-line
 * front ends and returned as HTTP error bodies.
 *
 * @module
 */

import { isNexusError } from '@nexus-core/sdk';
import { isRuntimeError, isSignedHttpError } from '../types/errors.js';
import type { ResponderRejectionKind } from '../signed-http/responder.js';

export type CliErrorFormat = 'plain' | 'json';

export interface CliError {
  /** Stable snake_case identifier */
  kind: string;
  reason: string;
  /** HTTP status to answer with, when the failure is the caller's */
  statusCode?: number;
}

const HTTP_UNAUTHORIZED = 401;
const HTTP_CONFLICT = 409;

export function toCliError(error: unknown): CliError {
  if (isSignedHttpError(error)) {
    return { kind: 'auth_failed', reason: error.message, statusCode: HTTP_UNAUTHORIZED };
  }
  if (isRuntimeError(error) || isNexusError(error)) {
    return { kind: error.code.toLowerCase(), reason: error.message };
  }
  return {
    kind: 'internal_error',
    reason: error instanceof Error ? error.message : String(error),
  };
}

/** Error body for a replay rejection, which the responder reports as a value. */
export function rejectionCliError(kind: ResponderRejectionKind): CliError {
  switch (kind) {
    case 'ReplayConflict':
      return {
        kind: 'replay_rejected',
        reason: 'nonce already used with different request',
        statusCode: HTTP_UNAUTHORIZED,
      };
    case 'InFlight':
      return {
        kind: 'request_in_flight',
        reason: 'request with same nonce is still processing',
        statusCode: HTTP_CONFLICT,
      };
  }
}

/**
 * Render an error for a terminal (`error[kind]: reason`) or as a single-line
 * JSON object `{"error", "details"}`.
 */
export function formatCliError(error: unknown, format: CliErrorFormat = 'plain'): string {
  const cli = toCliError(error);
  if (format === 'json') {
    return JSON.stringify({ error: cli.kind, details: cli.reason });
  }
  return `error[${cli.kind}]: ${cli.reason}`;
}

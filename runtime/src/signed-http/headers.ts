/**
 * Adapters between HTTP library header shapes and the signature header
 * triple, so callers never spell the protocol header names themselves.
 *
 * @module
 */

import {
  HEADER_SIG,
  HEADER_SIG_INPUT,
  HEADER_SIG_VERSION,
  signatureHeaderPairs,
  type EncodedSignatureHeaders,
  type SignatureHeaderValues,
} from './wire.js';

/** Node's `IncomingHttpHeaders` and plain objects both fit. */
export type HeaderRecord = Record<string, string | string[] | undefined>;

/** Build from a lookup such as `(name) => req.headers.get(name) ?? undefined`. */
export function headersFromGetter(get: (name: string) => string | null | undefined): SignatureHeaderValues {
  return {
    version: get(HEADER_SIG_VERSION) ?? undefined,
    sigInput: get(HEADER_SIG_INPUT) ?? undefined,
    signature: get(HEADER_SIG) ?? undefined,
  };
}

/**
 * Case-insensitive lookup in a header record. A repeated header yields its
 * first value.
 */
export function headersFromRecord(headers: HeaderRecord): SignatureHeaderValues {
  const lowered = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    const first = Array.isArray(value) ? value[0] : value;
    if (first !== undefined && !lowered.has(name.toLowerCase())) {
      lowered.set(name.toLowerCase(), first);
    }
  }
  return headersFromGetter((name) => lowered.get(name.toLowerCase()));
}

/** Plain object of the three outgoing headers. */
export function toHeaderRecord(headers: EncodedSignatureHeaders): Record<string, string> {
  return Object.fromEntries(signatureHeaderPairs(headers));
}

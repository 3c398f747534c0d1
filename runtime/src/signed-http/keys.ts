/**
 * Public key lookup for both sides of a signed invocation.
 *
 * @module
 */

/** Resolves leader keys when a tool authenticates a request. */
export interface InvokerKeyResolver {
  invokerPublicKey(invokerId: string, invokerKid: number): Uint8Array | undefined;
}

/** Resolves tool keys when a leader verifies a response. */
export interface ResponderKeyResolver {
  responderPublicKey(responderId: string, responderKid: number): Uint8Array | undefined;
}

/** A single known tool key. */
export class StaticResponderKey implements ResponderKeyResolver {
  constructor(
    readonly responderId: string,
    readonly responderKid: number,
    readonly publicKey: Uint8Array,
  ) {}

  responderPublicKey(responderId: string, responderKid: number): Uint8Array | undefined {
    if (responderId !== this.responderId || responderKid !== this.responderKid) {
      return undefined;
    }
    return this.publicKey;
  }
}

/**
 * In-memory `(id, kid) -> key` table usable on either side.
 */
export class KeyTable implements InvokerKeyResolver, ResponderKeyResolver {
  private readonly keys = new Map<string, Map<number, Uint8Array>>();

  /** Later inserts for the same `(id, kid)` replace earlier ones. */
  set(id: string, kid: number, publicKey: Uint8Array): this {
    const kids = this.keys.get(id) ?? new Map<number, Uint8Array>();
    kids.set(kid, publicKey);
    this.keys.set(id, kids);
    return this;
  }

  get(id: string, kid: number): Uint8Array | undefined {
    return this.keys.get(id)?.get(kid);
  }

  ids(): string[] {
    return [...this.keys.keys()];
  }

  invokerPublicKey(invokerId: string, invokerKid: number): Uint8Array | undefined {
    return this.get(invokerId, invokerKid);
  }

  responderPublicKey(responderId: string, responderKid: number): Uint8Array | undefined {
    return this.get(responderId, responderKid);
  }
}

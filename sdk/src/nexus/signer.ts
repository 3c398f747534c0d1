/**
 * Transaction signing and submission.
 *
 * The signer owns the sender key. It signs the intent message over the BCS
 * transaction bytes, submits, waits for the transaction to appear in a
 * checkpoint and decodes the Nexus events of the result.
 *
 * @module
 */

import { blake2b } from "@noble/hashes/blake2b";
import { ED25519_SCHEME_FLAG, type Ed25519Keypair } from "../crypto/ed25519.js";
import { decodeNexusEvent } from "../events/decode.js";
import type { NexusEvent, RawLedgerEvent } from "../events/types.js";
import { errorMessage, NotNexusEventError, TimeoutError, WalletError } from "../errors.js";
import type { ExecutedTransaction, LedgerClient, ObjectChange } from "../ledger/types.js";
import { getSdkLogger, type Logger } from "../logger.js";
import { serializeTransactionData, transactionDigest, type TransactionData } from "../transactions/bcs.js";
import { addressFromPublicKey, type Address } from "../types/address.js";
import type { NexusObjects } from "../types/nexus-objects.js";
import { concatBytes } from "../utils/encoding.js";
import type { GasCoinLease } from "./gas-pool.js";

/** Intent scope `TransactionData`, version 0, app id 0. */
const TRANSACTION_INTENT = Uint8Array.of(0, 0, 0);

export const DEFAULT_TRANSACTION_TIMEOUT_MS = 5_000;

export interface SignerOptions {
  keypair: Ed25519Keypair;
  ledger: LedgerClient;
  objects: NexusObjects;
  transactionTimeoutMs?: number;
  logger?: Logger;
}

export interface ExecutedTransactionResult {
  digest: string;
  /** Nexus events emitted by the transaction, in emission order */
  events: NexusEvent[];
  objectChanges: ObjectChange[];
  checkpoint?: bigint;
}

interface Confirmation {
  included: boolean;
  error?: unknown;
}

export class Signer {
  private readonly keypair: Ed25519Keypair;
  private readonly ledger: LedgerClient;
  private readonly objects: NexusObjects;
  private readonly logger: Logger;
  readonly transactionTimeoutMs: number;
  readonly address: Address;

  constructor(options: SignerOptions) {
    this.keypair = options.keypair;
    this.ledger = options.ledger;
    this.objects = options.objects;
    this.transactionTimeoutMs = options.transactionTimeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS;
    this.logger = options.logger ?? getSdkLogger();
    this.address = addressFromPublicKey(this.keypair.publicKeyBytes(), ED25519_SCHEME_FLAG);
  }

  /** Serialized user signature: `flag || signature || public key`. */
  signTransaction(txBytes: Uint8Array): Uint8Array {
    const digest = blake2b(concatBytes(TRANSACTION_INTENT, txBytes), { dkLen: 32 });
    return concatBytes(Uint8Array.of(ED25519_SCHEME_FLAG), this.keypair.sign(digest), this.keypair.publicKeyBytes());
  }

  /**
   * Sign, submit and confirm `data`. On success `gas.ref` points at the gas
   * coin's new version.
   *
   * @throws TimeoutError when no checkpoint includes the transaction in time
   * @throws WalletError when submission or execution fails
   */
  async executeTransaction(data: TransactionData, gas: GasCoinLease): Promise<ExecutedTransactionResult> {
    const txBytes = serializeTransactionData(data);
    const digest = transactionDigest(txBytes);
    const signature = this.signTransaction(txBytes);

    // Subscribe before submitting so the including checkpoint cannot be missed.
    const abort = new AbortController();
    const confirmed = this.confirm(digest, abort.signal);

    try {
      let response: ExecutedTransaction;
      try {
        response = await this.ledger.executeTransaction({ txBytes, signatures: [signature] });
      } catch (error) {
        throw new WalletError(`Transaction submission failed: ${errorMessage(error)}`, error);
      }
      this.logger.debug(`Submitted ${response.digest}`);

      await this.withTimeout(confirmed, digest);

      if (!response.success) {
        throw new WalletError(`Transaction execution failed: ${response.error ?? "unknown error"}`);
      }

      const gasChange = response.objectChanges.find((change) => change.objectId === gas.ref.objectId);
      if (gasChange?.version !== undefined && gasChange.digest !== undefined) {
        gas.ref = { objectId: gas.ref.objectId, version: gasChange.version, digest: gasChange.digest };
      }

      return {
        digest: response.digest,
        events: this.decodeEvents(response.events),
        objectChanges: response.objectChanges,
        checkpoint: response.checkpoint,
      };
    } finally {
      abort.abort();
    }
  }

  /** Nexus events among `raws`; other events are skipped. */
  decodeEvents(raws: readonly RawLedgerEvent[]): NexusEvent[] {
    const events: NexusEvent[] = [];
    for (const raw of raws) {
      try {
        events.push(decodeNexusEvent(raw, { primitivesPkgId: this.objects.primitivesPkgId }));
      } catch (error) {
        if (!(error instanceof NotNexusEventError)) {
          this.logger.warn(`Skipping undecodable event ${raw.id.eventSeq}: ${errorMessage(error)}`);
        }
      }
    }
    return events;
  }

  /** Never rejects; a stream failure is reported in the result. */
  private async confirm(digest: string, signal: AbortSignal): Promise<Confirmation> {
    try {
      for await (const checkpoint of this.ledger.subscribeCheckpoints(signal)) {
        if (checkpoint.transactionDigests.includes(digest)) {
          this.logger.debug(`${digest} included in checkpoint ${checkpoint.sequenceNumber}`);
          return { included: true };
        }
      }
      return { included: false };
    } catch (error) {
      return { included: false, error };
    }
  }

  private async withTimeout(confirmed: Promise<Confirmation>, digest: string): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<Confirmation>((resolve) => {
      timer = setTimeout(() => resolve({ included: false }), this.transactionTimeoutMs);
    });
    try {
      const result = await Promise.race([confirmed, timeout]);
      if (result.error !== undefined) {
        throw new WalletError(`Checkpoint subscription failed: ${errorMessage(result.error)}`, result.error);
      }
      if (!result.included) {
        throw new TimeoutError(`Transaction ${digest} confirmation timed out`, this.transactionTimeoutMs);
      }
    } finally {
      clearTimeout(timer);
    }
  }
}

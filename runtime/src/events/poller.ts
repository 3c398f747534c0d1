/**
 * EventPoller - follows the ledger's checkpoint stream and yields the Nexus
 * events each checkpoint carries.
 *
 * The poller itself never fails: a broken or finished subscription is
 * retried with exponential backoff, and events that are not Nexus events are
 * skipped. Polling stops when the caller's signal aborts.
 *
 * @module
 */

import { setTimeout as sleep } from 'node:timers/promises';
import {
  NotNexusEventError,
  decodeNexusEvent,
  errorMessage,
  type Address,
  type CheckpointSummary,
  type LedgerClient,
  type NexusEvent,
} from '@nexus-core/sdk';
import { silentLogger, type Logger } from '../utils/logger.js';

/** Nexus events of one checkpoint. */
export interface EventPage {
  checkpoint: bigint;
  events: NexusEvent[];
}

/**
 * EventPoller configuration
 */
export interface EventPollerConfig {
  ledger: LedgerClient;
  /** Only accept the event wrapper published by this package */
  primitivesPkgId?: Address;
  /** First checkpoint of interest; earlier ones are skipped */
  fromCheckpoint?: bigint;
  /** Delay before the first retry (default 100 ms) */
  initialBackoffMs?: number;
  /** Retry delays double up to this cap (default 2 s) */
  maxBackoffMs?: number;
  /** Yield checkpoints without Nexus events too (default false) */
  includeEmpty?: boolean;
  logger?: Logger;
}

export class EventPoller {
  private readonly ledger: LedgerClient;
  private readonly primitivesPkgId: Address | undefined;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly includeEmpty: boolean;
  private readonly logger: Logger;
  private nextCheckpoint: bigint;

  constructor(config: EventPollerConfig) {
    this.ledger = config.ledger;
    this.primitivesPkgId = config.primitivesPkgId;
    this.initialBackoffMs = config.initialBackoffMs ?? 100;
    this.maxBackoffMs = config.maxBackoffMs ?? 2_000;
    this.includeEmpty = config.includeEmpty ?? false;
    this.logger = config.logger ?? silentLogger;
    this.nextCheckpoint = config.fromCheckpoint ?? 0n;
  }

  /** Sequence number the poller will accept next; persist it to resume. */
  get cursor(): bigint {
    return this.nextCheckpoint;
  }

  /**
   * Iterate pages until `signal` aborts. Checkpoints replayed by a new
   * subscription are skipped, so each is yielded at most once.
   */
  async *pages(signal: AbortSignal): AsyncGenerator<EventPage> {
    let backoffMs = this.initialBackoffMs;

    while (!signal.aborted) {
      try {
        for await (const checkpoint of this.ledger.subscribeCheckpoints(signal)) {
          if (checkpoint.sequenceNumber < this.nextCheckpoint) continue;
          this.nextCheckpoint = checkpoint.sequenceNumber + 1n;
          backoffMs = this.initialBackoffMs;

          const page = this.decodePage(checkpoint);
          if (page.events.length > 0 || this.includeEmpty) {
            yield page;
          }
        }
        if (signal.aborted) return;
        this.logger.debug('Checkpoint subscription ended, resubscribing');
      } catch (error) {
        if (signal.aborted) return;
        this.logger.warn(`Checkpoint subscription failed: ${errorMessage(error)}`);
      }

      await sleep(backoffMs, undefined, { signal }).catch((error: unknown) => {
        if (!signal.aborted) throw error;
      });
      backoffMs = Math.min(backoffMs * 2, this.maxBackoffMs);
    }
  }

  /**
   * Deliver pages to `handler` until `signal` aborts. A handler error stops
   * polling and is rethrown.
   */
  async run(handler: (page: EventPage) => Promise<void> | void, signal: AbortSignal): Promise<void> {
    for await (const page of this.pages(signal)) {
      await handler(page);
    }
  }

  private decodePage(checkpoint: CheckpointSummary): EventPage {
    const events: NexusEvent[] = [];
    for (const raw of checkpoint.events) {
      try {
        events.push(decodeNexusEvent(raw, { primitivesPkgId: this.primitivesPkgId }));
      } catch (error) {
        if (error instanceof NotNexusEventError) continue;
        this.logger.warn(
          `Skipping undecodable event ${raw.id.txDigest}:${raw.id.eventSeq} in checkpoint ${checkpoint.sequenceNumber}: ${errorMessage(error)}`,
        );
      }
    }
    return { checkpoint: checkpoint.sequenceNumber, events };
  }
}

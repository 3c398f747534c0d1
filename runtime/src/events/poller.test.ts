import { describe, it, expect, vi } from 'vitest';
import { MemoryLedger, emitNexusEvent, normalizeAddress, type CheckpointSummary, type Logger } from '@nexus-core/sdk';
import { EventPoller, type EventPage } from './poller.js';

const PRIMITIVES = normalizeAddress('0x1f');
const WORKFLOW = normalizeAddress('0x2f');
const DAG_A = normalizeAddress('0xda');
const DAG_B = normalizeAddress('0xdb');

function dagCreated(dag: string, txDigest: string, eventSeq = 0n) {
  return emitNexusEvent(
    { kind: 'DAGCreated', json: { dag } },
    { primitivesPkgId: PRIMITIVES, workflowPkgId: WORKFLOW, id: { txDigest, eventSeq } },
  );
}

async function take(poller: EventPoller, count: number): Promise<EventPage[]> {
  const controller = new AbortController();
  const pages: EventPage[] = [];
  for await (const page of poller.pages(controller.signal)) {
    pages.push(page);
    if (pages.length === count) break;
  }
  controller.abort();
  return pages;
}

function recordingLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), setLevel: vi.fn() };
}

class FlakyLedger extends MemoryLedger {
  subscriptions = 0;

  async *subscribeCheckpoints(signal: AbortSignal): AsyncIterable<CheckpointSummary> {
    this.subscriptions++;
    if (this.subscriptions === 1) {
      for await (const checkpoint of super.subscribeCheckpoints(signal)) {
        yield checkpoint;
        throw new Error('stream reset');
      }
    }
    yield* super.subscribeCheckpoints(signal);
  }
}

describe('EventPoller', () => {
  it('yields decoded Nexus events per checkpoint and skips foreign ones', async () => {
    const ledger = new MemoryLedger();
    ledger.publishCheckpoint({
      sequenceNumber: 0n,
      transactionDigests: ['tx0'],
      events: [
        dagCreated(DAG_A, 'tx0'),
        { eventType: '0x2::coin::Minted', json: {}, id: { txDigest: 'tx0', eventSeq: 1n } },
      ],
    });
    ledger.publishCheckpoint({ sequenceNumber: 1n, transactionDigests: [] });
    ledger.publishCheckpoint({ sequenceNumber: 2n, transactionDigests: ['tx2'], events: [dagCreated(DAG_B, 'tx2')] });

    const poller = new EventPoller({ ledger, primitivesPkgId: PRIMITIVES });
    const pages = await take(poller, 2);

    expect(pages.map((page) => page.checkpoint)).toEqual([0n, 2n]);
    expect(pages[0].events).toHaveLength(1);
    expect(pages[0].events[0].data).toEqual({ kind: 'DAGCreated', json: { dag: DAG_A } });
    expect(pages[0].events[0].id).toEqual({ txDigest: 'tx0', eventSeq: 0n });
    expect(pages[1].events[0].data).toEqual({ kind: 'DAGCreated', json: { dag: DAG_B } });
    expect(poller.cursor).toBe(3n);
  });

  it('starts from the configured checkpoint', async () => {
    const ledger = new MemoryLedger();
    ledger.publishCheckpoint({ sequenceNumber: 4n, transactionDigests: ['a'], events: [dagCreated(DAG_A, 'a')] });
    ledger.publishCheckpoint({ sequenceNumber: 5n, transactionDigests: ['b'], events: [dagCreated(DAG_B, 'b')] });

    const pages = await take(new EventPoller({ ledger, fromCheckpoint: 5n }), 1);

    expect(pages).toHaveLength(1);
    expect(pages[0].checkpoint).toBe(5n);
  });

  it('yields empty checkpoints when asked to', async () => {
    const ledger = new MemoryLedger();
    ledger.publishCheckpoint({ sequenceNumber: 0n, transactionDigests: [] });

    const pages = await take(new EventPoller({ ledger, includeEmpty: true }), 1);

    expect(pages).toEqual([{ checkpoint: 0n, events: [] }]);
  });

  it('resubscribes after a failure without repeating checkpoints', async () => {
    const ledger = new FlakyLedger();
    ledger.publishCheckpoint({ sequenceNumber: 0n, transactionDigests: ['a'], events: [dagCreated(DAG_A, 'a')] });
    ledger.publishCheckpoint({ sequenceNumber: 1n, transactionDigests: ['b'], events: [dagCreated(DAG_B, 'b')] });
    const logger = recordingLogger();

    const pages = await take(new EventPoller({ ledger, initialBackoffMs: 1, logger }), 2);

    expect(pages.map((page) => page.checkpoint)).toEqual([0n, 1n]);
    expect(ledger.subscriptions).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith('Checkpoint subscription failed: stream reset');
  });

  it('skips Nexus events whose payload does not decode', async () => {
    const ledger = new MemoryLedger();
    const broken = { ...dagCreated(DAG_A, 'tx0'), json: { unexpected: true } };
    ledger.publishCheckpoint({ sequenceNumber: 0n, transactionDigests: ['tx0'], events: [broken, dagCreated(DAG_B, 'tx0', 1n)] });
    const logger = recordingLogger();

    const pages = await take(new EventPoller({ ledger, logger }), 1);

    expect(pages[0].events.map((event) => event.data)).toEqual([{ kind: 'DAGCreated', json: { dag: DAG_B } }]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toMatch(/^Skipping undecodable event tx0:0 in checkpoint 0: /);
  });

  it('delivers pages to a handler until aborted', async () => {
    const ledger = new MemoryLedger();
    ledger.publishCheckpoint({ sequenceNumber: 0n, transactionDigests: ['a'], events: [dagCreated(DAG_A, 'a')] });
    const controller = new AbortController();
    const seen: bigint[] = [];

    await new EventPoller({ ledger }).run((page) => {
      seen.push(page.checkpoint);
      controller.abort();
    }, controller.signal);

    expect(seen).toEqual([0n]);
  });
});

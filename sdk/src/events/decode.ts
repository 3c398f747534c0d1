/**
 * Ledger event decoding.
 *
 * Nexus events are emitted wrapped as `<primitives>::event::EventWrapper<T>`
 * with a payload of `{ event: <T fields> }`. The decoder tags the payload with
 * the inner struct name, rewrites scheduled envelopes so that every nested
 * `request` carries its own tag, then dispatches on the tag.
 *
 * @module
 */

import { formatZodIssues } from "../utils/zod.js";
import {
  MalformedPayloadError,
  NotAStructError,
  NotNexusEventError,
  UnknownEventKindError,
} from "../errors.js";
import { normalizeAddress, type Address } from "../types/address.js";
import { formatStructTag, formatTypeTag, parseStructTag, type StructTag, type TypeTag } from "../types/type-tag.js";
import { EVENT_PAYLOAD_SCHEMAS, isPlainKindName, scheduledEnvelopeSchema } from "./schemas.js";
import { NEXUS_EVENT_TYPE_TAG, type NexusEvent, type NexusEventKind, type RawLedgerEvent } from "./types.js";

export const EVENT_WRAPPER_MODULE = "event";
export const EVENT_WRAPPER_NAME = "EventWrapper";
const SCHEDULED = "RequestScheduledExecution";

export interface DecodeEventOptions {
  /** When set, the wrapper must also live in this package */
  primitivesPkgId?: Address;
}

/** Payload tagged with the Move name of the event it carries. */
export interface TaggedEvent {
  [NEXUS_EVENT_TYPE_TAG]: string;
  event: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function innerStruct(tag: TypeTag | undefined, context: string): StructTag {
  if (tag === undefined) throw new NotAStructError(`no type parameter on ${context}`);
  if (tag.kind !== "struct") throw new NotAStructError(formatTypeTag(tag));
  return tag.struct;
}

function kindNameOf(moveName: string): string {
  if (moveName === SCHEDULED) return moveName;
  return moveName.endsWith("Event") ? moveName.slice(0, -"Event".length) : moveName;
}

/**
 * Rewrite scheduled envelopes so that each `request` becomes
 * `{ _nexus_event_type: <name>, event: <request> }`, where the name comes
 * from the type parameter at the same nesting depth. Nested envelopes
 * (`RequestScheduledExecution<RequestScheduledExecution<X>>`) are rewritten
 * level by level.
 */
export function tagScheduledRequests(moveName: string, typeParams: TypeTag[], payload: unknown): TaggedEvent {
  if (!isRecord(payload) || !isRecord(payload.event)) {
    throw new MalformedPayloadError(moveName, ["event: expected an object"]);
  }
  const tagged: TaggedEvent = { [NEXUS_EVENT_TYPE_TAG]: moveName, event: payload.event };
  if (moveName !== SCHEDULED) return tagged;

  const inner = innerStruct(typeParams[0], moveName);
  const request = tagged.event.request;
  return {
    ...tagged,
    event: {
      ...tagged.event,
      request: tagScheduledRequests(inner.name, inner.typeParams, { event: request }),
    },
  };
}

/** Decode a tagged payload into its typed kind. */
export function parseTaggedEvent(tagged: TaggedEvent): NexusEventKind {
  const moveName = tagged[NEXUS_EVENT_TYPE_TAG];
  const kindName = kindNameOf(moveName);

  if (kindName === SCHEDULED) {
    const envelope = scheduledEnvelopeSchema.safeParse(tagged.event);
    if (!envelope.success) throw new MalformedPayloadError(moveName, formatZodIssues(envelope.error));
    const request = envelope.data.request;
    if (!isRecord(request) || typeof request[NEXUS_EVENT_TYPE_TAG] !== "string" || !isRecord(request.event)) {
      throw new MalformedPayloadError(moveName, ["request: expected a tagged event"]);
    }
    return {
      kind: "RequestScheduledExecution",
      request: parseTaggedEvent({ [NEXUS_EVENT_TYPE_TAG]: request[NEXUS_EVENT_TYPE_TAG], event: request.event }),
      priority: envelope.data.priority,
      requestMs: envelope.data.request_ms,
      startMs: envelope.data.start_ms,
      deadlineMs: envelope.data.deadline_ms,
    };
  }

  if (kindName === moveName || !isPlainKindName(kindName)) {
    throw new UnknownEventKindError(moveName);
  }

  const parsed = EVENT_PAYLOAD_SCHEMAS[kindName].safeParse(tagged.event);
  if (!parsed.success) throw new MalformedPayloadError(moveName, formatZodIssues(parsed.error));
  return parsed.data;
}

/**
 * Decode a raw ledger event.
 *
 * @throws NotNexusEventError when the outer type is not the event wrapper
 * @throws NotAStructError when a type parameter the decoder needs is not a struct
 * @throws UnknownEventKindError for an unrecognized inner event
 * @throws MalformedPayloadError when the payload does not match the event
 */
export function decodeNexusEvent(raw: RawLedgerEvent, options: DecodeEventOptions = {}): NexusEvent {
  const outer = typeof raw.eventType === "string" ? parseStructTag(raw.eventType) : raw.eventType;

  const isWrapper = outer.module === EVENT_WRAPPER_MODULE && outer.name === EVENT_WRAPPER_NAME;
  const fromPrimitives =
    options.primitivesPkgId === undefined || normalizeAddress(outer.address) === normalizeAddress(options.primitivesPkgId);
  if (!isWrapper || !fromPrimitives) {
    throw new NotNexusEventError(formatStructTag(outer));
  }

  const inner = innerStruct(outer.typeParams[0], formatStructTag(outer));
  const tagged = tagScheduledRequests(inner.name, inner.typeParams, raw.json);

  return {
    id: raw.id,
    generics: inner.typeParams,
    data: parseTaggedEvent(tagged),
  };
}

/** Decode events, skipping those that are not Nexus events. Other failures propagate. */
export function decodeNexusEvents(raws: readonly RawLedgerEvent[], options: DecodeEventOptions = {}): NexusEvent[] {
  const events: NexusEvent[] = [];
  for (const raw of raws) {
    try {
      events.push(decodeNexusEvent(raw, options));
    } catch (error) {
      if (error instanceof NotNexusEventError) continue;
      throw error;
    }
  }
  return events;
}

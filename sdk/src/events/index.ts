export * from "./types.js";
export { EVENT_PAYLOAD_SCHEMAS } from "./schemas.js";
export {
  EVENT_WRAPPER_MODULE,
  EVENT_WRAPPER_NAME,
  decodeNexusEvent,
  decodeNexusEvents,
  parseTaggedEvent,
  tagScheduledRequests,
  type DecodeEventOptions,
  type TaggedEvent,
} from "./decode.js";
export { emitEventFields, emitNexusEvent, eventTypeTag, type EmitEventOptions } from "./emit.js";

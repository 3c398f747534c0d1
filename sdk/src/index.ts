/**
 * @nexus-core/sdk - client SDK for Nexus workflows
 *
 * - Typed decoding of the ledger's Nexus events
 * - Object crawler over the ledger node API
 * - Programmable-transaction composer for DAGs, the scheduler, tools, gas
 *   and network auth
 * - {@link NexusClient}, an action facade with gas-coin pooling and signing
 */

export * from "./errors.js";
export {
  createLogger,
  getSdkLogger,
  parseLogLevel,
  setSdkLogLevel,
  setSdkLogger,
  silentLogger,
  type LogLevel,
  type Logger,
} from "./logger.js";

// Encoding and crypto
export * from "./utils/encoding.js";
export * from "./utils/numeric.js";
export * from "./utils/retry.js";
export { formatZodIssues } from "./utils/zod.js";
export * from "./crypto/ed25519.js";

// Data model
export * from "./types/address.js";
export * from "./types/allowed-leaders.js";
export * from "./types/codecs.js";
export * from "./types/dag.js";
export * from "./types/nexus-data.js";
export * from "./types/nexus-objects.js";
export * from "./types/object.js";
export * from "./types/runtime-vertex.js";
export * from "./types/tool.js";
export * from "./types/type-tag.js";

// Ledger access
export * from "./events/index.js";
export * from "./ledger/index.js";
export * from "./crawler/index.js";

// Composition and facade
export * from "./transactions/index.js";
export * from "./nexus/index.js";

export const VERSION = "0.1.0";

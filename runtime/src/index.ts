/**
 * @nexus-core/runtime - Leader and Tool side runtime for Nexus
 *
 * Signed HTTP v1 sessions with replay protection, checkpoint event polling,
 * persisted client state and on-chain tool schema generation. Ledger access,
 * codecs and transaction building live in @nexus-core/sdk.
 *
 * @packageDocumentation
 */

// Errors
export {
  RuntimeErrorCodes,
  RuntimeError,
  ValidationError,
  SignedHttpError,
  ClientStateError,
  SchemaGenerationError,
  isRuntimeError,
  isSignedHttpError,
  type RuntimeErrorCode,
  type SignedHttpErrorDetail,
  type SignedHttpErrorKind,
} from './types/errors.js';

// Logging
export {
  RUNTIME_LOG_PREFIX,
  createLogger,
  loggerFromEnv,
  silentLogger,
  type Logger,
  type LogLevel,
} from './utils/logger.js';

// Signed HTTP v1
export * from './signed-http/index.js';

// Event polling
export { EventPoller, type EventPage, type EventPollerConfig } from './events/poller.js';

// Client state
export {
  CLIENT_STATE_FILE,
  ClientStateStore,
  defaultClientStatePath,
  nexusConfigDir,
  normalizeSessionId,
  type ClientState,
  type ClientStateStoreConfig,
  type TakenSession,
} from './state/client-state.js';

// CLI error surface
export {
  formatCliError,
  rejectionCliError,
  toCliError,
  type CliError,
  type CliErrorFormat,
} from './cli/error-surface.js';

// On-chain tool schemas
export {
  SUMMARY_DIRECTORY,
  findModuleInSummary,
  generateOnChainSchema,
  inputSchemaFromSummary,
  isTxContextType,
  moveTypeToSchema,
  outputSchemaFromSummary,
  readModuleSummary,
  runSuiMoveSummary,
  type MoveDatatype,
  type MoveModuleId,
  type MoveModuleSummary,
  type MoveParameter,
  type MovePrimitive,
  type MoveType,
  type OnChainToolSchemas,
  type SummaryRunner,
  type TypeSchema,
  type VariantSchema,
} from './tools/onchain-schema.js';

export const VERSION = '0.1.0';

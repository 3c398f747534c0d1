export {
  NexusClient,
  NexusClientBuilder,
  findCreatedObject,
  findCreatedObjectOfType,
  type NexusClientParts,
} from "./client.js";
export { GasPool, type GasCoinLease } from "./gas-pool.js";
export { Signer, DEFAULT_TRANSACTION_TIMEOUT_MS, type ExecutedTransactionResult, type SignerOptions } from "./signer.js";
export {
  MAX_SAVE_FOR_EPOCHS,
  commitEntryData,
  commitNexusData,
  fetchNexusData,
  type ArtifactStorage,
  type SessionCipher,
  type StorageConf,
} from "./storage.js";
export {
  WorkflowActions,
  type ExecuteDagParams,
  type ExecuteResult,
  type ExecutionStep,
  type ExecutionTrace,
  type InspectOptions,
  type PublishResult,
} from "./workflow.js";
export {
  SchedulerActions,
  type CreateTaskParams,
  type CreateTaskResult,
  type PeriodicScheduleConfig,
  type ScheduleResult,
  type TaskStateResult,
  type UpdateMetadataResult,
} from "./scheduler.js";
export {
  ToolActions,
  type RegisterOffChainParams,
  type RegisterOffChainResult,
  type RegisterOnChainResult,
} from "./tools.js";
export { GasActions, type GasActionResult } from "./gas.js";
export {
  NetworkAuthActions,
  keyBindingSchema,
  keyRecordSchema,
  type KeyBinding,
  type KeyRecord,
  type RegisteredKey,
  type RegisteredLeaderKey,
  type RegisteredToolKey,
} from "./network-auth.js";

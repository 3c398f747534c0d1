export * from "./types.js";
export { protoValueToJson, jsonToProtoValue, classifyNumber, type ProtoValue, type NumberClass } from "./value.js";
export {
  GrpcLedgerClient,
  DEFAULT_PROTO_PATH,
  GATEWAY_PROTO_PACKAGE,
  loadGatewayMethods,
  type GrpcLedgerClientOptions,
} from "./grpc-client.js";
export { MemoryLedger, type MemoryObject, type TransactionHandler } from "./memory.js";

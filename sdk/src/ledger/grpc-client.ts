/**
 * gRPC implementation of {@link LedgerClient} against the Nexus ledger
 * gateway.
 *
 * The gateway's service definitions are loaded from
 * `proto/nexus/gateway/v1/gateway.proto` at construction time with
 * `@grpc/proto-loader`; no generated stubs are involved. Every response is validated before it is mapped to the SDK types,
 * and transport failures surface as {@link RpcError} carrying the gRPC status.
 *
 * @module
 */

import { fileURLToPath } from "node:url";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { z } from "zod";
import { ConfigurationError, ParsingError, RpcError, errorMessage } from "../errors.js";
import type { RawLedgerEvent } from "../events/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { addressSchema, type Address } from "../types/address.js";
import type { Owner } from "../types/object.js";
import { withRetry, type RetryConfig } from "../utils/retry.js";
import type {
  CheckpointSummary,
  DynamicFieldPage,
  EpochInfo,
  ExecuteTransactionRequest,
  ExecutedTransaction,
  LedgerClient,
  LedgerObject,
  ListDynamicFieldsRequest,
  ObjectChange,
  ObjectField,
} from "./types.js";
import { protoValueToJson, type ProtoValue } from "./value.js";

export const DEFAULT_PROTO_PATH = fileURLToPath(new URL("../../proto/nexus/gateway/v1/gateway.proto", import.meta.url));

export const GATEWAY_PROTO_PACKAGE = "nexus.gateway.v1";

const GATEWAY_SERVICES = ["LedgerService", "StateService", "TransactionExecutionService", "SubscriptionService"] as const;

export interface GrpcLedgerClientOptions {
  /** `host:port` of the ledger gateway */
  address: string;
  /** Use TLS (default: true) */
  tls?: boolean;
  /** Per-call deadline in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Retry policy for idempotent reads */
  retry?: Partial<RetryConfig>;
  /** Override where the service definitions are read from */
  protoPath?: string;
  logger?: Logger;
}

// ============================================================================
// Response schemas (proto-loader output: camelCase, u64 as string, enums as names)
// ============================================================================

const u64String = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    try {
      return BigInt(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid u64: ${value}` });
      return z.NEVER;
    }
  });

const bytesField = z.instanceof(Uint8Array);

const protoValueSchema: z.ZodType<ProtoValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    nullValue: z.union([z.string(), z.number(), z.null()]).optional(),
    numberValue: z.number().optional(),
    stringValue: z.string().optional(),
    boolValue: z.boolean().optional(),
    structValue: z.object({ fields: z.record(protoValueSchema).optional() }).nullish(),
    listValue: z.object({ values: z.array(protoValueSchema).optional() }).nullish(),
    kind: z.string().optional(),
  }),
);

const ownerSchema = z.object({
  kind: z.string().nullish(),
  address: addressSchema.nullish(),
  version: u64String.nullish(),
});

const objectSchema = z.object({
  objectId: addressSchema.nullish(),
  version: u64String.nullish(),
  digest: z.string().nullish(),
  owner: ownerSchema.nullish(),
  objectType: z.string().nullish(),
  balance: u64String.nullish(),
  json: protoValueSchema.nullish(),
});

const getObjectResponseSchema = z.object({ object: objectSchema.nullish() });

const batchGetObjectsResponseSchema = z.object({
  objects: z
    .array(
      z.object({
        object: objectSchema.nullish(),
        error: z.object({ code: z.number().nullish(), message: z.string().nullish() }).nullish(),
      }),
    )
    .default([]),
});

const getEpochResponseSchema = z.object({
  epoch: z
    .object({
      epoch: u64String.nullish(),
      referenceGasPrice: u64String.nullish(),
      endTimestampMs: u64String.nullish(),
    })
    .nullish(),
});

const listDynamicFieldsResponseSchema = z.object({
  dynamicFields: z
    .array(
      z.object({
        kind: z.string().nullish(),
        fieldId: addressSchema.nullish(),
        childId: addressSchema.nullish(),
      }),
    )
    .default([]),
  nextPageToken: bytesField.nullish(),
});

const eventSchema = z.object({
  eventType: z.string().nullish(),
  json: protoValueSchema.nullish(),
});

const executedTransactionSchema = z.object({
  digest: z.string().nullish(),
  effects: z
    .object({
      status: z.object({ success: z.boolean().nullish(), error: z.string().nullish() }).nullish(),
      changedObjects: z
        .array(
          z.object({
            objectId: addressSchema.nullish(),
            idOperation: z.string().nullish(),
            outputVersion: u64String.nullish(),
            outputDigest: z.string().nullish(),
            outputOwner: ownerSchema.nullish(),
            objectType: z.string().nullish(),
          }),
        )
        .default([]),
    })
    .nullish(),
  events: z.object({ events: z.array(eventSchema).default([]) }).nullish(),
  checkpoint: u64String.nullish(),
});

const executeTransactionResponseSchema = z.object({ transaction: executedTransactionSchema.nullish() });

const subscribeCheckpointsResponseSchema = z.object({
  cursor: u64String.nullish(),
  checkpoint: z
    .object({
      sequenceNumber: u64String.nullish(),
      transactions: z
        .array(
          z.object({
            digest: z.string().nullish(),
            events: z.object({ events: z.array(eventSchema).default([]) }).nullish(),
          }),
        )
        .default([]),
    })
    .nullish(),
});

// ============================================================================
// Mapping
// ============================================================================

function mapOwner(owner: z.infer<typeof ownerSchema>): Owner {
  switch (owner.kind) {
    case "ADDRESS":
    case "OBJECT": {
      if (owner.address == null) {
        throw new ParsingError(`Owner of kind ${owner.kind} has no address`);
      }
      return { kind: owner.kind === "ADDRESS" ? "address" : "object", address: owner.address };
    }
    case "SHARED":
      if (owner.version == null) {
        throw new ParsingError("Shared owner has no initial version");
      }
      return { kind: "shared", initialVersion: owner.version };
    case "IMMUTABLE":
      return { kind: "immutable" };
    default:
      throw new ParsingError(`Unknown owner kind: ${owner.kind ?? "<unset>"}`);
  }
}

function mapObject(object: z.infer<typeof objectSchema>): LedgerObject {
  const mapped: LedgerObject = {};
  if (object.objectId != null) mapped.objectId = object.objectId;
  if (object.version != null) mapped.version = object.version;
  if (object.digest != null) mapped.digest = object.digest;
  if (object.owner != null) mapped.owner = mapOwner(object.owner);
  if (object.objectType != null) mapped.objectType = object.objectType;
  if (object.balance != null) mapped.balance = object.balance;
  if (object.json != null) mapped.json = protoValueToJson(object.json);
  return mapped;
}

function mapChange(change: z.infer<typeof executedTransactionSchema>["effects"]): ObjectChange[] {
  return (change?.changedObjects ?? []).flatMap((entry): ObjectChange[] => {
    if (entry.objectId == null) return [];
    const mapped: ObjectChange = {
      objectId: entry.objectId,
      kind: entry.idOperation === "CREATED" ? "created" : entry.idOperation === "DELETED" ? "deleted" : "mutated",
    };
    if (entry.objectType != null) mapped.objectType = entry.objectType;
    if (entry.outputVersion != null) mapped.version = entry.outputVersion;
    if (entry.outputDigest != null) mapped.digest = entry.outputDigest;
    if (entry.outputOwner != null) mapped.owner = mapOwner(entry.outputOwner);
    return [mapped];
  });
}

function mapEvents(digest: string, events: z.infer<typeof eventSchema>[]): RawLedgerEvent[] {
  return events.map(
    (event, index): RawLedgerEvent => ({
      eventType: event.eventType ?? "",
      json: event.json != null ? protoValueToJson(event.json) : null,
      id: { txDigest: digest, eventSeq: BigInt(index) },
    }),
  );
}

function mapExecuted(tx: z.infer<typeof executedTransactionSchema>): ExecutedTransaction {
  const digest = tx.digest ?? "";
  const events = mapEvents(digest, tx.events?.events ?? []);
  const executed: ExecutedTransaction = {
    digest,
    success: tx.effects?.status?.success === true,
    objectChanges: mapChange(tx.effects),
    events,
  };
  const error = tx.effects?.status?.error;
  if (error != null) executed.error = error;
  if (tx.checkpoint != null) executed.checkpoint = tx.checkpoint;
  return executed;
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, method: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ParsingError(`Unexpected ${method} response: ${result.error.issues.map((i) => i.message).join("; ")}`);
  }
  return result.data;
}

function isServiceError(error: unknown): error is grpc.ServiceError {
  return error instanceof Error && "code" in error && typeof error.code === "number";
}

function toRpcError(method: string, error: unknown): RpcError {
  if (isServiceError(error)) {
    return new RpcError(`${method} failed: ${error.details || error.message}`, error.code, error);
  }
  return new RpcError(`${method} failed: ${errorMessage(error)}`, undefined, error);
}

// ============================================================================
// Client
// ============================================================================

type MethodDefinition = protoLoader.MethodDefinition<object, object>;

/** Load the gateway's methods, keyed by their `/package.Service/Method` path. */
export function loadGatewayMethods(protoPath: string = DEFAULT_PROTO_PATH): Map<string, MethodDefinition> {
  const definition = protoLoader.loadSync(protoPath, {
    keepCase: false,
    longs: String,
    enums: String,
    defaults: false,
    oneofs: true,
  });
  const methods = new Map<string, MethodDefinition>();
  for (const service of GATEWAY_SERVICES) {
    const serviceDefinition = definition[`${GATEWAY_PROTO_PACKAGE}.${service}`];
    if (serviceDefinition === undefined || "format" in serviceDefinition) {
      throw new ConfigurationError(`Service ${service} missing from gateway proto definitions`);
    }
    for (const method of Object.values(serviceDefinition)) {
      methods.set(method.path, method);
    }
  }
  return methods;
}

export class GrpcLedgerClient implements LedgerClient {
  private readonly client: grpc.Client;
  private readonly methods: Map<string, MethodDefinition>;
  private readonly timeoutMs: number;
  private readonly retry: Partial<RetryConfig> | undefined;
  private readonly logger: Logger;

  constructor(options: GrpcLedgerClientOptions) {
    this.methods = loadGatewayMethods(options.protoPath);

    const credentials = options.tls === false ? grpc.credentials.createInsecure() : grpc.credentials.createSsl();
    this.client = new grpc.Client(options.address, credentials);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retry = options.retry;
    this.logger = options.logger ?? silentLogger;
  }

  private method(service: string, name: string): MethodDefinition {
    const path = `/${GATEWAY_PROTO_PACKAGE}.${service}/${name}`;
    const method = this.methods.get(path);
    if (method === undefined) {
      throw new ConfigurationError(`Unknown gateway method ${path}`);
    }
    return method;
  }

  private unary(service: string, name: string, request: object): Promise<unknown> {
    const method = this.method(service, name);
    return new Promise((resolve, reject) => {
      this.client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        new grpc.Metadata(),
        { deadline: Date.now() + this.timeoutMs },
        (error, response) => {
          if (error) {
            reject(toRpcError(name, error));
          } else {
            resolve(response);
          }
        },
      );
    });
  }

  private read<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, { config: this.retry, logger: this.logger, label });
  }

  async getObject(objectId: Address, mask: readonly ObjectField[]): Promise<LedgerObject | undefined> {
    const response = await this.read("GetObject", () =>
      this.unary("LedgerService", "GetObject", { objectId, readMask: { paths: [...mask] } }),
    );
    const parsed = parseResponse(getObjectResponseSchema, response, "GetObject");
    return parsed.object != null ? mapObject(parsed.object) : undefined;
  }

  async batchGetObjects(
    objectIds: readonly Address[],
    mask: readonly ObjectField[],
  ): Promise<(LedgerObject | undefined)[]> {
    if (objectIds.length === 0) return [];
    const response = await this.read("BatchGetObjects", () =>
      this.unary("LedgerService", "BatchGetObjects", {
        requests: objectIds.map((objectId) => ({ objectId })),
        readMask: { paths: [...mask] },
      }),
    );
    const parsed = parseResponse(batchGetObjectsResponseSchema, response, "BatchGetObjects");
    if (parsed.objects.length !== objectIds.length) {
      throw new ParsingError(`BatchGetObjects returned ${parsed.objects.length} results for ${objectIds.length} ids`);
    }
    return parsed.objects.map((result, index) => {
      if (result.error != null) {
        this.logger.debug(`Object ${objectIds[index]} unavailable: ${result.error.message ?? "unknown error"}`);
        return undefined;
      }
      return result.object != null ? mapObject(result.object) : undefined;
    });
  }

  async getEpoch(): Promise<EpochInfo> {
    const response = await this.read("GetEpoch", () =>
      this.unary("LedgerService", "GetEpoch", { readMask: { paths: ["epoch", "reference_gas_price", "end_timestamp_ms"] } }),
    );
    const epoch = parseResponse(getEpochResponseSchema, response, "GetEpoch").epoch;
    if (epoch?.epoch == null || epoch.referenceGasPrice == null) {
      throw new ParsingError("GetEpoch response is missing the epoch or its reference gas price");
    }
    const info: EpochInfo = { epoch: epoch.epoch, referenceGasPrice: epoch.referenceGasPrice };
    if (epoch.endTimestampMs != null) info.endTimestampMs = epoch.endTimestampMs;
    return info;
  }

  async listDynamicFields(request: ListDynamicFieldsRequest): Promise<DynamicFieldPage> {
    const response = await this.read("ListDynamicFields", () =>
      this.unary("StateService", "ListDynamicFields", {
        parent: request.parent,
        pageSize: request.pageSize,
        ...(request.pageToken !== undefined ? { pageToken: Buffer.from(request.pageToken) } : {}),
        readMask: { paths: ["kind", "field_id", "child_id", "name"] },
      }),
    );
    const parsed = parseResponse(listDynamicFieldsResponseSchema, response, "ListDynamicFields");
    const page: DynamicFieldPage = {
      fields: parsed.dynamicFields.flatMap((field) => {
        if (field.fieldId == null) return [];
        return [
          {
            kind: field.kind === "OBJECT" ? "object" : "field",
            fieldId: field.fieldId,
            ...(field.childId != null ? { childId: field.childId } : {}),
          },
        ];
      }),
    };
    if (parsed.nextPageToken != null && parsed.nextPageToken.length > 0) {
      page.nextPageToken = Uint8Array.from(parsed.nextPageToken);
    }
    return page;
  }

  async executeTransaction(request: ExecuteTransactionRequest): Promise<ExecutedTransaction> {
    // Not retried: a timed-out submission may still have landed.
    const response = await this.unary("TransactionExecutionService", "ExecuteTransaction", {
      transaction: { bcs: { value: Buffer.from(request.txBytes) } },
      signatures: request.signatures.map((signature) => ({ bcs: { value: Buffer.from(signature) } })),
      readMask: { paths: ["digest", "effects", "events", "checkpoint"] },
    });
    const parsed = parseResponse(executeTransactionResponseSchema, response, "ExecuteTransaction");
    if (parsed.transaction == null) {
      throw new ParsingError("ExecuteTransaction response carries no transaction");
    }
    return mapExecuted(parsed.transaction);
  }

  async *subscribeCheckpoints(signal: AbortSignal): AsyncIterable<CheckpointSummary> {
    const method = this.method("SubscriptionService", "SubscribeCheckpoints");
    const call = this.client.makeServerStreamRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      { readMask: { paths: ["sequence_number", "transactions.digest", "transactions.events"] } },
      new grpc.Metadata(),
      {},
    );
    const onAbort = (): void => call.cancel();
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      for await (const message of call) {
        const parsed = parseResponse(subscribeCheckpointsResponseSchema, message, "SubscribeCheckpoints");
        const sequenceNumber = parsed.checkpoint?.sequenceNumber ?? parsed.cursor;
        if (sequenceNumber == null) continue;
        const transactions = parsed.checkpoint?.transactions ?? [];
        yield {
          sequenceNumber,
          transactionDigests: transactions.flatMap((tx) => (tx.digest != null ? [tx.digest] : [])),
          events: transactions.flatMap((tx) => mapEvents(tx.digest ?? "", tx.events?.events ?? [])),
        };
      }
    } catch (error) {
      if (signal.aborted) return;
      throw toRpcError("SubscribeCheckpoints", error);
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  close(): void {
    this.client.close();
  }
}

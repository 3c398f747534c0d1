/**
 * High-level Nexus client.
 *
 * Bundles the signer, the gas coin pool, the deployment's objects and a
 * crawler over one ledger connection, and hands out action groups for
 * workflows, the scheduler, tools, gas and network auth.
 *
 * ```typescript
 * const client = await NexusClient.builder()
 *   .withPrivateKey(process.env.NEXUS_PRIVATE_KEY ?? "")
 *   .withRpcUrl("https://node.example:443")
 *   .withGas([gasCoin], 50_000_000n)
 *   .withNexusObjects(objects)
 *   .build();
 *
 * const { dagObjectId } = await client.workflow().publish(dag);
 * ```
 *
 * @module
 */

import { Crawler } from "../crawler/crawler.js";
import { Ed25519Keypair } from "../crypto/ed25519.js";
import { ConfigurationError, errorMessage, RpcError } from "../errors.js";
import { GrpcLedgerClient } from "../ledger/grpc-client.js";
import type { LedgerClient, ObjectChange } from "../ledger/types.js";
import { getSdkLogger, type Logger } from "../logger.js";
import { TransactionBuilder } from "../transactions/builder.js";
import type { Address } from "../types/address.js";
import type { NexusObjects } from "../types/nexus-objects.js";
import type { ObjectRef } from "../types/object.js";
import { parseStructTag, parseTypeTag, typeTagEquals, type TypeTag } from "../types/type-tag.js";
import type { RetryConfig } from "../utils/retry.js";
import { GasPool } from "./gas-pool.js";
import { GasActions } from "./gas.js";
import { NetworkAuthActions } from "./network-auth.js";
import { SchedulerActions } from "./scheduler.js";
import { Signer, type ExecutedTransactionResult } from "./signer.js";
import { ToolActions } from "./tools.js";
import { WorkflowActions } from "./workflow.js";

interface RpcEndpoint {
  address: string;
  tls: boolean;
}

function parseRpcUrl(rpcUrl: string): RpcEndpoint {
  let url: URL;
  try {
    url = new URL(rpcUrl);
  } catch {
    throw new ConfigurationError(`Invalid RPC URL: ${rpcUrl}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigurationError("Invalid RPC URL: RPC URL must use http or https protocol");
  }
  const tls = url.protocol === "https:";
  const port = url.port !== "" ? url.port : tls ? "443" : "80";
  return { address: `${url.hostname}:${port}`, tls };
}

// ============================================================================
// Builder
// ============================================================================

export class NexusClientBuilder {
  private keypair: Ed25519Keypair | undefined;
  private ledger: LedgerClient | undefined;
  private rpcUrl: string | undefined;
  private gasCoins: ObjectRef[] = [];
  private gasBudget: bigint | undefined;
  private objects: NexusObjects | undefined;
  private transactionTimeoutMs: number | undefined;
  private logger: Logger | undefined;
  private retry: Partial<RetryConfig> | undefined;

  /** Raw 32-byte key, or a hex, base64 or flagged key string. */
  withPrivateKey(key: Ed25519Keypair | Uint8Array | string): this {
    if (key instanceof Ed25519Keypair) {
      this.keypair = key;
    } else {
      this.keypair = typeof key === "string" ? Ed25519Keypair.fromString(key) : Ed25519Keypair.fromSecretKey(key);
    }
    return this;
  }

  /** Use an existing ledger connection; takes precedence over {@link withRpcUrl}. */
  withLedgerClient(ledger: LedgerClient): this {
    this.ledger = ledger;
    return this;
  }

  withRpcUrl(rpcUrl: string): this {
    this.rpcUrl = rpcUrl;
    return this;
  }

  withGas(coins: readonly ObjectRef[], budget: bigint): this {
    this.gasCoins = [...coins];
    this.gasBudget = budget;
    return this;
  }

  withNexusObjects(objects: NexusObjects): this {
    this.objects = objects;
    return this;
  }

  withTransactionTimeout(timeoutMs: number): this {
    this.transactionTimeoutMs = timeoutMs;
    return this;
  }

  withLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  /** Retry policy for reads on the connection created from the RPC URL. */
  withRetry(retry: Partial<RetryConfig>): this {
    this.retry = retry;
    return this;
  }

  /**
   * Validate the configuration and fetch the reference gas price.
   *
   * @throws ConfigurationError for missing or invalid settings
   * @throws RpcError when the gas price cannot be read
   */
  async build(): Promise<NexusClient> {
    if (this.keypair === undefined) throw new ConfigurationError("User's private key is required");
    if (this.ledger === undefined && this.rpcUrl === undefined) throw new ConfigurationError("RPC URL is required");
    if (this.gasCoins.length === 0) throw new ConfigurationError("At least one gas coin is required");
    if (this.gasBudget === undefined) throw new ConfigurationError("Gas budget is required");
    if (this.objects === undefined) throw new ConfigurationError("Nexus objects are required");
    if (this.transactionTimeoutMs !== undefined && this.transactionTimeoutMs <= 0) {
      throw new ConfigurationError("Transaction timeout must be positive");
    }
    if (this.ledger !== undefined && this.retry !== undefined) {
      throw new ConfigurationError("Retry policy only applies to connections created from an RPC URL");
    }

    const logger = this.logger ?? getSdkLogger();
    const gasPool = new GasPool(this.gasCoins, this.gasBudget);
    let ledger = this.ledger;
    if (ledger === undefined && this.rpcUrl !== undefined) {
      const endpoint = parseRpcUrl(this.rpcUrl);
      ledger = new GrpcLedgerClient({ address: endpoint.address, tls: endpoint.tls, retry: this.retry, logger });
    }
    if (ledger === undefined) throw new ConfigurationError("RPC URL is required");

    let referenceGasPrice: bigint;
    try {
      referenceGasPrice = (await ledger.getEpoch()).referenceGasPrice;
    } catch (error) {
      if (error instanceof RpcError) throw error;
      throw new RpcError(`Failed to fetch reference gas price: ${errorMessage(error)}`, undefined, error);
    }
    logger.debug(`Nexus client ready, reference gas price ${referenceGasPrice}`);

    const signer = new Signer({
      keypair: this.keypair,
      ledger,
      objects: this.objects,
      transactionTimeoutMs: this.transactionTimeoutMs,
      logger,
    });
    return new NexusClient({ signer, gasPool, objects: this.objects, referenceGasPrice, ledger, logger });
  }
}

// ============================================================================
// Client
// ============================================================================

export interface NexusClientParts {
  signer: Signer;
  gasPool: GasPool;
  objects: NexusObjects;
  referenceGasPrice: bigint;
  ledger: LedgerClient;
  logger: Logger;
}

export class NexusClient {
  readonly signer: Signer;
  readonly gasPool: GasPool;
  readonly objects: NexusObjects;
  readonly referenceGasPrice: bigint;
  readonly crawler: Crawler;
  readonly logger: Logger;
  readonly ledger: LedgerClient;

  constructor(parts: NexusClientParts) {
    this.signer = parts.signer;
    this.gasPool = parts.gasPool;
    this.objects = parts.objects;
    this.referenceGasPrice = parts.referenceGasPrice;
    this.ledger = parts.ledger;
    this.logger = parts.logger;
    this.crawler = new Crawler(parts.ledger, { logger: parts.logger });
  }

  static builder(): NexusClientBuilder {
    return new NexusClientBuilder();
  }

  get address(): Address {
    return this.signer.address;
  }

  workflow(): WorkflowActions {
    return new WorkflowActions(this);
  }

  scheduler(): SchedulerActions {
    return new SchedulerActions(this);
  }

  tools(): ToolActions {
    return new ToolActions(this);
  }

  gas(): GasActions {
    return new GasActions(this);
  }

  networkAuth(): NetworkAuthActions {
    return new NetworkAuthActions(this);
  }

  /**
   * Compose a transaction with `compose`, then pay for it with a coin from
   * the pool, sign, submit and wait for inclusion. The coin returns to the
   * pool whatever the outcome.
   */
  async submit(compose: (tx: TransactionBuilder) => void): Promise<ExecutedTransactionResult> {
    const tx = new TransactionBuilder();
    compose(tx);
    return this.gasPool.withGasCoin(async (lease) => {
      const data = tx.build({
        sender: this.signer.address,
        gasPayment: [lease.ref],
        gasBudget: this.gasPool.budget,
        gasPrice: this.referenceGasPrice,
      });
      return this.signer.executeTransaction(data, lease);
    });
  }

  /** Reference usable as a shared input: `version` is the initial shared version. */
  async sharedObjectRef(objectId: Address): Promise<ObjectRef> {
    const response = await this.crawler.getObjectMetadata(objectId);
    return { objectId: response.objectId, version: response.getInitialVersion(), digest: response.digest };
  }

  async ownedObjectRef(objectId: Address): Promise<ObjectRef> {
    return (await this.crawler.getObjectMetadata(objectId)).objectRef();
  }

  close(): void {
    this.ledger.close();
  }
}

/** Id of the first object created with type `<pkg>::<module>::<name>`, generics ignored. */
export function findCreatedObject(
  changes: readonly ObjectChange[],
  pkg: Address,
  module: string,
  name: string,
): Address | undefined {
  for (const change of changes) {
    if (change.kind !== "created" || change.objectType === undefined) continue;
    let matches: boolean;
    try {
      const tag = parseStructTag(change.objectType);
      matches = tag.address === pkg && tag.module === module && tag.name === name;
    } catch {
      // Packages and other non-struct objects have no struct type.
      matches = false;
    }
    if (matches) return change.objectId;
  }
  return undefined;
}

/** Id of the first object created with exactly `type`, type parameters included. */
export function findCreatedObjectOfType(changes: readonly ObjectChange[], type: TypeTag): Address | undefined {
  for (const change of changes) {
    if (change.kind !== "created" || change.objectType === undefined) continue;
    let matches: boolean;
    try {
      matches = typeTagEquals(parseTypeTag(change.objectType), type);
    } catch {
      matches = false;
    }
    if (matches) return change.objectId;
  }
  return undefined;
}

/**
 * Programmable transaction builder.
 *
 * Commands run in the order they are added; each `moveCall` returns a
 * `Result` argument that later commands take as input, so helpers that compose
 * several calls hand back the last result for the caller to chain from.
 *
 * ```ts
 * const tx = new TransactionBuilder();
 * const dag = tx.moveCall({ package: pkg, module: "dag", function: "new" });
 * tx.moveCall({ package: "0x2", module: "transfer", function: "public_share_object", typeArguments: [dagType], arguments: [dag] });
 * const data = tx.build({ sender, gasPayment: [coin], gasBudget: 10_000_000n, gasPrice: 1000n });
 * ```
 *
 * @module
 */

import { bcs } from "@mysten/bcs";
import { TransactionBuildingError } from "../errors.js";
import { normalizeAddress, type Address } from "../types/address.js";
import type { ObjectRef, SharedObjectRef } from "../types/object.js";
import { parseTypeTag, type TypeTag } from "../types/type-tag.js";
import { isU64 } from "../utils/numeric.js";
import {
  AddressBcs,
  type Argument,
  type CallArg,
  type Command,
  type MoveCall,
  type ProgrammableTransaction,
  type TransactionData,
  type TransactionExpiration,
} from "./bcs.js";

export const CLOCK_OBJECT_ID = normalizeAddress("0x6");

/** The clock has been shared since genesis. */
const CLOCK_INITIAL_SHARED_VERSION = 1n;

export interface MoveCallInput {
  package: Address;
  module: string;
  function: string;
  /** Type tags or type strings such as `0x2::sui::SUI` */
  typeArguments?: readonly (TypeTag | string)[];
  arguments?: readonly Argument[];
}

export interface BuildOptions {
  sender: Address;
  gasPayment: readonly ObjectRef[];
  gasBudget: bigint;
  gasPrice: bigint;
  /** Defaults to the sender */
  gasOwner?: Address;
  expiration?: TransactionExpiration;
}

const ASCII_RE = /^[\x00-\x7f]*$/;

function checkU64(value: bigint | number, what: string): bigint {
  const big = BigInt(value);
  if (!isU64(big)) {
    throw new TransactionBuildingError(`${what} ${value} is not a valid u64`);
  }
  return big;
}

// ============================================================================
// Builder
// ============================================================================

export class TransactionBuilder {
  private readonly inputs: CallArg[] = [];
  private readonly commands: Command[] = [];
  /** Object id to input index */
  private readonly objectInputs = new Map<Address, number>();

  /** The coin paying for gas, usable as a command argument */
  readonly gas: Argument = { kind: "GasCoin" };

  // ==========================================================================
  // Pure inputs
  // ==========================================================================

  /** Add already-encoded bytes as a pure input. Equal values are not merged. */
  pure(bytes: Uint8Array): Argument {
    this.inputs.push({ kind: "Pure", bytes: Uint8Array.from(bytes) });
    return { kind: "Input", index: this.inputs.length - 1 };
  }

  pureU8(value: number): Argument {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new TransactionBuildingError(`Value ${value} is not a valid u8`);
    }
    return this.pure(bcs.u8().serialize(value).toBytes());
  }

  pureU64(value: bigint | number): Argument {
    return this.pure(bcs.u64().serialize(checkU64(value, "Value")).toBytes());
  }

  pureBool(value: boolean): Argument {
    return this.pure(bcs.bool().serialize(value).toBytes());
  }

  /** An `address`, or an `ID`, which shares its encoding. */
  pureAddress(value: Address): Argument {
    return this.pure(AddressBcs.serialize(normalizeAddress(value)).toBytes());
  }

  /** A UTF-8 `std::string::String`. */
  pureString(value: string): Argument {
    return this.pure(bcs.string().serialize(value).toBytes());
  }

  /** A `std::ascii::String`; rejects non-ASCII text. */
  pureAsciiString(value: string): Argument {
    if (!ASCII_RE.test(value)) {
      throw new TransactionBuildingError(`String "${value}" is not ASCII`);
    }
    return this.pure(bcs.string().serialize(value).toBytes());
  }

  /** A `vector<u8>`. */
  pureBytes(value: Uint8Array): Argument {
    return this.pure(bcs.vector(bcs.u8()).serialize(value).toBytes());
  }

  pureOptionU64(value: bigint | number | undefined): Argument {
    const checked = value === undefined ? null : checkU64(value, "Value");
    return this.pure(bcs.option(bcs.u64()).serialize(checked).toBytes());
  }

  pureOptionBytes(value: Uint8Array | undefined): Argument {
    return this.pure(bcs.option(bcs.vector(bcs.u8())).serialize(value ?? null).toBytes());
  }

  pureVectorString(values: readonly string[]): Argument {
    return this.pure(bcs.vector(bcs.string()).serialize(values).toBytes());
  }

  // ==========================================================================
  // Object inputs
  // ==========================================================================

  /** Owned or immutable object; the same object id maps to the same input. */
  object(ref: ObjectRef): Argument {
    const objectId = normalizeAddress(ref.objectId);
    const existing = this.objectInputs.get(objectId);
    if (existing !== undefined) {
      const input = this.inputs[existing];
      if (input?.kind === "Object" && input.object.kind === "SharedObject") {
        throw new TransactionBuildingError(`Object ${objectId} is used both as owned and as shared`);
      }
      return { kind: "Input", index: existing };
    }
    this.inputs.push({ kind: "Object", object: { kind: "ImmOrOwnedObject", ref: { ...ref, objectId } } });
    this.objectInputs.set(objectId, this.inputs.length - 1);
    return { kind: "Input", index: this.inputs.length - 1 };
  }

  /**
   * Shared object by its initial shared version. Adding the same object again
   * returns the first input, upgraded to mutable if either use needs it.
   */
  sharedObject(ref: SharedObjectRef): Argument {
    const objectId = normalizeAddress(ref.objectId);
    const existing = this.objectInputs.get(objectId);
    if (existing === undefined) {
      this.inputs.push({ kind: "Object", object: { kind: "SharedObject", ref: { ...ref, objectId } } });
      this.objectInputs.set(objectId, this.inputs.length - 1);
      return { kind: "Input", index: this.inputs.length - 1 };
    }

    const input = this.inputs[existing];
    if (input?.kind !== "Object" || input.object.kind !== "SharedObject") {
      throw new TransactionBuildingError(`Object ${objectId} is used both as owned and as shared`);
    }
    const previous = input.object.ref;
    if (previous.initialSharedVersion !== ref.initialSharedVersion) {
      throw new TransactionBuildingError(
        `Shared object ${objectId} added with initial versions ${previous.initialSharedVersion} and ${ref.initialSharedVersion}`,
      );
    }
    if (ref.mutable && !previous.mutable) {
      this.inputs[existing] = { kind: "Object", object: { kind: "SharedObject", ref: { ...previous, mutable: true } } };
    }
    return { kind: "Input", index: existing };
  }

  /** The immutable `0x6` clock. */
  clock(): Argument {
    return this.sharedObject({
      objectId: CLOCK_OBJECT_ID,
      initialSharedVersion: CLOCK_INITIAL_SHARED_VERSION,
      mutable: false,
    });
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  moveCall(input: MoveCallInput): Argument {
    const call: MoveCall = {
      package: normalizeAddress(input.package),
      module: input.module,
      function: input.function,
      typeArguments: (input.typeArguments ?? []).map((tag) => (typeof tag === "string" ? parseTypeTag(tag) : tag)),
      arguments: [...(input.arguments ?? [])],
    };
    for (const arg of call.arguments) this.checkArgument(arg);
    return this.push({ kind: "MoveCall", call });
  }

  /** Element `index` of a command returning a tuple. */
  nested(result: Argument, index: number): Argument {
    if (result.kind !== "Result") {
      throw new TransactionBuildingError(`Only command results can be indexed, got ${result.kind}`);
    }
    return { kind: "NestedResult", index: result.index, resultIndex: index };
  }

  transferObjects(objects: readonly Argument[], recipient: Argument): Argument {
    if (objects.length === 0) throw new TransactionBuildingError("Nothing to transfer");
    for (const arg of [...objects, recipient]) this.checkArgument(arg);
    return this.push({ kind: "TransferObjects", objects: [...objects], recipient });
  }

  /** Split `coin` into one new coin per amount; pick them with {@link nested}. */
  splitCoins(coin: Argument, amounts: readonly Argument[]): Argument {
    for (const arg of [coin, ...amounts]) this.checkArgument(arg);
    return this.push({ kind: "SplitCoins", coin, amounts: [...amounts] });
  }

  mergeCoins(destination: Argument, sources: readonly Argument[]): Argument {
    for (const arg of [destination, ...sources]) this.checkArgument(arg);
    return this.push({ kind: "MergeCoins", destination, sources: [...sources] });
  }

  makeMoveVec(type: TypeTag | undefined, elements: readonly Argument[]): Argument {
    for (const arg of elements) this.checkArgument(arg);
    return this.push({ kind: "MakeMoveVec", type, elements: [...elements] });
  }

  // ==========================================================================
  // Inspection and finalization
  // ==========================================================================

  /** Move calls in command order. */
  moveCalls(): MoveCall[] {
    return this.commands.flatMap((command) => (command.kind === "MoveCall" ? [command.call] : []));
  }

  get commandCount(): number {
    return this.commands.length;
  }

  get inputCount(): number {
    return this.inputs.length;
  }

  input(index: number): CallArg | undefined {
    return this.inputs[index];
  }

  snapshot(): ProgrammableTransaction {
    return { inputs: [...this.inputs], commands: [...this.commands] };
  }

  build(options: BuildOptions): TransactionData {
    if (this.commands.length === 0) {
      throw new TransactionBuildingError("Transaction has no commands");
    }
    if (options.gasPayment.length === 0) {
      throw new TransactionBuildingError("Gas payment must contain at least one coin");
    }
    if (options.gasBudget <= 0n) {
      throw new TransactionBuildingError("Gas budget must be positive");
    }
    const sender = normalizeAddress(options.sender);
    return {
      sender,
      kind: this.snapshot(),
      gasData: {
        payment: [...options.gasPayment],
        owner: normalizeAddress(options.gasOwner ?? sender),
        price: checkU64(options.gasPrice, "Gas price"),
        budget: checkU64(options.gasBudget, "Gas budget"),
      },
      expiration: options.expiration ?? { kind: "None" },
    };
  }

  private push(command: Command): Argument {
    this.commands.push(command);
    return { kind: "Result", index: this.commands.length - 1 };
  }

  private checkArgument(arg: Argument): void {
    switch (arg.kind) {
      case "GasCoin":
        return;
      case "Input":
        if (arg.index >= this.inputs.length) {
          throw new TransactionBuildingError(`Input ${arg.index} does not exist`);
        }
        return;
      case "Result":
      case "NestedResult":
        if (arg.index >= this.commands.length) {
          throw new TransactionBuildingError(`Result ${arg.index} refers to a later command`);
        }
    }
  }
}

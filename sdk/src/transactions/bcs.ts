/**
 * Canonical binary layout of ledger transactions.
 *
 * The layouts follow the ledger's `TransactionData::V1` encoding; the signing
 * payload is the BCS encoding of {@link TransactionData} and the transaction
 * digest is blake2b-256 over `"TransactionData::" || bytes`, base58 encoded.
 *
 * @module
 */

import { bcs, BcsType, type BcsReader, type BcsWriter } from "@mysten/bcs";
import { blake2b } from "@noble/hashes/blake2b";
import bs58 from "bs58";
import { addressFromBytes, addressToBytes, type Address } from "../types/address.js";
import type { ObjectRef, SharedObjectRef } from "../types/object.js";
import type { PrimitiveTypeName, StructTag, TypeTag } from "../types/type-tag.js";
import { concatBytes, utf8 } from "../utils/encoding.js";

// ============================================================================
// Transaction model
// ============================================================================

/** Reference to a transaction input, a previous command result or the gas coin. */
export type Argument =
  | { kind: "GasCoin" }
  | { kind: "Input"; index: number }
  | { kind: "Result"; index: number }
  | { kind: "NestedResult"; index: number; resultIndex: number };

export type ObjectArg =
  | { kind: "ImmOrOwnedObject"; ref: ObjectRef }
  | { kind: "SharedObject"; ref: SharedObjectRef }
  | { kind: "Receiving"; ref: ObjectRef };

export type CallArg = { kind: "Pure"; bytes: Uint8Array } | { kind: "Object"; object: ObjectArg };

export interface MoveCall {
  package: Address;
  module: string;
  function: string;
  typeArguments: TypeTag[];
  arguments: Argument[];
}

export type Command =
  | { kind: "MoveCall"; call: MoveCall }
  | { kind: "TransferObjects"; objects: Argument[]; recipient: Argument }
  | { kind: "SplitCoins"; coin: Argument; amounts: Argument[] }
  | { kind: "MergeCoins"; destination: Argument; sources: Argument[] }
  | { kind: "MakeMoveVec"; type: TypeTag | undefined; elements: Argument[] };

export interface ProgrammableTransaction {
  inputs: CallArg[];
  commands: Command[];
}

export interface GasData {
  payment: ObjectRef[];
  owner: Address;
  price: bigint;
  budget: bigint;
}

export type TransactionExpiration = { kind: "None" } | { kind: "Epoch"; epoch: bigint };

export interface TransactionData {
  sender: Address;
  kind: ProgrammableTransaction;
  gasData: GasData;
  expiration: TransactionExpiration;
}

// ============================================================================
// Leaf layouts
// ============================================================================

export const AddressBcs = bcs.bytes(32).transform({
  input: (value: Address) => addressToBytes(value),
  output: (bytes) => addressFromBytes(bytes),
});

const ObjectDigestBcs = bcs.vector(bcs.u8()).transform({
  input: (value: string) => bs58.decode(value),
  output: (value) => bs58.encode(Uint8Array.from(value)),
});

const ObjectRefBcs = bcs.tuple([AddressBcs, bcs.u64(), ObjectDigestBcs]).transform({
  input: (ref: ObjectRef): [Address, bigint, string] => [ref.objectId, ref.version, ref.digest],
  output: ([objectId, version, digest]): ObjectRef => ({ objectId, version: BigInt(version), digest }),
});

// ============================================================================
// Type tags
// ============================================================================

const PRIMITIVE_TAGS: readonly [PrimitiveTypeName, number][] = [
  ["bool", 0],
  ["u8", 1],
  ["u64", 2],
  ["u128", 3],
  ["address", 4],
  ["signer", 5],
  ["u16", 8],
  ["u32", 9],
  ["u256", 10],
];

const VECTOR_TAG = 6;
const STRUCT_TAG = 7;

const TAG_BY_PRIMITIVE = new Map<PrimitiveTypeName, number>(PRIMITIVE_TAGS);
const PRIMITIVE_BY_TAG = new Map<number, PrimitiveTypeName>(PRIMITIVE_TAGS.map(([name, tag]) => [tag, name]));

function writeString(value: string, writer: BcsWriter): void {
  const bytes = utf8(value);
  writer.writeULEB(bytes.length);
  for (const byte of bytes) writer.write8(byte);
}

function readString(reader: BcsReader): string {
  const length = reader.readULEB();
  return new TextDecoder().decode(reader.readBytes(length));
}

function writeTypeTag(tag: TypeTag, writer: BcsWriter): void {
  switch (tag.kind) {
    case "vector":
      writer.write8(VECTOR_TAG);
      writeTypeTag(tag.element, writer);
      return;
    case "struct":
      writer.write8(STRUCT_TAG);
      writeStructTag(tag.struct, writer);
      return;
    default: {
      const variant = TAG_BY_PRIMITIVE.get(tag.kind);
      if (variant === undefined) throw new Error(`Unknown primitive type ${tag.kind}`);
      writer.write8(variant);
    }
  }
}

function writeStructTag(tag: StructTag, writer: BcsWriter): void {
  for (const byte of addressToBytes(tag.address)) writer.write8(byte);
  writeString(tag.module, writer);
  writeString(tag.name, writer);
  writer.writeULEB(tag.typeParams.length);
  for (const param of tag.typeParams) writeTypeTag(param, writer);
}

function readTypeTag(reader: BcsReader): TypeTag {
  const tag = reader.read8();
  if (tag === VECTOR_TAG) return { kind: "vector", element: readTypeTag(reader) };
  if (tag === STRUCT_TAG) return { kind: "struct", struct: readStructTag(reader) };
  const primitive = PRIMITIVE_BY_TAG.get(tag);
  if (primitive === undefined) throw new Error(`Unknown type tag variant ${tag}`);
  return { kind: primitive };
}

function readStructTag(reader: BcsReader): StructTag {
  const address = addressFromBytes(reader.readBytes(32));
  const module = readString(reader);
  const name = readString(reader);
  const count = reader.readULEB();
  const typeParams: TypeTag[] = [];
  for (let i = 0; i < count; i++) typeParams.push(readTypeTag(reader));
  return { address, module, name, typeParams };
}

/** Recursive, so written against the reader/writer directly. */
export const TypeTagBcs = new BcsType<TypeTag, TypeTag>({
  name: "TypeTag",
  read: readTypeTag,
  write: writeTypeTag,
});

// ============================================================================
// Programmable transaction
// ============================================================================

const ArgumentBcs = bcs
  .enum("Argument", {
    GasCoin: null,
    Input: bcs.u16(),
    Result: bcs.u16(),
    NestedResult: bcs.tuple([bcs.u16(), bcs.u16()]),
  })
  .transform({
    input: (arg: Argument) => {
      switch (arg.kind) {
        case "GasCoin":
          return { GasCoin: true };
        case "Input":
          return { Input: arg.index };
        case "Result":
          return { Result: arg.index };
        case "NestedResult": {
          const pair: [number, number] = [arg.index, arg.resultIndex];
          return { NestedResult: pair };
        }
      }
    },
    output: (value): Argument => {
      switch (value.$kind) {
        case "GasCoin":
          return { kind: "GasCoin" };
        case "Input":
          return { kind: "Input", index: value.Input };
        case "Result":
          return { kind: "Result", index: value.Result };
        case "NestedResult":
          return { kind: "NestedResult", index: value.NestedResult[0], resultIndex: value.NestedResult[1] };
      }
    },
  });

const SharedObjectBcs = bcs.struct("SharedObject", {
  objectId: AddressBcs,
  initialSharedVersion: bcs.u64(),
  mutable: bcs.bool(),
});

const ObjectArgBcs = bcs
  .enum("ObjectArg", {
    ImmOrOwnedObject: ObjectRefBcs,
    SharedObject: SharedObjectBcs,
    Receiving: ObjectRefBcs,
  })
  .transform({
    input: (arg: ObjectArg) => {
      switch (arg.kind) {
        case "ImmOrOwnedObject":
          return { ImmOrOwnedObject: arg.ref };
        case "SharedObject":
          return { SharedObject: arg.ref };
        case "Receiving":
          return { Receiving: arg.ref };
      }
    },
    output: (value): ObjectArg => {
      switch (value.$kind) {
        case "ImmOrOwnedObject":
          return { kind: "ImmOrOwnedObject", ref: value.ImmOrOwnedObject };
        case "SharedObject":
          return {
            kind: "SharedObject",
            ref: {
              objectId: value.SharedObject.objectId,
              initialSharedVersion: BigInt(value.SharedObject.initialSharedVersion),
              mutable: value.SharedObject.mutable,
            },
          };
        case "Receiving":
          return { kind: "Receiving", ref: value.Receiving };
      }
    },
  });

const CallArgBcs = bcs
  .enum("CallArg", {
    Pure: bcs.vector(bcs.u8()),
    Object: ObjectArgBcs,
  })
  .transform({
    input: (arg: CallArg) => (arg.kind === "Pure" ? { Pure: arg.bytes } : { Object: arg.object }),
    output: (value): CallArg =>
      value.$kind === "Pure" ? { kind: "Pure", bytes: Uint8Array.from(value.Pure) } : { kind: "Object", object: value.Object },
  });

const MoveCallBcs = bcs.struct("ProgrammableMoveCall", {
  package: AddressBcs,
  module: bcs.string(),
  function: bcs.string(),
  typeArguments: bcs.vector(TypeTagBcs),
  arguments: bcs.vector(ArgumentBcs),
});

const CommandBcs = bcs
  .enum("Command", {
    MoveCall: MoveCallBcs,
    TransferObjects: bcs.struct("TransferObjects", { objects: bcs.vector(ArgumentBcs), address: ArgumentBcs }),
    SplitCoins: bcs.struct("SplitCoins", { coin: ArgumentBcs, amounts: bcs.vector(ArgumentBcs) }),
    MergeCoins: bcs.struct("MergeCoins", { destination: ArgumentBcs, sources: bcs.vector(ArgumentBcs) }),
    Publish: bcs.struct("Publish", { modules: bcs.vector(bcs.vector(bcs.u8())), dependencies: bcs.vector(AddressBcs) }),
    MakeMoveVec: bcs.struct("MakeMoveVec", { type: bcs.option(TypeTagBcs), elements: bcs.vector(ArgumentBcs) }),
  })
  .transform({
    input: (command: Command) => {
      switch (command.kind) {
        case "MoveCall":
          return { MoveCall: command.call };
        case "TransferObjects":
          return { TransferObjects: { objects: command.objects, address: command.recipient } };
        case "SplitCoins":
          return { SplitCoins: { coin: command.coin, amounts: command.amounts } };
        case "MergeCoins":
          return { MergeCoins: { destination: command.destination, sources: command.sources } };
        case "MakeMoveVec":
          return { MakeMoveVec: { type: command.type ?? null, elements: command.elements } };
      }
    },
    output: (value): Command => {
      switch (value.$kind) {
        case "MoveCall":
          return { kind: "MoveCall", call: value.MoveCall };
        case "TransferObjects":
          return { kind: "TransferObjects", objects: value.TransferObjects.objects, recipient: value.TransferObjects.address };
        case "SplitCoins":
          return { kind: "SplitCoins", coin: value.SplitCoins.coin, amounts: value.SplitCoins.amounts };
        case "MergeCoins":
          return { kind: "MergeCoins", destination: value.MergeCoins.destination, sources: value.MergeCoins.sources };
        case "MakeMoveVec":
          return { kind: "MakeMoveVec", type: value.MakeMoveVec.type ?? undefined, elements: value.MakeMoveVec.elements };
        case "Publish":
          throw new Error("Publish commands are not supported");
      }
    },
  });

const ProgrammableTransactionBcs = bcs.struct("ProgrammableTransaction", {
  inputs: bcs.vector(CallArgBcs),
  commands: bcs.vector(CommandBcs),
});

const TransactionKindBcs = bcs.enum("TransactionKind", {
  ProgrammableTransaction: ProgrammableTransactionBcs,
});

const GasDataBcs = bcs.struct("GasData", {
  payment: bcs.vector(ObjectRefBcs),
  owner: AddressBcs,
  price: bcs.u64(),
  budget: bcs.u64(),
});

const TransactionExpirationBcs = bcs.enum("TransactionExpiration", {
  None: null,
  Epoch: bcs.u64(),
});

const TransactionDataV1Bcs = bcs.struct("TransactionDataV1", {
  kind: TransactionKindBcs,
  sender: AddressBcs,
  gasData: GasDataBcs,
  expiration: TransactionExpirationBcs,
});

const TransactionDataBcs = bcs.enum("TransactionData", {
  V1: TransactionDataV1Bcs,
});

// ============================================================================
// Entry points
// ============================================================================

export function serializeTransactionData(data: TransactionData): Uint8Array {
  const expiration = data.expiration.kind === "None" ? { None: true } : { Epoch: data.expiration.epoch };
  return TransactionDataBcs.serialize({
    V1: {
      kind: { ProgrammableTransaction: data.kind },
      sender: data.sender,
      gasData: data.gasData,
      expiration,
    },
  }).toBytes();
}

export function deserializeTransactionData(bytes: Uint8Array): TransactionData {
  const { V1: v1 } = TransactionDataBcs.parse(bytes);
  const expiration: TransactionExpiration =
    v1.expiration.$kind === "Epoch" ? { kind: "Epoch", epoch: BigInt(v1.expiration.Epoch) } : { kind: "None" };
  return {
    sender: v1.sender,
    kind: v1.kind.ProgrammableTransaction,
    gasData: {
      payment: v1.gasData.payment,
      owner: v1.gasData.owner,
      price: BigInt(v1.gasData.price),
      budget: BigInt(v1.gasData.budget),
    },
    expiration,
  };
}

const TRANSACTION_DIGEST_PREFIX = utf8("TransactionData::");

/** Base58 digest identifying a transaction. */
export function transactionDigest(txBytes: Uint8Array): string {
  return bs58.encode(blake2b(concatBytes(TRANSACTION_DIGEST_PREFIX, txBytes), { dkLen: 32 }));
}

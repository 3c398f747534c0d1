/**
 * Conversion of `google.protobuf.Value` trees (as loaded by proto-loader) to
 * plain JSON.
 * @module
 */

import { ParsingError } from "../errors.js";

export interface ProtoValue {
  nullValue?: string | number | null;
  numberValue?: number;
  stringValue?: string;
  boolValue?: boolean;
  structValue?: { fields?: Record<string, ProtoValue> } | null;
  listValue?: { values?: ProtoValue[] } | null;
  /** Name of the populated member when loaded with `oneofs: true` */
  kind?: string;
}

export type NumberClass = "unsigned" | "signed" | "float";

/** Integers are unsigned when non-negative and signed otherwise; anything else is a float. */
export function classifyNumber(value: number): NumberClass {
  if (!Number.isInteger(value)) return "float";
  return value < 0 ? "signed" : "unsigned";
}

function populatedMember(value: ProtoValue): string | undefined {
  if (value.kind !== undefined) return value.kind;
  if (value.structValue != null) return "structValue";
  if (value.listValue != null) return "listValue";
  if (value.stringValue !== undefined) return "stringValue";
  if (value.numberValue !== undefined) return "numberValue";
  if (value.boolValue !== undefined) return "boolValue";
  if (value.nullValue !== undefined) return "nullValue";
  return undefined;
}

export function protoValueToJson(value: ProtoValue): unknown {
  switch (populatedMember(value)) {
    case "nullValue":
      return null;
    case "boolValue":
      return value.boolValue === true;
    case "stringValue":
      return value.stringValue ?? "";
    case "numberValue": {
      const n = value.numberValue ?? 0;
      if (!Number.isFinite(n)) {
        throw new ParsingError(`Could not convert number value '${n}' to JSON number`);
      }
      // -0 is an unsigned zero on the ledger
      return classifyNumber(n) === "unsigned" ? Math.abs(n) : n;
    }
    case "structValue": {
      const out: Record<string, unknown> = {};
      for (const [key, field] of Object.entries(value.structValue?.fields ?? {})) {
        out[key] = protoValueToJson(field);
      }
      return out;
    }
    case "listValue":
      return (value.listValue?.values ?? []).map(protoValueToJson);
    default:
      throw new ParsingError("Missing kind in protobuf value");
  }
}

/** Inverse conversion, used by in-process ledger fakes. */
export function jsonToProtoValue(json: unknown): ProtoValue {
  if (json === null || json === undefined) return { nullValue: "NULL_VALUE", kind: "nullValue" };
  if (typeof json === "boolean") return { boolValue: json, kind: "boolValue" };
  if (typeof json === "number") return { numberValue: json, kind: "numberValue" };
  if (typeof json === "string") return { stringValue: json, kind: "stringValue" };
  if (typeof json === "bigint") return { stringValue: json.toString(), kind: "stringValue" };
  if (Array.isArray(json)) return { listValue: { values: json.map(jsonToProtoValue) }, kind: "listValue" };
  if (typeof json === "object") {
    const fields: Record<string, ProtoValue> = {};
    for (const [key, field] of Object.entries(json)) {
      fields[key] = jsonToProtoValue(field);
    }
    return { structValue: { fields }, kind: "structValue" };
  }
  throw new ParsingError(`Cannot represent ${typeof json} as a protobuf value`);
}

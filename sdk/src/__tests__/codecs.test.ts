import { describe, expect, it } from "vitest";
import { normalizeAddress, isValidAddress, objectIdSchema } from "../types/address.js";
import { bytesSchema, normalizeMoveEnum, optionU64Schema, u64Schema } from "../types/codecs.js";
import {
  emitNexusData,
  hintRemoteFields,
  inlineData,
  jsonToNexusDataMap,
  nexusDataSchema,
  walrusData,
} from "../types/nexus-data.js";
import { formatToolFqn, parseToolFqn, parseToolRef } from "../types/tool.js";
import { formatTypeTag, parseStructTag, parseTypeTag } from "../types/type-tag.js";
import { U64_MAX } from "../utils/numeric.js";

const A2 = normalizeAddress("0x2");

describe("addresses", () => {
  it("normalizes to the long lowercase form", () => {
    expect(A2).toBe(`0x${"0".repeat(63)}2`);
    expect(normalizeAddress("0XAB")).toBe(`0x${"0".repeat(62)}ab`);
    expect(isValidAddress("0xzz")).toBe(false);
    expect(isValidAddress(`0x${"1".repeat(65)}`)).toBe(false);
  });

  it("unwraps UID forms", () => {
    expect(objectIdSchema.parse({ id: { id: "0x2" } })).toBe(A2);
    expect(objectIdSchema.parse({ id: "0x2" })).toBe(A2);
  });
});

describe("type tags", () => {
  it("parses nested generics and formats long addresses", () => {
    const tag = parseTypeTag("vector<0x2::coin::Coin<0x2::sui::SUI>>");
    expect(formatTypeTag(tag)).toBe(`vector<${A2}::coin::Coin<${A2}::sui::SUI>>`);
    expect(parseTypeTag("u64")).toEqual({ kind: "u64" });
  });

  it("reads struct tags", () => {
    expect(parseStructTag("0x2::table::Table<address, u64>")).toEqual({
      address: A2,
      module: "table",
      name: "Table",
      typeParams: [{ kind: "address" }, { kind: "u64" }],
    });
  });

  it("rejects malformed types", () => {
    expect(() => parseTypeTag("vector<u8, u8>")).toThrow(
      'Invalid type "vector<u8, u8>": vector takes exactly one type parameter',
    );
    expect(() => parseTypeTag("0x2::coin")).toThrow('expected "::"');
    expect(() => parseStructTag("u8")).toThrow('Invalid struct type "u8": not a struct');
  });
});

describe("u64 codecs", () => {
  it("decodes strings, safe numbers and bigints", () => {
    expect(u64Schema.parse("18446744073709551615")).toBe(U64_MAX);
    expect(u64Schema.parse(5)).toBe(5n);
    expect(u64Schema.parse(7n)).toBe(7n);
    expect(u64Schema.safeParse("18446744073709551616").success).toBe(false);
    expect(u64Schema.safeParse(2 ** 53).success).toBe(false);
  });

  it("decodes options", () => {
    expect(optionU64Schema.parse(null)).toBeUndefined();
    expect(optionU64Schema.parse({ vec: [] })).toBeUndefined();
    expect(optionU64Schema.parse({ vec: ["9"] })).toBe(9n);
    expect(optionU64Schema.parse("3")).toBe(3n);
  });

  it("decodes byte vectors", () => {
    expect(bytesSchema.parse([1, 2])).toEqual(Uint8Array.of(1, 2));
    expect(bytesSchema.parse("AQI=")).toEqual(Uint8Array.of(1, 2));
    expect(bytesSchema.safeParse("A").success).toBe(false);
  });
});

describe("normalizeMoveEnum", () => {
  it("folds every rendering into @variant", () => {
    expect(normalizeMoveEnum({ "@variant": "Ok", x: 1 })).toEqual({ "@variant": "Ok", x: 1 });
    expect(normalizeMoveEnum({ _variant_name: "Ok", x: 1 })).toEqual({ "@variant": "Ok", x: 1 });
    expect(normalizeMoveEnum({ variant: "Err", fields: { reason: "r" } })).toEqual({ "@variant": "Err", reason: "r" });
    expect(normalizeMoveEnum("Plain")).toBe("Plain");
  });
});

describe("tool identifiers", () => {
  it("splits the domain from the name at the last dot", () => {
    const fqn = parseToolFqn("xyz.weather.forecast@12");
    expect(fqn).toEqual({ domain: "xyz.weather", name: "forecast", version: 12 });
    expect(formatToolFqn(fqn)).toBe("xyz.weather.forecast@12");
  });

  it.each(["forecast@1", "xyz.forecast@0", "Xyz.forecast@1", "xyz.forecast"])("rejects %s", (text) => {
    expect(() => parseToolFqn(text)).toThrow("Invalid tool FQN");
  });

  it("parses http and ledger locations", () => {
    expect(parseToolRef("https://example.com/tool")).toEqual({ kind: "http", url: "https://example.com/tool" });
    expect(parseToolRef("0x2::math@0x5")).toEqual({
      kind: "ledger",
      package: A2,
      module: "math",
      witnessId: normalizeAddress("0x5"),
    });
    expect(() => parseToolRef("0x2-math")).toThrow("Invalid tool reference format");
  });
});

describe("NexusData", () => {
  it("stores a non-array value as one JSON text", () => {
    const wire = emitNexusData(inlineData({ a: 1 }));

    expect(wire).toEqual({
      storage: Array.from(new TextEncoder().encode("inline")),
      one: Array.from(new TextEncoder().encode('{"a":1}')),
      many: [],
      encrypted: false,
    });
    expect(nexusDataSchema.parse(wire)).toEqual(inlineData({ a: 1 }));
  });

  it("stores array elements separately", () => {
    const wire = emitNexusData(walrusData(["x", "y"], true));

    expect(wire.one).toEqual([]);
    expect(wire.many).toEqual([[34, 120, 34], [34, 121, 34]]);
    expect(nexusDataSchema.parse(wire)).toEqual(walrusData(["x", "y"], true));
  });

  it("rejects unknown storage kinds", () => {
    const wire = { ...emitNexusData(inlineData(1)), storage: Array.from(new TextEncoder().encode("disk")) };
    expect(nexusDataSchema.safeParse(wire).success).toBe(false);
  });

  it("maps JSON fields to ports", () => {
    const ports = jsonToNexusDataMap({ a: 1, b: "two" }, ["a"], ["b"]);

    expect(ports.get("a")).toEqual(inlineData(1, true));
    expect(ports.get("b")).toEqual(walrusData("two"));
    expect(() => jsonToNexusDataMap({ b: 1 }, [], ["b"], "inline")).toThrow(
      "Cannot store data remotely using inline storage",
    );
  });

  it("hints the largest fields for remote storage", () => {
    expect(hintRemoteFields({ a: 1 })).toEqual([]);
    expect(hintRemoteFields({ big: "x".repeat(40_000), small: 1 })).toEqual(["big"]);
    expect(() => hintRemoteFields({ many: Array<number>(3_000).fill(1) })).toThrow("Cannot fit data");
  });
});

import { describe, expect, it } from "vitest";
import {
  errorMessage,
  IndexOutOfBoundsError,
  InvalidKeyError,
  isNexusError,
  MalformedPayloadError,
  NexusError,
  NexusErrorCodes,
  RpcError,
} from "../errors.js";

describe("errors", () => {
  it("carries a code on every sdk error", () => {
    const error = new IndexOutOfBoundsError(7n, 3);

    expect(error).toBeInstanceOf(NexusError);
    expect(error.code).toBe(NexusErrorCodes.INDEX_OUT_OF_BOUNDS);
    expect(error.name).toBe("IndexOutOfBoundsError");
    expect(error.message).toBe("Index 7 out of bounds for table of size 3");
    expect(isNexusError(error)).toBe(true);
    expect(isNexusError(new Error("plain"))).toBe(false);
  });

  it("keeps the gRPC status and cause of RPC failures", () => {
    const cause = new Error("socket closed");
    const error = new RpcError("GetObject failed", 14, cause);

    expect(error.statusCode).toBe(14);
    expect(error.cause).toBe(cause);
    expect(error.code).toBe("RPC");
  });

  it("describes key parse failures", () => {
    expect(new InvalidKeyError({ kind: "UnsupportedKeySchemeFlag", flag: 2 }).message).toBe(
      "Unsupported key scheme flag 0x02",
    );
    expect(new InvalidKeyError({ kind: "InvalidLength", length: 31 }).message).toBe(
      "Invalid key length 31, expected 32 bytes or 33 bytes with a scheme flag",
    );
  });

  it("joins payload issues", () => {
    expect(new MalformedPayloadError("DAGCreated", ["dag: Required", "x: bad"]).message).toBe(
      "Malformed DAGCreated payload: dag: Required; x: bad",
    );
  });

  it("extracts messages from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("text")).toBe("text");
    expect(errorMessage(42)).toBe("42");
  });
});

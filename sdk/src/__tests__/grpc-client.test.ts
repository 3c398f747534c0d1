import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { GATEWAY_PROTO_PACKAGE, loadGatewayMethods } from "../ledger/grpc-client.js";

describe("loadGatewayMethods", () => {
  it("exposes every call the client makes under the gateway package", () => {
    const methods = loadGatewayMethods();

    expect(GATEWAY_PROTO_PACKAGE).toBe("nexus.gateway.v1");
    expect([...methods.keys()].sort()).toEqual([
      "/nexus.gateway.v1.LedgerService/BatchGetObjects",
      "/nexus.gateway.v1.LedgerService/GetEpoch",
      "/nexus.gateway.v1.LedgerService/GetObject",
      "/nexus.gateway.v1.StateService/ListDynamicFields",
      "/nexus.gateway.v1.SubscriptionService/SubscribeCheckpoints",
      "/nexus.gateway.v1.TransactionExecutionService/ExecuteTransaction",
    ]);
    expect(methods.get("/nexus.gateway.v1.SubscriptionService/SubscribeCheckpoints")?.responseStream).toBe(true);
    expect(methods.get("/nexus.gateway.v1.LedgerService/GetObject")?.responseStream).toBe(false);
  });

  describe("with other definitions", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "gateway-proto-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("rejects definitions from another package", async () => {
      const protoPath = join(dir, "other.proto");
      await writeFile(
        protoPath,
        'syntax = "proto3";\npackage other.v2;\nmessage Ping {}\nservice LedgerService { rpc GetObject(Ping) returns (Ping); }\n',
      );

      expect(() => loadGatewayMethods(protoPath)).toThrow(ConfigurationError);
      expect(() => loadGatewayMethods(protoPath)).toThrow("Service LedgerService missing from gateway proto definitions");
    });
  });
});

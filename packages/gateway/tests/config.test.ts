/**
 * Tests for configuration loading and wiring.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { InMemoryStore } from "@ibc-gatekeeper/state";
import { REGISTERED_ADDRESS } from "@ibc-gatekeeper/governance";
import { loadConfig } from "../src/config.js";
import { createGatekeeper } from "../src/bootstrap.js";
import {
  BLOCK_TIME,
  CREATOR,
  FakeChannelDirectory,
  FakeCoreBridge,
  FakeTransport,
  channel,
  makeVerifier,
  mockEnv,
} from "./helpers.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      COUNTERPARTY_CHAIN: 3104,
      PACKET_LIFETIME_SECONDS: 31_536_000,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ COUNTERPARTY_CHAIN: "20", PACKET_LIFETIME_SECONDS: "60" });

    expect(config.COUNTERPARTY_CHAIN).toBe(20);
    expect(config.PACKET_LIFETIME_SECONDS).toBe(60);
  });

  it("rejects a chain outside u16", () => {
    expect(() => loadConfig({ COUNTERPARTY_CHAIN: "70000" })).toThrow(ZodError);
  });

  it("rejects a non-positive packet lifetime", () => {
    expect(() => loadConfig({ PACKET_LIFETIME_SECONDS: "0" })).toThrow(ZodError);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});

describe("createGatekeeper", () => {
  it("wires the configured lifetime and counterparty into the gateway", () => {
    const transport = new FakeTransport();
    const { gateway, config } = createGatekeeper(
      {
        coreBridge: new FakeCoreBridge(),
        verifier: makeVerifier(),
        channels: new FakeChannelDirectory([channel("channel-7", "abcd")]),
        transport,
      },
      { LOG_LEVEL: "silent", NODE_ENV: "test", PACKET_LIFETIME_SECONDS: "90" },
    );
    const store = new InMemoryStore();
    REGISTERED_ADDRESS.save(store, "abcd");

    gateway.execute(store, mockEnv(), CREATOR, {
      type: "core",
      msg: { type: "post_message", message: new Uint8Array([1]), nonce: 0 },
    });

    expect(config.COUNTERPARTY_CHAIN).toBe(3104);
    expect(transport.sent[0]!.timeoutSeconds).toBe(BLOCK_TIME + 90);
    expect(transport.sent[0]!.channelId).toBe("channel-7");
  });
});

/**
 * Tests for Item and the contract version record.
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { InMemoryStore } from "../src/in-memory-store.js";
import { Item } from "../src/item.js";
import {
  CONTRACT_VERSION_KEY,
  getContractVersion,
  setContractVersion,
} from "../src/contract-version.js";
import { StateError } from "../src/types.js";

const ADDRESS = new Item("address", z.string().min(1));

describe("Item", () => {
  it("returns undefined from mayLoad on an empty slot", () => {
    expect(ADDRESS.mayLoad(new InMemoryStore())).toBeUndefined();
  });

  it("throws NOT_FOUND from load on an empty slot", () => {
    const store = new InMemoryStore();

    expect(() => ADDRESS.load(store)).toThrow(StateError);
    try {
      ADDRESS.load(store);
    } catch (err) {
      expect((err as StateError).code).toBe("NOT_FOUND");
      expect((err as StateError).key).toBe("address");
    }
  });

  it("stores values as JSON and loads them back", () => {
    const store = new InMemoryStore();
    ADDRESS.save(store, "abcd");

    expect(store.get("address")).toBe('"abcd"');
    expect(ADDRESS.load(store)).toBe("abcd");
    expect(ADDRESS.exists(store)).toBe(true);
  });

  it("overwrites instead of merging", () => {
    const store = new InMemoryStore();
    ADDRESS.save(store, "first");
    ADDRESS.save(store, "second");

    expect(ADDRESS.load(store)).toBe("second");
  });

  it("rejects values that fail the schema on save", () => {
    expect(() => ADDRESS.save(new InMemoryStore(), "")).toThrow();
  });

  it("reports CORRUPT_VALUE for invalid JSON", () => {
    const store = new InMemoryStore([["address", "{not json"]]);

    expect(() => ADDRESS.load(store)).toThrow(/not valid JSON/);
  });

  it("reports CORRUPT_VALUE for a schema mismatch", () => {
    const store = new InMemoryStore([["address", "42"]]);

    try {
      ADDRESS.load(store);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StateError);
      expect((err as StateError).code).toBe("CORRUPT_VALUE");
    }
  });
});

describe("contract version", () => {
  it("is absent before it is set", () => {
    expect(getContractVersion(new InMemoryStore())).toBeUndefined();
  });

  it("writes canonical JSON under the well-known key", () => {
    const store = new InMemoryStore();
    setContractVersion(store, "ibc-gatekeeper:receiver", "0.1.0");

    expect(store.get(CONTRACT_VERSION_KEY)).toBe(
      '{"contract":"ibc-gatekeeper:receiver","version":"0.1.0"}',
    );
    expect(getContractVersion(store)).toEqual({
      contract: "ibc-gatekeeper:receiver",
      version: "0.1.0",
    });
  });
});

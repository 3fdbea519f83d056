/**
 * Runtime type guard tests for @ibc-gatekeeper/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAttribute,
  isContractEvent,
  isContractResponse,
} from "../src/guards.js";

describe("isAttribute", () => {
  it("accepts a key/value pair", () => {
    expect(isAttribute({ key: "action", value: "instantiate" })).toBe(true);
  });

  it("rejects non-string values", () => {
    expect(isAttribute({ key: "height", value: 12 })).toBe(false);
  });

  it("rejects null and primitives", () => {
    expect(isAttribute(null)).toBe(false);
    expect(isAttribute("action=instantiate")).toBe(false);
  });
});

describe("isContractEvent", () => {
  it("accepts an event with attributes", () => {
    expect(
      isContractEvent({
        type: "RegisterChain",
        attributes: [{ key: "chain", value: "Wormchain" }],
      }),
    ).toBe(true);
  });

  it("rejects an empty type", () => {
    expect(isContractEvent({ type: "", attributes: [] })).toBe(false);
  });

  it("rejects malformed attributes", () => {
    expect(
      isContractEvent({ type: "RegisterChain", attributes: [{ key: "chain" }] }),
    ).toBe(false);
  });
});

describe("isContractResponse", () => {
  it("accepts an empty response", () => {
    expect(isContractResponse({ attributes: [], events: [] })).toBe(true);
  });

  it("accepts a populated response", () => {
    expect(
      isContractResponse({
        attributes: [{ key: "message.block_height", value: "7" }],
        events: [{ type: "wasm", attributes: [] }],
      }),
    ).toBe(true);
  });

  it("rejects a response without events", () => {
    expect(isContractResponse({ attributes: [] })).toBe(false);
  });

  it("rejects a response whose events are malformed", () => {
    expect(isContractResponse({ attributes: [], events: [{}] })).toBe(false);
  });

  it("rejects arrays", () => {
    expect(isContractResponse([])).toBe(false);
  });
});

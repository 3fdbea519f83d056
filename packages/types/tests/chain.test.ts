import { describe, it, expect } from "vitest";
import { CHAINS, chainName } from "../src/chain.js";
import { wasmPortId } from "../src/ibc.js";
import {
  attr,
  emptyResponse,
  withAttributes,
  withEvent,
} from "../src/response.js";

describe("chainName", () => {
  it("names well-known chains", () => {
    expect(chainName(CHAINS.Solana)).toBe("Solana");
    expect(chainName(3104)).toBe("Wormchain");
    expect(chainName(0)).toBe("Any");
  });

  it("renders unknown chains as their numeric ID", () => {
    expect(chainName(9999)).toBe("9999");
  });
});

describe("wasmPortId", () => {
  it("prefixes the contract address", () => {
    expect(wasmPortId("abcd")).toBe("wasm.abcd");
  });
});

describe("response builders", () => {
  it("appends attributes in order without mutating the input", () => {
    const base = emptyResponse();
    const next = withAttributes(base, attr("a", "1"), attr("b", 2));

    expect(base.attributes).toEqual([]);
    expect(next.attributes).toEqual([
      { key: "a", value: "1" },
      { key: "b", value: "2" },
    ]);
  });

  it("appends events", () => {
    const res = withEvent(emptyResponse(), { type: "RegisterChain", attributes: [] });
    expect(res.events).toEqual([{ type: "RegisterChain", attributes: [] }]);
  });
});

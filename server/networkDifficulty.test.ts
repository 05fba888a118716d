import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchNetworkDifficulties, fetchNetworkDifficulty } from "./networkDifficulty";
import { stubFetch } from "./testFetch";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("fetchNetworkDifficulty", () => {
  it("reads the plain-text primary source", async () => {
    const calls = stubFetch({ "https://blockchain.info/q/getdifficulty": { body: " 83000000000000\n" } });
    expect(await fetchNetworkDifficulty("btc")).toBe(83e12);
    expect(calls).toEqual(["https://blockchain.info/q/getdifficulty"]);
  });

  it("falls back when the primary fails", async () => {
    stubFetch({
      "https://blockchain.info/q/getdifficulty": { status: 503, body: "busy" },
      "https://mempool.space/api/v1/mining/hashrate/3d": { body: { currentDifficulty: 81000000000000 } },
    });
    expect(await fetchNetworkDifficulty("BTC")).toBe(81e12);
  });

  it("falls back when the primary body is unusable", async () => {
    stubFetch({
      "https://bch.2miners.com/api/stats": { body: "<html>maintenance</html>" },
      "https://solo-bch.2miners.com/api/stats": { body: { nodes: [{ difficulty: "412000000000" }] } },
    });
    expect(await fetchNetworkDifficulty("BCH")).toBe(412e9);
  });

  it("returns null for unknown coins and exhausted sources", async () => {
    const calls = stubFetch({});
    expect(await fetchNetworkDifficulty("DOGE")).toBeNull();
    expect(calls).toEqual([]);
    expect(await fetchNetworkDifficulty("RVN")).toBeNull();
  });
});

describe("fetchNetworkDifficulties", () => {
  it("looks each coin up once", async () => {
    const calls = stubFetch({
      "https://blockchain.info/q/getdifficulty": { body: "83000000000000" },
      "https://eth.2miners.com/api/stats": { body: { nodes: [{ difficulty: 1000 }] } },
    });
    expect(await fetchNetworkDifficulties(["BTC", "btc", "ETH"])).toEqual({ BTC: 83e12, ETH: 1000 });
    expect(calls).toHaveLength(2);
  });
});

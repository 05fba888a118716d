import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CGMinerResponse } from "./cgminerApi";
import { AntminerAdapter, AvalonAdapter, BitaxeAdapter, extractWalletWorker, GenericCgminerAdapter } from "./minerAdapters";
import { stubFetch } from "./testFetch";

vi.mock("./cgminerApi", async (importOriginal) => {
  const actual = await importOriginal<typeof import("./cgminerApi")>();
  return { ...actual, cgminerCommand: vi.fn() };
});

import { cgminerCommand } from "./cgminerApi";

const mockCommand = vi.mocked(cgminerCommand);

function replyWith(replies: Record<string, CGMinerResponse>) {
  mockCommand.mockImplementation(async (_ip, command) => replies[command] ?? null);
}

beforeEach(() => {
  mockCommand.mockReset();
  mockCommand.mockResolvedValue(null);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("extractWalletWorker", () => {
  it("splits address and worker", () => {
    expect(extractWalletWorker("bc1qaddr.rig1")).toEqual({ address: "bc1qaddr", worker: "rig1" });
  });

  it("accepts a bare address", () => {
    expect(extractWalletWorker("bc1qaddr")).toEqual({ address: "bc1qaddr", worker: null });
  });

  it("rejects other shapes", () => {
    expect(extractWalletWorker("a.b.c")).toEqual({ address: null, worker: null });
    expect(extractWalletWorker("")).toEqual({ address: null, worker: null });
    expect(extractWalletWorker(null)).toEqual({ address: null, worker: null });
  });
});

describe("BitaxeAdapter", () => {
  const adapter = new BitaxeAdapter();
  const info = {
    hashRate: 1.5,
    temp: 55,
    fanspeed: 80,
    uptimeSeconds: 3600,
    deviceModel: "Gamma",
    ASICModel: "BM1370",
    stratumURL: "solo.ckpool.org",
    stratumPort: 3333,
    stratumUser: "bc1qaddr.rig",
    stratum: { pools: [{ connected: true, accepted: 120, poolDifficulty: 1000 }] },
  };

  it("detects AxeOS by its system info keys", async () => {
    stubFetch({ "http://10.0.0.5/api/system/info": { body: { ASICModel: "BM1366" } } });
    expect(await adapter.detect("10.0.0.5")).toBe(true);

    stubFetch({ "http://10.0.0.5/api/system/info": { body: { hostname: "router" } } });
    expect(await adapter.detect("10.0.0.5")).toBe(false);

    stubFetch({});
    expect(await adapter.detect("10.0.0.5")).toBe(false);
  });

  it("normalizes system info", async () => {
    stubFetch({ "http://10.0.0.5:80/api/system/info": { body: info } });
    const result = await adapter.getInfo("10.0.0.5");
    expect(result).toMatchObject({
      minerType: "bitaxe",
      firmwareVersion: "Gamma (BM1370)",
      hashrate: 1.5e9,
      temperature: 55,
      fanSpeed: 80,
      uptime: 3600,
      poolUrl: "solo.ckpool.org:3333",
      poolUser: "bc1qaddr.rig",
      status: "online",
    });
    expect(result && adapter.readShareCounter(result)).toEqual({ accepted: 120, difficulty: 1000 });
  });

  it("reports idle when the pool is disconnected and offline without hashrate", async () => {
    stubFetch({
      "http://10.0.0.5:80/api/system/info": { body: { ...info, stratum: { pools: [{ connected: false }] } } },
    });
    expect((await adapter.getInfo("10.0.0.5"))?.status).toBe("idle");

    stubFetch({ "http://10.0.0.5:80/api/system/info": { body: { ...info, hashRate: 0 } } });
    expect((await adapter.getInfo("10.0.0.5"))?.status).toBe("offline");
  });

  it("falls back to top-level share counters", async () => {
    stubFetch({
      "http://10.0.0.5:80/api/system/info": {
        body: { hashRate: 1, sharesAccepted: 77, poolDifficulty: 512 },
      },
    });
    const result = await adapter.getInfo("10.0.0.5");
    expect(result && adapter.readShareCounter(result)).toEqual({ accepted: 77, difficulty: 512 });
  });

  it("reads recent shares", async () => {
    stubFetch({
      "http://10.0.0.5:80/api/shares": {
        body: { shares: [{ diff: 512, accepted: false, time: "12:00" }, { diff: "1024" }] },
      },
    });
    expect(await adapter.getRecentShares("10.0.0.5")).toEqual([
      { difficulty: 512, workerName: null, accepted: false, timestamp: "12:00" },
      { difficulty: 1024, workerName: null, accepted: true, timestamp: null },
    ]);
  });
});

describe("raw protocol adapters", () => {
  const summary: CGMinerResponse = {
    raw: "summary",
    json: {
      STATUS: [{ STATUS: "S", Description: "cgminer 4.11.1" }],
      SUMMARY: [{ "MHS av": 6000000, Elapsed: 7200, Temperature: 60 }],
    },
  };
  const pools: CGMinerResponse = {
    raw: "pools",
    json: {
      POOLS: [
        {
          URL: "stratum+tcp://solo.ckpool.org:3333",
          User: "bc1qaddr.avalon",
          Accepted: 55,
          "Difficulty Accepted": 2048,
        },
      ],
    },
  };

  it("merges summary and pools", async () => {
    replyWith({ summary, pools });
    const adapter = new AvalonAdapter();
    const result = await adapter.getInfo("10.0.0.7");

    expect(mockCommand).toHaveBeenCalledTimes(2);
    expect(mockCommand.mock.calls.map((c) => c[1])).toEqual(["summary", "pools"]);
    expect(result).toMatchObject({
      minerType: "avalon",
      firmwareVersion: "cgminer 4.11.1",
      hashrate: 6e12,
      temperature: 60,
      uptime: 7200,
      poolUrl: "stratum+tcp://solo.ckpool.org:3333",
      poolUser: "bc1qaddr.avalon",
      status: "online",
    });
    expect(result && adapter.readShareCounter(result)).toEqual({ accepted: 55, difficulty: 2048 });
  });

  it("prefers GH/s over MH/s", async () => {
    replyWith({
      summary: { raw: "", json: { SUMMARY: [{ "GHS av": 100, "MHS av": 5 }] } },
    });
    const result = await new GenericCgminerAdapter().getInfo("10.0.0.8");
    expect(result?.hashrate).toBe(100e9);
    expect(result?.poolUrl).toBeNull();
  });

  it("reports idle at zero hashrate", async () => {
    replyWith({ summary: { raw: "", json: { SUMMARY: [{ "KHS av": 0 }] } } });
    expect((await new AntminerAdapter().getInfo("10.0.0.9"))?.status).toBe("idle");
  });

  it("returns null without a summary", async () => {
    replyWith({ summary: { raw: "garbage" } });
    expect(await new AvalonAdapter().getInfo("10.0.0.7")).toBeNull();
  });

  it("detects Avalon by web UI before the raw API", async () => {
    stubFetch({ "http://10.0.0.7/": { body: "<title>Avalon Nano</title>" } });
    expect(await new AvalonAdapter().detect("10.0.0.7")).toBe(true);
    expect(mockCommand).not.toHaveBeenCalled();
  });

  it("falls back to the version reply", async () => {
    stubFetch({});
    replyWith({ version: { raw: '{"VERSION":[{"PROD":"Canaan AvalonMiner"}]}' } });
    expect(await new AvalonAdapter().detect("10.0.0.7")).toBe(true);

    replyWith({ version: { raw: '{"VERSION":[{"CGMiner":"4.11.1"}]}' } });
    expect(await new AntminerAdapter().detect("10.0.0.7")).toBe(false);
    expect(await new GenericCgminerAdapter().detect("10.0.0.7")).toBe(true);
  });

  it("builds an Avalon pseudo share from pool counters", async () => {
    replyWith({ pools });
    expect(await new AvalonAdapter().getRecentShares("10.0.0.7")).toEqual([
      { difficulty: 2048, workerName: "bc1qaddr.avalon", accepted: true, timestamp: null },
    ]);
    expect(await new AntminerAdapter().getRecentShares("10.0.0.7")).toEqual([]);
  });

  it("labels models from the version reply", async () => {
    replyWith({ version: { raw: "", json: { VERSION: [{ MODEL: "1246" }] } } });
    expect(await new AvalonAdapter().identify("10.0.0.7")).toBe("AvalonMiner 1246");
  });
});

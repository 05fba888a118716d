import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TrackedAccount } from "../drizzle/schema";
import { closeDatabase, createAccount, getMinerConfigs, getMiners } from "./db";
import { BitaxeAdapter, type MinerInfo } from "./minerAdapters";
import {
  autoMatchWallet,
  discoverAndRegisterMiners,
  enumerateHosts,
  InvalidCidrError,
  scanNetwork,
  type ScanProgress,
} from "./networkScanner";

vi.mock("./netProbe", () => ({
  PROBE_PORTS: [80, 4028],
  probeHost: vi.fn(),
  tcpCheck: vi.fn(),
}));

vi.mock("./adapterRegistry", async (importOriginal) => {
  const actual = await importOriginal<typeof import("./adapterRegistry")>();
  return { ...actual, detectMinerType: vi.fn(), getMinerAdapter: vi.fn() };
});

import { detectMinerType, getMinerAdapter } from "./adapterRegistry";
import { probeHost } from "./netProbe";

const mockProbe = vi.mocked(probeHost);
const mockDetect = vi.mocked(detectMinerType);
const mockGetAdapter = vi.mocked(getMinerAdapter);

const BTC_ADDRESS = "bc1qtestaddress000000000000000000";

function axeInfo(poolUser: string | null): MinerInfo {
  return {
    minerType: "bitaxe",
    firmwareVersion: "Gamma (BM1370)",
    hashrate: 1.2e12,
    temperature: 50,
    fanSpeed: 60,
    uptime: 100,
    poolUrl: "stratum+tcp://solo.ckpool.org:3333",
    poolUser,
    status: "online",
    rawData: {},
  };
}

/** Only `minerIp` answers, as an AxeOS device reporting `poolUser`. */
function oneMinerAt(minerIp: string, poolUser: string | null) {
  mockProbe.mockImplementation(async (ip) => ip === minerIp);
  mockDetect.mockResolvedValue("bitaxe");
  const adapter = new BitaxeAdapter();
  vi.spyOn(adapter, "getInfo").mockResolvedValue(axeInfo(poolUser));
  mockGetAdapter.mockReturnValue(adapter);
}

beforeEach(() => {
  mockProbe.mockReset();
  mockDetect.mockReset();
  mockGetAdapter.mockReset();
});

afterEach(() => {
  closeDatabase();
});

describe("enumerateHosts", () => {
  it("excludes network and broadcast addresses", () => {
    expect(enumerateHosts("192.168.1.0/30")).toEqual(["192.168.1.1", "192.168.1.2"]);
    expect(enumerateHosts("192.168.1.77/30")).toEqual(["192.168.1.77", "192.168.1.78"]);
    expect(enumerateHosts("10.0.0.0/24")).toHaveLength(254);
  });

  it("handles point-to-point and single-host blocks", () => {
    expect(enumerateHosts("10.0.0.7/31")).toEqual(["10.0.0.6", "10.0.0.7"]);
    expect(enumerateHosts("10.0.0.7/32")).toEqual(["10.0.0.7"]);
  });

  it("rejects malformed and oversized blocks", () => {
    for (const cidr of ["10.0.0.0", "10.0.0/24", "10.0.0.300/24", "10.0.0.0/33", "10.0.0.0/8"]) {
      expect(() => enumerateHosts(cidr)).toThrow(InvalidCidrError);
    }
  });
});

describe("scanNetwork", () => {
  it("probes every usable host and reports progress per batch", async () => {
    mockProbe.mockResolvedValue(false);
    const progress: ScanProgress[] = [];

    const found = await scanNetwork("192.168.1.0/28", { batchSize: 5, onProgress: (p) => progress.push(p) });

    expect(found).toEqual([]);
    expect(mockProbe).toHaveBeenCalledTimes(14);
    expect(mockProbe.mock.calls.map((c) => c[0])).toEqual(enumerateHosts("192.168.1.0/28"));
    expect(mockDetect).not.toHaveBeenCalled();
    expect(progress).toEqual([
      { scanned: 5, total: 14, found: 0 },
      { scanned: 10, total: 14, found: 0 },
      { scanned: 14, total: 14, found: 0 },
    ]);
  });

  it("returns fingerprinted miners", async () => {
    oneMinerAt("192.168.1.5", `${BTC_ADDRESS}.rig`);

    const found = await scanNetwork("192.168.1.0/29");

    expect(found).toEqual([
      {
        ipAddress: "192.168.1.5",
        minerType: "bitaxe",
        apiPort: 80,
        model: "Gamma (BM1370)",
        info: axeInfo(`${BTC_ADDRESS}.rig`),
      },
    ]);
    expect(mockDetect).toHaveBeenCalledTimes(1);
  });

  it("skips hosts that answer but match no family", async () => {
    mockProbe.mockResolvedValue(true);
    mockDetect.mockResolvedValue(null);
    expect(await scanNetwork("192.168.1.0/30")).toEqual([]);
    expect(mockGetAdapter).not.toHaveBeenCalled();
  });
});

describe("autoMatchWallet", () => {
  const accounts: TrackedAccount[] = [
    {
      id: 1,
      name: "Pool",
      address: BTC_ADDRESS,
      adapterKey: "2miners_btc",
      coin: "BTC",
      enabled: true,
      createdAt: new Date(0),
    },
    {
      id: 2,
      name: "Solo",
      address: BTC_ADDRESS,
      adapterKey: "ckpool_btc",
      coin: "BTC",
      enabled: true,
      createdAt: new Date(0),
    },
  ];

  it("matches address and pool host", () => {
    const match = autoMatchWallet(
      { poolUrl: "stratum+tcp://solo.ckpool.org:3333", poolUser: `${BTC_ADDRESS.toUpperCase()}.rig` },
      accounts
    );
    expect(match?.id).toBe(2);
  });

  it("requires a known pool host", () => {
    expect(autoMatchWallet({ poolUrl: "stratum+tcp://pool.example:3333", poolUser: BTC_ADDRESS }, accounts)).toBeNull();
    expect(autoMatchWallet({ poolUrl: null, poolUser: BTC_ADDRESS }, accounts)).toBeNull();
  });

  it("requires the address", () => {
    expect(
      autoMatchWallet({ poolUrl: "solo.ckpool.org:3333", poolUser: "bc1qotheraddress0000000000000000.rig" }, accounts)
    ).toBeNull();
    expect(autoMatchWallet({ poolUrl: "solo.ckpool.org:3333", poolUser: "a.b.c" }, accounts)).toBeNull();
  });
});

describe("discoverAndRegisterMiners", () => {
  async function soloAccount() {
    const account = await createAccount({ name: "Solo", address: BTC_ADDRESS, adapterKey: "ckpool_btc", coin: "BTC" });
    if (!account) throw new Error("account not created");
    return account;
  }

  it("registers and links discovered miners", async () => {
    const account = await soloAccount();
    oneMinerAt("192.168.1.5", `${BTC_ADDRESS}.rig`);

    const [result] = await discoverAndRegisterMiners({ cidr: "192.168.1.0/29" });

    expect(result.created).toBe(true);
    expect(result.account?.id).toBe(account.id);
    const [miner] = await getMiners();
    expect(miner).toMatchObject({
      id: result.minerId,
      name: "bitaxe_192.168.1.5",
      minerType: "bitaxe",
      apiPort: 80,
      model: "Gamma (BM1370)",
      autoDiscovered: true,
    });
    const configs = await getMinerConfigs({ minerId: miner.id });
    expect(configs).toHaveLength(1);
    expect(configs[0]).toMatchObject({
      accountId: account.id,
      poolUrl: "stratum+tcp://solo.ckpool.org:3333",
      workerName: "rig",
    });
  });

  it("does not rewrite an unchanged link on re-scan", async () => {
    await soloAccount();
    oneMinerAt("192.168.1.5", `${BTC_ADDRESS}.rig`);

    await discoverAndRegisterMiners({ cidr: "192.168.1.0/29" });
    const [again] = await discoverAndRegisterMiners({ cidr: "192.168.1.0/29" });

    expect(again.created).toBe(false);
    expect(await getMiners()).toHaveLength(1);
    expect(await getMinerConfigs({ includeInactive: true })).toHaveLength(1);
  });

  it("keeps an existing link when the miner no longer matches", async () => {
    const account = await soloAccount();
    oneMinerAt("192.168.1.5", `${BTC_ADDRESS}.rig`);
    await discoverAndRegisterMiners({ cidr: "192.168.1.0/29" });

    oneMinerAt("192.168.1.5", "bc1qotheraddress0000000000000000.rig");
    const [again] = await discoverAndRegisterMiners({ cidr: "192.168.1.0/29" });

    expect(again.account).toBeNull();
    const configs = await getMinerConfigs({ includeInactive: true });
    expect(configs).toHaveLength(1);
    expect(configs[0].accountId).toBe(account.id);
  });

  it("writes nothing when not saving", async () => {
    oneMinerAt("192.168.1.5", null);

    const results = await discoverAndRegisterMiners({ cidr: "192.168.1.0/29", save: false });

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ minerId: null, created: false, account: null });
    expect(await getMiners()).toEqual([]);
  });
});

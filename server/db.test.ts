import { afterEach, describe, expect, it } from "vitest";
import {
  cleanupOldData,
  closeDatabase,
  createAccount,
  deleteAccount,
  getAccountHistory,
  getAccounts,
  getActiveMinerConfig,
  getBestSharesHistory,
  getMinerConfigs,
  getMiners,
  getMinersWithActiveAccount,
  getShareStatistics,
  getShareSubmissions,
  getStatsSummary,
  linkMinerToAccount,
  logBestShare,
  logShareSubmission,
  savePoolSnapshot,
  unlinkMiner,
  updateAccount,
  updateMiner,
  upsertMinerByIp,
} from "./db";

const BTC_ADDRESS = "bc1qtestaddress000000000000000000";

afterEach(() => {
  closeDatabase();
});

async function addAccount(name = "Solo", address = BTC_ADDRESS) {
  const account = await createAccount({ name, address, adapterKey: "ckpool_btc", coin: "BTC" });
  if (!account) throw new Error("account not created");
  return account;
}

async function addMiner(ipAddress = "192.168.1.50") {
  const { miner } = await upsertMinerByIp({ name: `bitaxe_${ipAddress}`, minerType: "bitaxe", ipAddress, apiPort: 80 });
  return miner;
}

describe("accounts", () => {
  it("refuses a duplicate address on the same pool", async () => {
    await addAccount();
    expect(await createAccount({ name: "Again", address: BTC_ADDRESS, adapterKey: "ckpool_btc", coin: "BTC" })).toBeNull();
    expect(
      await createAccount({ name: "Other pool", address: BTC_ADDRESS, adapterKey: "2miners_solo_btc", coin: "BTC" })
    ).not.toBeNull();
    expect(await getAccounts()).toHaveLength(2);
  });

  it("filters disabled accounts", async () => {
    const account = await addAccount();
    await updateAccount(account.id, { enabled: false });
    expect(await getAccounts({ enabledOnly: true })).toEqual([]);
    expect(await getAccounts()).toHaveLength(1);
  });

  it("deletes history and deactivates links", async () => {
    const account = await addAccount();
    const miner = await addMiner();
    await linkMinerToAccount({ minerId: miner.id, accountId: account.id, poolUrl: null, workerName: null });
    await savePoolSnapshot({ accountId: account.id, poolName: "Solo CKPool", coin: "BTC", rawData: { ok: true } });
    await logBestShare({ accountId: account.id, poolName: "Solo CKPool", difficulty: 1000 });

    expect(await deleteAccount(account.id)).toBe(true);
    expect(await getAccountHistory(account.id)).toEqual([]);
    expect(await getBestSharesHistory({ accountId: account.id })).toEqual([]);
    expect(await getActiveMinerConfig(miner.id)).toBeUndefined();
    expect(await getMinerConfigs({ minerId: miner.id, includeInactive: true })).toHaveLength(1);
    expect(await deleteAccount(account.id)).toBe(false);
  });
});

describe("snapshots", () => {
  it("stores raw data as JSON text", async () => {
    const account = await addAccount();
    const id = await savePoolSnapshot({
      accountId: account.id,
      poolName: "Solo CKPool",
      coin: "BTC",
      hashrate: 1.5e12,
      workersOnline: 2,
      rawData: { hashrate1m: "1.5T" },
    });
    expect(id).toBeGreaterThan(0);

    const [snapshot] = await getAccountHistory(account.id);
    expect(snapshot.hashrate).toBe(1.5e12);
    expect(snapshot.workersOnline).toBe(2);
    expect(snapshot.rawData).toBe('{"hashrate1m":"1.5T"}');
  });
});

describe("logBestShare", () => {
  it("only records strictly increasing difficulty per account and pool", async () => {
    const account = await addAccount();
    const share = (difficulty: number) => logBestShare({ accountId: account.id, poolName: "Solo CKPool", difficulty });

    expect(await share(1e15)).toBe(true);
    expect(await share(5e14)).toBe(false);
    expect(await share(1e15)).toBe(false);
    expect(await share(2e15)).toBe(true);
    expect(await logBestShare({ accountId: account.id, poolName: "2Miners BTC", difficulty: 10 })).toBe(true);

    const history = await getBestSharesHistory({ accountId: account.id, poolName: "Solo CKPool" });
    expect(history.map((h) => h.difficulty)).toEqual([2e15, 1e15]);
  });

  it("ignores non-positive and non-finite values", async () => {
    const account = await addAccount();
    for (const difficulty of [0, -1, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(await logBestShare({ accountId: account.id, poolName: "Solo CKPool", difficulty })).toBe(false);
    }
    expect(await getBestSharesHistory()).toEqual([]);
  });
});

describe("share submissions", () => {
  it("summarizes accepted and rejected shares", async () => {
    const account = await addAccount();
    for (const [difficulty, accepted] of [
      [100, true],
      [300, true],
      [200, false],
      [400, true],
    ] as const) {
      await logShareSubmission({ accountId: account.id, poolName: "Solo CKPool", difficulty, accepted });
    }

    expect(await getShareStatistics({ accountId: account.id, hours: 4 })).toEqual({
      totalShares: 4,
      acceptedShares: 3,
      rejectedShares: 1,
      acceptanceRate: 75,
      avgDifficulty: 250,
      maxDifficulty: 400,
      sharesPerHour: 1,
    });
    const recent = await getShareSubmissions({ accountId: account.id, limit: 2 });
    expect(recent.map((s) => s.difficulty)).toEqual([400, 200]);
  });

  it("reports zeros without data", async () => {
    expect(await getShareStatistics()).toEqual({
      totalShares: 0,
      acceptedShares: 0,
      rejectedShares: 0,
      acceptanceRate: 0,
      avgDifficulty: 0,
      maxDifficulty: 0,
      sharesPerHour: 0,
    });
  });
});

describe("miners", () => {
  it("keeps one row per IP", async () => {
    const first = await upsertMinerByIp({ name: "rig", minerType: "avalon", ipAddress: "192.168.1.60", status: "offline" });
    const second = await upsertMinerByIp({ name: "renamed", minerType: "avalon", ipAddress: "192.168.1.60" });

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.miner.id).toBe(first.miner.id);
    expect(second.miner.name).toBe("rig");
    expect(second.miner.status).toBe("online");
    expect(await getMiners()).toHaveLength(1);
  });

  it("updates fields", async () => {
    const miner = await addMiner();
    const updated = await updateMiner(miner.id, { enabled: false, apiPort: 8080 });
    expect(updated?.enabled).toBe(false);
    expect(updated?.apiPort).toBe(8080);
    expect(await updateMiner(9999, { enabled: true })).toBeUndefined();
  });
});

describe("miner links", () => {
  it("keeps a single active link", async () => {
    const account = await addAccount();
    const miner = await addMiner();
    await linkMinerToAccount({ minerId: miner.id, accountId: null, poolUrl: "solo.ckpool.org:3333", workerName: null });
    const second = await linkMinerToAccount({
      minerId: miner.id,
      accountId: account.id,
      poolUrl: "solo.ckpool.org:3333",
      workerName: "rig",
    });

    expect(await getMinerConfigs({ minerId: miner.id })).toEqual([second]);
    expect(await getMinerConfigs({ minerId: miner.id, includeInactive: true })).toHaveLength(2);
    expect((await getActiveMinerConfig(miner.id))?.id).toBe(second.id);
  });

  it("joins enabled miners with their linked account", async () => {
    const account = await addAccount();
    const linked = await addMiner("192.168.1.50");
    const unlinked = await addMiner("192.168.1.51");
    const disabled = await addMiner("192.168.1.52");
    await linkMinerToAccount({ minerId: linked.id, accountId: account.id, poolUrl: null, workerName: "a" });
    await linkMinerToAccount({ minerId: unlinked.id, accountId: null, poolUrl: null, workerName: null });
    await linkMinerToAccount({ minerId: disabled.id, accountId: account.id, poolUrl: null, workerName: "c" });
    await updateMiner(disabled.id, { enabled: false });

    const rows = await getMinersWithActiveAccount();
    expect(rows).toHaveLength(1);
    expect(rows[0].miner.id).toBe(linked.id);
    expect(rows[0].account.id).toBe(account.id);
    expect(rows[0].config.workerName).toBe("a");
  });

  it("unlinks", async () => {
    const account = await addAccount();
    const miner = await addMiner();
    await linkMinerToAccount({ minerId: miner.id, accountId: account.id, poolUrl: null, workerName: null });
    expect(await unlinkMiner(miner.id)).toBe(1);
    expect(await unlinkMiner(miner.id)).toBe(0);
    expect(await getMinersWithActiveAccount()).toEqual([]);
  });
});

describe("maintenance", () => {
  it("keeps recent data", async () => {
    const account = await addAccount();
    await savePoolSnapshot({ accountId: account.id, poolName: "Solo CKPool", coin: "BTC" });
    expect(await cleanupOldData()).toEqual({ poolSnapshots: 0, workerSnapshots: 0, shareSubmissions: 0, bestShares: 0 });
  });

  it("summarizes stored data", async () => {
    const account = await addAccount();
    await addMiner();
    await savePoolSnapshot({ accountId: account.id, poolName: "Solo CKPool", coin: "BTC", hashrate: 100 });
    await savePoolSnapshot({ accountId: account.id, poolName: "Solo CKPool", coin: "BTC", hashrate: 300 });
    await logBestShare({ accountId: account.id, poolName: "Solo CKPool", difficulty: 5000 });

    const summary = await getStatsSummary("Solo CKPool");
    expect(summary.totalSnapshots).toBe(2);
    expect(summary.avgHashrate24h).toBe(200);
    expect(summary.bestShare).toBe(5000);
    expect(summary.accounts).toBe(1);
    expect(summary.miners).toBe(1);
    expect(summary.firstSnapshot).toBeInstanceOf(Date);
  });
});

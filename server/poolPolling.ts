/**
 * Pool polling cycle
 *
 * Fetches every enabled account concurrently, persists a snapshot per account
 * and publishes the combined result to the stats cache.
 */

import type { TrackedAccount } from "../drizzle/schema";
import { createLogger, errorMessage } from "./_core/logger";
import { requirePoolAdapter, UnknownAdapterError } from "./adapterRegistry";
import { getAccounts, logBestShare, savePoolSnapshot, saveWorkerSnapshot } from "./db";
import { fetchNetworkDifficulties } from "./networkDifficulty";
import type { PoolAdapter, PoolStats, WorkerStats } from "./poolAdapters";
import { publishLatestStats, type AccountData, type DashboardData } from "./statsCache";

const log = createLogger("PoolPolling");

type DifficultyTable = Record<string, number | null>;

function topWorker(workers: WorkerStats[]): WorkerStats | null {
  let best: WorkerStats | null = null;
  for (const w of workers) {
    if (w.bestShare !== null && (best === null || (best.bestShare ?? 0) < w.bestShare)) best = w;
  }
  return best;
}

async function persistStats(account: TrackedAccount, stats: PoolStats): Promise<void> {
  await savePoolSnapshot({
    accountId: account.id,
    poolName: stats.poolName,
    coin: stats.coin,
    hashrate: stats.hashrate,
    hashrateAvg: stats.hashrateAvg,
    workersOnline: stats.workersOnline,
    workersOffline: stats.workersOffline,
    balance: stats.balance,
    paid: stats.paid,
    bestShare: stats.bestShare,
    bestShareEstimated: stats.bestShareEstimated,
    bestEver: stats.bestEver,
    networkDifficulty: stats.networkDifficulty,
    rawData: stats.rawData,
  });

  for (const worker of stats.workers) {
    await saveWorkerSnapshot({
      accountId: account.id,
      poolName: stats.poolName,
      workerName: worker.name,
      hashrate: worker.hashrate,
      hashrateAvg: worker.hashrateAvg,
      bestShare: worker.bestShare,
      sharesCount: worker.sharesCount,
      offline: worker.offline,
    });
  }

  // Estimated values are not shares anyone submitted
  if (stats.bestShare !== null && !stats.bestShareEstimated) {
    const recorded = await logBestShare({
      accountId: account.id,
      poolName: stats.poolName,
      difficulty: stats.bestShare,
      workerName: topWorker(stats.workers)?.name ?? null,
      isAllTimeBest: stats.bestEver !== null && stats.bestShare >= stats.bestEver,
    });
    if (recorded) log.info(`New best share for ${account.name}: ${stats.bestShare}`);
  }
}

/**
 * Fetch, persist and return one account's stats. Failures are reported in
 * the result; this never rejects for an upstream problem.
 */
export async function fetchAccountStats(
  account: TrackedAccount,
  difficulties: Promise<DifficultyTable>
): Promise<AccountData> {
  const base = {
    accountId: account.id,
    name: account.name,
    address: account.address,
    adapterKey: account.adapterKey,
    coin: account.coin,
  };

  let adapter: PoolAdapter;
  try {
    adapter = requirePoolAdapter(account.adapterKey);
  } catch (err) {
    if (err instanceof UnknownAdapterError) {
      log.warn(`${account.name}: ${err.message}`);
      return { ...base, stats: null, error: err.message };
    }
    throw err;
  }

  const fetched = await adapter.fetchStats(account.address);
  if (!fetched) return { ...base, stats: null, error: "No data available" };

  const networkDifficulty = fetched.networkDifficulty ?? (await difficulties)[fetched.coin.toUpperCase()] ?? null;
  const stats: PoolStats = { ...fetched, networkDifficulty };

  try {
    await persistStats(account, stats);
  } catch (err) {
    log.error(`Failed to save snapshot for ${account.name}: ${errorMessage(err)}`);
  }
  return { ...base, stats, error: null };
}

/** One pool cycle: every enabled account, concurrently. */
export async function fetchAllStats(): Promise<DashboardData> {
  const accounts = await getAccounts({ enabledOnly: true });
  const difficulties = fetchNetworkDifficulties(accounts.map((a) => a.coin)).catch((err: unknown): DifficultyTable => {
    log.warn(`Network difficulty lookup failed: ${errorMessage(err)}`);
    return {};
  });

  const results = await Promise.allSettled(accounts.map((account) => fetchAccountStats(account, difficulties)));
  const data: AccountData[] = results.map((result, i) => {
    if (result.status === "fulfilled") return result.value;
    const account = accounts[i];
    log.error(`Poll failed for ${account.name}: ${errorMessage(result.reason)}`);
    return {
      accountId: account.id,
      name: account.name,
      address: account.address,
      adapterKey: account.adapterKey,
      coin: account.coin,
      stats: null,
      error: errorMessage(result.reason),
    };
  });

  const dashboard: DashboardData = {
    accounts: data,
    networkDifficulty: await difficulties,
    lastUpdated: new Date(),
  };
  publishLatestStats(dashboard);

  const ok = data.filter((d) => d.stats !== null).length;
  log.info(`Pool cycle done: ${ok}/${accounts.length} account(s) updated`);
  return dashboard;
}

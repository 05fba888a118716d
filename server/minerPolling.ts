/**
 * Miner Polling Service
 *
 * Two independent loops:
 *  - pool loop: account stats from the pools (see poolPolling.ts)
 *  - miner loop: live device info, turning accepted-share counter deltas into
 *    share submission records
 */

import { ENV } from "./_core/env";
import { createLogger, errorMessage } from "./_core/logger";
import { getMinerAdapter, getPoolAdapter } from "./adapterRegistry";
import { getMinersWithActiveAccount, logShareSubmission, updateMiner, type LinkedMiner } from "./db";
import { fetchAllStats } from "./poolPolling";

const log = createLogger("Polling");

/** Upper bound on share records synthesized for one device in one poll. */
export const MAX_SHARES_PER_POLL = 10;

export type ShareDelta = {
  baseline: number;
  newShares: number;
  records: number;
};

/**
 * Compare an observed accepted-share counter with the last baseline.
 * A lower counter means the device restarted: rebase without emitting anything.
 */
export function computeShareDelta(baseline: number | undefined, observed: number): ShareDelta {
  const previous = baseline ?? 0;
  if (observed > previous) {
    const newShares = observed - previous;
    return { baseline: observed, newShares, records: Math.min(newShares, MAX_SHARES_PER_POLL) };
  }
  return { baseline: observed, newShares: 0, records: 0 };
}

/** Per-miner share counter baselines, kept in memory for the process lifetime. */
export class ShareCounterTracker {
  private readonly baselines = new Map<number, number>();

  observe(minerId: number, observed: number): ShareDelta {
    const delta = computeShareDelta(this.baselines.get(minerId), observed);
    this.baselines.set(minerId, delta.baseline);
    return delta;
  }

  baselineOf(minerId: number): number | undefined {
    return this.baselines.get(minerId);
  }

  reset(): void {
    this.baselines.clear();
  }
}

const shareTracker = new ShareCounterTracker();

/** Poll one linked miner. Returns the number of share records written. */
export async function pollMiner(linked: LinkedMiner, tracker: ShareCounterTracker = shareTracker): Promise<number> {
  const { miner, config, account } = linked;
  const adapter = getMinerAdapter(miner.minerType);
  if (!adapter) {
    log.warn(`Unknown miner type ${miner.minerType} for ${miner.name}`);
    return 0;
  }

  const info = await adapter.getInfo(miner.ipAddress, miner.apiPort ?? adapter.defaultPort);
  if (!info) {
    await updateMiner(miner.id, { status: "offline" });
    log.debug(`${miner.name} (${miner.ipAddress}) unreachable`);
    return 0;
  }

  let written = 0;
  const counter = adapter.readShareCounter(info);
  if (counter) {
    const delta = tracker.observe(miner.id, counter.accepted);
    const poolName = getPoolAdapter(account.adapterKey)?.getPoolName() ?? account.adapterKey;
    for (let i = 0; i < delta.records; i++) {
      await logShareSubmission({
        accountId: account.id,
        minerId: miner.id,
        poolName,
        workerName: config.workerName,
        difficulty: counter.difficulty,
        accepted: true,
      });
      written++;
    }
    if (delta.newShares > 0) {
      log.info(`${miner.name}: ${delta.newShares} new share(s), ${written} recorded`);
    }
  }

  await updateMiner(miner.id, { status: info.status, lastSeen: new Date() });
  return written;
}

/** One miner cycle over every enabled miner linked to an account. */
export async function pollMinersForShares(
  tracker: ShareCounterTracker = shareTracker
): Promise<{ polled: number; shares: number }> {
  const linked = await getMinersWithActiveAccount();
  if (linked.length === 0) return { polled: 0, shares: 0 };

  const results = await Promise.allSettled(linked.map((l) => pollMiner(l, tracker)));
  let shares = 0;
  results.forEach((result, i) => {
    if (result.status === "fulfilled") {
      shares += result.value;
    } else {
      log.error(`Poll failed for ${linked[i].miner.name}: ${errorMessage(result.reason)}`);
    }
  });
  return { polled: linked.length, shares };
}

// ============ SERVICE LIFECYCLE ============

let _poolInterval: NodeJS.Timeout | null = null;
let _minerInterval: NodeJS.Timeout | null = null;
let _poolBusy = false;
let _minerBusy = false;

async function runPoolCycle(): Promise<void> {
  if (_poolBusy) {
    log.debug("Pool cycle still running, skipping tick");
    return;
  }
  _poolBusy = true;
  try {
    await fetchAllStats();
  } catch (err) {
    log.error("Pool cycle failed:", err);
  } finally {
    _poolBusy = false;
  }
}

async function runMinerCycle(): Promise<void> {
  if (_minerBusy) {
    log.debug("Miner cycle still running, skipping tick");
    return;
  }
  _minerBusy = true;
  try {
    const { polled, shares } = await pollMinersForShares();
    if (polled > 0) log.debug(`Miner cycle done: ${polled} miner(s), ${shares} share record(s)`);
  } catch (err) {
    log.error("Miner cycle failed:", err);
  } finally {
    _minerBusy = false;
  }
}

export function startPoolPolling(intervalMs = ENV.poolPollIntervalSeconds * 1000): void {
  if (_poolInterval) {
    log.info("Pool polling already running");
    return;
  }
  void runPoolCycle();
  _poolInterval = setInterval(() => void runPoolCycle(), intervalMs);
  log.info(`Pool polling started (every ${intervalMs / 1000}s)`);
}

export function stopPoolPolling(): void {
  if (!_poolInterval) return;
  clearInterval(_poolInterval);
  _poolInterval = null;
  log.info("Pool polling stopped");
}

export function startMinerPolling(intervalMs = ENV.minerPollIntervalSeconds * 1000): void {
  if (_minerInterval) {
    log.info("Miner polling already running");
    return;
  }
  void runMinerCycle();
  _minerInterval = setInterval(() => void runMinerCycle(), intervalMs);
  log.info(`Miner polling started (every ${intervalMs / 1000}s)`);
}

export function stopMinerPolling(): void {
  if (!_minerInterval) return;
  clearInterval(_minerInterval);
  _minerInterval = null;
  log.info("Miner polling stopped");
}

export function isPollingActive(): { pools: boolean; miners: boolean } {
  return { pools: _poolInterval !== null, miners: _minerInterval !== null };
}

export function startPollingService(): void {
  log.info("Starting polling service...");
  startPoolPolling();
  startMinerPolling();
}

export function stopPollingService(): void {
  stopPoolPolling();
  stopMinerPolling();
  log.info("Service stopped");
}

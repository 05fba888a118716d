/**
 * Pool adapters
 *
 * Each adapter speaks one pool's HTTP/JSON API and maps it onto PoolStats.
 * Adapters never throw: an invalid address, a missing account or an
 * unreachable pool all come back as null, logged differently.
 */

import { createLogger } from "./_core/logger";
import { getJson } from "./httpClient";
import {
  asArray,
  asObject,
  firstObject,
  isJsonObject,
  parseHashrate,
  pickBoolean,
  pickNumber,
  toNumber,
  type JsonObject,
} from "./normalize";

const log = createLogger("PoolAdapter");

export const ACCOUNT_TIMEOUT_MS = 15000;
export const POOL_STATS_TIMEOUT_MS = 10000;

const SATOSHI = 1e8;
// Best share shown for 2Miners Solo when only the round share count is known
const SOLO_BEST_SHARE_FACTOR = 0.01;

export type WorkerStats = {
  name: string;
  hashrate: number;
  hashrateAvg: number | null;
  lastShare: number | null;
  sharesCount: number | null;
  bestShare: number | null;
  offline: boolean;
};

export type PoolStats = {
  poolName: string;
  coin: string;
  address: string;
  hashrate: number;
  hashrateAvg: number;
  workersOnline: number;
  workersOffline: number;
  balance: number;
  paid: number;
  bestShare: number | null;
  /** bestShare was derived from network difficulty rather than reported */
  bestShareEstimated: boolean;
  bestEver: number | null;
  networkDifficulty: number | null;
  lastShare: number | null;
  workers: WorkerStats[];
  rawData: JsonObject;
};

export interface PoolAdapter {
  readonly coin: string;
  getPoolName(): string;
  validateAddress(address: string): boolean;
  fetchStats(address: string): Promise<PoolStats | null>;
}

function isBitcoinAddress(address: string): boolean {
  return address.startsWith("1") || address.startsWith("3") || address.startsWith("bc1");
}

abstract class HttpPoolAdapter implements PoolAdapter {
  abstract readonly coin: string;
  abstract getPoolName(): string;
  abstract validateAddress(address: string): boolean;
  protected abstract accountUrl(address: string): string;
  protected abstract parseAccount(address: string, body: JsonObject): Promise<PoolStats | null>;

  async fetchStats(address: string): Promise<PoolStats | null> {
    const name = this.getPoolName();
    if (!this.validateAddress(address)) {
      log.warn(`${name}: rejected address ${address}`);
      return null;
    }

    const result = await getJson(this.accountUrl(address), ACCOUNT_TIMEOUT_MS);
    if (result.kind === "not_found") {
      log.info(`${name}: no such account ${address}`);
      return null;
    }
    if (result.kind === "error") {
      log.warn(`${name}: fetch failed for ${address}: ${result.error}`);
      return null;
    }
    if (!isJsonObject(result.data)) {
      log.warn(`${name}: unexpected payload for ${address}`);
      return null;
    }
    return this.parseAccount(address, result.data);
  }
}

// ============ CKPOOL ============

export class CkPoolAdapter extends HttpPoolAdapter {
  readonly coin = "BTC";
  static readonly BASE_URL = "https://solo.ckpool.org";

  getPoolName(): string {
    return "Solo CKPool";
  }

  validateAddress(address: string): boolean {
    return address.length >= 26 && isBitcoinAddress(address);
  }

  protected accountUrl(address: string): string {
    return `${CkPoolAdapter.BASE_URL}/users/${address}`;
  }

  protected async parseAccount(address: string, body: JsonObject): Promise<PoolStats> {
    const workers: WorkerStats[] = asArray(body.worker).map((entry) => {
      const w = asObject(entry);
      const hashrate = parseHashrate(w.hashrate1m);
      const hashrateAvg = parseHashrate(w.hashrate1hr);
      const fullName = typeof w.workername === "string" ? w.workername : "";
      return {
        name: fullName.split(".").pop() || "default",
        hashrate,
        hashrateAvg,
        lastShare: pickNumber(w.lastshare),
        sharesCount: pickNumber(w.shares),
        bestShare: pickNumber(w.bestshare),
        offline: hashrate === 0 && hashrateAvg === 0,
      };
    });

    const online = workers.filter((w) => !w.offline).length;
    return {
      poolName: this.getPoolName(),
      coin: this.coin,
      address,
      hashrate: parseHashrate(body.hashrate1m),
      hashrateAvg: parseHashrate(body.hashrate1hr),
      workersOnline: online,
      workersOffline: workers.length - online,
      balance: 0,
      paid: 0,
      bestShare: pickNumber(body.bestshare),
      bestShareEstimated: false,
      bestEver: pickNumber(body.bestever),
      networkDifficulty: null,
      lastShare: pickNumber(body.lastshare),
      workers,
      rawData: body,
    };
  }
}

// ============ 2MINERS ============

function parseTwoMinersWorkers(workersMap: JsonObject): WorkerStats[] {
  return Object.entries(workersMap).map(([key, entry]) => {
    const w = asObject(entry);
    return {
      name: key === "0" ? "default" : key,
      hashrate: toNumber(w.hr),
      hashrateAvg: pickNumber(w.hr2),
      lastShare: pickNumber(w.lastBeat),
      sharesCount: pickNumber(w.sharesValid),
      bestShare: null,
      offline: pickBoolean(w.offline) ?? false,
    };
  });
}

function totalPaid(body: JsonObject): number {
  return asArray(body.payments).reduce<number>((sum, p) => sum + toNumber(asObject(p).amount), 0) / SATOSHI;
}

abstract class TwoMinersAdapter extends HttpPoolAdapter {
  constructor(readonly coin: string, protected readonly baseUrl: string) {
    super();
  }

  protected accountUrl(address: string): string {
    return `${this.baseUrl}/accounts/${address}`;
  }

  protected async bestShareFor(_body: JsonObject): Promise<{ bestShare: number | null; networkDifficulty: number | null }> {
    return { bestShare: null, networkDifficulty: null };
  }

  protected async parseAccount(address: string, body: JsonObject): Promise<PoolStats | null> {
    if (!isJsonObject(body.workers)) {
      log.warn(`${this.getPoolName()}: payload for ${address} has no workers`);
      return null;
    }

    const stats = asObject(body.stats);
    const { bestShare, networkDifficulty } = await this.bestShareFor(body);
    return {
      poolName: this.getPoolName(),
      coin: this.coin,
      address,
      hashrate: toNumber(body.currentHashrate),
      hashrateAvg: toNumber(body.hashrate),
      workersOnline: toNumber(body.workersOnline),
      workersOffline: toNumber(body.workersOffline),
      balance: toNumber(stats.balance) / SATOSHI,
      paid: totalPaid(body),
      bestShare,
      bestShareEstimated: bestShare !== null,
      bestEver: null,
      networkDifficulty,
      lastShare: pickNumber(stats.lastShare),
      workers: parseTwoMinersWorkers(body.workers),
      rawData: body,
    };
  }
}

export class TwoMinersSoloAdapter extends TwoMinersAdapter {
  constructor(coin: "BCH" | "BTC") {
    super(coin, `https://solo-${coin.toLowerCase()}.2miners.com/api`);
  }

  getPoolName(): string {
    return `2Miners Solo ${this.coin}`;
  }

  validateAddress(address: string): boolean {
    if (address.length < 20) return false;
    if (this.coin === "BCH") return address.length > 20;
    return isBitcoinAddress(address);
  }

  /** Solo accounts report no best share; estimate one from network difficulty. */
  protected async bestShareFor(body: JsonObject): Promise<{ bestShare: number | null; networkDifficulty: number | null }> {
    if (toNumber(body.roundShares) <= 0) return { bestShare: null, networkDifficulty: null };

    const result = await getJson(`${this.baseUrl}/stats`, POOL_STATS_TIMEOUT_MS);
    if (result.kind !== "ok") {
      log.debug(`${this.getPoolName()}: pool stats unavailable`);
      return { bestShare: null, networkDifficulty: null };
    }
    const networkDifficulty = pickNumber(firstObject(asObject(result.data).nodes).difficulty);
    if (networkDifficulty === null) return { bestShare: null, networkDifficulty: null };
    return { bestShare: networkDifficulty * SOLO_BEST_SHARE_FACTOR, networkDifficulty };
  }
}

export class TwoMinersPoolAdapter extends TwoMinersAdapter {
  constructor(coin: "BCH" | "BTC" | "ETH" | "RVN") {
    super(coin, `https://${coin.toLowerCase()}.2miners.com/api`);
  }

  getPoolName(): string {
    return `2Miners ${this.coin}`;
  }

  validateAddress(address: string): boolean {
    return address.length > 20;
  }
}

/**
 * Adapter registry
 *
 * Static key -> factory maps for pool and miner adapters. The maps are frozen
 * at module load; adding a pool or a hardware family means adding an entry here.
 */

import { createLogger, errorMessage } from "./_core/logger";
import {
  AntminerAdapter,
  AvalonAdapter,
  BitaxeAdapter,
  GenericCgminerAdapter,
  MINER_TYPES,
  type MinerAdapter,
  type MinerType,
} from "./minerAdapters";
import { CkPoolAdapter, TwoMinersPoolAdapter, TwoMinersSoloAdapter, type PoolAdapter } from "./poolAdapters";

const log = createLogger("Registry");

export class UnknownAdapterError extends Error {
  constructor(readonly kind: "pool" | "miner", readonly key: string) {
    super(`Unknown ${kind} adapter: ${key}`);
    this.name = "UnknownAdapterError";
  }
}

// ============ POOLS ============

export const POOL_ADAPTERS: Readonly<Record<string, () => PoolAdapter>> = Object.freeze({
  ckpool_btc: () => new CkPoolAdapter(),
  "2miners_solo_bch": () => new TwoMinersSoloAdapter("BCH"),
  "2miners_solo_btc": () => new TwoMinersSoloAdapter("BTC"),
  "2miners_bch": () => new TwoMinersPoolAdapter("BCH"),
  "2miners_btc": () => new TwoMinersPoolAdapter("BTC"),
  "2miners_eth": () => new TwoMinersPoolAdapter("ETH"),
  "2miners_rvn": () => new TwoMinersPoolAdapter("RVN"),
});

export type PoolOption = {
  key: string;
  name: string;
  coin: string;
};

export function isPoolAdapterKey(key: string): boolean {
  return Object.prototype.hasOwnProperty.call(POOL_ADAPTERS, key);
}

export function getPoolAdapter(key: string): PoolAdapter | null {
  return isPoolAdapterKey(key) ? POOL_ADAPTERS[key]() : null;
}

/** Like getPoolAdapter, but an unknown key is a caller error. */
export function requirePoolAdapter(key: string): PoolAdapter {
  const adapter = getPoolAdapter(key);
  if (!adapter) throw new UnknownAdapterError("pool", key);
  return adapter;
}

export function listAvailablePools(): PoolOption[] {
  return Object.entries(POOL_ADAPTERS).map(([key, factory]) => {
    const adapter = factory();
    return { key, name: adapter.getPoolName(), coin: adapter.coin };
  });
}

/**
 * Stratum hostnames and the pool adapter whose accounts mine there.
 * Hosts are compared exactly or as subdomains, so "bch.2miners.com" does not
 * claim "solo-bch.2miners.com".
 */
export const POOL_DOMAINS: ReadonlyArray<readonly [string, string]> = Object.freeze([
  ["solo.ckpool.org", "ckpool_btc"],
  ["solo-bch.2miners.com", "2miners_solo_bch"],
  ["solo-btc.2miners.com", "2miners_solo_btc"],
  ["bch.2miners.com", "2miners_bch"],
  ["btc.2miners.com", "2miners_btc"],
] as const);

export function adapterKeyForPoolHost(host: string | null | undefined): string | null {
  if (!host) return null;
  const h = host.toLowerCase();
  for (const [domain, key] of POOL_DOMAINS) {
    if (h === domain || h.endsWith(`.${domain}`)) return key;
  }
  return null;
}

// ============ MINERS ============

export const MINER_ADAPTERS: Readonly<Record<MinerType, () => MinerAdapter>> = Object.freeze({
  bitaxe: () => new BitaxeAdapter(),
  avalon: () => new AvalonAdapter(),
  antminer: () => new AntminerAdapter(),
  cgminer: () => new GenericCgminerAdapter(),
});

export function isMinerType(key: string): key is MinerType {
  return MINER_TYPES.some((t) => t === key);
}

export function getMinerAdapter(key: string): MinerAdapter | null {
  return isMinerType(key) ? MINER_ADAPTERS[key]() : null;
}

export function requireMinerAdapter(key: string): MinerAdapter {
  const adapter = getMinerAdapter(key);
  if (!adapter) throw new UnknownAdapterError("miner", key);
  return adapter;
}

export function listMinerTypes(): Array<{ key: MinerType; name: string; defaultPort: number }> {
  return MINER_TYPES.map((key) => {
    const adapter = MINER_ADAPTERS[key]();
    return { key, name: adapter.displayName, defaultPort: adapter.defaultPort };
  });
}

// Generic cgminer goes last: vendor firmware also answers its probe
const DETECTION_ORDER: readonly MinerType[] = ["bitaxe", "avalon", "antminer", "cgminer"];

/** Try each family's detection in order; the first affirmative wins. */
export async function detectMinerType(ip: string, timeoutMs?: number): Promise<MinerType | null> {
  for (const type of DETECTION_ORDER) {
    try {
      if (await MINER_ADAPTERS[type]().detect(ip, timeoutMs)) return type;
    } catch (err) {
      log.debug(`${type} detection failed for ${ip}: ${errorMessage(err)}`);
    }
  }
  return null;
}

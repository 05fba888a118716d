/**
 * Network scanner
 *
 * Walks an IPv4 block in fixed batches, fingerprints anything answering on the
 * miner ports, and (optionally) registers what it finds, linking each miner to
 * the tracked account it is mining for.
 */

import { networkInterfaces } from "os";
import type { TrackedAccount } from "../drizzle/schema";
import { ENV } from "./_core/env";
import { createLogger, errorMessage } from "./_core/logger";
import { adapterKeyForPoolHost, detectMinerType, getMinerAdapter } from "./adapterRegistry";
import { getAccounts, getActiveMinerConfig, linkMinerToAccount, upsertMinerByIp } from "./db";
import { extractWalletWorker, type MinerInfo, type MinerType } from "./minerAdapters";
import { probeHost } from "./netProbe";
import { poolHostOf } from "./stratumUrl";

const log = createLogger("Scanner");

export const SCAN_BATCH_SIZE = 20;
export const SCAN_PROBE_TIMEOUT_MS = 1000;
export const FALLBACK_SCAN_CIDR = "192.168.1.0/24";
// Largest block we are willing to walk (/16 = 65534 hosts)
const MIN_PREFIX = 16;

export class InvalidCidrError extends Error {
  constructor(readonly cidr: string, reason: string) {
    super(`Invalid CIDR ${cidr}: ${reason}`);
    this.name = "InvalidCidrError";
  }
}

function ipToInt(ip: string, cidr: string): number {
  const octets = ip.split(".");
  if (octets.length !== 4) throw new InvalidCidrError(cidr, "expected four octets");
  let value = 0;
  for (const part of octets) {
    if (!/^\d{1,3}$/.test(part) || Number(part) > 255) throw new InvalidCidrError(cidr, `bad octet "${part}"`);
    value = value * 256 + Number(part);
  }
  return value;
}

function intToIp(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join(".");
}

/**
 * Usable host addresses of an IPv4 block: network and broadcast excluded,
 * except for /31 (both addresses) and /32 (the single address).
 */
export function enumerateHosts(cidr: string): string[] {
  const [ip, prefixText, ...rest] = cidr.trim().split("/");
  if (rest.length > 0 || prefixText === undefined || !/^\d{1,2}$/.test(prefixText)) {
    throw new InvalidCidrError(cidr, "expected a.b.c.d/prefix");
  }
  const prefix = Number(prefixText);
  if (prefix > 32) throw new InvalidCidrError(cidr, "prefix must be 0-32");
  if (prefix < MIN_PREFIX) throw new InvalidCidrError(cidr, `blocks larger than /${MIN_PREFIX} are not scanned`);

  const size = 2 ** (32 - prefix);
  const network = Math.floor(ipToInt(ip, cidr) / size) * size;
  if (prefix === 32) return [intToIp(network)];
  if (prefix === 31) return [intToIp(network), intToIp(network + 1)];

  const hosts: string[] = [];
  for (let n = network + 1; n < network + size - 1; n++) hosts.push(intToIp(n));
  return hosts;
}

/** Configured subnet, else the /24 of the first external IPv4 interface, else 192.168.1.0/24. */
export function defaultScanCidr(): string {
  if (ENV.scanSubnet) return ENV.scanSubnet;
  for (const addresses of Object.values(networkInterfaces())) {
    for (const addr of addresses ?? []) {
      if (addr.family === "IPv4" && !addr.internal) {
        const [a, b, c] = addr.address.split(".");
        return `${a}.${b}.${c}.0/24`;
      }
    }
  }
  return FALLBACK_SCAN_CIDR;
}

export type DiscoveredMiner = {
  ipAddress: string;
  minerType: MinerType;
  apiPort: number;
  model: string | null;
  info: MinerInfo;
};

export type ScanProgress = {
  scanned: number;
  total: number;
  found: number;
};

export type ScanOptions = {
  timeoutMs?: number;
  batchSize?: number;
  onProgress?: (progress: ScanProgress) => void;
};

/** Probe, fingerprint and read one host. Never throws. */
export async function scanHost(ip: string, timeoutMs = SCAN_PROBE_TIMEOUT_MS): Promise<DiscoveredMiner | null> {
  try {
    if (!(await probeHost(ip, timeoutMs))) return null;

    const minerType = await detectMinerType(ip);
    if (!minerType) return null;
    const adapter = getMinerAdapter(minerType);
    if (!adapter) return null;

    const info = await adapter.getInfo(ip);
    if (!info) return null;

    const model = (adapter.identify ? await adapter.identify(ip) : null) ?? info.firmwareVersion;
    log.info(`Found ${minerType} at ${ip}${model ? ` (${model})` : ""}`);
    return { ipAddress: ip, minerType, apiPort: adapter.defaultPort, model, info };
  } catch (err) {
    log.debug(`${ip}: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Scan every usable host of a block. Batches run one after another; hosts
 * within a batch run concurrently.
 */
export async function scanNetwork(cidr: string = defaultScanCidr(), options: ScanOptions = {}): Promise<DiscoveredMiner[]> {
  const hosts = enumerateHosts(cidr);
  const batchSize = Math.max(1, options.batchSize ?? SCAN_BATCH_SIZE);
  const timeoutMs = options.timeoutMs ?? SCAN_PROBE_TIMEOUT_MS;
  const found: DiscoveredMiner[] = [];

  log.info(`Scanning ${cidr} (${hosts.length} hosts)`);
  for (let i = 0; i < hosts.length; i += batchSize) {
    const batch = hosts.slice(i, i + batchSize);
    const results = await Promise.all(batch.map((ip) => scanHost(ip, timeoutMs)));
    for (const miner of results) {
      if (miner) found.push(miner);
    }

    const progress = { scanned: Math.min(i + batchSize, hosts.length), total: hosts.length, found: found.length };
    log.info(`Progress ${progress.scanned}/${progress.total}, ${progress.found} miner(s)`);
    options.onProgress?.(progress);
  }
  return found;
}

/**
 * Find the tracked account a miner is mining for: its pool user must contain
 * the account address (case-insensitive) and its pool host must belong to the
 * account's pool. First match in `accounts` order wins.
 */
export function autoMatchWallet(
  miner: Pick<MinerInfo, "poolUrl" | "poolUser">,
  accounts: readonly TrackedAccount[]
): TrackedAccount | null {
  const { address } = extractWalletWorker(miner.poolUser);
  if (!address) return null;
  const adapterKey = adapterKeyForPoolHost(poolHostOf(miner.poolUrl));
  if (!adapterKey) return null;

  const needle = address.toLowerCase();
  return accounts.find((a) => a.adapterKey === adapterKey && a.address.toLowerCase().includes(needle)) ?? null;
}

export type RegisteredMiner = {
  discovered: DiscoveredMiner;
  minerId: number | null;
  created: boolean;
  account: TrackedAccount | null;
};

export type DiscoverOptions = ScanOptions & {
  cidr?: string;
  save?: boolean;
};

/**
 * Scan and, when saving, upsert each miner by IP and record its account link.
 * A link is only written when it differs from the active one; a miner that
 * matches no account keeps an existing link.
 */
export async function discoverAndRegisterMiners(options: DiscoverOptions = {}): Promise<RegisteredMiner[]> {
  const discovered = await scanNetwork(options.cidr ?? defaultScanCidr(), options);
  if (options.save === false) {
    return discovered.map((d) => ({ discovered: d, minerId: null, created: false, account: null }));
  }

  const accounts = await getAccounts({ enabledOnly: true });
  const registered: RegisteredMiner[] = [];
  for (const d of discovered) {
    const { miner, created } = await upsertMinerByIp({
      name: `${d.minerType}_${d.ipAddress}`,
      minerType: d.minerType,
      ipAddress: d.ipAddress,
      apiPort: d.minerType === "bitaxe" ? 80 : 4028,
      model: d.model,
      status: d.info.status,
      autoDiscovered: true,
    });

    const account = autoMatchWallet(d.info, accounts);
    const { worker } = extractWalletWorker(d.info.poolUser);
    const active = await getActiveMinerConfig(miner.id);
    const unchanged =
      active !== undefined &&
      active.accountId === (account?.id ?? null) &&
      active.poolUrl === d.info.poolUrl &&
      active.workerName === worker;
    if (!unchanged && (account !== null || active === undefined)) {
      await linkMinerToAccount({
        minerId: miner.id,
        accountId: account?.id ?? null,
        poolUrl: d.info.poolUrl,
        workerName: worker,
      });
    }

    if (account) log.info(`${miner.name} matched to account ${account.name}`);
    registered.push({ discovered: d, minerId: miner.id, created, account });
  }
  return registered;
}

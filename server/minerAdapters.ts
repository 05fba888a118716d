/**
 * Miner (device) adapters
 *
 * Two transports:
 *  - AxeOS HTTP API (`/api/system/info`) for Bitaxe, NerdQAxe and NerdMiner boards
 *  - CGMiner-compatible raw command API on port 4028 for Avalon, Antminer and
 *    generic cgminer/bfgminer rigs
 *
 * Everything is normalized to MinerInfo with hashrate in H/s.
 */

import { createLogger } from "./_core/logger";
import { CGMINER_DEFAULT_PORT, cgminerCommand } from "./cgminerApi";
import { getJson, getText } from "./httpClient";
import { inferModelFromVersion, matchesVendor, matchesWebUi, type RawProtocolFamily } from "./minerIdentify";
import {
  asArray,
  asObject,
  firstObject,
  firstPresent,
  isJsonObject,
  pickBoolean,
  pickNumber,
  pickString,
  toNumber,
  type JsonObject,
} from "./normalize";

const log = createLogger("MinerAdapter");

export const DETECT_TIMEOUT_MS = 2000;
export const INFO_TIMEOUT_MS = 5000;
export const VERSION_READ_CAP = 1024;
export const SUMMARY_READ_CAP = 8192;

export const MINER_TYPES = ["bitaxe", "avalon", "antminer", "cgminer"] as const;
export type MinerType = (typeof MINER_TYPES)[number];
export type MinerStatus = "online" | "idle" | "offline";

export type MinerInfo = {
  minerType: MinerType;
  firmwareVersion: string | null;
  hashrate: number;
  temperature: number | null;
  fanSpeed: number | null;
  uptime: number | null;
  poolUrl: string | null;
  poolUser: string | null;
  status: MinerStatus;
  rawData: JsonObject;
};

export type ShareInfo = {
  difficulty: number;
  workerName: string | null;
  accepted: boolean;
  timestamp: string | null;
};

export type WalletWorker = {
  address: string | null;
  worker: string | null;
};

/** Cumulative accepted-share counter and the difficulty those shares were submitted at. */
export type ShareCounter = {
  accepted: number;
  difficulty: number;
};

export interface MinerAdapter {
  readonly minerType: MinerType;
  readonly displayName: string;
  readonly defaultPort: number;
  detect(ip: string, timeoutMs?: number): Promise<boolean>;
  getInfo(ip: string, port?: number): Promise<MinerInfo | null>;
  getRecentShares(ip: string, port?: number, count?: number): Promise<ShareInfo[]>;
  extractWalletWorker(poolUser: string | null | undefined): WalletWorker;
  readShareCounter(info: MinerInfo): ShareCounter | null;
  /** Model label, when the family can report one beyond getInfo. */
  identify?(ip: string, port?: number): Promise<string | null>;
}

/**
 * Pool usernames are "<address>.<worker>" or a bare "<address>".
 * Any other shape, including an empty string, yields nothing.
 */
export function extractWalletWorker(poolUser: string | null | undefined): WalletWorker {
  if (!poolUser) return { address: null, worker: null };
  const parts = poolUser.split(".");
  if (parts.length === 2) return { address: parts[0], worker: parts[1] };
  if (parts.length === 1) return { address: parts[0], worker: null };
  return { address: null, worker: null };
}

// ============ AXEOS (HTTP) ============

const AXEOS_DETECT_KEYS = ["deviceModel", "asicCount", "stratumURL", "ASICModel"] as const;

export class BitaxeAdapter implements MinerAdapter {
  readonly minerType = "bitaxe" as const;
  readonly displayName = "Bitaxe / NerdQAxe (AxeOS)";
  readonly defaultPort: number = 80;

  async detect(ip: string, timeoutMs = DETECT_TIMEOUT_MS): Promise<boolean> {
    const result = await getJson(`http://${ip}/api/system/info`, timeoutMs);
    if (result.kind !== "ok" || !isJsonObject(result.data)) return false;
    const info = result.data;
    return AXEOS_DETECT_KEYS.some((key) => key in info);
  }

  async getInfo(ip: string, port = this.defaultPort): Promise<MinerInfo | null> {
    const result = await getJson(`http://${ip}:${port}/api/system/info`, INFO_TIMEOUT_MS);
    if (result.kind !== "ok" || !isJsonObject(result.data)) {
      log.debug(`AxeOS ${ip}: no system info`);
      return null;
    }
    const info = result.data;

    // AxeOS reports GH/s
    const hashrate = toNumber(info.hashRate) * 1e9;
    const connected = pickBoolean(firstObject(asObject(info.stratum).pools).connected);

    let status: MinerStatus = "offline";
    if (hashrate > 0) status = connected === false ? "idle" : "online";

    const stratumUrl = pickString(info.stratumURL);
    const stratumPort = pickNumber(info.stratumPort);
    const model = pickString(info.deviceModel);
    const asic = pickString(info.ASICModel);

    return {
      minerType: this.minerType,
      firmwareVersion: model ? (asic ? `${model} (${asic})` : model) : pickString(info.version),
      hashrate,
      temperature: pickNumber(info.temp),
      fanSpeed: pickNumber(info.fanspeed),
      uptime: pickNumber(info.uptimeSeconds),
      poolUrl: stratumUrl ? (stratumPort !== null ? `${stratumUrl}:${stratumPort}` : stratumUrl) : null,
      poolUser: pickString(info.stratumUser),
      status,
      rawData: info,
    };
  }

  async getRecentShares(ip: string, port = this.defaultPort, count = 10): Promise<ShareInfo[]> {
    const result = await getJson(`http://${ip}:${port}/api/shares`, INFO_TIMEOUT_MS);
    if (result.kind !== "ok") return [];
    return asArray(asObject(result.data).shares)
      .slice(0, count)
      .map((entry) => {
        const s = asObject(entry);
        return {
          difficulty: toNumber(s.diff),
          workerName: null,
          accepted: pickBoolean(s.accepted) ?? true,
          timestamp: pickString(s.time),
        };
      });
  }

  extractWalletWorker(poolUser: string | null | undefined): WalletWorker {
    return extractWalletWorker(poolUser);
  }

  readShareCounter(info: MinerInfo): ShareCounter | null {
    const pool = firstObject(asObject(info.rawData.stratum).pools);
    const accepted = pickNumber(pool.accepted) ?? pickNumber(info.rawData.sharesAccepted);
    if (accepted === null) return null;
    const difficulty = pickNumber(pool.poolDifficulty) ?? toNumber(info.rawData.poolDifficulty);
    return { accepted, difficulty };
  }
}

// ============ CGMINER (RAW COMMAND API) ============

// Hashrate fields in priority order, with their scale to H/s
const HASHRATE_FIELDS: ReadonlyArray<readonly [string, number]> = [
  ["GHS av", 1e9],
  ["MHS av", 1e6],
  ["KHS av", 1e3],
];

export function summaryHashrate(summary: JsonObject): number {
  for (const [field, scale] of HASHRATE_FIELDS) {
    const v = pickNumber(summary[field]);
    if (v !== null) return v * scale;
  }
  return 0;
}

export abstract class CgminerFamilyAdapter implements MinerAdapter {
  abstract readonly minerType: RawProtocolFamily;
  abstract readonly displayName: string;
  readonly defaultPort: number = CGMINER_DEFAULT_PORT;

  /** Ask the raw API for its version string and match vendor fingerprints. */
  protected async versionMatches(ip: string, timeoutMs: number): Promise<boolean> {
    const resp = await cgminerCommand(ip, "version", this.defaultPort, {
      maxBytes: VERSION_READ_CAP,
      timeoutMs,
    });
    return resp !== null && matchesVendor(this.minerType, resp.raw);
  }

  /** Fingerprint the vendor web UI served on port 80. */
  protected async webUiMatches(ip: string, timeoutMs: number): Promise<boolean> {
    const page = await getText(`http://${ip}/`, timeoutMs);
    return page.kind === "ok" && matchesWebUi(this.minerType, page.data);
  }

  async detect(ip: string, timeoutMs = DETECT_TIMEOUT_MS): Promise<boolean> {
    if (await this.webUiMatches(ip, timeoutMs)) return true;
    return this.versionMatches(ip, timeoutMs);
  }

  async getInfo(ip: string, port = this.defaultPort): Promise<MinerInfo | null> {
    const options = { maxBytes: SUMMARY_READ_CAP, timeoutMs: INFO_TIMEOUT_MS };
    const summaryResp = await cgminerCommand(ip, "summary", port, options);
    const summaryJson = summaryResp?.json;
    const summary = firstObject(summaryJson?.SUMMARY);
    if (!summaryJson || Object.keys(summary).length === 0) {
      log.debug(`${this.displayName} ${ip}: no summary`);
      return null;
    }

    const poolsResp = await cgminerCommand(ip, "pools", port, options);
    const poolsJson = poolsResp?.json ?? {};
    const pool = firstObject(poolsJson.POOLS);
    const hashrate = summaryHashrate(summary);

    return {
      minerType: this.minerType,
      firmwareVersion: this.firmwareOf(summaryJson),
      hashrate,
      temperature: pickNumber(summary.Temperature),
      fanSpeed: pickNumber(firstPresent(summary, ["Fan Speed", "Fan Speed In"])),
      uptime: pickNumber(summary.Elapsed),
      poolUrl: pickString(pool.URL),
      poolUser: pickString(pool.User),
      status: hashrate > 0 ? "online" : "idle",
      rawData: { summary: summaryJson, pools: poolsJson },
    };
  }

  /** Model label from the `version` reply, e.g. "AvalonMiner 1246" or "cgminer 4.11.1". */
  async identify(ip: string, port = this.defaultPort): Promise<string | null> {
    const resp = await cgminerCommand(ip, "version", port, { maxBytes: VERSION_READ_CAP, timeoutMs: INFO_TIMEOUT_MS });
    return inferModelFromVersion(resp?.json);
  }

  protected firmwareOf(summaryJson: JsonObject): string | null {
    const status = firstObject(summaryJson.STATUS);
    return pickString(status.Description);
  }

  async getRecentShares(_ip: string, _port?: number, _count?: number): Promise<ShareInfo[]> {
    return [];
  }

  extractWalletWorker(poolUser: string | null | undefined): WalletWorker {
    return extractWalletWorker(poolUser);
  }

  readShareCounter(info: MinerInfo): ShareCounter | null {
    const pool = firstObject(asObject(info.rawData.pools).POOLS);
    const accepted = pickNumber(pool.Accepted);
    if (accepted === null) return null;
    return { accepted, difficulty: toNumber(firstPresent(pool, ["Pool Difficulty", "Difficulty Accepted"])) };
  }
}

export class AvalonAdapter extends CgminerFamilyAdapter {
  readonly minerType = "avalon" as const;
  readonly displayName = "Avalon (Canaan)";

  /** One pseudo share summarizing the first pool's accepted counter. */
  async getRecentShares(ip: string, port = this.defaultPort): Promise<ShareInfo[]> {
    const resp = await cgminerCommand(ip, "pools", port, {
      maxBytes: SUMMARY_READ_CAP,
      timeoutMs: INFO_TIMEOUT_MS,
    });
    const pool = firstObject(resp?.json?.POOLS);
    if (toNumber(pool.Accepted) <= 0) return [];
    return [
      {
        difficulty: toNumber(firstPresent(pool, ["Pool Difficulty", "Difficulty Accepted"])),
        workerName: pickString(pool.User),
        accepted: true,
        timestamp: null,
      },
    ];
  }
}

export class AntminerAdapter extends CgminerFamilyAdapter {
  readonly minerType = "antminer" as const;
  readonly displayName = "Antminer (Bitmain)";
}

export class GenericCgminerAdapter extends CgminerFamilyAdapter {
  readonly minerType = "cgminer" as const;
  readonly displayName = "Generic CGMiner";

  // Generic rigs have no recognizable web UI
  async detect(ip: string, timeoutMs = DETECT_TIMEOUT_MS): Promise<boolean> {
    return this.versionMatches(ip, timeoutMs);
  }
}

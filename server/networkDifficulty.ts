import { createLogger } from "./_core/logger";
import { getText } from "./httpClient";
import { asObject, firstObject, isJsonObject, pickNumber } from "./normalize";

const log = createLogger("Difficulty");

export const DIFFICULTY_TIMEOUT_MS = 10000;

type DifficultySource = {
  name: string;
  url: string;
  parse: (body: string) => number | null;
};

function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}

function plainNumber(body: string): number | null {
  const n = pickNumber(body.trim());
  return n !== null && n > 0 ? n : null;
}

function twoMinersNodeDifficulty(body: string): number | null {
  const data = parseJsonBody(body);
  if (!isJsonObject(data)) return null;
  return pickNumber(firstObject(data.nodes).difficulty);
}

function mempoolCurrentDifficulty(body: string): number | null {
  return pickNumber(asObject(parseJsonBody(body)).currentDifficulty);
}

function twoMinersStats(name: string, host: string): DifficultySource {
  return { name, url: `https://${host}/api/stats`, parse: twoMinersNodeDifficulty };
}

/** Primary source first; the rest are fallbacks tried in order. */
export const DIFFICULTY_SOURCES: Readonly<Record<string, readonly DifficultySource[]>> = Object.freeze({
  BTC: [
    { name: "blockchain.info", url: "https://blockchain.info/q/getdifficulty", parse: plainNumber },
    { name: "mempool.space", url: "https://mempool.space/api/v1/mining/hashrate/3d", parse: mempoolCurrentDifficulty },
  ],
  BCH: [twoMinersStats("2miners", "bch.2miners.com"), twoMinersStats("2miners solo", "solo-bch.2miners.com")],
  ETH: [twoMinersStats("2miners", "eth.2miners.com")],
  RVN: [twoMinersStats("2miners", "rvn.2miners.com")],
});

export async function fetchNetworkDifficulty(coin: string): Promise<number | null> {
  const sources = DIFFICULTY_SOURCES[coin.toUpperCase()] ?? [];
  for (const source of sources) {
    const result = await getText(source.url, DIFFICULTY_TIMEOUT_MS);
    if (result.kind !== "ok") {
      log.debug(`${coin} via ${source.name} failed`);
      continue;
    }
    const difficulty = source.parse(result.data);
    if (difficulty !== null) return difficulty;
    log.debug(`${coin} via ${source.name}: unexpected body`);
  }
  log.warn(`No network difficulty available for ${coin}`);
  return null;
}

/** One lookup per distinct coin, all in parallel. */
export async function fetchNetworkDifficulties(coins: Iterable<string>): Promise<Record<string, number | null>> {
  const distinct = Array.from(new Set(Array.from(coins, (c) => c.toUpperCase())));
  const values = await Promise.all(distinct.map((coin) => fetchNetworkDifficulty(coin)));
  return Object.fromEntries(distinct.map((coin, i) => [coin, values[i]]));
}

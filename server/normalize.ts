/**
 * Value normalization shared by pool and device adapters.
 *
 * Upstream payloads are untrusted JSON: every field may be missing, null, a
 * string or a number. Adapters read them through these helpers instead of
 * indexing raw objects.
 */

export type JsonObject = Record<string, unknown>;

const SI_MULTIPLIERS: Record<string, number> = {
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
};

/**
 * Convert a hashrate value to hashes per second.
 *
 * Numbers pass through. Strings may carry one SI suffix ("11.5T", "602M").
 * Anything empty or unparseable yields 0.
 */
export function parseHashrate(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== "string") return 0;

  const trimmed = value.trim();
  if (!trimmed || trimmed === "0") return 0;

  const suffix = trimmed.slice(-1).toUpperCase();
  const multiplier = SI_MULTIPLIERS[suffix];
  const numeric = multiplier ? trimmed.slice(0, -1).trim() : trimmed;
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(numeric)) return 0;

  const parsed = Number(numeric);
  if (!Number.isFinite(parsed)) return 0;
  return multiplier ? parsed * multiplier : parsed;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asObject(value: unknown): JsonObject {
  return isJsonObject(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** First element of an array as an object, or an empty object. */
export function firstObject(value: unknown): JsonObject {
  return asObject(asArray(value)[0]);
}

// Accepts numbers and numeric strings; everything else is null.
export function pickNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function toNumber(value: unknown, fallback = 0): number {
  return pickNumber(value) ?? fallback;
}

export function pickString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

export function pickBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (value === 1 || value === "true") return true;
  if (value === 0 || value === "false") return false;
  return null;
}

/** Value of the first key present (non-null) on the object. */
export function firstPresent(obj: JsonObject, keys: readonly string[]): unknown {
  for (const key of keys) {
    const v = obj[key];
    if (v !== undefined && v !== null) return v;
  }
  return undefined;
}

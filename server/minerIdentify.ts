/**
 * Miner identification helpers.
 *
 * Vendor fingerprints matched against the `version` reply of the raw command
 * API and against the device's web UI. Matching is case-insensitive substring.
 */

import { asArray, asObject, pickString, type JsonObject } from "./normalize";

export type RawProtocolFamily = "avalon" | "antminer" | "cgminer";

export const VENDOR_FINGERPRINTS: Readonly<Record<RawProtocolFamily, readonly string[]>> = Object.freeze({
  avalon: ["avalon", "canaan"],
  antminer: ["antminer", "bitmain", "bmminer", "bosminer"],
  cgminer: ["cgminer", "bfgminer"],
});

// Web UI page titles/branding
export const WEB_FINGERPRINTS: Readonly<Partial<Record<RawProtocolFamily, readonly string[]>>> = Object.freeze({
  avalon: ["avalon"],
  antminer: ["antminer", "bitmain"],
});

export function matchesAny(text: string, needles: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return needles.some((n) => lower.includes(n));
}

export function matchesVendor(family: RawProtocolFamily, versionText: string): boolean {
  return matchesAny(versionText, VENDOR_FINGERPRINTS[family]);
}

export function matchesWebUi(family: RawProtocolFamily, page: string): boolean {
  const needles = WEB_FINGERPRINTS[family];
  return needles ? matchesAny(page, needles) : false;
}

/**
 * Best-effort model label from a VERSION reply, e.g. "Avalon Nano 3S",
 * "AvalonMiner 1246" or "cgminer 4.11.1".
 */
export function inferModelFromVersion(versionJson: JsonObject | null | undefined): string | null {
  if (!versionJson) return null;
  const ver = asObject(asArray(versionJson.VERSION)[0]);

  const prod = pickString(ver.PROD);
  if (prod) {
    const lower = prod.toLowerCase();
    if (lower === "avalonnano" || lower === "avalon nano") return "Avalon Nano";
    if (prod === "Q" || prod.includes("Avalon Q")) return "Avalon Q";
    if (prod.includes("Nano") && !prod.includes("Avalon")) return `Avalon ${prod}`;
    return prod;
  }

  const model = pickString(ver.MODEL) ?? pickString(ver.Type);
  if (model) {
    if (model === "Q") return "Avalon Q";
    if (/^[0-9]{3,4}$/.test(model)) return `AvalonMiner ${model}`;
    return model;
  }

  for (const key of ["CGMiner", "BMMiner", "BFGMiner", "BOSminer"]) {
    const v = pickString(ver[key]);
    if (v) return `${key.toLowerCase()} ${v}`;
  }
  return null;
}

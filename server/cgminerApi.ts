import * as net from "net";
import { createLogger, errorMessage } from "./_core/logger";
import { isJsonObject, type JsonObject } from "./normalize";

const log = createLogger("CGMiner");

export const CGMINER_DEFAULT_PORT = 4028;
export const DEFAULT_READ_CAP = 8192;
export const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

export type CGMinerResponse = {
  raw: string;
  json?: JsonObject;
};

export type SendCommandOptions = {
  parameter?: string;
  maxBytes?: number;
  timeoutMs?: number;
};

/**
 * Send one command over a fresh TCP connection and collect the reply.
 *
 * The request is a single line of JSON. Reading stops when the peer closes the
 * connection or `maxBytes` have been received; the socket is always destroyed.
 * Resolves to null when nothing was received (refused, timed out, reset).
 */
export function sendCommand(
  host: string,
  port: number,
  command: string,
  options: SendCommandOptions = {}
): Promise<Buffer | null> {
  const maxBytes = options.maxBytes ?? DEFAULT_READ_CAP;
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const payload: { command: string; parameter?: string } =
    options.parameter !== undefined ? { command, parameter: options.parameter } : { command };

  return new Promise((resolve) => {
    const socket = new net.Socket();
    const chunks: Buffer[] = [];
    let received = 0;
    let done = false;

    const finish = (reason?: string) => {
      if (done) return;
      done = true;
      socket.destroy();
      if (received === 0) {
        if (reason) log.debug(`${host}:${port} ${command} -> ${reason}`);
        resolve(null);
        return;
      }
      resolve(Buffer.concat(chunks, received).subarray(0, maxBytes));
    };

    socket.setTimeout(timeoutMs);
    socket.on("connect", () => {
      socket.write(JSON.stringify(payload) + "\n");
    });
    socket.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
      received += chunk.length;
      if (received >= maxBytes) finish();
    });
    socket.on("end", () => finish("closed without reply"));
    socket.on("close", () => finish("closed without reply"));
    socket.on("timeout", () => finish("timeout"));
    socket.on("error", (e) => finish(e.message || "socket error"));
    socket.connect(port, host);
  });
}

// Everything below 0x20 except \t \n \r, plus DEL
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;
const TRAILING_COMMA = /,(\s*[}\]])/g;

function decodeDeviceText(bytes: Buffer | string): string {
  const text = typeof bytes === "string" ? bytes : new TextDecoder("utf-8", { fatal: false }).decode(bytes);
  return text.replace(/\uFFFD/g, "").replace(CONTROL_CHARS, "");
}

function balancedObjectSpan(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function parseObject(candidate: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Pull the first balanced JSON object out of raw device output.
 *
 * Firmware pads replies with NULs, prefixes them with junk and sometimes leaves
 * trailing commas. Braces are counted without regard to string literals, so a
 * brace inside a string value can end the span early; the repair pass does not
 * cover that case and the result is null.
 */
export function extractJson(bytes: Buffer | string): JsonObject | null {
  const span = balancedObjectSpan(decodeDeviceText(bytes));
  if (span === null) return null;

  const parsed = parseObject(span);
  if (parsed) return parsed;

  const repaired = parseObject(span.replace(TRAILING_COMMA, "$1"));
  if (!repaired) log.warn(`Unparseable device JSON (${span.length} chars)`);
  return repaired;
}

/**
 * CGMiner-compatible API client: one command, one connection.
 */
export async function cgminerCommand(
  ip: string,
  command: string,
  port = CGMINER_DEFAULT_PORT,
  options: SendCommandOptions = {}
): Promise<CGMinerResponse | null> {
  try {
    const bytes = await sendCommand(ip, port, command, options);
    if (!bytes) return null;

    const raw = decodeDeviceText(bytes).trim();
    const json = extractJson(bytes);
    return json ? { raw, json } : { raw };
  } catch (err) {
    log.debug(`${ip}:${port} ${command} failed: ${errorMessage(err)}`);
    return null;
  }
}

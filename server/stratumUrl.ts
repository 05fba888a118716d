export type StratumTransport = "tcp" | "tls";

export type ParsedStratumEndpoint = {
  host: string;
  port: number | null;
  transport: StratumTransport;
};

/**
 * Split a pool URL as miners report it ("stratum+tcp://host:port", "host:port",
 * "stratum+ssl://host:port/path") into host and port.
 */
export function parseStratumEndpoint(urlOrHost: string, portOverride?: number | null): ParsedStratumEndpoint {
  const raw = (urlOrHost || "").trim();
  const transport: StratumTransport = /^(stratum\+ssl|stratum\+tls|ssl|tls):\/\//i.test(raw) ? "tls" : "tcp";

  // Any scheme, then drop the path
  const hostPort = raw.replace(/^[a-z][a-z0-9+.-]*:\/\//i, "").split("/")[0];
  let host = hostPort;
  let portFromUrl: number | null = null;
  const idx = hostPort.lastIndexOf(":");
  if (idx > 0) {
    const pn = Number(hostPort.slice(idx + 1));
    if (Number.isInteger(pn) && pn > 0) {
      host = hostPort.slice(0, idx);
      portFromUrl = pn;
    }
  }

  return { host: host.toLowerCase(), port: portOverride ?? portFromUrl, transport };
}

export function poolHostOf(poolUrl: string | null | undefined): string | null {
  if (!poolUrl) return null;
  const { host } = parseStratumEndpoint(poolUrl);
  return host || null;
}

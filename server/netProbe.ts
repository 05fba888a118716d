import * as net from "net";

export const PROBE_PORTS = [80, 4028] as const;

/**
 * TCP connect check. Resolves to null when the port accepted the connection,
 * otherwise to the failure reason.
 */
export function tcpCheck(host: string, port: number, timeoutMs = 1000): Promise<string | null> {
  return new Promise((resolve) => {
    const socket = new net.Socket();
    let done = false;

    const finish = (err: string | null) => {
      if (done) return;
      done = true;
      socket.destroy();
      resolve(err);
    };

    socket.setTimeout(timeoutMs);
    socket.on("connect", () => finish(null));
    socket.on("timeout", () => finish("Timeout"));
    socket.on("error", (e) => finish(e.message || "TCP error"));
    socket.connect(port, host);
  });
}

/** True when any of the miner ports answers. Ports are tried in order. */
export async function probeHost(ip: string, timeoutMs = 1000): Promise<boolean> {
  for (const port of PROBE_PORTS) {
    if ((await tcpCheck(ip, port, timeoutMs)) === null) return true;
  }
  return false;
}

import * as net from 'net';

export type ProbeResult = { reachable: true } | { reachable: false; reason: string };

/** Single TCP connect attempt, used for post-deployment reachability checks. */
export type PortProbe = (host: string, port: number, timeoutMs: number) => Promise<ProbeResult>;

export const tcpProbe: PortProbe = (host, port, timeoutMs) => {
  return new Promise((resolve) => {
    const socket = new net.Socket();

    const finish = (result: ProbeResult) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(result);
    };

    socket.setTimeout(timeoutMs);

    socket.once('connect', () => finish({ reachable: true }));
    socket.once('timeout', () => finish({ reachable: false, reason: `timed out after ${timeoutMs}ms` }));
    socket.once('error', (err) => finish({ reachable: false, reason: err.message }));

    socket.connect(port, host);
  });
};

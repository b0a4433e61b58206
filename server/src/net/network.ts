import net from 'net';
import os from 'os';

type Interfaces = ReturnType<typeof os.networkInterfaces>;

/** First external IPv4 address, or loopback when the host has none. */
export function getLocalIp(interfaces: Interfaces = os.networkInterfaces()): string {
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4' && !entry.internal) {
        return entry.address;
      }
    }
  }
  return '127.0.0.1';
}

export function canConnect(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    const done = (ok: boolean) => {
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => done(true));
    socket.on('timeout', () => done(false));
    socket.on('error', () => done(false));
  });
}

/** Reachability of a public DNS resolver, used before opening a tunnel. */
export function hasInternet(timeoutMs = 1000): Promise<boolean> {
  return canConnect('8.8.8.8', 53, timeoutMs);
}

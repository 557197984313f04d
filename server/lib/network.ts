import { createServer } from 'net';

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::', '']);

/** Wildcard bind addresses are not connectable; talk to loopback instead. */
export function connectableHost(host: string): string {
  return WILDCARD_HOSTS.has(host) ? '127.0.0.1' : host;
}

/** True when a TCP listener can bind `host:port` right now. */
export function isPortAvailable(host: string, port: number): Promise<boolean> {
  return new Promise(resolve => {
    const probe = createServer();
    probe.once('error', () => resolve(false));
    probe.once('listening', () => {
      probe.close(() => resolve(true));
    });
    probe.listen({ host, port, exclusive: true });
  });
}

import { createServer } from 'net';
import { once } from 'events';
import { describe, expect, it } from 'vitest';
import { connectableHost, isPortAvailable } from './network';

describe('connectableHost', () => {
  it('maps wildcard binds to loopback', () => {
    expect(connectableHost('0.0.0.0')).toBe('127.0.0.1');
    expect(connectableHost('::')).toBe('127.0.0.1');
    expect(connectableHost('')).toBe('127.0.0.1');
  });

  it('keeps concrete hosts', () => {
    expect(connectableHost('192.168.1.20')).toBe('192.168.1.20');
    expect(connectableHost('localhost')).toBe('localhost');
  });
});

describe('isPortAvailable', () => {
  it('reports a port held by a listener as busy and frees it afterwards', async () => {
    const server = createServer();
    server.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');

    expect(await isPortAvailable('127.0.0.1', address.port)).toBe(false);

    await new Promise<void>(resolve => server.close(() => resolve()));
    expect(await isPortAvailable('127.0.0.1', address.port)).toBe(true);
  });
});

import { describe, it, expect, afterEach } from 'vitest';
import * as dgram from 'node:dgram';
import * as net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  BroadcastConnector,
  resolveDiscoveryConfig,
  DISCOVERY_DEFAULTS,
  InvalidDiscoveryConfigError,
  DiscoveryAlreadyRunningError,
  type ConnectionDirection,
  type DiscoveryConfig,
  type DiscoveryStopReason,
} from '../../src/index.js';

/**
 * Configuration that confines a session to 127.0.0.1 so that it discovers
 * its own announcements.
 */
function loopbackConfig(udpPort: number, tcpPort: number, overrides: DiscoveryConfig = {}): DiscoveryConfig {
  return {
    udpPort,
    tcpPort,
    broadcastAddress: '127.0.0.1',
    bindAddress: '127.0.0.1',
    localAddress: '127.0.0.1',
    broadcastIntervalMs: 100,
    pollIntervalMs: 20,
    connectTimeoutMs: 500,
    ...overrides,
  };
}

describe('resolveDiscoveryConfig', () => {
  it('applies defaults', () => {
    const config = resolveDiscoveryConfig();

    expect(config.udpPort).toBe(DISCOVERY_DEFAULTS.UDP_PORT);
    expect(config.tcpPort).toBe(DISCOVERY_DEFAULTS.TCP_PORT);
    expect(config.broadcastIntervalMs).toBe(1000);
    expect(config.allowLoopback).toBe(false);
    expect(config.connectTimeoutMs).toBe(2000);
    expect(config.timeoutMs).toBe(0);
    expect(config.broadcastAddress).toBe('255.255.255.255');
    expect(config.bindAddress).toBe('0.0.0.0');
    expect(config.localAddress).toBeUndefined();
    expect(config.marker).toBe('BROADCAST');
  });

  it('keeps explicit values', () => {
    const config = resolveDiscoveryConfig({ udpPort: 9000, tcpPort: 9001, allowLoopback: true, timeoutMs: 5000 });

    expect(config.udpPort).toBe(9000);
    expect(config.tcpPort).toBe(9001);
    expect(config.allowLoopback).toBe(true);
    expect(config.timeoutMs).toBe(5000);
  });

  it.each<[string, DiscoveryConfig]>([
    ['a zero port', { udpPort: 0 }],
    ['a port above 65535', { tcpPort: 70000 }],
    ['a fractional port', { tcpPort: 80.5 }],
    ['a zero interval', { broadcastIntervalMs: 0 }],
    ['a negative timeout', { timeoutMs: -1 }],
    ['a zero connect timeout', { connectTimeoutMs: 0 }],
    ['a host name as broadcast address', { broadcastAddress: 'localhost' }],
    ['an IPv6 bind address', { bindAddress: '::' }],
    ['an invalid local address', { localAddress: '10.0.0' }],
    ['an empty marker', { marker: '' }],
  ])('rejects %s', (_description, config) => {
    expect(() => resolveDiscoveryConfig(config)).toThrow(InvalidDiscoveryConfigError);
    expect(() => new BroadcastConnector(config)).toThrow(InvalidDiscoveryConfigError);
  });
});

describe('BroadcastConnector', () => {
  const sockets: net.Socket[] = [];
  const blockers: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const socket of sockets.splice(0)) {
      socket.destroy();
    }
    for (const release of blockers.splice(0)) {
      await release();
    }
  });

  function track(connector: BroadcastConnector): Array<[string, ConnectionDirection]> {
    const connections: Array<[string, ConnectionDirection]> = [];
    connector.on('connected', (address, socket, direction) => {
      sockets.push(socket);
      connections.push([address, direction]);
    });
    return connections;
  }

  it('starts idle', () => {
    const connector = new BroadcastConnector(loopbackConfig(47401, 47402));

    expect(connector.getState()).toBe('idle');
    expect(connector.isEnabled()).toBe(false);
    expect(connector.getStopReason()).toBeNull();
    expect(connector.peers()).toEqual([]);
  });

  it('discovers itself when loopback is allowed and stops at the timeout', async () => {
    const handled: Array<[string, ConnectionDirection]> = [];
    const connector = new BroadcastConnector(
      loopbackConfig(47403, 47404, {
        allowLoopback: true,
        timeoutMs: 1000,
        onConnect: (_socket, address, direction) => handled.push([address, direction]),
      }),
    );
    const connections = track(connector);
    const stopped: DiscoveryStopReason[] = [];
    connector.on('stopped', (reason) => stopped.push(reason));

    const startedAt = Date.now();
    await connector.run();

    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(1000);
    expect(connector.peers()).toEqual(['127.0.0.1']);
    expect(connector.getSocket('127.0.0.1')).toBeInstanceOf(net.Socket);
    expect(connections.map(([, direction]) => direction).sort()).toEqual(['inbound', 'outbound']);
    expect(handled).toEqual(connections);
    expect(connector.getStopReason()).toBe('timeout');
    expect(connector.getState()).toBe('stopped');
    expect(connector.isEnabled()).toBe(false);
    expect(stopped).toEqual(['timeout']);
  });

  it('ignores its own announcements when loopback is not allowed', async () => {
    const connector = new BroadcastConnector(loopbackConfig(47405, 47406, { timeoutMs: 600 }));
    const announcements: string[] = [];
    const dialed: string[] = [];
    connector.on('announcement', (address) => announcements.push(address));
    connector.on('dialing', (address) => dialed.push(address));

    await connector.run();

    expect(announcements.length).toBeGreaterThan(0);
    expect(announcements.every((address) => address === '127.0.0.1')).toBe(true);
    expect(dialed).toEqual([]);
    expect(connector.peers()).toEqual([]);
  });

  it('can be stopped from onConnect', async () => {
    const connector: BroadcastConnector = new BroadcastConnector(
      loopbackConfig(47407, 47408, {
        allowLoopback: true,
        timeoutMs: 10000,
        onConnect: () => connector.stop(),
      }),
    );
    track(connector);

    const startedAt = Date.now();
    await connector.run();

    expect(Date.now() - startedAt).toBeLessThan(5000);
    expect(connector.getStopReason()).toBe('stopped');
    expect(connector.peers()).toEqual(['127.0.0.1']);
  });

  it('keeps running when onConnect throws', async () => {
    const connector = new BroadcastConnector(
      loopbackConfig(47409, 47410, {
        allowLoopback: true,
        timeoutMs: 800,
        onConnect: () => {
          throw new Error('handler failure');
        },
      }),
    );
    track(connector);

    await connector.run();

    expect(connector.getStopReason()).toBe('timeout');
    expect(connector.peers()).toEqual(['127.0.0.1']);
  });

  it('reports the local address when started', async () => {
    const connector = new BroadcastConnector(loopbackConfig(47411, 47412));
    const started: string[] = [];
    connector.on('started', (address) => started.push(address));

    await connector.start();
    expect(connector.getState()).toBe('running');
    expect(connector.isEnabled()).toBe(true);

    connector.stop();
    await connector.join();

    expect(started).toEqual(['127.0.0.1']);
    expect(connector.getLocalAddress()).toBe('127.0.0.1');
    expect(connector.getStopReason()).toBe('stopped');
  });

  it('rejects a second start while running', async () => {
    const connector = new BroadcastConnector(loopbackConfig(47413, 47414));

    await connector.start();
    await expect(connector.start()).rejects.toThrow(DiscoveryAlreadyRunningError);

    connector.stop();
    await connector.join();
    expect(connector.getState()).toBe('stopped');
  });

  it('fails the session when the TCP port is taken', async () => {
    const blocker = net.createServer();
    await new Promise<void>((resolve) => {
      blocker.listen(47416, '127.0.0.1', () => resolve());
    });
    blockers.push(
      () =>
        new Promise<void>((resolve) => {
          blocker.close(() => resolve());
        }),
    );

    const connector = new BroadcastConnector(loopbackConfig(47415, 47416, { timeoutMs: 5000 }));
    const stopped: DiscoveryStopReason[] = [];
    connector.on('stopped', (reason) => stopped.push(reason));

    const startedAt = Date.now();
    await connector.run();

    expect(Date.now() - startedAt).toBeLessThan(4000);
    expect(connector.getStopReason()).toBe('failed');
    expect(stopped).toEqual(['failed']);
  });

  it('fails the session when the UDP port is taken', async () => {
    const blocker = dgram.createSocket('udp4');
    await new Promise<void>((resolve) => {
      blocker.bind(47417, '127.0.0.1', () => resolve());
    });
    blockers.push(
      () =>
        new Promise<void>((resolve) => {
          blocker.close(() => resolve());
        }),
    );

    const connector = new BroadcastConnector(loopbackConfig(47417, 47418, { timeoutMs: 5000 }));

    await connector.run();

    expect(connector.getStopReason()).toBe('failed');
  });

  it('reports failed dials and keeps running', async () => {
    // A peer at 127.0.0.2 announces itself but accepts no connections.
    const announcer = dgram.createSocket('udp4');
    await new Promise<void>((resolve) => {
      announcer.bind(0, '127.0.0.2', () => resolve());
    });
    blockers.push(
      () =>
        new Promise<void>((resolve) => {
          announcer.close(() => resolve());
        }),
    );

    const connector = new BroadcastConnector(loopbackConfig(47419, 47420, { timeoutMs: 1000 }));
    const failures: string[] = [];
    connector.on('dialFailed', (address, error) => failures.push(`${address} ${error.name}`));

    await connector.start();
    await sleep(200);
    announcer.send('BROADCAST', 47419, '127.0.0.1');
    await connector.join();

    expect(failures).toEqual(['127.0.0.2 ConnectFailureError']);
    expect(connector.getStopReason()).toBe('timeout');
    expect(connector.peers()).toEqual([]);
  });
});

import { describe, it, expect, afterEach } from 'vitest';
import type * as net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import { LoopbackClient, LoopbackServer } from '../../src/index.js';

describe('Loopback', () => {
  const sockets: net.Socket[] = [];

  afterEach(() => {
    for (const socket of sockets.splice(0)) {
      socket.destroy();
    }
  });

  function keep(socket: net.Socket | null): net.Socket | null {
    if (socket) sockets.push(socket);
    return socket;
  }

  it('connects a server and a client on 127.0.0.1', async () => {
    const connected: string[] = [];
    const server = new LoopbackServer({
      tcpPort: 47431,
      timeoutMs: 5000,
      onConnect: () => connected.push('server'),
    });
    const client = new LoopbackClient({
      tcpPort: 47431,
      timeoutMs: 5000,
      onConnect: () => connected.push('client'),
    });

    const [serverSocket, clientSocket] = await Promise.all([server.connect(), client.connect()]);
    keep(serverSocket);
    keep(clientSocket);

    expect(serverSocket).not.toBeNull();
    expect(clientSocket).not.toBeNull();
    expect(clientSocket?.remotePort).toBe(47431);
    expect(server.socket).toBe(serverSocket);
    expect(client.socket).toBe(clientSocket);
    expect(connected.sort()).toEqual(['client', 'server']);
    expect(server.isEnabled()).toBe(false);
    expect(client.isEnabled()).toBe(false);
  });

  it('keeps retrying until the server appears', async () => {
    const client = new LoopbackClient({ tcpPort: 47432, timeoutMs: 5000, retryIntervalMs: 20 });
    const pending = client.connect();

    await sleep(150);
    const server = new LoopbackServer({ tcpPort: 47432, timeoutMs: 5000 });
    const [clientSocket, serverSocket] = await Promise.all([pending, server.connect()]);
    keep(clientSocket);
    keep(serverSocket);

    expect(clientSocket).not.toBeNull();
    expect(serverSocket).not.toBeNull();
  });

  it('server gives up after its timeout', async () => {
    const server = new LoopbackServer({ tcpPort: 47433, timeoutMs: 100 });

    expect(await server.connect()).toBeNull();
    expect(server.socket).toBeNull();
  });

  it('client gives up after its timeout', async () => {
    const client = new LoopbackClient({ tcpPort: 47434, timeoutMs: 200, retryIntervalMs: 20 });

    expect(await client.connect()).toBeNull();
  });

  it('stop() ends a pending connect', async () => {
    const server = new LoopbackServer({ tcpPort: 47435 });
    const client = new LoopbackClient({ tcpPort: 47436, retryIntervalMs: 20 });

    const pendingServer = server.connect();
    const pendingClient = client.connect();
    await sleep(50);
    server.stop();
    client.stop();

    expect(await pendingServer).toBeNull();
    expect(await pendingClient).toBeNull();
  });

  it('server resolves null when the port is taken', async () => {
    const first = new LoopbackServer({ tcpPort: 47437, timeoutMs: 1000 });
    const second = new LoopbackServer({ tcpPort: 47437, timeoutMs: 1000 });

    const pendingFirst = first.connect();
    await sleep(50);

    expect(await second.connect()).toBeNull();
    first.stop();
    expect(await pendingFirst).toBeNull();
  });
});

import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import { NetSocketChannel, ChannelError, isSocketChannel } from '../../src/index.js';

describe('NetSocketChannel', () => {
  let server: net.Server | null = null;
  const sockets: net.Socket[] = [];

  afterEach(async () => {
    for (const socket of sockets.splice(0)) {
      socket.destroy();
    }
    const closing = server;
    server = null;
    if (closing) {
      await new Promise<void>((resolve) => {
        closing.close(() => resolve());
      });
    }
  });

  async function connectPair(port: number): Promise<[net.Socket, net.Socket]> {
    const accepted = new Promise<net.Socket>((resolve) => {
      server = net.createServer((socket) => resolve(socket));
    });
    await new Promise<void>((resolve) => {
      server?.listen(port, '127.0.0.1', () => resolve());
    });

    const client = net.connect(port, '127.0.0.1');
    await new Promise<void>((resolve) => {
      client.once('connect', () => resolve());
    });
    const serverSide = await accepted;
    sockets.push(client, serverSide);
    return [client, serverSide];
  }

  async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!condition()) {
      if (Date.now() > deadline) {
        throw new Error('Timeout waiting for condition');
      }
      await sleep(5);
    }
  }

  it('reports the connection addresses', async () => {
    const [client] = await connectPair(47321);
    const channel = new NetSocketChannel(client);

    expect(channel.remoteAddress).toBe('127.0.0.1');
    expect(channel.localAddress).toBe('127.0.0.1');
    expect(channel.getSocket()).toBe(client);
  });

  it('throws EAGAIN when nothing has arrived', async () => {
    const [client] = await connectPair(47322);
    const channel = new NetSocketChannel(client);

    expect(channel.poll().readable).toBe(false);
    expect(() => channel.receive(1024)).toThrow(ChannelError);
    try {
      channel.receive(1024);
    } catch (error) {
      expect(error instanceof ChannelError && error.code).toBe('EAGAIN');
    }
  });

  it('returns received bytes in chunks of at most maxBytes', async () => {
    const [client, serverSide] = await connectPair(47323);
    const channel = new NetSocketChannel(client);

    serverSide.write(Buffer.from('hello world'));
    await waitFor(() => channel.poll().readable);

    expect(channel.receive(5).toString()).toBe('hello');
    expect(channel.receive(1024).toString()).toBe(' world');
  });

  it('accepts no more than the writable high water mark', async () => {
    const [client] = await connectPair(47324);
    const channel = new NetSocketChannel(client);
    const data = Buffer.alloc(client.writableHighWaterMark * 4, 1);

    expect(channel.poll().writable).toBe(true);
    const accepted = channel.send(data);

    expect(accepted).toBeGreaterThan(0);
    expect(accepted).toBeLessThanOrEqual(client.writableHighWaterMark);
  });

  it('returns an empty buffer once the peer ends the stream', async () => {
    const [client, serverSide] = await connectPair(47325);
    const channel = new NetSocketChannel(client);

    serverSide.end();
    await waitFor(() => channel.poll().readable);

    expect(channel.receive(1024).length).toBe(0);
  });

  it('throws EPIPE when sending after shutdown', async () => {
    const [client] = await connectPair(47326);
    const channel = new NetSocketChannel(client);

    channel.shutdown();

    expect(() => channel.send(Buffer.from('late'))).toThrow(ChannelError);
  });

  it('stops reading from the socket while received data is not consumed', async () => {
    const [client, serverSide] = await connectPair(47328);
    const channel = new NetSocketChannel(client);
    const chunk = Buffer.alloc(64 * 1024, 0x5a);
    const total = chunk.length * 200;

    for (let i = 0; i < 200; i++) {
      serverSide.write(chunk);
    }
    await sleep(500);

    expect(channel.pendingBytes()).toBeGreaterThan(0);
    expect(channel.pendingBytes()).toBeLessThanOrEqual(client.readableHighWaterMark + chunk.length);
    expect(client.isPaused()).toBe(true);

    let received = 0;
    const deadline = Date.now() + 5000;
    while (received < total && Date.now() < deadline) {
      if (channel.poll().readable) {
        const data = channel.receive(chunk.length);
        expect(data.every((byte) => byte === 0x5a)).toBe(true);
        received += data.length;
      } else {
        await sleep(1);
      }
    }

    expect(received).toBe(total);
    expect(channel.pendingBytes()).toBe(0);
  });

  it('is recognised as a channel while a socket is not', async () => {
    const [client] = await connectPair(47327);

    expect(isSocketChannel(new NetSocketChannel(client))).toBe(true);
    expect(isSocketChannel(client)).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { Messenger, ChannelError, Identify, type SocketChannel, type SocketReadiness } from '../../src/index.js';
import { byteProtocol, exchangeIdentity, textProtocol } from '../../src/bin/identity-exchange.js';

/**
 * In-memory channel fed from `inbound` that accepts every send.
 */
class FakeChannel implements SocketChannel {
  readonly localAddress = '10.0.0.1';
  readonly remoteAddress = '10.0.0.2';

  readonly inbound: Buffer[] = [];
  readonly delivered: Buffer[] = [];
  shutdowns = 0;

  poll(): SocketReadiness {
    return { readable: this.inbound.length > 0, writable: true, errored: false };
  }

  receive(): Buffer {
    const head = this.inbound.shift();
    if (head === undefined) {
      throw new ChannelError('EAGAIN', 'no data available');
    }
    return head;
  }

  send(data: Buffer): number {
    this.delivered.push(Buffer.from(data));
    return data.length;
  }

  shutdown(): void {
    this.shutdowns++;
  }
}

function captureLogs() {
  const lines: Array<{ msg: string; remote?: string; codec?: string; err?: { type: string } }> = [];
  const logger = pino(
    { level: 'warn' },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { logger, lines };
}

describe('exchangeIdentity', () => {
  it("returns the peer's identity and closes the messenger", async () => {
    const channel = new FakeChannel();
    const protocol = byteProtocol();
    const messenger = new Messenger(channel, protocol.codec);
    channel.inbound.push(protocol.codec.encode(new Identify('alice', 'laptop')));

    const identity = await exchangeIdentity(messenger, protocol, { pollIntervalMs: 1 });

    expect(identity).toBe('alice@laptop');
    expect(messenger.isClosed()).toBe(true);
    expect(channel.delivered.length).toBeGreaterThan(0);
    expect(channel.delivered[0]?.[1]).toBe(1);
  });

  it('resolves null and closes when the peer sends an unknown message type', async () => {
    const { logger, lines } = captureLogs();
    const channel = new FakeChannel();
    const protocol = byteProtocol();
    const messenger = new Messenger(channel, protocol.codec);
    channel.inbound.push(Buffer.from([2, 0x7f]));

    const identity = await exchangeIdentity(messenger, protocol, { pollIntervalMs: 1, logger });

    expect(identity).toBeNull();
    expect(messenger.isClosed()).toBe(true);
    expect(channel.shutdowns).toBe(1);
    expect(lines).toHaveLength(1);
    expect(lines[0]?.msg).toBe('peer uses a different message encoding');
    expect(lines[0]?.remote).toBe('10.0.0.2');
    expect(lines[0]?.codec).toBe('byte');
    expect(lines[0]?.err?.type).toBe('UnknownMessageTypeError');
  });

  it('resolves null when a text peer names an unregistered type', async () => {
    const channel = new FakeChannel();
    const protocol = textProtocol();
    const messenger = new Messenger(channel, protocol.codec);
    channel.inbound.push(Buffer.from('["MsgHello", {}]\n'));

    const identity = await exchangeIdentity(messenger, protocol, {
      pollIntervalMs: 1,
      logger: pino({ level: 'silent' }),
    });

    expect(identity).toBeNull();
    expect(messenger.isClosed()).toBe(true);
  });

  it('gives up after the timeout when no identity arrives', async () => {
    const channel = new FakeChannel();
    const protocol = byteProtocol();
    const messenger = new Messenger(channel, protocol.codec);

    const identity = await exchangeIdentity(messenger, protocol, { timeoutMs: 30, pollIntervalMs: 5 });

    expect(identity).toBeNull();
    expect(messenger.isClosed()).toBe(true);
  });
});

/**
 * Identity handshake used by the lanwire commands.
 *
 * @module bin/identity-exchange
 */

import { setTimeout as sleep } from 'node:timers/promises';

import { UnknownMessageTypeError } from '../types.js';
import { createLogger, type Logger } from '../logger.js';
import {
  createCodec,
  Identify,
  MsgIdentify,
  type ByteMessage,
  type FrameCodec,
  type TextMessage,
} from '../protocol/index.js';
import type { Messenger } from '../transport/index.js';

/**
 * How identities are encoded on one transport.
 */
export interface IdentityProtocol<M> {
  readonly codec: FrameCodec<M>;
  hello(): M;
  describe(message: M): string | null;
}

export const byteProtocol = (): IdentityProtocol<ByteMessage> => ({
  codec: createCodec('byte'),
  hello: () => new Identify(),
  describe: (message) =>
    message instanceof Identify ? `${message.username}@${message.hostname}` : null,
});

export const textProtocol = (): IdentityProtocol<TextMessage> => ({
  codec: createCodec('json'),
  hello: () => new MsgIdentify(),
  describe: (message) =>
    message instanceof MsgIdentify ? `${message.username}@${message.hostname}` : null,
});

/**
 * Options for exchangeIdentity().
 */
export interface ExchangeOptions {
  /** Give up waiting for the peer's identity after this long (ms) */
  readonly timeoutMs?: number;

  /** Pause between pumps (ms) */
  readonly pollIntervalMs?: number;

  /** Logger (defaults to an `exchange` child of the root logger) */
  readonly logger?: Logger;
}

/**
 * Sends our identity and waits for the peer's.
 *
 * The messenger is closed when the exchange ends, whatever the outcome. A
 * peer speaking another encoding shows up as an unknown message type and
 * ends the exchange without an identity.
 *
 * @returns The peer's `username@hostname`, or null if none arrived
 */
export async function exchangeIdentity<M>(
  messenger: Messenger<M>,
  protocol: IdentityProtocol<M>,
  options: ExchangeOptions = {},
): Promise<string | null> {
  const timeoutMs = options.timeoutMs ?? 2000;
  const pollIntervalMs = options.pollIntervalMs ?? 10;
  const logger = options.logger ?? createLogger('exchange');

  messenger.send(protocol.hello());
  const deadline = Date.now() + timeoutMs;

  try {
    while (Date.now() < deadline && messenger.pump()) {
      let message = messenger.receive();
      while (message !== null) {
        const identity = protocol.describe(message);
        if (identity !== null) {
          await messenger.drain();
          return identity;
        }
        message = messenger.receive();
      }
      await sleep(pollIntervalMs);
    }
  } catch (error) {
    if (!(error instanceof UnknownMessageTypeError)) {
      messenger.close();
      throw error;
    }
    logger.warn(
      { err: error, remote: messenger.remoteAddress, codec: protocol.codec.kind },
      'peer uses a different message encoding',
    );
  }

  messenger.close();
  return null;
}

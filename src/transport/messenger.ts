/**
 * Poll-driven message transport over one connected stream socket.
 *
 * A Messenger owns a read buffer and a write buffer. The owner drives it by
 * calling pump() repeatedly; each pump performs at most one read and one
 * write. Messages are queued with send() and collected with receive(),
 * neither of which touches the socket.
 *
 * @module transport/messenger
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type * as net from 'node:net';

import { SocketNotConnectedError, TRANSPORT_DEFAULTS, UnknownMessageTypeError } from '../types.js';
import { createLogger, type Logger } from '../logger.js';
import { advanceBy, type ExtractResult, type FrameCodec } from '../protocol/codec.js';
import {
  ChannelError,
  NetSocketChannel,
  isSocketChannel,
  type SocketChannel,
  type SocketReadiness,
} from './socket-channel.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a Messenger.
 */
export interface MessengerOptions {
  /** Maximum bytes read per pump */
  readonly chunkSize?: number;

  /** Logger (defaults to a `messenger` child of the root logger) */
  readonly logger?: Logger;
}

/**
 * Statistics for a Messenger.
 */
export interface MessengerStats {
  /** Whether the messenger has closed */
  readonly closed: boolean;

  /** Number of messages queued with send() */
  readonly messagesSent: number;

  /** Number of messages returned by receive() */
  readonly messagesReceived: number;

  /** Bytes accepted by the socket */
  readonly bytesSent: number;

  /** Bytes read from the socket */
  readonly bytesReceived: number;

  /** Bytes waiting in the write buffer */
  readonly pendingWriteBytes: number;

  /** Bytes waiting in the read buffer */
  readonly pendingReadBytes: number;

  /** Timestamp of the last successful socket write */
  readonly lastSentAt: number | null;

  /** Timestamp of the last successful socket read */
  readonly lastReceivedAt: number | null;
}

let instanceCount = 0;

// =============================================================================
// Messenger Class
// =============================================================================

/**
 * Sends and receives encoded messages across one connected socket.
 *
 * Socket failures never escape pump(); they close the messenger, which the
 * owner observes through pump()'s return value or isClosed(). A Messenger is
 * meant to be driven from a single loop.
 *
 * @example
 * ```typescript
 * const messenger = new Messenger(socket, createCodec('text'));
 * messenger.send(new MsgIdentify());
 *
 * while (messenger.pump()) {
 *   const message = messenger.receive();
 *   if (message) handle(message);
 *   await setTimeout(10);
 * }
 * ```
 */
export class Messenger<M> {
  readonly id: number;
  readonly localAddress: string;
  readonly remoteAddress: string;

  private readonly channel: SocketChannel;
  private readonly chunkSize: number;
  private readonly logger: Logger;

  private readBuffer: Buffer = Buffer.alloc(0);
  private writeBuffer: Buffer = Buffer.alloc(0);
  private closed = false;

  // Statistics
  private messagesSent = 0;
  private messagesReceived = 0;
  private bytesSent = 0;
  private bytesReceived = 0;
  private lastSentAt: number | null = null;
  private lastReceivedAt: number | null = null;

  /**
   * @param socket - Connected socket, or a channel already wrapping one
   * @param codec - Codec used for every message on this connection
   * @throws {SocketNotConnectedError} If the socket has no peer
   */
  constructor(
    socket: net.Socket | SocketChannel,
    readonly codec: FrameCodec<M>,
    options: MessengerOptions = {},
  ) {
    if (!isSocketChannel(socket) && (socket.destroyed || socket.remoteAddress === undefined)) {
      throw new SocketNotConnectedError();
    }

    this.channel = isSocketChannel(socket) ? socket : new NetSocketChannel(socket);
    if (this.channel.remoteAddress === '') {
      throw new SocketNotConnectedError();
    }

    this.id = ++instanceCount;
    this.localAddress = this.channel.localAddress;
    this.remoteAddress = this.channel.remoteAddress;
    this.chunkSize = options.chunkSize ?? TRANSPORT_DEFAULTS.CHUNK_SIZE;
    this.logger = (options.logger ?? createLogger('messenger')).child({
      messenger: this.id,
      remote: this.remoteAddress,
    });

    this.logger.debug({ codec: codec.kind }, 'messenger created');
  }

  /**
   * Whether the messenger has closed.
   */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Bytes queued but not yet accepted by the socket.
   */
  pendingWriteBytes(): number {
    return this.writeBuffer.length;
  }

  /**
   * Bytes received but not yet extracted as messages.
   */
  pendingReadBytes(): number {
    return this.readBuffer.length;
  }

  /**
   * Returns messenger statistics.
   */
  getStats(): MessengerStats {
    return {
      closed: this.closed,
      messagesSent: this.messagesSent,
      messagesReceived: this.messagesReceived,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      pendingWriteBytes: this.writeBuffer.length,
      pendingReadBytes: this.readBuffer.length,
      lastSentAt: this.lastSentAt,
      lastReceivedAt: this.lastReceivedAt,
    };
  }

  /**
   * Performs one non-blocking I/O pass: at most one read and one write.
   *
   * @returns false once the messenger is closed, true otherwise
   */
  pump(): boolean {
    if (this.closed) {
      this.logger.debug('pump called on a closed messenger');
      return false;
    }

    let readiness: SocketReadiness;
    try {
      readiness = this.channel.poll();
    } catch (error) {
      this.logger.error({ err: error }, 'readiness check failed');
      this.close();
      return false;
    }

    if (readiness.errored) {
      this.logger.error('socket reported an error');
      this.close();
      return false;
    }

    if (readiness.readable) {
      this.readOnce();
    }

    if (!this.closed && readiness.writable && this.writeBuffer.length > 0) {
      this.writeOnce();
    }

    return !this.closed;
  }

  /**
   * Extracts the next complete message from the read buffer.
   *
   * Decoding problems other than an unknown message type are logged and
   * reported as "no message".
   *
   * @returns The message, or null when none is complete yet
   * @throws {UnknownMessageTypeError} If the peer sent an unregistered type
   */
  receive(): M | null {
    let result: ExtractResult<M>;
    try {
      result = this.codec.extractOne(this.readBuffer);
    } catch (error) {
      if (error instanceof UnknownMessageTypeError) {
        throw error;
      }
      this.logger.error({ err: error }, 'failed to extract message');
      return null;
    }

    const advance = advanceBy(this.codec, result);
    if (advance === 0) {
      return null;
    }

    this.readBuffer = this.readBuffer.subarray(advance);
    if (result.message !== null) {
      this.messagesReceived++;
    }
    return result.message;
  }

  /**
   * Encodes a message and appends it to the write buffer.
   *
   * Transmission happens on later pump() calls.
   */
  send(message: M): void {
    const encoded = this.codec.encode(message);
    this.writeBuffer = this.writeBuffer.length > 0 ? Buffer.concat([this.writeBuffer, encoded]) : encoded;
    this.messagesSent++;
  }

  /**
   * Shuts the socket down in both directions. Idempotent.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.logger.debug('shutting down socket');
    try {
      this.channel.shutdown();
    } catch (error) {
      this.logger.debug({ err: error }, 'shutdown failed');
    }
  }

  /**
   * Pumps until the write buffer is empty or the attempt budget is spent,
   * then closes.
   *
   * Yields to the event loop between attempts so the socket can flush.
   */
  async drain(maxAttempts: number = TRANSPORT_DEFAULTS.DRAIN_ATTEMPTS): Promise<void> {
    let attempts = 0;

    while (!this.closed && this.writeBuffer.length > 0 && attempts < maxAttempts) {
      this.pump();
      attempts++;
      if (this.writeBuffer.length > 0) {
        await yieldToEventLoop();
      }
    }

    if (this.writeBuffer.length > 0) {
      this.logger.warn({ pendingWriteBytes: this.writeBuffer.length, attempts }, 'closing with unsent data');
    }
    this.close();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private readOnce(): void {
    let data: Buffer;
    try {
      data = this.channel.receive(this.chunkSize);
    } catch (error) {
      this.handleIoError(error, 'read');
      return;
    }

    if (data.length === 0) {
      this.logger.debug('peer ended the stream');
      this.closed = true;
      return;
    }

    this.readBuffer = this.readBuffer.length > 0 ? Buffer.concat([this.readBuffer, data]) : data;
    this.bytesReceived += data.length;
    this.lastReceivedAt = Date.now();
    this.logger.debug({ bytes: data.length }, 'read');
  }

  private writeOnce(): void {
    let sent: number;
    try {
      sent = this.channel.send(this.writeBuffer);
    } catch (error) {
      this.handleIoError(error, 'write');
      return;
    }

    if (sent > 0) {
      this.writeBuffer = this.writeBuffer.subarray(sent);
      this.bytesSent += sent;
      this.lastSentAt = Date.now();
      this.logger.debug({ bytes: sent }, 'wrote');
    }
  }

  private handleIoError(error: unknown, operation: 'read' | 'write'): void {
    if (error instanceof ChannelError) {
      if (error.code === 'EAGAIN') {
        return;
      }
      this.logger.debug({ code: error.code, operation }, 'connection lost');
      this.closed = true;
      return;
    }

    this.logger.error({ err: error, operation }, 'socket operation failed');
    this.close();
  }
}

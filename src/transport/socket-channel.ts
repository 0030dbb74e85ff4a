/**
 * Non-blocking, poll-style view of a connected stream socket.
 *
 * Node sockets deliver data through events. The Messenger instead services
 * its socket in explicit passes, so NetSocketChannel queues what the events
 * deliver and exposes readiness, partial reads and partial writes the way a
 * non-blocking kernel socket does.
 *
 * @module transport/socket-channel
 */

import type * as net from 'node:net';

// =============================================================================
// Types
// =============================================================================

/**
 * Result of a zero-wait readiness check.
 */
export interface SocketReadiness {
  /** receive() will return data, end of stream, or a reset error */
  readonly readable: boolean;

  /** send() will accept at least one byte */
  readonly writable: boolean;

  /** The socket failed with an error other than a peer reset */
  readonly errored: boolean;
}

/**
 * Error codes a channel reports through thrown errno-style errors.
 */
export type ChannelErrorCode = 'EAGAIN' | 'ECONNRESET' | 'EPIPE';

/**
 * Errno-style error thrown by channel operations.
 */
export class ChannelError extends Error {
  override readonly name = 'ChannelError' as const;

  constructor(
    readonly code: ChannelErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Connected stream socket serviced in explicit passes.
 */
export interface SocketChannel {
  /** Local IP address */
  readonly localAddress: string;

  /** Peer IP address */
  readonly remoteAddress: string;

  /**
   * Checks readiness without waiting.
   */
  poll(): SocketReadiness;

  /**
   * Returns up to `maxBytes` received bytes. An empty buffer means the peer
   * ended the stream.
   *
   * @throws {ChannelError} `EAGAIN` when nothing is available,
   *   `ECONNRESET` when the peer reset the connection
   */
  receive(maxBytes: number): Buffer;

  /**
   * Offers bytes for transmission and returns how many were accepted.
   *
   * @throws {ChannelError} `EPIPE` when the socket can no longer send
   */
  send(data: Buffer): number;

  /**
   * Shuts down both directions after pending output is flushed.
   */
  shutdown(): void;
}

/**
 * Checks whether a value is a SocketChannel rather than a net.Socket.
 */
export function isSocketChannel(value: net.Socket | SocketChannel): value is SocketChannel {
  return 'poll' in value && typeof value.poll === 'function';
}

const RESET_CODES: ReadonlySet<string> = new Set(['ECONNRESET', 'EPIPE', 'ECONNABORTED']);

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// =============================================================================
// NetSocketChannel Class
// =============================================================================

/**
 * SocketChannel backed by a `net.Socket`.
 *
 * `send()` accepts only what fits below the socket's writable high water
 * mark; the remainder stays with the caller until a later pass.
 */
export class NetSocketChannel implements SocketChannel {
  readonly localAddress: string;
  readonly remoteAddress: string;

  private readonly inbound: Buffer[] = [];
  private queuedBytes = 0;
  private ended = false;
  private resetError: Error | null = null;
  private fatalError: Error | null = null;

  constructor(private readonly socket: net.Socket) {
    this.localAddress = socket.localAddress ?? '';
    this.remoteAddress = socket.remoteAddress ?? '';

    socket.on('data', (chunk: Buffer) => {
      this.inbound.push(chunk);
      this.queuedBytes += chunk.length;
      if (this.queuedBytes >= socket.readableHighWaterMark) {
        socket.pause();
      }
    });
    socket.on('end', () => {
      this.ended = true;
    });
    socket.on('error', (error: Error) => {
      const code = errorCode(error);
      if (code !== undefined && RESET_CODES.has(code)) {
        this.resetError = error;
      } else {
        this.fatalError = error;
      }
    });
    socket.on('close', () => {
      this.ended = true;
    });
  }

  /**
   * Bytes received from the socket but not yet returned by receive().
   *
   * Reading from the socket pauses while this reaches the socket's readable
   * high water mark, leaving further data to TCP flow control.
   */
  pendingBytes(): number {
    return this.queuedBytes;
  }

  /**
   * The socket this channel wraps.
   */
  getSocket(): net.Socket {
    return this.socket;
  }

  poll(): SocketReadiness {
    return {
      readable: this.inbound.length > 0 || this.ended || this.resetError !== null,
      writable: this.canWrite() && this.socket.writableLength < this.socket.writableHighWaterMark,
      errored: this.fatalError !== null,
    };
  }

  receive(maxBytes: number): Buffer {
    const head = this.inbound[0];

    if (head === undefined) {
      if (this.resetError) {
        throw new ChannelError('ECONNRESET', this.resetError.message, { cause: this.resetError });
      }
      if (this.ended) {
        return Buffer.alloc(0);
      }
      throw new ChannelError('EAGAIN', 'no data available');
    }

    let data: Buffer;
    if (head.length <= maxBytes) {
      this.inbound.shift();
      data = head;
    } else {
      this.inbound[0] = head.subarray(maxBytes);
      data = head.subarray(0, maxBytes);
    }

    this.queuedBytes -= data.length;
    if (this.socket.isPaused() && this.queuedBytes < this.socket.readableHighWaterMark) {
      this.socket.resume();
    }
    return data;
  }

  send(data: Buffer): number {
    if (!this.canWrite()) {
      throw new ChannelError('EPIPE', 'socket is no longer writable');
    }

    const room = this.socket.writableHighWaterMark - this.socket.writableLength;
    const accepted = Math.max(0, Math.min(data.length, room));
    if (accepted > 0) {
      this.socket.write(data.subarray(0, accepted));
    }
    return accepted;
  }

  shutdown(): void {
    if (this.socket.destroyed) {
      return;
    }
    this.socket.end(() => {
      this.socket.destroy();
    });
  }

  private canWrite(): boolean {
    return !this.socket.destroyed && this.socket.writable && this.resetError === null;
  }
}

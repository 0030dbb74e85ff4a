/**
 * Single-host connection pair for exercising peer code without a network.
 *
 * A LoopbackServer accepts exactly one connection on 127.0.0.1 and a
 * LoopbackClient keeps dialing 127.0.0.1 until it gets one, so either side
 * may be started first.
 *
 * @module discovery/loopback
 */

import * as net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';

import { DISCOVERY_DEFAULTS } from '../types.js';
import { createLogger, type Logger } from '../logger.js';

const LOOPBACK_ADDRESS = '127.0.0.1';

/**
 * Options shared by LoopbackServer and LoopbackClient.
 */
export interface LoopbackOptions {
  /** TCP port on 127.0.0.1 */
  readonly tcpPort?: number;

  /** Give up after this many milliseconds; 0 waits until stop() */
  readonly timeoutMs?: number;

  /** Bound on a single connect attempt (client only, ms) */
  readonly connectTimeoutMs?: number;

  /** Pause between connect attempts (client only, ms) */
  readonly retryIntervalMs?: number;

  /** Called with the connected socket */
  readonly onConnect?: (socket: net.Socket) => void;

  /** Logger (defaults to a `loopback` child of the root logger) */
  readonly logger?: Logger;
}

abstract class Loopback {
  protected readonly tcpPort: number;
  protected readonly timeoutMs: number;
  protected readonly onConnect: ((socket: net.Socket) => void) | undefined;
  protected readonly logger: Logger;

  protected enabled = false;
  protected connected: net.Socket | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: LoopbackOptions) {
    this.tcpPort = options.tcpPort ?? DISCOVERY_DEFAULTS.TCP_PORT;
    this.timeoutMs = options.timeoutMs ?? DISCOVERY_DEFAULTS.TIMEOUT_MS;
    this.onConnect = options.onConnect;
    this.logger = options.logger ?? createLogger('loopback');
  }

  /**
   * The connected socket, once connect() has succeeded.
   */
  get socket(): net.Socket | null {
    return this.connected;
  }

  /**
   * Whether connect() is still trying.
   */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Makes a pending connect() give up and resolve to null.
   */
  stop(): void {
    this.finish();
  }

  protected begin(): void {
    this.enabled = true;
    this.connected = null;
    if (this.timeoutMs > 0) {
      this.timer = setTimeout(() => {
        this.logger.debug({ timeoutMs: this.timeoutMs }, 'loopback timed out');
        this.finish();
      }, this.timeoutMs);
    }
  }

  protected finish(): void {
    this.enabled = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  protected deliver(socket: net.Socket): void {
    this.connected = socket;
    socket.on('error', (error) => {
      this.logger.debug({ err: error }, 'loopback socket error');
    });
    if (this.onConnect) {
      this.onConnect(socket);
    }
  }
}

// =============================================================================
// LoopbackServer
// =============================================================================

/**
 * Accepts one connection on 127.0.0.1.
 */
export class LoopbackServer extends Loopback {
  private server: net.Server | null = null;
  private settle: ((socket: net.Socket | null) => void) | null = null;

  constructor(options: LoopbackOptions = {}) {
    super(options);
  }

  /**
   * Listens until a client connects, the timeout elapses or stop() is called.
   *
   * The listener is closed before the promise settles.
   *
   * @returns The accepted socket, or null if none was accepted
   */
  connect(): Promise<net.Socket | null> {
    this.begin();

    return new Promise((resolve) => {
      const server = net.createServer();
      this.server = server;
      this.settle = resolve;

      server.on('connection', (socket) => {
        if (!this.enabled) {
          socket.destroy();
          return;
        }
        this.logger.debug({ remotePort: socket.remotePort }, 'server accepted connection');
        this.complete(socket);
      });

      server.on('error', (error) => {
        this.logger.error({ err: error, tcpPort: this.tcpPort }, 'loopback server failed');
        this.complete(null);
      });

      server.listen(this.tcpPort, LOOPBACK_ADDRESS, DISCOVERY_DEFAULTS.LISTEN_BACKLOG, () => {
        this.logger.debug({ tcpPort: this.tcpPort }, 'server listening for connections');
      });
    });
  }

  override stop(): void {
    this.complete(null);
  }

  private complete(socket: net.Socket | null): void {
    const settle = this.settle;
    const server = this.server;
    this.settle = null;
    this.server = null;
    this.finish();

    if (server) {
      server.close((error) => {
        if (error) {
          this.logger.debug({ err: error }, 'loopback listener already closed');
        }
      });
    }
    if (!settle) {
      return;
    }
    if (socket) {
      this.deliver(socket);
    }
    settle(socket);
  }

  protected override finish(): void {
    const pending = this.settle !== null;
    super.finish();
    if (pending) {
      this.complete(null);
    }
  }
}

// =============================================================================
// LoopbackClient
// =============================================================================

/**
 * Dials 127.0.0.1 until a server answers.
 */
export class LoopbackClient extends Loopback {
  private readonly connectTimeoutMs: number;
  private readonly retryIntervalMs: number;

  constructor(options: LoopbackOptions = {}) {
    super(options);
    this.connectTimeoutMs = options.connectTimeoutMs ?? DISCOVERY_DEFAULTS.CONNECT_TIMEOUT_MS;
    this.retryIntervalMs = options.retryIntervalMs ?? DISCOVERY_DEFAULTS.POLL_INTERVAL_MS;
  }

  /**
   * Retries until connected, the timeout elapses or stop() is called.
   *
   * @returns The connected socket, or null if no attempt succeeded
   */
  async connect(): Promise<net.Socket | null> {
    this.begin();

    while (this.enabled) {
      this.logger.debug({ tcpPort: this.tcpPort }, 'client connecting');
      try {
        const socket = await this.attempt();
        if (!this.enabled) {
          socket.destroy();
          break;
        }
        this.logger.debug('client made connection');
        this.finish();
        this.deliver(socket);
        return socket;
      } catch (error) {
        this.logger.debug({ err: error }, 'client connect attempt failed');
      }
      if (this.enabled) {
        await sleep(this.retryIntervalMs);
      }
    }

    return null;
  }

  private attempt(): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new Error(`connect timed out after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      socket.once('connect', () => {
        clearTimeout(timer);
        socket.removeAllListeners('error');
        resolve(socket);
      });
      socket.once('error', (error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(error);
      });
      socket.connect(this.tcpPort, LOOPBACK_ADDRESS);
    });
  }
}

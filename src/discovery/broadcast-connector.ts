/**
 * Zero-configuration peer discovery over UDP broadcast.
 *
 * A discovery session runs cooperating workers on the event loop:
 * - broadcaster: announces this process on the discovery port
 * - discovery listener: hears announcements and dials the senders over TCP
 * - connection listener: accepts TCP connections from peers that heard us
 * - timeout (optional): ends the session at a deadline
 *
 * The workers share one `enabled` flag and one PeerTable. Clearing the flag
 * is the only way a session ends, whether on request, on timeout or because
 * a listening socket failed; every worker notices on its next poll.
 *
 * @module discovery/broadcast-connector
 */

import * as dgram from 'node:dgram';
import * as net from 'node:net';
import { EventEmitter } from 'node:events';
import { setTimeout as sleep } from 'node:timers/promises';

import type { ConnectionDirection, DiscoveryState, DiscoveryStopReason } from '../types.js';
import {
  ConnectFailureError,
  DISCOVERY_DEFAULTS,
  DiscoveryAlreadyRunningError,
  InvalidDiscoveryConfigError,
  ListenerFailureError,
} from '../types.js';
import { createLogger, type Logger } from '../logger.js';
import { PeerTable, normalizeAddress } from './peer-table.js';
import { resolveLocalAddress } from './local-address.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Handler invoked for every connection a session establishes.
 *
 * Runs on the event loop turn that completed the connection and may call
 * stop() on the connector.
 */
export type OnConnectHandler = (
  socket: net.Socket,
  address: string,
  direction: ConnectionDirection,
) => void;

/**
 * Configuration for a discovery session.
 */
export interface DiscoveryConfig {
  /** UDP port for announcements */
  readonly udpPort?: number;

  /** TCP port for peer connections */
  readonly tcpPort?: number;

  /** Interval between announcements (ms) */
  readonly broadcastIntervalMs?: number;

  /** Whether to dial announcements coming from this host's own address */
  readonly allowLoopback?: boolean;

  /** Bound on a single outbound connect attempt (ms) */
  readonly connectTimeoutMs?: number;

  /** Session timeout (ms); 0 runs until stop() */
  readonly timeoutMs?: number;

  /** Cadence at which workers check whether the session is still enabled (ms) */
  readonly pollIntervalMs?: number;

  /** Destination address of announcements */
  readonly broadcastAddress?: string;

  /** Address both listeners bind to */
  readonly bindAddress?: string;

  /** This host's address; resolved from the routing table when omitted */
  readonly localAddress?: string;

  /** Announcement payload */
  readonly marker?: string;

  /** Called for every established connection */
  readonly onConnect?: OnConnectHandler;

  /** Logger (defaults to a `discovery` child of the root logger) */
  readonly logger?: Logger;
}

/**
 * Discovery configuration with defaults applied.
 */
export interface ResolvedDiscoveryConfig {
  readonly udpPort: number;
  readonly tcpPort: number;
  readonly broadcastIntervalMs: number;
  readonly allowLoopback: boolean;
  readonly connectTimeoutMs: number;
  readonly timeoutMs: number;
  readonly pollIntervalMs: number;
  readonly broadcastAddress: string;
  readonly bindAddress: string;
  readonly localAddress: string | undefined;
  readonly marker: string;
  readonly onConnect: OnConnectHandler | undefined;
}

/**
 * Events emitted by BroadcastConnector.
 */
export interface DiscoveryEvents {
  /** Emitted when the workers have been launched */
  started: [localAddress: string];

  /** Emitted for every announcement heard */
  announcement: [address: string];

  /** Emitted before dialing a peer that announced itself */
  dialing: [address: string];

  /** Emitted for every established connection, including redundant ones */
  connected: [address: string, socket: net.Socket, direction: ConnectionDirection];

  /** Emitted when dialing a peer failed */
  dialFailed: [address: string, error: ConnectFailureError];

  /** Emitted once every worker has exited */
  stopped: [reason: DiscoveryStopReason];
}

// =============================================================================
// Configuration
// =============================================================================

function requirePort(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new InvalidDiscoveryConfigError(`${name} must be an integer in 1..65535, got ${value}`);
  }
}

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidDiscoveryConfigError(`${name} must be a positive number, got ${value}`);
  }
}

function requireIPv4(name: string, value: string): void {
  if (!net.isIPv4(value)) {
    throw new InvalidDiscoveryConfigError(`${name} must be an IPv4 address, got '${value}'`);
  }
}

/**
 * Applies defaults to a discovery configuration and validates it.
 *
 * @throws {InvalidDiscoveryConfigError} If a value is out of range
 */
export function resolveDiscoveryConfig(config: DiscoveryConfig = {}): ResolvedDiscoveryConfig {
  const resolved: ResolvedDiscoveryConfig = {
    udpPort: config.udpPort ?? DISCOVERY_DEFAULTS.UDP_PORT,
    tcpPort: config.tcpPort ?? DISCOVERY_DEFAULTS.TCP_PORT,
    broadcastIntervalMs: config.broadcastIntervalMs ?? DISCOVERY_DEFAULTS.BROADCAST_INTERVAL_MS,
    allowLoopback: config.allowLoopback ?? false,
    connectTimeoutMs: config.connectTimeoutMs ?? DISCOVERY_DEFAULTS.CONNECT_TIMEOUT_MS,
    timeoutMs: config.timeoutMs ?? DISCOVERY_DEFAULTS.TIMEOUT_MS,
    pollIntervalMs: config.pollIntervalMs ?? DISCOVERY_DEFAULTS.POLL_INTERVAL_MS,
    broadcastAddress: config.broadcastAddress ?? DISCOVERY_DEFAULTS.BROADCAST_ADDRESS,
    bindAddress: config.bindAddress ?? DISCOVERY_DEFAULTS.BIND_ADDRESS,
    localAddress: config.localAddress,
    marker: config.marker ?? DISCOVERY_DEFAULTS.MARKER,
    onConnect: config.onConnect,
  };

  requirePort('udpPort', resolved.udpPort);
  requirePort('tcpPort', resolved.tcpPort);
  requirePositive('broadcastIntervalMs', resolved.broadcastIntervalMs);
  requirePositive('connectTimeoutMs', resolved.connectTimeoutMs);
  requirePositive('pollIntervalMs', resolved.pollIntervalMs);

  if (!Number.isFinite(resolved.timeoutMs) || resolved.timeoutMs < 0) {
    throw new InvalidDiscoveryConfigError(`timeoutMs must be zero or positive, got ${resolved.timeoutMs}`);
  }

  requireIPv4('broadcastAddress', resolved.broadcastAddress);
  requireIPv4('bindAddress', resolved.bindAddress);
  if (resolved.localAddress !== undefined) {
    requireIPv4('localAddress', resolved.localAddress);
  }

  if (resolved.marker.length === 0) {
    throw new InvalidDiscoveryConfigError('marker must not be empty');
  }

  return resolved;
}

// =============================================================================
// Socket Helpers
// =============================================================================

function bindUdp(socket: dgram.Socket, port: number, address?: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      socket.off('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      socket.off('error', onError);
      resolve();
    };
    socket.once('error', onError);
    socket.once('listening', onListening);
    socket.bind(port, address);
  });
}

function listenTcp(server: net.Server, port: number, host: string, backlog: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host, backlog);
  });
}

// =============================================================================
// BroadcastConnector Class
// =============================================================================

/**
 * Finds peers on the local network and connects to them.
 *
 * Every peer ends up with one entry in the session's PeerTable, keyed by its
 * IP address. The first connection recorded for an address stays; when two
 * peers dial each other at the same moment the second connection is still
 * reported through `onConnect` and the `connected` event but is not recorded
 * and not closed.
 *
 * @example
 * ```typescript
 * const connector = new BroadcastConnector({
 *   timeoutMs: 5000,
 *   onConnect: (socket) => messengers.push(new Messenger(socket, codec)),
 * });
 *
 * await connector.run();
 * console.log('peers:', connector.peers());
 * ```
 */
export class BroadcastConnector extends EventEmitter<DiscoveryEvents> {
  private readonly config: ResolvedDiscoveryConfig;
  private readonly logger: Logger;

  private state: DiscoveryState = 'idle';
  private enabled = false;
  private stopReason: DiscoveryStopReason | null = null;
  private localAddress: string | null = null;
  private peerTable = new PeerTable();
  private announcements: string[] = [];
  private workers: Promise<void> | null = null;

  /**
   * @throws {InvalidDiscoveryConfigError} If the configuration is invalid
   */
  constructor(config: DiscoveryConfig = {}) {
    super();
    this.config = resolveDiscoveryConfig(config);
    this.logger = config.logger ?? createLogger('discovery');
  }

  /**
   * Returns the resolved configuration.
   */
  getConfig(): ResolvedDiscoveryConfig {
    return this.config;
  }

  /**
   * Returns the session lifecycle state.
   */
  getState(): DiscoveryState {
    return this.state;
  }

  /**
   * Whether the workers are still meant to run.
   */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Returns why the last session ended, or null while none has.
   */
  getStopReason(): DiscoveryStopReason | null {
    return this.stopReason;
  }

  /**
   * Returns the address used to recognise this host's own announcements.
   */
  getLocalAddress(): string | null {
    return this.localAddress;
  }

  /**
   * Snapshot of the addresses of connected peers.
   *
   * Entries may still be added while the session runs.
   */
  peers(): string[] {
    return this.peerTable.addresses();
  }

  /**
   * Returns the socket recorded for a peer address.
   */
  getSocket(address: string): net.Socket | undefined {
    return this.peerTable.get(address);
  }

  /**
   * Starts a discovery session and returns without waiting for it to end.
   *
   * @throws {DiscoveryAlreadyRunningError} If a session is still running
   */
  async start(): Promise<void> {
    if (this.state === 'running') {
      throw new DiscoveryAlreadyRunningError();
    }

    const startedAt = Date.now();
    this.state = 'running';
    this.enabled = true;
    this.stopReason = null;
    this.peerTable = new PeerTable();
    this.announcements = [];

    const localAddress =
      this.config.localAddress ?? (await resolveLocalAddress({ logger: this.logger }));
    this.localAddress = localAddress;

    const workers = [
      this.runWorker('broadcaster', () => this.broadcast()),
      this.runWorker('discovery-listener', () => this.listenForAnnouncements()),
      this.runWorker('connection-listener', () => this.listenForConnections()),
    ];
    if (this.config.timeoutMs > 0) {
      const deadline = startedAt + this.config.timeoutMs;
      workers.push(this.runWorker('timeout', () => this.expireAt(deadline)));
    }

    this.workers = Promise.all(workers).then(() => {
      this.state = 'stopped';
      const reason = this.stopReason ?? 'stopped';
      this.logger.info({ reason, peers: this.peerTable.size }, 'discovery stopped');
      this.emit('stopped', reason);
    });

    this.logger.info(
      { localAddress, udpPort: this.config.udpPort, tcpPort: this.config.tcpPort },
      'discovery started',
    );
    this.emit('started', localAddress);
  }

  /**
   * Resolves once every worker of the current session has exited.
   */
  join(): Promise<void> {
    return this.workers ?? Promise.resolve();
  }

  /**
   * Runs a discovery session to completion.
   */
  async run(): Promise<void> {
    await this.start();
    await this.join();
  }

  /**
   * Asks every worker to exit.
   *
   * Returns immediately; workers notice on their next poll. Use join() to
   * wait for them.
   */
  stop(): void {
    this.disable('stopped');
  }

  // ===========================================================================
  // Workers
  // ===========================================================================

  private async runWorker(name: string, body: () => Promise<void>): Promise<void> {
    this.logger.debug({ worker: name }, 'worker started');
    try {
      await body();
    } catch (error) {
      this.logger.error({ err: error, worker: name }, 'worker failed');
      this.disable('failed');
    }
    this.logger.debug({ worker: name }, 'worker exiting');
  }

  private async broadcast(): Promise<void> {
    const { udpPort, broadcastAddress, broadcastIntervalMs, pollIntervalMs, marker } = this.config;
    const socket = dgram.createSocket('udp4');
    const payload = Buffer.from(marker);

    try {
      await bindUdp(socket, 0);
    } catch (error) {
      socket.close();
      throw error;
    }
    socket.setBroadcast(true);
    socket.on('error', (error) => {
      this.logger.warn({ err: error }, 'broadcast socket error');
    });

    let nextBroadcastAt = Date.now() + DISCOVERY_DEFAULTS.INITIAL_BROADCAST_DELAY_MS;
    while (this.enabled) {
      await sleep(Math.min(pollIntervalMs, Math.max(0, nextBroadcastAt - Date.now())));
      if (!this.enabled || Date.now() < nextBroadcastAt) {
        continue;
      }

      socket.send(payload, udpPort, broadcastAddress, (error) => {
        if (error) {
          this.logger.warn({ err: error, broadcastAddress, udpPort }, 'announcement not sent');
        }
      });
      nextBroadcastAt = Date.now() + broadcastIntervalMs;
    }

    socket.close();
  }

  private async listenForAnnouncements(): Promise<void> {
    const { udpPort, bindAddress, pollIntervalMs } = this.config;
    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });

    try {
      await bindUdp(socket, udpPort, bindAddress);
      socket.setBroadcast(true);
    } catch (error) {
      this.fail(new ListenerFailureError('udp', udpPort, { cause: error }));
      socket.close();
      return;
    }

    socket.on('error', (error) => {
      this.fail(new ListenerFailureError('udp', udpPort, { cause: error }));
    });
    socket.on('message', (_data, remote) => {
      if (this.enabled) {
        this.announcements.push(normalizeAddress(remote.address));
      }
    });
    this.logger.debug({ udpPort }, 'listening for announcements');

    while (this.enabled) {
      const address = this.announcements.shift();
      if (address === undefined) {
        await sleep(pollIntervalMs);
        continue;
      }
      await this.handleAnnouncement(address);
    }

    socket.close();
  }

  private async listenForConnections(): Promise<void> {
    const { tcpPort, bindAddress, pollIntervalMs } = this.config;
    const server = net.createServer((socket) => this.handleAccepted(socket));

    try {
      await listenTcp(server, tcpPort, bindAddress, DISCOVERY_DEFAULTS.LISTEN_BACKLOG);
    } catch (error) {
      this.fail(new ListenerFailureError('tcp', tcpPort, { cause: error }));
      return;
    }

    server.on('error', (error) => {
      this.fail(new ListenerFailureError('tcp', tcpPort, { cause: error }));
    });
    this.logger.debug({ tcpPort }, 'listening for connections');

    while (this.enabled) {
      await sleep(pollIntervalMs);
    }

    // Stops accepting; connections already handed out stay open.
    server.close((error) => {
      if (error) {
        this.logger.debug({ err: error }, 'connection listener already closed');
      }
    });
  }

  private async expireAt(deadline: number): Promise<void> {
    while (this.enabled) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.logger.debug('discovery timed out');
        this.disable('timeout');
        return;
      }
      await sleep(Math.min(this.config.pollIntervalMs, remaining));
    }
  }

  // ===========================================================================
  // Connection Handling
  // ===========================================================================

  private async handleAnnouncement(address: string): Promise<void> {
    this.emit('announcement', address);

    if (this.peerTable.has(address)) {
      return;
    }
    if (!this.config.allowLoopback && address === this.localAddress) {
      this.logger.debug({ address }, 'ignoring own announcement');
      return;
    }

    this.logger.debug({ address, tcpPort: this.config.tcpPort }, 'dialing peer');
    this.emit('dialing', address);

    let socket: net.Socket;
    try {
      socket = await this.dial(address);
    } catch (error) {
      const failure =
        error instanceof ConnectFailureError
          ? error
          : new ConnectFailureError(address, this.config.tcpPort, { cause: error });
      this.logger.error({ err: failure }, 'could not connect to peer');
      this.emit('dialFailed', address, failure);
      return;
    }

    this.register(address, socket, 'outbound');
  }

  private handleAccepted(socket: net.Socket): void {
    const address = normalizeAddress(socket.remoteAddress ?? '');
    if (!this.enabled || address === '') {
      socket.destroy();
      return;
    }

    this.logger.debug({ address }, 'accepted connection');
    this.register(address, socket, 'inbound');
  }

  private dial(address: string): Promise<net.Socket> {
    const { tcpPort, connectTimeoutMs } = this.config;

    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        socket.destroy();
        reject(
          new ConnectFailureError(address, tcpPort, {
            cause: new Error(`connect timed out after ${connectTimeoutMs}ms`),
          }),
        );
      }, connectTimeoutMs);

      const onConnect = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.off('error', onError);
        resolve(socket);
      };

      const onError = (error: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.off('connect', onConnect);
        socket.destroy();
        reject(new ConnectFailureError(address, tcpPort, { cause: error }));
      };

      socket.once('connect', onConnect);
      socket.once('error', onError);
      socket.connect(tcpPort, address);
    });
  }

  private register(address: string, socket: net.Socket, direction: ConnectionDirection): void {
    socket.on('error', (error) => {
      this.logger.debug({ err: error, address }, 'peer socket error');
    });

    if (this.peerTable.claim(address, socket)) {
      this.logger.info({ address, direction }, 'peer connected');
    } else {
      this.logger.debug({ address, direction }, 'redundant connection to known peer');
    }

    this.emit('connected', address, socket, direction);

    const onConnect = this.config.onConnect;
    if (onConnect) {
      try {
        onConnect(socket, address, direction);
      } catch (error) {
        this.logger.error({ err: error, address }, 'onConnect handler failed');
      }
    }
  }

  // ===========================================================================
  // Session State
  // ===========================================================================

  private fail(error: ListenerFailureError): void {
    this.logger.error({ err: error }, 'listener failed');
    this.disable('failed');
  }

  private disable(reason: DiscoveryStopReason): void {
    if (!this.enabled) {
      return;
    }
    this.enabled = false;
    this.stopReason = reason;
    this.logger.debug({ reason }, 'discovery disabled');
  }
}

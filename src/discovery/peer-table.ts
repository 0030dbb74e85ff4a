/**
 * Table of connected peers for one discovery session.
 *
 * @module discovery/peer-table
 */

import type * as net from 'node:net';

const IPV4_MAPPED_PREFIX = '::ffff:';

/**
 * Strips the IPv4-mapped IPv6 prefix from an address.
 *
 * @example
 * ```typescript
 * normalizeAddress('::ffff:192.168.1.7'); // '192.168.1.7'
 * ```
 */
export function normalizeAddress(address: string): string {
  return address.startsWith(IPV4_MAPPED_PREFIX) ? address.slice(IPV4_MAPPED_PREFIX.length) : address;
}

/**
 * Maps peer addresses to their connected sockets.
 *
 * The first socket claimed for an address stays; later claims for the same
 * address are refused. `claim()` checks and inserts in one synchronous step,
 * so completions of concurrent dials and accepts cannot both win.
 */
export class PeerTable {
  private readonly sockets = new Map<string, net.Socket>();

  /**
   * Number of peers.
   */
  get size(): number {
    return this.sockets.size;
  }

  /**
   * Records a socket for an address unless one is already recorded.
   *
   * @returns true if the socket was recorded
   */
  claim(address: string, socket: net.Socket): boolean {
    const key = normalizeAddress(address);
    if (this.sockets.has(key)) {
      return false;
    }
    this.sockets.set(key, socket);
    return true;
  }

  has(address: string): boolean {
    return this.sockets.has(normalizeAddress(address));
  }

  get(address: string): net.Socket | undefined {
    return this.sockets.get(normalizeAddress(address));
  }

  /**
   * Snapshot of the recorded addresses.
   */
  addresses(): string[] {
    return Array.from(this.sockets.keys());
  }

  /**
   * Snapshot of the recorded entries.
   */
  entries(): Array<[string, net.Socket]> {
    return Array.from(this.sockets.entries());
  }
}

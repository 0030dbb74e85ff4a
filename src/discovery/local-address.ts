/**
 * Resolution of the local address used for outbound traffic.
 *
 * @module discovery/local-address
 */

import * as dgram from 'node:dgram';

import { DISCOVERY_DEFAULTS } from '../types.js';
import { createLogger, type Logger } from '../logger.js';

/**
 * Options for resolveLocalAddress().
 */
export interface LocalAddressOptions {
  /** Remote address the probe socket is connected to */
  readonly probeHost?: string;

  /** Remote port the probe socket is connected to */
  readonly probePort?: number;

  /** Address returned when no route exists */
  readonly fallback?: string;

  /** Logger (defaults to a `local-address` child of the root logger) */
  readonly logger?: Logger;
}

/**
 * Determines the IPv4 address this host sends from.
 *
 * Connects a UDP socket to the probe address and reads back the local
 * endpoint the kernel picked. Connecting a UDP socket sends nothing. When the
 * host has no route to the probe, the fallback address is returned.
 */
export function resolveLocalAddress(options: LocalAddressOptions = {}): Promise<string> {
  const probeHost = options.probeHost ?? DISCOVERY_DEFAULTS.PROBE_HOST;
  const probePort = options.probePort ?? DISCOVERY_DEFAULTS.PROBE_PORT;
  const fallback = options.fallback ?? DISCOVERY_DEFAULTS.FALLBACK_LOCAL_ADDRESS;
  const logger = options.logger ?? createLogger('local-address');

  return new Promise((resolve) => {
    const socket = dgram.createSocket('udp4');
    let settled = false;

    const finish = (address: string) => {
      if (settled) return;
      settled = true;
      socket.close();
      resolve(address);
    };

    const fail = (error: Error) => {
      logger.warn({ err: error, fallback }, 'cannot resolve local address');
      finish(fallback);
    };

    socket.on('error', fail);

    // The callback receives the error when the kernel has no route.
    socket.connect(probePort, probeHost, (error?: Error) => {
      if (error) {
        fail(error);
        return;
      }

      let address: string;
      try {
        address = socket.address().address;
      } catch (addressError) {
        fail(addressError instanceof Error ? addressError : new Error(String(addressError)));
        return;
      }
      logger.debug({ address }, 'resolved local address');
      finish(address);
    });
  });
}

/**
 * Shared type definitions, default configuration values and error classes
 * for lanwire discovery and message transport.
 *
 * @module types
 */

// =============================================================================
// Wire Keys
// =============================================================================

/**
 * Key identifying a message type on the wire.
 *
 * - byte encoding: one-byte numeric type code
 * - text encoding: type name string
 */
export type MessageKey = string | number;

/**
 * Name of a wire encoding.
 *
 * `json` is accepted as an alias of `text` where encodings are chosen by name.
 */
export type EncodingName = 'byte' | 'text' | 'json';

// =============================================================================
// Discovery
// =============================================================================

/**
 * Lifecycle state of a discovery session.
 *
 * - `idle`: never started
 * - `running`: workers are active
 * - `stopped`: every worker has exited
 */
export type DiscoveryState = 'idle' | 'running' | 'stopped';

/**
 * Why a discovery session ended.
 *
 * All three outcomes disable the same shared flag; the reason is recorded
 * separately so callers can tell them apart after the fact.
 */
export type DiscoveryStopReason = 'stopped' | 'timeout' | 'failed';

/**
 * Which side opened a peer connection.
 */
export type ConnectionDirection = 'outbound' | 'inbound';

// =============================================================================
// Default Configuration Values
// =============================================================================

/**
 * Default values for discovery configuration.
 */
export const DISCOVERY_DEFAULTS = {
  /** UDP port carrying broadcast announcements */
  UDP_PORT: 8222,

  /** TCP port accepting peer connections */
  TCP_PORT: 8223,

  /** Interval between announcements in milliseconds */
  BROADCAST_INTERVAL_MS: 1000,

  /** Delay before the first announcement in milliseconds */
  INITIAL_BROADCAST_DELAY_MS: 100,

  /** Bound on a single outbound connect attempt in milliseconds */
  CONNECT_TIMEOUT_MS: 2000,

  /** Session timeout in milliseconds (0 = run until stopped) */
  TIMEOUT_MS: 0,

  /** Cadence at which workers check the enabled flag */
  POLL_INTERVAL_MS: 250,

  /** Destination of announcements */
  BROADCAST_ADDRESS: '255.255.255.255',

  /** Address the listeners bind to */
  BIND_ADDRESS: '0.0.0.0',

  /** Announcement payload; its content is not interpreted by receivers */
  MARKER: 'BROADCAST',

  /** Pending connection backlog of the TCP listener */
  LISTEN_BACKLOG: 5,

  /** Address used to learn the outbound interface (nothing is sent to it) */
  PROBE_HOST: '8.8.8.8',

  /** Port used with PROBE_HOST */
  PROBE_PORT: 7,

  /** Local address assumed when the outbound interface cannot be resolved */
  FALLBACK_LOCAL_ADDRESS: '127.0.0.1',
} as const;

/**
 * Default values for message transport.
 */
export const TRANSPORT_DEFAULTS = {
  /** Maximum bytes read from the socket per pump */
  CHUNK_SIZE: 1024,

  /** Pump attempts made by drain() before giving up */
  DRAIN_ATTEMPTS: 100,
} as const;

/**
 * Limits of the byte wire format.
 */
export const BYTE_FORMAT = {
  /** Size of the length and type-code header */
  HEADER_SIZE: 2,

  /** Largest frame the one-byte length field can describe */
  MAX_MESSAGE_SIZE: 255,

  /** Largest payload that fits a frame */
  MAX_PAYLOAD_SIZE: 253,

  /** Largest type code */
  MAX_CODE: 255,
} as const;

/**
 * Constants of the text wire format.
 */
export const TEXT_FORMAT = {
  /** Byte terminating every message line */
  TERMINATOR: 0x0a,
} as const;

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error thrown when a wire key has no registered message type.
 *
 * Indicates a protocol or version mismatch between peers, so it is never
 * swallowed by codecs or by the Messenger.
 */
export class UnknownMessageTypeError extends Error {
  override readonly name = 'UnknownMessageTypeError' as const;

  constructor(readonly key: MessageKey) {
    super(
      typeof key === 'number'
        ? `${key} is not a registered message code`
        : `'${key}' is not a registered message type`,
    );
  }
}

/**
 * Error describing a message envelope that could not be decoded.
 */
export class MalformedEnvelopeError extends Error {
  override readonly name = 'MalformedEnvelopeError' as const;

  constructor(
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Malformed message envelope: ${reason}`, options);
  }
}

/**
 * Error thrown when an encoded message exceeds the byte format limit.
 */
export class MessageTooLargeError extends Error {
  override readonly name = 'MessageTooLargeError' as const;

  constructor(
    readonly size: number,
    readonly maxSize: number,
  ) {
    super(`Encoded message of ${size} bytes exceeds the ${maxSize}-byte frame limit`);
  }
}

/**
 * Error thrown when a text message attribute has no JSON representation.
 */
export class UnsupportedAttributeError extends Error {
  override readonly name = 'UnsupportedAttributeError' as const;

  constructor(
    readonly typeName: string,
    readonly attribute: string,
  ) {
    super(
      `Attribute '${attribute}' of '${typeName}' is not wire-safe; override toAttributes() to flatten it`,
    );
  }
}

/**
 * Error thrown when a message type is registered under an invalid key.
 */
export class InvalidMessageTypeError extends Error {
  override readonly name = 'InvalidMessageTypeError' as const;

  constructor(
    readonly key: MessageKey,
    readonly reason: string,
  ) {
    super(`Cannot register message type '${String(key)}': ${reason}`);
  }
}

/**
 * Error thrown when a Messenger is given a socket without a peer.
 */
export class SocketNotConnectedError extends Error {
  override readonly name = 'SocketNotConnectedError' as const;

  constructor() {
    super('Socket is not connected');
  }
}

/**
 * Error describing a failed outbound connection attempt to a peer.
 */
export class ConnectFailureError extends Error {
  override readonly name = 'ConnectFailureError' as const;

  constructor(
    readonly address: string,
    readonly port: number,
    options?: { cause?: unknown },
  ) {
    super(`Could not connect to ${address}:${port}`, options);
  }
}

/**
 * Error describing a failure of a discovery listening socket.
 */
export class ListenerFailureError extends Error {
  override readonly name = 'ListenerFailureError' as const;

  constructor(
    readonly listener: 'udp' | 'tcp',
    readonly port: number,
    options?: { cause?: unknown },
  ) {
    super(`${listener.toUpperCase()} listener on port ${port} failed`, options);
  }
}

/**
 * Error thrown when discovery configuration is invalid.
 */
export class InvalidDiscoveryConfigError extends Error {
  override readonly name = 'InvalidDiscoveryConfigError' as const;

  constructor(readonly reason: string) {
    super(`Invalid discovery configuration: ${reason}`);
  }
}

/**
 * Error thrown when start() is called on a session that is still running.
 */
export class DiscoveryAlreadyRunningError extends Error {
  override readonly name = 'DiscoveryAlreadyRunningError' as const;

  constructor() {
    super('Discovery session is already running. Call stop() and join() first.');
  }
}

/**
 * lanwire - LAN peer discovery and framed message exchange for Node.js
 *
 * This module provides the public API for the lanwire library.
 */

export const VERSION = '0.1.0' as const;

// Shared types
export type {
  MessageKey,
  EncodingName,
  DiscoveryState,
  DiscoveryStopReason,
  ConnectionDirection,
} from './types.js';

// Defaults
export { DISCOVERY_DEFAULTS, TRANSPORT_DEFAULTS, BYTE_FORMAT, TEXT_FORMAT } from './types.js';

// Error classes
export {
  UnknownMessageTypeError,
  MalformedEnvelopeError,
  MessageTooLargeError,
  UnsupportedAttributeError,
  InvalidMessageTypeError,
  SocketNotConnectedError,
  ConnectFailureError,
  ListenerFailureError,
  InvalidDiscoveryConfigError,
  DiscoveryAlreadyRunningError,
} from './types.js';

// Logging
export {
  configureLogger,
  createLogger,
  getRootLogger,
  resolveLogLevel,
  type Logger,
  type LoggerOptions,
} from './logger.js';

// Protocol
export {
  MessageRegistry,
  advanceBy,
  nothingExtracted,
  ByteCodec,
  ByteMessage,
  createByteRegistry,
  Identify,
  Join,
  Retry,
  Quit,
  BYTE_MESSAGE_TYPES,
  TextCodec,
  TextMessage,
  createTextRegistry,
  isWireValue,
  isWireAttributes,
  MsgIdentify,
  MsgJoin,
  MsgRetry,
  MsgQuit,
  TEXT_MESSAGE_TYPES,
  createCodec,
  isEncodingName,
  type MessageConstructor,
  type MessageRegistryOptions,
  type ExtractResult,
  type FrameCodec,
  type ByteCodecOptions,
  type ByteMessageClass,
  type ByteMessageRegistry,
  type TextCodecOptions,
  type TextMessageClass,
  type TextMessageRegistry,
  type WireAttributes,
  type WireValue,
  type CreateCodecOptions,
} from './protocol/index.js';

// Transport
export {
  ChannelError,
  NetSocketChannel,
  isSocketChannel,
  Messenger,
  type ChannelErrorCode,
  type SocketChannel,
  type SocketReadiness,
  type MessengerOptions,
  type MessengerStats,
} from './transport/index.js';

// Discovery
export {
  BroadcastConnector,
  resolveDiscoveryConfig,
  PeerTable,
  normalizeAddress,
  resolveLocalAddress,
  LoopbackClient,
  LoopbackServer,
  type DiscoveryConfig,
  type DiscoveryEvents,
  type OnConnectHandler,
  type ResolvedDiscoveryConfig,
  type LocalAddressOptions,
  type LoopbackOptions,
} from './discovery/index.js';

/**
 * Message model, registries and frame codecs.
 *
 * @module protocol
 *
 * @example
 * ```typescript
 * import { createCodec, MsgIdentify } from 'lanwire';
 *
 * const codec = createCodec('text');
 * const bytes = codec.encode(new MsgIdentify('alice', 'laptop'));
 * const { message, consumed } = codec.extractOne(bytes);
 * ```
 */

import type { EncodingName } from '../types.js';
import type { Logger } from '../logger.js';
import { ByteCodec, createByteRegistry, type ByteMessageClass } from './byte-codec.js';
import { TextCodec, createTextRegistry, type TextMessageClass } from './text-codec.js';
import { BYTE_MESSAGE_TYPES } from './byte-messages.js';
import { TEXT_MESSAGE_TYPES } from './text-messages.js';

// =============================================================================
// Registry and Codec Contract
// =============================================================================

export {
  MessageRegistry,
  type MessageConstructor,
  type MessageRegistryOptions,
} from './registry.js';

export {
  advanceBy,
  nothingExtracted,
  type ExtractResult,
  type FrameCodec,
} from './codec.js';

// =============================================================================
// Byte Encoding
// =============================================================================

export {
  ByteCodec,
  ByteMessage,
  createByteRegistry,
  type ByteCodecOptions,
  type ByteMessageClass,
  type ByteMessageRegistry,
} from './byte-codec.js';

export { Identify, Join, Retry, Quit, BYTE_MESSAGE_TYPES } from './byte-messages.js';

// =============================================================================
// Text Encoding
// =============================================================================

export {
  TextCodec,
  TextMessage,
  createTextRegistry,
  isWireValue,
  isWireAttributes,
  type TextCodecOptions,
  type TextMessageClass,
  type TextMessageRegistry,
  type WireAttributes,
  type WireValue,
} from './text-codec.js';

export { MsgIdentify, MsgJoin, MsgRetry, MsgQuit, TEXT_MESSAGE_TYPES } from './text-messages.js';

// =============================================================================
// Codec Selection
// =============================================================================

/**
 * Options for createCodec().
 */
export interface CreateCodecOptions {
  /** Extra byte message types registered after the built-in ones */
  readonly byteTypes?: Iterable<ByteMessageClass>;

  /** Extra text message types registered after the built-in ones */
  readonly textTypes?: Iterable<TextMessageClass>;

  /** Logger handed to the registry and codec */
  readonly logger?: Logger;
}

/**
 * Builds a codec for an encoding, registering the built-in messages.
 */
export function createCodec(encoding: 'byte', options?: CreateCodecOptions): ByteCodec;
export function createCodec(encoding: 'text' | 'json', options?: CreateCodecOptions): TextCodec;
export function createCodec(encoding: EncodingName, options?: CreateCodecOptions): ByteCodec | TextCodec;
export function createCodec(
  encoding: EncodingName,
  options: CreateCodecOptions = {},
): ByteCodec | TextCodec {
  const logger = options.logger;

  if (encoding === 'byte') {
    const registry = createByteRegistry(BYTE_MESSAGE_TYPES, logger);
    registry.registerAll(options.byteTypes ?? []);
    return new ByteCodec(registry, { ...(logger && { logger }) });
  }

  const registry = createTextRegistry(TEXT_MESSAGE_TYPES, logger);
  registry.registerAll(options.textTypes ?? []);
  return new TextCodec(registry, { ...(logger && { logger }) });
}

/**
 * Checks that a string names a supported encoding.
 */
export function isEncodingName(value: string): value is EncodingName {
  return value === 'byte' || value === 'text' || value === 'json';
}

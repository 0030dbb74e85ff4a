/**
 * Compact byte encoding.
 *
 * Frame layout:
 *
 * ```
 * byte 0       total frame length (counts itself and the type code)
 * byte 1       type code
 * byte 2..n    payload written by the message type
 * ```
 *
 * A message without payload is two bytes long; the one-byte length field caps
 * a frame at 255 bytes.
 *
 * @module protocol/byte-codec
 */

import {
  BYTE_FORMAT,
  InvalidMessageTypeError,
  MalformedEnvelopeError,
  MessageTooLargeError,
  UnknownMessageTypeError,
} from '../types.js';
import { createLogger, type Logger } from '../logger.js';
import { MessageRegistry, type MessageConstructor } from './registry.js';
import { nothingExtracted, type ExtractResult, type FrameCodec } from './codec.js';

// =============================================================================
// Message Base
// =============================================================================

/**
 * Base class of messages carried by the byte encoding.
 *
 * Subclasses must be constructible without arguments: the decoder creates an
 * empty instance and then hands it the payload.
 */
export abstract class ByteMessage {
  /** One-byte type code identifying the subclass on the wire */
  abstract get code(): number;

  /**
   * Returns the payload bytes of this message. Empty by default.
   */
  encodePayload(): Uint8Array {
    return new Uint8Array(0);
  }

  /**
   * Populates this message from its payload bytes. No-op by default.
   */
  decodePayload(_payload: Buffer): void {}

  toString(): string {
    return this.constructor.name;
  }
}

/**
 * Constructor of a concrete byte message type.
 */
export type ByteMessageClass = MessageConstructor<ByteMessage>;

/**
 * Registry of byte message types, keyed by type code.
 */
export type ByteMessageRegistry = MessageRegistry<number, ByteMessageClass>;

function validateCode(code: number): void {
  if (!Number.isInteger(code) || code < 0 || code > BYTE_FORMAT.MAX_CODE) {
    throw new InvalidMessageTypeError(code, `type code must be an integer in 0..${BYTE_FORMAT.MAX_CODE}`);
  }
}

/**
 * Creates a registry for byte message types.
 *
 * @param types - Types to register up front
 */
export function createByteRegistry(
  types: Iterable<ByteMessageClass> = [],
  logger?: Logger,
): ByteMessageRegistry {
  const registry = new MessageRegistry<number, ByteMessageClass>({
    keyOf: (ctor) => new ctor().code,
    validateKey: validateCode,
    ...(logger && { logger }),
  });
  return registry.registerAll(types);
}

// =============================================================================
// ByteCodec Class
// =============================================================================

/**
 * Options for a ByteCodec.
 */
export interface ByteCodecOptions {
  /** Logger (defaults to a `byte-codec` child of the root logger) */
  readonly logger?: Logger;
}

/**
 * Frame codec for the byte encoding.
 *
 * `extractOne()` reports the full frame length as `consumed`.
 */
export class ByteCodec implements FrameCodec<ByteMessage> {
  readonly kind = 'byte' as const;
  readonly terminatorLength = 0;

  private readonly logger: Logger;

  constructor(
    readonly registry: ByteMessageRegistry,
    options: ByteCodecOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('byte-codec');
  }

  /**
   * Encodes a message as `[length, code, ...payload]`.
   *
   * @throws {MessageTooLargeError} If the frame would exceed 255 bytes
   * @throws {InvalidMessageTypeError} If the message code does not fit one byte
   */
  encode(message: ByteMessage): Buffer {
    validateCode(message.code);

    const payload = message.encodePayload();
    const total = payload.length + BYTE_FORMAT.HEADER_SIZE;

    if (payload.length > BYTE_FORMAT.MAX_PAYLOAD_SIZE) {
      throw new MessageTooLargeError(total, BYTE_FORMAT.MAX_MESSAGE_SIZE);
    }

    const frame = Buffer.allocUnsafe(total);
    frame[0] = total;
    frame[1] = message.code;
    frame.set(payload, BYTE_FORMAT.HEADER_SIZE);

    this.logger.debug({ code: message.code, bytes: total }, 'encoded message');
    return frame;
  }

  /**
   * Extracts the first complete frame from the buffer.
   *
   * @throws {UnknownMessageTypeError} If the frame's type code is not registered
   */
  extractOne(buffer: Buffer): ExtractResult<ByteMessage> {
    const total = buffer[0];
    if (total === undefined || total > buffer.length) {
      return nothingExtracted();
    }

    const code = buffer[1];
    if (total < BYTE_FORMAT.HEADER_SIZE || code === undefined) {
      this.logger.error(
        { err: new MalformedEnvelopeError(`frame length ${total} is shorter than its header`) },
        'cannot extract message',
      );
      return nothingExtracted();
    }

    const ctor = this.registry.resolve(code);
    const message = new ctor();

    if (total > BYTE_FORMAT.HEADER_SIZE) {
      try {
        message.decodePayload(buffer.subarray(BYTE_FORMAT.HEADER_SIZE, total));
      } catch (error) {
        if (error instanceof UnknownMessageTypeError) {
          throw error;
        }
        this.logger.error(
          { err: new MalformedEnvelopeError(`payload of code ${code} could not be decoded`, { cause: error }) },
          'skipping frame',
        );
        return { message: null, consumed: total };
      }
    }

    this.logger.debug({ code, bytes: total }, 'extracted message');
    return { message, consumed: total };
  }
}

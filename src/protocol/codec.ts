/**
 * Frame codec contract shared by the byte and text encodings.
 *
 * @module protocol/codec
 */

/**
 * Outcome of one extraction attempt against a read buffer.
 *
 * - `{ message: null, consumed: 0 }`: not enough data yet (or a malformed
 *   envelope that is left in place)
 * - `{ message, consumed > 0 }`: a decoded message
 * - `{ message: null, consumed > 0 }`: a delimited frame that was skipped
 */
export interface ExtractResult<M> {
  /** Decoded message, or null */
  readonly message: M | null;

  /**
   * Bytes the message occupies, not counting the codec's terminator.
   *
   * The byte codec reports the full frame length. The text codec reports the
   * offset of its terminator, so callers advance by
   * `consumed + codec.terminatorLength` (see {@link advanceBy}).
   */
  readonly consumed: number;
}

/**
 * Turns messages into bytes and peels complete messages off a byte stream.
 */
export interface FrameCodec<M> {
  /** Wire encoding implemented by this codec */
  readonly kind: 'byte' | 'text';

  /** Bytes following each message that `consumed` does not count */
  readonly terminatorLength: number;

  /**
   * Encodes one message into its complete wire representation.
   */
  encode(message: M): Buffer;

  /**
   * Extracts the first complete message from the front of a buffer.
   *
   * Never mutates the buffer.
   */
  extractOne(buffer: Buffer): ExtractResult<M>;
}

/**
 * Number of bytes to drop from the read buffer after an extraction.
 */
export function advanceBy<M>(codec: FrameCodec<M>, result: ExtractResult<M>): number {
  return result.consumed > 0 ? result.consumed + codec.terminatorLength : 0;
}

/**
 * Empty extraction result.
 */
export function nothingExtracted<M>(): ExtractResult<M> {
  return { message: null, consumed: 0 };
}

/**
 * Line-delimited JSON encoding.
 *
 * Each message is one line of UTF-8 text holding a two-element array,
 * `[typeName, attributes]`, followed by a newline. Compared to the byte
 * encoding this costs bandwidth but needs no hand-written payload codecs.
 *
 * @module protocol/text-codec
 */

import { TextDecoder } from 'node:util';

import {
  InvalidMessageTypeError,
  MalformedEnvelopeError,
  TEXT_FORMAT,
  UnsupportedAttributeError,
} from '../types.js';
import { createLogger, type Logger } from '../logger.js';
import { MessageRegistry, type MessageConstructor } from './registry.js';
import { nothingExtracted, type ExtractResult, type FrameCodec } from './codec.js';

// =============================================================================
// Wire Values
// =============================================================================

/**
 * A value with an exact JSON representation.
 */
export type WireValue =
  | string
  | number
  | boolean
  | null
  | readonly WireValue[]
  | { readonly [key: string]: WireValue };

/**
 * Flattened attribute view of a text message.
 */
export type WireAttributes = { [key: string]: WireValue };

const RESERVED_ATTRIBUTES: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Checks that a value survives a JSON round trip unchanged.
 */
export function isWireValue(value: unknown): value is WireValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) {
        return true;
      }
      if (Array.isArray(value)) {
        return value.every((item: unknown) => isWireValue(item));
      }
      return isPlainObject(value) && Object.values(value).every((item: unknown) => isWireValue(item));
    default:
      return false;
  }
}

/**
 * Checks that a value is a JSON object of wire values.
 */
export function isWireAttributes(value: unknown): value is WireAttributes {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isWireValue(value);
}

// =============================================================================
// Message Base
// =============================================================================

/**
 * Base class of messages carried by the text encoding.
 *
 * Subclasses must be constructible without arguments. Attributes holding
 * anything other than JSON values need `toAttributes()` and
 * `applyAttributes()` overrides that flatten and rebuild them.
 */
export abstract class TextMessage {
  /** Name identifying the subclass on the wire */
  abstract get typeName(): string;

  /**
   * Returns the attributes to put on the wire.
   *
   * Defaults to every own enumerable field; `undefined` fields are left out.
   *
   * @throws {UnsupportedAttributeError} If a field has no JSON representation
   */
  toAttributes(): WireAttributes {
    const attributes: WireAttributes = {};
    for (const [key, value] of Object.entries(this)) {
      if (value === undefined) {
        continue;
      }
      if (!isWireValue(value)) {
        throw new UnsupportedAttributeError(this.typeName, key);
      }
      attributes[key] = value;
    }
    return attributes;
  }

  /**
   * Populates this message from decoded attributes.
   *
   * Defaults to copying each attribute onto the writable field of the same
   * name; attributes with no such field are ignored.
   */
  applyAttributes(attributes: WireAttributes): void {
    for (const key of Object.keys(attributes)) {
      if (RESERVED_ATTRIBUTES.has(key)) {
        continue;
      }
      // Only fields the instance already declares; accessors and unknown keys are ignored.
      const field = Object.getOwnPropertyDescriptor(this, key);
      if (field === undefined || !('value' in field) || field.writable !== true) {
        continue;
      }
      Object.defineProperty(this, key, { ...field, value: attributes[key] });
    }
  }

  toString(): string {
    return this.typeName;
  }
}

/**
 * Constructor of a concrete text message type.
 */
export type TextMessageClass = MessageConstructor<TextMessage>;

/**
 * Registry of text message types, keyed by type name.
 */
export type TextMessageRegistry = MessageRegistry<string, TextMessageClass>;

function validateTypeName(name: string): void {
  if (name.length === 0) {
    throw new InvalidMessageTypeError(name, 'type name must not be empty');
  }
}

/**
 * Creates a registry for text message types.
 *
 * @param types - Types to register up front
 */
export function createTextRegistry(
  types: Iterable<TextMessageClass> = [],
  logger?: Logger,
): TextMessageRegistry {
  const registry = new MessageRegistry<string, TextMessageClass>({
    keyOf: (ctor) => new ctor().typeName,
    validateKey: validateTypeName,
    ...(logger && { logger }),
  });
  return registry.registerAll(types);
}

// =============================================================================
// TextCodec Class
// =============================================================================

/**
 * Options for a TextCodec.
 */
export interface TextCodecOptions {
  /** Logger (defaults to a `text-codec` child of the root logger) */
  readonly logger?: Logger;
}

/**
 * Frame codec for the text encoding.
 *
 * `extractOne()` reports the offset of the terminator as `consumed`; the
 * terminator itself is one more byte ({@link TextCodec.terminatorLength}).
 */
export class TextCodec implements FrameCodec<TextMessage> {
  readonly kind = 'text' as const;
  readonly terminatorLength = 1;

  private readonly logger: Logger;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(
    readonly registry: TextMessageRegistry,
    options: TextCodecOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('text-codec');
  }

  /**
   * Encodes a message as one JSON line.
   *
   * @throws {UnsupportedAttributeError} If an attribute is not wire-safe
   */
  encode(message: TextMessage): Buffer {
    const line = JSON.stringify([message.typeName, message.toAttributes()]);
    this.logger.debug({ line }, 'encoded message');
    return Buffer.from(`${line}\n`, 'utf-8');
  }

  /**
   * Extracts the first complete line from the buffer.
   *
   * A line that cannot be decoded is logged and left in the buffer. A line
   * whose attributes the message rejects is logged and skipped.
   *
   * @throws {UnknownMessageTypeError} If the line names an unregistered type
   */
  extractOne(buffer: Buffer): ExtractResult<TextMessage> {
    const position = buffer.indexOf(TEXT_FORMAT.TERMINATOR);
    if (position < 0) {
      return nothingExtracted();
    }

    let envelope: [string, WireAttributes];
    try {
      envelope = this.parseEnvelope(buffer.subarray(0, position));
    } catch (error) {
      this.logger.error({ err: error }, 'cannot extract message');
      return nothingExtracted();
    }

    const [typeName, attributes] = envelope;
    const ctor = this.registry.resolve(typeName);
    const message = new ctor();

    try {
      message.applyAttributes(attributes);
    } catch (error) {
      this.logger.error(
        { err: new MalformedEnvelopeError(`attributes of '${typeName}' could not be applied`, { cause: error }) },
        'skipping line',
      );
      return { message: null, consumed: position };
    }

    this.logger.debug({ typeName, bytes: position }, 'extracted message');
    return { message, consumed: position };
  }

  private parseEnvelope(line: Buffer): [string, WireAttributes] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.decoder.decode(line));
    } catch (error) {
      throw new MalformedEnvelopeError('line is not UTF-8 encoded JSON', { cause: error });
    }

    if (!Array.isArray(parsed) || parsed.length !== 2) {
      throw new MalformedEnvelopeError('expected a [typeName, attributes] array');
    }

    const typeName: unknown = parsed[0];
    const attributes: unknown = parsed[1];
    if (typeof typeName !== 'string') {
      throw new MalformedEnvelopeError('type name is not a string');
    }
    if (!isWireAttributes(attributes)) {
      throw new MalformedEnvelopeError(`attributes of '${typeName}' are not an object`);
    }

    return [typeName, attributes];
  }
}

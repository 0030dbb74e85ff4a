/**
 * Registry mapping wire keys to message constructors.
 *
 * Each encoding owns its own registry instance; codecs receive the registry
 * they decode against instead of reaching for process-wide state.
 *
 * @module protocol/registry
 */

import type { MessageKey } from '../types.js';
import { UnknownMessageTypeError } from '../types.js';
import { createLogger, type Logger } from '../logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Constructor producing an empty message instance.
 */
export type MessageConstructor<M> = new () => M;

/**
 * Options for a MessageRegistry.
 */
export interface MessageRegistryOptions<K extends MessageKey, C> {
  /** Derives the wire key of a constructor for registerType()/registerAll() */
  readonly keyOf: (ctor: C) => K;

  /** Rejects keys that cannot appear on the wire; throws to refuse */
  readonly validateKey?: (key: K) => void;

  /** Logger (defaults to a `registry` child of the root logger) */
  readonly logger?: Logger;
}

// =============================================================================
// MessageRegistry Class
// =============================================================================

/**
 * Maps wire keys to the constructors decoders instantiate.
 *
 * Registering a key that is already present replaces the previous entry;
 * the last registration wins.
 *
 * @example
 * ```typescript
 * const registry = new MessageRegistry<number, ByteMessageClass>({
 *   keyOf: (ctor) => new ctor().code,
 * });
 * registry.registerAll([Identify, Join]);
 * const ctor = registry.resolve(1);
 * ```
 */
export class MessageRegistry<K extends MessageKey, C> {
  private readonly types = new Map<K, C>();
  private readonly keyOf: (ctor: C) => K;
  private readonly validateKey: ((key: K) => void) | undefined;
  private readonly logger: Logger;

  constructor(options: MessageRegistryOptions<K, C>) {
    this.keyOf = options.keyOf;
    this.validateKey = options.validateKey;
    this.logger = options.logger ?? createLogger('registry');
  }

  /**
   * Number of registered keys.
   */
  get size(): number {
    return this.types.size;
  }

  /**
   * Maps a key to a constructor, replacing any previous mapping.
   */
  register(key: K, ctor: C): this {
    this.validateKey?.(key);

    const previous = this.types.get(key);
    if (previous !== undefined && previous !== ctor) {
      this.logger.debug({ key }, 'replacing registered message type');
    }

    this.types.set(key, ctor);
    return this;
  }

  /**
   * Registers a constructor under the key derived from it.
   */
  registerType(ctor: C): this {
    return this.register(this.keyOf(ctor), ctor);
  }

  /**
   * Registers every constructor in the iterable.
   *
   * Running it again with the same constructors leaves the table unchanged.
   */
  registerAll(ctors: Iterable<C>): this {
    for (const ctor of ctors) {
      this.registerType(ctor);
    }
    return this;
  }

  /**
   * Returns the constructor registered for a key.
   *
   * @throws {UnknownMessageTypeError} If nothing is registered under the key
   */
  resolve(key: K): C {
    const ctor = this.types.get(key);
    if (ctor === undefined) {
      throw new UnknownMessageTypeError(key);
    }
    return ctor;
  }

  /**
   * Checks whether a key is registered.
   */
  has(key: K): boolean {
    return this.types.has(key);
  }

  /**
   * Returns the registered keys in registration order.
   */
  keys(): K[] {
    return Array.from(this.types.keys());
  }
}

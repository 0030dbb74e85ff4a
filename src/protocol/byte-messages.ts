/**
 * Built-in byte-encoded messages.
 *
 * @module protocol/byte-messages
 */

import { TextDecoder } from 'node:util';

import { ByteMessage, type ByteMessageClass } from './byte-codec.js';
import { currentHostname, currentUsername } from './identity.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Announces who is on the other end of a connection.
 *
 * Payload: UTF-8 `username@hostname`, split at the first '@'.
 */
export class Identify extends ByteMessage {
  username: string;
  hostname: string;

  constructor(username?: string, hostname?: string) {
    super();
    this.username = username ?? currentUsername();
    this.hostname = hostname ?? currentHostname();
  }

  get code(): number {
    return 0x01;
  }

  override encodePayload(): Uint8Array {
    return Buffer.from(`${this.username}@${this.hostname}`, 'utf-8');
  }

  override decodePayload(payload: Buffer): void {
    const text = utf8.decode(payload);
    const separator = text.indexOf('@');
    if (separator < 0) {
      throw new Error(`identify payload '${text}' has no '@' separator`);
    }
    this.username = text.slice(0, separator);
    this.hostname = text.slice(separator + 1);
  }
}

export class Join extends ByteMessage {
  get code(): number {
    return 0x02;
  }
}

export class Retry extends ByteMessage {
  get code(): number {
    return 0x03;
  }
}

export class Quit extends ByteMessage {
  get code(): number {
    return 0x04;
  }
}

/**
 * Every built-in byte message type.
 */
export const BYTE_MESSAGE_TYPES: readonly ByteMessageClass[] = [Identify, Join, Retry, Quit];

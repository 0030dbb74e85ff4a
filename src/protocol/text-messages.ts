/**
 * Built-in text-encoded messages.
 *
 * @module protocol/text-messages
 */

import { TextMessage, type TextMessageClass } from './text-codec.js';
import { currentHostname, currentUsername } from './identity.js';

/**
 * Announces who is on the other end of a connection.
 */
export class MsgIdentify extends TextMessage {
  username: string;
  hostname: string;

  constructor(username?: string, hostname?: string) {
    super();
    this.username = username ?? currentUsername();
    this.hostname = hostname ?? currentHostname();
  }

  get typeName(): string {
    return 'MsgIdentify';
  }
}

export class MsgJoin extends TextMessage {
  get typeName(): string {
    return 'MsgJoin';
  }
}

export class MsgRetry extends TextMessage {
  get typeName(): string {
    return 'MsgRetry';
  }
}

export class MsgQuit extends TextMessage {
  get typeName(): string {
    return 'MsgQuit';
  }
}

/**
 * Every built-in text message type.
 */
export const TEXT_MESSAGE_TYPES: readonly TextMessageClass[] = [MsgIdentify, MsgJoin, MsgRetry, MsgQuit];

/**
 * Poll-driven message transport over connected stream sockets.
 *
 * @module transport
 *
 * @example
 * ```typescript
 * import { Messenger, createCodec, Identify } from 'lanwire';
 *
 * const messenger = new Messenger(socket, createCodec('byte'));
 * messenger.send(new Identify());
 * messenger.pump();
 * const reply = messenger.receive();
 * ```
 */

export {
  ChannelError,
  NetSocketChannel,
  isSocketChannel,
  type ChannelErrorCode,
  type SocketChannel,
  type SocketReadiness,
} from './socket-channel.js';

export { Messenger, type MessengerOptions, type MessengerStats } from './messenger.js';

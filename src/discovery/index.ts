/**
 * LAN peer discovery and loopback connection helpers.
 *
 * @module discovery
 */

export {
  BroadcastConnector,
  resolveDiscoveryConfig,
  type DiscoveryConfig,
  type DiscoveryEvents,
  type OnConnectHandler,
  type ResolvedDiscoveryConfig,
} from './broadcast-connector.js';

export { PeerTable, normalizeAddress } from './peer-table.js';

export { resolveLocalAddress, type LocalAddressOptions } from './local-address.js';

export { LoopbackClient, LoopbackServer, type LoopbackOptions } from './loopback.js';

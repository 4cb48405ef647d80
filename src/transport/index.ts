/**
 * Client-side datagram transport.
 *
 * One dedicated connected socket per destination, a pool that tracks them
 * for shutdown, and an endpoint that the protocol engine talks to.
 *
 * @module transport
 *
 * @example
 * ```typescript
 * import { TransportEndpoint } from 'dgram-client-transport/transport';
 *
 * const endpoint = new TransportEndpoint({ codec, onMessage, onError });
 * message.remote = await endpoint.determineRemote(message);
 * endpoint.send(message);
 * await endpoint.shutdown();
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type {
  RemoteAddress,
  PeerAddress,
  Message,
  MessageOptions,
  MessageCodec,
  Logger,
  ConnectionId,
  ConnectionStage,
  ConnectionHandler,
  ConnectionEventSink,
} from './types.js';

export {
  TRANSPORT_DEFAULTS,
  InvalidRemoteError,
  UnparsableMessageError,
  ConnectError,
  PoolClosedError,
  ConnectionStateError,
} from './types.js';

// =============================================================================
// Addresses
// =============================================================================

export { HostPort, type HostPortComponents } from './host-port.js';

// =============================================================================
// Sockets
// =============================================================================

export type { SocketProvider, SocketEventSink, DatagramSocket } from './socket-provider.js';

export {
  UdpSocketProvider,
  type UdpSocketProviderConfig,
  type UdpLookup,
  type AddressFamily,
  type ResolvedAddress,
} from './udp-socket-provider.js';

export {
  MemorySocketProvider,
  MemoryDatagramSocket,
  type MemorySocketProviderConfig,
  type MemoryLookup,
} from './memory-socket-provider.js';

// =============================================================================
// Connections
// =============================================================================

export {
  Connection,
  type ConnectionConfig,
  type ConnectionStats,
} from './connection.js';

export {
  ConnectionPool,
  type ConnectionPoolState,
  type ConnectionPoolConfig,
  type ConnectionPoolEvents,
  type ConnectionPoolStats,
} from './connection-pool.js';

// =============================================================================
// Endpoint
// =============================================================================

export {
  TransportEndpoint,
  type TransportEndpointState,
  type TransportEndpointConfig,
  type TransportEndpointStats,
  type MessageHandler,
  type SocketErrorHandler,
} from './endpoint.js';

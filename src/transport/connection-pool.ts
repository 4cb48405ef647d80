/**
 * Factory and registry for outgoing connections.
 *
 * Every `connect()` creates a new socket; nothing is shared or looked up by
 * address. The registry exists so that `shutdown()` can reach every live
 * connection.
 *
 * @module transport/connection-pool
 */

import { EventEmitter } from 'node:events';

import type {
  ConnectionEventSink,
  ConnectionHandler,
  ConnectionId,
  Logger,
  RemoteAddress,
} from './types.js';
import { ConnectError, PoolClosedError, TRANSPORT_DEFAULTS } from './types.js';
import { Connection } from './connection.js';
import type { SocketProvider } from './socket-provider.js';
import { UdpSocketProvider } from './udp-socket-provider.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Pool state. Once closing, no connection can be added.
 */
export type ConnectionPoolState = 'open' | 'closing' | 'closed';

/**
 * Configuration for a connection pool.
 */
export interface ConnectionPoolConfig {
  /** Creates sockets; defaults to a {@link UdpSocketProvider} */
  readonly socketProvider?: SocketProvider;

  /** Port omitted from a connection's `hostinfo` */
  readonly defaultPort?: number;

  readonly logger?: Logger;
}

/**
 * Events emitted by ConnectionPool.
 */
export interface ConnectionPoolEvents {
  /** Emitted when a connection became ready and was registered */
  connectionEstablished: [connection: Connection];

  /** Emitted when a registered connection was destroyed */
  connectionClosed: [connection: Connection];
}

/**
 * Statistics for a connection pool.
 */
export interface ConnectionPoolStats {
  readonly state: ConnectionPoolState;

  /** Registered connections */
  readonly activeConnections: number;

  /** Connections waiting for their socket to become ready */
  readonly pendingConnections: number;

  /** Connections that ever became ready */
  readonly totalOpened: number;

  /** Connections whose socket failed before becoming ready */
  readonly totalFailed: number;
}

interface PendingConnect {
  readonly connection: Connection;
  readonly reject: (error: Error) => void;
}

// =============================================================================
// ConnectionPool Class
// =============================================================================

/**
 * Creates and tracks connections for a transport endpoint.
 *
 * @example
 * ```typescript
 * const pool = new ConnectionPool({ socketProvider: new UdpSocketProvider() });
 *
 * const a = await pool.connect({ host: 'node1.example', port: 5683 }, handler);
 * const b = await pool.connect({ host: 'node1.example', port: 5683 }, handler);
 * // a !== b
 *
 * await pool.shutdown();
 * ```
 */
export class ConnectionPool extends EventEmitter<ConnectionPoolEvents> {
  private state: ConnectionPoolState = 'open';
  private readonly connections = new Map<ConnectionId, Connection>();
  private readonly pending = new Map<ConnectionId, PendingConnect>();
  private shutdownPromise: Promise<void> | null = null;

  private readonly config: Required<ConnectionPoolConfig>;

  // Statistics
  private totalOpened = 0;
  private totalFailed = 0;

  constructor(config: ConnectionPoolConfig = {}) {
    super();

    this.config = {
      socketProvider: config.socketProvider ?? new UdpSocketProvider(),
      defaultPort: config.defaultPort ?? TRANSPORT_DEFAULTS.PORT,
      logger: config.logger ?? console,
    };
  }

  /**
   * Returns the current pool state.
   */
  getState(): ConnectionPoolState {
    return this.state;
  }

  /**
   * Returns the registered connections.
   */
  getConnections(): readonly Connection[] {
    return Array.from(this.connections.values());
  }

  /**
   * Returns pool statistics.
   */
  getStats(): ConnectionPoolStats {
    return {
      state: this.state,
      activeConnections: this.connections.size,
      pendingConnections: this.pending.size,
      totalOpened: this.totalOpened,
      totalFailed: this.totalFailed,
    };
  }

  /**
   * Creates a new connection to `remote` and waits until it is ready.
   *
   * Two calls for the same remote yield two independent connections.
   * There is no timeout; a connect that never becomes ready is only
   * released by `shutdown()`.
   *
   * @param remote - Destination; the host may be an unresolved name
   * @param handler - Receives the connection's datagrams and socket errors
   * @returns The ready, registered connection
   * @throws {PoolClosedError} If the pool is closing or closed
   * @throws {ConnectError} If the socket fails before becoming ready
   */
  connect(remote: RemoteAddress, handler: ConnectionHandler): Promise<Connection> {
    if (this.state !== 'open') {
      return Promise.reject(new PoolClosedError());
    }

    return new Promise((resolve, reject) => {
      const sink: ConnectionEventSink = {
        onReady: (connection) => {
          this.pending.delete(connection.id);
          this.connections.set(connection.id, connection);
          this.totalOpened++;
          this.emit('connectionEstablished', connection);
          resolve(connection);
        },

        onDatagram: (connection, data) => handler.onDatagram(connection, data),

        onSocketError: (connection, err) => {
          if (connection.getStage() === 'initializing') {
            this.failPending(connection, err);
            return;
          }
          handler.onSocketError(connection, err);
        },

        onDestroyed: (connection) => {
          if (this.pending.has(connection.id)) {
            this.failPending(connection, new Error('socket closed before becoming ready'));
            return;
          }
          if (this.connections.delete(connection.id)) {
            this.emit('connectionClosed', connection);
          }
        },
      };

      const connection = new Connection({
        remote,
        sink,
        socketProvider: this.config.socketProvider,
        defaultPort: this.config.defaultPort,
      });

      this.pending.set(connection.id, { connection, reject });
    });
  }

  /**
   * Shuts down every connection and closes the pool.
   *
   * Pending connects are rejected with {@link PoolClosedError}. Calling this
   * again returns the same promise.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.state = 'closing';

    const shutdowns: Promise<void>[] = [];

    for (const { connection, reject } of this.pending.values()) {
      reject(new PoolClosedError());
      shutdowns.push(connection.shutdown());
    }
    this.pending.clear();

    for (const connection of this.connections.values()) {
      if (connection.isOpen()) {
        shutdowns.push(connection.shutdown());
      }
    }

    this.shutdownPromise = Promise.all(shutdowns)
      .then(() => undefined)
      .finally(() => {
        this.connections.clear();
        this.state = 'closed';
      });

    return this.shutdownPromise;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private failPending(connection: Connection, err: Error): void {
    const entry = this.pending.get(connection.id);
    if (!entry) {
      return;
    }

    this.pending.delete(connection.id);
    this.totalFailed++;
    entry.reject(new ConnectError(connection.getRemote(), err));

    if (connection.isOpen()) {
      connection.shutdown().catch((shutdownErr: unknown) => {
        this.config.logger.warn(`Failed to release ${connection.toString()}:`, shutdownErr);
      });
    }
  }
}

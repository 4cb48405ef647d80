/**
 * Outgoing datagram connection to a single remote.
 *
 * Adapts the raw socket event stream (ready, data, error, closed) of one
 * exclusively owned socket into the calls of a {@link ConnectionEventSink},
 * and tracks a lifecycle stage for diagnostics.
 *
 * @module transport/connection
 */

import type {
  ConnectionEventSink,
  ConnectionId,
  ConnectionStage,
  PeerAddress,
  RemoteAddress,
} from './types.js';
import { ConnectionStateError, TRANSPORT_DEFAULTS } from './types.js';
import { HostPort } from './host-port.js';
import type { DatagramSocket, SocketEventSink, SocketProvider } from './socket-provider.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for a connection.
 */
export interface ConnectionConfig {
  /** Destination, as requested */
  readonly remote: RemoteAddress;

  /** Receiver of the connection's events */
  readonly sink: ConnectionEventSink;

  /** Creates the underlying socket */
  readonly socketProvider: SocketProvider;

  /** Port omitted from `hostinfo` */
  readonly defaultPort?: number;
}

/**
 * Statistics for a connection.
 */
export interface ConnectionStats {
  readonly id: ConnectionId;
  readonly stage: ConnectionStage;
  readonly remote: RemoteAddress;

  readonly datagramsSent: number;
  readonly datagramsReceived: number;
  readonly bytesSent: number;
  readonly bytesReceived: number;

  /** Datagrams discarded because the connection was not active */
  readonly datagramsDropped: number;

  /** Socket errors reported to the sink */
  readonly errors: number;

  readonly activatedAt: number | null;
  readonly lastSentAt: number | null;
  readonly lastReceivedAt: number | null;
}

let connectionCounter = 0;

function nextConnectionId(): ConnectionId {
  connectionCounter++;
  return `conn-${connectionCounter}` as ConnectionId;
}

// =============================================================================
// Connection Class
// =============================================================================

/**
 * A dedicated datagram socket bound to one remote address.
 *
 * Connections are created by the {@link ConnectionPool}; the sink's
 * `onReady` is the signal that the socket is bound. Message and error
 * callbacks only fire while the stage is `initializing` or `active`.
 *
 * @example
 * ```typescript
 * const connection = await pool.connect({ host: 'node1.example', port: 5683 }, handler);
 * connection.send(bytes);
 * console.log(connection.hostinfo); // 'node1.example'
 * await connection.shutdown();
 * ```
 */
export class Connection {
  readonly id: ConnectionId = nextConnectionId();

  private stage: ConnectionStage = 'initializing';
  private sink: ConnectionEventSink | null;
  private peer: PeerAddress | null = null;

  private readonly remote: RemoteAddress;
  private readonly defaultPort: number;
  private readonly socket: DatagramSocket;

  // Statistics
  private datagramsSent = 0;
  private datagramsReceived = 0;
  private bytesSent = 0;
  private bytesReceived = 0;
  private datagramsDropped = 0;
  private errors = 0;
  private activatedAt: number | null = null;
  private lastSentAt: number | null = null;
  private lastReceivedAt: number | null = null;

  constructor(config: ConnectionConfig) {
    this.remote = config.remote;
    this.sink = config.sink;
    this.defaultPort = config.defaultPort ?? TRANSPORT_DEFAULTS.PORT;
    this.socket = config.socketProvider.createSocket(config.remote, this.createSocketSink());
  }

  /**
   * Returns the current lifecycle stage.
   */
  getStage(): ConnectionStage {
    return this.stage;
  }

  /**
   * Whether shutdown has not begun yet.
   */
  isOpen(): boolean {
    return this.stage === 'initializing' || this.stage === 'active';
  }

  /**
   * Returns the destination this connection was requested for.
   */
  getRemote(): RemoteAddress {
    return this.remote;
  }

  /**
   * Returns connection statistics.
   */
  getStats(): ConnectionStats {
    return {
      id: this.id,
      stage: this.stage,
      remote: this.remote,
      datagramsSent: this.datagramsSent,
      datagramsReceived: this.datagramsReceived,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      datagramsDropped: this.datagramsDropped,
      errors: this.errors,
      activatedAt: this.activatedAt,
      lastSentAt: this.lastSentAt,
      lastReceivedAt: this.lastReceivedAt,
    };
  }

  // ===========================================================================
  // Address interface
  // ===========================================================================

  get isMulticast(): boolean {
    return false;
  }

  /**
   * Peer address as reported by the socket.
   *
   * @throws {ConnectionStateError} Before the socket is ready
   */
  get peerAddress(): PeerAddress {
    if (this.peer === null) {
      throw new ConnectionStateError(this.id, this.stage, 'read the address of');
    }
    return this.peer;
  }

  get remoteHost(): string {
    return this.peerAddress.address;
  }

  get remotePort(): number {
    return this.peerAddress.port;
  }

  /**
   * `host` or `host:port`; the port is left out when it is the default port.
   */
  get hostinfo(): string {
    const { address, port } = this.peerAddress;
    return HostPort.join(address, port === this.defaultPort ? undefined : port);
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  /**
   * Sends one datagram to the remote.
   *
   * Datagrams sent while the connection is not active are dropped.
   */
  send(data: Uint8Array): void {
    if (this.stage !== 'active') {
      this.datagramsDropped++;
      return;
    }

    this.socket.send(data);
    this.datagramsSent++;
    this.bytesSent += data.length;
    this.lastSentAt = Date.now();
  }

  /**
   * Releases the socket.
   *
   * The sink receives no datagram or error after this is called; its
   * `onDestroyed` is called once the socket is closed.
   *
   * @throws {ConnectionStateError} If shutdown has already begun
   */
  async shutdown(): Promise<void> {
    if (!this.isOpen()) {
      throw new ConnectionStateError(this.id, this.stage, 'shut down');
    }

    this.stage = 'shutting_down';
    const sink = this.sink;
    this.sink = null;

    await this.socket.close();

    this.stage = 'destroyed';
    sink?.onDestroyed(this);
  }

  toString(): string {
    const where = this.peer === null
      ? HostPort.join(this.remote.host, this.remote.port)
      : HostPort.join(this.peer.address, this.peer.port);
    return `<Connection ${this.id} to ${where}, ${this.stage}>`;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private createSocketSink(): SocketEventSink {
    return {
      onReady: () => this.handleReady(),
      onData: (data) => this.handleData(data),
      onError: (err) => this.handleError(err),
      onClosed: (err) => this.handleClosed(err),
    };
  }

  private handleReady(): void {
    if (this.stage !== 'initializing' || this.sink === null) {
      return;
    }

    this.peer = this.socket.remoteAddress();
    this.stage = 'active';
    this.activatedAt = Date.now();
    this.sink.onReady(this);
  }

  private handleData(data: Uint8Array): void {
    if (this.stage !== 'active' || this.sink === null) {
      this.datagramsDropped++;
      return;
    }

    this.datagramsReceived++;
    this.bytesReceived += data.length;
    this.lastReceivedAt = Date.now();
    this.sink.onDatagram(this, data);
  }

  private handleError(err: Error): void {
    if (this.sink === null) {
      return;
    }

    this.errors++;
    this.sink.onSocketError(this, err);
  }

  private handleClosed(err: Error | undefined): void {
    // Closes we initiated are handled by shutdown()
    if (!this.isOpen()) {
      return;
    }

    if (err) {
      this.handleError(err);
      // The sink may have shut us down while handling the error
      if (!this.isOpen()) {
        return;
      }
    }

    this.stage = 'shutting_down';
    const sink = this.sink;
    this.sink = null;
    this.stage = 'destroyed';
    sink?.onDestroyed(this);
  }
}

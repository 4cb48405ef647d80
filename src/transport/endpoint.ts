/**
 * Transport endpoint used by the protocol engine.
 *
 * Resolves a message's destination into a dedicated {@link Connection},
 * decodes inbound datagrams into messages and forwards socket errors. The
 * endpoint only does client-side work: it never listens.
 *
 * @module transport/endpoint
 */

import type {
  ConnectionHandler,
  Logger,
  Message,
  MessageCodec,
  RemoteAddress,
} from './types.js';
import { InvalidRemoteError, TRANSPORT_DEFAULTS, UnparsableMessageError } from './types.js';
import { Connection } from './connection.js';
import { ConnectionPool } from './connection-pool.js';
import { HostPort } from './host-port.js';
import type { SocketProvider } from './socket-provider.js';
import { UdpSocketProvider } from './udp-socket-provider.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Endpoint state.
 */
export type TransportEndpointState = 'running' | 'stopping' | 'stopped';

/**
 * Called with every successfully decoded inbound message.
 */
export type MessageHandler<M extends Message> = (message: M) => void;

/**
 * Called with every socket-level error, tagged with the connection it
 * happened on.
 */
export type SocketErrorHandler = (code: string, remote: Connection, error: Error) => void;

/**
 * Configuration for a transport endpoint.
 */
export interface TransportEndpointConfig<M extends Message> {
  readonly codec: MessageCodec<M>;
  readonly onMessage: MessageHandler<M>;
  readonly onError: SocketErrorHandler;

  /** Receives reports about dropped datagrams; defaults to `console` */
  readonly logger?: Logger;

  /** Creates sockets; defaults to a {@link UdpSocketProvider} */
  readonly socketProvider?: SocketProvider;

  /** Port used when a destination names none */
  readonly defaultPort?: number;

  /** The only scheme this endpoint accepts */
  readonly scheme?: string;
}

/**
 * Statistics for a transport endpoint.
 */
export interface TransportEndpointStats {
  readonly state: TransportEndpointState;
  readonly messagesSent: number;
  readonly messagesReceived: number;

  /** Inbound datagrams dropped because they could not be decoded */
  readonly unparsableDropped: number;

  /** Inbound events dropped because the codec or an engine callback threw */
  readonly dispatchFailures: number;

  readonly errorsForwarded: number;
}

/**
 * Extracts the error code of a socket error.
 */
function errorCode(error: Error): string {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return TRANSPORT_DEFAULTS.UNKNOWN_ERROR_CODE;
}

// =============================================================================
// TransportEndpoint Class
// =============================================================================

/**
 * Client-side datagram transport endpoint.
 *
 * @example
 * ```typescript
 * const endpoint = new TransportEndpoint({
 *   codec,
 *   onMessage: (message) => engine.receive(message),
 *   onError: (code, remote) => engine.fail(code, remote),
 * });
 *
 * const request = { unresolvedRemote: 'node1.example:5001', opt: {}, payload };
 * request.remote = await endpoint.determineRemote(request);
 * endpoint.send(request);
 *
 * await endpoint.shutdown();
 * ```
 */
export class TransportEndpoint<M extends Message = Message> implements ConnectionHandler {
  private state: TransportEndpointState = 'running';
  private onMessage: MessageHandler<M> | null;
  private onError: SocketErrorHandler | null;

  private readonly codec: MessageCodec<M>;
  private readonly logger: Logger;
  private readonly defaultPort: number;
  private readonly scheme: string;
  private readonly pool: ConnectionPool;

  // Statistics
  private messagesSent = 0;
  private messagesReceived = 0;
  private unparsableDropped = 0;
  private dispatchFailures = 0;
  private errorsForwarded = 0;

  constructor(config: TransportEndpointConfig<M>) {
    this.codec = config.codec;
    this.onMessage = config.onMessage;
    this.onError = config.onError;
    this.logger = config.logger ?? console;
    this.defaultPort = config.defaultPort ?? TRANSPORT_DEFAULTS.PORT;
    this.scheme = config.scheme ?? TRANSPORT_DEFAULTS.SCHEME;

    this.pool = new ConnectionPool({
      socketProvider: config.socketProvider ?? new UdpSocketProvider(),
      defaultPort: this.defaultPort,
      logger: this.logger,
    });
  }

  /**
   * Returns the current endpoint state.
   */
  getState(): TransportEndpointState {
    return this.state;
  }

  /**
   * Returns the pool holding this endpoint's connections.
   */
  getPool(): ConnectionPool {
    return this.pool;
  }

  /**
   * Returns endpoint statistics.
   */
  getStats(): TransportEndpointStats {
    return {
      state: this.state,
      messagesSent: this.messagesSent,
      messagesReceived: this.messagesReceived,
      unparsableDropped: this.unparsableDropped,
      dispatchFailures: this.dispatchFailures,
      errorsForwarded: this.errorsForwarded,
    };
  }

  /**
   * Obtains a new connection for the message's destination.
   *
   * The destination is taken from `message.unresolvedRemote` if present,
   * otherwise from the `uriHost`/`uriPort` options.
   *
   * @returns The connection, or undefined if the message asks for a scheme
   *          this endpoint does not serve
   * @throws {InvalidRemoteError} If no host can be derived from the message,
   *         or its port is not a usable UDP port
   * @throws {PoolClosedError} If the endpoint has been shut down
   * @throws {ConnectError} If the socket fails before becoming ready
   */
  async determineRemote(message: M): Promise<Connection | undefined> {
    if (message.requestedScheme !== undefined && message.requestedScheme !== this.scheme) {
      return undefined;
    }

    const remote = this.resolveDestination(message);
    return this.pool.connect(remote, this);
  }

  /**
   * Encodes the message and sends it over the connection attached to it.
   *
   * @throws {InvalidRemoteError} If the message carries no connection
   */
  send(message: M): void {
    const connection = message.remote;
    if (!(connection instanceof Connection)) {
      throw new InvalidRemoteError(undefined, 'message has no resolved remote; call determineRemote() first');
    }

    connection.send(this.codec.encode(message));
    this.messagesSent++;
  }

  /**
   * Shuts down every connection. No message or error is dispatched
   * afterwards.
   */
  async shutdown(): Promise<void> {
    this.state = 'stopping';
    try {
      await this.pool.shutdown();
    } finally {
      this.onMessage = null;
      this.onError = null;
      this.state = 'stopped';
    }
  }

  // ===========================================================================
  // Inbound dispatch
  // ===========================================================================

  /**
   * Decodes a datagram received on `connection` and hands it to the engine.
   *
   * Datagrams that are not well-formed messages are logged and dropped.
   * This runs inside the socket's event listener, so a codec or engine
   * failure is logged and the datagram dropped; it never reaches the
   * event loop.
   */
  onDatagram(connection: Connection, data: Uint8Array): void {
    const onMessage = this.onMessage;
    if (onMessage === null) {
      return;
    }

    let message: M;
    try {
      message = this.codec.decode(data, connection);
    } catch (err) {
      if (err instanceof UnparsableMessageError) {
        this.unparsableDropped++;
        this.logger.warn(`Ignoring unparsable message from ${connection.toString()}: ${err.reason}`);
        return;
      }
      this.dispatchFailures++;
      this.logger.error(`Codec failed on a datagram from ${connection.toString()}:`, err);
      return;
    }

    this.messagesReceived++;
    try {
      onMessage(message);
    } catch (err) {
      this.dispatchFailures++;
      this.logger.error(`Message handler failed for a message from ${connection.toString()}:`, err);
    }
  }

  /**
   * Forwards a socket error to the engine.
   */
  onSocketError(connection: Connection, error: Error): void {
    const onError = this.onError;
    if (onError === null) {
      return;
    }

    this.errorsForwarded++;
    try {
      onError(errorCode(error), connection, error);
    } catch (err) {
      this.dispatchFailures++;
      this.logger.error(`Error handler failed for ${connection.toString()}:`, err);
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private resolveDestination(message: M): RemoteAddress {
    if (message.unresolvedRemote !== undefined) {
      const { host, port } = HostPort.split(message.unresolvedRemote);
      return { host, port: port ?? this.defaultPort };
    }

    const { uriHost, uriPort } = message.opt;
    if (uriHost !== undefined && uriHost.length > 0) {
      const host = uriHost.toLowerCase();
      // An absent or zero Uri-Port means the default port
      const port = uriPort === undefined || uriPort === 0
        ? this.defaultPort
        : HostPort.validatePort(uriPort, HostPort.join(host, uriPort));
      return { host, port };
    }

    throw new InvalidRemoteError(
      undefined,
      'no location found to send message to (neither uriHost option nor unresolved remote)',
    );
  }
}

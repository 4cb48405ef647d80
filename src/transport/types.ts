/**
 * Shared types, defaults and error classes for the datagram transport.
 *
 * @module transport/types
 */

import type { Connection } from './connection.js';

// =============================================================================
// Addresses
// =============================================================================

/**
 * A destination as requested by the caller.
 *
 * The host does not need to be resolved; resolution is left to the
 * socket provider.
 */
export interface RemoteAddress {
  readonly host: string;
  readonly port: number;
}

/**
 * The peer address a socket actually got connected to.
 */
export interface PeerAddress {
  readonly address: string;
  readonly port: number;
  readonly family: 'IPv4' | 'IPv6';
}

// =============================================================================
// Messages
// =============================================================================

/**
 * Protocol options consulted when no unresolved remote is present.
 */
export interface MessageOptions {
  readonly uriHost?: string | undefined;
  readonly uriPort?: number | undefined;
}

/**
 * The slice of a protocol message the transport reads and writes.
 *
 * Everything else about a message belongs to the codec and the
 * protocol engine.
 */
export interface Message {
  /** Scheme the engine wants to use (e.g. `coap`, `coaps`) */
  readonly requestedScheme?: string | undefined;

  /** Textual `host[:port]` destination, not yet bound to a connection */
  readonly unresolvedRemote?: string | undefined;

  /** Connection obtained from `determineRemote`, or attached on receive */
  remote?: Connection | undefined;

  readonly opt: MessageOptions;
}

/**
 * Wire codec owned by the protocol engine.
 *
 * `decode` must throw {@link UnparsableMessageError} for bytes that are not
 * a well-formed message.
 */
export interface MessageCodec<M extends Message = Message> {
  encode(message: M): Uint8Array;
  decode(data: Uint8Array, remote: Connection): M;
}

// =============================================================================
// Logging
// =============================================================================

/**
 * Log sink. The global `console` satisfies it.
 */
export interface Logger {
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// =============================================================================
// Connections
// =============================================================================

declare const ConnectionIdBrand: unique symbol;

/**
 * Stable identity of a connection within the process.
 */
export type ConnectionId = string & { readonly [ConnectionIdBrand]: 'ConnectionId' };

/**
 * Connection lifecycle stage. Transitions only move forward.
 */
export type ConnectionStage = 'initializing' | 'active' | 'shutting_down' | 'destroyed';

/**
 * Receiver of a connection's inbound traffic.
 */
export interface ConnectionHandler {
  onDatagram(connection: Connection, data: Uint8Array): void;
  onSocketError(connection: Connection, error: Error): void;
}

/**
 * Everything a connection reports during its life.
 *
 * `onReady` fires once, before any datagram or error. `onDestroyed` fires
 * once, last.
 */
export interface ConnectionEventSink extends ConnectionHandler {
  onReady(connection: Connection): void;
  onDestroyed(connection: Connection): void;
}

// =============================================================================
// Default Configuration Values
// =============================================================================

export const TRANSPORT_DEFAULTS = {
  /** Well-known protocol port, omitted from formatted host info */
  PORT: 5683,

  /** Scheme handled by this transport */
  SCHEME: 'coap',

  /** Address family asked of the resolver for hostnames; 0 takes either */
  ADDRESS_FAMILY: 0,

  /** Error code reported when a socket error carries none */
  UNKNOWN_ERROR_CODE: 'EUNKNOWN',
} as const;

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error thrown when no usable destination can be derived from a message
 * or a remote string.
 */
export class InvalidRemoteError extends Error {
  override readonly name = 'InvalidRemoteError' as const;

  constructor(
    readonly value: string | undefined,
    readonly reason: string,
  ) {
    super(value === undefined ? `Invalid remote: ${reason}` : `Invalid remote '${value}': ${reason}`);
  }
}

/**
 * Error a codec throws for bytes that are not a well-formed message.
 */
export class UnparsableMessageError extends Error {
  override readonly name = 'UnparsableMessageError' as const;

  constructor(readonly reason: string) {
    super(`Unparsable message: ${reason}`);
  }
}

/**
 * Error thrown when a socket fails before it becomes ready.
 */
export class ConnectError extends Error {
  override readonly name = 'ConnectError' as const;
  override readonly cause: Error;

  constructor(
    readonly remote: RemoteAddress,
    cause: Error,
  ) {
    super(`Failed to connect to ${remote.host}:${remote.port}: ${cause.message}`);
    this.cause = cause;
  }
}

/**
 * Error thrown when a connection is requested from a pool that is shutting
 * down or has shut down.
 */
export class PoolClosedError extends Error {
  override readonly name = 'PoolClosedError' as const;

  constructor() {
    super('Connection pool has been shut down');
  }
}

/**
 * Error thrown when a connection operation is not valid in its current stage.
 */
export class ConnectionStateError extends Error {
  override readonly name = 'ConnectionStateError' as const;

  constructor(
    readonly connectionId: ConnectionId,
    readonly stage: ConnectionStage,
    readonly operation: string,
  ) {
    super(`Cannot ${operation} connection '${connectionId}' in ${stage} stage`);
  }
}

/**
 * Socket abstraction the connections are built on.
 *
 * Connections never touch `node:dgram` directly; they ask a
 * {@link SocketProvider} for a socket. `UdpSocketProvider` is the production
 * implementation and `MemorySocketProvider` the in-process one.
 *
 * @module transport/socket-provider
 */

import type { PeerAddress, RemoteAddress } from './types.js';

/**
 * Receiver of raw socket events.
 */
export interface SocketEventSink {
  /** The socket is connected to its remote and may send and receive */
  onReady(): void;

  /** A datagram arrived from the remote */
  onData(data: Uint8Array): void;

  /** The socket reported an error */
  onError(error: Error): void;

  /** The socket closed; `error` is set when it closed because of one */
  onClosed(error?: Error): void;
}

/**
 * An outgoing datagram socket connected to a single remote.
 */
export interface DatagramSocket {
  send(data: Uint8Array): void;

  /** Releases the socket. Resolves once it is closed. */
  close(): Promise<void>;

  /** Address the socket is connected to. Only valid after `onReady`. */
  remoteAddress(): PeerAddress;
}

/**
 * Creates connected datagram sockets.
 *
 * Implementations must not call into the sink synchronously from
 * `createSocket`; the first event is delivered on a later tick.
 */
export interface SocketProvider {
  createSocket(remote: RemoteAddress, sink: SocketEventSink): DatagramSocket;
}

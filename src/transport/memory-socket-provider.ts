/**
 * In-process socket provider.
 *
 * Sockets created here never touch the network. Outgoing datagrams are
 * recorded and handed to an optional `onSend` hook; inbound traffic,
 * errors and closes are injected by the owner. Events are delivered on
 * a later tick, like real sockets.
 *
 * Injected events are forwarded to the sink even after `close()`, so a
 * consumer's own guards against late socket events can be exercised.
 *
 * @module transport/memory-socket-provider
 */

import * as net from 'node:net';

import type { PeerAddress, RemoteAddress } from './types.js';
import type { DatagramSocket, SocketEventSink, SocketProvider } from './socket-provider.js';

/**
 * Result of a lookup: the address to connect to, or the error to fail with.
 */
export type MemoryLookup = (host: string) => string | Error;

/**
 * Configuration for the in-memory socket provider.
 */
export interface MemorySocketProviderConfig {
  /** Maps a requested host to an address; defaults to the host itself */
  readonly lookup?: MemoryLookup;

  /** When true, sockets stay pending until `open()` is called on them */
  readonly manualReady?: boolean;

  /** Called for every datagram a socket sends */
  readonly onSend?: (socket: MemoryDatagramSocket, data: Uint8Array) => void;
}

function defer(fn: () => void): void {
  setImmediate(fn);
}

/**
 * A socket created by {@link MemorySocketProvider}.
 */
export class MemoryDatagramSocket implements DatagramSocket {
  /** Datagrams sent through this socket, in order */
  readonly sent: Uint8Array[] = [];

  private opened = false;
  private closed = false;

  constructor(
    readonly remote: RemoteAddress,
    private readonly address: string,
    private readonly sink: SocketEventSink,
    private readonly onSend: ((socket: MemoryDatagramSocket, data: Uint8Array) => void) | undefined,
  ) {}

  isOpen(): boolean {
    return this.opened && !this.closed;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Marks the socket connected and reports ready.
   */
  open(): void {
    if (this.opened || this.closed) {
      return;
    }
    this.opened = true;
    defer(() => this.sink.onReady());
  }

  send(data: Uint8Array): void {
    if (!this.isOpen()) {
      return;
    }
    const copy = Uint8Array.from(data);
    this.sent.push(copy);
    this.onSend?.(this, copy);
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;

    return new Promise((resolve) => {
      defer(() => {
        this.sink.onClosed();
        resolve();
      });
    });
  }

  remoteAddress(): PeerAddress {
    return {
      address: this.address,
      port: this.remote.port,
      family: net.isIPv6(this.address) ? 'IPv6' : 'IPv4',
    };
  }

  /**
   * Simulates a datagram arriving from the remote.
   */
  deliver(data: Uint8Array): void {
    defer(() => this.sink.onData(data));
  }

  /**
   * Simulates a socket-level error.
   */
  fail(error: Error): void {
    defer(() => this.sink.onError(error));
  }

  /**
   * Simulates the socket closing on its own.
   */
  drop(error?: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    defer(() => this.sink.onClosed(error));
  }
}

/**
 * Socket provider that keeps every socket in memory.
 *
 * @example
 * ```typescript
 * const provider = new MemorySocketProvider({
 *   onSend: (socket, data) => socket.deliver(data), // echo
 * });
 * ```
 */
export class MemorySocketProvider implements SocketProvider {
  /** Every socket created, in creation order */
  readonly sockets: MemoryDatagramSocket[] = [];

  private readonly config: MemorySocketProviderConfig;

  constructor(config: MemorySocketProviderConfig = {}) {
    this.config = config;
  }

  createSocket(remote: RemoteAddress, sink: SocketEventSink): DatagramSocket {
    const resolved = this.config.lookup ? this.config.lookup(remote.host) : remote.host;
    const address = resolved instanceof Error ? remote.host : resolved;

    const socket = new MemoryDatagramSocket(remote, address, sink, this.config.onSend);
    this.sockets.push(socket);

    if (resolved instanceof Error) {
      socket.fail(resolved);
    } else if (!this.config.manualReady) {
      socket.open();
    }

    return socket;
  }
}

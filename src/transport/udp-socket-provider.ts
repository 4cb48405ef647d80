/**
 * Socket provider backed by connected `node:dgram` sockets.
 *
 * Hostnames are resolved first and the socket type follows the family of
 * the resolved address, so names with only AAAA records get a `udp6`
 * socket. Each socket is created unbound, then connected to its remote;
 * the OS picks the local port. A failed lookup or a rejected connect
 * surfaces as a socket error before ready.
 *
 * @module transport/udp-socket-provider
 */

import * as dgram from 'node:dgram';
import * as dns from 'node:dns/promises';
import * as net from 'node:net';

import type { PeerAddress, RemoteAddress } from './types.js';
import { TRANSPORT_DEFAULTS } from './types.js';
import type { DatagramSocket, SocketEventSink, SocketProvider } from './socket-provider.js';

/**
 * Address family asked of the resolver. 0 accepts either.
 */
export type AddressFamily = 0 | 4 | 6;

/**
 * A resolved address.
 */
export interface ResolvedAddress {
  readonly address: string;
  readonly family: number;
}

/**
 * Resolves a hostname to one address.
 */
export type UdpLookup = (host: string, family: AddressFamily) => Promise<ResolvedAddress>;

/**
 * Configuration for the UDP socket provider.
 */
export interface UdpSocketProviderConfig {
  /** Family requested when resolving hostnames */
  readonly family?: AddressFamily;

  /** Resolver for hostnames; defaults to `dns.lookup` */
  readonly lookup?: UdpLookup;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

const dnsLookup: UdpLookup = (host, family) => dns.lookup(host, { family });

class UdpDatagramSocket implements DatagramSocket {
  private socket: dgram.Socket | null = null;
  private released = false;
  private closed = false;

  constructor(private readonly sink: SocketEventSink) {}

  /**
   * Creates the dgram socket for a resolved address and connects it.
   */
  connect(resolved: ResolvedAddress, port: number): void {
    if (this.released) {
      return;
    }

    const socket = dgram.createSocket(resolved.family === 6 ? 'udp6' : 'udp4');
    try {
      // No callback: a failed connect is reported through the 'error' event.
      socket.connect(port, resolved.address);
    } catch (err) {
      socket.close();
      this.sink.onError(toError(err));
      return;
    }

    this.socket = socket;
    socket.once('connect', () => this.sink.onReady());
    socket.on('message', (data) => this.sink.onData(data));
    socket.on('error', (err) => this.sink.onError(err));
    socket.once('close', () => {
      this.closed = true;
      this.sink.onClosed();
    });
  }

  /**
   * Reports a failure that happened before the socket existed.
   */
  fail(error: Error): void {
    if (!this.released) {
      this.sink.onError(error);
    }
  }

  send(data: Uint8Array): void {
    const socket = this.socket;
    if (socket === null) {
      return;
    }

    socket.send(data, (err) => {
      if (err) {
        this.sink.onError(err);
      }
    });
  }

  close(): Promise<void> {
    this.released = true;

    const socket = this.socket;
    if (socket === null || this.closed) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      socket.close(() => resolve());
    });
  }

  remoteAddress(): PeerAddress {
    if (this.socket === null) {
      throw new Error('UDP socket is not connected');
    }

    const info = this.socket.remoteAddress();
    return {
      address: info.address,
      port: info.port,
      family: info.family === 'IPv6' ? 'IPv6' : 'IPv4',
    };
  }
}

/**
 * Creates one connected UDP socket per remote.
 *
 * @example
 * ```typescript
 * const provider = new UdpSocketProvider({ family: 6 });
 * const endpoint = new TransportEndpoint({ codec, onMessage, onError, socketProvider: provider });
 * ```
 */
export class UdpSocketProvider implements SocketProvider {
  private readonly config: Required<UdpSocketProviderConfig>;

  constructor(config: UdpSocketProviderConfig = {}) {
    this.config = {
      family: config.family ?? TRANSPORT_DEFAULTS.ADDRESS_FAMILY,
      lookup: config.lookup ?? dnsLookup,
    };
  }

  createSocket(remote: RemoteAddress, sink: SocketEventSink): DatagramSocket {
    const socket = new UdpDatagramSocket(sink);

    this.resolve(remote.host)
      .then((resolved) => socket.connect(resolved, remote.port))
      .catch((err: unknown) => socket.fail(toError(err)));

    return socket;
  }

  private resolve(host: string): Promise<ResolvedAddress> {
    const family = net.isIP(host);
    if (family !== 0) {
      return Promise.resolve({ address: host, family });
    }
    return this.config.lookup(host, this.config.family);
  }
}

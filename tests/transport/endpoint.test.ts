import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import {
  TransportEndpoint,
  Connection,
  InvalidRemoteError,
  PoolClosedError,
  ConnectError,
  MemorySocketProvider,
} from '../../src/index.js';
import type { MessageCodec } from '../../src/index.js';
import { createTestLogger, flush, testCodec, type TestLogger, type TestMessage } from './helpers.js';

function request(fields: Partial<TestMessage> = {}): TestMessage {
  return {
    payload: new Uint8Array([1, 2, 3]),
    opt: {},
    ...fields,
  };
}

function socketError(message: string, code?: string): Error {
  const error = new Error(message);
  return code === undefined ? error : Object.assign(error, { code });
}

describe('TransportEndpoint', () => {
  let provider: MemorySocketProvider;
  let logger: TestLogger;
  let onMessage: Mock;
  let onError: Mock;
  let endpoint: TransportEndpoint<TestMessage>;

  function createEndpoint(codec: MessageCodec<TestMessage> = testCodec): TransportEndpoint<TestMessage> {
    endpoint = new TransportEndpoint<TestMessage>({
      codec,
      onMessage,
      onError,
      logger,
      socketProvider: provider,
    });
    return endpoint;
  }

  beforeEach(() => {
    // Echo every datagram back to its sender
    provider = new MemorySocketProvider({
      onSend: (socket, data) => socket.deliver(data),
    });
    logger = createTestLogger();
    onMessage = vi.fn();
    onError = vi.fn();
    createEndpoint();
  });

  afterEach(async () => {
    if (endpoint.getState() === 'running') {
      await endpoint.shutdown();
    }
  });

  describe('determineRemote', () => {
    it('parses host and port from the unresolved remote', async () => {
      const connection = await endpoint.determineRemote(request({
        unresolvedRemote: 'node1.example:5001',
      }));

      expect(connection).toBeInstanceOf(Connection);
      expect(connection?.getRemote()).toEqual({ host: 'node1.example', port: 5001 });
      expect(connection?.remotePort).toBe(5001);
      expect(connection?.hostinfo).toBe('node1.example:5001');
    });

    it('uses the default port when the unresolved remote has none', async () => {
      const connection = await endpoint.determineRemote(request({
        unresolvedRemote: 'node1.example',
      }));

      expect(connection?.getRemote()).toEqual({ host: 'node1.example', port: 5683 });
    });

    it('parses bracketed IPv6 unresolved remotes', async () => {
      const connection = await endpoint.determineRemote(request({
        unresolvedRemote: '[2001:db8::1]:5001',
      }));

      expect(connection?.getRemote()).toEqual({ host: '2001:db8::1', port: 5001 });
      expect(connection?.hostinfo).toBe('[2001:db8::1]:5001');
    });

    it('falls back to the uriHost option with the default port', async () => {
      const connection = await endpoint.determineRemote(request({
        opt: { uriHost: 'node2.example' },
      }));

      expect(connection?.getRemote()).toEqual({ host: 'node2.example', port: 5683 });
      expect(connection?.hostinfo).toBe('node2.example');
    });

    it('uses the uriPort option when present', async () => {
      const connection = await endpoint.determineRemote(request({
        opt: { uriHost: 'node2.example', uriPort: 5002 },
      }));

      expect(connection?.getRemote()).toEqual({ host: 'node2.example', port: 5002 });
    });

    it('treats a zero uriPort as the default port', async () => {
      const connection = await endpoint.determineRemote(request({
        opt: { uriHost: 'node2.example', uriPort: 0 },
      }));

      expect(connection?.getRemote()).toEqual({ host: 'node2.example', port: 5683 });
    });

    it('rejects a uriPort outside the UDP range', async () => {
      await expect(
        endpoint.determineRemote(request({ opt: { uriHost: 'node2.example', uriPort: 70000 } })),
      ).rejects.toThrow("Invalid remote 'node2.example:70000': port must be between 1 and 65535");
      await expect(
        endpoint.determineRemote(request({ opt: { uriHost: 'node2.example', uriPort: -1 } })),
      ).rejects.toBeInstanceOf(InvalidRemoteError);
      expect(provider.sockets).toHaveLength(0);
    });

    it('rejects a fractional uriPort', async () => {
      await expect(
        endpoint.determineRemote(request({ opt: { uriHost: 'node2.example', uriPort: 5683.5 } })),
      ).rejects.toThrow("Invalid remote 'node2.example:5683.5': port is not a valid number");
    });

    it('lower-cases the uriHost option', async () => {
      const connection = await endpoint.determineRemote(request({
        opt: { uriHost: 'Node2.EXAMPLE', uriPort: 5002 },
      }));

      expect(connection?.getRemote()).toEqual({ host: 'node2.example', port: 5002 });
      expect(connection?.hostinfo).toBe('node2.example:5002');
    });

    it('prefers the unresolved remote over the options', async () => {
      const connection = await endpoint.determineRemote(request({
        unresolvedRemote: 'node1.example:5001',
        opt: { uriHost: 'node2.example', uriPort: 5002 },
      }));

      expect(connection?.getRemote()).toEqual({ host: 'node1.example', port: 5001 });
    });

    it('returns undefined for a scheme it does not serve', async () => {
      const connection = await endpoint.determineRemote(request({
        requestedScheme: 'coaps',
        unresolvedRemote: 'node1.example:5001',
      }));

      expect(connection).toBeUndefined();
      expect(provider.sockets).toHaveLength(0);
    });

    it('accepts its own scheme', async () => {
      const connection = await endpoint.determineRemote(request({
        requestedScheme: 'coap',
        unresolvedRemote: 'node1.example',
      }));

      expect(connection).toBeInstanceOf(Connection);
    });

    it('rejects with InvalidRemoteError when no host can be derived', async () => {
      await expect(endpoint.determineRemote(request())).rejects.toBeInstanceOf(InvalidRemoteError);
      expect(provider.sockets).toHaveLength(0);
    });

    it('rejects with InvalidRemoteError for a malformed port', async () => {
      await expect(
        endpoint.determineRemote(request({ unresolvedRemote: 'node1.example:abc' })),
      ).rejects.toThrow("Invalid remote 'node1.example:abc': port is not a valid number");
    });

    it('gives every call its own connection', async () => {
      const message = request({ unresolvedRemote: 'node1.example:5001' });

      const first = await endpoint.determineRemote(message);
      const second = await endpoint.determineRemote(message);

      expect(first).toBeInstanceOf(Connection);
      expect(second).toBeInstanceOf(Connection);
      expect(first).not.toBe(second);
      expect(endpoint.getPool().getConnections()).toHaveLength(2);
    });

    it('passes socket failures during connect on as ConnectError', async () => {
      provider = new MemorySocketProvider({ lookup: () => new Error('lookup failed') });
      createEndpoint();

      await expect(
        endpoint.determineRemote(request({ unresolvedRemote: 'nowhere.invalid' })),
      ).rejects.toBeInstanceOf(ConnectError);
      expect(onError).not.toHaveBeenCalled();
    });
  });

  describe('send', () => {
    it('round-trips a payload through the connection', async () => {
      const message = request({ unresolvedRemote: 'node1.example:5001' });
      message.remote = await endpoint.determineRemote(message);

      endpoint.send(message);
      await flush();

      expect(onMessage).toHaveBeenCalledTimes(1);
      const received: TestMessage = onMessage.mock.calls[0][0];
      expect(Array.from(received.payload)).toEqual([1, 2, 3]);
      expect(received.remote).toBe(message.remote);
    });

    it('encodes the message with the codec', async () => {
      const message = request({ unresolvedRemote: 'node1.example:5001' });
      message.remote = await endpoint.determineRemote(message);

      endpoint.send(message);

      expect(Array.from(provider.sockets[0].sent[0])).toEqual([0x40, 1, 2, 3]);
      expect(endpoint.getStats().messagesSent).toBe(1);
    });

    it('throws InvalidRemoteError when the message has no connection', () => {
      expect(() => endpoint.send(request({ unresolvedRemote: 'node1.example' }))).toThrow(
        InvalidRemoteError,
      );
    });

    it('does not touch other connections to the same remote', async () => {
      const first = request({ unresolvedRemote: 'node1.example:5001' });
      const second = request({ unresolvedRemote: 'node1.example:5001' });
      first.remote = await endpoint.determineRemote(first);
      second.remote = await endpoint.determineRemote(second);

      endpoint.send(first);
      await flush();

      expect(provider.sockets[0].sent).toHaveLength(1);
      expect(provider.sockets[1].sent).toHaveLength(0);
      expect(second.remote?.getStats().datagramsSent).toBe(0);
      expect(second.remote?.getStats().datagramsReceived).toBe(0);
      expect(second.remote?.getStage()).toBe('active');
    });
  });

  describe('inbound dispatch', () => {
    it('drops unparsable datagrams with a warning only', async () => {
      const connection = await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' }));
      if (!connection) throw new Error('expected a connection');

      provider.sockets[0].deliver(new Uint8Array([0xff, 1, 2]));
      await flush();

      expect(onMessage).not.toHaveBeenCalled();
      expect(onError).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        `Ignoring unparsable message from ${connection.toString()}: bad header`,
      );
      expect(endpoint.getStats().unparsableDropped).toBe(1);
    });

    it('drops empty datagrams', async () => {
      await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' }));

      provider.sockets[0].deliver(new Uint8Array(0));
      await flush();

      expect(onMessage).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('keeps dispatching after an unparsable datagram', async () => {
      await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' }));

      const socket = provider.sockets[0];
      socket.deliver(new Uint8Array([0x00]));
      socket.deliver(new Uint8Array([0x40, 9]));
      await flush();

      expect(onMessage).toHaveBeenCalledTimes(1);
      expect(Array.from(onMessage.mock.calls[0][0].payload)).toEqual([9]);
    });

    it('logs and drops datagrams the codec fails on', async () => {
      const failure = new TypeError('codec bug');
      createEndpoint({
        encode: testCodec.encode,
        decode(data, remote) {
          if (data[1] === 0) {
            throw failure;
          }
          return testCodec.decode(data, remote);
        },
      });
      const connection = await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' }));
      if (!connection) throw new Error('expected a connection');

      const socket = provider.sockets[provider.sockets.length - 1];
      socket.deliver(new Uint8Array([0x40, 0]));
      socket.deliver(new Uint8Array([0x40, 7]));
      await flush();

      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith(
        `Codec failed on a datagram from ${connection.toString()}:`,
        failure,
      );
      expect(onMessage).toHaveBeenCalledTimes(1);
      expect(Array.from(onMessage.mock.calls[0][0].payload)).toEqual([7]);
      expect(endpoint.getStats().dispatchFailures).toBe(1);
      expect(endpoint.getStats().unparsableDropped).toBe(0);
    });

    it('logs a throwing message handler and keeps the connection', async () => {
      const failure = new TypeError('engine bug');
      onMessage.mockImplementation(() => {
        throw failure;
      });
      const connection = await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' }));
      if (!connection) throw new Error('expected a connection');

      provider.sockets[0].deliver(new Uint8Array([0x40, 1]));
      await flush();

      expect(onMessage).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith(
        `Message handler failed for a message from ${connection.toString()}:`,
        failure,
      );
      expect(connection.getStage()).toBe('active');
      expect(endpoint.getStats()).toMatchObject({ messagesReceived: 1, dispatchFailures: 1 });
    });

    it('logs a throwing error handler', async () => {
      const failure = new TypeError('engine bug');
      onError.mockImplementation(() => {
        throw failure;
      });
      const connection = await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' }));
      if (!connection) throw new Error('expected a connection');

      provider.sockets[0].fail(socketError('send ECONNREFUSED', 'ECONNREFUSED'));
      await flush();

      expect(logger.error).toHaveBeenCalledWith(`Error handler failed for ${connection.toString()}:`, failure);
      expect(endpoint.getStats()).toMatchObject({ errorsForwarded: 1, dispatchFailures: 1 });
    });

    it('forwards socket errors with their code and connection', async () => {
      const connection = await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' }));

      const error = socketError('send EHOSTUNREACH', 'EHOSTUNREACH');
      provider.sockets[0].fail(error);
      await flush();

      expect(onError).toHaveBeenCalledWith('EHOSTUNREACH', connection, error);
      expect(connection?.getStage()).toBe('active');
      expect(endpoint.getStats().errorsForwarded).toBe(1);
    });

    it('reports EUNKNOWN for errors without a code', async () => {
      const connection = await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' }));

      const error = socketError('something broke');
      provider.sockets[0].fail(error);
      await flush();

      expect(onError).toHaveBeenCalledWith('EUNKNOWN', connection, error);
    });
  });

  describe('shutdown', () => {
    it('destroys every connection it handed out', async () => {
      const connections = [
        await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example:5001' })),
        await endpoint.determineRemote(request({ opt: { uriHost: 'node2.example' } })),
      ];

      await endpoint.shutdown();

      for (const connection of connections) {
        expect(connection?.getStage()).toBe('destroyed');
      }
      expect(endpoint.getState()).toBe('stopped');
      expect(endpoint.getPool().getState()).toBe('closed');
    });

    it('dispatches nothing for datagrams arriving afterwards', async () => {
      await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example:5001' }));
      await endpoint.shutdown();

      const socket = provider.sockets[0];
      socket.deliver(new Uint8Array([0x40, 1]));
      socket.deliver(new Uint8Array([0xff]));
      socket.fail(socketError('late', 'ECONNREFUSED'));
      await flush();

      expect(onMessage).not.toHaveBeenCalled();
      expect(onError).not.toHaveBeenCalled();
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('ignores direct dispatch after shutdown', async () => {
      const connection = await endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' }));
      if (!connection) throw new Error('expected a connection');
      await endpoint.shutdown();

      endpoint.onDatagram(connection, new Uint8Array([0x40, 1]));
      endpoint.onSocketError(connection, socketError('late'));

      expect(onMessage).not.toHaveBeenCalled();
      expect(onError).not.toHaveBeenCalled();
    });

    it('rejects determineRemote afterwards', async () => {
      await endpoint.shutdown();

      await expect(
        endpoint.determineRemote(request({ unresolvedRemote: 'node1.example' })),
      ).rejects.toBeInstanceOf(PoolClosedError);
    });

    it('still answers scheme mismatches with undefined afterwards', async () => {
      await endpoint.shutdown();

      await expect(
        endpoint.determineRemote(request({ requestedScheme: 'coaps' })),
      ).resolves.toBeUndefined();
    });
  });

  describe('getStats', () => {
    it('returns initial statistics', () => {
      expect(endpoint.getStats()).toEqual({
        state: 'running',
        messagesSent: 0,
        messagesReceived: 0,
        unparsableDropped: 0,
        dispatchFailures: 0,
        errorsForwarded: 0,
      });
    });

    it('counts received messages', async () => {
      const message = request({ unresolvedRemote: 'node1.example' });
      message.remote = await endpoint.determineRemote(message);

      endpoint.send(message);
      endpoint.send(message);
      await flush();

      expect(endpoint.getStats().messagesReceived).toBe(2);
    });
  });
});

import { vi, type Mock } from 'vitest';
import { UnparsableMessageError } from '../../src/index.js';
import type { Connection, Logger, Message, MessageCodec } from '../../src/index.js';

/**
 * First byte of every datagram the test codec produces.
 */
export const TEST_HEADER = 0x40;

export interface TestMessage extends Message {
  readonly payload: Uint8Array;
}

/**
 * Minimal codec: one header byte followed by the payload.
 */
export const testCodec: MessageCodec<TestMessage> = {
  encode(message: TestMessage): Uint8Array {
    const data = new Uint8Array(message.payload.length + 1);
    data[0] = TEST_HEADER;
    data.set(message.payload, 1);
    return data;
  },

  decode(data: Uint8Array, remote: Connection): TestMessage {
    if (data.length === 0) {
      throw new UnparsableMessageError('empty datagram');
    }
    if (data[0] !== TEST_HEADER) {
      throw new UnparsableMessageError('bad header');
    }
    return { payload: data.subarray(1), remote, opt: {} };
  },
};

export interface TestLogger extends Logger {
  readonly warn: Mock;
  readonly error: Mock;
}

export function createTestLogger(): TestLogger {
  return {
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Lets every event queued with setImmediate run.
 */
export function flush(rounds = 3): Promise<void> {
  let chain = Promise.resolve();
  for (let i = 0; i < rounds; i++) {
    chain = chain.then(() => new Promise<void>((resolve) => setImmediate(resolve)));
  }
  return chain;
}

export function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  return new Promise((resolve, reject) => {
    const start = Date.now();
    const check = () => {
      if (condition()) {
        resolve();
      } else if (Date.now() - start > timeoutMs) {
        reject(new Error('Timeout waiting for condition'));
      } else {
        setTimeout(check, 10);
      }
    };
    check();
  });
}

/**
 * Parsing and formatting of `host[:port]` strings.
 *
 * IPv6 literals are written in brackets (`[::1]:5683`), as in URI
 * authorities.
 *
 * @module transport/host-port
 */

import { InvalidRemoteError } from './types.js';

/**
 * Minimum UDP port number.
 */
const MIN_PORT = 1;

/**
 * Maximum UDP port number.
 */
const MAX_PORT = 65535;

const DIGITS_PATTERN = /^\d+$/;

/**
 * Components of a `host[:port]` string.
 */
export interface HostPortComponents {
  /** Host without brackets, lower-cased */
  readonly host: string;

  /** Port, or undefined when the string carries none */
  readonly port: number | undefined;
}

function parsePort(portStr: string, originalValue: string): number | undefined {
  if (portStr.length === 0) {
    return undefined;
  }

  if (!DIGITS_PATTERN.test(portStr)) {
    throw new InvalidRemoteError(originalValue, 'port is not a valid number');
  }

  return HostPort.validatePort(parseInt(portStr, 10), originalValue);
}

/**
 * HostPort namespace with the split/join pair used for remotes and the
 * port check they share.
 *
 * @example
 * ```typescript
 * HostPort.split('node1.example:5001'); // { host: 'node1.example', port: 5001 }
 * HostPort.split('[::1]');              // { host: '::1', port: undefined }
 * HostPort.join('::1', 5684);           // '[::1]:5684'
 * ```
 */
export const HostPort = {
  /**
   * Splits a `host[:port]` string.
   *
   * @throws {InvalidRemoteError} If the host is empty or the port malformed
   */
  split(value: string): HostPortComponents {
    let host: string;
    let portStr = '';

    if (value.startsWith('[')) {
      const closing = value.indexOf(']');
      if (closing === -1) {
        throw new InvalidRemoteError(value, "missing ']' after IPv6 address");
      }

      host = value.slice(1, closing);
      const rest = value.slice(closing + 1);
      if (rest.length > 0) {
        if (!rest.startsWith(':')) {
          throw new InvalidRemoteError(value, "unexpected characters after ']'");
        }
        portStr = rest.slice(1);
      }
    } else {
      const colonIndex = value.lastIndexOf(':');
      if (colonIndex !== value.indexOf(':')) {
        throw new InvalidRemoteError(value, 'IPv6 addresses must be enclosed in brackets');
      }

      if (colonIndex === -1) {
        host = value;
      } else {
        host = value.slice(0, colonIndex);
        portStr = value.slice(colonIndex + 1);
      }
    }

    if (host.length === 0) {
      throw new InvalidRemoteError(value, 'host cannot be empty');
    }

    return {
      host: host.toLowerCase(),
      port: parsePort(portStr, value),
    };
  },

  /**
   * Checks that `port` is a usable UDP port and returns it.
   *
   * @param value - The remote the port came from, reported in the error
   * @throws {InvalidRemoteError} If the port is not an integer in 1-65535
   */
  validatePort(port: number, value: string): number {
    if (!Number.isInteger(port)) {
      throw new InvalidRemoteError(value, 'port is not a valid number');
    }
    if (port < MIN_PORT || port > MAX_PORT) {
      throw new InvalidRemoteError(value, `port must be between ${MIN_PORT} and ${MAX_PORT}`);
    }
    return port;
  },

  /**
   * Joins a host and an optional port, bracketing IPv6 literals.
   */
  join(host: string, port?: number): string {
    const hostPart = host.includes(':') ? `[${host}]` : host;
    return port === undefined ? hostPart : `${hostPart}:${port}`;
  },
} as const;

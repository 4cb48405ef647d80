/**
 * dgram-client-transport - client-side datagram transport for
 * request/response protocols over UDP
 *
 * This module provides the public API for the library.
 */

export const VERSION = '0.1.0' as const;

export * from './transport/index.js';

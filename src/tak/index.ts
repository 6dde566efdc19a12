/**
 * TAK Module
 *
 * Outbound connection to the TAK server:
 * - Supervised TCP/TLS client with fixed-interval reconnect
 * - Bounded outbound queue
 * - TLS credential loading
 */

export { TakClient } from "./tak-client.ts";
export type { TakClientOptions, TakClientEvent, TakClientCallback } from "./tak-client.ts";

export { BoundedQueue } from "./outbound-queue.ts";
export type { OfferResult } from "./outbound-queue.ts";

export { buildTlsOptions } from "./tls.ts";
export type { TakTlsOptions, TlsCredentialFiles } from "./tls.ts";

/**
 * TLS options for the TAK connection.
 *
 * Client certificate, key and CA are loaded into a secure context once at
 * startup; a file that can't be read or parsed aborts startup. Without a CA
 * file the server certificate is not verified at all (chain and hostname).
 */

import { readFileSync } from "node:fs";
import { X509Certificate } from "node:crypto";
import { isIP } from "node:net";
import { createSecureContext, type ConnectionOptions, type SecureContextOptions } from "node:tls";
import { createLogger } from "../utils/logger.ts";
import { TlsCredentialError, getErrorMessage } from "../types/errors.ts";

export interface TlsCredentialFiles {
  certFile: string | null;
  keyFile: string | null;
  caFile: string | null;
}

export interface TakTlsOptions {
  /** Passed to tls.connect together with host and port */
  connectOptions: ConnectionOptions;
  /** False when no CA was configured and verification is off */
  verifyServer: boolean;
}

const log = createLogger("TAK TLS");

function readCredential(file: string): Buffer {
  try {
    return readFileSync(file);
  } catch (error) {
    throw new TlsCredentialError(file, getErrorMessage(error));
  }
}

// OpenSSL quietly skips CA bundles it can't parse, so check the first certificate here
function parseCa(file: string): Buffer {
  const ca = readCredential(file);
  try {
    new X509Certificate(ca);
  } catch (error) {
    throw new TlsCredentialError(file, getErrorMessage(error));
  }
  return ca;
}

/**
 * Load credentials and build the connect options.
 * Throws TlsCredentialError when a configured file can't be read, isn't PEM,
 * or the key doesn't belong to the certificate.
 */
export function buildTlsOptions(host: string, files: TlsCredentialFiles): TakTlsOptions {
  const connectOptions: ConnectionOptions = {};
  const contextOptions: SecureContextOptions = {};

  // SNI only applies to hostnames
  if (!isIP(host)) {
    connectOptions.servername = host;
  }

  if (files.certFile && files.keyFile) {
    contextOptions.cert = readCredential(files.certFile);
    contextOptions.key = readCredential(files.keyFile);
  }

  if (files.caFile) {
    contextOptions.ca = parseCa(files.caFile);
  }

  try {
    connectOptions.secureContext = createSecureContext(contextOptions);
  } catch (error) {
    const file = files.certFile && files.keyFile ? `${files.certFile} + ${files.keyFile}` : (files.caFile ?? "TLS context");
    throw new TlsCredentialError(file, getErrorMessage(error));
  }

  if (files.certFile && files.keyFile) {
    log.info("Loaded client certificate for TLS", { certFile: files.certFile });
  }

  if (files.caFile) {
    connectOptions.rejectUnauthorized = true;
    log.info("Loaded CA certificate for TLS", { caFile: files.caFile });
    return { connectOptions, verifyServer: true };
  }

  connectOptions.rejectUnauthorized = false;
  connectOptions.checkServerIdentity = () => undefined;
  return { connectOptions, verifyServer: false };
}

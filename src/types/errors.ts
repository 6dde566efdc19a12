/**
 * Fatal startup errors.
 *
 * Per-message failures (parse, conversion, backpressure) are returned as
 * values; only these abort startup.
 */

/** Invalid environment configuration */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Why the UDP socket could not be bound */
export type BindFailureCause = "address_in_use" | "permission_denied" | "os_error";

export class BindError extends Error {
  readonly kind: BindFailureCause;
  readonly host: string;
  readonly port: number;
  /** OS error code (EADDRINUSE, EACCES, ...) when available */
  readonly code: string | null;

  constructor(kind: BindFailureCause, host: string, port: number, code: string | null, message: string) {
    super(message);
    this.name = "BindError";
    this.kind = kind;
    this.host = host;
    this.port = port;
    this.code = code;
  }
}

/** Client certificate, key or CA could not be loaded */
export class TlsCredentialError extends Error {
  readonly file: string;

  constructor(file: string, detail: string) {
    super(`Failed to load TLS credential ${file}: ${detail}`);
    this.name = "TlsCredentialError";
    this.file = file;
  }
}

/** Extract an OS error code (e.g. "EADDRINUSE") from an unknown thrown value */
export function getErrorCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

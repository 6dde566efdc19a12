/**
 * GPGGA Relay Configuration
 *
 * All configuration settings for the relay service.
 * Values can be overridden via environment variables (or a .env file).
 * Durations are given in seconds in the environment and kept in
 * milliseconds here.
 */

import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./types/errors.ts";
import type { TakProtocol } from "./types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

/** Unset and empty variables both fall back to the default */
const emptyToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const intVar = (def: number, min: number, max: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(def));

const floatVar = (def: number, min: number, max: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().min(min).max(max).default(def));

const lowerCased = (value: unknown): unknown => {
  const normalized = emptyToUndefined(value);
  return typeof normalized === "string" ? normalized.toLowerCase() : normalized;
};

const boolVar = (def: boolean) =>
  z.preprocess(
    lowerCased,
    z
      .enum(["true", "false", "1", "0", "yes", "no"])
      .default(def ? "true" : "false")
      .transform((value) => value === "true" || value === "1" || value === "yes")
  );

const optionalPath = z.preprocess(emptyToUndefined, z.string().optional());

const envSchema = z
  .object({
    UDP_LISTEN_HOST: z.preprocess(emptyToUndefined, z.string().default("0.0.0.0")),
    UDP_LISTEN_PORT: intVar(5005, 1, 65535),
    UDP_BUFFER_SIZE: intVar(1024, 256, 65536),

    TAK_SERVER_URL: z.preprocess(
      emptyToUndefined,
      z
        .string()
        .default("tcp://localhost:8087")
        .refine((url) => /^(tcp|tls|udp):\/\//.test(url), {
          message: "must start with tcp://, tls:// or udp://",
        })
        .refine((url) => !url.startsWith("udp://"), {
          message: "udp:// is not a supported TAK transport (use tcp:// or tls://)",
        })
    ),
    TAK_RECONNECT_INTERVAL: intVar(5, 1, 300),
    TAK_SEND_TIMEOUT: floatVar(5.0, 0.1, 60),

    TAK_CERT_FILE: optionalPath,
    TAK_KEY_FILE: optionalPath,
    TAK_CA_FILE: optionalPath,

    DEVICE_TYPE: z.preprocess(emptyToUndefined, z.string().min(1).default("a-f-G-U-C")),
    STALE_TIME_SECONDS: intVar(300, 10, 3600),

    MESSAGE_QUEUE_SIZE: intVar(1000, 10, 10000),
    MAX_CONCURRENT_MESSAGES: intVar(100, 1, 1000),
    HEALTH_CHECK_INTERVAL: intVar(30, 5, 300),
    DEVICE_CLEANUP_INTERVAL: intVar(3600, 60, 86400),

    METRICS_ENABLED: boolVar(true),
    METRICS_PORT: intVar(8089, 1, 65535),

    LOG_LEVEL: z.preprocess(
      (value) => {
        const level = lowerCased(value);
        return level === "warning" ? "warn" : level === "critical" ? "error" : level;
      },
      z.enum(["debug", "info", "warn", "error"]).default("info")
    ),
    LOG_FORMAT: z.preprocess(lowerCased, z.enum(["text", "json"]).default("text")),
    LOG_FILE: optionalPath,
    LOG_FILE_MAX_BYTES: intVar(10 * 1024 * 1024, 1024, 1024 * 1024 * 1024),
    LOG_FILE_BACKUP_COUNT: intVar(5, 0, 100),
  })
  .superRefine((env, ctx) => {
    const tlsFiles = [env.TAK_CERT_FILE, env.TAK_KEY_FILE, env.TAK_CA_FILE].filter(Boolean);
    if (tlsFiles.length > 0 && !env.TAK_SERVER_URL.startsWith("tls://")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TAK_SERVER_URL"],
        message: "TLS certificates specified but TAK_SERVER_URL does not use tls://",
      });
    }
    if (Boolean(env.TAK_CERT_FILE) !== Boolean(env.TAK_KEY_FILE)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [env.TAK_CERT_FILE ? "TAK_KEY_FILE" : "TAK_CERT_FILE"],
        message: "TAK_CERT_FILE and TAK_KEY_FILE must be set together",
      });
    }
  });

type RelayEnv = z.infer<typeof envSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// URL HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/** Default TAK ports when the URL omits one */
const DEFAULT_TAK_PORTS: Record<TakProtocol, number> = {
  tcp: 8087,
  tls: 8089,
};

/**
 * Split a TAK server URL (tcp://host:port or tls://host:port)
 */
export function parseTakServerUrl(url: string): { protocol: TakProtocol; host: string; port: number } {
  const match = url.match(/^(tcp|tls):\/\/(\[[^\]]+\]|[^:/]+)(?::(\d+))?\/?$/);
  if (!match) {
    throw new ConfigError([`TAK_SERVER_URL: cannot parse "${url}"`]);
  }
  const protocol: TakProtocol = match[1] === "tls" ? "tls" : "tcp";
  const host = match[2].replace(/^\[|\]$/g, "");
  const port = match[3] ? Number(match[3]) : DEFAULT_TAK_PORTS[protocol];
  if (port < 1 || port > 65535) {
    throw new ConfigError([`TAK_SERVER_URL: port ${port} out of range`]);
  }
  return { protocol, host, port };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG BUILDER
// ═══════════════════════════════════════════════════════════════════════════════

function buildConfig(env: RelayEnv) {
  const tak = parseTakServerUrl(env.TAK_SERVER_URL);

  return {
    // ═══════════════════════════════════════════════════════════════════════════
    // UDP LISTENER (GPS devices)
    // ═══════════════════════════════════════════════════════════════════════════
    udp: {
      /** Host to bind the UDP listener (0.0.0.0 for all interfaces) */
      host: env.UDP_LISTEN_HOST,

      /** Port devices send GPGGA sentences to */
      port: env.UDP_LISTEN_PORT,

      /** Receive buffer size in bytes */
      bufferSize: env.UDP_BUFFER_SIZE,

      /** Max handler invocations in flight before datagrams are dropped */
      maxConcurrentMessages: env.MAX_CONCURRENT_MESSAGES,
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // TAK SERVER (downstream)
    // ═══════════════════════════════════════════════════════════════════════════
    tak: {
      url: env.TAK_SERVER_URL,
      protocol: tak.protocol,
      host: tak.host,
      port: tak.port,
      tlsEnabled: tak.protocol === "tls",

      /** Fixed wait between connection attempts (ms) */
      reconnectIntervalMs: env.TAK_RECONNECT_INTERVAL * 1000,

      /** Max time a producer waits for queue space (ms) */
      sendTimeoutMs: Math.round(env.TAK_SEND_TIMEOUT * 1000),

      /** Outbound queue capacity */
      queueSize: env.MESSAGE_QUEUE_SIZE,

      /** Liveness check interval while connected (ms) */
      healthCheckIntervalMs: env.HEALTH_CHECK_INTERVAL * 1000,

      certFile: env.TAK_CERT_FILE ?? null,
      keyFile: env.TAK_KEY_FILE ?? null,
      caFile: env.TAK_CA_FILE ?? null,
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // COT
    // ═══════════════════════════════════════════════════════════════════════════
    cot: {
      /** CoT type for devices (default: friendly ground unit) */
      deviceType: env.DEVICE_TYPE,

      /** Seconds before a position report becomes stale */
      staleTimeSeconds: env.STALE_TIME_SECONDS,
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // HEALTH & HOUSEKEEPING
    // ═══════════════════════════════════════════════════════════════════════════
    monitor: {
      /** Statistics log / gauge refresh interval (ms) */
      intervalMs: env.HEALTH_CHECK_INTERVAL * 1000,

      /** Active-device set is cleared this often (ms) */
      deviceCleanupIntervalMs: env.DEVICE_CLEANUP_INTERVAL * 1000,
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // STATUS ENDPOINT
    // ═══════════════════════════════════════════════════════════════════════════
    metrics: {
      enabled: env.METRICS_ENABLED,
      port: env.METRICS_PORT,
      host: "0.0.0.0",
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // LOGGING
    // ═══════════════════════════════════════════════════════════════════════════
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,

      /** Rotating log file written alongside the console; null = console only */
      file: env.LOG_FILE ?? null,
      fileMaxBytes: env.LOG_FILE_MAX_BYTES,
      fileBackupCount: env.LOG_FILE_BACKUP_COUNT,
    },
  } as const;
}

export type Config = ReturnType<typeof buildConfig>;

/**
 * Validate an environment and build the relay configuration.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }
  return buildConfig(parsed.data);
}

/**
 * One-line-per-setting summary for the startup banner
 */
export function getConfigSummary(cfg: Config): Record<string, string> {
  return {
    "UDP Listener": `${cfg.udp.host}:${cfg.udp.port}`,
    "TAK Server": cfg.tak.url,
    "TLS": cfg.tak.tlsEnabled ? (cfg.tak.caFile ? "enabled" : "enabled (no CA, unverified)") : "disabled",
    "Device Type": cfg.cot.deviceType,
    "Stale Time": `${cfg.cot.staleTimeSeconds}s`,
    "Queue Size": String(cfg.tak.queueSize),
    "Log Level": cfg.logging.level,
    "Log File": cfg.logging.file ?? "none",
    "Status API": cfg.metrics.enabled ? `port ${cfg.metrics.port}` : "disabled",
  };
}

export const config: Config = loadConfig(process.env);
export default config;

/**
 * GPGGA → CoT Relay Service
 *
 * Main entry point.
 *
 * This service:
 * - Listens for extended GPGGA sentences from GPS devices over UDP
 * - Validates checksums and fields, decodes positions
 * - Converts each position into a Cursor-on-Target event
 * - Streams events to a TAK server over TCP or TLS, reconnecting as needed
 * - Serves a small JSON status API and Prometheus metrics for monitoring
 */

import { config, getConfigSummary } from "./config.ts";
import { closeLogFile, createLogger, openLogFile } from "./utils/logger.ts";
import { installFatalHandlers } from "./utils/fatal-handlers.ts";
import { BindError, TlsCredentialError, getErrorMessage } from "./types/errors.ts";
import { Relay, RELAY_VERSION } from "./relay/index.ts";
import { StatusServer } from "./http/status-server.ts";

const log = createLogger("MAIN");

// References for graceful shutdown
let relay: Relay | null = null;
let statusServer: StatusServer | null = null;
let shuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// BANNER
// ═══════════════════════════════════════════════════════════════════════════════

const BANNER = `
╔═══════════════════════════════════════════════════════════════════╗
║                                                                   ║
║                 G P G G A   →   C o T   R E L A Y                 ║
║                                                                   ║
║              NMEA over UDP  •  Cursor-on-Target to TAK            ║
║                                                                   ║
╚═══════════════════════════════════════════════════════════════════╝
`;

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  if (config.logging.file) {
    try {
      openLogFile(config.logging.file);
    } catch (error) {
      log.error("Failed to set up file logging", { logFile: config.logging.file, error });
    }
  }

  console.log(BANNER);
  log.info(`Starting GPGGA to CoT relay v${RELAY_VERSION}`);
  log.info(`Runtime: Node.js ${process.version}`);

  for (const [key, value] of Object.entries(getConfigSummary(config))) {
    log.info(`  ${key.padEnd(14)} ${value}`);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Relay (TAK link + UDP listener)
  // ─────────────────────────────────────────────────────────────────────────────
  relay = new Relay();
  await relay.start();

  // ─────────────────────────────────────────────────────────────────────────────
  // Status API
  // ─────────────────────────────────────────────────────────────────────────────
  if (config.metrics.enabled) {
    statusServer = new StatusServer(relay);
    await statusServer.start();
  }

  console.log("");
  console.log("╔═══════════════════════════════════════════════════════════════════╗");
  console.log("║   ✓ GPGGA Relay READY                                             ║");
  console.log(`║   📡 Devices send to:   udp://${config.udp.host}:${config.udp.port}`.padEnd(68) + "║");
  console.log(`║   🎯 TAK server:        ${config.tak.url}`.padEnd(68) + "║");
  if (config.metrics.enabled) {
    console.log(`║   🌐 Status API:        http://${config.metrics.host}:${config.metrics.port}/api/status`.padEnd(68) + "║");
    console.log(`║   📈 Metrics:           http://${config.metrics.host}:${config.metrics.port}/metrics`.padEnd(68) + "║");
  }
  console.log("╚═══════════════════════════════════════════════════════════════════╝");
  console.log("");
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

async function shutdown(exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  try {
    if (statusServer) {
      log.info("[SHUTDOWN] Closing status server...");
      await statusServer.stop();
    }
    if (relay) {
      log.info("[SHUTDOWN] Stopping relay...");
      await relay.stop();
    }
    log.info("[SHUTDOWN] Goodbye!");
  } catch (error) {
    log.error("[SHUTDOWN] Error during shutdown", { error });
    exitCode = 1;
  }

  closeLogFile();
  process.exit(exitCode);
}

function describeFatal(error: unknown): string {
  if (error instanceof BindError) {
    switch (error.kind) {
      case "address_in_use":
        return `UDP port ${error.port} is already in use`;
      case "permission_denied":
        return `Permission denied binding UDP port ${error.port} (try a port above 1024 or run with privileges)`;
      case "os_error":
        return `Could not bind UDP ${error.host}:${error.port}: ${error.message}`;
    }
  }
  if (error instanceof TlsCredentialError) {
    return error.message;
  }
  return getErrorMessage(error);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    log.info(`Received ${signal}, shutting down gracefully...`);
    void shutdown(0);
  });
}

installFatalHandlers(process, shutdown);

main().catch((error: unknown) => {
  log.error(`Fatal: ${describeFatal(error)}`);
  void shutdown(1);
});

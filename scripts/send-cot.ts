#!/usr/bin/env -S npx tsx
/**
 * Direct CoT Test Sender
 *
 * Connects straight to a TAK server and sends one CoT event built by the
 * relay's encoder, bypassing UDP ingest. Useful for checking the downstream
 * path and TLS credentials.
 *
 * Usage:
 *   npx tsx scripts/send-cot.ts [tcp://host:port | tls://host:port] [options]
 *
 * Options:
 *   --device <id>   Callsign / device id (default: DIRECT-TEST)
 *   --lat <deg>     Latitude (default: 36.0)
 *   --lon <deg>     Longitude (default: -94.0)
 *   --alt <m>       Altitude (default: 100.0)
 *
 * TLS credentials come from TAK_CERT_FILE / TAK_KEY_FILE / TAK_CA_FILE.
 */

import net from "node:net";
import tls from "node:tls";
import { setTimeout as sleep } from "node:timers/promises";
import { config, parseTakServerUrl } from "../src/config.ts";
import { CotEncoder } from "../src/cot/index.ts";
import { createPositionRecord } from "../src/devices/index.ts";
import { buildTlsOptions } from "../src/tak/index.ts";

const CONNECT_TIMEOUT_MS = 5000;

function connect(url: string): Promise<net.Socket> {
  const { protocol, host, port } = parseTakServerUrl(url);

  return new Promise((resolve, reject) => {
    const socket =
      protocol === "tls"
        ? tls.connect({
            ...buildTlsOptions(host, config.tak).connectOptions,
            host,
            port,
          })
        : net.connect({ host, port });

    socket.setTimeout(CONNECT_TIMEOUT_MS, () => {
      socket.destroy();
      reject(new Error(`connect timed out after ${CONNECT_TIMEOUT_MS}ms`));
    });
    socket.once("error", reject);
    socket.once(protocol === "tls" ? "secureConnect" : "connect", () => {
      socket.setTimeout(0);
      socket.off("error", reject);
      resolve(socket);
    });
  });
}

async function main() {
  const args = process.argv.slice(2);
  let url = config.tak.url;
  let deviceId = "DIRECT-TEST";
  let latitude = 36.0;
  let longitude = -94.0;
  let altitude = 100.0;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === "--device" && next) {
      deviceId = next;
      i++;
    } else if (arg === "--lat" && next) {
      latitude = parseFloat(next);
      i++;
    } else if (arg === "--lon" && next) {
      longitude = parseFloat(next);
      i++;
    } else if (arg === "--alt" && next) {
      altitude = parseFloat(next);
      i++;
    } else if (/^(tcp|tls):\/\//.test(arg)) {
      url = arg;
    }
  }

  const record = createPositionRecord({
    latitude,
    longitude,
    altitude,
    fixQuality: 1,
    numSatellites: 8,
    hdop: 0.9,
    deviceId,
  });
  if (!record.ok) {
    console.error(`Invalid position: ${record.issues.join("; ")}`);
    process.exit(1);
  }

  const encoder = new CotEncoder({
    deviceType: config.cot.deviceType,
    staleTimeSeconds: config.cot.staleTimeSeconds,
  });
  const conversion = encoder.convert(record.record);
  if (!conversion.ok) {
    console.error(`Conversion failed: ${conversion.error.reason}`);
    process.exit(1);
  }

  console.log(`Connecting to ${url}...`);
  const socket = await connect(url);
  console.log("Connected! Sending CoT...");
  console.log(conversion.xml);

  await new Promise<void>((resolve, reject) => {
    socket.write(`${conversion.xml}\n`, "utf8", (error) => (error ? reject(error) : resolve()));
  });
  console.log("✅ CoT sent");

  // Give the server a moment before closing
  await sleep(2000);
  socket.end();

  console.log(`\nCheck your TAK client for a marker at ${latitude}, ${longitude} labeled '${deviceId}'`);
}

main().catch((error) => {
  console.error("Error:", error);
  process.exit(1);
});

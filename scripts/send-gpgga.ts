#!/usr/bin/env -S npx tsx
/**
 * GPGGA Test Sender
 *
 * Sends extended GPGGA sentences over UDP to a running relay.
 *
 * Usage:
 *   npx tsx scripts/send-gpgga.ts [options]
 *
 * Options:
 *   --host <host>       Relay host (default: 127.0.0.1)
 *   --port <port>       Relay UDP port (default: UDP_LISTEN_PORT)
 *   --device <id>       Device id (default: TEST-001)
 *   --count <n>         Number of sentences (default: 1)
 *   --interval <sec>    Seconds between sentences (default: 1)
 *   --lat <deg>         Latitude (default: random)
 *   --lon <deg>         Longitude (default: random)
 *   --alt <m>           Altitude (default: random)
 *   --movement          Drift the position slightly between sentences
 */

import dgram from "node:dgram";
import { setTimeout as sleep } from "node:timers/promises";
import { config } from "../src/config.ts";
import { formatGpggaSentence } from "../src/devices/index.ts";

interface SenderOptions {
  host: string;
  port: number;
  deviceId: string;
  count: number;
  intervalSeconds: number;
  latitude: number | null;
  longitude: number | null;
  altitude: number | null;
  movement: boolean;
}

const randomBetween = (min: number, max: number) => min + Math.random() * (max - min);

function printHelp(): void {
  console.log(`
GPGGA Test Sender

Usage:
  npx tsx scripts/send-gpgga.ts [options]

Options:
  --host <host>       Relay host (default: 127.0.0.1)
  --port <port>       Relay UDP port (default: ${config.udp.port})
  --device <id>       Device id (default: TEST-001)
  --count <n>         Number of sentences (default: 1)
  --interval <sec>    Seconds between sentences (default: 1)
  --lat <deg>         Latitude (default: random)
  --lon <deg>         Longitude (default: random)
  --alt <m>           Altitude (default: random)
  --movement          Drift the position slightly between sentences
  --help, -h          Show this help message

Examples:
  # One sentence from a fixed position
  npx tsx scripts/send-gpgga.ts --device UNIT-7 --lat 48.1173 --lon 11.5167 --alt 545.4

  # Ten moving reports, one per second
  npx tsx scripts/send-gpgga.ts --count 10 --movement
`);
}

function parseArgs(args: string[]): SenderOptions {
  const options: SenderOptions = {
    host: "127.0.0.1",
    port: config.udp.port,
    deviceId: "TEST-001",
    count: 1,
    intervalSeconds: 1,
    latitude: null,
    longitude: null,
    altitude: null,
    movement: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === "--host" && next) {
      options.host = next;
      i++;
    } else if (arg === "--port" && next) {
      options.port = parseInt(next, 10);
      i++;
    } else if (arg === "--device" && next) {
      options.deviceId = next;
      i++;
    } else if (arg === "--count" && next) {
      options.count = parseInt(next, 10);
      i++;
    } else if (arg === "--interval" && next) {
      options.intervalSeconds = parseFloat(next);
      i++;
    } else if (arg === "--lat" && next) {
      options.latitude = parseFloat(next);
      i++;
    } else if (arg === "--lon" && next) {
      options.longitude = parseFloat(next);
      i++;
    } else if (arg === "--alt" && next) {
      options.altitude = parseFloat(next);
      i++;
    } else if (arg === "--movement") {
      options.movement = true;
    } else if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }
  }

  return options;
}

function send(socket: dgram.Socket, message: string, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(message, port, host, (error) => (error ? reject(error) : resolve()));
  });
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const socket = dgram.createSocket(options.host.includes(":") ? "udp6" : "udp4");

  console.log(`Sending ${options.count} GPGGA message(s) to ${options.host}:${options.port}`);
  console.log(`Device ID: ${options.deviceId}`);
  console.log(`Interval: ${options.intervalSeconds}s`);
  if (options.movement) {
    console.log("Movement simulation: ENABLED");
  }
  console.log("");

  let latitude = options.latitude ?? randomBetween(30, 45);
  let longitude = options.longitude ?? randomBetween(-120, -75);
  let altitude = options.altitude ?? randomBetween(100, 500);

  try {
    for (let i = 0; i < options.count; i++) {
      if (options.movement && i > 0) {
        // ~100 m steps
        latitude += randomBetween(-0.001, 0.001);
        longitude += randomBetween(-0.001, 0.001);
        altitude += randomBetween(-10, 10);
      }

      const sentence = formatGpggaSentence({
        deviceId: options.deviceId,
        latitude,
        longitude,
        altitude,
      });
      await send(socket, sentence, options.host, options.port);
      console.log(`[${i + 1}/${options.count}] Sent: ${sentence}`);

      if (i < options.count - 1) {
        await sleep(options.intervalSeconds * 1000);
      }
    }
  } finally {
    socket.close();
  }

  console.log("\nDone!");
}

main().catch((error) => {
  console.error("Error:", error);
  process.exit(1);
});

/**
 * Tests for the rotating log file output
 *
 * Tests run with LOG_LEVEL=error, so only error lines reach the file.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { closeLogFile, createLogger, openLogFile } from "../src/utils/logger.ts";

// `2024-01-01T12:00:00.000Z` is 24 characters; the rest of each line is fixed
const TIMESTAMP_LENGTH = 24;

/** A message that makes each text line exactly 100 bytes with its newline */
function entry(n: number): string {
  return String(n).padEnd(59, "x");
}

function readLines(file: string): string[] {
  return readFileSync(file, "utf8")
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => line.slice(TIMESTAMP_LENGTH));
}

describe("log file", () => {
  let dir: string;
  let file: string;
  const log = createLogger("Test");

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "relay-log-"));
    file = join(dir, "logs", "relay.log");
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    closeLogFile();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("should create the directory and write plain lines", () => {
    openLogFile(file);

    log.error("Bind failed", { port: 5005 });

    expect(readLines(file)).toEqual([' [Test] [ERROR] Bind failed {"port":5005}']);
  });

  it("should skip lines below the configured level", () => {
    openLogFile(file);

    log.warn("not written");
    log.error("written");

    expect(readLines(file)).toEqual([" [Test] [ERROR] written"]);
  });

  it("should rotate by size and keep the configured number of backups", () => {
    openLogFile(file, { maxBytes: 250, backupCount: 2 });

    for (let n = 1; n <= 7; n++) {
      log.error(entry(n));
    }

    expect(readLines(file)).toEqual([` [Test] [ERROR] ${entry(7)}`]);
    expect(readLines(`${file}.1`)).toEqual([` [Test] [ERROR] ${entry(5)}`, ` [Test] [ERROR] ${entry(6)}`]);
    expect(readLines(`${file}.2`)).toEqual([` [Test] [ERROR] ${entry(3)}`, ` [Test] [ERROR] ${entry(4)}`]);
    expect(existsSync(`${file}.3`)).toBe(false);
  });

  it("should count an existing file towards the size limit", () => {
    openLogFile(file, { maxBytes: 250, backupCount: 1 });
    closeLogFile();
    writeFileSync(file, "x".repeat(199) + "\n");

    openLogFile(file, { maxBytes: 250, backupCount: 1 });
    log.error(entry(1));

    expect(readFileSync(`${file}.1`, "utf8")).toBe("x".repeat(199) + "\n");
    expect(readLines(file)).toEqual([` [Test] [ERROR] ${entry(1)}`]);
  });

  it("should stop writing after close", () => {
    openLogFile(file);
    log.error("before");
    closeLogFile();
    log.error("after");

    expect(readLines(file)).toEqual([" [Test] [ERROR] before"]);
  });
});

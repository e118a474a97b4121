/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.test.ts: Tests for buffered log file writes and trimming.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

type FileLogger = typeof import("./fileLogger.js");

const TIMESTAMP = "\\[\\d{4}/\\d{2}/\\d{2} \\d{2}:\\d{2}:\\d{2}\\.\\d{3}\\] ";

let fileLogger: FileLogger;
let logDir: string;
let logPath: string;

/**
 * Fifty 40-byte lines: "line 00 xxx...x\n" through "line 49 xxx...x\n".
 */
function seedLines(): string[] {

  return Array.from({ length: 50 }, (_, index) => "line " + String(index).padStart(2, "0") + " " + "x".repeat(31) + "\n");
}

describe("file logger", () => {

  beforeEach(async () => {

    // The logger keeps module state, so every test loads a fresh copy. The flush interval never fires; tests flush explicitly.
    vi.resetModules();
    vi.useFakeTimers({ toFake: [ "setInterval", "clearInterval" ] });

    fileLogger = await import("./fileLogger.js");
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), "stillwatch-log-"));
    logPath = path.join(logDir, "logs", "stillwatch.log");
  });

  afterEach(() => {

    fileLogger.shutdownFileLogger();
    vi.useRealTimers();
    fs.rmSync(logDir, { force: true, recursive: true });
  });

  it("creates the log file and its directory", async () => {

    await fileLogger.initializeFileLogger(logPath, 1048576);

    expect(fs.readFileSync(logPath, "utf-8")).toBe("");
  });

  it("ignores entries written before initialization", async () => {

    fileLogger.writeLogEntry("info", "Too early.");

    await fileLogger.initializeFileLogger(logPath, 1048576);
    fileLogger.flushLogBufferSync();

    expect(fs.readFileSync(logPath, "utf-8")).toBe("");
  });

  it("buffers entries until a synchronous flush", async () => {

    await fileLogger.initializeFileLogger(logPath, 1048576);

    fileLogger.writeLogEntry("info", "Started.");
    fileLogger.writeLogEntry("warn", "Slow stream.", "\x1b[33m");
    fileLogger.writeLogEntry("debug", "12 frames.", undefined, "detection:probe");

    expect(fs.readFileSync(logPath, "utf-8")).toBe("");

    fileLogger.flushLogBufferSync();

    const lines = fs.readFileSync(logPath, "utf-8").split("\n");

    expect(lines).toHaveLength(4);
    expect(lines[0]).toMatch(new RegExp("^" + TIMESTAMP + "Started\\.$"));
    expect(lines[1]).toMatch(new RegExp("^" + TIMESTAMP + "\x1b\\[33m\\[WARN\\] Slow stream\\.\x1b\\[0m$"));
    expect(lines[2]).toMatch(new RegExp("^" + TIMESTAMP + "\\[DEBUG:detection:probe\\] 12 frames\\.$"));
    expect(lines[3]).toBe("");
  });

  it("appends on an asynchronous flush and empties the buffer", async () => {

    await fileLogger.initializeFileLogger(logPath, 1048576);

    fileLogger.writeLogEntry("error", "Boom.");
    await fileLogger.flushLogBuffer();
    fileLogger.flushLogBufferSync();

    expect(fs.readFileSync(logPath, "utf-8")).toMatch(new RegExp("^" + TIMESTAMP + "\\[ERROR\\] Boom\\.\n$"));
  });

  it("trims an oversized file to the newest complete lines within half the maximum", async () => {

    const lines = seedLines();

    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fs.writeFileSync(logPath, lines.join(""));

    await fileLogger.initializeFileLogger(logPath, 1000);

    // The hundredth write checks the file size.
    for(let index = 0; index < 100; index++) {

      fileLogger.writeLogEntry("info", "Entry " + String(index) + ".");
    }

    // 2000 bytes cut at 1500 lands inside line 37, so the file keeps lines 38 through 49.
    const expected = lines.slice(38).join("");

    await vi.waitFor(() => {

      expect(fs.readFileSync(logPath, "utf-8")).toBe(expected);
    });

    expect(fs.existsSync(logPath + ".tmp")).toBe(false);
  });

  it("leaves the file whole while debug logging is on", async () => {

    const { initDebugFilter } = await import("./debugFilter.js");
    const seeded = seedLines().join("");

    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fs.writeFileSync(logPath, seeded);

    initDebugFilter("*");
    await fileLogger.initializeFileLogger(logPath, 1000);

    for(let index = 0; index < 100; index++) {

      fileLogger.writeLogEntry("info", "Entry " + String(index) + ".");
    }

    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(fs.readFileSync(logPath, "utf-8")).toBe(seeded);
  });
});

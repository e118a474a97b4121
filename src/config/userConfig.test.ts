/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.test.ts: Tests for config file loading and layered merging.
 */
import { DEFAULTS, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

describe("mergeConfiguration", () => {

  it("returns the defaults when nothing is overridden", () => {

    expect(mergeConfiguration({}, {})).toEqual(DEFAULTS);
  });

  it("applies config file values over defaults", () => {

    const config = mergeConfiguration({ detection: { minFrames: 4, timeout: 10 } }, {});

    expect(config.detection.timeout).toBe(10);
    expect(config.detection.minFrames).toBe(4);
    expect(config.detection.sampleDuration).toBe(3);
  });

  it("applies environment variables over config file values", () => {

    const config = mergeConfiguration({ detection: { timeout: 10 }, server: { port: 6000 } }, { DETECTION_TIMEOUT: "7.5", PORT: "8080" });

    expect(config.detection.timeout).toBe(7.5);
    expect(config.server.port).toBe(8080);
  });

  it("ignores environment values that do not parse", () => {

    expect(mergeConfiguration({}, { MIN_FRAMES: "many" }).detection.minFrames).toBe(2);
  });

  it("ignores config file values of the wrong type", () => {

    expect(mergeConfiguration(JSON.parse("{ \"detection\": { \"minFrames\": \"5\" } }"), {}).detection.minFrames).toBe(2);
  });

  it("treats an empty path variable as unset", () => {

    expect(mergeConfiguration({ detection: { ffmpegPath: "/opt/ffmpeg" } }, { FFMPEG_PATH: "" }).detection.ffmpegPath).toBeNull();
    expect(mergeConfiguration({}, { FFMPEG_PATH: "/usr/local/bin/ffmpeg" }).detection.ffmpegPath).toBe("/usr/local/bin/ffmpeg");
  });

  it("does not modify the defaults", () => {

    mergeConfiguration({ server: { host: "127.0.0.1" } }, { CACHE_SIZE: "5" });

    expect(DEFAULTS.server.host).toBe("0.0.0.0");
    expect(DEFAULTS.detection.cacheSize).toBe(100);
  });
});

describe("getNestedValue", () => {

  it("reads dot-separated paths", () => {

    expect(getNestedValue(DEFAULTS, "server.port")).toBe(5690);
    expect(getNestedValue(DEFAULTS, "server.missing")).toBeUndefined();
    expect(getNestedValue(DEFAULTS, "paths.logFile.deeper")).toBeUndefined();
  });
});

describe("loadUserConfig", () => {

  let dir: string;

  beforeEach(() => {

    dir = fs.mkdtempSync(path.join(os.tmpdir(), "stillwatch-config-"));
  });

  afterEach(() => {

    fs.rmSync(dir, { force: true, recursive: true });
  });

  it("returns an empty config when the file does not exist", async () => {

    await expect(loadUserConfig(path.join(dir, "config.json"))).resolves.toEqual({ config: {}, parseError: false });
  });

  it("loads a settings object", async () => {

    const file = path.join(dir, "config.json");

    fs.writeFileSync(file, JSON.stringify({ detection: { sampleDuration: 4 } }));

    await expect(loadUserConfig(file)).resolves.toEqual({ config: { detection: { sampleDuration: 4 } }, parseError: false });
  });

  it("flags invalid JSON", async () => {

    const file = path.join(dir, "config.json");

    fs.writeFileSync(file, "{ detection: ");

    const result = await loadUserConfig(file);

    expect(result.parseError).toBe(true);
    expect(result.config).toEqual({});
  });

  it("flags JSON that is not an object of categories", async () => {

    const file = path.join(dir, "config.json");

    fs.writeFileSync(file, "[ 1, 2 ]");

    await expect(loadUserConfig(file)).resolves.toEqual({ config: {}, parseError: true, parseErrorMessage: "expected an object of setting categories" });
  });
});

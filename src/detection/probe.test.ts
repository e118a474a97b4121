/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * probe.test.ts: Tests for FFmpeg probe arguments.
 */
import { describe, expect, it } from "vitest";
import { buildProbeArgs } from "./probe.js";

describe("buildProbeArgs", () => {

  it("samples the stream through the scene filter into the null muxer", () => {

    expect(buildProbeArgs("https://example.com/live.m3u8", 3)).toEqual([
      "-i", "https://example.com/live.m3u8",
      "-t", "3",
      "-vf", "select=gt(scene\\,0.01)",
      "-vsync", "0",
      "-f", "null",
      "-loglevel", "error",
      "-"
    ]);
  });

  it("passes the URL as a single argument", () => {

    const args = buildProbeArgs("http://example.com/live stream.m3u8?a=1&b=2", 1.5);

    expect(args[1]).toBe("http://example.com/live stream.m3u8?a=1&b=2");
    expect(args[3]).toBe("1.5");
  });
});

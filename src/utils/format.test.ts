/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.test.ts: Tests for log formatting helpers.
 */
import { URL_LOG_LENGTH, truncateUrl } from "./format.js";
import { describe, expect, it } from "vitest";

describe("truncateUrl", () => {

  it("leaves a URL of at most 50 characters alone", () => {

    const url = "http://example.com/" + "a".repeat(URL_LOG_LENGTH - 19);

    expect(url.length).toBe(50);
    expect(truncateUrl(url)).toBe(url);
  });

  it("cuts a longer URL to 50 characters plus an ellipsis", () => {

    const url = "http://example.com/live/stream.m3u8?token=" + "x".repeat(40);

    expect(truncateUrl(url)).toBe("http://example.com/live/stream.m3u8?token=xxxxxxxx...");
  });
});

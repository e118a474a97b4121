/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.test.ts: Tests for category-based debug filtering.
 */
import { afterEach, describe, expect, it } from "vitest";
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";

describe("debug filter", () => {

  afterEach(() => {

    initDebugFilter("");
  });

  it("is disabled by an empty pattern", () => {

    initDebugFilter("  ,  ");

    expect(isAnyDebugEnabled()).toBe(false);
    expect(isCategoryEnabled("detection")).toBe(false);
  });

  it("enables a category and its sub-categories", () => {

    initDebugFilter("detection");

    expect(isCategoryEnabled("detection")).toBe(true);
    expect(isCategoryEnabled("detection:probe")).toBe(true);
    expect(isCategoryEnabled("ffmpeg")).toBe(false);
  });

  it("does not treat a shared prefix without a colon as a sub-category", () => {

    initDebugFilter("detection");

    expect(isCategoryEnabled("detections")).toBe(false);
  });

  it("lets exclusions win over the wildcard", () => {

    initDebugFilter("*,-detection:cache");

    expect(isCategoryEnabled("config")).toBe(true);
    expect(isCategoryEnabled("detection:probe")).toBe(true);
    expect(isCategoryEnabled("detection:cache")).toBe(false);
  });

  it("excludes every sub-category of an excluded namespace", () => {

    initDebugFilter("detection, -detection");

    expect(isAnyDebugEnabled()).toBe(true);
    expect(isCategoryEnabled("detection")).toBe(false);
    expect(isCategoryEnabled("detection:probe")).toBe(false);
  });

  it("replaces the previous configuration", () => {

    initDebugFilter("ffmpeg");
    initDebugFilter("config");

    expect(isCategoryEnabled("ffmpeg")).toBe(false);
    expect(isCategoryEnabled("config")).toBe(true);
  });
});

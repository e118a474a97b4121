/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Frozen-screen detection exports for Stillwatch.
 */
export * from "./cache.js";
export * from "./classifier.js";
export * from "./detector.js";
export * from "./interpreter.js";
export * from "./probe.js";
export * from "./runner.js";
export * from "./types.js";

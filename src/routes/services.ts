/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * services.ts: Collaborators the HTTP endpoints are built around.
 */
import type { DetectionCache } from "../detection/index.js";

/**
 * Services handed to setupRoutes(). startServer() builds them from CONFIG; tests build them around stubs.
 */
export interface AppServices {

  // Memoized frozen-screen detection.
  cache: DetectionCache;

  // Reports whether FFmpeg can be run. Used by /health.
  ffmpegAvailable: () => Promise<boolean>;
}

/**
 * Reads a non-empty string parameter from a query string or JSON body value.
 * @param value - The raw value as Express parsed it.
 * @returns The string, or undefined when absent, empty or not a single string.
 */
export function readUrlParameter(value: unknown): string | undefined {

  return ((typeof value === "string") && (value.length > 0)) ? value : undefined;
}

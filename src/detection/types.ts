/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * types.ts: Detection result types for Stillwatch.
 */
import type { Nullable } from "../types/index.js";

/**
 * Structured outcome category of a check. Callers branch on this rather than on the reason text.
 *
 * - "filtered": the URL did not look like a video stream; no probe ran.
 * - "timeout": FFmpeg exceeded the probe timeout and was killed.
 * - "analysis-failed": FFmpeg exited with an error or printed no frame count.
 * - "error": FFmpeg could not be launched or the probe failed unexpectedly.
 * - "sparse-frames": fewer scene-changed frames than the configured minimum.
 * - "short-execution": the probe finished in under 40% of the sample duration.
 * - "moving": the picture is changing.
 */
export type DetectionCode = "analysis-failed" | "error" | "filtered" | "moving" | "short-execution" | "sparse-frames" | "timeout";

/**
 * Verdict for one URL. `reason` is null only when the picture was confirmed to be moving.
 */
export interface DetectionResult {

  readonly code: DetectionCode;
  readonly frozen: boolean;
  readonly reason: Nullable<string>;
}

/**
 * Anything that can produce a verdict for a URL. Implemented by FrozenScreenDetector and by test doubles.
 */
export interface Detector {

  detect(url: string): Promise<DetectionResult>;
}

/**
 * Builds an immutable detection result.
 * @param frozen - Whether the picture is considered frozen.
 * @param code - Outcome category.
 * @param reason - Human-readable explanation, or null for a moving picture.
 * @returns The frozen result object.
 */
export function detectionResult(frozen: boolean, code: DetectionCode, reason: Nullable<string> = null): DetectionResult {

  return Object.freeze({ code, frozen, reason });
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * interpreter.ts: Turns FFmpeg probe diagnostics into a frozen-screen verdict.
 */
import type { DetectionResult } from "./types.js";
import { LOG } from "../utils/logger.js";
import type { Nullable } from "../types/index.js";
import { detectionResult } from "./types.js";

/*
 * VERDICT RULES
 *
 * FFmpeg's scene filter passes only frames that differ from their predecessor, so the "frame=N" count on stderr is the number of changed frames in the sample.
 *
 * 1. Exit status 0 with a frame count below minFrames: frozen (sparse frames).
 * 2. Non-zero exit, or no frame count at all: not frozen, analysis failed. An unreachable or broken stream is ambiguous and never reported as frozen.
 * 3. A probe that succeeded but took less than 40% of the sample duration: frozen or invalid stream (short execution).
 * 4. Otherwise: moving.
 */

// The first progress token on stderr. FFmpeg pads the number with spaces ("frame=   25").
const FRAME_COUNT_PATTERN = /frame=\s*(\d+)/;

// Fraction of the sample duration below which a successful probe is considered suspiciously fast.
export const SHORT_EXECUTION_RATIO = 0.4;

// How much of stderr to quote in the failure warning.
const STDERR_EXCERPT_LENGTH = 100;

/**
 * Raw facts about a finished probe.
 */
export interface ProbeOutcome {

  // Wall-clock seconds between launching FFmpeg and its exit.
  elapsedSeconds: number;

  // Process exit status; null when the process was killed by a signal.
  exitCode: Nullable<number>;

  // Captured stderr.
  stderr: string;
}

/**
 * Thresholds that turn a probe outcome into a verdict.
 */
export interface InterpretSettings {

  minFrames: number;
  sampleDuration: number;
}

/**
 * Extracts the changed-frame count from FFmpeg diagnostics.
 * @param stderr - FFmpeg's stderr output.
 * @returns The first "frame=N" value, or undefined if none is present.
 */
export function parseChangedFrames(stderr: string): number | undefined {

  const match = FRAME_COUNT_PATTERN.exec(stderr);

  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Applies the verdict rules to a finished probe.
 * @param outcome - Exit status, stderr and elapsed time of the probe.
 * @param settings - Frame threshold and sample duration the probe ran with.
 * @returns The verdict.
 */
export function interpretProbe(outcome: ProbeOutcome, settings: InterpretSettings): DetectionResult {

  const framesExtracted = parseChangedFrames(outcome.stderr);

  if((outcome.exitCode !== 0) || (framesExtracted === undefined)) {

    LOG.warn("Stream analysis failed or produced no frame count (exit code %s): %s...", outcome.exitCode, outcome.stderr.slice(0, STDERR_EXCERPT_LENGTH));

    return detectionResult(false, "analysis-failed", "stream analysis failed");
  }

  LOG.debug("detection:probe", "Changed frames: %d in %ss.", framesExtracted, outcome.elapsedSeconds.toFixed(2));

  if(framesExtracted < settings.minFrames) {

    return detectionResult(true, "sparse-frames", "too few changed frames (" + String(framesExtracted) + "), likely frozen");
  }

  if(outcome.elapsedSeconds < (settings.sampleDuration * SHORT_EXECUTION_RATIO)) {

    return detectionResult(true, "short-execution", "execution time abnormally short (" + outcome.elapsedSeconds.toFixed(2) + "s), likely frozen or invalid stream");
  }

  return detectionResult(false, "moving");
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * detector.ts: Frozen-screen detection for a single stream URL.
 */
import type { DetectionResult, Detector } from "./types.js";
import { LOG, formatError, generateCheckId, getCheckId, isAbortError, runWithCheckContext, truncateUrl } from "../utils/index.js";
import type { ProcessResult, ProcessRunner } from "./runner.js";
import { buildProbeArgs } from "./probe.js";
import { detectionResult } from "./types.js";
import { interpretProbe } from "./interpreter.js";
import { isVideoUrl } from "./classifier.js";

/**
 * Construction options for FrozenScreenDetector.
 */
export interface DetectorOptions {

  // Millisecond clock used to time probes. Defaults to performance.now().
  clock?: () => number;

  // Changed frames below which the picture counts as frozen. Defaults to 2.
  minFrames?: number;

  // Runs FFmpeg. Tests supply a stub.
  runner: ProcessRunner;

  // Seconds of stream to sample. Defaults to 3.
  sampleDuration?: number;

  // Seconds before the probe is killed and reported as timed out. Defaults to 5.
  timeout?: number;
}

/**
 * Detects whether a live stream shows a frozen picture. Each call filters the URL, runs one FFmpeg probe bounded by the timeout, and interprets the result. The
 * returned promise never rejects: every failure is expressed as a DetectionResult.
 */
export class FrozenScreenDetector implements Detector {

  private readonly clock: () => number;
  private readonly minFrames: number;
  private readonly runner: ProcessRunner;
  private readonly sampleDuration: number;
  private readonly timeout: number;

  constructor(options: DetectorOptions) {

    this.clock = options.clock ?? ((): number => performance.now());
    this.minFrames = options.minFrames ?? 2;
    this.runner = options.runner;
    this.sampleDuration = options.sampleDuration ?? 3;
    this.timeout = options.timeout ?? 5;
  }

  /**
   * Checks a stream URL.
   * @param url - The stream URL.
   * @returns The verdict.
   */
  async detect(url: string): Promise<DetectionResult> {

    if(!isVideoUrl(url)) {

      return detectionResult(false, "filtered", "not a video stream URL");
    }

    return runWithCheckContext({ checkId: generateCheckId() }, async () => this.probe(url));
  }

  /**
   * Runs the FFmpeg probe against the timeout and interprets whatever comes back first.
   * @param url - A URL that passed the classifier.
   * @returns The verdict.
   */
  private async probe(url: string): Promise<DetectionResult> {

    const controller = new AbortController();
    const started = this.clock();
    const args = buildProbeArgs(url, this.sampleDuration);
    let timer: ReturnType<typeof setTimeout> | undefined;

    LOG.debug("detection", "Probing %s for %ss.", truncateUrl(url), this.sampleDuration);

    // Wrapping the call turns a synchronous throw from the runner into a rejection.
    const pending = (async (): Promise<ProcessResult> => this.runner.run(args, controller.signal))();
    const expiry = new Promise<"timeout">((resolve) => {

      timer = setTimeout(() => resolve("timeout"), this.timeout * 1000);
    });

    let outcome: ProcessResult | "timeout";

    try {

      outcome = await Promise.race([ pending, expiry ]);
    } catch(error) {

      LOG.debug("detection", "Check of %s failed: %s.", truncateUrl(url), formatError(error));

      return detectionResult(false, "error", "detection error: " + ((error instanceof Error) ? error.message : String(error)));
    } finally {

      clearTimeout(timer);
    }

    if(outcome === "timeout") {

      controller.abort();
      this.reapAfterTimeout(pending);

      LOG.debug("detection", "Check of %s timed out after %ss.", truncateUrl(url), this.timeout);

      return detectionResult(false, "timeout", "detection timed out (" + String(this.timeout) + "s)");
    }

    const elapsedSeconds = (this.clock() - started) / 1000;

    return interpretProbe({ elapsedSeconds, exitCode: outcome.exitCode, stderr: outcome.stderr }, { minFrames: this.minFrames, sampleDuration: this.sampleDuration });
  }

  /**
   * Observes the settlement of a probe that lost the race against the timeout. The runner rejects with an abort error once the killed process is reaped; anything
   * else is logged.
   * @param pending - The runner's promise.
   */
  private reapAfterTimeout(pending: Promise<ProcessResult>): void {

    const log = LOG.withCheckId(getCheckId() ?? "-");

    void pending.then((late) => {

      log.debug("detection", "Probe finished after its timeout with exit code %s; result discarded.", late.exitCode);
    }, (error: unknown) => {

      if(!isAbortError(error)) {

        log.debug("detection", "Probe failed after its timeout: %s.", formatError(error));
      }
    });
  }
}

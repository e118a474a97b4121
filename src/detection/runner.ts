/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * runner.ts: Child process execution for FFmpeg probes.
 */
import { LOG } from "../utils/logger.js";
import type { Nullable } from "../types/index.js";
import { getFFmpegCommand } from "../utils/ffmpeg.js";
import { spawn } from "node:child_process";

/**
 * What a finished probe process left behind.
 */
export interface ProcessResult {

  // Exit status, or null when the process was terminated by a signal.
  exitCode: Nullable<number>;

  // Everything the process wrote to stderr, decoded as UTF-8.
  stderr: string;
}

/**
 * Narrow capability for running an external tool. The detector only depends on this interface, so its interpretation logic can be exercised with a stub.
 *
 * Implementations must terminate the process when `signal` aborts and must reject rather than resolve in that case.
 */
export interface ProcessRunner {

  run(args: readonly string[], signal: AbortSignal): Promise<ProcessResult>;
}

/**
 * Creates the rejection value for a probe cancelled through its AbortSignal.
 * @returns An Error named "AbortError".
 */
function createAbortError(): Error {

  const error = new Error("FFmpeg probe was aborted.");

  error.name = "AbortError";

  return error;
}

/**
 * Runs FFmpeg as a child process. stdin and stdout are ignored; stderr, where FFmpeg writes its diagnostics and progress, is captured. An aborted signal kills the
 * child with SIGKILL and the returned promise rejects once the child has been reaped.
 */
export class FFmpegRunner implements ProcessRunner {

  private readonly command: () => string;

  /**
   * @param command - Returns the executable to spawn. Defaults to the FFmpeg path resolved at startup.
   */
  constructor(command: () => string = getFFmpegCommand) {

    this.command = command;
  }

  async run(args: readonly string[], signal: AbortSignal): Promise<ProcessResult> {

    if(signal.aborted) {

      throw createAbortError();
    }

    return new Promise<ProcessResult>((resolve, reject) => {

      const child = spawn(this.command(), args, { stdio: [ "ignore", "ignore", "pipe" ] });
      const chunks: string[] = [];
      let killed = false;

      const onAbort = (): void => {

        killed = true;

        LOG.debug("ffmpeg", "Killing FFmpeg process %s.", child.pid ?? "(not started)");

        child.kill("SIGKILL");
      };

      signal.addEventListener("abort", onAbort, { once: true });

      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (chunk: string) => {

        chunks.push(chunk);
      });

      // Spawn failures (e.g., ENOENT when FFmpeg is missing) arrive here.
      child.on("error", (error) => {

        signal.removeEventListener("abort", onAbort);
        reject(error);
      });

      // "close" fires after the process has exited and its stdio has been drained, so the captured stderr is complete.
      child.on("close", (code, exitSignal) => {

        signal.removeEventListener("abort", onAbort);

        if(killed) {

          reject(createAbortError());

          return;
        }

        LOG.debug("ffmpeg", "FFmpeg exited with code %s%s.", code, exitSignal ? " (signal " + exitSignal + ")" : "");

        resolve({ exitCode: code, stderr: chunks.join("") });
      });
    });
  }
}

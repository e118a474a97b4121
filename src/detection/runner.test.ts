/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * runner.test.ts: Tests for the FFmpeg child process runner against a fake child.
 */
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { ChildProcess } from "node:child_process";
import { EventEmitter } from "node:events";
import { FFmpegRunner } from "./runner.js";
import { PassThrough } from "node:stream";
import { spawn } from "node:child_process";

vi.mock("node:child_process", () => ({ spawn: vi.fn() }));

/**
 * Stand-in for a spawned FFmpeg process. Killing it closes it the way a real child reports a signal exit.
 */
class FakeChild extends EventEmitter {

  readonly kill = vi.fn((signal: NodeJS.Signals): boolean => {

    this.emit("close", null, signal);

    return true;
  });

  readonly pid = 4242;
  readonly stderr = new PassThrough();
}

const spawnMock = vi.mocked(spawn);
let child: FakeChild;

/**
 * Lets the stderr stream deliver buffered chunks.
 */
async function drain(): Promise<void> {

  await new Promise((resolve) => setImmediate(resolve));
}

describe("FFmpegRunner", () => {

  beforeEach(() => {

    child = new FakeChild();
    spawnMock.mockReset();
    spawnMock.mockReturnValue(child as unknown as ChildProcess);
  });

  it("spawns the resolved command with stderr piped", async () => {

    const runner = new FFmpegRunner(() => "/opt/ffmpeg/bin/ffmpeg");
    const pending = runner.run([ "-i", "http://example.com/live.m3u8" ], new AbortController().signal);

    child.emit("close", 0, null);
    await pending;

    expect(spawnMock).toHaveBeenCalledWith("/opt/ffmpeg/bin/ffmpeg", [ "-i", "http://example.com/live.m3u8" ], { stdio: [ "ignore", "ignore", "pipe" ] });
  });

  it("resolves with the exit code and the captured stderr", async () => {

    const pending = new FFmpegRunner(() => "ffmpeg").run([], new AbortController().signal);

    child.stderr.write("frame=   12 ");
    child.stderr.write("fps=0.0");
    await drain();
    child.emit("close", 0, null);

    await expect(pending).resolves.toEqual({ exitCode: 0, stderr: "frame=   12 fps=0.0" });
  });

  it("rejects when the process cannot be started", async () => {

    const pending = new FFmpegRunner(() => "ffmpeg").run([], new AbortController().signal);

    child.emit("error", new Error("spawn ffmpeg ENOENT"));

    await expect(pending).rejects.toThrow("spawn ffmpeg ENOENT");
  });

  it("kills the process with SIGKILL when aborted and rejects with an abort error", async () => {

    const controller = new AbortController();
    const pending = new FFmpegRunner(() => "ffmpeg").run([], controller.signal);

    controller.abort();

    await expect(pending).rejects.toMatchObject({ message: "FFmpeg probe was aborted.", name: "AbortError" });
    expect(child.kill).toHaveBeenCalledWith("SIGKILL");
  });

  it("does not spawn when the signal is already aborted", async () => {

    const controller = new AbortController();

    controller.abort();

    await expect(new FFmpegRunner(() => "ffmpeg").run([], controller.signal)).rejects.toMatchObject({ name: "AbortError" });
    expect(spawnMock).not.toHaveBeenCalled();
  });
});

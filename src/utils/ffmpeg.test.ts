/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpeg.test.ts: Tests for FFmpeg path resolution against a fake child process.
 */
import { describe, expect, it, vi } from "vitest";
import { getFFmpegCommand, isFFmpegAvailable } from "./ffmpeg.js";
import type { ChildProcess } from "node:child_process";
import { EventEmitter } from "node:events";
import { spawn } from "node:child_process";

vi.mock("node:child_process", () => ({ spawn: vi.fn() }));

const spawnMock = vi.mocked(spawn);

/**
 * Makes the next spawn fail the way a missing executable does.
 */
function spawnFails(): void {

  spawnMock.mockImplementationOnce(() => {

    const child = new EventEmitter();

    setImmediate(() => child.emit("error", new Error("spawn ffmpeg ENOENT")));

    return child as unknown as ChildProcess;
  });
}

/**
 * Makes the next spawn exit with the given code.
 */
function spawnExits(code: number): void {

  spawnMock.mockImplementationOnce(() => {

    const child = new EventEmitter();

    setImmediate(() => child.emit("exit", code, null));

    return child as unknown as ChildProcess;
  });
}

describe("FFmpeg resolution", () => {

  it("looks again after a failed lookup and caches the first success", async () => {

    spawnFails();

    expect(await isFFmpegAvailable()).toBe(false);
    expect(getFFmpegCommand()).toBe("ffmpeg");

    spawnExits(1);

    expect(await isFFmpegAvailable()).toBe(false);

    spawnExits(0);

    expect(await isFFmpegAvailable()).toBe(true);
    expect(spawnMock).toHaveBeenCalledTimes(3);
    expect(spawnMock).toHaveBeenLastCalledWith("ffmpeg", [ "-version" ], { stdio: [ "ignore", "ignore", "ignore" ] });

    expect(await isFFmpegAvailable()).toBe(true);
    expect(spawnMock).toHaveBeenCalledTimes(3);
  });
});

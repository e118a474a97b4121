/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * probe.ts: FFmpeg argument construction for frozen-screen probes.
 */

/**
 * Scene-change score a frame must exceed to count as changed.
 */
export const SCENE_CHANGE_THRESHOLD = 0.01;

/**
 * Builds the FFmpeg arguments for one probe. FFmpeg reads `sampleDuration` seconds of the stream, keeps only frames whose scene-change score exceeds the threshold,
 * and discards the output. Its final progress line on stderr ("frame=N") then reports how many frames changed.
 *
 * - `-i <url>`: Read the stream
 * - `-t <seconds>`: Stop after the sample duration
 * - `-vf select=gt(scene\,0.01)`: Pass only frames that differ from their predecessor. The comma is escaped for the filtergraph parser; no shell is involved
 * - `-vsync 0`: Neither duplicate nor drop frames, so the count is exact
 * - `-f null -`: Null muxer, no output file
 * - `-loglevel error`: Minimal diagnostics
 * @param url - The stream URL.
 * @param sampleDuration - Seconds of stream to sample.
 * @returns The argument list, without the FFmpeg executable itself.
 */
export function buildProbeArgs(url: string, sampleDuration: number): string[] {

  return [
    "-i", url,
    "-t", String(sampleDuration),
    "-vf", "select=gt(scene\\," + String(SCENE_CHANGE_THRESHOLD) + ")",
    "-vsync", "0",
    "-f", "null",
    "-loglevel", "error",
    "-"
  ];
}

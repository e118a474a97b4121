/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * classifier.ts: Cheap lexical pre-filter for stream URLs.
 */

// Literal prefixes a URL must start with. "http" also admits "https". The match is case-sensitive and no URL parsing takes place.
const ACCEPTED_PREFIXES = [ "http", "rtmp" ];

// Substrings that mark a URL as a likely video stream, matched against the lower-cased URL.
const VIDEO_INDICATORS = [ ".m3u8", ".mp4", ".flv", ".ts", "stream", "live", "m3u8" ];

/**
 * Decides whether a URL is plausibly a video stream worth probing. This is a fast lexical filter run before the expensive FFmpeg probe, so it errs on the side of
 * accepting: any URL under an accepted prefix that mentions a common playlist, container or streaming keyword passes.
 * @param url - The URL to classify.
 * @returns True if the URL should be probed.
 */
export function isVideoUrl(url: string): boolean {

  if(!ACCEPTED_PREFIXES.some((prefix) => url.startsWith(prefix))) {

    return false;
  }

  const lowered = url.toLowerCase();

  return VIDEO_INDICATORS.some((indicator) => lowered.includes(indicator));
}

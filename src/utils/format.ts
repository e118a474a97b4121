/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Log formatting helpers for Stillwatch.
 */

// Log lines quote at most this much of a URL. Stream URLs often carry long signed query strings.
export const URL_LOG_LENGTH = 50;

/**
 * Shortens a URL for log output.
 * @param url - The URL.
 * @returns The first URL_LOG_LENGTH characters, followed by "..." when anything was cut.
 */
export function truncateUrl(url: string): string {

  return (url.length > URL_LOG_LENGTH) ? url.slice(0, URL_LOG_LENGTH) + "..." : url;
}

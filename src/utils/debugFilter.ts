/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for Stillwatch.
 */
import type { Nullable } from "../types/index.js";

/* STILLWATCH_DEBUG (or --debug, which means "*") selects which debug categories are written. The value is a comma-separated list of tokens:
 *
 *   *                  every category
 *   detection          detection itself and everything below it (detection:probe, detection:cache)
 *   -detection:cache   never detection:cache, whatever else is selected
 *
 * So "*,-detection:cache" logs everything except cache bookkeeping, and "detection:probe" logs only the frame counts.
 */

/**
 * A parsed STILLWATCH_DEBUG value.
 */
interface DebugSelection {

  readonly everything: boolean;
  readonly excluded: readonly string[];
  readonly selected: readonly string[];
}

// Null while debug output is off.
let selection: Nullable<DebugSelection> = null;

/**
 * Tests whether a category is the given namespace or lives below it.
 * @param namespace - A category name from the debug setting.
 * @param category - The category of a log line.
 * @returns True on an exact match or a "namespace:" prefix.
 */
function isWithin(namespace: string, category: string): boolean {

  return (category === namespace) || category.startsWith(namespace + ":");
}

/**
 * Replaces the active debug selection. An empty or blank value turns debug output off.
 * @param pattern - Comma-separated category tokens, e.g. "detection,-detection:cache".
 */
export function initDebugFilter(pattern: string): void {

  const tokens = pattern.split(",").map((token) => token.trim()).filter((token) => token.length > 0);

  if(!tokens.length) {

    selection = null;

    return;
  }

  selection = {

    everything: tokens.includes("*"),
    excluded: tokens.filter((token) => token.startsWith("-")).map((token) => token.slice(1)),
    selected: tokens.filter((token) => (token !== "*") && !token.startsWith("-"))
  };
}

/**
 * Decides whether debug lines of a category are written. Exclusions override both "*" and explicit selections.
 * @param category - The category of the log line, e.g. "detection:probe".
 * @returns True if the line should be written.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!selection || selection.excluded.some((namespace) => isWithin(namespace, category))) {

    return false;
  }

  return selection.everything || selection.selected.some((namespace) => isWithin(namespace, category));
}

/**
 * Whether any debug setting is active. The logger checks this before formatting a debug line, and the file logger skips trimming while it is true.
 * @returns True unless debug output is off.
 */
export function isAnyDebugEnabled(): boolean {

  return selection !== null;
}

/**
 * A debug category and what it covers. Printed by --list-env.
 */
export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "config", description: "Configuration file loading and environment overrides." },
  { category: "detection", description: "Check outcomes: timeouts, execution errors." },
  { category: "detection:cache", description: "Verdict cache hits, misses, evictions and clears." },
  { category: "detection:probe", description: "Changed-frame counts and elapsed time per FFmpeg probe." },
  { category: "ffmpeg", description: "FFmpeg path resolution and process lifecycle." }
];

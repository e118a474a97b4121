/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * cache.ts: Memoizing LRU cache of frozen-screen verdicts keyed by URL.
 */
import type { DetectionResult, Detector } from "./types.js";
import { LOG } from "../utils/logger.js";
import { truncateUrl } from "../utils/format.js";

/*
 * VERDICT CACHE
 *
 * Verdicts are memoized by the exact URL string. A Map keeps insertion order, so re-inserting an entry on every hit keeps the least recently used URL first in
 * iteration order, and eviction removes from the front. Entries never expire on their own; clearAll() is the only way to force a fresh probe of a URL that is
 * still cached.
 *
 * Concurrent lookups of a URL that is not cached yet share one in-flight probe. JavaScript runs the check-then-insert sequence below without interleaving, so no
 * further locking is needed. A clearAll() while a probe is in flight drops that probe's result instead of caching it.
 */

/**
 * Default number of URLs whose verdicts are kept.
 */
export const DEFAULT_CACHE_SIZE = 100;

export class DetectionCache {

  private readonly detector: Detector;
  private readonly entries = new Map<string, DetectionResult>();
  private generation = 0;
  private readonly inFlight = new Map<string, Promise<DetectionResult>>();
  private readonly maxEntries: number;

  /**
   * @param detector - Produces verdicts for URLs that are not cached.
   * @param capacity - Maximum number of cached URLs. Values below 1 are raised to 1.
   */
  constructor(detector: Detector, capacity = DEFAULT_CACHE_SIZE) {

    this.detector = detector;
    this.maxEntries = Math.max(1, Math.floor(capacity));
  }

  /**
   * Maximum number of cached URLs.
   */
  get capacity(): number {

    return this.maxEntries;
  }

  /**
   * Number of URLs currently cached.
   */
  get size(): number {

    return this.entries.size;
  }

  /**
   * Returns the cached verdict for a URL, or probes it, caches the verdict and returns it.
   * @param url - The stream URL, used verbatim as the cache key.
   * @returns The verdict.
   */
  async getOrCompute(url: string): Promise<DetectionResult> {

    const cached = this.entries.get(url);

    if(cached) {

      // Refresh recency.
      this.entries.delete(url);
      this.entries.set(url, cached);

      LOG.debug("detection:cache", "Cache hit for %s.", truncateUrl(url));

      return cached;
    }

    const pending = this.inFlight.get(url);

    if(pending) {

      LOG.debug("detection:cache", "Joining in-flight check for %s.", truncateUrl(url));

      return pending;
    }

    const generation = this.generation;
    const computation = this.detector.detect(url).then((result) => {

      if(generation === this.generation) {

        this.store(url, result);
      }

      return result;
    }).finally(() => {

      if(this.inFlight.get(url) === computation) {

        this.inFlight.delete(url);
      }
    });

    this.inFlight.set(url, computation);

    return computation;
  }

  /**
   * Discards every cached verdict. In-flight probes finish, but their verdicts are not cached.
   * @returns The number of verdicts discarded.
   */
  clearAll(): number {

    const cleared = this.entries.size;

    this.entries.clear();
    this.inFlight.clear();
    this.generation++;

    LOG.debug("detection:cache", "Cleared %d cached verdicts.", cleared);

    return cleared;
  }

  /**
   * Inserts a verdict, evicting least recently used entries to stay within capacity.
   * @param url - The cache key.
   * @param result - The verdict.
   */
  private store(url: string, result: DetectionResult): void {

    this.entries.delete(url);

    for(const key of this.entries.keys()) {

      if(this.entries.size < this.maxEntries) {

        break;
      }

      LOG.debug("detection:cache", "Evicting %s.", truncateUrl(key));

      this.entries.delete(key);
    }

    this.entries.set(url, result);
  }
}

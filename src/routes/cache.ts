/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * cache.ts: Verdict cache routes for Stillwatch.
 */
import type { Express, Request, Response } from "express";
import type { DetectionCache } from "../detection/index.js";
import { LOG } from "../utils/index.js";

/**
 * Creates the GET and DELETE /cache endpoints. GET reports occupancy; DELETE discards every cached verdict so the next check of any URL probes again.
 * @param app - The Express application.
 * @param cache - The verdict cache.
 */
export function setupCacheEndpoint(app: Express, cache: DetectionCache): void {

  app.get("/cache", (_req: Request, res: Response): void => {

    res.json({ capacity: cache.capacity, size: cache.size });
  });

  app.delete("/cache", (_req: Request, res: Response): void => {

    const cleared = cache.clearAll();

    LOG.info("Verdict cache cleared (%d entries).", cleared);

    res.json({ cleared });
  });
}

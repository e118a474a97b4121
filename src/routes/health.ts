/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for Stillwatch.
 */
import type { Express, NextFunction, Request, Response } from "express";
import type { AppServices } from "./services.js";
import type { HealthStatus } from "../types/index.js";
import { getPackageVersion } from "../utils/index.js";

/* The health endpoint reports whether checks can run at all, along with cache occupancy and memory usage. Without FFmpeg every check would end in a detection
 * error, so a missing FFmpeg makes the service unhealthy and the endpoint answers HTTP 503 for load balancers and monitoring systems.
 */

/**
 * Creates a health check endpoint for monitoring application status.
 * @param app - The Express application.
 * @param services - The application services.
 */
export function setupHealthEndpoint(app: Express, services: AppServices): void {

  app.get("/health", async (_req: Request, res: Response, next: NextFunction): Promise<void> => {

    let ffmpegAvailable: boolean;

    try {

      ffmpegAvailable = await services.ffmpegAvailable();
    } catch(error) {

      next(error);

      return;
    }

    const memoryUsage = process.memoryUsage();

    const health: HealthStatus = {

      cache: {

        capacity: services.cache.capacity,
        size: services.cache.size
      },
      ffmpegAvailable,
      memory: {

        heapTotal: memoryUsage.heapTotal,
        heapUsed: memoryUsage.heapUsed,
        rss: memoryUsage.rss
      },
      status: ffmpegAvailable ? "healthy" : "unhealthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: getPackageVersion()
    };

    if(!ffmpegAvailable) {

      health.message = "FFmpeg is not available.";
    }

    res.status(ffmpegAvailable ? 200 : 503).json(health);
  });
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for Stillwatch.
 */
import type { AppServices } from "./services.js";
import type { Express } from "express";
import { setupCacheEndpoint } from "./cache.js";
import { setupClassifyEndpoint } from "./classify.js";
import { setupDetectEndpoint } from "./detect.js";
import { setupHealthEndpoint } from "./health.js";

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param services - The services the endpoints are built around.
 */
export function setupRoutes(app: Express, services: AppServices): void {

  setupCacheEndpoint(app, services.cache);
  setupClassifyEndpoint(app);
  setupDetectEndpoint(app, services.cache);
  setupHealthEndpoint(app, services);
}

export type { AppServices } from "./services.js";

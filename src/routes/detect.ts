/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * detect.ts: Frozen-screen detection routes for Stillwatch.
 */
import type { Express, NextFunction, Request, Response } from "express";
import type { DetectionCache } from "../detection/index.js";
import { readUrlParameter } from "./services.js";

/* The detection endpoints are what the monitoring system polls. GET takes the stream URL as a query parameter; POST takes it in a JSON body, which avoids escaping
 * long signed URLs into a query string. Both go through the verdict cache, so repeated polls of the same URL do not start new FFmpeg probes until the cache is
 * cleared via DELETE /cache.
 */

/**
 * Creates the GET and POST /detect endpoints.
 * @param app - The Express application.
 * @param cache - The verdict cache.
 */
export function setupDetectEndpoint(app: Express, cache: DetectionCache): void {

  const respond = async (url: string | undefined, res: Response, next: NextFunction): Promise<void> => {

    if(!url) {

      res.status(400).json({ error: "Missing required parameter: url." });

      return;
    }

    try {

      const result = await cache.getOrCompute(url);

      res.json({ code: result.code, frozen: result.frozen, reason: result.reason, url });
    } catch(error) {

      next(error);
    }
  };

  app.get("/detect", async (req: Request, res: Response, next: NextFunction): Promise<void> => {

    await respond(readUrlParameter(req.query.url), res, next);
  });

  app.post("/detect", async (req: Request, res: Response, next: NextFunction): Promise<void> => {

    const body: unknown = req.body;

    await respond(((typeof body === "object") && (body !== null) && ("url" in body)) ? readUrlParameter(body.url) : undefined, res, next);
  });
}

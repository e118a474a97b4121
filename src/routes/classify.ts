/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * classify.ts: URL classification route for Stillwatch.
 */
import type { Express, Request, Response } from "express";
import { isVideoUrl } from "../detection/index.js";
import { readUrlParameter } from "./services.js";

/**
 * Creates the GET /classify endpoint, which answers whether a URL would be probed at all. No FFmpeg process is started.
 * @param app - The Express application.
 */
export function setupClassifyEndpoint(app: Express): void {

  app.get("/classify", (req: Request, res: Response): void => {

    const url = readUrlParameter(req.query.url);

    if(!url) {

      res.status(400).json({ error: "Missing required parameter: url." });

      return;
    }

    res.json({ url, video: isVideoUrl(url) });
  });
}

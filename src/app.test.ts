/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.test.ts: HTTP endpoint tests against an application built around a stub detector.
 */
import type { DetectionResult, Detector } from "./detection/index.js";
import { DetectionCache, detectionResult } from "./detection/index.js";
import { describe, expect, it, vi } from "vitest";
import type { AppServices } from "./routes/index.js";
import { buildApp } from "./app.js";
import request from "supertest";

const STREAM_URL = "https://example.com/live/index.m3u8";

/**
 * Builds the services the routes need around a detector stub.
 */
function createServices(detect: (url: string) => Promise<DetectionResult>, ffmpegAvailable = true): AppServices & { detector: Detector } {

  const detector: Detector = { detect: vi.fn(detect) };

  return { cache: new DetectionCache(detector, 5), detector, ffmpegAvailable: async (): Promise<boolean> => ffmpegAvailable };
}

describe("detection endpoints", () => {

  it("rejects a GET without a url", async () => {

    const app = buildApp(createServices(async () => detectionResult(false, "moving")), "none");
    const res = await request(app).get("/detect");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Missing required parameter: url." });
  });

  it("rejects an empty url", async () => {

    const app = buildApp(createServices(async () => detectionResult(false, "moving")), "none");

    expect((await request(app).get("/detect").query({ url: "" })).status).toBe(400);
  });

  it("returns the verdict for a GET", async () => {

    const app = buildApp(createServices(async () => detectionResult(true, "sparse-frames", "too few changed frames (0), likely frozen")), "none");
    const res = await request(app).get("/detect").query({ url: STREAM_URL });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ code: "sparse-frames", frozen: true, reason: "too few changed frames (0), likely frozen", url: STREAM_URL });
  });

  it("returns the verdict for a POST", async () => {

    const app = buildApp(createServices(async () => detectionResult(false, "moving")), "none");
    const res = await request(app).post("/detect").send({ url: STREAM_URL });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ code: "moving", frozen: false, reason: null, url: STREAM_URL });
  });

  it("answers malformed JSON with a 400 without running a check", async () => {

    const services = createServices(async () => detectionResult(false, "moving"));
    const app = buildApp(services, "none");
    const res = await request(app).post("/detect").set("Content-Type", "application/json").send("{bad");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Invalid request body." });
    expect(services.detector.detect).not.toHaveBeenCalled();
  });

  it("rejects a POST without a url", async () => {

    const app = buildApp(createServices(async () => detectionResult(false, "moving")), "none");
    const res = await request(app).post("/detect").send({ stream: STREAM_URL });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Missing required parameter: url." });
  });

  it("serves repeated checks from the cache", async () => {

    const services = createServices(async () => detectionResult(false, "moving"));
    const app = buildApp(services, "none");

    await request(app).get("/detect").query({ url: STREAM_URL });
    await request(app).post("/detect").send({ url: STREAM_URL });

    expect(services.detector.detect).toHaveBeenCalledTimes(1);
  });

  it("answers 500 when detection fails unexpectedly", async () => {

    const app = buildApp(createServices(async () => Promise.reject(new Error("detector crashed"))), "none");
    const res = await request(app).get("/detect").query({ url: STREAM_URL });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Internal server error" });
  });
});

describe("classification endpoint", () => {

  it("classifies a URL without probing it", async () => {

    const services = createServices(async () => detectionResult(false, "moving"));
    const app = buildApp(services, "none");

    expect((await request(app).get("/classify").query({ url: STREAM_URL })).body).toEqual({ url: STREAM_URL, video: true });
    expect((await request(app).get("/classify").query({ url: "ftp://example.com/video.mp4" })).body).toEqual({ url: "ftp://example.com/video.mp4", video: false });
    expect(services.detector.detect).not.toHaveBeenCalled();
  });

  it("rejects a missing url", async () => {

    const app = buildApp(createServices(async () => detectionResult(false, "moving")), "none");

    expect((await request(app).get("/classify")).status).toBe(400);
  });
});

describe("cache endpoints", () => {

  it("reports occupancy and clears every verdict", async () => {

    const services = createServices(async () => detectionResult(false, "moving"));
    const app = buildApp(services, "none");

    expect((await request(app).get("/cache")).body).toEqual({ capacity: 5, size: 0 });

    await request(app).get("/detect").query({ url: STREAM_URL });

    expect((await request(app).get("/cache")).body).toEqual({ capacity: 5, size: 1 });
    expect((await request(app).delete("/cache")).body).toEqual({ cleared: 1 });
    expect((await request(app).get("/cache")).body).toEqual({ capacity: 5, size: 0 });

    await request(app).get("/detect").query({ url: STREAM_URL });

    expect(services.detector.detect).toHaveBeenCalledTimes(2);
  });
});

describe("health endpoint", () => {

  it("reports healthy when FFmpeg is available", async () => {

    const app = buildApp(createServices(async () => detectionResult(false, "moving")), "none");
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ cache: { capacity: 5, size: 0 }, ffmpegAvailable: true, status: "healthy" });
    expect(res.body).not.toHaveProperty("message");
  });

  it("reports unhealthy with 503 when FFmpeg is missing", async () => {

    const app = buildApp(createServices(async () => detectionResult(false, "moving"), false), "none");
    const res = await request(app).get("/health");

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ ffmpegAvailable: false, message: "FFmpeg is not available.", status: "unhealthy" });
  });
});

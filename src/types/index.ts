/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for Stillwatch.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values come from defaults, the user config file, environment variables and CLI flags, and are validated at startup before the server begins
 * accepting connections.
 */

/**
 * Frozen-screen detection configuration. These values are handed to the detector and the result cache when the application is built.
 */
export interface DetectionConfig {

  // Maximum number of distinct URLs whose verdicts are kept in memory. When a new URL would exceed this, the least recently used verdict is evicted. Environment
  // variable: CACHE_SIZE. Default: 100.
  cacheSize: number;

  // Path to the FFmpeg executable. When null, FFmpeg is looked up on the system PATH. Environment variable: FFMPEG_PATH.
  ffmpegPath: Nullable<string>;

  // Number of scene-changed frames below which a sample is considered frozen. Environment variable: MIN_FRAMES. Default: 2.
  minFrames: number;

  // Seconds of stream time FFmpeg reads per check. A probe that finishes in under 40% of this is treated as suspicious. Environment variable: SAMPLE_DURATION.
  // Default: 3.
  sampleDuration: number;

  // Hard wall-clock limit in seconds for a single FFmpeg probe. When exceeded, the process is killed and the check reports a timeout rather than a frozen picture.
  // Environment variable: DETECTION_TIMEOUT. Default: 5.
  timeout: number;
}

/**
 * HTTP request logging levels accepted by the logging configuration.
 */
export type HttpLogLevel = "all" | "errors" | "filtered" | "none";

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // Controls HTTP request logging level. "none" disables HTTP request logging, "errors" logs only 4xx and 5xx responses, "filtered" logs everything except
  // successful /health and /cache polling, "all" logs all requests. Environment variable: HTTP_LOG_LEVEL. Default: "errors".
  httpLogLevel: HttpLogLevel;

  // Maximum size of the log file in bytes. When the file exceeds this size, it is trimmed to half the size keeping only complete lines. Environment variable:
  // LOG_MAX_SIZE. Default: 1048576 (1MB). Valid range: 10240-104857600.
  maxSize: number;
}

/**
 * Filesystem paths that may be overridden.
 */
export interface PathsConfig {

  // Absolute path to the log file. When null, the log file lives in the data directory. Environment variable: STILLWATCH_LOG_FILE.
  logFile: Nullable<string>;
}

/**
 * HTTP server configuration controlling network binding.
 */
export interface ServerConfig {

  // IP address or hostname to bind the HTTP server. Use "0.0.0.0" to accept connections on all network interfaces, or "127.0.0.1" to accept only local
  // connections. Environment variable: HOST. Default: "0.0.0.0".
  host: string;

  // TCP port number for the HTTP server. Environment variable: PORT. Default: 5690. Valid range: 1-65535.
  port: number;
}

/**
 * Root configuration object.
 */
export interface Config {

  // Probe timing, frame threshold and cache capacity.
  detection: DetectionConfig;

  // Logging configuration.
  logging: LoggingConfig;

  // Filesystem path overrides.
  paths: PathsConfig;

  // HTTP server binding configuration.
  server: ServerConfig;
}

/*
 * HEALTH TYPES
 */

/**
 * Response body of the /health endpoint.
 */
export interface HealthStatus {

  // Verdict cache occupancy.
  cache: {

    capacity: number;
    size: number;
  };

  // Whether FFmpeg could be located and executed.
  ffmpegAvailable: boolean;

  // Node.js memory usage statistics in bytes.
  memory: {

    heapTotal: number;
    heapUsed: number;
    rss: number;
  };

  // Human-readable explanation when the service is not healthy.
  message?: string;

  // Overall status. "unhealthy" means no check can run.
  status: "healthy" | "unhealthy";

  // ISO 8601 timestamp of the report.
  timestamp: string;

  // Process uptime in seconds.
  uptime: number;

  // Package version.
  version: string;
}

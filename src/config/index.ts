/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for Stillwatch.
 */
import type { Config, Nullable } from "../types/index.js";
import { CONFIG_METADATA, DEFAULTS, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import { LOG } from "../utils/index.js";
import { getConfigFilePath } from "./paths.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters for the application. Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. CLI flags (--port, --log-file)
 * 2. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 3. User config file (<data-dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - server: Network binding for the HTTP server (port, host)
 * - detection: Probe timeout, sample duration, frame threshold, cache capacity and FFmpeg location
 * - logging: HTTP request log level and log file size
 * - paths: Log file location
 */

// The CONFIG object is initialized during startup. It starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = structuredClone(DEFAULTS);

/**
 * Settings supplied on the command line. These override every other configuration layer.
 */
export interface CliOverrides {

  logFile?: string;
  port?: number;
}

/**
 * Initializes the configuration by loading the user config file, merging with defaults, and applying environment variable and CLI overrides. This must be called
 * at startup before any code reads CONFIG.
 * @param cli - Overrides parsed from the command line.
 */
export async function initializeConfiguration(cli: CliOverrides = {}): Promise<void> {

  const result = await loadUserConfig(getConfigFilePath());

  CONFIG = mergeConfiguration(result.config);

  if(cli.port !== undefined) {

    CONFIG.server.port = cli.port;
  }

  if(cli.logFile !== undefined) {

    CONFIG.paths.logFile = cli.logFile;
  }

  LOG.info("Configuration initialized from defaults, user config, environment variables and command line.");
}

/*
 * CONFIGURATION VALIDATION
 *
 * Before starting the server, we validate all configuration values. Validation collects every problem before throwing, so an operator can fix all of them in one
 * pass.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  return checkBounds(name, value, min, max);
}

/**
 * Validates that a configuration value is a positive number (including floats) within an optional range.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveNumber(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isFinite(value) || (value <= 0)) {

    return [ name, " must be a positive number, got: ", String(value) ].join("");
  }

  return checkBounds(name, value, min, max);
}

/**
 * Checks optional inclusive bounds on an already type-checked number.
 * @param name - The configuration name for error messages.
 * @param value - The value to check.
 * @param min - Optional minimum allowed value.
 * @param max - Optional maximum allowed value.
 * @returns Error message if out of range, null otherwise.
 */
function checkBounds(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates all configuration values against their metadata and throws an error listing every invalid value.
 * @param config - The configuration to validate. Defaults to the active CONFIG.
 * @throws If any configuration value is invalid.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];
  const values: Record<string, unknown> = {

    "detection.cacheSize": config.detection.cacheSize,
    "detection.minFrames": config.detection.minFrames,
    "detection.sampleDuration": config.detection.sampleDuration,
    "detection.timeout": config.detection.timeout,
    "logging.httpLogLevel": config.logging.httpLogLevel,
    "logging.maxSize": config.logging.maxSize,
    "server.port": config.server.port
  };

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const value = values[setting.path];
      const name = setting.envVar ?? setting.path;
      let error: Nullable<string> = null;

      if(value === undefined) {

        continue;
      }

      if((setting.type === "float") && (typeof value === "number")) {

        error = validatePositiveNumber(name, value, setting.min, setting.max);
      } else if(((setting.type === "integer") || (setting.type === "port")) && (typeof value === "number")) {

        error = validatePositiveInt(name, value, setting.min, setting.max);
      } else if(setting.validValues && !setting.validValues.includes(String(value))) {

        error = [ name, " must be one of ", setting.validValues.join(", "), ", got: ", String(value) ].join("");
      }

      if(error) {

        errors.push(error);
      }
    }
  }

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }

  // A probe that times out before its sample finishes can never reach a verdict. This is legal, but almost certainly a mistake.
  if(config.detection.timeout <= config.detection.sampleDuration) {

    LOG.warn("DETECTION_TIMEOUT (%ss) is not larger than SAMPLE_DURATION (%ss). Most checks will time out before sampling finishes.",
      config.detection.timeout, config.detection.sampleDuration);
  }
}

/**
 * Displays the active configuration at startup so operators can verify their settings.
 */
export function displayConfiguration(): void {

  LOG.info("Starting Stillwatch with configuration:");
  LOG.info("  Server: %s:%s", CONFIG.server.host, CONFIG.server.port);
  LOG.info("  Probe timeout: %ss, sample duration: %ss", CONFIG.detection.timeout, CONFIG.detection.sampleDuration);
  LOG.info("  Minimum changed frames: %s", CONFIG.detection.minFrames);
  LOG.info("  Verdict cache size: %s", CONFIG.detection.cacheSize);
  LOG.info("  FFmpeg: %s", CONFIG.detection.ffmpegPath ?? "system PATH");
}

export { CONFIG_METADATA, DEFAULTS, getNestedValue } from "./userConfig.js";
export { getConfigFilePath, getDataDir, getLogFilePath, initializeDataDir, resolveDataDir } from "./paths.js";

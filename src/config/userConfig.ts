/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for Stillwatch.
 */
import type { Config, Nullable } from "../types/index.js";
import { LOG, formatError } from "../utils/index.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * Stillwatch reads optional user configuration from <data-dir>/config.json. The configuration system uses a layered approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data-dir>/config.json)
 * 3. Environment variables
 * 4. CLI flags (highest priority, applied by initializeConfiguration())
 */

/**
 * Metadata describing a single configuration setting. Default values live in DEFAULTS; use getNestedValue(DEFAULTS, setting.path) to read one.
 */
export interface SettingMetadata {

  // Human-readable description, printed by --list-env.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: string | null;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // Dot-separated path to the setting (e.g., "detection.timeout").
  path: string;

  // Data type for parsing and validation.
  type: "float" | "host" | "integer" | "path" | "port" | "string";

  // Valid values for string type settings.
  validValues?: string[];

  // Unit of measurement (e.g., "seconds", "bytes").
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<keyof Config, SettingMetadata[]> = {

  detection: [
    {

      description: "Hard wall-clock limit for one FFmpeg probe. When exceeded, FFmpeg is killed and the check reports a timeout, never a frozen picture.",
      envVar: "DETECTION_TIMEOUT",
      max: 300,
      min: 0.5,
      path: "detection.timeout",
      type: "float",
      unit: "seconds"
    },
    {

      description: "Seconds of stream FFmpeg samples per check. Probes finishing in under 40% of this are treated as frozen or invalid streams.",
      envVar: "SAMPLE_DURATION",
      max: 300,
      min: 0.5,
      path: "detection.sampleDuration",
      type: "float",
      unit: "seconds"
    },
    {

      description: "Scene-changed frames required in a sample for the picture to count as moving.",
      envVar: "MIN_FRAMES",
      max: 10000,
      min: 1,
      path: "detection.minFrames",
      type: "integer"
    },
    {

      description: "Number of distinct URLs whose verdicts are cached. The least recently used verdict is evicted first.",
      envVar: "CACHE_SIZE",
      max: 100000,
      min: 1,
      path: "detection.cacheSize",
      type: "integer"
    },
    {

      description: "Path to the FFmpeg executable. Leave empty to use ffmpeg from the system PATH.",
      envVar: "FFMPEG_PATH",
      path: "detection.ffmpegPath",
      type: "path"
    }
  ],

  logging: [
    {

      description: "HTTP request logging level. \"none\" disables logging, \"errors\" logs only 4xx/5xx responses, \"filtered\" skips successful /health and " +
        "/cache polling, \"all\" logs everything.",
      envVar: "HTTP_LOG_LEVEL",
      path: "logging.httpLogLevel",
      type: "string",
      validValues: [ "none", "errors", "filtered", "all" ]
    },
    {

      description: "Maximum log file size. When exceeded, the file is trimmed to half this size keeping the most recent logs.",
      envVar: "LOG_MAX_SIZE",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  paths: [
    {

      description: "Absolute path to the log file. Leave empty to log to stillwatch.log in the data directory.",
      envVar: "STILLWATCH_LOG_FILE",
      path: "paths.logFile",
      type: "path"
    }
  ],

  server: [
    {

      description: "IP address or hostname the HTTP server binds to.",
      envVar: "HOST",
      path: "server.host",
      type: "host"
    },
    {

      description: "TCP port the HTTP server listens on.",
      envVar: "PORT",
      max: 65535,
      min: 1,
      path: "server.port",
      type: "port"
    }
  ]
};

/**
 * User configuration with all fields optional. This is the structure of the config.json file.
 */
export type UserConfig = { [K in keyof Config]?: Partial<Config[K]> };

/**
 * Result of loading user config.
 */
export interface UserConfigLoadResult {

  // The loaded configuration (empty object if file missing or unreadable).
  config: UserConfig;

  // True if the config file exists but does not contain a JSON object.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/**
 * Hard-coded default configuration values. These are the baseline values used when neither user config nor environment variables provide a value.
 */
export const DEFAULTS: Config = {

  detection: {

    cacheSize: 100,
    ffmpegPath: null,
    minFrames: 2,
    sampleDuration: 3,
    timeout: 5
  },

  logging: {

    httpLogLevel: "errors",
    maxSize: 1048576
  },

  paths: {

    logFile: null
  },

  server: {

    host: "0.0.0.0",
    port: 5690
  }
};

/**
 * Checks that a parsed JSON value has the shape of a user config: an object whose category entries, when present, are objects too.
 * @param value - The parsed JSON value.
 * @returns True if the value can be used as a UserConfig.
 */
function isUserConfig(value: unknown): value is UserConfig {

  if((typeof value !== "object") || (value === null) || Array.isArray(value)) {

    return false;
  }

  return Object.values(value).every((section: unknown) => (typeof section === "object") && (section !== null) && !Array.isArray(section));
}

/**
 * Loads user configuration from the config file. Returns an empty config if the file doesn't exist, and sets parseError if the file exists but does not hold a
 * JSON object of settings.
 * @param filePath - Absolute path to config.json.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(filePath: string): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    // A missing file is normal; we run on defaults.
    if((error as NodeJS.ErrnoException).code !== "ENOENT") {

      LOG.warn("Failed to read configuration file %s: %s. Using defaults.", filePath, formatError(error));
    }

    return { config: {}, parseError: false };
  }

  let parsed: unknown;

  try {

    parsed = JSON.parse(content);
  } catch(error) {

    const message = formatError(error);

    LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", filePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }

  if(!isUserConfig(parsed)) {

    const message = "expected an object of setting categories";

    LOG.warn("Unexpected structure in configuration file %s: %s. Using defaults.", filePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }

  LOG.debug("config", "Loaded configuration file %s.", filePath);

  return { config: parsed, parseError: false };
}

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if parsing fails.
 */
function parseEnvValue(value: string, type: SettingMetadata["type"]): Nullable<number | string> | undefined {

  switch(type) {

    case "float": {

      const num = parseFloat(value);

      return Number.isNaN(num) ? undefined : num;
    }

    case "integer":
    case "port": {

      const num = parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    case "path": {

      // An empty path clears the override and falls back to the default location.
      return (value.length > 0) ? value : null;
    }

    default: {

      return value;
    }
  }
}

/**
 * Checks whether a value from config.json has the JavaScript type the setting expects. Mismatched values are ignored with a warning.
 * @param value - The user-supplied value.
 * @param type - The setting type.
 * @returns True if the value can be applied.
 */
function matchesSettingType(value: unknown, type: SettingMetadata["type"]): boolean {

  switch(type) {

    case "float":
    case "integer":
    case "port": {

      return typeof value === "number";
    }

    case "path": {

      return (value === null) || (typeof value === "string");
    }

    default: {

      return typeof value === "string";
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "detection.timeout").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if((current === null) || (typeof current !== "object")) {

      return undefined;
    }

    current = Reflect.get(current, part);
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "detection.timeout").
 * @param value - The value to set.
 */
export function setNestedValue(obj: object, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  const leaf = parts.pop();
  let current = obj;

  if(leaf === undefined) {

    return;
  }

  for(const part of parts) {

    const next: unknown = Reflect.get(current, part);

    if((typeof next === "object") && (next !== null)) {

      current = next;

      continue;
    }

    const created = {};

    Reflect.set(current, part, created);
    current = created;
  }

  Reflect.set(current, leaf, value);
}

/**
 * Merges user configuration with defaults and environment overrides to produce the final configuration. Priority: env vars > user config > defaults.
 * @param userConfig - User configuration from the config file.
 * @param env - Environment to read overrides from.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig, env: NodeJS.ProcessEnv = process.env): Config {

  const config = structuredClone(DEFAULTS);

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const userValue = getNestedValue(userConfig, setting.path);

      if(userValue === undefined) {

        continue;
      }

      if(!matchesSettingType(userValue, setting.type)) {

        LOG.warn("Ignoring configuration value for %s: expected a %s, got %j.", setting.path, setting.type, userValue);

        continue;
      }

      setNestedValue(config, setting.path, userValue);
    }
  }

  // Apply environment variable overrides.
  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const envValue = setting.envVar ? env[setting.envVar] : undefined;

      if(envValue === undefined) {

        continue;
      }

      const parsedValue = parseEnvValue(envValue, setting.type);

      if(parsedValue === undefined) {

        LOG.warn("Ignoring environment variable %s: cannot parse '%s' as a %s.", setting.envVar, envValue, setting.type);

        continue;
      }

      LOG.debug("config", "Environment variable %s overrides %s.", setting.envVar, setting.path);

      setNestedValue(config, setting.path, parsedValue);
    }
  }

  return config;
}

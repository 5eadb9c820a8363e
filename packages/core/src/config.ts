/**
 * Load and validate BenchConfig, merging with defaults.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError } from "./errors.js";
import {
  defaultBenchConfig,
  isLayoutName,
  isLogLevelName,
  type BenchConfig,
  type LayoutName,
} from "./types.js";

function positiveInt(key: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError({ message: `${key} must be a positive integer, got ${JSON.stringify(value)}` });
  }
  return value;
}

function layoutList(value: unknown): LayoutName[] {
  const items = typeof value === "string" ? value.split(",").map((s) => s.trim()) : value;
  if (!Array.isArray(items) || items.length === 0) {
    throw new ConfigError({ message: `layouts must be a non-empty list, got ${JSON.stringify(value)}` });
  }
  return items.map((item: unknown) => {
    if (typeof item !== "string" || !isLayoutName(item)) {
      throw new ConfigError({
        message: `Unknown layout ${JSON.stringify(item)}. Expected one of row_major, col_major, tiled`,
      });
    }
    return item;
  });
}

/**
 * Validate a partial config merged over the defaults, throwing ConfigError
 * on the first invalid field.
 */
export function validateBenchConfig(raw: Record<string, unknown>): BenchConfig {
  const merged: Record<string, unknown> = { ...defaultBenchConfig, ...raw };
  const logLevel = merged["logLevel"];
  if (typeof logLevel !== "string" || !isLogLevelName(logLevel)) {
    throw new ConfigError({ message: `Unknown logLevel ${JSON.stringify(logLevel)}` });
  }
  return {
    size: positiveInt("size", merged["size"]),
    tileSize: positiveInt("tileSize", merged["tileSize"]),
    iters: positiveInt("iters", merged["iters"]),
    layouts: layoutList(merged["layouts"]),
    logLevel,
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Read and parse a JSON config file into a plain object. */
function readConfigFile(path: string): Effect.Effect<Record<string, unknown>, ConfigError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) => new ConfigError({ message: `Failed to read config at ${path}`, cause }),
  }).pipe(
    Effect.flatMap((text) =>
      Effect.try({
        try: (): unknown => JSON.parse(text),
        catch: (cause) => new ConfigError({ message: `Failed to parse config at ${path}: invalid JSON`, cause }),
      }),
    ),
    Effect.flatMap((parsed) =>
      isRecord(parsed)
        ? Effect.succeed(parsed)
        : Effect.fail(new ConfigError({ message: `Config at ${path} must be a JSON object` })),
    ),
  );
}

/**
 * Load a BenchConfig from a JSON file path (defaults when no path is given),
 * then apply `overrides` on top of the file values.
 */
export function loadBenchConfig(
  path?: string,
  overrides: Record<string, unknown> = {},
): Effect.Effect<BenchConfig, ConfigError> {
  const fromFile: Effect.Effect<Record<string, unknown>, ConfigError> = path
    ? readConfigFile(path)
    : Effect.succeed({});

  return fromFile.pipe(
    Effect.flatMap((file) =>
      Effect.try({
        try: () => validateBenchConfig({ ...file, ...overrides }),
        catch: (cause) =>
          cause instanceof ConfigError
            ? cause
            : new ConfigError({ message: "Invalid bench config", cause }),
      }),
    ),
  );
}

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Either } from "effect";
import { ConfigError, defaultBenchConfig, loadBenchConfig, validateBenchConfig } from "@gradlab/core";

describe("validateBenchConfig", () => {
  it("fills in defaults", () => {
    expect(validateBenchConfig({})).toEqual({
      size: 256,
      tileSize: 16,
      iters: 1000,
      layouts: ["row_major", "col_major", "tiled"],
      logLevel: "info",
    });
  });

  it("accepts a comma-separated layout list", () => {
    expect(validateBenchConfig({ layouts: "tiled, row_major" }).layouts).toEqual(["tiled", "row_major"]);
  });

  it("rejects invalid fields", () => {
    expect(() => validateBenchConfig({ size: 0 })).toThrow(ConfigError);
    expect(() => validateBenchConfig({ iters: 1.5 })).toThrow("iters must be a positive integer, got 1.5");
    expect(() => validateBenchConfig({ tileSize: "4" })).toThrow(ConfigError);
    expect(() => validateBenchConfig({ layouts: [] })).toThrow(ConfigError);
    expect(() => validateBenchConfig({ layouts: ["diagonal"] })).toThrow('Unknown layout "diagonal"');
    expect(() => validateBenchConfig({ logLevel: "loud" })).toThrow('Unknown logLevel "loud"');
  });
});

describe("loadBenchConfig", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "gradlab-config-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("defaults without a path", async () => {
    const config = await Effect.runPromise(loadBenchConfig());
    expect(config.size).toBe(defaultBenchConfig.size);
    expect(config.logLevel).toBe("info");
  });

  it("overrides take precedence over the file", async () => {
    const path = join(dir, "bench.json");
    await writeFile(path, JSON.stringify({ size: 32, iters: 5, logLevel: "debug" }));
    const config = await Effect.runPromise(loadBenchConfig(path, { iters: 7 }));
    expect(config.size).toBe(32);
    expect(config.iters).toBe(7);
    expect(config.logLevel).toBe("debug");
  });

  it("fails with ConfigError on a missing file", async () => {
    const result = await Effect.runPromise(Effect.either(loadBenchConfig(join(dir, "missing.json"))));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ConfigError");
    }
  });

  it("fails on invalid JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ size: ");
    const result = await Effect.runPromise(Effect.either(loadBenchConfig(path)));
    expect(Either.isLeft(result) && result.left.message).toBe(`Failed to parse config at ${path}: invalid JSON`);
  });

  it("fails when the file is not an object", async () => {
    const path = join(dir, "list.json");
    await writeFile(path, "[1, 2]");
    const result = await Effect.runPromise(Effect.either(loadBenchConfig(path)));
    expect(Either.isLeft(result) && result.left.message).toBe(`Config at ${path} must be a JSON object`);
  });

  it("fails on invalid values", async () => {
    const path = join(dir, "bad.json");
    await writeFile(path, JSON.stringify({ size: -1 }));
    const result = await Effect.runPromise(Effect.either(loadBenchConfig(path)));
    expect(Either.isLeft(result) && result.left.message).toBe("size must be a positive integer, got -1");
  });
});

import { existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { USAGE } from "@/cli/args";
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from "@/cli/run";
import {
  createTempDir,
  exifFile,
  removeTempDirs,
  snapshot,
} from "../fixtures/metadata";

afterEach(() => {
  removeTempDirs();
});

function capture() {
  const lines: string[] = [];
  return { lines, io: { writeErr: (line: string) => lines.push(line) } };
}

function resultsWithSnapshot(): string {
  const dir = createTempDir();
  writeFileSync(
    join(dir, "Consolidate_Meta_Results.json"),
    JSON.stringify(
      snapshot([exifFile("2024:06:01 12:00:00"), exifFile("2024:06:01 12:03:00")]),
    ),
  );
  return dir;
}

describe("runCli", () => {
  test("prints usage for --help", () => {
    const { lines, io } = capture();
    expect(runCli(["--help"], io)).toBe(EXIT_OK);
    expect(lines).toEqual([USAGE]);
  });

  test("exits with the usage code on bad arguments", () => {
    const { lines, io } = capture();
    expect(runCli(["--verbose"], io)).toBe(EXIT_USAGE);
    expect(lines).toEqual(["[media-relate] Unknown argument: --verbose", USAGE]);
  });

  test("reports a missing config field", () => {
    const { lines, io } = capture();
    const code = runCli(["--config-json", '{"paths":{}}'], io);
    expect(code).toBe(EXIT_FAILURE);
    expect(lines).toEqual([
      '[media-relate] ERROR Missing required config field: paths.resultsDirectory {"code":"CONFIG_MISSING_FIELD"}',
    ]);
  });

  test("reports malformed config JSON", () => {
    const { lines, io } = capture();
    expect(runCli(["--config-json", "{"], io)).toBe(EXIT_FAILURE);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[media-relate\] ERROR Config is not valid JSON: /);
    expect(lines[0]).toMatch(/\{"code":"CONFIG_INVALID"\}$/);
  });

  test("reports a missing config file", () => {
    const { lines, io } = capture();
    const path = join(createTempDir(), "absent.json");
    expect(runCli(["--config", path], io)).toBe(EXIT_FAILURE);
    expect(lines).toEqual([
      `[media-relate] ERROR Config file not found: ${path} {"code":"INPUT_NOT_FOUND"}`,
    ]);
  });

  test("clusters the results directory from a config file", () => {
    const dir = resultsWithSnapshot();
    const configPath = join(createTempDir(), "config.json");
    writeFileSync(
      configPath,
      JSON.stringify({ paths: { resultsDirectory: dir } }),
    );
    const { lines, io } = capture();

    expect(runCli(["--config", configPath], io)).toBe(EXIT_OK);
    expect(existsSync(join(dir, "relationship_sets.json"))).toBe(true);
    expect(lines).toContain("[media-relate] INFO Total files processed: 2");
    expect(lines.some((line) => line.includes(" DEBUG "))).toBe(false);
  });

  test("logs defaulted thresholds at debug level", () => {
    const dir = resultsWithSnapshot();
    const { lines, io } = capture();
    const payload = {
      paths: { resultsDirectory: dir },
      settings: {
        clustering: { timeThresholdSeconds: 120 },
        logging: { level: "debug" },
      },
    };

    expect(runCli(["--config-json", JSON.stringify(payload)], io)).toBe(EXIT_OK);
    expect(lines).toContain(
      "[media-relate] DEBUG settings.clustering.locationThresholdKm not set, using default",
    );
    expect(lines).not.toContain(
      "[media-relate] DEBUG settings.clustering.timeThresholdSeconds not set, using default",
    );
    expect(lines).toContain("[media-relate] DEBUG write: 1/1");
  });

  test("fails when the metadata snapshot is missing", () => {
    const dir = createTempDir();
    const { lines, io } = capture();
    const payload = JSON.stringify({ paths: { resultsDirectory: dir } });

    expect(runCli(["--config-json", payload], io)).toBe(EXIT_FAILURE);
    const errors = lines.filter((line) => line.startsWith("[media-relate] ERROR"));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain(
      `Metadata file not found: ${join(dir, "Consolidate_Meta_Results.json")}`,
    );
    expect(existsSync(join(dir, "relationship_sets.json"))).toBe(false);
  });
});

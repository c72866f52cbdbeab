import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { DEFAULT_INCLUDE_GLOBS, DEFAULT_LOG_FILE, DEFAULT_OUTPUT_FILE } from "./config.js";
import { loadConfigFile, resolveRunConfig } from "./config-loader.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function writeConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "inventory.yaml");
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

// =============================================================================
// TESTS
// =============================================================================

describe("resolveRunConfig", () => {
  it("applies defaults when only the root is given", () => {
    const config = resolveRunConfig({ root: "./manifests" });

    expect(config).toEqual({
      root: "./manifests",
      output: DEFAULT_OUTPUT_FILE,
      log_file: DEFAULT_LOG_FILE,
      verbose: false,
      include: DEFAULT_INCLUDE_GLOBS,
      exclude: [],
      max_column_width: 120,
    });
  });

  it("lets command-line overrides win over config file values", () => {
    const configPath = writeConfig(
      ["output: from-file.xlsx", "verbose: true", "exclude:", "  - '**/charts/**'", "max_column_width: 80"].join(
        "\n",
      ),
    );

    const config = resolveRunConfig({
      root: "/repo",
      configPath,
      overrides: { output: "from-flag.xlsx", verbose: undefined },
    });

    expect(config.output).toBe("from-flag.xlsx");
    expect(config.verbose).toBe(true);
    expect(config.exclude).toEqual(["**/charts/**"]);
    expect(config.max_column_width).toBe(80);
  });
});

describe("loadConfigFile", () => {
  it("treats an empty file as an empty config", () => {
    expect(loadConfigFile(writeConfig(""))).toEqual({});
  });

  it("maps a missing file to a user-facing config error", () => {
    const missing = path.join(os.tmpdir(), "composition-inventory-missing", "nope.yaml");

    const error = captureError(() => loadConfigFile(missing));

    expect(error).toBeInstanceOf(UserFacingError);
    const userError = error as UserFacingError;
    expect(userError.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(userError.title).toBe("Config file missing.");
    expect(userError.message).toBe(`Could not read config file at ${path.resolve(missing)}.`);
  });

  it("rejects unknown keys", () => {
    const configPath = writeConfig("outputs: report.xlsx\n");

    const error = captureError(() => loadConfigFile(configPath));

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).message).toContain("Unrecognized key");
  });

  it("names the offending key for type mismatches", () => {
    const configPath = writeConfig("max_column_width: wide\n");

    const error = captureError(() => loadConfigFile(configPath));

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).message).toContain("max_column_width:");
  });
});

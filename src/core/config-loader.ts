/*
 * Run configuration loading.
 * Resolution order (highest first): CLI flags, config file, schema defaults.
 */

import fs from "node:fs";
import path from "node:path";

import * as yaml from "js-yaml";
import type { ZodError } from "zod";

import { ConfigFileSchema, RunConfigSchema, type ConfigFile, type RunConfig } from "./config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export type RunConfigOverrides = ConfigFile;

const CONFIG_HINT = "Fix the config file or pass the setting as a command-line flag.";

// =============================================================================
// CONFIG FILE
// =============================================================================

export function loadConfigFile(configPath: string): ConfigFile {
  const resolvedPath = path.resolve(configPath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file missing.",
      message: `Could not read config file at ${resolvedPath}.`,
      hint: "Check the --config path.",
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file invalid.",
      message: `Config file ${resolvedPath} is not valid YAML.`,
      hint: CONFIG_HINT,
      cause: err,
    });
  }

  // An empty file configures nothing.
  if (parsed === undefined || parsed === null) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file invalid.",
      message: `Config file ${resolvedPath} is invalid: ${describeFirstIssue(result.error)}`,
      hint: CONFIG_HINT,
      cause: result.error,
    });
  }

  return result.data;
}

// =============================================================================
// RUN CONFIG
// =============================================================================

export function resolveRunConfig(args: {
  root: string;
  configPath?: string;
  overrides?: RunConfigOverrides;
}): RunConfig {
  const fromFile = args.configPath ? loadConfigFile(args.configPath) : {};
  const merged = {
    ...fromFile,
    ...definedOnly(args.overrides ?? {}),
    root: args.root,
  };

  const result = RunConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration invalid.",
      message: `Configuration is invalid: ${describeFirstIssue(result.error)}`,
      hint: CONFIG_HINT,
      cause: result.error,
    });
  }

  return result.data;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function describeFirstIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "unknown validation error";
  }

  const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${location}: ${issue.message}`;
}

import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { ZodIssue } from "zod";
import { errorMessage } from "../errors";
import { appConfigSchema } from "./schema";
import type { AppConfig, RetryConfig, SourceConfig } from "./schema";

export type ConfigIssue = {
  readonly path: string;
  readonly message: string;
};

/** The config file could not be read, parsed or validated. */
export class ConfigError extends Error {
  readonly configPath: string;
  readonly issues: ReadonlyArray<ConfigIssue>;

  constructor(configPath: string, message: string, issues: ReadonlyArray<ConfigIssue> = []) {
    super(message);
    this.name = "ConfigError";
    this.configPath = configPath;
    this.issues = issues;
  }
}

function toIssue(issue: ZodIssue): ConfigIssue {
  return { path: issue.path.join("."), message: issue.message };
}

/** Reads and validates the YAML config. The result is frozen at the top level. */
export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(
      configPath,
      `failed to read config file at ${configPath}: ${errorMessage(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigError(
      configPath,
      `failed to parse YAML in ${configPath}: ${errorMessage(err)}`,
    );
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(toIssue);
    const listing = issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
    throw new ConfigError(
      configPath,
      `invalid configuration in ${configPath}:\n${listing}`,
      issues,
    );
  }

  return Object.freeze(result.data);
}

export type { AppConfig, RetryConfig, SourceConfig };

/**
 * VPC Atlas — Configuration Loader
 *
 * Reads an optional JSON or YAML configuration file and layers command-line
 * values over it. Precedence: CLI, then file, then defaults.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import * as yaml from "js-yaml";
import { ConfigValidationError, formatErrorMessage } from "../errors.js";
import { DEFAULT_TIER_RULES } from "../core/tiers.js";
import { createPolicy } from "./policy.js";
import type { ConfigFile, TopologyConfig } from "./schema.js";
import { configFileSchema, parseOrThrow, topologyConfigSchema } from "./schema.js";

export const DEFAULT_REGIONS = ["us-east-1"];
export const DEFAULT_CONCURRENCY = 4;

/**
 * Parse configuration text. The format follows the file extension:
 * `.yml` / `.yaml` are YAML, everything else is JSON.
 */
export function parseConfigText(text: string, path: string): ConfigFile {
  const ext = extname(path).toLowerCase();
  let raw: unknown;
  try {
    raw = ext === ".yml" || ext === ".yaml" ? yaml.load(text) : JSON.parse(text);
  } catch (err) {
    const issue = `${path}: ${formatErrorMessage(err)}`;
    throw new ConfigValidationError(`Cannot parse configuration file: ${issue}`, [issue]);
  }
  // An empty YAML document is an empty configuration.
  return parseOrThrow(configFileSchema, raw ?? {}, `configuration file ${path}`);
}

export async function loadConfigFile(path: string): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const issue = `${path}: ${formatErrorMessage(err)}`;
    throw new ConfigValidationError(`Cannot read configuration file: ${issue}`, [issue]);
  }
  return parseConfigText(text, path);
}

/** Values collected from the command line; undefined means "not given". */
export type CliOverrides = {
  regions?: string[];
  account?: string;
  profile?: string;
  preset?: string;
  policy?: Record<string, unknown>;
  concurrency?: number;
  logLevel?: string;
  logFile?: string;
};

/**
 * Merge file and CLI values into a validated configuration.
 *
 * Policy layers: defaults, preset (CLI over file), file policy, CLI policy.
 */
export function resolveConfig(file: ConfigFile = {}, cli: CliOverrides = {}): TopologyConfig {
  const basePolicy = createPolicy(cli.preset ?? file.preset, file.policy ?? {});
  const policy = createPolicy(undefined, { ...basePolicy, ...stripUndefined(cli.policy ?? {}) });

  return parseOrThrow(
    topologyConfigSchema,
    {
      regions: cli.regions && cli.regions.length > 0 ? cli.regions : (file.regions ?? DEFAULT_REGIONS),
      account: cli.account ?? file.account,
      profile: cli.profile,
      policy,
      tierRules: file.tierRules ?? DEFAULT_TIER_RULES.map((rule) => ({ ...rule, patterns: [...rule.patterns] })),
      concurrency: cli.concurrency ?? file.concurrency ?? DEFAULT_CONCURRENCY,
      logging: {
        level: cli.logLevel ?? file.logging?.level ?? "warn",
        file: cli.logFile ?? file.logging?.file,
        redactPatterns: file.logging?.redactPatterns ?? [],
      },
    },
    "configuration",
  );
}

function stripUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

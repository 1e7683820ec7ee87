/**
 * VPC Atlas — Configuration Schemas
 *
 * Schema-based validation for the topology configuration using Zod.
 * Invalid values are rejected when the configuration is constructed,
 * before any discovery or resolution runs.
 */

import { z } from "zod";
import { ConfigValidationError } from "../errors.js";

// =============================================================================
// Enumerations
// =============================================================================

export const FLOW_SCOPES = ["none", "inter-subnet", "tier-crossing", "external-only"] as const;
export const TRAFFIC_DIRECTIONS = ["both", "north-south", "east-west"] as const;
export const DETAIL_LEVELS = ["minimal", "ports", "protocols", "full"] as const;
export const LB_DISPLAY_MODES = ["all", "connected-only", "none"] as const;
export const LB_DETAIL_LEVELS = ["minimal", "ports", "full"] as const;
export const PRESET_NAMES = ["clean", "network", "security", "debug"] as const;
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type FlowScope = (typeof FLOW_SCOPES)[number];
export type TrafficDirection = (typeof TRAFFIC_DIRECTIONS)[number];
export type DetailLevel = (typeof DETAIL_LEVELS)[number];
export type LbDisplayMode = (typeof LB_DISPLAY_MODES)[number];
export type LbDetailLevel = (typeof LB_DETAIL_LEVELS)[number];
export type PresetName = (typeof PRESET_NAMES)[number];

// =============================================================================
// Zod Schemas
// =============================================================================

/**
 * Filter policy schema
 */
export const policySchema = z
  .object({
    flows: z.enum(FLOW_SCOPES),
    direction: z.enum(TRAFFIC_DIRECTIONS),
    detail: z.enum(DETAIL_LEVELS),
    filterInternal: z.boolean(),
    filterEphemeral: z.boolean(),
    onlyIngress: z.boolean(),
    lbDisplay: z.enum(LB_DISPLAY_MODES),
    lbDetail: z.enum(LB_DETAIL_LEVELS),
    filterUnhealthy: z.boolean(),
  })
  .strict();

/** Partial policy used for presets and overrides. */
export const policyOverridesSchema = policySchema.partial();

/**
 * Tier rule schema
 */
export const tierRuleSchema = z
  .object({
    tier: z.enum(["presentation", "application", "restricted"]),
    patterns: z.array(z.string().min(1)).min(1),
  })
  .strict();

function compilesAsPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, "gi");
    return true;
  } catch {
    return false;
  }
}

/**
 * Logging config schema
 */
export const loggingConfigSchema = z
  .object({
    level: z.enum(LOG_LEVELS).default("warn"),
    file: z.string().min(1).optional(),
    redactPatterns: z
      .array(z.string().refine(compilesAsPattern, { message: "invalid regular expression" }))
      .default([]),
  })
  .strict();

/**
 * Configuration file schema (every field optional).
 */
export const configFileSchema = z
  .object({
    regions: z.array(z.string().min(1)).min(1).optional(),
    account: z.string().min(1).optional(),
    preset: z.enum(PRESET_NAMES).optional(),
    policy: policyOverridesSchema.optional(),
    tierRules: z.array(tierRuleSchema).min(1).optional(),
    concurrency: z.number().int().positive().optional(),
    logging: loggingConfigSchema.partial().optional(),
  })
  .strict();

/**
 * Fully resolved configuration handed to discovery and the pipeline.
 */
export const topologyConfigSchema = z
  .object({
    regions: z.array(z.string().min(1)).min(1),
    account: z.string().min(1).optional(),
    profile: z.string().min(1).optional(),
    policy: policySchema,
    tierRules: z.array(tierRuleSchema).min(1),
    concurrency: z.number().int().positive(),
    logging: loggingConfigSchema,
  })
  .strict();

export type FilterPolicy = z.infer<typeof policySchema>;
export type TopologyConfig = z.infer<typeof topologyConfigSchema>;
export type PolicyOverrides = z.infer<typeof policyOverridesSchema>;
export type TierRuleConfig = z.infer<typeof tierRuleSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type ConfigFile = z.infer<typeof configFileSchema>;

// =============================================================================
// Validation
// =============================================================================

/**
 * Parse a value against a schema or throw ConfigValidationError listing
 * every issue.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  what: string,
): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
  throw new ConfigValidationError(`Invalid ${what}: ${issues.join("; ")}`, issues);
}

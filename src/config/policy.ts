/**
 * VPC Atlas — Filter Policy
 *
 * Defaults, named presets and override application. A preset is a bundle
 * of options applied before explicit overrides; the merged value is
 * validated once.
 */

import type { FilterPolicy, PolicyOverrides, PresetName } from "./schema.js";
import { parseOrThrow, policyOverridesSchema, policySchema, PRESET_NAMES } from "./schema.js";
import { ConfigValidationError } from "../errors.js";

export const DEFAULT_POLICY: Readonly<FilterPolicy> = Object.freeze({
  flows: "inter-subnet",
  direction: "both",
  detail: "ports",
  filterInternal: false,
  filterEphemeral: false,
  onlyIngress: false,
  lbDisplay: "all",
  lbDetail: "ports",
  filterUnhealthy: false,
});

export const PRESETS: Readonly<Record<PresetName, Readonly<PolicyOverrides>>> = Object.freeze({
  /** Structure only: no flows, no load balancers. */
  clean: { flows: "none", detail: "minimal", lbDisplay: "none" },
  network: {
    flows: "tier-crossing",
    direction: "north-south",
    detail: "ports",
    lbDisplay: "connected-only",
    lbDetail: "ports",
  },
  security: {
    flows: "inter-subnet",
    detail: "full",
    onlyIngress: true,
    lbDisplay: "all",
    lbDetail: "full",
  },
  debug: {
    flows: "external-only",
    detail: "full",
    filterEphemeral: true,
    lbDisplay: "connected-only",
    lbDetail: "full",
  },
});

export function isPresetName(value: string): value is PresetName {
  return (PRESET_NAMES as readonly string[]).includes(value);
}

/**
 * Build a policy: defaults, then the preset, then overrides.
 * Undefined override values leave the preset's value in place.
 *
 * Throws ConfigValidationError for an unknown preset or invalid values.
 */
export function createPolicy(preset?: string, overrides: unknown = {}): FilterPolicy {
  let bundle: Readonly<PolicyOverrides> = {};
  if (preset !== undefined) {
    if (!isPresetName(preset)) {
      const issue = `preset: expected one of ${PRESET_NAMES.join(", ")}, got "${preset}"`;
      throw new ConfigValidationError(`Invalid policy: ${issue}`, [issue]);
    }
    bundle = PRESETS[preset];
  }

  const explicit = parseOrThrow(policyOverridesSchema, stripUndefined(overrides), "policy overrides");

  return parseOrThrow(policySchema, { ...DEFAULT_POLICY, ...bundle, ...explicit }, "policy");
}

function stripUndefined(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

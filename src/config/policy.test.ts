import { describe, it, expect } from "vitest";
import { ConfigValidationError } from "../errors.js";
import { createPolicy, DEFAULT_POLICY, isPresetName, PRESETS } from "./policy.js";

describe("createPolicy", () => {
  it("returns the defaults without a preset or overrides", () => {
    expect(createPolicy()).toEqual(DEFAULT_POLICY);
  });

  it("applies a preset bundle over the defaults", () => {
    expect(createPolicy("network")).toEqual({
      ...DEFAULT_POLICY,
      flows: "tier-crossing",
      direction: "north-south",
      lbDisplay: "connected-only",
    });
  });

  it("lets explicit values win over the preset", () => {
    const policy = createPolicy("security", { onlyIngress: false, detail: "protocols" });
    expect(policy.onlyIngress).toBe(false);
    expect(policy.detail).toBe("protocols");
    expect(policy.lbDetail).toBe("full");
  });

  it("ignores undefined override values", () => {
    expect(createPolicy("clean", { flows: undefined }).flows).toBe("none");
  });

  it("rejects an unknown preset", () => {
    expect(() => createPolicy("verbose")).toThrow(ConfigValidationError);
  });

  it("rejects unknown enumeration values", () => {
    try {
      createPolicy(undefined, { flows: "sideways" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^flows: /);
      }
    }
  });

  it("rejects unknown options", () => {
    expect(() => createPolicy(undefined, { colour: "red" })).toThrow(/Invalid policy overrides/);
  });

  it("builds a valid policy for every preset", () => {
    for (const name of Object.keys(PRESETS)) {
      expect(() => createPolicy(name)).not.toThrow();
    }
  });
});

describe("isPresetName", () => {
  it("recognises preset names", () => {
    expect(isPresetName("debug")).toBe(true);
    expect(isPresetName("Debug")).toBe(false);
  });
});

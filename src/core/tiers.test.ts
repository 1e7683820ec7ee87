import { describe, it, expect } from "vitest";
import { makeSubnet } from "../testing/fixtures.js";
import { compileGlob, createTierClassifier, subnetLabel, tierRank } from "./tiers.js";

describe("compileGlob", () => {
  it("anchors and ignores case", () => {
    const re = compileGlob("*public*");
    expect(re.test("Prod-PUBLIC-a")).toBe(true);
    expect(re.test("private")).toBe(false);
  });

  it("matches exactly one character for ?", () => {
    const re = compileGlob("app-?");
    expect(re.test("app-1")).toBe(true);
    expect(re.test("app-12")).toBe(false);
  });

  it("treats regex metacharacters literally", () => {
    const re = compileGlob("a.b+(c)");
    expect(re.test("a.b+(c)")).toBe(true);
    expect(re.test("axbb(c)")).toBe(false);
  });
});

describe("createTierClassifier", () => {
  const classify = createTierClassifier();

  it("applies the default rules", () => {
    expect(classify(makeSubnet("public-1"))).toBe("presentation");
    expect(classify(makeSubnet("dmz-a"))).toBe("presentation");
    expect(classify(makeSubnet("private-app"))).toBe("application");
    expect(classify(makeSubnet("data-1"))).toBe("restricted");
    expect(classify(makeSubnet("db-2"))).toBe("restricted");
  });

  it("falls back to unclassified", () => {
    expect(classify(makeSubnet("subnet-0abc"))).toBe("unclassified");
  });

  it("lets the first matching rule win", () => {
    // Matches *public* and *db*; presentation is listed first.
    expect(classify(makeSubnet("public-db"))).toBe("presentation");
  });

  it("prefers the Name tag over the id", () => {
    const subnet = makeSubnet("subnet-0123", { name: "subnet-0123", tags: { Name: "App-Tier" } });
    expect(subnetLabel(subnet)).toBe("App-Tier");
    expect(classify(subnet)).toBe("application");
  });

  it("follows custom rule order", () => {
    const custom = createTierClassifier([
      { tier: "restricted", patterns: ["*"] },
      { tier: "presentation", patterns: ["*public*"] },
    ]);
    expect(custom(makeSubnet("public-1"))).toBe("restricted");
  });

  it("classifies nothing with an empty rule list", () => {
    expect(createTierClassifier([])(makeSubnet("public-1"))).toBe("unclassified");
  });
});

describe("tierRank", () => {
  it("ranks the stack top to bottom", () => {
    expect(tierRank("presentation")).toBe(0);
    expect(tierRank("restricted")).toBe(2);
    expect(tierRank("unclassified")).toBeNull();
  });
});

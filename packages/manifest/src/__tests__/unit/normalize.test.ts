import { describe, expect, it } from "vitest";
import { normalizeArgument, normalizeArgumentValue, normalizeRule } from "../../normalize.js";

describe("normalizeArgument", () => {
  it("turns a string into a literal", () => {
    expect(normalizeArgument("--demo")).toEqual({ kind: "literal", value: "--demo" });
  });

  it("turns a rule object into a guarded spec", () => {
    expect(normalizeArgument({ rules: [{ action: "deny" }], value: "-X" })).toEqual({
      kind: "guarded",
      rules: [{ action: "deny" }],
      value: { kind: "single", value: "-X" },
    });
  });
});

describe("normalizeArgumentValue", () => {
  it("distinguishes single and multiple values", () => {
    expect(normalizeArgumentValue("a")).toEqual({ kind: "single", value: "a" });
    expect(normalizeArgumentValue(["a", "b"])).toEqual({ kind: "multiple", values: ["a", "b"] });
  });

  it("keeps an empty array as multiple", () => {
    expect(normalizeArgumentValue([])).toEqual({ kind: "multiple", values: [] });
  });
});

describe("normalizeRule", () => {
  it("omits absent constraints", () => {
    expect(normalizeRule({ action: "allow" })).toEqual({ action: "allow" });
    expect(Object.keys(normalizeRule({ action: "allow" }))).toEqual(["action"]);
  });

  it("keeps features and os constraints", () => {
    expect(
      normalizeRule({ action: "allow", features: { is_demo_user: true }, os: { name: "linux" } }),
    ).toEqual({ action: "allow", features: { is_demo_user: true }, os: { name: "linux" } });
  });
});

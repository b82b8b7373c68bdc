import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({ fallbackTarget: { value: "1", unit: "kg" }, decimals: 2 });
  });

  it("reads and trims the environment", () => {
    const config = loadConfig({
      FORMULATOR_TARGET_MASS: " 250 ",
      FORMULATOR_TARGET_UNIT: "g",
      FORMULATOR_DECIMALS: "3"
    });
    expect(config).toEqual({ fallbackTarget: { value: "250", unit: "g" }, decimals: 3 });
  });

  it("rejects a non-numeric decimal count", () => {
    expect(() => loadConfig({ FORMULATOR_DECIMALS: "two" })).toThrow(/^Invalid environment: FORMULATOR_DECIMALS: /);
  });
});

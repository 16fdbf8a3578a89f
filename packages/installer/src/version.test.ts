import { describe, it, expect } from "vitest";
import { parseVersion, isValidVersion, compareVersions, isNewerVersion } from "./version.js";

describe("parseVersion", () => {
  it("parses a four-part version", () => {
    expect(parseVersion("11.0.16.8512")).toEqual([11, 0, 16, 8512]);
  });

  it("parses a two-part version", () => {
    expect(parseVersion("5.4")).toEqual([5, 4]);
  });

  it("throws on a single component", () => {
    expect(() => parseVersion("11")).toThrow('Invalid version string: "11"');
  });

  it("throws on non-numeric components", () => {
    expect(() => parseVersion("11.0.x")).toThrow('Invalid version string: "11.0.x"');
  });

  it("throws on empty string", () => {
    expect(() => parseVersion("")).toThrow('Invalid version string: ""');
  });
});

describe("isValidVersion", () => {
  it("accepts dotted numbers only", () => {
    expect(isValidVersion("5.4.16.782")).toBe(true);
    expect(isValidVersion("5.4.16.782</span>")).toBe(false);
    expect(isValidVersion("latest")).toBe(false);
  });
});

describe("compareVersions", () => {
  it("returns 0 for equal versions", () => {
    expect(compareVersions("11.0.16.8512", "11.0.16.8512")).toBe(0);
  });

  it("treats missing trailing components as zero", () => {
    expect(compareVersions("11.0", "11.0.0.0")).toBe(0);
    expect(compareVersions("11.0", "11.0.0.1")).toBe(-1);
  });

  it("compares numerically, not lexically", () => {
    expect(compareVersions("11.0.16.10000", "11.0.16.9999")).toBe(1);
    expect(compareVersions("5.4.9.1", "5.4.10.1")).toBe(-1);
  });
});

describe("isNewerVersion", () => {
  it("returns true when latest is newer", () => {
    expect(isNewerVersion("11.0.16.8000", "11.0.16.8100")).toBe(true);
  });

  it("returns false when versions are equal", () => {
    expect(isNewerVersion("11.0.16.8000", "11.0.16.8000")).toBe(false);
  });

  it("returns false when current is newer", () => {
    expect(isNewerVersion("12.0.0.1", "11.0.16.8000")).toBe(false);
  });
});

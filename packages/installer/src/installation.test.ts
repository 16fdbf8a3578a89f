import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { detectInstallation, isPrivileged } from "./installation.js";
import type { InstallPaths } from "./types.js";

describe("isPrivileged", () => {
  it("is true only for uid 0", () => {
    expect(isPrivileged(() => 0)).toBe(true);
    expect(isPrivileged(() => 1000)).toBe(false);
  });

  it("is false where user ids are unavailable", () => {
    expect(isPrivileged(undefined)).toBe(false);
  });
});

describe("detectInstallation", () => {
  let tmpDir: string;
  let paths: InstallPaths;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "plasticscm-probe-test-"));
    paths = {
      installDir: join(tmpDir, "opt", "plasticscm5"),
      binDir: join(tmpDir, "bin"),
      desktopDir: join(tmpDir, "applications"),
      configDir: join(tmpDir, "etc"),
      tmpDir: join(tmpDir, "tmp"),
    };
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reports nothing installed when the directory is missing", async () => {
    expect(await detectInstallation(paths)).toEqual({ installed: false });
  });

  it("reports nothing installed for an empty directory", async () => {
    mkdirSync(paths.installDir, { recursive: true });
    expect(await detectInstallation(paths)).toEqual({ installed: false });
  });

  function writeClient(): void {
    mkdirSync(join(paths.installDir, "client"), { recursive: true });
    writeFileSync(join(paths.installDir, "client", "cm"), "", { mode: 0o644 });
  }

  it("reads the version recorded by a previous run", async () => {
    writeClient();
    mkdirSync(paths.configDir, { recursive: true });
    writeFileSync(
      join(paths.configDir, "installer.conf"),
      `version=11.0.16.8000\nchannel=labs\ninstall_dir=${paths.installDir}\n`,
    );

    expect(await detectInstallation(paths)).toEqual({ installed: true, version: "11.0.16.8000" });
  });

  it("ignores a defaults file that belongs to another install path", async () => {
    mkdirSync(paths.installDir, { recursive: true });
    mkdirSync(paths.configDir, { recursive: true });
    writeFileSync(
      join(paths.configDir, "installer.conf"),
      "version=11.0.16.8000\ninstall_dir=/somewhere/else\n",
    );

    expect(await detectInstallation(paths)).toEqual({ installed: false });
  });

  it("ignores a leftover defaults file when the client is missing", async () => {
    mkdirSync(paths.installDir, { recursive: true });
    mkdirSync(paths.configDir, { recursive: true });
    writeFileSync(
      join(paths.configDir, "installer.conf"),
      `version=11.0.16.8000\ninstall_dir=${paths.installDir}\n`,
    );

    expect(await detectInstallation(paths)).toEqual({ installed: false });
  });

  it("counts a client without a readable version as installed", async () => {
    writeClient();

    expect(await detectInstallation(paths)).toEqual({ installed: true });
  });
});

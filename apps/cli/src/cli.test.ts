import { describe, it, expect, vi } from "vitest";
import { InstallError, type InstallerOptions, type InstallResult } from "@plasticscm-setup/installer";
import { EXIT_USAGE, USAGE, UsageError, parseCliArgs, runCli } from "./cli.js";

describe("parseCliArgs", () => {
  it.each([
    [[], "stable", "allow-upgrade"],
    [["--labs"], "labs", "allow-upgrade"],
    [["--no-upgrade"], "stable", "refuse-if-installed"],
    [["--labs", "--no-upgrade"], "labs", "refuse-if-installed"],
    [["--no-upgrade", "--labs"], "labs", "refuse-if-installed"],
  ])("maps %j to %s / %s", (argv, channel, upgradePolicy) => {
    expect(parseCliArgs(argv)).toEqual({
      channel,
      upgradePolicy,
      includeServer: false,
      help: false,
    });
  });

  it("reads --with-server and --help", () => {
    expect(parseCliArgs(["--with-server", "-h"])).toMatchObject({ includeServer: true, help: true });
  });

  it("rejects unknown flags", () => {
    expect(() => parseCliArgs(["--beta"])).toThrow(UsageError);
  });

  it("rejects positional arguments", () => {
    expect(() => parseCliArgs(["install"])).toThrow(UsageError);
  });
});

describe("runCli", () => {
  function fakeInstaller(result: InstallResult) {
    const run = vi.fn().mockResolvedValue(result);
    const createInstaller = vi.fn((_options: InstallerOptions) => ({ run }));
    return { run, createInstaller };
  }

  it("prints usage and exits 0 for --help", async () => {
    const out: string[] = [];
    const code = await runCli(["--help"], { writeOut: (text) => out.push(text) });
    expect(code).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it("prints usage and exits 64 for an unknown flag", async () => {
    const out: string[] = [];
    const code = await runCli(["--beta"], { writeOut: (text) => out.push(text) });
    expect(code).toBe(EXIT_USAGE);
    expect(out).toEqual([USAGE]);
  });

  it("passes channel, policy and configured paths to the installer", async () => {
    const { run, createInstaller } = fakeInstaller({
      ok: true,
      outcome: { status: "installed", version: "11.0.16.8100" },
    });
    const out: string[] = [];

    const code = await runCli(["--labs", "--no-upgrade", "--with-server"], {
      env: { PLASTICSCM_INSTALL_DIR: "/srv/plastic", PLASTICSCM_DOWNLOAD_URL: "https://mirror.example.com/dl/" },
      createInstaller,
      writeOut: (text) => out.push(text),
    });

    expect(code).toBe(0);
    expect(run).toHaveBeenCalledWith("labs", "refuse-if-installed");
    expect(createInstaller).toHaveBeenCalledWith(
      expect.objectContaining({
        downloadUrl: "https://mirror.example.com/dl",
        includeServer: true,
        paths: expect.objectContaining({ installDir: "/srv/plastic" }),
      }),
    );
    expect(out).toEqual(["Installed Plastic SCM 11.0.16.8100.\n"]);
  });

  it("reports upgrades with the previous version", async () => {
    const { createInstaller } = fakeInstaller({
      ok: true,
      outcome: { status: "upgraded", version: "11.0.16.8000", previousVersion: "11.0.15.1" },
    });
    const out: string[] = [];

    await runCli([], { env: {}, createInstaller, writeOut: (text) => out.push(text) });

    expect(out).toEqual(["Upgraded Plastic SCM from 11.0.15.1 to 11.0.16.8000.\n"]);
  });

  it.each([
    ["InsufficientPrivileges", 77],
    ["AlreadyInstalled", 3],
    ["ReleaseNotFound", 4],
    ["DownloadFailed", 5],
    ["ExtractionFailed", 6],
    ["FilesystemError", 7],
  ] as const)("exits with the code for %s", async (kind, expected) => {
    const { createInstaller } = fakeInstaller({
      ok: false,
      error: new InstallError(kind, "simulated"),
    });

    const code = await runCli([], { env: {}, createInstaller, writeOut: () => {} });

    expect(code).toBe(expected);
  });

  it("exits 1 on invalid configuration without creating an installer", async () => {
    const { createInstaller } = fakeInstaller({
      ok: true,
      outcome: { status: "installed", version: "1.0" },
    });

    const code = await runCli([], {
      env: { PLASTICSCM_INSTALL_DIR: "relative/dir" },
      createInstaller,
      writeOut: () => {},
    });

    expect(code).toBe(1);
    expect(createInstaller).not.toHaveBeenCalled();
  });
});

import { parseArgs } from "node:util";
import { createLogger } from "@plasticscm-setup/logger";
import {
  Installer,
  exitCodeFor,
  formatError,
  loadConfig,
  type InstallerConfig,
  type InstallerOptions,
  type InstallResult,
  type ReleaseChannel,
  type UpgradePolicy,
} from "@plasticscm-setup/installer";

const log = createLogger("cli");

export const EXIT_SUCCESS = 0;
export const EXIT_UNEXPECTED = 1;
export const EXIT_USAGE = 64;

export const USAGE = `Usage: plasticscm-setup [options]

Install or upgrade Plastic SCM from the ZIP bundles published on its website.

Options:
  --labs          Install the latest release of the labs channel
  --no-upgrade    Refuse to run when Plastic SCM is already installed
  --with-server   Also install the server bundle
  -h, --help      Show this help
`;

export interface CliOptions {
  channel: ReleaseChannel;
  upgradePolicy: UpgradePolicy;
  includeServer: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Map command-line flags onto installer options. Throws UsageError. */
export function parseCliArgs(argv: string[]): CliOptions {
  let values: { labs?: boolean; "no-upgrade"?: boolean; "with-server"?: boolean; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        labs: { type: "boolean" },
        "no-upgrade": { type: "boolean" },
        "with-server": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new UsageError(formatError(err));
  }

  return {
    channel: values.labs ? "labs" : "stable",
    upgradePolicy: values["no-upgrade"] ? "refuse-if-installed" : "allow-upgrade",
    includeServer: values["with-server"] ?? false,
    help: values.help ?? false,
  };
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  createInstaller?: (options: InstallerOptions) => { run: Installer["run"] };
  writeOut?: (text: string) => void;
}

function summarize(result: Extract<InstallResult, { ok: true }>): string {
  const { outcome } = result;
  switch (outcome.status) {
    case "up-to-date":
      return `Already up to date (${outcome.version}).`;
    case "upgraded":
      return outcome.previousVersion
        ? `Upgraded Plastic SCM from ${outcome.previousVersion} to ${outcome.version}.`
        : `Upgraded Plastic SCM to ${outcome.version}.`;
    case "installed":
      return `Installed Plastic SCM ${outcome.version}.`;
  }
}

/** Run the installer for the given arguments and return the exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const writeOut = deps.writeOut ?? ((text: string) => process.stdout.write(text));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    log.error(formatError(err));
    writeOut(USAGE);
    return EXIT_USAGE;
  }

  if (options.help) {
    writeOut(USAGE);
    return EXIT_SUCCESS;
  }

  let config: InstallerConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (err) {
    log.error(formatError(err));
    return EXIT_UNEXPECTED;
  }

  const createInstaller = deps.createInstaller ?? ((opts: InstallerOptions) => new Installer(opts));
  const installer = createInstaller({
    paths: config.paths,
    downloadUrl: config.downloadUrl,
    includeServer: options.includeServer,
    onProgress: (progress) => {
      if (progress.percent !== undefined) {
        log.debug(`${progress.url}: ${progress.percent}%`);
      }
    },
  });

  const result = await installer.run(options.channel, options.upgradePolicy);
  if (!result.ok) {
    return exitCodeFor(result.error.kind);
  }

  writeOut(`${summarize(result)}\n`);
  return EXIT_SUCCESS;
}

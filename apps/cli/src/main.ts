import { createLogger } from "@plasticscm-setup/logger";
import { formatError } from "@plasticscm-setup/installer";
import { EXIT_UNEXPECTED, runCli } from "./cli.js";

const log = createLogger("cli");

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.fatal(`Unexpected failure: ${formatError(err)}`);
    process.exitCode = EXIT_UNEXPECTED;
  });

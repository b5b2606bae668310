import { logger, setVerboseLoggingEnabled } from "../logging/logger.js";
import type { CommandResult } from "../types/index.js";
import { runListCommand } from "./commands.list.js";
import { runProvisionCommand } from "./commands.run.js";
import { parseGlobalCliOptions, renderHelp, resolveCliCommand } from "./router.js";

export interface CliDeps {
  runProvisionCommand: (args: string[]) => Promise<CommandResult>;
  runListCommand: (args: string[]) => Promise<CommandResult>;
}

const defaultDeps: CliDeps = {
  runProvisionCommand: (args) => runProvisionCommand(args),
  runListCommand: (args) => runListCommand(args)
};

export async function runCli(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  try {
    const globalOptions = parseGlobalCliOptions(argv);
    setVerboseLoggingEnabled(globalOptions.verbose);
    const resolved = resolveCliCommand(globalOptions.args);

    if (resolved.command === "help") {
      logger.info(renderHelp());
      return 0;
    }

    const result =
      resolved.command === "list"
        ? await deps.runListCommand(resolved.args)
        : await deps.runProvisionCommand(resolved.args);
    logger.info(result.message);
    return result.exitCode ?? 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unexpected CLI failure";
    logger.error(message);
    return 1;
  }
}

import { loadConfig, type LoadConfigOptions } from "../config/load.js";
import type { ResolvedProvisionerConfig } from "../config/schema.js";
import { logger, registerRedactedValue } from "../logging/logger.js";
import { runProvisioningBatch } from "../provision/processor.js";
import { formatBatchSummary, type BatchReport } from "../provision/report.js";
import type { CommandResult } from "../types/index.js";

export interface RunCommandDeps {
  loadConfig: (options?: LoadConfigOptions) => Promise<ResolvedProvisionerConfig>;
  runProvisioningBatch: (config: ResolvedProvisionerConfig) => Promise<BatchReport>;
}

const defaultDeps: RunCommandDeps = {
  loadConfig,
  runProvisioningBatch
};

export async function runProvisionCommand(args: string[], deps: RunCommandDeps = defaultDeps): Promise<CommandResult> {
  if (args.length > 0) {
    throw new Error(`run takes no arguments, got: ${args.join(" ")}`);
  }

  const config = await deps.loadConfig();
  registerRedactedValue(config.github.token);

  if (config.github.org === undefined) {
    logger.warn("ORGNAME is not set; repository creation will fail.");
  }
  if (config.github.token === undefined) {
    logger.warn("GH_TOKEN/GITHUB_TOKEN is not set; requests will be unauthenticated.");
  }

  logger.verbose(`Reading repository list from ${config.store.path}.`);
  const report = await deps.runProvisioningBatch(config);

  return {
    message: formatBatchSummary(report),
    exitCode: report.failed > 0 ? 1 : 0
  };
}

import { loadConfig, type LoadConfigOptions } from "../config/load.js";
import type { ResolvedProvisionerConfig } from "../config/schema.js";
import { loadRepositorySpecs, type RepositorySpecStore } from "../state/repo-specs.js";
import type { CommandResult } from "../types/index.js";

export interface ListCommandDeps {
  loadConfig: (options?: LoadConfigOptions) => Promise<ResolvedProvisionerConfig>;
  loadRepositorySpecs: (path: string) => Promise<RepositorySpecStore>;
}

const defaultDeps: ListCommandDeps = {
  loadConfig,
  loadRepositorySpecs
};

export async function runListCommand(_args: string[], deps: ListCommandDeps = defaultDeps): Promise<CommandResult> {
  const config = await deps.loadConfig();
  const store = await deps.loadRepositorySpecs(config.store.path);

  if (store.entries.length === 0) {
    return {
      message: "No repositories listed.",
      exitCode: 0
    };
  }

  const lines = store.entries.map(({ spec }, index) => {
    const pipeline = spec.pipelineType === undefined ? "" : ` pipeline=${spec.pipelineType}`;
    const users = spec.collaborators.length === 0 ? "" : ` users=${spec.collaborators.join(",")}`;
    return `${index + 1}) ${spec.name} [${spec.status}]${pipeline}${users}`;
  });

  return {
    message: lines.join("\n"),
    exitCode: 0
  };
}

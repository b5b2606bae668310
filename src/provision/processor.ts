import type { ResolvedProvisionerConfig } from "../config/schema.js";
import {
  createProvisioningClient,
  type ProvisioningClientOptions,
  type RepositoryProvisioningClient
} from "../github/provisioner.js";
import { logger } from "../logging/logger.js";
import { loadPipelineTemplate, workflowPathFor } from "../pipeline/templates.js";
import { resolveSecrets, type ResolvedSecret } from "../secrets/sources.js";
import { loadRepositorySpecs, saveRepositorySpecs } from "../state/repo-specs.js";
import { CREATED, NEED_TO_CREATE, type RepositorySpec } from "../types/index.js";
import {
  buildBatchReport,
  classifyProvisionFailure,
  describeFailure,
  MissingPipelineTypeError,
  type BatchReport,
  type FailedOutcome,
  type ProvisionOutcome,
  type ProvisionStage
} from "./report.js";

export interface ProvisionDeps {
  client: RepositoryProvisioningClient;
  loadPipelineTemplate: (pipelineType: string) => Promise<string>;
  resolveSecrets: () => ResolvedSecret[];
  branch: string;
}

/**
 * Brings one `need-to-create` entry to `created`. Errors never escape: they
 * become a `failed` outcome and the entry's status is left as it was.
 */
export async function provisionRepository(spec: RepositorySpec, deps: ProvisionDeps): Promise<ProvisionOutcome> {
  if (spec.status !== NEED_TO_CREATE) {
    logger.verbose(`Skipping '${spec.name}' (status '${spec.status}').`);
    return { name: spec.name, result: "skipped", status: spec.status };
  }

  let stage: ProvisionStage = "create";
  try {
    await deps.client.createRepository(spec.name);

    stage = "collaborators";
    for (const username of spec.collaborators) {
      await deps.client.addCollaborator(spec.name, username);
    }

    stage = "pipeline";
    if (spec.pipelineType === undefined) {
      throw new MissingPipelineTypeError(spec.name);
    }
    const template = await deps.loadPipelineTemplate(spec.pipelineType);
    await deps.client.uploadFile(spec.name, {
      path: workflowPathFor(spec.pipelineType),
      content: template,
      message: `Add ${spec.pipelineType} pipeline`,
      branch: deps.branch
    });

    stage = "secrets";
    for (const secret of deps.resolveSecrets()) {
      await deps.client.setSecret(spec.name, secret.name, secret.value);
    }
  } catch (error) {
    const failure = classifyProvisionFailure(error);
    const outcome: FailedOutcome = {
      name: spec.name,
      result: "failed",
      stage,
      ...failure,
      remoteCreated: stage !== "create"
    };

    logger.error(`Provisioning '${spec.name}' failed. ${describeFailure(outcome)}`);
    if (outcome.remoteCreated) {
      logger.warn(
        `Repository '${spec.name}' exists remotely but stays '${NEED_TO_CREATE}'; a re-run will fail at repository creation until it is inspected manually.`
      );
    } else if (failure.httpStatus === 422) {
      logger.warn(`Repository '${spec.name}' may already exist, possibly from an earlier partial run.`);
    }

    return outcome;
  }

  spec.status = CREATED;
  logger.success(`Repository '${spec.name}' provisioned.`);
  return { name: spec.name, result: "created" };
}

/** Processes every entry in order, one at a time. */
export async function processRepositorySpecs(specs: RepositorySpec[], deps: ProvisionDeps): Promise<BatchReport> {
  const outcomes: ProvisionOutcome[] = [];

  for (const spec of specs) {
    outcomes.push(await provisionRepository(spec, deps));
  }

  return buildBatchReport(outcomes);
}

export interface RunProvisioningBatchOptions extends ProvisioningClientOptions {
  provisioningClient?: RepositoryProvisioningClient;
}

/**
 * Loads the repository list, provisions pending entries and rewrites the list.
 * Store errors are not caught.
 */
export async function runProvisioningBatch(
  config: ResolvedProvisionerConfig,
  options: RunProvisioningBatchOptions = {}
): Promise<BatchReport> {
  const store = await loadRepositorySpecs(config.store.path);
  const client = options.provisioningClient ?? createProvisioningClient(config, options);

  const report = await processRepositorySpecs(
    store.entries.map((entry) => entry.spec),
    {
      client,
      loadPipelineTemplate: (pipelineType) =>
        loadPipelineTemplate(pipelineType, { templateDir: config.pipeline.template_dir }),
      resolveSecrets: () => resolveSecrets(config.secrets, { env: config.env, token: config.github.token }),
      branch: config.pipeline.branch
    }
  );

  await saveRepositorySpecs(store);
  return report;
}

import { SecretEncryptionError } from "../crypto/sealed-secret.js";
import { toHttpFailure } from "../github/client.js";
import { PipelineTemplateNotFoundError } from "../pipeline/templates.js";
import { SecretSourceError } from "../secrets/sources.js";

export type ProvisionStage = "create" | "collaborators" | "pipeline" | "secrets";

export type FailureReason = "http" | "configuration" | "encoding" | "unexpected";

export class MissingPipelineTypeError extends Error {
  constructor(repositoryName: string) {
    super(`Pipeline type is not defined for '${repositoryName}'.`);
    this.name = "MissingPipelineTypeError";
  }
}

export type ProvisionOutcome =
  | { name: string; result: "created" }
  | { name: string; result: "skipped"; status: string }
  | {
      name: string;
      result: "failed";
      stage: ProvisionStage;
      reason: FailureReason;
      httpStatus?: number;
      message: string;
      /** The repository exists remotely although its status was not advanced. */
      remoteCreated: boolean;
    };

export type FailedOutcome = Extract<ProvisionOutcome, { result: "failed" }>;

export interface BatchReport {
  outcomes: ProvisionOutcome[];
  created: number;
  skipped: number;
  failed: number;
}

export interface ClassifiedFailure {
  reason: FailureReason;
  httpStatus?: number;
  message: string;
}

export function classifyProvisionFailure(error: unknown): ClassifiedFailure {
  const httpFailure = toHttpFailure(error);
  if (httpFailure) {
    return { reason: "http", httpStatus: httpFailure.status, message: httpFailure.message };
  }

  if (
    error instanceof MissingPipelineTypeError ||
    error instanceof PipelineTemplateNotFoundError ||
    error instanceof SecretSourceError
  ) {
    return { reason: "configuration", message: error.message };
  }

  if (error instanceof SecretEncryptionError) {
    return { reason: "encoding", message: error.message };
  }

  return { reason: "unexpected", message: error instanceof Error ? error.message : String(error) };
}

export function buildBatchReport(outcomes: ProvisionOutcome[]): BatchReport {
  return {
    outcomes,
    created: outcomes.filter((outcome) => outcome.result === "created").length,
    skipped: outcomes.filter((outcome) => outcome.result === "skipped").length,
    failed: outcomes.filter((outcome) => outcome.result === "failed").length
  };
}

export function describeFailure(outcome: FailedOutcome): string {
  const status = outcome.httpStatus === undefined ? "" : ` (HTTP ${outcome.httpStatus})`;
  return `${outcome.name}: ${outcome.reason} failure at ${outcome.stage}${status}: ${outcome.message}`;
}

export function formatBatchSummary(report: BatchReport): string {
  const lines = [`Provisioning finished: ${report.created} created, ${report.skipped} skipped, ${report.failed} failed.`];

  for (const outcome of report.outcomes) {
    if (outcome.result === "failed") {
      lines.push(`  - ${describeFailure(outcome)}`);
    }
  }

  return lines.join("\n");
}

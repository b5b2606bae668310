import { Octokit } from "@octokit/rest";
import type { ResolvedProvisionerConfig } from "../config/schema.js";
import { logger } from "../logging/logger.js";

type GitHubClientConfig = Pick<ResolvedProvisionerConfig, "github">;

export interface GitHubClientOptions {
  fetch?: typeof fetch;
  userAgent?: string;
}

export function createGitHubClient(config: GitHubClientConfig, options: GitHubClientOptions = {}): Octokit {
  return new Octokit({
    auth: config.github.token,
    baseUrl: config.github.api_url,
    userAgent: options.userAgent ?? "repo-provisioner",
    // failures are reported per repository by the processor
    log: {
      debug: logger.verbose,
      info: logger.verbose,
      warn: logger.warn,
      error: logger.verbose
    },
    request: options.fetch ? { fetch: options.fetch } : undefined
  });
}

export interface HttpFailure {
  status: number;
  message: string;
}

/** Octokit raises `RequestError`s carrying the response status. */
export function toHttpFailure(error: unknown): HttpFailure | undefined {
  if (!(error instanceof Error) || !("status" in error)) {
    return undefined;
  }

  const { status } = error;
  if (typeof status !== "number") {
    return undefined;
  }

  return { status, message: error.message };
}

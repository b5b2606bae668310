import type { Octokit } from "@octokit/rest";
import type { ResolvedProvisionerConfig } from "../config/schema.js";
import { encryptSecret } from "../crypto/sealed-secret.js";
import { logger } from "../logging/logger.js";
import type { PublicKeyInfo } from "../types/index.js";
import { createGitHubClient, type GitHubClientOptions } from "./client.js";

export interface UploadFileRequest {
  path: string;
  content: string;
  message: string;
  branch: string;
}

export interface RepositoryProvisioningClient {
  createRepository(name: string): Promise<void>;
  addCollaborator(name: string, username: string): Promise<void>;
  fetchPublicKey(name: string): Promise<PublicKeyInfo>;
  uploadFile(name: string, file: UploadFileRequest): Promise<void>;
  setSecret(name: string, secretName: string, plaintext: string): Promise<void>;
}

export interface ProvisioningClientOptions extends GitHubClientOptions {
  client?: Octokit;
}

type ProvisioningConfig = Pick<ResolvedProvisionerConfig, "github">;

/**
 * Every call is a single request against the organization's repositories.
 * Non-2xx responses surface as Octokit `RequestError`s; nothing is retried.
 */
export function createProvisioningClient(
  config: ProvisioningConfig,
  options: ProvisioningClientOptions = {}
): RepositoryProvisioningClient {
  const octokit = options.client ?? createGitHubClient(config, options);
  const owner = config.github.org ?? "";

  async function fetchPublicKey(name: string): Promise<PublicKeyInfo> {
    const { data } = await octokit.rest.actions.getRepoPublicKey({ owner, repo: name });
    return { key: data.key, keyId: data.key_id };
  }

  return {
    async createRepository(name) {
      await octokit.rest.repos.createInOrg({ org: owner, name, private: true });
      logger.success(`Repository '${name}' created.`);
    },

    async addCollaborator(name, username) {
      await octokit.rest.repos.addCollaborator({ owner, repo: name, username, permission: "push" });
      logger.success(`User '${username}' added as collaborator to '${name}'.`);
    },

    fetchPublicKey,

    async uploadFile(name, file) {
      await octokit.rest.repos.createOrUpdateFileContents({
        owner,
        repo: name,
        path: file.path,
        message: file.message,
        content: Buffer.from(file.content, "utf8").toString("base64"),
        branch: file.branch
      });
      logger.success(`File '${file.path}' committed to '${name}' on '${file.branch}'.`);
    },

    async setSecret(name, secretName, plaintext) {
      const publicKey = await fetchPublicKey(name);
      logger.verbose(`Fetched public key ${publicKey.keyId} for '${name}'.`);
      const encryptedValue = await encryptSecret(publicKey.key, plaintext);
      await octokit.rest.actions.createOrUpdateRepoSecret({
        owner,
        repo: name,
        secret_name: secretName,
        encrypted_value: encryptedValue,
        key_id: publicKey.keyId
      });
      logger.success(`Secret '${secretName}' added to '${name}'.`);
    }
  };
}

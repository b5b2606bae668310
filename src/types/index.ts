export type CliCommandName = "run" | "list" | "help";

export type KnownRepositoryStatus = "need-to-create" | "created";

export const NEED_TO_CREATE: KnownRepositoryStatus = "need-to-create";
export const CREATED: KnownRepositoryStatus = "created";

export interface RepositorySpec {
  name: string;
  collaborators: string[];
  pipelineType?: string;
  status: string;
}

export interface PublicKeyInfo {
  key: string;
  keyId: string;
}

export interface CommandResult {
  message: string;
  exitCode?: number;
}

import { readFile, writeFile } from "node:fs/promises";
import type { RepositorySpec } from "../types/index.js";

type JsonRecord = Record<string, unknown>;

export const REPO_NAME_KEY = "repo-name";
export const REPO_USERS_KEY = "repo-users";
export const PIPELINE_TYPE_KEY = "pipeline-type";
export const STATUS_KEY = "status";

export interface RepositorySpecEntry {
  spec: RepositorySpec;
  /** The entry as read, so keys the provisioner does not know survive a rewrite. */
  record: JsonRecord;
}

export interface RepositorySpecStore {
  path: string;
  entries: RepositorySpecEntry[];
  trailingNewline: boolean;
}

export async function loadRepositorySpecs(path: string): Promise<RepositorySpecStore> {
  let source: string;
  try {
    source = await readFile(path, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new Error(`Cannot load repository list at '${path}': file does not exist.`);
    }
    throw error;
  }

  return parseRepositorySpecs(source, path);
}

export function parseRepositorySpecs(source: string, path: string): RepositorySpecStore {
  let parsed: unknown;
  try {
    parsed = JSON.parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot parse repository list at '${path}': ${message}`);
  }

  if (!Array.isArray(parsed)) {
    throw new Error("Invalid repository list root: expected a JSON array.");
  }

  const entries = parsed.map((entry, index): RepositorySpecEntry => {
    if (!isRecord(entry)) {
      throw new Error(`Invalid repos[${index}]: expected an object.`);
    }

    return { spec: toRepositorySpec(entry, index), record: entry };
  });

  return {
    path,
    entries,
    trailingNewline: source.endsWith("\n")
  };
}

export function serializeRepositorySpecs(store: RepositorySpecStore): string {
  const records = store.entries.map(({ spec, record }) => ({
    ...record,
    [STATUS_KEY]: spec.status
  }));
  const body = JSON.stringify(records, null, 2);
  return store.trailingNewline ? `${body}\n` : body;
}

/** Overwrites the list with every entry, changed or not. */
export async function saveRepositorySpecs(store: RepositorySpecStore): Promise<void> {
  await writeFile(store.path, serializeRepositorySpecs(store), "utf8");
}

function toRepositorySpec(entry: JsonRecord, index: number): RepositorySpec {
  const name = entry[REPO_NAME_KEY];
  if (typeof name !== "string" || name.trim() === "") {
    throw new Error(`Invalid repos[${index}].${REPO_NAME_KEY}: required non-empty string is missing.`);
  }

  const users = entry[REPO_USERS_KEY] ?? [];
  if (!Array.isArray(users) || !users.every((user): user is string => typeof user === "string")) {
    throw new Error(`Invalid repos[${index}].${REPO_USERS_KEY}: expected an array of strings.`);
  }

  const pipelineType = entry[PIPELINE_TYPE_KEY] ?? undefined;
  if (pipelineType !== undefined && typeof pipelineType !== "string") {
    throw new Error(`Invalid repos[${index}].${PIPELINE_TYPE_KEY}: expected a string.`);
  }

  const status = entry[STATUS_KEY];
  if (typeof status !== "string") {
    throw new Error(`Invalid repos[${index}].${STATUS_KEY}: expected a string.`);
  }

  return {
    name,
    collaborators: [...users],
    pipelineType,
    status
  };
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

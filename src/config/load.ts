import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import { resolveGitToken } from "../auth/token.js";
import { loadEnvSource, type EnvSource } from "./env.js";
import { defaultConfig } from "./defaults.js";
import type { ResolvedProvisionerConfig, SecretDefinition, SecretSource } from "./schema.js";

type JsonRecord = Record<string, unknown>;

export interface LoadConfigOptions {
  configPath?: string;
  envPath?: string;
  cwd?: string;
  env?: EnvSource;
}

export const PROVISIONER_CONFIG_FILENAME = "repo-provisioner.toml";

const SECRET_SOURCES = ["literal", "env", "token"] as const;

/**
 * Resolves the provisioner configuration from an optional TOML file and the
 * environment. A missing organization or token is left undefined here; the
 * first remote call reports it as an authorization failure.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedProvisionerConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ?? resolve(cwd, PROVISIONER_CONFIG_FILENAME);
  const envPath = options.envPath ?? resolve(cwd, ".env");

  const rawConfig = await readTomlConfig(configPath);
  const env = await loadEnvSource(envPath, options.env);

  const githubRaw = getOptionalTable(rawConfig, "github", "github");
  const storeRaw = getOptionalTable(rawConfig, "store", "store");
  const pipelineRaw = getOptionalTable(rawConfig, "pipeline", "pipeline");
  const secretsRaw = getOptionalTable(rawConfig, "secrets", "secrets");

  const storePath = getOptionalString(storeRaw, "path", "store.path") ?? defaultConfig.store.path;
  const templateDir =
    getOptionalString(pipelineRaw, "template_dir", "pipeline.template_dir") ?? defaultConfig.pipeline.template_dir;

  return {
    github: {
      org: trimToUndefined(env.ORGNAME) ?? getOptionalString(githubRaw, "org", "github.org"),
      token: resolveGitToken(env),
      api_url:
        trimToUndefined(env.GITHUB_API_URL) ??
        getOptionalString(githubRaw, "api_url", "github.api_url") ??
        defaultConfig.github.api_url
    },
    store: {
      path: resolve(cwd, storePath)
    },
    pipeline: {
      template_dir: resolve(cwd, templateDir),
      branch: getOptionalString(pipelineRaw, "branch", "pipeline.branch") ?? defaultConfig.pipeline.branch
    },
    secrets: resolveSecrets(secretsRaw),
    env
  };
}

async function readTomlConfig(configPath: string): Promise<JsonRecord> {
  let source: string;
  try {
    source = await readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseToml(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot parse provisioner config at '${configPath}': ${message}`);
  }

  if (!isRecord(parsed)) {
    throw new Error("Invalid provisioner config root: expected a TOML table.");
  }

  return parsed;
}

function resolveSecrets(rawSecrets: JsonRecord | undefined): SecretDefinition[] {
  if (rawSecrets === undefined) {
    return defaultConfig.secrets;
  }

  return Object.entries(rawSecrets).map(([name, entry]) => {
    const path = `secrets.${name}`;
    if (!isRecord(entry)) {
      throw new Error(`Invalid ${path}: expected a TOML table.`);
    }

    return { name, from: resolveSecretSource(entry, path) };
  });
}

function resolveSecretSource(entry: JsonRecord, path: string): SecretSource {
  const source = getOptionalEnum(entry, "source", `${path}.source`, SECRET_SOURCES);

  switch (source) {
    case "literal": {
      const value = getOptionalString(entry, "value", `${path}.value`);
      if (value === undefined) {
        throw new Error(`Invalid ${path}.value: required for source 'literal'.`);
      }
      return { source, value };
    }
    case "env":
      return { source, name: getRequiredString(entry, "name", `${path}.name`) };
    case "token":
      return { source };
    case undefined:
      throw new Error(`Invalid ${path}.source: expected one of ${SECRET_SOURCES.join("|")}.`);
  }
}

function getOptionalTable(parent: JsonRecord, key: string, path: string): JsonRecord | undefined {
  const value = parent[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error(`Invalid ${path}: expected a TOML table.`);
  }
  return value;
}

function getOptionalString(parent: JsonRecord | undefined, key: string, path: string): string | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`Invalid ${path}: expected a string.`);
  }
  return value;
}

function getRequiredString(parent: JsonRecord, key: string, path: string): string {
  const value = getOptionalString(parent, key, path);
  if (value === undefined || value.trim() === "") {
    throw new Error(`Invalid ${path}: required non-empty string is missing.`);
  }
  return value;
}

function getOptionalEnum<T extends readonly string[]>(
  parent: JsonRecord | undefined,
  key: string,
  path: string,
  values: T
): T[number] | undefined {
  const value = getOptionalString(parent, key, path);
  if (value === undefined) {
    return undefined;
  }
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Invalid ${path}: expected one of ${values.join("|")}.`);
  }
  return match;
}

function trimToUndefined(value: string | undefined): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

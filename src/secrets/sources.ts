import type { SecretDefinition, SecretSource } from "../config/schema.js";
import type { EnvSource } from "../config/env.js";

export class SecretSourceError extends Error {
  readonly secretName: string;

  constructor(secretName: string, message: string) {
    super(`Cannot resolve secret '${secretName}': ${message}`);
    this.name = "SecretSourceError";
    this.secretName = secretName;
  }
}

export interface SecretSourceContext {
  env: EnvSource;
  token: string | undefined;
}

export interface ResolvedSecret {
  name: string;
  value: string;
}

export function resolveSecretValue(name: string, from: SecretSource, context: SecretSourceContext): string {
  switch (from.source) {
    case "literal":
      return from.value;
    case "env": {
      const value = context.env[from.name];
      if (value === undefined || value.trim() === "") {
        throw new SecretSourceError(name, `environment variable ${from.name} is not set.`);
      }
      return value;
    }
    case "token":
      if (context.token === undefined) {
        throw new SecretSourceError(name, "no provisioning token is configured (set GH_TOKEN or GITHUB_TOKEN).");
      }
      return context.token;
  }
}

/** Resolves the whole set in configuration order; the first unresolved secret fails it. */
export function resolveSecrets(definitions: SecretDefinition[], context: SecretSourceContext): ResolvedSecret[] {
  return definitions.map((definition) => ({
    name: definition.name,
    value: resolveSecretValue(definition.name, definition.from, context)
  }));
}

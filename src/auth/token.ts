const tokenEnvPriority = ["GH_TOKEN", "GITHUB_TOKEN"] as const;

export function resolveGitToken(env: Record<string, string | undefined>): string | undefined {
  for (const key of tokenEnvPriority) {
    const value = normalizeToken(env[key]);
    if (value) {
      return value;
    }
  }

  return undefined;
}

function normalizeToken(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed === "" ? undefined : trimmed;
}

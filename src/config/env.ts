import { readFile } from "node:fs/promises";
import { parse as parseDotEnv } from "dotenv";

export type EnvSource = Record<string, string | undefined>;

/**
 * Values from the `.env` file overlaid by the process environment. A missing
 * file contributes nothing.
 */
export async function loadEnvSource(envPath: string, processEnv: EnvSource = process.env): Promise<EnvSource> {
  let fileEnv: EnvSource = {};

  try {
    fileEnv = parseDotEnv(await readFile(envPath, "utf8"));
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw new Error(`Cannot read env file at '${envPath}': ${describeError(error)}`, { cause: error });
    }
  }

  return {
    ...fileEnv,
    ...processEnv
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

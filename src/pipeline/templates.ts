import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

export class PipelineTemplateNotFoundError extends Error {
  readonly templatePath: string;

  constructor(pipelineType: string, templatePath: string) {
    super(`The file for pipeline type '${pipelineType}' does not exist: ${templatePath}`);
    this.name = "PipelineTemplateNotFoundError";
    this.templatePath = templatePath;
  }
}

export interface LoadPipelineTemplateOptions {
  templateDir?: string;
}

export function pipelineTemplatePath(pipelineType: string, options: LoadPipelineTemplateOptions = {}): string {
  return resolve(options.templateDir ?? process.cwd(), `${pipelineType}.yml`);
}

/** Reads `<pipelineType>.yml` verbatim. */
export async function loadPipelineTemplate(
  pipelineType: string,
  options: LoadPipelineTemplateOptions = {}
): Promise<string> {
  const templatePath = pipelineTemplatePath(pipelineType, options);

  try {
    return await readFile(templatePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new PipelineTemplateNotFoundError(pipelineType, templatePath);
    }
    throw error;
  }
}

export function workflowPathFor(pipelineType: string): string {
  return `.github/workflows/${pipelineType}.yml`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

import type { CliCommandName } from "../types/index.js";

export interface ResolvedCliCommand {
  command: CliCommandName;
  args: string[];
}

export interface GlobalCliOptions {
  args: string[];
  verbose: boolean;
}

export function isHelpFlag(token: string): boolean {
  return token === "-h" || token === "--help";
}

export function parseGlobalCliOptions(argv: string[]): GlobalCliOptions {
  return {
    args: argv.filter((token) => token !== "--verbose"),
    verbose: argv.includes("--verbose")
  };
}

export function resolveCliCommand(argv: string[]): ResolvedCliCommand {
  const [first, ...rest] = argv;

  if (first === undefined) {
    return { command: "run", args: [] };
  }

  if (isHelpFlag(first) || first === "help") {
    return { command: "help", args: [] };
  }

  if (first === "run" || first === "list") {
    return { command: first, args: rest };
  }

  throw new Error(`Unknown command: ${first}. Use --help for usage.`);
}

export function renderHelp(): string {
  return [
    "repo-provisioner CLI",
    "",
    "Usage:",
    "  repo-provisioner [command] [--verbose]",
    "",
    "Inputs (working directory):",
    "  repos.json               repository list, rewritten after each run",
    "  <pipeline-type>.yml      workflow templates",
    "  repo-provisioner.toml    optional settings ([github], [store], [pipeline], [secrets.<NAME>])",
    "  .env                     ORGNAME, GH_TOKEN or GITHUB_TOKEN, GITHUB_API_URL",
    "",
    "Commands:",
    "  run      Provision every 'need-to-create' repository (default)",
    "  list     Show repositories and their status",
    "",
    "Options:",
    "  --verbose             Show per-request details",
    "  -h, --help            Show help"
  ].join("\n");
}

import { describe, expect, it } from "vitest";
import { parseGlobalCliOptions, renderHelp, resolveCliCommand } from "../src/cli/router.js";

describe("CLI bootstrap routing", () => {
  it("runs the batch when no command is given", () => {
    expect(resolveCliCommand([])).toEqual({ command: "run", args: [] });
  });

  it("routes list with passthrough args", () => {
    expect(resolveCliCommand(["list", "extra"])).toEqual({ command: "list", args: ["extra"] });
  });

  it("routes help flags and the help command", () => {
    expect(resolveCliCommand(["--help"]).command).toBe("help");
    expect(resolveCliCommand(["-h"]).command).toBe("help");
    expect(resolveCliCommand(["help"]).command).toBe("help");
  });

  it("rejects unknown commands", () => {
    expect(() => resolveCliCommand(["deploy"])).toThrow("Unknown command: deploy. Use --help for usage.");
  });

  it("extracts --verbose wherever it appears", () => {
    expect(parseGlobalCliOptions(["--verbose", "run"])).toEqual({ args: ["run"], verbose: true });
    expect(parseGlobalCliOptions(["list", "--verbose"])).toEqual({ args: ["list"], verbose: true });
    expect(parseGlobalCliOptions(["run"])).toEqual({ args: ["run"], verbose: false });
  });

  it("documents the commands in help", () => {
    const help = renderHelp();

    expect(help).toContain("  run      Provision every 'need-to-create' repository (default)");
    expect(help).toContain("  list     Show repositories and their status");
  });
});

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultConfig } from "../src/config/defaults.js";
import { loadEnvSource } from "../src/config/env.js";
import { loadConfig } from "../src/config/load.js";

describe("loadConfig", () => {
  let tempDir = "";

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "repo-provisioner-config-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("applies defaults when no config file exists", async () => {
    const resolved = await loadConfig({ cwd: tempDir, env: {} });

    expect(resolved.github).toEqual({ org: undefined, token: undefined, api_url: "https://api.github.com" });
    expect(resolved.store.path).toBe(join(tempDir, "repos.json"));
    expect(resolved.pipeline).toEqual({ template_dir: tempDir, branch: "main" });
    expect(resolved.secrets).toEqual(defaultConfig.secrets);
  });

  it("reads organization and token from .env", async () => {
    await writeFile(join(tempDir, ".env"), "ORGNAME=acme\nGH_TOKEN= test-token \n");

    const resolved = await loadConfig({ cwd: tempDir, env: {} });

    expect(resolved.github.org).toBe("acme");
    expect(resolved.github.token).toBe("test-token");
    expect(resolved.env.ORGNAME).toBe("acme");
  });

  it("prefers GH_TOKEN over GITHUB_TOKEN and process values over .env", async () => {
    await writeFile(join(tempDir, ".env"), "ORGNAME=from-file\nGITHUB_TOKEN=file-token\n");

    const resolved = await loadConfig({
      cwd: tempDir,
      env: { ORGNAME: "from-process", GH_TOKEN: "process-token" }
    });

    expect(resolved.github.org).toBe("from-process");
    expect(resolved.github.token).toBe("process-token");
  });

  it("reads settings and the secret mapping from the TOML file", async () => {
    await writeFile(
      join(tempDir, "repo-provisioner.toml"),
      [
        "[github]",
        'org = "platform"',
        'api_url = "https://ghe.example.test/api/v3"',
        "",
        "[store]",
        'path = "state/repos.json"',
        "",
        "[pipeline]",
        'template_dir = "pipelines"',
        'branch = "trunk"',
        "",
        "[secrets.RG_PASSWORD]",
        'source = "env"',
        'name = "RG_PASSWORD"',
        "",
        "[secrets.SECRET_KEY]",
        'source = "literal"',
        'value = "example_secret_value"',
        "",
        "[secrets.GH_TOKEN]",
        'source = "token"'
      ].join("\n")
    );

    const resolved = await loadConfig({ cwd: tempDir, env: {} });

    expect(resolved.github.org).toBe("platform");
    expect(resolved.github.api_url).toBe("https://ghe.example.test/api/v3");
    expect(resolved.store.path).toBe(join(tempDir, "state", "repos.json"));
    expect(resolved.pipeline).toEqual({ template_dir: join(tempDir, "pipelines"), branch: "trunk" });
    expect(resolved.secrets).toEqual([
      { name: "RG_PASSWORD", from: { source: "env", name: "RG_PASSWORD" } },
      { name: "SECRET_KEY", from: { source: "literal", value: "example_secret_value" } },
      { name: "GH_TOKEN", from: { source: "token" } }
    ]);
  });

  it("rejects an unknown secret source", async () => {
    await writeFile(join(tempDir, "repo-provisioner.toml"), '[secrets.VAULT]\nsource = "vault"\n');

    await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toThrow(
      "Invalid secrets.VAULT.source: expected one of literal|env|token."
    );
  });

  it("rejects an env source without a variable name", async () => {
    await writeFile(join(tempDir, "repo-provisioner.toml"), '[secrets.RG_URL]\nsource = "env"\n');

    await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toThrow(
      "Invalid secrets.RG_URL.name: required non-empty string is missing."
    );
  });

  it("rejects wrongly typed values", async () => {
    await writeFile(join(tempDir, "repo-provisioner.toml"), "[pipeline]\nbranch = 3\n");

    await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toThrow("Invalid pipeline.branch: expected a string.");
  });

  it("reports unparsable TOML with its path", async () => {
    const configPath = join(tempDir, "repo-provisioner.toml");
    await writeFile(configPath, "[github\n");

    await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toThrow(
      `Cannot parse provisioner config at '${configPath}':`
    );
  });
});

describe("loadEnvSource", () => {
  let tempDir = "";

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "repo-provisioner-env-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("ignores a missing .env file", async () => {
    const env = await loadEnvSource(join(tempDir, "missing.env"), { ORGNAME: "acme" });

    expect(env).toEqual({ ORGNAME: "acme" });
  });

  it("throws for non-ENOENT read failures", async () => {
    await expect(loadEnvSource(tempDir, {})).rejects.toThrow(`Cannot read env file at '${tempDir}':`);
  });
});

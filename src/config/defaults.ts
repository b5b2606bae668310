import type { ResolvedProvisionerConfig } from "./schema.js";

export const defaultConfig: ResolvedProvisionerConfig = {
  github: {
    org: undefined,
    token: undefined,
    api_url: "https://api.github.com"
  },
  store: {
    path: "repos.json"
  },
  pipeline: {
    template_dir: ".",
    branch: "main"
  },
  secrets: [
    { name: "SECRET_KEY", from: { source: "literal", value: "example_secret_value" } },
    { name: "GH_TOKEN", from: { source: "token" } }
  ],
  env: {}
};

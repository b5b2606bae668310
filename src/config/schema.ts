export type SecretSource =
  | { source: "literal"; value: string }
  | { source: "env"; name: string }
  | { source: "token" };

export interface SecretDefinition {
  name: string;
  from: SecretSource;
}

export interface ResolvedProvisionerConfig {
  github: {
    org: string | undefined;
    token: string | undefined;
    api_url: string;
  };
  store: {
    path: string;
  };
  pipeline: {
    template_dir: string;
    branch: string;
  };
  secrets: SecretDefinition[];
  env: Record<string, string | undefined>;
}

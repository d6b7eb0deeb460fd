import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";

import { ServerConfigSchema, formatSchemaIssues, type ServerConfig } from "./config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "wirebridge.yaml";

export type ConfigOverrides = Partial<Pick<ServerConfig, "host" | "port" | "storage_dir" | "open_browser">>;

export type LoadConfigOptions = {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
};

export type LoadedConfig = {
  config: ServerConfig;
  configPath: string | null;
};

// Precedence: defaults < YAML file < WIREBRIDGE_* env < CLI overrides.
export function loadServerConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const configPath = resolveConfigPath(options.explicitPath, cwd);
  const fileValues = configPath ? readConfigFile(configPath) : {};

  const merged: Record<string, unknown> = {
    ...fileValues,
    ...readEnvOverrides(options.env ?? process.env),
    ...dropUndefined(options.overrides ?? {}),
  };

  const parsed = ServerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const source = configPath ?? "environment";
    throw createConfigError(
      `Invalid configuration in ${source}:\n${formatSchemaIssues(parsed.error.issues).join("\n")}`,
      parsed.error,
    );
  }

  return { config: parsed.data, configPath };
}

// =============================================================================
// INTERNALS
// =============================================================================

const CONFIG_HINT = `Check ${DEFAULT_CONFIG_FILE} and WIREBRIDGE_* environment variables.`;

function createConfigError(message: string, cause?: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Configuration invalid.",
    message,
    hint: CONFIG_HINT,
    cause,
  });
}

function resolveConfigPath(explicitPath: string | undefined, cwd: string): string | null {
  if (explicitPath) {
    const resolved = path.resolve(cwd, explicitPath);
    if (!fs.existsSync(resolved)) {
      throw createConfigError(`Config file not found at ${resolved}.`);
    }
    return resolved;
  }

  const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(candidate) ? candidate : null;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw createConfigError(`Failed to read config file at ${configPath}.`, err);
  }

  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw createConfigError(`Config file at ${configPath} must contain a mapping.`);
  }
  return Object.fromEntries(Object.entries(raw));
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};

  const host = env.WIREBRIDGE_HOST?.trim();
  if (host) values.host = host;

  const port = env.WIREBRIDGE_PORT?.trim();
  if (port) values.port = Number(port);

  const storageDir = env.WIREBRIDGE_STORAGE_DIR?.trim();
  if (storageDir) values.storage_dir = storageDir;

  return values;
}

function dropUndefined(values: ConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

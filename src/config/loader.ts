import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { RelayConfigSchema, type RelayConfig } from "./schema";

export const CONFIG_PATH_ENV = "MODEL_RELAY_CONFIG";
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 3000;

export interface ConfigLoadResult {
  success: boolean;
  config?: RelayConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  const envPath = process.env[CONFIG_PATH_ENV];
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), ".model-relay", "config.jsonc");
}

/** Fills the sections every runtime needs so callers can read them without guards. */
export function applyConfigDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  const server: Record<string, unknown> = isRecord(obj.server) ? { ...obj.server } : {};
  if (!Object.hasOwn(server, "host")) {
    server.host = DEFAULT_HOST;
  }
  if (!Object.hasOwn(server, "port")) {
    server.port = DEFAULT_PORT;
  }
  obj.server = server;

  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
  } else if (isRecord(obj.logging) && !Object.hasOwn(obj.logging, "level")) {
    obj.logging = { ...obj.logging, level: "info" };
  }

  if (!Object.hasOwn(obj, "agents")) {
    obj.agents = { echo: { enabled: true } };
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false, quiet: true });
  if (result.error) {
    throw result.error;
  }
}

export function parseConfigText(raw: string, env?: Record<string, string | undefined>) {
  const parseErrors: ParseError[] = [];
  let config: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    return {
      success: false as const,
      errors: parseErrors.map(
        (error) => `offset ${error.offset}: ${printParseErrorCode(error.error)}`,
      ),
    };
  }
  config = replaceEnvVars(config, env);
  config = applyConfigDefaults(config);

  const result = RelayConfigSchema.safeParse(config);
  if (!result.success) {
    return {
      success: false as const,
      errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { success: true as const, config: result.data };
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const raw = fs.readFileSync(resolvedPath, "utf-8");
    const parsed = parseConfigText(raw);
    if (!parsed.success) {
      return { success: false, errors: parsed.errors, path: resolvedPath };
    }
    return { success: true, config: parsed.config, path: resolvedPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}

/** Config used when no file exists: echo agent only, default listener. */
export function defaultConfig(): RelayConfig {
  const parsed = RelayConfigSchema.parse(applyConfigDefaults({}));
  return parsed;
}

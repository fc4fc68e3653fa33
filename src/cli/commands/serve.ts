import fs from "node:fs";
import { defaultConfig, loadConfig, resolveConfigPath, type RelayConfig } from "../../config";
import { logger } from "../../logger";
import { RelayHost } from "../../server";
import { APP_NAME, APP_VERSION } from "../../version";

/**
 * Loads config for `serve`. A missing file at the default location falls back
 * to built-in defaults; an explicit path must exist.
 */
export function loadServeConfig(configPath?: string): RelayConfig | null {
  const resolvedPath = resolveConfigPath(configPath);
  if (!configPath && !fs.existsSync(resolvedPath)) {
    logger.warn({ path: resolvedPath }, "No config file found; using defaults");
    return defaultConfig();
  }
  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    logger.error({ errors: result.errors, path: result.path }, "Failed to load configuration");
    return null;
  }
  logger.info({ path: result.path }, "Loaded configuration");
  return result.config;
}

export async function runServe(configPath?: string): Promise<void> {
  const config = loadServeConfig(configPath);
  if (!config) {
    process.exit(1);
  }

  logger.info(`${APP_NAME} v${APP_VERSION}`);
  const host = new RelayHost(config);

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down...`);
    try {
      await host.stop();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  await host.start();
  logger.info("Relay is running. Press Ctrl+C to stop.");
}

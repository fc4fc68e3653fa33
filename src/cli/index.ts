#!/usr/bin/env node
import { Command } from "commander";
import { APP_NAME, APP_VERSION } from "../version";

const program = new Command()
  .name(APP_NAME)
  .description("Envelope relay for AI agent backends")
  .version(APP_VERSION);

program
  .command("serve")
  .description("Start the relay server")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { runServe } = await import("./commands/serve");
    await runServe(options.config);
  });

program
  .command("send <agent> <action>")
  .description("Send one envelope to a running relay and print the reply")
  .option("-p, --payload <json>", "Payload as JSON", "{}")
  .option("-u, --url <url>", "Relay base URL")
  .option("-t, --token <token>", "Bearer token")
  .option("--timeout <ms>", "Request timeout in milliseconds")
  .action(
    async (
      agent: string,
      action: string,
      options: { payload?: string; url?: string; token?: string; timeout?: string },
    ) => {
      const { runSend } = await import("./commands/send");
      await runSend(agent, action, options);
    },
  );

const configCmd = program.command("config").description("Inspect configuration");

configCmd
  .command("validate")
  .description("Validate the config file")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { validateConfig } = await import("./commands/config");
    await validateConfig(options.config);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

import { loadConfig } from "../../config";

export async function validateConfig(configPath?: string) {
  const result = loadConfig(configPath);
  if (result.success) {
    console.log(`✅ Config check passed. ${result.path} is valid.`);
    return;
  }
  console.error(`❌ Config check failed. Invalid config file ${result.path}:`);
  for (const error of result.errors ?? []) {
    console.error(`- ${error}`);
  }
  process.exit(1);
}

/**
 * Config command - Show configuration file location and resolved settings
 */

import { z } from "zod";
import { ENV_VARIABLES, getUserConfigPath, loadConfig, resolveConfig } from "../../utils";

const ConfigOptionsSchema = z.object({
  config: z.string().optional(),
});

export async function configCommand(opts: unknown): Promise<void> {
  const options = ConfigOptionsSchema.parse(opts);
  const { config, errors } = await loadConfig(options.config);

  console.log("User configuration file location:");
  console.log(getUserConfigPath());

  for (const { path, error } of errors) {
    const message = error instanceof Error ? error.message : String(error);
    console.log(`\nIgnored invalid configuration file ${path}: ${message}`);
  }

  // Environment variables apply on top of the files
  const resolved = resolveConfig(config, {}, process.env);
  console.log("\nResolved configuration:");
  console.log(JSON.stringify(resolved, null, 2));

  console.log("\nEnvironment variables:");
  for (const variable of Object.values(ENV_VARIABLES)) {
    console.log(`  ${variable}`);
  }
}

import chalk from "chalk";
import { z } from "zod";
import { getConfigPath, getConfigValue, loadConfig, setConfigValue } from "../../config/configManager.js";
import { CONFIG_KEYS, isConfigKey, type ConfigKey } from "../../config/schema.js";

/**
 * Shows all current configuration values.
 */
export function configShowCommand(): void {
  const config = loadConfig();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${getConfigPath()}\n`));

  for (const [key, value] of Object.entries(config)) {
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(String(value))}`);
  }
  console.log();
}

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    console.log(chalk.red(`\n❌ Unknown config key: ${key}`));
    console.log(chalk.gray(`   Valid keys: ${CONFIG_KEYS.join(", ")}\n`));
    process.exit(1);
  }
  return key;
}

/**
 * Sets a configuration value. Numbers are converted before validation.
 */
export function configSetCommand(key: string, value: string): void {
  const configKey = requireKey(key);

  try {
    const updated = setConfigValue(configKey, value);
    console.log(chalk.green(`\n✅ Set ${configKey} = ${String(updated[configKey])}\n`));
  } catch (error) {
    if (!(error instanceof z.ZodError)) throw error;
    console.log(chalk.red(`\n❌ Invalid value for ${configKey}: ${value}`));
    console.log(chalk.gray(`   ${z.prettifyError(error)}\n`));
    process.exit(1);
  }
}

/**
 * Gets a specific configuration value.
 */
export function configGetCommand(key: string): void {
  console.log(String(getConfigValue(requireKey(key))));
}

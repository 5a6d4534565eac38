import chalk from "chalk";
import { loadConfig } from "../../config/configManager.js";
import { loadEnvFile, resolveServerSettings } from "../../config/env.js";
import { createApiServer } from "../../server/server.js";
import { createShutdownManager } from "../../shared/shutdown.js";
import { createOrchestrator } from "../runtime.js";

export interface ServeOptions {
  host?: string | undefined;
  port?: number | undefined;
}

/**
 * Starts the HTTP API with server-sent progress events.
 */
export async function serveCommand(options: ServeOptions): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const settings = resolveServerSettings(config);
  const host = options.host ?? settings.host;
  const port = options.port ?? settings.port;

  const server = await createApiServer({
    defaultMaxVideos: config.maxVideos,
    createOrchestrator: (logger) => createOrchestrator(config, { outputDir: settings.outputDir, logger }),
  });

  const shutdown = createShutdownManager();
  shutdown.setup();
  shutdown.registerCleanup(() => server.close());

  await server.listen({ host, port });
  console.log(chalk.green(`\n🌐 Listening on http://${host}:${port}`));
  console.log(chalk.gray(`   Downloads go to ${settings.outputDir}\n`));
}

/**
 * Graceful shutdown management for CLI commands.
 * First Ctrl+C cancels running downloads and waits for them; the second one exits at once.
 */
import chalk from "chalk";

type Cleanup = () => void | Promise<void>;

/**
 * Shutdown manager instance returned by createShutdownManager.
 */
export interface ShutdownManager {
  /** Set up SIGINT and SIGTERM handlers. Call once at command start. */
  setup: () => void;
  /** Register a cleanup callback, run in registration order. */
  registerCleanup: (fn: Cleanup) => void;
}

export interface ShutdownOptions {
  /** Registers a signal handler. Defaults to process.on. */
  onSignal?: ((signal: NodeJS.Signals, handler: () => void) => void) | undefined;
  /** Ends the process. Defaults to process.exit. */
  exit?: ((code: number) => void) | undefined;
}

/**
 * Creates a shutdown manager for graceful CLI termination.
 *
 * @example
 * ```typescript
 * const shutdown = createShutdownManager();
 * shutdown.setup();
 * shutdown.registerCleanup(() => orchestrator.shutdown());
 * ```
 */
export function createShutdownManager(options: ShutdownOptions = {}): ShutdownManager {
  const onSignal =
    options.onSignal ??
    ((signal: NodeJS.Signals, handler: () => void) => {
      process.on(signal, handler);
    });
  const exit = options.exit ?? ((code: number) => process.exit(code));

  let shuttingDown = false;
  const cleanups: Cleanup[] = [];

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      // Force exit on second signal
      console.log(chalk.red("\n\n⚠️  Force exit"));
      exit(1);
      return;
    }

    shuttingDown = true;
    console.log(chalk.yellow(`\n\n⏹️  ${signal} received, cancelling downloads...`));

    let failed = false;
    for (const cleanup of cleanups) {
      try {
        await cleanup();
      } catch (error) {
        failed = true;
        console.log(chalk.gray(`   Cleanup failed: ${error instanceof Error ? error.message : String(error)}`));
      }
    }
    if (!failed) {
      console.log(chalk.gray("   Cleanup complete."));
    }

    exit(failed ? 1 : 130);
  };

  return {
    setup: () => {
      onSignal("SIGINT", () => void shutdown("SIGINT"));
      onSignal("SIGTERM", () => void shutdown("SIGTERM"));
    },

    registerCleanup: (fn: Cleanup) => {
      cleanups.push(fn);
    },
  };
}

import { ConfigError, loadEnvFiles } from "./config";
import { logger } from "./logger";
import { createRuntime } from "./runtime";
import type { Runtime } from "./runtime";

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

const boot = (): Runtime | null => {
  loadEnvFiles();
  try {
    return createRuntime(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("❌ Configuration is invalid, refusing to start", { issues: error.issues });
      return null;
    }
    throw error;
  }
};

const runtime = boot();

if (runtime === null) {
  process.exit(1);
} else {
  const { scheduler } = runtime;
  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      logger.info("👋 Shutdown signal received", { signal });
      void scheduler.stop().then(() => process.exit(0));
    });
  }
  // SIGUSR1 is taken by the Node inspector.
  process.on("SIGUSR2", () => {
    void scheduler.trigger();
  });
  scheduler.start();
}

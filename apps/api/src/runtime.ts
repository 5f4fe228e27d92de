import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { logger, setLogLevel } from "./logger";
import { PorkbunClient } from "./porkbun/client";
import { createScheduler } from "./scheduler";
import type { Scheduler } from "./scheduler";
import { performUpdate } from "./update";
import { resolvePublicIPv4 } from "./update/ip-resolver";
import { createReconciler } from "./update/reconcile";
import type { Reconciler } from "./update/reconcile";
import { buildTargets } from "./update/targets";
import type { Target } from "./update/targets";

export type Runtime = {
  readonly config: AppConfig;
  readonly targets: readonly Target[];
  readonly client: PorkbunClient;
  readonly reconciler: Reconciler;
  readonly scheduler: Scheduler;
};

/**
 * Builds the whole service from the environment without touching the network.
 * Throws `ConfigError` when the environment is incomplete.
 */
export const createRuntime = (env: NodeJS.ProcessEnv = process.env): Runtime => {
  const config = loadConfig(env);
  setLogLevel(config.logLevel);

  const targets = buildTargets(config.domain, config.subdomains);
  const client = new PorkbunClient(config.credentials, {
    baseUrl: config.apiBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    ttl: config.recordTtl
  });
  const reconciler = createReconciler(client);
  const scheduler = createScheduler(
    () =>
      performUpdate({
        resolveAddress: () => resolvePublicIPv4({ url: config.ipEchoUrl, timeoutMs: config.requestTimeoutMs }),
        reconciler,
        targets
      }),
    { intervalSeconds: config.checkIntervalSeconds }
  );

  logger.info("🛰️ DDNS worker configured", {
    domain: config.domain,
    hosts: targets.map((target) => target.host),
    checkIntervalSeconds: config.checkIntervalSeconds,
    recordTtl: config.recordTtl
  });

  return { config, targets, client, reconciler, scheduler };
};

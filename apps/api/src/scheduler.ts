import { MAX_CHECK_INTERVAL_SECONDS } from "./config";
import { logger } from "./logger";
import { PorkbunApiError } from "./porkbun/client";
import type { UpdateSummary } from "./update";
import { IpResolveError } from "./update/ip-resolver";

export type SchedulerError = {
  readonly timestamp: string;
  readonly message: string;
  readonly stack?: string;
  readonly kind?: string;
};

export type SchedulerState = "idle" | "running" | "stopped";

export type SchedulerSnapshot = {
  readonly state: SchedulerState;
  readonly cycles: number;
  readonly nextRunAt?: string;
  readonly lastSuccess?: UpdateSummary;
  readonly lastError?: SchedulerError;
};

export type Scheduler = {
  readonly start: () => void;
  readonly stop: () => Promise<void>;
  readonly trigger: () => Promise<UpdateSummary | null>;
  readonly snapshot: () => SchedulerSnapshot;
};

export type SchedulerOptions = {
  readonly intervalSeconds: number;
};

const describeFailure = (error: unknown): SchedulerError => {
  const base = {
    timestamp: new Date().toISOString(),
    message: error instanceof Error ? error.message : "Unknown error",
    stack: error instanceof Error ? error.stack : undefined
  };
  if (error instanceof IpResolveError || error instanceof PorkbunApiError) {
    return { ...base, kind: error.kind };
  }
  return base;
};

/**
 * Runs a cycle immediately on start, then again `intervalSeconds` after each
 * cycle settles. Cycles never overlap, and a failed cycle only waits for the
 * next tick.
 */
export const createScheduler = (runCycle: () => Promise<UpdateSummary>, options: SchedulerOptions): Scheduler => {
  if (
    !Number.isInteger(options.intervalSeconds) ||
    options.intervalSeconds < 1 ||
    options.intervalSeconds > MAX_CHECK_INTERVAL_SECONDS
  ) {
    throw new RangeError(
      `Scheduler interval must be an integer between 1 and ${MAX_CHECK_INTERVAL_SECONDS} seconds, got ${options.intervalSeconds}`
    );
  }
  const intervalMs = options.intervalSeconds * 1000;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let inFlight: Promise<void> | null = null;
  let started = false;
  let stopped = false;
  let cycles = 0;
  let nextRunAt: string | undefined;
  let lastSuccess: UpdateSummary | undefined;
  let lastError: SchedulerError | undefined;

  const arm = (): void => {
    if (!started || stopped || timer !== null) {
      return;
    }
    nextRunAt = new Date(Date.now() + intervalMs).toISOString();
    logger.info("😴 Next check scheduled", { inSeconds: options.intervalSeconds, at: nextRunAt });
    timer = setTimeout(() => {
      timer = null;
      void execute();
    }, intervalMs);
  };

  const runOnce = async (): Promise<void> => {
    logger.info("⏱️ Executing scheduled update");
    try {
      lastSuccess = await runCycle();
      lastError = undefined;
    } catch (error) {
      const failure = describeFailure(error);
      lastError = failure;
      logger.error("💥 Scheduled update failed", {
        error: failure.message,
        failedAt: failure.timestamp,
        kind: failure.kind,
        stack: failure.stack
      });
    } finally {
      cycles += 1;
    }
  };

  const execute = (): Promise<void> => {
    if (inFlight !== null) {
      logger.warn("⏳ Update skipped because a previous execution is still running");
      return inFlight;
    }
    nextRunAt = undefined;
    const run = runOnce().finally(() => {
      inFlight = null;
      arm();
    });
    inFlight = run;
    return run;
  };

  const start = (): void => {
    if (started || stopped) {
      return;
    }
    started = true;
    logger.info("🕒 Scheduler started", {
      intervalSeconds: options.intervalSeconds
    });
    void execute();
  };

  const stop = async (): Promise<void> => {
    stopped = true;
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
    nextRunAt = undefined;
    if (inFlight !== null) {
      await inFlight;
    }
    logger.info("🛑 Scheduler stopped", { cycles });
  };

  const trigger = async (): Promise<UpdateSummary | null> => {
    if (stopped) {
      return null;
    }
    logger.info("⚡ Manual update trigger received");
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
    await execute();
    return lastSuccess ?? null;
  };

  const snapshot = (): SchedulerSnapshot => {
    let state: SchedulerState = "idle";
    if (inFlight !== null) {
      state = "running";
    } else if (stopped) {
      state = "stopped";
    }
    return {
      state,
      cycles,
      nextRunAt,
      lastSuccess,
      lastError
    };
  };

  return {
    start,
    stop,
    trigger,
    snapshot
  };
};

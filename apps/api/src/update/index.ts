import { logger } from "../logger";
import type { RecordChange, RecordChangeKind, Reconciler } from "./reconcile";
import type { Target } from "./targets";

export type UpdateSummary = {
  readonly timestamp: string;
  readonly durationMs: number;
  readonly address: string;
  readonly targetCount: number;
  readonly changes: readonly RecordChange[];
  readonly totals: Record<RecordChangeKind, number>;
};

export type UpdateContext = {
  readonly resolveAddress: () => Promise<string>;
  readonly reconciler: Reconciler;
  readonly targets: readonly Target[];
};

export const summarizeChangeKinds = (entries: readonly RecordChange[]): Record<RecordChangeKind, number> => {
  const counts: Record<RecordChangeKind, number> = {
    updated: 0,
    unchanged: 0,
    missing: 0,
    failed: 0
  };
  for (const entry of entries) {
    counts[entry.kind] += 1;
  }
  return counts;
};

/**
 * One cycle: resolve the public address once, then reconcile every target.
 * A resolver failure rejects the whole cycle; target failures only show up in
 * the returned changes.
 */
export const performUpdate = async (context: UpdateContext): Promise<UpdateSummary> => {
  const startedAt = Date.now();
  logger.info("🚀 DNS update started", { targets: context.targets.length });
  const address = await context.resolveAddress();
  logger.info("🌐 Public IP resolved", { ipv4: address });

  const changes = await context.reconciler.reconcile(context.targets, address);

  const finishedAt = Date.now();
  const summary: UpdateSummary = {
    timestamp: new Date(startedAt).toISOString(),
    durationMs: finishedAt - startedAt,
    address,
    targetCount: context.targets.length,
    changes,
    totals: summarizeChangeKinds(changes)
  };
  logger.info("🏁 DNS update finished", {
    durationMs: summary.durationMs,
    targetCount: summary.targetCount,
    ...summary.totals
  });
  return summary;
};

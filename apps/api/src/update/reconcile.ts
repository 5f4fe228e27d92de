import { logger } from "../logger";
import { PorkbunApiError } from "../porkbun/client";
import type { PorkbunApiErrorKind, PorkbunClient, RemoteRecord } from "../porkbun/client";
import type { Target } from "./targets";

export type RecordClient = Pick<PorkbunClient, "fetchRecord" | "updateRecord">;

export type FailureKind = PorkbunApiErrorKind | "unexpected";

export type RecordChange =
  | {
      readonly kind: "updated";
      readonly host: string;
      readonly previous: string;
      readonly current: string;
    }
  | {
      readonly kind: "unchanged";
      readonly host: string;
      readonly current: string;
    }
  | {
      readonly kind: "missing";
      readonly host: string;
    }
  | {
      readonly kind: "failed";
      readonly host: string;
      readonly stage: "fetch" | "update";
      readonly errorKind: FailureKind;
      readonly reason: string;
      readonly status?: number;
    };

export type RecordChangeKind = RecordChange["kind"];

type FailedChange = Extract<RecordChange, { kind: "failed" }>;

export type Reconciler = {
  readonly reconcile: (targets: readonly Target[], address: string) => Promise<readonly RecordChange[]>;
  readonly reconcileTarget: (target: Target, address: string) => Promise<RecordChange>;
  readonly lastApplied: () => ReadonlyMap<string, string>;
};

const assertNever = (value: never): never => {
  throw new Error(`Unhandled failure kind: ${String(value)}`);
};

const toFailure = (host: string, stage: FailedChange["stage"], error: unknown): FailedChange => {
  if (error instanceof PorkbunApiError) {
    return { kind: "failed", host, stage, errorKind: error.kind, reason: error.message, status: error.status };
  }
  return {
    kind: "failed",
    host,
    stage,
    errorKind: "unexpected",
    reason: error instanceof Error ? error.message : "Unknown error"
  };
};

const logFailure = (change: FailedChange): void => {
  const fields = {
    host: change.host,
    stage: change.stage,
    reason: change.reason,
    status: change.status
  };
  switch (change.errorKind) {
    case "unauthorized":
      logger.error("🔐 Porkbun rejected the API credentials", {
        ...fields,
        hint: "Check PORKBUN_API_KEY and PORKBUN_SECRET_API_KEY, and that API access is enabled for the domain"
      });
      return;
    case "rateLimited":
      logger.warn("🐢 Porkbun rate limit reached, retrying next cycle", fields);
      return;
    case "transient":
      logger.error("⚠️ Porkbun request failed, retrying next cycle", fields);
      return;
    case "unexpected":
      logger.error("💥 Unexpected error while reconciling record", fields);
      return;
    default:
      assertNever(change.errorKind);
  }
};

/**
 * Keeps the A record of every target pointed at the observed address.
 *
 * The provider's record is always fetched and compared; the last-applied map
 * only tracks what this instance wrote or confirmed, so out-of-band edits are
 * still corrected on the next cycle.
 */
export const createReconciler = (
  client: RecordClient,
  initialState: ReadonlyMap<string, string> = new Map()
): Reconciler => {
  const applied = new Map<string, string>(initialState);

  const reconcileTarget = async (target: Target, address: string): Promise<RecordChange> => {
    const { host } = target;
    let remote: RemoteRecord;
    try {
      remote = await client.fetchRecord(target);
    } catch (error) {
      const failure = toFailure(host, "fetch", error);
      logFailure(failure);
      return failure;
    }

    if (!remote.exists) {
      logger.warn("🚫 No existing A record, skipping (create it manually in Porkbun)", { host });
      return { kind: "missing", host };
    }

    if (remote.content === address) {
      applied.set(host, address);
      logger.info("👌 No change for A record", { host, address });
      return { kind: "unchanged", host, current: address };
    }

    const cached = applied.get(host);
    if (cached !== undefined && cached !== remote.content) {
      logger.warn("✏️ A record was changed outside of this updater", {
        host,
        expected: cached,
        found: remote.content
      });
    }

    try {
      await client.updateRecord(target, address);
    } catch (error) {
      const failure = toFailure(host, "update", error);
      logFailure(failure);
      return failure;
    }
    applied.set(host, address);
    logger.info("🔁 A record updated", { host, previous: remote.content, current: address });
    return { kind: "updated", host, previous: remote.content, current: address };
  };

  const reconcile = async (targets: readonly Target[], address: string): Promise<readonly RecordChange[]> => {
    const changes: RecordChange[] = [];
    for (const target of targets) {
      changes.push(await reconcileTarget(target, address));
    }
    return changes;
  };

  return {
    reconcile,
    reconcileTarget,
    lastApplied: () => new Map(applied)
  };
};

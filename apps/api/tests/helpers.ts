import { vi } from "vitest";
import { z } from "zod";
import { PorkbunApiError } from "../src/porkbun/client";
import type { RemoteRecord } from "../src/porkbun/client";
import type { UpdateSummary } from "../src/update";
import type { RecordClient } from "../src/update/reconcile";
import type { Target } from "../src/update/targets";

const logLineSchema = z
  .object({
    level: z.string(),
    message: z.string(),
    timestamp: z.string()
  })
  .passthrough();

export type LogLine = z.infer<typeof logLineSchema>;

export const captureLogs = () => {
  const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const lines = (): LogLine[] => spy.mock.calls.map(([text]) => logLineSchema.parse(JSON.parse(String(text))));
  return {
    lines,
    find: (message: string): LogLine | undefined => lines().find((line) => line.message === message)
  };
};

export const stubFetch = () => {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
};

export const jsonResponse = (body: unknown, status: number = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });

export const textResponse = (body: string, status: number = 200): Response =>
  new Response(body, { status, headers: { "Content-Type": "text/plain" } });

export const requestAt = (fetchMock: ReturnType<typeof stubFetch>, index: number) => {
  const call = fetchMock.mock.calls[index];
  if (call === undefined) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [input, init] = call;
  const rawBody = init?.body;
  const body: unknown = typeof rawBody === "string" ? JSON.parse(rawBody) : undefined;
  return {
    url: String(input),
    method: init?.method,
    signal: init?.signal,
    body
  };
};

export const captureError = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected promise to reject");
};

export const makeTarget = (subdomain: string, domain: string = "example.com"): Target => ({
  domain,
  subdomain,
  host: subdomain.length === 0 ? domain : `${subdomain}.${domain}`
});

/**
 * In-memory Porkbun account: hosts without an entry have no A record.
 */
export class FakeRecordClient implements RecordClient {
  public readonly records = new Map<string, string>();

  public readonly fetchFailures = new Map<string, Error>();

  public readonly updateFailures = new Map<string, Error>();

  public readonly fetchCalls: string[] = [];

  public readonly updateCalls: { readonly host: string; readonly address: string }[] = [];

  public async fetchRecord(target: Target): Promise<RemoteRecord> {
    this.fetchCalls.push(target.host);
    const failure = this.fetchFailures.get(target.host);
    if (failure !== undefined) {
      throw failure;
    }
    const content = this.records.get(target.host);
    if (content === undefined) {
      return { exists: false };
    }
    return { exists: true, id: `id-${target.host}`, content, ttl: 600 };
  }

  public async updateRecord(target: Target, address: string): Promise<void> {
    this.updateCalls.push({ host: target.host, address });
    const failure = this.updateFailures.get(target.host);
    if (failure !== undefined) {
      throw failure;
    }
    this.records.set(target.host, address);
  }
}

export const apiError = (kind: PorkbunApiError["kind"], message: string, status?: number): PorkbunApiError =>
  new PorkbunApiError(kind, message, status);

export const makeSummary = (overrides: Partial<UpdateSummary> = {}): UpdateSummary => ({
  timestamp: "2026-01-01T00:00:00.000Z",
  durationMs: 5,
  address: "5.6.7.8",
  targetCount: 1,
  changes: [],
  totals: { updated: 0, unchanged: 0, missing: 0, failed: 0 },
  ...overrides
});

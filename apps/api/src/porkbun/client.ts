import { z } from "zod";
import { DEFAULT_API_BASE_URL, DEFAULT_REQUEST_TIMEOUT_MS, MIN_RECORD_TTL } from "../config";
import type { Credentials } from "../config";
import { logger } from "../logger";
import type { Target } from "../update/targets";

const envelopeSchema = z.object({
  status: z.string(),
  message: z.string().optional()
});

const dnsRecordSchema = z.object({
  id: z.coerce.string(),
  name: z.string(),
  type: z.string(),
  content: z.string(),
  ttl: z.coerce.number()
});

const retrieveResponseSchema = envelopeSchema.extend({
  records: z.array(dnsRecordSchema).optional()
});

type Envelope = z.infer<typeof envelopeSchema>;

type RawResponse = {
  readonly status: number;
  readonly ok: boolean;
  readonly rawBody: string;
};

export type RemoteRecord =
  | { readonly exists: false }
  | {
      readonly exists: true;
      readonly id: string;
      readonly content: string;
      readonly ttl: number;
    };

export type PorkbunApiErrorKind = "unauthorized" | "rateLimited" | "transient";

export class PorkbunApiError extends Error {
  public readonly kind: PorkbunApiErrorKind;

  public readonly status?: number;

  public readonly body?: string;

  constructor(
    kind: PorkbunApiErrorKind,
    message: string,
    status?: number,
    body?: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.name = "PorkbunApiError";
    this.kind = kind;
    this.status = status;
    this.body = body;
  }
}

// "All API requests require an API key and secret API key.", "Domain is not opted in to API access."
const UNAUTHORIZED_PATTERN = /api key|api access|not opted in|unauthori[sz]ed|forbidden/i;
// "You have exceeded the rate limit."
const RATE_LIMIT_PATTERN = /rate limit|too many requests/i;
const MAX_STORED_BODY = 1024;

export const classifyFailure = (status: number | undefined, message: string): PorkbunApiErrorKind => {
  if (status === 401 || status === 403) {
    return "unauthorized";
  }
  if (status === 429 || RATE_LIMIT_PATTERN.test(message)) {
    return "rateLimited";
  }
  if (UNAUTHORIZED_PATTERN.test(message)) {
    return "unauthorized";
  }
  return "transient";
};

type RecordAction = "retrieveByNameType" | "editByNameType";

const recordPath = (action: RecordAction, target: Target): string => {
  const segments = ["dns", action, target.domain, "A"];
  if (target.subdomain.length > 0) {
    segments.push(target.subdomain);
  }
  return `/${segments.map((segment) => encodeURIComponent(segment)).join("/")}`;
};

const parseJson = (rawBody: string): unknown => {
  if (rawBody.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(rawBody);
  } catch {
    return undefined;
  }
};

export type PorkbunClientOptions = {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly ttl?: number;
};

/**
 * Porkbun JSON API v3, restricted to the A records of a single host.
 *
 * Records are only ever read and edited in place; this client has no way to
 * create one.
 */
export class PorkbunClient {
  private readonly credentials: Credentials;

  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly ttl: number;

  constructor(credentials: Credentials, options: PorkbunClientOptions = {}) {
    this.credentials = credentials;
    this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.ttl = options.ttl ?? MIN_RECORD_TTL;
  }

  public async fetchRecord(target: Target): Promise<RemoteRecord> {
    const response = await this.request(recordPath("retrieveByNameType", target), {}, retrieveResponseSchema);
    const matches = (response.records ?? []).filter(
      (record) => record.type === "A" && record.name.toLowerCase() === target.host
    );
    const [primary] = matches;
    if (primary === undefined) {
      return { exists: false };
    }
    if (matches.length > 1) {
      logger.debug("📚 Multiple A records found, comparing the first", {
        host: target.host,
        count: matches.length
      });
    }
    return {
      exists: true,
      id: primary.id,
      content: primary.content,
      ttl: primary.ttl
    };
  }

  public async updateRecord(target: Target, address: string): Promise<void> {
    await this.request(
      recordPath("editByNameType", target),
      {
        content: address,
        ttl: this.ttl.toString()
      },
      envelopeSchema
    );
  }

  private async send(path: string, body: Record<string, string>): Promise<RawResponse> {
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          apikey: this.credentials.apiKey,
          secretapikey: this.credentials.secretApiKey,
          ...body
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      return {
        status: response.status,
        ok: response.ok,
        rawBody: await response.text()
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : "unknown error";
      throw new PorkbunApiError("transient", `Porkbun API request to ${path} failed: ${reason}`, undefined, undefined, {
        cause: error
      });
    }
  }

  private async request<T extends Envelope>(
    path: string,
    body: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const { status, ok, rawBody } = await this.send(path, body);
    const storedBody = rawBody.slice(0, MAX_STORED_BODY);
    const payload = parseJson(rawBody);
    const envelope = envelopeSchema.safeParse(payload);

    if (!ok || !envelope.success || envelope.data.status !== "SUCCESS") {
      let message: string;
      if (envelope.success) {
        message = envelope.data.message ?? `status ${envelope.data.status}`;
      } else if (ok) {
        message = "malformed response body";
      } else {
        message = `HTTP status ${status}`;
      }
      throw new PorkbunApiError(classifyFailure(status, message), `Porkbun API error: ${message}`, status, storedBody);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new PorkbunApiError("transient", "Porkbun API error: unexpected response shape", status, storedBody);
    }
    return parsed.data;
  }
}

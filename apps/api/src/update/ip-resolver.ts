import { isIPv4 } from "node:net";
import { z } from "zod";

export type IpResolveErrorKind = "unreachable" | "invalidFormat";

export class IpResolveError extends Error {
  public readonly kind: IpResolveErrorKind;

  public readonly url: string;

  constructor(kind: IpResolveErrorKind, url: string, message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "IpResolveError";
    this.kind = kind;
    this.url = url;
  }
}

export type IpResolverOptions = {
  readonly url: string;
  readonly timeoutMs: number;
};

const ipv4Schema = z.string().superRefine((value, ctx) => {
  if (!isIPv4(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Invalid IPv4 response"
    });
  }
});

const jsonBodySchema = z.object({ ip: z.string() });

const fetchText = async (url: string, timeoutMs: number): Promise<string> => {
  let response: Response;
  try {
    response = await fetch(url, { method: "GET", signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unknown error";
    throw new IpResolveError("unreachable", url, `Failed to reach ${url}: ${reason}`, { cause: error });
  }
  if (!response.ok) {
    throw new IpResolveError("unreachable", url, `Failed to fetch IP from ${url}: status ${response.status}`);
  }
  try {
    return await response.text();
  } catch (error) {
    throw new IpResolveError("unreachable", url, `Failed to read IP response from ${url}`, { cause: error });
  }
};

// Echo services answer either with the bare address or with {"ip": "..."}.
const extractAddress = (body: string): string => {
  const text = body.trim();
  if (!text.startsWith("{")) {
    return text;
  }
  try {
    const parsed = jsonBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.ip.trim() : text;
  } catch {
    return text;
  }
};

export const resolvePublicIPv4 = async (options: IpResolverOptions): Promise<string> => {
  const body = await fetchText(options.url, options.timeoutMs);
  const address = extractAddress(body);
  const result = ipv4Schema.safeParse(address);
  if (!result.success) {
    throw new IpResolveError(
      "invalidFormat",
      options.url,
      `IP echo service returned a malformed address: ${JSON.stringify(address.slice(0, 64))}`
    );
  }
  return result.data;
};

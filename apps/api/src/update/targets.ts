import { logger } from "../logger";

export type Target = {
  readonly domain: string;
  readonly subdomain: string;
  readonly host: string;
};

const normalizeLabel = (value: string): string => value.trim().toLowerCase();

export const toHost = (domain: string, subdomain: string): string =>
  subdomain.length === 0 ? domain : `${subdomain}.${domain}`;

export const buildTargets = (domain: string, subdomains: readonly string[]): readonly Target[] => {
  const canonicalDomain = normalizeLabel(domain);
  if (canonicalDomain.length === 0) {
    throw new Error("A base domain is required to build targets");
  }
  const entries = subdomains.length === 0 ? [""] : subdomains;
  const byHost = new Map<string, Target>();
  for (const entry of entries) {
    const subdomain = normalizeLabel(entry);
    const host = toHost(canonicalDomain, subdomain);
    if (byHost.has(host)) {
      logger.debug("🪞 Duplicate target ignored", { host });
      continue;
    }
    byHost.set(host, Object.freeze({ domain: canonicalDomain, subdomain, host }));
  }
  return Object.freeze(Array.from(byHost.values()));
};

import type { NextFunction, Request, RequestHandler, Response } from "express";

const ALLOWED_METHODS = "GET,POST,DELETE,OPTIONS";
const ALLOWED_HEADERS = "Content-Type,Authorization";
const PREFLIGHT_MAX_AGE_SECONDS = 600;

type OriginRule =
  | Readonly<{ kind: "any" }>
  | Readonly<{ kind: "origin"; origin: string }>
  | Readonly<{ kind: "subdomains"; protocol: string; domain: string }>;

export type OriginPolicy = Readonly<{
  /** Entries from the configured list that are neither `*`, an origin, nor `scheme://*.domain`. */
  rejected: ReadonlyArray<string>;
  allows(origin: string): boolean;
}>;

const WILDCARD_ENTRY = /^([a-z][a-z0-9+.-]*:)\/\/\*\.(.+)$/i;

function toUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

function parseRule(entry: string): OriginRule | null {
  if (entry === "*") return { kind: "any" };

  const wildcard = WILDCARD_ENTRY.exec(entry);
  if (wildcard) {
    const url = toUrl(`${wildcard[1]}//${wildcard[2]}`);
    return url ? { kind: "subdomains", protocol: url.protocol, domain: url.hostname } : null;
  }

  const url = toUrl(entry);
  // Opaque origins serialize as "null" and can never be matched.
  return url && url.origin !== "null" ? { kind: "origin", origin: url.origin } : null;
}

function matches(rule: OriginRule, url: URL): boolean {
  switch (rule.kind) {
    case "any":
      return true;
    case "origin":
      return url.origin === rule.origin;
    case "subdomains":
      // The bare domain is not a subdomain of itself.
      return url.protocol === rule.protocol && url.hostname.endsWith(`.${rule.domain}`);
  }
}

/** Builds a policy from a comma-separated CORS_ALLOWED_ORIGINS value. */
export function createOriginPolicy(raw: string): OriginPolicy {
  const rules: OriginRule[] = [];
  const rejected: string[] = [];
  for (const entry of raw.split(",").map((v) => v.trim())) {
    if (entry === "") continue;
    const rule = parseRule(entry);
    if (rule) {
      rules.push(rule);
    } else {
      rejected.push(entry);
    }
  }

  return {
    rejected,
    allows(origin: string): boolean {
      const url = toUrl(origin);
      return url !== null && rules.some((rule) => matches(rule, url));
    }
  };
}

export function corsMiddleware(policy: OriginPolicy): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    res.vary("Origin");
    const origin = req.headers.origin?.trim() ?? "";
    const allowed = origin !== "" && policy.allows(origin);
    if (allowed) {
      res.setHeader("Access-Control-Allow-Origin", origin);
    }
    if (req.method !== "OPTIONS") {
      next();
      return;
    }
    if (allowed) {
      res.setHeader("Access-Control-Allow-Methods", ALLOWED_METHODS);
      res.setHeader("Access-Control-Allow-Headers", ALLOWED_HEADERS);
      res.setHeader("Access-Control-Max-Age", String(PREFLIGHT_MAX_AGE_SECONDS));
    }
    res.status(204).end();
  };
}

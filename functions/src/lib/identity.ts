import { createHash } from "node:crypto";

export type IdentityRule = {
  /** Shape of the platform-native reference code (matched upper-cased). */
  referencePattern: RegExp;
};

// CIG: 10 alphanumeric characters
export const DEFAULT_IDENTITY_RULE: IdentityRule = {
  referencePattern: /^[A-Z0-9]{10}$/,
};

export type IdentityInput = {
  url: string | null;
  referenceCode: string | null;
  bandoNumber: string | null;
};

export type IdentitySource = "reference" | "bando" | "url";

export class IdentityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IdentityError";
  }
}

const NOISE_PARAMS = [
  /^jsessionid$/,
  /^phpsessid$/,
  /^sessionid$/,
  /^sid$/,
  /^utm_/,
  /^fbclid$/,
  /^gclid$/,
  /^_$/,
  /^_ts$/,
  /^timestamp$/,
  /^cachebuster$/,
];

/**
 * Lower-cased URL without fragment, session tokens or tracking parameters,
 * remaining query parameters sorted, no trailing slash.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  let u: URL;
  try {
    u = new URL(trimmed);
  } catch {
    return trimmed.toLowerCase().replace(/\/+$/, "");
  }
  u.hash = "";
  u.pathname = u.pathname.replace(/;jsessionid=[^/;]*/gi, "");
  const kept = [...u.searchParams.entries()]
    .filter(([k]) => !NOISE_PARAMS.some((re) => re.test(k.toLowerCase())))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));
  const query = new URLSearchParams(kept).toString();
  const path = u.pathname.replace(/\/+$/, "");
  return `${u.protocol}//${u.host}${path}${query ? `?${query}` : ""}`.toLowerCase();
}

export function hashUrl(url: string): string {
  return createHash("sha256").update(normalizeUrl(url)).digest("hex").slice(0, 20);
}

function platformNamespace(platform: string) {
  return platform.trim().toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

/**
 * Stable key for a scraped tender: the platform's reference code when it is
 * well formed, then the platform-scoped bando number, then a hash of the
 * detail URL.
 */
export function resolveIdentity(
  platform: string,
  input: IdentityInput,
  rule: IdentityRule = DEFAULT_IDENTITY_RULE
): { key: string; source: IdentitySource } {
  const ref = input.referenceCode?.trim().toUpperCase();
  if (ref && rule.referencePattern.test(ref)) {
    return { key: `CIG_${ref}`, source: "reference" };
  }

  const bando = input.bandoNumber?.trim();
  if (bando && /^\d+$/.test(bando)) {
    const n = bando.replace(/^0+(?=\d)/, "");
    return { key: `BANDO_${platformNamespace(platform)}_${n}`, source: "bando" };
  }

  const url = input.url?.trim();
  if (url) return { key: `URL_${hashUrl(url)}`, source: "url" };

  throw new IdentityError(
    "no usable identifier: reference code, bando number and url all missing or malformed"
  );
}

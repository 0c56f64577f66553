import { isRecord, JsonRecord } from "./normalize";

const REDACTED = "[REDACTED]";

// Compared after lower-casing and dropping `-`/`_`, so `api_key`, `apiKey` and `X-Api-Key` all match.
// Usage fields such as `totalTokens` or `tokenLimit` are left alone.
const CREDENTIAL_KEYS = new Set([
  "authorization",
  "proxyauthorization",
  "cookie",
  "setcookie",
  "apikey",
  "xapikey",
  "accesskey",
  "secret",
  "clientsecret",
  "password",
  "token",
  "accesstoken",
  "refreshtoken",
  "idtoken",
  "session",
  "sessionid",
]);

const CREDENTIAL_VALUE_PATTERNS = [
  /^Bearer\s+\S+$/i,
  // BigModel keys: `<32 hex>.<secret>`.
  /^[0-9a-f]{32}\.[A-Za-z0-9]{8,}$/,
  /^sk-[A-Za-z0-9_-]{16,}$/,
  // JWT
  /^[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}$/,
];

export function isCredentialKey(key: string): boolean {
  return CREDENTIAL_KEYS.has(key.toLowerCase().replace(/[-_]/g, ""));
}

export function looksLikeCredential(value: string): boolean {
  const trimmed = value.trim();
  return CREDENTIAL_VALUE_PATTERNS.some((pattern) => pattern.test(trimmed));
}

export function redactSecret(value: string): string {
  const bare = value.replace(/^Bearer\s+/i, "");
  const prefix = bare === value ? "" : value.slice(0, value.length - bare.length);
  if (bare.length <= 12) {
    return `${prefix}${REDACTED}`;
  }
  return `${prefix}${bare.slice(0, 4)}...${REDACTED}...${bare.slice(-4)}`;
}

function redactEntry(key: string, value: unknown): unknown {
  if (!isCredentialKey(key)) {
    return redactPayload(value);
  }
  return typeof value === "string" ? redactSecret(value) : REDACTED;
}

/**
 * Copies a provider payload for `--json --raw`, masking values under credential keys
 * and strings shaped like API keys or bearer tokens. Usage numbers and ids pass through.
 */
export function redactPayload(value: unknown): unknown {
  if (typeof value === "string") {
    return looksLikeCredential(value) ? redactSecret(value.trim()) : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactPayload(item));
  }
  if (!isRecord(value)) {
    return value;
  }

  const output: JsonRecord = {};
  for (const [key, entry] of Object.entries(value)) {
    output[key] = redactEntry(key, entry);
  }
  return output;
}

/** Request headers for debug logs; only the credential headers change. */
export function redactHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    output[key] = isCredentialKey(key) ? redactSecret(value) : value;
  }
  return output;
}

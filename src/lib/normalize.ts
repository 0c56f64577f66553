import { UsageStatus } from "../models/usage";

const CRITICAL_REMAINING_PERCENT = 10;
const WARNING_REMAINING_PERCENT = 25;

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function parseOptionalNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      return undefined;
    }
    const parsed = Number(trimmed);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return undefined;
}

export function parseOptionalInteger(value: unknown): number | undefined {
  const parsed = parseOptionalNumber(value);
  return parsed !== undefined && Number.isInteger(parsed) ? parsed : undefined;
}

export function safeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

/**
 * Providers mix `"100"` and `100` for the same field; the model carries both as text.
 */
export function toQuantity(value: unknown, fallback = "0"): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return safeString(value) ?? fallback;
}

const ISO_INSTANT_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[Tt ](\d{2}:\d{2}(?::\d{2})?)(?:\.(\d+))?([Zz]|[+-]\d{2}:?\d{2})$/;

const MAX_ISO_YEAR = 9999;

// Past year 9999 `toISOString()` switches to the expanded `+010000-` form.
function isoInstant(date: Date): string | undefined {
  const year = date.getUTCFullYear();
  if (Number.isNaN(year) || year < 0 || year > MAX_ISO_YEAR) {
    return undefined;
  }
  return date.toISOString();
}

/**
 * Parses `2026-02-06T08:31:59.863136Z` style strings into UTC. The fraction is kept
 * digit for digit; values without an explicit zone are rejected.
 */
export function parseIsoUtc(value: unknown): string | undefined {
  const trimmed = safeString(value);
  const match = trimmed ? ISO_INSTANT_PATTERN.exec(trimmed) : null;
  if (!match) {
    return undefined;
  }

  const [, day, time, fraction, zone] = match;
  const offset = zone.toUpperCase() === "Z" ? "Z" : zone.replace(/^([+-]\d{2}):?(\d{2})$/, "$1:$2");
  const parsedMs = Date.parse(`${day}T${time.length === 5 ? `${time}:00` : time}${offset}`);
  if (Number.isNaN(parsedMs)) {
    return undefined;
  }

  const instant = isoInstant(new Date(parsedMs));
  if (!instant) {
    return undefined;
  }
  return `${instant.slice(0, 19)}.${fraction ?? "000"}Z`;
}

export function parseEpochMillis(value: unknown): string | undefined {
  const parsed = parseOptionalNumber(value);
  if (!parsed) {
    return undefined;
  }

  return isoInstant(new Date(parsed));
}

export function parseOptionalCount(value: unknown): number | undefined {
  const parsed = parseOptionalInteger(value);
  return parsed !== undefined && parsed >= 0 ? parsed : undefined;
}

export function statusFromRemainingPercent(remainingPercent?: number): UsageStatus {
  if (remainingPercent === undefined) {
    return "unknown";
  }

  if (remainingPercent <= CRITICAL_REMAINING_PERCENT) {
    return "critical";
  }

  if (remainingPercent <= WARNING_REMAINING_PERCENT) {
    return "warning";
  }

  return "ok";
}

export function statusFromUsedPercent(usedPercent?: number): UsageStatus {
  return statusFromRemainingPercent(usedPercent === undefined ? undefined : 100 - usedPercent);
}

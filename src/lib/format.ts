import {
  failureMessage,
  isFailedUsage,
  KNOWN_TIME_UNITS,
  LimitDetail,
  TOKENS_LIMIT,
  UsageInfo,
  UsageStatus,
} from "../models/usage";
import { formatDateTime, formatRemainingDaysHours, formatResetTimestamp } from "./date";
import { statusFromUsedPercent } from "./normalize";
import { redactPayload } from "./redact";
import { plainTheme, Theme } from "./theme";

const RULE = "=".repeat(60);
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

const SHORT_PROVIDER_NAMES: Record<string, string> = {
  kimi: "K",
  bigmodel: "B",
  zai: "Z",
};

export const STATUS_LOADING = "⏳";
export const STATUS_NO_DATA = "❌";
export const STATUS_PARTIAL_FAILURE = "⚠️";

export interface TextFormatOptions {
  theme?: Theme;
  /** IANA zone for reset times; defaults to the local zone. */
  timeZone?: string;
  now?: Date;
}

function parseInteger(value: string): bigint | undefined {
  if (!INTEGER_PATTERN.test(value)) {
    return undefined;
  }
  return BigInt(value.trim().replace(/^\+/, ""));
}

function floorDivide(dividend: bigint, divisor: bigint): bigint {
  const quotient = dividend / divisor;
  return dividend % divisor !== 0n && dividend < 0n !== divisor < 0n ? quotient - 1n : quotient;
}

/** Whole-number percentage of `used` over `limit`, floored. Quantities can exceed 2^53. */
export function percentage(used: string, limit: string): number | undefined {
  const usedValue = parseInteger(used);
  const limitValue = parseInteger(limit);
  if (usedValue === undefined || limitValue === undefined || limitValue === 0n) {
    return undefined;
  }
  return Number(floorDivide(usedValue * 100n, limitValue));
}

function isKnownTimeUnit(value: string): boolean {
  return KNOWN_TIME_UNITS.some((unit) => unit === value);
}

export function timeWindowLabel(duration: number, timeUnit: string): string {
  if (timeUnit === TOKENS_LIMIT) {
    return "total";
  }
  if (isKnownTimeUnit(timeUnit)) {
    return `${duration} ${timeUnit}`;
  }
  const unit = timeUnit.replace(/^TIME_UNIT_/, "").toLowerCase();
  return `${duration} ${unit}`;
}

export function limitStatus(limit: LimitDetail): UsageStatus {
  return statusFromUsedPercent(percentage(limit.used, limit.limit));
}

function formatLimitLines(limit: LimitDetail, options: TextFormatOptions, theme: Theme): string[] {
  const lines: string[] = [];
  const window = timeWindowLabel(limit.duration, limit.timeUnit);
  const percent = percentage(limit.used, limit.limit);
  const percentText = percent !== undefined ? ` ${theme.status(limitStatus(limit), `(${percent}%)`)}` : "";

  lines.push(`    - ${window}: ${limit.used}/${limit.limit}${percentText} (remaining: ${limit.remaining})`);

  if (limit.resetTime) {
    const until = formatRemainingDaysHours(limit.resetTime, (options.now ?? new Date()).getTime());
    const reset = formatResetTimestamp(limit.resetTime, options.timeZone);
    lines.push(`      Reset: ${reset}${until ? theme.muted(` (in ${until})`) : ""}`);
  }

  if (limit.usageDetails.length > 0) {
    lines.push("      Usage by model:");
    for (const detail of limit.usageDetails) {
      lines.push(`        • ${detail.modelCode}: ${detail.usage}`);
    }
  }

  return lines;
}

export function formatUsageText(usages: readonly UsageInfo[], options: TextFormatOptions = {}): string {
  const theme = options.theme ?? plainTheme;
  const lines: string[] = [];

  usages.forEach((usage, index) => {
    if (index > 0) {
      lines.push("");
    }
    lines.push(RULE);
    lines.push(theme.heading(`Provider: ${usage.provider}`));
    if (usage.userId) {
      lines.push(`User ID: ${usage.userId}`);
    }
    if (usage.membershipLevel) {
      lines.push(`Membership: ${usage.membershipLevel}`);
    }

    lines.push("");
    const failure = failureMessage(usage);
    if (failure !== undefined) {
      lines.push(theme.error(`  Error: ${failure}`));
    } else if (usage.limits.length > 0) {
      lines.push("  Rate Limits:");
      for (const limit of usage.limits) {
        lines.push(...formatLimitLines(limit, options, theme));
      }
    } else {
      lines.push("  No rate limits available.");
    }
  });

  lines.push("");
  lines.push(RULE);
  return lines.join("\n");
}

export function shortProviderName(provider: string): string {
  return SHORT_PROVIDER_NAMES[provider] ?? provider.slice(0, 1).toUpperCase();
}

export function formatProviderStatus(usage: UsageInfo): string {
  const name = shortProviderName(usage.provider);
  if (usage.limits.length === 0) {
    return `${name}: N/A`;
  }

  const parts = usage.limits.map((limit) => {
    const percent = percentage(limit.used, limit.limit);
    return percent !== undefined ? `${percent}%` : `${limit.used}/${limit.limit}`;
  });
  return `${name}: ${parts.join("/")}`;
}

/** Compact one-line summary, e.g. `K: 65% | B: 42%/92%`. */
export function formatStatusLine(usages: readonly UsageInfo[]): string {
  const parts: string[] = [];
  let hasFailure = false;

  for (const usage of usages) {
    if (usage.limits.length > 0) {
      parts.push(formatProviderStatus(usage));
    } else {
      hasFailure = true;
    }
  }

  if (parts.length === 0) {
    return STATUS_NO_DATA;
  }

  const line = parts.join(" | ");
  return hasFailure ? `${line} ${STATUS_PARTIAL_FAILURE}` : line;
}

/** Text behind the "copy status" action: the full report plus the refresh time. */
export function formatDetailedStatus(
  usages: readonly UsageInfo[],
  lastUpdated: Date | undefined,
  options: TextFormatOptions = {},
): string {
  if (usages.length === 0) {
    return "No usage data available.";
  }

  const report = formatUsageText(usages, options);
  if (!lastUpdated) {
    return report;
  }
  return `${report}\n\nLast updated: ${formatDateTime(lastUpdated, options.timeZone)}`;
}

export interface JsonFormatOptions {
  includeRaw?: boolean;
}

export function formatUsageJson(usages: readonly UsageInfo[], options: JsonFormatOptions = {}): string {
  const report = usages.map((usage) => ({
    provider: usage.provider,
    userId: usage.userId,
    membershipLevel: usage.membershipLevel,
    error: failureMessage(usage),
    limits: usage.limits.map((limit) => ({
      ...limit,
      window: timeWindowLabel(limit.duration, limit.timeUnit),
      percentUsed: percentage(limit.used, limit.limit),
    })),
    rawResponse: options.includeRaw && !isFailedUsage(usage) ? redactPayload(usage.rawResponse) : undefined,
  }));
  return JSON.stringify(report, null, 2);
}

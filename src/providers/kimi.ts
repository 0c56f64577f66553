import { asArray, asRecord, isRecord, JsonRecord, parseIsoUtc, parseOptionalCount, safeString, toQuantity } from "../lib/normalize";
import { createLimitDetail, createUsageInfo, LimitDetail, UsageInfo } from "../models/usage";
import { requireJsonObject, UsageProvider } from "./base";

export const KIMI_USAGE_URL = "https://api.kimi.com/coding/v1/usages";

interface KimiWindowRaw {
  duration?: unknown;
  timeUnit?: unknown;
}

interface KimiDetailRaw {
  limit?: unknown;
  used?: unknown;
  remaining?: unknown;
  resetTime?: unknown;
}

export function mapKimiLimit(entry: JsonRecord): LimitDetail {
  const timeWindow: KimiWindowRaw = asRecord(entry.window);
  const detail: KimiDetailRaw = asRecord(entry.detail);

  return createLimitDetail({
    duration: parseOptionalCount(timeWindow.duration) ?? 0,
    timeUnit: safeString(timeWindow.timeUnit) ?? "",
    limit: toQuantity(detail.limit),
    used: toQuantity(detail.used),
    remaining: toQuantity(detail.remaining),
    resetTime: parseIsoUtc(detail.resetTime),
  });
}

export function mapKimiUsage(raw: JsonRecord, provider = "kimi"): UsageInfo {
  const user = asRecord(raw.user);
  const membership = asRecord(user.membership);

  const limits = asArray(raw.limits)
    .filter(isRecord)
    .map((entry) => mapKimiLimit(entry));

  return createUsageInfo({
    provider,
    userId: safeString(user.userId),
    membershipLevel: safeString(membership.level),
    limits,
    rawResponse: raw,
  });
}

export class KimiProvider extends UsageProvider {
  readonly name = "kimi";
  readonly displayName = "Kimi";
  protected readonly defaultEndpoint = KIMI_USAGE_URL;

  parseUsage(raw: unknown): UsageInfo {
    return mapKimiUsage(requireJsonObject(raw, this.displayName), this.name);
  }
}

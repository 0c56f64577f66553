import { ProviderApiError } from "../lib/errors";
import {
  asArray,
  asRecord,
  isRecord,
  JsonRecord,
  parseEpochMillis,
  parseOptionalCount,
  parseOptionalInteger,
  parseOptionalNumber,
  safeString,
  toQuantity,
} from "../lib/normalize";
import { createLimitDetail, createUsageDetail, createUsageInfo, LimitDetail, UsageDetail, UsageInfo } from "../models/usage";
import { requireJsonObject, UsageProvider } from "./base";

export const BIGMODEL_QUOTA_URL = "https://open.bigmodel.cn/api/monitor/usage/quota/limit";
export const ZAI_QUOTA_URL = "https://api.z.ai/api/monitor/usage/quota/limit";

const UNIT_NAMES: Record<number, string> = {
  1: "second",
  2: "minute",
  3: "hour",
  4: "day",
  5: "month",
  6: "year",
};

interface QuotaLimitRaw {
  type?: unknown;
  unit?: unknown;
  number?: unknown;
  usage?: unknown;
  currentValue?: unknown;
  current_value?: unknown;
  remaining?: unknown;
  percentage?: unknown;
  nextResetTime?: unknown;
  next_reset_time?: unknown;
  usageDetails?: unknown;
}

interface QuotaEnvelopeRaw {
  code?: unknown;
  msg?: unknown;
  success?: unknown;
}

const PLAN_KEYS = ["level", "planName", "plan_name", "plan", "planType", "plan_type", "packageName", "package_name"];

export function unitName(unit: number): string {
  return UNIT_NAMES[unit] ?? `unit_${unit}`;
}

interface Quantities {
  limit: string;
  used: string;
  remaining: string;
}

/**
 * Absolute counts when the record has them; records that only report a percentage
 * (token quotas) are expressed on a 100 scale so `used / limit` still reads correctly.
 */
function quotaQuantities(record: QuotaLimitRaw): Quantities {
  const current = record.currentValue ?? record.current_value;
  const hasAbsolute = record.usage !== undefined || current !== undefined || record.remaining !== undefined;
  const percent = parseOptionalNumber(record.percentage);

  if (!hasAbsolute && percent !== undefined) {
    const used = Math.max(0, Math.min(100, Math.round(percent)));
    return { limit: "100", used: String(used), remaining: String(100 - used) };
  }

  return {
    limit: toQuantity(record.usage),
    used: toQuantity(current),
    remaining: toQuantity(record.remaining),
  };
}

function mapUsageDetails(value: unknown): UsageDetail[] {
  return asArray(value)
    .filter(isRecord)
    .map((detail) =>
      createUsageDetail({
        modelCode: safeString(detail.modelCode ?? detail.model_code) ?? "",
        usage: parseOptionalInteger(detail.usage) ?? 0,
      }),
    );
}

export function mapQuotaLimit(record: QuotaLimitRaw): LimitDetail {
  return createLimitDetail({
    duration: parseOptionalCount(record.number) ?? 1,
    timeUnit: unitName(parseOptionalInteger(record.unit) ?? 0),
    ...quotaQuantities(record),
    resetTime: parseEpochMillis(record.nextResetTime ?? record.next_reset_time),
    usageDetails: mapUsageDetails(record.usageDetails),
  });
}

function detectMembershipLevel(data: JsonRecord): string | undefined {
  return PLAN_KEYS.map((key) => safeString(data[key])).find((candidate) => !!candidate);
}

export function mapQuotaUsage(raw: JsonRecord, provider = "bigmodel"): UsageInfo {
  const data = asRecord(raw.data);
  const limits = asArray(data.limits)
    .filter(isRecord)
    .map((record) => mapQuotaLimit(record));

  return createUsageInfo({
    provider,
    membershipLevel: detectMembershipLevel(data),
    limits,
    rawResponse: raw,
  });
}

/** Zhipu BigModel coding-plan quota endpoint. */
export class BigModelProvider extends UsageProvider {
  readonly name: string = "bigmodel";
  readonly displayName: string = "BigModel";
  protected readonly defaultEndpoint: string = BIGMODEL_QUOTA_URL;

  protected checkEnvelope(payload: unknown): void {
    if (!isRecord(payload)) {
      return;
    }
    const envelope: QuotaEnvelopeRaw = payload;
    if (envelope.success === false) {
      const message = safeString(envelope.msg) ?? "Unknown response status.";
      const code = parseOptionalNumber(envelope.code);
      throw new ProviderApiError(`${this.displayName} API error${code !== undefined ? ` ${code}` : ""}: ${message}`);
    }
  }

  parseUsage(raw: unknown): UsageInfo {
    return mapQuotaUsage(requireJsonObject(raw, this.displayName), this.name);
  }
}

/** The same quota API served from the international z.ai host. */
export class ZaiProvider extends BigModelProvider {
  readonly name: string = "zai";
  readonly displayName: string = "z.ai";
  protected readonly defaultEndpoint: string = ZAI_QUOTA_URL;
}

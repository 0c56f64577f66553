import { z } from "zod";
import { ValidationError } from "../lib/errors";

/** Time-unit sentinel for caps that have no reset window. */
export const TOKENS_LIMIT = "TOKENS_LIMIT";

export const KNOWN_TIME_UNITS = ["second", "minute", "hour", "day", "week", "month", "year"] as const;

export type KnownTimeUnit = (typeof KNOWN_TIME_UNITS)[number];

export type UsageStatus = "ok" | "warning" | "critical" | "unknown";

export interface UsageDetail {
  readonly modelCode: string;
  readonly usage: number;
}

export interface LimitDetail {
  /** Window length in `timeUnit` units; 0 when no window applies. */
  readonly duration: number;
  readonly timeUnit: string;
  readonly limit: string;
  readonly used: string;
  readonly remaining: string;
  /** ISO-8601 UTC instant of the next reset. */
  readonly resetTime?: string;
  readonly usageDetails: readonly UsageDetail[];
}

export interface UsageInfo {
  readonly provider: string;
  readonly userId?: string;
  readonly membershipLevel?: string;
  readonly limits: readonly LimitDetail[];
  readonly rawResponse: Readonly<Record<string, unknown>>;
}

const usageDetailSchema = z.object({
  modelCode: z.string(),
  usage: z.number().int(),
});

const limitDetailSchema = z.object({
  duration: z.number().int().nonnegative(),
  timeUnit: z.string(),
  limit: z.string(),
  used: z.string(),
  remaining: z.string(),
  resetTime: z.string().datetime({ offset: true }).optional(),
  usageDetails: z.array(usageDetailSchema).default([]),
});

const usageInfoSchema = z.object({
  provider: z.string().min(1),
  userId: z.string().optional(),
  membershipLevel: z.string().optional(),
  limits: z.array(limitDetailSchema).default([]),
  rawResponse: z.record(z.unknown()),
});

export type UsageDetailInput = UsageDetail;
export type LimitDetailInput = Omit<LimitDetail, "usageDetails"> & { usageDetails?: readonly UsageDetail[] };
export type UsageInfoInput = Omit<UsageInfo, "limits"> & { limits?: readonly LimitDetail[] };

function validate<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ValidationError(`Invalid ${label}`, issues);
  }
  return result.data;
}

export function createUsageDetail(input: UsageDetailInput): UsageDetail {
  return validate(usageDetailSchema, input, "UsageDetail");
}

export function createLimitDetail(input: LimitDetailInput): LimitDetail {
  return validate(limitDetailSchema, input, "LimitDetail");
}

export function createUsageInfo(input: UsageInfoInput): UsageInfo {
  return validate(usageInfoSchema, input, "UsageInfo");
}

/** Placeholder emitted for a provider whose fetch failed; carries the error in `rawResponse`. */
export function createFailedUsage(provider: string, message: string): UsageInfo {
  return {
    provider,
    limits: [],
    rawResponse: { error: message },
  };
}

export function failureMessage(usage: UsageInfo): string | undefined {
  const error = usage.rawResponse.error;
  return usage.limits.length === 0 && typeof error === "string" ? error : undefined;
}

export function isFailedUsage(usage: UsageInfo): boolean {
  return failureMessage(usage) !== undefined;
}

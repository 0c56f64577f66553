import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/lib/errors";
import {
  createFailedUsage,
  createLimitDetail,
  createUsageDetail,
  createUsageInfo,
  failureMessage,
  isFailedUsage,
} from "../src/models/usage";

const baseLimit = {
  duration: 5,
  timeUnit: "hour",
  limit: "100",
  used: "42",
  remaining: "58",
};

describe("createLimitDetail", () => {
  it("fills in an empty usage breakdown", () => {
    expect(createLimitDetail(baseLimit)).toEqual({ ...baseLimit, usageDetails: [] });
  });

  it("rejects a fractional or negative duration", () => {
    expect(() => createLimitDetail({ ...baseLimit, duration: 1.5 })).toThrow(ValidationError);
    expect(() => createLimitDetail({ ...baseLimit, duration: -1 })).toThrow(ValidationError);
  });

  it("rejects a reset time that is not an ISO timestamp", () => {
    expect(() => createLimitDetail({ ...baseLimit, resetTime: "tomorrow" })).toThrow(/resetTime/);
  });

  it("lists the offending paths", () => {
    try {
      createLimitDetail({ ...baseLimit, duration: 0.5 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^duration: /);
      }
    }
  });
});

describe("createUsageDetail", () => {
  it("requires an integer usage", () => {
    expect(createUsageDetail({ modelCode: "zread", usage: 3 })).toEqual({ modelCode: "zread", usage: 3 });
    expect(() => createUsageDetail({ modelCode: "zread", usage: 0.5 })).toThrow(ValidationError);
  });
});

describe("createUsageInfo", () => {
  it("defaults limits to an empty list", () => {
    expect(createUsageInfo({ provider: "kimi", rawResponse: {} })).toEqual({
      provider: "kimi",
      limits: [],
      rawResponse: {},
    });
  });

  it("requires a provider name", () => {
    expect(() => createUsageInfo({ provider: "", rawResponse: {} })).toThrow(ValidationError);
  });
});

describe("failed usage placeholders", () => {
  it("carries the error in the raw response", () => {
    const usage = createFailedUsage("kimi", "Kimi API key is invalid.");

    expect(usage).toEqual({ provider: "kimi", limits: [], rawResponse: { error: "Kimi API key is invalid." } });
    expect(isFailedUsage(usage)).toBe(true);
    expect(failureMessage(usage)).toBe("Kimi API key is invalid.");
  });

  it("does not mistake an empty but successful response for a failure", () => {
    expect(isFailedUsage(createUsageInfo({ provider: "bigmodel", rawResponse: { code: 200 } }))).toBe(false);
  });
});

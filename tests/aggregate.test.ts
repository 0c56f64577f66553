import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchAll, fetchAllWithFailures, fetchProviderUsage, hasUsageData } from "../src/lib/aggregate";
import { TransportError, UnknownProviderError } from "../src/lib/errors";
import { setLogSink } from "../src/lib/logger";
import { createFailedUsage } from "../src/models/usage";
import { BIGMODEL_QUOTA_URL } from "../src/providers/bigmodel";
import { KIMI_USAGE_URL } from "../src/providers/kimi";
import { jsonResponse, loadFixture } from "./fixtures";

const configs = {
  kimi: { apiKey: "test-kimi-key" },
  bigmodel: { apiKey: "test-bigmodel-key" },
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

let restoreSink: (() => void) | undefined;

function captureLogs(): string[] {
  const lines: string[] = [];
  restoreSink = setLogSink((line) => lines.push(line));
  return lines;
}

afterEach(() => {
  restoreSink?.();
  restoreSink = undefined;
});

describe("fetchProviderUsage", () => {
  it("runs authenticate, fetch and parse for one provider", async () => {
    const fetch = vi.fn(async () => jsonResponse(loadFixture("bigmodel-quota.json")));
    const usage = await fetchProviderUsage("bigmodel", configs.bigmodel, { fetch });

    expect(usage.provider).toBe("bigmodel");
    expect(usage.limits).toHaveLength(2);
    expect(fetch).toHaveBeenCalledWith(BIGMODEL_QUOTA_URL, {
      method: "GET",
      headers: { Authorization: "Bearer test-bigmodel-key", "Content-Type": "application/json" },
    });
  });

  it("surfaces unknown provider names", async () => {
    await expect(fetchProviderUsage("openai", { apiKey: "test-key" })).rejects.toBeInstanceOf(UnknownProviderError);
  });
});

describe("fetchAll", () => {
  it("keeps the other providers when one fails", async () => {
    const logs = captureLogs();
    const fetch = vi.fn(async (url: string) => {
      if (url === KIMI_USAGE_URL) {
        throw new TypeError("fetch failed");
      }
      return jsonResponse(loadFixture("bigmodel-quota.json"));
    });

    const { usages, failures } = await fetchAllWithFailures(configs, { fetch });

    expect(usages.map((usage) => usage.provider)).toEqual(["kimi", "bigmodel"]);
    expect(usages[0]).toEqual(createFailedUsage("kimi", "Kimi request failed: fetch failed"));
    expect(usages[1].limits).toHaveLength(2);
    expect(failures).toHaveLength(1);
    expect(failures[0].provider).toBe("kimi");
    expect(failures[0].error).toBeInstanceOf(TransportError);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toContain("[aggregate] Error fetching kimi usage: Kimi request failed: fetch failed");
  });

  it("returns results in configuration order, not completion order", async () => {
    const completed: string[] = [];
    const fetch = vi.fn(async (url: string) => {
      if (url === KIMI_USAGE_URL) {
        await delay(20);
        completed.push("kimi");
        return jsonResponse(loadFixture("kimi-usage.json"));
      }
      completed.push("bigmodel");
      return jsonResponse(loadFixture("bigmodel-quota.json"));
    });

    const usages = await fetchAll(configs, { fetch });

    expect(completed).toEqual(["bigmodel", "kimi"]);
    expect(usages.map((usage) => usage.provider)).toEqual(["kimi", "bigmodel"]);
  });

  it("starts every request before any of them settles", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const fetch = vi.fn(async (url: string) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(5);
      inFlight -= 1;
      return jsonResponse(loadFixture(url === KIMI_USAGE_URL ? "kimi-usage.json" : "bigmodel-quota.json"));
    });

    await fetchAll(configs, { fetch });

    expect(maxInFlight).toBe(2);
  });

  it("turns unknown providers into placeholders without aborting the rest", async () => {
    captureLogs();
    const fetch = vi.fn(async () => jsonResponse(loadFixture("kimi-usage.json")));

    const usages = await fetchAll({ openai: { apiKey: "test-key" }, kimi: configs.kimi }, { fetch });

    expect(usages[0]).toEqual(createFailedUsage("openai", "Unknown provider: openai"));
    expect(usages[1].userId).toBe("10000000000000000001");
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("never rejects, even when every provider fails", async () => {
    captureLogs();
    const fetch = vi.fn(async () => new Response("nope", { status: 500 }));

    const usages = await fetchAll(configs, { fetch });

    expect(usages).toEqual([
      createFailedUsage("kimi", "Kimi API 500: nope"),
      createFailedUsage("bigmodel", "BigModel API 500: nope"),
    ]);
    expect(hasUsageData(usages)).toBe(false);
  });

  it("returns nothing for an empty configuration", async () => {
    await expect(fetchAll({})).resolves.toEqual([]);
  });
});

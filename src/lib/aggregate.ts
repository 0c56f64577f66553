import { createFailedUsage, isFailedUsage, UsageInfo } from "../models/usage";
import { createProvider, ProviderConfig, ProviderOptions } from "../providers";
import { errorMessage } from "./errors";
import { getLogger } from "./logger";

export type ProviderConfigMap = Readonly<Record<string, ProviderConfig>>;

export interface ProviderFailure {
  provider: string;
  error: unknown;
}

export interface FetchAllResult {
  /** One entry per configured provider, in configuration order; failures are placeholders. */
  usages: UsageInfo[];
  failures: ProviderFailure[];
}

const log = getLogger("aggregate");

export async function fetchProviderUsage(
  name: string,
  config: ProviderConfig,
  options?: ProviderOptions,
): Promise<UsageInfo> {
  const provider = createProvider(name, config, options);
  provider.authenticate();
  const raw = await provider.fetchUsage();
  return provider.parseUsage(raw);
}

export async function fetchAllWithFailures(
  configs: ProviderConfigMap,
  options?: ProviderOptions,
): Promise<FetchAllResult> {
  const entries = Object.entries(configs);
  const failures: ProviderFailure[] = [];

  const usages = await Promise.all(
    entries.map(async ([name, config]) => {
      try {
        const usage = await fetchProviderUsage(name, config, options);
        log.debug(`${name}: ${usage.limits.length} limit(s)`);
        return usage;
      } catch (error) {
        const message = errorMessage(error);
        log.warn(`Error fetching ${name} usage: ${message}`);
        failures.push({ provider: name, error });
        return createFailedUsage(name, message);
      }
    }),
  );

  // Keep failures in configuration order rather than completion order.
  const order = new Map(entries.map(([name], index) => [name, index]));
  failures.sort((a, b) => (order.get(a.provider) ?? 0) - (order.get(b.provider) ?? 0));

  return { usages, failures };
}

export async function fetchAll(configs: ProviderConfigMap, options?: ProviderOptions): Promise<UsageInfo[]> {
  const { usages } = await fetchAllWithFailures(configs, options);
  return usages;
}

/** True when at least one provider answered, even if it reported no limits. */
export function hasUsageData(usages: readonly UsageInfo[]): boolean {
  return usages.some((usage) => !isFailedUsage(usage));
}

import { UnknownProviderError } from "../lib/errors";
import { ProviderConfig, ProviderOptions, UsageProvider } from "./base";
import { BigModelProvider, ZaiProvider } from "./bigmodel";
import { KimiProvider } from "./kimi";

export type ProviderFactory = (config: ProviderConfig, options?: ProviderOptions) => UsageProvider;

const registry = new Map<string, ProviderFactory>([
  ["kimi", (config, options) => new KimiProvider(config, options)],
  ["bigmodel", (config, options) => new BigModelProvider(config, options)],
  ["zai", (config, options) => new ZaiProvider(config, options)],
]);

export function registerProvider(name: string, factory: ProviderFactory): void {
  registry.set(name, factory);
}

export function listProviders(): string[] {
  return [...registry.keys()];
}

export function createProvider(name: string, config: ProviderConfig, options?: ProviderOptions): UsageProvider {
  const factory = registry.get(name);
  if (!factory) {
    throw new UnknownProviderError(name);
  }
  return factory(config, options);
}

export { UsageProvider } from "./base";
export type { FetchLike, ProviderConfig, ProviderOptions } from "./base";
export { BigModelProvider, ZaiProvider } from "./bigmodel";
export { KimiProvider } from "./kimi";

export * from "./models/usage";
export * from "./lib/errors";
export { fetchAll, fetchAllWithFailures, fetchProviderUsage, hasUsageData } from "./lib/aggregate";
export type { FetchAllResult, ProviderConfigMap, ProviderFailure } from "./lib/aggregate";
export { CONFIG_TEMPLATE, loadConfig, parseConfig, resolveConfigPath } from "./lib/config";
export type { UsageConfig } from "./lib/config";
export {
  formatDetailedStatus,
  formatStatusLine,
  formatUsageJson,
  formatUsageText,
  percentage,
  timeWindowLabel,
} from "./lib/format";
export { StatusBarApp } from "./lib/status-bar";
export type { StatusBarRenderer, StatusBarState } from "./lib/status-bar";
export {
  BigModelProvider,
  createProvider,
  KimiProvider,
  listProviders,
  registerProvider,
  UsageProvider,
  ZaiProvider,
} from "./providers";
export type { FetchLike, ProviderConfig, ProviderFactory, ProviderOptions } from "./providers";

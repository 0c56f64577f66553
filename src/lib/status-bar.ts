import { UsageInfo } from "../models/usage";
import { fetchAll, ProviderConfigMap } from "./aggregate";
import { loadConfig, UsageConfig } from "./config";
import { errorMessage } from "./errors";
import { formatDetailedStatus, formatStatusLine, STATUS_LOADING, STATUS_NO_DATA, TextFormatOptions } from "./format";
import { getLogger } from "./logger";

export const DEFAULT_REFRESH_INTERVAL_MS = 5 * 60 * 1000;

/** Where the live status goes: a terminal line, a tray title, a test double. */
export interface StatusBarRenderer {
  setTitle(title: string): void;
  showDetails(text: string): void;
}

export interface StatusBarState {
  readonly configPath: string;
  readonly config?: UsageConfig;
  readonly usages: readonly UsageInfo[];
  readonly lastUpdated?: Date;
  readonly statusText: string;
  readonly refreshing: boolean;
}

export interface StatusBarOptions {
  configPath: string;
  renderer: StatusBarRenderer;
  intervalMs?: number;
  loadConfig?: (configPath: string) => Promise<UsageConfig>;
  fetchUsages?: (providers: ProviderConfigMap) => Promise<UsageInfo[]>;
  now?: () => Date;
  format?: TextFormatOptions;
}

const log = getLogger("status-bar");

export class StatusBarApp {
  private state: StatusBarState;
  private timer: NodeJS.Timeout | undefined;
  private readonly renderer: StatusBarRenderer;
  private readonly intervalMs: number;
  private readonly load: (configPath: string) => Promise<UsageConfig>;
  private readonly fetchUsages: (providers: ProviderConfigMap) => Promise<UsageInfo[]>;
  private readonly now: () => Date;
  private readonly format: TextFormatOptions;

  constructor(options: StatusBarOptions) {
    this.renderer = options.renderer;
    this.intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.load = options.loadConfig ?? loadConfig;
    this.fetchUsages = options.fetchUsages ?? ((providers) => fetchAll(providers));
    this.now = options.now ?? (() => new Date());
    this.format = options.format ?? {};
    this.state = {
      configPath: options.configPath,
      usages: [],
      statusText: STATUS_LOADING,
      refreshing: false,
    };
  }

  get snapshot(): StatusBarState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.renderer.setTitle(STATUS_LOADING);
    this.requestRefresh();
    this.timer = setInterval(() => this.requestRefresh(), this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Fire-and-forget refresh for timers and key bindings. */
  requestRefresh(): void {
    this.refresh().catch((error: unknown) => {
      log.error(`Refresh failed: ${errorMessage(error)}`);
    });
  }

  /**
   * Runs one fetch cycle. Cycles never overlap: a call made while one is in flight
   * returns without fetching.
   */
  async refresh(): Promise<void> {
    if (this.state.refreshing) {
      log.debug("Refresh already in progress; skipping");
      return;
    }

    this.state = { ...this.state, refreshing: true };
    this.renderer.setTitle(STATUS_LOADING);

    try {
      const usages = await this.collect();
      const statusText = formatStatusLine(usages);
      this.state = { ...this.state, usages, lastUpdated: this.now(), statusText };
    } catch (error) {
      this.state = { ...this.state, statusText: STATUS_NO_DATA };
      throw error;
    } finally {
      this.state = { ...this.state, refreshing: false };
      this.renderer.setTitle(this.state.statusText);
    }
  }

  detailedStatus(): string {
    return formatDetailedStatus(this.state.usages, this.state.lastUpdated, this.format);
  }

  showDetails(): void {
    this.renderer.showDetails(this.detailedStatus());
  }

  private async collect(): Promise<UsageInfo[]> {
    let config = this.state.config;
    if (!config) {
      try {
        config = await this.load(this.state.configPath);
      } catch (error) {
        log.warn(`Could not load config: ${errorMessage(error)}`);
        return [];
      }
      this.state = { ...this.state, config };
    }
    return this.fetchUsages(config.providers);
  }
}

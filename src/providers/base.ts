import { HttpStatusError, NotAuthenticatedError, TransportError, ValidationError, errorMessage } from "../lib/errors";
import { getLogger } from "../lib/logger";
import { isRecord, JsonRecord } from "../lib/normalize";
import { redactHeaders } from "../lib/redact";
import { UsageInfo } from "../models/usage";

export interface ProviderConfig {
  apiKey: string;
  /** Overrides the provider's built-in usage URL. */
  endpoint?: string;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ProviderOptions {
  fetch?: FetchLike;
}

const log = getLogger("provider");

function normalizeApiKey(apiKey: string): string {
  return apiKey.trim().replace(/^Bearer\s+/i, "");
}

function normalizeEndpoint(candidate: string): string {
  const trimmed = candidate.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function requireJsonObject(raw: unknown, provider: string): JsonRecord {
  if (!isRecord(raw)) {
    throw new ValidationError(`${provider} response is not a JSON object`);
  }
  return raw;
}

/**
 * One usage endpoint of one vendor. Subclasses supply the URL and the mapping from the
 * vendor payload to {@link UsageInfo}; request plumbing lives here.
 */
export abstract class UsageProvider {
  abstract readonly name: string;
  /** Human-facing vendor name used in error messages. */
  abstract readonly displayName: string;
  protected abstract readonly defaultEndpoint: string;

  protected headers: Record<string, string> = {};
  private readonly fetchImpl: FetchLike;

  constructor(
    protected readonly config: ProviderConfig,
    options: ProviderOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get endpoint(): string {
    return this.config.endpoint ? normalizeEndpoint(this.config.endpoint) : this.defaultEndpoint;
  }

  get requestHeaders(): Readonly<Record<string, string>> {
    return this.headers;
  }

  authenticate(): void {
    this.headers = {
      Authorization: `Bearer ${normalizeApiKey(this.config.apiKey)}`,
      "Content-Type": "application/json",
    };
  }

  async fetchUsage(): Promise<unknown> {
    if (!this.headers.Authorization) {
      throw new NotAuthenticatedError(this.name);
    }

    const url = this.endpoint;
    log.debug(`GET ${url}`, JSON.stringify(redactHeaders(this.headers)));

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: this.headers,
      });
    } catch (error) {
      throw new TransportError(`${this.displayName} request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      if (response.status === 401 || response.status === 403) {
        throw new HttpStatusError(`${this.displayName} API key is invalid.`, response.status);
      }
      const body = await response.text();
      const excerpt = body ? `: ${body.slice(0, 220)}` : "";
      throw new HttpStatusError(`${this.displayName} API ${response.status}${excerpt}`, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TransportError(`${this.displayName} returned an unreadable response body.`, { cause: error });
    }

    this.checkEnvelope(payload);
    return payload;
  }

  /** Hook for vendors that report failures inside a 2xx body. */
  protected checkEnvelope(_payload: unknown): void {}

  abstract parseUsage(raw: unknown): UsageInfo;
}

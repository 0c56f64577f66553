import { existsSync, promises as fs } from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import { ProviderConfig } from "../providers";
import { ConfigError, ConfigNotFoundError } from "./errors";

export const CONFIG_PATH_ENV = "CODING_PLAN_USAGE_CONFIG";
export const LOCAL_CONFIG_FILE = "config.json";
export const HOME_CONFIG_FILE = ".coding_plan_usage_config.json";

export const CONFIG_TEMPLATE = `{
  "providers": {
    "kimi": {
      "api_key": "your-api-key"
    },
    "bigmodel": {
      "api_key": "your-api-key"
    }
  }
}`;

const providerConfigSchema = z.object({
  api_key: z.string().trim().min(1, "api_key must not be empty"),
  endpoint: z.string().trim().url().optional(),
});

const configSchema = z.object({
  providers: z.record(providerConfigSchema).default({}),
});

export interface UsageConfig {
  /** Insertion order of the file is the display order. */
  providers: Record<string, ProviderConfig>;
}

export interface ConfigPathOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function resolveConfigPath(manual?: string, options: ConfigPathOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const explicit = manual?.trim() || env[CONFIG_PATH_ENV]?.trim();
  if (explicit) {
    return path.resolve(cwd, explicit);
  }

  const local = path.join(cwd, LOCAL_CONFIG_FILE);
  if (existsSync(local)) {
    return local;
  }

  return path.join(options.homeDir ?? os.homedir(), HOME_CONFIG_FILE);
}

export function parseConfig(input: unknown, source = "config"): UsageConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(source, reason);
  }

  const providers: Record<string, ProviderConfig> = {};
  for (const [name, entry] of Object.entries(result.data.providers)) {
    providers[name] = entry.endpoint ? { apiKey: entry.api_key, endpoint: entry.endpoint } : { apiKey: entry.api_key };
  }
  return { providers };
}

export async function loadConfig(configPath: string): Promise<UsageConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigNotFoundError(configPath);
    }
    throw new ConfigError(configPath, "file could not be read", { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(configPath, "not valid JSON", { cause: error });
  }

  return parseConfig(parsed, configPath);
}

#!/usr/bin/env node

import readline from "readline";
import { Command, InvalidArgumentError } from "commander";
import { fetchAllWithFailures, hasUsageData } from "./lib/aggregate";
import { CONFIG_TEMPLATE, loadConfig, resolveConfigPath, UsageConfig } from "./lib/config";
import { ConfigNotFoundError, errorMessage } from "./lib/errors";
import { formatUsageJson, formatUsageText } from "./lib/format";
import { getLogger, setLogLevel } from "./lib/logger";
import { DEFAULT_REFRESH_INTERVAL_MS, StatusBarApp } from "./lib/status-bar";
import { createTerminalRenderer } from "./lib/terminal";
import { createTheme, shouldUseColor } from "./lib/theme";

interface CliOptions {
  config?: string;
  watch?: boolean;
  interval?: number;
  json?: boolean;
  raw?: boolean;
  verbose?: boolean;
  color: boolean;
}

const log = getLogger("cli");

function parseInterval(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 10) {
    throw new InvalidArgumentError("must be a number of seconds, at least 10.");
  }
  return seconds;
}

async function runOnce(options: CliOptions): Promise<number> {
  const configPath = resolveConfigPath(options.config);

  let config: UsageConfig;
  try {
    config = await loadConfig(configPath);
  } catch (error) {
    if (error instanceof ConfigNotFoundError) {
      process.stderr.write(`Error: ${error.message}\n`);
      process.stderr.write("\nPlease create a config file with the following structure:\n\n");
      process.stderr.write(`${CONFIG_TEMPLATE}\n`);
      return 1;
    }
    throw error;
  }

  const names = Object.keys(config.providers);
  log.info(`Fetching usage for ${names.join(", ") || "no providers"}`);

  const { usages, failures } = await fetchAllWithFailures(config.providers);
  for (const failure of failures) {
    process.stderr.write(`Error fetching ${failure.provider} usage: ${errorMessage(failure.error)}\n`);
  }

  if (!hasUsageData(usages)) {
    process.stderr.write("No usage data retrieved.\n");
    return 1;
  }

  if (options.json) {
    process.stdout.write(`${formatUsageJson(usages, { includeRaw: options.raw })}\n`);
    return 0;
  }

  const rich = options.color && shouldUseColor(process.stdout);
  process.stdout.write(`${formatUsageText(usages, { theme: createTheme(rich) })}\n`);
  return 0;
}

function runWatch(options: CliOptions): Promise<number> {
  const app = new StatusBarApp({
    configPath: resolveConfigPath(options.config),
    renderer: createTerminalRenderer({ windowTitle: true }),
    intervalMs: options.interval !== undefined ? options.interval * 1000 : DEFAULT_REFRESH_INTERVAL_MS,
    format: { theme: createTheme(options.color && shouldUseColor(process.stdout)) },
  });

  return new Promise((resolve) => {
    const stdin = process.stdin;

    const quit = () => {
      app.stop();
      if (stdin.isTTY) {
        stdin.setRawMode(false);
      }
      stdin.pause();
      process.stdout.write("\n");
      resolve(0);
    };

    if (stdin.isTTY) {
      readline.emitKeypressEvents(stdin);
      stdin.setRawMode(true);
      stdin.on("keypress", (_text: string | undefined, key: readline.Key | undefined) => {
        if (!key) {
          return;
        }
        if (key.name === "q" || (key.ctrl && key.name === "c")) {
          quit();
        } else if (key.name === "r") {
          app.requestRefresh();
        } else if (key.name === "d") {
          app.showDetails();
        }
      });
      stdin.resume();
      process.stderr.write("Keys: [r] refresh  [d] details  [q] quit\n");
    }

    process.once("SIGINT", quit);
    process.once("SIGTERM", quit);
    app.start();
  });
}

const program = new Command();

program
  .name("coding-plan-usage")
  .description("Fetch coding plan usage from Kimi and BigModel.")
  .option("-c, --config <path>", "path to the configuration file")
  .option("-w, --watch", "keep a live status line that refreshes on a timer")
  .option("--interval <seconds>", "refresh interval for --watch", parseInterval)
  .option("--json", "print usage as JSON")
  .option("--raw", "include redacted provider payloads in --json output")
  .option("-v, --verbose", "log debug output to stderr")
  .option("--no-color", "disable colored output")
  .action(async (options: CliOptions) => {
    if (options.verbose) {
      setLogLevel("debug");
    }
    process.exitCode = options.watch ? await runWatch(options) : await runOnce(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exit(1);
});

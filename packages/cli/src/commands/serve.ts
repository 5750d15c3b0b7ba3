/**
 * Serve Command
 *
 * `mdlive serve [path]`: load configuration, start the preview server and
 * run until SIGINT/SIGTERM.
 *
 * @module cli/commands/serve
 */

import {
  ConfigError,
  createLogger,
  loadConfig,
  type PartialServerConfig,
  PartialServerConfigSchema,
  THEMES,
} from "@mdlive/core";
import { PreviewServer } from "@mdlive/server";
import { Err, ErrorCode, Ok, type Result } from "@mdlive/shared";
import chalk from "chalk";
import { Command, InvalidArgumentError, Option } from "commander";
import { openUrl } from "../utils/open-browser.js";
import { version } from "../version.js";
import { EXIT_CODES, type ExitCode, exitCodeFor } from "./exit-codes.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed `serve` flags as commander hands them over.
 * `open` and `reload` are true unless `--no-open` / `--no-reload` is given.
 */
export interface ServeOptions {
  port?: number;
  host?: string;
  theme?: string;
  open: boolean;
  reload: boolean;
  debounce?: number;
  logLevel?: string;
  jsonLogs?: boolean;
}

export interface BannerInfo {
  url: string;
  servePath: string;
  mode: "file" | "directory";
  liveReload: boolean;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// =============================================================================
// Helpers
// =============================================================================

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

/**
 * Turn CLI flags into a config override layer. Only flags the user gave are
 * set, so config files and MDLIVE_* variables still apply underneath.
 */
export function buildServeOverrides(
  servePath: string | undefined,
  options: ServeOptions
): Result<PartialServerConfig, ConfigError> {
  const layer = {
    servePath,
    host: options.host,
    port: options.port,
    theme: options.theme,
    debounceMs: options.debounce,
    logLevel: options.logLevel?.toLowerCase(),
    openBrowser: options.open ? undefined : false,
    reloadEnabled: options.reload ? undefined : false,
  };

  const parsed = PartialServerConfigSchema.safeParse(layer);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return Err(new ConfigError(`Invalid option: ${details}`, ErrorCode.CONFIG_INVALID));
  }

  return Ok(parsed.data);
}

export function formatBanner(info: BannerInfo): string {
  const reload = info.liveReload ? chalk.green("on") : chalk.yellow("off");
  return [
    "",
    `  ${chalk.bold("mdlive")} ${chalk.dim(`v${version}`)}`,
    "",
    `  ${chalk.cyan("➜")}  Serving:     ${info.servePath} ${chalk.dim(`(${info.mode})`)}`,
    `  ${chalk.cyan("➜")}  Local:       ${chalk.cyan(info.url)}`,
    `  ${chalk.cyan("➜")}  Live reload: ${reload}`,
    "",
    chalk.dim("  Press Ctrl+C to stop"),
    "",
  ].join("\n");
}

function printError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`✗ ${message}`));
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      for (const name of SHUTDOWN_SIGNALS) {
        process.off(name, onSignal);
      }
      resolve(signal);
    };
    for (const name of SHUTDOWN_SIGNALS) {
      process.on(name, onSignal);
    }
  });
}

// =============================================================================
// Command
// =============================================================================

/**
 * Load config, start the server and block until a shutdown signal.
 */
export async function runServe(servePath: string | undefined, options: ServeOptions): Promise<ExitCode> {
  const overrides = buildServeOverrides(servePath, options);
  if (!overrides.ok) {
    printError(overrides.error);
    return exitCodeFor(overrides.error);
  }

  const loaded = loadConfig({ overrides: overrides.value });
  if (!loaded.ok) {
    printError(loaded.error);
    return exitCodeFor(loaded.error);
  }

  const config = loaded.value;
  const logger = createLogger({ level: config.logLevel, json: options.jsonLogs ?? false });
  const server = new PreviewServer({ config, logger });

  try {
    await server.start();
  } catch (error) {
    logger.fatal("Preview server failed to start", { error });
    return exitCodeFor(error);
  }

  console.log(
    formatBanner({
      url: server.url,
      servePath: server.state.servePath,
      mode: server.state.mode,
      liveReload: server.liveReloadActive,
    })
  );

  if (config.openBrowser) {
    const opened = await openUrl(server.url);
    if (!opened.success) {
      logger.warn(opened.error);
    }
  }

  const signal = await waitForShutdownSignal();
  logger.info(`Received ${signal}, shutting down`);
  await server.stop();
  return EXIT_CODES.SUCCESS;
}

export function createServeCommand(): Command {
  return new Command("serve")
    .description("Serve a Markdown file or directory with live reload")
    .argument("[path]", "File or directory to serve (default: current directory)")
    .option("-p, --port <port>", "Port to listen on (0 for an ephemeral port)", parseInteger)
    .option("-H, --host <host>", "Address to bind")
    .addOption(new Option("-t, --theme <theme>", "Page theme").choices(THEMES))
    .option("--no-open", "Do not open a browser")
    .option("--no-reload", "Disable live reload")
    .option("-d, --debounce <ms>", "Quiet period before reloading, in milliseconds", parseInteger)
    .option("-l, --log-level <level>", "trace, debug, info, warn, error or fatal")
    .option("--json-logs", "Write logs as JSON lines")
    .action(async (servePath: string | undefined, options: ServeOptions) => {
      process.exitCode = await runServe(servePath, options);
    });
}

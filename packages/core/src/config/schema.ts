import { z } from "zod";

// ============================================
// Server Configuration Schema
// ============================================

/**
 * UI themes accepted by the page template.
 */
export const THEMES = ["light", "dark", "catppuccin-mocha", "catppuccin-latte"] as const;

export const ThemeSchema = z.enum(THEMES);

export type Theme = z.infer<typeof ThemeSchema>;

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * Full server configuration. Every field has a default except `servePath`.
 */
export const ServerConfigSchema = z.object({
  /** File or directory to serve */
  servePath: z.string().min(1),
  host: z.string().min(1).default("127.0.0.1"),
  /** 0 binds an ephemeral port */
  port: z
    .number()
    .int()
    .min(0)
    .max(65535)
    .refine((port) => port === 0 || port >= 1024, { message: "Port must be 0 or between 1024 and 65535" })
    .default(8000),
  theme: ThemeSchema.default("light"),
  openBrowser: z.boolean().default(true),
  /** When false the live-reload pipeline is not constructed at all */
  reloadEnabled: z.boolean().default(true),
  /** Quiet period before a burst of filesystem events is emitted */
  debounceMs: z.number().int().min(0).max(60_000).default(150),
  recursive: z.boolean().default(true),
  keepaliveIntervalMs: z.number().int().positive().default(30_000),
  keepaliveTimeoutMs: z.number().int().positive().default(60_000),
  /** How long the watcher waits for the scheduler to acknowledge an event */
  bridgeTimeoutMs: z.number().int().positive().default(500),
  renderCacheSize: z.number().int().positive().default(128),
  maxFileSizeBytes: z
    .number()
    .int()
    .positive()
    .default(10 * 1024 * 1024),
  logLevel: LogLevelSchema.default("info"),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Shape accepted from config files, environment and CLI overrides.
 */
export const PartialServerConfigSchema = ServerConfigSchema.partial();

export type PartialServerConfig = z.input<typeof PartialServerConfigSchema>;

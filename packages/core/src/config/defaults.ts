// ============================================
// Defaults
// ============================================

export const DEFAULT_DEBOUNCE_MS = 150;
export const DEFAULT_KEEPALIVE_INTERVAL_MS = 30_000;
export const DEFAULT_KEEPALIVE_TIMEOUT_MS = 60_000;
export const DEFAULT_BRIDGE_TIMEOUT_MS = 500;
export const DEFAULT_RENDER_CACHE_SIZE = 128;

/** Config file names searched for, in order, from the working directory upward */
export const CONFIG_FILE_NAMES = ["mdlive.toml", ".mdlive.toml"] as const;

/** Extensions treated as Markdown (compared lower-cased) */
export const MARKDOWN_EXTENSIONS: ReadonlySet<string> = new Set([".md", ".markdown"]);

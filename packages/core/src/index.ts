// ============================================
// mdlive Core
// ============================================

/**
 * @module @mdlive/core
 *
 * Live-reload pipeline (watcher, debounce, bridge, connection registry),
 * path containment, rendering, configuration, errors and logging.
 */

// ============================================
// Logger
// ============================================
export * from "./logger/index.js";

// ============================================
// Errors
// ============================================
export * from "./errors/index.js";

// ============================================
// Config
// ============================================
export * from "./config/index.js";

// ============================================
// Security
// ============================================
export * from "./security/index.js";

// ============================================
// Watch
// ============================================
export * from "./watch/index.js";

// ============================================
// Bridge
// ============================================
export * from "./bridge/index.js";

// ============================================
// Live connections
// ============================================
export * from "./live/index.js";

// ============================================
// Render
// ============================================
export * from "./render/index.js";

/**
 * HTML page template.
 *
 * @module server/template
 */

import type { Theme, TocEntry } from "@mdlive/core";

// =============================================================================
// Constants
// =============================================================================

export const LIVE_RELOAD_SCRIPT_PATH = "/__mdlive/live-reload.js";

const THEME_COLORS: Record<Theme, { background: string; text: string; muted: string; link: string; code: string }> =
  {
    light: { background: "#ffffff", text: "#1f2328", muted: "#59636e", link: "#0969da", code: "#f6f8fa" },
    dark: { background: "#0d1117", text: "#e6edf3", muted: "#9198a1", link: "#4493f8", code: "#151b23" },
    "catppuccin-mocha": { background: "#1e1e2e", text: "#cdd6f4", muted: "#a6adc8", link: "#89b4fa", code: "#181825" },
    "catppuccin-latte": { background: "#eff1f5", text: "#4c4f69", muted: "#6c6f85", link: "#1e66f5", code: "#e6e9ef" },
  };

// =============================================================================
// Helpers
// =============================================================================

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Encode a root-relative path for use in a URL, keeping the slashes.
 */
export function encodePathForUrl(relativePath: string): string {
  return relativePath.split("/").map(encodeURIComponent).join("/");
}

function themeStyles(theme: Theme): string {
  const colors = THEME_COLORS[theme];
  return `:root{--bg:${colors.background};--fg:${colors.text};--muted:${colors.muted};--link:${colors.link};--code:${colors.code}}
body{margin:0;background:var(--bg);color:var(--fg);font:16px/1.6 system-ui,sans-serif}
main{max-width:880px;margin:0 auto;padding:2rem 1.5rem}
nav.toc{font-size:.9rem;color:var(--muted);border-bottom:1px solid var(--muted);margin-bottom:1.5rem}
a{color:var(--link)}
pre,code{background:var(--code);border-radius:4px}
pre{padding:1rem;overflow:auto}
table{border-collapse:collapse}td,th{border:1px solid var(--muted);padding:.3rem .6rem}`;
}

// =============================================================================
// Pages
// =============================================================================

export interface PageOptions {
  title: string;
  /** Rendered HTML, inserted as-is */
  body: string;
  theme: Theme;
  reloadEnabled: boolean;
  /** Root-relative path of the document, null for generated pages */
  documentPath: string | null;
  toc?: readonly TocEntry[];
}

function renderToc(toc: readonly TocEntry[]): string {
  if (toc.length < 2) {
    return "";
  }
  const items = toc
    .map((entry) => `<li style="margin-left:${entry.level - 1}em"><a href="#${escapeHtml(entry.id)}">${escapeHtml(entry.text)}</a></li>`)
    .join("");
  return `<nav class="toc"><ul>${items}</ul></nav>`;
}

export function renderPage(options: PageOptions): string {
  const reloadScript = options.reloadEnabled ? `<script src="${LIVE_RELOAD_SCRIPT_PATH}" defer></script>` : "";
  const documentMeta =
    options.documentPath === null ? "" : `<meta name="mdlive-path" content="${escapeHtml(options.documentPath)}">`;

  return `<!DOCTYPE html>
<html lang="en" data-theme="${options.theme}">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
${documentMeta}
<title>${escapeHtml(options.title)}</title>
<style>${themeStyles(options.theme)}</style>
${reloadScript}
</head>
<body>
<main>
${renderToc(options.toc ?? [])}
<article>
${options.body}
</article>
</main>
</body>
</html>
`;
}

/**
 * Body of the generated index page for a directory without index.md/README.md.
 */
export function renderFileList(title: string, files: readonly string[]): string {
  if (files.length === 0) {
    return `<h1>${escapeHtml(title)}</h1>\n<p>No Markdown files found.</p>`;
  }
  const items = files
    .map((file) => `<li><a href="/view/${escapeHtml(encodePathForUrl(file))}">${escapeHtml(file)}</a></li>`)
    .join("\n");
  return `<h1>${escapeHtml(title)}</h1>\n<ul>\n${items}\n</ul>`;
}

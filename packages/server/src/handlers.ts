/**
 * Request handlers and the route table that wires them.
 *
 * @module server/handlers
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { FileTooLargeError, hashContent, isMarkdownFile, NotFoundError } from "@mdlive/core";

import {
  html,
  json,
  type HandlerResponse,
  type RequestContext,
  type ResolvedFile,
  resolveFile,
  type Route,
  text,
  toPosixPath,
} from "./router.js";
import type { ServerState } from "./state.js";
import { LIVE_RELOAD_SCRIPT_PATH, renderFileList, renderPage } from "./template.js";

// =============================================================================
// Constants
// =============================================================================

/** Files rendered for `GET /` in directory mode, in order of preference */
const INDEX_CANDIDATES = ["index.md", "README.md", "readme.md"] as const;

/** Directory names never listed */
const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set(["node_modules"]);

const LIVE_RELOAD_SCRIPT_URL = new URL("../assets/live-reload.js", import.meta.url);

// =============================================================================
// Types
// =============================================================================

export interface FileEntry {
  name: string;
  path: string;
  size: number;
  /** Modification time, epoch seconds */
  modified: number;
}

export interface DirectoryEntry {
  name: string;
  path: string;
  files: FileEntry[];
  subdirs: DirectoryEntry[];
}

export interface FileMetadata {
  path: string;
  name: string;
  size: number;
  modified: number;
  contentHash: string;
  isMarkdown: boolean;
}

// =============================================================================
// Helpers
// =============================================================================

function isMarkdownPath(filePath: string): boolean {
  return isMarkdownFile({ filePath });
}

/**
 * Read a file as UTF-8, refusing files over the configured limit.
 *
 * @throws FileTooLargeError, NotFoundError
 */
export async function readTextFile(absolutePath: string, maxBytes: number): Promise<string> {
  const stats = await fs.stat(absolutePath);
  if (!stats.isFile()) {
    throw new NotFoundError("Not a file");
  }
  if (stats.size > maxBytes) {
    throw new FileTooLargeError(stats.size, maxBytes);
  }
  return fs.readFile(absolutePath, "utf-8");
}

function titleFor(file: ResolvedFile, frontmatter: Readonly<Record<string, unknown>>, firstHeading?: string): string {
  const title = frontmatter.title;
  if (typeof title === "string" && title.trim() !== "") {
    return title;
  }
  return firstHeading ?? path.posix.basename(file.relativePath);
}

async function renderDocument(state: ServerState, file: ResolvedFile): Promise<HandlerResponse> {
  const content = await readTextFile(file.absolutePath, state.config.maxFileSizeBytes);
  const result = state.renderCache.render(file.absolutePath, content, state.renderer);

  return html(
    renderPage({
      title: titleFor(file, result.frontmatter, result.toc[0]?.text),
      body: result.html,
      toc: result.toc,
      theme: state.config.theme,
      reloadEnabled: state.config.reloadEnabled,
      documentPath: file.relativePath,
    })
  );
}

function servedFile(state: ServerState): ResolvedFile {
  return {
    absolutePath: state.servePath,
    relativePath: toPosixPath(path.relative(state.validationRoot, state.servePath)),
  };
}

async function findIndexDocument(root: string): Promise<ResolvedFile | undefined> {
  for (const candidate of INDEX_CANDIDATES) {
    let file: ResolvedFile;
    try {
      file = resolveFile(candidate, root);
    } catch (error) {
      if (error instanceof NotFoundError) {
        continue;
      }
      throw error;
    }
    if ((await fs.stat(file.absolutePath)).isFile()) {
      return file;
    }
  }
  return undefined;
}

/**
 * Recursively collect Markdown files under `directory`. Dot directories,
 * node_modules and symlinks are skipped.
 */
export async function buildTree(directory: string, root: string): Promise<DirectoryEntry> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: FileEntry[] = [];
  const subdirs: DirectoryEntry[] = [];

  for (const entry of entries) {
    const absolutePath = path.join(directory, entry.name);
    if (entry.isFile() && isMarkdownPath(entry.name)) {
      const stats = await fs.stat(absolutePath);
      files.push({
        name: entry.name,
        path: toPosixPath(path.relative(root, absolutePath)),
        size: stats.size,
        modified: stats.mtimeMs / 1000,
      });
    } else if (entry.isDirectory() && !entry.name.startsWith(".") && !SKIPPED_DIRECTORIES.has(entry.name)) {
      subdirs.push(await buildTree(absolutePath, root));
    }
  }

  const relative = toPosixPath(path.relative(root, directory));
  return { name: path.basename(directory), path: relative === "" ? "." : relative, files, subdirs };
}

export function flattenTree(tree: DirectoryEntry): FileEntry[] {
  return [...tree.files, ...tree.subdirs.flatMap(flattenTree)];
}

let liveReloadScript: Promise<string> | undefined;

function loadLiveReloadScript(): Promise<string> {
  liveReloadScript ??= fs.readFile(fileURLToPath(LIVE_RELOAD_SCRIPT_URL), "utf-8").catch((error: unknown) => {
    liveReloadScript = undefined;
    throw error;
  });
  return liveReloadScript;
}

// =============================================================================
// Guards
// =============================================================================

function requireFileMode(state: ServerState): HandlerResponse | undefined {
  return state.mode === "file"
    ? undefined
    : json(403, { error: "/api/raw is only available when serving a single file" });
}

function requireDirectoryMode(state: ServerState): HandlerResponse | undefined {
  return state.mode === "directory" ? undefined : json(404, { error: "Not available in single file mode" });
}

// =============================================================================
// Handlers
// =============================================================================

export async function handleIndex({ state }: RequestContext): Promise<HandlerResponse> {
  if (state.mode === "file") {
    return renderDocument(state, servedFile(state));
  }

  const index = await findIndexDocument(state.validationRoot);
  if (index) {
    return renderDocument(state, index);
  }

  const tree = await buildTree(state.validationRoot, state.validationRoot);
  const title = path.basename(state.validationRoot);
  return html(
    renderPage({
      title,
      body: renderFileList(
        title,
        flattenTree(tree).map((file) => file.path)
      ),
      theme: state.config.theme,
      reloadEnabled: state.config.reloadEnabled,
      documentPath: null,
    })
  );
}

export async function handleView({ state }: RequestContext, file: ResolvedFile): Promise<HandlerResponse> {
  if (!isMarkdownPath(file.absolutePath)) {
    return json(400, { error: "Only Markdown files (.md, .markdown) can be viewed" });
  }
  return renderDocument(state, file);
}

export async function handleFileTree({ state }: RequestContext): Promise<HandlerResponse> {
  const tree = await buildTree(state.validationRoot, state.validationRoot);
  return json(200, { files: flattenTree(tree), tree });
}

export async function handleFileMetadata({ state }: RequestContext, file: ResolvedFile): Promise<HandlerResponse> {
  const content = await readTextFile(file.absolutePath, state.config.maxFileSizeBytes);
  const stats = await fs.stat(file.absolutePath);

  const metadata: FileMetadata = {
    path: file.relativePath,
    name: path.basename(file.absolutePath),
    size: stats.size,
    modified: stats.mtimeMs / 1000,
    contentHash: hashContent(content),
    isMarkdown: isMarkdownPath(file.absolutePath),
  };
  return json(200, metadata);
}

async function rawResponse(state: ServerState, file: ResolvedFile): Promise<HandlerResponse> {
  if (!isMarkdownPath(file.absolutePath)) {
    return json(400, { error: "Only Markdown files (.md, .markdown) are supported by /api/raw" });
  }
  const content = await readTextFile(file.absolutePath, state.config.maxFileSizeBytes);
  const name = path.basename(file.absolutePath).replace(/["\\\r\n]/g, "_");
  return text(200, content, { "Content-Disposition": `inline; filename="${name}"` });
}

export async function handleRawServedFile({ state }: RequestContext): Promise<HandlerResponse> {
  return rawResponse(state, servedFile(state));
}

export async function handleRawFile({ state }: RequestContext, file: ResolvedFile): Promise<HandlerResponse> {
  return rawResponse(state, file);
}

export async function handleLiveReloadScript(): Promise<HandlerResponse> {
  return {
    status: 200,
    headers: { "Content-Type": "application/javascript; charset=utf-8", "Cache-Control": "no-cache" },
    body: await loadLiveReloadScript(),
  };
}

export async function handleHealth({ state }: RequestContext): Promise<HandlerResponse> {
  return json(200, {
    status: "ok",
    connections: state.registry.count(),
    liveReload: state.watcher?.running ?? false,
  });
}

// =============================================================================
// Route table
// =============================================================================

export function createRoutes(state: ServerState): Route[] {
  const routes: Route[] = [
    { kind: "exact", method: "GET", path: "/", handler: handleIndex },
    { kind: "file", method: "GET", prefix: "/view/", handler: handleView },
    { kind: "exact", method: "GET", path: "/api/files", guard: requireDirectoryMode, handler: handleFileTree },
    { kind: "file", method: "GET", prefix: "/api/file/", handler: handleFileMetadata },
    { kind: "exact", method: "GET", path: "/api/raw", guard: requireFileMode, handler: handleRawServedFile },
    { kind: "file", method: "GET", prefix: "/api/raw/", guard: requireFileMode, handler: handleRawFile },
    { kind: "exact", method: "GET", path: "/health", handler: handleHealth },
  ];

  if (state.config.reloadEnabled) {
    routes.push({ kind: "exact", method: "GET", path: LIVE_RELOAD_SCRIPT_PATH, handler: handleLiveReloadScript });
  }

  return routes;
}

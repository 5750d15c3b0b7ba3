import { createHash } from "node:crypto";
import { LRUCache } from "lru-cache";

import { DEFAULT_RENDER_CACHE_SIZE } from "../config/defaults.js";
import type { Renderer, RenderResult } from "./renderer.js";

export interface RenderCacheConfig {
  /** Maximum cached documents (default: 128) */
  maxSize: number;
}

export function hashContent(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Bounded LRU of render results keyed by content hash. Paths are tracked only
 * so a watcher event can invalidate what was last rendered for a file.
 */
export class RenderCache {
  private readonly cache: LRUCache<string, RenderResult>;
  private readonly pathHashes = new Map<string, string>();

  constructor(config: Partial<RenderCacheConfig> = {}) {
    this.cache = new LRUCache<string, RenderResult>({
      max: config.maxSize ?? DEFAULT_RENDER_CACHE_SIZE,
    });
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Return the cached render of `content`, rendering on a miss.
   */
  render(filePath: string, content: string, renderer: Renderer): RenderResult {
    const hash = hashContent(content);
    this.pathHashes.set(filePath, hash);

    const cached = this.cache.get(hash);
    if (cached) {
      return cached;
    }

    const result = renderer.render(content);
    this.cache.set(hash, result);
    return result;
  }

  /**
   * Drop whatever was last rendered for `filePath`.
   *
   * @returns whether a cached entry was removed
   */
  invalidate(filePath: string): boolean {
    const hash = this.pathHashes.get(filePath);
    if (hash === undefined) {
      return false;
    }
    this.pathHashes.delete(filePath);
    return this.cache.delete(hash);
  }

  clear(): void {
    this.cache.clear();
    this.pathHashes.clear();
  }
}

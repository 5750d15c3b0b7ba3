/**
 * Markdown Renderer
 *
 * marked-based Markdown to HTML conversion with heading ids, a table of
 * contents and gray-matter frontmatter extraction.
 *
 * @module render/renderer
 */

import matter from "gray-matter";
import { Marked, type Tokens } from "marked";

import { createSilentLogger } from "../logger/factory.js";
import type { Logger } from "../logger/logger.js";

// =============================================================================
// Types
// =============================================================================

export interface TocEntry {
  /** Heading depth, 1-6 */
  readonly level: number;
  readonly text: string;
  /** Anchor id written on the heading element */
  readonly id: string;
}

export interface RenderResult {
  readonly html: string;
  readonly toc: readonly TocEntry[];
  readonly frontmatter: Readonly<Record<string, unknown>>;
}

/**
 * Converts Markdown text to HTML. Implementations must be synchronous and pure.
 */
export interface Renderer {
  render(markdown: string): RenderResult;
}

export interface MarkedRendererOptions {
  /** Treat single newlines as <br> (default: false) */
  readonly breaks?: boolean;
  readonly logger?: Logger;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Strip inline Markdown syntax, leaving readable text.
 */
export function stripInlineMarkdown(text: string): string {
  return text
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/<[^>]*>/g, "")
    .replace(/[*_`~]/g, "")
    .trim();
}

/**
 * GitHub-style anchor slug.
 */
export function slugify(text: string): string {
  const slug = stripInlineMarkdown(text)
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
  return slug === "" ? "section" : slug;
}

// =============================================================================
// MarkedRenderer
// =============================================================================

/**
 * Default {@link Renderer}: GFM via marked, YAML frontmatter via gray-matter.
 *
 * @example
 * ```typescript
 * const renderer = new MarkedRenderer();
 * const { html, toc } = renderer.render("# Intro\n\nHello");
 * // html: '<h1 id="intro">Intro</h1>\n<p>Hello</p>\n'
 * // toc:  [{ level: 1, text: "Intro", id: "intro" }]
 * ```
 */
export class MarkedRenderer implements Renderer {
  private readonly marked: Marked;
  private readonly logger: Logger;
  private toc: TocEntry[] = [];
  private slugCounts = new Map<string, number>();

  constructor(options: MarkedRendererOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    const collect = (depth: number, text: string): string => this.collectHeading(depth, text);

    this.marked = new Marked({
      gfm: true,
      breaks: options.breaks ?? false,
      renderer: {
        heading({ tokens, depth, text }: Tokens.Heading): string {
          const id = collect(depth, text);
          return `<h${depth} id="${id}">${this.parser.parseInline(tokens)}</h${depth}>\n`;
        },
      },
    });
  }

  render(markdown: string): RenderResult {
    const { content, frontmatter } = this.extractFrontmatter(markdown);

    this.toc = [];
    this.slugCounts = new Map();
    const html = this.marked.parser(this.marked.lexer(content));
    const toc = this.toc;
    this.toc = [];

    return { html, toc, frontmatter };
  }

  private extractFrontmatter(markdown: string): { content: string; frontmatter: Record<string, unknown> } {
    if (!markdown.startsWith("---")) {
      return { content: markdown, frontmatter: {} };
    }

    try {
      // passing options skips gray-matter's unbounded input cache
      const parsed = matter(markdown, {});
      return { content: parsed.content, frontmatter: { ...parsed.data } };
    } catch (error) {
      this.logger.warn("Malformed frontmatter, rendering document as-is", { error });
      return { content: markdown, frontmatter: {} };
    }
  }

  private collectHeading(depth: number, text: string): string {
    const base = slugify(text);
    const seen = this.slugCounts.get(base) ?? 0;
    this.slugCounts.set(base, seen + 1);
    const id = seen === 0 ? base : `${base}-${seen}`;

    this.toc.push({ level: depth, text: stripInlineMarkdown(text), id });
    return id;
  }
}

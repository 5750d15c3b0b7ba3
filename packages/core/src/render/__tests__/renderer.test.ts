import { describe, expect, it } from "vitest";
import { Logger } from "../../logger/logger.js";
import type { LogEntry } from "../../logger/types.js";
import { MarkedRenderer, slugify, stripInlineMarkdown } from "../index.js";

describe("MarkedRenderer", () => {
  it("should render headings with ids and collect a toc", () => {
    const result = new MarkedRenderer().render("# Intro\n\nHello");

    expect(result.html).toBe('<h1 id="intro">Intro</h1>\n<p>Hello</p>\n');
    expect(result.toc).toEqual([{ level: 1, text: "Intro", id: "intro" }]);
    expect(result.frontmatter).toEqual({});
  });

  it("should keep inline markup in the heading but not in the toc", () => {
    const result = new MarkedRenderer().render("## Hello *world*");

    expect(result.html).toBe('<h2 id="hello-world">Hello <em>world</em></h2>\n');
    expect(result.toc).toEqual([{ level: 2, text: "Hello world", id: "hello-world" }]);
  });

  it("should suffix duplicate heading ids", () => {
    const result = new MarkedRenderer().render("## Setup\n\n## Setup\n\n## Setup");

    expect(result.toc.map((entry) => entry.id)).toEqual(["setup", "setup-1", "setup-2"]);
  });

  it("should start every render with fresh heading state", () => {
    const renderer = new MarkedRenderer();
    renderer.render("# Setup");

    expect(renderer.render("# Setup").toc).toEqual([{ level: 1, text: "Setup", id: "setup" }]);
  });

  it("should extract YAML frontmatter", () => {
    const result = new MarkedRenderer().render("---\ntitle: Guide\ntags: [a, b]\n---\n# Guide\n");

    expect(result.frontmatter).toEqual({ title: "Guide", tags: ["a", "b"] });
    expect(result.html).toBe('<h1 id="guide">Guide</h1>\n');
  });

  it("should render the whole document when frontmatter is malformed", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: "warn", transports: [{ log: (entry) => entries.push(entry) }] });

    const result = new MarkedRenderer({ logger }).render("---\ntitle: [unclosed\n---\n\n# Body\n");

    expect(result.frontmatter).toEqual({});
    expect(result.html).toContain('<h1 id="body">Body</h1>');
    expect(entries.map((e) => e.message)).toEqual(["Malformed frontmatter, rendering document as-is"]);
  });

  it("should render GFM tables", () => {
    const result = new MarkedRenderer().render("| a |\n|---|\n| 1 |\n");

    expect(result.html).toContain("<table>");
    expect(result.html).toContain("<td>1</td>");
  });
});

describe("slugify", () => {
  it("should produce GitHub-style anchors", () => {
    expect(slugify("Hello, World!")).toBe("hello-world");
    expect(slugify("Café au lait")).toBe("café-au-lait");
    expect(slugify("Use `npm test`")).toBe("use-npm-test");
  });

  it("should fall back for empty slugs", () => {
    expect(slugify("!!!")).toBe("section");
  });
});

describe("stripInlineMarkdown", () => {
  it("should keep link text and drop markup", () => {
    expect(stripInlineMarkdown("See [the guide](guide.md) **now**")).toBe("See the guide now");
  });
});

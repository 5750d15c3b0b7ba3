import { describe, expect, it } from "vitest";
import { encodePathForUrl, escapeHtml, renderFileList, renderPage } from "../template.js";

describe("escapeHtml", () => {
  it("should escape markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;"
    );
  });
});

describe("encodePathForUrl", () => {
  it("should encode segments and keep slashes", () => {
    expect(encodePathForUrl("my docs/a#b.md")).toBe("my%20docs/a%23b.md");
  });
});

describe("renderPage", () => {
  it("should escape the title and document path", () => {
    const page = renderPage({
      title: "<script>",
      body: "<p>ok</p>",
      theme: "dark",
      reloadEnabled: false,
      documentPath: 'a"b.md',
    });

    expect(page).toContain("<title>&lt;script&gt;</title>");
    expect(page).toContain('<meta name="mdlive-path" content="a&quot;b.md">');
    expect(page).toContain('<html lang="en" data-theme="dark">');
    expect(page).toContain("<article>\n<p>ok</p>\n</article>");
  });

  it("should render a table of contents only for two or more headings", () => {
    const single = renderPage({
      title: "T",
      body: "",
      theme: "light",
      reloadEnabled: false,
      documentPath: null,
      toc: [{ level: 1, text: "One", id: "one" }],
    });
    const multiple = renderPage({
      title: "T",
      body: "",
      theme: "light",
      reloadEnabled: false,
      documentPath: null,
      toc: [
        { level: 1, text: "One", id: "one" },
        { level: 2, text: "Two", id: "two" },
      ],
    });

    expect(single).not.toContain('<nav class="toc">');
    expect(multiple).toContain(
      '<nav class="toc"><ul><li style="margin-left:0em"><a href="#one">One</a></li><li style="margin-left:1em"><a href="#two">Two</a></li></ul></nav>'
    );
  });
});

describe("renderFileList", () => {
  it("should say when there is nothing to list", () => {
    expect(renderFileList("docs", [])).toBe("<h1>docs</h1>\n<p>No Markdown files found.</p>");
  });

  it("should link every file through /view/", () => {
    expect(renderFileList("docs", ["a.md", "sub/b.md"])).toBe(
      '<h1>docs</h1>\n<ul>\n<li><a href="/view/a.md">a.md</a></li>\n<li><a href="/view/sub/b.md">sub/b.md</a></li>\n</ul>'
    );
  });
});

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundError, SecurityError } from "../../errors/index.js";
import { canonicalizePath, isContained, isSafePath, validatePath } from "../index.js";

describe("validatePath", () => {
  let baseDir: string;
  let root: string;
  let outside: string;

  beforeEach(() => {
    baseDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "mdlive-path-test-")));
    root = path.join(baseDir, "root");
    outside = path.join(baseDir, "outside");
    fs.mkdirSync(path.join(root, "guide"), { recursive: true });
    fs.mkdirSync(outside);
    fs.writeFileSync(path.join(root, "readme.md"), "# hi");
    fs.writeFileSync(path.join(root, "guide", "intro.md"), "# intro");
    fs.writeFileSync(path.join(outside, "secret.md"), "secret");
  });

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  describe("paths inside root", () => {
    it("should return the absolute path of an existing file", () => {
      expect(validatePath("readme.md", root)).toBe(path.join(root, "readme.md"));
      expect(validatePath("guide/intro.md", root)).toBe(path.join(root, "guide", "intro.md"));
    });

    it("should allow the root itself", () => {
      expect(validatePath(".", root)).toBe(root);
      expect(validatePath("", root)).toBe(root);
    });

    it("should allow .. segments that stay inside root", () => {
      expect(validatePath("guide/../readme.md", root)).toBe(path.join(root, "readme.md"));
    });

    it("should throw NotFoundError for missing files", () => {
      expect(() => validatePath("missing.md", root)).toThrow(NotFoundError);
      expect(() => validatePath("guide/nested/missing.md", root)).toThrow(NotFoundError);
    });

    it("should allow a symlink whose target is inside root", () => {
      fs.symlinkSync(path.join(root, "readme.md"), path.join(root, "alias.md"));

      expect(validatePath("alias.md", root)).toBe(path.join(root, "readme.md"));
    });
  });

  describe("traversal", () => {
    it("should reject .. escaping to an existing file", () => {
      expect(() => validatePath("../outside/secret.md", root)).toThrow(SecurityError);
    });

    it("should reject .. escaping to a missing file", () => {
      expect(() => validatePath("../outside/nothing.md", root)).toThrow(SecurityError);
      expect(() => validatePath("guide/../../../nowhere", root)).toThrow(SecurityError);
    });

    it("should reject absolute paths outside root", () => {
      expect(() => validatePath(path.join(outside, "secret.md"), root)).toThrow(SecurityError);
    });

    it("should reject a sibling sharing the root's name as prefix", () => {
      const sibling = `${root}-evil`;
      fs.mkdirSync(sibling);
      fs.writeFileSync(path.join(sibling, "x.md"), "x");

      expect(() => validatePath("../root-evil/x.md", root)).toThrow(SecurityError);
    });

    it("should reject NUL bytes", () => {
      expect(() => validatePath("readme.md\0.png", root)).toThrow(SecurityError);
    });

    it("should not expose the resolved path in the message", () => {
      expect(() => validatePath("../outside/secret.md", root)).toThrow(
        "Access denied: path is outside the serve root"
      );
    });
  });

  describe("symlinks", () => {
    it("should reject a file symlink pointing outside root", () => {
      fs.symlinkSync(path.join(outside, "secret.md"), path.join(root, "leak.md"));

      expect(() => validatePath("leak.md", root)).toThrow(SecurityError);
    });

    it("should reject paths through a directory symlink pointing outside root", () => {
      fs.symlinkSync(outside, path.join(root, "escape"));

      expect(() => validatePath("escape/secret.md", root)).toThrow(SecurityError);
      expect(() => validatePath("escape/missing.md", root)).toThrow(SecurityError);
    });

    it("should collapse link/.. lexically before following the link", () => {
      fs.symlinkSync(outside, path.join(root, "escape"));

      expect(validatePath("escape/../readme.md", root)).toBe(path.join(root, "readme.md"));
    });

    it("should reject a dangling symlink pointing outside root", () => {
      fs.symlinkSync(path.join(outside, "later.md"), path.join(root, "dangling.md"));

      expect(() => validatePath("dangling.md", root)).toThrow(SecurityError);
    });

    it("should treat symlink loops as a security failure", () => {
      fs.symlinkSync(path.join(root, "loop-b"), path.join(root, "loop-a"));
      fs.symlinkSync(path.join(root, "loop-a"), path.join(root, "loop-b"));

      expect(() => validatePath("loop-a", root)).toThrow(SecurityError);
    });

    it("should canonicalize a root given through a symlink", () => {
      const rootLink = path.join(baseDir, "root-link");
      fs.symlinkSync(root, rootLink);

      expect(validatePath("readme.md", rootLink)).toBe(path.join(root, "readme.md"));
    });
  });
});

describe("isSafePath", () => {
  let root: string;

  beforeEach(() => {
    root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "mdlive-safe-test-")));
    fs.writeFileSync(path.join(root, "a.md"), "a");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("should return booleans instead of throwing", () => {
    expect(isSafePath("a.md", root)).toBe(true);
    expect(isSafePath("b.md", root)).toBe(false);
    expect(isSafePath("../etc/passwd", root)).toBe(false);
  });
});

describe("isContained", () => {
  it("should compare by path segments, not string prefix", () => {
    expect(isContained("/srv/docs", "/srv/docs")).toBe(true);
    expect(isContained("/srv/docs/a/b.md", "/srv/docs")).toBe(true);
    expect(isContained("/srv/docs-old/a.md", "/srv/docs")).toBe(false);
    expect(isContained("/srv", "/srv/docs")).toBe(false);
  });

  it("should accept file names beginning with two dots", () => {
    expect(isContained("/srv/docs/..notes.md", "/srv/docs")).toBe(true);
  });
});

describe("canonicalizePath", () => {
  it("should keep missing segments under a canonical ancestor", () => {
    const base = fs.realpathSync(os.tmpdir());
    expect(canonicalizePath(path.join(base, "mdlive-missing-dir", "x", "y.md"))).toBe(
      path.join(base, "mdlive-missing-dir", "x", "y.md")
    );
  });
});

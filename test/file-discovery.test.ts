import { describe, it, expect, afterEach } from "vitest";
import { join, resolve } from "node:path";
import { tmpdir } from "node:os";
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { discoverFiles, type DiscoveryOptions } from "../src/file-discovery.js";
import { DEFAULTS } from "../src/config.js";
import { RootNotFoundError, type Diagnostic } from "../src/types.js";

const PY_PROJECT = resolve(import.meta.dirname, "fixtures/py-project");

const options = (overrides: Partial<DiscoveryOptions> = {}): DiscoveryOptions => ({
  include: [],
  exclude: [],
  extensions: DEFAULTS.extensions,
  ...overrides,
});

describe("discoverFiles", () => {
  it("finds supported files and skips excluded directories", () => {
    const found = discoverFiles(PY_PROJECT, options());
    expect(found.rootDir).toBe(PY_PROJECT);
    expect(found.files).toEqual([
      "app/__init__.py",
      "app/models/user.py",
      "app/services/report.py",
      "app/utils/helpers.py",
      "broken.py",
      "main.py",
      "tests/test_helpers.py",
    ]);
    expect(found.skipped).toEqual(["README.md"]);
  });

  it("applies include globs", () => {
    const found = discoverFiles(PY_PROJECT, options({ include: ["app/**"] }));
    expect(found.files).toEqual([
      "app/__init__.py",
      "app/models/user.py",
      "app/services/report.py",
      "app/utils/helpers.py",
    ]);
    expect(found.skipped).toEqual([]);
  });

  it("applies exclude globs", () => {
    const found = discoverFiles(PY_PROJECT, options({ exclude: ["tests/**", "broken.py"] }));
    expect(found.files).toEqual([
      "app/__init__.py",
      "app/models/user.py",
      "app/services/report.py",
      "app/utils/helpers.py",
      "main.py",
    ]);
  });

  it("moves files outside the extension allow-list to skipped", () => {
    const found = discoverFiles(PY_PROJECT, options({ extensions: [".ts"] }));
    expect(found.files).toEqual([]);
    expect(found.skipped).toEqual([
      "README.md",
      "app/__init__.py",
      "app/models/user.py",
      "app/services/report.py",
      "app/utils/helpers.py",
      "broken.py",
      "main.py",
      "tests/test_helpers.py",
    ]);
  });

  it("rejects a missing root", () => {
    expect(() => discoverFiles(join(PY_PROJECT, "does-not-exist"), options())).toThrow(RootNotFoundError);
  });

  it("rejects a root that is a file", () => {
    expect(() => discoverFiles(join(PY_PROJECT, "main.py"), options())).toThrow(RootNotFoundError);
  });
});

describe("discoverFiles on a scratch tree", () => {
  let tmpRoot = "";

  afterEach(() => {
    if (tmpRoot) rmSync(tmpRoot, { recursive: true, force: true });
    tmpRoot = "";
  });

  function scratch(files: Record<string, string>): string {
    tmpRoot = mkdtempSync(join(tmpdir(), "source-atlas-discovery-"));
    const root = join(tmpRoot, "project");
    mkdirSync(root);
    for (const [rel, content] of Object.entries(files)) {
      const abs = join(root, rel);
      mkdirSync(resolve(abs, ".."), { recursive: true });
      writeFileSync(abs, content);
    }
    return root;
  }

  it("leaves declaration files out", () => {
    const root = scratch({
      "src/a.ts": "export const a = 1;\n",
      "src/types.d.ts": "declare const x: number;\n",
      "src/b.js": "module.exports = {};\n",
    });
    const found = discoverFiles(root, options());
    expect(found.files).toEqual(["src/a.ts", "src/b.js"]);
    expect(found.skipped).toEqual(["src/types.d.ts"]);
  });

  it("does not loop on a symlink cycle", () => {
    const root = scratch({ "pkg/mod.py": "x = 1\n" });
    symlinkSync(root, join(root, "pkg", "loop"));
    const found = discoverFiles(root, options());
    expect(found.files).toEqual(["pkg/mod.py"]);
  });

  it("reports symlinks that leave the root", () => {
    const root = scratch({ "main.py": "x = 1\n" });
    writeFileSync(join(tmpRoot, "outside.py"), "y = 2\n");
    symlinkSync(join(tmpRoot, "outside.py"), join(root, "linked.py"));
    const diagnostics: Diagnostic[] = [];
    const found = discoverFiles(root, options(), diagnostics);
    expect(found.files).toEqual(["main.py"]);
    expect(diagnostics.map((d) => [d.level, d.message])).toEqual([
      ["info", "Symlink linked.py points outside the root; skipped"],
    ]);
  });
});

// src/file-discovery.ts — File Discovery
// Walks the root directory, honoring default excluded directories, the
// extension allow-list and include/exclude globs (picomatch).

import { readdirSync, realpathSync, statSync } from "node:fs";
import { extname, join, relative, resolve, sep } from "node:path";
import picomatch from "picomatch";
import type { Diagnostic } from "./types.js";
import { DEFAULT_EXCLUDE_DIRS, DTS_EXTENSION, RootNotFoundError } from "./types.js";

export interface DiscoveryOptions {
  include: string[];
  exclude: string[];
  extensions: string[];
}

export interface DiscoveredFiles {
  /** Absolute root the paths are relative to */
  rootDir: string;
  /** Relative POSIX paths to analyze, sorted */
  files: string[];
  /** Relative POSIX paths with no supported extension, sorted */
  skipped: string[];
}

const EXCLUDED_DIRS: ReadonlySet<string> = new Set(DEFAULT_EXCLUDE_DIRS);

function toPosix(p: string): string {
  return sep === "/" ? p : p.split(sep).join("/");
}

/**
 * Discover analyzable files under `rootDir`. Throws RootNotFoundError when
 * the root is missing or not a directory; unreadable subdirectories are
 * reported and skipped.
 */
export function discoverFiles(
  rootDir: string,
  options: DiscoveryOptions,
  diagnostics: Diagnostic[] = [],
): DiscoveredFiles {
  const absRoot = resolve(rootDir);
  try {
    if (!statSync(absRoot).isDirectory()) throw new Error("not a directory");
  } catch (err: unknown) {
    throw new RootNotFoundError(absRoot, err instanceof Error ? err : undefined);
  }

  const found: string[] = [];
  const visited = new Set<number>(); // directory inodes, for symlink cycles
  visited.add(statSync(absRoot).ino);
  walkDirectory(absRoot, absRoot, found, visited, diagnostics);

  const isIncluded = options.include.length > 0 ? picomatch(options.include, { dot: true }) : null;
  const isExcluded = options.exclude.length > 0 ? picomatch(options.exclude, { dot: true }) : null;
  const extensions = new Set(options.extensions.map((e) => e.toLowerCase()));

  const files: string[] = [];
  const skipped: string[] = [];
  for (const abs of found) {
    const rel = toPosix(relative(absRoot, abs));
    if (isIncluded && !isIncluded(rel)) continue;
    if (isExcluded && isExcluded(rel)) continue;
    if (extensions.has(extname(rel).toLowerCase()) && !DTS_EXTENSION.test(rel)) files.push(rel);
    else skipped.push(rel);
  }

  return { rootDir: absRoot, files: files.sort(), skipped: skipped.sort() };
}

function walkDirectory(
  dir: string,
  rootDir: string,
  results: string[],
  visitedInodes: Set<number>,
  diagnostics: Diagnostic[],
): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    diagnostics.push({
      level: "warn",
      kind: "ReadFailure",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (EXCLUDED_DIRS.has(entry.name)) continue;
      walkDirectory(fullPath, rootDir, results, visitedInodes, diagnostics);
    } else if (entry.isSymbolicLink()) {
      try {
        const realPath = realpathSync(fullPath);
        const rel = relative(rootDir, realPath);
        if (rel.startsWith("..")) {
          diagnostics.push({
            level: "info",
            kind: "ReadFailure",
            module: "file-discovery",
            message: `Symlink ${toPosix(relative(rootDir, fullPath))} points outside the root; skipped`,
            file: fullPath,
          });
          continue;
        }
        const stat = statSync(realPath);
        if (stat.isDirectory()) {
          if (visitedInodes.has(stat.ino) || EXCLUDED_DIRS.has(entry.name)) continue;
          visitedInodes.add(stat.ino);
          walkDirectory(fullPath, rootDir, results, visitedInodes, diagnostics);
        } else if (stat.isFile()) {
          results.push(fullPath);
        }
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        diagnostics.push({
          level: "warn",
          kind: "ReadFailure",
          module: "file-discovery",
          message: `Cannot resolve symlink: ${msg}`,
          file: fullPath,
        });
      }
    } else if (entry.isFile()) {
      results.push(fullPath);
    }
  }
}

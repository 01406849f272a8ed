// src/dependency-graph.ts — Dependency Graph Builder
// Resolves each module's imports against the analyzed file set. Anything that
// does not resolve to an analyzed module and is not relative is external.

import { posix } from "node:path";
import type {
  DependencyEdge,
  DependencyGraph,
  Diagnostic,
  ImportRecord,
  ModuleInfo,
} from "./types.js";

/** `pkg/sub/mod.py` → `pkg.sub.mod`, `pkg/__init__.py` → `pkg` */
export function pythonModuleKey(path: string): string {
  const noExt = path.replace(/\.pyi?$/, "");
  const dotted = noExt.split("/").join(".");
  if (dotted === "__init__") return "";
  return dotted.endsWith(".__init__") ? dotted.slice(0, -".__init__".length) : dotted;
}

/** Top-level package of a bare specifier: `a.b` → `a`, `@s/p/x` → `@s/p` */
export function externalPackageName(specifier: string, language: ModuleInfo["language"]): string {
  if (language === "python") return specifier.split(".")[0];
  const parts = specifier.split("/");
  if (specifier.startsWith("@") && parts.length > 1) return `${parts[0]}/${parts[1]}`;
  return parts[0];
}

/**
 * Candidate paths for a relative TypeScript/JavaScript specifier, in
 * preference order. `.js` specifiers map to their `.ts` sources.
 */
function scriptCandidates(specifier: string): string[] {
  const jsMapped = /\.(m|c)?jsx?$/.exec(specifier);
  if (jsMapped) {
    const stem = specifier.slice(0, -jsMapped[0].length);
    const flavor = jsMapped[1] ?? "";
    return [
      `${stem}.${flavor}ts`,
      `${stem}.${flavor}tsx`.replace(/\.(m|c)tsx$/, ".tsx"),
      specifier,
    ];
  }
  if (/\.(m|c)?tsx?$/.test(specifier)) return [specifier];
  return [
    `${specifier}.ts`,
    `${specifier}.tsx`,
    `${specifier}/index.ts`,
    `${specifier}/index.tsx`,
    `${specifier}.js`,
    `${specifier}.jsx`,
    `${specifier}/index.js`,
    `${specifier}/index.jsx`,
  ];
}

interface Resolution {
  internal: number[];
  external: string[];
}

class Resolver {
  private readonly byPath = new Map<string, ModuleInfo>();
  private readonly pythonExact = new Map<string, ModuleInfo>();
  /** Every dotted suffix of every Python module key */
  private readonly pythonSuffix = new Map<string, ModuleInfo[]>();

  constructor(
    modules: readonly ModuleInfo[],
    private readonly diagnostics: Diagnostic[],
  ) {
    for (const mod of modules) {
      this.byPath.set(mod.path, mod);
      if (mod.language !== "python") continue;
      const key = pythonModuleKey(mod.path);
      if (!key) continue;
      this.pythonExact.set(key, mod);
      const parts = key.split(".");
      for (let i = 0; i < parts.length; i++) {
        const suffix = parts.slice(i).join(".");
        const list = this.pythonSuffix.get(suffix) ?? [];
        list.push(mod);
        this.pythonSuffix.set(suffix, list);
      }
    }
  }

  resolve(mod: ModuleInfo, imp: ImportRecord): Resolution {
    return mod.language === "python" ? this.resolvePython(mod, imp) : this.resolveScript(mod, imp);
  }

  private resolvePython(mod: ModuleInfo, imp: ImportRecord): Resolution {
    const members = imp.form === "member" ? imp.names.filter((n) => n !== "*") : [];

    if (imp.level > 0) {
      const pkg = posix.dirname(mod.path).split("/").filter((p) => p !== ".");
      const up = imp.level - 1;
      if (up > pkg.length) {
        this.unresolved(mod, imp);
        return { internal: [], external: [] };
      }
      const base = [...pkg.slice(0, pkg.length - up), ...(imp.specifier ? imp.specifier.split(".") : [])];
      const internal: number[] = [];
      let needBase = members.length === 0;
      for (const member of members) {
        const sub = this.pythonExact.get([...base, member].join("."));
        if (sub) internal.push(sub.id);
        else needBase = true;
      }
      if (needBase) {
        const target = this.pythonExact.get(base.join("."));
        if (target) internal.push(target.id);
        else if (internal.length === 0) this.unresolved(mod, imp);
      }
      return { internal: internal.filter((id) => id !== mod.id), external: [] };
    }

    const internal: number[] = [];
    let needBase = members.length === 0;
    for (const member of members) {
      const hit = this.pickPython(mod, `${imp.specifier}.${member}`);
      if (hit !== null) internal.push(hit);
      else needBase = true;
    }
    if (needBase) {
      const hit = this.pickPython(mod, imp.specifier);
      if (hit !== null) internal.push(hit);
      else if (internal.length === 0) {
        return { internal: [], external: [externalPackageName(imp.specifier, "python")] };
      }
    }
    return { internal, external: [] };
  }

  /** Suffix match with ambiguity handling; the importing module never matches itself. */
  private pickPython(mod: ModuleInfo, target: string): number | null {
    const candidates = (this.pythonSuffix.get(target) ?? []).filter((c) => c.id !== mod.id);
    if (candidates.length === 0) return null;
    if (candidates.length === 1) return candidates[0].id;

    const fromDir = posix.dirname(mod.path);
    const ranked = candidates
      .map((c) => ({ mod: c, distance: posix.relative(fromDir, c.path).split("/").length }))
      .sort((a, b) => a.distance - b.distance || (a.mod.path < b.mod.path ? -1 : 1));
    const chosen = ranked[0].mod;
    this.diagnostics.push({
      level: "warn",
      kind: "ResolutionAmbiguity",
      module: "dependency-graph",
      message: `Import "${target}" in ${mod.path} matches ${candidates.length} modules (${candidates
        .map((c) => c.path)
        .sort()
        .join(", ")}); using ${chosen.path}`,
      file: mod.path,
    });
    return chosen.id;
  }

  private resolveScript(mod: ModuleInfo, imp: ImportRecord): Resolution {
    if (!imp.specifier.startsWith(".")) {
      return { internal: [], external: [externalPackageName(imp.specifier, mod.language)] };
    }
    const fromDir = posix.dirname(mod.path);
    for (const candidate of scriptCandidates(imp.specifier)) {
      const target = posix.normalize(posix.join(fromDir, candidate));
      if (target.startsWith("../")) break;
      const hit = this.byPath.get(target);
      if (hit && hit.language !== "python") {
        return { internal: hit.id === mod.id ? [] : [hit.id], external: [] };
      }
    }
    this.unresolved(mod, imp);
    return { internal: [], external: [] };
  }

  private unresolved(mod: ModuleInfo, imp: ImportRecord): void {
    const spec = ".".repeat(imp.level) + imp.specifier;
    this.diagnostics.push({
      level: "warn",
      kind: "UnresolvedImport",
      module: "dependency-graph",
      message: `Relative import "${spec}" in ${mod.path} (line ${imp.line}) does not resolve to an analyzed module`,
      file: mod.path,
    });
  }
}

/**
 * Build internal and external dependency edges for every module. Edges are
 * de-duplicated per source module and never point back at their source.
 */
export function buildDependencyGraph(
  modules: readonly ModuleInfo[],
  diagnostics: Diagnostic[] = [],
): DependencyGraph {
  const resolver = new Resolver(modules, diagnostics);
  const edges: DependencyEdge[] = [];
  const external = new Set<string>();

  for (const mod of modules) {
    const seenInternal = new Set<number>();
    const seenExternal = new Set<string>();
    for (const imp of mod.imports) {
      const { internal, external: ext } = resolver.resolve(mod, imp);
      for (const target of internal) {
        if (target === mod.id || seenInternal.has(target)) continue;
        seenInternal.add(target);
        edges.push({ source: mod.id, kind: "internal", target });
      }
      for (const name of ext) {
        if (!name || seenExternal.has(name)) continue;
        seenExternal.add(name);
        external.add(name);
        edges.push({ source: mod.id, kind: "external", target: name });
      }
    }
  }

  return { edges, external: [...external].sort() };
}

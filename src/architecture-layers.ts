// src/architecture-layers.ts — Architecture Layer Classifier
// Labels each top-level directory with a layer and spots common layouts.

import type {
  ArchitectureLayer,
  ArchitecturePattern,
  ArchitectureSummary,
  LayerName,
  ModuleInfo,
  ProjectType,
} from "./types.js";

// Ordered: first keyword hit wins
const LAYER_KEYWORDS: { layer: LayerName; keywords: string[] }[] = [
  { layer: "interface", keywords: ["api", "server", "router", "endpoint"] },
  { layer: "data", keywords: ["model", "schema", "entity", "db", "database"] },
  { layer: "infrastructure", keywords: ["util", "helper", "lib", "common", "config"] },
  { layer: "presentation", keywords: ["ui", "view", "component"] },
  { layer: "test", keywords: ["test", "spec"] },
];

const PATTERN_DIRECTORIES: { pattern: ArchitecturePattern; directories: string[] }[] = [
  { pattern: "MVC", directories: ["models", "views", "controllers"] },
  { pattern: "Layered", directories: ["presentation", "business", "data", "services"] },
  { pattern: "Microservices", directories: ["services", "api", "gateway"] },
  { pattern: "Repository", directories: ["repositories", "models", "entities"] },
  { pattern: "Clean Architecture", directories: ["domain", "infrastructure", "application", "interface"] },
];

// A pattern needs two of its directories, and at least this share of them
const PATTERN_THRESHOLD = 0.5;

export function classifyDirectory(directory: string): LayerName {
  const lower = directory.toLowerCase();
  for (const { layer, keywords } of LAYER_KEYWORDS) {
    if (keywords.some((k) => lower.includes(k))) return layer;
  }
  return "business";
}

/**
 * Classify every top-level directory that holds analyzed modules. Files at the
 * root and dot-directories are not part of any layer.
 */
export function classifyArchitecture(modules: readonly ModuleInfo[]): ArchitectureSummary {
  const counts = new Map<string, number>();
  for (const mod of modules) {
    const parts = mod.path.split("/");
    if (parts.length < 2 || parts[0].startsWith(".")) continue;
    counts.set(parts[0], (counts.get(parts[0]) ?? 0) + 1);
  }
  const topLevel = new Set([...counts.keys()].map((d) => d.toLowerCase()));

  const layers: ArchitectureLayer[] = [...counts.keys()].sort().map((directory) => ({
    directory,
    layer: classifyDirectory(directory),
    fileCount: counts.get(directory) ?? 0,
  }));

  const patterns: ArchitecturePattern[] = [];
  for (const { pattern, directories } of PATTERN_DIRECTORIES) {
    const present = directories.filter((d) => topLevel.has(d)).length;
    if (present >= 2 && present / directories.length >= PATTERN_THRESHOLD) patterns.push(pattern);
  }

  return { layers, patterns };
}

const PYTHON_MARKERS = ["requirements.txt", "setup.py", "pyproject.toml"];

// Checked in order against external packages and lower-cased paths
const PYTHON_FRAMEWORKS: { type: ProjectType; keyword: string }[] = [
  { type: "Flask Web Application", keyword: "flask" },
  { type: "Django Web Application", keyword: "django" },
  { type: "FastAPI Application", keyword: "fastapi" },
  { type: "Streamlit Application", keyword: "streamlit" },
];

/**
 * Guess the kind of project from root-level marker files, file paths and the
 * external packages it imports. `paths` should hold every file seen, not only
 * the analyzed ones, since the markers are not source files.
 */
export function detectProjectType(paths: readonly string[], external: readonly string[]): ProjectType {
  const rootFiles = new Set(paths.filter((p) => !p.includes("/")));
  if (PYTHON_MARKERS.some((m) => rootFiles.has(m))) {
    if (rootFiles.has("app.py")) return "Flask Web Application";
    const lowerPaths = paths.map((p) => p.toLowerCase());
    for (const { type, keyword } of PYTHON_FRAMEWORKS) {
      if (external.includes(keyword) || lowerPaths.some((p) => p.includes(keyword))) return type;
    }
    return "Python Library/Package";
  }
  if (rootFiles.has("package.json")) return "Node.js Application";
  return "General Software Project";
}

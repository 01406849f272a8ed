// src/index.ts — Library API
// Two entry points: analyze() for a directory, analyzeSources() for in-memory files

import { readFile } from "node:fs/promises";
import { join, posix } from "node:path";
import type {
  AnalysisResult,
  AnalyzeOptions,
  AnalyzeSourcesOptions,
  Diagnostic,
  SourceInput,
} from "./types.js";
import { resolveConfig } from "./config.js";
import { discoverFiles } from "./file-discovery.js";
import { runPipeline, type FileJob } from "./pipeline.js";
import { languageFor } from "./tree-extractor.js";

// Re-export all public types
export type {
  AnalysisResult,
  AnalysisMeta,
  AnalysisLookup,
  AnalyzeOptions,
  AnalyzeSourcesOptions,
  ArchitectureLayer,
  ArchitecturePattern,
  ArchitectureSummary,
  CalleeNames,
  ClassCategory,
  ClassInfo,
  ClassRule,
  ComplexityRank,
  ComplexitySummary,
  DependencyEdge,
  DependencyGraph,
  Diagnostic,
  DiagnosticKind,
  ExtractResult,
  FlowChain,
  FlowLexicon,
  FlowNode,
  FlowOptions,
  FlowRole,
  FlowSubtype,
  FlowSubtypeRule,
  FunctionCategory,
  FunctionInfo,
  FunctionRule,
  ImportRecord,
  Language,
  LayerName,
  MethodKind,
  ModuleIndex,
  ModuleInfo,
  Overview,
  Parameter,
  ParseFailure,
  ProjectType,
  ResolvedConfig,
  RuleTables,
  SourceInput,
  SourceTree,
  SyntaxNode,
  ValidatorInfo,
} from "./types.js";

export {
  AnalysisCancelledError,
  AnalysisDecodeError,
  RootNotFoundError,
  ENGINE_VERSION,
} from "./types.js";
export { resolveConfig, DEFAULTS } from "./config.js";
export { discoverFiles } from "./file-discovery.js";
export { createTreeExtractor, extractTree, languageFor } from "./tree-extractor.js";
export { indexModule } from "./structural-indexer.js";
export { computeComplexity, complexityRank } from "./complexity.js";
export { classifyFunction, classifyClass, DEFAULT_RULE_TABLES } from "./role-classifier.js";
export { buildDependencyGraph } from "./dependency-graph.js";
export {
  inferFlowChains,
  assignFlowRoles,
  findValidators,
  flowSubtype,
  DEFAULT_FLOW_LEXICON,
  DEFAULT_FLOW_SUBTYPES,
} from "./flow-chains.js";
export { classifyArchitecture, detectProjectType } from "./architecture-layers.js";
export { serializeAnalysis, deserializeAnalysis } from "./serializer.js";

/**
 * Analyze every supported file under `options.rootDir`. A config file in the
 * root (or the `sourceAtlas` key of its package.json) is merged under the
 * given options.
 */
export async function analyze(options: AnalyzeOptions): Promise<AnalysisResult> {
  const { rootDir, configPath, signal, ...overrides } = options;
  const diagnostics: Diagnostic[] = [];
  const config = resolveConfig(overrides, diagnostics, { configPath, cwd: rootDir });
  const discovered = discoverFiles(rootDir, config, diagnostics);

  const jobs: FileJob[] = discovered.files.map((path) => ({
    path,
    load: () => readFile(join(discovered.rootDir, path)),
  }));

  return runPipeline(jobs, config, {
    rootDir: discovered.rootDir,
    skipped: discovered.skipped,
    diagnostics,
    signal,
  });
}

/**
 * Analyze in-memory sources. Paths are treated as relative POSIX paths;
 * entries with unsupported extensions are listed in `skippedFiles`.
 */
export async function analyzeSources(
  sources: readonly SourceInput[],
  options: AnalyzeSourcesOptions = {},
): Promise<AnalysisResult> {
  const { signal, ...overrides } = options;
  const diagnostics: Diagnostic[] = [];
  const config = resolveConfig(overrides, diagnostics, { search: false });
  const extensions = new Set(config.extensions.map((e) => e.toLowerCase()));

  const jobs: FileJob[] = [];
  const skipped: string[] = [];
  const seen = new Set<string>();
  for (const source of sources) {
    const path = posix.normalize(source.path.replace(/\\/g, "/")).replace(/^\.\//, "");
    if (seen.has(path)) continue;
    seen.add(path);
    if (!languageFor(path) || !extensions.has(posix.extname(path).toLowerCase())) {
      skipped.push(path);
      continue;
    }
    const content = source.content;
    jobs.push({ path, load: async () => content });
  }

  return runPipeline(jobs, config, { rootDir: null, skipped, diagnostics, signal });
}

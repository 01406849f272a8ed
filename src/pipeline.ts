// src/pipeline.ts — Pipeline Orchestrator
// Per-file work runs in a bounded pool. Aggregation waits for every file
// (one barrier) and then reads the finished tables only.

import pLimit from "p-limit";
import type {
  AnalysisResult,
  Diagnostic,
  ModuleIndex,
  ParseFailure,
  ResolvedConfig,
} from "./types.js";
import { AnalysisCancelledError, ENGINE_VERSION } from "./types.js";
import { createTreeExtractor } from "./tree-extractor.js";
import { indexModule } from "./structural-indexer.js";
import { assembleTables, buildLookup, buildOverview, summarizeComplexity } from "./analysis-builder.js";
import { buildDependencyGraph } from "./dependency-graph.js";
import { findValidators, inferFlowChains } from "./flow-chains.js";
import { classifyArchitecture, detectProjectType } from "./architecture-layers.js";

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export interface FileJob {
  /** Relative POSIX path */
  path: string;
  load(): Promise<string | Uint8Array>;
}

export interface PipelineContext {
  rootDir: string | null;
  skipped: string[];
  diagnostics: Diagnostic[];
  signal?: AbortSignal;
}

interface FileOutcome {
  path: string;
  index?: ModuleIndex;
  failure?: ParseFailure;
  diagnostics: Diagnostic[];
}

/**
 * Analyze a set of files. Rejects with AnalysisCancelledError if the signal
 * fires; nothing partial is returned in that case.
 */
export async function runPipeline(
  jobs: readonly FileJob[],
  config: ResolvedConfig,
  context: PipelineContext,
): Promise<AnalysisResult> {
  const startTime = performance.now();
  const { signal, diagnostics } = context;
  const verbose = config.verbose;
  const extractor = createTreeExtractor();
  const limit = pLimit(config.concurrency);
  let completed = 0;

  vlog(verbose, `Analyzing ${jobs.length} file(s) with concurrency ${config.concurrency}`);
  if (signal?.aborted) throw new AnalysisCancelledError(0);

  const processFile = async (job: FileJob): Promise<FileOutcome> => {
    const outcome: FileOutcome = { path: job.path, diagnostics: [] };
    if (signal?.aborted) return outcome;

    let content: string | Uint8Array;
    try {
      content = await job.load();
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      outcome.failure = { path: job.path, reason: `read failed: ${reason}` };
      outcome.diagnostics.push({
        level: "warn",
        kind: "ReadFailure",
        module: "pipeline",
        message: `Cannot read ${job.path}: ${reason}`,
        file: job.path,
      });
      return outcome;
    }

    const extracted = extractor.extract(job.path, content);
    if (!extracted.ok) {
      outcome.failure = extracted.failure;
      outcome.diagnostics.push({
        level: "warn",
        kind: "ParseFailure",
        module: "tree-extractor",
        message: `Skipping ${job.path}: ${extracted.failure.reason}`,
        file: job.path,
      });
    } else {
      outcome.index = indexModule(extracted.tree, config.rules);
    }
    completed++;
    vlog(verbose, `  [${completed}/${jobs.length}] ${job.path}`);
    return outcome;
  };

  const outcomes = await Promise.all(jobs.map((job) => limit(() => processFile(job))));

  // Barrier passed. A cancelled run publishes nothing.
  if (signal?.aborted) {
    vlog(verbose, `Cancelled after ${completed} file(s)`);
    throw new AnalysisCancelledError(completed);
  }

  outcomes.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const indexes: ModuleIndex[] = [];
  const parseFailures: ParseFailure[] = [];
  for (const outcome of outcomes) {
    diagnostics.push(...outcome.diagnostics);
    if (outcome.index) indexes.push(outcome.index);
    if (outcome.failure) parseFailures.push(outcome.failure);
  }

  const tables = assembleTables(indexes);
  vlog(verbose, `Indexed ${tables.modules.length} module(s), ${tables.classes.length} class(es), ${tables.functions.length} function(s)`);

  const dependencies = buildDependencyGraph(tables.modules, diagnostics);
  vlog(verbose, `  Dependency edges: ${dependencies.edges.length}`);

  const flows = inferFlowChains(
    tables.functions,
    {
      maxDepth: config.maxChainDepth,
      maxChainsPerEntry: config.maxChainsPerEntry,
      maxChains: config.maxChains,
      lexicon: config.flowLexicon,
    },
    diagnostics,
  );
  const validators = findValidators(tables.functions);
  vlog(verbose, `  Flow chains: ${flows.chains.length}, validators: ${validators.length}`);

  const architecture = classifyArchitecture(tables.modules);
  vlog(verbose, `  Layers: ${architecture.layers.length}, patterns: ${architecture.patterns.join(", ") || "none"}`);

  const seenPaths = [...jobs.map((j) => j.path), ...context.skipped];
  const projectType = detectProjectType(seenPaths, dependencies.external);

  return {
    meta: {
      engineVersion: ENGINE_VERSION,
      rootDir: context.rootDir,
      analyzedAt: new Date().toISOString(),
      timingMs: Math.round(performance.now() - startTime),
      ruleTableVersion: config.rules.version,
    },
    overview: buildOverview(tables, projectType),
    modules: tables.modules,
    classes: tables.classes,
    functions: tables.functions,
    dependencies,
    flowNodes: flows.nodes,
    flowChains: flows.chains,
    validators,
    architecture,
    complexity: summarizeComplexity(tables.functions, config.highComplexityThreshold),
    parseFailures,
    skippedFiles: [...context.skipped].sort(),
    diagnostics,
    lookup: buildLookup(tables),
  };
}

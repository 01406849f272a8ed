// src/types.ts — All shared types for the source analyzer

// ─── Top-level output ────────────────────────────────────────────────────────

/**
 * Everything one analysis run produces. Entities reference each other only by
 * integer ids, which are indices into `modules`, `classes` and `functions`.
 */
export interface AnalysisResult {
  meta: AnalysisMeta;
  overview: Overview;
  modules: ModuleInfo[];
  classes: ClassInfo[];
  functions: FunctionInfo[];
  dependencies: DependencyGraph;
  flowNodes: FlowNode[];
  /**
   * Candidate pipelines inferred from call names and declaration order.
   * These are heuristics: chains may contain false positives.
   */
  flowChains: FlowChain[];
  validators: ValidatorInfo[];
  architecture: ArchitectureSummary;
  complexity: ComplexitySummary;
  parseFailures: ParseFailure[];
  skippedFiles: string[];
  diagnostics: Diagnostic[];
  lookup: AnalysisLookup;
}

export interface AnalysisMeta {
  engineVersion: string;
  rootDir: string | null;
  analyzedAt: string;
  timingMs: number;
  ruleTableVersion: string;
}

export interface Overview {
  totalFiles: number;
  totalLines: number;
  totalClasses: number;
  totalFunctions: number;
  languages: Language[];
  projectType: ProjectType;
}

export type ProjectType =
  | "Flask Web Application"
  | "Django Web Application"
  | "FastAPI Application"
  | "Streamlit Application"
  | "Python Library/Package"
  | "Node.js Application"
  | "General Software Project";

export interface AnalysisLookup {
  /** Relative POSIX path → module id */
  modulesByPath: Record<string, number>;
  /** Bare function name → function ids, ascending */
  functionsByName: Record<string, number[]>;
}

export type Language = "python" | "typescript" | "javascript";

// ─── Diagnostics ─────────────────────────────────────────────────────────────

export type DiagnosticKind =
  | "ParseFailure"
  | "ResolutionAmbiguity"
  | "UnresolvedImport"
  | "DepthExceeded"
  | "ReadFailure"
  | "Config";

/** Collected rather than thrown; passed to every module. */
export interface Diagnostic {
  level: "info" | "warn" | "error";
  kind: DiagnosticKind;
  module: string;
  message: string;
  file?: string;
}

export interface ParseFailure {
  path: string;
  reason: string;
}

// ─── Lowered syntax tree ─────────────────────────────────────────────────────

export type SyntaxNode =
  | ClassNode
  | FunctionNode
  | ImportNode
  | ConditionalNode
  | LoopNode
  | HandlerNode
  | BooleanNode
  | FilterNode
  | TernaryNode
  | CallNode;

export interface ModuleNode {
  kind: "module";
  docstring: string | null;
  hasMainGuard: boolean;
  children: SyntaxNode[];
}

export interface ClassNode {
  kind: "class";
  name: string;
  line: number;
  endLine: number;
  docstring: string | null;
  bases: string[];
  decorators: string[];
  children: SyntaxNode[];
}

export interface FunctionNode {
  kind: "function";
  name: string;
  line: number;
  endLine: number;
  isAsync: boolean;
  params: Parameter[];
  returnType: string | null;
  docstring: string | null;
  decorators: string[];
  /** TypeScript `static` modifier */
  isStatic: boolean;
  /** TypeScript get/set accessor */
  isAccessor: boolean;
  children: SyntaxNode[];
}

export interface ImportNode {
  kind: "import";
  specifier: string;
  level: number;
  form: ImportForm;
  names: string[];
  line: number;
}

export interface ConditionalNode {
  kind: "conditional";
  line: number;
  children: SyntaxNode[];
}

export interface LoopNode {
  kind: "loop";
  line: number;
  children: SyntaxNode[];
}

export interface HandlerNode {
  kind: "handler";
  line: number;
  children: SyntaxNode[];
}

/** One short-circuit operator occurrence (`and`, `or`, `&&`, `||`, `??`) */
export interface BooleanNode {
  kind: "boolean";
  operator: string;
  line: number;
  children: SyntaxNode[];
}

/** Comprehension `if` clause */
export interface FilterNode {
  kind: "filter";
  line: number;
  children: SyntaxNode[];
}

export interface TernaryNode {
  kind: "ternary";
  line: number;
  children: SyntaxNode[];
}

export interface CallNode {
  kind: "call";
  /** Dotted callee text, or null when the callee is not a name chain */
  callee: string | null;
  line: number;
  children: SyntaxNode[];
}

export interface SourceTree {
  path: string;
  language: Language;
  lineCount: number;
  root: ModuleNode;
}

export type ExtractResult =
  | { ok: true; tree: SourceTree }
  | { ok: false; failure: ParseFailure };

// ─── Structural records ──────────────────────────────────────────────────────

export type ImportForm = "module" | "member";

export interface ImportRecord {
  specifier: string;
  level: number;
  form: ImportForm;
  names: string[];
  line: number;
}

export interface Parameter {
  name: string;
  type: string | null;
  defaultValue: string | null;
}

export interface ModuleInfo {
  id: number;
  path: string;
  name: string;
  language: Language;
  docstring: string | null;
  lineCount: number;
  imports: ImportRecord[];
  classIds: number[];
  functionIds: number[];
  isMain: boolean;
  hasMainGuard: boolean;
}

export type ClassCategory =
  | "Model"
  | "Pipeline"
  | "Generator"
  | "Analyzer"
  | "Entity"
  | "Service"
  | "General";

export interface ClassInfo {
  id: number;
  name: string;
  moduleId: number;
  file: string;
  line: number;
  endLine: number;
  docstring: string | null;
  bases: string[];
  methods: string[];
  methodIds: number[];
  decorators: string[];
  category: ClassCategory;
  parentClassId: number | null;
  parentFunctionId: number | null;
  isAbstract: boolean;
  isException: boolean;
}

export type FunctionCategory =
  | "Dunder"
  | "Entry_Point"
  | "Private"
  | "Getter"
  | "Setter"
  | "Creator"
  | "Processor"
  | "General";

export type MethodKind = "instance" | "class" | "static" | "property";

export interface FunctionInfo {
  id: number;
  name: string;
  qualifiedName: string;
  moduleId: number;
  file: string;
  line: number;
  endLine: number;
  params: Parameter[];
  returnType: string | null;
  docstring: string | null;
  decorators: string[];
  isAsync: boolean;
  complexity: number;
  category: FunctionCategory;
  /** Callee names as written, sorted and de-duplicated */
  calls: string[];
  classId: number | null;
  parentFunctionId: number | null;
  methodKind: MethodKind | null;
  isStaticLike: boolean;
}

/**
 * Output of indexing a single file. Ids are local to the file (module id 0,
 * class and function ids from 0) until the builder rebases them.
 */
export interface ModuleIndex {
  module: ModuleInfo;
  classes: ClassInfo[];
  functions: FunctionInfo[];
}

// ─── Dependencies ────────────────────────────────────────────────────────────

export type DependencyEdge =
  | { source: number; kind: "internal"; target: number }
  | { source: number; kind: "external"; target: string };

export interface DependencyGraph {
  edges: DependencyEdge[];
  /** Sorted union of external package names */
  external: string[];
}

// ─── Flows ───────────────────────────────────────────────────────────────────

export type FlowRole = "EntryPoint" | "Transformation" | "Output" | "DataStore";

export type TransformationSubtype =
  | "parser"
  | "cleaner"
  | "converter"
  | "filter"
  | "aggregator"
  | "validator"
  | "processor";

export type OutputSubtype = "storage" | "export" | "communication" | "presentation" | "logging" | "output";

export type DataStoreSubtype = "file_reader" | "data_fetcher" | "query_engine" | "connector" | "data_accessor";

export type FlowSubtype = TransformationSubtype | OutputSubtype | DataStoreSubtype;

export interface FlowNode {
  functionId: number;
  role: FlowRole;
  /** Finer label for the role; always null for entry points */
  subtype: FlowSubtype | null;
}

/** Ordered, first match wins. Verbs match whole name segments and their inflections. */
export interface FlowSubtypeRule {
  role: Exclude<FlowRole, "EntryPoint">;
  subtype: FlowSubtype;
  verbs: string[];
}

/** A function named like a check (`validate_x`, `is_ready`, `hasAccess`). */
export interface ValidatorInfo {
  functionId: number;
  /** True when the declared return type mentions bool, or nothing is declared */
  returnsBoolean: boolean;
}

export interface FlowChain {
  id: number;
  functionIds: number[];
  roles: FlowRole[];
  truncated: boolean;
}

/** Maps a function to the bare names it calls. */
export interface CalleeNames {
  (fn: FunctionInfo): Set<string>;
}

export interface FlowLexicon {
  output: string[];
  dataStore: string[];
}

export interface FlowOptions {
  maxDepth: number;
  maxChainsPerEntry: number;
  maxChains: number;
  lexicon: FlowLexicon;
  calleeNames?: CalleeNames;
  subtypes?: FlowSubtypeRule[];
}

// ─── Architecture ────────────────────────────────────────────────────────────

export type LayerName =
  | "interface"
  | "data"
  | "infrastructure"
  | "presentation"
  | "test"
  | "business";

export interface ArchitectureLayer {
  directory: string;
  layer: LayerName;
  fileCount: number;
}

export type ArchitecturePattern =
  | "MVC"
  | "Layered"
  | "Microservices"
  | "Repository"
  | "Clean Architecture";

export interface ArchitectureSummary {
  layers: ArchitectureLayer[];
  patterns: ArchitecturePattern[];
}

// ─── Complexity summary ──────────────────────────────────────────────────────

export type ComplexityRank = "A" | "B" | "C" | "D" | "E" | "F";

export interface HighComplexityEntry {
  functionId: number;
  name: string;
  file: string;
  complexity: number;
  rank: ComplexityRank;
}

export interface ComplexitySummary {
  averageComplexity: number;
  maxComplexity: number;
  totalFunctions: number;
  highComplexity: HighComplexityEntry[];
}

// ─── Rule tables ─────────────────────────────────────────────────────────────

export type FunctionMatcher =
  | { type: "dunder" }
  | { type: "name"; names: string[] }
  | { type: "decorator"; lastSegments: string[] }
  | { type: "leadingUnderscore" }
  | { type: "prefix"; prefixes: string[] };

export interface FunctionRule {
  category: FunctionCategory;
  match: FunctionMatcher;
}

export type ClassRuleSource = "name" | "bases" | "docstring" | "methods";

export interface ClassRule {
  category: ClassCategory;
  source: ClassRuleSource;
  keywords: string[];
}

/** Ordered, first match wins. Plain JSON so tables can live in config. */
export interface RuleTables {
  version: string;
  functions: FunctionRule[];
  classes: ClassRule[];
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface ResolvedConfig {
  include: string[];
  exclude: string[];
  extensions: string[];
  concurrency: number;
  maxChainDepth: number;
  maxChainsPerEntry: number;
  maxChains: number;
  highComplexityThreshold: number;
  verbose: boolean;
  rules: RuleTables;
  flowLexicon: FlowLexicon;
}

export interface AnalyzeOptions extends Partial<ResolvedConfig> {
  rootDir: string;
  configPath?: string;
  signal?: AbortSignal;
}

export interface SourceInput {
  path: string;
  content: string | Uint8Array;
}

export interface AnalyzeSourcesOptions extends Partial<ResolvedConfig> {
  signal?: AbortSignal;
}

// ─── Error types ─────────────────────────────────────────────────────────────

export class RootNotFoundError extends Error {
  constructor(
    public readonly rootDir: string,
    cause?: Error,
  ) {
    super(`Root directory not found or unreadable: ${rootDir}`);
    this.name = "RootNotFoundError";
    this.cause = cause;
  }
}

export class AnalysisCancelledError extends Error {
  constructor(public readonly filesCompleted: number) {
    super(`Analysis cancelled after ${filesCompleted} file(s)`);
    this.name = "AnalysisCancelledError";
  }
}

export class AnalysisDecodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(`Cannot decode analysis: ${message}`);
    this.name = "AnalysisDecodeError";
    this.cause = cause;
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.1.0";

export const DEFAULT_EXCLUDE_DIRS = [
  "node_modules",
  "venv",
  ".venv",
  "env",
  ".env",
  "__pycache__",
  ".git",
  "site-packages",
  "build",
  "dist",
  ".tox",
  "coverage",
] as const;

export const PYTHON_EXTENSIONS = [".py", ".pyi"] as const;
export const TYPESCRIPT_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts"] as const;
export const JAVASCRIPT_EXTENSIONS = [".js", ".jsx", ".mjs", ".cjs"] as const;
export const DTS_EXTENSION = /\.d\.(ts|mts|cts|tsx)$/;

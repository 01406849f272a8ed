// src/schemas.ts — zod schemas for configuration files and serialized results

import { z } from "zod";

const functionCategory = z.enum([
  "Dunder",
  "Entry_Point",
  "Private",
  "Getter",
  "Setter",
  "Creator",
  "Processor",
  "General",
]);

const classCategory = z.enum([
  "Model",
  "Pipeline",
  "Generator",
  "Analyzer",
  "Entity",
  "Service",
  "General",
]);

const functionMatcher = z.discriminatedUnion("type", [
  z.object({ type: z.literal("dunder") }),
  z.object({ type: z.literal("name"), names: z.array(z.string()) }),
  z.object({ type: z.literal("decorator"), lastSegments: z.array(z.string()) }),
  z.object({ type: z.literal("leadingUnderscore") }),
  z.object({ type: z.literal("prefix"), prefixes: z.array(z.string()) }),
]);

export const ruleTablesSchema = z.object({
  version: z.string(),
  functions: z.array(z.object({ category: functionCategory, match: functionMatcher })),
  classes: z.array(
    z.object({
      category: classCategory,
      source: z.enum(["name", "bases", "docstring", "methods"]),
      keywords: z.array(z.string()),
    }),
  ),
});

export const flowLexiconSchema = z.object({
  output: z.array(z.string()),
  dataStore: z.array(z.string()),
});

/** Shape of `source-atlas.config.json` and the `sourceAtlas` key of package.json */
export const configFileSchema = z
  .object({
    include: z.array(z.string()),
    exclude: z.array(z.string()),
    extensions: z.array(z.string().startsWith(".")),
    concurrency: z.number().int().min(1),
    maxChainDepth: z.number().int().min(2),
    maxChainsPerEntry: z.number().int().min(1),
    maxChains: z.number().int().min(0),
    highComplexityThreshold: z.number().min(0),
    verbose: z.boolean(),
    rules: ruleTablesSchema,
    flowLexicon: flowLexiconSchema,
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ─── Analysis result ─────────────────────────────────────────────────────────

const language = z.enum(["python", "typescript", "javascript"]);
const nullableString = z.string().nullable();
const id = z.number().int().min(0);

const parameter = z.object({
  name: z.string(),
  type: nullableString,
  defaultValue: nullableString,
});

const importRecord = z.object({
  specifier: z.string(),
  level: z.number().int().min(0),
  form: z.enum(["module", "member"]),
  names: z.array(z.string()),
  line: z.number().int(),
});

const moduleInfo = z.object({
  id,
  path: z.string(),
  name: z.string(),
  language,
  docstring: nullableString,
  lineCount: z.number().int(),
  imports: z.array(importRecord),
  classIds: z.array(id),
  functionIds: z.array(id),
  isMain: z.boolean(),
  hasMainGuard: z.boolean(),
});

const classInfo = z.object({
  id,
  name: z.string(),
  moduleId: id,
  file: z.string(),
  line: z.number().int(),
  endLine: z.number().int(),
  docstring: nullableString,
  bases: z.array(z.string()),
  methods: z.array(z.string()),
  methodIds: z.array(id),
  decorators: z.array(z.string()),
  category: classCategory,
  parentClassId: id.nullable(),
  parentFunctionId: id.nullable(),
  isAbstract: z.boolean(),
  isException: z.boolean(),
});

const functionInfo = z.object({
  id,
  name: z.string(),
  qualifiedName: z.string(),
  moduleId: id,
  file: z.string(),
  line: z.number().int(),
  endLine: z.number().int(),
  params: z.array(parameter),
  returnType: nullableString,
  docstring: nullableString,
  decorators: z.array(z.string()),
  isAsync: z.boolean(),
  complexity: z.number().int().min(1),
  category: functionCategory,
  calls: z.array(z.string()),
  classId: id.nullable(),
  parentFunctionId: id.nullable(),
  methodKind: z.enum(["instance", "class", "static", "property"]).nullable(),
  isStaticLike: z.boolean(),
});

const dependencyEdge = z.discriminatedUnion("kind", [
  z.object({ source: id, kind: z.literal("internal"), target: id }),
  z.object({ source: id, kind: z.literal("external"), target: z.string() }),
]);

const flowRole = z.enum(["EntryPoint", "Transformation", "Output", "DataStore"]);

const flowSubtype = z.enum([
  "parser",
  "cleaner",
  "converter",
  "filter",
  "aggregator",
  "validator",
  "processor",
  "storage",
  "export",
  "communication",
  "presentation",
  "logging",
  "output",
  "file_reader",
  "data_fetcher",
  "query_engine",
  "connector",
  "data_accessor",
]);

const diagnostic = z.object({
  level: z.enum(["info", "warn", "error"]),
  kind: z.enum([
    "ParseFailure",
    "ResolutionAmbiguity",
    "UnresolvedImport",
    "DepthExceeded",
    "ReadFailure",
    "Config",
  ]),
  module: z.string(),
  message: z.string(),
  file: z.string().optional(),
});

export const analysisResultSchema = z.object({
  meta: z.object({
    engineVersion: z.string(),
    rootDir: nullableString,
    analyzedAt: z.string(),
    timingMs: z.number(),
    ruleTableVersion: z.string(),
  }),
  overview: z.object({
    totalFiles: z.number().int(),
    totalLines: z.number().int(),
    totalClasses: z.number().int(),
    totalFunctions: z.number().int(),
    languages: z.array(language),
    projectType: z.enum([
      "Flask Web Application",
      "Django Web Application",
      "FastAPI Application",
      "Streamlit Application",
      "Python Library/Package",
      "Node.js Application",
      "General Software Project",
    ]),
  }),
  modules: z.array(moduleInfo),
  classes: z.array(classInfo),
  functions: z.array(functionInfo),
  dependencies: z.object({
    edges: z.array(dependencyEdge),
    external: z.array(z.string()),
  }),
  flowNodes: z.array(z.object({ functionId: id, role: flowRole, subtype: flowSubtype.nullable() })),
  flowChains: z.array(
    z.object({
      id,
      functionIds: z.array(id),
      roles: z.array(flowRole),
      truncated: z.boolean(),
    }),
  ),
  validators: z.array(z.object({ functionId: id, returnsBoolean: z.boolean() })),
  architecture: z.object({
    layers: z.array(
      z.object({
        directory: z.string(),
        layer: z.enum(["interface", "data", "infrastructure", "presentation", "test", "business"]),
        fileCount: z.number().int(),
      }),
    ),
    patterns: z.array(
      z.enum(["MVC", "Layered", "Microservices", "Repository", "Clean Architecture"]),
    ),
  }),
  complexity: z.object({
    averageComplexity: z.number(),
    maxComplexity: z.number().int(),
    totalFunctions: z.number().int(),
    highComplexity: z.array(
      z.object({
        functionId: id,
        name: z.string(),
        file: z.string(),
        complexity: z.number().int(),
        rank: z.enum(["A", "B", "C", "D", "E", "F"]),
      }),
    ),
  }),
  parseFailures: z.array(z.object({ path: z.string(), reason: z.string() })),
  skippedFiles: z.array(z.string()),
  diagnostics: z.array(diagnostic),
  // Derived from the tables on decode; z.record would drop a `__proto__` key
  lookup: z.unknown(),
});

// src/role-classifier.ts — Role Classifier
// Table-driven function and class categories. Tables are ordered data; the
// first matching rule wins, so the same input always gets the same category.

import type {
  ClassCategory,
  ClassRule,
  FunctionCategory,
  FunctionMatcher,
  RuleTables,
} from "./types.js";

const CLASS_KEYWORDS: { category: ClassCategory; keywords: string[] }[] = [
  { category: "Analyzer", keywords: ["analyzer"] },
  { category: "Generator", keywords: ["generator"] },
  { category: "Service", keywords: ["manager", "service"] },
  { category: "Model", keywords: ["model", "schema"] },
  { category: "Entity", keywords: ["entity"] },
  { category: "Pipeline", keywords: ["pipeline", "workflow"] },
];

function classRulesFor(source: ClassRule["source"]): ClassRule[] {
  return CLASS_KEYWORDS.map(({ category, keywords }) => ({ category, source, keywords }));
}

export const DEFAULT_RULE_TABLES: RuleTables = {
  version: "1",
  functions: [
    { category: "Dunder", match: { type: "dunder" } },
    { category: "Entry_Point", match: { type: "name", names: ["main"] } },
    {
      category: "Entry_Point",
      match: {
        type: "decorator",
        lastSegments: ["command", "group", "entrypoint", "entry_point", "script", "main"],
      },
    },
    { category: "Private", match: { type: "leadingUnderscore" } },
    { category: "Getter", match: { type: "prefix", prefixes: ["get", "fetch", "load", "retrieve"] } },
    { category: "Setter", match: { type: "prefix", prefixes: ["set", "save", "update", "write"] } },
    { category: "Creator", match: { type: "prefix", prefixes: ["create", "generate", "build", "make"] } },
    {
      category: "Processor",
      match: { type: "prefix", prefixes: ["process", "transform", "analyze", "convert"] },
    },
  ],
  classes: [...classRulesFor("name"), ...classRulesFor("bases"), ...classRulesFor("docstring")],
};

/**
 * `getUserName` → `get_user_name`, `HTTPServer` → `http_server`. Names that
 * are already snake_case come back lowercased.
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase();
}

function lastSegment(dotted: string): string {
  const idx = dotted.lastIndexOf(".");
  return idx === -1 ? dotted : dotted.slice(idx + 1);
}

function matchesFunction(
  matcher: FunctionMatcher,
  name: string,
  decorators: readonly string[],
): boolean {
  switch (matcher.type) {
    case "dunder":
      return name.length > 4 && name.startsWith("__") && name.endsWith("__");
    case "name":
      return matcher.names.includes(name);
    case "decorator":
      return decorators.some((d) => matcher.lastSegments.includes(lastSegment(d)));
    case "leadingUnderscore":
      return name.startsWith("_");
    case "prefix": {
      const snake = toSnakeCase(name);
      return matcher.prefixes.some((p) => snake.startsWith(`${p.toLowerCase()}_`));
    }
  }
}

/** Category of a function from its name and decorator names. */
export function classifyFunction(
  name: string,
  decorators: readonly string[] = [],
  tables: RuleTables = DEFAULT_RULE_TABLES,
): FunctionCategory {
  for (const rule of tables.functions) {
    if (matchesFunction(rule.match, name, decorators)) return rule.category;
  }
  return "General";
}

export interface ClassFacts {
  name: string;
  bases: readonly string[];
  methods: readonly string[];
  docstring: string | null;
}

/** Category of a class from its name, bases, method names and docstring. */
export function classifyClass(
  facts: ClassFacts,
  tables: RuleTables = DEFAULT_RULE_TABLES,
): ClassCategory {
  for (const rule of tables.classes) {
    const haystacks = sourceText(rule.source, facts);
    const hit = haystacks.some((text) =>
      rule.keywords.some((k) => text.includes(k.toLowerCase())),
    );
    if (hit) return rule.category;
  }
  return "General";
}

function sourceText(source: ClassRule["source"], facts: ClassFacts): string[] {
  switch (source) {
    case "name":
      return [facts.name.toLowerCase()];
    case "bases":
      return facts.bases.map((b) => b.toLowerCase());
    case "docstring":
      return facts.docstring ? [facts.docstring.toLowerCase()] : [];
    case "methods":
      return facts.methods.map((m) => m.toLowerCase());
  }
}

// src/flow-chains.ts — Flow Chain Inferencer
// Heuristic pipelines: entry points feeding transformations that end in an
// output or a data store. Adjacency comes from call names plus declaration
// order within a module, so chains can include false positives.

import type {
  CalleeNames,
  Diagnostic,
  FlowChain,
  FlowLexicon,
  FlowNode,
  FlowOptions,
  FlowRole,
  FlowSubtype,
  FlowSubtypeRule,
  FunctionInfo,
  ValidatorInfo,
} from "./types.js";
import { toSnakeCase } from "./role-classifier.js";

export const DEFAULT_FLOW_LEXICON: FlowLexicon = {
  output: ["save", "write", "log", "export", "render"],
  dataStore: ["cache", "persist", "db", "store"],
};

const DEFAULT_FLOW_OPTIONS: FlowOptions = {
  maxDepth: 4,
  maxChainsPerEntry: 10,
  maxChains: 200,
  lexicon: DEFAULT_FLOW_LEXICON,
};

const MIN_CHAIN_LENGTH = 3;
// Paths explored per entry point before giving up
const EXPANSION_BUDGET = 50_000;

/** Default adjacency: the last segment of each recorded call (`self.save` → `save`). */
export const lastSegmentCallees: CalleeNames = (fn) =>
  new Set(fn.calls.map((c) => c.slice(c.lastIndexOf(".") + 1)));

export interface FlowInference {
  nodes: FlowNode[];
  chains: FlowChain[];
}

function nameSegments(name: string): string[] {
  return toSnakeCase(name)
    .split("_")
    .filter((s) => s.length > 0);
}

export const DEFAULT_FLOW_SUBTYPES: FlowSubtypeRule[] = [
  { role: "Transformation", subtype: "parser", verbs: ["parse", "decode", "deserialize"] },
  { role: "Transformation", subtype: "cleaner", verbs: ["clean", "sanitize", "normalize"] },
  { role: "Transformation", subtype: "converter", verbs: ["convert", "transform", "map"] },
  { role: "Transformation", subtype: "filter", verbs: ["filter", "select", "extract"] },
  { role: "Transformation", subtype: "aggregator", verbs: ["aggregate", "reduce", "summarize"] },
  { role: "Transformation", subtype: "validator", verbs: ["validate", "verify", "check"] },
  { role: "Output", subtype: "storage", verbs: ["save", "write", "store"] },
  { role: "Output", subtype: "export", verbs: ["export", "dump", "serialize"] },
  { role: "Output", subtype: "communication", verbs: ["send", "transmit", "publish"] },
  { role: "Output", subtype: "presentation", verbs: ["render", "display", "show"] },
  { role: "Output", subtype: "logging", verbs: ["log", "print", "output"] },
  { role: "DataStore", subtype: "file_reader", verbs: ["load", "read", "open"] },
  { role: "DataStore", subtype: "data_fetcher", verbs: ["fetch", "get", "retrieve"] },
  { role: "DataStore", subtype: "query_engine", verbs: ["query", "search", "find"] },
  { role: "DataStore", subtype: "connector", verbs: ["connect", "init", "setup"] },
];

const FALLBACK_SUBTYPE: Record<Exclude<FlowRole, "EntryPoint">, FlowSubtype> = {
  Transformation: "processor",
  Output: "output",
  DataStore: "data_accessor",
};

const VALIDATOR_VERBS = ["validate", "verify", "check", "ensure"];
const PREDICATE_PREFIXES = ["is", "has"];

/**
 * Whether a name segment is `verb` or one of its regular inflections:
 * `log` matches log, logs, logged, logging and logger but not login.
 */
export function isVerbForm(segment: string, verb: string): boolean {
  if (segment === verb) return true;
  const forms = [`${verb}s`, `${verb}es`, `${verb}ed`, `${verb}ing`, `${verb}er`];
  if (verb.endsWith("e")) {
    const stem = verb.slice(0, -1);
    forms.push(`${verb}d`, `${verb}r`, `${stem}ing`);
  } else if (!/[aeiouy]$/.test(verb)) {
    const doubled = verb + verb.slice(-1);
    forms.push(`${doubled}ed`, `${doubled}ing`, `${doubled}er`);
  }
  return forms.includes(segment);
}

function hasVerb(segments: string[], verbs: string[]): boolean {
  return segments.some((s) => verbs.some((v) => isVerbForm(s, v)));
}

/** Finer label for a role, from the first matching subtype rule. */
export function flowSubtype(
  name: string,
  role: FlowRole,
  rules: readonly FlowSubtypeRule[] = DEFAULT_FLOW_SUBTYPES,
): FlowSubtype | null {
  if (role === "EntryPoint") return null;
  const segments = nameSegments(name);
  const rule = rules.find((r) => r.role === role && hasVerb(segments, r.verbs));
  return rule ? rule.subtype : FALLBACK_SUBTYPE[role];
}

/** Functions named like checks. An undeclared return type counts as boolean. */
export function findValidators(functions: readonly FunctionInfo[]): ValidatorInfo[] {
  const validators: ValidatorInfo[] = [];
  for (const fn of functions) {
    const segments = nameSegments(fn.name);
    const isPredicate = segments.length > 1 && PREDICATE_PREFIXES.includes(segments[0]);
    if (!isPredicate && !hasVerb(segments, VALIDATOR_VERBS)) continue;
    validators.push({
      functionId: fn.id,
      returnsBoolean: fn.returnType === null || fn.returnType.toLowerCase().includes("bool"),
    });
  }
  return validators;
}

/**
 * Assign flow roles. Precedence: EntryPoint, Output, DataStore,
 * Transformation. Functions without a role do not take part in chains.
 */
export function assignFlowRoles(
  functions: readonly FunctionInfo[],
  lexicon: FlowLexicon = DEFAULT_FLOW_LEXICON,
  calleeNames: CalleeNames = lastSegmentCallees,
): Map<number, FlowRole> {
  const called = new Map<string, Set<number>>();
  for (const fn of functions) {
    for (const name of calleeNames(fn)) {
      const callers = called.get(name) ?? new Set<number>();
      callers.add(fn.id);
      called.set(name, callers);
    }
  }

  const roles = new Map<number, FlowRole>();
  for (const fn of functions) {
    const callers = called.get(fn.name);
    const hasOtherCaller = callers !== undefined && [...callers].some((id) => id !== fn.id);
    const segments = nameSegments(fn.name);
    if (fn.category === "Entry_Point" || !hasOtherCaller) roles.set(fn.id, "EntryPoint");
    else if (hasVerb(segments, lexicon.output)) roles.set(fn.id, "Output");
    else if (hasVerb(segments, lexicon.dataStore)) roles.set(fn.id, "DataStore");
    else if (fn.category === "Processor") roles.set(fn.id, "Transformation");
  }
  return roles;
}

function isTerminal(role: FlowRole | undefined): boolean {
  return role === "Output" || role === "DataStore";
}

/**
 * Infer flow chains. Every chain holds 3 to maxDepth + 1 distinct functions
 * and starts at an EntryPoint.
 */
export function inferFlowChains(
  functions: readonly FunctionInfo[],
  options: Partial<FlowOptions> = {},
  diagnostics: Diagnostic[] = [],
): FlowInference {
  const opts: FlowOptions = { ...DEFAULT_FLOW_OPTIONS, ...options };
  const calleeNames = opts.calleeNames ?? lastSegmentCallees;
  const subtypes = opts.subtypes ?? DEFAULT_FLOW_SUBTYPES;
  const roles = assignFlowRoles(functions, opts.lexicon, calleeNames);

  const participants = functions.filter((f) => roles.has(f.id));

  // Call edges first, then same-module edges to later declarations
  const adjacency = new Map<number, number[]>();
  for (const a of participants) {
    if (isTerminal(roles.get(a.id))) continue;
    const callees = calleeNames(a);
    const viaCall: number[] = [];
    const viaOrder: number[] = [];
    for (const b of participants) {
      if (b.id === a.id || roles.get(b.id) === "EntryPoint") continue;
      if (callees.has(b.name)) viaCall.push(b.id);
      else if (b.moduleId === a.moduleId && a.line < b.line) viaOrder.push(b.id);
    }
    adjacency.set(a.id, [...viaCall, ...viaOrder]);
  }

  const nodes: FlowNode[] = [];
  for (const f of participants) {
    const role = roles.get(f.id);
    if (role) nodes.push({ functionId: f.id, role, subtype: flowSubtype(f.name, role, subtypes) });
  }

  const chains: FlowChain[] = [];
  const entries = participants.filter((f) => roles.get(f.id) === "EntryPoint");

  for (const entry of entries) {
    if (chains.length >= opts.maxChains) break;
    let produced = 0;
    let truncatedCount = 0;
    let expansions = 0;
    const path: number[] = [entry.id];
    const onPath = new Set<number>(path);

    const record = (truncated: boolean): void => {
      if (path.length < MIN_CHAIN_LENGTH) return;
      if (produced >= opts.maxChainsPerEntry || chains.length >= opts.maxChains) return;
      chains.push({
        id: chains.length,
        functionIds: [...path],
        roles: path.map((id) => roles.get(id) ?? "Transformation"),
        truncated,
      });
      produced++;
      if (truncated) truncatedCount++;
    };

    const full = (): boolean =>
      produced >= opts.maxChainsPerEntry ||
      chains.length >= opts.maxChains ||
      expansions >= EXPANSION_BUDGET;

    const dfs = (current: number): void => {
      expansions++;
      if (path.length > 1 && isTerminal(roles.get(current))) {
        record(false);
        return;
      }
      const next = (adjacency.get(current) ?? []).filter((id) => !onPath.has(id));
      if (path.length - 1 >= opts.maxDepth) {
        if (next.length > 0) record(true);
        return;
      }
      for (const id of next) {
        if (full()) return;
        path.push(id);
        onPath.add(id);
        dfs(id);
        path.pop();
        onPath.delete(id);
      }
    };

    dfs(entry.id);

    if (truncatedCount > 0) {
      diagnostics.push({
        level: "info",
        kind: "DepthExceeded",
        module: "flow-chains",
        message: `${truncatedCount} flow path(s) from ${entry.qualifiedName} stopped at depth ${opts.maxDepth}`,
        file: entry.file,
      });
    }
    if (expansions >= EXPANSION_BUDGET) {
      diagnostics.push({
        level: "info",
        kind: "DepthExceeded",
        module: "flow-chains",
        message: `Flow search from ${entry.qualifiedName} stopped after ${EXPANSION_BUDGET} expansions`,
        file: entry.file,
      });
    }
  }

  return { nodes, chains };
}

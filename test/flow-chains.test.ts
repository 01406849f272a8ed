import { describe, it, expect } from "vitest";
import {
  assignFlowRoles,
  findValidators,
  flowSubtype,
  inferFlowChains,
  isVerbForm,
} from "../src/flow-chains.js";
import { classifyFunction } from "../src/role-classifier.js";
import type { Diagnostic, FunctionInfo } from "../src/types.js";

interface FnSpec {
  name: string;
  calls?: string[];
  moduleId?: number;
  line?: number;
  returnType?: string;
}

/** Each function gets its own module unless one is given. */
function makeFunctions(specs: FnSpec[]): FunctionInfo[] {
  return specs.map((spec, id): FunctionInfo => ({
    id,
    name: spec.name,
    qualifiedName: spec.name,
    moduleId: spec.moduleId ?? id,
    file: `m${spec.moduleId ?? id}.py`,
    line: spec.line ?? 1,
    endLine: (spec.line ?? 1) + 2,
    params: [],
    returnType: spec.returnType ?? null,
    docstring: null,
    decorators: [],
    isAsync: false,
    complexity: 1,
    category: classifyFunction(spec.name),
    calls: spec.calls ?? [],
    classId: null,
    parentFunctionId: null,
    methodKind: null,
    isStaticLike: false,
  }));
}

describe("assignFlowRoles", () => {
  it("assigns roles by precedence", () => {
    const functions = makeFunctions([
      { name: "main", calls: ["process_data", "save_results", "store_cache", "helper"] },
      { name: "process_data" },
      { name: "save_results" },
      { name: "store_cache" },
      { name: "helper" },
      { name: "walk", calls: ["walk"] },
    ]);
    const roles = assignFlowRoles(functions);
    expect([...roles.entries()]).toEqual([
      [0, "EntryPoint"],
      [1, "Transformation"],
      [2, "Output"],
      [3, "DataStore"],
      [5, "EntryPoint"],
    ]);
  });

  it("matches whole name segments, not prefixes", () => {
    const functions = makeFunctions([
      {
        name: "main",
        calls: ["login_user", "logic_step", "logout", "dbg_dump", "log_event", "write_logs", "cached_rows"],
      },
      { name: "login_user" },
      { name: "logic_step" },
      { name: "logout" },
      { name: "dbg_dump" },
      { name: "log_event" },
      { name: "write_logs" },
      { name: "cached_rows" },
    ]);
    expect([...assignFlowRoles(functions).entries()]).toEqual([
      [0, "EntryPoint"],
      [5, "Output"],
      [6, "Output"],
      [7, "DataStore"],
    ]);
  });
});

describe("isVerbForm", () => {
  it("accepts a verb and its regular inflections", () => {
    for (const form of ["log", "logs", "logged", "logging", "logger"]) expect(isVerbForm(form, "log")).toBe(true);
    for (const form of ["saves", "saved", "saving", "saver"]) expect(isVerbForm(form, "save")).toBe(true);
    expect(isVerbForm("caching", "cache")).toBe(true);
  });

  it("rejects other words sharing the prefix", () => {
    for (const word of ["login", "logic", "logout", "blog"]) expect(isVerbForm(word, "log")).toBe(false);
    expect(isVerbForm("dbg", "db")).toBe(false);
  });
});

describe("flowSubtype", () => {
  it("labels each role from the first matching rule", () => {
    expect(flowSubtype("parse_header", "Transformation")).toBe("parser");
    expect(flowSubtype("normalizeRows", "Transformation")).toBe("cleaner");
    expect(flowSubtype("process_rows", "Transformation")).toBe("processor");
    expect(flowSubtype("write_report", "Output")).toBe("storage");
    expect(flowSubtype("export_csv", "Output")).toBe("export");
    expect(flowSubtype("render_page", "Output")).toBe("presentation");
    expect(flowSubtype("log_event", "Output")).toBe("logging");
    expect(flowSubtype("save_log", "Output")).toBe("storage");
    expect(flowSubtype("cache_query_results", "DataStore")).toBe("query_engine");
    expect(flowSubtype("store_cache", "DataStore")).toBe("data_accessor");
    expect(flowSubtype("main", "EntryPoint")).toBeNull();
  });

  it("takes a custom rule table", () => {
    const rules = [{ role: "DataStore" as const, subtype: "connector" as const, verbs: ["cache"] }];
    expect(flowSubtype("store_cache", "DataStore", rules)).toBe("connector");
    expect(flowSubtype("persist_rows", "DataStore", rules)).toBe("data_accessor");
  });
});

describe("findValidators", () => {
  it("finds check-like names and whether they return a boolean", () => {
    const functions = makeFunctions([
      { name: "validate_input" },
      { name: "is_ready", returnType: "bool" },
      { name: "hasAccess", returnType: "boolean" },
      { name: "check_schema", returnType: "None" },
      { name: "ensure_dir" },
      { name: "island" },
      { name: "this_is_fine" },
    ]);
    expect(findValidators(functions)).toEqual([
      { functionId: 0, returnsBoolean: true },
      { functionId: 1, returnsBoolean: true },
      { functionId: 2, returnsBoolean: true },
      { functionId: 3, returnsBoolean: false },
      { functionId: 4, returnsBoolean: true },
    ]);
  });
});

describe("inferFlowChains", () => {
  it("follows main through a transformation into an output", () => {
    const functions = makeFunctions([
      { name: "main", calls: ["process_data"], moduleId: 0, line: 1 },
      { name: "process_data", calls: ["save_results"], moduleId: 0, line: 5 },
      { name: "save_results", moduleId: 0, line: 9 },
    ]);
    const { chains, nodes } = inferFlowChains(functions);
    expect(chains).toEqual([
      {
        id: 0,
        functionIds: [0, 1, 2],
        roles: ["EntryPoint", "Transformation", "Output"],
        truncated: false,
      },
    ]);
    expect(nodes).toEqual([
      { functionId: 0, role: "EntryPoint", subtype: null },
      { functionId: 1, role: "Transformation", subtype: "processor" },
      { functionId: 2, role: "Output", subtype: "storage" },
    ]);
  });

  const longPipeline = (): FunctionInfo[] =>
    makeFunctions([
      { name: "main", calls: ["process_a"] },
      { name: "process_a", calls: ["process_b"] },
      { name: "process_b", calls: ["process_c"] },
      { name: "process_c", calls: ["process_d"] },
      { name: "process_d", calls: ["save_out"] },
      { name: "save_out" },
    ]);

  it("truncates paths at the depth limit and reports it", () => {
    const diagnostics: Diagnostic[] = [];
    const { chains } = inferFlowChains(longPipeline(), { maxDepth: 4 }, diagnostics);
    expect(chains).toHaveLength(1);
    expect(chains[0].functionIds).toEqual([0, 1, 2, 3, 4]);
    expect(chains[0].truncated).toBe(true);
    expect(diagnostics).toEqual([
      {
        level: "info",
        kind: "DepthExceeded",
        module: "flow-chains",
        message: "1 flow path(s) from main stopped at depth 4",
        file: "m0.py",
      },
    ]);
  });

  it("reaches the terminal when the limit allows", () => {
    const diagnostics: Diagnostic[] = [];
    const { chains } = inferFlowChains(longPipeline(), { maxDepth: 5 }, diagnostics);
    expect(chains.map((c) => [c.functionIds, c.truncated])).toEqual([[[0, 1, 2, 3, 4, 5], false]]);
    expect(diagnostics).toEqual([]);
  });

  it("never repeats a function inside a chain", () => {
    const functions = makeFunctions([
      { name: "main", calls: ["process_a"] },
      { name: "process_a", calls: ["process_b"] },
      { name: "process_b", calls: ["process_a", "store_cache"] },
      { name: "store_cache" },
    ]);
    const { chains } = inferFlowChains(functions);
    expect(chains).toEqual([
      {
        id: 0,
        functionIds: [0, 1, 2, 3],
        roles: ["EntryPoint", "Transformation", "Transformation", "DataStore"],
        truncated: false,
      },
    ]);
  });

  it("caps chains per entry point and overall", () => {
    const functions = makeFunctions([
      { name: "main", calls: ["process_a", "process_b", "process_c"] },
      { name: "process_a", calls: ["save_out"] },
      { name: "process_b", calls: ["save_out"] },
      { name: "process_c", calls: ["save_out"] },
      { name: "save_out" },
    ]);
    expect(inferFlowChains(functions).chains.map((c) => c.functionIds)).toEqual([
      [0, 1, 4],
      [0, 2, 4],
      [0, 3, 4],
    ]);
    expect(inferFlowChains(functions, { maxChainsPerEntry: 2 }).chains).toHaveLength(2);
    expect(inferFlowChains(functions, { maxChains: 1 }).chains).toHaveLength(1);
  });

  it("uses a custom callee-name function for adjacency", () => {
    const functions = makeFunctions([
      { name: "main", calls: ["pipeline.process_data"] },
      { name: "process_data", calls: ["save_results"] },
      { name: "save_results" },
    ]);
    expect(inferFlowChains(functions).chains.map((c) => c.functionIds)).toEqual([[0, 1, 2]]);

    const exact = { calleeNames: (fn: FunctionInfo) => new Set(fn.calls) };
    expect(inferFlowChains(functions, exact).chains).toEqual([]);
    expect(assignFlowRoles(functions, undefined, exact.calleeNames).get(1)).toBe("EntryPoint");
  });

  it("keeps every chain within the length bounds", () => {
    const { chains } = inferFlowChains(longPipeline(), { maxDepth: 2 });
    for (const chain of chains) {
      expect(chain.functionIds.length).toBeGreaterThanOrEqual(3);
      expect(chain.functionIds.length).toBeLessThanOrEqual(3);
      expect(new Set(chain.functionIds).size).toBe(chain.functionIds.length);
    }
    expect(chains).toHaveLength(1);
  });
});

import { describe, it, expect } from "vitest";
import { analyzeSources } from "../src/index.js";
import { deserializeAnalysis, serializeAnalysis } from "../src/serializer.js";
import { AnalysisDecodeError, type AnalysisResult } from "../src/types.js";

async function sample(): Promise<AnalysisResult> {
  return analyzeSources([
    {
      path: "app/pipeline.py",
      content: [
        '"""Pipeline."""',
        "import requests",
        "",
        "class Loader:",
        "    def load_rows(self):",
        "        return requests.get('x')",
        "",
        "def main():",
        "    process_data(Loader().load_rows())",
        "",
        "def process_data(rows):",
        "    save_results([r for r in rows if r])",
        "",
        "def save_results(rows):",
        "    print(rows)",
        "",
      ].join("\n"),
    },
    { path: "broken.py", content: "def nope(:\n" },
  ]);
}

describe("serializeAnalysis / deserializeAnalysis", () => {
  it("round-trips a result", async () => {
    const result = await sample();
    expect(result.flowChains).toHaveLength(1);
    const decoded = deserializeAnalysis(serializeAnalysis(result));
    expect(decoded).toEqual(result);
  });

  it("keeps function names that collide with object keys", async () => {
    const result = await analyzeSources([
      { path: "a.ts", content: "class A { __proto__() { return 1; } }\nexport function constructor() {}\n" },
    ]);
    expect(Object.keys(result.lookup.functionsByName)).toEqual(["__proto__", "constructor"]);
    const decoded = deserializeAnalysis(serializeAnalysis(result));
    expect(Object.keys(decoded.lookup.functionsByName)).toEqual(["__proto__", "constructor"]);
    expect(decoded.lookup.functionsByName["__proto__"]).toEqual([0]);
    expect(decoded).toEqual(result);
  });

  it("writes compact JSON on request", async () => {
    const text = serializeAnalysis(await sample(), 0);
    expect(text.includes("\n")).toBe(false);
  });

  it("rejects text that is not JSON", () => {
    expect(() => deserializeAnalysis("{ not json")).toThrow(AnalysisDecodeError);
  });

  it("rejects a malformed result", async () => {
    const broken = { ...(await sample()), modules: "nope" };
    expect(() => deserializeAnalysis(JSON.stringify(broken))).toThrow(/^Cannot decode analysis: modules: /);
  });

  it("rejects an id that points outside its table", async () => {
    const result = await sample();
    const dangling: AnalysisResult = {
      ...result,
      flowChains: [{ id: 0, functionIds: [0, 99], roles: ["EntryPoint", "Output"], truncated: false }],
    };
    expect(() => deserializeAnalysis(serializeAnalysis(dangling))).toThrow(
      "Cannot decode analysis: dangling reference in flowChains[0]",
    );
  });

  it("rejects a validator that points outside the function table", async () => {
    const result = await sample();
    const dangling: AnalysisResult = { ...result, validators: [{ functionId: 42, returnsBoolean: true }] };
    expect(() => deserializeAnalysis(serializeAnalysis(dangling))).toThrow(
      "Cannot decode analysis: dangling reference in validators[0]",
    );
  });

  it("rejects ids that do not match their position", async () => {
    const result = await sample();
    const shuffled: AnalysisResult = { ...result, functions: [...result.functions].reverse() };
    expect(() => deserializeAnalysis(serializeAnalysis(shuffled))).toThrow(
      "Cannot decode analysis: dangling reference in functions[0].id",
    );
  });
});

// src/serializer.ts — JSON encode/decode of analysis results

import type { AnalysisResult } from "./types.js";
import { AnalysisDecodeError } from "./types.js";
import { analysisResultSchema } from "./schemas.js";
import { buildLookup } from "./analysis-builder.js";

export function serializeAnalysis(result: AnalysisResult, indent = 2): string {
  return JSON.stringify(result, null, indent);
}

/**
 * Decode a serialized result. The shape is validated, and every id reference
 * must point into its table. `lookup` is rebuilt from the tables rather than
 * read back.
 */
export function deserializeAnalysis(text: string): AnalysisResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new AnalysisDecodeError(err instanceof Error ? err.message : String(err), err);
  }

  const parsed = analysisResultSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".")}: ${first.message}` : "invalid shape";
    throw new AnalysisDecodeError(where, parsed.error);
  }

  const { lookup: _lookup, ...tables } = parsed.data;
  checkReferences(tables);
  return { ...tables, lookup: buildLookup(tables) };
}

function checkReferences(result: Omit<AnalysisResult, "lookup">): void {
  const moduleCount = result.modules.length;
  const classCount = result.classes.length;
  const functionCount = result.functions.length;

  const expect = (ok: boolean, what: string): void => {
    if (!ok) throw new AnalysisDecodeError(`dangling reference in ${what}`);
  };
  const inRange = (id: number | null, count: number): boolean => id === null || id < count;

  result.modules.forEach((m, i) => {
    expect(m.id === i, `modules[${i}].id`);
    expect(m.classIds.every((id) => id < classCount), `modules[${i}].classIds`);
    expect(m.functionIds.every((id) => id < functionCount), `modules[${i}].functionIds`);
  });
  result.classes.forEach((c, i) => {
    expect(c.id === i, `classes[${i}].id`);
    expect(c.moduleId < moduleCount, `classes[${i}].moduleId`);
    expect(c.methodIds.every((id) => id < functionCount), `classes[${i}].methodIds`);
    expect(inRange(c.parentClassId, classCount), `classes[${i}].parentClassId`);
    expect(inRange(c.parentFunctionId, functionCount), `classes[${i}].parentFunctionId`);
  });
  result.functions.forEach((f, i) => {
    expect(f.id === i, `functions[${i}].id`);
    expect(f.moduleId < moduleCount, `functions[${i}].moduleId`);
    expect(inRange(f.classId, classCount), `functions[${i}].classId`);
    expect(inRange(f.parentFunctionId, functionCount), `functions[${i}].parentFunctionId`);
  });
  result.dependencies.edges.forEach((e, i) => {
    expect(e.source < moduleCount, `dependencies.edges[${i}].source`);
    if (e.kind === "internal") expect(e.target < moduleCount, `dependencies.edges[${i}].target`);
  });
  result.flowNodes.forEach((node, i) => {
    expect(node.functionId < functionCount, `flowNodes[${i}]`);
  });
  result.flowChains.forEach((chain, i) => {
    expect(chain.functionIds.every((id) => id < functionCount), `flowChains[${i}]`);
  });
  result.validators.forEach((v, i) => {
    expect(v.functionId < functionCount, `validators[${i}]`);
  });
}

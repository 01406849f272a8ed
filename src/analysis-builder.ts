// src/analysis-builder.ts — Analysis Builder
// Merges per-file indexes into flat, id-addressed tables and derives the
// summary sections of the result.

import type {
  AnalysisLookup,
  ClassInfo,
  ComplexitySummary,
  FunctionInfo,
  HighComplexityEntry,
  Language,
  ModuleIndex,
  ModuleInfo,
  Overview,
  ProjectType,
} from "./types.js";
import { complexityRank } from "./complexity.js";

export interface ArenaTables {
  modules: ModuleInfo[];
  classes: ClassInfo[];
  functions: FunctionInfo[];
}

/**
 * Concatenate per-file indexes into global tables. Indexes are sorted by path
 * first, so ids depend only on the set of files and never on the order in
 * which they finished.
 */
export function assembleTables(indexes: readonly ModuleIndex[]): ArenaTables {
  const sorted = [...indexes].sort((a, b) =>
    a.module.path < b.module.path ? -1 : a.module.path > b.module.path ? 1 : 0,
  );
  const tables: ArenaTables = { modules: [], classes: [], functions: [] };

  for (const index of sorted) {
    const moduleId = tables.modules.length;
    const classOffset = tables.classes.length;
    const functionOffset = tables.functions.length;
    const cls = (id: number | null): number | null => (id === null ? null : id + classOffset);
    const fn = (id: number | null): number | null => (id === null ? null : id + functionOffset);

    tables.modules.push({
      ...index.module,
      id: moduleId,
      classIds: index.module.classIds.map((id) => id + classOffset),
      functionIds: index.module.functionIds.map((id) => id + functionOffset),
    });
    for (const c of index.classes) {
      tables.classes.push({
        ...c,
        id: c.id + classOffset,
        moduleId,
        methodIds: c.methodIds.map((id) => id + functionOffset),
        parentClassId: cls(c.parentClassId),
        parentFunctionId: fn(c.parentFunctionId),
      });
    }
    for (const f of index.functions) {
      tables.functions.push({
        ...f,
        id: f.id + functionOffset,
        moduleId,
        classId: cls(f.classId),
        parentFunctionId: fn(f.parentFunctionId),
      });
    }
  }
  return tables;
}

export function buildLookup(tables: ArenaTables): AnalysisLookup {
  const byName = new Map<string, number[]>();
  for (const f of tables.functions) {
    const ids = byName.get(f.name) ?? [];
    ids.push(f.id);
    byName.set(f.name, ids);
  }
  return {
    modulesByPath: Object.fromEntries(tables.modules.map((m) => [m.path, m.id])),
    functionsByName: Object.fromEntries(byName),
  };
}

export function buildOverview(tables: ArenaTables, projectType: ProjectType): Overview {
  const languages = new Set<Language>(tables.modules.map((m) => m.language));
  return {
    totalFiles: tables.modules.length,
    totalLines: tables.modules.reduce((sum, m) => sum + m.lineCount, 0),
    totalClasses: tables.classes.length,
    totalFunctions: tables.functions.length,
    languages: [...languages].sort(),
    projectType,
  };
}

/**
 * Average and maximum complexity plus every function above `threshold`,
 * highest first.
 */
export function summarizeComplexity(
  functions: readonly FunctionInfo[],
  threshold: number,
): ComplexitySummary {
  if (functions.length === 0) {
    return { averageComplexity: 0, maxComplexity: 0, totalFunctions: 0, highComplexity: [] };
  }
  let total = 0;
  let max = 0;
  const high: HighComplexityEntry[] = [];
  for (const f of functions) {
    total += f.complexity;
    max = Math.max(max, f.complexity);
    if (f.complexity > threshold) {
      high.push({
        functionId: f.id,
        name: f.qualifiedName,
        file: f.file,
        complexity: f.complexity,
        rank: complexityRank(f.complexity),
      });
    }
  }
  high.sort((a, b) => b.complexity - a.complexity || a.functionId - b.functionId);
  return {
    averageComplexity: Math.round((total / functions.length) * 100) / 100,
    maxComplexity: max,
    totalFunctions: functions.length,
    highComplexity: high,
  };
}

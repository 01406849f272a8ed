// src/structural-indexer.ts — Structural Indexer
// One walk over a lowered tree yields the module record plus every class and
// function defined in it, with file-local ids.

import { basename, extname } from "node:path";
import type {
  ClassInfo,
  FunctionInfo,
  FunctionNode,
  ImportRecord,
  Language,
  MethodKind,
  ModuleIndex,
  RuleTables,
  SourceTree,
  SyntaxNode,
} from "./types.js";
import { computeComplexity } from "./complexity.js";
import { classifyClass, classifyFunction, DEFAULT_RULE_TABLES } from "./role-classifier.js";

const PROPERTY_DECORATORS = new Set(["property", "cached_property", "functools.cached_property"]);

interface WalkContext {
  /** Set only while walking a class body directly */
  classId: number | null;
  parentClassId: number | null;
  parentFunctionId: number | null;
  qualifier: string[];
}

export function moduleName(path: string): string {
  return basename(path, extname(path));
}

/**
 * Index one parsed file. Module id is 0 and class/function ids start at 0;
 * the analysis builder rebases them onto the global tables.
 */
export function indexModule(
  tree: SourceTree,
  tables: RuleTables = DEFAULT_RULE_TABLES,
): ModuleIndex {
  const classes: ClassInfo[] = [];
  const functions: FunctionInfo[] = [];
  const imports: ImportRecord[] = [];
  const file = tree.path;

  const walk = (nodes: SyntaxNode[], ctx: WalkContext): void => {
    for (const node of nodes) {
      switch (node.kind) {
        case "import":
          imports.push({
            specifier: node.specifier,
            level: node.level,
            form: node.form,
            names: node.names,
            line: node.line,
          });
          break;
        case "class": {
          const id = classes.length;
          const info: ClassInfo = {
            id,
            name: node.name,
            moduleId: 0,
            file,
            line: node.line,
            endLine: node.endLine,
            docstring: node.docstring,
            bases: node.bases,
            methods: [],
            methodIds: [],
            decorators: node.decorators,
            category: "General",
            parentClassId: ctx.parentClassId,
            parentFunctionId: ctx.parentFunctionId,
            isAbstract: node.bases.some((b) => /abc|abstract/i.test(b)),
            isException: node.bases.some((b) => /exception|error/i.test(b)),
          };
          classes.push(info);
          walk(node.children, {
            classId: id,
            parentClassId: id,
            parentFunctionId: null,
            qualifier: [...ctx.qualifier, node.name],
          });
          info.methods = info.methodIds.map((fid) => functions[fid].name);
          info.category = classifyClass(
            { name: info.name, bases: info.bases, methods: info.methods, docstring: info.docstring },
            tables,
          );
          break;
        }
        case "function": {
          const id = functions.length;
          const methodKind = ctx.classId === null ? null : methodKindOf(node, tree.language);
          functions.push({
            id,
            name: node.name,
            qualifiedName: [...ctx.qualifier, node.name].join("."),
            moduleId: 0,
            file,
            line: node.line,
            endLine: node.endLine,
            params: node.params,
            returnType: node.returnType,
            docstring: node.docstring,
            decorators: node.decorators,
            isAsync: node.isAsync,
            complexity: computeComplexity(node),
            category: classifyFunction(node.name, node.decorators, tables),
            calls: collectCalls(node.children),
            classId: ctx.classId,
            parentFunctionId: ctx.parentFunctionId,
            methodKind,
            isStaticLike:
              methodKind === "static" ||
              (methodKind !== null && tree.language === "python" && node.params.length === 0),
          });
          if (ctx.classId !== null) classes[ctx.classId].methodIds.push(id);
          walk(node.children, {
            classId: null,
            parentClassId: ctx.parentClassId,
            parentFunctionId: id,
            qualifier: [...ctx.qualifier, node.name],
          });
          break;
        }
        default:
          walk(node.children, ctx);
      }
    }
  };

  walk(tree.root.children, {
    classId: null,
    parentClassId: null,
    parentFunctionId: null,
    qualifier: [],
  });

  const name = moduleName(tree.path);
  return {
    module: {
      id: 0,
      path: tree.path,
      name,
      language: tree.language,
      docstring: tree.root.docstring,
      lineCount: tree.lineCount,
      imports,
      classIds: classes.map((c) => c.id),
      functionIds: functions.map((f) => f.id),
      isMain: name === "main" || name === "__main__",
      hasMainGuard: tree.root.hasMainGuard,
    },
    classes,
    functions,
  };
}

function methodKindOf(node: FunctionNode, language: Language): MethodKind {
  if (language !== "python") {
    if (node.isStatic) return "static";
    return node.isAccessor ? "property" : "instance";
  }
  for (const d of node.decorators) {
    if (d === "staticmethod") return "static";
    if (d === "classmethod") return "class";
    if (PROPERTY_DECORATORS.has(d) || /\.(setter|getter|deleter)$/.test(d)) return "property";
  }
  return "instance";
}

/** Callee names in a body, excluding calls inside nested definitions. */
function collectCalls(nodes: SyntaxNode[]): string[] {
  const names = new Set<string>();
  const visit = (list: SyntaxNode[]): void => {
    for (const node of list) {
      if (node.kind === "function" || node.kind === "class" || node.kind === "import") continue;
      if (node.kind === "call" && node.callee !== null) names.add(node.callee);
      visit(node.children);
    }
  };
  visit(nodes);
  return [...names].sort();
}

// src/parsers/python-parser.ts — Python front end (tree-sitter)
// Lowers a tree-sitter-python tree into the shared SyntaxNode union.

import Parser from "tree-sitter";
import Python from "tree-sitter-python";
import type {
  ClassNode,
  FunctionNode,
  ImportNode,
  ModuleNode,
  Parameter,
  SyntaxNode,
} from "../types.js";

type TSNode = Parser.SyntaxNode;

const MAIN_GUARD = /__name__\s*==\s*["']__main__["']|["']__main__["']\s*==\s*__name__/;

/** Raised for a tree that a strict parser would reject. Caught by the extractor. */
export class PythonSyntaxError extends Error {
  constructor(
    public readonly line: number,
    detail: string,
  ) {
    super(`${detail} at line ${line}`);
    this.name = "PythonSyntaxError";
  }
}

export interface PythonParser {
  parse(content: string): ModuleNode;
}

/**
 * Create a parser bound to the Python grammar. Each analysis run owns its own
 * instance, so nothing is shared between runs.
 */
export function createPythonParser(): PythonParser {
  const parser = new Parser();
  parser.setLanguage(Python);

  return {
    parse(content: string): ModuleNode {
      // Default buffer is too small for large files
      const bufferSize = Math.max(32 * 1024, content.length * 2 + 1024);
      const tree = parser.parse(content, undefined, { bufferSize });
      assertWellFormed(tree.rootNode);
      return lowerModule(tree.rootNode);
    },
  };
}

function assertWellFormed(root: TSNode): void {
  const stack: TSNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === "ERROR") {
      throw new PythonSyntaxError(node.startPosition.row + 1, "invalid syntax");
    }
    // Tokens the parser inserted to recover have zero width
    if (node !== root && node.children.length === 0 && node.startIndex === node.endIndex) {
      throw new PythonSyntaxError(node.startPosition.row + 1, `missing "${node.type}"`);
    }
    for (const child of node.children) stack.push(child);
  }
}

// ─── Lowering ────────────────────────────────────────────────────────────────

function lowerModule(root: TSNode): ModuleNode {
  const hasMainGuard = root.namedChildren.some((stmt) => {
    if (stmt.type !== "if_statement") return false;
    const condition = stmt.childForFieldName("condition");
    return condition !== null && MAIN_GUARD.test(condition.text);
  });
  return {
    kind: "module",
    docstring: docstringOf(root),
    hasMainGuard,
    children: lowerChildren(root),
  };
}

function lowerChildren(node: TSNode): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  for (const child of node.namedChildren) {
    out.push(...lower(child));
  }
  return out;
}

function line(node: TSNode): number {
  return node.startPosition.row + 1;
}

function lower(node: TSNode): SyntaxNode[] {
  switch (node.type) {
    case "decorated_definition": {
      const decorators = node.namedChildren
        .filter((c) => c.type === "decorator")
        .map(decoratorName)
        .filter((d): d is string => d !== null);
      const definition = node.childForFieldName("definition");
      if (!definition) return [];
      if (definition.type === "class_definition") return [lowerClass(definition, decorators)];
      if (definition.type === "function_definition") return [lowerFunction(definition, decorators)];
      return lower(definition);
    }
    case "class_definition":
      return [lowerClass(node, [])];
    case "function_definition":
      return [lowerFunction(node, [])];
    case "import_statement":
      return lowerImport(node);
    case "import_from_statement":
      return [lowerImportFrom(node)];
    case "future_import_statement":
      return [
        {
          kind: "import",
          specifier: "__future__",
          level: 0,
          form: "member",
          names: importedNames(node, null),
          line: line(node),
        },
      ];
    case "if_statement":
    case "elif_clause":
      return [{ kind: "conditional", line: line(node), children: lowerChildren(node) }];
    case "for_statement":
    case "while_statement":
      return [{ kind: "loop", line: line(node), children: lowerChildren(node) }];
    case "except_clause":
    case "except_group_clause":
      return [{ kind: "handler", line: line(node), children: lowerChildren(node) }];
    case "boolean_operator": {
      const operator = node.childForFieldName("operator");
      return [
        {
          kind: "boolean",
          operator: operator ? operator.type : "and",
          line: line(node),
          children: lowerChildren(node),
        },
      ];
    }
    case "if_clause":
      return [{ kind: "filter", line: line(node), children: lowerChildren(node) }];
    case "conditional_expression":
      return [{ kind: "ternary", line: line(node), children: lowerChildren(node) }];
    case "call": {
      const fn = node.childForFieldName("function");
      return [
        {
          kind: "call",
          callee: fn ? calleeName(fn) : null,
          line: line(node),
          children: lowerChildren(node),
        },
      ];
    }
    default:
      // Lambdas, comprehension `for` clauses, match/with/else/finally:
      // contents only
      return lowerChildren(node);
  }
}

function lowerClass(node: TSNode, decorators: string[]): ClassNode {
  const body = node.childForFieldName("body");
  const superclasses = node.childForFieldName("superclasses");
  const bases: string[] = [];
  if (superclasses) {
    for (const arg of superclasses.namedChildren) {
      // metaclass=..., comments
      if (arg.type === "keyword_argument" || arg.type === "comment") continue;
      bases.push(dottedName(arg) ?? arg.text);
    }
  }
  return {
    kind: "class",
    name: node.childForFieldName("name")?.text ?? "",
    line: line(node),
    endLine: node.endPosition.row + 1,
    docstring: body ? docstringOf(body) : null,
    bases,
    decorators,
    children: body ? lowerChildren(body) : [],
  };
}

function lowerFunction(node: TSNode, decorators: string[]): FunctionNode {
  const body = node.childForFieldName("body");
  const params = node.childForFieldName("parameters");
  const returnType = node.childForFieldName("return_type");
  return {
    kind: "function",
    name: node.childForFieldName("name")?.text ?? "",
    line: line(node),
    endLine: node.endPosition.row + 1,
    isAsync: node.children.some((c) => c.type === "async"),
    params: params ? lowerParameters(params) : [],
    returnType: returnType ? returnType.text : null,
    docstring: body ? docstringOf(body) : null,
    decorators,
    isStatic: false,
    isAccessor: false,
    children: body ? lowerChildren(body) : [],
  };
}

function lowerParameters(params: TSNode): Parameter[] {
  const out: Parameter[] = [];
  for (const p of params.namedChildren) {
    switch (p.type) {
      case "identifier":
      case "list_splat_pattern":
      case "dictionary_splat_pattern":
        out.push({ name: p.text, type: null, defaultValue: null });
        break;
      case "typed_parameter": {
        const name = p.namedChildren.find((c) => c.type !== "type");
        const type = p.childForFieldName("type");
        out.push({ name: name?.text ?? "", type: type?.text ?? null, defaultValue: null });
        break;
      }
      case "default_parameter":
      case "typed_default_parameter": {
        const name = p.childForFieldName("name");
        const type = p.childForFieldName("type");
        const value = p.childForFieldName("value");
        out.push({
          name: name?.text ?? "",
          type: type?.text ?? null,
          defaultValue: value?.text ?? null,
        });
        break;
      }
      // `*` and `/` separators carry no name
    }
  }
  return out;
}

function lowerImport(node: TSNode): ImportNode[] {
  const out: ImportNode[] = [];
  for (const child of node.namedChildren) {
    const target = child.type === "aliased_import" ? child.childForFieldName("name") : child;
    if (!target || target.type !== "dotted_name") continue;
    out.push({
      kind: "import",
      specifier: target.text,
      level: 0,
      form: "module",
      names: [],
      line: line(node),
    });
  }
  return out;
}

function lowerImportFrom(node: TSNode): ImportNode {
  const moduleName = node.childForFieldName("module_name");
  let specifier = "";
  let level = 0;
  if (moduleName?.type === "relative_import") {
    for (const part of moduleName.namedChildren) {
      if (part.type === "import_prefix") level = part.text.length;
      else if (part.type === "dotted_name") specifier = part.text;
    }
  } else if (moduleName) {
    specifier = moduleName.text;
  }
  return {
    kind: "import",
    specifier,
    level,
    form: "member",
    names: importedNames(node, moduleName),
    line: line(node),
  };
}

function importedNames(node: TSNode, moduleName: TSNode | null): string[] {
  const names: string[] = [];
  for (const child of node.namedChildren) {
    if (moduleName && child.startIndex === moduleName.startIndex) continue;
    if (child.type === "wildcard_import") names.push("*");
    else if (child.type === "dotted_name") names.push(child.text);
    else if (child.type === "aliased_import") {
      const name = child.childForFieldName("name");
      if (name) names.push(name.text);
    }
  }
  return names;
}

// ─── Names ───────────────────────────────────────────────────────────────────

/** `a`, `a.b.c`; null for anything that is not a plain name chain */
function dottedName(node: TSNode): string | null {
  if (node.type === "identifier") return node.text;
  if (node.type === "dotted_name") return node.text;
  if (node.type === "attribute") {
    const object = node.childForFieldName("object");
    const attr = node.childForFieldName("attribute");
    if (!object || !attr) return null;
    const base = dottedName(object);
    return base === null ? null : `${base}.${attr.text}`;
  }
  return null;
}

/** Like dottedName, but `make().save` still yields the method name `save`. */
function calleeName(node: TSNode): string | null {
  const dotted = dottedName(node);
  if (dotted !== null) return dotted;
  if (node.type === "attribute") {
    return node.childForFieldName("attribute")?.text ?? null;
  }
  return null;
}

/** `@app.route("/x")` → `app.route` */
function decoratorName(decorator: TSNode): string | null {
  const expr = decorator.namedChildren.find((c) => c.type !== "comment");
  if (!expr) return null;
  if (expr.type === "call") {
    const fn = expr.childForFieldName("function");
    return fn ? dottedName(fn) : null;
  }
  return dottedName(expr) ?? expr.text;
}

// ─── Docstrings ──────────────────────────────────────────────────────────────

function docstringOf(block: TSNode): string | null {
  const first = block.namedChildren.find((c) => c.type !== "comment");
  if (!first || first.type !== "expression_statement") return null;
  const literal = first.namedChildren[0];
  if (!literal || literal.type !== "string" || first.namedChildren.length !== 1) return null;
  return cleandoc(stringValue(literal.text));
}

function stringValue(raw: string): string {
  const prefix = /^[rRbBuUfF]*/.exec(raw);
  let body = raw.slice(prefix ? prefix[0].length : 0);
  for (const quote of ['"""', "'''", '"', "'"]) {
    if (body.startsWith(quote) && body.endsWith(quote) && body.length >= quote.length * 2) {
      body = body.slice(quote.length, body.length - quote.length);
      break;
    }
  }
  return body;
}

/**
 * Normalize docstring indentation: the first line is stripped, the common
 * margin of the remaining lines is removed, and blank edge lines are dropped.
 */
function cleandoc(doc: string): string {
  const lines = doc.replace(/\t/g, "        ").split("\n");
  let margin = Infinity;
  for (const l of lines.slice(1)) {
    const content = l.trimStart();
    if (content.length > 0) margin = Math.min(margin, l.length - content.length);
  }
  const out = [lines[0].trimStart()];
  for (const l of lines.slice(1)) {
    out.push(margin === Infinity ? l : l.slice(margin));
  }
  while (out.length > 0 && out[out.length - 1].trim() === "") out.pop();
  while (out.length > 0 && out[0].trim() === "") out.shift();
  return out.map((l) => l.trimEnd()).join("\n");
}

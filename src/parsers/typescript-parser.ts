// src/parsers/typescript-parser.ts — TypeScript / JavaScript front end
// Lowers a TypeScript compiler AST into the shared SyntaxNode union.

import { extname } from "node:path";
import ts from "typescript";
import type {
  ClassNode,
  FunctionNode,
  ImportNode,
  ModuleNode,
  Parameter,
  SyntaxNode,
} from "../types.js";

const MAIN_GUARD = /require\.main\s*===?\s*module|module\s*===?\s*require\.main/;
const MODULE_DOC_TAG = /@(file|fileoverview|module|packageDocumentation)\b/;

export class TypeScriptSyntaxError extends Error {
  constructor(
    public readonly line: number,
    detail: string,
  ) {
    super(`${detail} at line ${line}`);
    this.name = "TypeScriptSyntaxError";
  }
}

function scriptKindFor(filePath: string): ts.ScriptKind {
  const ext = extname(filePath).toLowerCase();
  if (ext === ".tsx") return ts.ScriptKind.TSX;
  if (ext === ".jsx") return ts.ScriptKind.JSX;
  if (ext === ".js" || ext === ".mjs" || ext === ".cjs") return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}

/**
 * Parse a TypeScript or JavaScript file. Throws TypeScriptSyntaxError when the
 * compiler reports a syntactic error.
 */
export function parseTypeScript(filePath: string, content: string): ModuleNode {
  // Syntactic diagnostics only; no type checking happens here
  const { diagnostics = [] } = ts.transpileModule(content, {
    fileName: filePath,
    reportDiagnostics: true,
    compilerOptions: { jsx: ts.JsxEmit.Preserve },
  });
  const firstError = diagnostics.find((d) => d.category === ts.DiagnosticCategory.Error);
  if (firstError) {
    const position =
      firstError.file && firstError.start !== undefined
        ? firstError.file.getLineAndCharacterOfPosition(firstError.start).line + 1
        : 1;
    throw new TypeScriptSyntaxError(
      position,
      ts.flattenDiagnosticMessageText(firstError.messageText, " "),
    );
  }

  const sourceFile = ts.createSourceFile(
    filePath,
    content,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(filePath),
  );
  return new Lowerer(sourceFile).module();
}

class Lowerer {
  constructor(private readonly sf: ts.SourceFile) {}

  module(): ModuleNode {
    const children: SyntaxNode[] = [];
    for (const stmt of this.sf.statements) children.push(...this.lower(stmt));
    const hasMainGuard = this.sf.statements.some(
      (stmt) => ts.isIfStatement(stmt) && MAIN_GUARD.test(stmt.expression.getText(this.sf)),
    );
    return { kind: "module", docstring: this.moduleDocstring(), hasMainGuard, children };
  }

  private line(node: ts.Node): number {
    return this.sf.getLineAndCharacterOfPosition(node.getStart(this.sf)).line + 1;
  }

  private endLine(node: ts.Node): number {
    return this.sf.getLineAndCharacterOfPosition(node.getEnd()).line + 1;
  }

  private children(node: ts.Node): SyntaxNode[] {
    const out: SyntaxNode[] = [];
    ts.forEachChild(node, (child) => {
      out.push(...this.lower(child));
    });
    return out;
  }

  private lower(node: ts.Node): SyntaxNode[] {
    if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) {
      return [this.lowerClass(node)];
    }
    if (ts.isFunctionDeclaration(node) && node.name) {
      return [this.lowerFunction(node, node.name.text)];
    }
    if (
      ts.isMethodDeclaration(node) ||
      ts.isGetAccessorDeclaration(node) ||
      ts.isSetAccessorDeclaration(node)
    ) {
      return [this.lowerFunction(node, propertyName(node.name, this.sf))];
    }
    if (ts.isConstructorDeclaration(node)) {
      return [this.lowerFunction(node, "constructor")];
    }
    if (
      (ts.isVariableDeclaration(node) || ts.isPropertyDeclaration(node)) &&
      node.initializer &&
      (ts.isArrowFunction(node.initializer) || ts.isFunctionExpression(node.initializer))
    ) {
      return [this.lowerFunction(node.initializer, propertyName(node.name, this.sf), node)];
    }
    if (ts.isImportDeclaration(node)) return this.lowerImportDeclaration(node);
    if (ts.isExportDeclaration(node)) return this.lowerExportDeclaration(node);
    if (
      ts.isImportEqualsDeclaration(node) &&
      ts.isExternalModuleReference(node.moduleReference) &&
      ts.isStringLiteral(node.moduleReference.expression)
    ) {
      return [this.importNode(node.moduleReference.expression.text, "module", [], node)];
    }
    if (ts.isCallExpression(node)) return this.lowerCall(node);
    if (ts.isIfStatement(node)) {
      const conditional: SyntaxNode = {
        kind: "conditional",
        line: this.line(node),
        children: [...this.lower(node.expression), ...this.lower(node.thenStatement)],
      };
      // `else if` lowers to a sibling conditional
      return node.elseStatement ? [conditional, ...this.lower(node.elseStatement)] : [conditional];
    }
    if (
      ts.isForStatement(node) ||
      ts.isForInStatement(node) ||
      ts.isForOfStatement(node) ||
      ts.isWhileStatement(node) ||
      ts.isDoStatement(node)
    ) {
      return [{ kind: "loop", line: this.line(node), children: this.children(node) }];
    }
    if (ts.isCatchClause(node)) {
      return [{ kind: "handler", line: this.line(node), children: this.children(node) }];
    }
    if (ts.isBinaryExpression(node) && isShortCircuit(node.operatorToken.kind)) {
      return [
        {
          kind: "boolean",
          operator: node.operatorToken.getText(this.sf),
          line: this.line(node),
          children: this.children(node),
        },
      ];
    }
    if (ts.isConditionalExpression(node)) {
      return [{ kind: "ternary", line: this.line(node), children: this.children(node) }];
    }
    // Inline arrows and function expressions belong to the enclosing definition
    return this.children(node);
  }

  private lowerClass(node: ts.ClassDeclaration | ts.ClassExpression): ClassNode {
    const bases: string[] = [];
    for (const clause of node.heritageClauses ?? []) {
      for (const type of clause.types) bases.push(type.expression.getText(this.sf));
    }
    const children: SyntaxNode[] = [];
    for (const member of node.members) children.push(...this.lower(member));
    return {
      kind: "class",
      name: node.name?.text ?? "<anonymous>",
      line: this.line(node),
      endLine: this.endLine(node),
      docstring: this.jsDoc(node),
      bases,
      decorators: this.decorators(node),
      children,
    };
  }

  private lowerFunction(
    node: ts.SignatureDeclaration & { body?: ts.ConciseBody },
    name: string,
    declaration: ts.Node = node,
  ): FunctionNode {
    const modifiers = ts.canHaveModifiers(declaration) ? ts.getModifiers(declaration) ?? [] : [];
    const fnModifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) ?? [] : [];
    const params: Parameter[] = [];
    for (const p of node.parameters) {
      const text = p.name.getText(this.sf);
      if (text === "this") continue;
      params.push({
        name: p.dotDotDotToken ? `...${text}` : text,
        type: p.type ? p.type.getText(this.sf) : null,
        defaultValue: p.initializer ? p.initializer.getText(this.sf) : null,
      });
    }
    return {
      kind: "function",
      name,
      line: this.line(declaration),
      endLine: this.endLine(declaration),
      isAsync: [...modifiers, ...fnModifiers].some((m) => m.kind === ts.SyntaxKind.AsyncKeyword),
      params,
      returnType: node.type ? node.type.getText(this.sf) : null,
      docstring: this.jsDoc(declaration),
      decorators: this.decorators(declaration),
      isStatic: modifiers.some((m) => m.kind === ts.SyntaxKind.StaticKeyword),
      isAccessor: ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node),
      children: node.body ? this.lower(node.body) : [],
    };
  }

  private lowerCall(node: ts.CallExpression): SyntaxNode[] {
    const [first] = node.arguments;
    if (node.expression.kind === ts.SyntaxKind.ImportKeyword && first && ts.isStringLiteral(first)) {
      return [this.importNode(first.text, "module", [], node)];
    }
    if (
      ts.isIdentifier(node.expression) &&
      node.expression.text === "require" &&
      node.arguments.length === 1 &&
      first &&
      ts.isStringLiteral(first)
    ) {
      return [this.importNode(first.text, "module", [], node)];
    }
    return [
      {
        kind: "call",
        callee: calleeName(node.expression),
        line: this.line(node),
        children: this.children(node),
      },
    ];
  }

  private lowerImportDeclaration(node: ts.ImportDeclaration): SyntaxNode[] {
    if (!ts.isStringLiteral(node.moduleSpecifier)) return [];
    const clause = node.importClause;
    const names: string[] = [];
    let form: "module" | "member" = "module";
    if (clause?.name) names.push("default");
    const bindings = clause?.namedBindings;
    if (bindings && ts.isNamedImports(bindings)) {
      form = "member";
      for (const spec of bindings.elements) {
        names.push((spec.propertyName ?? spec.name).text);
      }
    } else if (bindings && ts.isNamespaceImport(bindings)) {
      names.push("*");
    }
    return [this.importNode(node.moduleSpecifier.text, form, names, node)];
  }

  private lowerExportDeclaration(node: ts.ExportDeclaration): SyntaxNode[] {
    if (!node.moduleSpecifier || !ts.isStringLiteral(node.moduleSpecifier)) return [];
    const names: string[] = [];
    if (node.exportClause && ts.isNamedExports(node.exportClause)) {
      for (const spec of node.exportClause.elements) {
        names.push((spec.propertyName ?? spec.name).text);
      }
    } else {
      names.push("*");
    }
    return [this.importNode(node.moduleSpecifier.text, "member", names, node)];
  }

  private importNode(
    specifier: string,
    form: "module" | "member",
    names: string[],
    node: ts.Node,
  ): ImportNode {
    return { kind: "import", specifier, level: 0, form, names, line: this.line(node) };
  }

  private decorators(node: ts.Node): string[] {
    if (!ts.canHaveDecorators(node)) return [];
    const out: string[] = [];
    for (const decorator of ts.getDecorators(node) ?? []) {
      const expr = ts.isCallExpression(decorator.expression)
        ? decorator.expression.expression
        : decorator.expression;
      out.push(calleeName(expr) ?? expr.getText(this.sf));
    }
    return out;
  }

  private jsDoc(node: ts.Node): string | null {
    const docs = ts.getJSDocCommentsAndTags(node).filter(ts.isJSDoc);
    const doc = docs[docs.length - 1];
    if (!doc) return null;
    const text = ts.getTextOfJSDocComment(doc.comment);
    return text ? text.trim() : null;
  }

  private moduleDocstring(): string | null {
    const ranges = ts.getLeadingCommentRanges(this.sf.text, 0) ?? [];
    for (const range of ranges) {
      const raw = this.sf.text.slice(range.pos, range.end);
      if (!raw.startsWith("/**") || !MODULE_DOC_TAG.test(raw)) continue;
      const body = raw
        .slice(3, -2)
        .split("\n")
        .map((l) => l.replace(/^\s*\*?\s?/, "").trimEnd())
        .join("\n")
        .replace(new RegExp(MODULE_DOC_TAG.source, "g"), "")
        .trim();
      return body.length > 0 ? body : null;
    }
    return null;
  }
}

function isShortCircuit(kind: ts.SyntaxKind): boolean {
  return (
    kind === ts.SyntaxKind.AmpersandAmpersandToken ||
    kind === ts.SyntaxKind.BarBarToken ||
    kind === ts.SyntaxKind.QuestionQuestionToken
  );
}

function propertyName(name: ts.PropertyName | ts.BindingName, sf: ts.SourceFile): string {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isPrivateIdentifier(name)) {
    return name.text;
  }
  return name.getText(sf);
}

/** `foo`, `this.save`, `a.b.c`; `make().save` yields `save` */
function calleeName(expr: ts.Expression): string | null {
  if (ts.isIdentifier(expr)) return expr.text;
  if (expr.kind === ts.SyntaxKind.ThisKeyword) return "this";
  if (ts.isPropertyAccessExpression(expr)) {
    const base = dotted(expr.expression);
    return base === null ? expr.name.text : `${base}.${expr.name.text}`;
  }
  return null;
}

function dotted(expr: ts.Expression): string | null {
  if (ts.isIdentifier(expr)) return expr.text;
  if (expr.kind === ts.SyntaxKind.ThisKeyword) return "this";
  if (ts.isPropertyAccessExpression(expr)) {
    const base = dotted(expr.expression);
    return base === null ? null : `${base}.${expr.name.text}`;
  }
  return null;
}

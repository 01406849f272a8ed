import { describe, it, expect } from "vitest";
import { computeComplexity, complexityRank } from "../src/complexity.js";
import { classifyFunction } from "../src/role-classifier.js";
import { extractTree } from "../src/tree-extractor.js";
import type { FunctionNode, SyntaxNode } from "../src/types.js";

function findFunction(nodes: SyntaxNode[], name: string): FunctionNode | undefined {
  for (const node of nodes) {
    if (node.kind === "function" && node.name === name) return node;
    if ("children" in node) {
      const hit = findFunction(node.children, name);
      if (hit) return hit;
    }
  }
  return undefined;
}

function complexityOf(path: string, source: string, name: string): number {
  const result = extractTree(path, source);
  if (!result.ok) throw new Error(result.failure.reason);
  const fn = findFunction(result.tree.root.children, name);
  if (!fn) throw new Error(`no function ${name}`);
  return computeComplexity(fn);
}

const py = (source: string, name: string): number => complexityOf("mod.py", source, name);

describe("computeComplexity (Python)", () => {
  it("scores a function without branches as 1", () => {
    expect(py("def f(x):\n    return x + 1\n", "f")).toBe(1);
  });

  it("adds one per independent if", () => {
    const source = [
      "def f(a, b, c):",
      "    if a:",
      "        pass",
      "    if b:",
      "        pass",
      "    if c:",
      "        pass",
      "",
    ].join("\n");
    expect(py(source, "f")).toBe(4);
  });

  it("counts elif but not else", () => {
    const source = [
      "def f(a):",
      "    if a > 1:",
      "        return 1",
      "    elif a > 0:",
      "        return 2",
      "    else:",
      "        return 3",
      "",
    ].join("\n");
    expect(py(source, "f")).toBe(3);
  });

  it("counts except handlers, not try or finally", () => {
    const source = [
      "def f():",
      "    try:",
      "        run()",
      "    except ValueError:",
      "        pass",
      "    except KeyError:",
      "        pass",
      "    finally:",
      "        done()",
      "",
    ].join("\n");
    expect(py(source, "f")).toBe(3);
  });

  it("counts each boolean operator", () => {
    expect(py("def f(a, b, c):\n    return a and b or c\n", "f")).toBe(3);
  });

  it("counts comprehension filters", () => {
    expect(py("def f(xs):\n    return [x for x in xs if x if x > 2]\n", "f")).toBe(3);
  });

  it("scores nested definitions on their own", () => {
    const source = [
      "def outer():",
      "    def inner(x):",
      "        if x:",
      "            return 1",
      "        return 0",
      "    return inner",
      "",
    ].join("\n");
    expect(py(source, "outer")).toBe(1);
    expect(py(source, "inner")).toBe(2);
  });

  it("counts branches inside a lambda towards the enclosing function", () => {
    expect(py("def f(x):\n    return (lambda y: y if y else 0)(x)\n", "f")).toBe(2);
  });

  it("counts loops", () => {
    const source = "def f(xs):\n    for x in xs:\n        while x:\n            x -= 1\n";
    expect(py(source, "f")).toBe(3);
  });
});

describe("computeComplexity (TypeScript)", () => {
  it("counts loops, catch clauses, ternaries and short-circuit operators", () => {
    const source = [
      "function f(items: number[], x?: number): number {",
      "  for (const i of items) {",
      "    console.log(i);",
      "  }",
      "  while (x) {",
      "    x--;",
      "  }",
      "  try {",
      "    run();",
      "  } catch (e) {",
      "    report(e);",
      "  }",
      "  const y = x ? 1 : 2;",
      "  const z = x ?? 0;",
      "  if (y > z) {",
      "    return y;",
      "  }",
      "  return z;",
      "}",
      "",
    ].join("\n");
    expect(complexityOf("src/f.ts", source, "f")).toBe(7);
  });

  it("treats else-if as one more branch", () => {
    const source = [
      "function g(a: number): number {",
      "  if (a > 1) {",
      "    return 1;",
      "  } else if (a > 0) {",
      "    return 2;",
      "  } else {",
      "    return 3;",
      "  }",
      "}",
      "",
    ].join("\n");
    expect(complexityOf("src/g.ts", source, "g")).toBe(3);
  });

  it("counts branches in inline callbacks", () => {
    const source = "const h = (xs: number[]) => xs.map((x) => (x > 0 ? x : -x));\n";
    expect(complexityOf("src/h.ts", source, "h")).toBe(2);
  });
});

describe("complexityRank", () => {
  it("maps scores onto letter grades", () => {
    expect(complexityRank(1)).toBe("A");
    expect(complexityRank(5)).toBe("A");
    expect(complexityRank(6)).toBe("B");
    expect(complexityRank(10)).toBe("B");
    expect(complexityRank(11)).toBe("C");
    expect(complexityRank(20)).toBe("C");
    expect(complexityRank(21)).toBe("D");
    expect(complexityRank(31)).toBe("E");
    expect(complexityRank(41)).toBe("F");
  });
});

describe("categorized complexity", () => {
  it("scores a private helper with one if and one for", () => {
    const source = [
      "def _save_report(self, lines):",
      "    if not lines:",
      "        return",
      "    for line in lines:",
      "        print(line)",
      "",
    ].join("\n");
    expect(classifyFunction("_save_report")).toBe("Private");
    expect(py(source, "_save_report")).toBe(3);
  });

  it("scores a branchless setter", () => {
    const source = "def save_documentation(doc):\n    write(doc)\n";
    expect(classifyFunction("save_documentation")).toBe("Setter");
    expect(py(source, "save_documentation")).toBe(1);
  });
});

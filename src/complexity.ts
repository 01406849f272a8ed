// src/complexity.ts — Complexity Calculator

import type { ComplexityRank, FunctionNode, SyntaxNode } from "./types.js";

/**
 * Cyclomatic complexity of a function: 1 plus every branch point in its body.
 * Nested function and class definitions are scored on their own and do not
 * contribute to the enclosing function.
 */
export function computeComplexity(fn: FunctionNode): number {
  return 1 + countBranches(fn.children);
}

function countBranches(nodes: SyntaxNode[]): number {
  let total = 0;
  for (const node of nodes) {
    switch (node.kind) {
      case "conditional":
      case "loop":
      case "handler":
      case "boolean":
      case "filter":
      case "ternary":
        total += 1 + countBranches(node.children);
        break;
      case "call":
        total += countBranches(node.children);
        break;
      case "function":
      case "class":
      case "import":
        break;
      default: {
        const exhaustive: never = node;
        return exhaustive;
      }
    }
  }
  return total;
}

/** Letter grade: A 1-5, B 6-10, C 11-20, D 21-30, E 31-40, F above. */
export function complexityRank(score: number): ComplexityRank {
  if (score <= 5) return "A";
  if (score <= 10) return "B";
  if (score <= 20) return "C";
  if (score <= 30) return "D";
  if (score <= 40) return "E";
  return "F";
}

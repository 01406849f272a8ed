// src/tree-extractor.ts — Tree Extractor
// Parses one file into the lowered syntax tree. Never throws: any failure
// becomes a ParseFailure the caller records.

import { extname } from "node:path";
import type { ExtractResult, Language, ModuleNode } from "./types.js";
import {
  DTS_EXTENSION,
  JAVASCRIPT_EXTENSIONS,
  PYTHON_EXTENSIONS,
  TYPESCRIPT_EXTENSIONS,
} from "./types.js";
import { createPythonParser, type PythonParser } from "./parsers/python-parser.js";
import { parseTypeScript } from "./parsers/typescript-parser.js";

export interface TreeExtractor {
  extract(path: string, content: string | Uint8Array): ExtractResult;
}

/**
 * Map a path to the language that parses it, or null when no front end
 * handles the extension. Declaration files are not analyzed.
 */
export function languageFor(path: string): Language | null {
  if (DTS_EXTENSION.test(path)) return null;
  const ext = extname(path).toLowerCase();
  if (PYTHON_EXTENSIONS.some((e) => e === ext)) return "python";
  if (TYPESCRIPT_EXTENSIONS.some((e) => e === ext)) return "typescript";
  if (JAVASCRIPT_EXTENSIONS.some((e) => e === ext)) return "javascript";
  return null;
}

export function decodeSource(content: string | Uint8Array): string {
  const text =
    typeof content === "string" ? content : new TextDecoder("utf-8", { fatal: true }).decode(content);
  if (text.includes("\u0000")) throw new Error("binary content (NUL byte)");
  // Leading BOM would otherwise shift the first token
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Create an extractor for one analysis run. The Python parser is created on
 * first use and owned by this extractor.
 */
export function createTreeExtractor(): TreeExtractor {
  let python: PythonParser | undefined;

  return {
    extract(path: string, content: string | Uint8Array): ExtractResult {
      const language = languageFor(path);
      if (!language) {
        return { ok: false, failure: { path, reason: `unsupported file type "${extname(path)}"` } };
      }
      try {
        const text = decodeSource(content);
        let root: ModuleNode;
        if (language === "python") {
          python ??= createPythonParser();
          root = python.parse(text);
        } else {
          root = parseTypeScript(path, text);
        }
        return {
          ok: true,
          tree: { path, language, lineCount: text.split("\n").length, root },
        };
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        return { ok: false, failure: { path, reason } };
      }
    },
  };
}

/** One-shot extraction with a throwaway extractor. */
export function extractTree(path: string, content: string | Uint8Array): ExtractResult {
  return createTreeExtractor().extract(path, content);
}

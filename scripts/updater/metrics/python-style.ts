import Parser from "tree-sitter";
import Python from "tree-sitter-python";

import { percent, round2, splitLines, type MetricGroup, type StyleMetrics } from "./types";

export interface Definition {
  kind: "def" | "class";
  annotated: boolean;
  hasDocstring: boolean;
}

const ANNOTATED_PARAMETERS = new Set(["typed_parameter", "typed_default_parameter"]);

let parser: Parser | null = null;

function parsePython(text: string): Parser.Tree {
  if (!parser) {
    parser = new Parser();
    parser.setLanguage(Python);
  }
  // the binding rejects strings longer than its default input buffer
  return parser.parse(text, undefined, { bufferSize: Math.max(32 * 1024, text.length * 2 + 1) });
}

function hasDocstring(node: Parser.SyntaxNode): boolean {
  const body = node.childForFieldName("body");
  const first = body?.namedChildren.find((child) => child.type !== "comment");
  if (!first || first.type !== "expression_statement") {
    return false;
  }
  return first.firstNamedChild?.type === "string";
}

function isAnnotated(node: Parser.SyntaxNode): boolean {
  if (node.childForFieldName("return_type")) {
    return true;
  }
  const parameters = node.childForFieldName("parameters");
  return parameters?.namedChildren.some((parameter) => ANNOTATED_PARAMETERS.has(parameter.type)) ?? false;
}

function walk(node: Parser.SyntaxNode, visit: (node: Parser.SyntaxNode) => void) {
  visit(node);
  for (const child of node.namedChildren) {
    walk(child, visit);
  }
}

export function findDefinitions(text: string): Definition[] {
  const definitions: Definition[] = [];
  walk(parsePython(text).rootNode, (node) => {
    if (node.type === "function_definition") {
      definitions.push({ kind: "def", annotated: isAnnotated(node), hasDocstring: hasDocstring(node) });
    } else if (node.type === "class_definition") {
      definitions.push({ kind: "class", annotated: false, hasDocstring: hasDocstring(node) });
    }
  });
  return definitions;
}

// Triple-quoted strings say nothing about the preferred quote character.
export function countQuotes(text: string): { single: number; double: number } {
  const counts = { single: 0, double: 0 };
  walk(parsePython(text).rootNode, (node) => {
    if (node.type !== "string") {
      return;
    }
    const opening = (node.firstChild?.text ?? "").replace(/^[A-Za-z]+/, "");
    if (opening === "'") {
      counts.single += 1;
    } else if (opening === '"') {
      counts.double += 1;
    }
  });
  return counts;
}

function quoteStyle(single: number, double: number): string {
  if (single === 0 && double === 0) {
    return "";
  }
  if (single === double) {
    return "mixed";
  }
  return single > double ? "single" : "double";
}

function indentStyle(tabs: number, spaces: number): string {
  if (tabs > 0 && spaces > 0) {
    return "mixed";
  }
  if (tabs > 0) {
    return "tabs";
  }
  return spaces > 0 ? "spaces" : "";
}

// ties go to the smaller width
function mostCommonWidth(steps: Map<number, number>): number {
  let width = 0;
  let best = 0;
  for (const [step, count] of [...steps.entries()].sort(([a], [b]) => a - b)) {
    if (count > best) {
      width = step;
      best = count;
    }
  }
  return width;
}

export const pythonStyle: MetricGroup = async (tree, config) => {
  let totalLines = 0;
  let blankLines = 0;
  let nonBlankLength = 0;
  let maxLineLength = 0;
  let longLines = 0;
  let tabIndented = 0;
  let spaceIndented = 0;
  let single = 0;
  let double = 0;
  let functions = 0;
  let annotatedFunctions = 0;
  let definitions = 0;
  let documented = 0;
  const steps = new Map<number, number>();

  for (const source of tree.pythonSources) {
    const lines = splitLines(source.text);
    let previousIndent = 0;

    for (const line of lines) {
      const length = Array.from(line).length;
      totalLines += 1;
      maxLineLength = Math.max(maxLineLength, length);
      if (length > config.maxLineLength) {
        longLines += 1;
      }

      const trimmed = line.trim();
      if (!trimmed) {
        blankLines += 1;
        continue;
      }
      nonBlankLength += length;

      const indent = /^[ \t]*/.exec(line)?.[0] ?? "";
      if (indent.startsWith("\t")) {
        tabIndented += 1;
      } else if (indent.startsWith(" ")) {
        spaceIndented += 1;
      }

      if (trimmed.startsWith("#") || indent.includes("\t")) {
        continue;
      }
      if (indent.length > previousIndent) {
        const step = indent.length - previousIndent;
        steps.set(step, (steps.get(step) ?? 0) + 1);
      }
      previousIndent = indent.length;
    }

    const quotes = countQuotes(source.text);
    single += quotes.single;
    double += quotes.double;

    for (const definition of findDefinitions(source.text)) {
      definitions += 1;
      if (definition.hasDocstring) {
        documented += 1;
      }
      if (definition.kind === "def") {
        functions += 1;
        if (definition.annotated) {
          annotatedFunctions += 1;
        }
      }
    }
  }

  const nonBlankLines = totalLines - blankLines;
  const metrics: StyleMetrics = {
    python_files: tree.pythonSources.length,
    python_lines: totalLines,
    blank_lines_pct: percent(blankLines, totalLines),
    avg_line_length: nonBlankLines > 0 ? round2(nonBlankLength / nonBlankLines) : 0,
    max_line_length: maxLineLength,
    long_lines_pct: percent(longLines, totalLines),
    indent_style: indentStyle(tabIndented, spaceIndented),
    indent_width: mostCommonWidth(steps),
    quote_style: quoteStyle(single, double),
    type_hints_pct: percent(annotatedFunctions, functions),
    docstring_pct: percent(documented, definitions),
  };
  return metrics;
};

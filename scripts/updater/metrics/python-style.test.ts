import { describe, it, expect, beforeAll } from "vitest";
import { loadMetricsConfig, type MetricsConfig } from "../config";
import { countQuotes, findDefinitions, pythonStyle } from "./python-style";
import type { ProjectTree } from "./types";

const GREETER = `#!/usr/bin/env python3
"""Module docstring."""
from __future__ import annotations


def greet(name: str) -> str:
    """Say hello."""
    return 'hello ' + name


class Greeter:
    def run(self):
        print('hi')
`;

function treeOf(...texts: string[]): ProjectTree {
  return {
    root: "/project",
    files: texts.map((_, index) => `module_${index}.py`),
    pythonSources: texts.map((text, index) => ({ path: `module_${index}.py`, text })),
  };
}

describe("findDefinitions", () => {
  it("detects annotations and docstrings", () => {
    const source = [
      "async def fetch(url, *, timeout: float = 1.0):",
      "    pass",
      "def plain(a, b=(1, 2)):",
      "    'doc'",
      "class Empty(Base):",
      "    # comment",
      '    """Documented."""',
    ].join("\n");

    expect(findDefinitions(source)).toEqual([
      { kind: "def", annotated: true, hasDocstring: false },
      { kind: "def", annotated: false, hasDocstring: true },
      { kind: "class", annotated: false, hasDocstring: true },
    ]);
  });

  it("does not count code shown inside docstrings", () => {
    const source = [
      "def run():",
      '    """Example:',
      "",
      "    def hook(event: str) -> None: ...",
      '    """',
      "    return 1",
      "",
    ].join("\n");

    expect(findDefinitions(source)).toEqual([{ kind: "def", annotated: false, hasDocstring: true }]);
  });

  it("reads parameters split by comments across lines", () => {
    const source = "def f(a,  # don't touch\n      b: int):\n    pass\n";

    expect(findDefinitions(source)).toEqual([{ kind: "def", annotated: true, hasDocstring: false }]);
  });

  it("finds nested and decorated definitions", () => {
    const source = [
      "class Outer:",
      "    @property",
      "    def value(self) -> int:",
      "        return 1",
      "",
      "    class Inner:",
      "        'Nested.'",
      "",
    ].join("\n");

    expect(findDefinitions(source)).toEqual([
      { kind: "class", annotated: false, hasDocstring: false },
      { kind: "def", annotated: true, hasDocstring: false },
      { kind: "class", annotated: false, hasDocstring: true },
    ]);
  });
});

describe("countQuotes", () => {
  it("counts single-line literals outside comments and triple quotes", () => {
    const source = `x = "a" + 'b' + "c"  # 'comment'\ns = """doc 'x'"""\nt = 'it\\'s'\n`;
    expect(countQuotes(source)).toEqual({ single: 2, double: 2 });
  });

  it("is not confused by apostrophes in comments or string prefixes", () => {
    const source = `# don't count this\nname = f"{user}" + r'raw' + b"bytes"\n`;
    expect(countQuotes(source)).toEqual({ single: 1, double: 2 });
  });
});

describe("pythonStyle", () => {
  let config: MetricsConfig;

  beforeAll(async () => {
    config = await loadMetricsConfig();
  });

  it("summarises formatting and conventions", async () => {
    await expect(pythonStyle(treeOf(GREETER), config)).resolves.toEqual({
      python_files: 1,
      python_lines: 13,
      blank_lines_pct: 30,
      avg_line_length: 22.67,
      max_line_length: 34,
      long_lines_pct: 0,
      indent_style: "spaces",
      indent_width: 4,
      quote_style: "single",
      type_hints_pct: 50,
      docstring_pct: 33,
    });
  });

  it("reports tab and mixed indentation", async () => {
    const tabs = "if ready:\n\tgo()\n";
    const spaces = "if ready:\n  go()\n";

    const tabbed = await pythonStyle(treeOf(tabs), config);
    const mixed = await pythonStyle(treeOf(tabs, spaces), config);

    expect(tabbed.indent_style).toBe("tabs");
    expect(tabbed.indent_width).toBe(0);
    expect(mixed.indent_style).toBe("mixed");
    expect(mixed.indent_width).toBe(2);
  });

  it("counts lines above the configured length", async () => {
    const metrics = await pythonStyle(treeOf(`x = "${"a".repeat(10)}"\n`), { ...config, maxLineLength: 10 });
    expect(metrics.long_lines_pct).toBe(100);
    expect(metrics.max_line_length).toBe(16);
    expect(metrics.quote_style).toBe("double");
  });

  it("handles empty sources", async () => {
    const metrics = await pythonStyle(treeOf(""), config);
    expect(metrics).toMatchObject({
      python_lines: 0,
      blank_lines_pct: 0,
      avg_line_length: 0,
      indent_style: "",
      quote_style: "",
      type_hints_pct: 0,
    });
  });
});

import { describe, expect, it } from "vitest";

import { analyzeCell, stripDirectives } from "./analyzer.js";

function lines(...source: string[]): string {
  return source.join("\n");
}

describe("analyzeCell", () => {
  it("reports module-level definitions and external references", () => {
    const analysis = analyzeCell("y = x + 1");

    expect(analysis.definitions).toEqual(["y"]);
    expect(analysis.references).toEqual(["x"]);
    expect(analysis.note).toBeNull();
  });

  it("does not report names bound before their first use", () => {
    expect(analyzeCell(lines("x = 1", "y = x")).references).toEqual([]);
    expect(analyzeCell(lines("y = x", "x = 1")).references).toEqual(["x"]);
  });

  it("treats augmented assignment as a read then a binding", () => {
    const analysis = analyzeCell("total += value");

    expect(analysis.references).toEqual(["total", "value"]);
    expect(analysis.definitions).toEqual(["total"]);
  });

  it("excludes built-ins and honours a custom table", () => {
    expect(analyzeCell("print(len(items))").references).toEqual(["items"]);
    expect(analyzeCell("spark.read()", { builtins: new Set(["spark"]) }).references).toEqual([]);
  });

  it("keeps parameters and comprehension targets local", () => {
    const analysis = analyzeCell(
      lines(
        "def scale(values, factor=default_factor):",
        "    return [v * factor for v in values if v > threshold]",
      ),
    );

    expect(analysis.definitions).toEqual(["scale"]);
    expect(analysis.functions).toEqual(["scale"]);
    expect(analysis.references).toEqual(["default_factor", "threshold"]);
  });

  it("lets deferred bodies see names bound later in the cell", () => {
    expect(analyzeCell(lines("def report():", "    return summary", "summary = 1")).references).toEqual(
      [],
    );
    expect(analyzeCell(lines("print(later)", "later = 1")).references).toEqual(["later"]);
  });

  it("promotes names declared global in a nested scope", () => {
    const analysis = analyzeCell(
      lines("def setup():", "    global config", "    config = load()"),
    );

    expect(analysis.definitions).toEqual(["setup", "config"]);
    expect(analysis.references).toEqual(["load"]);
  });

  it("hides class attributes from methods", () => {
    const analysis = analyzeCell(
      lines(
        "class Model(Base, metaclass=Meta):",
        "    size = 3",
        "    def area(self):",
        "        return size",
      ),
    );

    expect(analysis.definitions).toEqual(["Model"]);
    expect(analysis.classes).toEqual(["Model"]);
    expect(analysis.references).toEqual(["Base", "Meta", "size"]);
  });

  it("binds import aliases and top-level packages", () => {
    const analysis = analyzeCell(
      lines(
        "import numpy as np, os.path",
        "from collections import (OrderedDict as OD, deque)",
        "from math import *",
      ),
    );

    expect(analysis.definitions).toEqual(["np", "os", "OD", "deque"]);
    expect(analysis.imports).toEqual(["np", "os", "OD", "deque"]);
    expect(analysis.references).toEqual([]);
  });

  it("binds walrus targets outside the comprehension", () => {
    const analysis = analyzeCell("squares = [(last := n * n) for n in range(5)]");

    expect(analysis.definitions).toEqual(["last", "squares"]);
    expect(analysis.references).toEqual([]);
  });

  it("reads f-string replacement fields", () => {
    expect(analyzeCell('print(f"{total:>{width}} {label!r}")').references).toEqual([
      "label",
      "total",
      "width",
    ]);
  });

  it("ignores keyword-argument and attribute names", () => {
    const analysis = analyzeCell("result = frame.groupby(by=key).agg(total=amount)");

    expect(analysis.references).toEqual(["amount", "frame", "key"]);
    expect(analysis.definitions).toEqual(["result"]);
  });

  it("binds loop, with and except targets", () => {
    const analysis = analyzeCell(
      lines(
        "for i, (key, value) in enumerate(pairs):",
        "    pass",
        "with open(path) as handle, lock:",
        "    data = handle.read()",
        "try:",
        "    risky()",
        "except ValueError as err:",
        "    message = str(err)",
      ),
    );

    expect(analysis.definitions).toEqual([
      "i",
      "key",
      "value",
      "handle",
      "data",
      "err",
      "message",
    ]);
    expect(analysis.references).toEqual(["lock", "pairs", "path", "risky"]);
  });

  it("walks lambda defaults outside the lambda", () => {
    const analysis = analyzeCell(
      "handler = lambda event, retries=max_retries: process(event, retries)",
    );

    expect(analysis.definitions).toEqual(["handler"]);
    expect(analysis.references).toEqual(["max_retries", "process"]);
  });

  it("binds match captures and reads class patterns", () => {
    const analysis = analyzeCell(
      lines(
        "match command:",
        "    case Point(x=0, y=yy) if yy > limit:",
        "        hit = yy",
        "    case [first, *rest]:",
        "        hit = first",
      ),
    );

    expect(analysis.definitions).toEqual(["yy", "hit", "first", "rest"]);
    expect(analysis.references).toEqual(["Point", "command", "limit"]);
  });

  it("walks decorators before binding the decorated name", () => {
    const analysis = analyzeCell(lines("@register(kind)", "class Widget:", "    pass"));

    expect(analysis.definitions).toEqual(["Widget"]);
    expect(analysis.references).toEqual(["kind", "register"]);
  });

  it("strips directive lines and keeps captured shell output bindings", () => {
    const analysis = analyzeCell(
      lines("%matplotlib inline", "!pip install x", "files = !ls", "print(files)"),
    );

    expect(analysis.definitions).toEqual(["files"]);
    expect(analysis.references).toEqual([]);
    expect(analysis.note).toBeNull();
  });

  it("returns an empty analysis for cell magics", () => {
    const analysis = analyzeCell("\n%%bash\necho hi\n");

    expect(analysis.definitions).toEqual([]);
    expect(analysis.references).toEqual([]);
    expect(analysis.note).toEqual({ kind: "cell_magic", detail: "cell magic %%bash" });
  });

  it("fails open on syntax errors", () => {
    const analysis = analyzeCell("def broken(:\n    pass");

    expect(analysis.definitions).toEqual([]);
    expect(analysis.references).toEqual([]);
    expect(analysis.note).toEqual({
      kind: "parse_failed",
      detail: "'(' was never closed (line 2)",
    });
  });
});

describe("stripDirectives", () => {
  it("only rewrites captures for shell and magic prefixes", () => {
    expect(stripDirectives("a = !ls\nb = ?x\n?help", ["!", "?"])).toBe("a = None\nb = ?x\n");
  });
});

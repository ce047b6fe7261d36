/*
Purpose: scope-aware extraction of the names a notebook cell binds and reads.
Assumptions: cells are Python; directive lines (%magic, !shell, ?help) are not Python and are
stripped first. The analysis never throws; unparsable cells come back empty with a note.
Usage: analyzeCell("y = x + 1") -> { definitions: ["y"], references: ["x"], ... }.
*/

import { DEFAULT_DIRECTIVE_PREFIXES } from "../core/config.js";
import { AnalysisSyntaxError } from "../core/errors.js";

import {
  findTopLevel,
  isName,
  isOp,
  matchingClose,
  parseStatements,
  splitCommas,
  splitTopLevel,
  type CompoundStatement,
  type Statement,
} from "./blocks.js";
import { defaultBuiltins } from "./builtins.js";
import { ScopeStack } from "./scope.js";
import type { Token } from "./tokenizer.js";

// =============================================================================
// TYPES
// =============================================================================

export type AnalysisNoteKind = "parse_failed" | "cell_magic";

export type AnalysisNote = {
  kind: AnalysisNoteKind;
  detail: string;
};

export type CellAnalysis = {
  definitions: string[];
  references: string[];
  imports: string[];
  functions: string[];
  classes: string[];
  note: AnalysisNote | null;
};

export type AnalyzeOptions = {
  builtins?: ReadonlySet<string>;
  directivePrefixes?: readonly string[];
};

const KEYWORDS = new Set([
  "False",
  "None",
  "True",
  "and",
  "as",
  "assert",
  "async",
  "await",
  "break",
  "class",
  "continue",
  "def",
  "del",
  "elif",
  "else",
  "except",
  "finally",
  "for",
  "from",
  "global",
  "if",
  "import",
  "in",
  "is",
  "lambda",
  "nonlocal",
  "not",
  "or",
  "pass",
  "raise",
  "return",
  "try",
  "while",
  "with",
  "yield",
]);

const AUGMENTED_OPERATORS = new Set([
  "+=",
  "-=",
  "*=",
  "/=",
  "//=",
  "%=",
  "**=",
  ">>=",
  "<<=",
  "&=",
  "|=",
  "^=",
  "@=",
]);

// =============================================================================
// PUBLIC API
// =============================================================================

export function emptyAnalysis(note: AnalysisNote | null = null): CellAnalysis {
  return { definitions: [], references: [], imports: [], functions: [], classes: [], note };
}

export function analyzeCell(source: string, options: AnalyzeOptions = {}): CellAnalysis {
  const prefixes = options.directivePrefixes ?? DEFAULT_DIRECTIVE_PREFIXES;
  const builtins = options.builtins ?? defaultBuiltins();

  const firstLine = source.split(/\r\n|\r|\n/).find((line) => line.trim().length > 0);
  if (firstLine !== undefined && firstLine.trimStart().startsWith("%%")) {
    const magic = firstLine.trim().split(/\s+/)[0];
    return emptyAnalysis({ kind: "cell_magic", detail: `cell magic ${magic}` });
  }

  try {
    return summarize(walkCell(stripDirectives(source, prefixes)), builtins);
  } catch (err) {
    if (err instanceof AnalysisSyntaxError) {
      return emptyAnalysis({ kind: "parse_failed", detail: err.message });
    }
    throw err;
  }
}

function walkCell(source: string): ScopeStack {
  const scopes = new ScopeStack();
  new StatementWalker(scopes).walkBlock(parseStatements(source));
  return scopes;
}

function summarize(scopes: ScopeStack, builtins: ReadonlySet<string>): CellAnalysis {
  const bindings = scopes.moduleBindings();
  const references = [...scopes.externalReads()].filter((name) => !builtins.has(name)).sort();

  return {
    definitions: bindings.definitions,
    references,
    imports: [...bindings.imports],
    functions: [...bindings.functions],
    classes: [...bindings.classes],
    note: null,
  };
}

// Directive lines are dropped; `name = !cmd` and `name = %magic` keep only the binding.
export function stripDirectives(source: string, prefixes: readonly string[]): string {
  const capturing: string[] = prefixes.filter((prefix) => prefix === "!" || prefix === "%");

  return source
    .split(/\r\n|\r|\n/)
    .map((line) => {
      const trimmed = line.trimStart();
      if (prefixes.some((prefix) => trimmed.startsWith(prefix))) {
        return "";
      }
      const capture = /^(\s*)([A-Za-z_]\w*(?:\s*,\s*[A-Za-z_]\w*)*)\s*=\s*(\S)/.exec(line);
      if (capture && capturing.includes(capture[3])) {
        return `${capture[1]}${capture[2]} = None`;
      }
      return line;
    })
    .join("\n");
}

// =============================================================================
// STATEMENT WALKER
// =============================================================================

class StatementWalker {
  constructor(private readonly scopes: ScopeStack) {}

  walkBlock(statements: Statement[]): void {
    for (const statement of statements) {
      if (statement.kind === "simple") {
        this.walkSimple(statement.tokens);
      } else {
        this.walkCompound(statement);
      }
    }
  }

  // ===========================================================================
  // SIMPLE STATEMENTS
  // ===========================================================================

  private walkSimple(tokens: Token[]): void {
    const head = tokens[0];

    if (isOp(head, "@")) {
      this.walkExpr(tokens.slice(1));
      return;
    }

    if (isName(head)) {
      switch (head.value) {
        case "import":
          this.walkImport(tokens.slice(1));
          return;
        case "from":
          this.walkFromImport(tokens);
          return;
        case "global":
          for (const token of tokens.slice(1)) {
            if (isName(token)) this.scopes.declareGlobal(token.value);
          }
          return;
        case "nonlocal":
          for (const token of tokens.slice(1)) {
            if (isName(token)) this.scopes.declareNonlocal(token.value);
          }
          return;
        case "type":
          if (this.walkTypeAlias(tokens)) return;
          break;
      }
    }

    this.walkAssignmentOrExpr(tokens);
  }

  private walkImport(tokens: Token[]): void {
    for (const clause of splitCommas(tokens)) {
      const asIndex = clause.findIndex((token) => isName(token, "as"));
      const bound = asIndex >= 0 ? clause[asIndex + 1] : clause[0];
      if (isName(bound)) this.scopes.bind(bound.value, "import");
    }
  }

  private walkFromImport(tokens: Token[]): void {
    const importIndex = tokens.findIndex((token) => isName(token, "import"));
    if (importIndex < 0) {
      throw new AnalysisSyntaxError("expected 'import'", tokens[0].line);
    }

    let names = tokens.slice(importIndex + 1);
    if (isOp(names[0], "(")) {
      names = names.slice(1, matchingClose(names, 0));
    }
    if (names.length === 1 && isOp(names[0], "*")) return;

    for (const clause of splitCommas(names)) {
      const bound = clause.length >= 3 && isName(clause[1], "as") ? clause[2] : clause[0];
      if (isName(bound)) this.scopes.bind(bound.value, "import");
    }
  }

  // `type Alias[T] = value`; the value is evaluated lazily with T in scope.
  private walkTypeAlias(tokens: Token[]): boolean {
    const alias = tokens[1];
    if (!isName(alias) || !(isOp(tokens[2], "=") || isOp(tokens[2], "["))) {
      return false;
    }

    let valueStart = 3;
    this.scopes.push("lambda");
    if (isOp(tokens[2], "[")) {
      const close = matchingClose(tokens, 2);
      this.bindTypeParams(tokens.slice(3, close));
      valueStart = close + 2;
    }
    this.walkExpr(tokens.slice(valueStart));
    this.scopes.pop();

    this.scopes.bind(alias.value);
    return true;
  }

  private walkAssignmentOrExpr(tokens: Token[]): void {
    const augmented = findTopLevel(
      tokens,
      (token) => token.kind === "op" && AUGMENTED_OPERATORS.has(token.value),
    );
    if (augmented >= 0) {
      const target = tokens.slice(0, augmented);
      this.walkExpr(target);
      this.walkExpr(tokens.slice(augmented + 1));
      this.bindTargets(target);
      return;
    }

    const equals = findTopLevel(tokens, (token) => isOp(token, "="));
    const colon = findTopLevel(tokens, (token) => isOp(token, ":"));
    if (colon >= 0 && (equals < 0 || colon < equals)) {
      this.walkAnnotated(tokens, colon, equals);
      return;
    }

    if (equals < 0) {
      this.walkExpr(tokens);
      return;
    }

    const parts = splitTopLevel(tokens, (token) => isOp(token, "="));
    const value = parts[parts.length - 1];
    this.walkExpr(value);
    for (const target of parts.slice(0, -1)) {
      this.bindTargets(target);
    }
  }

  private walkAnnotated(tokens: Token[], colon: number, equals: number): void {
    const target = tokens.slice(0, colon);
    const annotation = tokens.slice(colon + 1, equals >= 0 ? equals : tokens.length);

    this.walkExpr(annotation);
    if (equals >= 0) {
      this.walkExpr(tokens.slice(equals + 1));
    }

    if (target.length === 1 && isName(target[0])) {
      this.scopes.bind(target[0].value);
    } else {
      this.walkExpr(target);
    }
  }

  // ===========================================================================
  // COMPOUND STATEMENTS
  // ===========================================================================

  private walkCompound(statement: CompoundStatement): void {
    const { header, body } = statement;

    switch (statement.keyword) {
      case "if":
      case "elif":
      case "while":
      case "match":
        this.walkExpr(header);
        this.walkBlock(body);
        return;
      case "else":
      case "try":
      case "finally":
        this.walkBlock(body);
        return;
      case "except":
        this.walkExcept(header);
        this.walkBlock(body);
        return;
      case "for":
        this.walkFor(header, statement.line);
        this.walkBlock(body);
        return;
      case "with":
        this.walkWith(header);
        this.walkBlock(body);
        return;
      case "def":
        this.walkFunction(header, body, statement.line);
        return;
      case "class":
        this.walkClass(header, body, statement.line);
        return;
      case "case":
        this.walkCase(header);
        this.walkBlock(body);
        return;
      default:
        throw new AnalysisSyntaxError(`unsupported statement '${statement.keyword}'`, statement.line);
    }
  }

  private walkExcept(header: Token[]): void {
    const clause = isOp(header[0], "*") ? header.slice(1) : header;
    const asIndex = findTopLevel(clause, (token) => isName(token, "as"));
    if (asIndex < 0) {
      this.walkExpr(clause);
      return;
    }
    this.walkExpr(clause.slice(0, asIndex));
    const bound = clause[asIndex + 1];
    if (isName(bound)) this.scopes.bind(bound.value);
  }

  private walkFor(header: Token[], line: number): void {
    const inIndex = findTopLevel(header, (token) => isName(token, "in"));
    if (inIndex < 0) {
      throw new AnalysisSyntaxError("expected 'in' in for statement", line);
    }
    this.walkExpr(header.slice(inIndex + 1));
    this.bindTargets(header.slice(0, inIndex));
  }

  private walkWith(header: Token[]): void {
    let items = splitCommas(header);

    if (isOp(header[0], "(") && matchingClose(header, 0) === header.length - 1) {
      const inner = header.slice(1, -1);
      if (findTopLevel(inner, (token) => isName(token, "as")) >= 0) {
        items = splitCommas(inner);
      }
    }

    for (const item of items) {
      const asIndex = findTopLevel(item, (token) => isName(token, "as"));
      if (asIndex < 0) {
        this.walkExpr(item);
        continue;
      }
      this.walkExpr(item.slice(0, asIndex));
      this.bindTargets(item.slice(asIndex + 1));
    }
  }

  private walkFunction(header: Token[], body: Statement[], line: number): void {
    const name = header[0];
    if (!isName(name)) {
      throw new AnalysisSyntaxError("expected function name", line);
    }

    let cursor = 1;
    let typeParams: Token[] = [];
    if (isOp(header[cursor], "[")) {
      const close = matchingClose(header, cursor);
      typeParams = header.slice(cursor + 1, close);
      cursor = close + 1;
    }
    if (!isOp(header[cursor], "(")) {
      throw new AnalysisSyntaxError("expected '(' after function name", line);
    }

    const close = matchingClose(header, cursor);
    const params = parseParameters(header.slice(cursor + 1, close));
    const returns = isOp(header[close + 1], "->") ? header.slice(close + 2) : [];

    for (const param of params) {
      this.walkExpr(param.annotation);
      this.walkExpr(param.defaultValue);
    }
    this.walkExpr(returns);
    this.scopes.bind(name.value, "function");

    this.scopes.push("function");
    this.bindTypeParams(typeParams);
    for (const param of params) {
      this.scopes.bind(param.name);
    }
    this.walkBlock(body);
    this.scopes.pop();
  }

  private walkClass(header: Token[], body: Statement[], line: number): void {
    const name = header[0];
    if (!isName(name)) {
      throw new AnalysisSyntaxError("expected class name", line);
    }

    let cursor = 1;
    let typeParams: Token[] = [];
    if (isOp(header[cursor], "[")) {
      const close = matchingClose(header, cursor);
      typeParams = header.slice(cursor + 1, close);
      cursor = close + 1;
    }
    if (isOp(header[cursor], "(")) {
      const close = matchingClose(header, cursor);
      this.walkCallArguments(header.slice(cursor + 1, close));
    }

    this.scopes.push("class");
    this.bindTypeParams(typeParams);
    this.walkBlock(body);
    this.scopes.pop();

    this.scopes.bind(name.value, "class");
  }

  private walkCase(header: Token[]): void {
    const guardIndex = findTopLevel(header, (token) => isName(token, "if"));
    const pattern = guardIndex >= 0 ? header.slice(0, guardIndex) : header;

    pattern.forEach((token, index) => {
      if (token.kind !== "name" || KEYWORDS.has(token.value) || token.value === "_") return;
      if (isOp(pattern[index - 1], ".")) return;
      if (isOp(pattern[index + 1], "=")) return;
      if (isOp(pattern[index + 1], ".") || isOp(pattern[index + 1], "(")) {
        this.scopes.read(token.value);
        return;
      }
      this.scopes.bind(token.value);
    });

    if (guardIndex >= 0) {
      this.walkExpr(header.slice(guardIndex + 1));
    }
  }

  private bindTypeParams(tokens: Token[]): void {
    for (const param of splitCommas(tokens)) {
      const name = param.find((token) => isName(token));
      if (name) this.scopes.bind(name.value);
    }
  }

  // ===========================================================================
  // TARGETS
  // ===========================================================================

  private bindTargets(tokens: Token[]): void {
    for (const part of splitCommas(tokens)) {
      const target = isOp(part[0], "*") ? part.slice(1) : part;
      if (target.length === 0) continue;

      if (target.length === 1 && isName(target[0]) && !KEYWORDS.has(target[0].value)) {
        this.scopes.bind(target[0].value);
        continue;
      }

      const first = target[0];
      if (
        (isOp(first, "(") || isOp(first, "[")) &&
        matchingClose(target, 0) === target.length - 1
      ) {
        this.bindTargets(target.slice(1, -1));
        continue;
      }

      // Attribute and subscript targets only read their base.
      this.walkExpr(target);
    }
  }

  // ===========================================================================
  // EXPRESSIONS
  // ===========================================================================

  walkExpr(tokens: Token[]): void {
    let i = 0;

    while (i < tokens.length) {
      const token = tokens[i];

      if (token.kind === "string") {
        for (const field of token.embedded ?? []) {
          this.walkExpr(field);
        }
        i += 1;
        continue;
      }

      if (token.kind === "op") {
        if (token.value === "(" || token.value === "[" || token.value === "{") {
          const close = matchingClose(tokens, i);
          const inner = tokens.slice(i + 1, close);
          const isCall = token.value === "(" && i > 0 && endsValue(tokens[i - 1]);
          if (isCall) {
            this.walkCallArguments(inner);
          } else if (hasTopLevelFor(inner)) {
            this.walkComprehension(inner);
          } else {
            this.walkExpr(inner);
          }
          i = close + 1;
          continue;
        }
        i += 1;
        continue;
      }

      if (token.kind !== "name") {
        i += 1;
        continue;
      }

      if (token.value === "lambda") {
        i = this.walkLambda(tokens, i);
        continue;
      }

      if (KEYWORDS.has(token.value) || isOp(tokens[i - 1], ".")) {
        i += 1;
        continue;
      }

      if (isOp(tokens[i + 1], ":=")) {
        const valueEnd = findTopLevelOrEnd(tokens, i + 2, (t) => isOp(t, ","));
        this.walkExpr(tokens.slice(i + 2, valueEnd));
        this.scopes.bindWalrus(token.value);
        i = valueEnd;
        continue;
      }

      this.scopes.read(token.value);
      i += 1;
    }
  }

  private walkCallArguments(tokens: Token[]): void {
    if (hasTopLevelFor(tokens)) {
      this.walkComprehension(tokens);
      return;
    }

    for (const arg of splitCommas(tokens)) {
      if (arg.length >= 2 && isName(arg[0]) && isOp(arg[1], "=")) {
        this.walkExpr(arg.slice(2));
        continue;
      }
      this.walkExpr(arg);
    }
  }

  // Returns the index just past the lambda body.
  private walkLambda(tokens: Token[], start: number): number {
    const colon = findTopLevelOrEnd(tokens, start + 1, (t) => isOp(t, ":"));
    const params = parseParameters(tokens.slice(start + 1, colon));
    const bodyEnd = findTopLevelOrEnd(
      tokens,
      colon + 1,
      (t) => isOp(t, ",") || isName(t, "for") || isName(t, "async"),
    );

    for (const param of params) {
      this.walkExpr(param.defaultValue);
    }

    this.scopes.push("lambda");
    for (const param of params) {
      this.scopes.bind(param.name);
    }
    this.walkExpr(tokens.slice(colon + 1, bodyEnd));
    this.scopes.pop();

    return bodyEnd;
  }

  private walkComprehension(tokens: Token[]): void {
    const clauses = splitTopLevel(tokens, (token) => isName(token, "for"));
    const element = stripTrailingAsync(clauses[0]);
    const loops = clauses.slice(1).map((clause) => parseLoopClause(stripTrailingAsync(clause)));

    // The first iterable is evaluated in the enclosing scope.
    this.walkExpr(loops[0].iterable);

    this.scopes.push("comprehension");
    loops.forEach((loop, index) => {
      if (index > 0) this.walkExpr(loop.iterable);
      this.bindTargets(loop.targets);
      for (const condition of loop.conditions) {
        this.walkExpr(condition);
      }
    });
    this.walkExpr(element);
    this.scopes.pop();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

type Parameter = {
  name: string;
  annotation: Token[];
  defaultValue: Token[];
};

function parseParameters(tokens: Token[]): Parameter[] {
  const params: Parameter[] = [];

  for (const raw of splitCommas(tokens)) {
    const part = isOp(raw[0], "*") || isOp(raw[0], "**") ? raw.slice(1) : raw;
    const name = part[0];
    if (!isName(name)) continue;

    const equals = findTopLevel(part, (token) => isOp(token, "="));
    const end = equals >= 0 ? equals : part.length;
    const annotation = isOp(part[1], ":") ? part.slice(2, end) : [];
    const defaultValue = equals >= 0 ? part.slice(equals + 1) : [];
    params.push({ name: name.value, annotation, defaultValue });
  }

  return params;
}

type LoopClause = {
  targets: Token[];
  iterable: Token[];
  conditions: Token[][];
};

function parseLoopClause(tokens: Token[]): LoopClause {
  const inIndex = findTopLevel(tokens, (token) => isName(token, "in"));
  if (inIndex < 0) {
    throw new AnalysisSyntaxError("expected 'in' in comprehension", tokens[0]?.line ?? 0);
  }
  const [iterable, ...conditions] = splitTopLevel(tokens.slice(inIndex + 1), (token) =>
    isName(token, "if"),
  );
  return { targets: tokens.slice(0, inIndex), iterable, conditions };
}

function stripTrailingAsync(tokens: Token[]): Token[] {
  return isName(tokens[tokens.length - 1], "async") ? tokens.slice(0, -1) : tokens;
}

function hasTopLevelFor(tokens: Token[]): boolean {
  return findTopLevel(tokens, (token) => isName(token, "for")) >= 0;
}

function findTopLevelOrEnd(tokens: Token[], from: number, match: (token: Token) => boolean): number {
  const index = findTopLevel(tokens, match, from);
  return index >= 0 ? index : tokens.length;
}

function endsValue(token: Token): boolean {
  if (token.kind === "name") return !KEYWORDS.has(token.value);
  if (token.kind === "string" || token.kind === "number") return true;
  return token.value === ")" || token.value === "]" || token.value === "}";
}

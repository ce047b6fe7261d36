import { AnalysisSyntaxError } from "../core/errors.js";

import { tokenizeLines, type LogicalLine, type Token } from "./tokenizer.js";

// =============================================================================
// TYPES
// =============================================================================

export type SimpleStatement = {
  kind: "simple";
  tokens: Token[];
  line: number;
};

export type CompoundStatement = {
  kind: "compound";
  keyword: string;
  header: Token[];
  body: Statement[];
  line: number;
};

export type Statement = SimpleStatement | CompoundStatement;

const COMPOUND_KEYWORDS = new Set([
  "if",
  "elif",
  "else",
  "for",
  "while",
  "try",
  "except",
  "finally",
  "with",
  "def",
  "class",
]);

const SOFT_COMPOUND_KEYWORDS = new Set(["match", "case"]);

// =============================================================================
// TOKEN HELPERS
// =============================================================================

export function isOp(token: Token | undefined, value?: string): boolean {
  if (!token || token.kind !== "op") return false;
  return value === undefined || token.value === value;
}

export function isName(token: Token | undefined, value?: string): boolean {
  if (!token || token.kind !== "name") return false;
  return value === undefined || token.value === value;
}

function isOpening(token: Token): boolean {
  return token.kind === "op" && (token.value === "(" || token.value === "[" || token.value === "{");
}

function isClosing(token: Token): boolean {
  return token.kind === "op" && (token.value === ")" || token.value === "]" || token.value === "}");
}

export function matchingClose(tokens: Token[], openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < tokens.length; i++) {
    if (isOpening(tokens[i])) depth += 1;
    else if (isClosing(tokens[i])) {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return tokens.length - 1;
}

// Calls visit(token, index) for each token outside brackets and outside lambda parameter
// lists; stops when visit returns true and yields that index, else -1.
export function scanTopLevel(
  tokens: Token[],
  visit: (token: Token, index: number) => boolean,
  from = 0,
): number {
  let depth = 0;
  let pendingLambdas = 0;

  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i];
    if (isOpening(token)) {
      depth += 1;
      continue;
    }
    if (isClosing(token)) {
      depth -= 1;
      continue;
    }
    if (depth > 0) continue;

    if (isName(token, "lambda")) {
      pendingLambdas += 1;
      continue;
    }
    if (pendingLambdas > 0) {
      if (isOp(token, ":")) pendingLambdas -= 1;
      continue;
    }
    if (visit(token, i)) return i;
  }

  return -1;
}

export function findTopLevel(tokens: Token[], match: (token: Token) => boolean, from = 0): number {
  return scanTopLevel(tokens, (token) => match(token), from);
}

export function splitTopLevel(tokens: Token[], match: (token: Token) => boolean): Token[][] {
  const parts: Token[][] = [];
  let start = 0;
  scanTopLevel(tokens, (token, index) => {
    if (match(token)) {
      parts.push(tokens.slice(start, index));
      start = index + 1;
    }
    return false;
  });
  parts.push(tokens.slice(start));
  return parts;
}

export function splitCommas(tokens: Token[]): Token[][] {
  return splitTopLevel(tokens, (token) => isOp(token, ",")).filter((part) => part.length > 0);
}

// =============================================================================
// BLOCK STRUCTURE
// =============================================================================

export function parseStatements(source: string): Statement[] {
  const lines = tokenizeLines(source);
  if (lines.length === 0) return [];

  if (lines[0].indent !== 0) {
    throw new AnalysisSyntaxError("unexpected indent", lines[0].line);
  }

  const { statements } = parseBlock(lines, 0, 0);
  return statements;
}

function parseBlock(
  lines: LogicalLine[],
  start: number,
  indent: number,
): { statements: Statement[]; next: number } {
  const statements: Statement[] = [];
  let i = start;

  while (i < lines.length) {
    const line = lines[i];
    if (line.indent < indent) break;
    if (line.indent > indent) {
      throw new AnalysisSyntaxError("unexpected indent", line.line);
    }

    const keyword = compoundKeyword(line.tokens);
    if (!keyword) {
      statements.push(...splitSimpleStatements(line.tokens, line.line));
      i += 1;
      continue;
    }

    const headerStart = keyword.async ? 2 : 1;
    const colon = findTopLevel(line.tokens, (token) => isOp(token, ":"), headerStart);
    if (colon < 0) {
      throw new AnalysisSyntaxError("expected ':'", line.line);
    }

    const header = line.tokens.slice(headerStart, colon);
    const inline = line.tokens.slice(colon + 1);

    if (inline.length > 0) {
      statements.push({
        kind: "compound",
        keyword: keyword.name,
        header,
        body: splitSimpleStatements(inline, line.line),
        line: line.line,
      });
      i += 1;
      continue;
    }

    const bodyStart = i + 1;
    if (bodyStart >= lines.length || lines[bodyStart].indent <= indent) {
      throw new AnalysisSyntaxError(`expected an indented block after '${keyword.name}'`, line.line);
    }

    const child = parseBlock(lines, bodyStart, lines[bodyStart].indent);
    statements.push({
      kind: "compound",
      keyword: keyword.name,
      header,
      body: child.statements,
      line: line.line,
    });
    i = child.next;
  }

  return { statements, next: i };
}

function compoundKeyword(tokens: Token[]): { name: string; async: boolean } | null {
  const first = tokens[0];
  if (!isName(first)) return null;

  if (first.value === "async") {
    const second = tokens[1];
    if (isName(second, "def") || isName(second, "for") || isName(second, "with")) {
      return { name: second.value, async: true };
    }
    return null;
  }

  if (COMPOUND_KEYWORDS.has(first.value)) {
    return { name: first.value, async: false };
  }

  // `match` and `case` are keywords only at the head of a block-opening line.
  if (
    SOFT_COMPOUND_KEYWORDS.has(first.value) &&
    tokens.length > 2 &&
    isOp(tokens[tokens.length - 1], ":") &&
    !isOp(tokens[1], "=") &&
    !isOp(tokens[1], ".") &&
    !isOp(tokens[1], ":")
  ) {
    return { name: first.value, async: false };
  }

  return null;
}

function splitSimpleStatements(tokens: Token[], line: number): SimpleStatement[] {
  return splitTopLevel(tokens, (token) => isOp(token, ";"))
    .filter((part) => part.length > 0)
    .map((part): SimpleStatement => ({ kind: "simple", tokens: part, line }));
}

/*
Purpose: split Python source into logical lines of tokens for name analysis.
Assumptions: only enough of the lexical grammar to find names, brackets and statement
boundaries; string contents are opaque except for f-string replacement fields.
Usage: tokenizeLines("x = 1\nif x:\n    y = x\n") -> LogicalLine[].
*/

import { AnalysisSyntaxError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type TokenKind = "name" | "number" | "string" | "op";

export type Token = {
  kind: TokenKind;
  value: string;
  line: number;
  // f-string replacement fields, each tokenized as an expression.
  embedded?: Token[][];
};

export type LogicalLine = {
  indent: number;
  tokens: Token[];
  line: number;
};

// =============================================================================
// LEXICAL TABLES
// =============================================================================

const OPERATORS = [
  "**=",
  "//=",
  ">>=",
  "<<=",
  "...",
  "->",
  ":=",
  "**",
  "//",
  "<<",
  ">>",
  "<=",
  ">=",
  "==",
  "!=",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "@=",
  "+",
  "-",
  "*",
  "/",
  "%",
  "@",
  "&",
  "|",
  "^",
  "~",
  "<",
  ">",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
  ",",
  ":",
  ";",
  ".",
  "=",
];

const CLOSING: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

const STRING_PREFIXES = new Set(["r", "u", "b", "f", "br", "rb", "fr", "rf"]);

const NAME_PATTERN = /[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*/uy;
const NUMBER_PATTERN =
  /(?:0[xXoObB][0-9a-fA-F_]+|(?:\d[\d_]*\.?[\d_]*|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJ]?)/y;

const TAB_SIZE = 8;

// =============================================================================
// TOKENIZER
// =============================================================================

class Tokenizer {
  private pos = 0;
  private line = 1;
  private readonly brackets: string[] = [];
  private readonly lines: LogicalLine[] = [];
  private current: Token[] = [];
  private currentIndent = 0;
  private currentLine = 1;
  private atLineStart = true;

  constructor(private readonly source: string) {}

  run(): LogicalLine[] {
    const src = this.source;

    while (this.pos < src.length) {
      if (this.atLineStart && this.brackets.length === 0) {
        this.readIndentation();
        continue;
      }

      const ch = src[this.pos];

      if (ch === "#") {
        this.skipComment();
        continue;
      }

      if (ch === "\\" && this.isLineBreakAt(this.pos + 1)) {
        this.pos += 1;
        this.consumeLineBreak();
        continue;
      }

      if (ch === "\n" || ch === "\r") {
        this.consumeLineBreak();
        if (this.brackets.length === 0) {
          this.flushLine();
          this.atLineStart = true;
        }
        continue;
      }

      if (ch === " " || ch === "\t" || ch === "\f") {
        this.pos += 1;
        continue;
      }

      if (ch === "'" || ch === '"') {
        this.readString("");
        continue;
      }

      if (isDigit(ch) || (ch === "." && isDigit(src[this.pos + 1] ?? ""))) {
        this.readNumber();
        continue;
      }

      NAME_PATTERN.lastIndex = this.pos;
      const nameMatch = NAME_PATTERN.exec(src);
      if (nameMatch) {
        const word = nameMatch[0];
        const next = src[this.pos + word.length];
        if ((next === "'" || next === '"') && STRING_PREFIXES.has(word.toLowerCase())) {
          this.pos += word.length;
          this.readString(word.toLowerCase());
          continue;
        }
        this.push("name", word);
        this.pos += word.length;
        continue;
      }

      this.readOperator();
    }

    if (this.brackets.length > 0) {
      throw new AnalysisSyntaxError(`'${this.brackets[this.brackets.length - 1]}' was never closed`, this.line);
    }
    this.flushLine();
    return this.lines;
  }

  private readIndentation(): void {
    const src = this.source;
    let width = 0;

    while (this.pos < src.length) {
      const ch = src[this.pos];
      if (ch === " ") {
        width += 1;
      } else if (ch === "\t") {
        width = (Math.floor(width / TAB_SIZE) + 1) * TAB_SIZE;
      } else if (ch === "\f") {
        width = 0;
      } else {
        break;
      }
      this.pos += 1;
    }

    const ch = src[this.pos];
    if (ch === "#") {
      this.skipComment();
      return;
    }
    if (ch === "\n" || ch === "\r") {
      this.consumeLineBreak();
      return;
    }
    if (ch === undefined) {
      return;
    }

    this.currentIndent = width;
    this.currentLine = this.line;
    this.atLineStart = false;
  }

  private skipComment(): void {
    const src = this.source;
    while (this.pos < src.length && src[this.pos] !== "\n" && src[this.pos] !== "\r") {
      this.pos += 1;
    }
  }

  private isLineBreakAt(index: number): boolean {
    const ch = this.source[index];
    return ch === "\n" || ch === "\r";
  }

  private consumeLineBreak(): void {
    if (this.source[this.pos] === "\r" && this.source[this.pos + 1] === "\n") {
      this.pos += 2;
    } else {
      this.pos += 1;
    }
    this.line += 1;
  }

  private flushLine(): void {
    if (this.current.length === 0) return;
    this.lines.push({ indent: this.currentIndent, tokens: this.current, line: this.currentLine });
    this.current = [];
  }

  private push(kind: TokenKind, value: string, embedded?: Token[][]): void {
    const token: Token = { kind, value, line: this.line };
    if (embedded && embedded.length > 0) {
      token.embedded = embedded;
    }
    this.current.push(token);
  }

  private readNumber(): void {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.source);
    const text = match ? match[0] : this.source[this.pos];
    this.push("number", text);
    this.pos += text.length;
  }

  private readOperator(): void {
    const src = this.source;
    const op = OPERATORS.find((candidate) => src.startsWith(candidate, this.pos));
    if (!op) {
      throw new AnalysisSyntaxError(`invalid character '${src[this.pos]}'`, this.line);
    }

    if (op === "(" || op === "[" || op === "{") {
      this.brackets.push(op);
    } else if (op === ")" || op === "]" || op === "}") {
      const open = this.brackets.pop();
      if (open !== CLOSING[op]) {
        throw new AnalysisSyntaxError(`unmatched '${op}'`, this.line);
      }
    }

    this.push("op", op);
    this.pos += op.length;
  }

  private readString(prefix: string): void {
    const src = this.source;
    const startLine = this.line;
    const quote = src[this.pos];
    const triple = src.startsWith(quote.repeat(3), this.pos);
    const delimiter = triple ? quote.repeat(3) : quote;

    let cursor = this.pos + delimiter.length;
    const bodyStart = cursor;

    while (true) {
      if (cursor >= src.length) {
        throw new AnalysisSyntaxError("unterminated string literal", startLine);
      }
      const ch = src[cursor];
      if (ch === "\\") {
        if (src[cursor + 1] === "\r" && src[cursor + 2] === "\n") {
          this.line += 1;
          cursor += 3;
          continue;
        }
        if (this.isLineBreakAt(cursor + 1)) {
          this.line += 1;
        }
        cursor += 2;
        continue;
      }
      if (ch === "\n" || ch === "\r") {
        if (!triple) {
          throw new AnalysisSyntaxError("unterminated string literal", startLine);
        }
        if (!(ch === "\r" && src[cursor + 1] === "\n")) {
          this.line += 1;
        }
        cursor += 1;
        continue;
      }
      if (src.startsWith(delimiter, cursor)) {
        break;
      }
      cursor += 1;
    }

    const body = src.slice(bodyStart, cursor);
    const embedded = prefix.includes("f") ? extractReplacementFields(body, startLine) : undefined;

    const token: Token = { kind: "string", value: `${prefix}${delimiter}${body}${delimiter}`, line: startLine };
    if (embedded && embedded.length > 0) {
      token.embedded = embedded;
    }
    this.current.push(token);
    this.pos = cursor + delimiter.length;
  }
}

// =============================================================================
// F-STRINGS
// =============================================================================

function extractReplacementFields(body: string, line: number): Token[][] {
  const fields: Token[][] = [];
  let i = 0;

  while (i < body.length) {
    const ch = body[i];
    if (ch === "{" && body[i + 1] === "{") {
      i += 2;
      continue;
    }
    if (ch !== "{") {
      i += 1;
      continue;
    }
    i = readReplacementField(body, i + 1, line, fields);
  }

  return fields;
}

// Reads `expr[=][!conv][:spec]}` starting just after `{`; returns the index after `}`.
function readReplacementField(body: string, start: number, line: number, fields: Token[][]): number {
  let depth = 0;
  let quote: string | null = null;
  let i = start;

  for (; i < body.length; i++) {
    const ch = body[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      continue;
    }
    if (ch === "(" || ch === "[" || ch === "{") {
      depth += 1;
      continue;
    }
    if ((ch === ")" || ch === "]" || ch === "}") && depth > 0) {
      depth -= 1;
      continue;
    }
    if (depth > 0) continue;
    if (ch === "}" || ch === ":") break;
    if (ch === "!" && body[i + 1] !== "=") break;
  }

  if (i >= body.length) {
    throw new AnalysisSyntaxError("f-string: expecting '}'", line);
  }

  const expression = stripSelfDocumentingEquals(body.slice(start, i));
  if (expression.trim().length === 0) {
    throw new AnalysisSyntaxError("f-string: valid expression required before '}'", line);
  }
  fields.push(tokenizeExpression(expression, line));

  if (body[i] === "!") {
    while (i < body.length && body[i] !== ":" && body[i] !== "}") i += 1;
  }

  if (body[i] === ":") {
    i += 1;
    while (i < body.length && body[i] !== "}") {
      if (body[i] === "{") {
        i = readReplacementField(body, i + 1, line, fields);
        continue;
      }
      i += 1;
    }
  }

  if (body[i] !== "}") {
    throw new AnalysisSyntaxError("f-string: expecting '}'", line);
  }
  return i + 1;
}

function stripSelfDocumentingEquals(expression: string): string {
  const trimmed = expression.trimEnd();
  if (!trimmed.endsWith("=")) return expression;
  const before = trimmed.at(-2);
  if (before === "=" || before === "!" || before === "<" || before === ">") return expression;
  return trimmed.slice(0, -1);
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function tokenizeLines(source: string): LogicalLine[] {
  return new Tokenizer(source).run();
}

// Tokenizes a bracket-free expression fragment; line breaks are allowed inside it.
export function tokenizeExpression(expression: string, line: number): Token[] {
  const lines = new Tokenizer(`(${expression})`).run();
  const tokens = lines.flatMap((logical) => logical.tokens);
  return tokens.slice(1, -1).map((token) => ({ ...token, line }));
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

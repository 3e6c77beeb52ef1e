// ─── Scanner ───────────────────────────────────────────────────────
// Single left-to-right pass over code points, no backtracking.
// Pure function: source text in, token sequence out.

import { ExpressionSyntaxError } from "./errors";
import type { OperatorKind, PunctuationKind, Token } from "./tokens";
import { booleanValue, numberValue, stringValue } from "./value";

// Reserved words, matched case-insensitively
const KEYWORDS: ReadonlyMap<string, Token> = new Map<string, Token>([
  ["true", { kind: "Literal", value: booleanValue(true) }],
  ["false", { kind: "Literal", value: booleanValue(false) }],
  ["and", { kind: "And" }],
  ["or", { kind: "Or" }],
  ["xor", { kind: "Xor" }],
  ["not", { kind: "Not" }],
  ["div", { kind: "Div" }],
  ["mod", { kind: "Mod" }],
]);

const SINGLE_CHAR_TOKENS: ReadonlyMap<string, PunctuationKind | OperatorKind> = new Map<
  string,
  PunctuationKind | OperatorKind
>([
  ["(", "LeftParen"],
  [")", "RightParen"],
  ["[", "LeftBracket"],
  ["]", "RightBracket"],
  [",", "Comma"],
  ["+", "Plus"],
  ["-", "Minus"],
  ["*", "Star"],
  ["/", "Slash"],
  ["=", "Equal"],
]);

const WHITESPACE = new Set([" ", "\t", "\r", "\n"]);

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isIdentStart(ch: string): boolean {
  return ch === "_" || /^\p{L}$/u.test(ch);
}

function isIdentContinue(ch: string): boolean {
  return ch === "_" || ch === "-" || /^[\p{L}\p{N}]$/u.test(ch);
}

/**
 * Converts source text into tokens.
 *
 * @throws {ExpressionSyntaxError} on an invalid character, a malformed number,
 *   an unterminated string, or when the source holds no token at all.
 */
export function tokenize(source: string): Token[] {
  const chars = Array.from(source);
  const tokens: Token[] = [];
  let pos = 0;

  const peek = (offset = 0): string | undefined => chars[pos + offset];

  while (pos < chars.length) {
    const ch = chars[pos] ?? "";

    if (WHITESPACE.has(ch)) {
      pos++;
      continue;
    }

    // Identifiers and keywords
    if (isIdentStart(ch)) {
      const start = pos;
      while (pos < chars.length && isIdentContinue(chars[pos] ?? "")) {
        pos++;
      }
      const word = chars.slice(start, pos).join("");
      tokens.push(KEYWORDS.get(word.toLowerCase()) ?? { kind: "Identifier", name: word });
      continue;
    }

    // Numbers: digits, optionally `.` and more digits; a leading `.` is allowed
    if (isDigit(ch) || ch === ".") {
      const start = pos;
      while (isDigit(peek() ?? "")) pos++;
      if (peek() === "." && (pos === start || isDigit(peek(1) ?? ""))) {
        pos++;
        while (isDigit(peek() ?? "")) pos++;
      }
      const text = chars.slice(start, pos).join("");
      const value = Number(text);
      if (text === "." || Number.isNaN(value)) {
        throw new ExpressionSyntaxError("InvalidNumber", `Invalid number '${text}'`);
      }
      tokens.push({ kind: "Literal", value: numberValue(value) });
      continue;
    }

    // String literals: single quotes, no escapes
    if (ch === "'") {
      const start = pos + 1;
      pos = start;
      while (pos < chars.length && chars[pos] !== "'") pos++;
      if (pos >= chars.length) {
        throw new ExpressionSyntaxError(
          "UnterminatedStringLiteral",
          `Unterminated string literal '${chars.slice(start).join("")}`
        );
      }
      tokens.push({ kind: "Literal", value: stringValue(chars.slice(start, pos).join("")) });
      pos++; // closing quote
      continue;
    }

    if (ch === ">") {
      pos++;
      if (peek() === "=") {
        pos++;
        tokens.push({ kind: "GreaterEqual" });
      } else {
        tokens.push({ kind: "Greater" });
      }
      continue;
    }

    if (ch === "<") {
      pos++;
      if (peek() === "=") {
        pos++;
        tokens.push({ kind: "LessEqual" });
      } else if (peek() === ">") {
        pos++;
        tokens.push({ kind: "NotEqual" });
      } else {
        tokens.push({ kind: "Less" });
      }
      continue;
    }

    const single = SINGLE_CHAR_TOKENS.get(ch);
    if (single) {
      tokens.push({ kind: single });
      pos++;
      continue;
    }

    throw new ExpressionSyntaxError(
      "InvalidCharacter",
      `Invalid character '${ch}' at position ${pos}`
    );
  }

  if (tokens.length === 0) {
    throw new ExpressionSyntaxError("EmptyExpression", "Empty expression");
  }

  return tokens;
}

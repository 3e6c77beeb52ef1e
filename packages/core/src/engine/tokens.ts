// ─── Tokens ────────────────────────────────────────────────────────
// Lexical units produced by the scanner. Tokens carry no position;
// their order in the sequence is the only metadata.

import { formatValue, type Value } from "./value";

export type PunctuationKind =
  | "LeftParen"
  | "RightParen"
  | "LeftBracket"
  | "RightBracket"
  | "Comma";

export type OperatorKind =
  | "Plus"
  | "Minus"
  | "Star"
  | "Slash"
  | "Div"
  | "Mod"
  | "Equal"
  | "NotEqual"
  | "Greater"
  | "GreaterEqual"
  | "Less"
  | "LessEqual"
  | "And"
  | "Or"
  | "Xor"
  | "Not";

export type Token =
  | { readonly kind: PunctuationKind | OperatorKind }
  | { readonly kind: "Literal"; readonly value: Value }
  | { readonly kind: "Identifier"; readonly name: string };

export type TokenKind = Token["kind"];

/** Surface syntax of every fixed token. */
export const TOKEN_SYMBOLS: Readonly<Record<PunctuationKind | OperatorKind, string>> = {
  LeftParen: "(",
  RightParen: ")",
  LeftBracket: "[",
  RightBracket: "]",
  Comma: ",",
  Plus: "+",
  Minus: "-",
  Star: "*",
  Slash: "/",
  Div: "div",
  Mod: "mod",
  Equal: "=",
  NotEqual: "<>",
  Greater: ">",
  GreaterEqual: ">=",
  Less: "<",
  LessEqual: "<=",
  And: "and",
  Or: "or",
  Xor: "xor",
  Not: "not",
};

/** Renders a token back into (approximate) source text for diagnostics. */
export function tokenToString(token: Token): string {
  switch (token.kind) {
    case "Literal":
      return token.value.kind === "string"
        ? `'${token.value.value}'`
        : formatValue(token.value);
    case "Identifier":
      return token.name;
    default:
      return TOKEN_SYMBOLS[token.kind];
  }
}

// ─── Precedence ────────────────────────────────────────────────────
// Binding power, lowest to highest. Only used while parsing.

export const Precedence = {
  None: 0,
  Or: 1, // or xor
  And: 2, // and
  Equality: 3, // = <>
  Comparison: 4, // < > <= >=
  Term: 5, // + -
  Factor: 6, // * / div mod
  Unary: 7, // not -
  Call: 8, // ()
  Primary: 9,
} as const;

export type Precedence = (typeof Precedence)[keyof typeof Precedence];

export function precedenceOf(token: Token): Precedence {
  switch (token.kind) {
    case "Or":
    case "Xor":
      return Precedence.Or;
    case "And":
      return Precedence.And;
    case "Equal":
    case "NotEqual":
      return Precedence.Equality;
    case "Greater":
    case "GreaterEqual":
    case "Less":
    case "LessEqual":
      return Precedence.Comparison;
    case "Plus":
    case "Minus":
      return Precedence.Term;
    case "Star":
    case "Slash":
    case "Div":
    case "Mod":
      return Precedence.Factor;
    case "LeftParen":
      return Precedence.Call;
    default:
      return Precedence.None;
  }
}

const PRECEDENCE_ORDER: readonly Precedence[] = [
  Precedence.None,
  Precedence.Or,
  Precedence.And,
  Precedence.Equality,
  Precedence.Comparison,
  Precedence.Term,
  Precedence.Factor,
  Precedence.Unary,
  Precedence.Call,
  Precedence.Primary,
];

/** The next-higher level; `Primary` is the ceiling. */
export function nextPrecedence(precedence: Precedence): Precedence {
  return PRECEDENCE_ORDER[precedence + 1] ?? Precedence.Primary;
}

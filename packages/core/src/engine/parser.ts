// ─── Parser ────────────────────────────────────────────────────────
// Precedence climbing (Pratt parsing). Each token has a binding power;
// the right operand of a binary operator is parsed one level higher,
// so chains of the same level associate to the left.
//   or xor  →  and  →  = <>  →  < > <= >=  →  + -  →  * / div mod  →  unary  →  call

import type { BinaryOperator, Expression } from "./ast";
import { ExpressionSyntaxError } from "./errors";
import {
  Precedence,
  nextPrecedence,
  precedenceOf,
  tokenToString,
  type Token,
  type TokenKind,
} from "./tokens";

const BINARY_OPERATORS: Partial<Readonly<Record<TokenKind, BinaryOperator>>> = {
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
};

/**
 * Parses a token sequence into a single expression tree.
 * Pure function, no side effects.
 *
 * @throws {ExpressionSyntaxError} on any malformed construct.
 */
export function parse(tokens: readonly Token[]): Expression {
  let pos = 0;

  function current(): Token | undefined {
    return tokens[pos];
  }

  function advance(expected: string): Token {
    const tok = tokens[pos];
    if (!tok) {
      throw new ExpressionSyntaxError(
        "MissingToken",
        `Expected ${expected}, found end of expression`
      );
    }
    pos++;
    return tok;
  }

  function expect(kind: TokenKind, description: string): void {
    const tok = current();
    if (!tok) {
      throw new ExpressionSyntaxError(
        "MissingToken",
        `Expected ${description}, found end of expression`
      );
    }
    if (tok.kind !== kind) {
      throw new ExpressionSyntaxError(
        "UnexpectedToken",
        `Expected ${description}, found '${tokenToString(tok)}'`
      );
    }
    pos++;
  }

  function parseExpression(): Expression {
    return parsePrecedence(Precedence.Or);
  }

  function parsePrecedence(min: Precedence): Expression {
    let expression = parsePrefix(advance("expression"));

    for (let next = current(); next; next = current()) {
      const precedence = precedenceOf(next);
      if (precedence === Precedence.None || precedence < min) break;
      pos++;
      expression = parseInfix(next, expression);
    }

    return expression;
  }

  /** Comma-separated expressions up to (and including) the closing token. */
  function parseList(close: TokenKind, description: string): Expression[] {
    const items: Expression[] = [];
    if (current()?.kind === close) {
      pos++;
      return items;
    }
    items.push(parseExpression());
    while (current()?.kind === "Comma") {
      pos++;
      items.push(parseExpression());
    }
    expect(close, description);
    return items;
  }

  // ── Prefix rules ──

  function parsePrefix(tok: Token): Expression {
    switch (tok.kind) {
      case "Literal":
        return { kind: "Literal", value: tok.value };
      case "Identifier":
        return { kind: "Variable", name: tok.name };
      case "LeftParen": {
        const inner = parseExpression();
        expect("RightParen", "')' after group expression");
        return inner;
      }
      case "LeftBracket":
        return { kind: "Array", elements: parseList("RightBracket", "']' after array elements") };
      case "Minus":
        return { kind: "Unary", operator: "-", operand: parsePrecedence(Precedence.Unary) };
      case "Not":
        return { kind: "Unary", operator: "not", operand: parsePrecedence(Precedence.Unary) };
      default:
        throw new ExpressionSyntaxError(
          "UnexpectedToken",
          `Expected expression, found '${tokenToString(tok)}'`
        );
    }
  }

  // ── Infix rules ──

  function parseInfix(tok: Token, left: Expression): Expression {
    if (tok.kind === "LeftParen") {
      if (left.kind !== "Variable") {
        throw new ExpressionSyntaxError(
          "InvalidCallTarget",
          `Expression of kind ${left.kind} is not a valid call target`
        );
      }
      return {
        kind: "Call",
        name: left.name,
        params: parseList("RightParen", "')' after argument list"),
      };
    }

    const operator = BINARY_OPERATORS[tok.kind];
    if (operator === undefined) {
      throw new ExpressionSyntaxError(
        "UnexpectedToken",
        `Unexpected operator '${tokenToString(tok)}'`
      );
    }
    const right = parsePrecedence(nextPrecedence(precedenceOf(tok)));
    return { kind: "Binary", operator, left, right };
  }

  const ast = parseExpression();

  // Ensure we consumed all tokens
  const trailing = current();
  if (trailing) {
    throw new ExpressionSyntaxError(
      "MultipleExpressions",
      `Expected end of expression, found '${tokenToString(trailing)}'`
    );
  }

  return ast;
}

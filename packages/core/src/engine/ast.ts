// ─── AST Node Types ────────────────────────────────────────────────
// Discriminated union on `kind`. A strict tree: every composite node
// exclusively owns its children, nodes are never mutated after creation.

import type { Value } from "./value";

export type UnaryOperator = "-" | "not";

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "div"
  | "mod"
  | "="
  | "<>"
  | ">"
  | ">="
  | "<"
  | "<="
  | "and"
  | "or"
  | "xor";

export type TernaryOperator = "if_then";

/** Name of the three-parameter call idiom the optimizer turns into a Ternary. */
export const TERNARY_IF_THEN = "if_then";

export interface Literal {
  readonly kind: "Literal";
  readonly value: Value;
}

export interface Variable {
  readonly kind: "Variable";
  readonly name: string;
}

export interface Call {
  readonly kind: "Call";
  readonly name: string;
  readonly params: readonly Expression[];
}

export interface Unary {
  readonly kind: "Unary";
  readonly operator: UnaryOperator;
  readonly operand: Expression;
}

export interface Binary {
  readonly kind: "Binary";
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface ArrayExpression {
  readonly kind: "Array";
  readonly elements: readonly Expression[];
}

/** `condition ? consequent : alternate`, evaluating only the taken branch. */
export interface Ternary {
  readonly kind: "Ternary";
  readonly operator: TernaryOperator;
  readonly condition: Expression;
  readonly consequent: Expression;
  readonly alternate: Expression;
}

export type Expression =
  | Literal
  | Variable
  | Call
  | Unary
  | Binary
  | ArrayExpression
  | Ternary;

export type ExpressionKind = Expression["kind"];

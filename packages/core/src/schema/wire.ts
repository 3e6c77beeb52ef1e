// ─── Wire Format ───────────────────────────────────────────────────
// Self-describing JSON form of an expression tree, for caching compiled
// expressions. This is the parse boundary: raw JSON enters, a typed
// Expression exits.

import { z } from "zod";
import type { BinaryOperator, Expression, UnaryOperator } from "../engine/ast";
import { TERNARY_IF_THEN } from "../engine/ast";
import { arrayValue, booleanValue, numberValue, stringValue, type Value } from "../engine/value";

// ─── Serialized Types ──────────────────────────────────────────────

/** JSON has no literal for these, so they travel as strings. */
export type NonFiniteNumber = "NaN" | "Infinity" | "-Infinity";

export type SerializedValue =
  | { number: number | NonFiniteNumber }
  | { boolean: boolean }
  | { string: string }
  | { array: SerializedValue[] };

export type SerializedExpression =
  | { type: "literal"; value: SerializedValue }
  | { type: "variable"; name: string }
  | { type: "call"; name: string; params: SerializedExpression[] }
  | { type: "unary"; operator: UnaryOperator; operand: SerializedExpression }
  | {
      type: "binary";
      operator: BinaryOperator;
      left: SerializedExpression;
      right: SerializedExpression;
    }
  | { type: "array"; elements: SerializedExpression[] }
  | {
      type: "ternary";
      operator: typeof TERNARY_IF_THEN;
      condition: SerializedExpression;
      consequent: SerializedExpression;
      alternate: SerializedExpression;
    };

// ─── Schemas ───────────────────────────────────────────────────────

const NonFiniteNumberSchema = z.enum(["NaN", "Infinity", "-Infinity"]);

const UnaryOperatorSchema = z.enum(["-", "not"]);

const BinaryOperatorSchema = z.enum([
  "+",
  "-",
  "*",
  "/",
  "div",
  "mod",
  "=",
  "<>",
  ">",
  ">=",
  "<",
  "<=",
  "and",
  "or",
  "xor",
]);

export const SerializedValueSchema: z.ZodType<SerializedValue> = z.lazy(() =>
  z.union([
    z.object({ number: z.union([z.number(), NonFiniteNumberSchema]) }).strict(),
    z.object({ boolean: z.boolean() }).strict(),
    z.object({ string: z.string() }).strict(),
    z.object({ array: z.array(SerializedValueSchema) }).strict(),
  ])
);

export const SerializedExpressionSchema: z.ZodType<SerializedExpression> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("literal"), value: SerializedValueSchema }),
    z.object({ type: z.literal("variable"), name: z.string().min(1) }),
    z.object({
      type: z.literal("call"),
      name: z.string().min(1),
      params: z.array(SerializedExpressionSchema),
    }),
    z.object({
      type: z.literal("unary"),
      operator: UnaryOperatorSchema,
      operand: SerializedExpressionSchema,
    }),
    z.object({
      type: z.literal("binary"),
      operator: BinaryOperatorSchema,
      left: SerializedExpressionSchema,
      right: SerializedExpressionSchema,
    }),
    z.object({
      type: z.literal("array"),
      elements: z.array(SerializedExpressionSchema),
    }),
    z.object({
      type: z.literal("ternary"),
      operator: z.literal(TERNARY_IF_THEN),
      condition: SerializedExpressionSchema,
      consequent: SerializedExpressionSchema,
      alternate: SerializedExpressionSchema,
    }),
  ])
);

// ─── Conversion ────────────────────────────────────────────────────

function serializeNumber(value: number): number | NonFiniteNumber {
  if (Number.isFinite(value)) return value;
  if (Number.isNaN(value)) return "NaN";
  return value > 0 ? "Infinity" : "-Infinity";
}

export function serializeValue(value: Value): SerializedValue {
  switch (value.kind) {
    case "boolean":
      return { boolean: value.value };
    case "number":
      return { number: serializeNumber(value.value) };
    case "string":
      return { string: value.value };
    case "array":
      return { array: value.value.map(serializeValue) };
  }
}

export function deserializeValue(value: SerializedValue): Value {
  if ("boolean" in value) return booleanValue(value.boolean);
  if ("number" in value) {
    return numberValue(typeof value.number === "string" ? Number(value.number) : value.number);
  }
  if ("string" in value) return stringValue(value.string);
  return arrayValue(value.array.map(deserializeValue));
}

/** Converts an expression tree into its JSON wire form. */
export function serializeExpression(expression: Expression): SerializedExpression {
  switch (expression.kind) {
    case "Literal":
      return { type: "literal", value: serializeValue(expression.value) };
    case "Variable":
      return { type: "variable", name: expression.name };
    case "Call":
      return {
        type: "call",
        name: expression.name,
        params: expression.params.map(serializeExpression),
      };
    case "Unary":
      return {
        type: "unary",
        operator: expression.operator,
        operand: serializeExpression(expression.operand),
      };
    case "Binary":
      return {
        type: "binary",
        operator: expression.operator,
        left: serializeExpression(expression.left),
        right: serializeExpression(expression.right),
      };
    case "Array":
      return { type: "array", elements: expression.elements.map(serializeExpression) };
    case "Ternary":
      return {
        type: "ternary",
        operator: expression.operator,
        condition: serializeExpression(expression.condition),
        consequent: serializeExpression(expression.consequent),
        alternate: serializeExpression(expression.alternate),
      };
  }
}

function toExpression(node: SerializedExpression): Expression {
  switch (node.type) {
    case "literal":
      return { kind: "Literal", value: deserializeValue(node.value) };
    case "variable":
      return { kind: "Variable", name: node.name };
    case "call":
      return { kind: "Call", name: node.name, params: node.params.map(toExpression) };
    case "unary":
      return { kind: "Unary", operator: node.operator, operand: toExpression(node.operand) };
    case "binary":
      return {
        kind: "Binary",
        operator: node.operator,
        left: toExpression(node.left),
        right: toExpression(node.right),
      };
    case "array":
      return { kind: "Array", elements: node.elements.map(toExpression) };
    case "ternary":
      return {
        kind: "Ternary",
        operator: node.operator,
        condition: toExpression(node.condition),
        consequent: toExpression(node.consequent),
        alternate: toExpression(node.alternate),
      };
  }
}

/**
 * Parses raw JSON into a serialized expression tree.
 * Returns the parsed data or throws a ZodError with detailed issues.
 */
export function parseSerializedExpression(raw: unknown): SerializedExpression {
  return SerializedExpressionSchema.parse(raw);
}

/**
 * Safe parse variant: returns a discriminated result instead of throwing.
 */
export function safeParseSerializedExpression(
  raw: unknown
): z.SafeParseReturnType<SerializedExpression, SerializedExpression> {
  return SerializedExpressionSchema.safeParse(raw);
}

/**
 * Validates raw JSON and rebuilds the expression tree it describes.
 *
 * @throws {ZodError} if the JSON is not a well-formed serialized expression.
 */
export function deserializeExpression(raw: unknown): Expression {
  return toExpression(parseSerializedExpression(raw));
}

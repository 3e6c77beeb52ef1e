// ─── Value Model ───────────────────────────────────────────────────
// The only runtime datatype: a closed, discriminated union on `kind`.
// Values are immutable; operators always build new values.

import { EvaluationError } from "./errors";

export type Value =
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "array"; readonly value: readonly Value[] };

export type ValueKind = Value["kind"];

/** Plain JSON shape a Value maps onto (used by hosts and the CLI). */
export type JsonValue = boolean | number | string | readonly JsonValue[];

// ─── Constructors ──────────────────────────────────────────────────

export function booleanValue(value: boolean): Value {
  return { kind: "boolean", value };
}

export function numberValue(value: number): Value {
  return { kind: "number", value };
}

export function stringValue(value: string): Value {
  return { kind: "string", value };
}

export function arrayValue(value: readonly Value[]): Value {
  return { kind: "array", value };
}

// ─── Emptiness ─────────────────────────────────────────────────────

/** The empty value of a kind: `false`, `0`, `''` or `[]`. */
export function emptyOf(kind: ValueKind): Value {
  switch (kind) {
    case "boolean":
      return booleanValue(false);
    case "number":
      return numberValue(0);
    case "string":
      return stringValue("");
    case "array":
      return arrayValue([]);
  }
}

export function isEmpty(value: Value): boolean {
  switch (value.kind) {
    case "boolean":
      return !value.value;
    case "number":
      return value.value === 0;
    case "string":
      return value.value.length === 0;
    case "array":
      return value.value.length === 0;
  }
}

/**
 * Length of a string (in code points) or an array.
 * Booleans and numbers have a length of 0.
 */
export function valueLength(value: Value): number {
  switch (value.kind) {
    case "string":
      return Array.from(value.value).length;
    case "array":
      return value.value.length;
    default:
      return 0;
  }
}

// ─── Equality & Ordering ───────────────────────────────────────────

/** Deep, same-variant equality. Values of different kinds are never equal. */
export function valueEquals(left: Value, right: Value): boolean {
  switch (left.kind) {
    case "boolean":
    case "number":
    case "string":
      return left.kind === right.kind && left.value === right.value;
    case "array": {
      if (right.kind !== "array" || left.value.length !== right.value.length) {
        return false;
      }
      return left.value.every((item, i) => {
        const other = right.value[i];
        return other !== undefined && valueEquals(item, other);
      });
    }
  }
}

function sign(n: number): -1 | 0 | 1 {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function compareCodePoints(left: string, right: string): -1 | 0 | 1 {
  const a = Array.from(left);
  const b = Array.from(right);
  const common = Math.min(a.length, b.length);
  for (let i = 0; i < common; i++) {
    const diff = (a[i]?.codePointAt(0) ?? 0) - (b[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) return sign(diff);
  }
  return sign(a.length - b.length);
}

/**
 * Orders two values of the same kind.
 * Returns undefined when the values are not comparable (different kinds, NaN).
 *
 * Arrays order by length first, then element by element.
 */
export function compareValues(left: Value, right: Value): -1 | 0 | 1 | undefined {
  if (left.kind === "boolean" && right.kind === "boolean") {
    return sign(Number(left.value) - Number(right.value));
  }
  if (left.kind === "number" && right.kind === "number") {
    if (Number.isNaN(left.value) || Number.isNaN(right.value)) return undefined;
    return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  }
  if (left.kind === "string" && right.kind === "string") {
    return compareCodePoints(left.value, right.value);
  }
  if (left.kind === "array" && right.kind === "array") {
    if (left.value.length !== right.value.length) {
      return sign(left.value.length - right.value.length);
    }
    for (let i = 0; i < left.value.length; i++) {
      const a = left.value[i];
      const b = right.value[i];
      if (a === undefined || b === undefined) return undefined;
      const order = compareValues(a, b);
      if (order !== 0) return order;
    }
    return 0;
  }
  return undefined;
}

// ─── Operators ─────────────────────────────────────────────────────

function mismatch(operator: string, left: Value, right?: Value): EvaluationError {
  const operands = right ? `${left.kind} and ${right.kind}` : left.kind;
  return new EvaluationError(
    "TypeMismatch",
    `Operator '${operator}' cannot be applied to ${operands}`
  );
}

function numeric(
  operator: string,
  left: Value,
  right: Value,
  apply: (a: number, b: number) => number
): Value {
  if (left.kind !== "number" || right.kind !== "number") {
    throw mismatch(operator, left, right);
  }
  return numberValue(apply(left.value, right.value));
}

/** Numeric addition, string concatenation or array concatenation. */
export function add(left: Value, right: Value): Value {
  if (left.kind === "number" && right.kind === "number") {
    return numberValue(left.value + right.value);
  }
  if (left.kind === "string" && right.kind === "string") {
    return stringValue(left.value + right.value);
  }
  if (left.kind === "array" && right.kind === "array") {
    return arrayValue([...left.value, ...right.value]);
  }
  throw mismatch("+", left, right);
}

export function subtract(left: Value, right: Value): Value {
  return numeric("-", left, right, (a, b) => a - b);
}

export function multiply(left: Value, right: Value): Value {
  return numeric("*", left, right, (a, b) => a * b);
}

export function divide(left: Value, right: Value): Value {
  return numeric("/", left, right, (a, b) => a / b);
}

/** Integer division, truncating toward zero. */
export function intDivide(left: Value, right: Value): Value {
  return numeric("div", left, right, (a, b) => Math.trunc(a / b));
}

/** Truncating remainder: the sign follows the dividend. */
export function modulo(left: Value, right: Value): Value {
  return numeric("mod", left, right, (a, b) => a % b);
}

export function xor(left: Value, right: Value): Value {
  if (left.kind !== "boolean" || right.kind !== "boolean") {
    throw mismatch("xor", left, right);
  }
  return booleanValue(left.value !== right.value);
}

export function negate(operand: Value): Value {
  if (operand.kind !== "number") {
    throw mismatch("-", operand);
  }
  return numberValue(-operand.value);
}

export function logicalNot(operand: Value): Value {
  if (operand.kind !== "boolean") {
    throw mismatch("not", operand);
  }
  return booleanValue(!operand.value);
}

// ─── Display & JSON ────────────────────────────────────────────────

function formatElement(value: Value): string {
  return value.kind === "string" ? `'${value.value}'` : formatValue(value);
}

/**
 * Human-readable rendering. Strings are printed raw at the top level and
 * quoted inside arrays: `[1, 'a', true]`.
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case "boolean":
      return value.value ? "true" : "false";
    case "number":
      return String(value.value);
    case "string":
      return value.value;
    case "array":
      return `[${value.value.map(formatElement).join(", ")}]`;
  }
}

export function fromJson(json: JsonValue): Value {
  if (typeof json === "boolean") return booleanValue(json);
  if (typeof json === "number") return numberValue(json);
  if (typeof json === "string") return stringValue(json);
  return arrayValue(json.map(fromJson));
}

export function toJson(value: Value): JsonValue {
  return value.kind === "array" ? value.value.map(toJson) : value.value;
}

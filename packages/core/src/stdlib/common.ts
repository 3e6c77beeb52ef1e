// ─── Common Functions ──────────────────────────────────────────────
// Conversions, comparisons and collection helpers that work on
// strings and arrays alike. All of them are pure.

import { TERNARY_IF_THEN } from "../engine/ast";
import { arity } from "../engine/arity";
import { defineFunction, type FunctionDefinition } from "../engine/environment";
import { NativeError } from "../engine/errors";
import {
  arrayValue,
  booleanValue,
  compareValues,
  emptyOf,
  formatValue,
  isEmpty,
  numberValue,
  stringValue,
  valueEquals,
  valueLength,
  type Value,
} from "../engine/value";
import {
  STRING_OFFSET,
  defaultString,
  numberParam,
  param,
  smartList,
  toIndex,
  toStringIndex,
} from "./helpers";

const TRUE = booleanValue(true);

function all(params: readonly Value[]): Value {
  return booleanValue(smartList(params).every((value) => valueEquals(value, TRUE)));
}

function any(params: readonly Value[]): Value {
  return booleanValue(smartList(params).some((value) => valueEquals(value, TRUE)));
}

function at(params: readonly Value[]): Value {
  const values = param(params, 0, 2);
  const position = numberParam(params, 1, 2);

  if (values.kind === "string") {
    const index = toStringIndex(position);
    const char = Array.from(values.value)[index];
    if (char === undefined) throw NativeError.indexOutOfBounds(index);
    return stringValue(char);
  }
  if (values.kind === "array") {
    const index = toIndex(position);
    const item = values.value[index];
    if (item === undefined) throw NativeError.indexOutOfBounds(index);
    return item;
  }
  throw NativeError.wrongParameterType();
}

/** Inclusive range check; values of different kinds are never in range. */
function between(params: readonly Value[]): Value {
  const value = param(params, 0, 3);
  const lower = compareValues(value, param(params, 1, 3));
  const upper = compareValues(value, param(params, 2, 3));
  return booleanValue(
    (lower === 0 || lower === 1) && (upper === 0 || upper === -1)
  );
}

/**
 * Booleans stay as they are, numbers are true only for 1, strings only for
 * "true" (any case), arrays when not empty.
 */
function bool(params: readonly Value[]): Value {
  const value = param(params, 0, 1);
  switch (value.kind) {
    case "boolean":
      return value;
    case "number":
      return booleanValue(value.value === 1);
    case "string":
      return booleanValue(value.value.toLowerCase() === "true");
    case "array":
      return booleanValue(value.value.length > 0);
  }
}

function contains(params: readonly Value[]): Value {
  const haystack = param(params, 0, 2);
  const needle = param(params, 1, 2);

  if (haystack.kind === "string" && needle.kind === "string") {
    return booleanValue(haystack.value.includes(needle.value));
  }
  if (haystack.kind === "array") {
    return booleanValue(haystack.value.some((item) => valueEquals(item, needle)));
  }
  throw NativeError.wrongParameterType();
}

function compare(params: readonly Value[]): Value {
  const order = compareValues(param(params, 0, 2), param(params, 1, 2));
  if (order === undefined) {
    throw NativeError.custom("values not comparable");
  }
  return numberValue(order);
}

/** `copy(source, start, count)`: a slice of a string or array. */
function copy(params: readonly Value[]): Value {
  const source = param(params, 0, 3);
  const start = numberParam(params, 1, 3);
  const count = Math.max(0, Math.trunc(numberParam(params, 2, 3)));

  if (source.kind === "string") {
    const from = toStringIndex(start);
    return stringValue(Array.from(source.value).slice(from, from + count).join(""));
  }
  if (source.kind === "array") {
    const from = toIndex(start);
    return arrayValue(source.value.slice(from, from + count));
  }
  throw NativeError.wrongParameterType();
}

function empty(params: readonly Value[]): Value {
  return booleanValue(isEmpty(param(params, 0, 1)));
}

/**
 * Position of a substring (1-based, 0 when absent) or index of an array
 * item (0-based, -1 when absent).
 */
function find(params: readonly Value[]): Value {
  const haystack = param(params, 0, 2);
  const needle = param(params, 1, 2);

  if (haystack.kind === "string" && needle.kind === "string") {
    const unit = haystack.value.indexOf(needle.value);
    if (unit === -1) return numberValue(-1 + STRING_OFFSET);
    return numberValue(Array.from(haystack.value.slice(0, unit)).length + STRING_OFFSET);
  }
  if (haystack.kind === "array") {
    return numberValue(haystack.value.findIndex((item) => valueEquals(item, needle)));
  }
  throw NativeError.wrongParameterType();
}

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOATS = new Map<string, number>([
  ["inf", Infinity],
  ["+inf", Infinity],
  ["-inf", -Infinity],
  ["infinity", Infinity],
  ["+infinity", Infinity],
  ["-infinity", -Infinity],
  ["nan", NaN],
]);

function parseFloatStrict(text: string): number {
  if (FLOAT_PATTERN.test(text)) return Number(text);
  const special = SPECIAL_FLOATS.get(text.toLowerCase());
  if (special === undefined) {
    throw NativeError.custom(`invalid float literal '${text}'`);
  }
  return special;
}

function toNumber(value: Value): number {
  switch (value.kind) {
    case "boolean":
      return value.value ? 1 : 0;
    case "number":
      return value.value;
    case "string":
      return parseFloatStrict(value.value);
    case "array":
      throw NativeError.wrongParameterType();
  }
}

function float(params: readonly Value[]): Value {
  return numberValue(toNumber(param(params, 0, 1)));
}

function int(params: readonly Value[]): Value {
  return numberValue(Math.trunc(toNumber(param(params, 0, 1))));
}

/**
 * Eager form of the ternary idiom. Without a third parameter the result
 * for a false condition is the empty value of the second parameter's kind.
 */
function ifThen(params: readonly Value[]): Value {
  const condition = param(params, 0, 2);
  const first = param(params, 1, 2);
  if (condition.kind !== "boolean") {
    throw NativeError.wrongParameterType();
  }
  if (condition.value) return first;
  return params[2] ?? emptyOf(first.kind);
}

function insert(params: readonly Value[]): Value {
  const target = param(params, 0, 3);
  const source = param(params, 1, 3);
  const position = numberParam(params, 2, 3);

  if (target.kind === "string" && source.kind === "string") {
    const index = toStringIndex(position);
    const chars = Array.from(target.value);
    if (index > chars.length) throw NativeError.indexOutOfBounds(index);
    return stringValue(
      chars.slice(0, index).join("") + source.value + chars.slice(index).join("")
    );
  }
  if (target.kind === "array") {
    const index = toIndex(position);
    if (index > target.value.length) throw NativeError.indexOutOfBounds(index);
    return arrayValue([
      ...target.value.slice(0, index),
      source,
      ...target.value.slice(index),
    ]);
  }
  throw NativeError.wrongParameterType();
}

function length(params: readonly Value[]): Value {
  return numberValue(valueLength(param(params, 0, 1)));
}

/** Last of the greatest values; incomparable values count as equal. */
function max(params: readonly Value[]): Value {
  const [first, ...rest] = smartList(params);
  if (first === undefined) throw NativeError.wrongParameterCount(1);
  return rest.reduce((best, value) => (compareValues(best, value) === 1 ? best : value), first);
}

/** First of the least values; incomparable values count as equal. */
function min(params: readonly Value[]): Value {
  const [first, ...rest] = smartList(params);
  if (first === undefined) throw NativeError.wrongParameterCount(1);
  return rest.reduce((best, value) => (compareValues(best, value) === 1 ? value : best), first);
}

function reverse(params: readonly Value[]): Value {
  const value = param(params, 0, 1);
  if (value.kind === "string") {
    return stringValue(Array.from(value.value).reverse().join(""));
  }
  if (value.kind === "array") {
    return arrayValue([...value.value].reverse());
  }
  throw NativeError.wrongParameterType();
}

/**
 * Replaces every occurrence of `from` with `to`. Without `to`, matches
 * are removed (empty string, or dropped array items).
 */
function replace(params: readonly Value[]): Value {
  const value = param(params, 0, 2);
  const from = param(params, 1, 2);

  if (value.kind === "string" && from.kind === "string") {
    return stringValue(value.value.replaceAll(from.value, defaultString(params, 2, "")));
  }
  if (value.kind === "array") {
    const to = params[2];
    return arrayValue(
      value.value.flatMap((item) => (valueEquals(item, from) ? (to ? [to] : []) : [item]))
    );
  }
  throw NativeError.wrongParameterType();
}

function str(params: readonly Value[]): Value {
  return stringValue(formatValue(param(params, 0, 1)));
}

// ─── Registration ──────────────────────────────────────────────────

export function commonFunctions(): FunctionDefinition[] {
  return [
    defineFunction(all, arity.variadic(), "all(...): Boolean"),
    defineFunction(any, arity.variadic(), "any(...): Boolean"),
    defineFunction(at, arity.required(2), "at(values: [String|Array], index: Number): Any"),
    defineFunction(between, arity.required(3), "between(value: Any, lower: Any, upper: Any): Boolean"),
    defineFunction(bool, arity.required(1), "bool(value: Any): Boolean"),
    defineFunction(contains, arity.required(2), "contains(haystack: [String|Array], needle: [String|Any]): Boolean"),
    defineFunction(compare, arity.required(2), "compare(left: Any, right: Any): Number"),
    defineFunction(copy, arity.required(3), "copy(source: [String|Array], start: Number, count: Number): [String|Array]"),
    defineFunction(empty, arity.required(1), "empty(value: Any): Boolean"),
    defineFunction(find, arity.required(2), "find(haystack: [String|Array], needle: [String|Any]): Number"),
    defineFunction(float, arity.required(1), "float(value: Any): Number"),
    defineFunction(ifThen, arity.optional(2, 1), `${TERNARY_IF_THEN}(condition: Boolean, first: Any, second: Any): Any`),
    defineFunction(insert, arity.required(3), "insert(target: [String|Array], source: [String|Any], index: Number): Any"),
    defineFunction(int, arity.required(1), "int(value: Any): Number"),
    defineFunction(length, arity.required(1), "length(value: [String|Array]): Number"),
    defineFunction(max, arity.variadic(), "max(...): Any"),
    defineFunction(min, arity.variadic(), "min(...): Any"),
    defineFunction(replace, arity.optional(2, 1), "replace(value: [String|Array], from: [String|Any], to: [String|Any]): [String|Array]"),
    defineFunction(replace, arity.required(2), "remove(value: [String|Array], from: [String|Any]): [String|Array]"),
    defineFunction(reverse, arity.required(1), "reverse(value: [Array|String]): [Array|String]"),
    defineFunction(str, arity.required(1), "str(value: Any): String"),
  ];
}

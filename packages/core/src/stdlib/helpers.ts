// ─── Native Function Helpers ───────────────────────────────────────
// Parameter extraction shared by the standard library. Every helper
// throws a NativeError, which the interpreter wraps at the call boundary.

import { NativeError } from "../engine/errors";
import type { Value } from "../engine/value";

/** Strings are indexed from 1 in expressions. */
export const STRING_OFFSET = 1;

export function param(params: readonly Value[], index: number, expected: number): Value {
  const value = params[index];
  if (value === undefined) {
    throw NativeError.wrongParameterCount(expected);
  }
  return value;
}

export function numberParam(params: readonly Value[], index: number, expected: number): number {
  const value = param(params, index, expected);
  if (value.kind !== "number") {
    throw NativeError.wrongParameterType();
  }
  return value.value;
}

export function stringParam(params: readonly Value[], index: number, expected: number): string {
  const value = param(params, index, expected);
  if (value.kind !== "string") {
    throw NativeError.wrongParameterType();
  }
  return value.value;
}

/** An optional Number parameter; absent means `fallback`. */
export function defaultNumber(params: readonly Value[], index: number, fallback: number): number {
  const value = params[index];
  if (value === undefined) return fallback;
  if (value.kind !== "number") throw NativeError.wrongParameterType();
  return value.value;
}

/** An optional String parameter; absent means `fallback`. */
export function defaultString(params: readonly Value[], index: number, fallback: string): string {
  const value = params[index];
  if (value === undefined) return fallback;
  if (value.kind !== "string") throw NativeError.wrongParameterType();
  return value.value;
}

/** Truncates a Number into a zero-based array index. */
export function toIndex(value: number): number {
  if (!(value >= 0)) {
    throw NativeError.indexNegative();
  }
  return Math.trunc(value);
}

/** Converts a (1-based) string position into a zero-based code point index. */
export function toStringIndex(value: number): number {
  const index = toIndex(value) - STRING_OFFSET;
  if (index < 0) {
    throw NativeError.indexNegative();
  }
  return index;
}

/**
 * A single Array parameter stands for its elements; otherwise the
 * parameters themselves are the list (variadic call).
 */
export function smartList(params: readonly Value[]): readonly Value[] {
  const [first] = params;
  return params.length === 1 && first?.kind === "array" ? first.value : params;
}

// ─── Math Functions ────────────────────────────────────────────────
// Number functions. `random` and `choice` draw from a seeded PRNG and
// are registered as impure, so constant folding never inlines them.

import { arity } from "../engine/arity";
import {
  defineFunction,
  defineImpure,
  type FunctionDefinition,
  type NativeFunction,
} from "../engine/environment";
import { NativeError } from "../engine/errors";
import { booleanValue, numberValue, stringValue, type Value } from "../engine/value";
import { defaultNumber, numberParam, smartList } from "./helpers";
import type { SeededRng } from "./prng";

/** Lifts a unary number function into a native function. */
function unary(fn: (value: number) => number): NativeFunction {
  return (params) => numberValue(fn(numberParam(params, 0, 1)));
}

/** Rounds half away from zero: `round(2.5)` is 3, `round(-2.5)` is -3. */
function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/** Fractional part, keeping the sign: `frac(-1.25)` is -0.25. */
function fractional(value: number): number {
  return value - Math.trunc(value);
}

const INT64_MAX = 2n ** 63n - 1n;
const INT64_MIN = -(2n ** 63n);

/** Saturating conversion to a signed 64-bit integer. */
function toInt64(value: number): bigint {
  if (Number.isNaN(value)) return 0n;
  if (value >= 2 ** 63) return INT64_MAX;
  if (value <= -(2 ** 63)) return INT64_MIN;
  return BigInt(Math.trunc(value));
}

/** Uppercase hex of the truncated value; negatives in two's complement. */
function intToHex(params: readonly Value[]): Value {
  const value = toInt64(numberParam(params, 0, 1));
  return stringValue(BigInt.asUintN(64, value).toString(16).toUpperCase());
}

function isEven(value: number): boolean {
  return Math.trunc(Math.abs(value)) % 2 === 0;
}

function even(params: readonly Value[]): Value {
  return booleanValue(isEven(numberParam(params, 0, 1)));
}

function odd(params: readonly Value[]): Value {
  return booleanValue(!isEven(numberParam(params, 0, 1)));
}

function pow(params: readonly Value[]): Value {
  const exponent = defaultNumber(params, 1, 2);
  return numberValue(Math.pow(numberParam(params, 0, 1), exponent));
}

// ─── Random ────────────────────────────────────────────────────────

/** `random(range = 1)`: a float in [0, range). */
function random(rng: SeededRng): NativeFunction {
  return (params) => {
    const range = defaultNumber(params, 0, 1);
    return numberValue(range === 0 ? 0 : rng.next() * range);
  };
}

/** One of the parameters, or one item of a single Array parameter. */
function choice(rng: SeededRng): NativeFunction {
  return (params) => {
    const picked = rng.pick(smartList(params));
    if (picked === undefined) {
      throw NativeError.wrongParameterType();
    }
    return picked;
  };
}

// ─── Registration ──────────────────────────────────────────────────

export function mathFunctions(rng: SeededRng): FunctionDefinition[] {
  return [
    defineFunction(unary(Math.abs), arity.required(1), "abs(value: Number): Number"),
    defineFunction(unary(Math.atan), arity.required(1), "arc_tan(value: Number): Number"),
    defineFunction(unary(Math.cos), arity.required(1), "cos(value: Number): Number"),
    defineFunction(unary(Math.exp), arity.required(1), "exp(value: Number): Number"),
    defineFunction(unary(fractional), arity.required(1), "frac(value: Number): Number"),
    defineFunction(unary(Math.log), arity.required(1), "ln(value: Number): Number"),
    defineFunction(unary(roundHalfAwayFromZero), arity.required(1), "round(value: Number): Number"),
    defineFunction(unary(Math.sin), arity.required(1), "sin(value: Number): Number"),
    defineFunction(unary(Math.sqrt), arity.required(1), "sqrt(value: Number): Number"),
    defineFunction(unary(Math.trunc), arity.required(1), "trunc(value: Number): Number"),
    defineFunction(intToHex, arity.required(1), "int_to_hex(value: Number): String"),
    defineFunction(even, arity.required(1), "even(value: Number): Boolean"),
    defineFunction(odd, arity.required(1), "odd(value: Number): Boolean"),
    defineFunction(pow, arity.optional(1, 1), "pow(value: Number, exponent: Number = 2): Number"),
    defineImpure(random(rng), arity.optional(0, 1), "random(range: Number = 1): Number"),
    defineImpure(choice(rng), arity.variadic(), "choice(...): Any"),
  ];
}

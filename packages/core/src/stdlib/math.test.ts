import { describe, it, expect } from "vitest";
import { createStandardLibrary } from "./index.js";
import { evaluate } from "../engine/interpreter.js";
import { parse } from "../engine/parser.js";
import { tokenize } from "../engine/scanner.js";
import { EvaluationError } from "../engine/errors.js";
import { booleanValue, numberValue, stringValue, type Value } from "../engine/value.js";
import type { StaticEnvironment } from "../engine/environment.js";

// ─── Test Helpers ──────────────────────────────────────────────────

function run(source: string, env: StaticEnvironment = createStandardLibrary({ seed: 1 })): Value {
  return evaluate(env, parse(tokenize(source)));
}

function numberOf(value: Value): number {
  if (value.kind !== "number") throw new Error(`Expected a number, got ${value.kind}`);
  return value.value;
}

const n = numberValue;

// ─── Tests ─────────────────────────────────────────────────────────

describe("math functions", () => {
  it("wraps the unary number functions", () => {
    expect(run("abs(-2)")).toEqual(n(2));
    expect(run("sqrt(16)")).toEqual(n(4));
    expect(run("ln(1)")).toEqual(n(0));
    expect(run("exp(0)")).toEqual(n(1));
    expect(run("cos(0)")).toEqual(n(1));
    expect(run("sin(0)")).toEqual(n(0));
    expect(run("arc_tan(0)")).toEqual(n(0));
    expect(run("trunc(-1.7)")).toEqual(n(-1));
  });

  it("rounds half away from zero", () => {
    expect(run("round(2.5)")).toEqual(n(3));
    expect(run("round(-2.5)")).toEqual(n(-3));
    expect(run("round(1.4)")).toEqual(n(1));
  });

  it("keeps the sign of the fractional part", () => {
    expect(run("frac(-1.25)")).toEqual(n(-0.25));
    expect(run("frac(3.5)")).toEqual(n(0.5));
  });

  it("formats integers as uppercase hex", () => {
    expect(run("int_to_hex(255)")).toEqual(stringValue("FF"));
    expect(run("int_to_hex(-1)")).toEqual(stringValue("FFFFFFFFFFFFFFFF"));
    expect(run("int_to_hex(20000000000000000000)")).toEqual(stringValue("7FFFFFFFFFFFFFFF"));
  });

  it("checks parity on the truncated magnitude", () => {
    expect(run("even(4)")).toEqual(booleanValue(true));
    expect(run("even(-3)")).toEqual(booleanValue(false));
    expect(run("odd(3.9)")).toEqual(booleanValue(true));
  });

  it("squares by default in pow", () => {
    expect(run("pow(3)")).toEqual(n(9));
    expect(run("pow(2, 10)")).toEqual(n(1024));
  });

  it("rejects non-number parameters", () => {
    expect(() => run("abs('x')")).toThrow(
      new EvaluationError("NativeFunctionError", "Function 'abs' failed: wrong parameter type")
    );
  });

  describe("random / choice", () => {
    it("are impure", () => {
      const env = createStandardLibrary({ seed: 1 });
      expect(env.function("random")?.pure).toBe(false);
      expect(env.function("choice")?.pure).toBe(false);
      expect(env.function("abs")?.pure).toBe(true);
    });

    it("draw within range", () => {
      const env = createStandardLibrary({ seed: 5 });
      for (let i = 0; i < 100; i++) {
        const value = numberOf(run("random(10)", env));
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(10);
      }
      expect(run("random(0)", env)).toEqual(n(0));
    });

    it("repeat for the same seed", () => {
      const first = createStandardLibrary({ seed: 99 });
      const second = createStandardLibrary({ seed: 99 });
      const sources = ["random()", "choice(1, 2, 3)", "choice(['a', 'b'])", "random(100)"];

      expect(sources.map((source) => run(source, first))).toEqual(
        sources.map((source) => run(source, second))
      );
    });

    it("choice picks one of its parameters", () => {
      expect(run("choice('only')")).toEqual(stringValue("only"));
      expect([1, 2, 3]).toContain(numberOf(run("choice(1, 2, 3)")));
    });

    it("choice fails on an empty list", () => {
      expect(() => run("choice([])")).toThrow("Function 'choice' failed: wrong parameter type");
    });
  });
});

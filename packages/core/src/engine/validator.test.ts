import { describe, it, expect } from "vitest";
import { checkBooleanResult, describeValidation, validate } from "./validator.js";
import { evaluate } from "./interpreter.js";
import { transformTernary } from "./optimizer.js";
import { parse } from "./parser.js";
import { tokenize } from "./scanner.js";
import { StaticEnvironment, defineFunction } from "./environment.js";
import { arity } from "./arity.js";
import { EvaluationError } from "./errors.js";
import { booleanValue, numberValue, type Value } from "./value.js";
import type { Expression } from "./ast.js";

// ─── Test Helpers ──────────────────────────────────────────────────

function compile(source: string): Expression {
  return parse(tokenize(source));
}

function first(params: readonly Value[]): Value {
  return params[0] ?? booleanValue(false);
}

function environment(): StaticEnvironment {
  return new StaticEnvironment()
    .addVariable("price", numberValue(10))
    .addVariable("flag", booleanValue(true))
    .addFunction(defineFunction(first, arity.required(2), "max(left: Number, right: Number): Number"))
    .addFunction(defineFunction(first, arity.variadic(), "func(...): Number"))
    .addFunction(defineFunction(first, arity.optional(2, 1), "if_then(c: Boolean, a: Any, b: Any): Any"));
}

// ─── Tests ─────────────────────────────────────────────────────────

describe("validate", () => {
  it("accepts expressions that only use literals", () => {
    expect(validate(new StaticEnvironment(), compile("10 + -10"))).toEqual({ kind: "valid" });
  });

  it("accepts known variables and functions", () => {
    expect(validate(environment(), compile("max(PRICE, 2) > 3 and flag"))).toEqual({
      kind: "valid",
    });
  });

  it("reports a missing variable with its original spelling", () => {
    expect(validate(environment(), compile("10 + VAR_NAME"))).toEqual({
      kind: "missingVariable",
      name: "VAR_NAME",
    });
  });

  it("reports a missing function", () => {
    expect(validate(new StaticEnvironment(), compile("10 + max()"))).toEqual({
      kind: "missingFunction",
      name: "max",
    });
  });

  it("reports a parameter count mismatch with the declared arity", () => {
    expect(validate(environment(), compile("10 + max()"))).toEqual({
      kind: "paramCountMismatch",
      name: "max",
      expected: { kind: "polyadic", required: 2, optional: 0 },
      found: 0,
    });
  });

  it("checks the parameters of a call", () => {
    expect(validate(environment(), compile("func(not_found)"))).toEqual({
      kind: "missingVariable",
      name: "not_found",
    });
  });

  it("stops at the first problem, left to right", () => {
    expect(validate(environment(), compile("[a, nope(), b]"))).toEqual({
      kind: "missingVariable",
      name: "a",
    });
  });

  it("checks a ternary as a three-parameter if_then call", () => {
    const ternary = transformTernary(compile("if_then(flag, price, missing)"));

    expect(validate(environment(), ternary)).toEqual({ kind: "missingVariable", name: "missing" });
    expect(validate(new StaticEnvironment(), ternary)).toEqual({
      kind: "missingFunction",
      name: "if_then",
    });
  });

  it("agrees with evaluation: valid expressions raise no name or arity errors", () => {
    const env = environment();
    for (const source of ["max(price, 1)", "func()", "if_then(flag, 1, 2)", "-price * 2"]) {
      const expression = compile(source);
      expect(validate(env, expression)).toEqual({ kind: "valid" });
      expect(() => evaluate(env, expression)).not.toThrow(EvaluationError);
    }
  });
});

describe("describeValidation", () => {
  it("renders each result", () => {
    expect(describeValidation({ kind: "valid" })).toBe("valid");
    expect(describeValidation({ kind: "missingVariable", name: "x" })).toBe("Missing variable 'x'");
    expect(describeValidation({ kind: "missingFunction", name: "f" })).toBe("Missing function 'f'");
    expect(
      describeValidation({
        kind: "paramCountMismatch",
        name: "pow",
        expected: arity.optional(1, 1),
        found: 3,
      })
    ).toBe("Function 'pow' expects 1-2 parameter(s), got 3");
  });
});

describe("checkBooleanResult", () => {
  it.each(["not a", "a > 1", "a = 1", "a and b", "a or b", "a xor b", "true", "x", "f(1)"])(
    "accepts %s",
    (source) => {
      expect(checkBooleanResult(compile(source))).toEqual({ ok: true });
    }
  );

  it("rejects arithmetic at the top level", () => {
    expect(checkBooleanResult(compile("1 + 2"))).toEqual({
      ok: false,
      reason: "Binary operator '+' does not produce a boolean",
    });
    expect(checkBooleanResult(compile("-a"))).toEqual({
      ok: false,
      reason: "Unary operator '-' does not produce a boolean",
    });
  });

  it("rejects non-boolean literals and arrays", () => {
    expect(checkBooleanResult(compile("'yes'"))).toEqual({
      ok: false,
      reason: "A string literal does not produce a boolean",
    });
    expect(checkBooleanResult(compile("[true]"))).toEqual({
      ok: false,
      reason: "An array does not produce a boolean",
    });
  });

  it("requires every part of a ternary to pass", () => {
    expect(checkBooleanResult(transformTernary(compile("if_then(a, true, b > 1)")))).toEqual({
      ok: true,
    });
    expect(checkBooleanResult(transformTernary(compile("if_then(a, 1, true)")))).toEqual({
      ok: false,
      reason: "A number literal does not produce a boolean",
    });
  });
});

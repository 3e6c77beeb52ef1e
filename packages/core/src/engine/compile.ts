// ─── Compilation Pipeline ──────────────────────────────────────────
// source → tokens → AST → (validate) → (optimize) → Value

import type { Expression } from "./ast";
import type { Environment } from "./environment";
import { evaluate } from "./interpreter";
import { optimizeWithEnvironment, transformTernary } from "./optimizer";
import { parse } from "./parser";
import { tokenize } from "./scanner";
import { describeValidation, validate, type ValidationResult } from "./validator";
import type { Value } from "./value";

/** Thrown by {@link evaluateSource} when pre-flight validation fails. */
export class ExpressionValidationError extends Error {
  readonly result: Exclude<ValidationResult, { kind: "valid" }>;

  constructor(result: Exclude<ValidationResult, { kind: "valid" }>) {
    super(describeValidation(result));
    this.name = "ExpressionValidationError";
    this.result = result;
  }
}

/**
 * Compiles source text into an expression tree.
 *
 * @throws {ExpressionSyntaxError} on any scan or parse failure.
 */
export function compile(source: string): Expression {
  return parse(tokenize(source));
}

/** Evaluates a compiled expression; same as `evaluate`. */
export function execute(environment: Environment, expression: Expression): Value {
  return evaluate(environment, expression);
}

export interface EvaluateOptions {
  /** Check names and arities before evaluating. Default: true. */
  readonly validate?: boolean;
  /** Rewrite `if_then(c, a, b)` into a lazy ternary. Default: true. */
  readonly optimize?: boolean;
  /** Fold constant subtrees (implies `optimize`). Default: false. */
  readonly fold?: boolean;
}

/**
 * One-shot convenience: compile, optionally validate and optimize, then
 * evaluate.
 *
 * @throws {ExpressionSyntaxError} if the source does not compile.
 * @throws {ExpressionValidationError} if validation is on and fails.
 * @throws {EvaluationError} if evaluation fails.
 */
export function evaluateSource(
  environment: Environment,
  source: string,
  options: EvaluateOptions = {}
): Value {
  let expression = compile(source);

  if (options.validate ?? true) {
    const result = validate(environment, expression);
    if (result.kind !== "valid") {
      throw new ExpressionValidationError(result);
    }
  }

  if (options.fold) {
    expression = optimizeWithEnvironment(environment, expression);
  } else if (options.optimize ?? true) {
    expression = transformTernary(expression);
  }

  return evaluate(environment, expression);
}

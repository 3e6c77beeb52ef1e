// ─── Validator ─────────────────────────────────────────────────────
// Advisory pre-flight check of names and arities against an environment.
// Never throws: the first problem found (depth-first, left to right) is
// returned as a discriminated result.

import { TERNARY_IF_THEN, type Expression } from "./ast";
import { acceptsParamCount, formatArity, type Arity } from "./arity";
import type { Environment } from "./environment";

export type ValidationResult =
  | { readonly kind: "valid" }
  | { readonly kind: "missingVariable"; readonly name: string }
  | { readonly kind: "missingFunction"; readonly name: string }
  | {
      readonly kind: "paramCountMismatch";
      readonly name: string;
      readonly expected: Arity;
      readonly found: number;
    };

const VALID: ValidationResult = { kind: "valid" };

function validateAll(env: Environment, nodes: readonly Expression[]): ValidationResult {
  for (const node of nodes) {
    const result = validate(env, node);
    if (result.kind !== "valid") return result;
  }
  return VALID;
}

function validateFunction(env: Environment, name: string, found: number): ValidationResult {
  const fn = env.function(name);
  if (!fn) return { kind: "missingFunction", name };
  if (!acceptsParamCount(fn.arity, found)) {
    return { kind: "paramCountMismatch", name, expected: fn.arity, found };
  }
  return VALID;
}

/**
 * Checks that every variable and function the expression references is
 * defined by the environment, and that calls match the declared arity.
 * A Ternary node counts as a three-parameter `if_then` call.
 */
export function validate(environment: Environment, expression: Expression): ValidationResult {
  switch (expression.kind) {
    case "Literal":
      return VALID;

    case "Variable":
      return environment.variable(expression.name) === undefined
        ? { kind: "missingVariable", name: expression.name }
        : VALID;

    case "Unary":
      return validate(environment, expression.operand);

    case "Binary":
      return validateAll(environment, [expression.left, expression.right]);

    case "Array":
      return validateAll(environment, expression.elements);

    case "Ternary": {
      const result = validateFunction(environment, TERNARY_IF_THEN, 3);
      if (result.kind !== "valid") return result;
      return validateAll(environment, [
        expression.condition,
        expression.consequent,
        expression.alternate,
      ]);
    }

    case "Call": {
      const result = validateFunction(environment, expression.name, expression.params.length);
      if (result.kind !== "valid") return result;
      return validateAll(environment, expression.params);
    }
  }
}

/** Human-readable description of a failed validation. */
export function describeValidation(result: ValidationResult): string {
  switch (result.kind) {
    case "valid":
      return "valid";
    case "missingVariable":
      return `Missing variable '${result.name}'`;
    case "missingFunction":
      return `Missing function '${result.name}'`;
    case "paramCountMismatch":
      return `Function '${result.name}' expects ${formatArity(result.expected)} parameter(s), got ${result.found}`;
  }
}

// ─── Boolean Result Check ──────────────────────────────────────────

export type BooleanResultCheck =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

const BOOLEAN_OPERATORS = new Set(["=", "<>", ">", ">=", "<", "<=", "and", "or", "xor"]);

/**
 * Reports whether the top-level node can only produce a Boolean.
 * Variables and calls pass, since their type is only known at run time.
 */
export function checkBooleanResult(expression: Expression): BooleanResultCheck {
  switch (expression.kind) {
    case "Unary":
      return expression.operator === "not"
        ? { ok: true }
        : { ok: false, reason: `Unary operator '${expression.operator}' does not produce a boolean` };

    case "Binary":
      return BOOLEAN_OPERATORS.has(expression.operator)
        ? { ok: true }
        : { ok: false, reason: `Binary operator '${expression.operator}' does not produce a boolean` };

    case "Ternary": {
      for (const branch of [expression.condition, expression.consequent, expression.alternate]) {
        const check = checkBooleanResult(branch);
        if (!check.ok) return check;
      }
      return { ok: true };
    }

    case "Array":
      return { ok: false, reason: "An array does not produce a boolean" };

    case "Literal":
      return expression.value.kind === "boolean"
        ? { ok: true }
        : { ok: false, reason: `A ${expression.value.kind} literal does not produce a boolean` };

    case "Variable":
    case "Call":
      return { ok: true };
  }
}

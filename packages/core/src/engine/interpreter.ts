// ─── Interpreter ───────────────────────────────────────────────────
// Recursive tree walker. Holds no state between calls: the same tree
// and environment may be evaluated any number of times.

import type { Binary, Call, Expression, Ternary, Unary } from "./ast";
import { acceptsParamCount, formatArity } from "./arity";
import type { Environment } from "./environment";
import { EvaluationError, NativeError } from "./errors";
import {
  add,
  arrayValue,
  booleanValue,
  compareValues,
  divide,
  emptyOf,
  intDivide,
  isEmpty,
  logicalNot,
  modulo,
  multiply,
  negate,
  subtract,
  valueEquals,
  xor,
  type Value,
} from "./value";

type BooleanValue = Extract<Value, { kind: "boolean" }>;

/**
 * Result of evaluating an operand. `undefined` stands for a variable the
 * environment does not define ("no value").
 */
type Operand = Value | undefined;

/** What "no value" becomes where nothing hints at a type. */
const NO_VALUE: Value = booleanValue(false);

/**
 * Evaluates an expression tree against an environment.
 *
 * @throws {EvaluationError} on type mismatches, unknown functions, arity
 *   mismatches and errors raised by native functions.
 */
export function evaluate(environment: Environment, expression: Expression): Value {
  return evaluateNode(environment, expression);
}

function evaluateNode(env: Environment, node: Expression): Value {
  switch (node.kind) {
    case "Literal":
      return node.value;

    case "Variable":
      return env.variable(node.name) ?? NO_VALUE;

    case "Unary":
      return evaluateUnary(env, node);

    case "Binary":
      return evaluateBinary(env, node);

    case "Array":
      return arrayValue(node.elements.map((element) => evaluateNode(env, element)));

    case "Ternary":
      return evaluateTernary(env, node);

    case "Call":
      return evaluateCall(env, node);
  }
}

function evaluateOperand(env: Environment, node: Expression): Operand {
  return node.kind === "Variable" ? env.variable(node.name) : evaluateNode(env, node);
}

function requireBoolean(operand: Operand, description: string): BooleanValue {
  const value = operand ?? emptyOf("boolean");
  if (value.kind !== "boolean") {
    throw new EvaluationError(
      "TypeMismatch",
      `${description} must be boolean, got ${value.kind}`
    );
  }
  return value;
}

function evaluateUnary(env: Environment, node: Unary): Value {
  const operand = evaluateOperand(env, node.operand);
  switch (node.operator) {
    case "not":
      return logicalNot(operand ?? emptyOf("boolean"));
    case "-":
      return negate(operand ?? emptyOf("number"));
  }
}

/** Equality where "no value" equals exactly the empty values. */
function operandsEqual(left: Operand, right: Operand): boolean {
  if (left === undefined && right === undefined) return true;
  if (left === undefined) return right !== undefined && isEmpty(right);
  if (right === undefined) return isEmpty(left);
  return valueEquals(left, right);
}

/** "No value" takes the empty value of the other operand's kind. */
function resolvePair(left: Operand, right: Operand): [Value, Value] {
  if (left === undefined && right === undefined) return [NO_VALUE, NO_VALUE];
  if (left === undefined) return right ? [emptyOf(right.kind), right] : [NO_VALUE, NO_VALUE];
  return [left, right ?? emptyOf(left.kind)];
}

function evaluateBinary(env: Environment, node: Binary): Value {
  // Short-circuit evaluation for logical operators
  if (node.operator === "and" || node.operator === "or") {
    const left = requireBoolean(
      evaluateOperand(env, node.left),
      `Left operand of '${node.operator}'`
    );
    if (node.operator === "and" && !left.value) return booleanValue(false);
    if (node.operator === "or" && left.value) return booleanValue(true);
    const right = requireBoolean(
      evaluateOperand(env, node.right),
      `Right operand of '${node.operator}'`
    );
    return booleanValue(right.value);
  }

  const leftOperand = evaluateOperand(env, node.left);
  const rightOperand = evaluateOperand(env, node.right);

  if (node.operator === "=") {
    return booleanValue(operandsEqual(leftOperand, rightOperand));
  }
  if (node.operator === "<>") {
    return booleanValue(!operandsEqual(leftOperand, rightOperand));
  }

  const [left, right] = resolvePair(leftOperand, rightOperand);

  switch (node.operator) {
    case "+":
      return add(left, right);
    case "-":
      return subtract(left, right);
    case "*":
      return multiply(left, right);
    case "/":
      return divide(left, right);
    case "div":
      return intDivide(left, right);
    case "mod":
      return modulo(left, right);
    case "xor":
      return xor(left, right);
    case ">":
      return booleanValue(compareValues(left, right) === 1);
    case ">=": {
      const order = compareValues(left, right);
      return booleanValue(order === 1 || order === 0);
    }
    case "<":
      return booleanValue(compareValues(left, right) === -1);
    case "<=": {
      const order = compareValues(left, right);
      return booleanValue(order === -1 || order === 0);
    }
  }
}

function evaluateTernary(env: Environment, node: Ternary): Value {
  const condition = requireBoolean(
    evaluateOperand(env, node.condition),
    `Condition of '${node.operator}'`
  );
  // Only the chosen branch is evaluated
  return condition.value
    ? evaluateNode(env, node.consequent)
    : evaluateNode(env, node.alternate);
}

function evaluateCall(env: Environment, node: Call): Value {
  const fn = env.function(node.name);
  if (!fn) {
    throw new EvaluationError("MissingFunction", `Unknown function: '${node.name}'`);
  }
  if (!acceptsParamCount(fn.arity, node.params.length)) {
    throw new EvaluationError(
      "ParamCountMismatch",
      `Function '${node.name}' expects ${formatArity(fn.arity)} parameter(s), got ${node.params.length}`
    );
  }

  const params = node.params.map((param) => evaluateNode(env, param));

  try {
    return fn.call(params);
  } catch (error) {
    if (error instanceof NativeError) {
      throw new EvaluationError(
        "NativeFunctionError",
        `Function '${node.name}' failed: ${error.message}`,
        { cause: error }
      );
    }
    throw error;
  }
}

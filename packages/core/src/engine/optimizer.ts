// ─── Optimizer ─────────────────────────────────────────────────────
// Tree-to-tree rewrites. Children are rewritten first (post-order);
// an unchanged subtree is returned as the same object, which is how
// the fixpoint loop detects that nothing is left to do.

import { TERNARY_IF_THEN, type Expression } from "./ast";
import { acceptsParamCount } from "./arity";
import type { Environment } from "./environment";
import { EvaluationError } from "./errors";
import { evaluate } from "./interpreter";

function rewriteAll(
  nodes: readonly Expression[],
  rewrite: (node: Expression) => Expression
): readonly Expression[] {
  const rewritten = nodes.map(rewrite);
  return rewritten.every((node, i) => node === nodes[i]) ? nodes : rewritten;
}

/**
 * Rewrites the children of a composite node with `rewrite`, rebuilding the
 * node only when a child changed.
 */
function rewriteChildren(
  node: Expression,
  rewrite: (node: Expression) => Expression
): Expression {
  switch (node.kind) {
    case "Literal":
    case "Variable":
      return node;

    case "Unary": {
      const operand = rewrite(node.operand);
      return operand === node.operand ? node : { ...node, operand };
    }

    case "Binary": {
      const left = rewrite(node.left);
      const right = rewrite(node.right);
      return left === node.left && right === node.right ? node : { ...node, left, right };
    }

    case "Array": {
      const elements = rewriteAll(node.elements, rewrite);
      return elements === node.elements ? node : { ...node, elements };
    }

    case "Ternary": {
      const condition = rewrite(node.condition);
      const consequent = rewrite(node.consequent);
      const alternate = rewrite(node.alternate);
      return condition === node.condition &&
        consequent === node.consequent &&
        alternate === node.alternate
        ? node
        : { ...node, condition, consequent, alternate };
    }

    case "Call": {
      const params = rewriteAll(node.params, rewrite);
      return params === node.params ? node : { ...node, params };
    }
  }
}

// ─── Ternary Rewrite ───────────────────────────────────────────────

/**
 * Turns every three-parameter `if_then(...)` call into a Ternary node, so
 * only the taken branch is evaluated. Calls with any other parameter count
 * stay ordinary calls. Never fails.
 */
export function transformTernary(expression: Expression): Expression {
  const node = rewriteChildren(expression, transformTernary);
  if (node.kind !== "Call" || node.name.toLowerCase() !== TERNARY_IF_THEN) {
    return node;
  }

  const [condition, consequent, alternate, ...rest] = node.params;
  if (!condition || !consequent || !alternate || rest.length > 0) {
    return node;
  }
  return { kind: "Ternary", operator: TERNARY_IF_THEN, condition, consequent, alternate };
}

/** The environment-free rewrite; same as {@link transformTernary}. */
export const optimize = transformTernary;

// ─── Constant Folding ──────────────────────────────────────────────

function allLiteral(nodes: readonly Expression[]): boolean {
  return nodes.every((node) => node.kind === "Literal");
}

function isConstant(env: Environment, node: Expression): boolean {
  switch (node.kind) {
    case "Unary":
      return node.operand.kind === "Literal";
    case "Binary":
      return node.left.kind === "Literal" && node.right.kind === "Literal";
    case "Array":
      return allLiteral(node.elements);
    case "Call": {
      const fn = env.function(node.name);
      return (
        fn !== undefined &&
        fn.pure &&
        acceptsParamCount(fn.arity, node.params.length) &&
        allLiteral(node.params)
      );
    }
    default:
      return false;
  }
}

/**
 * Evaluates ahead of time every subtree whose operands are all literals
 * (unary, binary, array and pure function calls) and resolves ternaries
 * whose condition is a boolean literal, unless the taken branch is a bare
 * variable. A subtree whose evaluation fails is left as it is, so the error
 * is raised when the expression runs.
 */
export function foldConstants(environment: Environment, expression: Expression): Expression {
  const fold = (node: Expression): Expression => {
    const rewritten = rewriteChildren(node, fold);

    if (rewritten.kind === "Ternary") {
      const { condition } = rewritten;
      if (condition.kind === "Literal" && condition.value.kind === "boolean") {
        const taken = condition.value.value ? rewritten.consequent : rewritten.alternate;
        // A missing variable is false here, but "no value" in the parent.
        return taken.kind === "Variable" ? rewritten : taken;
      }
      return rewritten;
    }

    if (!isConstant(environment, rewritten)) {
      return rewritten;
    }

    try {
      return { kind: "Literal", value: evaluate(environment, rewritten) };
    } catch (error) {
      if (error instanceof EvaluationError) return rewritten;
      throw error;
    }
  };

  return fold(expression);
}

/**
 * Applies the ternary rewrite and constant folding repeatedly until
 * neither changes the tree.
 */
export function optimizeWithEnvironment(
  environment: Environment,
  expression: Expression
): Expression {
  let current = expression;
  for (;;) {
    const next = foldConstants(environment, transformTernary(current));
    if (next === current) return current;
    current = next;
  }
}

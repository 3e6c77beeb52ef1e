// ─── Engine Errors ─────────────────────────────────────────────────
// Two disjoint taxonomies: compile-time (scanner/parser) and runtime
// (interpreter). Native functions throw NativeError, which the
// interpreter wraps at the call boundary.

export type SyntaxErrorCode =
  | "InvalidCharacter"
  | "InvalidNumber"
  | "UnterminatedStringLiteral"
  | "EmptyExpression"
  | "UnexpectedToken"
  | "MissingToken"
  | "MultipleExpressions"
  | "InvalidCallTarget";

/** Thrown by the scanner and parser. There is never a partial AST. */
export class ExpressionSyntaxError extends Error {
  readonly code: SyntaxErrorCode;

  constructor(code: SyntaxErrorCode, message: string) {
    super(message);
    this.name = "ExpressionSyntaxError";
    this.code = code;
  }
}

export type EvaluationErrorCode =
  | "MissingFunction"
  | "ParamCountMismatch"
  | "TypeMismatch"
  | "NativeFunctionError";

/** Thrown by the interpreter (and by value operators on mismatched operands). */
export class EvaluationError extends Error {
  readonly code: EvaluationErrorCode;

  constructor(code: EvaluationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EvaluationError";
    this.code = code;
  }
}

export type NativeErrorCode =
  | "WrongParameterCount"
  | "WrongParameterType"
  | "IndexOutOfBounds"
  | "IndexNegative"
  | "Custom";

/** Error raised from inside a native (host) function. */
export class NativeError extends Error {
  readonly code: NativeErrorCode;

  constructor(code: NativeErrorCode, message: string) {
    super(message);
    this.name = "NativeError";
    this.code = code;
  }

  static wrongParameterCount(expected: number): NativeError {
    return new NativeError(
      "WrongParameterCount",
      `wrong number of parameters: ${expected} expected`
    );
  }

  static wrongParameterType(): NativeError {
    return new NativeError("WrongParameterType", "wrong parameter type");
  }

  static indexOutOfBounds(index: number): NativeError {
    return new NativeError("IndexOutOfBounds", `index ${index} is out of bounds`);
  }

  static indexNegative(): NativeError {
    return new NativeError("IndexNegative", "index must not be negative");
  }

  static custom(message: string): NativeError {
    return new NativeError("Custom", message);
  }
}

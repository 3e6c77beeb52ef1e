export * from "./ast";
export * from "./tokens";
export * from "./value";
export { ExpressionSyntaxError, EvaluationError, NativeError, type SyntaxErrorCode, type EvaluationErrorCode, type NativeErrorCode } from "./errors";
export { arity, acceptsParamCount, formatArity, type Arity } from "./arity";
export { StaticEnvironment, defineFunction, defineImpure, type Environment, type FunctionDefinition, type NativeFunction } from "./environment";
export { tokenize } from "./scanner";
export { parse } from "./parser";
export { transformTernary, optimize, foldConstants, optimizeWithEnvironment } from "./optimizer";
export { validate, describeValidation, checkBooleanResult, type ValidationResult, type BooleanResultCheck } from "./validator";
export { evaluate } from "./interpreter";
export { compile, execute, evaluateSource, ExpressionValidationError, type EvaluateOptions } from "./compile";

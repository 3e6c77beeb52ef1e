export {
  SerializedExpressionSchema,
  SerializedValueSchema,
  serializeExpression,
  deserializeExpression,
  serializeValue,
  deserializeValue,
  parseSerializedExpression,
  safeParseSerializedExpression,
  type SerializedExpression,
  type SerializedValue,
} from "./wire";
export { formatZodIssues } from "./format-zod-issues";

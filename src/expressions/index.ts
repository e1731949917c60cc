export { ExpressionLexer, ExpressionSyntaxError } from "./lexer.js";
export {
  ExpressionParser,
  isExpressionString,
  parseExpression,
  parseTemplateExpression,
  unescapeLiteral,
} from "./parser.js";
export { literalExpression, serializeExpression, toTemplateString } from "./serializer.js";
export {
  checkArity,
  FunctionEvaluationError,
  FunctionRegistry,
  type EagerFunction,
  type FunctionContext,
  type FunctionDefinition,
  type LazyFunction,
  type RuntimeFunction,
} from "./registry.js";
export { getBuiltinRegistry, registerBuiltinFunctions, toArmString } from "./functions.js";
export { ExpressionEvaluator, type EvaluationContext, type ResolvedValue } from "./evaluator.js";
export { parseResourceReference, providerPath, type ResourceTypeAndName } from "./resource-id.js";
export { isResidual, Residual, type EvalResult, type Expression } from "./types.js";

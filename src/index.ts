/**
 * template-binder: validate ARM-style deployment templates, bind parameter
 * values and resolve template expressions ahead of deployment.
 */

export * from "./binder/index.js";
export * from "./template/index.js";
export {
  ExpressionEvaluator,
  FunctionEvaluationError,
  FunctionRegistry,
  getBuiltinRegistry,
  parseExpression,
  registerBuiltinFunctions,
  serializeExpression,
  type EvaluationContext,
  type FunctionContext,
  type FunctionDefinition,
} from "./expressions/index.js";
export {
  BindingError,
  CyclicReferenceError,
  InvalidExpressionError,
  InvalidParameterValueError,
  isBindingError,
  MalformedDocumentError,
  MissingParameterError,
  UnresolvedReferenceError,
  type BindingErrorCode,
} from "./errors.js";
export {
  ConfigError,
  DEFAULT_DEPLOYMENT_SCOPE,
  getDefaultConfig,
  loadConfig,
  type BinderConfig,
  type DeploymentScope,
  type ResolvedConfig,
} from "./config.js";
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from "./logging.js";
export type { JsonObject, JsonValue } from "./types.js";

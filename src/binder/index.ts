export {
  bind,
  isTemplateDocument,
  resolveTemplate,
  type BindOptions,
  type BindResult,
  type ResolvedOutput,
  type ResolvedTemplate,
} from "./binder.js";
export {
  checkParameterValue,
  describeParameterValue,
  type BoundParameter,
  type ParameterSource,
  type ParameterValues,
} from "./parameters.js";
export { analyzeReferences, detectCycle, type ReferenceReport } from "./references.js";
export { MAX_COPY_COUNT } from "./resources.js";
export {
  DEFAULT_CONTENT_VERSION,
  DEFAULT_TEMPLATE_SCHEMA,
  renderDeploymentRequest,
  type DeploymentMode,
  type DeploymentRequest,
  type RenderOptions,
} from "./request.js";

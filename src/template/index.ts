export { loadTemplateFile, parseTemplate, parseTemplateJson } from "./loader.js";
export {
  coerceParameterValue,
  loadParameterFile,
  parseAssignment,
  parseParameterFile,
  parseParameterFileJson,
} from "./parameter-file.js";
export { checkTemplateDocument, TemplateDocumentSchema } from "./schema.js";
export {
  isSecureType,
  matchesType,
  PARAMETER_TYPES,
  type OutputDeclaration,
  type ParameterDeclaration,
  type ParameterType,
  type ResourceSpec,
  type TemplateDocument,
  type UserFunction,
  type VariableDeclaration,
} from "./types.js";

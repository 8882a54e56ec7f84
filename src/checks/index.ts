/**
 * Style and complexity checks for C sources.
 */

export {
  checkFunctionComplexity,
  countFunctionBody,
  type FunctionCount,
  MAX_FUNCTION_LINES,
  type StatementKind,
} from "./complexity.js";
export {
  checkCaseConsistency,
  classifyCase,
  classifyIdentifiers,
  type ClassifyResult,
} from "./identifiers.js";
export { checkFunctionComments, checkGlobalVariables } from "./structure.js";

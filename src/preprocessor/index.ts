/**
 * Preprocessor module - macro expansion and line-marker realignment.
 */

export {
  type ExpandOptions,
  type LineMarker,
  MalformedDirectiveError,
  PreprocessError,
  type Preprocessor,
  type PreprocessorSettings,
} from "./types.js";

export {
  buildArgs,
  CommandPreprocessor,
  DEBUG_MACRO,
  DEFAULT_PREPROCESSOR,
} from "./bridge.js";
export { parseLineMarker, realign, STDIN_NAME } from "./realign.js";

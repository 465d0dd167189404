// Core model types
//
// IMPORTANT: This module only imports from shared/ - no node or resolver code.

export { type Writer, StringWriter, writeText } from "./writer.js";
export {
  type TemplateContext,
  createTemplateContext,
  DEFAULT_START_CHARS,
  DEFAULT_END_CHARS,
} from "./context.js";
export { type ScopeStack, isAbsent, extendScopes, innermostScope } from "./scope.js";

// Shared infrastructure
//
// Cross-cutting utilities used by every layer.
// IMPORTANT: This module imports nothing from the rest of the engine.

export {
  debug,
  configureDebug,
  getDebugChannel,
  openDebugChannel,
  refreshDebugChannels,
  isDebugEnabled,
  parseDebugChannels,
  DEBUG_ENV_VAR,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

export {
  RenderError,
  RenderErrorCode,
  isRenderError,
  describeError,
  type RenderErrorCodeType,
} from "./errors.js";

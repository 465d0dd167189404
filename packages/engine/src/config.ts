import { DEBUG_ENV_VAR, openDebugChannel, parseDebugChannels, type DebugChannel } from "./shared/debug.js";
import { RenderError, RenderErrorCode } from "./shared/errors.js";

/**
 * Per-call render configuration. Each render resolves its own options, so
 * concurrent renders with different settings never interfere.
 */
export interface EngineOptions {
  /** Report render start, completion and failure to `trace`. */
  readonly debug: boolean;
  readonly trace: DebugChannel;
}

export interface EngineOptionsInput {
  /** Defaults to whether MOUSTACHE_DEBUG enables the `render` channel. */
  debug?: boolean;
  /** Defaults to a `render` channel writing through the debug output. */
  trace?: DebugChannel;
}

export function resolveEngineOptions(
  input: EngineOptionsInput = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineOptions {
  if (input.debug !== undefined && typeof input.debug !== "boolean") {
    throw new RenderError(
      `Option 'debug' must be a boolean, got ${typeof input.debug}`,
      RenderErrorCode.INVALID_OPTIONS,
    );
  }
  if (input.trace !== undefined && typeof input.trace !== "function") {
    throw new RenderError(
      `Option 'trace' must be a function, got ${typeof input.trace}`,
      RenderErrorCode.INVALID_OPTIONS,
    );
  }

  const channels = parseDebugChannels(env[DEBUG_ENV_VAR]);
  return {
    debug: input.debug ?? (channels.has("*") || channels.has("render")),
    trace: input.trace ?? openDebugChannel("render"),
  };
}

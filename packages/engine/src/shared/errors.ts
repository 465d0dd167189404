/* =============================================================================
 * RENDER ERRORS
 * ============================================================================= */

/** Error codes */
export const RenderErrorCode = {
  /** The output writer rejected a write. */
  SINK_FAILURE: "RENDER_SINK_FAILURE",
  /** A node kind cannot be duplicated. */
  DUPLICATION_UNSUPPORTED: "RENDER_DUPLICATION_UNSUPPORTED",
  /** Children were replaced after the tree was initialized. */
  TREE_SEALED: "RENDER_TREE_SEALED",
  /** Children were replaced on a node that has no container. */
  NO_CONTAINER: "RENDER_NO_CONTAINER",
  INVALID_OPTIONS: "RENDER_INVALID_OPTIONS",
  /** Any other failure raised while rendering. */
  FAILED: "RENDER_FAILED",
} as const;

export type RenderErrorCodeType = (typeof RenderErrorCode)[keyof typeof RenderErrorCode];

/**
 * Failure raised while executing or reconstructing a node tree.
 * Every lower-level failure surfaces as this one category.
 */
export class RenderError extends Error {
  constructor(
    message: string,
    public readonly code: RenderErrorCodeType,
    public readonly node?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RenderError";
  }
}

export function isRenderError(value: unknown): value is RenderError {
  return value instanceof RenderError;
}

/** Describe an unknown thrown value for error messages. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

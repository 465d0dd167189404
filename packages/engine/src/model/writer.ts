import { RenderError, RenderErrorCode, describeError, isRenderError } from "../shared/errors.js";

/**
 * Output destination threaded through every execute and identity call.
 * Nodes borrow a writer for the duration of one call and never retain it.
 */
export interface Writer {
  write(text: string): void;
}

/** Collects written fragments in memory. */
export class StringWriter implements Writer {
  private readonly parts: string[] = [];

  write(text: string): void {
    this.parts.push(text);
  }

  /** Total characters written so far. */
  get length(): number {
    let total = 0;
    for (const part of this.parts) total += part.length;
    return total;
  }

  toString(): string {
    return this.parts.join("");
  }
}

/**
 * Write through to the sink, surfacing any failure as a RenderError.
 * A RenderError raised by the sink itself passes through unchanged.
 */
export function writeText(writer: Writer, text: string, node?: string): void {
  try {
    writer.write(text);
  } catch (error) {
    if (isRenderError(error)) throw error;
    throw new RenderError(
      `Failed to write template output: ${describeError(error)}`,
      RenderErrorCode.SINK_FAILURE,
      node,
      { cause: error },
    );
  }
}

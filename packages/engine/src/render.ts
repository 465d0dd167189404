import { resolveEngineOptions, type EngineOptionsInput } from "./config.js";
import { StringWriter, type Writer } from "./model/writer.js";
import type { Node } from "./node/node.js";
import { countNodes } from "./node/walk.js";
import { debug } from "./shared/debug.js";
import { RenderError, RenderErrorCode, describeError, isRenderError } from "./shared/errors.js";

/**
 * Initialize `root` (idempotent) and execute it against a one-element scope
 * stack, writing into `writer`.
 *
 * @returns The writer returned by the root node.
 * @throws {RenderError} Every failure is surfaced as a RenderError; errors
 *   that are not already one are wrapped with code `RENDER_FAILED`.
 */
export function renderTo(
  root: Node,
  writer: Writer,
  scope: unknown,
  input: EngineOptionsInput = {},
): Writer {
  const options = resolveEngineOptions(input);
  const label = root.name ?? "<root>";
  const started = options.debug ? process.hrtime.bigint() : 0n;

  if (options.debug) {
    options.trace("render.start", { node: label, nodes: countNodes(root) });
  }

  try {
    root.init();
    const result = root.render(writer, scope);
    if (options.debug) {
      options.trace("render.complete", {
        node: label,
        elapsedMs: Number(process.hrtime.bigint() - started) / 1e6,
        ...(result instanceof StringWriter ? { length: result.length } : {}),
      });
    }
    return result;
  } catch (error) {
    if (options.debug) {
      options.trace("render.failed", { node: label, error });
    }
    if (isRenderError(error)) throw error;
    throw new RenderError(
      `Failed to render '${label}': ${describeError(error)}`,
      RenderErrorCode.FAILED,
      label,
      { cause: error },
    );
  }
}

/** Render `root` against `scope` and return the output. */
export function renderTemplate(root: Node, scope: unknown, input: EngineOptionsInput = {}): string {
  const writer = new StringWriter();
  renderTo(root, writer, scope, input);
  return writer.toString();
}

/** Regenerate the template source `root` was compiled from. */
export function reconstructTemplate(root: Node): string {
  const writer = new StringWriter();
  root.identity(writer);
  debug.render("identity", { node: root.name ?? "<root>", length: writer.length });
  return writer.toString();
}

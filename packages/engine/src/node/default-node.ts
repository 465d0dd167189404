import { createTemplateContext, type TemplateContext } from "../model/context.js";
import { extendScopes, innermostScope, type ScopeStack } from "../model/scope.js";
import { writeText, type Writer } from "../model/writer.js";
import type { Binding, ObjectHandler } from "../resolve/object-handler.js";
import { debug } from "../shared/debug.js";
import { RenderError, RenderErrorCode } from "../shared/errors.js";
import type { Node, NodeContainer } from "./node.js";

/** Reserved name denoting the innermost scope value itself. */
export const SELF_REFERENCE = ".";

/** Tag markers written by `identity` for the common node kinds. */
export const TagMarker = {
  VARIABLE: "",
  UNESCAPED: "&",
  SECTION: "#",
  INVERTED: "^",
  PARTIAL: ">",
  COMMENT: "!",
} as const;

export interface NodeInit {
  /** Delimiters and location in effect where the tag was compiled. */
  context?: TemplateContext;
  /** Source of the node's binding; omitted for root and anonymous nodes. */
  handler?: ObjectHandler | null;
  /** Owner of the node's children; omitted for leaf nodes. */
  container?: NodeContainer | null;
  /** Empty string and `null` both mean anonymous. */
  name?: string | null;
  kind?: string;
}

/** State a duplicate shares with, or copies from, its source node. */
export interface SharedNodeState {
  readonly binding: Binding | null;
  readonly trailingText: string | null;
}

type LifecycleState = "created" | "initializing" | "ready";

/**
 * Base node with the shared default behavior: run the children in document
 * order, then write the trailing text.
 */
export class DefaultNode implements Node {
  readonly name: string | null;
  readonly kind: string;
  readonly context: TemplateContext;
  readonly isSelfReference: boolean;

  protected readonly handler: ObjectHandler | null;
  protected readonly container: NodeContainer | null;
  protected readonly binding: Binding | null;

  // Final once init() is complete
  protected appended: string | null = null;

  private state: LifecycleState = "created";

  /**
   * @param shared - When given, the binding and trailing text are taken from
   *   it instead of asking the handler; this is how `duplicate` shares state.
   */
  constructor(init: NodeInit = {}, shared?: SharedNodeState) {
    this.name = init.name ? init.name : null;
    this.kind = init.kind ?? TagMarker.VARIABLE;
    this.context = init.context ?? createTemplateContext();
    this.handler = init.handler ?? null;
    this.container = init.container ?? null;
    this.isSelfReference = this.name === SELF_REFERENCE;

    if (shared) {
      this.binding = shared.binding;
      this.appended = shared.trailingText;
    } else {
      this.binding =
        this.handler === null || this.name === null
          ? null
          : this.handler.createBinding(this.name, this.context, this);
    }
  }

  get trailingText(): string | null {
    return this.appended;
  }

  get initialized(): boolean {
    return this.state === "ready";
  }

  getChildren(): readonly Node[] | null {
    return this.container === null ? null : this.container.getChildren();
  }

  setChildren(children: readonly Node[]): void {
    if (this.container === null) {
      throw new RenderError(
        `Node '${this.label()}' has no container to hold children`,
        RenderErrorCode.NO_CONTAINER,
        this.label(),
      );
    }
    this.container.setChildren(children);
  }

  /**
   * Initialize the subtree depth-first, then seal this node's container.
   * A call made while initialization is already running, or after it
   * finished, does nothing.
   */
  init(): void {
    if (this.state !== "created") return;
    this.state = "initializing";
    try {
      const children = this.getChildren();
      if (children !== null) {
        for (const child of children) {
          child.init();
        }
      }
      this.container?.seal();
      this.state = "ready";
    } catch (error) {
      this.state = "created";
      throw error;
    }
    debug.node("init", { node: this.label(), kind: this.kind });
  }

  /**
   * Retrieve the first value in the stack of scopes that matches this node's
   * name, searching innermost first. The binding caches how it found the
   * value and re-validates that against the current stack on every call.
   *
   * @returns The value, or `undefined` when nothing matches. A binding
   *   failure is reported as absent, never thrown.
   */
  get(scopes: ScopeStack): unknown {
    if (this.isSelfReference) {
      return innermostScope(scopes);
    }
    if (this.binding === null) return undefined;
    try {
      return this.binding.get(scopes);
    } catch (error) {
      debug.resolve("binding.failed", { node: this.label(), error });
      return undefined;
    }
  }

  render(writer: Writer, scope: unknown): Writer {
    return this.execute(writer, [scope]);
  }

  /**
   * The default behavior is to run the children and append the captured text.
   */
  execute(writer: Writer, scopes: ScopeStack): Writer {
    return this.appendText(this.runChildren(writer, scopes));
  }

  identity(writer: Writer): void {
    const children = this.getChildren();
    if (this.name === null) {
      this.runIdentity(writer, children);
    } else {
      this.tag(writer, this.kind);
      if (children !== null) {
        this.runIdentity(writer, children);
        this.tag(writer, "/");
      }
    }
    this.appendText(writer);
  }

  append(text: string): void {
    if (this.state === "ready") {
      throw new RenderError(
        `Cannot append text to '${this.label()}' after the tree has been initialized`,
        RenderErrorCode.TREE_SEALED,
        this.label(),
      );
    }
    this.appended = this.appended === null ? text : this.appended + text;
  }

  /** Expand the current set of scopes. Absent candidates leave it as is. */
  addScope(scopes: ScopeStack, scope: unknown): ScopeStack {
    return extendScopes(scopes, scope);
  }

  /**
   * Every subclass must provide its own duplicate; inheriting this one would
   * silently produce a node of the wrong kind.
   */
  duplicate(): DefaultNode {
    if (Object.getPrototypeOf(this) !== DefaultNode.prototype) {
      throw new RenderError(
        `${this.constructor.name} does not support duplication`,
        RenderErrorCode.DUPLICATION_UNSUPPORTED,
        this.label(),
      );
    }
    debug.node("duplicate", { node: this.label() });
    return new DefaultNode(this.nodeInit(), this.sharedState());
  }

  protected nodeInit(): NodeInit {
    return {
      context: this.context,
      handler: this.handler,
      container: this.container,
      name: this.name,
      kind: this.kind,
    };
  }

  protected sharedState(): SharedNodeState {
    return { binding: this.binding, trailingText: this.appended };
  }

  protected runChildren(writer: Writer, scopes: ScopeStack): Writer {
    const children = this.getChildren();
    if (children !== null) {
      for (const child of children) {
        writer = child.execute(writer, scopes);
      }
    }
    return writer;
  }

  protected appendText(writer: Writer): Writer {
    if (this.appended !== null) {
      writeText(writer, this.appended, this.label());
    }
    return writer;
  }

  protected label(): string {
    return this.name ?? "<anonymous>";
  }

  private runIdentity(writer: Writer, children: readonly Node[] | null): void {
    if (children === null) return;
    for (const child of children) {
      child.identity(writer);
    }
  }

  private tag(writer: Writer, marker: string): void {
    const { startChars, endChars } = this.context;
    writeText(writer, `${startChars}${marker}${this.name ?? ""}${endChars}`, this.label());
  }
}

import type { TemplateContext } from "../model/context.js";
import type { ScopeStack } from "../model/scope.js";
import type { Node } from "../node/node.js";
import { debug } from "../shared/debug.js";
import { DEFAULT_BACKENDS, findBackend, type LookupBackend } from "./lookup.js";
import type { Binding, ObjectHandler } from "./object-handler.js";

/* =============================================================================
 * GUARD FINGERPRINTS
 * ============================================================================= */

/** Structural kind of one scope value, as recorded in a guard. */
export function shapeOf(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  if (Array.isArray(value)) return "Array";
  if (value instanceof Map) return "Map";
  const proto: object | null = Object.getPrototypeOf(value);
  if (proto === null) return "Object(null)";
  const ctor: unknown = Reflect.get(proto, "constructor");
  return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
}

/** Fingerprint of a whole stack: its length and every scope's shape. */
export function fingerprint(scopes: ScopeStack): string {
  let out = `${scopes.length}:`;
  for (let i = 0; i < scopes.length; i++) {
    out += i === 0 ? shapeOf(scopes[i]) : `|${shapeOf(scopes[i])}`;
  }
  return out;
}

/* =============================================================================
 * GUARDED BINDING
 * ============================================================================= */

interface CacheEntry {
  readonly guard: string;
  readonly index: number;
  readonly backend: LookupBackend;
}

interface Resolution {
  readonly index: number;
  readonly backend: LookupBackend;
}

export interface BindingStats {
  readonly cacheHits: number;
  readonly cacheMisses: number;
}

/**
 * Binding for one (possibly dotted) name.
 *
 * The head segment is searched from the innermost scope outwards. The last
 * successful search is cached together with the stack fingerprint it was
 * made against; the cache is only used when the fingerprint matches and the
 * cached scope still wins the search. Entries are immutable and replaced
 * by a single assignment.
 */
export class GuardedBinding implements Binding {
  readonly name: string;
  readonly context: TemplateContext;

  private readonly segments: readonly string[];
  private readonly backends: readonly LookupBackend[];
  private entry: CacheEntry | null = null;
  private hits = 0;
  private misses = 0;

  constructor(name: string, context: TemplateContext, backends: readonly LookupBackend[]) {
    this.name = name;
    this.context = context;
    this.segments = name.split(".");
    this.backends = backends;
  }

  get stats(): BindingStats {
    return { cacheHits: this.hits, cacheMisses: this.misses };
  }

  get(scopes: ScopeStack): unknown {
    const head = this.segments[0] ?? "";
    const guard = fingerprint(scopes);

    let found = this.validate(this.entry, guard, scopes, head);
    if (found !== null) {
      this.hits++;
    } else {
      this.misses++;
      found = searchScopes(this.backends, scopes, head);
      this.entry = found === null ? null : Object.freeze({ guard, ...found });
      debug.resolve("cache.miss", {
        name: this.name,
        guard,
        index: found?.index ?? null,
        backend: found?.backend.kind ?? null,
      });
      if (found === null) return undefined;
    }

    return readPath(this.backends, found.backend.read(scopes[found.index], head), this.segments);
  }

  private validate(
    entry: CacheEntry | null,
    guard: string,
    scopes: ScopeStack,
    head: string,
  ): Resolution | null {
    if (entry === null || entry.guard !== guard) return null;
    if (findBackend(this.backends, scopes[entry.index], head) !== entry.backend) return null;
    for (let i = scopes.length - 1; i > entry.index; i--) {
      if (findBackend(this.backends, scopes[i], head) !== null) return null;
    }
    return entry;
  }
}

/** Full innermost-first search for the scope exposing `key`. */
export function searchScopes(
  backends: readonly LookupBackend[],
  scopes: ScopeStack,
  key: string,
): Resolution | null {
  for (let i = scopes.length - 1; i >= 0; i--) {
    const backend = findBackend(backends, scopes[i], key);
    if (backend !== null) return { index: i, backend };
  }
  return null;
}

/** Follow the segments after the head; a missing link yields `undefined`. */
function readPath(
  backends: readonly LookupBackend[],
  head: unknown,
  segments: readonly string[],
): unknown {
  let value = head;
  for (let i = 1; i < segments.length; i++) {
    const segment = segments[i] ?? "";
    const backend = findBackend(backends, value, segment);
    if (backend === null) return undefined;
    value = backend.read(value, segment);
  }
  return value;
}

/* =============================================================================
 * HANDLER
 * ============================================================================= */

export interface ReflectionObjectHandlerOptions {
  /** Lookup backends, tried in order. Defaults to map, accessor, property. */
  backends?: readonly LookupBackend[];
}

/**
 * Object handler that resolves names against plain objects, class instances
 * and maps, with one guarded cache per binding.
 */
export class ReflectionObjectHandler implements ObjectHandler {
  private readonly backends: readonly LookupBackend[];

  constructor(options: ReflectionObjectHandlerOptions = {}) {
    this.backends = options.backends ?? DEFAULT_BACKENDS;
  }

  createBinding(name: string, context: TemplateContext, _node: Node): GuardedBinding {
    return new GuardedBinding(name, context, this.backends);
  }

  /** Uncached resolution of `name` against `scopes`. */
  resolve(name: string, scopes: ScopeStack): unknown {
    const segments = name.split(".");
    const head = segments[0] ?? "";
    const found = searchScopes(this.backends, scopes, head);
    if (found === null) return undefined;
    return readPath(this.backends, found.backend.read(scopes[found.index], head), segments);
  }
}

/**
 * Debug Channels
 *
 * Targeted, structured debug logging for the node tree: lifecycle passes,
 * binding cache decisions and render entry points.
 *
 * ## Usage
 *
 * ```bash
 * MOUSTACHE_DEBUG=resolve npm test       # binding cache only
 * MOUSTACHE_DEBUG=node,render npm test   # several channels
 * MOUSTACHE_DEBUG=* npm test             # everything
 * ```
 *
 * ```typescript
 * debug.resolve("cache.miss", { name, depth: scopes.length });
 * ```
 *
 * A disabled channel is a no-op function; checking it costs one call.
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Custom output function (defaults to console.log) */
  output: (message: string) => void;
}

export const DEBUG_ENV_VAR = "MOUSTACHE_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

/** Parse a MOUSTACHE_DEBUG value into the set of enabled channels. */
export function parseDebugChannels(value: string | undefined): Set<string> {
  const env = value ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0),
  );
}

let enabledChannels = parseDebugChannels(process.env[DEBUG_ENV_VAR]);

const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(
  channel: string,
  point: string,
  data: DebugData | undefined,
): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data: toJsonData(data) }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

/** Errors serialize as `{}`; keep their name and message instead. */
function toJsonData(data: DebugData): DebugData {
  const out: DebugData = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

function formatData(data: DebugData): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    parts.push(`${key}=${formatValue(value)}`);
  }
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  if (value instanceof Error) {
    return `<${value.name}: ${value.message}>`;
  }
  if (typeof value === "object") {
    if ("name" in value && typeof value.name === "string") {
      return `<${value.name}>`;
    }
    if ("kind" in value && typeof value.kind === "string") {
      return `<${value.kind}>`;
    }
    return "{...}";
  }
  return String(value);
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Get or create an extra debug channel by name.
 * Channels are refreshed when refreshDebugChannels() is called.
 */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * A channel that always logs through the configured output, whatever
 * MOUSTACHE_DEBUG says. Used when a caller turns debugging on explicitly.
 */
export function openDebugChannel(name: string): DebugChannel {
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/** Re-read MOUSTACHE_DEBUG and rebuild every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugChannels(process.env[DEBUG_ENV_VAR]);
  debug.node = createChannel("node");
  debug.resolve = createChannel("resolve");
  debug.render = createChannel("render");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Check if any debug channel is enabled.
 * Useful for conditional expensive computations.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Node lifecycle (init, sealing, duplication) */
  node: createChannel("node"),

  /** Binding resolution and guard cache */
  resolve: createChannel("resolve"),

  /** Render and reconstruction entry points */
  render: createChannel("render"),
};

export type Debug = typeof debug;

/**
 * Debug channels for the parser.
 *
 * Enable via environment variable:
 * ```bash
 * TEMPL_DEBUG=parse npm test         # template/file level events
 * TEMPL_DEBUG=parse,nodes npm test   # plus node parser terminator decisions
 * TEMPL_DEBUG=* npm test             # everything
 * ```
 *
 * Disabled channels are no-op functions.
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  format: "json" | "pretty";
  /** Defaults to console.log */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  output: (message) => console.log(message),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["TEMPL_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(["*"]);
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    return JSON.stringify(value.length > 60 ? `${value.slice(0, 57)}...` : value);
  }
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return `[${value.length} items]`;
  return "{...}";
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({ channel, point, ...(data && { data }) });
  }
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return label;
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${label} { ${parts.join(", ")} }`;
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) return () => {};
  return (point, data) => {
    config.output(formatMessage(name, point, data));
  };
}

export const debug: { parse: DebugChannel; nodes: DebugChannel } = {
  parse: createChannel("parse"),
  nodes: createChannel("nodes"),
};

/** Re-reads TEMPL_DEBUG and rebuilds the channels. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.parse = createChannel("parse");
  debug.nodes = createChannel("nodes");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

// Debug-namespace logging for the stateful layers.
//
// A namespace is enabled when the active pattern list matches it, the way
// npm's debug package does it. Patterns come from localStorage.debug when
// a localStorage global exists, otherwise from the DEBUG environment
// variable.

export type LogData = Record<string, unknown>;

export interface Logger {
  readonly namespace: string;
  enabled(): boolean;
  debug(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
}

export const LogNamespace = {
  Stream: "lnmp:stream",
  Backpressure: "lnmp:backpressure",
  Negotiation: "lnmp:negotiation",
} as const;
export type LogNamespace = (typeof LogNamespace)[keyof typeof LogNamespace];

function debugPatterns(): string | undefined {
  if (typeof localStorage !== "undefined") {
    const value = localStorage.getItem("debug");
    if (value) return value;
  }
  if (typeof process !== "undefined") return process.env.DEBUG;
  return undefined;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Whether `namespace` is enabled by the current pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string): boolean {
  const debug = debugPatterns();
  if (!debug) return false;

  let enabled = false;
  for (const pattern of debug.split(/[\s,]+/).filter(Boolean)) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) enabled = false;
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }
  return enabled;
}

/**
 * Create a logger for a namespace. Records are structured objects handed
 * to the console, so they stay expandable in devtools.
 *
 * To enable in a browser console:
 * ```javascript
 * localStorage.debug = 'lnmp:*'
 * ```
 * or from a shell: `DEBUG=lnmp:stream node app.js`.
 */
export function createLogger(namespace: string): Logger {
  return {
    namespace,
    enabled: () => isEnabled(namespace),
    debug(message, data = {}) {
      if (!isEnabled(namespace)) return;
      console.log(`${namespace} ${message}`, { namespace, ...data });
    },
    warn(message, data = {}) {
      if (!isEnabled(namespace)) return;
      console.warn(`${namespace} ${message}`, { namespace, ...data });
    },
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = {
  namespace: "",
  enabled: () => false,
  debug() {},
  warn() {},
};

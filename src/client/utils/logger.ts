interface LogLevel {
  log: 'log';
  warn: 'warn';
  error: 'error';
  debug: 'debug';
}

type LogMethod = (...args: unknown[]) => void;

export interface Logger {
  log: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  debug: LogMethod;
}

export interface LogRecord {
  level: keyof LogLevel;
  module: string;
  args: unknown[];
}

/** Receives every emitted record, e.g. to forward it to a collector endpoint */
export type LogTransport = (record: LogRecord) => void | Promise<void>;

let debugMode = false;
let transport: LogTransport | null = null;

/**
 * Enable or disable debug mode for all loggers
 * @param enabled - Whether to enable debug logging
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Install (or remove with `null`) the remote log transport
 */
export function setLogTransport(next: LogTransport | null): void {
  transport = next;
}

/**
 * Format arguments for consistent logging
 */
function formatArgs(args: unknown[]): unknown[] {
  return args.map((arg) => {
    if (arg instanceof Error) {
      return arg.stack ?? `${arg.name}: ${arg.message}`;
    }
    if (typeof arg === 'object' && arg !== null) {
      try {
        return JSON.stringify(arg, null, 2);
      } catch {
        return String(arg);
      }
    }
    return arg;
  });
}

/**
 * Hand a record to the transport (fire and forget)
 */
async function sendToTransport(level: keyof LogLevel, module: string, args: unknown[]): Promise<void> {
  const current = transport;
  if (!current) return;

  try {
    await current({ level, module, args: formatArgs(args) });
  } catch {
    // Transport failures must not recurse into the logger
  }
}

/**
 * Creates a logger instance for a specific module
 * @param moduleName - The name of the module for log context
 * @returns Logger instance with log, warn, error, and debug methods
 */
export function createLogger(moduleName: string): Logger {
  const createLogMethod = (level: keyof LogLevel): LogMethod => {
    return (...args: unknown[]) => {
      // Skip debug logs if debug mode is disabled
      if (level === 'debug' && !debugMode) return;

      console[level](`[${moduleName}]`, ...args);

      void sendToTransport(level, moduleName, args);
    };
  };

  return {
    log: createLogMethod('log'),
    warn: createLogMethod('warn'),
    error: createLogMethod('error'),
    debug: createLogMethod('debug'),
  };
}

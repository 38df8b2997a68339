/**
 * Logging for mcp-switchboard
 * Based on tslog with structured output
 */

import { Logger, type ILogObj } from "tslog";

/**
 * Log levels
 */
export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type MCPLogger = Logger<ILogObj>;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: "mcpsw",
  level: "info",
  prettyPrint: true,
};

const LEVELS: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Parse a level name such as the value of MCPSW_LOG_LEVEL, falling back when unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : fallback;
}

/**
 * Create a logger instance
 */
export function createLogger(config: Partial<LoggerConfig> = {}): MCPLogger {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };

  return new Logger<ILogObj>({
    name: finalConfig.name,
    minLevel: LEVELS[finalConfig.level],
    prettyLogTemplate: finalConfig.prettyPrint
      ? "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] "
      : undefined,
    prettyLogTimeZone: "local",
    stylePrettyLogs: finalConfig.prettyPrint,
  });
}

/**
 * Create a child logger with a specific name
 */
export function createChildLogger(parent: MCPLogger, name: string): MCPLogger {
  return parent.getSubLogger({ name });
}

let globalLogger: MCPLogger | null = null;

/**
 * Get the global logger instance
 */
export function getLogger(): MCPLogger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Set the global logger instance
 */
export function setLogger(logger: MCPLogger): void {
  globalLogger = logger;
}

/**
 * Child of the global logger, e.g. `scopedLogger("mcp:client")`
 */
export function scopedLogger(name: string): MCPLogger {
  return createChildLogger(getLogger(), name);
}

/**
 * Structured Logger Service
 *
 * JSON-formatted log lines on stderr (stdout is reserved for the MCP
 * JSON-RPC protocol). Every line of one query carries the same query_id,
 * so `grep qry_1734345045123_a1b2c3` shows its whole lifecycle.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  // Correlation
  query_id?: string;
  session_id?: string;
  dataset_id?: string;

  // Query lifecycle
  state?: string;
  attempt?: number;
  category?: string;

  // Performance
  duration_ms?: number;

  // Errors
  error?: string;

  // Extensible
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function minimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
    return configured;
  }
  return 'info';
}

/**
 * Log a structured message to stderr
 *
 * Output format:
 * {"ts":"2025-12-16T10:30:45.123Z","level":"info","msg":"Query recorded","query_id":"qry_...",...}
 */
export function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }
  const entry = {
    ts: new Date().toISOString(),
    level,
    msg: message,
    ...context,
  };
  console.error(JSON.stringify(entry));
}

// Convenience functions
export const logInfo = (msg: string, ctx?: LogContext) => log('info', msg, ctx);
export const logWarn = (msg: string, ctx?: LogContext) => log('warn', msg, ctx);
export const logError = (msg: string, ctx?: LogContext) => log('error', msg, ctx);
export const logDebug = (msg: string, ctx?: LogContext) => log('debug', msg, ctx);

/**
 * Generate unique query ID for log correlation
 * Format: qry_<timestamp>_<random>
 */
export function generateQueryId(): string {
  return `qry_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

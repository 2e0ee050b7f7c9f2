/**
 * Structured Logger
 *
 * JSON lines with bounty / request context.
 * Lines go to stdout unless a sink is supplied.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  bountyId?: number;
  submitter?: string;
  caller?: string;
  requestId?: string;
  operation?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

export type LogSink = (line: string) => void;

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

// =============================================================================
// JSON LOGGER IMPLEMENTATION
// =============================================================================

export class JsonLogger implements Logger {
  private context: LogContext;
  private level: LogLevel;
  private sink: LogSink;

  constructor(context: LogContext = {}, level: LogLevel = 'info', sink: LogSink = defaultSink) {
    this.context = context;
    this.level = level;
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, context: LogContext, message: string): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    for (const [key, value] of Object.entries({ ...this.context, ...context })) {
      // Drop undefined values
      if (value === undefined) continue;
      entry[key] = serializeValue(value);
    }

    this.sink(JSON.stringify(entry));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level, this.sink);
  }
}

// Amounts are bigint and errors carry their stack; JSON.stringify handles neither
function serializeValue(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

function defaultSink(line: string): void {
  console.log(line);
}

// =============================================================================
// FACTORY
// =============================================================================

export function createLogger(
  options?: {
    level?: LogLevel;
    service?: string;
    sink?: LogSink;
  }
): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'bounty-escrow' },
    options?.level ?? 'info',
    options?.sink
  );
}

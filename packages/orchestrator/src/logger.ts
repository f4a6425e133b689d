import pc from 'picocolors';

type LogLevel = 'info' | 'warn' | 'error' | 'step' | 'success';

export type LogEvent = {
  level: LogLevel;
  message: string;
  details?: Record<string, unknown> | undefined;
  timestamp: string;
};

export type Logger = {
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
  step: (message: string, details?: Record<string, unknown>) => void;
  success: (message: string, details?: Record<string, unknown>) => void;
  events: () => LogEvent[];
  flush: (final?: Record<string, unknown>) => void;
};

type LoggerOptions = {
  json?: boolean;
  /** Where human-readable lines go; console.log by default. */
  write?: (line: string) => void;
};

const ICONS: Record<LogLevel, string> = {
  info: pc.cyan('ℹ'),
  warn: pc.yellow('⚠'),
  error: pc.red('✖'),
  step: pc.dim('•'),
  success: pc.green('✔'),
};

export function formatMessage(level: LogLevel, message: string, details?: Record<string, unknown>): string {
  const text = level === 'error' ? pc.red(message) : message;
  const hasDetails = details !== undefined && Object.keys(details).length > 0;
  return hasDetails ? `${ICONS[level]} ${text} ${pc.dim(JSON.stringify(details))}` : `${ICONS[level]} ${text}`;
}

/**
 * Console logger for the CLI. In JSON mode nothing is printed until `flush`,
 * which writes the buffered events together with the final result.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { json = false, write = (line: string) => console.log(line) } = options;
  const events: LogEvent[] = [];

  const push = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    events.push({ level, message, details, timestamp: new Date().toISOString() });
    if (!json) write(formatMessage(level, message, details));
  };

  return {
    info: (message, details) => push('info', message, details),
    warn: (message, details) => push('warn', message, details),
    error: (message, details) => push('error', message, details),
    step: (message, details) => push('step', message, details),
    success: (message, details) => push('success', message, details),
    events: () => events,
    flush: (final) => {
      if (json) {
        write(JSON.stringify({ events, result: final ?? null }, null, 2));
      }
    },
  };
}

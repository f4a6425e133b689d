import pino from 'pino';

export type PipelineLogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface PipelineLogEvent {
  level: PipelineLogLevel;
  message: string;
  runId?: string;
  stage?: string;
  detail?: Record<string, unknown>;
}

export interface PipelineLogger {
  log: (event: PipelineLogEvent) => void;
}

export interface PipelineMetrics {
  timing: (metric: string, durationMs: number, tags?: Record<string, string>) => void;
  increment: (metric: string, value?: number, tags?: Record<string, string>) => void;
}

export const noopLogger: PipelineLogger = {
  log: () => {
    /* noop */
  },
};

export const noopMetrics: PipelineMetrics = {
  timing: () => {
    /* noop */
  },
  increment: () => {
    /* noop */
  },
};

export interface PinoLoggerOptions {
  level?: string;
  /** Destination stream; stdout when omitted. */
  destination?: pino.DestinationStream;
}

/** Structured JSON logging for library callers that are not the CLI. */
export function createPinoLogger(options: PinoLoggerOptions = {}): PipelineLogger {
  const base = pino(
    { level: options.level ?? process.env.LOG_LEVEL ?? 'info' },
    options.destination ?? pino.destination(1),
  );
  return {
    log({ level, message, runId, stage, detail }) {
      const fields: Record<string, unknown> = { ...(detail ?? {}) };
      if (runId) fields.runId = runId;
      if (stage) fields.stage = stage;
      base[level](fields, message);
    },
  };
}

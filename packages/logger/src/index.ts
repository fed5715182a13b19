import { Axiom } from '@axiomhq/js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface LogRecord extends LogData {
  level: LogLevel;
  component: string;
  event: string;
}

// Severity for the threshold; writer is the console method the record goes to
const LEVELS: Record<LogLevel, { severity: number; write: (line: string) => void }> = {
  debug: { severity: 10, write: (line) => console.debug(line) },
  info: { severity: 20, write: (line) => console.log(line) },
  warn: { severity: 30, write: (line) => console.warn(line) },
  error: { severity: 40, write: (line) => console.error(line) },
};

const DEFAULT_DATASET = 'science-trivia';

export interface LoggerEnv {
  LOG_LEVEL?: LogLevel;
  AXIOM_TOKEN?: string;
  AXIOM_ORG_ID?: string;
  AXIOM_DATASET?: string;
}

export interface Logger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  /** Resolves once every record handed to Axiom so far has been shipped. */
  flush(): Promise<void>;
}

function toRecord(level: LogLevel, component: string, event: string, data?: LogData): LogRecord {
  return { level, component, event, ...data };
}

/**
 * Writes one game event as a single-line JSON record, e.g.
 * `{"level":"warn","component":"simulator","event":"event.rejected","reason":"DEADLINE_EXCEEDED"}`.
 * Replay output can then be filtered by `event` or `reason` with any JSON tool.
 */
export function log(level: LogLevel, component: string, event: string, data?: LogData): void {
  LEVELS[level].write(JSON.stringify(toRecord(level, component, event, data)));
}

/**
 * Component-scoped logger with a level threshold.
 * Ships records to Axiom when `AXIOM_TOKEN` is present; console output is unaffected.
 */
export function createLogger(component: string, env: LoggerEnv = {}): Logger {
  const threshold = LEVELS[env.LOG_LEVEL ?? 'info'].severity;
  const dataset = env.AXIOM_DATASET ?? DEFAULT_DATASET;
  const axiom = env.AXIOM_TOKEN
    ? new Axiom({ token: env.AXIOM_TOKEN, orgId: env.AXIOM_ORG_ID })
    : null;

  const emit = (level: LogLevel) => (event: string, data?: LogData) => {
    if (LEVELS[level].severity < threshold) return;
    const record = toRecord(level, component, event, data);
    LEVELS[level].write(JSON.stringify(record));
    axiom?.ingest(dataset, [record]);
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    async flush() {
      if (!axiom) return;
      try {
        await axiom.flush();
      } catch (err) {
        console.error('Failed to ship logs to Axiom', err);
      }
    },
  };
}

export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical';

type LogSink = (line: string) => void;

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

let minimumLevel: LogLevel = 'warning';
let sink: LogSink = stderrSink;

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

/** Replace the output writer; pass nothing to restore stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

// Internal logging function - use `logger` object for external access
function writeLog(level: LogLevel, data: string, loggerName?: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;
  sink(`[${level}] ${loggerName ? `${loggerName}: ` : ''}${data}`);
}

export const logger = {
  debug: (msg: string, loggerName?: string): void => {
    writeLog('debug', msg, loggerName);
  },
  info: (msg: string, loggerName?: string): void => {
    writeLog('info', msg, loggerName);
  },
  notice: (msg: string, loggerName?: string): void => {
    writeLog('notice', msg, loggerName);
  },
  warning: (msg: string, loggerName?: string): void => {
    writeLog('warning', msg, loggerName);
  },
  error: (msg: string, loggerName?: string): void => {
    writeLog('error', msg, loggerName);
  },
  critical: (msg: string, loggerName?: string): void => {
    writeLog('critical', msg, loggerName);
  },
};

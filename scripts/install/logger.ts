import { createFileSink, createStreamSink, createTeeWriter, type Writer } from '../lib/output.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Pino-compatible (levels-only) surface:
// - logger.info('msg')
// - logger.info({ key: 'value' }, 'msg')
export type InstallLogger = {
  debug: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  info: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  warn: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  error: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
};

function normalizeArgs(
  objOrMsg?: Record<string, unknown> | string,
  msg?: string
): { obj: Record<string, unknown>; msg: string } {
  if (typeof objOrMsg === 'string') {
    return { obj: {}, msg: objOrMsg };
  }
  return { obj: objOrMsg ?? {}, msg: msg ?? '' };
}

function levelToNumber(level: LogLevel): number {
  // Align with pino numeric levels.
  switch (level) {
    case 'debug':
      return 20;
    case 'info':
      return 30;
    case 'warn':
      return 40;
    case 'error':
      return 50;
  }
}

function formatField(value: unknown): string {
  if (typeof value === 'string') return value.includes(' ') ? JSON.stringify(value) : value;
  if (value instanceof Error) return JSON.stringify(value.message);
  return JSON.stringify(value) ?? String(value);
}

/**
 * `[info] install.package.start name=PETSc version=3.12.1`
 */
export function formatLogLine(level: LogLevel, obj: Record<string, unknown>, msg: string): string {
  const fields = Object.entries(obj)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${formatField(v)}`);
  return [`[${level}]`, msg, ...fields].filter((part) => part.length > 0).join(' ') + '\n';
}

/**
 * Logger that writes through the same writer as user-facing output, so the
 * log file and the terminal stay identical.
 */
export function createInstallLogger(out: Writer, opts: { level?: LogLevel } = {}): InstallLogger {
  const threshold = levelToNumber(opts.level ?? 'info');

  const write = (level: LogLevel, objOrMsg?: Record<string, unknown> | string, msg?: string): void => {
    if (levelToNumber(level) < threshold) return;
    const { obj, msg: normalizedMsg } = normalizeArgs(objOrMsg, msg);
    out.write(formatLogLine(level, obj, normalizedMsg));
  };

  return {
    debug: (objOrMsg, msg) => write('debug', objOrMsg, msg),
    info: (objOrMsg, msg) => write('info', objOrMsg, msg),
    warn: (objOrMsg, msg) => write('warn', objOrMsg, msg),
    error: (objOrMsg, msg) => write('error', objOrMsg, msg)
  };
}

/**
 * Process-wide output: the terminal mirrored into a fresh log file.
 * The file handle lives until the process exits.
 */
export function createInstallOutput(params: {
  logFile: string;
  terminal?: NodeJS.WritableStream;
}): Writer {
  const terminal = createStreamSink(params.terminal ?? process.stdout);
  const logFile = createFileSink(params.logFile, { fresh: true });
  return createTeeWriter([terminal, logFile]);
}

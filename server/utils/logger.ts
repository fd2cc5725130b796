type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(context: LogMeta): Logger;
}

function formatMeta(meta?: LogMeta): string {
  if (!meta) return '';
  try {
    return ' ' + JSON.stringify(meta);
  } catch {
    return ' [unserializable meta]';
  }
}

function write(level: LogLevel, prefix: string, msg: string, meta?: LogMeta) {
  const line = `[${level.toUpperCase()}] ${new Date().toISOString()} ${prefix}${msg}${formatMeta(meta)}`;
  switch (level) {
    case 'debug':
      if (process.env.NODE_ENV !== 'production') console.debug(line);
      return;
    case 'info':
      console.info(line);
      return;
    case 'warn':
      console.warn(line);
      return;
    case 'error':
      console.error(line);
      return;
  }
}

function createLogger(prefix = ''): Logger {
  return {
    debug: (msg, meta) => write('debug', prefix, msg, meta),
    info: (msg, meta) => write('info', prefix, msg, meta),
    warn: (msg, meta) => write('warn', prefix, msg, meta),
    error: (msg, meta) => write('error', prefix, msg, meta),
    // prefixes every message with the serialized context
    child: (context) => createLogger(`${prefix}${JSON.stringify(context)} `),
  };
}

const logger = createLogger();

export default logger;

import pinoPkg from 'pino';
const pino = pinoPkg;
import { fileURLToPath } from 'url';
import { log_file, log_level, log_pretty, type LogLevel } from './config.js';

// Create the base logger instance
const baseLogger = log_pretty
  ? pino({
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'yyyy-mm-dd HH:MM:ss.l',
          ignore: 'pid,hostname',
        }
      },
      level: log_level
    })
  : pino({ level: log_level });

// Also write to file when one is configured
const fileLogger = log_file ? pino({ level: log_level }, pino.destination(log_file)) : undefined;

// Accepts a file path or an import.meta.url
function getFileName(fileName: string): string {
  const filePath = fileName.startsWith('file:') ? fileURLToPath(fileName) : fileName;
  return filePath.split(/[\\/]/).pop() || filePath;
}

// Function to change log level at runtime
function setLogLevel(level: LogLevel): void {
  baseLogger.level = level;
  if (fileLogger) fileLogger.level = level;
}

type LogMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

// Create a wrapper that adds filename to log messages
function createLogger(fileName: string) {
  const shortFileName = getFileName(fileName);

  const formatArgs = (args: unknown[]) => args.map(arg =>
    typeof arg === 'object' && arg !== null ? "\n" + JSON.stringify(arg, null, 2) : String(arg)
  );

  const write = (method: LogMethod) => (message: string, ...args: unknown[]) => {
    if (!baseLogger.isLevelEnabled(method)) return;
    const msg = `[${shortFileName}] ${message} ${formatArgs(args).join(' ')}`.trimEnd();
    baseLogger[method](msg);
    fileLogger?.[method](msg);
  };

  return {
    setLogLevel,
    trace: write('trace'),
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    fatal: write('fatal'),
  };
}

type Logger = ReturnType<typeof createLogger>;

export { createLogger, setLogLevel };
export type { Logger };

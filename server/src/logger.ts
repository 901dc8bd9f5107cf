import fs from 'fs';
import path from 'path';

type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';
type ConsoleMethod = (message?: unknown, ...args: unknown[]) => void;

const logsDir = process.env.LOG_DIR
  ? path.resolve(process.env.LOG_DIR)
  : path.join(process.cwd(), 'logs');

// テスト実行中はファイルに書かない
const fileLoggingEnabled =
  process.env.LOG_TO_FILE !== 'false' && process.env.NODE_ENV !== 'test';

const logFile = path.join(
  logsDir,
  `server-${new Date().toISOString().split('T')[0]}.log`
);

const formatArg = (arg: unknown): string => {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  if (typeof arg === 'object') return JSON.stringify(arg, null, 2);
  return String(arg);
};

export const formatLogLine = (
  level: LogLevel,
  message: string,
  args: unknown[],
  timestamp = new Date()
): string =>
  `[${timestamp.toISOString()}] [${level}] ${[message, ...args.map(formatArg)].join(' ')}\n`;

const appendToFile = (line: string) => {
  if (!fileLoggingEnabled) return;
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  fs.appendFileSync(logFile, line, 'utf8');
};

const emit =
  (level: LogLevel, print: ConsoleMethod) =>
  (message: string, ...args: unknown[]) => {
    print(message, ...args);
    appendToFile(formatLogLine(level, message, args));
  };

export const logger = {
  log: emit('INFO', console.log),
  warn: emit('WARN', console.warn),
  error: emit('ERROR', console.error),
  debug: emit('DEBUG', console.debug),
  /** ファイル出力が無効なら null */
  getLogFilePath: (): string | null => (fileLoggingEnabled ? logFile : null),
};

/**
 * Application logger singleton backed by Winston.
 *
 * - Writes daily rotated log files to `<logsDir>/application-<DATE>.log`.
 * - Outside production, also logs to a colorized console.
 * - Under `NODE_ENV=test` nothing is written to disk and the console is silent.
 *
 * Level comes from `LOG_LEVEL`, then `config.json` `logging.level`, then `info`.
 */
import fs from 'fs';
import { createLogger, format, transports } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const { combine, timestamp, printf, colorize } = format;

const logFormat = printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

interface LoggingSettings {
  logsDir: string;
  level: string;
  dailyRotate: boolean;
  maxSize: string;
  maxFiles: string;
  console: boolean;
}

const isTest = process.env.NODE_ENV === 'test';

const settings: LoggingSettings = {
  logsDir: 'logs',
  level: process.env.LOG_LEVEL || 'info',
  dailyRotate: true,
  maxSize: '20m',
  maxFiles: '14d',
  console: process.env.NODE_ENV !== 'production',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// config.json is read directly here rather than through ./config, which logs
// through this module.
try {
  const cfgPath = 'config.json';
  if (!isTest && fs.existsSync(cfgPath)) {
    const parsed: unknown = JSON.parse(fs.readFileSync(cfgPath, 'utf8'));
    const logging = isRecord(parsed) && isRecord(parsed.logging) ? parsed.logging : {};
    const paths = isRecord(parsed) && isRecord(parsed.paths) ? parsed.paths : {};
    if (typeof paths.logsDir === 'string' && paths.logsDir) settings.logsDir = paths.logsDir;
    if (!process.env.LOG_LEVEL && typeof logging.level === 'string') settings.level = logging.level;
    if (typeof logging.dailyRotate === 'boolean') settings.dailyRotate = logging.dailyRotate;
    if (typeof logging.maxSize === 'string') settings.maxSize = logging.maxSize;
    if (typeof logging.maxFiles === 'string') settings.maxFiles = logging.maxFiles;
    if (typeof logging.console === 'boolean') settings.console = logging.console;
  }
} catch (e) {
  console.warn(`Ignoring unreadable config.json logging section: ${e instanceof Error ? e.message : String(e)}`);
}

function fileTransports() {
  if (isTest) return [];
  fs.mkdirSync(settings.logsDir, { recursive: true });
  if (!settings.dailyRotate) {
    return [new transports.File({ filename: `${settings.logsDir}/application.log`, level: settings.level })];
  }
  return [
    new DailyRotateFile({
      filename: `${settings.logsDir}/application-%DATE%.log`,
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: settings.maxSize,
      maxFiles: settings.maxFiles,
      level: settings.level,
    }),
  ];
}

function consoleTransports() {
  // tests keep a silent console so winston always has a transport
  if (!settings.console && !isTest) return [];
  return [new transports.Console({ format: combine(colorize(), timestamp(), logFormat), silent: isTest })];
}

const logger = createLogger({
  level: settings.level,
  format: combine(timestamp(), logFormat),
  transports: [...fileTransports(), ...consoleTransports()],
});

export default logger;

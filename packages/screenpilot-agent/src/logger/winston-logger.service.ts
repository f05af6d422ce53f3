import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { errorMessage } from '@screenpilot/shared';

/**
 * Create Winston logger configuration with platform-aware paths
 */
export function createWinstonLogger(serviceName = 'screenpilot-agent') {
  // SCREENPILOT_LOG_DIR wins, otherwise a platform default
  let logDir: string;
  if (process.env.SCREENPILOT_LOG_DIR) {
    logDir = process.env.SCREENPILOT_LOG_DIR;
  } else if (os.platform() === 'win32') {
    logDir = path.join(os.homedir(), 'AppData', 'Local', 'Screenpilot', 'logs');
  } else {
    logDir = path.join(os.homedir(), '.screenpilot', 'logs');
  }

  if (!fs.existsSync(logDir)) {
    try {
      fs.mkdirSync(logDir, { recursive: true });
    } catch (error) {
      console.error(
        `Failed to create log directory ${logDir}: ${errorMessage(error)}`,
      );
      logDir = os.tmpdir();
    }
  }

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, context, stack }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      const stackStr = stack ? `\n${String(stack)}` : '';
      return `[${String(timestamp)}] [${level.toUpperCase()}] ${contextStr}${String(message)}${stackStr}`;
    }),
  );

  // Console format (colorized for readability)
  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, context }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      return `[${String(timestamp)}] ${level} ${contextStr}${String(message)}`;
    }),
  );

  const level = process.env.SCREENPILOT_LOG_LEVEL ?? 'debug';

  const fileRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, `${serviceName}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level,
  });

  // Error log transport (errors only)
  const errorRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, `${serviceName}-error-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'error',
  });

  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
    level,
  });

  return winston.createLogger({
    level,
    transports: [consoleTransport, fileRotateTransport, errorRotateTransport],
    exceptionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, `${serviceName}-exceptions.log`),
        format: logFormat,
      }),
    ],
    rejectionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, `${serviceName}-rejections.log`),
        format: logFormat,
      }),
    ],
  });
}

import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'debug';
type Colorizer = typeof chalk.white;

interface LevelStyle {
  color: Colorizer;
  bright: Colorizer;
  icon: string;
}

const levelStyles: Record<LogLevel, LevelStyle> = {
  error: { color: chalk.red, bright: chalk.redBright, icon: '❌' },
  warn: { color: chalk.yellow, bright: chalk.yellowBright, icon: '⚠️ ' },
  info: { color: chalk.blue, bright: chalk.blueBright, icon: 'ℹ️ ' },
  http: { color: chalk.magenta, bright: chalk.magentaBright, icon: '🌐' },
  debug: { color: chalk.cyan, bright: chalk.cyanBright, icon: '🔍' },
};

const fallbackStyle: LevelStyle = { color: chalk.white, bright: chalk.whiteBright, icon: '📝' };

const isLogLevel = (level: string): level is LogLevel => level in levelStyles;

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const style = isLogLevel(level) ? levelStyles[level] : fallbackStyle;

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = style.color(`[${level.toUpperCase()}]`);

  // Format the message - use bright color for strings
  const formattedMessage = typeof message === 'string' ? style.bright(message) : String(message);

  // Include stack trace for errors
  return stack
    ? `${timestampStr} ${style.icon} ${levelStr}\n${chalk.red(String(stack))}`
    : `${timestampStr} ${style.icon} ${levelStr} ${formattedMessage}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${String(stack ?? message)}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'attendance-reconciliation' },
  transports: [
    // Console transport with colors
    new winston.transports.Console({
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
}

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

// Static helpers for one-off messages (objects are pretty-printed)
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(toMessage(args));
  };

  public static error = (args: unknown): void => {
    logger.error(toMessage(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(toMessage(args));
  };

  public static http = (args: unknown): void => {
    logger.http(toMessage(args));
  };

  // Pretty formatted success message, silenced like the logger in tests
  public static success = (args: unknown): void => {
    if (env.NODE_ENV === 'test') return;
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(toMessage(args)));
  };

  // Box-styled important message
  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╔${line}╗`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╠${line}╣`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╚${line}╝`));
  };
}

export default logger;

import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';

type Painter = typeof chalk.red;

interface LevelStyle {
  color: Painter;
  bright: Painter;
  icon: string;
}

const levelStyles: Record<LevelName, LevelStyle> = {
  error: { color: chalk.red, bright: chalk.redBright, icon: '❌' },
  warn: { color: chalk.yellow, bright: chalk.yellowBright, icon: '⚠️ ' },
  info: { color: chalk.blue, bright: chalk.blueBright, icon: 'ℹ️ ' },
  http: { color: chalk.magenta, bright: chalk.magentaBright, icon: '🌐' },
  debug: { color: chalk.cyan, bright: chalk.cyanBright, icon: '🔍' },
};

const fallbackStyle: LevelStyle = { color: chalk.white, bright: chalk.whiteBright, icon: '📝' };

function isLevelName(level: string): level is LevelName {
  return Object.prototype.hasOwnProperty.call(levelStyles, level);
}

function styleFor(level: string): LevelStyle {
  return isLevelName(level) ? levelStyles[level] : fallbackStyle;
}

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack, sessionId }) => {
  const style = styleFor(level);

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = style.color(`[${level.toUpperCase()}]`);
  const sessionStr = typeof sessionId === 'string' ? chalk.gray(`[${sessionId.slice(0, 8)}] `) : '';
  const formattedMessage = typeof message === 'string' ? style.bright(message) : String(message);

  return stack
    ? `${timestampStr} ${style.icon} ${levelStr} ${sessionStr}${formattedMessage}\n${chalk.red(String(stack))}`
    : `${timestampStr} ${style.icon} ${levelStr} ${sessionStr}${formattedMessage}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack, sessionId }) => {
  const sessionStr = typeof sessionId === 'string' ? ` [${sessionId}]` : '';
  return `${String(ts)} [${level.toUpperCase()}]${sessionStr}: ${String(stack ?? message)}`;
});

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'reconciliation-engine' },
  transports: [
    new winston.transports.Console({
      silent: env.NODE_ENV === 'test' && env.LOG_LEVEL !== 'debug',
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

/**
 * Child logger carrying the session id, so every line of one
 * reconciliation run can be grepped together.
 */
export function sessionLogger(sessionId: string): winston.Logger {
  return logger.child({ sessionId });
}

const stringify = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

export class Logging {
  public static info = (args: unknown): void => {
    logger.info(stringify(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(stringify(args));
  };

  public static error = (args: unknown): void => {
    logger.error(stringify(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(stringify(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(stringify(args)));
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

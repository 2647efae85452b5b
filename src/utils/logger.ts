import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type ChalkStyle = typeof chalk.red;

interface LevelStyle {
  color: ChalkStyle;
  bright: ChalkStyle;
  icon: string;
}

// Colors and icons per log level
const levelStyles: Record<string, LevelStyle> = {
  error: { color: chalk.red, bright: chalk.redBright, icon: '❌' },
  warn: { color: chalk.yellow, bright: chalk.yellowBright, icon: '⚠️ ' },
  info: { color: chalk.blue, bright: chalk.blueBright, icon: 'ℹ️ ' },
  http: { color: chalk.magenta, bright: chalk.magentaBright, icon: '🌐' },
  debug: { color: chalk.cyan, bright: chalk.cyanBright, icon: '🔍' },
};

const fallbackStyle: LevelStyle = { color: chalk.white, bright: chalk.whiteBright, icon: '📝' };

const asText = (value: unknown): string => (typeof value === 'string' ? value : String(value));

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const style = levelStyles[level] ?? fallbackStyle;

  const timestampStr = chalk.gray(`[${asText(ts)}]`);
  const levelStr = style.color(`[${level.toUpperCase()}]`);

  // Include stack trace for errors
  if (stack) {
    return `${timestampStr} ${style.icon} ${levelStr}\n${chalk.red(asText(stack))}`;
  }

  return `${timestampStr} ${style.icon} ${levelStr} ${style.bright(asText(message))}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${asText(ts)} [${level.toUpperCase()}]: ${asText(stack ?? message)}`;
});

const baseFormat = [timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })];

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(...baseFormat),
  defaultMeta: { service: 'product-reconciliation' },
  transports: [new winston.transports.Console({ format: combine(...baseFormat, colorizedFormat) })],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(...baseFormat, fileFormat),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(...baseFormat, fileFormat),
    })
  );
}

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

// Console helpers for startup banners and request tracing
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

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    if (env.NODE_ENV === 'test') return;
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(toMessage(args)));
  };

  // Box-styled important message
  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    const rows = [
      chalk.cyan(`╔${line}╗`),
      chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╠${line}╣`),
      chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╚${line}╝`),
    ];
    // eslint-disable-next-line no-console
    console.log(rows.join('\n'));
  };
}

export default logger;

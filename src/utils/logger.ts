import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';
type Colorizer = (text: string) => string;

// Color definitions for different log levels
const levelColors: Record<LevelName, Colorizer> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  http: chalk.magenta,
  debug: chalk.cyan,
};

const levelBrightColors: Record<LevelName, Colorizer> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  http: chalk.magentaBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<LevelName, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  http: '🌐',
  debug: '🔍',
};

const isLevelName = (level: string): level is LevelName => level in levelColors;

const asText = (value: unknown): string => (typeof value === 'string' ? value : String(value));

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const color = isLevelName(level) ? levelColors[level] : chalk.white;
  const brightColor = isLevelName(level) ? levelBrightColors[level] : chalk.whiteBright;
  const icon = isLevelName(level) ? levelIcons[level] : '📝';

  const timestampStr = chalk.gray(`[${asText(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);

  const formattedMessage = typeof message === 'string' ? brightColor(message) : asText(message);

  // Include stack trace for errors
  return stack
    ? `${timestampStr} ${icon} ${levelStr}\n${chalk.red(asText(stack))}`
    : `${timestampStr} ${icon} ${levelStr} ${formattedMessage}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${asText(ts)} [${level.toUpperCase()}]: ${asText(stack ?? message)}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'invoice-reconciliation' },
  transports: [
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
      format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true }), fileFormat),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true }), fileFormat),
    })
  );
}

const stringify = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

export class Logging {
  public static info = (args: unknown): void => {
    logger.info(stringify(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    if (env.NODE_ENV === 'test') return;
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(stringify(args)));
  };

  // Box-styled important message
  public static box = (title: string, message: string): void => {
    if (env.NODE_ENV === 'test') return;
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

import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type Colorizer = (text: string) => string;

// Color definitions for different log levels
const levelColors: Record<string, Colorizer> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  http: chalk.magenta,
  debug: chalk.cyan,
};

const levelBrightColors: Record<string, Colorizer> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  http: chalk.magentaBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<string, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  http: '🌐',
  debug: '🔍',
};

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

const label = (component: unknown): string =>
  typeof component === 'string' ? `[${component}] ` : '';

const render = (message: unknown): string =>
  typeof message === 'string' ? message : JSON.stringify(message);

// Console: icon, colored level, optional [component], bright message
const colorizedFormat = printf(({ level, message, timestamp: ts, stack, component }) => {
  const color = levelColors[level] ?? chalk.white;
  const brightColor = levelBrightColors[level] ?? chalk.whiteBright;
  const icon = levelIcons[level] ?? '📝';
  const head = `${chalk.gray(`[${String(ts)}]`)} ${icon} ${color(`[${level.toUpperCase()}]`)}`;

  if (stack) {
    return `${head} ${chalk.gray(label(component))}\n${chalk.red(String(stack))}`;
  }

  return `${head} ${chalk.gray(label(component))}${brightColor(render(message))}`;
});

// Files: no colors
const fileFormat = printf(({ level, message, timestamp: ts, stack, component }) => {
  const body = stack ? String(stack) : render(message);
  return `${String(ts)} [${level.toUpperCase()}] ${label(component)}${body}`;
});

const withTimestamp = (format: winston.Logform.Format): winston.Logform.Format =>
  combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), format);

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  defaultMeta: { service: 'invoice-reconciler' },
  transports: [new winston.transports.Console({ format: withTimestamp(colorizedFormat) })],
});

// logs/ next to the working directory
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: withTimestamp(fileFormat),
    })
  );
  logger.add(new winston.transports.File({ filename: 'logs/combined.log', format: withTimestamp(fileFormat) }));
}

/**
 * Logger whose lines carry a component label, e.g. `[catalog]`
 */
export const componentLogger = (component: string): winston.Logger => logger.child({ component });

const stringify = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

/**
 * Static helpers for human-facing startup and progress messages
 */
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(stringify(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const message = stringify(args);
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(message));
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

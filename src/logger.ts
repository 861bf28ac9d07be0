import winston from 'winston';
import { loadLogSettings } from './config.js';

// info -> green, debug -> magenta, warn -> yellow, error -> red
winston.addColors({
  info: 'green',
  debug: 'magenta',
  warn: 'yellow',
  error: 'red',
});

const settings = loadLogSettings();

function formatMeta(meta: Record<string, unknown>): string {
  return Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, null, 0)}` : '';
}

const colorizer = winston.format.colorize();

const logger = winston.createLogger({
  level: settings.level,
  format: winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  transports: [
    new winston.transports.Console({
      // Color only the level label; meta fields are appended as JSON
      format: winston.format.printf((info) => {
        const { level, message, timestamp, ...meta } = info;
        const coloredLevel = colorizer.colorize(level, `${level.toLowerCase()}:`);
        return `${String(timestamp)} ${coloredLevel} ${String(message)}${formatMeta(meta)}`;
      }),
      silent: settings.silent,
    }),
  ],
});

if (settings.file) {
  logger.add(
    new winston.transports.File({
      filename: settings.file,
      format: winston.format.printf((info) => {
        const { level, message, timestamp, ...meta } = info;
        return `${String(timestamp)} ${level.toUpperCase()}: ${String(message)}${formatMeta(meta)}`;
      }),
    })
  );
}

export default logger;

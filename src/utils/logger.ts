import fs from 'fs';
import winston from 'winston';

const { combine, colorize, errors, json, printf, timestamp } = winston.format;

/**
 * Console line for tailing a live session: aircraft id and state lead, other meta follows as JSON.
 * `CCA101 PARKED->TAXIING Aircraft state changed {"service":"traffic-awareness"}`
 */
export const formatConsoleLine = (entry: Record<string, unknown>): string => {
  const {
    level, message, timestamp: time, id, oldState, newState, ...rest
  } = entry;
  const subject = typeof id === 'string' ? `${id} ` : '';
  const transition = typeof oldState === 'string' && typeof newState === 'string'
    ? `${oldState}->${newState} `
    : '';
  const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  return `${String(time)} ${String(level)}: ${subject}${transition}${String(message)}${extra}`;
};

const resolveLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'error' : 'info';
};

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(colorize(), printf((entry) => formatConsoleLine(entry))),
  }),
];

// LOG_DIR turns on file output: errors alone, and the full traffic stream
if (process.env.LOG_DIR) {
  fs.mkdirSync(process.env.LOG_DIR, { recursive: true });
  transports.push(
    new winston.transports.File({ filename: `${process.env.LOG_DIR}/error.log`, level: 'error', format: json() }),
    new winston.transports.File({ filename: `${process.env.LOG_DIR}/traffic.log`, format: json() }),
  );
}

const logger = winston.createLogger({
  level: resolveLevel(),
  format: combine(timestamp(), errors({ stack: true })),
  defaultMeta: { service: 'traffic-awareness' },
  transports,
});

export default logger;

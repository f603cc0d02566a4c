import winston from 'winston';
import { config } from '../config';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const transports: Array<
  winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
> = [
  // stdout carries the module result, so every level goes to stderr
  new winston.transports.Console({
    stderrLevels: Object.keys(levels),
  }),
];

if (config.logging.file) {
  transports.push(new winston.transports.File({ filename: config.logging.file }));
}

export const logger = winston.createLogger({
  level: config.logging.level,
  levels,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports,
});

export default logger;

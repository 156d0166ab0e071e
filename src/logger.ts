import { createLogger, format, transports } from 'winston';
import { getConfig } from './config/config';

const { logLevel } = getConfig();

const logger = createLogger({
  level: logLevel === 'silent' ? 'error' : logLevel,
  silent: logLevel === 'silent',
  format: format.combine(
    format.colorize(),
    format.timestamp(),
    format.printf(({ timestamp, level, message }) => {
      return `${timestamp} [${level}]: ${message}`;
    })
  ),
  transports: [new transports.Console()],
});

export default logger;

import winston from 'winston'
import { loadConfig, type Config } from './config.js'

export const createLogger = (config: Config = loadConfig()): winston.Logger => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    })
  ]

  if (config.logging.filePath) {
    const fileTransportOptions: winston.transports.FileTransportOptions = {
      filename: config.logging.filePath,
      level: config.logging.level,
      maxFiles: config.logging.maxFiles || 5, // Default to 5 rotated files
      tailable: true,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.printf(({ timestamp, level, message, service, stack, ...meta }) => {
          let log = `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}`;
          if (stack) {
            log += `\n${String(stack)}`;
          }
          const additionalMeta = Object.keys(meta).length ? JSON.stringify(meta) : '';
          if (additionalMeta) {
            log += ` ${additionalMeta}`;
          }
          return log;
        })
      )
    }

    if (config.logging.maxSizeMB) {
      fileTransportOptions.maxsize = config.logging.maxSizeMB * 1024 * 1024;
    }

    transports.push(new winston.transports.File(fileTransportOptions))
  }

  return winston.createLogger({
    level: config.logging.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: 'typed-result' },
    transports
  })
}

export const logger = createLogger()

import winston from "winston";

export type Logger = winston.Logger;

export function createRootLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [new winston.transports.Console()],
  });
}

export const logger = createRootLogger();

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}

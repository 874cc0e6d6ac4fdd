import pino from "pino";
import { EsaConfig } from "./config";

/**
 * Structured logger. Output always goes to stderr so that stdout stays free
 * for command results.
 */
export class Logger {
  private logger: pino.Logger;

  constructor(config: EsaConfig) {
    const options: pino.LoggerOptions = {
      name: "esa-attachments",
      level: config.logLevel,
    };

    this.logger = config.isProduction
      ? pino(options, pino.destination(2))
      : pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              destination: 2,
            },
          },
        });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(data, message);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.logger.error(data, message);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(data, message);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(data, message);
  }
}

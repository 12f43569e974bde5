// src/utils/logger.ts
import { Inject, Injectable } from "@nestjs/common";
import * as winston from "winston";
import { GAME_CONFIG } from "../config/game-config";

export type LogMeta = Record<string, unknown>;

export interface LoggingOptions {
  logLevel: string;
  /** Error-level log file; no file is written when empty. */
  logFile?: string;
}

@Injectable()
export class LoggingService {
  private readonly logger: winston.Logger;

  constructor(@Inject(GAME_CONFIG) options: LoggingOptions) {
    this.logger = winston.createLogger({
      level: options.logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console(),
        ...(options.logFile
          ? [new winston.transports.File({ filename: options.logFile, level: "error" })]
          : []),
      ],
    });
  }

  logError(message: string, meta?: LogMeta) {
    this.logger.error(message, meta);
  }

  logInfo(message: string, meta?: LogMeta) {
    this.logger.info(message, meta);
  }

  logWarn(message: string, meta?: LogMeta) {
    this.logger.warn(message, meta);
  }

  logDebug(message: string, meta?: LogMeta) {
    this.logger.debug(message, meta);
  }
}

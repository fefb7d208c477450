import { LoggerService } from '@nestjs/common';
import { createLogger, format, Logger, transports } from 'winston';

export class CustomLogger implements LoggerService {
  private readonly logger: Logger;

  constructor(level: string = process.env.LOG_LEVEL || 'info', logFile: string | undefined = process.env.LOG_FILE) {
    const outputs: Array<transports.ConsoleTransportInstance | transports.FileTransportInstance> = [
      new transports.Console(),
    ];
    if (logFile) {
      outputs.push(new transports.File({ filename: logFile }));
    }

    this.logger = createLogger({
      level,
      format: format.combine(
        format.timestamp(),
        format.json(),
      ),
      transports: outputs,
    });
  }

  log(message: unknown, context?: string) {
    this.logger.info(String(message), { context });
  }

  error(message: unknown, trace?: string, context?: string) {
    this.logger.error(String(message), { trace, context });
  }

  warn(message: unknown, context?: string) {
    this.logger.warn(String(message), { context });
  }

  debug(message: unknown, context?: string) {
    this.logger.debug(String(message), { context });
  }

  verbose(message: unknown, context?: string) {
    this.logger.verbose(String(message), { context });
  }
}

// apps/api/src/common/app-logger.ts
import { Logger } from '@nestjs/common';
import { getLogContext } from './log-context';

/** Nest Logger that tags every line with the current request id. */
export class AppLogger extends Logger {
  private prefixMessage(message: unknown): unknown {
    const ctx = getLogContext();
    const reqId = ctx?.requestId;

    if (!reqId || typeof message !== 'string') {
      return message;
    }

    if (message.startsWith('[reqId=')) {
      return message;
    }

    return `[reqId=${reqId}] ${message}`;
  }

  log(message: unknown, ...optionalParams: unknown[]) {
    super.log(this.prefixMessage(message), ...optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    super.error(this.prefixMessage(message), ...optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    super.warn(this.prefixMessage(message), ...optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    super.debug(this.prefixMessage(message), ...optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    super.verbose(this.prefixMessage(message), ...optionalParams);
  }
}

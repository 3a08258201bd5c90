// middleware/errorHandler.ts
import logger from '../utils/logger.js';
import { GameValidationError } from '../utils/errors/index.js';

export interface ActionErrorContext {
  operation: string;
  participant?: string;
  round?: number;
}

export class ErrorHandler {
  /**
   * Action boundary: validation failures are logged and handed back so the caller
   * can re-prompt or fall back. Anything else is logged and rethrown.
   */
  static handleActionError(error: unknown, context: ActionErrorContext): GameValidationError {
    const { operation, participant, round } = context;

    if (error instanceof GameValidationError) {
      logger.warn(`[VALIDATION_ERROR] ${operation}`, {
        participant,
        round,
        code: error.code,
        message: error.message,
        details: error.details,
      });
      return error;
    }

    if (error instanceof Error) {
      logger.error(`[GAME_ERROR] ${operation}`, {
        participant,
        round,
        error: error.message,
        stack: error.stack,
      });
    } else {
      logger.error(`[UNKNOWN_ERROR] ${operation}`, { participant, round, error });
    }
    throw error;
  }

  static async monitorPerformance<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const start = process.hrtime.bigint();
    try {
      return await fn();
    } finally {
      const duration = Number(process.hrtime.bigint() - start) / 1_000_000; // ms
      logger.debug('[PERF]', { operation, duration });
    }
  }
}

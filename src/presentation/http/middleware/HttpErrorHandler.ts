import type { ErrorRequestHandler } from 'express';
import { ILogger } from '../../../domain/interfaces/ILogger';
import { HTTP_STATUS } from '../../../infrastructure/pagination/constants/HttpConstants';

/**
 * Handles errors that reach the end of the Express pipeline
 */
export class HttpErrorHandler {
  /**
   * Error middleware: logs the failure and answers 500 if nothing was sent yet
   */
  static middleware(logger: ILogger): ErrorRequestHandler {
    return (err: unknown, req, res, next) => {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error(`[${req.method} ${req.path}] ${error.message}`);

      if (res.headersSent) {
        // Let Express close the connection
        next(err);
        return;
      }

      res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ error: error.message || 'Internal server error' });
    };
  }
}

import type { Response } from 'express';
import type { ILogger } from '../../../domain/interfaces';
import { InvalidMediaError, ResolutionErrorCode, isResolutionError } from '../../../domain/errors';
import { HTTP_STATUS } from '../constants/HttpConstants';

/**
 * Handles controller errors consistently
 */
export class ErrorResponder {
  /**
   * Ensures headers are not sent before executing callback
   */
  static ensureHeadersNotSent(res: Response, callback: () => void): void {
    if (!res.headersSent) {
      callback();
    }
  }

  /**
   * Maps an error to a status, logs it with context and answers if still possible
   */
  static handle(error: unknown, res: Response, logger: ILogger, context: string): void {
    const message = error instanceof Error ? error.message : String(error);
    const status = this.statusOf(error);

    if (status === HTTP_STATUS.INTERNAL_SERVER_ERROR) {
      logger.error(`[${context}] ${message}`, error);
    } else {
      logger.warn(`[${context}] ${message}`);
    }

    this.sendError(res, status === HTTP_STATUS.INTERNAL_SERVER_ERROR ? 'Internal server error' : message, status);
  }

  static statusOf(error: unknown): number {
    if (error instanceof InvalidMediaError) {
      return HTTP_STATUS.BAD_REQUEST;
    }
    if (isResolutionError(error)) {
      return error.code === ResolutionErrorCode.CANCELLED ? HTTP_STATUS.GATEWAY_TIMEOUT : HTTP_STATUS.BAD_GATEWAY;
    }
    return HTTP_STATUS.INTERNAL_SERVER_ERROR;
  }

  /**
   * Sends generic error response
   */
  static sendError(res: Response, error: string, status: number = HTTP_STATUS.INTERNAL_SERVER_ERROR): void {
    this.ensureHeadersNotSent(res, () => {
      res.status(status).json({ error });
    });
  }
}

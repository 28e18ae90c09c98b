import { NextFunction, Request, Response } from "express";
import { GatewayError, toError, ValidationError } from "../../core/errors";
import { GatewayLogger } from "../../core/logger";

export interface ErrorBody {
  detail: string;
  issues?: unknown;
}

/**
 * Last-resort handler. Generation failures never get here (they come back
 * as 200 with "Error: ..." text); this covers unreadable bodies, schema
 * violations and whatever else escapes a route.
 */
export function errorHandler(logger: GatewayLogger) {
  return (error: unknown, req: Request, res: Response<ErrorBody>, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof ValidationError) {
      res.status(error.statusCode).json({ detail: error.message, issues: error.details?.issues });
      return;
    }

    const err = toError(error);
    const status = error instanceof GatewayError ? error.statusCode : 500;
    logger.error(err, { method: req.method, path: req.path, statusCode: status });
    res.status(status).json({ detail: err.message || "Internal server error" });
  };
}

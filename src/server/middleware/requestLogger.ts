/**
 * Logs one line per HTTP exchange: method, path, status and latency in ms.
 * Hooked on "finish" so it fires for successes, errors and 404s alike.
 */

import { NextFunction, Request, Response } from "express";
import { EventBus } from "../../core/eventBus";
import { GatewayLogger } from "../../core/logger";

export function requestLogger(logger: GatewayLogger, eventBus?: EventBus) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();
    const { method } = req;
    const path = req.path;

    res.on("finish", () => {
      const duration = Number(process.hrtime.bigint() - start) / 1e6;
      logger.traceRequest(method, path, res.statusCode, duration);
      eventBus?.emit("RequestEvent", { method, path, statusCode: res.statusCode, duration });
    });

    next();
  };
}

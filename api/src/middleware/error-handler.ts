import type { ErrorRequestHandler, Request, Response } from "express";
import { NotFoundError, ValidationError } from "../../../shared/errors";
import type { ApiResponse } from "../../../shared/types";
import { renderErrorPage } from "../../../frontend/src/render";
import type { Logger } from "../logger";

function wantsJson(req: Request): boolean {
  return req.originalUrl.startsWith("/api/");
}

function sendError(req: Request, res: Response, status: number, message: string) {
  if (wantsJson(req)) {
    const body: ApiResponse<null> = { data: null, error: message };
    res.status(status).json(body);
  } else {
    res.status(status).type("html").send(renderErrorPage(status, message));
  }
}

/** Final handler for requests no route matched. */
export function notFoundHandler(req: Request, res: Response) {
  sendError(req, res, 404, "Page not found");
}

/**
 * Maps thrown errors to responses: validation problems are the caller's
 * fault (400), a missing task is 404, everything else is logged and 500.
 */
export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof ValidationError) {
      sendError(req, res, 400, err.message);
      return;
    }
    if (err instanceof NotFoundError) {
      sendError(req, res, 404, err.message);
      return;
    }
    log.error(`${req.method} ${req.originalUrl} failed`, err);
    sendError(req, res, 500, "Something went wrong while handling this request");
  };
}

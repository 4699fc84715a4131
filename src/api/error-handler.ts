import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "pino";
import { getErrorCode, getErrorMessage, getErrorStatusCode } from "../core/errors.js";

/** Express 4 does not forward rejected promises; route them to next(). */
export function wrap(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function makeErrorHandler(log: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    // body-parser: malformed JSON
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      res.status(400).json({ ok: false, error: "invalid_json", message: err.message });
      return;
    }

    const status = getErrorStatusCode(err);
    if (status >= 500) log.error({ err, path: req.path }, "request failed");
    else log.debug({ err, path: req.path }, "request rejected");

    res.status(status).json({ ok: false, error: getErrorCode(err), message: getErrorMessage(err) });
  };
}

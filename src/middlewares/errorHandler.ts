// ============================================================
// Error Handling Middleware
// ============================================================
// The LAST two middlewares registered in app.ts.
//
//   notFound      → any unmatched route → NotFoundError (404)
//   errorHandler  → every error passed to next(error) ends here
//
// RESPONSE SHAPE (always JSON):
//   { success: false, message: "...", errors?: [{ field, message }] }
//
// AppError subclasses carry their own status. A JSON body that
// fails to parse is a 400; other body-parser rejections keep their
// own 4xx (413 too large, 415 unsupported charset / encoding).
// Anything else is logged and becomes a generic 500 (internal
// messages are not leaked).
// ============================================================

import { NextFunction, Request, Response } from "express";
import { AppError, NotFoundError, errorMessage } from "../utils/errors";

export const notFound = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.originalUrl} not found`));
};

// body-parser marks its own failures with `type` and `status`
const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";

/** Status of an http-errors client error that is safe to show, else null. */
const exposedClientStatus = (error: unknown): number | null => {
  if (!(error instanceof Error)) return null;
  if (!("expose" in error) || error.expose !== true) return null;
  if (!("status" in error) || typeof error.status !== "number") return null;
  return error.status >= 400 && error.status < 500 ? error.status : null;
};

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  _next: NextFunction
): void => {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error(`[HTTP] ${req.method} ${req.originalUrl} → ${error.statusCode}: ${error.message}`);
    }
    res.status(error.statusCode).json({
      success: false,
      message: error.message,
      ...(error.details ? { errors: error.details } : {}),
    });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ success: false, message: "Malformed JSON body" });
    return;
  }

  const clientStatus = exposedClientStatus(error);
  if (clientStatus !== null) {
    res.status(clientStatus).json({ success: false, message: errorMessage(error) });
    return;
  }

  console.error(`[HTTP] Unhandled error on ${req.method} ${req.originalUrl}:`, error);
  res.status(500).json({ success: false, message: "Internal server error" });
};

import { NextFunction, Request, Response } from "express";

/**
 * One console line per finished request:
 *   [HTTP] POST /api/chat/ 200 431ms
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const started = process.hrtime.bigint();

  res.on("finish", () => {
    const elapsedMs = Number(process.hrtime.bigint() - started) / 1e6;
    console.log(`[HTTP] ${req.method} ${req.originalUrl} ${res.statusCode} ${elapsedMs.toFixed(0)}ms`);
  });

  next();
};

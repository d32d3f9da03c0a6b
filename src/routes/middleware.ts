import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import { Logger } from "../logger";
import { InvalidRateError } from "../services/catalog";

declare global {
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}

const SLOW_REQUEST_MS = 2000;

export function asyncRoute(handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

// The upstream gateway authenticates the caller and forwards their id.
export function requireUser(req: Request, res: Response, next: NextFunction) {
  const userId = req.header("x-user-id")?.trim();
  if (!userId) {
    return res.status(401).json({ success: false, error: { code: "UNAUTHENTICATED", message: "Missing X-User-Id header" } });
  }
  req.userId = userId;
  next();
}

export function requireAdmin(req: Request, res: Response, next: NextFunction) {
  if (req.header("x-user-role") !== "admin") {
    return res.status(403).json({ success: false, error: { code: "FORBIDDEN", message: "Admin access required" } });
  }
  next();
}

/** The caller id set by requireUser. */
export function callerOf(req: Request): string {
  if (!req.userId) {
    throw new Error("requireUser must run before this handler");
  }
  return req.userId;
}

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      const durationMs = Date.now() - started;
      const fields = { method: req.method, path: req.path, statusCode: res.statusCode, durationMs };
      if (durationMs > SLOW_REQUEST_MS) {
        logger.warn(fields, "Slow request");
      } else {
        logger.debug(fields, "Request handled");
      }
    });
    next();
  };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    if (error instanceof ZodError) {
      return res.status(400).json({
        success: false,
        error: {
          code: "VALIDATION_ERROR",
          message: "Invalid request",
          details: error.issues.map(issue => ({ path: issue.path.join("."), message: issue.message }))
        }
      });
    }
    if (error instanceof InvalidRateError) {
      return res.status(400).json({ success: false, error: { code: "INVALID_RATE", message: error.message } });
    }
    // body-parser marks malformed JSON with a 400 status
    if (error instanceof SyntaxError && "status" in error && error.status === 400) {
      return res.status(400).json({ success: false, error: { code: "MALFORMED_JSON", message: "Request body is not valid JSON" } });
    }
    logger.error({ err: error, method: req.method, path: req.path }, "Unhandled request error");
    res.status(500).json({ success: false, error: { code: "INTERNAL_ERROR", message: "An unexpected error occurred" } });
  };
}

import { rateLimit } from "express-rate-limit";
import { Request, Response, NextFunction } from "express";
import { loadConfig } from "../configs/environment";

const config = loadConfig();

export const rateLimiter = rateLimit({
  windowMs: config.api.rateLimit.windowMs,
  max: config.api.rateLimit.max,
  message: {
    success: false,
    error: "TooManyRequests",
    message: "Rate limit exceeded. Please try again later.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});

/** Bodies, when present, must be JSON. Bodyless POSTs such as `/start` pass. */
export const validateContentType = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const writes = ["POST", "PUT", "PATCH"];
  if (writes.includes(req.method) && req.is("application/json") === false) {
    res.status(415).json({
      success: false,
      error: "UnsupportedMediaType",
      message: "Content-Type must be application/json",
    });
    return;
  }
  next();
};

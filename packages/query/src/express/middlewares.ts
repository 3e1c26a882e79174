import crypto from "crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { logger } from "../util/logger";

export const API_KEY_HEADER = "x-api-key";

function keysMatch(expected: string, received: string): boolean {
  const expectedBuffer = Buffer.from(expected);
  const receivedBuffer = Buffer.from(received);
  if (expectedBuffer.length !== receivedBuffer.length) {
    return false;
  }
  return crypto.timingSafeEqual(expectedBuffer, receivedBuffer);
}

/**
 * Requires the `x-api-key` header to equal `apiKey`. Without a configured
 * key every request is let through.
 */
export function authenticated(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      next();
      return;
    }

    const received = req.get(API_KEY_HEADER);
    if (!received) {
      logger.error("Auth - Invalid Request - Missing API key header");
      res.status(401).json({ error: "Invalid or missing API key" });
      return;
    }

    if (!keysMatch(apiKey, received)) {
      logger.error("Auth - Unauthorized - Invalid API key");
      res.status(401).json({ error: "Invalid or missing API key" });
      return;
    }

    next();
  };
}

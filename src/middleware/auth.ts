/**
 * Admin routes (settings audit of the game folder) take the ADMIN_API_KEY
 * in the X-API-Key header. Keys are compared in constant time.
 */
import { timingSafeEqual } from "crypto";
import type { NextFunction, Request, Response } from "express";

export const ADMIN_KEY_HEADER = "x-api-key";

function keyMatches(given: string, expected: string): boolean {
  const givenBuf = Buffer.from(given);
  const expectedBuf = Buffer.from(expected);
  return givenBuf.length === expectedBuf.length && timingSafeEqual(givenBuf, expectedBuf);
}

export function authMiddleware(req: Request, res: Response, next: NextFunction) {
  const adminKey = process.env.ADMIN_API_KEY;
  if (!adminKey) {
    return res.status(500).json({ success: false, error: "ADMIN_API_KEY is not configured, admin routes are disabled" });
  }

  const apiKey = String(req.headers[ADMIN_KEY_HEADER] || "");
  if (!apiKey || !keyMatches(apiKey, adminKey)) {
    return res.status(401).json({
      success: false,
      error: "Unauthorized",
      message: "Settings audits need the admin key in the X-API-Key header.",
    });
  }

  next();
}

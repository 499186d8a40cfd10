import crypto from "node:crypto";
import type { Request, RequestHandler } from "express";

function getKeyFromReq(req: Request): string {
  return (req.header("x-api-key") || "").trim();
}

function digest(s: string): Buffer {
  return crypto.createHash("sha256").update(s).digest();
}

/** Guards mutating routes. With no key configured the API is open (local use). */
export function requireApiKey(expected: string): RequestHandler {
  return (req, res, next) => {
    if (!expected) return next();
    const key = getKeyFromReq(req);
    if (!key) {
      res.status(401).json({ ok: false, error: "missing_api_key" });
      return;
    }
    if (!crypto.timingSafeEqual(digest(key), digest(expected))) {
      res.status(401).json({ ok: false, error: "invalid_api_key" });
      return;
    }
    next();
  };
}

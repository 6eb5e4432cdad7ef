import type { Request, Response, NextFunction, RequestHandler } from "express";
import { timingSafeEqual } from "node:crypto";

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireSyncToken(adminToken: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!adminToken) {
      console.error(`[AUTH DENIED] SYNC_ADMIN_TOKEN is not configured, refusing ${req.path}`);
      res.status(503).json({ message: "Sync API is disabled" });
      return;
    }

    const header = req.get("authorization") ?? "";
    const [scheme, token] = header.split(" ");
    if (scheme !== "Bearer" || !token) {
      console.error(`[AUTH DENIED] Missing bearer token for ${req.path}`);
      res.status(401).json({ message: "Unauthorized" });
      return;
    }

    if (!tokensMatch(token, adminToken)) {
      console.error(`[AUTH DENIED] Invalid token for ${req.path}`);
      res.status(403).json({ message: "Forbidden" });
      return;
    }

    next();
  };
}

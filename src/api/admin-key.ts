import crypto from "crypto";
import type { NextFunction, Request, Response } from "express";

function getKeyFromReq(req: Request): string {
  return (req.header("x-admin-key") || "").trim();
}

function sameKey(a: string, b: string): boolean {
  const x = Buffer.from(a);
  const y = Buffer.from(b);
  return x.length === y.length && crypto.timingSafeEqual(x, y);
}

export function checkAdminKey(req: Request, adminKey: string) {
  if (!adminKey) {
    return { ok: false as const, status: 500, error: "admin_key_not_configured" as const };
  }
  const key = getKeyFromReq(req);
  if (!key) {
    return { ok: false as const, status: 401, error: "missing_admin_key" as const };
  }
  if (!sameKey(key, adminKey)) {
    return { ok: false as const, status: 401, error: "invalid_admin_key" as const };
  }
  return { ok: true as const, status: 200 };
}

/** Guards supervisor routes. */
export function requireAdminKey(adminKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const k = checkAdminKey(req, adminKey);
    if (!k.ok) {
      res.status(k.status).json({ ok: false, error: k.error });
      return;
    }
    next();
  };
}

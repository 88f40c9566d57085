// backend/http/requireAuth.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { AuthJwtPayload, JwtVerifier } from "../auth/jwt.js";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {

    interface Request {
      user?: AuthJwtPayload;
    }
  }
}

export function createRequireAuth(verify: JwtVerifier): RequestHandler {
  return function requireAuth(req: Request, res: Response, next: NextFunction) {
    const header = String(req.headers.authorization || "");
    if (!header.startsWith("Bearer ")) {
      res.setHeader("WWW-Authenticate", "Bearer");
      return res.status(401).json({ error: "Missing token" });
    }

    try {
      const token = header.slice("Bearer ".length);
      req.user = verify(token);
    } catch {
      res.setHeader("WWW-Authenticate", "Bearer");
      return res.status(401).json({ error: "Invalid token" });
    }

    return next();
  };
}

import type { Request, Response, NextFunction, RequestHandler } from "express";
import jwt from "jsonwebtoken";

// Extend Express Request type to include businessId
declare global {
  namespace Express {
    interface Request {
      businessId?: string;
    }
  }
}

function readToken(req: Request): string | undefined {
  const cookieToken: unknown = req.cookies?.token;
  if (typeof cookieToken === "string" && cookieToken) {
    return cookieToken;
  }

  const authHeader = req.headers.authorization;
  if (authHeader && authHeader.startsWith("Bearer ")) {
    return authHeader.substring(7);
  }
  return undefined;
}

/**
 * Authentication middleware
 * Verifies the JWT (cookie or Bearer header) and attaches its businessId to the request
 */
export const authenticate = (secret: string): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = readToken(req);

    if (!token) {
      res.status(401).json({
        success: false,
        error: { kind: "Unauthorized", message: "No token provided" },
      });
      return;
    }

    try {
      const decoded = jwt.verify(token, secret);
      if (typeof decoded === "string" || typeof decoded.businessId !== "string" || !decoded.businessId) {
        res.status(401).json({
          success: false,
          error: { kind: "Unauthorized", message: "Token does not name a business" },
        });
        return;
      }

      req.businessId = decoded.businessId;
      next();
    } catch {
      res.status(401).json({
        success: false,
        error: { kind: "Unauthorized", message: "Invalid or expired token" },
      });
    }
  };
};

export function requireBusinessId(req: Request): string {
  if (!req.businessId) {
    throw new Error("authenticate middleware must run before this handler");
  }
  return req.businessId;
}

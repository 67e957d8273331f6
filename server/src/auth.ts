import type { RequestHandler, Response } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { unauthorized } from "./errors";

const tokenPayloadSchema = z.object({
  id: z.number().int().positive(),
  username: z.string(),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export function signToken(payload: TokenPayload, secret: string): string {
  return jwt.sign(payload, secret, { expiresIn: "7d" });
}

export function verifyToken(token: string, secret: string): TokenPayload {
  const decoded = jwt.verify(token, secret);
  const parsed = tokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) throw unauthorized("Invalid token");
  return parsed.data;
}

export function requireAuth(secret: string): RequestHandler {
  return (req, res, next) => {
    const auth = req.headers.authorization;
    if (!auth?.startsWith("Bearer ")) return next(unauthorized());
    try {
      res.locals.user = verifyToken(auth.slice(7), secret);
      next();
    } catch {
      next(unauthorized("Invalid token"));
    }
  };
}

/** The user `requireAuth` put on the response. */
export function authenticatedUser(res: Response): TokenPayload {
  const parsed = tokenPayloadSchema.safeParse(res.locals.user);
  if (!parsed.success) throw unauthorized();
  return parsed.data;
}
